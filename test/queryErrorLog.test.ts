import fs from "node:fs";
import { describe, expect, it } from "vitest";
import { QueryErrorLog } from "../src/output/queryErrorLog";
import { makeTmpDir } from "./utils/fakes";

describe("QueryErrorLog", () => {
  it("writes the header once and one line per failure", async () => {
    const log = new QueryErrorLog(makeTmpDir("errors"), () => new Date("2026-10-18T09:30:05Z"));

    await Promise.all([
      log.record({
        query_name: "geo",
        entity_id: "222",
        error: "[auth] code 7 PERMISSION_DENIED (after 1 attempt)",
        context: { kind: "auth", page: 1 },
      }),
      log.record({
        query_name: "pages",
        entity_id: "333",
        error: 'bad "dimension"\nname',
        context: {},
      }),
    ]);

    expect(log.count).toBe(2);
    expect(fs.readFileSync(log.filePath, "utf8")).toBe(
      [
        "timestamp,query_name,entity_id,error,context",
        "2026-10-18T09:30:05.000Z,geo,222,[auth] code 7 PERMISSION_DENIED (after 1 attempt),\"{'kind':'auth','page':1}\"",
        "2026-10-18T09:30:05.000Z,pages,333,bad 'dimension' name,{}",
        "",
      ].join("\n")
    );
  });

  it("appends to an existing file without a second header", async () => {
    const dir = makeTmpDir("errors");
    const first = new QueryErrorLog(dir, () => new Date("2026-10-18T00:00:00Z"));
    await first.record({ query_name: "a", entity_id: "1", error: "x", context: {} });
    const second = new QueryErrorLog(dir, () => new Date("2026-10-18T00:00:00Z"));
    await second.record({ query_name: "b", entity_id: "2", error: "y", context: {} });

    expect(fs.readFileSync(second.filePath, "utf8").split("\n").filter(Boolean)).toEqual([
      "timestamp,query_name,entity_id,error,context",
      "2026-10-18T00:00:00.000Z,a,1,x,{}",
      "2026-10-18T00:00:00.000Z,b,2,y,{}",
    ]);
  });
});
