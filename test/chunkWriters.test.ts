import fs from "node:fs";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import {
  createLineChunkWriter,
  escapeCsvField,
  toCsvLine,
  writeChunkWithSheet,
} from "../src/output/chunkWriters";
import { makeTmpDir } from "./utils/fakes";

describe("CSV helpers", () => {
  it("quotes fields with separators, quotes or line breaks", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });

  it("renders missing cells as empty and rejects non-text cells", () => {
    expect(toCsvLine(["a", "b", "c"], { a: "1", c: "3" })).toBe("1,,3");
    const parsed: Record<string, string> = JSON.parse('{"a":true}');
    expect(() => toCsvLine(["a"], parsed)).toThrow("column a holds a boolean, expected text");
  });
});

describe("chunk writers", () => {
  it("writes a sheet chunk with and without the header", () => {
    const filePath = path.join(makeTmpDir("chunks"), "nested", "out.csv");
    const columns = ["country", "sessions"];

    writeChunkWithSheet({
      filePath,
      columns,
      records: [{ country: "Malaysia", sessions: "12" }],
      includeHeader: true,
      createFile: true,
    });
    const outcome = writeChunkWithSheet({
      filePath,
      columns,
      records: [{ country: "Korea, Republic of", sessions: "3" }],
      includeHeader: false,
      createFile: false,
    });

    expect(outcome).toEqual({ written: 1, skipped: 0 });
    expect(fs.readFileSync(filePath, "utf8")).toBe(
      'country,sessions\nMalaysia,12\n"Korea, Republic of",3\n'
    );
  });

  it("reports rows the line writer skipped", () => {
    const filePath = path.join(makeTmpDir("chunks"), "out.csv");
    const onSkip = vi.fn();
    const rows: Record<string, string>[] = JSON.parse('[{"a":"1"},{"a":{"nested":true}}]');

    const outcome = createLineChunkWriter(onSkip)({
      filePath,
      columns: ["a"],
      records: rows,
      includeHeader: false,
      createFile: true,
    });

    expect(outcome).toEqual({ written: 1, skipped: 1 });
    expect(fs.readFileSync(filePath, "utf8")).toBe("1\n");
    expect(onSkip).toHaveBeenCalledWith(
      expect.objectContaining({ index: 1, reason: "column a holds a object, expected text" })
    );
  });

  it("refuses to create a file that already exists", () => {
    const filePath = path.join(makeTmpDir("chunks"), "out.csv");
    fs.writeFileSync(filePath, "earlier\n", "utf8");
    const request = { filePath, columns: ["a"], records: [{ a: "1" }], includeHeader: true, createFile: true };

    expect(() => writeChunkWithSheet(request)).toThrow(/EEXIST/);
    expect(() => createLineChunkWriter()(request)).toThrow(/EEXIST/);
    expect(fs.readFileSync(filePath, "utf8")).toBe("earlier\n");
  });
});
