import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, sampleForLog } from "../src/lib/logger";

const savedEnv = { LOG_LEVEL: process.env.LOG_LEVEL, LOG_FORMAT: process.env.LOG_FORMAT };

afterEach(() => {
  vi.restoreAllMocks();
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe("logger", () => {
  it("prints one JSON object per line in json format", () => {
    process.env.LOG_FORMAT = "json";
    delete process.env.LOG_LEVEL;
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);

    logger.info("[Pipeline] Query finished", { query: "geo", rows: 2 });

    expect(out).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(out.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "info", msg: "[Pipeline] Query finished", query: "geo", rows: 2 });
    expect(typeof line.ts).toBe("string");
  });

  it("drops messages below LOG_LEVEL", () => {
    process.env.LOG_LEVEL = "warn";
    delete process.env.LOG_FORMAT;
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.info("[Test] hidden");
    logger.warn("[Test] shown", { reason: "x" });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Test] shown", { reason: "x" });
  });
});

describe("sampleForLog", () => {
  it("keeps the first records and caps the length", () => {
    expect(sampleForLog([{ a: "1" }, { a: "2" }, { a: "3" }])).toBe('[{"a":"1"},{"a":"2"}]');
    expect(sampleForLog(["abcdefghij"], 1, 5)).toBe('["abc...');
  });
});
