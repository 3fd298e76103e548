import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { CONFIG_DEFAULTS, parseExtractorConfig, readExtractorConfig } from "../src/config/loadConfig";
import { ConfigError } from "../src/lib/errors";
import { makeTmpDir } from "./utils/fakes";

const serviceAccount = { type: "service_account", private_key: "test-secret", client_email: "extractor@example.com" };

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseExtractorConfig", () => {
  it("applies defaults to a minimal configuration", () => {
    const config = parseExtractorConfig({
      parameters: {
        service_account_json: serviceAccount,
        query_definitions: [{ name: "geo", dimensions: ["country"], metrics: ["sessions"] }],
      },
    });

    expect(config).toEqual({
      serviceAccount,
      propertyList: [],
      startDate: undefined,
      endDate: undefined,
      queryDefinitions: [{ name: "geo", dimensions: ["country"], metrics: ["sessions"] }],
      destination: "ga4",
      outputFormat: "default",
      maxWorkers: CONFIG_DEFAULTS.maxWorkers,
      batchSize: 100_000,
      chunkSize: 10_000,
      rateLimitDelaySeconds: 0.1,
      maxRetries: 3,
      backoffFactor: 2,
      maxPages: 100,
      requestTimeoutSeconds: 300,
      maxFieldLength: 1000,
    });
  });

  it("reads doubly nested parameters and mixed property lists", () => {
    const config = parseExtractorConfig({
      parameters: {
        parameters: {
          service_account_json: serviceAccount,
          property_list: ["123", 456, { property_id: 789, account_id: 12, account_name: " Main " }],
          query_definitions: [],
          batch_size: "500",
          output_format: "json",
          start_date: "30daysAgo",
          end_date: "2026-10-17",
        },
      },
    });

    expect(config.propertyList).toEqual([
      { property_id: "123" },
      { property_id: "456" },
      { property_id: "789", account_id: "12", account_name: "Main" },
    ]);
    expect(config.queryDefinitions).toEqual([]);
    expect(config.batchSize).toBe(500);
    expect(config.outputFormat).toBe("json");
    expect(config.startDate).toBe("30daysAgo");
    expect(config.endDate).toBe("2026-10-17");
  });

  it("keeps the dimension filter of a query untouched", () => {
    const filter = { and_group: [{ field_name: "country", string_filter: { value: "Malaysia" } }] };
    const config = parseExtractorConfig({
      parameters: {
        service_account_json: serviceAccount,
        query_definitions: [{ name: "geo", dimensions: [], metrics: ["sessions"], dimension_filter: filter }],
      },
    });
    expect(config.queryDefinitions[0].dimension_filter).toEqual(filter);
  });

  it("collects every problem before failing", () => {
    const problems = problemsOf(() =>
      parseExtractorConfig({
        parameters: {
          start_date: "2026-13-01",
          query_definitions: [
            { name: "geo", metrics: [] },
            { name: "geo", metrics: ["sessions"] },
            { name: "x" },
          ],
          output_format: "xml",
          max_workers: 0,
          batch_size: 200_000,
        },
      })
    );

    expect(problems).toEqual([
      "service_account_json is required and must be an object",
      "start_date must be YYYY-MM-DD, today, yesterday or NdaysAgo",
      "query_definitions[0].metrics must not be empty",
      'query_definitions[1].name duplicates "geo"',
      "query_definitions[2].metrics is required",
      'output_format must be "default" or "json"',
      "max_workers must be >= 1",
      "batch_size must be >= 1 and <= 100000",
    ]);
  });

  it("rejects query names that collide once made filename-safe", () => {
    const problems = problemsOf(() =>
      parseExtractorConfig({
        parameters: {
          service_account_json: serviceAccount,
          query_definitions: [
            { name: "geo daily", metrics: ["sessions"] },
            { name: "geo/daily", metrics: ["sessions"] },
            { name: "geo.daily", metrics: ["sessions"] },
          ],
        },
      })
    );
    expect(problems).toEqual(['query_definitions[1].name "geo/daily" maps to the same output file as "geo daily"']);
  });

  it("requires a private key and the query list", () => {
    expect(
      problemsOf(() => parseExtractorConfig({ parameters: { service_account_json: { client_email: "x" } } }))
    ).toEqual([
      "service_account_json.private_key is required",
      "query_definitions is required and must be an array",
    ]);
  });

  it("rejects input without a parameters object", () => {
    expect(problemsOf(() => parseExtractorConfig({ service_account_json: serviceAccount }))).toEqual([
      "configuration must contain a parameters object",
    ]);
  });
});

describe("readExtractorConfig", () => {
  it("reads a config file from disk", () => {
    const file = path.join(makeTmpDir("config"), "config.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ parameters: { service_account_json: serviceAccount, query_definitions: [] } }),
      "utf8"
    );
    expect(readExtractorConfig(file).destination).toBe("ga4");
  });

  it("reports a missing or unreadable file as a config error", () => {
    const dir = makeTmpDir("config");
    const missing = path.join(dir, "missing.json");
    expect(problemsOf(() => readExtractorConfig(missing))).toEqual([`config file not found: ${missing}`]);

    const broken = path.join(dir, "broken.json");
    fs.writeFileSync(broken, "{ not json", "utf8");
    const [problem] = problemsOf(() => readExtractorConfig(broken));
    expect(problem.startsWith(`cannot parse ${broken}: `)).toBe(true);
  });
});
