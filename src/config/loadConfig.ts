import fs from "node:fs";
import type { PropertyInput, QueryDefinition } from "../ga/types";
import { isReportDate } from "../lib/dates";
import { ConfigError } from "../lib/errors";
import { safeSegment } from "../output/filenames";
import type { OutputFormat } from "../output/manifest";
import type { ServiceAccount } from "./credentials";

export type ExtractorConfig = {
  serviceAccount: ServiceAccount;
  propertyList: PropertyInput[];
  startDate?: string;
  endDate?: string;
  queryDefinitions: QueryDefinition[];
  destination: string;
  outputFormat: OutputFormat;
  maxWorkers: number;
  batchSize: number;
  chunkSize: number;
  rateLimitDelaySeconds: number;
  maxRetries: number;
  backoffFactor: number;
  maxPages: number;
  requestTimeoutSeconds: number;
  maxFieldLength: number;
};

export const CONFIG_DEFAULTS = {
  destination: "ga4",
  outputFormat: "default",
  maxWorkers: 5,
  batchSize: 100_000,
  chunkSize: 10_000,
  rateLimitDelaySeconds: 0.1,
  maxRetries: 3,
  backoffFactor: 2,
  maxPages: 100,
  requestTimeoutSeconds: 300,
  maxFieldLength: 1000,
} as const;

type RecordValue = Record<string, unknown>;

function isRecord(value: unknown): value is RecordValue {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function optionalString(value: unknown, field: string, errors: string[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    errors.push(`${field} must be a string when provided`);
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed || undefined;
}

function optionalNumber(
  value: unknown,
  field: string,
  bounds: { min: number; max?: number; integer?: boolean; exclusiveMin?: boolean },
  fallback: number,
  errors: string[]
): number {
  if (value === undefined || value === null || value === "") return fallback;
  const parsed = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed)) {
    errors.push(`${field} must be a finite number when provided`);
    return fallback;
  }
  if (bounds.integer && !Number.isInteger(parsed)) {
    errors.push(`${field} must be an integer`);
    return fallback;
  }
  const belowMin = bounds.exclusiveMin ? parsed <= bounds.min : parsed < bounds.min;
  if (belowMin || (bounds.max !== undefined && parsed > bounds.max)) {
    const range = `${bounds.exclusiveMin ? ">" : ">="} ${bounds.min}${
      bounds.max !== undefined ? ` and <= ${bounds.max}` : ""
    }`;
    errors.push(`${field} must be ${range}`);
    return fallback;
  }
  return parsed;
}

function stringList(value: unknown, field: string, errors: string[]): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array of strings`);
    return [];
  }
  const out: string[] = [];
  value.forEach((item, index) => {
    if (typeof item !== "string" || !item.trim()) {
      errors.push(`${field}[${index}] must be a non-empty string`);
      return;
    }
    out.push(item.trim());
  });
  return out;
}

/** Accepts `{ parameters: {...} }` and the doubly nested `{ parameters: { parameters: {...} } }`. */
export function flattenParameters(raw: unknown): RecordValue | null {
  if (!isRecord(raw) || !isRecord(raw.parameters)) return null;
  const params = raw.parameters;
  return isRecord(params.parameters) ? params.parameters : params;
}

function parseServiceAccount(value: unknown, errors: string[]): ServiceAccount {
  if (!isRecord(value)) {
    errors.push("service_account_json is required and must be an object");
    return { private_key: "" };
  }
  const privateKey = value.private_key;
  if (typeof privateKey !== "string" || !privateKey.trim()) {
    errors.push("service_account_json.private_key is required");
    return { private_key: "" };
  }
  return { ...value, private_key: privateKey };
}

function parsePropertyInput(raw: unknown, index: number, errors: string[]): PropertyInput | null {
  if (typeof raw === "string" || typeof raw === "number") {
    const propertyId = String(raw).trim();
    if (!propertyId) {
      errors.push(`property_list[${index}] must not be empty`);
      return null;
    }
    return { property_id: propertyId };
  }
  if (!isRecord(raw)) {
    errors.push(`property_list[${index}] must be a property id or an object`);
    return null;
  }
  const rawId = raw.property_id;
  const propertyId =
    typeof rawId === "string" || typeof rawId === "number" ? String(rawId).trim() : "";
  if (!propertyId) {
    errors.push(`property_list[${index}].property_id is required`);
    return null;
  }
  const input: PropertyInput = { property_id: propertyId };
  const propertyName = optionalString(raw.property_name, `property_list[${index}].property_name`, errors);
  const accountId =
    typeof raw.account_id === "number"
      ? String(raw.account_id)
      : optionalString(raw.account_id, `property_list[${index}].account_id`, errors);
  const accountName = optionalString(raw.account_name, `property_list[${index}].account_name`, errors);
  if (propertyName !== undefined) input.property_name = propertyName;
  if (accountId !== undefined) input.account_id = accountId;
  if (accountName !== undefined) input.account_name = accountName;
  return input;
}

function parsePropertyList(value: unknown, errors: string[]): PropertyInput[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    errors.push("property_list must be an array when provided");
    return [];
  }
  const out: PropertyInput[] = [];
  value.forEach((raw, index) => {
    const parsed = parsePropertyInput(raw, index, errors);
    if (parsed) out.push(parsed);
  });
  return out;
}

function parseQueryDefinition(raw: unknown, index: number, errors: string[]): QueryDefinition | null {
  const field = `query_definitions[${index}]`;
  if (!isRecord(raw)) {
    errors.push(`${field} must be an object`);
    return null;
  }
  const name = typeof raw.name === "string" ? raw.name.trim() : "";
  if (!name) errors.push(`${field}.name is required`);
  const dimensions = stringList(raw.dimensions, `${field}.dimensions`, errors);
  const metrics = stringList(raw.metrics, `${field}.metrics`, errors);
  if (!metrics.length && Array.isArray(raw.metrics)) errors.push(`${field}.metrics must not be empty`);
  if (raw.metrics === undefined) errors.push(`${field}.metrics is required`);
  if (!name) return null;

  const definition: QueryDefinition = { name, dimensions, metrics };
  if (raw.dimension_filter !== undefined && raw.dimension_filter !== null) {
    definition.dimension_filter = raw.dimension_filter;
  }
  return definition;
}

function parseQueryDefinitions(value: unknown, errors: string[]): QueryDefinition[] {
  if (!Array.isArray(value)) {
    errors.push("query_definitions is required and must be an array");
    return [];
  }
  const out: QueryDefinition[] = [];
  const names = new Set<string>();
  // query names end up in output filenames, so they must stay distinct there too
  const fileSegments = new Map<string, string>();
  value.forEach((raw, index) => {
    const parsed = parseQueryDefinition(raw, index, errors);
    if (!parsed) return;
    if (names.has(parsed.name)) {
      errors.push(`query_definitions[${index}].name duplicates "${parsed.name}"`);
      return;
    }
    const segment = safeSegment(parsed.name);
    const clash = fileSegments.get(segment);
    if (clash !== undefined) {
      errors.push(
        `query_definitions[${index}].name "${parsed.name}" maps to the same output file as "${clash}"`
      );
      return;
    }
    names.add(parsed.name);
    fileSegments.set(segment, parsed.name);
    out.push(parsed);
  });
  return out;
}

function parseDate(value: unknown, field: string, errors: string[]): string | undefined {
  const date = optionalString(value, field, errors);
  if (date !== undefined && !isReportDate(date)) {
    errors.push(`${field} must be YYYY-MM-DD, today, yesterday or NdaysAgo`);
    return undefined;
  }
  return date;
}

function parseOutputFormat(value: unknown, errors: string[]): OutputFormat {
  const format = optionalString(value, "output_format", errors);
  if (format === undefined || format === "default") return "default";
  if (format === "json") return "json";
  errors.push(`output_format must be "default" or "json"`);
  return "default";
}

export function parseExtractorConfig(raw: unknown): ExtractorConfig {
  const params = flattenParameters(raw);
  if (!params) throw new ConfigError(["configuration must contain a parameters object"]);

  const errors: string[] = [];
  const serviceAccount = parseServiceAccount(params.service_account_json, errors);
  const propertyList = parsePropertyList(params.property_list, errors);
  const startDate = parseDate(params.start_date, "start_date", errors);
  const endDate = parseDate(params.end_date, "end_date", errors);
  const queryDefinitions = parseQueryDefinitions(params.query_definitions, errors);
  const destination = optionalString(params.destination, "destination", errors) ?? CONFIG_DEFAULTS.destination;
  const outputFormat = parseOutputFormat(params.output_format, errors);

  const config: ExtractorConfig = {
    serviceAccount,
    propertyList,
    startDate,
    endDate,
    queryDefinitions,
    destination,
    outputFormat,
    maxWorkers: optionalNumber(params.max_workers, "max_workers", { min: 1, integer: true }, CONFIG_DEFAULTS.maxWorkers, errors),
    batchSize: optionalNumber(params.batch_size, "batch_size", { min: 1, max: 100_000, integer: true }, CONFIG_DEFAULTS.batchSize, errors),
    chunkSize: optionalNumber(params.chunk_size, "chunk_size", { min: 1, integer: true }, CONFIG_DEFAULTS.chunkSize, errors),
    rateLimitDelaySeconds: optionalNumber(params.rate_limit_delay, "rate_limit_delay", { min: 0 }, CONFIG_DEFAULTS.rateLimitDelaySeconds, errors),
    maxRetries: optionalNumber(params.max_retries, "max_retries", { min: 0, integer: true }, CONFIG_DEFAULTS.maxRetries, errors),
    backoffFactor: optionalNumber(params.backoff_factor, "backoff_factor", { min: 1 }, CONFIG_DEFAULTS.backoffFactor, errors),
    maxPages: optionalNumber(params.max_pages, "max_pages", { min: 1, integer: true }, CONFIG_DEFAULTS.maxPages, errors),
    requestTimeoutSeconds: optionalNumber(params.request_timeout_seconds, "request_timeout_seconds", { min: 0, exclusiveMin: true }, CONFIG_DEFAULTS.requestTimeoutSeconds, errors),
    maxFieldLength: optionalNumber(params.max_field_length, "max_field_length", { min: 4, integer: true }, CONFIG_DEFAULTS.maxFieldLength, errors),
  };

  if (errors.length) throw new ConfigError(errors);
  return config;
}

export function readExtractorConfig(configPath: string): ExtractorConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError([`config file not found: ${configPath}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError([`cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseExtractorConfig(raw);
}
