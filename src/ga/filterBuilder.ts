import { logger, type Logger } from "../lib/logger";
import type { FilterExpression, StringFilter, StringMatchType } from "./types";

const MATCH_TYPES: ReadonlySet<string> = new Set<StringMatchType>([
  "EXACT",
  "BEGINS_WITH",
  "ENDS_WITH",
  "CONTAINS",
  "FULL_REGEXP",
  "PARTIAL_REGEXP",
]);

type RecordValue = Record<string, unknown>;

function isRecord(value: unknown): value is RecordValue {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isMatchType(value: string): value is StringMatchType {
  return MATCH_TYPES.has(value);
}

type ConditionParse =
  | { ok: true; fieldName: string; stringFilter: StringFilter }
  | { ok: false; reason: string };

function parseCondition(raw: unknown): ConditionParse {
  if (!isRecord(raw)) return { ok: false, reason: "condition must be an object" };

  const fieldName = typeof raw.field_name === "string" ? raw.field_name.trim() : "";
  if (!fieldName) return { ok: false, reason: "missing field_name" };

  const stringFilter = raw.string_filter;
  if (!isRecord(stringFilter) || typeof stringFilter.value !== "string") {
    return { ok: false, reason: "missing string_filter.value" };
  }

  const filter: StringFilter = { value: stringFilter.value };
  if (stringFilter.match_type !== undefined) {
    const matchType = String(stringFilter.match_type).trim().toUpperCase();
    if (!isMatchType(matchType)) {
      return { ok: false, reason: `unknown match_type ${String(stringFilter.match_type)}` };
    }
    filter.matchType = matchType;
  }
  if (typeof stringFilter.case_sensitive === "boolean") {
    filter.caseSensitive = stringFilter.case_sensitive;
  }
  return { ok: true, fieldName, stringFilter: filter };
}

/**
 * Turns `{ and_group: [{ field_name, string_filter: { value } }] }` into a Data
 * API filter expression. Malformed conditions are dropped one by one; returns
 * null when nothing usable is left.
 */
export function buildDimensionFilter(
  config: unknown,
  log: Logger = logger
): FilterExpression | null {
  if (!isRecord(config)) return null;
  const group = config.and_group;
  if (!Array.isArray(group) || group.length === 0) return null;

  const expressions: FilterExpression["andGroup"]["expressions"] = [];
  group.forEach((raw, index) => {
    const parsed = parseCondition(raw);
    if (!parsed.ok) {
      log.warn("[Filter] Skipping malformed condition", { index, reason: parsed.reason });
      return;
    }
    expressions.push({ filter: { fieldName: parsed.fieldName, stringFilter: parsed.stringFilter } });
  });

  if (!expressions.length) return null;
  return { andGroup: { expressions } };
}
