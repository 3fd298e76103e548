import type {
  AnalyticsReportApi,
  Entity,
  FilterExpression,
  QueryDefinition,
  ReportRow,
} from "../ga/types";
import type { DateRange } from "../lib/dates";
import { classifyApiError, formatError, type ApiErrorKind } from "../lib/errors";
import { logger, type Logger } from "../lib/logger";
import type { RateLimiter } from "../lib/rateLimiter";
import { fail, ok, type Result } from "../lib/result";
import { callWithRetry, type RetryPolicy } from "../lib/retry";

export const API_PAGE_LIMIT = 100_000;
export const DEFAULT_MAX_PAGES = 100;
export const DATE_DIMENSION = "date";

export type ReportRecord = Readonly<Record<string, string>>;

export const ENTITY_COLUMNS = ["account_id", "account_name", "property_id", "property_name"] as const;

export type FetchState = "pending" | "fetching_page" | "accumulating" | "done" | "partial" | "failed";

export type FetchFailure = {
  kind: ApiErrorKind;
  message: string;
  page: number;
  offset: number;
};

export type EntityFetch = {
  status: "done" | "partial";
  records: ReportRecord[];
  pages: number;
  pageRowCounts: number[];
};

export type EntityFetchResult = Result<EntityFetch, FetchFailure>;

export type ExecutorOptions = {
  pageSize: number;
  maxPages: number;
  rateLimiter: RateLimiter;
  retry: RetryPolicy & { delaysMs?: number[] };
  signal?: AbortSignal;
  log?: Logger;
  onStateChange?: (state: FetchState) => void;
};

export type QueryUnit = {
  query: QueryDefinition;
  entity: Entity;
  dateRange: DateRange;
  dimensionFilter: FilterExpression | null;
};

/** Puts "date" first unless the query already asks for it. Returns a new definition. */
export function injectDateDimension(query: QueryDefinition): QueryDefinition {
  if (query.dimensions.includes(DATE_DIMENSION)) return query;
  return { ...query, dimensions: [DATE_DIMENSION, ...query.dimensions] };
}

export function clampPageSize(pageSize: number): number {
  if (!Number.isFinite(pageSize) || pageSize < 1) return API_PAGE_LIMIT;
  return Math.min(Math.floor(pageSize), API_PAGE_LIMIT);
}

export function recordColumns(query: QueryDefinition): string[] {
  return [...ENTITY_COLUMNS, ...query.dimensions, ...query.metrics];
}

export function normalizeRow(entity: Entity, query: QueryDefinition, row: ReportRow): ReportRecord {
  const record: Record<string, string> = {
    account_id: entity.account_id,
    account_name: entity.account_name,
    property_id: entity.property_id,
    property_name: entity.property_name,
  };
  query.dimensions.forEach((dimension, index) => {
    const value = row.dimensionValues[index];
    record[dimension] = value === null || value === undefined ? "" : String(value);
  });
  query.metrics.forEach((metric, index) => {
    const value = row.metricValues[index];
    record[metric] = value === null || value === undefined ? "0" : String(value);
  });
  return record;
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason.message : "aborted";
}

/**
 * Fetches every page of one query for one property. Pages are requested one
 * after another; a short page (or a reached rowCount) ends the loop, and
 * `maxPages` caps it. A failed request ends the fetch and is returned as a
 * failure value together with the page it happened on.
 */
export async function fetchEntityReport(
  api: AnalyticsReportApi,
  unit: QueryUnit,
  options: ExecutorOptions
): Promise<EntityFetchResult> {
  const log = options.log ?? logger;
  const limit = clampPageSize(options.pageSize);
  const maxPages = Math.max(1, Math.floor(options.maxPages));
  const setState = (state: FetchState) => options.onStateChange?.(state);
  const { query, entity } = unit;

  const records: ReportRecord[] = [];
  const pageRowCounts: number[] = [];
  let offset = 0;
  setState("pending");

  for (let page = 1; page <= maxPages; page += 1) {
    if (options.signal?.aborted) {
      setState("failed");
      return fail({ kind: "timeout", message: abortReason(options.signal), page, offset });
    }

    setState("fetching_page");
    let rows: ReportRow[];
    let rowCount: number | null;
    try {
      const result = await callWithRetry(
        async () => {
          await options.rateLimiter.wait();
          options.signal?.throwIfAborted();
          return api.runReport({
            propertyId: entity.property_id,
            dimensions: query.dimensions,
            metrics: query.metrics,
            dateRange: unit.dateRange,
            dimensionFilter: unit.dimensionFilter,
            limit,
            offset,
          });
        },
        options.retry,
        ({ attempt, error, delayMs }) => {
          log.warn("[Executor] Retrying report page", {
            query: query.name,
            propertyId: entity.property_id,
            page,
            attempt,
            delayMs,
            error: formatError(error),
          });
        },
        options.signal
      );
      rows = result.rows;
      rowCount = result.rowCount;
    } catch (err) {
      setState("failed");
      return fail({ kind: classifyApiError(err), message: formatError(err), page, offset });
    }

    setState("accumulating");
    for (const row of rows) records.push(normalizeRow(entity, query, row));
    pageRowCounts.push(rows.length);
    offset += rows.length;

    log.debug("[Executor] Page fetched", {
      query: query.name,
      propertyId: entity.property_id,
      page,
      rows: rows.length,
    });

    const shortPage = rows.length < limit;
    const reachedTotal = rowCount !== null && offset >= rowCount;
    if (shortPage || reachedTotal) {
      setState("done");
      return ok({ status: "done", records, pages: page, pageRowCounts });
    }
  }

  log.warn("[Executor] Page ceiling reached; keeping rows fetched so far", {
    query: query.name,
    propertyId: entity.property_id,
    maxPages,
    rows: records.length,
  });
  setState("partial");
  return ok({ status: "partial", records, pages: maxPages, pageRowCounts });
}
