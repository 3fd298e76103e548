import fs from "node:fs";
import path from "node:path";
import type { ExtractorConfig } from "../config/loadConfig";
import {
  fetchEntityReport,
  injectDateDimension,
  recordColumns,
  type EntityFetchResult,
  type ReportRecord,
} from "../extract/queryExecutor";
import { buildDimensionFilter } from "../ga/filterBuilder";
import { PropertyResolver } from "../ga/propertyResolver";
import type { AnalyticsAdminApi, AnalyticsReportApi, Entity, QueryDefinition } from "../ga/types";
import { runWithConcurrency, withTimeout } from "../lib/concurrency";
import { formatRunStamp, resolveDateRange, type DateRange } from "../lib/dates";
import { classifyApiError, formatError } from "../lib/errors";
import { logger, type Logger } from "../lib/logger";
import { RateLimiter } from "../lib/rateLimiter";
import { fail } from "../lib/result";
import type { RetryPolicy } from "../lib/retry";
import { outputFilename } from "../output/filenames";
import { buildOutputManifest, writeOutputManifest } from "../output/manifest";
import { QueryErrorLog } from "../output/queryErrorLog";
import { sanitizeRecord } from "../output/sanitize";
import { StreamingCsvWriter, type WriterStats } from "../output/streamingWriter";

export type PipelineDeps = {
  admin: AnalyticsAdminApi;
  reports: AnalyticsReportApi;
  outDir: string;
  now?: () => Date;
  log?: Logger;
  rateLimiter?: RateLimiter;
  dryRun?: boolean;
};

export type QueryRunSummary = {
  query_name: string;
  filename: string;
  written: boolean;
  manifest_path: string | null;
  writer: WriterStats | null;
  entities_succeeded: number;
  entities_partial: number;
  entities_failed: number;
};

export type RunSummary = {
  status: "completed" | "no_queries" | "no_entities" | "dry_run";
  date_range: DateRange;
  entities: Entity[];
  queries: QueryRunSummary[];
  errors_logged: number;
};

type QueryContext = {
  config: ExtractorConfig;
  deps: PipelineDeps;
  log: Logger;
  entities: Entity[];
  dateRange: DateRange;
  runStamp: string;
  rateLimiter: RateLimiter;
  retry: RetryPolicy;
  errorLog: QueryErrorLog;
};

function toJsonRow(record: ReportRecord, maxFieldLength: number): Record<string, string> {
  return { data: JSON.stringify(sanitizeRecord(record, maxFieldLength)) };
}

async function resolveEntities(
  config: ExtractorConfig,
  resolver: PropertyResolver,
  log: Logger
): Promise<Entity[]> {
  if (!config.propertyList.length) {
    log.info("[Pipeline] No property list provided; discovering accessible properties");
    return resolver.discover();
  }
  log.info("[Pipeline] Enriching configured properties", { properties: config.propertyList.length });
  return resolver.enrich(config.propertyList);
}

async function runQuery(query: QueryDefinition, ctx: QueryContext): Promise<QueryRunSummary> {
  const { config, deps, log } = ctx;
  const startedAt = Date.now();
  const filename = outputFilename(config.destination, query.name, ctx.runStamp, config.outputFormat);
  const filePath = path.join(deps.outDir, filename);
  const dimensionFilter = buildDimensionFilter(query.dimension_filter, log);
  const writer = new StreamingCsvWriter({
    filePath,
    columns: config.outputFormat === "json" ? ["data"] : recordColumns(query),
    chunkSize: config.chunkSize,
    maxFieldLength: config.maxFieldLength,
    sanitize: config.outputFormat !== "json",
    log,
  });

  const contributors: Entity[] = [];
  let succeeded = 0;
  let partial = 0;
  let failed = 0;
  let pagesFetched = 0;

  log.info("[Pipeline] Running query", {
    query: query.name,
    dimensions: query.dimensions,
    metrics: query.metrics,
    filtered: dimensionFilter !== null,
    properties: ctx.entities.length,
  });

  await runWithConcurrency(ctx.entities, config.maxWorkers, async (entity) => {
    let result: EntityFetchResult;
    try {
      result = await withTimeout(
        (signal) =>
          fetchEntityReport(
            deps.reports,
            { query, entity, dateRange: ctx.dateRange, dimensionFilter },
            {
              pageSize: config.batchSize,
              maxPages: config.maxPages,
              rateLimiter: ctx.rateLimiter,
              retry: ctx.retry,
              signal,
              log,
            }
          ),
        config.requestTimeoutSeconds * 1000
      );
    } catch (err) {
      result = fail({ kind: classifyApiError(err), message: formatError(err), page: 0, offset: 0 });
    }

    if (!result.ok) {
      failed += 1;
      const { kind, message, page, offset } = result.error;
      log.warn("[Pipeline] Query failed for property", {
        query: query.name,
        propertyId: entity.property_id,
        kind,
        error: message,
      });
      await ctx.errorLog.record({
        query_name: query.name,
        entity_id: entity.property_id,
        error: message,
        context: { kind, page, offset, account_id: entity.account_id, date_range: ctx.dateRange },
      });
      return;
    }

    const { records, status, pages } = result.value;
    pagesFetched += pages;
    if (status === "partial") partial += 1;
    else succeeded += 1;
    if (!records.length) return;

    contributors.push(entity);
    const rows =
      config.outputFormat === "json"
        ? records.map((record) => toJsonRow(record, config.maxFieldLength))
        : records;
    await writer.add(rows);
  });

  const stats = await writer.finalize();
  const summary: QueryRunSummary = {
    query_name: query.name,
    filename,
    written: false,
    manifest_path: null,
    writer: stats,
    entities_succeeded: succeeded,
    entities_partial: partial,
    entities_failed: failed,
  };

  if (stats.success_count === 0) {
    if (writer.createdFile) fs.rmSync(filePath, { force: true });
    log.info("[Pipeline] Query produced no rows; no output written", { query: query.name });
    return summary;
  }

  const manifest = buildOutputManifest({
    outputTable: `${config.destination}.${query.name}`,
    filename,
    outputFormat: config.outputFormat,
    queryName: query.name,
    dimensions: query.dimensions,
    metrics: query.metrics,
    dateRange: ctx.dateRange,
    contributors,
    writerStats: stats,
    runStats: {
      entities_total: ctx.entities.length,
      entities_succeeded: succeeded,
      entities_partial: partial,
      entities_failed: failed,
      pages_fetched: pagesFetched,
      duration_ms: Date.now() - startedAt,
    },
    createdAt: deps.now ? deps.now() : undefined,
  });
  summary.manifest_path = writeOutputManifest(deps.outDir, manifest);
  summary.written = true;

  log.info("[Pipeline] Query finished", {
    query: query.name,
    file: filename,
    rows: stats.success_count,
    errors: stats.error_count,
    failedProperties: failed,
  });
  return summary;
}

/**
 * One extraction run: dates, properties, then every query definition against
 * every property. Per-property failures are logged to query_errors.csv and do
 * not stop the run.
 */
export async function runExtraction(config: ExtractorConfig, deps: PipelineDeps): Promise<RunSummary> {
  const log = deps.log ?? logger;
  const now = deps.now ?? (() => new Date());
  const runStartedAt = now();

  const { range: dateRange, defaulted } = resolveDateRange(config.startDate, config.endDate, runStartedAt);
  if (defaulted) {
    log.info("[Pipeline] No date range provided; using default", { ...dateRange });
  }

  const summary: RunSummary = {
    status: "completed",
    date_range: dateRange,
    entities: [],
    queries: [],
    errors_logged: 0,
  };

  if (!config.queryDefinitions.length) {
    log.warn("[Pipeline] No query definitions configured; nothing to do");
    return { ...summary, status: "no_queries" };
  }

  const rateLimiter = deps.rateLimiter ?? RateLimiter.fromSeconds(config.rateLimitDelaySeconds);
  const retry: RetryPolicy = { maxRetries: config.maxRetries, backoffFactor: config.backoffFactor };
  const resolver = new PropertyResolver(deps.admin, {
    rateLimiter,
    retry,
    maxWorkers: config.maxWorkers,
    unitTimeoutMs: config.requestTimeoutSeconds * 1000,
    log,
  });

  const entities = (await resolveEntities(config, resolver, log)).map((entity) => Object.freeze({ ...entity }));
  summary.entities = entities;
  if (!entities.length) {
    log.warn("[Pipeline] No properties resolved; nothing to do");
    return { ...summary, status: "no_entities" };
  }

  const queries = config.queryDefinitions.map(injectDateDimension);

  if (deps.dryRun) {
    log.info("[Pipeline] Dry run; skipping report queries", {
      properties: entities.map((entity) => entity.property_id),
      queries: queries.map((query) => ({ name: query.name, dimensions: query.dimensions, metrics: query.metrics })),
    });
    return { ...summary, status: "dry_run" };
  }

  const errorLog = new QueryErrorLog(deps.outDir, now);
  const ctx: QueryContext = {
    config,
    deps,
    log,
    entities,
    dateRange,
    runStamp: formatRunStamp(runStartedAt),
    rateLimiter,
    retry,
    errorLog,
  };

  for (const query of queries) {
    summary.queries.push(await runQuery(query, ctx));
  }
  summary.errors_logged = errorLog.count;

  log.info("[Pipeline] Run finished", {
    queries: summary.queries.length,
    written: summary.queries.filter((query) => query.written).length,
    errorsLogged: summary.errors_logged,
  });
  return summary;
}
