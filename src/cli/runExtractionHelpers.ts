import { removeTempCredentials, writeTempCredentials } from "../config/credentials";
import type { ExtractorConfig } from "../config/loadConfig";
import { createGoogleAnalyticsApis, type GoogleAnalyticsApis } from "../ga/googleClients";
import { formatError } from "../lib/errors";
import { logger, type Logger } from "../lib/logger";
import { runExtraction, type RunSummary } from "../pipeline/runExtraction";

export type CredentialedRunOptions = {
  outDir: string;
  dryRun?: boolean;
  credentialsDir?: string;
  createApis?: (keyFilename: string) => GoogleAnalyticsApis;
  log?: Logger;
};

/**
 * Runs the pipeline with SDK clients built from a temporary key file. The key
 * file is removed whatever happens after it was written, client construction
 * included.
 */
export async function runWithTempCredentials(
  config: ExtractorConfig,
  options: CredentialedRunOptions
): Promise<RunSummary> {
  const log = options.log ?? logger;
  const createApis = options.createApis ?? createGoogleAnalyticsApis;
  const keyFile = writeTempCredentials(config.serviceAccount, options.credentialsDir);
  let apis: GoogleAnalyticsApis | undefined;
  try {
    apis = createApis(keyFile);
    return await runExtraction(config, {
      admin: apis.admin,
      reports: apis.reports,
      outDir: options.outDir,
      dryRun: options.dryRun,
      log,
    });
  } finally {
    if (apis) {
      await apis.close().catch((err: unknown) => {
        log.warn("[CLI] Closing API clients failed", { error: formatError(err) });
      });
    }
    removeTempCredentials(keyFile);
  }
}

export function summarizeRun(summary: RunSummary) {
  return {
    status: summary.status,
    date_range: summary.date_range,
    properties: summary.entities.length,
    queries: summary.queries.map((query) => ({
      name: query.query_name,
      file: query.written ? query.filename : null,
      rows: query.writer?.success_count ?? 0,
      failed_properties: query.entities_failed,
    })),
    errors_logged: summary.errors_logged,
  };
}
