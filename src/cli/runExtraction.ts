import { loadExtractorEnv } from "../config/env";
import { readExtractorConfig } from "../config/loadConfig";
import { ConfigError } from "../lib/errors";
import { logger } from "../lib/logger";
import { runWithTempCredentials, summarizeRun } from "./runExtractionHelpers";

function usage() {
  console.log("Usage: npm run extract -- [--config <path.json>] [--out-dir <dir>] [--dry-run]");
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

async function main() {
  if (hasFlag("--help")) {
    usage();
    return;
  }
  const env = loadExtractorEnv();
  const configPath = getArg("--config") ?? env.configPath;
  const outDir = getArg("--out-dir") ?? env.outDir;
  const dryRun = hasFlag("--dry-run");

  const config = readExtractorConfig(configPath);
  const summary = await runWithTempCredentials(config, { outDir, dryRun });
  console.log(JSON.stringify(summarizeRun(summary), null, 2));
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error("[Config] Run aborted", { problems: err.problems });
  } else {
    logger.error("[Pipeline] Run aborted", { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
