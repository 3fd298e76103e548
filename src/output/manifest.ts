import fs from "node:fs";
import path from "node:path";
import type { Entity } from "../ga/types";
import type { DateRange } from "../lib/dates";
import type { WriterStats } from "./streamingWriter";

export type OutputFormat = "default" | "json";

export type RunStats = {
  entities_total: number;
  entities_succeeded: number;
  entities_partial: number;
  entities_failed: number;
  pages_fetched: number;
  duration_ms: number;
};

export type OutputManifest = {
  output_table: string;
  filename: string;
  format: "csv";
  output_format: OutputFormat;
  row_count: number;
  created_at: string;
  query_name: string;
  dimensions: string[];
  metrics: string[];
  date_range: DateRange;
  property_ids: string[];
  property_names: string[];
  account_ids: string[];
  account_names: string[];
  stats: WriterStats & RunStats;
};

function distinctSorted(values: string[]): string[] {
  return [...new Set(values.filter((value) => value !== ""))].sort((a, b) => a.localeCompare(b));
}

export function manifestFilename(filename: string): string {
  return `${filename}.manifest.json`;
}

export function buildOutputManifest(params: {
  outputTable: string;
  filename: string;
  outputFormat: OutputFormat;
  queryName: string;
  dimensions: string[];
  metrics: string[];
  dateRange: DateRange;
  contributors: Entity[];
  writerStats: WriterStats;
  runStats: RunStats;
  createdAt?: Date;
}): OutputManifest {
  const { contributors } = params;
  return {
    output_table: params.outputTable,
    filename: params.filename,
    format: "csv",
    output_format: params.outputFormat,
    row_count: params.writerStats.success_count,
    created_at: (params.createdAt ?? new Date()).toISOString(),
    query_name: params.queryName,
    dimensions: [...params.dimensions],
    metrics: [...params.metrics],
    date_range: { ...params.dateRange },
    property_ids: distinctSorted(contributors.map((entity) => entity.property_id)),
    property_names: distinctSorted(contributors.map((entity) => entity.property_name)),
    account_ids: distinctSorted(contributors.map((entity) => entity.account_id)),
    account_names: distinctSorted(contributors.map((entity) => entity.account_name)),
    stats: { ...params.writerStats, ...params.runStats },
  };
}

/** Writes the sidecar next to the output file. Returns null for an empty output. */
export function writeOutputManifest(outDir: string, manifest: OutputManifest): string | null {
  if (manifest.row_count <= 0) return null;
  if (!fs.existsSync(outDir)) fs.mkdirSync(outDir, { recursive: true });
  const manifestPath = path.join(outDir, manifestFilename(manifest.filename));
  fs.writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
  return manifestPath;
}
