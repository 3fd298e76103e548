import fs from "node:fs";
import path from "node:path";
import { formatError } from "../lib/errors";
import { logger, sampleForLog, type Logger } from "../lib/logger";
import { Mutex } from "../lib/mutex";
import {
  createLineChunkWriter,
  writeChunkWithSheet,
  type ChunkWriter,
  type CsvRow,
} from "./chunkWriters";
import { DEFAULT_MAX_FIELD_LENGTH, sanitizeRecord } from "./sanitize";

export const DEFAULT_CHUNK_SIZE = 10_000;

export type WriterStats = {
  total_rows: number;
  success_count: number;
  error_count: number;
  success_rate: number;
  flushes: number;
  fallback_flushes: number;
  emergency_dumps: number;
};

export type StreamingWriterOptions = {
  filePath: string;
  columns?: string[];
  chunkSize?: number;
  maxFieldLength?: number;
  sanitize?: boolean;
  primary?: ChunkWriter;
  fallback?: ChunkWriter;
  log?: Logger;
};

/**
 * Buffers records and appends them to one CSV file in chunks.
 *
 * Each flush tries the sheet writer first, then the line writer, then dumps
 * the chunk to `<file>.emergency-<n>.json`. The first chunk that reaches disk
 * creates the file together with its header row; a file that already exists is
 * never appended to. Calls are serialized, so several producers can share one
 * writer.
 */
export class StreamingCsvWriter {
  readonly filePath: string;
  private columns: string[] | null;
  private readonly chunkSize: number;
  private readonly maxFieldLength: number;
  private readonly sanitize: boolean;
  private readonly primary: ChunkWriter;
  private readonly fallback: ChunkWriter;
  private readonly log: Logger;
  private readonly mutex = new Mutex();

  private buffer: CsvRow[] = [];
  private headerWritten = false;
  private finalized = false;
  private stats: Omit<WriterStats, "success_rate"> = {
    total_rows: 0,
    success_count: 0,
    error_count: 0,
    flushes: 0,
    fallback_flushes: 0,
    emergency_dumps: 0,
  };

  constructor(options: StreamingWriterOptions) {
    this.filePath = options.filePath;
    this.columns = options.columns ? [...options.columns] : null;
    this.chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));
    this.maxFieldLength = options.maxFieldLength ?? DEFAULT_MAX_FIELD_LENGTH;
    this.sanitize = options.sanitize ?? true;
    this.log = options.log ?? logger;
    this.primary = options.primary ?? writeChunkWithSheet;
    this.fallback =
      options.fallback ??
      createLineChunkWriter(({ index, reason, record }) => {
        this.log.warn("[Writer] Skipping malformed row", {
          file: path.basename(this.filePath),
          index,
          reason,
          sample: sampleForLog([record], 1),
        });
      });
  }

  get hasHeader(): boolean {
    return this.headerWritten;
  }

  /** True once this writer has created its output file. */
  get createdFile(): boolean {
    return this.headerWritten;
  }

  add(records: readonly CsvRow[]): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (this.finalized) throw new Error(`Writer for ${this.filePath} is already finalized`);
      for (const record of records) {
        this.buffer.push(record);
        this.stats.total_rows += 1;
        if (this.buffer.length >= this.chunkSize) this.flush();
      }
    });
  }

  finalize(): Promise<WriterStats> {
    return this.mutex.runExclusive(() => {
      if (!this.finalized) {
        if (this.buffer.length) this.flush();
        this.finalized = true;
      }
      return this.snapshot();
    });
  }

  private snapshot(): WriterStats {
    const { total_rows, success_count } = this.stats;
    return {
      ...this.stats,
      success_rate: total_rows > 0 ? Math.round((success_count / total_rows) * 10_000) / 10_000 : 0,
    };
  }

  private resolveColumns(records: CsvRow[]): string[] {
    if (!this.columns) {
      const seen = new Set<string>();
      for (const record of records) for (const key of Object.keys(record)) seen.add(key);
      this.columns = [...seen];
    }
    return this.columns;
  }

  private flush() {
    const chunk = this.buffer;
    this.buffer = [];
    if (!chunk.length) return;
    this.stats.flushes += 1;

    const records = this.sanitize
      ? chunk.map((record) => sanitizeRecord(record, this.maxFieldLength))
      : chunk;
    const request = {
      filePath: this.filePath,
      columns: this.resolveColumns(records),
      records,
      includeHeader: !this.headerWritten,
      createFile: !this.headerWritten,
    };

    try {
      const outcome = this.primary(request);
      this.recordOutcome(outcome.written, outcome.skipped);
      return;
    } catch (err) {
      this.log.warn("[Writer] Sheet write failed; falling back to line writer", {
        file: path.basename(this.filePath),
        rows: records.length,
        reason: formatError(err),
        sample: sampleForLog(records),
      });
    }

    try {
      this.stats.fallback_flushes += 1;
      const outcome = this.fallback(request);
      this.recordOutcome(outcome.written, outcome.skipped);
      return;
    } catch (err) {
      this.log.error("[Writer] Line write failed; dumping chunk as JSON", {
        file: path.basename(this.filePath),
        rows: records.length,
        reason: formatError(err),
        sample: sampleForLog(records),
      });
    }

    this.stats.error_count += records.length;
    this.emergencyDump(records);
  }

  private recordOutcome(written: number, skipped: number) {
    this.headerWritten = true;
    this.stats.success_count += written;
    this.stats.error_count += skipped;
  }

  private emergencyDump(records: CsvRow[]) {
    this.stats.emergency_dumps += 1;
    const dumpPath = `${this.filePath}.emergency-${this.stats.emergency_dumps}.json`;
    try {
      fs.mkdirSync(path.dirname(dumpPath), { recursive: true });
      fs.writeFileSync(dumpPath, JSON.stringify(records, null, 2), "utf8");
      this.log.error("[Writer] Chunk saved to emergency dump", { dumpPath, rows: records.length });
    } catch (err) {
      this.log.error("[Writer] Emergency dump failed; chunk lost", {
        dumpPath,
        rows: records.length,
        reason: formatError(err),
        sample: sampleForLog(records),
      });
    }
  }
}
