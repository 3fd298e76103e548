import fs from "node:fs";
import path from "node:path";
import { Mutex } from "../lib/mutex";
import { escapeCsvField } from "./chunkWriters";
import { sanitizeValue } from "./sanitize";

export const QUERY_ERRORS_FILENAME = "query_errors.csv";

const HEADER = ["timestamp", "query_name", "entity_id", "error", "context"] as const;

export type QueryErrorEntry = {
  query_name: string;
  entity_id: string;
  error: string;
  context: Record<string, unknown>;
};

/** Append-only CSV of failed query units, shared by every query of a run. */
export class QueryErrorLog {
  readonly filePath: string;
  private readonly mutex = new Mutex();
  private recorded = 0;

  constructor(
    outDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.filePath = path.join(outDir, QUERY_ERRORS_FILENAME);
  }

  get count(): number {
    return this.recorded;
  }

  record(entry: QueryErrorEntry): Promise<void> {
    return this.mutex.runExclusive(() => {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      const cells = [
        this.now().toISOString(),
        entry.query_name,
        entry.entity_id,
        entry.error,
        JSON.stringify(entry.context),
      ].map((value) => escapeCsvField(sanitizeValue(value)));
      const prefix = fs.existsSync(this.filePath) ? "" : `${HEADER.join(",")}\n`;
      fs.appendFileSync(this.filePath, `${prefix}${cells.join(",")}\n`, "utf8");
      this.recorded += 1;
    });
  }
}
