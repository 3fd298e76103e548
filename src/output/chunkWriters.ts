import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export type CsvRow = Readonly<Record<string, string>>;

export type ChunkWriteRequest = {
  filePath: string;
  columns: string[];
  records: CsvRow[];
  includeHeader: boolean;
  /** First write of a file: fails instead of touching a file that already exists. */
  createFile: boolean;
};

export type ChunkWriteOutcome = {
  written: number;
  skipped: number;
};

export type ChunkWriter = (request: ChunkWriteRequest) => ChunkWriteOutcome;

function ensureParentDir(filePath: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

function writeText(filePath: string, text: string, createFile: boolean) {
  ensureParentDir(filePath);
  fs.writeFileSync(filePath, text, { encoding: "utf8", flag: createFile ? "wx" : "a" });
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

/** Throws when a cell is neither a string nor missing. */
export function toCsvLine(columns: string[], record: CsvRow): string {
  return columns
    .map((column) => {
      const value: unknown = record[column];
      if (value === undefined || value === null) return "";
      if (typeof value !== "string") {
        throw new TypeError(`column ${column} holds a ${typeof value}, expected text`);
      }
      return escapeCsvField(value);
    })
    .join(",");
}

/** Structured write: SheetJS builds the sheet and renders it as CSV. */
export const writeChunkWithSheet: ChunkWriter = ({
  filePath,
  columns,
  records,
  includeHeader,
  createFile,
}) => {
  if (!records.length && !includeHeader) return { written: 0, skipped: 0 };
  const sheet = XLSX.utils.json_to_sheet(records, { header: columns, skipHeader: !includeHeader });
  const csv = XLSX.utils.sheet_to_csv(sheet);
  writeText(filePath, `${csv}\n`, createFile);
  return { written: records.length, skipped: 0 };
};

/** Line-by-line write that drops rows it cannot serialize instead of failing the chunk. */
export function createLineChunkWriter(
  onSkip?: (info: { index: number; reason: string; record: CsvRow }) => void
): ChunkWriter {
  return ({ filePath, columns, records, includeHeader, createFile }) => {
    const lines: string[] = [];
    if (includeHeader) lines.push(columns.map(escapeCsvField).join(","));
    let skipped = 0;
    records.forEach((record, index) => {
      try {
        lines.push(toCsvLine(columns, record));
      } catch (err) {
        skipped += 1;
        if (onSkip) onSkip({ index, reason: err instanceof Error ? err.message : String(err), record });
      }
    });
    if (!lines.length) return { written: 0, skipped };
    writeText(filePath, `${lines.join("\n")}\n`, createFile);
    return { written: records.length - skipped, skipped };
  };
}
