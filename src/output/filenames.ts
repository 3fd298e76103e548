import type { OutputFormat } from "./manifest";

export function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_.-]/g, "_").replace(/^\.+/, "") || "_";
}

export function outputFilename(
  destination: string,
  queryName: string,
  runStamp: string,
  format: OutputFormat
): string {
  const separator = format === "json" ? "-" : ".";
  return [safeSegment(destination), safeSegment(queryName), runStamp].join(separator) + ".csv";
}
