export const DEFAULT_MAX_FIELD_LENGTH = 1000;
export const TRUNCATION_MARKER = "...";

const CONTROL_RUN_RE = /[\r\n\t]+/g;
const QUOTE_RE = /"/g;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function sanitizeValue(value: string, maxLength = DEFAULT_MAX_FIELD_LENGTH): string {
  const cleaned = value.replace(QUOTE_RE, "'").replace(CONTROL_RUN_RE, " ").trim();
  if (cleaned.length <= maxLength) return cleaned;
  let keep = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  // never split a surrogate pair
  if (keep > 0 && isHighSurrogate(cleaned.charCodeAt(keep - 1))) keep -= 1;
  return `${cleaned.slice(0, keep)}${TRUNCATION_MARKER}`;
}

/** Sanitizes string fields; anything else is passed through for the writer to reject. */
export function sanitizeRecord(
  record: Readonly<Record<string, string>>,
  maxLength = DEFAULT_MAX_FIELD_LENGTH
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, raw] of Object.entries(record)) {
    const value: unknown = raw;
    out[key] = typeof value === "string" ? sanitizeValue(value, maxLength) : raw;
  }
  return out;
}
