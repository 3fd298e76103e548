export type DateRange = {
  start_date: string;
  end_date: string;
};

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const RELATIVE_DATE_RE = /^(today|yesterday|\d+daysAgo)$/;

export const DEFAULT_LOOKBACK_DAYS = 7;

export function addDaysUtc(dateIso: string, days: number): string {
  const [y, m, d] = dateIso.split("-").map(Number);
  const utc = Date.UTC(y, m - 1, d);
  const next = new Date(utc + days * 24 * 60 * 60 * 1000);
  const year = next.getUTCFullYear();
  const month = String(next.getUTCMonth() + 1).padStart(2, "0");
  const day = String(next.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/** ISO dates plus the relative forms the Data API accepts. */
export function isReportDate(value: string): boolean {
  return isValidIsoDate(value) || RELATIVE_DATE_RE.test(value);
}

export function resolveDateRange(
  startDate: string | undefined,
  endDate: string | undefined,
  now: Date = new Date()
): { range: DateRange; defaulted: boolean } {
  if (startDate && endDate) {
    return { range: { start_date: startDate, end_date: endDate }, defaulted: false };
  }
  const end = now.toISOString().slice(0, 10);
  return {
    range: { start_date: addDaysUtc(end, -DEFAULT_LOOKBACK_DAYS), end_date: end },
    defaulted: true,
  };
}

/** UTC run stamp used in output filenames, e.g. 20261018T093005. */
export function formatRunStamp(date: Date): string {
  return date
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, "");
}
