import type { DateRange } from "../lib/dates";

export type Entity = {
  account_id: string;
  account_name: string;
  property_id: string;
  property_name: string;
};

export type PropertyInput = {
  property_id: string;
  property_name?: string;
  account_id?: string;
  account_name?: string;
};

export type StringMatchType =
  | "EXACT"
  | "BEGINS_WITH"
  | "ENDS_WITH"
  | "CONTAINS"
  | "FULL_REGEXP"
  | "PARTIAL_REGEXP";

export type StringFilter = {
  value: string;
  matchType?: StringMatchType;
  caseSensitive?: boolean;
};

export type FilterExpression = {
  andGroup: {
    expressions: { filter: { fieldName: string; stringFilter: StringFilter } }[];
  };
};

export type QueryDefinition = {
  name: string;
  dimensions: string[];
  metrics: string[];
  dimension_filter?: unknown;
};

export type AccountSummary = {
  accountId: string;
  displayName: string;
};

export type PropertySummary = {
  propertyId: string;
  displayName: string;
  parentAccountId: string | null;
};

export type ReportRequest = {
  propertyId: string;
  dimensions: string[];
  metrics: string[];
  dateRange: DateRange;
  dimensionFilter: FilterExpression | null;
  limit: number;
  offset: number;
};

export type ReportRow = {
  dimensionValues: (string | null | undefined)[];
  metricValues: (string | null | undefined)[];
};

export type ReportPage = {
  rows: ReportRow[];
  rowCount: number | null;
};

export type AnalyticsAdminApi = {
  listAccounts: () => Promise<AccountSummary[]>;
  listProperties: (accountId: string) => Promise<PropertySummary[]>;
  getProperty: (propertyId: string) => Promise<PropertySummary>;
};

export type AnalyticsReportApi = {
  runReport: (request: ReportRequest) => Promise<ReportPage>;
};

export const UNKNOWN_ACCOUNT = "unknown";

/** "accounts/123" -> "123"; also used for "properties/456". */
export function lastPathSegment(resourceName: string | null | undefined): string | null {
  if (!resourceName) return null;
  const segment = resourceName.split("/").pop()?.trim();
  return segment ? segment : null;
}
