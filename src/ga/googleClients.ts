import { AnalyticsAdminServiceClient } from "@google-analytics/admin";
import { BetaAnalyticsDataClient } from "@google-analytics/data";
import {
  lastPathSegment,
  type AccountSummary,
  type AnalyticsAdminApi,
  type AnalyticsReportApi,
  type PropertySummary,
  type ReportPage,
  type ReportRequest,
} from "./types";

type PropertyResource = {
  name?: string | null;
  displayName?: string | null;
  parent?: string | null;
};

function toPropertySummary(property: PropertyResource, fallbackId?: string): PropertySummary {
  const propertyId = lastPathSegment(property.name) ?? fallbackId;
  if (!propertyId) throw new Error("Admin API returned a property without a name");
  const parent = property.parent ?? "";
  return {
    propertyId,
    displayName: property.displayName ?? "",
    parentAccountId: parent.startsWith("accounts/") ? lastPathSegment(parent) : null,
  };
}

export function createAdminApi(client: AnalyticsAdminServiceClient): AnalyticsAdminApi {
  return {
    async listAccounts() {
      const [accounts] = await client.listAccounts({});
      const summaries: AccountSummary[] = [];
      for (const account of accounts) {
        const accountId = lastPathSegment(account.name);
        if (!accountId) continue;
        summaries.push({ accountId, displayName: account.displayName ?? "" });
      }
      return summaries;
    },
    async listProperties(accountId) {
      const [properties] = await client.listProperties({ filter: `parent:accounts/${accountId}` });
      return properties.map((property) => toPropertySummary(property));
    },
    async getProperty(propertyId) {
      const [property] = await client.getProperty({ name: `properties/${propertyId}` });
      return toPropertySummary(property, propertyId);
    },
  };
}

export function createReportApi(client: BetaAnalyticsDataClient): AnalyticsReportApi {
  return {
    async runReport(request: ReportRequest): Promise<ReportPage> {
      const [response] = await client.runReport({
        property: `properties/${request.propertyId}`,
        dimensions: request.dimensions.map((name) => ({ name })),
        metrics: request.metrics.map((name) => ({ name })),
        dateRanges: [{ startDate: request.dateRange.start_date, endDate: request.dateRange.end_date }],
        dimensionFilter: request.dimensionFilter,
        limit: request.limit,
        offset: request.offset,
      });
      const rows = (response.rows ?? []).map((row) => ({
        dimensionValues: (row.dimensionValues ?? []).map((value) => value.value),
        metricValues: (row.metricValues ?? []).map((value) => value.value),
      }));
      return { rows, rowCount: typeof response.rowCount === "number" ? response.rowCount : null };
    },
  };
}

export type GoogleAnalyticsApis = {
  admin: AnalyticsAdminApi;
  reports: AnalyticsReportApi;
  close: () => Promise<void>;
};

/** Both SDK clients authenticate with the service account key file. */
export function createGoogleAnalyticsApis(keyFilename: string): GoogleAnalyticsApis {
  const adminClient = new AnalyticsAdminServiceClient({ keyFilename });
  const dataClient = new BetaAnalyticsDataClient({ keyFilename });
  return {
    admin: createAdminApi(adminClient),
    reports: createReportApi(dataClient),
    close: async () => {
      await Promise.all([adminClient.close(), dataClient.close()]);
    },
  };
}
