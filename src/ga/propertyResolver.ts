import { runWithConcurrency, withTimeout } from "../lib/concurrency";
import { formatError } from "../lib/errors";
import { KeyedCache } from "../lib/keyedCache";
import { logger, type Logger } from "../lib/logger";
import type { RateLimiter } from "../lib/rateLimiter";
import { callWithRetry, type RetryPolicy } from "../lib/retry";
import {
  UNKNOWN_ACCOUNT,
  type AccountSummary,
  type AnalyticsAdminApi,
  type Entity,
  type PropertyInput,
  type PropertySummary,
} from "./types";

export type PropertyResolverOptions = {
  rateLimiter: RateLimiter;
  retry: RetryPolicy & { delaysMs?: number[] };
  maxWorkers: number;
  unitTimeoutMs: number;
  log?: Logger;
};

const ACCOUNT_DIRECTORY_KEY = "*";

export function fallbackAccountName(accountId: string): string {
  return `account_${accountId}`;
}

/**
 * Discovers or enriches the properties a run targets. Account names and
 * property metadata are cached for the lifetime of the resolver.
 */
export class PropertyResolver {
  private readonly accountDirectory = new KeyedCache<Map<string, string>>();
  private readonly accountNames = new KeyedCache<string>();
  private readonly properties = new KeyedCache<PropertySummary>();
  private readonly log: Logger;

  constructor(
    private readonly admin: AnalyticsAdminApi,
    private readonly options: PropertyResolverOptions
  ) {
    if (options.maxWorkers < 1) throw new Error("maxWorkers must be >= 1");
    this.log = options.log ?? logger;
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return callWithRetry(
      async () => {
        await this.options.rateLimiter.wait();
        return fn();
      },
      this.options.retry,
      ({ attempt, error, delayMs }) => {
        this.log.warn(`[Resolver] Retrying ${label}`, {
          attempt,
          maxRetries: this.options.retry.maxRetries,
          delayMs,
          error: formatError(error),
        });
      }
    );
  }

  private listAccounts(): Promise<AccountSummary[]> {
    return this.call("listAccounts", () => this.admin.listAccounts());
  }

  private loadAccountDirectory(): Promise<Map<string, string>> {
    return this.accountDirectory.getOrLoad(ACCOUNT_DIRECTORY_KEY, async () => {
      const accounts = await this.listAccounts();
      return new Map(accounts.map((account) => [account.accountId, account.displayName]));
    });
  }

  private resolveAccountName(accountId: string): Promise<string> {
    return this.accountNames.getOrLoad(accountId, async () => {
      try {
        const directory = await this.loadAccountDirectory();
        return directory.get(accountId) || fallbackAccountName(accountId);
      } catch (err) {
        this.log.warn("[Resolver] Account name lookup failed", { accountId, error: formatError(err) });
        return fallbackAccountName(accountId);
      }
    });
  }

  private getProperty(propertyId: string): Promise<PropertySummary> {
    return this.properties.getOrLoad(propertyId, () =>
      this.call(`getProperty ${propertyId}`, () => this.admin.getProperty(propertyId))
    );
  }

  async discover(): Promise<Entity[]> {
    let accounts: AccountSummary[];
    try {
      accounts = await this.listAccounts();
    } catch (err) {
      this.log.error("[Resolver] Account listing failed; no properties discovered", {
        error: formatError(err),
      });
      return [];
    }

    const perAccount = await runWithConcurrency(accounts, this.options.maxWorkers, async (account) => {
      try {
        const properties = await this.call(`listProperties ${account.accountId}`, () =>
          this.admin.listProperties(account.accountId)
        );
        return properties.map(
          (property): Entity => ({
            account_id: account.accountId,
            account_name: account.displayName || fallbackAccountName(account.accountId),
            property_id: property.propertyId,
            property_name: property.displayName,
          })
        );
      } catch (err) {
        this.log.warn("[Resolver] Skipping account after listing failure", {
          accountId: account.accountId,
          error: formatError(err),
        });
        return [];
      }
    });

    const entities = perAccount.flat();
    this.log.info("[Resolver] Discovery finished", {
      accounts: accounts.length,
      properties: entities.length,
    });
    return entities;
  }

  // Lookups are shared through the caches, so the signal is checked between
  // them instead of aborting a load another unit may be waiting on.
  private async enrichOne(input: PropertyInput, signal: AbortSignal): Promise<Entity> {
    if (input.account_id && input.account_name) {
      return {
        account_id: input.account_id,
        account_name: input.account_name,
        property_id: input.property_id,
        property_name: input.property_name ?? "",
      };
    }

    const property = await this.getProperty(input.property_id);
    signal.throwIfAborted();
    const accountId = property.parentAccountId ?? input.account_id;
    if (!accountId) {
      throw new Error(`Property ${input.property_id} has no parent account`);
    }
    const accountName = input.account_name || (await this.resolveAccountName(accountId));
    signal.throwIfAborted();
    return {
      account_id: accountId,
      account_name: accountName,
      property_id: input.property_id,
      property_name: property.displayName || input.property_name || "",
    };
  }

  async enrich(inputs: PropertyInput[]): Promise<Entity[]> {
    const entities = await runWithConcurrency(inputs, this.options.maxWorkers, async (input) => {
      try {
        return await withTimeout((signal) => this.enrichOne(input, signal), this.options.unitTimeoutMs);
      } catch (err) {
        this.log.warn("[Resolver] Enrichment failed; keeping property with unknown account", {
          propertyId: input.property_id,
          error: formatError(err),
        });
        return {
          ...input,
          property_name: input.property_name ?? "",
          account_id: UNKNOWN_ACCOUNT,
          account_name: UNKNOWN_ACCOUNT,
        };
      }
    });
    this.log.info("[Resolver] Enrichment finished", {
      properties: entities.length,
      unknown: entities.filter((entity) => entity.account_id === UNKNOWN_ACCOUNT).length,
    });
    return entities;
  }
}
