import { ConfigService } from '@nestjs/config';

export const ConfigKeys = {
  LOW_STOCK_THRESHOLD: 'LOW_STOCK_THRESHOLD',
  DASHBOARD_CACHE_TTL_SECONDS: 'DASHBOARD_CACHE_TTL_SECONDS',
  DASHBOARD_READ_RETRY_BACKOFF_MS: 'DASHBOARD_READ_RETRY_BACKOFF_MS',
  RECENT_TRANSACTIONS_LIMIT: 'RECENT_TRANSACTIONS_LIMIT',
} as const;

export interface DashboardSettings {
  lowStockThreshold: number;
  cacheTtlMs: number;
  readRetryBackoffMs: number;
  recentTransactionsLimit: number;
}

export const DASHBOARD_DEFAULTS: DashboardSettings = {
  lowStockThreshold: 50,
  cacheTtlMs: 30_000,
  readRetryBackoffMs: 100,
  recentTransactionsLimit: 10,
};

// Env values arrive as strings; anything unparsable or negative falls back.
export function readNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function readDashboardSettings(config: ConfigService): DashboardSettings {
  return {
    lowStockThreshold: readNumber(
      config,
      ConfigKeys.LOW_STOCK_THRESHOLD,
      DASHBOARD_DEFAULTS.lowStockThreshold,
    ),
    cacheTtlMs:
      readNumber(
        config,
        ConfigKeys.DASHBOARD_CACHE_TTL_SECONDS,
        DASHBOARD_DEFAULTS.cacheTtlMs / 1000,
      ) * 1000,
    readRetryBackoffMs: readNumber(
      config,
      ConfigKeys.DASHBOARD_READ_RETRY_BACKOFF_MS,
      DASHBOARD_DEFAULTS.readRetryBackoffMs,
    ),
    recentTransactionsLimit: readNumber(
      config,
      ConfigKeys.RECENT_TRANSACTIONS_LIMIT,
      DASHBOARD_DEFAULTS.recentTransactionsLimit,
    ),
  };
}
