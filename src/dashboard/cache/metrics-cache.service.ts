import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock } from '../../common/clock/clock';
import { readDashboardSettings } from '../../config/app-config';
import {
  MovementTotals,
  RecentTransaction,
  StockBalance,
  TopEntities,
  TrendSeries,
} from '../dashboard.types';
import { TenantKeyedCache } from './tenant-keyed-cache';

export interface CachedTotals {
  stockIn: MovementTotals;
  stockOut: MovementTotals;
}

/**
 * One cache per query kind. Values are stored unredacted; the dashboard strips
 * financial fields per caller after reading.
 */
@Injectable()
export class MetricsCacheService {
  private readonly logger = new Logger(MetricsCacheService.name);

  readonly balances: TenantKeyedCache<StockBalance[]>;
  readonly totals: TenantKeyedCache<CachedTotals>;
  readonly trend: TenantKeyedCache<TrendSeries>;
  readonly topEntities: TenantKeyedCache<TopEntities>;
  readonly recent: TenantKeyedCache<RecentTransaction[]>;

  constructor(config: ConfigService, clock: Clock) {
    const { cacheTtlMs } = readDashboardSettings(config);
    this.balances = new TenantKeyedCache('balances', cacheTtlMs, clock);
    this.totals = new TenantKeyedCache('totals', cacheTtlMs, clock);
    this.trend = new TenantKeyedCache('trend', cacheTtlMs, clock);
    this.topEntities = new TenantKeyedCache('top_entities', cacheTtlMs, clock);
    this.recent = new TenantKeyedCache('recent', cacheTtlMs, clock);
  }

  private all(): TenantKeyedCache<unknown>[] {
    return [this.balances, this.totals, this.trend, this.topEntities, this.recent];
  }

  invalidateTenant(tenantId: string, reason: string): number {
    const dropped = this.all().reduce((n, cache) => n + cache.invalidateTenant(tenantId), 0);
    this.logger.log(
      ['cache_invalidated', `tenant=${tenantId}`, `reason=${reason}`, `entries=${dropped}`].join(' | '),
    );
    return dropped;
  }
}
