import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Decimal } from 'decimal.js';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { isSuperAdmin } from '../authorization/authorization';
import { ComputationException } from '../common/exceptions/report.exceptions';
import { describeException } from '../common/filters/all-exceptions.filter';
import { DateRange } from '../common/types/date-range';
import { sumDecimals } from '../common/utils/decimal';
import { DashboardSettings, readDashboardSettings } from '../config/app-config';
import { MovementType } from '../inventory/stock-movement.entity';
import { MovementReadStore, MovementRow, StockBalanceRow } from '../tenancy/movement-read.store';
import { ScopedReader } from '../tenancy/scoped-reader.service';
import { TenantScope } from '../tenancy/tenant-scope';
import { TenantSettingsSource } from '../tenant/tenant-settings.source';
import {
  classifyStock,
  parseAggregate,
  percentageChange,
  RankCandidate,
  rankEntities,
  zeroFillSeries,
} from './aggregation';
import { CachedTotals, MetricsCacheService } from './cache/metrics-cache.service';
import {
  AlertSeverity,
  ComputeOptions,
  DashboardSnapshot,
  DashboardWidget,
  FinancialMetrics,
  InventoryMetrics,
  MovementTotals,
  PerformanceComparison,
  RecentTransaction,
  StockAlert,
  StockBalance,
  StockLevel,
  StockStatus,
  TopEntities,
  TopEntityKind,
  TrendSeries,
  WidgetResult,
} from './dashboard.types';
import { daysInRange, PeriodSelector, rangeKey } from './period/period';
import { PeriodResolverService } from './period/period-resolver.service';
import { DashboardPreferenceService } from './preferences/dashboard-preference.service';

export const DEFAULT_TOP_N: Record<TopEntityKind, number> = {
  [TopEntityKind.STOCK_IN_PRODUCTS]: 5,
  [TopEntityKind.STOCK_OUT_PRODUCTS]: 5,
  [TopEntityKind.FARMERS]: 10,
  [TopEntityKind.CUSTOMERS]: 10,
};

const MAX_TOP_N = 100;

const WIDGET_TOP_KIND: Partial<Record<DashboardWidget, TopEntityKind>> = {
  [DashboardWidget.TOP_STOCK_IN_PRODUCTS]: TopEntityKind.STOCK_IN_PRODUCTS,
  [DashboardWidget.TOP_STOCK_OUT_PRODUCTS]: TopEntityKind.STOCK_OUT_PRODUCTS,
  [DashboardWidget.TOP_FARMERS]: TopEntityKind.FARMERS,
  [DashboardWidget.TOP_CUSTOMERS]: TopEntityKind.CUSTOMERS,
};

function isAlert(level: StockLevel): level is StockLevel & { status: AlertSeverity } {
  return level.status !== StockStatus.IN_STOCK;
}

/**
 * Inventory and financial analytics for one tenant.
 *
 * Every public method authorizes the actor, resolves the tenant scope and only
 * then reads, through the metrics cache. Cached values are unredacted; financial
 * fields are nulled per caller on the way out.
 */
@Injectable()
export class DashboardService {
  private readonly logger = new Logger(DashboardService.name);
  private readonly settings: DashboardSettings;

  constructor(
    config: ConfigService,
    private readonly authorization: AuthorizationService,
    private readonly store: MovementReadStore,
    private readonly reader: ScopedReader,
    private readonly cache: MetricsCacheService,
    private readonly periods: PeriodResolverService,
    private readonly tenantSettings: TenantSettingsSource,
    private readonly preferences: DashboardPreferenceService,
  ) {
    this.settings = readDashboardSettings(config);
  }

  // ---- Public operations ----

  async getInventoryMetrics(
    tenantId: string | undefined,
    actor: Actor,
    options: ComputeOptions = {},
  ): Promise<InventoryMetrics> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const balances = await this.balances(scope, options.signal);

    return {
      totalStock: sumDecimals(balances.map((b) => b.available)),
      productCount: balances.filter((b) => b.available.gt(0)).length,
      totalValue: this.canSeeFinancials(actor, scope)
        ? sumDecimals(balances.map((b) => b.available.times(b.pricePerQuintal)))
        : null,
    };
  }

  async getStockLevels(
    tenantId: string | undefined,
    actor: Actor,
    options: ComputeOptions = {},
  ): Promise<StockLevel[]> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    return this.stockLevels(scope, options.signal);
  }

  async getStockAlerts(
    tenantId: string | undefined,
    actor: Actor,
    options: ComputeOptions = {},
  ): Promise<StockAlert[]> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const levels = await this.stockLevels(scope, options.signal);

    return levels
      .filter(isAlert)
      .map((level) => ({
        productId: level.productId,
        productName: level.productName,
        sku: level.sku,
        currentStock: level.available,
        severity: level.status,
      }))
      .sort(
        (a, b) =>
          a.currentStock.comparedTo(b.currentStock) ||
          a.productName.localeCompare(b.productName),
      );
  }

  async getFinancialMetrics(
    tenantId: string | undefined,
    actor: Actor,
    selector: PeriodSelector,
    options: ComputeOptions = {},
  ): Promise<FinancialMetrics> {
    const scope = await this.scopeFor(
      actor,
      tenantId,
      PermissionAction.VIEW_REPORTS,
      PermissionAction.VIEW_FINANCIALS,
    );
    const period = this.periods.resolve(selector);
    const { stockIn, stockOut } = await this.totals(scope, period.current, options.signal);

    return {
      period,
      purchases: stockIn.amount,
      sales: stockOut.amount,
      grossMargin: stockOut.amount.minus(stockIn.amount),
      stockInQuantity: stockIn.quantity,
      stockOutQuantity: stockOut.quantity,
      stockInCount: stockIn.count,
      stockOutCount: stockOut.count,
    };
  }

  async getTrendSeries(
    tenantId: string | undefined,
    actor: Actor,
    selector: PeriodSelector,
    options: ComputeOptions = {},
  ): Promise<TrendSeries> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const { current } = this.periods.resolve(selector);

    return this.cache.trend.getOrCompute(
      scope.tenantId,
      rangeKey(current),
      async (signal) => {
        const [ins, outs] = await Promise.all([
          this.dailySeries(scope, MovementType.IN, current, signal),
          this.dailySeries(scope, MovementType.OUT, current, signal),
        ]);
        const dates = daysInRange(current);
        return {
          period: current,
          dates,
          stockIn: zeroFillSeries(dates, ins),
          stockOut: zeroFillSeries(dates, outs),
        };
      },
      options.signal,
    );
  }

  async getTopEntities(
    tenantId: string | undefined,
    actor: Actor,
    selector: PeriodSelector,
    kind: TopEntityKind,
    n: number = DEFAULT_TOP_N[kind],
    options: ComputeOptions = {},
  ): Promise<TopEntities> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const { current } = this.periods.resolve(selector);
    const limit = Math.min(Math.max(Math.trunc(n), 0), MAX_TOP_N);

    const ranked = await this.cache.topEntities.getOrCompute(
      scope.tenantId,
      `${kind}:${limit}:${rangeKey(current)}`,
      async (signal) => {
        const candidates = await this.rankCandidates(scope, kind, current, signal);
        return { kind, period: current, ...rankEntities(candidates, limit) };
      },
      options.signal,
    );

    if (this.canSeeFinancials(actor, scope)) {
      return ranked;
    }
    return {
      ...ranked,
      entries: ranked.entries.map((entry) => ({ ...entry, totalAmount: null })),
    };
  }

  async getPerformanceComparison(
    tenantId: string | undefined,
    actor: Actor,
    selector: PeriodSelector,
    options: ComputeOptions = {},
  ): Promise<PerformanceComparison> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const period = this.periods.resolve(selector);

    const [current, previous] = await Promise.all([
      this.totals(scope, period.current, options.signal),
      this.totals(scope, period.previous, options.signal),
    ]);

    return {
      period,
      stockIn: {
        current: current.stockIn.quantity,
        previous: previous.stockIn.quantity,
        pctChange: percentageChange(current.stockIn.quantity, previous.stockIn.quantity),
      },
      stockOut: {
        current: current.stockOut.quantity,
        previous: previous.stockOut.quantity,
        pctChange: percentageChange(current.stockOut.quantity, previous.stockOut.quantity),
      },
    };
  }

  async getRecentTransactions(
    tenantId: string | undefined,
    actor: Actor,
    limit: number = this.settings.recentTransactionsLimit,
    options: ComputeOptions = {},
  ): Promise<RecentTransaction[]> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const size = Math.min(Math.max(Math.trunc(limit), 0), MAX_TOP_N);

    const rows = await this.cache.recent.getOrCompute(
      scope.tenantId,
      `limit:${size}`,
      (signal) =>
        this.load(
          scope,
          'recent_movements',
          () => this.store.recentMovements(scope, size),
          (raw) => raw.map(toRecentTransaction),
          signal,
        ),
      options.signal,
    );

    if (this.canSeeFinancials(actor, scope)) {
      return rows;
    }
    return rows.map((row) => ({ ...row, pricePerQuintal: null, totalPrice: null }));
  }

  /**
   * All visible widgets at once. Each widget succeeds or fails on its own; only
   * access errors on the dashboard itself and cancellation reject the whole call.
   */
  async getDashboard(
    tenantId: string | undefined,
    actor: Actor,
    selector?: PeriodSelector,
    options: ComputeOptions = {},
  ): Promise<DashboardSnapshot> {
    const scope = await this.scopeFor(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const pref = await this.preferences.getOrCreate(actor);
    const effective: PeriodSelector = selector ?? { name: pref.defaultTimePeriod };
    const period = this.periods.resolve(effective);

    const financials = this.canSeeFinancials(actor, scope);
    const layout = this.preferences
      .layoutOf(pref)
      .filter((widget) => financials || widget !== DashboardWidget.FINANCIAL);

    const settled = await Promise.allSettled(
      layout.map((widget) => this.widget(widget, scope.tenantId, actor, effective, options)),
    );
    options.signal?.throwIfAborted();

    const widgets: DashboardSnapshot['widgets'] = {};
    settled.forEach((result, i) => {
      const widget = layout[i];
      widgets[widget] = this.toWidgetResult(scope, widget, result);
    });

    return { tenantId: scope.tenantId, period, layout, widgets };
  }

  // ---- Access ----

  /** Authorizes and resolves the scope; a tenant named by a super admin must exist. */
  private async scopeFor(
    actor: Actor,
    tenantId: string | undefined,
    ...actions: PermissionAction[]
  ): Promise<TenantScope> {
    const scope = this.authorization.authorizeScope(actor, tenantId, ...actions);
    if (isSuperAdmin(actor)) {
      await this.tenantSettings.requireTenant(scope.tenantId);
    }
    return scope;
  }

  private canSeeFinancials(actor: Actor, scope: TenantScope): boolean {
    return this.authorization.can(actor, PermissionAction.VIEW_FINANCIALS, {
      tenantId: scope.tenantId,
    });
  }

  // ---- Reads ----

  /** Reads through the retrying reader and logs computation errors raised while deriving. */
  private async load<R, T>(
    scope: TenantScope,
    label: string,
    read: () => Promise<R>,
    derive: (raw: R) => T,
    signal?: AbortSignal,
  ): Promise<T> {
    const raw = await this.reader.read(scope, label, read, signal);
    try {
      return derive(raw);
    } catch (err) {
      if (err instanceof ComputationException) {
        this.logger.error(
          [
            'computation_error',
            `tenant=${scope.tenantId}`,
            `metric=${err.metric}`,
            `reason=${err.reason}`,
          ].join(' | '),
        );
      }
      throw err;
    }
  }

  private balances(scope: TenantScope, signal?: AbortSignal): Promise<StockBalance[]> {
    return this.cache.balances.getOrCompute(
      scope.tenantId,
      'all',
      (computeSignal) =>
        this.load(
          scope,
          'stock_balances',
          () => this.store.stockBalances(scope),
          (rows) => rows.map(toStockBalance),
          computeSignal,
        ),
      signal,
    );
  }

  private async stockLevels(scope: TenantScope, signal?: AbortSignal): Promise<StockLevel[]> {
    const [balances, threshold] = await Promise.all([
      this.balances(scope, signal),
      this.lowStockThreshold(scope, signal),
    ]);

    return balances.map((b) => ({
      productId: b.productId,
      productName: b.productName,
      sku: b.sku,
      unit: b.unit,
      totalIn: b.totalIn,
      totalOut: b.totalOut,
      available: b.available,
      status: classifyStock(b.available, threshold),
    }));
  }

  private async lowStockThreshold(scope: TenantScope, signal?: AbortSignal): Promise<number> {
    const settings = await this.reader.read(
      scope,
      'tenant_settings',
      () => this.tenantSettings.settingsFor(scope.tenantId),
      signal,
    );
    const configured = settings.lowStockThreshold;
    return typeof configured === 'number' && Number.isFinite(configured) && configured >= 0
      ? configured
      : this.settings.lowStockThreshold;
  }

  private totals(scope: TenantScope, range: DateRange, signal?: AbortSignal): Promise<CachedTotals> {
    return this.cache.totals.getOrCompute(
      scope.tenantId,
      rangeKey(range),
      async (computeSignal) => {
        const [stockIn, stockOut] = await Promise.all([
          this.movementTotals(scope, MovementType.IN, range, computeSignal),
          this.movementTotals(scope, MovementType.OUT, range, computeSignal),
        ]);
        return { stockIn, stockOut };
      },
      signal,
    );
  }

  private movementTotals(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
    signal?: AbortSignal,
  ): Promise<MovementTotals> {
    return this.load(
      scope,
      `${type}_totals`,
      () => this.store.movementTotals(scope, type, range),
      (raw) => ({
        quantity: parseAggregate(`${type}_quantity`, raw.quantity),
        amount: parseAggregate(`${type}_amount`, raw.amount),
        count: raw.count,
      }),
      signal,
    );
  }

  private dailySeries(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
    signal?: AbortSignal,
  ): Promise<{ date: string; quantity: Decimal }[]> {
    return this.load(
      scope,
      `${type}_daily`,
      () => this.store.dailyQuantities(scope, type, range),
      (rows) =>
        rows.map((row) => ({
          date: row.date,
          quantity: parseAggregate(`${type}_daily_quantity`, row.quantity),
        })),
      signal,
    );
  }

  private rankCandidates(
    scope: TenantScope,
    kind: TopEntityKind,
    range: DateRange,
    signal?: AbortSignal,
  ): Promise<RankCandidate[]> {
    switch (kind) {
      case TopEntityKind.STOCK_IN_PRODUCTS:
      case TopEntityKind.STOCK_OUT_PRODUCTS: {
        const type =
          kind === TopEntityKind.STOCK_IN_PRODUCTS ? MovementType.IN : MovementType.OUT;
        return this.load(
          scope,
          `${type}_product_volumes`,
          () => this.store.productVolumes(scope, type, range),
          (rows) =>
            rows.map((row) => ({
              id: row.productId,
              name: row.productName,
              quantity: parseAggregate(`${type}_product_quantity`, row.quantity),
              amount: parseAggregate(`${type}_product_amount`, row.amount),
            })),
          signal,
        );
      }
      case TopEntityKind.FARMERS:
      case TopEntityKind.CUSTOMERS: {
        const type = kind === TopEntityKind.FARMERS ? MovementType.IN : MovementType.OUT;
        return this.load(
          scope,
          `${type}_party_volumes`,
          () => this.store.partyVolumes(scope, type, range),
          (rows) =>
            rows.map((row) => ({
              id: row.partyName,
              name: row.partyName,
              quantity: parseAggregate(`${type}_party_quantity`, row.quantity),
              amount: parseAggregate(`${type}_party_amount`, row.amount),
              count: row.count,
            })),
          signal,
        );
      }
    }
  }

  // ---- Dashboard assembly ----

  private widget(
    widget: DashboardWidget,
    tenantId: string,
    actor: Actor,
    selector: PeriodSelector,
    options: ComputeOptions,
  ): Promise<unknown> {
    const topKind = WIDGET_TOP_KIND[widget];
    if (topKind) {
      return this.getTopEntities(tenantId, actor, selector, topKind, undefined, options);
    }

    switch (widget) {
      case DashboardWidget.INVENTORY:
        return this.getInventoryMetrics(tenantId, actor, options);
      case DashboardWidget.ALERTS:
        return this.getStockAlerts(tenantId, actor, options);
      case DashboardWidget.FINANCIAL:
        return this.getFinancialMetrics(tenantId, actor, selector, options);
      case DashboardWidget.TREND:
        return this.getTrendSeries(tenantId, actor, selector, options);
      case DashboardWidget.COMPARISON:
        return this.getPerformanceComparison(tenantId, actor, selector, options);
      default:
        return this.getRecentTransactions(tenantId, actor, undefined, options);
    }
  }

  private toWidgetResult(
    scope: TenantScope,
    widget: DashboardWidget,
    result: PromiseSettledResult<unknown>,
  ): WidgetResult<unknown> {
    if (result.status === 'fulfilled') {
      return { status: 'ok', data: result.value };
    }

    const { code, message } = describeException(result.reason);
    this.logger.warn(
      ['widget_failed', `tenant=${scope.tenantId}`, `widget=${widget}`, `code=${code}`].join(' | '),
    );
    return { status: 'error', error: { code, message } };
  }
}

function toStockBalance(row: StockBalanceRow): StockBalance {
  const totalIn = parseAggregate('stock_in_quantity', row.totalIn);
  const totalOut = parseAggregate('stock_out_quantity', row.totalOut);
  return {
    productId: row.productId,
    productName: row.productName,
    sku: row.sku,
    unit: row.unit,
    pricePerQuintal: parseAggregate('price_per_quintal', row.pricePerQuintal),
    totalIn,
    totalOut,
    // negative when more went out than came in; classified as out of stock
    available: totalIn.minus(totalOut),
  };
}

function toRecentTransaction(row: MovementRow): RecentTransaction {
  return {
    id: row.id,
    type: row.type,
    productId: row.productId,
    productName: row.productName,
    partyName: row.partyName,
    date: row.date,
    numOfBags: row.numOfBags,
    totalQuintals: parseAggregate('total_quintals', row.totalQuintals),
    pricePerQuintal: parseAggregate('price_per_quintal', row.pricePerQuintal),
    totalPrice: parseAggregate('total_price', row.totalPrice),
    createdAt: row.createdAt,
  };
}
