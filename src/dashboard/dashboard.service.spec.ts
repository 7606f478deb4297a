import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Decimal } from 'decimal.js';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { ManualClock } from '../common/clock/testing/manual-clock';
import { TenantErrors } from '../common/errors/tenant.errors';
import {
  TenantMismatchException,
  UnauthorizedActionException,
} from '../common/exceptions/access-denied.exception';
import {
  ComputationException,
  DegradedDataException,
} from '../common/exceptions/report.exceptions';
import { InventoryService } from '../inventory/inventory.service';
import { MovementType } from '../inventory/stock-movement.entity';
import { InMemoryMovementReadStore } from '../tenancy/testing/in-memory-movement-read.store';
import { ScopedReader } from '../tenancy/scoped-reader.service';
import { UserRole } from '../user/user.entity';
import { MetricsCacheService } from './cache/metrics-cache.service';
import { DashboardService } from './dashboard.service';
import { DashboardWidget, TopEntityKind } from './dashboard.types';
import { ChangeNotifierService } from './notifications/change-notifier.service';
import { DashboardCacheInvalidator } from './notifications/dashboard-cache-invalidator';
import { PeriodName } from './period/period';
import { PeriodResolverService } from './period/period-resolver.service';
import { DashboardPreferenceService } from './preferences/dashboard-preference.service';

const TENANT_A = 'aaaaaaaa-0000-4000-8000-000000000001';
const TENANT_B = 'bbbbbbbb-0000-4000-8000-000000000002';

const admin: Actor = { id: 'admin-a', role: UserRole.COMPANY_ADMIN, tenantId: TENANT_A };
const operator: Actor = { id: 'operator-a', role: UserRole.OPERATOR, tenantId: TENANT_A };
const viewer: Actor = { id: 'viewer-a', role: UserRole.VIEWER, tenantId: TENANT_A };
const root: Actor = { id: 'root', role: UserRole.SUPER_ADMIN, tenantId: null };

const THIS_MONTH = { name: PeriodName.THIS_MONTH } as const;

const tick = () => new Promise((resolve) => setImmediate(resolve));

function seed(store: InMemoryMovementReadStore): void {
  store
    .addProduct({ id: 'p1', tenantId: TENANT_A, name: 'Basmati Paddy', sku: 'BAS-01', pricePerQuintal: '2000' })
    .addProduct({ id: 'p2', tenantId: TENANT_A, name: 'Sona Masoori', sku: 'SON-01', pricePerQuintal: '1500' })
    .addProduct({ id: 'p3', tenantId: TENANT_A, name: 'Broken Rice', sku: 'BRK-01', pricePerQuintal: '800' })
    .addProduct({ id: 'p9', tenantId: TENANT_B, name: 'Other Mill Paddy', sku: 'OTH-01', pricePerQuintal: '999' });

  store
    .addMovement({ id: 'm1', tenantId: TENANT_A, type: MovementType.IN, productId: 'p1', date: '2025-03-02', partyName: 'Ravi', totalQuintals: '100', pricePerQuintal: '2000' })
    .addMovement({ id: 'm2', tenantId: TENANT_A, type: MovementType.IN, productId: 'p2', date: '2025-03-05', partyName: 'Suresh', totalQuintals: '40', pricePerQuintal: '1500' })
    .addMovement({ id: 'm3', tenantId: TENANT_A, type: MovementType.OUT, productId: 'p1', date: '2025-03-06', partyName: 'Kumar Traders', totalQuintals: '30', pricePerQuintal: '2500', createdAt: new Date('2025-03-06T09:00:00Z') })
    .addMovement({ id: 'm4', tenantId: TENANT_A, type: MovementType.IN, productId: 'p1', date: '2025-02-10', partyName: 'Ravi', totalQuintals: '50', pricePerQuintal: '1900' })
    .addMovement({ id: 'm5', tenantId: TENANT_A, type: MovementType.OUT, productId: 'p2', date: '2025-03-06', partyName: 'Lakshmi Stores', totalQuintals: '40', pricePerQuintal: '1800', createdAt: new Date('2025-03-06T10:00:00Z') })
    .addMovement({ id: 'm6', tenantId: TENANT_A, type: MovementType.IN, productId: 'p3', date: '2025-03-10', partyName: 'Ravi', totalQuintals: '20', pricePerQuintal: '800' })
    .addMovement({ id: 'm7', tenantId: TENANT_A, type: MovementType.OUT, productId: 'p3', date: '2025-02-20', partyName: 'Kumar Traders', totalQuintals: '10', pricePerQuintal: '900' })
    .addMovement({ id: 'm9', tenantId: TENANT_B, type: MovementType.IN, productId: 'p9', date: '2025-03-03', partyName: 'Someone Else', totalQuintals: '500', pricePerQuintal: '999' });
}

describe('DashboardService', () => {
  let clock: ManualClock;
  let store: InMemoryMovementReadStore;
  let cache: MetricsCacheService;
  let settings: { settingsFor: jest.Mock; requireTenant: jest.Mock };
  let preference: {
    userId: string;
    widgetOrder: string[];
    hiddenWidgets: string[];
    defaultTimePeriod: PeriodName;
  };
  let service: DashboardService;

  function createService(reader: ScopedReader): DashboardService {
    const config = new ConfigService({});
    const preferenceRepo = { findOne: jest.fn(async () => preference) } as any;
    return new DashboardService(
      config,
      new AuthorizationService(),
      store,
      reader,
      cache,
      new PeriodResolverService(clock),
      settings as any,
      new DashboardPreferenceService(preferenceRepo),
    );
  }

  beforeEach(() => {
    const config = new ConfigService({ DASHBOARD_READ_RETRY_BACKOFF_MS: 0 });
    // Wednesday 12 March 2025
    clock = new ManualClock('2025-03-12T10:00:00Z');

    store = new InMemoryMovementReadStore();
    seed(store);
    cache = new MetricsCacheService(config, clock);
    settings = {
      settingsFor: jest.fn().mockResolvedValue({}),
      requireTenant: jest.fn(async (id: string) => {
        if (id !== TENANT_A && id !== TENANT_B) {
          throw new NotFoundException(TenantErrors.TENANT_NOT_FOUND);
        }
      }),
    };
    preference = {
      userId: 'any',
      widgetOrder: [],
      hiddenWidgets: [],
      defaultTimePeriod: PeriodName.THIS_MONTH,
    };
    service = createService(new ScopedReader(config));
  });

  describe('getInventoryMetrics', () => {
    it('sums available stock and values it at current prices', async () => {
      const metrics = await service.getInventoryMetrics(undefined, admin);

      expect(metrics.totalStock.toString()).toBe('130');
      // p2 went out as fast as it came in
      expect(metrics.productCount).toBe(2);
      expect(metrics.totalValue?.toString()).toBe('248000');
    });

    it('hides the stock value from viewers', async () => {
      const metrics = await service.getInventoryMetrics(TENANT_A, viewer);
      expect(metrics.totalStock.toString()).toBe('130');
      expect(metrics.totalValue).toBeNull();
    });

    it('serves repeated reads from the cache until the tenant is invalidated', async () => {
      await service.getInventoryMetrics(undefined, admin);
      await service.getInventoryMetrics(undefined, viewer);
      expect(store.callCount('stockBalances')).toBe(1);

      cache.invalidateTenant(TENANT_A, 'test');
      await service.getInventoryMetrics(undefined, admin);
      expect(store.callCount('stockBalances')).toBe(2);
    });

    it('counts only products with stock on hand', async () => {
      store.addProduct({ id: 'p4', tenantId: TENANT_A, name: 'Red Rice', sku: 'RED-01', pricePerQuintal: '1200' });

      const metrics = await service.getInventoryMetrics(undefined, admin);

      expect(metrics.productCount).toBe(2);
      expect(metrics.totalStock.toString()).toBe('130');
    });

    it('lets a super admin read a named tenant', async () => {
      const metrics = await service.getInventoryMetrics(TENANT_B, root);
      expect(metrics.totalStock.toString()).toBe('500');
      expect(metrics.productCount).toBe(1);
      expect(settings.requireTenant).toHaveBeenCalledWith(TENANT_B);
    });

    it('answers a super admin naming an unknown tenant with not found', async () => {
      const missing = 'cccccccc-0000-4000-8000-000000000003';

      await expect(service.getInventoryMetrics(missing, root)).rejects.toBeInstanceOf(
        NotFoundException,
      );
      await expect(
        service.getFinancialMetrics(missing, root, THIS_MONTH),
      ).rejects.toBeInstanceOf(NotFoundException);
      await expect(service.getDashboard(missing, root, THIS_MONTH)).rejects.toBeInstanceOf(
        NotFoundException,
      );
      expect(store.callCount('stockBalances')).toBe(0);
      expect(store.callCount('movementTotals')).toBe(0);
    });

    it('does not look up the tenant of a tenant-bound actor', async () => {
      await service.getInventoryMetrics(undefined, admin);
      expect(settings.requireTenant).not.toHaveBeenCalled();
    });

    it('refuses a super admin who names no tenant', async () => {
      await expect(service.getInventoryMetrics(undefined, root)).rejects.toBeInstanceOf(
        TenantMismatchException,
      );
      expect(store.callCount('stockBalances')).toBe(0);
    });

    it('refuses cross-tenant reads before touching the store', async () => {
      await expect(service.getInventoryMetrics(TENANT_B, operator)).rejects.toBeInstanceOf(
        UnauthorizedActionException,
      );
      await expect(service.getInventoryMetrics(TENANT_B, admin)).rejects.toBeInstanceOf(
        TenantMismatchException,
      );
      expect(store.callCount('stockBalances')).toBe(0);
    });

    it('raises a computation error for a negative aggregate and caches nothing', async () => {
      store.addMovement({
        id: 'bad',
        tenantId: TENANT_A,
        type: MovementType.IN,
        productId: 'p2',
        date: '2025-03-07',
        partyName: 'Ravi',
        totalQuintals: '-100',
        pricePerQuintal: '1500',
      });

      await expect(service.getInventoryMetrics(undefined, admin)).rejects.toBeInstanceOf(
        ComputationException,
      );
      await expect(service.getInventoryMetrics(undefined, admin)).rejects.toBeInstanceOf(
        ComputationException,
      );
      expect(store.callCount('stockBalances')).toBe(2);
    });

    it('rejects an already cancelled request without reading', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        service.getInventoryMetrics(undefined, admin, { signal: controller.signal }),
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(store.callCount('stockBalances')).toBe(0);
    });

    it('stops retrying a read once the only caller goes away', async () => {
      const slowReader = new ScopedReader(
        new ConfigService({ DASHBOARD_READ_RETRY_BACKOFF_MS: 60_000 }),
      );
      const read = jest.spyOn(slowReader, 'read');
      service = createService(slowReader);
      store.failNext('stockBalances', new Error('connection reset'));
      const controller = new AbortController();

      const pending = service.getInventoryMetrics(undefined, admin, { signal: controller.signal });
      await tick();
      controller.abort();

      await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
      expect(read.mock.calls[0][1]).toBe('stock_balances');
      expect(read.mock.calls[0][3]?.aborted).toBe(true);
      await tick();
      expect(store.callCount('stockBalances')).toBe(1);
    });
  });

  describe('getStockAlerts', () => {
    it('lists out-of-stock and low-stock products, lowest first', async () => {
      const alerts = await service.getStockAlerts(undefined, operator);

      expect(
        alerts.map((a) => [a.productId, a.currentStock.toString(), a.severity]),
      ).toEqual([
        ['p2', '0', 'out_of_stock'],
        ['p3', '10', 'low_stock'],
      ]);
    });

    it('uses the tenant threshold when one is configured', async () => {
      settings.settingsFor.mockResolvedValue({ lowStockThreshold: 150 });

      const alerts = await service.getStockAlerts(undefined, operator);

      expect(alerts.map((a) => a.productId)).toEqual(['p2', 'p3', 'p1']);
      expect(settings.settingsFor).toHaveBeenCalledWith(TENANT_A);
    });
  });

  describe('getStockLevels', () => {
    it('reports in, out and available per product', async () => {
      const levels = await service.getStockLevels(undefined, viewer);

      expect(
        levels.map((l) => [l.productName, l.totalIn.toString(), l.totalOut.toString(), l.available.toString(), l.status]),
      ).toEqual([
        ['Basmati Paddy', '150', '30', '120', 'in_stock'],
        ['Broken Rice', '20', '10', '10', 'low_stock'],
        ['Sona Masoori', '40', '40', '0', 'out_of_stock'],
      ]);
    });
  });

  describe('getFinancialMetrics', () => {
    it('sums purchases and sales for the period', async () => {
      const metrics = await service.getFinancialMetrics(undefined, admin, THIS_MONTH);

      expect(metrics.period.current).toEqual({ start: '2025-03-01', end: '2025-04-01' });
      expect(metrics.purchases.toString()).toBe('276000');
      expect(metrics.sales.toString()).toBe('147000');
      expect(metrics.grossMargin.toString()).toBe('-129000');
      expect(metrics.stockInQuantity.toString()).toBe('160');
      expect(metrics.stockOutQuantity.toString()).toBe('70');
      expect(metrics.stockInCount).toBe(3);
      expect(metrics.stockOutCount).toBe(2);
    });

    it('is unavailable to viewers', async () => {
      await expect(
        service.getFinancialMetrics(undefined, viewer, THIS_MONTH),
      ).rejects.toBeInstanceOf(UnauthorizedActionException);
      expect(store.callCount('movementTotals')).toBe(0);
    });

    it('recovers from a single failed read', async () => {
      store.failNext('movementTotals', new Error('connection reset'));

      const metrics = await service.getFinancialMetrics(undefined, admin, THIS_MONTH);

      expect(metrics.purchases.toString()).toBe('276000');
      expect(store.callCount('movementTotals')).toBe(3);
    });

    it('reports degraded data when reads keep failing', async () => {
      store.failNext(
        'movementTotals',
        new Error('down'),
        new Error('down'),
        new Error('down'),
        new Error('down'),
      );

      await expect(
        service.getFinancialMetrics(undefined, admin, THIS_MONTH),
      ).rejects.toBeInstanceOf(DegradedDataException);
    });
  });

  describe('getTrendSeries', () => {
    it('returns one zero-filled bucket per day of the period', async () => {
      const trend = await service.getTrendSeries(undefined, viewer, THIS_MONTH);

      expect(trend.dates).toHaveLength(31);
      expect(trend.stockIn).toHaveLength(31);
      expect(trend.stockOut).toHaveLength(31);
      expect(trend.dates[0]).toBe('2025-03-01');
      expect(trend.dates[30]).toBe('2025-03-31');
      expect(trend.stockIn[1].toString()).toBe('100');
      expect(trend.stockIn[4].toString()).toBe('40');
      expect(trend.stockIn[9].toString()).toBe('20');
      expect(trend.stockOut[5].toString()).toBe('70');
      expect(trend.stockIn[0].toString()).toBe('0');
    });
  });

  describe('getTopEntities', () => {
    it('ranks stock-in products with shares of the displayed total', async () => {
      const top = await service.getTopEntities(undefined, admin, THIS_MONTH, TopEntityKind.STOCK_IN_PRODUCTS);

      expect(top.total.toString()).toBe('160');
      expect(
        top.entries.map((e) => [e.id, e.quantity.toString(), e.percentage.toString(), e.totalAmount?.toString()]),
      ).toEqual([
        ['p1', '100', '62.5', '200000'],
        ['p2', '40', '25', '60000'],
        ['p3', '20', '12.5', '16000'],
      ]);
    });

    it('ranks farmers with transaction counts', async () => {
      const top = await service.getTopEntities(undefined, operator, THIS_MONTH, TopEntityKind.FARMERS);

      expect(top.entries).toHaveLength(2);
      expect(top.entries[0]).toMatchObject({ id: 'Ravi', transactionCount: 2 });
      expect(top.entries[0].averageTransactionSize?.toString()).toBe('60');
      expect(top.entries[0].percentage.toString()).toBe('75');
      expect(top.entries[1]).toMatchObject({ id: 'Suresh', transactionCount: 1 });
    });

    it('ranks customers and limits to n', async () => {
      const top = await service.getTopEntities(undefined, admin, THIS_MONTH, TopEntityKind.CUSTOMERS);
      expect(top.entries.map((e) => [e.name, e.percentage.toString()])).toEqual([
        ['Lakshmi Stores', '57.14'],
        ['Kumar Traders', '42.86'],
      ]);

      const one = await service.getTopEntities(undefined, admin, THIS_MONTH, TopEntityKind.CUSTOMERS, 1);
      expect(one.entries.map((e) => e.name)).toEqual(['Lakshmi Stores']);
      expect(one.entries[0].percentage.toString()).toBe('100');
    });

    it('drops amounts for viewers without touching the cached copy', async () => {
      const forViewer = await service.getTopEntities(undefined, viewer, THIS_MONTH, TopEntityKind.FARMERS);
      expect(forViewer.entries.every((e) => e.totalAmount === null)).toBe(true);

      const forAdmin = await service.getTopEntities(undefined, admin, THIS_MONTH, TopEntityKind.FARMERS);
      expect(forAdmin.entries[0].totalAmount?.toString()).toBe('216000');
      expect(store.callCount('partyVolumes')).toBe(1);
    });
  });

  describe('getPerformanceComparison', () => {
    it('compares against the previous calendar month', async () => {
      const comparison = await service.getPerformanceComparison(undefined, viewer, THIS_MONTH);

      expect(comparison.period.previous).toEqual({ start: '2025-02-01', end: '2025-03-01' });
      expect(comparison.stockIn.current.toString()).toBe('160');
      expect(comparison.stockIn.previous.toString()).toBe('50');
      expect(comparison.stockIn.pctChange.value.toString()).toBe('220');
      expect(comparison.stockIn.pctChange.baseline).toBe('previous');
      expect(comparison.stockOut.pctChange.value.toString()).toBe('600');
    });

    it('flags growth from an empty previous period', async () => {
      const comparison = await service.getPerformanceComparison(undefined, viewer, {
        name: PeriodName.CUSTOM,
        start: '2025-03-01',
        end: '2025-03-08',
      });

      // previous range 2025-02-22..2025-03-01 has no stock-ins
      expect(comparison.stockIn.previous.toString()).toBe('0');
      expect(comparison.stockIn.pctChange).toMatchObject({ baseline: 'none' });
      expect(comparison.stockIn.pctChange.value.toString()).toBe('100');
    });
  });

  describe('getRecentTransactions', () => {
    it('returns the newest movements first regardless of period', async () => {
      const recent = await service.getRecentTransactions(undefined, admin, 3);

      expect(recent.map((r) => r.id)).toEqual(['m6', 'm5', 'm3']);
      expect(recent[1]).toMatchObject({ type: MovementType.OUT, productName: 'Sona Masoori' });
      expect(recent[1].totalPrice?.toString()).toBe('72000');
    });

    it('defaults to ten and includes older periods', async () => {
      const recent = await service.getRecentTransactions(undefined, admin);
      expect(recent.map((r) => r.id)).toEqual(['m6', 'm5', 'm3', 'm2', 'm1', 'm7', 'm4']);
    });

    it('nulls prices for viewers', async () => {
      const recent = await service.getRecentTransactions(undefined, viewer, 1);
      expect(recent[0].pricePerQuintal).toBeNull();
      expect(recent[0].totalPrice).toBeNull();
      expect(recent[0].totalQuintals.toString()).toBe('20');
    });
  });

  describe('after a recorded movement', () => {
    it('recomputes inventory within the ttl once a stock-in is published', async () => {
      const notifier = new ChangeNotifierService(clock);
      const invalidator = new DashboardCacheInvalidator(notifier, cache);
      invalidator.onModuleInit();

      const product = {
        id: 'p1',
        tenantId: TENANT_A,
        name: 'Basmati Paddy',
        pricePerQuintal: new Decimal('2000'),
      };
      const repo = {
        create: jest.fn((data: Record<string, unknown>) => ({ ...data })),
        save: jest.fn(async (entity: any) => {
          store.addMovement({
            id: 'm10',
            tenantId: entity.tenantId,
            type: MovementType.IN,
            productId: entity.productId,
            date: entity.date,
            partyName: entity.partyName,
            totalQuintals: entity.totalQuintals.toString(),
            pricePerQuintal: entity.pricePerQuintal.toString(),
          });
          return { id: 'm10', ...entity };
        }),
      };
      const manager = { getRepository: jest.fn(() => repo) };
      const inventory = new InventoryService(
        { transaction: jest.fn((work: (m: unknown) => unknown) => work(manager)) } as any,
        new AuthorizationService(),
        { getForScopeOrThrow: jest.fn(async () => product) } as any,
        { record: jest.fn(async () => ({})) } as any,
        notifier,
        clock,
      );

      const before = await service.getInventoryMetrics(undefined, admin);
      expect(before.totalStock.toString()).toBe('130');

      clock.advance(10_000);
      const saved = await inventory.recordStockIn(operator, {
        productId: 'p1',
        date: '2025-03-12',
        partyName: 'Ravi',
        numOfBags: 10,
        netWeightPerBagKg: '50',
      });
      expect(saved.totalQuintals.toString()).toBe('5');
      expect(saved.totalPrice.toString()).toBe('10000');

      clock.advance(1_000);
      const after = await service.getInventoryMetrics(undefined, admin);

      expect(after.totalStock.toString()).toBe('135');
      expect(store.callCount('stockBalances')).toBe(2);
      invalidator.onModuleDestroy();
    });

    it('keeps serving the cached value within the ttl when nothing changed', async () => {
      await service.getInventoryMetrics(undefined, admin);
      clock.advance(11_000);
      await service.getInventoryMetrics(undefined, admin);

      expect(store.callCount('stockBalances')).toBe(1);
    });
  });

  describe('getDashboard', () => {
    it('assembles every widget for an admin', async () => {
      const snapshot = await service.getDashboard(undefined, admin, THIS_MONTH);

      expect(snapshot.tenantId).toBe(TENANT_A);
      expect(snapshot.layout).toHaveLength(10);
      expect(Object.values(snapshot.widgets).every((w) => w?.status === 'ok')).toBe(true);
    });

    it('leaves out the financial widget for viewers', async () => {
      const snapshot = await service.getDashboard(undefined, viewer, THIS_MONTH);

      expect(snapshot.layout).not.toContain(DashboardWidget.FINANCIAL);
      expect(snapshot.widgets[DashboardWidget.FINANCIAL]).toBeUndefined();
      expect(snapshot.widgets[DashboardWidget.INVENTORY]?.status).toBe('ok');
    });

    it('skips hidden widgets and follows the saved order', async () => {
      preference.hiddenWidgets = [DashboardWidget.TREND];
      preference.widgetOrder = [DashboardWidget.RECENT, DashboardWidget.ALERTS];

      const snapshot = await service.getDashboard(undefined, admin, THIS_MONTH);

      expect(snapshot.layout.slice(0, 3)).toEqual([
        DashboardWidget.RECENT,
        DashboardWidget.ALERTS,
        DashboardWidget.INVENTORY,
      ]);
      expect(snapshot.widgets[DashboardWidget.TREND]).toBeUndefined();
      expect(store.callCount('dailyQuantities')).toBe(0);
    });

    it('lets one widget fail without failing the others', async () => {
      store.failNext('recentMovements', new Error('timeout'), new Error('timeout'));

      const snapshot = await service.getDashboard(undefined, admin, THIS_MONTH);

      expect(snapshot.widgets[DashboardWidget.RECENT]).toEqual({
        status: 'error',
        error: {
          code: 'REPORT_DATA_UNAVAILABLE',
          message: 'Report data is temporarily unavailable. Please retry shortly.',
        },
      });
      expect(snapshot.widgets[DashboardWidget.INVENTORY]?.status).toBe('ok');
    });

    it('falls back to the saved default period', async () => {
      preference.defaultTimePeriod = PeriodName.LAST_MONTH;

      const snapshot = await service.getDashboard(undefined, admin);

      expect(snapshot.period.current).toEqual({ start: '2025-02-01', end: '2025-03-01' });
    });
  });
});
