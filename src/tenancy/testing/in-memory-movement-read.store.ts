import { Decimal } from 'decimal.js';
import { DateRange } from '../../common/types/date-range';
import { MovementType } from '../../inventory/stock-movement.entity';
import {
  compareByDateDesc,
  compareNewestFirst,
  DailyQuantityRow,
  DEFAULT_HISTORY_LIMIT,
  MovementHistoryFilters,
  MovementReadStore,
  MovementRow,
  MovementTotalsRow,
  PartyVolumeRow,
  ProductVolumeRow,
  StockBalanceRow,
} from '../movement-read.store';
import { TenantScope } from '../tenant-scope';

export interface SeedProduct {
  id: string;
  tenantId: string;
  name: string;
  sku: string;
  unit?: string;
  pricePerQuintal: string;
}

export interface SeedMovement {
  id: string;
  tenantId: string;
  type: MovementType;
  productId: string;
  date: string;
  partyName: string;
  numOfBags?: number;
  netWeightPerBagKg?: string;
  totalQuintals: string;
  pricePerQuintal: string;
  totalPrice?: string;
  createdAt?: Date;
}

/**
 * Aggregates over plain arrays the way the SQL store does, including the
 * string-typed numerics. `calls` counts reads per method.
 */
export class InMemoryMovementReadStore extends MovementReadStore {
  readonly products: SeedProduct[] = [];
  readonly movements: SeedMovement[] = [];
  readonly calls = new Map<string, number>();
  private failures = new Map<string, unknown[]>();

  addProduct(product: SeedProduct): this {
    this.products.push(product);
    return this;
  }

  addMovement(movement: SeedMovement): this {
    this.movements.push(movement);
    return this;
  }

  /** Makes the next calls of `method` reject with the given errors, in order. */
  failNext(method: keyof MovementReadStore, ...errors: unknown[]): this {
    this.failures.set(method, [...(this.failures.get(method) ?? []), ...errors]);
    return this;
  }

  callCount(method: keyof MovementReadStore): number {
    return this.calls.get(method) ?? 0;
  }

  private enter(method: keyof MovementReadStore): void {
    this.calls.set(method, this.callCount(method) + 1);
    const pending = this.failures.get(method);
    if (pending?.length) {
      throw pending.shift();
    }
  }

  private select(scope: TenantScope, type: MovementType, range: DateRange): SeedMovement[] {
    return this.movements.filter(
      (m) =>
        m.tenantId === scope.tenantId &&
        m.type === type &&
        m.date >= range.start &&
        m.date < range.end,
    );
  }

  private product(id: string): SeedProduct | undefined {
    return this.products.find((p) => p.id === id);
  }

  async stockBalances(scope: TenantScope): Promise<StockBalanceRow[]> {
    this.enter('stockBalances');
    return this.products
      .filter((p) => p.tenantId === scope.tenantId)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((p) => {
        const own = this.movements.filter(
          (m) => m.tenantId === scope.tenantId && m.productId === p.id,
        );
        return {
          productId: p.id,
          productName: p.name,
          sku: p.sku,
          unit: p.unit ?? 'quintal',
          pricePerQuintal: p.pricePerQuintal,
          totalIn: sum(own.filter((m) => m.type === MovementType.IN), (m) => m.totalQuintals),
          totalOut: sum(own.filter((m) => m.type === MovementType.OUT), (m) => m.totalQuintals),
        };
      });
  }

  async movementTotals(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<MovementTotalsRow> {
    this.enter('movementTotals');
    const rows = this.select(scope, type, range);
    return {
      quantity: sum(rows, (m) => m.totalQuintals),
      amount: sum(rows, amountOf),
      count: rows.length,
    };
  }

  async dailyQuantities(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<DailyQuantityRow[]> {
    this.enter('dailyQuantities');
    const byDay = groupBy(this.select(scope, type, range), (m) => m.date);
    return [...byDay.entries()]
      .sort(([a], [b]) => (a < b ? -1 : 1))
      .map(([date, rows]) => ({ date, quantity: sum(rows, (m) => m.totalQuintals) }));
  }

  async productVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<ProductVolumeRow[]> {
    this.enter('productVolumes');
    const byProduct = groupBy(this.select(scope, type, range), (m) => m.productId);
    return [...byProduct.entries()].map(([productId, rows]) => ({
      productId,
      productName: this.product(productId)?.name ?? '',
      quantity: sum(rows, (m) => m.totalQuintals),
      amount: sum(rows, amountOf),
    }));
  }

  async partyVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<PartyVolumeRow[]> {
    this.enter('partyVolumes');
    const byParty = groupBy(this.select(scope, type, range), (m) => m.partyName);
    return [...byParty.entries()].map(([partyName, rows]) => ({
      partyName,
      quantity: sum(rows, (m) => m.totalQuintals),
      amount: sum(rows, amountOf),
      count: rows.length,
    }));
  }

  async recentMovements(scope: TenantScope, limit: number): Promise<MovementRow[]> {
    this.enter('recentMovements');
    return this.rows(scope).sort(compareNewestFirst).slice(0, limit);
  }

  async movementHistory(
    scope: TenantScope,
    filters: MovementHistoryFilters,
  ): Promise<MovementRow[]> {
    this.enter('movementHistory');
    const needle = filters.partyName?.toLowerCase();
    return this.rows(scope)
      .filter(
        (r) =>
          (!filters.type || r.type === filters.type) &&
          (!filters.dateFrom || r.date >= filters.dateFrom) &&
          (!filters.dateTo || r.date <= filters.dateTo) &&
          (!needle || r.partyName.toLowerCase().includes(needle)),
      )
      .sort(compareByDateDesc)
      .slice(0, filters.limit ?? DEFAULT_HISTORY_LIMIT);
  }

  private rows(scope: TenantScope): MovementRow[] {
    return this.movements
      .filter((m) => m.tenantId === scope.tenantId)
      .map((m) => ({
        id: m.id,
        type: m.type,
        productId: m.productId,
        productName: this.product(m.productId)?.name ?? '',
        date: m.date,
        partyName: m.partyName,
        partyContact: null,
        vehicleNumber: null,
        numOfBags: m.numOfBags ?? 1,
        netWeightPerBagKg: m.netWeightPerBagKg ?? '100',
        totalQuintals: m.totalQuintals,
        pricePerQuintal: m.pricePerQuintal,
        totalPrice: amountOf(m),
        createdAt: m.createdAt ?? new Date(`${m.date}T00:00:00.000Z`),
      }));
  }
}

function amountOf(m: SeedMovement): string {
  return m.totalPrice ?? new Decimal(m.totalQuintals).times(m.pricePerQuintal).toFixed();
}

function sum<T>(rows: T[], pick: (row: T) => string): string {
  return rows.reduce((acc, row) => acc.plus(pick(row)), new Decimal(0)).toFixed();
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    groups.set(k, [...(groups.get(k) ?? []), row]);
  }
  return groups;
}
