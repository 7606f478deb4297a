import { DateRange } from '../common/types/date-range';
import { MovementType } from '../inventory/stock-movement.entity';
import { TenantScope } from './tenant-scope';

// Numeric aggregates arrive as strings exactly as the database returns them;
// the dashboard parses and sanity-checks them.

export interface StockBalanceRow {
  productId: string;
  productName: string;
  sku: string;
  unit: string;
  pricePerQuintal: string;
  totalIn: string;
  totalOut: string;
}

export interface MovementTotalsRow {
  quantity: string;
  amount: string;
  count: number;
}

export interface DailyQuantityRow {
  date: string;
  quantity: string;
}

export interface ProductVolumeRow {
  productId: string;
  productName: string;
  quantity: string;
  amount: string;
}

export interface PartyVolumeRow {
  partyName: string;
  quantity: string;
  amount: string;
  count: number;
}

export interface MovementRow {
  id: string;
  type: MovementType;
  productId: string;
  productName: string;
  date: string;
  partyName: string;
  partyContact: string | null;
  vehicleNumber: string | null;
  numOfBags: number;
  netWeightPerBagKg: string;
  totalQuintals: string;
  pricePerQuintal: string;
  totalPrice: string;
  createdAt: Date;
}

export interface MovementHistoryFilters {
  type?: MovementType;
  dateFrom?: string;
  // inclusive
  dateTo?: string;
  partyName?: string;
  limit?: number;
}

/**
 * The only way to read aggregated movement data. Ranges are `[start, end)` over
 * the movement's business date.
 */
export abstract class MovementReadStore {
  /** One row per product of the tenant, with lifetime in/out quantities. */
  abstract stockBalances(scope: TenantScope): Promise<StockBalanceRow[]>;

  abstract movementTotals(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<MovementTotalsRow>;

  /** Days without movements are absent. */
  abstract dailyQuantities(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<DailyQuantityRow[]>;

  abstract productVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<ProductVolumeRow[]>;

  abstract partyVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<PartyVolumeRow[]>;

  /** Both movement kinds, newest inserted first. */
  abstract recentMovements(scope: TenantScope, limit: number): Promise<MovementRow[]>;

  /** Newest business date first. */
  abstract movementHistory(
    scope: TenantScope,
    filters: MovementHistoryFilters,
  ): Promise<MovementRow[]>;
}

export const DEFAULT_HISTORY_LIMIT = 200;

export function compareNewestFirst(a: MovementRow, b: MovementRow): number {
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

export function compareByDateDesc(a: MovementRow, b: MovementRow): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  return compareNewestFirst(a, b);
}
