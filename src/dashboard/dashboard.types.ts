import { Decimal } from 'decimal.js';
import { DateRange } from '../common/types/date-range';
import { MovementType } from '../inventory/stock-movement.entity';
import { ResolvedPeriod } from './period/period';

export interface StockBalance {
  productId: string;
  productName: string;
  sku: string;
  unit: string;
  pricePerQuintal: Decimal;
  totalIn: Decimal;
  totalOut: Decimal;
  available: Decimal;
}

export interface InventoryMetrics {
  totalStock: Decimal;
  productCount: number;
  // available stock at current product prices; null without financial access
  totalValue: Decimal | null;
}

export enum StockStatus {
  OUT_OF_STOCK = 'out_of_stock',
  LOW_STOCK = 'low_stock',
  IN_STOCK = 'in_stock',
}

export type AlertSeverity = StockStatus.OUT_OF_STOCK | StockStatus.LOW_STOCK;

export interface StockAlert {
  productId: string;
  productName: string;
  sku: string;
  currentStock: Decimal;
  severity: AlertSeverity;
}

export interface StockLevel {
  productId: string;
  productName: string;
  sku: string;
  unit: string;
  totalIn: Decimal;
  totalOut: Decimal;
  available: Decimal;
  status: StockStatus;
}

export interface MovementTotals {
  quantity: Decimal;
  amount: Decimal;
  count: number;
}

export interface FinancialMetrics {
  period: ResolvedPeriod;
  purchases: Decimal;
  sales: Decimal;
  grossMargin: Decimal;
  stockInQuantity: Decimal;
  stockOutQuantity: Decimal;
  stockInCount: number;
  stockOutCount: number;
}

export interface TrendSeries {
  period: DateRange;
  dates: string[];
  stockIn: Decimal[];
  stockOut: Decimal[];
}

export enum TopEntityKind {
  STOCK_IN_PRODUCTS = 'stock_in_products',
  STOCK_OUT_PRODUCTS = 'stock_out_products',
  FARMERS = 'farmers',
  CUSTOMERS = 'customers',
}

export interface RankedEntity {
  // product id, or the party name for farmers and customers
  id: string;
  name: string;
  quantity: Decimal;
  totalAmount: Decimal | null;
  percentage: Decimal;
  transactionCount?: number;
  averageTransactionSize?: Decimal;
}

export interface TopEntities {
  kind: TopEntityKind;
  period: DateRange;
  total: Decimal;
  entries: RankedEntity[];
}

export type PercentChangeBaseline = 'both_zero' | 'none' | 'previous';

export interface PercentChange {
  value: Decimal;
  // 'none': previous was zero, value is the +100 sentinel
  baseline: PercentChangeBaseline;
}

export interface SeriesComparison {
  current: Decimal;
  previous: Decimal;
  pctChange: PercentChange;
}

export interface PerformanceComparison {
  period: ResolvedPeriod;
  stockIn: SeriesComparison;
  stockOut: SeriesComparison;
}

export interface RecentTransaction {
  id: string;
  type: MovementType;
  productId: string;
  productName: string;
  partyName: string;
  date: string;
  numOfBags: number;
  totalQuintals: Decimal;
  pricePerQuintal: Decimal | null;
  totalPrice: Decimal | null;
  createdAt: Date;
}

export enum DashboardWidget {
  INVENTORY = 'inventory',
  ALERTS = 'alerts',
  FINANCIAL = 'financial',
  TREND = 'trend',
  TOP_STOCK_IN_PRODUCTS = 'top_stock_in_products',
  TOP_STOCK_OUT_PRODUCTS = 'top_stock_out_products',
  TOP_FARMERS = 'top_farmers',
  TOP_CUSTOMERS = 'top_customers',
  COMPARISON = 'comparison',
  RECENT = 'recent',
}

export const ALL_WIDGETS: readonly DashboardWidget[] = Object.values(DashboardWidget);

export type WidgetResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'error'; error: { code: string; message: string } };

export interface DashboardSnapshot {
  tenantId: string;
  period: ResolvedPeriod;
  // visible widgets in display order
  layout: DashboardWidget[];
  widgets: Partial<Record<DashboardWidget, WidgetResult<unknown>>>;
}

export interface ComputeOptions {
  signal?: AbortSignal;
}
