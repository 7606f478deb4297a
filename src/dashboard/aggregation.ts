import { Decimal } from 'decimal.js';
import { ComputationException } from '../common/exceptions/report.exceptions';
import { PercentChange, RankedEntity, StockStatus } from './dashboard.types';

const HUNDRED = new Decimal(100);
const ZERO = new Decimal(0);

/**
 * Parses a numeric aggregate from the store. Missing values count as zero;
 * anything unparsable, infinite or negative is a computation error.
 */
export function parseAggregate(metric: string, raw: string | number | null | undefined): Decimal {
  if (raw === null || raw === undefined || raw === '') {
    return ZERO;
  }

  let value: Decimal;
  try {
    value = new Decimal(raw);
  } catch {
    throw new ComputationException(metric, `not a number: ${String(raw)}`);
  }

  if (!value.isFinite()) {
    throw new ComputationException(metric, `not a number: ${String(raw)}`);
  }
  if (value.isNegative() && !value.isZero()) {
    throw new ComputationException(metric, `negative aggregate: ${value.toFixed()}`);
  }
  return value;
}

export function percentageChange(current: Decimal, previous: Decimal): PercentChange {
  if (previous.isZero()) {
    return current.isZero()
      ? { value: ZERO, baseline: 'both_zero' }
      : { value: HUNDRED, baseline: 'none' };
  }
  return {
    value: current.minus(previous).div(previous).times(HUNDRED).toDecimalPlaces(2),
    baseline: 'previous',
  };
}

export function percentageOf(part: Decimal, total: Decimal): Decimal {
  return total.isZero() ? ZERO : part.div(total).times(HUNDRED).toDecimalPlaces(2);
}

export interface RankCandidate {
  id: string;
  name: string;
  quantity: Decimal;
  amount: Decimal;
  count?: number;
}

/**
 * Top `n` by quantity, then amount, both descending, then id. Percentages are
 * shares of the returned rows only.
 */
export function rankEntities(
  candidates: RankCandidate[],
  n: number,
): { total: Decimal; entries: RankedEntity[] } {
  const top = [...candidates]
    .sort(
      (a, b) =>
        b.quantity.comparedTo(a.quantity) ||
        b.amount.comparedTo(a.amount) ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    )
    .slice(0, Math.max(0, n));

  const total = top.reduce((acc, row) => acc.plus(row.quantity), ZERO);

  return {
    total,
    entries: top.map((row) => ({
      id: row.id,
      name: row.name,
      quantity: row.quantity,
      totalAmount: row.amount,
      percentage: percentageOf(row.quantity, total),
      ...(row.count !== undefined
        ? {
            transactionCount: row.count,
            averageTransactionSize:
              row.count > 0 ? row.quantity.div(row.count).toDecimalPlaces(2) : ZERO,
          }
        : {}),
    })),
  };
}

/** Aligns sparse daily rows onto `days`, with zero for days without movements. */
export function zeroFillSeries(
  days: string[],
  rows: { date: string; quantity: Decimal }[],
): Decimal[] {
  const byDay = new Map(rows.map((row) => [row.date, row.quantity]));
  return days.map((day) => byDay.get(day) ?? ZERO);
}

export function classifyStock(available: Decimal, threshold: number): StockStatus {
  if (available.lte(0)) return StockStatus.OUT_OF_STOCK;
  if (available.lt(threshold)) return StockStatus.LOW_STOCK;
  return StockStatus.IN_STOCK;
}
