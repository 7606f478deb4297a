import { Decimal } from 'decimal.js';
import { ValueTransformer } from 'typeorm';

export const ZERO = new Decimal(0);

/**
 * Maps `numeric` columns to Decimal. Postgres hands numerics back as strings,
 * so nothing passes through a binary float on the way in or out.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: Decimal.Value | null | undefined): string | null | undefined =>
    value === null || value === undefined ? value : new Decimal(value).toFixed(),
  from: (value: string | null): Decimal | null =>
    value === null ? null : new Decimal(value),
};

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}
