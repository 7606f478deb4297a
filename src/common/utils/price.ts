import { BadRequestException } from '@nestjs/common';
import { Decimal } from 'decimal.js';

/** Parses a strictly positive decimal, throwing `BadRequestException(error)` otherwise. */
export function parsePositiveDecimal(
  value: Decimal.Value,
  error: { code: string; message: string },
): Decimal {
  let parsed: Decimal;
  try {
    parsed = new Decimal(value);
  } catch {
    throw new BadRequestException(error);
  }
  if (!parsed.isFinite() || parsed.lte(0)) {
    throw new BadRequestException(error);
  }
  return parsed;
}
