import { BadRequestException } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { InventoryErrors } from '../common/errors/inventory.errors';
import { parsePositiveDecimal } from '../common/utils/price';

export const KG_PER_QUINTAL = 100;

// scale of the stored weight and price columns
const INPUT_SCALE = 2;

export interface MovementMeasures {
  numOfBags: number;
  netWeightPerBagKg: Decimal.Value;
  pricePerQuintal: Decimal.Value;
}

export interface MovementTotals {
  numOfBags: number;
  netWeightPerBagKg: Decimal;
  pricePerQuintal: Decimal;
  // bags × kg per bag / 100; at most 4 decimals for a 2-decimal bag weight
  totalQuintals: Decimal;
  // quintals × price; at most 6 decimals
  totalPrice: Decimal;
}

/** Validates the measured inputs of a movement and derives its stored totals. */
export function calculateMovementTotals(input: MovementMeasures): MovementTotals {
  if (!Number.isInteger(input.numOfBags) || input.numOfBags <= 0) {
    throw new BadRequestException(InventoryErrors.INVALID_BAG_COUNT);
  }
  const netWeightPerBagKg = parsePositiveDecimal(
    input.netWeightPerBagKg,
    InventoryErrors.INVALID_BAG_WEIGHT,
  );
  const pricePerQuintal = parsePositiveDecimal(input.pricePerQuintal, InventoryErrors.INVALID_PRICE);
  if (netWeightPerBagKg.decimalPlaces() > INPUT_SCALE) {
    throw new BadRequestException(InventoryErrors.INVALID_BAG_WEIGHT);
  }
  if (pricePerQuintal.decimalPlaces() > INPUT_SCALE) {
    throw new BadRequestException(InventoryErrors.INVALID_PRICE);
  }

  const totalQuintals = netWeightPerBagKg.times(input.numOfBags).div(KG_PER_QUINTAL);

  return {
    numOfBags: input.numOfBags,
    netWeightPerBagKg,
    pricePerQuintal,
    totalQuintals,
    totalPrice: totalQuintals.times(pricePerQuintal),
  };
}
