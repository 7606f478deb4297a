export const InventoryErrors = {
  INVALID_BAG_COUNT: {
    code: 'INVENTORY_INVALID_BAG_COUNT',
    message: 'Number of bags must be a positive whole number.',
  },
  INVALID_BAG_WEIGHT: {
    code: 'INVENTORY_INVALID_BAG_WEIGHT',
    message: 'Net weight per bag must be greater than 0, with at most 2 decimals.',
  },
  INVALID_PRICE: {
    code: 'INVENTORY_INVALID_PRICE',
    message: 'Price per quintal must be greater than 0, with at most 2 decimals.',
  },
  INVALID_DATE: {
    code: 'INVENTORY_INVALID_DATE',
    message: 'Movement date must be a valid YYYY-MM-DD date.',
  },
  MOVEMENT_NOT_FOUND: {
    code: 'INVENTORY_MOVEMENT_NOT_FOUND',
    message: 'Stock movement not found.',
  },
  DATE_IN_FUTURE: {
    code: 'INVENTORY_DATE_IN_FUTURE',
    message: 'Movement date cannot be in the future.',
  },
};
