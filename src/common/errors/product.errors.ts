export const ProductErrors = {
  PRODUCT_NOT_FOUND: {
    code: 'PRODUCT_NOT_FOUND',
    message: 'Product not found.',
  },
  PRODUCT_SKU_IN_USE: {
    code: 'PRODUCT_SKU_IN_USE',
    message: 'Another product of this tenant already uses this SKU.',
  },
  PRODUCT_INVALID_PRICE: {
    code: 'PRODUCT_INVALID_PRICE',
    message: 'Price per quintal must be greater than 0.',
  },
};
