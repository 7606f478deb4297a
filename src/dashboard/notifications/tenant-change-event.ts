import { MovementType } from '../../inventory/stock-movement.entity';

export type TenantChange =
  | {
      type: 'transaction_created';
      movementType: MovementType;
      movementId: string;
      productId: string;
      date: string;
    }
  | {
      type: 'product_updated';
      productId: string;
    };

export type TenantChangeEvent = TenantChange & {
  tenantId: string;
  publishedAt: string;
};
