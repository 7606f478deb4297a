import { Decimal } from 'decimal.js';
import { Column, JoinColumn, ManyToOne } from 'typeorm';
import { AuditableEntity } from '../common/entity/auditable-base.entity';
import { decimalTransformer } from '../common/utils/decimal';
import { Product } from '../product/product.entity';
import { Tenant } from '../tenant/tenant.entity';

export enum MovementType {
  IN = 'stock_in',
  OUT = 'stock_out',
}

/**
 * Columns shared by stock-ins (purchases from farmers) and stock-outs (sales to
 * customers). Rows are written once and never updated; totals are computed at
 * insert time from the price in force then.
 */
export abstract class StockMovement extends AuditableEntity {
  @Column({ type: 'uuid' })
  tenantId!: string;

  @ManyToOne(() => Tenant)
  @JoinColumn({ name: 'tenantId' })
  tenant?: Tenant;

  @Column({ type: 'uuid' })
  productId!: string;

  @ManyToOne(() => Product)
  @JoinColumn({ name: 'productId' })
  product?: Product;

  // business date of the movement, YYYY-MM-DD
  @Column({ type: 'date' })
  date!: string;

  // farmer for stock-ins, customer for stock-outs
  @Column()
  partyName!: string;

  @Column({ nullable: true })
  partyContact?: string | null;

  @Column({ nullable: true })
  vehicleNumber?: string | null;

  @Column({ type: 'int' })
  numOfBags!: number;

  @Column({ type: 'numeric', precision: 10, scale: 2, transformer: decimalTransformer })
  netWeightPerBagKg!: Decimal;

  @Column({ type: 'numeric', precision: 14, scale: 4, transformer: decimalTransformer })
  totalQuintals!: Decimal;

  @Column({ type: 'numeric', precision: 12, scale: 2, transformer: decimalTransformer })
  pricePerQuintal!: Decimal;

  @Column({ type: 'numeric', precision: 20, scale: 6, transformer: decimalTransformer })
  totalPrice!: Decimal;

  @Column({ nullable: true })
  notes?: string | null;
}
