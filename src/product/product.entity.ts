import { Decimal } from 'decimal.js';
import { Column, Entity, Index, JoinColumn, ManyToOne, Unique } from 'typeorm';
import { Tenant } from '../tenant/tenant.entity';
import { AuditableEntity } from '../common/entity/auditable-base.entity';
import { decimalTransformer } from '../common/utils/decimal';

export const DEFAULT_PRODUCT_CATEGORY = 'Paddy';
export const DEFAULT_PRODUCT_UNIT = 'quintal';

@Entity({ name: 'products' })
@Unique('uq_products_tenant_sku', ['tenantId', 'sku'])
@Index('idx_products_tenant', ['tenantId'])
export class Product extends AuditableEntity {
  @Column({ type: 'uuid' })
  tenantId!: string;

  @ManyToOne(() => Tenant)
  @JoinColumn({ name: 'tenantId' })
  tenant?: Tenant;

  @Column()
  name!: string;

  @Column()
  sku!: string;

  // set on create, never changed afterwards
  @Column({ default: DEFAULT_PRODUCT_CATEGORY })
  category!: string;

  @Column({ default: DEFAULT_PRODUCT_UNIT })
  unit!: string;

  // current price; movements keep the price they were recorded at
  @Column({ type: 'numeric', precision: 12, scale: 2, transformer: decimalTransformer })
  pricePerQuintal!: Decimal;

  @Column({ nullable: true })
  description?: string | null;

  @Column({ default: true })
  isActive!: boolean;
}
