import { Entity, Index } from 'typeorm';
import { StockMovement } from './stock-movement.entity';

@Entity({ name: 'stock_ins' })
@Index('idx_stock_ins_tenant_date', ['tenantId', 'date'])
@Index('idx_stock_ins_tenant_party', ['tenantId', 'partyName'])
@Index('idx_stock_ins_tenant_product', ['tenantId', 'productId'])
export class StockIn extends StockMovement {}
