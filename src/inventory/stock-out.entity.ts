import { Entity, Index } from 'typeorm';
import { StockMovement } from './stock-movement.entity';

@Entity({ name: 'stock_outs' })
@Index('idx_stock_outs_tenant_date', ['tenantId', 'date'])
@Index('idx_stock_outs_tenant_party', ['tenantId', 'partyName'])
@Index('idx_stock_outs_tenant_product', ['tenantId', 'productId'])
export class StockOut extends StockMovement {}
