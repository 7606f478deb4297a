import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { ProductModule } from '../product/product.module';
import { InventoryController } from './inventory.controller';
import { InventoryService } from './inventory.service';
import { StockIn } from './stock-in.entity';
import { StockOut } from './stock-out.entity';

@Module({
  imports: [TypeOrmModule.forFeature([StockIn, StockOut]), ProductModule, AuditModule],
  providers: [InventoryService],
  controllers: [InventoryController],
  exports: [InventoryService],
})
export class InventoryModule {}
