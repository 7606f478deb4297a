import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StockIn } from '../inventory/stock-in.entity';
import { StockOut } from '../inventory/stock-out.entity';
import { Product } from '../product/product.entity';
import { MovementReadStore } from './movement-read.store';
import { ScopedReader } from './scoped-reader.service';
import { TypeOrmMovementReadStore } from './typeorm-movement-read.store';

@Module({
  imports: [TypeOrmModule.forFeature([StockIn, StockOut, Product])],
  providers: [
    ScopedReader,
    { provide: MovementReadStore, useClass: TypeOrmMovementReadStore },
  ],
  exports: [ScopedReader, MovementReadStore],
})
export class TenancyModule {}
