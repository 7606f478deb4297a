import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { DateRange } from '../common/types/date-range';
import { StockIn } from '../inventory/stock-in.entity';
import { StockOut } from '../inventory/stock-out.entity';
import { MovementType, StockMovement } from '../inventory/stock-movement.entity';
import { Product } from '../product/product.entity';
import {
  compareByDateDesc,
  compareNewestFirst,
  DailyQuantityRow,
  DEFAULT_HISTORY_LIMIT,
  MovementHistoryFilters,
  MovementReadStore,
  MovementRow,
  MovementTotalsRow,
  PartyVolumeRow,
  ProductVolumeRow,
  StockBalanceRow,
} from './movement-read.store';
import { TenantScope } from './tenant-scope';

interface RawMovementRow extends Omit<MovementRow, 'type' | 'numOfBags'> {
  numOfBags: number | string;
}

@Injectable()
export class TypeOrmMovementReadStore extends MovementReadStore {
  constructor(
    @InjectRepository(StockIn)
    private readonly stockInRepo: Repository<StockIn>,
    @InjectRepository(StockOut)
    private readonly stockOutRepo: Repository<StockOut>,
    @InjectRepository(Product)
    private readonly productRepo: Repository<Product>,
  ) {
    super();
  }

  private repoFor(type: MovementType): Repository<StockMovement> {
    return type === MovementType.IN ? this.stockInRepo : this.stockOutRepo;
  }

  private inRange(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): SelectQueryBuilder<StockMovement> {
    return this.repoFor(type)
      .createQueryBuilder('m')
      .where('m.tenantId = :tenantId', { tenantId: scope.tenantId })
      .andWhere('m.date >= :start AND m.date < :end', {
        start: range.start,
        end: range.end,
      });
  }

  async stockBalances(scope: TenantScope): Promise<StockBalanceRow[]> {
    const { tenantId } = scope;

    return this.productRepo
      .createQueryBuilder('p')
      .leftJoin(
        (qb) =>
          qb
            .select('si.productId', 'productId')
            .addSelect('SUM(si.totalQuintals)', 'qty')
            .from(StockIn, 'si')
            .where('si.tenantId = :tenantId')
            .groupBy('si.productId'),
        'ins',
        'ins."productId" = p.id',
      )
      .leftJoin(
        (qb) =>
          qb
            .select('so.productId', 'productId')
            .addSelect('SUM(so.totalQuintals)', 'qty')
            .from(StockOut, 'so')
            .where('so.tenantId = :tenantId')
            .groupBy('so.productId'),
        'outs',
        'outs."productId" = p.id',
      )
      .select('p.id', 'productId')
      .addSelect('p.name', 'productName')
      .addSelect('p.sku', 'sku')
      .addSelect('p.unit', 'unit')
      .addSelect('p.pricePerQuintal', 'pricePerQuintal')
      .addSelect('COALESCE(ins.qty, 0)', 'totalIn')
      .addSelect('COALESCE(outs.qty, 0)', 'totalOut')
      .where('p.tenantId = :tenantId', { tenantId })
      .orderBy('p.name', 'ASC')
      .getRawMany<StockBalanceRow>();
  }

  async movementTotals(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<MovementTotalsRow> {
    const raw = await this.inRange(scope, type, range)
      .select('COALESCE(SUM(m.totalQuintals), 0)', 'quantity')
      .addSelect('COALESCE(SUM(m.totalPrice), 0)', 'amount')
      .addSelect('COUNT(m.id)', 'count')
      .getRawOne<{ quantity: string; amount: string; count: string }>();

    return {
      quantity: raw?.quantity ?? '0',
      amount: raw?.amount ?? '0',
      count: Number(raw?.count ?? 0),
    };
  }

  async dailyQuantities(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<DailyQuantityRow[]> {
    return this.inRange(scope, type, range)
      .select("TO_CHAR(m.date, 'YYYY-MM-DD')", 'date')
      .addSelect('SUM(m.totalQuintals)', 'quantity')
      .groupBy('m.date')
      .orderBy('m.date', 'ASC')
      .getRawMany<DailyQuantityRow>();
  }

  async productVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<ProductVolumeRow[]> {
    return this.inRange(scope, type, range)
      .innerJoin('m.product', 'p')
      .select('m.productId', 'productId')
      .addSelect('p.name', 'productName')
      .addSelect('SUM(m.totalQuintals)', 'quantity')
      .addSelect('SUM(m.totalPrice)', 'amount')
      .groupBy('m.productId')
      .addGroupBy('p.name')
      .getRawMany<ProductVolumeRow>();
  }

  async partyVolumes(
    scope: TenantScope,
    type: MovementType,
    range: DateRange,
  ): Promise<PartyVolumeRow[]> {
    const rows = await this.inRange(scope, type, range)
      .select('m.partyName', 'partyName')
      .addSelect('SUM(m.totalQuintals)', 'quantity')
      .addSelect('SUM(m.totalPrice)', 'amount')
      .addSelect('COUNT(m.id)', 'count')
      .groupBy('m.partyName')
      .getRawMany<{ partyName: string; quantity: string; amount: string; count: string }>();

    return rows.map((r) => ({ ...r, count: Number(r.count) }));
  }

  async recentMovements(scope: TenantScope, limit: number): Promise<MovementRow[]> {
    const [ins, outs] = await Promise.all(
      [MovementType.IN, MovementType.OUT].map((type) =>
        this.movementRows(scope, type)
          .orderBy('m.createdAt', 'DESC')
          .addOrderBy('m.id', 'DESC')
          .limit(limit)
          .getRawMany<RawMovementRow>()
          .then((rows) => rows.map((r) => toMovementRow(type, r))),
      ),
    );

    return [...ins, ...outs].sort(compareNewestFirst).slice(0, limit);
  }

  async movementHistory(
    scope: TenantScope,
    filters: MovementHistoryFilters,
  ): Promise<MovementRow[]> {
    const limit = filters.limit ?? DEFAULT_HISTORY_LIMIT;
    const types = filters.type ? [filters.type] : [MovementType.IN, MovementType.OUT];

    const results = await Promise.all(
      types.map((type) => {
        const qb = this.movementRows(scope, type);
        if (filters.dateFrom) {
          qb.andWhere('m.date >= :dateFrom', { dateFrom: filters.dateFrom });
        }
        if (filters.dateTo) {
          qb.andWhere('m.date <= :dateTo', { dateTo: filters.dateTo });
        }
        if (filters.partyName) {
          qb.andWhere('m.partyName ILIKE :partyName', {
            partyName: `%${escapeLike(filters.partyName)}%`,
          });
        }

        return qb
          .orderBy('m.date', 'DESC')
          .addOrderBy('m.createdAt', 'DESC')
          .limit(limit)
          .getRawMany<RawMovementRow>()
          .then((rows) => rows.map((r) => toMovementRow(type, r)));
      }),
    );

    return results.flat().sort(compareByDateDesc).slice(0, limit);
  }

  private movementRows(
    scope: TenantScope,
    type: MovementType,
  ): SelectQueryBuilder<StockMovement> {
    return this.repoFor(type)
      .createQueryBuilder('m')
      .innerJoin('m.product', 'p')
      .select('m.id', 'id')
      .addSelect('m.productId', 'productId')
      .addSelect('p.name', 'productName')
      .addSelect("TO_CHAR(m.date, 'YYYY-MM-DD')", 'date')
      .addSelect('m.partyName', 'partyName')
      .addSelect('m.partyContact', 'partyContact')
      .addSelect('m.vehicleNumber', 'vehicleNumber')
      .addSelect('m.numOfBags', 'numOfBags')
      .addSelect('m.netWeightPerBagKg', 'netWeightPerBagKg')
      .addSelect('m.totalQuintals', 'totalQuintals')
      .addSelect('m.pricePerQuintal', 'pricePerQuintal')
      .addSelect('m.totalPrice', 'totalPrice')
      .addSelect('m.createdAt', 'createdAt')
      .where('m.tenantId = :tenantId', { tenantId: scope.tenantId });
  }
}

function toMovementRow(type: MovementType, raw: RawMovementRow): MovementRow {
  return { ...raw, type, numOfBags: Number(raw.numOfBags) };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}
