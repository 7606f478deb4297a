import { Injectable } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { Actor } from '../authorization/actor';
import { isSuperAdmin } from '../authorization/authorization';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { InvalidPeriodException } from '../common/exceptions/report.exceptions';
import { parseIsoDate } from '../common/utils/iso-date';
import { parseAggregate } from '../dashboard/aggregation';
import { DashboardService } from '../dashboard/dashboard.service';
import { ComputeOptions, StockLevel } from '../dashboard/dashboard.types';
import { MovementType } from '../inventory/stock-movement.entity';
import {
  DEFAULT_HISTORY_LIMIT,
  MovementReadStore,
  MovementRow,
} from '../tenancy/movement-read.store';
import { ScopedReader } from '../tenancy/scoped-reader.service';
import { TenantSettingsSource } from '../tenant/tenant-settings.source';
import { MovementHistoryQueryDto } from './dto/movement-history-query.dto';

export interface MovementHistoryEntry {
  id: string;
  type: MovementType;
  date: string;
  productId: string;
  productName: string;
  partyName: string;
  partyContact: string | null;
  vehicleNumber: string | null;
  numOfBags: number;
  netWeightPerBagKg: Decimal;
  totalQuintals: Decimal;
  // null for actors without financial access
  pricePerQuintal: Decimal | null;
  totalPrice: Decimal | null;
  createdAt: Date;
}

/**
 * Tabular reports. History is read live, never cached: filters are open ended
 * and the rows are the audit trail operators reconcile against.
 */
@Injectable()
export class ReportsService {
  constructor(
    private readonly authorization: AuthorizationService,
    private readonly store: MovementReadStore,
    private readonly reader: ScopedReader,
    private readonly dashboard: DashboardService,
    private readonly tenants: TenantSettingsSource,
  ) {}

  getStockLevels(actor: Actor, tenantId?: string, options: ComputeOptions = {}): Promise<StockLevel[]> {
    return this.dashboard.getStockLevels(tenantId, actor, options);
  }

  async getMovementHistory(
    actor: Actor,
    query: MovementHistoryQueryDto,
    options: ComputeOptions = {},
  ): Promise<MovementHistoryEntry[]> {
    const scope = this.authorization.authorizeScope(
      actor,
      query.tenantId,
      PermissionAction.VIEW_REPORTS,
    );
    if (isSuperAdmin(actor)) {
      await this.tenants.requireTenant(scope.tenantId);
    }
    for (const value of [query.dateFrom, query.dateTo]) {
      if (value !== undefined && !parseIsoDate(value)) {
        throw new InvalidPeriodException(`invalid date: ${value}`);
      }
    }
    if (query.dateFrom && query.dateTo && query.dateFrom > query.dateTo) {
      throw new InvalidPeriodException('dateFrom is after dateTo');
    }

    const partyName = query.partyName?.trim();
    const rows = await this.reader.read(
      scope,
      'movement_history',
      () =>
        this.store.movementHistory(scope, {
          type: query.type,
          dateFrom: query.dateFrom,
          dateTo: query.dateTo,
          partyName: partyName || undefined,
          limit: query.limit ?? DEFAULT_HISTORY_LIMIT,
        }),
      options.signal,
    );
    options.signal?.throwIfAborted();

    const financials = this.authorization.can(actor, PermissionAction.VIEW_FINANCIALS, {
      tenantId: scope.tenantId,
    });
    return rows.map((row) => toHistoryEntry(row, financials));
  }
}

function toHistoryEntry(row: MovementRow, financials: boolean): MovementHistoryEntry {
  return {
    id: row.id,
    type: row.type,
    date: row.date,
    productId: row.productId,
    productName: row.productName,
    partyName: row.partyName,
    partyContact: row.partyContact,
    vehicleNumber: row.vehicleNumber,
    numOfBags: row.numOfBags,
    netWeightPerBagKg: parseAggregate('net_weight_per_bag_kg', row.netWeightPerBagKg),
    totalQuintals: parseAggregate('total_quintals', row.totalQuintals),
    pricePerQuintal: financials ? parseAggregate('price_per_quintal', row.pricePerQuintal) : null,
    totalPrice: financials ? parseAggregate('total_price', row.totalPrice) : null,
    createdAt: row.createdAt,
  };
}
