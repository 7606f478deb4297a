import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource, EntityTarget, Repository } from 'typeorm';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { AuditService } from '../audit/audit.service';
import { Clock } from '../common/clock/clock';
import { InventoryErrors } from '../common/errors/inventory.errors';
import { formatIsoDate, parseIsoDate } from '../common/utils/iso-date';
import { ChangeNotifierService } from '../dashboard/notifications/change-notifier.service';
import { ProductService } from '../product/product.service';
import { CreateStockMovementDto } from './dto/create-stock-movement.dto';
import { calculateMovementTotals } from './movement-totals';
import { StockIn } from './stock-in.entity';
import { MovementType, StockMovement } from './stock-movement.entity';
import { StockOut } from './stock-out.entity';

const TARGETS: Record<MovementType, EntityTarget<StockMovement>> = {
  [MovementType.IN]: StockIn,
  [MovementType.OUT]: StockOut,
};

/**
 * Records stock-ins and stock-outs. Totals are derived once, in the same
 * transaction as the insert and its audit entry; the change event goes out
 * only after commit.
 */
@Injectable()
export class InventoryService {
  private readonly logger = new Logger(InventoryService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly authorization: AuthorizationService,
    private readonly productService: ProductService,
    private readonly auditService: AuditService,
    private readonly notifier: ChangeNotifierService,
    private readonly clock: Clock,
  ) {}

  recordStockIn(actor: Actor, dto: CreateStockMovementDto): Promise<StockMovement> {
    return this.record(MovementType.IN, actor, dto);
  }

  recordStockOut(actor: Actor, dto: CreateStockMovementDto): Promise<StockMovement> {
    return this.record(MovementType.OUT, actor, dto);
  }

  async findMovement(
    actor: Actor,
    type: MovementType,
    id: string,
    tenantId?: string,
  ): Promise<StockMovement> {
    const scope = this.authorization.authorizeScope(actor, tenantId, PermissionAction.VIEW_REPORTS);
    const movement = await this.repoFor(type).findOne({
      where: { id, tenantId: scope.tenantId },
      relations: { product: true },
    });
    if (!movement) {
      throw new NotFoundException(InventoryErrors.MOVEMENT_NOT_FOUND);
    }
    return movement;
  }

  private repoFor(type: MovementType): Repository<StockMovement> {
    return this.dataSource.getRepository(TARGETS[type]);
  }

  private assertBusinessDate(date: string): void {
    if (!parseIsoDate(date)) {
      throw new BadRequestException(InventoryErrors.INVALID_DATE);
    }
    // ISO dates compare correctly as strings
    if (date > formatIsoDate(this.clock.now())) {
      throw new BadRequestException(InventoryErrors.DATE_IN_FUTURE);
    }
  }

  private async record(
    type: MovementType,
    actor: Actor,
    dto: CreateStockMovementDto,
  ): Promise<StockMovement> {
    const scope = this.authorization.authorizeScope(
      actor,
      dto.tenantId,
      PermissionAction.MANAGE_INVENTORY,
    );
    this.assertBusinessDate(dto.date);

    const saved = await this.dataSource.transaction(async (manager) => {
      const product = await this.productService.getForScopeOrThrow(scope, dto.productId, manager);
      const totals = calculateMovementTotals({
        numOfBags: dto.numOfBags,
        netWeightPerBagKg: dto.netWeightPerBagKg,
        pricePerQuintal: dto.pricePerQuintal ?? product.pricePerQuintal,
      });

      const repo = manager.getRepository(TARGETS[type]);
      const movement = await repo.save(
        repo.create({
          tenantId: scope.tenantId,
          productId: product.id,
          date: dto.date,
          partyName: dto.partyName.trim(),
          partyContact: dto.partyContact ?? null,
          vehicleNumber: dto.vehicleNumber ?? null,
          notes: dto.notes ?? null,
          ...totals,
          createdById: actor.id,
          updatedById: actor.id,
        }),
      );

      await this.auditService.record(
        actor,
        {
          action: `${type}.create`,
          resourceType: type,
          resourceId: movement.id,
          tenantId: scope.tenantId,
          changes: {
            productId: product.id,
            date: movement.date,
            partyName: movement.partyName,
            numOfBags: totals.numOfBags,
            totalQuintals: totals.totalQuintals.toFixed(4),
            pricePerQuintal: totals.pricePerQuintal.toFixed(2),
            totalPrice: totals.totalPrice.toFixed(6),
          },
        },
        manager,
      );
      return movement;
    });

    this.logger.log(
      [
        'movement_recorded',
        `type=${type}`,
        `tenant=${scope.tenantId}`,
        `id=${saved.id}`,
        `quintals=${saved.totalQuintals.toFixed(4)}`,
      ].join(' | '),
    );
    this.publishCreated(type, saved);
    return saved;
  }

  private publishCreated(type: MovementType, movement: StockMovement): void {
    try {
      this.notifier.publish(movement.tenantId, {
        type: 'transaction_created',
        movementType: type,
        movementId: movement.id,
        productId: movement.productId,
        date: movement.date,
      });
    } catch (err) {
      this.logger.error(
        ['publish_failed', `tenant=${movement.tenantId}`, `movement=${movement.id}`].join(' | '),
        err instanceof Error ? err.stack : String(err),
      );
    }
  }
}
