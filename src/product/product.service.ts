import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, ILike, Not, Repository } from 'typeorm';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { AuditService } from '../audit/audit.service';
import { PaginatedResponseDto, PaginationMetaDto } from '../common/dto/paginated-response.dto';
import { ProductErrors } from '../common/errors/product.errors';
import { parsePositiveDecimal } from '../common/utils/price';
import { ChangeNotifierService } from '../dashboard/notifications/change-notifier.service';
import { TenantScope } from '../tenancy/tenant-scope';
import { CreateProductDto } from './dto/create-product.dto';
import { ListProductsQueryDto } from './dto/list-products.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { DEFAULT_PRODUCT_CATEGORY, DEFAULT_PRODUCT_UNIT, Product } from './product.entity';

@Injectable()
export class ProductService {
  private readonly logger = new Logger(ProductService.name);

  constructor(
    @InjectRepository(Product)
    private readonly productRepo: Repository<Product>,
    private readonly authorization: AuthorizationService,
    private readonly auditService: AuditService,
    private readonly notifier: ChangeNotifierService,
  ) {}

  private getRepo(manager?: EntityManager): Repository<Product> {
    return manager ? manager.getRepository(Product) : this.productRepo;
  }

  /**
   * Looks the product up inside the scope only: a product of another tenant is
   * indistinguishable from a missing one.
   */
  async getForScopeOrThrow(
    scope: TenantScope,
    productId: string,
    manager?: EntityManager,
  ): Promise<Product> {
    const product = await this.getRepo(manager).findOne({
      where: { id: productId, tenantId: scope.tenantId },
    });
    if (!product) {
      throw new NotFoundException(ProductErrors.PRODUCT_NOT_FOUND);
    }
    return product;
  }

  async findOne(actor: Actor, productId: string, tenantId?: string): Promise<Product> {
    const scope = this.authorization.authorizeScope(actor, tenantId, PermissionAction.VIEW_REPORTS);
    return this.getForScopeOrThrow(scope, productId);
  }

  async findAll(actor: Actor, query: ListProductsQueryDto): Promise<PaginatedResponseDto<Product>> {
    const scope = this.authorization.authorizeScope(
      actor,
      query.tenantId,
      PermissionAction.VIEW_REPORTS,
    );
    const { page, limit } = query;

    const base: FindOptionsWhere<Product> = { tenantId: scope.tenantId };
    if (query.isActive !== undefined) {
      base.isActive = query.isActive;
    }
    const search = query.search?.trim();
    const where = search
      ? [
          { ...base, name: ILike(`%${search}%`) },
          { ...base, sku: ILike(`%${search}%`) },
        ]
      : base;

    const [data, total] = await this.productRepo.findAndCount({
      where,
      order: { name: 'ASC', id: 'ASC' },
      skip: (page - 1) * limit,
      take: limit,
    });

    const totalPages = Math.ceil(total / limit);
    return new PaginatedResponseDto(
      data,
      new PaginationMetaDto({ total, limit, page, totalPages, hasMore: page < totalPages }),
    );
  }

  async create(actor: Actor, dto: CreateProductDto): Promise<Product> {
    const scope = this.authorization.authorizeScope(
      actor,
      dto.tenantId,
      PermissionAction.MANAGE_INVENTORY,
    );
    const price = parsePositiveDecimal(dto.pricePerQuintal, ProductErrors.PRODUCT_INVALID_PRICE);
    const sku = dto.sku.trim();

    const saved = await this.productRepo.manager.transaction(async (manager) => {
      await this.ensureSkuAvailable(scope, sku, undefined, manager);

      const repo = this.getRepo(manager);
      const product = await repo.save(
        repo.create({
          tenantId: scope.tenantId,
          name: dto.name.trim(),
          sku,
          category: dto.category?.trim() || DEFAULT_PRODUCT_CATEGORY,
          unit: dto.unit?.trim() || DEFAULT_PRODUCT_UNIT,
          pricePerQuintal: price,
          description: dto.description ?? null,
          isActive: true,
          createdById: actor.id,
          updatedById: actor.id,
        }),
      );

      await this.auditService.record(
        actor,
        {
          action: 'product.create',
          resourceType: 'product',
          resourceId: product.id,
          tenantId: scope.tenantId,
          changes: {
            name: product.name,
            sku: product.sku,
            category: product.category,
            unit: product.unit,
            pricePerQuintal: price.toFixed(2),
          },
        },
        manager,
      );
      return product;
    });

    this.publishUpdated(scope.tenantId, saved.id);
    return saved;
  }

  async update(
    actor: Actor,
    productId: string,
    dto: UpdateProductDto,
    tenantId?: string,
  ): Promise<Product> {
    const scope = this.authorization.authorizeScope(
      actor,
      tenantId,
      PermissionAction.MANAGE_INVENTORY,
    );

    let changed = false;
    const saved = await this.productRepo.manager.transaction(async (manager) => {
      const product = await this.getForScopeOrThrow(scope, productId, manager);
      const changes: Record<string, { from: unknown; to: unknown }> = {};

      if (dto.name !== undefined && dto.name.trim() !== product.name) {
        changes.name = { from: product.name, to: dto.name.trim() };
        product.name = dto.name.trim();
      }
      if (dto.sku !== undefined && dto.sku.trim() !== product.sku) {
        const sku = dto.sku.trim();
        await this.ensureSkuAvailable(scope, sku, product.id, manager);
        changes.sku = { from: product.sku, to: sku };
        product.sku = sku;
      }
      if (dto.unit !== undefined && dto.unit.trim() !== product.unit) {
        changes.unit = { from: product.unit, to: dto.unit.trim() };
        product.unit = dto.unit.trim();
      }
      if (dto.pricePerQuintal !== undefined) {
        const price = parsePositiveDecimal(dto.pricePerQuintal, ProductErrors.PRODUCT_INVALID_PRICE);
        if (!price.eq(product.pricePerQuintal)) {
          changes.pricePerQuintal = {
            from: product.pricePerQuintal.toFixed(2),
            to: price.toFixed(2),
          };
          product.pricePerQuintal = price;
        }
      }
      if (dto.description !== undefined && dto.description !== product.description) {
        changes.description = { from: product.description ?? null, to: dto.description };
        product.description = dto.description;
      }
      if (dto.isActive !== undefined && dto.isActive !== product.isActive) {
        changes.isActive = { from: product.isActive, to: dto.isActive };
        product.isActive = dto.isActive;
      }

      if (Object.keys(changes).length === 0) {
        return product;
      }

      changed = true;
      product.updatedById = actor.id;
      const updated = await this.getRepo(manager).save(product);
      await this.auditService.record(
        actor,
        {
          action: 'product.update',
          resourceType: 'product',
          resourceId: product.id,
          tenantId: scope.tenantId,
          changes,
        },
        manager,
      );
      return updated;
    });

    if (changed) {
      this.publishUpdated(scope.tenantId, saved.id);
    }
    return saved;
  }

  private async ensureSkuAvailable(
    scope: TenantScope,
    sku: string,
    exceptProductId: string | undefined,
    manager?: EntityManager,
  ): Promise<void> {
    const clash = await this.getRepo(manager).findOne({
      where: {
        tenantId: scope.tenantId,
        sku,
        ...(exceptProductId ? { id: Not(exceptProductId) } : {}),
      },
    });
    if (clash) {
      throw new ConflictException(ProductErrors.PRODUCT_SKU_IN_USE);
    }
  }

  private publishUpdated(tenantId: string, productId: string): void {
    try {
      this.notifier.publish(tenantId, { type: 'product_updated', productId });
    } catch (err) {
      this.logger.error(
        ['publish_failed', `tenant=${tenantId}`, `product=${productId}`].join(' | '),
        err instanceof Error ? err.stack : String(err),
      );
    }
  }
}
