import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { AuditService } from '../audit/audit.service';
import { TenantErrors } from '../common/errors/tenant.errors';
import { SLUG_PATTERN, slugify } from '../common/utils/slugify';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { UpdateTenantSettingsDto } from './dto/update-tenant-settings.dto';
import { Tenant, TenantSettings } from './tenant.entity';
import { TenantSettingsSource } from './tenant-settings.source';

export const DEFAULT_TENANT_SETTINGS: Readonly<TenantSettings> = {
  default_unit: 'kg',
  timezone: 'UTC',
  date_format: 'YYYY-MM-DD',
};

const SETTING_KEYS = ['default_unit', 'timezone', 'date_format', 'lowStockThreshold'] as const;

@Injectable()
export class TenantsService extends TenantSettingsSource {
  private readonly logger = new Logger(TenantsService.name);

  constructor(
    @InjectRepository(Tenant)
    private readonly tenantRepo: Repository<Tenant>,
    private readonly dataSource: DataSource,
    private readonly authorization: AuthorizationService,
    private readonly auditService: AuditService,
  ) {
    super();
  }

  private getRepo(manager?: EntityManager): Repository<Tenant> {
    return manager ? manager.getRepository(Tenant) : this.tenantRepo;
  }

  findById(id: string, manager?: EntityManager): Promise<Tenant | null> {
    return this.getRepo(manager).findOne({ where: { id } });
  }

  async getOrThrow(id: string, manager?: EntityManager): Promise<Tenant> {
    const tenant = await this.findById(id, manager);
    if (!tenant) {
      throw new NotFoundException(TenantErrors.TENANT_NOT_FOUND);
    }
    return tenant;
  }

  async requireTenant(tenantId: string): Promise<void> {
    await this.getOrThrow(tenantId);
  }

  /** Stored settings over the defaults. Internal read; callers authorize. */
  async settingsFor(tenantId: string): Promise<TenantSettings> {
    const tenant = await this.getOrThrow(tenantId);
    return { ...DEFAULT_TENANT_SETTINGS, ...tenant.settings };
  }

  async create(actor: Actor, dto: CreateTenantDto): Promise<Tenant> {
    this.authorization.authorize(actor, PermissionAction.MANAGE_TENANTS);

    const slug = dto.slug?.trim() || slugify(dto.name);
    if (!SLUG_PATTERN.test(slug)) {
      throw new BadRequestException(TenantErrors.TENANT_INVALID_SLUG);
    }

    const tenant = await this.dataSource.transaction(async (manager) => {
      const repo = this.getRepo(manager);
      if (await repo.exists({ where: { slug } })) {
        throw new ConflictException(TenantErrors.TENANT_SLUG_IN_USE);
      }

      const saved = await repo.save(
        repo.create({
          name: dto.name.trim(),
          slug,
          contactEmail: dto.contactEmail,
          contactPhone: dto.contactPhone,
          isActive: true,
          settings: {},
          createdById: actor.id,
          updatedById: actor.id,
        }),
      );
      await this.auditService.record(
        actor,
        {
          action: 'tenant.create',
          resourceType: 'tenant',
          resourceId: saved.id,
          tenantId: saved.id,
          changes: { name: saved.name, slug },
        },
        manager,
      );
      return saved;
    });

    this.logger.log(['tenant_created', `tenant=${tenant.id}`, `slug=${slug}`].join(' | '));
    return tenant;
  }

  /** Tenants are deactivated, never deleted; their users are refused at sign-in. */
  async setActive(actor: Actor, tenantId: string, isActive: boolean): Promise<Tenant> {
    this.authorization.authorize(actor, PermissionAction.MANAGE_TENANTS, { tenantId });

    return this.dataSource.transaction(async (manager) => {
      const tenant = await this.getOrThrow(tenantId, manager);
      if (tenant.isActive === isActive) {
        return tenant;
      }

      tenant.isActive = isActive;
      tenant.updatedById = actor.id;
      const saved = await this.getRepo(manager).save(tenant);
      await this.auditService.record(
        actor,
        {
          action: isActive ? 'tenant.activate' : 'tenant.deactivate',
          resourceType: 'tenant',
          resourceId: tenantId,
          tenantId,
          changes: { isActive },
        },
        manager,
      );
      return saved;
    });
  }

  async getSettings(actor: Actor, tenantId?: string): Promise<TenantSettings> {
    const scope = this.authorization.authorizeScope(actor, tenantId, PermissionAction.VIEW_REPORTS);
    return this.settingsFor(scope.tenantId);
  }

  async updateSettings(actor: Actor, dto: UpdateTenantSettingsDto): Promise<TenantSettings> {
    const scope = this.authorization.authorizeScope(
      actor,
      dto.tenantId,
      PermissionAction.MANAGE_TENANT_SETTINGS,
    );

    return this.dataSource.transaction(async (manager) => {
      const tenant = await this.getOrThrow(scope.tenantId, manager);
      const next: TenantSettings = { ...tenant.settings };
      const changes: Record<string, { from: unknown; to: unknown }> = {};

      for (const key of SETTING_KEYS) {
        const value = dto[key];
        if (value === undefined || value === next[key]) continue;
        changes[key] = { from: next[key] ?? null, to: value };
        Object.assign(next, { [key]: value });
      }

      if (Object.keys(changes).length > 0) {
        tenant.settings = next;
        tenant.updatedById = actor.id;
        await this.getRepo(manager).save(tenant);
        await this.auditService.record(
          actor,
          {
            action: 'tenant.settings.update',
            resourceType: 'tenant',
            resourceId: tenant.id,
            tenantId: tenant.id,
            changes,
          },
          manager,
        );
      }
      return { ...DEFAULT_TENANT_SETTINGS, ...next };
    });
  }
}
