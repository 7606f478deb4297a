import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { TenantErrors } from '../common/errors/tenant.errors';
import {
  TenantMismatchException,
  UnauthorizedActionException,
} from '../common/exceptions/access-denied.exception';
import { UserRole } from '../user/user.entity';
import { Tenant } from './tenant.entity';
import { TenantsService } from './tenant.service';

const TENANT_A = 'aaaaaaaa-0000-4000-8000-000000000001';
const TENANT_B = 'bbbbbbbb-0000-4000-8000-000000000002';

const root: Actor = { id: 'root', role: UserRole.SUPER_ADMIN, tenantId: null };
const admin: Actor = { id: 'admin-a', role: UserRole.COMPANY_ADMIN, tenantId: TENANT_A };
const operator: Actor = { id: 'operator-a', role: UserRole.OPERATOR, tenantId: TENANT_A };

function fakeTenantRepo(seed: Tenant[]) {
  const rows = new Map(seed.map((t) => [t.id, t]));
  let nextId = 1;
  return {
    rows,
    findOne: jest.fn(async ({ where }: { where: { id: string } }) => rows.get(where.id) ?? null),
    exists: jest.fn(async ({ where }: { where: { slug: string } }) =>
      [...rows.values()].some((t) => t.slug === where.slug),
    ),
    create: jest.fn((data: Partial<Tenant>) => ({ ...data })),
    save: jest.fn(async (tenant: Partial<Tenant>) => {
      const saved = { ...tenant, id: tenant.id ?? `tenant-${nextId++}` } as Tenant;
      rows.set(saved.id, saved);
      return saved;
    }),
  };
}

describe('TenantsService', () => {
  let repo: ReturnType<typeof fakeTenantRepo>;
  let auditService: { record: jest.Mock };
  let service: TenantsService;

  beforeEach(() => {
    repo = fakeTenantRepo([
      { id: TENANT_A, name: 'Mill A', slug: 'mill-a', isActive: true, settings: { timezone: 'Asia/Kolkata' } } as Tenant,
      { id: TENANT_B, name: 'Mill B', slug: 'mill-b', isActive: true, settings: {} } as Tenant,
    ]);
    auditService = { record: jest.fn(async () => ({})) };
    const manager = { getRepository: jest.fn(() => repo) };
    const dataSource = { transaction: jest.fn((work: (m: unknown) => unknown) => work(manager)) };

    service = new TenantsService(
      repo as any,
      dataSource as any,
      new AuthorizationService(),
      auditService as any,
    );
  });

  describe('create', () => {
    it('derives the slug from the name and audits the creation', async () => {
      const tenant = await service.create(root, { name: ' Sri Lakshmi Rice Mill ' });

      expect(tenant.slug).toBe('sri-lakshmi-rice-mill');
      expect(tenant.name).toBe('Sri Lakshmi Rice Mill');
      expect(tenant.isActive).toBe(true);
      expect(auditService.record).toHaveBeenCalledWith(
        root,
        expect.objectContaining({ action: 'tenant.create', resourceId: tenant.id, tenantId: tenant.id }),
        expect.anything(),
      );
    });

    it('rejects malformed and taken slugs', async () => {
      const invalid = service.create(root, { name: 'Mill', slug: 'Mill_One' });
      await expect(invalid).rejects.toBeInstanceOf(BadRequestException);

      await expect(service.create(root, { name: 'Mill', slug: 'mill-a' })).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('is reserved to super admins', async () => {
      await expect(service.create(admin, { name: 'Another Mill' })).rejects.toBeInstanceOf(
        UnauthorizedActionException,
      );
    });
  });

  describe('setActive', () => {
    it('deactivates without deleting and audits once', async () => {
      const tenant = await service.setActive(root, TENANT_B, false);
      expect(tenant.isActive).toBe(false);
      expect(repo.rows.has(TENANT_B)).toBe(true);

      await service.setActive(root, TENANT_B, false);
      expect(auditService.record).toHaveBeenCalledTimes(1);
      expect(auditService.record.mock.calls[0][1].action).toBe('tenant.deactivate');
    });

    it('raises not found for an unknown tenant', async () => {
      await expect(service.setActive(root, 'missing', true)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('settings', () => {
    it('fills defaults under stored values', async () => {
      await expect(service.getSettings(operator)).resolves.toEqual({
        default_unit: 'kg',
        timezone: 'Asia/Kolkata',
        date_format: 'YYYY-MM-DD',
      });
    });

    it('lets a company admin update their own tenant and audits the diff', async () => {
      const settings = await service.updateSettings(admin, {
        lowStockThreshold: 25,
        timezone: 'Asia/Kolkata',
      });

      expect(settings.lowStockThreshold).toBe(25);
      expect(repo.rows.get(TENANT_A)?.settings).toEqual({
        timezone: 'Asia/Kolkata',
        lowStockThreshold: 25,
      });
      expect(auditService.record.mock.calls[0][1].changes).toEqual({
        lowStockThreshold: { from: null, to: 25 },
      });
    });

    it('skips the write when nothing changes', async () => {
      await service.updateSettings(admin, { timezone: 'Asia/Kolkata' });
      expect(repo.save).not.toHaveBeenCalled();
      expect(auditService.record).not.toHaveBeenCalled();
    });

    it('refuses operators and other tenants', async () => {
      await expect(service.updateSettings(operator, { timezone: 'UTC' })).rejects.toBeInstanceOf(
        UnauthorizedActionException,
      );
      await expect(
        service.updateSettings(admin, { tenantId: TENANT_B, timezone: 'UTC' }),
      ).rejects.toBeInstanceOf(TenantMismatchException);
    });

    it('exposes merged settings to other modules', async () => {
      await expect(service.settingsFor(TENANT_B)).resolves.toEqual({
        default_unit: 'kg',
        timezone: 'UTC',
        date_format: 'YYYY-MM-DD',
      });
      const err = await service.settingsFor('missing').catch((e: NotFoundException) => e);
      expect(err).toBeInstanceOf(NotFoundException);
      expect((err as NotFoundException).getResponse()).toEqual(TenantErrors.TENANT_NOT_FOUND);
    });

    it('confirms a tenant exists or raises not found', async () => {
      await expect(service.requireTenant(TENANT_B)).resolves.toBeUndefined();
      await expect(service.requireTenant('missing')).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
