import { TenantMismatchException } from '../common/exceptions/access-denied.exception';
import { UserRole } from '../user/user.entity';
import { TenantScope } from './tenant-scope';

const TENANT_A = 'tenant-a';
const TENANT_B = 'tenant-b';

describe('TenantScope', () => {
  it('defaults a tenant-bound actor to the own tenant', () => {
    const scope = TenantScope.resolve({ id: 'u1', role: UserRole.OPERATOR, tenantId: TENANT_A });
    expect(scope.tenantId).toBe(TENANT_A);
  });

  it('accepts the own tenant when named explicitly', () => {
    const scope = TenantScope.resolve(
      { id: 'u1', role: UserRole.VIEWER, tenantId: TENANT_A },
      TENANT_A,
    );
    expect(scope.tenantId).toBe(TENANT_A);
  });

  it('rejects another tenant for non super admins', () => {
    expect(() =>
      TenantScope.resolve({ id: 'u1', role: UserRole.COMPANY_ADMIN, tenantId: TENANT_A }, TENANT_B),
    ).toThrow(TenantMismatchException);
  });

  it('rejects a tenant-bound role that has no tenant', () => {
    expect(() =>
      TenantScope.resolve({ id: 'u1', role: UserRole.OPERATOR, tenantId: null }),
    ).toThrow(TenantMismatchException);
  });

  it('requires super admins to name a tenant', () => {
    const admin = { id: 'root', role: UserRole.SUPER_ADMIN, tenantId: null };
    expect(() => TenantScope.resolve(admin)).toThrow(TenantMismatchException);
    expect(() => TenantScope.resolve(admin, '')).toThrow(TenantMismatchException);
    expect(TenantScope.resolve(admin, TENANT_B).tenantId).toBe(TENANT_B);
  });
});
