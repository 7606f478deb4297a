import { Actor } from '../authorization/actor';
import { TenantMismatchException } from '../common/exceptions/access-denied.exception';
import { UserRole } from '../user/user.entity';

/**
 * Proof that an actor may read one tenant's data. Only {@link TenantScope.resolve}
 * creates one, and every read-store method demands one, so no aggregate query can
 * run without having passed the tenant check.
 */
export class TenantScope {
  private constructor(readonly tenantId: string) {}

  static resolve(actor: Actor, requestedTenantId?: string | null): TenantScope {
    return new TenantScope(TenantScope.targetTenantId(actor, requestedTenantId));
  }

  /**
   * The tenant an operation should run against. Tenant-bound actors default to
   * their own tenant; super admins must always name one.
   */
  static targetTenantId(actor: Actor, requestedTenantId?: string | null): string {
    if (actor.role === UserRole.SUPER_ADMIN) {
      if (!requestedTenantId) {
        throw new TenantMismatchException();
      }
      return requestedTenantId;
    }

    if (!actor.tenantId) {
      throw new TenantMismatchException();
    }
    if (requestedTenantId && requestedTenantId !== actor.tenantId) {
      throw new TenantMismatchException();
    }
    return actor.tenantId;
  }
}
