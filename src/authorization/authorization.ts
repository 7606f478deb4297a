import { UserRole } from '../user/user.entity';
import { Actor, TenantResource } from './actor';
import { PermissionAction, ruleFor } from './permissions';

export function isSuperAdmin(actor: Actor | null | undefined): boolean {
  return actor?.role === UserRole.SUPER_ADMIN;
}

export function hasRole(
  actor: Actor | null | undefined,
  roles: UserRole | readonly UserRole[],
): boolean {
  if (!actor) return false;
  return typeof roles === 'string' ? actor.role === roles : roles.includes(actor.role);
}

export function isSameTenant(
  actor: Actor | null | undefined,
  resource: TenantResource | null | undefined,
): boolean {
  if (!actor?.tenantId || !resource?.tenantId) return false;
  return actor.tenantId === resource.tenantId;
}

/**
 * Decides whether `actor` may perform `action` on `resource`.
 * Pure and total: unknown roles, actions or malformed actors yield `false`.
 */
export function can(
  actor: Actor | null | undefined,
  action: PermissionAction,
  resource?: TenantResource | null,
): boolean {
  if (!actor) return false;
  if (actor.role === UserRole.SUPER_ADMIN) return true;
  // every other role is bound to a tenant
  if (!actor.tenantId) return false;

  switch (ruleFor(actor.role, action)) {
    case 'always':
      return true;
    case 'same_tenant':
      return isSameTenant(actor, resource);
    default:
      return false;
  }
}
