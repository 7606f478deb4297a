import { UserRole } from '../user/user.entity';

export enum PermissionAction {
  MANAGE_USERS = 'manage_users',
  VIEW_AUDIT_LOGS = 'view_audit_logs',
  MANAGE_INVENTORY = 'manage_inventory',
  VIEW_REPORTS = 'view_reports',
  // purchases, sales, margin, prices and stock value
  VIEW_FINANCIALS = 'view_financials',
  MANAGE_TENANT_SETTINGS = 'manage_tenant_settings',
  // provisioning / (de)activating tenants
  MANAGE_TENANTS = 'manage_tenants',
}

/**
 * - `always`: granted inside the actor's own tenant; the data layer enforces the scope
 * - `same_tenant`: granted only when the resource carries the actor's tenant id
 * - `never`: denied
 */
export type PermissionRule = 'always' | 'same_tenant' | 'never';

/**
 * The complete role × action matrix. Super admins are allowed everything before
 * this table is consulted; their row is listed so the matrix reads complete.
 */
export const PERMISSION_TABLE: Readonly<
  Record<UserRole, Readonly<Record<PermissionAction, PermissionRule>>>
> = {
  [UserRole.SUPER_ADMIN]: {
    [PermissionAction.MANAGE_USERS]: 'always',
    [PermissionAction.VIEW_AUDIT_LOGS]: 'always',
    [PermissionAction.MANAGE_INVENTORY]: 'always',
    [PermissionAction.VIEW_REPORTS]: 'always',
    [PermissionAction.VIEW_FINANCIALS]: 'always',
    [PermissionAction.MANAGE_TENANT_SETTINGS]: 'always',
    [PermissionAction.MANAGE_TENANTS]: 'always',
  },
  [UserRole.COMPANY_ADMIN]: {
    [PermissionAction.MANAGE_USERS]: 'same_tenant',
    [PermissionAction.VIEW_AUDIT_LOGS]: 'same_tenant',
    [PermissionAction.MANAGE_INVENTORY]: 'always',
    [PermissionAction.VIEW_REPORTS]: 'always',
    [PermissionAction.VIEW_FINANCIALS]: 'always',
    [PermissionAction.MANAGE_TENANT_SETTINGS]: 'always',
    [PermissionAction.MANAGE_TENANTS]: 'never',
  },
  [UserRole.OPERATOR]: {
    [PermissionAction.MANAGE_USERS]: 'never',
    [PermissionAction.VIEW_AUDIT_LOGS]: 'never',
    [PermissionAction.MANAGE_INVENTORY]: 'same_tenant',
    [PermissionAction.VIEW_REPORTS]: 'same_tenant',
    [PermissionAction.VIEW_FINANCIALS]: 'same_tenant',
    [PermissionAction.MANAGE_TENANT_SETTINGS]: 'never',
    [PermissionAction.MANAGE_TENANTS]: 'never',
  },
  [UserRole.VIEWER]: {
    [PermissionAction.MANAGE_USERS]: 'never',
    [PermissionAction.VIEW_AUDIT_LOGS]: 'never',
    [PermissionAction.MANAGE_INVENTORY]: 'never',
    [PermissionAction.VIEW_REPORTS]: 'same_tenant',
    [PermissionAction.VIEW_FINANCIALS]: 'never',
    [PermissionAction.MANAGE_TENANT_SETTINGS]: 'never',
    [PermissionAction.MANAGE_TENANTS]: 'never',
  },
};

// Flattened for lookups keyed by untrusted strings (roles decoded from a token).
const RULES = new Map<string, PermissionRule>(
  Object.entries(PERMISSION_TABLE).flatMap(([role, actions]) =>
    Object.entries(actions).map(
      ([action, rule]): [string, PermissionRule] => [`${role}:${action}`, rule],
    ),
  ),
);

export function ruleFor(role: string, action: string): PermissionRule {
  return RULES.get(`${role}:${action}`) ?? 'never';
}
