import { TenantSettings } from './tenant.entity';

/** Read access to tenants and their settings, for consumers outside the tenant module. */
export abstract class TenantSettingsSource {
  abstract settingsFor(tenantId: string): Promise<TenantSettings>;

  /** Throws `NotFoundException` when no tenant has this id. */
  abstract requireTenant(tenantId: string): Promise<void>;
}
