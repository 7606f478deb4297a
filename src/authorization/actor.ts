import { User, UserRole } from '../user/user.entity';

/** Who is asking. `tenantId` is null only for super admins. */
export interface Actor {
  id: string;
  role: UserRole;
  tenantId: string | null;
}

/** Anything that belongs to a tenant: a product, a user, a bare `{ tenantId }`. */
export interface TenantResource {
  tenantId?: string | null;
}

export function toActor(user: Pick<User, 'id' | 'role' | 'tenantId'>): Actor {
  return { id: user.id, role: user.role, tenantId: user.tenantId };
}
