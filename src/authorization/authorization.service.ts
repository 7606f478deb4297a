import { Injectable, Logger } from '@nestjs/common';
import { Actor, TenantResource } from './actor';
import { can } from './authorization';
import { PermissionAction } from './permissions';
import { UnauthorizedActionException } from '../common/exceptions/access-denied.exception';
import { TenantScope } from '../tenancy/tenant-scope';

@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);

  can(
    actor: Actor | null | undefined,
    action: PermissionAction,
    resource?: TenantResource | null,
  ): boolean {
    return can(actor, action, resource);
  }

  /**
   * Throws {@link UnauthorizedActionException} unless `can` allows the action.
   * The resource is logged but never echoed back to the caller.
   */
  authorize(
    actor: Actor | null | undefined,
    action: PermissionAction,
    resource?: TenantResource | null,
  ): void {
    if (can(actor, action, resource)) {
      return;
    }

    this.logger.warn(
      [
        'authorization_denied',
        `user=${actor?.id ?? 'anonymous'}`,
        `role=${actor?.role ?? '-'}`,
        `tenant=${actor?.tenantId ?? '-'}`,
        `action=${action}`,
        `resourceTenant=${resource?.tenantId ?? '-'}`,
      ].join(' | '),
    );
    throw new UnauthorizedActionException();
  }

  /**
   * Authorizes each action against the requested tenant (or the actor's own),
   * then resolves the scope the operation may read and write.
   */
  authorizeScope(
    actor: Actor,
    requestedTenantId: string | null | undefined,
    ...actions: PermissionAction[]
  ): TenantScope {
    const resource = { tenantId: requestedTenantId || actor.tenantId };
    for (const action of actions) {
      this.authorize(actor, action, resource);
    }
    return TenantScope.resolve(actor, requestedTenantId);
  }
}
