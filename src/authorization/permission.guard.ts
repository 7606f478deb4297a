import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RequestWithUser } from '../common/types/request-with-user';
import { toActor } from './actor';
import { AuthorizationService } from './authorization.service';
import { PermissionAction } from './permissions';
import { REQUIRED_PERMISSION_KEY } from './require-permission.decorator';

/**
 * Route-level gate. Checks the action against the actor's own tenant; services
 * re-check against the tenant actually requested.
 */
@Injectable()
export class PermissionGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly authorization: AuthorizationService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const action = this.reflector.getAllAndOverride<PermissionAction | undefined>(
      REQUIRED_PERMISSION_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!action) {
      return true;
    }

    const req = context.switchToHttp().getRequest<RequestWithUser>();
    const actor = req.user ? toActor(req.user) : undefined;

    this.authorization.authorize(actor, action, { tenantId: actor?.tenantId });
    return true;
  }
}
