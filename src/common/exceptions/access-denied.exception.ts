import { ForbiddenException } from '@nestjs/common';
import { AuthorizationErrors } from '../errors/authorization.errors';

/** The actor's role does not grant the requested action. */
export class UnauthorizedActionException extends ForbiddenException {
  constructor() {
    super(AuthorizationErrors.ACCESS_DENIED);
  }
}

/**
 * The operation named a tenant the actor does not own, or a super admin
 * omitted the tenant. Rendered exactly like {@link UnauthorizedActionException}.
 */
export class TenantMismatchException extends ForbiddenException {
  constructor() {
    super(AuthorizationErrors.ACCESS_DENIED);
  }
}
