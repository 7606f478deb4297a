import { SetMetadata } from '@nestjs/common';
import { PermissionAction } from './permissions';

export const REQUIRED_PERMISSION_KEY = 'requiredPermission';

export const RequirePermission = (action: PermissionAction) =>
  SetMetadata(REQUIRED_PERMISSION_KEY, action);
