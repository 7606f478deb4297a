// src/common/context/cls-store.type.ts
import { ClsStore } from 'nestjs-cls';
import { UserRole } from '../../user/user.entity';

export interface AppClsStore extends ClsStore {
  correlationId: string;
  userId?: string;
  tenantId?: string | null;
  role?: UserRole;
  ip?: string;
  userAgent?: string;
}
