// src/common/context/app-context.service.ts
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from './cls-store.type';
import { ContextErrors } from '../errors/context.errors';
import { Actor } from '../../authorization/actor';

@Injectable()
export class AppContextService {
  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  // ---- Actor ----
  getActorOrThrow(): Actor {
    const userId = this.cls.get('userId');
    const role = this.cls.get('role');
    if (!userId || !role) {
      throw new UnauthorizedException(ContextErrors.USER_NOT_FOUND);
    }
    return { id: userId, role, tenantId: this.cls.get('tenantId') ?? null };
  }

  // ---- Request meta ----
  getIp(): string | undefined {
    return this.cls.get('ip');
  }

  getUserAgent(): string | undefined {
    return this.cls.get('userAgent');
  }
}
