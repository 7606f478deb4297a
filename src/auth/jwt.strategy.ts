import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AuthErrors } from '../common/errors/auth.errors';
import { User, UserStatus } from '../user/user.entity';
import { UsersService } from '../user/user.service';

/** Claims of an access token issued by the identity service. */
export interface JwtPayload {
  sub: string;
  // null for super admins
  tenantId: string | null;
  role: string;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    config: ConfigService,
    private readonly usersService: UsersService,
  ) {
    const secret = config.get<string>('JWT_SECRET');
    if (!secret) {
      throw new Error('JWT_SECRET is not set in configuration');
    }

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  /**
   * Re-loads the user so deactivations and role changes apply to tokens that
   * are still unexpired.
   */
  async validate(payload: JwtPayload): Promise<User> {
    const user = await this.usersService.findById(payload.sub);

    if (!user) {
      throw this.reject(payload, 'unknown_user', AuthErrors.INVALID_TOKEN);
    }
    if (user.status !== UserStatus.ACTIVE) {
      throw this.reject(payload, 'user_inactive', AuthErrors.USER_INACTIVE);
    }
    if (user.role !== payload.role || user.tenantId !== (payload.tenantId ?? null)) {
      throw this.reject(payload, 'claims_mismatch', AuthErrors.INVALID_TOKEN);
    }
    if (user.tenantId && !user.tenant?.isActive) {
      throw this.reject(payload, 'tenant_inactive', AuthErrors.TENANT_INACTIVE);
    }

    return user; // request.user
  }

  private reject(
    payload: JwtPayload,
    reason: string,
    error: { code: string; message: string },
  ): UnauthorizedException {
    this.logger.warn(
      ['token_rejected', `reason=${reason}`, `user=${payload.sub}`, `tenant=${payload.tenantId ?? '-'}`].join(
        ' | ',
      ),
    );
    return new UnauthorizedException(error);
  }
}
