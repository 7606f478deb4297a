import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, ILike, Repository } from 'typeorm';
import { Actor } from '../authorization/actor';
import { isSuperAdmin } from '../authorization/authorization';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { AuditService } from '../audit/audit.service';
import { PaginatedResponseDto, PaginationMetaDto } from '../common/dto/paginated-response.dto';
import { UserErrors } from '../common/errors/user.errors';
import { UnauthorizedActionException } from '../common/exceptions/access-denied.exception';
import { TenantsService } from '../tenant/tenant.service';
import { CreateUserDto } from './dto/create-user.dto';
import { ListUsersQueryDto } from './dto/list-users.dto';
import { User, UserRole, UserStatus } from './user.entity';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepo: Repository<User>,
    private readonly tenantsService: TenantsService,
    private readonly authorization: AuthorizationService,
    private readonly auditService: AuditService,
  ) {}

  private getRepo(manager?: EntityManager): Repository<User> {
    return manager ? manager.getRepository(User) : this.userRepo;
  }

  findById(id: string, manager?: EntityManager): Promise<User | null> {
    return this.getRepo(manager).findOne({ where: { id }, relations: { tenant: true } });
  }

  async listForTenant(actor: Actor, query: ListUsersQueryDto): Promise<PaginatedResponseDto<User>> {
    const scope = this.authorization.authorizeScope(
      actor,
      query.tenantId,
      PermissionAction.MANAGE_USERS,
    );
    const { page, limit } = query;

    const base: FindOptionsWhere<User> = { tenantId: scope.tenantId };
    if (query.role) base.role = query.role;
    if (query.status) base.status = query.status;
    const search = query.search?.trim();
    const where = search
      ? [
          { ...base, name: ILike(`%${search}%`) },
          { ...base, email: ILike(`%${search}%`) },
        ]
      : base;

    const [data, total] = await this.userRepo.findAndCount({
      where,
      order: { name: 'ASC', id: 'ASC' },
      skip: (page - 1) * limit,
      take: limit,
    });

    const totalPages = Math.ceil(total / limit);
    return new PaginatedResponseDto(
      data,
      new PaginationMetaDto({ total, limit, page, totalPages, hasMore: page < totalPages }),
    );
  }

  /**
   * Super admins carry no tenant and only super admins create them; every other
   * role is created inside the tenant the actor may manage.
   */
  async create(actor: Actor, dto: CreateUserDto): Promise<User> {
    const tenantId = this.targetTenantFor(actor, dto);
    const email = dto.email.trim().toLowerCase();

    const user = await this.userRepo.manager.transaction(async (manager) => {
      const repo = this.getRepo(manager);
      if (tenantId) {
        await this.tenantsService.getOrThrow(tenantId, manager);
      }
      if (await repo.exists({ where: { email } })) {
        throw new ConflictException(UserErrors.EMAIL_ALREADY_IN_USE);
      }

      const saved = await repo.save(
        repo.create({
          tenantId,
          email,
          name: dto.name.trim(),
          role: dto.role,
          status: UserStatus.ACTIVE,
          createdById: actor.id,
          updatedById: actor.id,
        }),
      );
      await this.auditService.record(
        actor,
        {
          action: 'user.create',
          resourceType: 'user',
          resourceId: saved.id,
          tenantId,
          changes: { email, role: saved.role },
        },
        manager,
      );
      return saved;
    });

    this.logger.log(
      ['user_created', `user=${user.id}`, `role=${user.role}`, `tenant=${tenantId ?? '-'}`].join(' | '),
    );
    return user;
  }

  async setStatus(
    actor: Actor,
    userId: string,
    status: UserStatus,
    tenantId?: string,
  ): Promise<User> {
    const scope = this.authorization.authorizeScope(actor, tenantId, PermissionAction.MANAGE_USERS);
    if (userId === actor.id) {
      throw new BadRequestException(UserErrors.CANNOT_CHANGE_OWN_STATUS);
    }

    return this.userRepo.manager.transaction(async (manager) => {
      const repo = this.getRepo(manager);
      const user = await repo.findOne({ where: { id: userId, tenantId: scope.tenantId } });
      if (!user) {
        throw new NotFoundException(UserErrors.USER_NOT_FOUND);
      }
      if (user.status === status) {
        return user;
      }

      const from = user.status;
      user.status = status;
      user.updatedById = actor.id;
      const saved = await repo.save(user);
      await this.auditService.record(
        actor,
        {
          action: 'user.status.update',
          resourceType: 'user',
          resourceId: user.id,
          tenantId: scope.tenantId,
          changes: { status: { from, to: status } },
        },
        manager,
      );
      return saved;
    });
  }

  private targetTenantFor(actor: Actor, dto: CreateUserDto): string | null {
    if (dto.role === UserRole.SUPER_ADMIN) {
      if (!isSuperAdmin(actor)) {
        throw new UnauthorizedActionException();
      }
      if (dto.tenantId) {
        throw new BadRequestException(UserErrors.SUPER_ADMIN_WITH_TENANT);
      }
      return null;
    }

    if (isSuperAdmin(actor) && !dto.tenantId) {
      throw new BadRequestException(UserErrors.TENANT_REQUIRED);
    }
    return this.authorization.authorizeScope(actor, dto.tenantId, PermissionAction.MANAGE_USERS)
      .tenantId;
  }
}
