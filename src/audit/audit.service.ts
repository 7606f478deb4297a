import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Actor } from '../authorization/actor';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { AppContextService } from '../common/context/app-context.service';
import { AuditLog } from './audit-log.entity';
import { ListAuditLogsQueryDto } from './dto/list-audit-logs.dto';

export interface AuditEntry {
  action: string;
  resourceType: string;
  resourceId?: string | null;
  // defaults to the actor's tenant
  tenantId?: string | null;
  changes?: Record<string, unknown>;
}

export const DEFAULT_AUDIT_PAGE = 50;

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(AuditLog)
    private readonly auditRepo: Repository<AuditLog>,
    private readonly authorization: AuthorizationService,
    private readonly appContext: AppContextService,
  ) {}

  private getRepo(manager?: EntityManager): Repository<AuditLog> {
    return manager ? manager.getRepository(AuditLog) : this.auditRepo;
  }

  /** Writes inside the caller's transaction when a manager is given. */
  async record(
    actor: Actor | undefined,
    entry: AuditEntry,
    manager?: EntityManager,
  ): Promise<AuditLog> {
    const repo = this.getRepo(manager);
    const log = repo.create({
      tenantId: entry.tenantId !== undefined ? entry.tenantId : actor?.tenantId ?? null,
      userId: actor?.id ?? null,
      action: entry.action,
      resourceType: entry.resourceType,
      resourceId: entry.resourceId ?? null,
      changes: entry.changes ?? {},
      ipAddress: this.appContext.getIp() ?? null,
      userAgent: this.appContext.getUserAgent() ?? null,
      createdById: actor?.id ?? null,
    });

    const saved = await repo.save(log);
    this.logger.log(
      [
        'audit',
        `action=${entry.action}`,
        `resource=${entry.resourceType}:${entry.resourceId ?? '-'}`,
        `user=${actor?.id ?? '-'}`,
        `tenant=${saved.tenantId ?? '-'}`,
      ].join(' | '),
    );
    return saved;
  }

  /** Newest first. */
  async list(
    tenantId: string | undefined,
    actor: Actor,
    query: ListAuditLogsQueryDto,
  ): Promise<AuditLog[]> {
    const scope = this.authorization.authorizeScope(
      actor,
      tenantId,
      PermissionAction.VIEW_AUDIT_LOGS,
    );

    const where: FindOptionsWhere<AuditLog> = { tenantId: scope.tenantId };
    if (query.action) where.action = query.action;
    if (query.resourceType) where.resourceType = query.resourceType;

    return this.auditRepo.find({
      where,
      order: { createdAt: 'DESC', id: 'DESC' },
      take: query.limit ?? DEFAULT_AUDIT_PAGE,
    });
  }
}
