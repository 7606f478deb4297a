import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt.auth.guard';
import { PermissionAction } from '../authorization/permissions';
import { PermissionGuard } from '../authorization/permission.guard';
import { RequirePermission } from '../authorization/require-permission.decorator';
import { AppContextService } from '../common/context/app-context.service';
import { AuditService } from './audit.service';
import { ListAuditLogsQueryDto } from './dto/list-audit-logs.dto';

@ApiTags('Audit')
@ApiBearerAuth('access-token')
@Controller('audit-logs')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class AuditController {
  constructor(
    private readonly auditService: AuditService,
    private readonly appContext: AppContextService,
  ) {}

  @Get()
  @RequirePermission(PermissionAction.VIEW_AUDIT_LOGS)
  @ApiOperation({ summary: 'Audit trail of the tenant, newest first' })
  list(@Query() query: ListAuditLogsQueryDto) {
    return this.auditService.list(query.tenantId, this.appContext.getActorOrThrow(), query);
  }
}
