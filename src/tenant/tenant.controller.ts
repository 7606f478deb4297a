import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt.auth.guard';
import { PermissionAction } from '../authorization/permissions';
import { PermissionGuard } from '../authorization/permission.guard';
import { RequirePermission } from '../authorization/require-permission.decorator';
import { AppContextService } from '../common/context/app-context.service';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { SetTenantStatusDto } from './dto/set-tenant-status.dto';
import { UpdateTenantSettingsDto } from './dto/update-tenant-settings.dto';
import { TenantsService } from './tenant.service';

@ApiTags('Tenants')
@ApiBearerAuth('access-token')
@Controller('tenants')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class TenantsController {
  constructor(
    private readonly tenantsService: TenantsService,
    private readonly appContext: AppContextService,
  ) {}

  @Post()
  @RequirePermission(PermissionAction.MANAGE_TENANTS)
  @ApiOperation({ summary: 'Provision a tenant (super admin)' })
  create(@Body() dto: CreateTenantDto) {
    return this.tenantsService.create(this.appContext.getActorOrThrow(), dto);
  }

  @Patch(':id/status')
  @RequirePermission(PermissionAction.MANAGE_TENANTS)
  @ApiOperation({ summary: 'Activate or deactivate a tenant (super admin)' })
  setStatus(@Param('id', ParseUUIDPipe) id: string, @Body() dto: SetTenantStatusDto) {
    return this.tenantsService.setActive(this.appContext.getActorOrThrow(), id, dto.isActive);
  }

  @Get('settings')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiQuery({ name: 'tenantId', required: false })
  getSettings(@Query('tenantId') tenantId?: string) {
    return this.tenantsService.getSettings(this.appContext.getActorOrThrow(), tenantId);
  }

  @Patch('settings')
  @RequirePermission(PermissionAction.MANAGE_TENANT_SETTINGS)
  updateSettings(@Body() dto: UpdateTenantSettingsDto) {
    return this.tenantsService.updateSettings(this.appContext.getActorOrThrow(), dto);
  }
}
