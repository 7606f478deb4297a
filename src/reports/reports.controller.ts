import { Controller, Get, Query, Res, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { JwtAuthGuard } from '../auth/jwt.auth.guard';
import { PermissionAction } from '../authorization/permissions';
import { PermissionGuard } from '../authorization/permission.guard';
import { RequirePermission } from '../authorization/require-permission.decorator';
import { AppContextService } from '../common/context/app-context.service';
import { abortOnClose } from '../common/http/abort-on-close';
import { MovementHistoryQueryDto } from './dto/movement-history-query.dto';
import { ReportsService } from './reports.service';

@ApiTags('Reports')
@ApiBearerAuth('access-token')
@Controller('reports')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class ReportsController {
  constructor(
    private readonly reportsService: ReportsService,
    private readonly appContext: AppContextService,
  ) {}

  @Get('stock-levels')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiOperation({ summary: 'Current stock per product with in/out totals and status' })
  @ApiQuery({ name: 'tenantId', required: false })
  getStockLevels(
    @Res({ passthrough: true }) res: Response,
    @Query('tenantId') tenantId?: string,
  ) {
    return this.reportsService.getStockLevels(this.appContext.getActorOrThrow(), tenantId, {
      signal: abortOnClose(res),
    });
  }

  @Get('movements')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiOperation({
    summary: 'Stock-in / stock-out history',
    description: 'Newest business date first; prices are omitted for viewers.',
  })
  getMovementHistory(
    @Query() query: MovementHistoryQueryDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    return this.reportsService.getMovementHistory(this.appContext.getActorOrThrow(), query, {
      signal: abortOnClose(res),
    });
  }
}
