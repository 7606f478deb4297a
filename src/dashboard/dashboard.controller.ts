import {
  Body,
  Controller,
  Get,
  MessageEvent,
  Param,
  ParseEnumPipe,
  Post,
  Put,
  Query,
  Res,
  Sse,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { map, Observable } from 'rxjs';
import { JwtAuthGuard } from '../auth/jwt.auth.guard';
import { AuthorizationService } from '../authorization/authorization.service';
import { PermissionAction } from '../authorization/permissions';
import { PermissionGuard } from '../authorization/permission.guard';
import { RequirePermission } from '../authorization/require-permission.decorator';
import { AppContextService } from '../common/context/app-context.service';
import { abortOnClose } from '../common/http/abort-on-close';
import { DashboardService } from './dashboard.service';
import { TopEntityKind } from './dashboard.types';
import { DashboardQueryDto, selectorOf } from './dto/dashboard-query.dto';
import { ChangeNotifierService } from './notifications/change-notifier.service';
import { DashboardPreferenceService } from './preferences/dashboard-preference.service';
import { SetDefaultPeriodDto } from './preferences/dto/set-default-period.dto';
import { UpdateWidgetOrderDto } from './preferences/dto/update-widget-order.dto';

@ApiTags('Dashboard')
@ApiBearerAuth('access-token')
@Controller('dashboard')
@UseGuards(JwtAuthGuard, PermissionGuard)
@RequirePermission(PermissionAction.VIEW_REPORTS)
export class DashboardController {
  constructor(
    private readonly dashboard: DashboardService,
    private readonly preferences: DashboardPreferenceService,
    private readonly notifier: ChangeNotifierService,
    private readonly authorization: AuthorizationService,
    private readonly appContext: AppContextService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Every visible widget of the caller, computed independently' })
  getDashboard(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    // no period in the query means the caller's saved default
    const selector = query.period ? selectorOf(query) : undefined;
    return this.dashboard.getDashboard(query.tenantId, this.appContext.getActorOrThrow(), selector, {
      signal: abortOnClose(res),
    });
  }

  @Get('inventory')
  getInventory(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getInventoryMetrics(query.tenantId, this.appContext.getActorOrThrow(), {
      signal: abortOnClose(res),
    });
  }

  @Get('alerts')
  getAlerts(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getStockAlerts(query.tenantId, this.appContext.getActorOrThrow(), {
      signal: abortOnClose(res),
    });
  }

  @Get('financial')
  @RequirePermission(PermissionAction.VIEW_FINANCIALS)
  getFinancial(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getFinancialMetrics(
      query.tenantId,
      this.appContext.getActorOrThrow(),
      selectorOf(query),
      { signal: abortOnClose(res) },
    );
  }

  @Get('trend')
  getTrend(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getTrendSeries(
      query.tenantId,
      this.appContext.getActorOrThrow(),
      selectorOf(query),
      { signal: abortOnClose(res) },
    );
  }

  @Get('top/:kind')
  getTop(
    @Param('kind', new ParseEnumPipe(TopEntityKind)) kind: TopEntityKind,
    @Query() query: DashboardQueryDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    return this.dashboard.getTopEntities(
      query.tenantId,
      this.appContext.getActorOrThrow(),
      selectorOf(query),
      kind,
      query.limit,
      { signal: abortOnClose(res) },
    );
  }

  @Get('comparison')
  getComparison(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getPerformanceComparison(
      query.tenantId,
      this.appContext.getActorOrThrow(),
      selectorOf(query),
      { signal: abortOnClose(res) },
    );
  }

  @Get('recent')
  getRecent(@Query() query: DashboardQueryDto, @Res({ passthrough: true }) res: Response) {
    return this.dashboard.getRecentTransactions(
      query.tenantId,
      this.appContext.getActorOrThrow(),
      query.limit,
      { signal: abortOnClose(res) },
    );
  }

  @Sse('events')
  @ApiOperation({ summary: 'Live change notifications for the tenant (server-sent events)' })
  events(@Query() query: DashboardQueryDto): Observable<MessageEvent> {
    const scope = this.authorization.authorizeScope(
      this.appContext.getActorOrThrow(),
      query.tenantId,
      PermissionAction.VIEW_REPORTS,
    );
    return this.notifier
      .subscribe(scope.tenantId)
      .pipe(map((event): MessageEvent => ({ type: event.type, data: event })));
  }

  // ---- Preferences (always the caller's own row) ----

  @Get('preferences')
  getPreferences() {
    return this.preferences.getOrCreate(this.appContext.getActorOrThrow());
  }

  @Put('preferences/widget-order')
  updateWidgetOrder(@Body() dto: UpdateWidgetOrderDto) {
    return this.preferences.updateWidgetOrder(this.appContext.getActorOrThrow(), dto.widgetOrder);
  }

  @Post('preferences/widgets/:widget/toggle')
  toggleWidget(@Param('widget') widget: string) {
    return this.preferences.toggleWidgetVisibility(this.appContext.getActorOrThrow(), widget);
  }

  @Put('preferences/default-period')
  setDefaultPeriod(@Body() dto: SetDefaultPeriodDto) {
    return this.preferences.setDefaultPeriod(this.appContext.getActorOrThrow(), dto.defaultTimePeriod);
  }

  @Post('preferences/reset')
  resetLayout() {
    return this.preferences.resetLayout(this.appContext.getActorOrThrow());
  }
}
