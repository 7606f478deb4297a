import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
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
import { CreateStockMovementDto } from './dto/create-stock-movement.dto';
import { InventoryService } from './inventory.service';
import { MovementType } from './stock-movement.entity';

@ApiTags('Inventory')
@ApiBearerAuth('access-token')
@Controller('inventory')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class InventoryController {
  constructor(
    private readonly inventoryService: InventoryService,
    private readonly appContext: AppContextService,
  ) {}

  @Post('stock-ins')
  @RequirePermission(PermissionAction.MANAGE_INVENTORY)
  @ApiOperation({ summary: 'Record paddy received from a farmer' })
  recordStockIn(@Body() dto: CreateStockMovementDto) {
    return this.inventoryService.recordStockIn(this.appContext.getActorOrThrow(), dto);
  }

  @Post('stock-outs')
  @RequirePermission(PermissionAction.MANAGE_INVENTORY)
  @ApiOperation({ summary: 'Record rice dispatched to a customer' })
  recordStockOut(@Body() dto: CreateStockMovementDto) {
    return this.inventoryService.recordStockOut(this.appContext.getActorOrThrow(), dto);
  }

  @Get('stock-ins/:id')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiQuery({ name: 'tenantId', required: false })
  findStockIn(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('tenantId') tenantId?: string,
  ) {
    return this.inventoryService.findMovement(
      this.appContext.getActorOrThrow(),
      MovementType.IN,
      id,
      tenantId,
    );
  }

  @Get('stock-outs/:id')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiQuery({ name: 'tenantId', required: false })
  findStockOut(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('tenantId') tenantId?: string,
  ) {
    return this.inventoryService.findMovement(
      this.appContext.getActorOrThrow(),
      MovementType.OUT,
      id,
      tenantId,
    );
  }
}
