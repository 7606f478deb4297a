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
import { CreateProductDto } from './dto/create-product.dto';
import { ListProductsQueryDto } from './dto/list-products.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { ProductService } from './product.service';

@ApiTags('Products')
@ApiBearerAuth('access-token')
@Controller('products')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class ProductController {
  constructor(
    private readonly productService: ProductService,
    private readonly appContext: AppContextService,
  ) {}

  @Post()
  @RequirePermission(PermissionAction.MANAGE_INVENTORY)
  @ApiOperation({ summary: 'Create a product' })
  create(@Body() dto: CreateProductDto) {
    return this.productService.create(this.appContext.getActorOrThrow(), dto);
  }

  @Get()
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiOperation({ summary: 'List products of the tenant' })
  findAll(@Query() query: ListProductsQueryDto) {
    return this.productService.findAll(this.appContext.getActorOrThrow(), query);
  }

  @Get(':id')
  @RequirePermission(PermissionAction.VIEW_REPORTS)
  @ApiOperation({ summary: 'Get one product' })
  @ApiQuery({ name: 'tenantId', required: false })
  findOne(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('tenantId') tenantId?: string,
  ) {
    return this.productService.findOne(this.appContext.getActorOrThrow(), id, tenantId);
  }

  @Patch(':id')
  @RequirePermission(PermissionAction.MANAGE_INVENTORY)
  @ApiOperation({ summary: 'Update a product (category cannot change)' })
  @ApiQuery({ name: 'tenantId', required: false })
  update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateProductDto,
    @Query('tenantId') tenantId?: string,
  ) {
    return this.productService.update(this.appContext.getActorOrThrow(), id, dto, tenantId);
  }
}
