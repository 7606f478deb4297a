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
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/jwt.auth.guard';
import { PermissionAction } from '../authorization/permissions';
import { PermissionGuard } from '../authorization/permission.guard';
import { RequirePermission } from '../authorization/require-permission.decorator';
import { AppContextService } from '../common/context/app-context.service';
import { CreateUserDto } from './dto/create-user.dto';
import { ListUsersQueryDto } from './dto/list-users.dto';
import { SetUserStatusDto } from './dto/set-user-status.dto';
import { UsersService } from './user.service';

@ApiTags('Users')
@ApiBearerAuth('access-token')
@Controller('users')
@UseGuards(JwtAuthGuard, PermissionGuard)
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    private readonly appContext: AppContextService,
  ) {}

  @Get()
  @RequirePermission(PermissionAction.MANAGE_USERS)
  @ApiOperation({ summary: 'List users of the tenant' })
  list(@Query() query: ListUsersQueryDto) {
    return this.usersService.listForTenant(this.appContext.getActorOrThrow(), query);
  }

  @Post()
  @RequirePermission(PermissionAction.MANAGE_USERS)
  @ApiOperation({ summary: 'Create a user' })
  create(@Body() dto: CreateUserDto) {
    return this.usersService.create(this.appContext.getActorOrThrow(), dto);
  }

  @Patch(':id/status')
  @RequirePermission(PermissionAction.MANAGE_USERS)
  @ApiOperation({ summary: 'Activate or deactivate a user' })
  setStatus(@Param('id', ParseUUIDPipe) id: string, @Body() dto: SetUserStatusDto) {
    return this.usersService.setStatus(
      this.appContext.getActorOrThrow(),
      id,
      dto.status,
      dto.tenantId,
    );
  }
}
