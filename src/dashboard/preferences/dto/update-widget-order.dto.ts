import { ApiProperty } from '@nestjs/swagger';
import { ArrayMaxSize, IsArray, IsString } from 'class-validator';
import { ALL_WIDGETS, DashboardWidget } from '../../dashboard.types';

export class UpdateWidgetOrderDto {
  @ApiProperty({ example: ['alerts', 'inventory', 'trend'], enum: DashboardWidget, isArray: true })
  @IsArray()
  @ArrayMaxSize(ALL_WIDGETS.length)
  @IsString({ each: true })
  widgetOrder!: string[];
}
