import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsTimeZone,
  IsUUID,
  Min,
} from 'class-validator';

export const SUPPORTED_UNITS = ['kg', 'quintal', 'tonne'] as const;
export const SUPPORTED_DATE_FORMATS = ['YYYY-MM-DD', 'DD-MM-YYYY', 'DD/MM/YYYY', 'MM/DD/YYYY'] as const;

export class UpdateTenantSettingsDto {
  @ApiPropertyOptional({ description: 'Target tenant; required for super admins' })
  @IsOptional()
  @IsUUID('4')
  tenantId?: string;

  @ApiPropertyOptional({ enum: [...SUPPORTED_UNITS] })
  @IsOptional()
  @IsIn(SUPPORTED_UNITS)
  default_unit?: string;

  @ApiPropertyOptional({ example: 'Asia/Kolkata' })
  @IsOptional()
  @IsString()
  @IsTimeZone()
  timezone?: string;

  @ApiPropertyOptional({ enum: [...SUPPORTED_DATE_FORMATS] })
  @IsOptional()
  @IsIn(SUPPORTED_DATE_FORMATS)
  date_format?: string;

  @ApiPropertyOptional({ description: 'Quintals at or below which a product raises a low-stock alert' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  lowStockThreshold?: number;
}
