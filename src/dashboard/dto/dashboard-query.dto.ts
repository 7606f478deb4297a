import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString, IsUUID, Max, Min } from 'class-validator';
import { PeriodName, PeriodSelector, parsePeriodSelector } from '../period/period';

export class DashboardQueryDto {
  @ApiPropertyOptional({ description: 'Required for super admins' })
  @IsOptional()
  @IsUUID('4')
  tenantId?: string;

  @ApiPropertyOptional({ enum: PeriodName, description: 'Defaults to this_month' })
  @IsOptional()
  @IsEnum(PeriodName)
  period?: PeriodName;

  @ApiPropertyOptional({ example: '2025-03-01', description: 'Custom period start (inclusive)' })
  @IsOptional()
  @IsString()
  start?: string;

  @ApiPropertyOptional({ example: '2025-04-01', description: 'Custom period end (exclusive)' })
  @IsOptional()
  @IsString()
  end?: string;

  @ApiPropertyOptional({ description: 'Row count for top lists and recent transactions' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(100)
  limit?: number;
}

export function selectorOf(query: DashboardQueryDto): PeriodSelector {
  return parsePeriodSelector(query.period, query.start, query.end);
}
