import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDecimal, IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';

export class CreateProductDto {
  @ApiPropertyOptional({ description: 'Target tenant; required for super admins' })
  @IsOptional()
  @IsUUID('4')
  tenantId?: string;

  @ApiProperty({ example: 'Basmati Paddy' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name!: string;

  @ApiProperty({ example: 'BAS-01', description: 'Unique within the tenant' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(40)
  sku!: string;

  @ApiPropertyOptional({ example: 'Paddy', description: 'Fixed after creation' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  category?: string;

  @ApiPropertyOptional({ example: 'quintal' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  unit?: string;

  @ApiProperty({ example: '2150.00', description: 'Current price per quintal (> 0)' })
  @IsDecimal({ decimal_digits: '0,2' })
  pricePerQuintal!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;
}
