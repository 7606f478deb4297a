import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsDecimal,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

// no category: it is fixed at creation
export class UpdateProductDto {
  @ApiPropertyOptional({ example: 'Basmati Paddy (new crop)' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name?: string;

  @ApiPropertyOptional({ example: 'BAS-02' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(40)
  sku?: string;

  @ApiPropertyOptional({ example: 'quintal' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  unit?: string;

  @ApiPropertyOptional({
    example: '2200.00',
    description: 'New current price. Recorded movements keep their own price.',
  })
  @IsOptional()
  @IsDecimal({ decimal_digits: '0,2' })
  pricePerQuintal?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ example: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
