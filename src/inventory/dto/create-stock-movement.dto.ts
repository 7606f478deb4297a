import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDecimal,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  IsUUID,
  Matches,
  MaxLength,
} from 'class-validator';

/** Body of both stock-in (from a farmer) and stock-out (to a customer). */
export class CreateStockMovementDto {
  @ApiPropertyOptional({ description: 'Target tenant; required for super admins' })
  @IsOptional()
  @IsUUID('4')
  tenantId?: string;

  @ApiProperty()
  @IsUUID('4')
  productId!: string;

  @ApiProperty({ example: '2025-03-12', description: 'Business date, not in the future' })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @ApiProperty({ example: 'Ravi Kumar', description: 'Farmer or customer name' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  partyName!: string;

  @ApiPropertyOptional({ example: '9000000000' })
  @IsOptional()
  @IsString()
  @MaxLength(20)
  partyContact?: string;

  @ApiPropertyOptional({ example: 'TS09AB1234' })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  vehicleNumber?: string;

  @ApiProperty({ example: 120 })
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  numOfBags!: number;

  @ApiProperty({ example: '75.00' })
  @IsDecimal({ decimal_digits: '0,2' })
  netWeightPerBagKg!: string;

  @ApiPropertyOptional({
    example: '2150.00',
    description: "Defaults to the product's current price",
  })
  @IsOptional()
  @IsDecimal({ decimal_digits: '0,2' })
  pricePerQuintal?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  notes?: string;
}
