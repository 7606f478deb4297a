import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean } from 'class-validator';

export class SetTenantStatusDto {
  @ApiProperty()
  @IsBoolean()
  isActive!: boolean;
}
