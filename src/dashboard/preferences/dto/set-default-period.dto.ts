import { ApiProperty } from '@nestjs/swagger';
import { IsIn } from 'class-validator';
import { PeriodName, PRESET_PERIODS, PresetPeriodName } from '../../period/period';

export class SetDefaultPeriodDto {
  // a custom range has no dates to remember
  @ApiProperty({ enum: [...PRESET_PERIODS], example: PeriodName.THIS_MONTH })
  @IsIn(PRESET_PERIODS)
  defaultTimePeriod!: PresetPeriodName;
}
