import { Injectable } from '@nestjs/common';
import { Clock } from '../../common/clock/clock';
import { PeriodSelector, ResolvedPeriod, resolvePeriod } from './period';

@Injectable()
export class PeriodResolverService {
  constructor(private readonly clock: Clock) {}

  resolve(selector: PeriodSelector): ResolvedPeriod {
    return resolvePeriod(selector, this.clock.now());
  }
}
