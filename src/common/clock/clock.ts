import { Injectable } from '@nestjs/common';

/**
 * Source of "now". Period resolution and cache expiry read time through this
 * so both can be pinned in tests.
 */
export abstract class Clock {
  abstract now(): Date;
}

@Injectable()
export class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}
