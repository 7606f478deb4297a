import {
  BadRequestException,
  InternalServerErrorException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ReportsErrors } from '../errors/report.errors';

export class InvalidPeriodException extends BadRequestException {
  constructor(reason?: string) {
    super({
      ...ReportsErrors.INVALID_PERIOD,
      ...(reason ? { details: { reason } } : {}),
    });
  }
}

export class ComputationException extends InternalServerErrorException {
  constructor(readonly metric: string, readonly reason: string) {
    super(ReportsErrors.COMPUTATION_ERROR);
  }
}

export class DegradedDataException extends ServiceUnavailableException {
  constructor(readonly source: string) {
    super(ReportsErrors.DATA_UNAVAILABLE);
  }
}
