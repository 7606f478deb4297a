import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as delay } from 'timers/promises';
import { readDashboardSettings } from '../config/app-config';
import { DegradedDataException } from '../common/exceptions/report.exceptions';
import { TenantScope } from './tenant-scope';

/**
 * Runs read-store calls with one retry. Access and validation errors are final;
 * anything else gets a second attempt after a short backoff before the read is
 * reported as degraded.
 */
@Injectable()
export class ScopedReader {
  private readonly logger = new Logger(ScopedReader.name);
  private readonly backoffMs: number;

  constructor(config: ConfigService) {
    this.backoffMs = readDashboardSettings(config).readRetryBackoffMs;
  }

  async read<T>(
    scope: TenantScope,
    label: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof HttpException || signal?.aborted) {
        throw err;
      }
      this.logger.warn(
        [
          'read_retry',
          `tenant=${scope.tenantId}`,
          `source=${label}`,
          `error=${err instanceof Error ? err.message : String(err)}`,
        ].join(' | '),
      );
    }

    await delay(this.backoffMs, undefined, { signal });

    try {
      return await fn();
    } catch (err) {
      if (err instanceof HttpException || signal?.aborted) {
        throw err;
      }
      this.logger.error(
        ['read_degraded', `tenant=${scope.tenantId}`, `source=${label}`].join(' | '),
        err instanceof Error ? err.stack : String(err),
      );
      throw new DegradedDataException(label);
    }
  }
}
