import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Subscription } from 'rxjs';
import { MetricsCacheService } from '../cache/metrics-cache.service';
import { ChangeNotifierService } from './change-notifier.service';

/** Drops a tenant's cached dashboard metrics whenever its data changes. */
@Injectable()
export class DashboardCacheInvalidator implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DashboardCacheInvalidator.name);
  private subscription?: Subscription;

  constructor(
    private readonly notifier: ChangeNotifierService,
    private readonly cache: MetricsCacheService,
  ) {}

  onModuleInit(): void {
    this.subscription = this.notifier.events().subscribe((event) => {
      // an error escaping an rxjs subscriber is rethrown asynchronously
      try {
        this.cache.invalidateTenant(event.tenantId, event.type);
      } catch (err) {
        this.logger.error(
          ['cache_invalidation_failed', `tenant=${event.tenantId}`, `type=${event.type}`].join(' | '),
          err instanceof Error ? err.stack : String(err),
        );
      }
    });
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
  }
}
