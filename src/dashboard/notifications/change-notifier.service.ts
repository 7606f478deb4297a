import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { filter, Observable, Subject } from 'rxjs';
import { Clock } from '../../common/clock/clock';
import { TenantChange, TenantChangeEvent } from './tenant-change-event';

/**
 * In-process fan-out of "tenant data changed" events. Writers publish after
 * their transaction commits; the dashboard cache and live sessions subscribe.
 */
@Injectable()
export class ChangeNotifierService implements OnModuleDestroy {
  private readonly logger = new Logger(ChangeNotifierService.name);
  private readonly bus = new Subject<TenantChangeEvent>();

  constructor(private readonly clock: Clock) {}

  publish(tenantId: string, change: TenantChange): void {
    const event: TenantChangeEvent = {
      ...change,
      tenantId,
      publishedAt: this.clock.now().toISOString(),
    };
    this.logger.debug(['change_published', `tenant=${tenantId}`, `type=${change.type}`].join(' | '));
    this.bus.next(event);
  }

  subscribe(tenantId: string): Observable<TenantChangeEvent> {
    return this.bus.pipe(filter((event) => event.tenantId === tenantId));
  }

  events(): Observable<TenantChangeEvent> {
    return this.bus.asObservable();
  }

  onModuleDestroy(): void {
    this.bus.complete();
  }
}
