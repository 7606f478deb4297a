import { ConfigService } from '@nestjs/config';
import { ManualClock } from '../../common/clock/testing/manual-clock';
import { MovementType } from '../../inventory/stock-movement.entity';
import { MetricsCacheService } from '../cache/metrics-cache.service';
import { ChangeNotifierService } from './change-notifier.service';
import { DashboardCacheInvalidator } from './dashboard-cache-invalidator';
import { TenantChangeEvent } from './tenant-change-event';

describe('ChangeNotifierService', () => {
  const clock = new ManualClock('2025-03-12T10:00:00.000Z');
  let notifier: ChangeNotifierService;

  beforeEach(() => {
    notifier = new ChangeNotifierService(clock);
  });

  afterEach(() => notifier.onModuleDestroy());

  it('delivers events only to subscribers of the same tenant', () => {
    const seenA: TenantChangeEvent[] = [];
    const seenB: TenantChangeEvent[] = [];
    notifier.subscribe('tenant-a').subscribe((e) => seenA.push(e));
    notifier.subscribe('tenant-b').subscribe((e) => seenB.push(e));

    notifier.publish('tenant-a', { type: 'product_updated', productId: 'p1' });

    expect(seenA).toEqual([
      {
        type: 'product_updated',
        productId: 'p1',
        tenantId: 'tenant-a',
        publishedAt: '2025-03-12T10:00:00.000Z',
      },
    ]);
    expect(seenB).toEqual([]);
  });

  it('completes every stream on shutdown', () => {
    const complete = jest.fn();
    notifier.events().subscribe({ complete });
    notifier.onModuleDestroy();
    expect(complete).toHaveBeenCalledTimes(1);
  });
});

describe('DashboardCacheInvalidator', () => {
  const clock = new ManualClock('2025-03-12T10:00:00.000Z');

  it('invalidates the tenant of each published change', async () => {
    const notifier = new ChangeNotifierService(clock);
    const cache = new MetricsCacheService(new ConfigService({}), clock);
    const invalidator = new DashboardCacheInvalidator(notifier, cache);
    invalidator.onModuleInit();

    await cache.recent.getOrCompute('tenant-a', 'limit:10', async () => []);
    await cache.recent.getOrCompute('tenant-b', 'limit:10', async () => []);

    notifier.publish('tenant-a', {
      type: 'transaction_created',
      movementType: MovementType.IN,
      movementId: 'm1',
      productId: 'p1',
      date: '2025-03-12',
    });

    expect(cache.recent.size).toBe(1);
    const fresh = jest.fn().mockResolvedValue([]);
    await cache.recent.getOrCompute('tenant-b', 'limit:10', fresh);
    expect(fresh).not.toHaveBeenCalled();

    invalidator.onModuleDestroy();
    notifier.onModuleDestroy();
  });

  it('keeps publishing working when invalidation throws', () => {
    const notifier = new ChangeNotifierService(clock);
    const cache = {
      invalidateTenant: jest.fn(() => {
        throw new Error('cache down');
      }),
    };
    const invalidator = new DashboardCacheInvalidator(notifier, cache as unknown as MetricsCacheService);
    invalidator.onModuleInit();

    expect(() =>
      notifier.publish('tenant-a', { type: 'product_updated', productId: 'p1' }),
    ).not.toThrow();
    expect(cache.invalidateTenant).toHaveBeenCalledWith('tenant-a', 'product_updated');

    invalidator.onModuleDestroy();
    notifier.onModuleDestroy();
  });
});
