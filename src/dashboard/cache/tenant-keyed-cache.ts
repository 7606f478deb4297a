import { Clock } from '../../common/clock/clock';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
  // a caller without a signal can never walk away
  pinned: boolean;
}

// Expired entries are only dropped on read; above this size a write also sweeps.
const SWEEP_THRESHOLD = 1000;

/**
 * Rejects as soon as `signal` aborts, without cancelling `promise` itself. Other
 * callers waiting on the same promise are unaffected.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * TTL cache for one query kind, keyed by tenant and range.
 *
 * Concurrent misses for the same key share one computation. Each tenant has a
 * generation counter: a computation that started before an invalidation still
 * answers its callers but is not stored. The computation's own signal aborts
 * once every caller waiting on it has aborted.
 */
export class TenantKeyedCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly flights = new Map<string, Flight<T>>();
  private readonly generations = new Map<string, number>();

  constructor(
    readonly kind: string,
    private readonly ttlMs: number,
    private readonly clock: Clock,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  async getOrCompute(
    tenantId: string,
    rangeKey: string,
    compute: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    signal?.throwIfAborted();

    const key = this.key(tenantId, rangeKey);
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > this.now()) {
      return hit.value;
    }
    if (hit) {
      this.entries.delete(key);
    }

    let flight = this.flights.get(key);
    if (!flight || flight.controller.signal.aborted) {
      flight = this.startFlight(tenantId, key, compute);
    }

    return this.join(flight, signal);
  }

  /** Drops every entry and in-flight computation of the tenant. Returns the number of entries dropped. */
  invalidateTenant(tenantId: string): number {
    this.generations.set(tenantId, this.generationOf(tenantId) + 1);

    const prefix = `${tenantId}:`;
    let dropped = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        dropped++;
      }
    }
    for (const key of [...this.flights.keys()]) {
      if (key.startsWith(prefix)) {
        this.flights.delete(key);
      }
    }
    return dropped;
  }

  clear(): void {
    this.entries.clear();
    this.flights.clear();
  }

  private join(flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
      flight.pinned = true;
      return flight.promise;
    }

    flight.waiters++;
    const onAbort = () => {
      flight.waiters--;
      if (flight.waiters === 0 && !flight.pinned) {
        flight.controller.abort(signal.reason);
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });
    const detach = () => signal.removeEventListener('abort', onAbort);
    void flight.promise.then(detach, detach);

    return raceAbort(flight.promise, signal);
  }

  private startFlight(
    tenantId: string,
    key: string,
    compute: (signal: AbortSignal) => Promise<T>,
  ): Flight<T> {
    const generation = this.generationOf(tenantId);
    const controller = new AbortController();

    const promise: Promise<T> = Promise.resolve()
      .then(() => compute(controller.signal))
      .then((value) => {
        if (this.generationOf(tenantId) === generation) {
          this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
          this.sweepIfLarge();
        }
        return value;
      })
      .finally(() => {
        if (this.flights.get(key)?.promise === promise) {
          this.flights.delete(key);
        }
      });

    const flight: Flight<T> = { promise, controller, waiters: 0, pinned: false };
    this.flights.set(key, flight);
    return flight;
  }

  private sweepIfLarge(): void {
    if (this.entries.size <= SWEEP_THRESHOLD) return;

    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private generationOf(tenantId: string): number {
    return this.generations.get(tenantId) ?? 0;
  }

  private key(tenantId: string, rangeKey: string): string {
    return `${tenantId}:${rangeKey}`;
  }

  private now(): number {
    return this.clock.now().getTime();
  }
}
