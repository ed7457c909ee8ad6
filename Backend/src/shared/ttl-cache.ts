// src/shared/ttl-cache.ts
/**
 * Generic in-memory TTL cache.
 * - per-entry expiry, checked lazily on every read
 * - periodic sweep (unref'd timer) that backs off while it keeps failing
 * - getOrSet with in-flight de-duplication and a store predicate
 * - hit/miss/error counters for the health surface
 *
 * One instance per process, created in index.ts and handed to every service.
 * All mutations are synchronous, so there is no interleaving inside an operation.
 */

import { CacheFailure, errorMessage } from "../errors";
import { moduleLog, type Logger } from "../logger";

export interface CacheEntry<V> {
  value: V;
  /** absolute epoch ms */
  expiresAt: number;
  createdAt: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  errors: number;
  sweeps: number;
  expired: number;
}

export interface TtlCacheOptions {
  /** TTL used when set() gets none (ms). */
  defaultTtlMs?: number;
  /** Clock; defaults to Date.now. */
  now?: () => number;
  logger?: Logger;
  /** Upper bound for the sweep backoff, as a multiple of the interval. */
  maxBackoffFactor?: number;
}

export interface GetOrSetOptions<V> {
  ttlMs?: number;
  /** false returns the value without storing it */
  storeIf?: (value: V) => boolean;
  /**
   * Caller's signal. A caller that joined another caller's run starts its own
   * when that run rejects while this signal is still live.
   */
  signal?: AbortSignal;
}

export const DEFAULT_SWEEP_INTERVAL_MS = 300_000;

export class TtlCache<V> {
  private map = new Map<string, CacheEntry<V>>();
  private inflight = new Map<string, Promise<V>>();
  private counters = { hits: 0, misses: 0, errors: 0, sweeps: 0, expired: 0 };

  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly maxBackoffFactor: number;

  private timer: NodeJS.Timeout | undefined;
  private sweepIntervalMs = DEFAULT_SWEEP_INTERVAL_MS;
  private consecutiveFailures = 0;

  constructor(opts: TtlCacheOptions = {}) {
    this.defaultTtlMs = opts.defaultTtlMs ?? 30 * 60_000;
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? moduleLog("cache");
    this.maxBackoffFactor = Math.max(1, opts.maxBackoffFactor ?? 8);
  }

  /** Value if present and not expired. Expired entries are purged and count as a miss. */
  get(key: string): V | undefined {
    const e = this.map.get(key);
    if (!e) {
      this.counters.misses++;
      return undefined;
    }
    if (e.expiresAt <= this.now()) {
      this.map.delete(key);
      this.counters.expired++;
      this.counters.misses++;
      return undefined;
    }
    this.counters.hits++;
    return e.value;
  }

  /** Overwrites wholesale. A non-positive TTL stores nothing (and drops any old entry). */
  set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    if (!(ttlMs > 0)) {
      this.map.delete(key);
      return;
    }
    const now = this.now();
    this.map.set(key, { value, createdAt: now, expiresAt: now + ttlMs });
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  /** Removes every entry with expiresAt <= now; returns how many went. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [k, e] of this.map) {
      if (e.expiresAt <= now) {
        this.map.delete(k);
        removed++;
      }
    }
    this.counters.sweeps++;
    this.counters.expired += removed;
    return removed;
  }

  /**
   * Cached value, or the factory's result.
   * Concurrent callers for the same key share one factory call. A factory
   * rejection is passed to every waiter and nothing is stored. Internal cache
   * failures are counted and fall through to the factory.
   */
  getOrSet(key: string, factory: () => Promise<V> | V, opts: GetOrSetOptions<V> = {}): Promise<V> {
    const hit = this.tryGet(key);
    if (hit !== undefined) return Promise.resolve(hit);

    const shared = this.inflight.get(key);
    if (!shared) return this.load(key, factory, opts);

    // the run we joined belongs to another caller; its abort is not ours
    return shared.catch((err: unknown) => {
      if (!opts.signal || opts.signal.aborted) throw err;
      return this.getOrSet(key, factory, opts);
    });
  }

  private load(key: string, factory: () => Promise<V> | V, opts: GetOrSetOptions<V>): Promise<V> {
    const p: Promise<V> = Promise.resolve()
      .then(factory)
      .then((value) => {
        if (opts.storeIf?.(value) ?? true) this.trySet(key, value, opts.ttlMs);
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === p) this.inflight.delete(key);
      });
    this.inflight.set(key, p);
    return p;
  }

  stats(): CacheStats {
    return { entries: this.map.size, ...this.counters };
  }

  // ---------------- background sweep ----------------

  startSweeper(intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS): void {
    if (this.timer) return;
    this.sweepIntervalMs = Math.max(1, intervalMs);
    this.consecutiveFailures = 0;
    this.schedule(this.sweepIntervalMs);
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }

  get sweeping(): boolean {
    return this.timer !== undefined;
  }

  private schedule(delayMs: number) {
    this.timer = setTimeout(() => this.runSweep(), delayMs);
    this.timer.unref?.();
  }

  private runSweep() {
    try {
      const removed = this.sweep();
      this.consecutiveFailures = 0;
      if (removed) this.log.debug({ removed, entries: this.map.size }, "cache sweep");
    } catch (err) {
      this.consecutiveFailures++;
      this.counters.errors++;
      this.log.warn({ err, failures: this.consecutiveFailures }, "cache sweep failed");
    }
    // stop() may have run inside the cycle
    if (this.timer) this.schedule(this.nextDelay());
  }

  /** Interval while healthy; doubles per consecutive failure up to the cap. */
  nextDelay(): number {
    const factor = Math.min(2 ** this.consecutiveFailures, this.maxBackoffFactor);
    return this.sweepIntervalMs * factor;
  }

  // ---------------- internal-failure isolation ----------------

  private tryGet(key: string): V | undefined {
    try {
      return this.get(key);
    } catch (err) {
      this.recordFailure(new CacheFailure(`get failed for ${key}: ${errorMessage(err)}`, { cause: err }));
      return undefined;
    }
  }

  private trySet(key: string, value: V, ttlMs?: number) {
    try {
      this.set(key, value, ttlMs);
    } catch (err) {
      this.recordFailure(new CacheFailure(`set failed for ${key}: ${errorMessage(err)}`, { cause: err }));
    }
  }

  private recordFailure(err: CacheFailure) {
    this.counters.errors++;
    this.log.warn({ err }, "cache operation failed; recomputing");
  }
}
