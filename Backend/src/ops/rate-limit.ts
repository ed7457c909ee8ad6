// src/ops/rate-limit.ts
/**
 * Rate limiters: SlidingWindow + TokenBucket + Adaptive.
 * In-memory, one state per key; keys never share state. Every check returns a
 * structured decision, rejections included. Nothing here throws.
 */

import { telemetry } from "./telemetry";

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** 0 when allowed; Infinity when the request can never fit */
  retryAfterSec: number;
  windowSec: number;
}

export interface KeyOccupancy {
  key: string;
  used: number;
  limit: number;
}

export interface LimiterSnapshot {
  kind: "sliding-window" | "token-bucket" | "adaptive";
  limit: number;
  windowSec: number;
  keys: KeyOccupancy[];
}

export interface Limiter {
  readonly kind: LimiterSnapshot["kind"];
  check(key: string, cost?: number): RateLimitDecision;
  occupancy(): LimiterSnapshot;
  reset(key?: string): void;
}

export interface SlidingConfig {
  maxRequests: number;
  windowSec: number;
}

export interface BucketConfig {
  capacity: number; // max tokens
  refillPerSec: number; // tokens per second
}

type Clock = () => number;

const allowCounter = () => telemetry.counter("rate_allow_total", { help: "Admitted requests", labelNames: ["policy"] });
const blockCounter = () => telemetry.counter("rate_block_total", { help: "Rejected requests", labelNames: ["policy"] });

// ---------------- Sliding window ----------------

export class SlidingWindowLimiter implements Limiter {
  readonly kind: LimiterSnapshot["kind"] = "sliding-window";
  private windows = new Map<string, number[]>();
  private maxRequests: number;
  readonly windowSec: number;

  constructor(cfg: SlidingConfig, private now: Clock = Date.now) {
    this.maxRequests = Math.max(1, Math.floor(cfg.maxRequests));
    this.windowSec = cfg.windowSec;
  }

  get limit(): number {
    return this.maxRequests;
  }

  setLimit(n: number) {
    this.maxRequests = Math.max(1, Math.floor(n));
  }

  check(key: string): RateLimitDecision {
    const now = this.now();
    const q = this.prune(key, now);

    if (q.length < this.maxRequests) {
      q.push(now);
      this.windows.set(key, q);
      allowCounter().inc(1, { policy: "sw" });
      return { allowed: true, limit: this.maxRequests, remaining: this.maxRequests - q.length, retryAfterSec: 0, windowSec: this.windowSec };
    }

    const oldest = q[0] ?? now;
    const retryAfterSec = (oldest + this.windowSec * 1000 - now) / 1000;
    blockCounter().inc(1, { policy: "sw" });
    return { allowed: false, limit: this.maxRequests, remaining: 0, retryAfterSec, windowSec: this.windowSec };
  }

  occupancy(): LimiterSnapshot {
    const now = this.now();
    const keys: KeyOccupancy[] = [];
    for (const key of [...this.windows.keys()]) {
      const q = this.prune(key, now);
      if (q.length) keys.push({ key, used: q.length, limit: this.maxRequests });
    }
    return { kind: this.kind, limit: this.maxRequests, windowSec: this.windowSec, keys };
  }

  reset(key?: string) {
    if (key === undefined) this.windows.clear();
    else this.windows.delete(key);
  }

  /** Drops timestamps outside the trailing window; forgets keys left empty. */
  private prune(key: string, now: number): number[] {
    const q = this.windows.get(key) ?? [];
    const cutoff = now - this.windowSec * 1000;
    let i = 0;
    while (i < q.length && q[i] <= cutoff) i++;
    const kept = i ? q.slice(i) : q;
    if (kept.length) this.windows.set(key, kept);
    else this.windows.delete(key);
    return kept;
  }
}

// ---------------- Token bucket ----------------

interface BucketState {
  tokens: number;
  lastRefill: number;
}

export class TokenBucketLimiter implements Limiter {
  readonly kind: LimiterSnapshot["kind"] = "token-bucket";
  private buckets = new Map<string, BucketState>();

  constructor(private cfg: BucketConfig, private now: Clock = Date.now) {}

  /** Seconds for an empty bucket to fill up again. */
  get windowSec(): number {
    return this.cfg.refillPerSec > 0 ? this.cfg.capacity / this.cfg.refillPerSec : Infinity;
  }

  check(key: string, cost = 1): RateLimitDecision {
    return this.consume(key, cost);
  }

  consume(key: string, n = 1): RateLimitDecision {
    const state = this.refill(key, this.now());
    const { capacity, refillPerSec } = this.cfg;

    if (state.tokens >= n) {
      state.tokens -= n;
      allowCounter().inc(1, { policy: "tb" });
      return { allowed: true, limit: capacity, remaining: Math.floor(state.tokens), retryAfterSec: 0, windowSec: this.windowSec };
    }

    const retryAfterSec = n > capacity || refillPerSec <= 0 ? Infinity : (n - state.tokens) / refillPerSec;
    blockCounter().inc(1, { policy: "tb" });
    return { allowed: false, limit: capacity, remaining: Math.floor(state.tokens), retryAfterSec, windowSec: this.windowSec };
  }

  occupancy(): LimiterSnapshot {
    const now = this.now();
    const keys: KeyOccupancy[] = [];
    for (const key of [...this.buckets.keys()]) {
      const s = this.refill(key, now);
      const used = this.cfg.capacity - s.tokens;
      if (used > 0) keys.push({ key, used: Math.ceil(used), limit: this.cfg.capacity });
      else this.buckets.delete(key); // full bucket == fresh state
    }
    return { kind: this.kind, limit: this.cfg.capacity, windowSec: this.windowSec, keys };
  }

  reset(key?: string) {
    if (key === undefined) this.buckets.clear();
    else this.buckets.delete(key);
  }

  private refill(key: string, now: number): BucketState {
    let s = this.buckets.get(key);
    if (!s) {
      s = { tokens: this.cfg.capacity, lastRefill: now };
      this.buckets.set(key, s);
      return s;
    }
    const elapsed = Math.max(0, now - s.lastRefill) / 1000;
    s.tokens = Math.min(this.cfg.capacity, s.tokens + elapsed * this.cfg.refillPerSec);
    s.lastRefill = now;
    return s;
  }
}

// ---------------- Adaptive ----------------

export interface AdaptiveConfig {
  baseLimit: number;
  maxLimit: number;
  windowSec: number;
  adjustIntervalSec?: number;
}

/**
 * Sliding window whose limit follows the downstream error ratio: once per
 * interval, > 10% errors shrinks it by 20%, < 5% grows it by 20%, always
 * within [baseLimit, maxLimit]. Intervals with no recorded outcome leave it alone.
 */
export class AdaptiveLimiter implements Limiter {
  readonly kind: LimiterSnapshot["kind"] = "adaptive";
  private window: SlidingWindowLimiter;
  private ok = 0;
  private failed = 0;
  private lastAdjust: number;
  private readonly intervalMs: number;

  constructor(private cfg: AdaptiveConfig, private now: Clock = Date.now) {
    this.window = new SlidingWindowLimiter({ maxRequests: cfg.baseLimit, windowSec: cfg.windowSec }, now);
    this.intervalMs = (cfg.adjustIntervalSec ?? 60) * 1000;
    this.lastAdjust = now();
  }

  get limit(): number {
    return this.window.limit;
  }

  record(success: boolean) {
    if (success) this.ok++;
    else this.failed++;
  }

  check(key: string): RateLimitDecision {
    this.maybeAdjust();
    return this.window.check(key);
  }

  occupancy(): LimiterSnapshot {
    return { ...this.window.occupancy(), kind: this.kind };
  }

  reset(key?: string) {
    this.window.reset(key);
  }

  maybeAdjust() {
    const now = this.now();
    if (now - this.lastAdjust < this.intervalMs) return;
    this.lastAdjust = now;

    const total = this.ok + this.failed;
    const ratio = total ? this.failed / total : 0;
    this.ok = 0;
    this.failed = 0;
    if (!total) return;

    const cur = this.window.limit;
    if (ratio > 0.1) {
      this.window.setLimit(Math.max(this.cfg.baseLimit, Math.min(cur - 1, Math.floor(cur * 0.8))));
    } else if (ratio < 0.05) {
      this.window.setLimit(Math.min(this.cfg.maxLimit, Math.max(cur + 1, Math.floor(cur * 1.2))));
    }
  }
}

/** Feeds a call outcome to limiters that adapt to it; others ignore it. */
export function recordOutcome(limiter: Limiter | undefined, success: boolean) {
  if (limiter instanceof AdaptiveLimiter) limiter.record(success);
}

// ---------------- Registry (health) ----------------

export class LimiterRegistry {
  private limiters = new Map<string, Limiter>();

  register<L extends Limiter>(name: string, limiter: L): L {
    this.limiters.set(name, limiter);
    return limiter;
  }

  get(name: string): Limiter | undefined {
    return this.limiters.get(name);
  }

  snapshot(): Record<string, LimiterSnapshot> {
    const out: Record<string, LimiterSnapshot> = {};
    for (const [name, l] of this.limiters) out[name] = l.occupancy();
    return out;
  }
}

/** Retry-After value for headers/JSON: whole seconds, -1 for "never". */
export function retryAfterWire(sec: number): number {
  return Number.isFinite(sec) ? Math.max(1, Math.ceil(sec)) : -1;
}
