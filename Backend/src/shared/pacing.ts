// src/shared/pacing.ts
/**
 * Pacing policies for outbound call series (search variants, enrichment batches).
 * A policy is injected where the series runs, so tests can swap in `noPacing`.
 */

export interface PacingPolicy {
  readonly name: string;
  /** Resolves when call number `index` (0-based) of a series may start. */
  wait(index: number, signal?: AbortSignal): Promise<void>;
}

export function abortReason(signal: AbortSignal): Error {
  const r: unknown = signal.reason;
  if (r instanceof Error) return r;
  const err = new Error(typeof r === "string" ? r : "Aborted");
  err.name = "AbortError";
  return err;
}

/** setTimeout as a promise; rejects with the abort reason if the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(t);
      if (signal) reject(abortReason(signal));
    };
    const t = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Fixed gap between consecutive calls; the first call goes immediately. */
export class FixedDelayPacing implements PacingPolicy {
  readonly name = "fixed";
  constructor(readonly delayMs: number) {}

  wait(index: number, signal?: AbortSignal): Promise<void> {
    return sleep(index === 0 ? 0 : this.delayMs, signal);
  }
}

/**
 * Leaky bucket: calls drain at `ratePerSec`, spaced evenly, across every series
 * that shares the instance.
 */
export class LeakyBucketPacing implements PacingPolicy {
  readonly name = "leaky-bucket";
  private nextSlot = 0;
  private readonly gapMs: number;

  constructor(ratePerSec: number, private now: () => number = Date.now) {
    this.gapMs = ratePerSec > 0 ? 1000 / ratePerSec : 0;
  }

  wait(_index: number, signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.gapMs;
    return sleep(slot - now, signal);
  }
}

export type PacingKind = "fixed" | "leaky-bucket";

/**
 * Policy for a configured kind. A leaky bucket drains at one call per `delayMs`
 * and is meant to be shared by every series it should space.
 */
export function pacingFor(kind: PacingKind, delayMs: number): PacingPolicy {
  if (kind === "leaky-bucket") return new LeakyBucketPacing(delayMs > 0 ? 1000 / delayMs : 0);
  return new FixedDelayPacing(delayMs);
}

export const noPacing: PacingPolicy = {
  name: "none",
  wait: (_index, signal) => sleep(0, signal),
};
