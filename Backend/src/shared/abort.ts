// src/shared/abort.ts
// Signal plumbing: a child signal that fires on the parent's abort or after a deadline.

export interface ScopedSignal {
  signal: AbortSignal;
  /** true once the deadline (not the parent) fired */
  readonly timedOut: boolean;
  dispose(): void;
}

export function scopedSignal(parent: AbortSignal | undefined, timeoutMs?: number): ScopedSignal {
  const ctrl = new AbortController();
  let timedOut = false;

  const onParent = () => ctrl.abort(parent?.reason);
  if (parent?.aborted) ctrl.abort(parent.reason);
  else parent?.addEventListener("abort", onParent, { once: true });

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined && timeoutMs > 0 && !ctrl.signal.aborted) {
    timer = setTimeout(() => {
      timedOut = true;
      const err = new Error(`Timed out after ${timeoutMs}ms`);
      err.name = "TimeoutError";
      ctrl.abort(err);
    }, timeoutMs);
    timer.unref?.();
  }

  return {
    signal: ctrl.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParent);
    },
  };
}
