// tests/pacing.spec.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { FixedDelayPacing, LeakyBucketPacing, noPacing, pacingFor, sleep } from "../src/shared/pacing";
import { loadConfig } from "../src/config";
import { scopedSignal } from "../src/shared/abort";

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllEnvs();
});

describe("pacing policies", () => {
  it("fixed delay lets the first call through and spaces the rest", async () => {
    vi.useFakeTimers();
    const pacing = new FixedDelayPacing(1000);
    let done = false;

    await pacing.wait(0);
    const second = pacing.wait(1).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await second;
    expect(done).toBe(true);
  });

  it("leaky bucket spaces calls evenly across callers sharing it", async () => {
    vi.useFakeTimers();
    const pacing = new LeakyBucketPacing(2, () => Date.now());
    const started: number[] = [];
    const t0 = Date.now();

    const all = [0, 1, 2].map((i) => pacing.wait(i).then(() => started.push(Date.now() - t0)));
    await vi.advanceTimersByTimeAsync(1000);
    await Promise.all(all);
    expect(started).toEqual([0, 500, 1000]);
  });

  it("rejects a pending wait when the signal aborts", async () => {
    vi.useFakeTimers();
    const ctrl = new AbortController();
    const waiting = new FixedDelayPacing(5000).wait(1, ctrl.signal);
    ctrl.abort(new Error("caller gone"));
    await expect(waiting).rejects.toThrow("caller gone");
  });

  it("noPacing never waits but still honours an aborted signal", async () => {
    await expect(noPacing.wait(3)).resolves.toBeUndefined();
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(noPacing.wait(0, ctrl.signal)).rejects.toThrow();
  });

  it("sleep with a string reason rejects as an AbortError", async () => {
    const ctrl = new AbortController();
    ctrl.abort("stop");
    await expect(sleep(10, ctrl.signal)).rejects.toMatchObject({ name: "AbortError", message: "stop" });
  });
});

describe("scopedSignal", () => {
  it("fires with a TimeoutError after the deadline and marks timedOut", async () => {
    vi.useFakeTimers();
    const scope = scopedSignal(undefined, 100);
    expect(scope.signal.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(100);
    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut).toBe(true);
    expect(scope.signal.reason).toMatchObject({ name: "TimeoutError" });
    scope.dispose();
  });

  it("follows the parent without counting as a timeout", () => {
    const parent = new AbortController();
    const scope = scopedSignal(parent.signal, 10_000);
    parent.abort(new Error("parent"));
    expect(scope.signal.aborted).toBe(true);
    expect(scope.timedOut).toBe(false);
    scope.dispose();
  });
});

describe("pacingFor", () => {
  it("builds the configured policy", () => {
    expect(pacingFor("fixed", 250)).toBeInstanceOf(FixedDelayPacing);
    expect(pacingFor("leaky-bucket", 250).name).toBe("leaky-bucket");
  });

  it("drains a shared leaky bucket at one call per delay across series", async () => {
    vi.useFakeTimers();
    const pacing = pacingFor("leaky-bucket", 1000);
    const started: number[] = [];
    const t0 = Date.now();

    // two series both starting at index 0 still queue behind each other
    const all = [pacing.wait(0), pacing.wait(0), pacing.wait(1)].map((p) => p.then(() => started.push(Date.now() - t0)));
    await vi.advanceTimersByTimeAsync(2000);
    await Promise.all(all);
    expect(started).toEqual([0, 1000, 2000]);
  });

  it("reads the search pacing from SEARCH_PACING, defaulting to fixed", () => {
    vi.stubEnv("SEARCH_PACING", "leaky-bucket");
    expect(loadConfig().search.pacing).toBe("leaky-bucket");
    vi.stubEnv("SEARCH_PACING", "bursty");
    expect(loadConfig().search.pacing).toBe("fixed");
  });
});
