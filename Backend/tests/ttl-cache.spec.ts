// tests/ttl-cache.spec.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { TtlCache } from "../src/shared/ttl-cache";

function clocked(start = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("TtlCache: expiry", () => {
  it("returns a value before its TTL and a miss after it", () => {
    const clock = clocked();
    const cache = new TtlCache<string>({ now: clock.now });

    cache.set("short", "a", 1000);
    cache.set("long", "b", 100_000);
    expect(cache.get("long")).toBe("b");

    clock.advance(1100);
    expect(cache.get("short")).toBeUndefined();
    expect(cache.get("long")).toBe("b");
    expect(cache.stats()).toEqual({ entries: 1, hits: 2, misses: 1, errors: 0, sweeps: 0, expired: 1 });
  });

  it("treats the expiry instant itself as expired", () => {
    const clock = clocked();
    const cache = new TtlCache<number>({ now: clock.now });
    cache.set("k", 1, 500);
    clock.advance(500);
    expect(cache.get("k")).toBeUndefined();
  });

  it("overwrites wholesale and resets the TTL on re-set", () => {
    const clock = clocked();
    const cache = new TtlCache<string>({ now: clock.now });
    cache.set("k", "old", 1000);
    clock.advance(900);
    cache.set("k", "new", 1000);
    clock.advance(900);
    expect(cache.get("k")).toBe("new");
  });

  it("stores nothing for a non-positive TTL and drops the previous entry", () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    cache.set("k", "kept", 1000);
    cache.set("k", "ignored", 0);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.stats().entries).toBe(0);
  });

  it("uses the default TTL when none is given", () => {
    const clock = clocked();
    const cache = new TtlCache<string>({ now: clock.now, defaultTtlMs: 2000 });
    cache.set("k", "v");
    clock.advance(1999);
    expect(cache.get("k")).toBe("v");
    clock.advance(1);
    expect(cache.get("k")).toBeUndefined();
  });

  it("sweep removes only expired entries", () => {
    const clock = clocked();
    const cache = new TtlCache<string>({ now: clock.now });
    cache.set("a", "1", 100);
    cache.set("b", "2", 1000);
    clock.advance(500);

    expect(cache.sweep()).toBe(1);
    expect(cache.stats()).toMatchObject({ entries: 1, sweeps: 1, expired: 1 });
    expect(cache.get("b")).toBe("2");
  });

  it("clear and delete drop entries", () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    cache.set("a", "1", 100);
    cache.set("b", "2", 100);
    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.stats().entries).toBe(0);
  });
});

describe("TtlCache: getOrSet", () => {
  it("shares one factory call between concurrent callers", async () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    let calls = 0;
    const factory = async () => {
      calls++;
      return "computed";
    };

    const [a, b] = await Promise.all([cache.getOrSet("k", factory, { ttlMs: 1000 }), cache.getOrSet("k", factory, { ttlMs: 1000 })]);
    expect(a).toBe("computed");
    expect(b).toBe("computed");
    expect(calls).toBe(1);
    expect(cache.get("k")).toBe("computed");
  });

  it("passes a factory rejection to every waiter and stores nothing", async () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls++;
      throw new Error("upstream down");
    };

    const results = await Promise.allSettled([cache.getOrSet("k", failing), cache.getOrSet("k", failing)]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
    expect(calls).toBe(1);
    expect(cache.get("k")).toBeUndefined();

    await expect(cache.getOrSet("k", () => "second try")).resolves.toBe("second try");
  });

  it("returns a value the predicate refuses without storing it", async () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    const storeIf = (v: string) => v !== "fallback";

    await expect(cache.getOrSet("k", () => "fallback", { storeIf })).resolves.toBe("fallback");
    expect(cache.stats().entries).toBe(0);
    await expect(cache.getOrSet("k", () => "real", { storeIf })).resolves.toBe("real");
    expect(cache.get("k")).toBe("real");
  });

  it("starts a fresh run for a live caller when the shared run rejects", async () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    const owner = cache.getOrSet("k", async () => {
      throw new Error("owner aborted");
    });
    const waiter = cache.getOrSet("k", () => "own run", { signal: new AbortController().signal });

    await expect(owner).rejects.toThrow("owner aborted");
    await expect(waiter).resolves.toBe("own run");
    expect(cache.get("k")).toBe("own run");
  });

  it("counts a failing read and recomputes", async () => {
    class BrokenRead extends TtlCache<string> {
      get(): string | undefined {
        throw new Error("corrupt");
      }
    }
    const cache = new BrokenRead({ now: () => 0 });
    await expect(cache.getOrSet("k", () => "fresh")).resolves.toBe("fresh");
    expect(cache.stats()).toMatchObject({ errors: 1, entries: 1 });
  });

  it("returns the cached value without calling the factory", async () => {
    const cache = new TtlCache<string>({ now: () => 0 });
    cache.set("k", "cached", 1000);
    const factory = vi.fn(() => "fresh");
    await expect(cache.getOrSet("k", factory)).resolves.toBe("cached");
    expect(factory).not.toHaveBeenCalled();
  });
});

describe("TtlCache: background sweeper", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("sweeps on its interval until stopped", () => {
    vi.useFakeTimers();
    const cache = new TtlCache<string>({ now: () => Date.now() });
    cache.set("k", "v", 1000);

    cache.startSweeper(5000);
    expect(cache.sweeping).toBe(true);
    vi.advanceTimersByTime(5000);
    expect(cache.stats()).toMatchObject({ entries: 0, sweeps: 1, expired: 1 });

    cache.stop();
    expect(cache.sweeping).toBe(false);
    vi.advanceTimersByTime(20_000);
    expect(cache.stats().sweeps).toBe(1);
  });

  it("keeps running after a failed cycle and backs off up to 8x", () => {
    vi.useFakeTimers();
    let broken = false;
    const cache = new TtlCache<string>({
      now: () => {
        if (broken) throw new Error("clock unavailable");
        return Date.now();
      },
    });

    cache.startSweeper(1000);
    broken = true;

    vi.advanceTimersByTime(1000);
    expect(cache.stats().errors).toBe(1);
    expect(cache.nextDelay()).toBe(2000);

    vi.advanceTimersByTime(1000);
    expect(cache.stats().errors).toBe(1);
    vi.advanceTimersByTime(1000);
    expect(cache.stats().errors).toBe(2);
    expect(cache.nextDelay()).toBe(4000);

    vi.advanceTimersByTime(4000);
    expect(cache.nextDelay()).toBe(8000);
    vi.advanceTimersByTime(8000);
    expect(cache.stats().errors).toBe(4);
    expect(cache.nextDelay()).toBe(8000);

    broken = false;
    vi.advanceTimersByTime(8000);
    expect(cache.stats()).toMatchObject({ errors: 4, sweeps: 1 });
    expect(cache.nextDelay()).toBe(1000);
    cache.stop();
  });
});
