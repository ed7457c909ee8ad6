// tests/routes.spec.ts
import { describe, expect, it } from "vitest";
import { loadConfig, summarizeConfig } from "../src/config";
import { SupplierDiscoveryService } from "../src/discovery/supplier-discovery";
import { EnrichmentOrchestrator } from "../src/enrichment/orchestrator";
import { ProviderChain } from "../src/enrichment/provider-chain";
import { DiscoveryTimeout, RateLimitExceeded, ValidationFailure } from "../src/errors";
import { MarketIntelService } from "../src/market/market-intel";
import { toErrorResponse } from "../src/middleware/errors";
import { LimiterRegistry, SlidingWindowLimiter } from "../src/ops/rate-limit";
import { Telemetry } from "../src/ops/telemetry";
import { clearCache, healthStatus, metricsText, readiness } from "../src/routes/health";
import { handleIntelligence, handleTrends } from "../src/routes/market";
import { handleDiscover, handleSuggestions } from "../src/routes/suppliers";
import { DiscoverBody } from "../src/routes/validation";
import { SearchAggregator } from "../src/search/fanout";
import { noPacing } from "../src/shared/pacing";
import { StubLlmProvider, StubSearchProvider, hit, newCache } from "./helpers/stubs";

function deps() {
  const cache = newCache();
  const search = new SearchAggregator({
    provider: new StubSearchProvider({}, [hit("Lone Star Steel Supply - Houston, TX", "https://lonestarsteel.com/", "Industrial steel distributor based in Houston, TX.")]),
    cache,
    pacing: noPacing,
  });
  const chain = new ProviderChain([new StubLlmProvider("groq", ['{"confidence_score": 0.8}'])]);
  return {
    cache,
    discovery: new SupplierDiscoveryService({
      search,
      enrichment: new EnrichmentOrchestrator({ chain, cache, pacing: noPacing }),
    }),
    market: new MarketIntelService({ search, chain, cache, pacing: noPacing }),
  };
}

describe("request validation", () => {
  it("applies defaults to a discovery body", () => {
    expect(DiscoverBody.parse({ product: "  steel pipe " })).toEqual({
      product: "steel pipe",
      requirements: [],
      certifications: [],
      maxResults: 10,
    });
  });

  it("rejects out-of-range fields with their paths", async () => {
    const err = await handleDiscover({ product: "ab", maxResults: 51, minRating: 0 }, deps()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationFailure);
    const { status, body } = toErrorResponse(err);
    expect(status).toBe(400);
    expect(body).toMatchObject({ ok: false, error: "INVALID_REQUEST", code: "VALID_001" });
    expect(err instanceof ValidationFailure ? err.issues.map((i) => i.path) : []).toEqual(["product", "minRating", "maxResults"]);
  });

  it("caps requirement lists at ten entries", async () => {
    const requirements = Array.from({ length: 11 }, (_, i) => `req ${i}`);
    await expect(handleDiscover({ product: "steel pipe", requirements }, deps())).rejects.toBeInstanceOf(ValidationFailure);
  });
});

describe("supplier handlers", () => {
  it("runs discovery and wraps the response", async () => {
    const { status, body } = await handleDiscover({ product: "steel pipe", maxResults: 5 }, deps());
    expect(status).toBe(200);
    expect(body).toMatchObject({ ok: true, totalFound: 1, searchQuery: "steel pipe", locationFilter: null, dataSources: ["stub-search", "groq"] });
  });

  it("suggests queries with a coerced limit", () => {
    expect(handleSuggestions({ query: "steel pipe", limit: "2" })).toEqual({
      status: 200,
      body: { ok: true, query: "steel pipe", suggestions: ["steel pipe suppliers", "steel pipe manufacturers"] },
    });
    expect(() => handleSuggestions({})).toThrow(ValidationFailure);
  });
});

describe("market handlers", () => {
  it("defaults the timeframe and flags", async () => {
    const { status, body } = await handleIntelligence({ product: "steel" }, deps());
    expect(status).toBe(200);
    expect(body).toMatchObject({ ok: true, product: "steel", timeframe: "6months", forecast: { timeframe: "6months" } });
  });

  it("rejects an unknown timeframe", async () => {
    await expect(handleTrends({ product: "steel", timeframe: "2weeks" }, deps())).rejects.toBeInstanceOf(ValidationFailure);
  });
});

describe("error responses", () => {
  it("maps rate limits, timeouts and unknown errors", () => {
    expect(toErrorResponse(new RateLimitExceeded(10, 60, 12.5))).toEqual({
      status: 429,
      body: {
        ok: false,
        error: "RATE_LIMITED",
        code: "RATE_001",
        message: "Rate limit exceeded",
        limit: 10,
        windowSec: 60,
        retryAfterSec: 13,
      },
    });
    expect(toErrorResponse(new DiscoveryTimeout(60_000))).toEqual({
      status: 504,
      body: { ok: false, error: "DiscoveryTimeout", code: "TIMEOUT_001", message: "Request did not complete within 60000ms" },
    });
    expect(toErrorResponse(new Error("boom"))).toEqual({
      status: 500,
      body: { ok: false, error: "internal_error", code: "INTERNAL", message: "Internal Server Error" },
    });
  });
});

describe("health", () => {
  function healthDeps() {
    const cache = newCache();
    const limiters = new LimiterRegistry();
    limiters.register("discover", new SlidingWindowLimiter({ maxRequests: 10, windowSec: 60 }, () => 0)).check("1.2.3.4:discover");
    return {
      cache,
      limiters,
      metrics: new Telemetry(),
      configSummary: summarizeConfig({ ...loadConfig(), env: "test" }),
      startedAt: Date.parse("2025-01-01T00:00:00Z"),
      now: () => Date.parse("2025-01-01T00:01:30Z"),
    };
  }

  it("reports uptime, cache stats and limiter occupancy", () => {
    const d = healthDeps();
    d.cache.set("search:supplier:steel:", { kind: "search", hits: [] }, 1000);
    const { status, body } = healthStatus(d);
    expect(status).toBe(200);
    expect(body).toMatchObject({
      ok: true,
      uptimeSec: 90,
      startedAtIso: "2025-01-01T00:00:00.000Z",
      cache: { entries: 1 },
      limiters: { discover: { kind: "sliding-window", keys: [{ key: "1.2.3.4:discover", used: 1, limit: 10 }] } },
    });
  });

  it("is ready only while the cache sweeper runs", () => {
    const d = healthDeps();
    expect(readiness(d).status).toBe(503);
    d.cache.startSweeper(60_000);
    expect(readiness(d).status).toBe(200);
    d.cache.stop();
  });

  it("clears the cache and exposes gauges as Prometheus text", () => {
    const d = healthDeps();
    d.cache.set("a", { kind: "search", hits: [] }, 1000);
    expect(metricsText(d)).toContain('cache_stat{stat="entries"} 1');
    expect(clearCache(d)).toEqual({ status: 200, body: { ok: true, cleared: 1 } });
    expect(metricsText(d)).toContain('cache_stat{stat="entries"} 0');
  });

  it("summarizes configuration without key values", () => {
    const summary = summarizeConfig({ ...loadConfig(), providers: { groq: "test-secret" } });
    expect(summary.llm).toEqual({ groq: true, openai: false, gemini: false });
    expect(JSON.stringify(summary)).not.toContain("test-secret");
  });
});
