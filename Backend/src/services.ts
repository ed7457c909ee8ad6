// src/services.ts
// Process wiring: one cache, the limiter registry, providers and the services built on them.

import type { AppConfig } from "./config";
import { moduleLog } from "./logger";
import { AdaptiveLimiter, LimiterRegistry, SlidingWindowLimiter, TokenBucketLimiter } from "./ops/rate-limit";
import { SupplierDiscoveryService } from "./discovery/supplier-discovery";
import { buildProviders } from "./enrichment/llm-providers";
import { EnrichmentOrchestrator } from "./enrichment/orchestrator";
import { ProviderChain } from "./enrichment/provider-chain";
import { MarketIntelService } from "./market/market-intel";
import { SearchAggregator } from "./search/fanout";
import { getSearchProvider } from "./search/providers";
import { FixedDelayPacing, pacingFor } from "./shared/pacing";
import { TtlCache } from "./shared/ttl-cache";
import type { AppCache, CacheValue } from "./types";

export interface Services {
  cache: AppCache;
  limiters: LimiterRegistry;
  endpointLimits: { discover: SlidingWindowLimiter; market: SlidingWindowLimiter; lookup: SlidingWindowLimiter };
  search: SearchAggregator;
  chain: ProviderChain;
  discovery: SupplierDiscoveryService;
  market: MarketIntelService;
}

export function buildServices(cfg: AppConfig): Services {
  const cache: AppCache = new TtlCache<CacheValue>({ defaultTtlMs: cfg.cache.searchTtlMs, logger: moduleLog("cache") });

  const limiters = new LimiterRegistry();
  const endpointLimits = {
    discover: limiters.register("discover", new SlidingWindowLimiter(cfg.limits.discover)),
    market: limiters.register("market", new SlidingWindowLimiter(cfg.limits.market)),
    lookup: limiters.register("lookup", new SlidingWindowLimiter(cfg.limits.lookup)),
  };
  const searchGate = limiters.register("outbound-search", new TokenBucketLimiter(cfg.outbound.search));
  const llmGate = limiters.register("outbound-llm", new AdaptiveLimiter(cfg.outbound.llm));

  const searchPacing = pacingFor(cfg.search.pacing, cfg.search.delayMs);
  const search = new SearchAggregator({
    provider: getSearchProvider(cfg),
    cache,
    pacing: searchPacing,
    gate: searchGate,
    ttlMs: cfg.cache.searchTtlMs,
    perQuery: cfg.search.perQuery,
  });

  const chain = new ProviderChain(buildProviders(cfg), { gate: llmGate });

  const enrichment = new EnrichmentOrchestrator({
    chain,
    cache,
    pacing: new FixedDelayPacing(cfg.enrichment.batchDelayMs),
    batchSize: cfg.enrichment.batchSize,
    ttlMs: cfg.cache.supplierTtlMs,
  });

  const discovery = new SupplierDiscoveryService({
    search,
    enrichment,
    timeoutMs: cfg.discovery.timeoutMs,
    defaultMaxResults: cfg.discovery.defaultMaxResults,
  });

  const market = new MarketIntelService({
    search,
    chain,
    cache,
    pacing: searchPacing,
    ttlMs: cfg.cache.marketTtlMs,
    timeoutMs: cfg.discovery.timeoutMs,
  });

  return { cache, limiters, endpointLimits, search, chain, discovery, market };
}
