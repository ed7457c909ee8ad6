// src/market/market-intel.ts
/**
 * Market intelligence run:
 *   market fan-out -> follow-up searches -> competitors / trend signals
 *   -> model synthesis (fallback on failure) -> forecast.
 *
 * Search and model failures degrade the report instead of failing it; only a
 * timeout or caller abort rejects.
 */

import { CacheFailure, DiscoveryTimeout } from "../errors";
import { moduleLog, type Logger } from "../logger";
import { telemetry } from "../ops/telemetry";
import { scopedSignal } from "../shared/abort";
import { abortReason, noPacing, type PacingPolicy } from "../shared/pacing";
import { cleanQuery } from "../shared/text";
import { firstJsonObject } from "../enrichment/json";
import type { ProviderChain } from "../enrichment/provider-chain";
import type { SearchAggregator } from "../search/fanout";
import type { AppCache, CacheValue, SearchHit, Timeframe } from "../types";
import { analyzeTrends, buildForecast, buildLandscape, classifyDataType, fallbackIntelligence } from "./analysis";
import { marketPrompt } from "./prompts";
import { toIntelligence } from "./schema";
import type { MarketDataPoint, MarketIntelligence, MarketReport, MarketRequest, TrendSummary } from "./types";

export const FOLLOW_UP_RESULTS = 3;
export const COMPETITOR_RESULTS = 5;

export function followUpQueries(product: string, region?: string): string[] {
  const out = [
    `${product} supply chain analysis`,
    `${product} raw material costs`,
    `${product} demand forecast`,
    `${product} industry challenges`,
    `${product} regulatory impact`,
  ];
  const r = region?.trim();
  if (r) out.push(`${product} ${r} market analysis`, `${product} ${r} suppliers`);
  return out;
}

export function competitorQueries(product: string): string[] {
  return [`${product} market leaders`, `${product} top companies`, `${product} competitive analysis`, `${product} market share`];
}

export function marketCacheKey(req: MarketRequest): string {
  const region = req.region?.trim().toLowerCase() || "global";
  const flags = `${req.includeCompetitors ? "c" : ""}${req.includeTrends ? "t" : ""}` || "-";
  return `market:${cleanQuery(req.product)}:${req.timeframe}:${region}:${flags}`;
}

function toDataPoint(h: SearchHit, dataType = classifyDataType(h.title, h.snippet), query?: string): MarketDataPoint {
  return {
    title: h.title,
    content: h.snippet,
    source: h.source,
    url: h.url,
    relevance: h.relevanceScore,
    dataType,
    ...(query ? { query } : {}),
  };
}

export interface MarketIntelDeps {
  search: SearchAggregator;
  chain: ProviderChain;
  cache: AppCache;
  /** spacing between follow-up searches */
  pacing?: PacingPolicy;
  ttlMs?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export class MarketIntelService {
  private readonly log: Logger;
  private readonly pacing: PacingPolicy;

  constructor(private deps: MarketIntelDeps) {
    this.log = deps.logger ?? moduleLog("market");
    this.pacing = deps.pacing ?? noPacing;
  }

  async analyze(req: MarketRequest, opts: { signal?: AbortSignal } = {}): Promise<MarketReport> {
    const value = await this.deps.cache.getOrSet(
      marketCacheKey(req),
      async (): Promise<CacheValue> => ({ kind: "market", report: await this.build(req, opts.signal) }),
      {
        ttlMs: this.deps.ttlMs ?? 2 * 60 * 60_000,
        storeIf: (v) => v.kind === "market" && v.report.marketIntelligence.source !== "fallback",
        signal: opts.signal,
      },
    );
    if (value.kind !== "market") throw new CacheFailure(`unexpected ${value.kind} entry for market report`);
    return value.report;
  }

  private async build(req: MarketRequest, parent?: AbortSignal): Promise<MarketReport> {
    const timeoutMs = this.deps.timeoutMs ?? 60_000;
    const started = performance.now();
    const scope = scopedSignal(parent, timeoutMs);
    const signal = scope.signal;

    try {
      const market = await this.deps.search.searchMarket(req.product, req.timeframe, { signal });
      const points = market.hits.map((h) => toDataPoint(h));

      // indexes run on from the market fan-out, so the first follow-up is spaced too
      const queries = followUpQueries(req.product, req.region);
      const followUps = await this.sequence(queries, FOLLOW_UP_RESULTS, signal, 1);
      for (const { query, hits } of followUps) {
        points.push(...hits.map((h) => toDataPoint(h, "enrichment", query)));
      }

      let landscape: MarketReport["competitiveLandscape"] = null;
      if (req.includeCompetitors) {
        const found = await this.sequence(competitorQueries(req.product), COMPETITOR_RESULTS, signal, 1 + queries.length);
        landscape = buildLandscape(found.flatMap((f) => f.hits.map((h) => ({ title: h.title, content: h.snippet }))));
      }

      const trends: TrendSummary | null = req.includeTrends ? analyzeTrends(points) : null;

      const intel = await this.synthesize(req.product, points, signal);
      if (landscape?.keyPlayers.length) intel.keyPlayers = [...landscape.keyPlayers];

      const report: MarketReport = {
        marketIntelligence: intel,
        competitiveLandscape: landscape,
        trends,
        forecast: buildForecast(intel, req.timeframe),
        dataPoints: points.length,
        processingTime: Math.round(performance.now() - started) / 1000,
      };

      telemetry.counter("market_reports_total", { help: "Market reports built", labelNames: ["source"] }).inc(1, {
        source: intel.source === "fallback" ? "fallback" : "provider",
      });
      this.log.info({ product: req.product, points: points.length, source: intel.source }, "market report built");
      return report;
    } catch (err) {
      if (scope.timedOut) {
        this.log.warn({ product: req.product, timeoutMs }, "market analysis timed out");
        throw new DiscoveryTimeout(timeoutMs);
      }
      throw err;
    } finally {
      scope.dispose();
    }
  }

  /** Trend signals from the market fan-out alone. */
  async trends(product: string, timeframe: Timeframe, opts: { signal?: AbortSignal } = {}): Promise<TrendSummary> {
    const market = await this.deps.search.searchMarket(product, timeframe, opts);
    return analyzeTrends(market.hits.map((h) => ({ title: h.title, content: h.snippet })));
  }

  private async sequence(queries: string[], maxResults: number, signal: AbortSignal, firstIndex: number) {
    const out: Array<{ query: string; hits: SearchHit[] }> = [];
    for (const [i, query] of queries.entries()) {
      await this.pacing.wait(firstIndex + i, signal);
      const res = await this.deps.search.searchGeneral(query, maxResults, "market", { signal });
      out.push({ query, hits: res.hits });
    }
    return out;
  }

  private async synthesize(product: string, points: MarketDataPoint[], signal: AbortSignal): Promise<MarketIntelligence> {
    const res = await this.deps.chain.complete(marketPrompt(product, points), { signal });
    if (signal.aborted) throw abortReason(signal);
    if (!res.ok) {
      this.log.warn({ product, errors: res.errors }, "market synthesis failed; using fallback");
      return fallbackIntelligence(product);
    }
    return toIntelligence(product, firstJsonObject(res.text), res.provider);
  }
}
