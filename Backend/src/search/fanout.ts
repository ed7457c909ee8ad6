// src/search/fanout.ts
/**
 * Query fan-out + aggregation.
 *
 * One user query becomes a fixed list of variants, run one after another through
 * the injected pacing policy. A failing variant is logged and skipped; when every
 * variant fails the result is simply empty. The merged hits are then deduped,
 * spam-filtered, keyword-boosted, scored by overlap with the query and stably
 * sorted. Whole aggregated sets are cached per (mode, query, location); callers
 * asking for the same set at once share one fan-out.
 */

import { moduleLog, type Logger } from "../logger";
import { errorMessage } from "../errors";
import type { Limiter } from "../ops/rate-limit";
import { telemetry } from "../ops/telemetry";
import type { PacingPolicy } from "../shared/pacing";
import { cleanQuery, collapse, keywordMatcher, overlapCount, termSet } from "../shared/text";
import type { AppCache, CacheValue, SearchHit, Timeframe } from "../types";
import type { SearchProvider } from "./providers";

export type SearchMode = "supplier" | "market";

// ---------------- Vocabulary ----------------

export const SUPPLIER_KEYWORDS = [
  "supplier", "manufacturer", "vendor", "distributor", "company", "corporation", "inc", "llc",
  "ltd", "wholesale", "industrial", "factory", "producer", "exporter", "importer",
] as const;

export const MARKET_KEYWORDS = [
  "market", "price", "pricing", "cost", "analysis", "report", "trend", "forecast", "industry",
  "research", "data", "statistics", "survey", "outlook", "intelligence",
] as const;

export const SPAM_KEYWORDS = [
  "download", "free", "click here", "sign up", "register now", "limited time", "special offer",
  "discount", "sale", "wikipedia", "amazon.com", "ebay.com", "social media",
] as const;

const BOOST: Record<SearchMode, number> = { supplier: 0.2, market: 0.3 };

const isSpam = keywordMatcher(SPAM_KEYWORDS);
const hasVocabulary: Record<SearchMode, (text: string) => boolean> = {
  supplier: keywordMatcher(SUPPLIER_KEYWORDS),
  market: keywordMatcher(MARKET_KEYWORDS),
};

// ---------------- Variants ----------------

export function supplierQueries(query: string, location?: string): string[] {
  const q = cleanQuery(query);
  const loc = location?.trim() ? ` in ${location.trim()}` : "";
  return [
    `${q} suppliers manufacturers${loc}`,
    `${q} vendors distributors${loc}`,
    `certified ${q} companies${loc}`,
    `${q} industry directory${loc}`,
    `wholesale ${q} suppliers${loc}`,
  ];
}

export function marketQueries(product: string, timeframe: Timeframe, year = new Date().getFullYear()): string[] {
  const q = cleanQuery(product);
  return [
    `${q} market price ${year}`,
    `${q} pricing trends analysis ${timeframe}`,
    `${q} industry report market size`,
    `${q} cost analysis ${year}`,
    `${q} market forecast pricing`,
    `${q} supply chain costs`,
  ];
}

const SUGGESTION_SUFFIXES = ["suppliers", "manufacturers", "vendors", "distributors", "companies"];

export function suggestions(query: string, limit = 5): string[] {
  const q = collapse(query);
  if (!q) return [];
  return SUGGESTION_SUFFIXES.map((s) => `${q} ${s}`).slice(0, Math.max(0, limit));
}

// ---------------- Aggregation (pure) ----------------

function urlKey(url: string) {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}
function titleKey(title: string) {
  return collapse(title).toLowerCase();
}

/** First occurrence wins; a hit is a duplicate if its URL OR its title was already seen. */
export function dedupeHits(hits: readonly SearchHit[]): SearchHit[] {
  const urls = new Set<string>();
  const titles = new Set<string>();
  const out: SearchHit[] = [];
  for (const h of hits) {
    const u = urlKey(h.url);
    const t = titleKey(h.title);
    if ((u && urls.has(u)) || (t && titles.has(t))) continue;
    if (u) urls.add(u);
    if (t) titles.add(t);
    out.push(h);
  }
  return out;
}

export function hitText(h: SearchHit): string {
  return `${h.title} ${h.snippet} ${h.url}`;
}

export function isSpamHit(h: SearchHit): boolean {
  return isSpam(hitText(h));
}

export function keywordBoost(h: SearchHit, mode: SearchMode): number {
  return hasVocabulary[mode](`${h.title} ${h.snippet}`) ? BOOST[mode] : 0;
}

/** (title overlap * 0.3 + snippet overlap * 0.1) / |query terms|; 0 for an empty query. */
export function overlapScore(query: string, h: SearchHit): number {
  const q = termSet(query);
  if (!q.size) return 0;
  const title = overlapCount(q, termSet(h.title));
  const snippet = overlapCount(q, termSet(h.snippet));
  return (title * 0.3 + snippet * 0.1) / q.size;
}

export interface AggregateOptions {
  query: string;
  mode: SearchMode;
  maxResults?: number;
}

/** Provider score, plus the vocabulary boost, plus query overlap; each step capped at 1. */
export function rescore(h: SearchHit, opts: Pick<AggregateOptions, "query" | "mode">): number {
  const boosted = Math.min(1, h.relevanceScore + keywordBoost(h, opts.mode));
  return Math.min(1, boosted + overlapScore(opts.query, h));
}

/** Returns new hit objects; the input list is left as it was. */
export function aggregate(hits: readonly SearchHit[], opts: AggregateOptions): SearchHit[] {
  const scored = dedupeHits(hits)
    .filter((h) => !isSpamHit(h))
    .map((h, order) => ({ hit: { ...h, relevanceScore: rescore(h, opts) }, order }));
  // explicit tie-break keeps discovery order whatever the engine's sort does
  scored.sort((a, b) => b.hit.relevanceScore - a.hit.relevanceScore || a.order - b.order);
  const out = scored.map((s) => s.hit);
  return opts.maxResults === undefined ? out : out.slice(0, Math.max(0, opts.maxResults));
}

// ---------------- Aggregator service ----------------

export interface SearchAggregatorDeps {
  provider: SearchProvider;
  cache: AppCache;
  pacing: PacingPolicy;
  /** outbound admission; a denial counts as a failed variant */
  gate?: Limiter;
  ttlMs?: number;
  perQuery?: number;
  logger?: Logger;
}

export interface SearchOutcome {
  hits: SearchHit[];
  fromCache: boolean;
  variants: number;
  failedVariants: number;
  provider: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export class SearchAggregator {
  private readonly log: Logger;
  private readonly ttlMs: number;
  private readonly perQuery: number;

  constructor(private deps: SearchAggregatorDeps) {
    this.log = deps.logger ?? moduleLog("fanout");
    this.ttlMs = deps.ttlMs ?? 30 * 60_000;
    this.perQuery = deps.perQuery ?? 5;
  }

  get providerId(): string {
    return this.deps.provider.id;
  }

  searchSuppliers(query: string, location: string | undefined, maxResults: number, opts: RunOptions = {}): Promise<SearchOutcome> {
    const key = `search:supplier:${cleanQuery(query)}:${(location ?? "").trim().toLowerCase()}`;
    return this.run(key, supplierQueries(query, location), { query, mode: "supplier", maxResults }, this.perQuery, opts);
  }

  searchMarket(product: string, timeframe: Timeframe, opts: RunOptions = {}): Promise<SearchOutcome> {
    const key = `search:market:${cleanQuery(product)}:${timeframe}`;
    return this.run(key, marketQueries(product, timeframe), { query: product, mode: "market" }, this.perQuery, opts);
  }

  /** Single query, no variants; used for targeted follow-up searches. */
  searchGeneral(query: string, maxResults: number, mode: SearchMode = "market", opts: RunOptions = {}): Promise<SearchOutcome> {
    const key = `search:general:${cleanQuery(query)}:${maxResults}`;
    return this.run(key, [query], { query, mode, maxResults }, maxResults, opts);
  }

  private async run(
    cacheKey: string,
    variants: string[],
    agg: AggregateOptions,
    perQuery: number,
    opts: RunOptions,
  ): Promise<SearchOutcome> {
    const truncate = (hits: SearchHit[]) => (agg.maxResults === undefined ? hits : hits.slice(0, agg.maxResults));
    const base = { variants: variants.length, provider: this.deps.provider.id };
    const fresh = { ran: false, failed: 0 };

    const value = await this.deps.cache.getOrSet(
      cacheKey,
      async (): Promise<CacheValue> => {
        const { hits, failed } = await this.fanOut(variants, perQuery, opts.signal);
        const all = aggregate(hits, { query: agg.query, mode: agg.mode });
        fresh.ran = true;
        fresh.failed = failed;
        this.log.debug({ key: cacheKey, raw: hits.length, kept: all.length, failed }, "fan-out complete");
        return { kind: "search", hits: all };
      },
      // an all-failed run is not worth remembering
      { ttlMs: this.ttlMs, storeIf: () => fresh.failed < variants.length, signal: opts.signal },
    );

    const hits = value.kind === "search" ? value.hits : [];
    return { ...base, hits: truncate(hits), fromCache: !fresh.ran, failedVariants: fresh.failed };
  }

  private async fanOut(variants: string[], perQuery: number, signal?: AbortSignal) {
    const counter = telemetry.counter("search_queries_total", { help: "Search variant calls", labelNames: ["outcome"] });
    const hits: SearchHit[] = [];
    let failed = 0;

    for (const [i, variant] of variants.entries()) {
      await this.deps.pacing.wait(i, signal);

      const admission = this.deps.gate?.check("search");
      if (admission && !admission.allowed) {
        failed++;
        counter.inc(1, { outcome: "rate_limited" });
        this.log.warn({ variant, retryAfterSec: admission.retryAfterSec }, "search gate closed; skipping variant");
        continue;
      }

      try {
        const page = await this.deps.provider.search(variant, perQuery, { signal });
        hits.push(...page);
        counter.inc(1, { outcome: "ok" });
      } catch (err) {
        if (signal?.aborted) throw err;
        failed++;
        counter.inc(1, { outcome: "error" });
        this.log.warn({ variant, err: errorMessage(err) }, "search variant failed; continuing");
      }
    }
    return { hits, failed };
  }
}
