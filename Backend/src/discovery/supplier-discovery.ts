// src/discovery/supplier-discovery.ts
/**
 * End-to-end supplier discovery:
 *   fan-out search -> candidate extraction -> enrichment -> ranking -> top N.
 *
 * The whole run sits under one deadline. When it fires (or the caller aborts)
 * the signal reaches every in-flight provider call and pacing sleep, the
 * current batch is awaited, and the run rejects with DiscoveryTimeout.
 */

import { DiscoveryTimeout } from "../errors";
import { moduleLog, type Logger } from "../logger";
import { telemetry } from "../ops/telemetry";
import { scopedSignal } from "../shared/abort";
import { extractCandidates } from "../extraction/candidate";
import type { EnrichmentOrchestrator } from "../enrichment/orchestrator";
import type { SearchAggregator } from "../search/fanout";
import { rankSuppliers } from "../scoring/ranking";
import type { ScoredSupplier } from "../types";

export interface DiscoveryRequest {
  product: string;
  location?: string;
  requirements?: string[];
  certifications?: string[];
  minRating?: number;
  maxResults?: number;
}

export interface DiscoveryResponse {
  suppliers: ScoredSupplier[];
  totalFound: number;
  searchQuery: string;
  locationFilter: string | null;
  /** seconds */
  processingTime: number;
  dataSources: string[];
}

export interface DiscoveryDeps {
  search: SearchAggregator;
  enrichment: EnrichmentOrchestrator;
  timeoutMs?: number;
  defaultMaxResults?: number;
  logger?: Logger;
}

/** Over-fetch so filtering still leaves enough to fill the page. */
const SEARCH_FACTOR = 2;

export class SupplierDiscoveryService {
  private readonly log: Logger;

  constructor(private deps: DiscoveryDeps) {
    this.log = deps.logger ?? moduleLog("discovery");
  }

  async discover(req: DiscoveryRequest, opts: { signal?: AbortSignal } = {}): Promise<DiscoveryResponse> {
    const timeoutMs = this.deps.timeoutMs ?? 60_000;
    const maxResults = req.maxResults ?? this.deps.defaultMaxResults ?? 10;
    const started = performance.now();
    const latency = telemetry.histogram("discovery_duration_ms", { help: "Supplier discovery latency", labelNames: ["outcome"] });
    const scope = scopedSignal(opts.signal, timeoutMs);

    try {
      const search = await this.deps.search.searchSuppliers(req.product, req.location, maxResults * SEARCH_FACTOR, {
        signal: scope.signal,
      });
      const candidates = extractCandidates(search.hits, req.location);

      const enriched = await this.deps.enrichment.enrichAll(
        candidates,
        { product: req.product, requirements: req.requirements ?? [] },
        { signal: scope.signal },
      );

      const ranked = rankSuppliers(enriched.suppliers, {
        location: req.location,
        minRating: req.minRating,
        certifications: req.certifications,
        requirements: req.requirements,
        product: req.product,
      });

      const sources = [search.provider, ...enriched.providers];
      if (enriched.fallbacks) sources.push("fallback");
      const elapsedMs = performance.now() - started;
      latency.observe(elapsedMs, { outcome: "ok" });
      this.log.info(
        {
          product: req.product,
          hits: search.hits.length,
          candidates: candidates.length,
          ranked: ranked.length,
          fallbacks: enriched.fallbacks,
          ms: Math.round(elapsedMs),
        },
        "discovery complete",
      );

      return {
        suppliers: ranked.slice(0, maxResults),
        totalFound: ranked.length,
        searchQuery: req.product,
        locationFilter: req.location?.trim() || null,
        processingTime: Math.round(elapsedMs) / 1000,
        dataSources: [...new Set(sources)],
      };
    } catch (err) {
      if (scope.timedOut) {
        latency.observe(performance.now() - started, { outcome: "timeout" });
        this.log.warn({ product: req.product, timeoutMs }, "discovery timed out");
        throw new DiscoveryTimeout(timeoutMs);
      }
      throw err;
    } finally {
      scope.dispose();
    }
  }
}
