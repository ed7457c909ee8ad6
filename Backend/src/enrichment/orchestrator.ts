// src/enrichment/orchestrator.ts
/**
 * Verification/enrichment orchestrator.
 *
 * Candidates go out in fixed-size batches. Inside a batch every call runs
 * concurrently and the batch only completes once all of them have settled.
 * A candidate whose providers all fail gets the deterministic low-confidence
 * fallback record, so one bad candidate never costs the others.
 *
 * Successful enrichments are cached by a fingerprint of name + description;
 * fallback records are returned but never stored.
 */

import { createHash } from "crypto";
import { CacheFailure, errorMessage } from "../errors";
import { moduleLog, type Logger } from "../logger";
import { telemetry } from "../ops/telemetry";
import { abortReason, type PacingPolicy } from "../shared/pacing";
import { LOCATION_UNSPECIFIED, type AppCache, type CacheValue, type Candidate, type VerifiedSupplier } from "../types";
import { firstJsonObject } from "./json";
import { supplierPrompt, type EnrichmentHints } from "./prompts";
import type { ProviderChain } from "./provider-chain";
import { parseEnrichment, type EnrichmentPayload } from "./schema";

export const FALLBACK_CONFIDENCE = 0.3;
export const DEFAULT_BATCH_SIZE = 5;

export interface OrchestratorDeps {
  chain: ProviderChain;
  cache: AppCache;
  /** gap between batches */
  pacing: PacingPolicy;
  batchSize?: number;
  ttlMs?: number;
  logger?: Logger;
}

export type EnrichmentSource = "cache" | "provider" | "fallback";

export interface EnrichmentRun {
  suppliers: VerifiedSupplier[];
  fallbacks: number;
  cacheHits: number;
  /** candidates lost to an unexpected error (not provider failures) */
  dropped: number;
  providers: string[];
}

const sha256 = (s: string) => createHash("sha256").update(s).digest("hex");

/** Stable cache identity for a candidate. */
export function fingerprint(c: Pick<Candidate, "name" | "description">): string {
  return sha256(`${c.name.trim().toLowerCase()}|${sha256(c.description)}`);
}

export function fallbackSupplier(c: Candidate): VerifiedSupplier {
  return {
    ...c,
    confidenceScore: FALLBACK_CONFIDENCE,
    certifications: [],
    rating: null,
    verificationStatus: "unverified",
    contactInfo: {},
    specialties: [],
    companySize: null,
    enrichedBy: "fallback",
  };
}

export function toVerified(c: Candidate, p: EnrichmentPayload, provider: string): VerifiedSupplier {
  return {
    ...c,
    // a located candidate keeps its own guess; the provider only fills the gap
    location: c.location === LOCATION_UNSPECIFIED && p.location ? p.location : c.location,
    confidenceScore: p.confidence_score,
    certifications: p.certifications,
    rating: p.rating,
    verificationStatus: p.verification_status,
    contactInfo: p.contact_info,
    specialties: p.specialties,
    companySize: p.company_size,
    enrichedBy: provider,
  };
}

function copySupplier(s: VerifiedSupplier): VerifiedSupplier {
  return {
    ...s,
    certifications: [...s.certifications],
    specialties: [...s.specialties],
    contactInfo: { ...s.contactInfo },
  };
}

export class EnrichmentOrchestrator {
  private readonly log: Logger;
  private readonly batchSize: number;
  private readonly ttlMs: number;

  constructor(private deps: OrchestratorDeps) {
    this.log = deps.logger ?? moduleLog("enrich");
    this.batchSize = Math.max(1, deps.batchSize ?? DEFAULT_BATCH_SIZE);
    this.ttlMs = deps.ttlMs ?? 6 * 3600_000;
  }

  async enrichAll(candidates: readonly Candidate[], hints: EnrichmentHints, opts: { signal?: AbortSignal } = {}): Promise<EnrichmentRun> {
    const { signal } = opts;
    const outcomes = telemetry.counter("enrich_results_total", { help: "Enrichment outcomes", labelNames: ["source"] });
    const run: EnrichmentRun = { suppliers: [], fallbacks: 0, cacheHits: 0, dropped: 0, providers: [] };
    const providers = new Set<string>();

    for (let b = 0, i = 0; i < candidates.length; b++, i += this.batchSize) {
      await this.deps.pacing.wait(b, signal);
      const batch = candidates.slice(i, i + this.batchSize);

      const settled = await Promise.allSettled(batch.map((c) => this.enrichOne(c, hints, signal)));
      if (signal?.aborted) throw abortReason(signal);

      settled.forEach((s, j) => {
        if (s.status === "rejected") {
          run.dropped++;
          outcomes.inc(1, { source: "dropped" });
          this.log.error({ candidate: batch[j]?.name, err: errorMessage(s.reason) }, "enrichment task failed; dropping candidate");
          return;
        }
        const { supplier, source } = s.value;
        run.suppliers.push(supplier);
        if (source === "fallback") run.fallbacks++;
        if (source === "cache") run.cacheHits++;
        if (source === "provider") providers.add(supplier.enrichedBy);
        outcomes.inc(1, { source });
      });
    }

    run.providers = [...providers];
    this.log.debug({ total: candidates.length, fallbacks: run.fallbacks, cacheHits: run.cacheHits, dropped: run.dropped }, "enrichment done");
    return run;
  }

  async enrichOne(
    c: Candidate,
    hints: EnrichmentHints,
    signal?: AbortSignal,
  ): Promise<{ supplier: VerifiedSupplier; source: EnrichmentSource }> {
    const key = `supplier:${fingerprint(c)}`;
    const made: { source?: EnrichmentSource } = {};

    const value = await this.deps.cache.getOrSet(
      key,
      async (): Promise<CacheValue> => {
        const result = await this.deps.chain.complete(supplierPrompt(c, hints), { signal });
        if (!result.ok) {
          if (signal?.aborted) throw abortReason(signal);
          this.log.info({ candidate: c.name, errors: result.errors }, "all providers failed; using fallback record");
          made.source = "fallback";
          return { kind: "supplier", supplier: fallbackSupplier(c) };
        }
        made.source = "provider";
        return { kind: "supplier", supplier: toVerified(c, parseEnrichment(firstJsonObject(result.text)), result.provider) };
      },
      { ttlMs: this.ttlMs, storeIf: (v) => v.kind === "supplier" && v.supplier.enrichedBy !== "fallback", signal },
    );
    if (value.kind !== "supplier") throw new CacheFailure(`unexpected ${value.kind} entry under ${key}`);

    const isFallback = value.supplier.enrichedBy === "fallback";
    const source = made.source ?? (isFallback ? "fallback" : "cache");
    // the stored record is never handed out
    return { supplier: copySupplier(value.supplier), source };
  }
}
