// src/types.ts
// Shared domain shapes passed between the pipeline stages.

import type { TtlCache } from "./shared/ttl-cache";
import type { MarketReport } from "./market/types";

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
  /** origin domain or provider id */
  source: string;
  /** 0..1 */
  relevanceScore: number;
}

export const LOCATION_UNSPECIFIED = "Location not specified";

export interface Candidate {
  name: string;
  location: string;
  description: string;
  website: string;
  domain: string;
  searchRelevance: number;
}

export type VerificationStatus = "verified" | "unverified" | "pending" | "failed";

export interface VerifiedSupplier extends Candidate {
  confidenceScore: number;
  certifications: string[];
  rating: number | null;
  verificationStatus: VerificationStatus;
  contactInfo: Record<string, string>;
  specialties: string[];
  companySize: string | null;
  /** provider name, or "fallback" */
  enrichedBy: string;
}

export interface ScoredSupplier extends VerifiedSupplier {
  /** confidence as the provider reported it, before scoring */
  reportedConfidence: number;
}

export const TIMEFRAMES = ["1month", "3months", "6months", "1year"] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

// ---- cache payloads (one process-wide cache holds all of them) ----

export type CacheValue =
  | { kind: "search"; hits: SearchHit[] }
  | { kind: "supplier"; supplier: VerifiedSupplier }
  | { kind: "market"; report: MarketReport };

export type AppCache = TtlCache<CacheValue>;
