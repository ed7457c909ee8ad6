// src/scoring/ranking.ts
/**
 * Scoring & ranking.
 * Filters first (location, min rating, certifications, requirement coverage),
 * then a deterministic weighted score, recomputed for every supplier whatever a
 * provider reported, then a stable descending sort.
 */

import { termSet } from "../shared/text";
import type { ScoredSupplier, VerificationStatus, VerifiedSupplier } from "../types";
import { isUnspecified, locationMatches } from "./location";

export const WEIGHTS = {
  confidence: 0.4,
  status: 0.2,
  rating: 0.15,
  certifications: 0.1,
  location: 0.1,
  specialties: 0.05,
} as const;

export const STATUS_WEIGHT: Record<VerificationStatus, number> = {
  verified: 1.0,
  unverified: 0.5,
  pending: 0.3,
  failed: 0.0,
};

export const MIN_REQUIREMENT_COVERAGE = 0.5;
const CERT_CAP = 5;

export interface RankingFilters {
  location?: string;
  minRating?: number;
  certifications?: string[];
  requirements?: string[];
  /** product query; drives the specialty overlap term */
  product?: string;
}

// ---------------- Filters ----------------

export function passesLocation(s: VerifiedSupplier, requested?: string): boolean {
  if (!requested?.trim()) return true;
  if (isUnspecified(s.location)) return true;
  return locationMatches(s.location, requested);
}

/** Suppliers without a rating are not held to the threshold. */
export function passesRating(s: VerifiedSupplier, minRating?: number): boolean {
  if (minRating === undefined || s.rating === null) return true;
  return s.rating >= minRating;
}

/** Every requested certification must be held (case-insensitive, "ISO 9001" matches "ISO 9001:2015"). */
export function passesCertifications(s: VerifiedSupplier, required?: string[]): boolean {
  const want = (required ?? []).map((c) => c.trim().toLowerCase()).filter(Boolean);
  if (!want.length) return true;
  const held = s.certifications.map((c) => c.toLowerCase());
  return want.every((w) => held.some((h) => h.includes(w)));
}

export function requirementCoverage(s: VerifiedSupplier, requirements?: string[]): number {
  const reqs = (requirements ?? []).map((r) => r.trim().toLowerCase()).filter(Boolean);
  if (!reqs.length) return 1;
  const text = [s.description, ...s.specialties, ...s.certifications].join(" ").toLowerCase();
  return reqs.filter((r) => text.includes(r)).length / reqs.length;
}

export function passesFilters(s: VerifiedSupplier, f: RankingFilters): boolean {
  return (
    passesLocation(s, f.location) &&
    passesRating(s, f.minRating) &&
    passesCertifications(s, f.certifications) &&
    requirementCoverage(s, f.requirements) >= MIN_REQUIREMENT_COVERAGE
  );
}

// ---------------- Score ----------------

export function specialtyOverlap(s: VerifiedSupplier, product?: string): number {
  const terms = termSet(product ?? "");
  if (!terms.size || !s.specialties.length) return 0;
  const have = termSet(s.specialties.join(" "));
  let hit = 0;
  for (const t of terms) if (have.has(t)) hit++;
  return hit / terms.size;
}

const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

export function scoreSupplier(s: VerifiedSupplier, f: RankingFilters = {}): number {
  const locationBonus = f.location?.trim() && !isUnspecified(s.location) && locationMatches(s.location, f.location) ? 1 : 0;
  const score =
    clamp01(s.confidenceScore) * WEIGHTS.confidence +
    STATUS_WEIGHT[s.verificationStatus] * WEIGHTS.status +
    (s.rating === null ? 0 : s.rating / 5) * WEIGHTS.rating +
    Math.min(s.certifications.length / CERT_CAP, 1) * WEIGHTS.certifications +
    locationBonus * WEIGHTS.location +
    specialtyOverlap(s, f.product) * WEIGHTS.specialties;
  return clamp01(score);
}

// ---------------- Ranking ----------------

/** Filtered, re-scored copies in descending score order; ties keep input order. */
export function rankSuppliers(suppliers: readonly VerifiedSupplier[], filters: RankingFilters = {}): ScoredSupplier[] {
  const scored = suppliers
    .filter((s) => passesFilters(s, filters))
    .map((s, order) => ({
      order,
      supplier: { ...s, reportedConfidence: s.confidenceScore, confidenceScore: scoreSupplier(s, filters) },
    }));
  scored.sort((a, b) => b.supplier.confidenceScore - a.supplier.confidenceScore || a.order - b.order);
  return scored.map((x) => x.supplier);
}
