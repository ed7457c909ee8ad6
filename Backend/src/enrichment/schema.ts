// src/enrichment/schema.ts
// Validation of the enrichment payload; every field has a default, so any object parses.

import { z } from "zod";
import { OptionalText, StringList, lowerTrim, toNumber, unitInterval } from "../shared/coerce";

export const VERIFICATION_STATUSES = ["verified", "unverified", "pending", "failed"] as const;

export const EnrichmentPayload = z.object({
  location: OptionalText,
  confidence_score: unitInterval(0.5),
  certifications: StringList,
  specialties: StringList,
  company_size: OptionalText,
  verification_status: z.preprocess(lowerTrim, z.enum(VERIFICATION_STATUSES)).catch("unverified"),
  contact_info: z
    .record(z.unknown())
    .transform((r) => {
      const out: Record<string, string> = {};
      for (const [k, v] of Object.entries(r)) {
        if ((typeof v === "string" || typeof v === "number") && String(v).trim()) out[k] = String(v).trim();
      }
      return out;
    })
    .catch({}),
  rating: z.preprocess(toNumber, z.number().min(1).max(5)).nullable().catch(null),
});

export type EnrichmentPayload = z.infer<typeof EnrichmentPayload>;

export function parseEnrichment(raw: unknown): EnrichmentPayload {
  // every field catches, so only a non-object can fail
  const parsed = EnrichmentPayload.safeParse(raw);
  return parsed.success ? parsed.data : EnrichmentPayload.parse({});
}
