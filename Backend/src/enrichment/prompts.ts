// src/enrichment/prompts.ts
import type { Candidate } from "../types";

export interface EnrichmentHints {
  product: string;
  requirements: string[];
}

export function supplierPrompt(c: Candidate, hints: EnrichmentHints): string {
  const data = {
    name: c.name,
    website: c.website,
    domain: c.domain,
    location: c.location,
    description: c.description,
  };
  const reqs = hints.requirements.length ? hints.requirements.join("; ") : "none stated";
  return [
    "Assess the supplier below for a procurement search and return one JSON object.",
    "",
    `Supplier data: ${JSON.stringify(data, null, 2)}`,
    `Product: ${hints.product}`,
    `Requirements: ${reqs}`,
    "",
    "Structure:",
    "{",
    '  "name": "verified company name",',
    '  "location": "verified location or null",',
    '  "confidence_score": 0.0-1.0,',
    '  "certifications": ["ISO 9001", "..."],',
    '  "specialties": ["..."],',
    '  "company_size": "Small | Medium | Large | Enterprise" or null,',
    '  "verification_status": "verified | unverified | pending",',
    '  "contact_info": {"email": "", "phone": "", "address": ""},',
    '  "rating": 1.0-5.0 or null',
    "}",
    "",
    "Only report certifications and contact details the data supports.",
  ].join("\n");
}
