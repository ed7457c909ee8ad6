// src/extraction/candidate.ts
/**
 * SearchHit -> Candidate. Pure and deterministic; a hit whose name comes out
 * shorter than 3 characters is rejected (undefined), not an error.
 */

import { hostOf } from "../search/providers";
import { LOCATION_UNSPECIFIED, type Candidate, type SearchHit } from "../types";
import { firstMatch, regexRule, tidy, type Rule } from "./rules";

export const MIN_NAME_LENGTH = 3;

const WORD = "[A-Z][A-Za-z0-9&'.-]*";

/** "1. Foo - bar | baz" -> "Foo" */
export function titleHead(title: string): string {
  const unnumbered = title.replace(/^\s*\d+[.)]\s*/, "");
  return tidy(unnumbered.split(/\s+[-–—]\s+|\|/)[0] ?? "");
}

const leadingPhrase = regexRule("capitalized-phrase", new RegExp(`^(${WORD}(?:\\s+[A-Z0-9&][A-Za-z0-9&'.-]*){0,3})`));

export const NAME_RULES: readonly Rule<string>[] = [
  regexRule("legal-suffix", new RegExp(`(${WORD}(?:\\s+[A-Z0-9&][A-Za-z0-9&'.-]*){0,5}?\\s+(?:Inc|LLC|Ltd|Corp|Corporation|Company|Co)\\b\\.?)`)),
  {
    name: "capitalized-phrase",
    apply: (title) => leadingPhrase.apply(titleHead(title)),
  },
  {
    name: "before-separator",
    apply: (title) => {
      const head = titleHead(title);
      return head.length >= MIN_NAME_LENGTH ? head : undefined;
    },
  },
];

const CAP_WORDS = "[A-Z][A-Za-z]*(?:[ ]+[A-Z][A-Za-z]*)*";

export const LOCATION_RULES: readonly Rule<string>[] = [
  regexRule(
    "located-in",
    new RegExp(`(?:[Ll]ocated|[Bb]ased|[Hh]eadquartered|[Hh]eadquarters|[Oo]ffices?)\\s+(?:in|at)\\s+(${CAP_WORDS}(?:,\\s*${CAP_WORDS})*)`),
  ),
  regexRule("city-region", new RegExp(`\\b(${CAP_WORDS},\\s*[A-Z]{2})\\b`)),
  regexRule("city-country", new RegExp(`\\b(${CAP_WORDS},\\s*${CAP_WORDS})`)),
];

export function extractName(title: string): string {
  return firstMatch(NAME_RULES, title)?.value ?? title.trim();
}

export function extractLocation(snippet: string, preferred?: string): string {
  const hit = firstMatch(LOCATION_RULES, snippet);
  if (hit) return hit.value;
  const want = preferred?.trim();
  if (want && snippet.toLowerCase().includes(want.toLowerCase())) return want;
  return LOCATION_UNSPECIFIED;
}

export function extractCandidate(hit: SearchHit, preferredLocation?: string): Candidate | undefined {
  const name = extractName(hit.title);
  if (name.length < MIN_NAME_LENGTH) return undefined;
  return {
    name,
    location: extractLocation(hit.snippet, preferredLocation),
    description: hit.snippet,
    website: hit.url,
    domain: hostOf(hit.url),
    searchRelevance: hit.relevanceScore,
  };
}

/** Keeps input order; rejects are dropped. */
export function extractCandidates(hits: readonly SearchHit[], preferredLocation?: string): Candidate[] {
  const out: Candidate[] = [];
  for (const h of hits) {
    const c = extractCandidate(h, preferredLocation);
    if (c) out.push(c);
  }
  return out;
}
