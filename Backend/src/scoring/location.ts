// src/scoring/location.ts
// Loose location equivalence: substring either way, or a shared US state (name or postal code).

import states from "../data/us-states.json";
import { LOCATION_UNSPECIFIED } from "../types";

const NAME_BY_CODE = new Map<string, string>(Object.entries(states).map(([code, name]) => [code, name.toLowerCase()]));

export function isUnspecified(location: string | undefined | null): boolean {
  const l = (location ?? "").trim();
  return !l || l.toLowerCase() === LOCATION_UNSPECIFIED.toLowerCase();
}

/** Postal codes of every state mentioned by name or by code. */
export function statesIn(location: string): Set<string> {
  const out = new Set<string>();
  const trimmed = location.trim();
  // a bare two-letter input ("tx") is a code whatever its case
  const codes = /^[A-Za-z]{2}$/.test(trimmed) ? [trimmed.toUpperCase()] : trimmed.match(/\b[A-Z]{2}\b/g) ?? [];
  for (const c of codes) if (NAME_BY_CODE.has(c)) out.add(c);

  const lower = ` ${trimmed.toLowerCase().replace(/[^a-z]+/g, " ")} `;
  for (const [code, name] of NAME_BY_CODE) {
    if (lower.includes(` ${name} `)) out.add(code);
  }
  return out;
}

export function locationMatches(supplierLocation: string, requested: string): boolean {
  const s = supplierLocation.trim().toLowerCase();
  const r = requested.trim().toLowerCase();
  if (!r) return true;
  if (!s) return false;
  if (s.includes(r) || (s.length >= 3 && r.includes(s))) return true;

  const want = statesIn(requested);
  if (!want.size) return false;
  for (const code of statesIn(supplierLocation)) if (want.has(code)) return true;
  return false;
}
