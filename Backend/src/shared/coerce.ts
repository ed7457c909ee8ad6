// src/shared/coerce.ts
// Forgiving zod building blocks for model output: bad values fall back instead of failing the object.

import { z } from "zod";

export const toNumber = (v: unknown) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v);

export function uniqueStrings(v: unknown[] | string): string[] {
  const items = typeof v === "string" ? v.split(",") : v;
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    if (typeof item !== "string") continue;
    const s = item.trim();
    const key = s.toLowerCase();
    if (!s || seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}

/** Array of strings (or one comma-separated string); non-strings and repeats dropped; [] otherwise. */
export const StringList = z.union([z.array(z.unknown()), z.string()]).transform(uniqueStrings).catch([]);

/** Trimmed text, or null for empty/"null"/anything not a string. */
export const OptionalText = z
  .string()
  .transform((s) => s.trim())
  .transform((s) => (s && s.toLowerCase() !== "null" ? s : null))
  .nullable()
  .catch(null);

/** Preprocessor for enum fields: "Verified " -> "verified". */
export const lowerTrim = (v: unknown) => (typeof v === "string" ? v.trim().toLowerCase() : v);

export const unitInterval = (fallback: number) =>
  z
    .preprocess(toNumber, z.number().finite())
    .transform((n) => Math.min(1, Math.max(0, n)))
    .catch(fallback);
