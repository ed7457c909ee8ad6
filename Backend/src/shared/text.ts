// src/shared/text.ts
// Small text helpers shared by search, extraction and scoring.

/** Strip punctuation (keeps word chars, spaces, hyphens), collapse whitespace, lowercase. */
export function cleanQuery(q: string): string {
  return q.replace(/[^\w\s-]/g, " ").replace(/\s+/g, " ").trim().toLowerCase();
}

export function termSet(text: string): Set<string> {
  const clean = cleanQuery(text);
  return new Set(clean ? clean.split(" ") : []);
}

export function overlapCount(a: Set<string>, b: Set<string>): number {
  let n = 0;
  for (const t of a) if (b.has(t)) n++;
  return n;
}

export function collapse(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function escapeRe(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-word/phrase matcher for a keyword list.
 * "sale" does not match "wholesale"; "amazon.com" matches inside a URL.
 */
export function keywordMatcher(words: readonly string[]): (text: string) => boolean {
  if (!words.length) return () => false;
  const re = new RegExp(`(?:^|[^a-z0-9])(?:${words.map(escapeRe).join("|")})(?![a-z0-9])`, "i");
  return (text) => re.test(text);
}
