// src/extraction/rules.ts
// Ordered-rule evaluator: rules run in order, the first one that yields a value wins.

export interface Rule<I> {
  name: string;
  apply(input: I): string | undefined;
}

export interface RuleMatch {
  rule: string;
  value: string;
}

export function firstMatch<I>(rules: readonly Rule<I>[], input: I): RuleMatch | undefined {
  for (const r of rules) {
    const value = r.apply(input);
    if (value !== undefined) return { rule: r.name, value };
  }
  return undefined;
}

/**
 * Rule from a regex: capture group 1 (or the whole match), tidied, kept only
 * when it reaches `minLength`.
 */
export function regexRule(name: string, re: RegExp, minLength = 3): Rule<string> {
  return {
    name,
    apply(text) {
      const m = re.exec(text);
      if (!m) return undefined;
      const value = tidy(m[1] ?? m[0]);
      return value.length >= minLength ? value : undefined;
    },
  };
}

/** Collapse whitespace, drop dangling separators. */
export function tidy(s: string): string {
  return s.replace(/\s+/g, " ").replace(/^[\s,;:|-]+|[\s,;:|-]+$/g, "");
}
