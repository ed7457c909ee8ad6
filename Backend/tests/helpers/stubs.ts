// tests/helpers/stubs.ts
// In-process stand-ins for the search and language-model providers.

import type { LlmProvider } from "../../src/enrichment/llm-providers";
import { EnrichmentFailure, SearchFailure } from "../../src/errors";
import type { SearchProvider } from "../../src/search/providers";
import { TtlCache } from "../../src/shared/ttl-cache";
import type { AppCache, CacheValue, SearchHit } from "../../src/types";

export function hit(title: string, url: string, snippet = ""): SearchHit {
  return { title, url, snippet, source: new URL(url).hostname, relevanceScore: 0.5 };
}

export function newCache(now: () => number = () => 0): AppCache {
  return new TtlCache<CacheValue>({ now });
}

type SearchAnswer = SearchHit[] | Error;

/** Answers per exact query; unknown queries get `fallback` (empty by default). */
export class StubSearchProvider implements SearchProvider {
  id = "stub-search";
  readonly calls: string[] = [];

  constructor(private answers: Record<string, SearchAnswer> = {}, private fallback: SearchAnswer = []) {}

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    this.calls.push(query);
    const a = this.answers[query] ?? this.fallback;
    if (a instanceof Error) throw a;
    return a.slice(0, maxResults);
  }
}

export const searchDown = () => new SearchFailure("stub-search", "HTTP 503");

type LlmAnswer = string | Error | ((prompt: string) => string);

/** Replies with the queued answers in order, then repeats the last one. */
export class StubLlmProvider implements LlmProvider {
  readonly prompts: string[] = [];

  constructor(readonly name: string, private answers: LlmAnswer[]) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const a = this.answers[Math.min(this.prompts.length, this.answers.length) - 1];
    if (a === undefined) return "";
    if (a instanceof Error) throw a;
    return typeof a === "function" ? a(prompt) : a;
  }
}

export const llmDown = (provider: string) => new EnrichmentFailure(provider, "http", "HTTP 500");
