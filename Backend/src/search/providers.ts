// src/search/providers.ts

/**
 * Search provider abstraction.
 * Executes one query against a paid API (Brave, Bing, Google CSE) picked by which
 * keys exist; with none configured a null provider answers with no results.
 *
 * Adapters throw SearchFailure on transport/timeout/quota problems; the fan-out
 * decides what a failure means.
 */

import { z } from "zod";
import type { AppConfig } from "../config";
import { SearchFailure, errorMessage, isAbortError } from "../errors";
import { scopedSignal } from "../shared/abort";
import type { SearchHit } from "../types";

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface SearchProvider {
  id: string;
  search(query: string, maxResults: number, opts?: SearchOptions): Promise<SearchHit[]>;
}

type RawHit = { title: string; url: string; snippet: string };

const BraveBody = z.object({
  web: z
    .object({ results: z.array(z.object({ title: z.string(), url: z.string(), description: z.string().optional() })) })
    .optional(),
});
const BingBody = z.object({
  webPages: z
    .object({ value: z.array(z.object({ name: z.string(), url: z.string(), snippet: z.string().optional() })) })
    .optional(),
});
const CseBody = z.object({
  items: z.array(z.object({ title: z.string(), link: z.string(), snippet: z.string().optional() })).optional(),
});

// ---------------------- HTTP adapter base -----------------------------------

abstract class HttpSearchProvider implements SearchProvider {
  abstract id: string;
  constructor(protected timeoutMs: number) {}

  protected abstract request(query: string, count: number): { url: string; headers?: Record<string, string> };
  protected abstract parse(body: unknown): RawHit[];

  async search(query: string, maxResults: number, opts: SearchOptions = {}): Promise<SearchHit[]> {
    const { url, headers } = this.request(query, maxResults);
    const scope = scopedSignal(opts.signal, this.timeoutMs);
    try {
      const res = await fetch(url, { headers, signal: scope.signal });
      if (res.status === 429) throw new SearchFailure(this.id, "quota exceeded (429)");
      if (!res.ok) throw new SearchFailure(this.id, `HTTP ${res.status}`);
      const hits = this.parse(await res.json());
      return normalizeHits(hits, this.id).slice(0, maxResults);
    } catch (err) {
      if (err instanceof SearchFailure) throw err;
      // caller-level cancellation is not a provider failure
      if (opts.signal?.aborted) throw err;
      const why = scope.timedOut || isAbortError(err) ? `timeout after ${this.timeoutMs}ms` : errorMessage(err);
      throw new SearchFailure(this.id, why, { cause: err });
    } finally {
      scope.dispose();
    }
  }
}

export class BraveSearchProvider extends HttpSearchProvider {
  id = "brave";
  constructor(private key: string, timeoutMs: number) {
    super(timeoutMs);
  }
  protected request(q: string, count: number) {
    return {
      url: `https://api.search.brave.com/res/v1/web/search?q=${encodeURIComponent(q)}&count=${count}`,
      headers: { "X-Subscription-Token": this.key, Accept: "application/json" },
    };
  }
  protected parse(body: unknown): RawHit[] {
    const items = BraveBody.parse(body).web?.results ?? [];
    return items.map((i) => ({ title: i.title, url: i.url, snippet: i.description ?? "" }));
  }
}

export class BingSearchProvider extends HttpSearchProvider {
  id = "bing";
  constructor(private endpoint: string, private key: string, timeoutMs: number) {
    super(timeoutMs);
  }
  protected request(q: string, count: number) {
    return {
      url: `${this.endpoint}?q=${encodeURIComponent(q)}&count=${count}`,
      headers: { "Ocp-Apim-Subscription-Key": this.key },
    };
  }
  protected parse(body: unknown): RawHit[] {
    const items = BingBody.parse(body).webPages?.value ?? [];
    return items.map((i) => ({ title: i.name, url: i.url, snippet: i.snippet ?? "" }));
  }
}

export class GoogleCseProvider extends HttpSearchProvider {
  id = "google_cse";
  constructor(private cx: string, private key: string, timeoutMs: number) {
    super(timeoutMs);
  }
  protected request(q: string, num: number) {
    // CSE caps num at 10
    const n = Math.min(10, Math.max(1, num));
    return { url: `https://www.googleapis.com/customsearch/v1?key=${this.key}&cx=${this.cx}&q=${encodeURIComponent(q)}&num=${n}` };
  }
  protected parse(body: unknown): RawHit[] {
    const items = CseBody.parse(body).items ?? [];
    return items.map((i) => ({ title: i.title, url: i.link, snippet: i.snippet ?? "" }));
  }
}

export class NullSearchProvider implements SearchProvider {
  id = "none";
  async search(): Promise<SearchHit[]> {
    return [];
  }
}

export function getSearchProvider(cfg: AppConfig): SearchProvider {
  const p = cfg.providers;
  const t = cfg.search.timeoutMs;
  if (p.brave) return new BraveSearchProvider(p.brave, t);
  if (p.bingEndpoint && p.bingKey) return new BingSearchProvider(p.bingEndpoint, p.bingKey, t);
  if (p.googleCseId && p.googleCseKey) return new GoogleCseProvider(p.googleCseId, p.googleCseKey, t);
  return new NullSearchProvider();
}

// ---------------------- Normalization ---------------------------------------

export function normalizeHits(list: RawHit[], provider: string): SearchHit[] {
  return list
    .filter((r) => r.url && r.title)
    .map((r) => ({
      title: r.title.trim(),
      url: normalizeUrl(r.url),
      snippet: (r.snippet || "").trim(),
      source: hostOf(r.url) || provider,
      relevanceScore: 0.5,
    }));
}

export function normalizeUrl(u: string): string {
  try {
    const x = new URL(u);
    x.hash = "";
    return x.toString();
  } catch {
    return u;
  }
}

export function hostOf(u: string): string {
  try {
    return new URL(u).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
}
