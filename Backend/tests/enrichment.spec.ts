// tests/enrichment.spec.ts
import { describe, expect, it } from "vitest";
import { firstJsonObject, matchingBrace } from "../src/enrichment/json";
import type { LlmProvider } from "../src/enrichment/llm-providers";
import { EnrichmentOrchestrator, FALLBACK_CONFIDENCE, fingerprint } from "../src/enrichment/orchestrator";
import { ProviderChain } from "../src/enrichment/provider-chain";
import { parseEnrichment } from "../src/enrichment/schema";
import { SlidingWindowLimiter } from "../src/ops/rate-limit";
import { noPacing, type PacingPolicy } from "../src/shared/pacing";
import { TtlCache } from "../src/shared/ttl-cache";
import { LOCATION_UNSPECIFIED, type CacheValue, type Candidate } from "../src/types";
import { StubLlmProvider, llmDown, newCache } from "./helpers/stubs";

function candidate(name: string, location = "Houston, TX"): Candidate {
  return {
    name,
    location,
    description: `${name} supplies structural steel`,
    website: `https://${name.toLowerCase().replace(/\s+/g, "")}.example.com/`,
    domain: `${name.toLowerCase().replace(/\s+/g, "")}.example.com`,
    searchRelevance: 0.5,
  };
}

const hints = { product: "structural steel", requirements: [] };

const GOOD_ANSWER = `Sure! Here is the assessment:
{"confidence_score": 0.9, "certifications": ["ISO 9001", "iso 9001", "AS9100"], "verification_status": "Verified",
 "rating": "4.5", "location": "Austin, TX", "contact_info": {"phone": "555-0100", "fax": ""}}`;

describe("JSON extraction", () => {
  it("finds the first balanced object, ignoring braces inside strings", () => {
    expect(firstJsonObject('Here you go: {"a": {"b": "}"}, "c": 1} trailing')).toEqual({ a: { b: "}" }, c: 1 });
    expect(matchingBrace('{"x":"\\"}"}', 0)).toBe(10);
  });

  it("skips spans that do not parse and tries the next one", () => {
    expect(firstJsonObject('{not json} then {"ok": true}')).toEqual({ ok: true });
  });

  it("yields an empty object for missing, unbalanced or non-object JSON", () => {
    expect(firstJsonObject("")).toEqual({});
    expect(firstJsonObject('{"a": 1')).toEqual({});
    expect(firstJsonObject("[1, 2]")).toEqual({});
  });
});

describe("enrichment payload", () => {
  it("fills defaults for an empty or non-object payload", () => {
    const defaults = {
      location: null,
      confidence_score: 0.5,
      certifications: [],
      specialties: [],
      company_size: null,
      verification_status: "unverified",
      contact_info: {},
      rating: null,
    };
    expect(parseEnrichment({})).toEqual(defaults);
    expect(parseEnrichment("not an object")).toEqual(defaults);
  });

  it("coerces loose values and drops out-of-range ones", () => {
    const p = parseEnrichment({
      confidence_score: 1.7,
      certifications: "ISO 9001, AS9100",
      company_size: "null",
      verification_status: " PENDING ",
      rating: 6,
    });
    expect(p).toMatchObject({
      confidence_score: 1,
      certifications: ["ISO 9001", "AS9100"],
      company_size: null,
      verification_status: "pending",
      rating: null,
    });
    expect(parseEnrichment({ confidence_score: "0.8", rating: "3", verification_status: "confirmed" })).toMatchObject({
      confidence_score: 0.8,
      rating: 3,
      verification_status: "unverified",
    });
    expect(parseEnrichment({ confidence_score: "abc" }).confidence_score).toBe(0.5);
  });
});

describe("ProviderChain", () => {
  it("reports a configuration error with no providers", async () => {
    await expect(new ProviderChain([]).complete("p")).resolves.toEqual({
      ok: false,
      errors: [{ provider: "none", kind: "config", message: "no language-model provider configured" }],
    });
  });

  it("falls through to the next provider and keeps the earlier errors", async () => {
    const chain = new ProviderChain([new StubLlmProvider("groq", [llmDown("groq")]), new StubLlmProvider("gemini", ["{}"])]);
    await expect(chain.complete("p")).resolves.toEqual({
      ok: true,
      provider: "gemini",
      text: "{}",
      errors: [{ provider: "groq", kind: "http", message: "[groq] http: HTTP 500" }],
    });
  });

  it("maps unknown errors to transport and skips providers the gate refuses", async () => {
    const gate = new SlidingWindowLimiter({ maxRequests: 1, windowSec: 60 }, () => 0);
    const groq = new StubLlmProvider("groq", ["{}"]);
    const gemini = new StubLlmProvider("gemini", [new Error("socket hang up")]);
    const chain = new ProviderChain([groq, gemini], { gate });

    expect((await chain.complete("first")).ok).toBe(true);
    const second = await chain.complete("second");
    expect(second).toEqual({
      ok: false,
      errors: [
        { provider: "groq", kind: "rate_limited", message: "retry after 60s" },
        { provider: "gemini", kind: "transport", message: "socket hang up" },
      ],
    });
    expect(groq.prompts).toEqual(["first"]);
  });
});

describe("EnrichmentOrchestrator", () => {
  function orchestrator(providers: LlmProvider[], opts: { pacing?: PacingPolicy; cache?: TtlCache<CacheValue> } = {}) {
    return new EnrichmentOrchestrator({
      chain: new ProviderChain(providers),
      cache: opts.cache ?? newCache(),
      pacing: opts.pacing ?? noPacing,
    });
  }

  it("validates the provider answer into a verified supplier and caches it", async () => {
    const groq = new StubLlmProvider("groq", [GOOD_ANSWER]);
    const orch = orchestrator([groq]);
    const c = candidate("Lone Star Steel");

    const run = await orch.enrichAll([c], hints);
    expect(run).toMatchObject({ fallbacks: 0, cacheHits: 0, dropped: 0, providers: ["groq"] });
    expect(run.suppliers).toEqual([
      {
        ...c,
        confidenceScore: 0.9,
        certifications: ["ISO 9001", "AS9100"],
        rating: 4.5,
        verificationStatus: "verified",
        contactInfo: { phone: "555-0100" },
        specialties: [],
        companySize: null,
        enrichedBy: "groq",
      },
    ]);

    const again = await orch.enrichAll([c], hints);
    expect(again.cacheHits).toBe(1);
    expect(again.suppliers[0].confidenceScore).toBe(0.9);
    expect(groq.prompts).toHaveLength(1);
  });

  it("lets the provider fill in an unspecified location only", async () => {
    const orch = orchestrator([new StubLlmProvider("groq", [GOOD_ANSWER])]);
    const run = await orch.enrichAll([candidate("Gulf Coast Fab", LOCATION_UNSPECIFIED)], hints);
    expect(run.suppliers[0].location).toBe("Austin, TX");
  });

  it("treats unparsable completion text as an empty payload", async () => {
    const orch = orchestrator([new StubLlmProvider("groq", ["I could not find that company."])]);
    const run = await orch.enrichAll([candidate("Quiet Metals")], hints);
    expect(run.suppliers[0]).toMatchObject({ confidenceScore: 0.5, verificationStatus: "unverified", rating: null, enrichedBy: "groq" });
  });

  it("uses the secondary provider when the primary fails", async () => {
    const orch = orchestrator([
      new StubLlmProvider("groq", [llmDown("groq")]),
      new StubLlmProvider("gemini", ['{"confidence_score": 0.7}']),
    ]);
    const run = await orch.enrichAll([candidate("Red River Steel")], hints);
    expect(run.providers).toEqual(["gemini"]);
    expect(run.suppliers[0]).toMatchObject({ confidenceScore: 0.7, enrichedBy: "gemini", certifications: [] });
  });

  it("falls back to a low-confidence record when every provider fails, without caching it", async () => {
    const groq = new StubLlmProvider("groq", [llmDown("groq")]);
    const gemini = new StubLlmProvider("gemini", [llmDown("gemini")]);
    const orch = orchestrator([groq, gemini]);
    const c = candidate("Pecos Pipe");

    const run = await orch.enrichAll([c], hints);
    expect(run.fallbacks).toBe(1);
    expect(run.providers).toEqual([]);
    expect(run.suppliers).toEqual([
      {
        ...c,
        confidenceScore: FALLBACK_CONFIDENCE,
        certifications: [],
        rating: null,
        verificationStatus: "unverified",
        contactInfo: {},
        specialties: [],
        companySize: null,
        enrichedBy: "fallback",
      },
    ]);

    await orch.enrichAll([c], hints);
    expect(groq.prompts).toHaveLength(2);
    expect(gemini.prompts).toHaveLength(2);
  });

  it("isolates one failing candidate inside a batch", async () => {
    const groq = new StubLlmProvider("groq", [
      (prompt) => {
        if (prompt.includes("Supplier 3")) throw llmDown("groq");
        return '{"confidence_score": 0.8}';
      },
    ]);
    const cands = [1, 2, 3, 4, 5].map((i) => candidate(`Supplier ${i}`));

    const run = await orchestrator([groq]).enrichAll(cands, hints);
    expect(run.suppliers.map((s) => s.enrichedBy)).toEqual(["groq", "groq", "fallback", "groq", "groq"]);
    expect(run.fallbacks).toBe(1);
  });

  it("runs batches of five, paced, with at most five calls in flight", async () => {
    class PeakCounter implements LlmProvider {
      readonly name = "peak";
      active = 0;
      peak = 0;
      async complete(): Promise<string> {
        this.active++;
        this.peak = Math.max(this.peak, this.active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        this.active--;
        return "{}";
      }
    }
    const counter = new PeakCounter();
    const waits: number[] = [];
    const pacing: PacingPolicy = { name: "recording", wait: async (i) => void waits.push(i) };
    const cands = Array.from({ length: 12 }, (_, i) => candidate(`Supplier ${i + 1}`));

    const run = await orchestrator([counter], { pacing }).enrichAll(cands, hints);
    expect(waits).toEqual([0, 1, 2]);
    expect(counter.peak).toBe(5);
    expect(run.suppliers.map((s) => s.name)).toEqual(cands.map((c) => c.name));
  });

  it("recomputes when a cache read fails", async () => {
    const bad = candidate("Broken Entry");
    const badKey = `supplier:${fingerprint(bad)}`;
    class FlakyCache extends TtlCache<CacheValue> {
      get(key: string) {
        if (key === badKey) throw new Error("corrupt entry");
        return super.get(key);
      }
    }
    const cache = new FlakyCache({ now: () => 0 });
    const orch = orchestrator([new StubLlmProvider("groq", ["{}"])], { cache });

    const run = await orch.enrichAll([candidate("First Steel"), bad, candidate("Third Steel")], hints);
    expect(run.dropped).toBe(0);
    expect(run.suppliers.map((s) => s.enrichedBy)).toEqual(["groq", "groq", "groq"]);
    expect(cache.stats().errors).toBe(1);
  });

  it("drops a candidate whose task fails without failing the batch", async () => {
    const bad = candidate("Broken Entry");
    const cache = newCache();
    cache.set(`supplier:${fingerprint(bad)}`, { kind: "search", hits: [] }, 1000);
    const orch = orchestrator([new StubLlmProvider("groq", ["{}"])], { cache });

    const run = await orch.enrichAll([candidate("First Steel"), bad, candidate("Third Steel")], hints);
    expect(run.dropped).toBe(1);
    expect(run.suppliers.map((s) => s.name)).toEqual(["First Steel", "Third Steel"]);
  });

  it("shares one provider call between identical candidates in flight", async () => {
    const groq = new StubLlmProvider("groq", [GOOD_ANSWER]);
    const c = candidate("Lone Star Steel");

    const run = await orchestrator([groq]).enrichAll([c, { ...c }], hints);
    expect(groq.prompts).toHaveLength(1);
    expect(run.suppliers.map((s) => s.confidenceScore)).toEqual([0.9, 0.9]);
    expect(run.suppliers[1]).not.toBe(run.suppliers[0]);
    expect(run).toMatchObject({ cacheHits: 1, providers: ["groq"] });
  });

  it("fingerprints by lowercased name and description", () => {
    const a = candidate("Acme Steel");
    expect(fingerprint({ ...a, name: "  ACME STEEL " })).toBe(fingerprint(a));
    expect(fingerprint({ ...a, description: "other" })).not.toBe(fingerprint(a));
  });

  it("rejects when the caller has aborted", async () => {
    const ctrl = new AbortController();
    ctrl.abort(new Error("deadline"));
    const orch = orchestrator([new StubLlmProvider("groq", ["{}"])]);
    await expect(orch.enrichAll([candidate("Late Steel")], hints, { signal: ctrl.signal })).rejects.toThrow("deadline");
  });
});
