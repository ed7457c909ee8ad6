// src/enrichment/provider-chain.ts
/**
 * Ordered fallback across language-model providers. Providers are tried in
 * order and the first success wins. Failures come back as data, never as a throw.
 */

import { EnrichmentFailure, errorMessage, type ProviderErrorKind } from "../errors";
import { moduleLog, type Logger } from "../logger";
import { recordOutcome, retryAfterWire, type Limiter } from "../ops/rate-limit";
import { telemetry } from "../ops/telemetry";
import type { CompletionOptions, LlmProvider } from "./llm-providers";

export interface ProviderError {
  provider: string;
  kind: ProviderErrorKind;
  message: string;
}

export type ChainResult =
  | { ok: true; provider: string; text: string; errors: ProviderError[] }
  | { ok: false; errors: ProviderError[] };

export interface ProviderChainOptions {
  /** outbound admission, checked per provider; a denial counts as that provider failing */
  gate?: Limiter;
  logger?: Logger;
}

export class ProviderChain {
  private readonly log: Logger;

  constructor(private providers: readonly LlmProvider[], private opts: ProviderChainOptions = {}) {
    this.log = opts.logger ?? moduleLog("llm");
  }

  get names(): string[] {
    return this.providers.map((p) => p.name);
  }

  async complete(prompt: string, opts: CompletionOptions = {}): Promise<ChainResult> {
    const calls = telemetry.counter("llm_calls_total", { help: "Language-model calls", labelNames: ["provider", "outcome"] });
    const errors: ProviderError[] = [];

    if (!this.providers.length) {
      errors.push({ provider: "none", kind: "config", message: "no language-model provider configured" });
      return { ok: false, errors };
    }

    for (const p of this.providers) {
      if (opts.signal?.aborted) break;

      const admission = this.opts.gate?.check(`llm:${p.name}`);
      if (admission && !admission.allowed) {
        errors.push({ provider: p.name, kind: "rate_limited", message: `retry after ${retryAfterWire(admission.retryAfterSec)}s` });
        calls.inc(1, { provider: p.name, outcome: "rate_limited" });
        continue;
      }

      try {
        const text = await p.complete(prompt, opts);
        recordOutcome(this.opts.gate, true);
        calls.inc(1, { provider: p.name, outcome: "ok" });
        return { ok: true, provider: p.name, text, errors };
      } catch (err) {
        if (opts.signal?.aborted) break;
        recordOutcome(this.opts.gate, false);
        const e = toProviderError(p.name, err);
        errors.push(e);
        calls.inc(1, { provider: p.name, outcome: e.kind });
        this.log.warn({ provider: p.name, kind: e.kind, err: e.message }, "provider failed; trying next");
      }
    }
    return { ok: false, errors };
  }
}

function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof EnrichmentFailure) return { provider: err.provider, kind: err.kind, message: err.message };
  return { provider, kind: "transport", message: errorMessage(err) };
}
