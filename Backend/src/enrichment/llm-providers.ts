// src/enrichment/llm-providers.ts
// Minimal language-model clients over fetch: OpenAI-compatible chat (Groq, OpenAI) and Gemini.

import { z } from "zod";
import type { AppConfig } from "../config";
import { EnrichmentFailure, errorMessage, isAbortError } from "../errors";
import { scopedSignal } from "../shared/abort";

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface LlmProvider {
  readonly name: string;
  complete(prompt: string, opts?: CompletionOptions): Promise<string>;
}

export interface ModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export const SYSTEM_PROMPT =
  "You are a procurement analyst. Answer with a single JSON object that follows the requested structure; use null for anything you cannot support from the data.";

const ChatBody = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })).min(1),
});

const GeminiBody = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }) }))
    .min(1),
});

// ---------------- HTTP base ----------------

abstract class HttpLlmProvider implements LlmProvider {
  abstract readonly name: string;
  constructor(protected settings: ModelSettings) {}

  protected abstract request(prompt: string): { url: string; headers: Record<string, string>; body: unknown };
  protected abstract extract(body: unknown): string;

  async complete(prompt: string, opts: CompletionOptions = {}): Promise<string> {
    const { url, headers, body } = this.request(prompt);
    const scope = scopedSignal(opts.signal, this.settings.timeoutMs);
    try {
      const res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
        signal: scope.signal,
      });
      if (res.status === 429) throw new EnrichmentFailure(this.name, "quota", "HTTP 429");
      if (!res.ok) throw new EnrichmentFailure(this.name, "http", `HTTP ${res.status}`);

      let json: unknown;
      try {
        json = await res.json();
      } catch (err) {
        throw new EnrichmentFailure(this.name, "http", "response body is not JSON", { cause: err });
      }
      return this.extract(json);
    } catch (err) {
      if (err instanceof EnrichmentFailure) throw err;
      if (opts.signal?.aborted) throw err;
      if (scope.timedOut || isAbortError(err)) {
        throw new EnrichmentFailure(this.name, "timeout", `no answer within ${this.settings.timeoutMs}ms`, { cause: err });
      }
      throw new EnrichmentFailure(this.name, "transport", errorMessage(err), { cause: err });
    } finally {
      scope.dispose();
    }
  }
}

// ---------------- OpenAI-compatible chat (Groq, OpenAI) ----------------

export class ChatCompletionsProvider extends HttpLlmProvider {
  constructor(
    readonly name: string,
    private endpoint: string,
    private key: string,
    settings: ModelSettings,
  ) {
    super(settings);
  }

  protected request(prompt: string) {
    return {
      url: this.endpoint,
      headers: { Authorization: `Bearer ${this.key}` },
      body: {
        model: this.settings.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      },
    };
  }

  protected extract(body: unknown): string {
    const parsed = ChatBody.safeParse(body);
    if (!parsed.success) throw new EnrichmentFailure(this.name, "http", "unexpected response shape");
    return parsed.data.choices[0]?.message.content ?? "";
  }
}

// ---------------- Gemini ----------------

export class GeminiProvider extends HttpLlmProvider {
  readonly name = "gemini";
  constructor(private key: string, settings: ModelSettings) {
    super(settings);
  }

  protected request(prompt: string) {
    return {
      url: `https://generativelanguage.googleapis.com/v1beta/models/${this.settings.model}:generateContent?key=${this.key}`,
      headers: {},
      body: {
        systemInstruction: { parts: [{ text: SYSTEM_PROMPT }] },
        contents: [{ role: "user", parts: [{ text: prompt }] }],
        generationConfig: { temperature: this.settings.temperature, maxOutputTokens: this.settings.maxTokens },
      },
    };
  }

  protected extract(body: unknown): string {
    const parsed = GeminiBody.safeParse(body);
    if (!parsed.success) throw new EnrichmentFailure(this.name, "http", "unexpected response shape");
    const parts = parsed.data.candidates[0]?.content.parts ?? [];
    return parts.map((p) => p.text ?? "").join("");
  }
}

// ---------------- Factory ----------------

const GROQ_URL = "https://api.groq.com/openai/v1/chat/completions";
const OPENAI_URL = "https://api.openai.com/v1/chat/completions";

/** Providers in configured order; names without a key are skipped. */
export function buildProviders(cfg: AppConfig): LlmProvider[] {
  const base = { temperature: cfg.models.temperature, maxTokens: cfg.models.maxTokens, timeoutMs: cfg.models.timeoutMs };
  const out: LlmProvider[] = [];
  for (const name of cfg.models.order) {
    const { groq, openai, gemini } = cfg.providers;
    if (name === "groq" && groq) out.push(new ChatCompletionsProvider("groq", GROQ_URL, groq, { ...base, model: cfg.models.groq }));
    else if (name === "openai" && openai) out.push(new ChatCompletionsProvider("openai", OPENAI_URL, openai, { ...base, model: cfg.models.openai }));
    else if (name === "gemini" && gemini) out.push(new GeminiProvider(gemini, { ...base, model: cfg.models.gemini }));
  }
  return out;
}
