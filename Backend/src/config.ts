// src/config.ts
/**
 * Centralized config.
 * Reads environment variables once and exposes a typed object; every service
 * receives the slice it needs from index.ts rather than reading process.env itself.
 */

import type { PacingKind } from "./shared/pacing";

export type NodeEnv = "development" | "production" | "test";

export interface LimitRule {
  maxRequests: number;
  windowSec: number;
}

export interface AppConfig {
  env: NodeEnv;
  port: number;

  providers: {
    groq?: string;
    openai?: string;
    gemini?: string;
    brave?: string;
    bingKey?: string;
    bingEndpoint?: string;
    googleCseId?: string;
    googleCseKey?: string;
  };

  models: {
    /** provider names in fallback order, e.g. ["groq", "gemini"] */
    order: string[];
    groq: string;
    openai: string;
    gemini: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };

  cache: {
    searchTtlMs: number;
    supplierTtlMs: number;
    marketTtlMs: number;
    sweepIntervalMs: number;
  };

  search: {
    perQuery: number;
    delayMs: number;
    /** "leaky-bucket" spaces search and market fan-outs on one shared clock */
    pacing: PacingKind;
    timeoutMs: number;
  };

  enrichment: {
    batchSize: number;
    batchDelayMs: number;
  };

  discovery: {
    timeoutMs: number;
    defaultMaxResults: number;
  };

  // inbound, per caller
  limits: {
    discover: LimitRule;
    market: LimitRule;
    lookup: LimitRule;
  };

  // outbound admission: token bucket for search, adaptive window for LLM calls
  outbound: {
    search: { capacity: number; refillPerSec: number };
    llm: { baseLimit: number; maxLimit: number; windowSec: number; adjustIntervalSec: number };
  };
}

function env(name: string, def?: string): string | undefined {
  return process.env[name] || def;
}
function envStr(name: string, def: string): string {
  return process.env[name] || def;
}
function envNum(name: string, def: number): number {
  const v = process.env[name];
  const n = v ? Number(v) : NaN;
  return Number.isFinite(n) ? n : def;
}
function csv(v?: string): string[] {
  return (v || "").split(",").map((s) => s.trim()).filter(Boolean);
}

function nodeEnv(): NodeEnv {
  const v = envStr("NODE_ENV", "development");
  return v === "production" || v === "test" ? v : "development";
}

function limit(prefix: string, maxRequests: number, windowSec: number): LimitRule {
  return {
    maxRequests: envNum(`${prefix}_MAX`, maxRequests),
    windowSec: envNum(`${prefix}_WINDOW_SEC`, windowSec),
  };
}

export function loadConfig(): AppConfig {
  return {
    env: nodeEnv(),
    port: envNum("PORT", 8787),

    providers: {
      groq: env("GROQ_API_KEY"),
      openai: env("OPENAI_API_KEY"),
      gemini: env("GEMINI_API_KEY"),
      brave: env("BRAVE_API_KEY"),
      bingKey: env("BING_KEY"),
      bingEndpoint: env("BING_ENDPOINT"),
      googleCseId: env("GOOGLE_CSE_ID"),
      googleCseKey: env("GOOGLE_CSE_KEY"),
    },

    models: {
      order: csv(env("LLM_ORDER", "groq,gemini")),
      groq: envStr("GROQ_MODEL", "llama3-8b-8192"),
      openai: envStr("OPENAI_MODEL", "gpt-4o-mini"),
      gemini: envStr("GEMINI_MODEL", "gemini-1.5-flash"),
      temperature: envNum("LLM_TEMPERATURE", 0.3),
      maxTokens: envNum("LLM_MAX_TOKENS", 2000),
      timeoutMs: envNum("LLM_TIMEOUT_MS", 30_000),
    },

    cache: {
      searchTtlMs: envNum("CACHE_TTL_SEARCH_S", 1800) * 1000,
      supplierTtlMs: envNum("CACHE_TTL_SUPPLIER_S", 6 * 3600) * 1000,
      marketTtlMs: envNum("CACHE_TTL_MARKET_S", 7200) * 1000,
      sweepIntervalMs: envNum("CACHE_SWEEP_S", 300) * 1000,
    },

    search: {
      perQuery: envNum("SEARCH_PER_QUERY", 5),
      delayMs: envNum("SEARCH_DELAY_MS", 1000),
      pacing: envStr("SEARCH_PACING", "fixed") === "leaky-bucket" ? "leaky-bucket" : "fixed",
      timeoutMs: envNum("SEARCH_TIMEOUT_MS", 10_000),
    },

    enrichment: {
      batchSize: envNum("ENRICH_BATCH_SIZE", 5),
      batchDelayMs: envNum("ENRICH_BATCH_DELAY_MS", 500),
    },

    discovery: {
      timeoutMs: envNum("DISCOVERY_TIMEOUT_MS", 60_000),
      defaultMaxResults: envNum("DISCOVERY_DEFAULT_MAX", 10),
    },

    limits: {
      discover: limit("RL_DISCOVER", 10, 60),
      market: limit("RL_MARKET", 10, 60),
      lookup: limit("RL_LOOKUP", 30, 60),
    },

    outbound: {
      search: { capacity: envNum("OUT_SEARCH_CAPACITY", 5), refillPerSec: envNum("OUT_SEARCH_RPS", 1) },
      llm: {
        baseLimit: envNum("OUT_LLM_BASE", 30),
        maxLimit: envNum("OUT_LLM_MAX", 60),
        windowSec: envNum("OUT_LLM_WINDOW_SEC", 60),
        adjustIntervalSec: envNum("OUT_LLM_ADJUST_SEC", 60),
      },
    },
  };
}

export const config: AppConfig = loadConfig();

/** Safe for health output: key presence only, never values. */
export function summarizeConfig(cfg: AppConfig = config) {
  const has = (v?: string) => Boolean(v && v.trim());
  return {
    env: cfg.env,
    search: {
      brave: has(cfg.providers.brave),
      bing: has(cfg.providers.bingKey) && has(cfg.providers.bingEndpoint),
      googleCse: has(cfg.providers.googleCseId) && has(cfg.providers.googleCseKey),
    },
    llm: {
      groq: has(cfg.providers.groq),
      openai: has(cfg.providers.openai),
      gemini: has(cfg.providers.gemini),
    },
    providerOrder: cfg.models.order,
  };
}
