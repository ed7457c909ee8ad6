// src/routes/health.ts
//
// Health + status.
// - GET  /api/health             -> uptime, config summary, cache stats, limiter occupancy
// - GET  /api/health/live        -> liveness
// - GET  /api/health/ready       -> 503 until the cache sweeper runs
// - GET  /api/health/cache       -> cache stats
// - POST /api/health/cache/clear -> drop every cache entry
// - GET  /api/health/metrics     -> Prometheus text

import { Router, type Request, type Response } from "express";
import type { summarizeConfig } from "../config";
import { log } from "../logger";
import type { LimiterRegistry } from "../ops/rate-limit";
import { prometheusText, type Telemetry } from "../ops/telemetry";
import type { AppCache } from "../types";
import { send, type HandlerResult } from "./respond";

export interface HealthDeps {
  cache: AppCache;
  limiters: LimiterRegistry;
  metrics: Telemetry;
  configSummary: ReturnType<typeof summarizeConfig>;
  /** process start, ms since epoch */
  startedAt: number;
  now?: () => number;
}

/* -------------------------------- handlers -------------------------------- */

export function healthStatus(deps: HealthDeps): HandlerResult {
  const now = deps.now?.() ?? Date.now();
  return {
    status: 200,
    body: {
      ok: true,
      service: "supplier-discovery",
      now: new Date(now).toISOString(),
      uptimeSec: Math.max(0, Math.round((now - deps.startedAt) / 1000)),
      startedAtIso: new Date(deps.startedAt).toISOString(),
      config: deps.configSummary,
      cache: deps.cache.stats(),
      limiters: deps.limiters.snapshot(),
    },
  };
}

export function readiness(deps: Pick<HealthDeps, "cache">): HandlerResult {
  const ready = deps.cache.sweeping;
  return { status: ready ? 200 : 503, body: { ok: ready, ready, time: new Date().toISOString() } };
}

export function clearCache(deps: Pick<HealthDeps, "cache">): HandlerResult {
  const cleared = deps.cache.stats().entries;
  deps.cache.clear();
  log.info({ cleared }, "[health] cache cleared");
  return { status: 200, body: { ok: true, cleared } };
}

/** Scrape-time gauges first, then the whole registry as text. */
export function metricsText(deps: Pick<HealthDeps, "cache" | "metrics">): string {
  const s = deps.cache.stats();
  const g = deps.metrics.gauge("cache_stat", { help: "Cache counters at scrape time", labelNames: ["stat"] });
  g.set(s.entries, { stat: "entries" });
  g.set(s.hits, { stat: "hits" });
  g.set(s.misses, { stat: "misses" });
  g.set(s.errors, { stat: "errors" });
  g.set(s.expired, { stat: "expired" });
  return prometheusText(deps.metrics.snapshot());
}

/* --------------------------------- router --------------------------------- */

export default function healthRoutes(deps: HealthDeps) {
  const r = Router();

  r.get("/", (_req: Request, res: Response) => send(res, healthStatus(deps)));

  r.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true, alive: true, at: new Date().toISOString() });
  });

  r.get("/ready", (_req: Request, res: Response) => send(res, readiness(deps)));

  r.get("/cache", (_req: Request, res: Response) => {
    res.json({ ok: true, cache: deps.cache.stats() });
  });

  r.post("/cache/clear", (_req: Request, res: Response) => send(res, clearCache(deps)));

  r.get("/metrics", (_req: Request, res: Response) => {
    res.type("text/plain; version=0.0.4").send(metricsText(deps));
  });

  return r;
}
