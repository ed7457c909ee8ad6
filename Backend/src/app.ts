// src/app.ts
//
// Express app: CORS headers, JSON parser, routers, then the error handler last.

import express from "express";
import { summarizeConfig, type AppConfig } from "./config";
import { errorHandler } from "./middleware/errors";
import { telemetry, type Telemetry } from "./ops/telemetry";
import healthRoutes from "./routes/health";
import marketRoutes from "./routes/market";
import supplierRoutes from "./routes/suppliers";
import type { Services } from "./services";

export interface AppDeps {
  services: Services;
  config: AppConfig;
  metrics?: Telemetry;
  startedAt?: number;
}

export function createApp(deps: AppDeps) {
  const { services } = deps;
  const app = express();

  // ---- CORS (permissive; the API carries no credentials) ----
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Expose-Headers", "X-RateLimit-Limit, X-RateLimit-Remaining, Retry-After");
    next();
  });
  app.use((req, res, next) => {
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  app.use(express.json({ limit: "1mb" }));

  // ---- mounts ----
  app.use(
    "/api/suppliers",
    supplierRoutes({
      discovery: services.discovery,
      limits: { discover: services.endpointLimits.discover, lookup: services.endpointLimits.lookup },
    }),
  );
  app.use(
    "/api/market",
    marketRoutes({
      market: services.market,
      limits: { market: services.endpointLimits.market, lookup: services.endpointLimits.lookup },
    }),
  );
  app.use(
    "/api/health",
    healthRoutes({
      cache: services.cache,
      limiters: services.limiters,
      metrics: deps.metrics ?? telemetry,
      configSummary: summarizeConfig(deps.config),
      startedAt: deps.startedAt ?? Date.now(),
    }),
  );

  app.use("/api", (_req, res) => {
    res.status(404).json({ ok: false, error: "not_found", code: "NOT_FOUND", message: "Unknown endpoint" });
  });

  app.use(errorHandler);
  return app;
}
