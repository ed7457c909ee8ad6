// src/routes/market.ts
import { Router } from "express";
import { asyncRoute } from "../middleware/errors";
import limitRequests from "../middleware/rateLimit";
import type { MarketIntelService } from "../market/market-intel";
import type { Limiter } from "../ops/rate-limit";
import { MarketBody, TrendsQuery, parseInput } from "./validation";
import { responseSignal, send, type HandlerResult } from "./respond";

export interface MarketRouteDeps {
  market: MarketIntelService;
  limits: { market: Limiter; lookup: Limiter };
}

export async function handleIntelligence(
  input: unknown,
  deps: Pick<MarketRouteDeps, "market">,
  signal?: AbortSignal,
): Promise<HandlerResult> {
  const body = parseInput(MarketBody, input);
  const report = await deps.market.analyze(
    {
      product: body.product,
      timeframe: body.timeframe,
      region: body.region || undefined,
      includeCompetitors: body.includeCompetitors,
      includeTrends: body.includeTrends,
    },
    { signal },
  );
  return { status: 200, body: { ok: true, product: body.product, timeframe: body.timeframe, ...report } };
}

export async function handleTrends(
  query: unknown,
  deps: Pick<MarketRouteDeps, "market">,
  signal?: AbortSignal,
): Promise<HandlerResult> {
  const q = parseInput(TrendsQuery, query);
  const trends = await deps.market.trends(q.product, q.timeframe, { signal });
  return { status: 200, body: { ok: true, product: q.product, timeframe: q.timeframe, trends } };
}

export default function marketRoutes(deps: MarketRouteDeps) {
  const r = Router();

  r.post(
    "/intelligence",
    limitRequests(deps.limits.market, { operation: "market" }),
    asyncRoute(async (req, res) => {
      send(res, await handleIntelligence(req.body, deps, responseSignal(res)));
    }),
  );

  r.get(
    "/trends",
    limitRequests(deps.limits.lookup, { operation: "trends" }),
    asyncRoute(async (req, res) => {
      send(res, await handleTrends(req.query, deps, responseSignal(res)));
    }),
  );

  return r;
}
