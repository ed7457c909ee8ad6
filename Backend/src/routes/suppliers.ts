// src/routes/suppliers.ts
import { Router } from "express";
import type { SupplierDiscoveryService } from "../discovery/supplier-discovery";
import { asyncRoute } from "../middleware/errors";
import limitRequests from "../middleware/rateLimit";
import type { Limiter } from "../ops/rate-limit";
import { suggestions } from "../search/fanout";
import { DiscoverBody, SuggestionsQuery, parseInput } from "./validation";
import { responseSignal, send, type HandlerResult } from "./respond";

export interface SupplierRouteDeps {
  discovery: SupplierDiscoveryService;
  limits: { discover: Limiter; lookup: Limiter };
}

export async function handleDiscover(
  input: unknown,
  deps: Pick<SupplierRouteDeps, "discovery">,
  signal?: AbortSignal,
): Promise<HandlerResult> {
  const body = parseInput(DiscoverBody, input);
  const out = await deps.discovery.discover(
    {
      product: body.product,
      location: body.location || undefined,
      requirements: body.requirements,
      certifications: body.certifications,
      minRating: body.minRating,
      maxResults: body.maxResults,
    },
    { signal },
  );
  return { status: 200, body: { ok: true, ...out } };
}

export function handleSuggestions(query: unknown): HandlerResult {
  const q = parseInput(SuggestionsQuery, query);
  return { status: 200, body: { ok: true, query: q.query, suggestions: suggestions(q.query, q.limit) } };
}

export default function supplierRoutes(deps: SupplierRouteDeps) {
  const r = Router();

  r.post(
    "/discover",
    limitRequests(deps.limits.discover, { operation: "discover" }),
    asyncRoute(async (req, res) => {
      send(res, await handleDiscover(req.body, deps, responseSignal(res)));
    }),
  );

  r.get("/suggestions", limitRequests(deps.limits.lookup, { operation: "suggestions" }), (req, res) => {
    send(res, handleSuggestions(req.query));
  });

  return r;
}
