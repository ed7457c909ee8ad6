// src/middleware/rateLimit.ts
import type { IncomingHttpHeaders } from "http";
import { retryAfterWire, type Limiter, type RateLimitDecision } from "../ops/rate-limit";
import { RateLimitExceeded } from "../errors";

/** The parts of an Express request the limiter reads. */
export interface CallerRequest {
  headers: IncomingHttpHeaders;
  ip?: string;
  socket: { remoteAddress?: string };
}

/** The parts of an Express response the limiter writes. */
export interface LimitedResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): { json(body: unknown): unknown };
}

export type RateLimitOptions = {
  /** operation name, appended to the caller key */
  operation: string;
  /** derive the caller identity (client ip by default) */
  key?: (req: CallerRequest) => string;
  /** set X-RateLimit-* headers */
  headers?: boolean;
};

export function callerKey(req: CallerRequest): string {
  // prefer x-forwarded-for if present (behind proxies), else ip/remoteAddress
  const raw = req.headers["x-forwarded-for"];
  const fwd = (Array.isArray(raw) ? raw[0] : raw)?.split(",")[0]?.trim();
  return fwd || req.ip || req.socket.remoteAddress || "unknown";
}

/** JSON body sent with a 429. */
export function rateLimitBody(d: RateLimitDecision) {
  const err = new RateLimitExceeded(d.limit, d.windowSec, d.retryAfterSec);
  return {
    ok: false as const,
    error: "RATE_LIMITED",
    code: err.code,
    message: err.message,
    limit: d.limit,
    windowSec: d.windowSec,
    retryAfterSec: retryAfterWire(d.retryAfterSec),
  };
}

/**
 * Express rate limit middleware over any Limiter; state is keyed by
 * `${caller}:${operation}` so operations never share a window.
 */
export default function limitRequests(limiter: Limiter, opts: RateLimitOptions) {
  const keyFn = opts.key ?? callerKey;
  const sendHeaders = opts.headers ?? true;

  return (req: CallerRequest, res: LimitedResponse, next: () => void): void => {
    const decision = limiter.check(`${keyFn(req)}:${opts.operation}`);

    // headers must be strings – never pass undefined
    if (sendHeaders) {
      res.setHeader("X-RateLimit-Limit", String(decision.limit));
      res.setHeader("X-RateLimit-Remaining", String(Math.max(0, decision.remaining)));
    }

    if (!decision.allowed) {
      res.setHeader("Retry-After", String(retryAfterWire(decision.retryAfterSec)));
      res.status(429).json(rateLimitBody(decision));
      return;
    }

    next();
  };
}
