// src/middleware/errors.ts
import type { Request, Response } from 'express';
import { log } from '../logger';
import { AppError, RateLimitExceeded, ValidationFailure } from '../errors';
import { retryAfterWire } from '../ops/rate-limit';

export interface ErrorBody {
  ok: false;
  error: string;
  code: string;
  message: string;
  [extra: string]: unknown;
}

/** Status + JSON body for any thrown value. */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof RateLimitExceeded) {
    return {
      status: err.status,
      body: {
        ok: false,
        error: 'RATE_LIMITED',
        code: err.code,
        message: err.message,
        limit: err.limit,
        windowSec: err.windowSec,
        retryAfterSec: retryAfterWire(err.retryAfterSec),
      },
    };
  }
  if (err instanceof ValidationFailure) {
    return { status: err.status, body: { ok: false, error: 'INVALID_REQUEST', code: err.code, message: err.message, issues: err.issues } };
  }
  if (err instanceof AppError) {
    return { status: err.status, body: { ok: false, error: err.name, code: err.code, message: err.message } };
  }
  return { status: 500, body: { ok: false, error: 'internal_error', code: 'INTERNAL', message: 'Internal Server Error' } };
}

export interface JsonResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): { json(body: unknown): unknown };
}

export function errorHandler(err: unknown, _req: unknown, res: JsonResponse, _next: unknown) {
  const { status, body } = toErrorResponse(err);

  if (status >= 500) log.error({ err }, '[error] unhandled');
  else log.warn({ err }, '[warn] handled');

  if (err instanceof RateLimitExceeded) res.setHeader('Retry-After', String(body.retryAfterSec));
  res.status(status).json(body);
}

/** Forwards async handler rejections to the error handler. */
export function asyncRoute<Req = Request, Res = Response>(fn: (req: Req, res: Res) => Promise<void>) {
  return (req: Req, res: Res, next: (err?: unknown) => void): void => {
    fn(req, res).catch(next);
  };
}
