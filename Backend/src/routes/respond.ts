// src/routes/respond.ts
import type { Response } from "express";

/** What every route handler returns; Express only sees it in `send`. */
export interface HandlerResult<B = unknown> {
  status: number;
  body: B;
}

export function send(res: Response, result: HandlerResult) {
  res.status(result.status).json(result.body);
}

/** Aborts when the client goes away before the response is written. */
export function responseSignal(res: Response): AbortSignal {
  const ctrl = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) ctrl.abort(new Error("client disconnected"));
  });
  return ctrl.signal;
}
