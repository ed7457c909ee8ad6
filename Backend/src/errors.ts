// src/errors.ts
/**
 * Error taxonomy. Every class carries a stable machine code and the HTTP
 * status the error handler should answer with.
 *
 * Only RateLimitExceeded, ValidationFailure and DiscoveryTimeout are meant to
 * reach a caller; the rest are absorbed inside the pipeline and degrade the
 * result instead.
 */

export type ErrorCode =
  | "SEARCH_001"
  | "LLM_001"
  | "CACHE_001"
  | "RATE_001"
  | "VALID_001"
  | "TIMEOUT_001";

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Search provider transport / timeout / quota failure for one query. */
export class SearchFailure extends AppError {
  constructor(readonly provider: string, message: string, options?: { cause?: unknown }) {
    super("SEARCH_001", 502, `[${provider}] ${message}`, options);
  }
}

export type ProviderErrorKind = "transport" | "timeout" | "quota" | "http" | "rate_limited" | "config";

/** One language-model provider failed to produce text. */
export class EnrichmentFailure extends AppError {
  constructor(
    readonly provider: string,
    readonly kind: ProviderErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("LLM_001", 502, `[${provider}] ${kind}: ${message}`, options);
  }
}

/** Internal to the cache; never surfaced. */
export class CacheFailure extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_001", 500, message, options);
  }
}

export class RateLimitExceeded extends AppError {
  constructor(
    readonly limit: number,
    readonly windowSec: number,
    readonly retryAfterSec: number,
    message = "Rate limit exceeded",
  ) {
    super("RATE_001", 429, message);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationFailure extends AppError {
  constructor(readonly issues: ValidationIssue[]) {
    super("VALID_001", 400, issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ") || "Invalid request");
  }
}

export class DiscoveryTimeout extends AppError {
  constructor(readonly timeoutMs: number) {
    super("TIMEOUT_001", 504, `Request did not complete within ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** True for the DOMException/Error produced by an aborted signal. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
