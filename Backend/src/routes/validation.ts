// src/routes/validation.ts
// Request schemas. Every parse goes through `parseInput`, which turns zod issues into a ValidationFailure.

import { z } from "zod";
import { ValidationFailure } from "../errors";
import { TIMEFRAMES } from "../types";

const text = (max: number) => z.string().trim().max(max);

export const DiscoverBody = z.object({
  product: z.string().trim().min(3).max(200),
  location: text(100).optional(),
  requirements: z.array(z.string().trim().min(1).max(200)).max(10).default([]),
  certifications: z.array(z.string().trim().min(1).max(100)).max(10).default([]),
  minRating: z.number().min(1).max(5).optional(),
  maxResults: z.number().int().min(1).max(50).default(10),
});
export type DiscoverBody = z.infer<typeof DiscoverBody>;

export const TimeframeParam = z.enum(TIMEFRAMES);

export const MarketBody = z.object({
  product: z.string().trim().min(3).max(200),
  timeframe: TimeframeParam.default("6months"),
  region: text(100).optional(),
  includeCompetitors: z.boolean().default(true),
  includeTrends: z.boolean().default(true),
});
export type MarketBody = z.infer<typeof MarketBody>;

export const SuggestionsQuery = z.object({
  query: z.string().trim().min(2).max(200),
  limit: z.coerce.number().int().min(1).max(5).default(5),
});

export const TrendsQuery = z.object({
  product: z.string().trim().min(3).max(200),
  timeframe: TimeframeParam.default("6months"),
});

export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const r = schema.safeParse(input);
  if (r.success) return r.data;
  throw new ValidationFailure(r.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })));
}
