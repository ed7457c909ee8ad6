// src/market/schema.ts
import { z } from "zod";
import { OptionalText, StringList, lowerTrim, toNumber, unitInterval } from "../shared/coerce";
import type { MarketIntelligence, MarketTrend } from "./types";

const amount = z.preprocess(toNumber, z.number().finite().nonnegative()).catch(0);

const PriceInsights = z.object({
  price_range: z.object({ min: amount, max: amount, avg: amount }).catch({ min: 0, max: 0, avg: 0 }),
  currency: z.string().trim().min(1).catch("USD"),
  unit: OptionalText,
  trend: z.preprocess(lowerTrim, z.enum(["increasing", "decreasing", "stable"])).catch("stable"),
  factors: StringList,
});

const Trend = z.object({
  trend_type: z.string().trim().min(1),
  description: z.string().trim().min(1),
  impact: z.preprocess(lowerTrim, z.enum(["high", "medium", "low"])).catch("medium"),
  confidence: unitInterval(0.5),
});

export const MarketPayload = z.object({
  price_insights: PriceInsights.catch(PriceInsights.parse({})),
  market_trends: z
    .array(z.unknown())
    .transform((items) =>
      items.flatMap((item): MarketTrend[] => {
        const t = Trend.safeParse(item);
        return t.success
          ? [{ trendType: t.data.trend_type, description: t.data.description, impact: t.data.impact, confidence: t.data.confidence }]
          : [];
      }),
    )
    .catch([]),
  market_size: OptionalText,
  growth_rate: OptionalText,
  key_players: StringList,
  opportunities: StringList,
  risks: StringList,
  recommendations: StringList,
});

export type MarketPayload = z.infer<typeof MarketPayload>;

export function toIntelligence(product: string, raw: unknown, source: string, now = new Date()): MarketIntelligence {
  const parsed = MarketPayload.safeParse(raw);
  const p = parsed.success ? parsed.data : MarketPayload.parse({});
  const pi = p.price_insights;
  return {
    productCategory: product,
    priceInsights: {
      priceRange: { ...pi.price_range },
      currency: pi.currency,
      unit: pi.unit,
      trend: pi.trend,
      factors: pi.factors,
    },
    marketTrends: p.market_trends,
    recommendations: p.recommendations,
    marketSize: p.market_size,
    growthRate: p.growth_rate,
    keyPlayers: p.key_players,
    opportunities: p.opportunities,
    risks: p.risks,
    source,
    dataFreshness: now.toISOString(),
  };
}
