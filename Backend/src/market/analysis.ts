// src/market/analysis.ts
// Heuristics over market search data: classification, competitors, trend signals, forecast.

import type { Timeframe } from "../types";
import type {
  CompetitiveLandscape,
  DataType,
  Forecast,
  MarketDataPoint,
  MarketIntelligence,
  TrendCategory,
  TrendSummary,
} from "./types";

const anyOf = (text: string, words: readonly string[]) => words.some((w) => text.includes(w));

export function classifyDataType(title: string, content: string): DataType {
  const text = `${title} ${content}`.toLowerCase();
  if (anyOf(text, ["price", "cost", "pricing", "rate"])) return "pricing";
  if (anyOf(text, ["trend", "forecast", "outlook", "prediction"])) return "trend";
  if (anyOf(text, ["report", "analysis", "study", "research"])) return "research";
  if (anyOf(text, ["supplier", "vendor", "manufacturer"])) return "supplier";
  if (anyOf(text, ["demand", "supply", "inventory"])) return "supply_demand";
  return "general";
}

// ---------------- Competitors ----------------

const COMPETITOR_PATTERNS: readonly RegExp[] = [
  /\b([A-Z][a-zA-Z]+\s+(?:Inc|LLC|Corp|Corporation|Company|Co\.|Ltd))/g,
  /\b([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)*)\s+(?:is|are|has|have)\s+(?:a\s+)?(?:leading|major|top)/g,
  /(?:leading|major|top)\s+companies?\s+(?:include|are|such as)\s+([A-Z][a-zA-Z]+(?:(?:,\s*|\s+and\s+|\s+)[A-Z][a-zA-Z]+)*)/g,
];

export const MAX_COMPETITORS_PER_TEXT = 5;

export function extractCompetitors(title: string, content: string): string[] {
  const text = `${title} ${content}`;
  const out: string[] = [];
  for (const re of COMPETITOR_PATTERNS) {
    for (const m of text.matchAll(re)) {
      const name = (m[1] ?? "").trim();
      if (name.length > 2) out.push(name);
    }
  }
  return out.slice(0, MAX_COMPETITORS_PER_TEXT);
}

const POSITIONING_PATTERNS: readonly RegExp[] = [
  /positioned\s+(?:as|to)\s+([^.]+)/i,
  /market\s+leader\s+in\s+([^.]+)/i,
  /specializes?\s+in\s+([^.]+)/i,
  /focus(?:es)?\s+on\s+([^.]+)/i,
];

export function extractPositioning(content: string): string | undefined {
  for (const re of POSITIONING_PATTERNS) {
    const m = re.exec(content);
    if (m?.[1]) return m[1].trim();
  }
  return undefined;
}

export function buildLandscape(texts: Array<{ title: string; content: string }>): CompetitiveLandscape {
  const players = new Set<string>();
  const positioning: string[] = [];
  for (const t of texts) {
    for (const c of extractCompetitors(t.title, t.content)) players.add(c);
    const p = extractPositioning(t.content);
    if (p && !positioning.includes(p)) positioning.push(p);
  }
  return { keyPlayers: [...players], marketPositioning: positioning };
}

// ---------------- Trend signals ----------------

type Detector = (text: string) => string[];

const DETECTORS: Record<TrendCategory, Detector> = {
  price_trends: (t) => {
    if (anyOf(t, ["price increase", "rising cost", "higher price"])) return ["increasing"];
    if (anyOf(t, ["price decrease", "falling cost", "lower price"])) return ["decreasing"];
    if (anyOf(t, ["stable price", "steady cost", "unchanged"])) return ["stable"];
    return [];
  },
  demand_trends: (t) => {
    if (anyOf(t, ["growing demand", "increased demand", "rising demand"])) return ["increasing_demand"];
    if (anyOf(t, ["declining demand", "decreased demand", "falling demand"])) return ["decreasing_demand"];
    return [];
  },
  supply_trends: (t) => {
    if (anyOf(t, ["supply shortage", "limited supply", "constrained supply"])) return ["supply_shortage"];
    if (anyOf(t, ["abundant supply", "oversupply", "surplus"])) return ["supply_surplus"];
    return [];
  },
  // word match: "ai" must not fire inside "maintain"
  technology_trends: (t) =>
    ["automation", "ai", "digital", "innovation", "technology"]
      .filter((k) => new RegExp(`\\b${k}\\b`).test(t))
      .map((k) => `technology_${k}`),
  regulatory_trends: (t) => (anyOf(t, ["regulation", "compliance", "policy", "law"]) ? ["regulatory_change"] : []),
};

const CATEGORIES: readonly TrendCategory[] = [
  "price_trends",
  "demand_trends",
  "supply_trends",
  "technology_trends",
  "regulatory_trends",
];

export const TOP_TRENDS = 3;

/** Per category, the most frequent signals (ties by first appearance), at most three. */
export function analyzeTrends(points: ReadonlyArray<Pick<MarketDataPoint, "title" | "content">>): TrendSummary {
  const counts = new Map<TrendCategory, Map<string, number>>();
  for (const p of points) {
    const text = `${p.title} ${p.content}`.toLowerCase();
    for (const cat of CATEGORIES) {
      for (const signal of DETECTORS[cat](text)) {
        const m = counts.get(cat) ?? new Map<string, number>();
        m.set(signal, (m.get(signal) ?? 0) + 1);
        counts.set(cat, m);
      }
    }
  }

  const out: TrendSummary = {};
  for (const [cat, m] of counts) {
    out[cat] = [...m.entries()].sort((a, b) => b[1] - a[1]).slice(0, TOP_TRENDS);
  }
  return out;
}

// ---------------- Forecast ----------------

const TIMELINE: Record<Timeframe, string> = {
  "1month": "Short-term price volatility expected",
  "3months": "Quarterly trends should become clearer",
  "6months": "Medium-term market patterns emerging",
  "1year": "Long-term structural changes may occur",
};

const PRICE_OUTLOOK = {
  increasing: { prediction: "Prices expected to continue rising", action: "Consider forward contracts or bulk purchasing" },
  decreasing: { prediction: "Prices may continue to decline", action: "Delay non-urgent purchases if possible" },
  stable: { prediction: "Prices expected to remain stable", action: "Normal procurement timing recommended" },
} as const;

export function buildForecast(intel: MarketIntelligence, timeframe: Timeframe): Forecast {
  const outlook = PRICE_OUTLOOK[intel.priceInsights.trend];
  return {
    timeframe,
    confidenceLevel: intel.source === "fallback" ? "low" : "medium",
    keyPredictions: [outlook.prediction, TIMELINE[timeframe]],
    riskFactors: [...intel.risks],
    opportunities: [...intel.opportunities],
    recommendedActions: [outlook.action],
  };
}

export function fallbackIntelligence(product: string, now = new Date()): MarketIntelligence {
  return {
    productCategory: product,
    priceInsights: {
      priceRange: { min: 0, max: 0, avg: 0 },
      currency: "USD",
      unit: null,
      trend: "stable",
      factors: ["Limited data available"],
    },
    marketTrends: [
      {
        trendType: "data_limitation",
        description: "Insufficient data for comprehensive analysis",
        impact: "medium",
        confidence: 0.3,
      },
    ],
    recommendations: ["Conduct more detailed market research", "Consult industry experts"],
    marketSize: "Data unavailable",
    growthRate: "Data unavailable",
    keyPlayers: [],
    opportunities: ["Potential market opportunity due to limited data"],
    risks: ["Data quality limitations may affect decision-making"],
    source: "fallback",
    dataFreshness: now.toISOString(),
  };
}
