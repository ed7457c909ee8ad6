// src/market/prompts.ts
import type { MarketDataPoint } from "./types";

/** Top points only, to stay well inside model context limits. */
export const PROMPT_DATA_POINTS = 10;

export function marketPrompt(product: string, points: readonly MarketDataPoint[]): string {
  const summary = points
    .slice(0, PROMPT_DATA_POINTS)
    .map((p, i) => `${i + 1}. [${p.dataType}] ${p.title}: ${p.content}`)
    .join("\n");
  return [
    `Analyze the following market data for ${product} and return one JSON object.`,
    "",
    "Market data:",
    summary || "(no search data available)",
    "",
    "Structure:",
    "{",
    '  "price_insights": {',
    '    "price_range": {"min": 0, "max": 0, "avg": 0},',
    '    "currency": "USD",',
    '    "unit": "per unit/kg/etc",',
    '    "trend": "increasing | decreasing | stable",',
    '    "factors": ["..."]',
    "  },",
    '  "market_trends": [{"trend_type": "pricing | demand | supply | technology", "description": "...", "impact": "high | medium | low", "confidence": 0.0-1.0}],',
    '  "market_size": "...",',
    '  "growth_rate": "...",',
    '  "key_players": ["..."],',
    '  "opportunities": ["..."],',
    '  "risks": ["..."],',
    '  "recommendations": ["..."]',
    "}",
    "",
    "Focus on price trends, market drivers, competition, supply chain and procurement advice.",
  ].join("\n");
}
