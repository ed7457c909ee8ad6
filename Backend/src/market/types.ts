// src/market/types.ts
import type { Timeframe } from "../types";

export type PriceTrend = "increasing" | "decreasing" | "stable";

export interface PriceInsight {
  priceRange: { min: number; max: number; avg: number };
  currency: string;
  unit: string | null;
  trend: PriceTrend;
  factors: string[];
}

export interface MarketTrend {
  trendType: string;
  description: string;
  impact: "high" | "medium" | "low";
  confidence: number;
}

export interface MarketIntelligence {
  productCategory: string;
  priceInsights: PriceInsight;
  marketTrends: MarketTrend[];
  recommendations: string[];
  marketSize: string | null;
  growthRate: string | null;
  keyPlayers: string[];
  opportunities: string[];
  risks: string[];
  /** provider name, or "fallback" */
  source: string;
  dataFreshness: string;
}

export type DataType = "pricing" | "trend" | "research" | "supplier" | "supply_demand" | "general" | "enrichment";

export interface MarketDataPoint {
  title: string;
  content: string;
  source: string;
  url: string;
  relevance: number;
  dataType: DataType;
  query?: string;
}

export interface CompetitiveLandscape {
  keyPlayers: string[];
  marketPositioning: string[];
}

export type TrendCategory = "price_trends" | "demand_trends" | "supply_trends" | "technology_trends" | "regulatory_trends";

/** per category: top signals as [signal, count], most frequent first */
export type TrendSummary = Partial<Record<TrendCategory, Array<[string, number]>>>;

export interface Forecast {
  timeframe: Timeframe;
  confidenceLevel: "low" | "medium" | "high";
  keyPredictions: string[];
  riskFactors: string[];
  opportunities: string[];
  recommendedActions: string[];
}

export interface MarketRequest {
  product: string;
  timeframe: Timeframe;
  region?: string;
  includeCompetitors: boolean;
  includeTrends: boolean;
}

export interface MarketReport {
  marketIntelligence: MarketIntelligence;
  competitiveLandscape: CompetitiveLandscape | null;
  trends: TrendSummary | null;
  forecast: Forecast;
  dataPoints: number;
  processingTime: number;
}
