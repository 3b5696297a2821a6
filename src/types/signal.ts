/**
 * Core records persisted by the feature store.
 */

export interface AssetFeatures {
  return1h: number;
  return6h: number;
  return24h: number;
  rsi14: number;
  volumeRatio: number;
  newsSentiment: number;
  currentPrice: number | null;
}

/** One asset on one trading day: prediction-time features plus the realized outcome. */
export interface AssetDay extends AssetFeatures {
  asset: string;
  position: number;
  realizedReturn24h: number;
}

export interface TradeRecord {
  date: string;
  chosenAsset: string;
  chosenScore: number;
  modelVersion: number;
  actualReturnOfChosen: number | null;
  rankOfChosen: number | null;
  newsHeadlines: string | null;
  strategySummary: string | null;
  createdAt: string;
  resolvedAt: string | null;
  /** Ordered by canonical position. Empty until the outcome is recorded. */
  assets: AssetDay[];
}

export interface ResolvedTradeRecord extends TradeRecord {
  actualReturnOfChosen: number;
  rankOfChosen: number;
  resolvedAt: string;
}

export interface OutcomeWrite {
  actualReturn: number;
  rank: number;
  assets: AssetDay[];
  headlines: string;
  summary: string;
}

export type ImprovementType = 'initial' | 'daily' | 'long_term' | 'rollback';

export interface ModelVersion {
  version: number;
  strategyCode: string;
  codeHash: string;
  rankCorrelation: number | null;
  avgDailyReturn: number | null;
  improvementType: ImprovementType;
  rolledBackFrom: number | null;
  createdAt: string;
}

export interface NewModelVersion {
  strategyCode: string;
  rankCorrelation: number | null;
  avgDailyReturn: number | null;
  improvementType: ImprovementType;
  rolledBackFrom?: number | null;
}

export interface ResolvedQuery {
  limit?: number;
  /** Inclusive lower bound, yyyy-MM-dd. */
  since?: string;
}

export interface PerformanceSummary {
  totalTrades: number;
  avgReturn: number | null;
  avgRank: number | null;
  winRatePct: number | null;
  bestReturn: number | null;
  worstReturn: number | null;
  currentVersion: number | null;
}
