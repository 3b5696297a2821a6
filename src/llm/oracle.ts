/**
 * Strategy oracle contract. An oracle proposes new scoring-function source;
 * whatever it returns is untrusted until validated and backtested.
 */

export interface RealizedAssetReturn {
  asset: string;
  realizedReturn: number;
}

export interface DailyProposalContext {
  date: string;
  chosenAsset: string;
  actualReturn: number;
  rank: number;
  universeSize: number;
  /** Universe sorted by realized return, best first. */
  realizedReturns: RealizedAssetReturn[];
  headlines: string;
  activeCode: string;
  activeVersion: number;
}

export interface PerformanceDigest {
  totalTrades: number;
  avgReturn: number;
  sharpeRatio: number;
  winRate: number;
  avgRank: number;
}

export interface RecentOutcome {
  date: string;
  chosenAsset: string;
  actualReturn: number;
  rank: number;
}

export interface LongTermProposalContext {
  date: string;
  universeSize: number;
  activeCode: string;
  activeVersion: number;
  performance: PerformanceDigest;
  recentOutcomes: RecentOutcome[];
}

export interface StrategyOracle {
  readonly name: string;
  /** Raw response text, or null when the oracle has nothing to offer. */
  proposeDaily(context: DailyProposalContext): Promise<string | null>;
  proposeLongTerm(context: LongTermProposalContext): Promise<string | null>;
}
