/**
 * Backtest Engine
 *
 * Replays a strategy over the most recent resolved records. For every day the
 * strategy's ranking of the universe is paired with the realized ranking, and
 * all asset-day pairs feed a single Spearman correlation (not a per-day
 * average). The average return is that of the strategy's top pick per day.
 */

import { getConfig } from '@/core/config';
import { canonicalPosition } from '@/core/universe';
import { queryResolved } from '@/data/repositories/trade_repo';
import { FEATURE_DEFAULTS } from '@/scoring/features';
import { scoreEntries, type ScoringEntry } from '@/scoring/engine';
import { rankMap, type Rankable } from '@/scoring/ranking';
import { loadStrategyOrNeutral } from '@/strategy/loader';
import type { ScoringStrategy } from '@/strategy/types';
import type { AssetDay, ResolvedTradeRecord } from '@/types/signal';
import { createChildLogger } from '@/utils/logger';
import { mean, sharpeRatio, spearman, winRate } from './stats';

const logger = createChildLogger('backtest');

export interface BacktestMetrics {
  status: 'ok';
  rankCorrelation: number;
  /** Mean realized return (percent) of the strategy's pick per day. */
  avgReturn: number;
  sharpeRatio: number;
  winRate: number;
  /** Mean realized rank of the strategy's pick. */
  avgPickRank: number;
  sampleCount: number;
  pairCount: number;
  failedInvocations: number;
  firstDate: string;
  lastDate: string;
}

export interface InsufficientData {
  status: 'insufficient_data';
  reason: 'too_few_records' | 'degenerate_ranking';
  sampleCount: number;
  requiredSamples: number;
}

export type BacktestResult = BacktestMetrics | InsufficientData;

export interface BacktestOptions {
  minSamples?: number;
  universe?: readonly string[];
  timeoutMs?: number;
}

export interface DailyReplay {
  date: string;
  pick: string;
  pickReturn: number;
  pickRank: number;
  predictedRanks: number[];
  actualRanks: number[];
  failed: number;
}

function dayEntries(record: ResolvedTradeRecord, universe: readonly string[]): {
  entries: ScoringEntry[];
  realized: Rankable[];
} {
  const byAsset = new Map<string, AssetDay>(record.assets.map((a) => [a.asset, a]));
  const entries: ScoringEntry[] = [];
  const realized: Rankable[] = [];

  for (const asset of universe) {
    const stored = byAsset.get(asset);
    const position = canonicalPosition(asset, universe);
    entries.push({
      asset,
      position,
      features: stored ?? { ...FEATURE_DEFAULTS, currentPrice: null },
    });
    realized.push({ asset, position, value: stored?.realizedReturn24h ?? 0 });
  }

  return { entries, realized };
}

/**
 * Scores one resolved day. Pair order follows the universe order.
 */
export function replayDay(
  strategy: ScoringStrategy,
  record: ResolvedTradeRecord,
  universe: readonly string[]
): DailyReplay {
  const { entries, realized } = dayEntries(record, universe);
  const pass = scoreEntries(strategy, entries, { date: record.date, logFailures: false });

  const predicted = rankMap(pass.scores);
  const actual = rankMap(realized);
  const pick = pass.top?.asset ?? universe[0];

  return {
    date: record.date,
    pick,
    pickReturn: realized.find((r) => r.asset === pick)?.value ?? 0,
    pickRank: actual.get(pick) ?? universe.length,
    predictedRanks: universe.map((asset) => predicted.get(asset) ?? universe.length),
    actualRanks: universe.map((asset) => actual.get(asset) ?? universe.length),
    failed: pass.failedAssets.length,
  };
}

/**
 * Pure backtest over the given records (most recent first, as stored).
 */
export function backtestRecords(
  strategy: ScoringStrategy,
  records: readonly ResolvedTradeRecord[],
  universe: readonly string[],
  minSamples: number
): BacktestResult {
  if (records.length < minSamples) {
    return {
      status: 'insufficient_data',
      reason: 'too_few_records',
      sampleCount: records.length,
      requiredSamples: minSamples,
    };
  }

  const predictedRanks: number[] = [];
  const actualRanks: number[] = [];
  const pickReturns: number[] = [];
  const pickRanks: number[] = [];
  let failedInvocations = 0;

  for (const record of records) {
    const day = replayDay(strategy, record, universe);
    predictedRanks.push(...day.predictedRanks);
    actualRanks.push(...day.actualRanks);
    pickReturns.push(day.pickReturn);
    pickRanks.push(day.pickRank);
    failedInvocations += day.failed;
  }

  const rankCorrelation = spearman(predictedRanks, actualRanks);
  const avgReturn = mean(pickReturns);
  const avgPickRank = mean(pickRanks);

  if (rankCorrelation === null || avgReturn === null || avgPickRank === null) {
    return {
      status: 'insufficient_data',
      reason: 'degenerate_ranking',
      sampleCount: records.length,
      requiredSamples: minSamples,
    };
  }

  if (failedInvocations > 0) {
    logger.warn(
      { strategy: strategy.label, failedInvocations, days: records.length },
      'Strategy calls failed during backtest and were scored neutral'
    );
  }

  return {
    status: 'ok',
    rankCorrelation,
    avgReturn,
    sharpeRatio: sharpeRatio(pickReturns),
    winRate: winRate(pickReturns),
    avgPickRank,
    sampleCount: records.length,
    pairCount: predictedRanks.length,
    failedInvocations,
    firstDate: records[records.length - 1].date,
    lastDate: records[0].date,
  };
}

/**
 * Backtest a strategy (or strategy source) over the `window` most recent
 * resolved records in the feature store.
 */
export function runBacktest(
  strategy: ScoringStrategy | string,
  window: number,
  options: BacktestOptions = {}
): BacktestResult {
  const config = getConfig();
  const universe = options.universe ?? config.universe.symbols;
  const minSamples = options.minSamples ?? config.engine.backtest.minSamples;
  const timeoutMs = options.timeoutMs ?? config.engine.strategyTimeoutMs;

  const records = queryResolved({ limit: window });
  if (records.length < minSamples) {
    logger.info(
      { available: records.length, required: minSamples },
      'Not enough resolved records to backtest'
    );
    return {
      status: 'insufficient_data',
      reason: 'too_few_records',
      sampleCount: records.length,
      requiredSamples: minSamples,
    };
  }

  const loaded =
    typeof strategy === 'string' ? loadStrategyOrNeutral(strategy, { timeoutMs }) : strategy;

  const result = backtestRecords(loaded, records, universe, minSamples);
  if (result.status === 'ok') {
    logger.info(
      {
        strategy: loaded.label,
        days: result.sampleCount,
        rankCorrelation: result.rankCorrelation,
        avgReturn: result.avgReturn,
      },
      'Backtest complete'
    );
  }
  return result;
}
