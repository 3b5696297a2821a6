/**
 * Prediction Engine
 * Scores today's universe with the active strategy and records the top asset.
 */

import { DataUnavailableError, NoScorableAssetsError } from '@/core/errors';
import { canonicalPosition } from '@/core/universe';
import { upsertPrediction } from '@/data/repositories/trade_repo';
import type { TradeDirective } from '@/execution/directives';
import type { DailySnapshot } from '@/providers/types';
import { scoreEntries, type AssetScore, type ScoringEntry } from '@/scoring/engine';
import { fillFeatures } from '@/scoring/features';
import type { ScoringStrategy } from '@/strategy/types';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('prediction_engine');

export interface PredictionRequest {
  date: string;
  snapshot: DailySnapshot | null;
  universe: readonly string[];
  strategy: ScoringStrategy;
}

export interface PredictionResult {
  date: string;
  chosenAsset: string;
  chosenScore: number;
  modelVersion: number;
  /** Canonical order. */
  scores: AssetScore[];
  missingAssets: string[];
  failedAssets: string[];
  directive: TradeDirective;
}

export function buildScoringEntries(
  date: string,
  snapshot: DailySnapshot | null,
  universe: readonly string[]
): { entries: ScoringEntry[]; missingAssets: string[] } {
  const entries: ScoringEntry[] = [];
  const missingAssets: string[] = [];

  for (const asset of universe) {
    const raw = snapshot?.assets[asset];
    if (!raw) {
      missingAssets.push(asset);
      const unavailable = new DataUnavailableError(asset, date, 'feature snapshot');
      logger.warn({ asset, date, code: unavailable.code }, 'Missing snapshot, using defaults');
    }

    const { features, missing } = fillFeatures(raw, snapshot?.sentiment?.[asset]);
    if (raw && missing.length > 0) {
      logger.debug({ asset, date, missing }, 'Defaulted missing feature fields');
    }

    entries.push({ asset, position: canonicalPosition(asset, universe), features });
  }

  return { entries, missingAssets };
}

/**
 * Score, pick and persist today's prediction.
 * Throws NoScorableAssetsError when no asset has a snapshot.
 */
export function runPrediction(request: PredictionRequest): PredictionResult {
  const { date, snapshot, universe, strategy } = request;

  const { entries, missingAssets } = buildScoringEntries(date, snapshot, universe);
  if (missingAssets.length === universe.length) {
    throw new NoScorableAssetsError(date);
  }

  const pass = scoreEntries(strategy, entries, { date });
  if (!pass.top) {
    throw new NoScorableAssetsError(date);
  }

  const modelVersion = strategy.version ?? 0;
  upsertPrediction(date, pass.top.asset, pass.top.score, modelVersion);

  logger.info(
    {
      date,
      chosenAsset: pass.top.asset,
      chosenScore: pass.top.score,
      modelVersion,
      missing: missingAssets.length,
      failed: pass.failedAssets.length,
    },
    'Prediction recorded'
  );

  return {
    date,
    chosenAsset: pass.top.asset,
    chosenScore: pass.top.score,
    modelVersion,
    scores: pass.scores,
    missingAssets,
    failedAssets: pass.failedAssets,
    directive: { asset: pass.top.asset, directive: 'buy-all-cash', date },
  };
}
