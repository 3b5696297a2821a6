/**
 * Scoring pass: one strategy applied to every asset of one day.
 */

import { scoreWithFallback } from '@/strategy/invoke';
import type { ScoringStrategy } from '@/strategy/types';
import type { AssetFeatures } from '@/types/signal';
import { toScoringInputs } from './features';
import { selectTop, type Rankable } from './ranking';

export interface ScoringEntry {
  asset: string;
  position: number;
  features: AssetFeatures;
}

export interface AssetScore extends Rankable {
  /** Same as value; kept under a domain name for callers and logs. */
  score: number;
  failed: boolean;
}

export interface ScoringPass {
  scores: AssetScore[];
  top: AssetScore | null;
  failedAssets: string[];
}

/**
 * Scores entries in their given order. A failing call scores 0.0 for that
 * asset only.
 */
export function scoreEntries(
  strategy: ScoringStrategy,
  entries: readonly ScoringEntry[],
  options: { date?: string; logFailures?: boolean } = {}
): ScoringPass {
  const scores: AssetScore[] = [];
  const failedAssets: string[] = [];

  for (const entry of entries) {
    const guarded = scoreWithFallback(strategy, entry.asset, toScoringInputs(entry.features), {
      date: options.date,
      log: options.logFailures,
    });
    if (guarded.error) failedAssets.push(entry.asset);
    scores.push({
      asset: entry.asset,
      position: entry.position,
      value: guarded.score,
      score: guarded.score,
      failed: guarded.error !== null,
    });
  }

  return { scores, top: selectTop(scores), failedAssets };
}
