/**
 * Promotion rule: a candidate replaces the active strategy when it improves
 * rank correlation OR average pick return by at least the configured deltas.
 */

import type { PromotionThresholds } from '@/core/config';
import type { BacktestMetrics } from '@/backtesting/engine';

export interface PromotionEvaluation {
  corrDelta: number;
  returnDelta: number;
  promote: boolean;
  reasons: string[];
}

export function meetsPromotionThreshold(
  corrDelta: number,
  returnDelta: number,
  thresholds: PromotionThresholds
): boolean {
  return corrDelta >= thresholds.minCorrelationDelta || returnDelta >= thresholds.minReturnDelta;
}

export function evaluatePromotion(
  candidate: BacktestMetrics,
  active: BacktestMetrics,
  thresholds: PromotionThresholds
): PromotionEvaluation {
  const corrDelta = candidate.rankCorrelation - active.rankCorrelation;
  const returnDelta = candidate.avgReturn - active.avgReturn;

  const reasons: string[] = [];
  if (corrDelta >= thresholds.minCorrelationDelta) {
    reasons.push(
      `rank correlation +${corrDelta.toFixed(4)} >= ${thresholds.minCorrelationDelta}`
    );
  }
  if (returnDelta >= thresholds.minReturnDelta) {
    reasons.push(`avg return +${returnDelta.toFixed(4)}% >= ${thresholds.minReturnDelta}%`);
  }

  return {
    corrDelta,
    returnDelta,
    promote: meetsPromotionThreshold(corrDelta, returnDelta, thresholds),
    reasons,
  };
}
