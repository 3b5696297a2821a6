import { ScoringError, toError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import type { ScoringInputs, ScoringStrategy } from './types';

const logger = createChildLogger('strategy_invoke');

export const NEUTRAL_SCORE = 0;

export interface GuardedScore {
  score: number;
  error: ScoringError | null;
}

/**
 * Fault boundary around a single strategy call. Any failure scores the asset
 * neutrally and is logged; it never propagates.
 */
export function scoreWithFallback(
  strategy: ScoringStrategy,
  asset: string,
  inputs: ScoringInputs,
  options: { date?: string; log?: boolean } = {}
): GuardedScore {
  try {
    return { score: strategy.score(inputs), error: null };
  } catch (error) {
    const cause = toError(error);
    const scoringError = new ScoringError(
      `Strategy ${strategy.label} failed for ${asset}: ${cause.message}`,
      asset,
      cause
    );
    if (options.log !== false) {
      logger.warn(
        { asset, date: options.date, strategy: strategy.label, error: cause.message },
        'Scoring failed, using neutral score'
      );
    }
    return { score: NEUTRAL_SCORE, error: scoringError };
  }
}
