/**
 * Resolves the strategy used for live predictions from the version registry.
 */

import { getActiveModelVersion } from '@/data/repositories/model_version_repo';
import { createChildLogger } from '@/utils/logger';
import { loadBaselineStrategy, loadStrategyOrNeutral } from './loader';
import type { ScoringStrategy } from './types';

const logger = createChildLogger('strategy_registry');

/**
 * The active promoted version, or the built-in baseline before any promotion.
 */
export function resolveActiveStrategy(timeoutMs?: number): ScoringStrategy {
  const active = getActiveModelVersion();
  if (!active) {
    logger.info('No promoted strategy yet, using baseline');
    return loadBaselineStrategy(timeoutMs);
  }

  return loadStrategyOrNeutral(active.strategyCode, {
    version: active.version,
    label: `v${active.version}`,
    timeoutMs,
  });
}
