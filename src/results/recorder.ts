/**
 * Result Recorder
 *
 * Once a holding day has closed, ranks the universe by realized 24h return,
 * locates the previously chosen asset in that ranking and back-fills the
 * day's record with the outcome and the full per-asset snapshot that later
 * backtests train on.
 */

import { RecordNotFoundError } from '@/core/errors';
import { canonicalPosition } from '@/core/universe';
import { getTradeRecord, upsertOutcome } from '@/data/repositories/trade_repo';
import type { DailySnapshot } from '@/providers/types';
import { fillFeatures } from '@/scoring/features';
import { rankMap, sortDescending, type Rankable } from '@/scoring/ranking';
import type { AssetDay } from '@/types/signal';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('result_recorder');

const MAX_HEADLINES = 5;

export interface OutcomeRequest {
  date: string;
  realizedReturns: Record<string, number>;
  snapshot: DailySnapshot | null;
  universe: readonly string[];
}

export interface OutcomeReport {
  date: string;
  chosenAsset: string;
  actualReturn: number;
  rank: number;
  universeSize: number;
  topPerformers: Array<{ asset: string; realizedReturn: number }>;
  defaultedReturns: string[];
}

function realizedRankables(
  realizedReturns: Record<string, number>,
  universe: readonly string[]
): { items: Rankable[]; defaulted: string[] } {
  const defaulted: string[] = [];
  const items = universe.map((asset) => {
    const value = realizedReturns[asset];
    const finite = typeof value === 'number' && Number.isFinite(value);
    if (!finite) defaulted.push(asset);
    return { asset, position: canonicalPosition(asset, universe), value: finite ? value : 0 };
  });
  return { items, defaulted };
}

/**
 * 1-indexed position of `chosen` when the universe is sorted by realized
 * return descending (ties by canonical order). An asset outside the universe
 * ranks last.
 */
export function computeRealizedRank(
  chosen: string,
  realizedReturns: Record<string, number>,
  universe: readonly string[]
): number {
  const { items } = realizedRankables(realizedReturns, universe);
  return rankMap(items).get(chosen) ?? universe.length;
}

export function buildAssetDays(
  snapshot: DailySnapshot | null,
  realizedReturns: Record<string, number>,
  universe: readonly string[]
): AssetDay[] {
  const { items } = realizedRankables(realizedReturns, universe);
  return universe.map((asset, index) => {
    const { features } = fillFeatures(snapshot?.assets[asset], snapshot?.sentiment?.[asset]);
    return {
      asset,
      position: canonicalPosition(asset, universe),
      ...features,
      realizedReturn24h: items[index].value,
    };
  });
}

/**
 * Records the outcome for `date`. Throws RecordNotFoundError when no
 * prediction exists for that date; nothing is written in that case.
 */
export function recordOutcome(request: OutcomeRequest): OutcomeReport {
  const { date, realizedReturns, snapshot, universe } = request;

  const record = getTradeRecord(date);
  if (!record) {
    throw new RecordNotFoundError(date);
  }

  const chosenAsset = record.chosenAsset;
  if (!snapshot) {
    logger.warn({ date }, 'No feature snapshot for outcome day, storing default features');
  }
  const { items, defaulted } = realizedRankables(realizedReturns, universe);
  if (defaulted.length > 0) {
    logger.warn({ date, assets: defaulted }, 'Missing realized returns, defaulted to 0');
  }

  const ranks = rankMap(items);
  const rank = ranks.get(chosenAsset) ?? universe.length;
  if (!ranks.has(chosenAsset)) {
    logger.warn({ date, chosenAsset }, 'Chosen asset not in universe, ranked last');
  }
  const actualReturn = items.find((i) => i.asset === chosenAsset)?.value ?? 0;

  const headlines = (snapshot?.headlines?.[chosenAsset] ?? []).slice(0, MAX_HEADLINES).join('\n');
  const summary = snapshot?.summaries?.[chosenAsset] ?? '';

  upsertOutcome(date, {
    actualReturn,
    rank,
    assets: buildAssetDays(snapshot, realizedReturns, universe),
    headlines,
    summary,
  });

  const topPerformers = sortDescending(items)
    .slice(0, 5)
    .map((i) => ({ asset: i.asset, realizedReturn: i.value }));

  logger.info(
    { date, chosenAsset, actualReturn, rank, universeSize: universe.length },
    'Outcome recorded'
  );

  return {
    date,
    chosenAsset,
    actualReturn,
    rank,
    universeSize: universe.length,
    topPerformers,
    defaultedReturns: defaulted,
  };
}
