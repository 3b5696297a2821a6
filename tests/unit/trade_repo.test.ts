import { describe, expect, it } from 'vitest';
import { InvalidRecordError, RecordNotFoundError } from '@/core/errors';
import { getDatabase } from '@/data/db';
import {
  countResolved,
  getPerformanceSummary,
  getTradeRecord,
  isResolved,
  listRecentRecords,
  queryResolved,
  upsertOutcome,
  upsertPrediction,
} from '@/data/repositories/trade_repo';
import { makeAssetDay, marchDay, seedResolvedDay, useTempStore } from '../helpers/temp_store';

const universe = ['AAA', 'BBB', 'CCC'];

function outcome(rank: number, actualReturn = 1.5) {
  return {
    actualReturn,
    rank,
    assets: universe.map((asset, position) =>
      makeAssetDay(asset, position, { return24h: position, realizedReturn24h: position * 2 })
    ),
    headlines: 'headline one\nheadline two',
    summary: 'summary',
  };
}

describe('trade_repo', () => {
  useTempStore('trade-repo');

  it('upserts predictions idempotently on date', () => {
    upsertPrediction('2024-03-01', 'AAA', 1.2, 0);
    const first = getTradeRecord('2024-03-01');
    upsertPrediction('2024-03-01', 'BBB', 3.4, 2);

    const count = getDatabase()
      .prepare('SELECT COUNT(*) AS n FROM trade_records')
      .get() as { n: number };
    const record = getTradeRecord('2024-03-01');

    expect(count.n).toBe(1);
    expect(record?.chosenAsset).toBe('BBB');
    expect(record?.chosenScore).toBe(3.4);
    expect(record?.modelVersion).toBe(2);
    expect(record?.createdAt).toBe(first?.createdAt);
  });

  it('leaves the record unchanged when the same prediction is written twice', () => {
    upsertPrediction('2024-03-01', 'CCC', 0.7, 1);
    upsertOutcome('2024-03-01', outcome(2));
    const before = getTradeRecord('2024-03-01');

    upsertPrediction('2024-03-01', 'CCC', 0.7, 1);
    const after = getTradeRecord('2024-03-01');

    expect(before).not.toBeNull();
    expect(after).toEqual(before);
    expect(after?.createdAt).toBe(before?.createdAt);
    expect(after?.assets).toEqual(before?.assets);
  });

  it('returns null for an unknown date', () => {
    expect(getTradeRecord('2024-03-01')).toBeNull();
  });

  it('merges the outcome into an existing prediction', () => {
    upsertPrediction('2024-03-01', 'CCC', 0.7, 1);
    upsertOutcome('2024-03-01', outcome(2));

    const record = getTradeRecord('2024-03-01');
    expect(record).not.toBeNull();
    if (!record) return;

    expect(isResolved(record)).toBe(true);
    expect(record.chosenAsset).toBe('CCC');
    expect(record.actualReturnOfChosen).toBe(1.5);
    expect(record.rankOfChosen).toBe(2);
    expect(record.newsHeadlines).toBe('headline one\nheadline two');
    expect(record.assets.map((a) => a.asset)).toEqual(universe);
    expect(record.assets[2].realizedReturn24h).toBe(4);
  });

  it('keeps the outcome when the prediction is written again', () => {
    upsertPrediction('2024-03-01', 'CCC', 0.7, 1);
    upsertOutcome('2024-03-01', outcome(2));
    upsertPrediction('2024-03-01', 'AAA', 0.9, 1);

    const record = getTradeRecord('2024-03-01');
    expect(record?.chosenAsset).toBe('AAA');
    expect(record?.actualReturnOfChosen).toBe(1.5);
    expect(record?.rankOfChosen).toBe(2);
  });

  it('rewrites the outcome without duplicating asset rows', () => {
    upsertPrediction('2024-03-01', 'CCC', 0.7, 1);
    upsertOutcome('2024-03-01', outcome(2));
    upsertOutcome('2024-03-01', outcome(3, -0.5));

    const record = getTradeRecord('2024-03-01');
    expect(record?.rankOfChosen).toBe(3);
    expect(record?.actualReturnOfChosen).toBe(-0.5);
    expect(record?.assets).toHaveLength(3);
  });

  it('refuses an outcome for a date without a prediction', () => {
    expect(() => upsertOutcome('2024-03-01', outcome(1))).toThrow(RecordNotFoundError);
    expect(getTradeRecord('2024-03-01')).toBeNull();
  });

  it('refuses an outcome without asset rows', () => {
    upsertPrediction('2024-03-01', 'AAA', 1, 0);
    expect(() => upsertOutcome('2024-03-01', { ...outcome(1), assets: [] })).toThrow(
      InvalidRecordError
    );
  });

  it('refuses ranks outside [1, N]', () => {
    upsertPrediction('2024-03-01', 'AAA', 1, 0);
    expect(() => upsertOutcome('2024-03-01', outcome(0))).toThrow(InvalidRecordError);
    expect(() => upsertOutcome('2024-03-01', outcome(4))).toThrow('Rank 4 outside [1, 3]');
    expect(getTradeRecord('2024-03-01')?.rankOfChosen).toBeNull();
  });

  it('queries resolved records most recent first', () => {
    seedResolvedDay(marchDay(1), universe, { AAA: 1 });
    seedResolvedDay(marchDay(3), universe, { AAA: 3 });
    seedResolvedDay(marchDay(2), universe, { AAA: 2 });
    upsertPrediction(marchDay(4), 'AAA', 0, 0);

    expect(queryResolved().map((r) => r.date)).toEqual([marchDay(3), marchDay(2), marchDay(1)]);
    expect(queryResolved({ limit: 2 }).map((r) => r.date)).toEqual([marchDay(3), marchDay(2)]);
    expect(queryResolved({ since: marchDay(2) })).toHaveLength(2);
    expect(countResolved()).toBe(3);
    expect(listRecentRecords(10).map((r) => r.date)[0]).toBe(marchDay(4));
  });

  it('summarizes resolved performance', () => {
    seedResolvedDay(marchDay(1), universe, { AAA: 2 });
    seedResolvedDay(marchDay(2), universe, { AAA: -1 });

    const summary = getPerformanceSummary();
    expect(summary.totalTrades).toBe(2);
    expect(summary.avgReturn).toBe(0.5);
    expect(summary.winRatePct).toBe(50);
    expect(summary.bestReturn).toBe(2);
    expect(summary.worstReturn).toBe(-1);
  });

  it('reports an empty summary before any trade resolves', () => {
    const summary = getPerformanceSummary();
    expect(summary.totalTrades).toBe(0);
    expect(summary.avgReturn).toBeNull();
  });
});
