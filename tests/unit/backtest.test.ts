import { describe, expect, it } from 'vitest';
import { backtestRecords, replayDay, runBacktest } from '@/backtesting/engine';
import { queryResolved } from '@/data/repositories/trade_repo';
import { loadStrategy } from '@/strategy/loader';
import { seedResolvedDays, useTempStore } from '../helpers/temp_store';

const universe = ['AAA', 'BBB', 'CCC'];
const values = { AAA: 1, BBB: 2, CCC: 3 };

const momentum = loadStrategy('function scoreAsset(r24, r6, vol, s) { return r24; }');
const contrarian = loadStrategy('function scoreAsset(r24, r6, vol, s) { return -r24; }');

describe('backtest engine', () => {
  useTempStore('backtest');

  it('reports insufficient data below the minimum sample count', () => {
    seedResolvedDays(9, universe, values);

    const result = backtestRecords(momentum, queryResolved(), universe, 10);
    expect(result).toEqual({
      status: 'insufficient_data',
      reason: 'too_few_records',
      sampleCount: 9,
      requiredSamples: 10,
    });
  });

  it('scores a strategy that ranks the realized order perfectly', () => {
    seedResolvedDays(12, universe, values);

    const result = backtestRecords(momentum, queryResolved(), universe, 10);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    expect(result.rankCorrelation).toBeCloseTo(1, 10);
    expect(result.avgReturn).toBe(3);
    expect(result.avgPickRank).toBe(1);
    expect(result.winRate).toBe(1);
    expect(result.sharpeRatio).toBe(0);
    expect(result.sampleCount).toBe(12);
    expect(result.pairCount).toBe(36);
    expect(result.firstDate).toBe('2024-03-01');
    expect(result.lastDate).toBe('2024-03-12');
  });

  it('scores an inverted strategy negatively', () => {
    seedResolvedDays(12, universe, values);

    const result = backtestRecords(contrarian, queryResolved(), universe, 10);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    expect(result.rankCorrelation).toBeCloseTo(-1, 10);
    expect(result.avgReturn).toBe(1);
    expect(result.avgPickRank).toBe(3);
  });

  it('is deterministic for identical inputs', () => {
    seedResolvedDays(12, universe, values);
    const records = queryResolved();

    expect(backtestRecords(momentum, records, universe, 10)).toEqual(
      backtestRecords(momentum, records, universe, 10)
    );
  });

  it('counts failed calls and scores them neutrally', () => {
    seedResolvedDays(12, universe, values);
    const failing = loadStrategy(
      'function scoreAsset(r24, r6, vol, s) { return r24 > 2 ? "bad" : r24; }'
    );

    const result = backtestRecords(failing, queryResolved(), universe, 10);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.failedInvocations).toBe(12);
    // CCC scores 0 and drops last; BBB becomes the pick
    expect(result.avgReturn).toBe(2);
  });

  it('replays one day against the realized ranking', () => {
    seedResolvedDays(1, universe, values);
    const [record] = queryResolved();

    const day = replayDay(momentum, record, universe);
    expect(day.pick).toBe('CCC');
    expect(day.pickReturn).toBe(3);
    expect(day.predictedRanks).toEqual([3, 2, 1]);
    expect(day.actualRanks).toEqual([3, 2, 1]);
  });

  it('limits runBacktest to the most recent window', () => {
    seedResolvedDays(12, universe, values);

    const small = runBacktest(momentum, 5, { universe, minSamples: 10 });
    expect(small.status).toBe('insufficient_data');

    const full = runBacktest(
      'function scoreAsset(r24, r6, vol, s) { return r24; }',
      12,
      { universe, minSamples: 10 }
    );
    expect(full.status).toBe('ok');
  });
});
