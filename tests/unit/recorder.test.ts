import { describe, expect, it } from 'vitest';
import { RecordNotFoundError } from '@/core/errors';
import { getTradeRecord, upsertPrediction } from '@/data/repositories/trade_repo';
import type { DailySnapshot } from '@/providers/types';
import { buildAssetDays, recordOutcome } from '@/results/recorder';
import { useTempStore } from '../helpers/temp_store';

const universe = ['A', 'B', 'C'];

const snapshot: DailySnapshot = {
  date: '2024-03-01',
  assets: {
    A: { return_24h: 1.5, return_6h: 0.5, volume_ratio: 2, rsi_14: 61, current_price: 10 },
    C: { return_24h: -0.5 },
  },
  sentiment: { A: 0.4 },
  headlines: { A: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] },
  summaries: { A: 'A rallied' },
};

describe('buildAssetDays', () => {
  it('pairs stored features with realized returns in universe order', () => {
    const days = buildAssetDays(snapshot, { A: 5, B: -2, C: 9 }, universe);
    expect(days.map((d) => [d.asset, d.position, d.realizedReturn24h])).toEqual([
      ['A', 0, 5],
      ['B', 1, -2],
      ['C', 2, 9],
    ]);
    expect(days[0].return24h).toBe(1.5);
    expect(days[0].newsSentiment).toBe(0.4);
    expect(days[1].rsi14).toBe(50);
  });
});

describe('recordOutcome', () => {
  useTempStore('recorder');

  it('records rank, return, headlines and per-asset rows', () => {
    upsertPrediction('2024-03-01', 'A', 2.1, 0);

    const report = recordOutcome({
      date: '2024-03-01',
      realizedReturns: { A: 5, B: -2, C: 9 },
      snapshot,
      universe,
    });

    expect(report.rank).toBe(2);
    expect(report.actualReturn).toBe(5);
    expect(report.topPerformers).toEqual([
      { asset: 'C', realizedReturn: 9 },
      { asset: 'A', realizedReturn: 5 },
      { asset: 'B', realizedReturn: -2 },
    ]);

    const record = getTradeRecord('2024-03-01');
    expect(record?.rankOfChosen).toBe(2);
    expect(record?.actualReturnOfChosen).toBe(5);
    expect(record?.newsHeadlines).toBe('h1\nh2\nh3\nh4\nh5');
    expect(record?.strategySummary).toBe('A rallied');
    expect(record?.assets.map((a) => a.realizedReturn24h)).toEqual([5, -2, 9]);
    expect(record?.assets[0].currentPrice).toBe(10);
  });

  it('defaults missing realized returns to 0', () => {
    upsertPrediction('2024-03-01', 'B', 1, 0);

    const report = recordOutcome({
      date: '2024-03-01',
      realizedReturns: { A: 1, C: -1 },
      snapshot: null,
      universe,
    });

    expect(report.defaultedReturns).toEqual(['B']);
    expect(report.actualReturn).toBe(0);
    expect(report.rank).toBe(2);
    expect(getTradeRecord('2024-03-01')?.newsHeadlines).toBe('');
  });

  it('throws RecordNotFoundError without a prediction', () => {
    expect(() =>
      recordOutcome({ date: '2024-03-01', realizedReturns: { A: 1 }, snapshot, universe })
    ).toThrow(RecordNotFoundError);
  });
});
