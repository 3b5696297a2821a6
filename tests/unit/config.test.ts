import { afterEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_ENGINE_CONFIG,
  getConfig,
  normalizeEngineConfig,
  normalizeUniverse,
  resetConfig,
} from '@/core/config';
import { canonicalPosition, normalizeSymbol } from '@/core/universe';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('loads the shipped universe and engine settings', () => {
    const config = getConfig();
    expect(config.universe.symbols).toHaveLength(16);
    expect(config.universe.symbols[0]).toBe('BTCUSD');
    expect(config.engine.backtest).toEqual({ minSamples: 10, lookbackRecords: 180 });
    expect(config.engine.promotion).toEqual({ minCorrelationDelta: 0.04, minReturnDelta: 0.25 });
    expect(config.engine.longTerm.epoch).toBe('2024-01-01');
  });

  it('normalizes universe symbols, dropping duplicates and non-strings', () => {
    const universe = normalizeUniverse({ name: 'Test', symbols: [' btcusd ', 'ETHUSD', 'BTCUSD', 42] });
    expect(universe.symbols).toEqual(['BTCUSD', 'ETHUSD']);
    expect(universe.name).toBe('Test');
  });

  it('falls back to defaults for missing or invalid engine fields', () => {
    expect(normalizeEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);

    const engine = normalizeEngineConfig({
      backtest: { min_samples: 0, lookback_records: 90 },
      promotion: { min_correlation_delta: 'high' },
      strategy: { timeout_ms: 25 },
    });
    expect(engine.backtest).toEqual({ minSamples: 10, lookbackRecords: 90 });
    expect(engine.promotion.minCorrelationDelta).toBe(0.04);
    expect(engine.strategyTimeoutMs).toBe(25);
  });
});

describe('universe', () => {
  const universe = ['BTCUSD', 'ETHUSD', 'SOLUSD'];

  it('reports canonical positions', () => {
    expect(canonicalPosition('ETHUSD', universe)).toBe(1);
    expect(canonicalPosition('DOGEUSD', universe)).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('matches symbols case-insensitively', () => {
    expect(canonicalPosition('solusd', universe)).toBe(2);
    expect(normalizeSymbol(' ethusd ')).toBe('ETHUSD');
  });
});
