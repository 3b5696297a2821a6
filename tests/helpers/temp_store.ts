import { afterEach, beforeEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { resetEnvConfig } from '@/core/env';
import { closeDatabase, initializeDatabase } from '@/data/db';
import { upsertOutcome, upsertPrediction } from '@/data/repositories/trade_repo';
import type { AssetDay } from '@/types/signal';

/**
 * Points SIGNAL_DB_PATH at a fresh SQLite file for every test.
 */
export function useTempStore(prefix: string): void {
  let tempDir: string;
  let previousPath: string | undefined;

  beforeEach(() => {
    previousPath = process.env.SIGNAL_DB_PATH;
    tempDir = mkdtempSync(join(tmpdir(), `${prefix}-`));
    process.env.SIGNAL_DB_PATH = join(tempDir, 'test.db');
    resetEnvConfig();
    initializeDatabase();
  });

  afterEach(() => {
    closeDatabase();
    if (previousPath === undefined) {
      delete process.env.SIGNAL_DB_PATH;
    } else {
      process.env.SIGNAL_DB_PATH = previousPath;
    }
    resetEnvConfig();
    rmSync(tempDir, { recursive: true, force: true });
  });
}

export function makeAssetDay(
  asset: string,
  position: number,
  overrides: Partial<Omit<AssetDay, 'asset' | 'position'>> = {}
): AssetDay {
  return {
    asset,
    position,
    return1h: 0,
    return6h: 0,
    return24h: 0,
    rsi14: 50,
    volumeRatio: 1,
    newsSentiment: 0,
    currentPrice: null,
    realizedReturn24h: 0,
    ...overrides,
  };
}

/**
 * Stores a resolved day where every asset's prediction-time return24h and
 * realized return are both `values[asset]`. The recorded pick is the first
 * universe entry.
 */
export function seedResolvedDay(
  date: string,
  universe: readonly string[],
  values: Record<string, number>
): void {
  upsertPrediction(date, universe[0], 0, 0);
  const assets = universe.map((asset, position) =>
    makeAssetDay(asset, position, {
      return24h: values[asset] ?? 0,
      realizedReturn24h: values[asset] ?? 0,
    })
  );
  upsertOutcome(date, {
    actualReturn: values[universe[0]] ?? 0,
    rank: 1,
    assets,
    headlines: '',
    summary: '',
  });
}

/** yyyy-MM-dd for day `n` (1-based) of March 2024. */
export function marchDay(n: number): string {
  return `2024-03-${String(n).padStart(2, '0')}`;
}

/** Seeds `count` consecutive resolved March days with identical values. */
export function seedResolvedDays(
  count: number,
  universe: readonly string[],
  values: Record<string, number>
): void {
  for (let n = 1; n <= count; n++) {
    seedResolvedDay(marchDay(n), universe, values);
  }
}
