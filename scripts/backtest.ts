/**
 * Backtest CLI
 * Replays a stored version, a strategy file or the baseline over resolved history
 *
 * Usage:
 *   npx tsx scripts/backtest.ts [--version=N | --file=path/to/strategy.js] [--window=180]
 */

import './lib/load-env';
import { readFileSync } from 'fs';
import { runBacktest } from '../src/backtesting/engine';
import { getConfig } from '../src/core/config';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { getActiveModelVersion, requireVersion } from '../src/data/repositories/model_version_repo';
import { loadBaselineStrategy, loadStrategy } from '../src/strategy/loader';
import type { ScoringStrategy } from '../src/strategy/types';
import { getFlagValue } from './lib/cli';

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${name} must be a positive integer, got ${raw}`);
  }
  return value;
}

function pickStrategy(timeoutMs: number): ScoringStrategy {
  const file = getFlagValue('file');
  if (file) {
    return loadStrategy(readFileSync(file, 'utf-8'), { label: file, timeoutMs });
  }

  const version = parsePositiveInt(getFlagValue('version'), 'version');
  const stored = version !== undefined ? requireVersion(version) : getActiveModelVersion();
  if (!stored) {
    return loadBaselineStrategy(timeoutMs);
  }
  return loadStrategy(stored.strategyCode, { version: stored.version, timeoutMs });
}

try {
  initializeDatabase();
  const config = getConfig();
  const window =
    parsePositiveInt(getFlagValue('window'), 'window') ?? config.engine.backtest.lookbackRecords;
  const strategy = pickStrategy(config.engine.strategyTimeoutMs);
  const result = runBacktest(strategy, window);

  console.log('\n' + '='.repeat(50));
  console.log(`Backtest: ${strategy.label} over last ${window} resolved records`);
  console.log('='.repeat(50));
  if (result.status === 'insufficient_data') {
    console.log(
      `Insufficient data (${result.reason}): ${result.sampleCount} records, need ${result.requiredSamples}`
    );
  } else {
    console.log(`Period:            ${result.firstDate} to ${result.lastDate}`);
    console.log(`Days:              ${result.sampleCount}`);
    console.log(`Rank correlation:  ${result.rankCorrelation.toFixed(4)}`);
    console.log(`Avg pick return:   ${result.avgReturn.toFixed(3)}%`);
    console.log(`Sharpe (daily):    ${result.sharpeRatio.toFixed(3)}`);
    console.log(`Win rate:          ${(result.winRate * 100).toFixed(1)}%`);
    console.log(`Avg pick rank:     ${result.avgPickRank.toFixed(2)}`);
    if (result.failedInvocations > 0) {
      console.log(`Failed calls:      ${result.failedInvocations}`);
    }
  }
  console.log('='.repeat(50) + '\n');
} catch (error) {
  console.error('Backtest failed:', error);
  process.exitCode = 1;
} finally {
  closeDatabase();
}
