/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';

export interface UniverseConfig {
  name: string;
  symbols: string[];
  description?: string;
  version?: string;
  selection_rule?: string;
}

export interface BacktestConfig {
  minSamples: number;
  lookbackRecords: number;
}

export interface PromotionThresholds {
  minCorrelationDelta: number;
  minReturnDelta: number;
}

export interface LongTermConfig {
  periodDays: number;
  epoch: string;
  minResolvedRecords: number;
  lookbackRecords: number;
}

export interface EngineConfig {
  backtest: BacktestConfig;
  promotion: PromotionThresholds;
  longTerm: LongTermConfig;
  strategyTimeoutMs: number;
  snapshotsDir: string;
  outcomesDir: string;
}

export interface AppConfig {
  universe: UniverseConfig;
  engine: EngineConfig;
  projectRoot: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  backtest: { minSamples: 10, lookbackRecords: 180 },
  promotion: { minCorrelationDelta: 0.04, minReturnDelta: 0.25 },
  longTerm: { periodDays: 30, epoch: '2024-01-01', minResolvedRecords: 30, lookbackRecords: 180 },
  strategyTimeoutMs: 50,
  snapshotsDir: 'data/snapshots',
  outcomesDir: 'data/outcomes',
};

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function resolveConfigPath(projectRoot: string, envValue: string | undefined, fallback: string): string {
  if (!envValue) return join(projectRoot, 'config', fallback);
  if (isAbsolute(envValue)) return envValue;
  // Bare names refer to files under config/
  if (!envValue.includes('/')) {
    return join(projectRoot, 'config', envValue.endsWith('.json') ? envValue : `${envValue}.json`);
  }
  return join(projectRoot, envValue);
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function asRecord(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

export function normalizeUniverse(raw: unknown): UniverseConfig {
  const parsed = asRecord(raw);
  const symbols = Array.isArray(parsed.symbols) ? parsed.symbols : [];
  const normalizedSymbols: string[] = [];
  const seen = new Set<string>();
  for (const sym of symbols) {
    if (typeof sym !== 'string') continue;
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalizedSymbols.push(upper);
    }
  }

  return {
    name: typeof parsed.name === 'string' ? parsed.name : 'Universe',
    description: typeof parsed.description === 'string' ? parsed.description : '',
    version: typeof parsed.version === 'string' ? parsed.version : '1',
    selection_rule: typeof parsed.selection_rule === 'string' ? parsed.selection_rule : '',
    symbols: normalizedSymbols,
  };
}

export function normalizeEngineConfig(raw: unknown): EngineConfig {
  const parsed = asRecord(raw);
  const backtest = asRecord(parsed.backtest);
  const promotion = asRecord(parsed.promotion);
  const longTerm = asRecord(parsed.long_term);
  const strategy = asRecord(parsed.strategy);
  const paths = asRecord(parsed.paths);
  const defaults = DEFAULT_ENGINE_CONFIG;

  return {
    backtest: {
      minSamples: positiveInteger(backtest.min_samples, defaults.backtest.minSamples),
      lookbackRecords: positiveInteger(backtest.lookback_records, defaults.backtest.lookbackRecords),
    },
    promotion: {
      minCorrelationDelta: positiveNumber(
        promotion.min_correlation_delta,
        defaults.promotion.minCorrelationDelta
      ),
      minReturnDelta: positiveNumber(promotion.min_return_delta, defaults.promotion.minReturnDelta),
    },
    longTerm: {
      periodDays: positiveInteger(longTerm.period_days, defaults.longTerm.periodDays),
      epoch: nonEmptyString(longTerm.epoch, defaults.longTerm.epoch),
      minResolvedRecords: positiveInteger(
        longTerm.min_resolved_records,
        defaults.longTerm.minResolvedRecords
      ),
      lookbackRecords: positiveInteger(longTerm.lookback_records, defaults.longTerm.lookbackRecords),
    },
    strategyTimeoutMs: positiveInteger(strategy.timeout_ms, defaults.strategyTimeoutMs),
    snapshotsDir: nonEmptyString(paths.snapshots_dir, defaults.snapshotsDir),
    outcomesDir: nonEmptyString(paths.outcomes_dir, defaults.outcomesDir),
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();

  const universePath = resolveConfigPath(
    projectRoot,
    process.env.UNIVERSE_CONFIG || process.env.UNIVERSE,
    'universe.json'
  );
  const universe = normalizeUniverse(JSON.parse(readFileSync(universePath, 'utf-8')));
  if (universe.symbols.length === 0) {
    throw new Error(`Universe config has no symbols: ${universePath}`);
  }

  const enginePath = resolveConfigPath(projectRoot, process.env.ENGINE_CONFIG, 'engine.json');
  const engine = existsSync(enginePath)
    ? normalizeEngineConfig(JSON.parse(readFileSync(enginePath, 'utf-8')))
    : DEFAULT_ENGINE_CONFIG;

  return {
    universe,
    engine,
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
