/**
 * Reads collector output from `{dir}/{YYYY-MM-DD}.json`.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getConfig, type AppConfig } from '@/core/config';
import { assertDateKey } from '@/core/time';
import { normalizeSymbol } from '@/core/universe';
import { createChildLogger } from '@/utils/logger';
import { validateDailySnapshot, validateRealizedReturns } from '@/validation/ajv_instance';
import type { ValidationResult } from '@/validation/ajv_instance';
import {
  SnapshotSourceError,
  type DailySnapshot,
  type RealizedReturns,
  type SnapshotSource,
} from './types';

const logger = createChildLogger('file_snapshot_source');

export interface FileSnapshotSourceOptions {
  snapshotsDir: string;
  outcomesDir: string;
}

function upperKeys<T>(record: Record<string, T> | undefined): Record<string, T> | undefined {
  if (!record) return undefined;
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    out[normalizeSymbol(key)] = value;
  }
  return out;
}

export class FileSnapshotSource implements SnapshotSource {
  readonly name = 'file';

  constructor(private readonly options: FileSnapshotSourceOptions) {}

  loadDailySnapshot(date: string): DailySnapshot | null {
    const raw = this.readJson(this.options.snapshotsDir, date);
    if (raw === null) return null;

    const snapshot = this.check(validateDailySnapshot(raw), 'snapshot', date);
    return {
      date: snapshot.date,
      assets: upperKeys(snapshot.assets) ?? {},
      sentiment: upperKeys(snapshot.sentiment),
      headlines: upperKeys(snapshot.headlines),
      summaries: upperKeys(snapshot.summaries),
    };
  }

  loadRealizedReturns(date: string): RealizedReturns | null {
    const raw = this.readJson(this.options.outcomesDir, date);
    if (raw === null) return null;

    const realized = this.check(validateRealizedReturns(raw), 'outcome', date);
    return { date: realized.date, returns: upperKeys(realized.returns) ?? {} };
  }

  private readJson(dir: string, date: string): unknown {
    const path = join(dir, `${assertDateKey(date)}.json`);
    if (!existsSync(path)) {
      logger.warn({ path }, 'Input file not found');
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      return parsed;
    } catch (error) {
      throw new SnapshotSourceError(
        `Unreadable JSON in ${path}`,
        this.name,
        date,
        [error instanceof Error ? error.message : String(error)]
      );
    }
  }

  private check<T extends { date: string }>(
    result: ValidationResult<T>,
    kind: string,
    date: string
  ): T {
    if (!result.valid) {
      logger.error({ kind, date, errors: result.errors }, 'Input file failed schema validation');
      throw new SnapshotSourceError(`Invalid ${kind} file for ${date}`, this.name, date, result.errors);
    }
    if (result.data.date !== date) {
      throw new SnapshotSourceError(
        `${kind} file for ${date} is dated ${result.data.date}`,
        this.name,
        date
      );
    }
    return result.data;
  }
}

export function createFileSnapshotSource(config: AppConfig = getConfig()): FileSnapshotSource {
  const resolve = (dir: string) => (isAbsolute(dir) ? dir : join(config.projectRoot, dir));
  return new FileSnapshotSource({
    snapshotsDir: resolve(config.engine.snapshotsDir),
    outcomesDir: resolve(config.engine.outcomesDir),
  });
}
