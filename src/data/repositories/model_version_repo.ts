/**
 * Strategy version registry: append-only log plus the active pointer.
 *
 * Appending a version and repointing "active" happen in one transaction, so
 * the pointer can never reference a version missing from the log.
 */

import { getDatabase } from '../db';
import { EngineError, PersistenceError, toError } from '@/core/errors';
import { strategyCodeHash } from '@/core/seed';
import { nowIso } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { ImprovementType, ModelVersion, NewModelVersion } from '@/types/signal';

const logger = createChildLogger('model_version_repo');

interface ModelVersionRow {
  version: number;
  strategy_code: string;
  code_hash: string;
  rank_correlation: number | null;
  avg_daily_return: number | null;
  improvement_type: ImprovementType;
  rolled_back_from: number | null;
  created_at: string;
}

const VERSION_COLUMNS = `
  version, strategy_code, code_hash, rank_correlation, avg_daily_return,
  improvement_type, rolled_back_from, created_at
`;

function mapRow(row: ModelVersionRow): ModelVersion {
  return {
    version: row.version,
    strategyCode: row.strategy_code,
    codeHash: row.code_hash,
    rankCorrelation: row.rank_correlation,
    avgDailyReturn: row.avg_daily_return,
    improvementType: row.improvement_type,
    rolledBackFrom: row.rolled_back_from,
    createdAt: row.created_at,
  };
}

export function getLatestVersionNumber(): number | null {
  const db = getDatabase();
  const row = db.prepare('SELECT MAX(version) AS version FROM model_versions').get() as {
    version: number | null;
  };
  return row.version;
}

/**
 * Append a version and make it active. Returns the stored row; its version is
 * always the previous maximum plus one.
 */
export function appendModelVersion(entry: NewModelVersion): ModelVersion {
  const db = getDatabase();
  const createdAt = nowIso();
  const codeHash = strategyCodeHash(entry.strategyCode);

  const tx = db.transaction((): number => {
    const next = (getLatestVersionNumber() ?? 0) + 1;

    db.prepare(
      `INSERT INTO model_versions (
         version, strategy_code, code_hash, rank_correlation, avg_daily_return,
         improvement_type, rolled_back_from, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      next,
      entry.strategyCode,
      codeHash,
      entry.rankCorrelation,
      entry.avgDailyReturn,
      entry.improvementType,
      entry.rolledBackFrom ?? null,
      createdAt
    );

    db.prepare(
      `INSERT INTO active_strategy (id, version, updated_at)
       VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         version = excluded.version,
         updated_at = excluded.updated_at`
    ).run(next, createdAt);

    return next;
  });

  let version: number;
  try {
    version = tx();
  } catch (error) {
    throw new PersistenceError('appendModelVersion', toError(error), {
      improvementType: entry.improvementType,
    });
  }

  logger.info(
    {
      version,
      improvementType: entry.improvementType,
      rankCorrelation: entry.rankCorrelation,
      avgDailyReturn: entry.avgDailyReturn,
    },
    'Model version appended and activated'
  );

  const stored = getVersion(version);
  if (!stored) {
    throw new PersistenceError('appendModelVersion', undefined, { version });
  }
  return stored;
}

export function getVersion(version: number): ModelVersion | null {
  const db = getDatabase();
  const row = db
    .prepare(`SELECT ${VERSION_COLUMNS} FROM model_versions WHERE version = ?`)
    .get(version) as ModelVersionRow | undefined;
  return row ? mapRow(row) : null;
}

export function requireVersion(version: number): ModelVersion {
  const found = getVersion(version);
  if (!found) {
    throw new EngineError(`Unknown model version ${version}`, 'RECORD_NOT_FOUND', { version });
  }
  return found;
}

/**
 * The version the active pointer references, or null before the first promotion.
 */
export function getActiveModelVersion(): ModelVersion | null {
  const db = getDatabase();
  const row = db
    .prepare(
      `SELECT mv.version, mv.strategy_code, mv.code_hash, mv.rank_correlation,
              mv.avg_daily_return, mv.improvement_type, mv.rolled_back_from, mv.created_at
       FROM active_strategy a
       JOIN model_versions mv ON mv.version = a.version
       WHERE a.id = 1`
    )
    .get() as ModelVersionRow | undefined;
  return row ? mapRow(row) : null;
}

export function listVersions(limit?: number): ModelVersion[] {
  const db = getDatabase();
  const rows = (
    limit === undefined
      ? db.prepare(`SELECT ${VERSION_COLUMNS} FROM model_versions ORDER BY version DESC`).all()
      : db
          .prepare(`SELECT ${VERSION_COLUMNS} FROM model_versions ORDER BY version DESC LIMIT ?`)
          .all(Math.max(0, Math.floor(limit)))
  ) as ModelVersionRow[];
  return rows.map(mapRow);
}

export function countVersions(): number {
  const db = getDatabase();
  const row = db.prepare('SELECT COUNT(*) AS count FROM model_versions').get() as { count: number };
  return row.count;
}

export interface PointerRecovery {
  repaired: boolean;
  activeVersion: number | null;
  previousPointer: number | null;
}

/**
 * Repoint "active" at the newest logged version when the pointer is missing or
 * dangling. Safe to run on every start-up.
 */
export function recoverActivePointer(): PointerRecovery {
  const db = getDatabase();

  const tx = db.transaction((): PointerRecovery => {
    const pointer = db.prepare('SELECT version FROM active_strategy WHERE id = 1').get() as
      | { version: number }
      | undefined;
    const latest = getLatestVersionNumber();
    const previousPointer = pointer?.version ?? null;

    if (latest === null) {
      if (pointer) {
        db.prepare('DELETE FROM active_strategy WHERE id = 1').run();
        return { repaired: true, activeVersion: null, previousPointer };
      }
      return { repaired: false, activeVersion: null, previousPointer };
    }

    const pointerValid =
      pointer !== undefined &&
      db.prepare('SELECT 1 FROM model_versions WHERE version = ?').get(pointer.version) !== undefined;

    if (pointerValid) {
      return { repaired: false, activeVersion: previousPointer, previousPointer };
    }

    db.prepare(
      `INSERT INTO active_strategy (id, version, updated_at)
       VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(latest, nowIso());
    return { repaired: true, activeVersion: latest, previousPointer };
  });

  let result: PointerRecovery;
  try {
    result = tx();
  } catch (error) {
    throw new PersistenceError('recoverActivePointer', toError(error));
  }

  if (result.repaired) {
    logger.warn(result, 'Active strategy pointer repaired');
  }
  return result;
}
