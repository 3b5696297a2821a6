import { getDatabase } from '@/data/db';

const STALE_LOCK_MS = 30 * 60 * 1000;

type RunLockStatus = 'idle' | 'running' | 'failed';

export type CycleStage = 'predict' | 'record_results' | 'self_improve' | 'rollback';

interface RunLockRow {
  status: RunLockStatus;
  stage: CycleStage | null;
  cycle_date: string | null;
  started_by: string | null;
  started_at: string | null;
  updated_at: string | null;
  error_msg: string | null;
}

export interface RunLockState {
  status: RunLockStatus;
  stage: CycleStage | null;
  cycleDate: string | null;
  startedBy: string | null;
  startedAt: string | null;
  updatedAt: string | null;
  errorMsg: string | null;
}

function ensureSingletonRow(): void {
  const db = getDatabase();
  db.prepare(`INSERT OR IGNORE INTO run_lock (id, status) VALUES (1, 'idle')`).run();
}

function normalizeRow(row?: RunLockRow): RunLockState {
  if (!row) {
    return {
      status: 'idle',
      stage: null,
      cycleDate: null,
      startedBy: null,
      startedAt: null,
      updatedAt: null,
      errorMsg: null,
    };
  }

  return {
    status: row.status,
    stage: row.stage,
    cycleDate: row.cycle_date,
    startedBy: row.started_by,
    startedAt: row.started_at,
    updatedAt: row.updated_at,
    errorMsg: row.error_msg,
  };
}

export function getRunLockState(): RunLockState {
  ensureSingletonRow();
  const db = getDatabase();
  const row = db
    .prepare(
      'SELECT status, stage, cycle_date, started_by, started_at, updated_at, error_msg FROM run_lock WHERE id = 1'
    )
    .get() as RunLockRow | undefined;
  return normalizeRow(row);
}

/**
 * Claim the singleton lock for a batch stage. A lock held longer than
 * STALE_LOCK_MS is treated as abandoned.
 */
export function acquireRunLock(params: {
  stage: CycleStage;
  cycleDate: string;
  startedBy: string;
  now?: Date;
}): boolean {
  ensureSingletonRow();
  const db = getDatabase();
  const nowDate = params.now ?? new Date();
  const now = nowDate.toISOString();

  const tx = db.transaction(() => {
    const current = db
      .prepare('SELECT status, started_at FROM run_lock WHERE id = 1')
      .get() as Pick<RunLockRow, 'status' | 'started_at'> | undefined;

    if (current?.status === 'running') {
      if (current.started_at) {
        const startedAtMs = new Date(current.started_at).getTime();
        if (Number.isFinite(startedAtMs) && nowDate.getTime() - startedAtMs <= STALE_LOCK_MS) {
          return false;
        }
      } else {
        return false;
      }
    }

    db.prepare(`
      UPDATE run_lock
      SET
        status = 'running',
        stage = ?,
        cycle_date = ?,
        started_by = ?,
        started_at = ?,
        updated_at = ?,
        error_msg = NULL
      WHERE id = 1
    `).run(params.stage, params.cycleDate, params.startedBy, now, now);

    return true;
  });

  return tx();
}

export function releaseRunLock(error?: string): void {
  ensureSingletonRow();
  const db = getDatabase();
  const now = new Date().toISOString();

  if (error) {
    db.prepare(`
      UPDATE run_lock
      SET
        status = 'failed',
        error_msg = ?,
        updated_at = ?
      WHERE id = 1
    `).run(error, now);
    return;
  }

  db.prepare(`
    UPDATE run_lock
    SET
      status = 'idle',
      stage = NULL,
      cycle_date = NULL,
      started_by = NULL,
      started_at = NULL,
      error_msg = NULL,
      updated_at = ?
    WHERE id = 1
  `).run(now);
}
