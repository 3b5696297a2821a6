/**
 * Trade record repository: the prediction/outcome half of the feature store.
 *
 * Prediction and outcome writes touch disjoint columns, so either may run
 * again for a date without clobbering what the other recorded.
 */

import { getDatabase } from '../db';
import {
  EngineError,
  InvalidRecordError,
  PersistenceError,
  RecordNotFoundError,
  toError,
} from '@/core/errors';
import { nowIso } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type {
  AssetDay,
  OutcomeWrite,
  PerformanceSummary,
  ResolvedQuery,
  ResolvedTradeRecord,
  TradeRecord,
} from '@/types/signal';

const logger = createChildLogger('trade_repo');

interface TradeRow {
  date: string;
  chosen_asset: string;
  chosen_score: number;
  model_version: number;
  actual_return_of_chosen: number | null;
  rank_of_chosen: number | null;
  news_headlines: string | null;
  strategy_summary: string | null;
  created_at: string;
  resolved_at: string | null;
}

interface AssetFeatureRow {
  asset: string;
  position: number;
  return_1h: number;
  return_6h: number;
  return_24h: number;
  rsi_14: number;
  volume_ratio: number;
  news_sentiment: number;
  current_price: number | null;
  realized_return_24h: number;
}

const TRADE_COLUMNS = `
  date, chosen_asset, chosen_score, model_version, actual_return_of_chosen,
  rank_of_chosen, news_headlines, strategy_summary, created_at, resolved_at
`;

function mapAssetRow(row: AssetFeatureRow): AssetDay {
  return {
    asset: row.asset,
    position: row.position,
    return1h: row.return_1h,
    return6h: row.return_6h,
    return24h: row.return_24h,
    rsi14: row.rsi_14,
    volumeRatio: row.volume_ratio,
    newsSentiment: row.news_sentiment,
    currentPrice: row.current_price,
    realizedReturn24h: row.realized_return_24h,
  };
}

function loadAssets(date: string): AssetDay[] {
  const db = getDatabase();
  const rows = db
    .prepare(
      `SELECT asset, position, return_1h, return_6h, return_24h, rsi_14, volume_ratio,
              news_sentiment, current_price, realized_return_24h
       FROM asset_features
       WHERE date = ?
       ORDER BY position ASC, asset ASC`
    )
    .all(date) as AssetFeatureRow[];
  return rows.map(mapAssetRow);
}

function mapTradeRow(row: TradeRow): TradeRecord {
  return {
    date: row.date,
    chosenAsset: row.chosen_asset,
    chosenScore: row.chosen_score,
    modelVersion: row.model_version,
    actualReturnOfChosen: row.actual_return_of_chosen,
    rankOfChosen: row.rank_of_chosen,
    newsHeadlines: row.news_headlines,
    strategySummary: row.strategy_summary,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
    assets: loadAssets(row.date),
  };
}

export function isResolved(record: TradeRecord): record is ResolvedTradeRecord {
  return (
    record.actualReturnOfChosen !== null &&
    record.rankOfChosen !== null &&
    record.resolvedAt !== null
  );
}

function wrapWrite<T>(operation: string, context: Record<string, unknown>, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof EngineError) throw error;
    throw new PersistenceError(operation, toError(error), context);
  }
}

/**
 * Create or update the prediction half of a record. Idempotent on date.
 */
export function upsertPrediction(
  date: string,
  asset: string,
  score: number,
  modelVersion: number
): void {
  const db = getDatabase();
  wrapWrite('upsertPrediction', { date, asset }, () => {
    db.prepare(
      `INSERT INTO trade_records (date, chosen_asset, chosen_score, model_version, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(date) DO UPDATE SET
         chosen_asset = excluded.chosen_asset,
         chosen_score = excluded.chosen_score,
         model_version = excluded.model_version`
    ).run(date, asset, score, modelVersion, nowIso());
  });
  logger.debug({ date, asset, score, modelVersion }, 'Prediction upserted');
}

/**
 * Merge outcome fields and per-asset feature rows into an existing record.
 * All writes share one transaction.
 */
export function upsertOutcome(date: string, outcome: OutcomeWrite): void {
  const universeSize = outcome.assets.length;
  if (universeSize === 0) {
    throw new InvalidRecordError('Outcome carries no asset rows', date);
  }
  if (!Number.isInteger(outcome.rank) || outcome.rank < 1 || outcome.rank > universeSize) {
    throw new InvalidRecordError(`Rank ${outcome.rank} outside [1, ${universeSize}]`, date, {
      rank: outcome.rank,
    });
  }

  const db = getDatabase();
  const updateTrade = db.prepare(
    `UPDATE trade_records
     SET actual_return_of_chosen = ?,
         rank_of_chosen = ?,
         news_headlines = ?,
         strategy_summary = ?,
         resolved_at = ?
     WHERE date = ?`
  );
  const upsertAsset = db.prepare(
    `INSERT INTO asset_features (
       date, asset, position, return_1h, return_6h, return_24h, rsi_14,
       volume_ratio, news_sentiment, current_price, realized_return_24h
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(date, asset) DO UPDATE SET
       position = excluded.position,
       return_1h = excluded.return_1h,
       return_6h = excluded.return_6h,
       return_24h = excluded.return_24h,
       rsi_14 = excluded.rsi_14,
       volume_ratio = excluded.volume_ratio,
       news_sentiment = excluded.news_sentiment,
       current_price = excluded.current_price,
       realized_return_24h = excluded.realized_return_24h`
  );

  const tx = db.transaction(() => {
    const existing = db.prepare('SELECT date FROM trade_records WHERE date = ?').get(date);
    if (!existing) {
      throw new RecordNotFoundError(date);
    }

    updateTrade.run(
      outcome.actualReturn,
      outcome.rank,
      outcome.headlines,
      outcome.summary,
      nowIso(),
      date
    );

    for (const a of outcome.assets) {
      upsertAsset.run(
        date,
        a.asset,
        a.position,
        a.return1h,
        a.return6h,
        a.return24h,
        a.rsi14,
        a.volumeRatio,
        a.newsSentiment,
        a.currentPrice,
        a.realizedReturn24h
      );
    }
  });

  wrapWrite('upsertOutcome', { date }, () => tx());
  logger.debug({ date, rank: outcome.rank, assets: universeSize }, 'Outcome upserted');
}

export function getTradeRecord(date: string): TradeRecord | null {
  const db = getDatabase();
  const row = db
    .prepare(`SELECT ${TRADE_COLUMNS} FROM trade_records WHERE date = ?`)
    .get(date) as TradeRow | undefined;
  return row ? mapTradeRow(row) : null;
}

/**
 * Resolved records, most recent first.
 */
export function queryResolved(query: ResolvedQuery = {}): ResolvedTradeRecord[] {
  const db = getDatabase();

  let sql = `SELECT ${TRADE_COLUMNS} FROM trade_records
             WHERE actual_return_of_chosen IS NOT NULL
               AND rank_of_chosen IS NOT NULL
               AND resolved_at IS NOT NULL`;
  const params: (string | number)[] = [];

  if (query.since) {
    sql += ` AND date >= ?`;
    params.push(query.since);
  }

  sql += ` ORDER BY date DESC`;

  if (query.limit !== undefined) {
    sql += ` LIMIT ?`;
    params.push(Math.max(0, Math.floor(query.limit)));
  }

  const rows = db.prepare(sql).all(...params) as TradeRow[];
  return rows.map(mapTradeRow).filter(isResolved);
}

export function countResolved(): number {
  const db = getDatabase();
  const row = db
    .prepare(
      `SELECT COUNT(*) AS count FROM trade_records
       WHERE actual_return_of_chosen IS NOT NULL AND rank_of_chosen IS NOT NULL`
    )
    .get() as { count: number };
  return row.count;
}

export function listRecentRecords(limit: number): TradeRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare(`SELECT ${TRADE_COLUMNS} FROM trade_records ORDER BY date DESC LIMIT ?`)
    .all(Math.max(0, Math.floor(limit))) as TradeRow[];
  return rows.map(mapTradeRow);
}

export function getPerformanceSummary(): PerformanceSummary {
  const db = getDatabase();
  const row = db
    .prepare(
      `SELECT
         COUNT(*) AS total_trades,
         AVG(actual_return_of_chosen) AS avg_return,
         AVG(rank_of_chosen) AS avg_rank,
         SUM(CASE WHEN actual_return_of_chosen > 0 THEN 1 ELSE 0 END) * 100.0 / COUNT(*) AS win_rate_pct,
         MAX(actual_return_of_chosen) AS best_return,
         MIN(actual_return_of_chosen) AS worst_return,
         MAX(model_version) AS current_version
       FROM trade_records
       WHERE actual_return_of_chosen IS NOT NULL`
    )
    .get() as {
    total_trades: number;
    avg_return: number | null;
    avg_rank: number | null;
    win_rate_pct: number | null;
    best_return: number | null;
    worst_return: number | null;
    current_version: number | null;
  };

  return {
    totalTrades: row.total_trades,
    avgReturn: row.avg_return,
    avgRank: row.avg_rank,
    winRatePct: row.win_rate_pct,
    bestReturn: row.best_return,
    worstReturn: row.worst_return,
    currentVersion: row.current_version,
  };
}
