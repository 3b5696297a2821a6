/**
 * Shapes exchanged with the external market-data and sentiment collaborators.
 *
 * A daily snapshot is written by the data collectors before prediction time;
 * realized returns are written once the holding day has closed. Both arrive as
 * JSON files validated against schemas/*.schema.json.
 */

/** Per-asset features; any field may be absent and is then defaulted. */
export interface FeatureSnapshot {
  return_1h?: number;
  return_6h?: number;
  return_24h?: number;
  rsi_14?: number;
  volume_ratio?: number;
  current_price?: number | null;
}

export interface DailySnapshot {
  date: string;
  assets: Record<string, FeatureSnapshot>;
  /** sentiment_score in [-1, 1] per asset */
  sentiment?: Record<string, number>;
  headlines?: Record<string, string[]>;
  summaries?: Record<string, string>;
}

export interface RealizedReturns {
  date: string;
  /** 24h return in percent per asset */
  returns: Record<string, number>;
}

export interface SnapshotSource {
  loadDailySnapshot(date: string): DailySnapshot | null;
  loadRealizedReturns(date: string): RealizedReturns | null;
}

export class SnapshotSourceError extends Error {
  constructor(
    message: string,
    public source: string,
    public date: string,
    public errors: string[] = []
  ) {
    super(message);
    this.name = 'SnapshotSourceError';
  }
}
