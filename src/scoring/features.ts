/**
 * Feature defaults and normalization for snapshot inputs.
 */

import type { FeatureSnapshot } from '@/providers/types';
import type { ScoringInputs } from '@/strategy/types';
import type { AssetFeatures } from '@/types/signal';

export const FEATURE_DEFAULTS: Readonly<Omit<AssetFeatures, 'currentPrice'>> = {
  return1h: 0,
  return6h: 0,
  return24h: 0,
  rsi14: 50,
  volumeRatio: 1,
  newsSentiment: 0,
};

export interface FilledFeatures {
  features: AssetFeatures;
  /** Snapshot fields that were absent or not finite. */
  missing: string[];
}

function pick(value: unknown, fallback: number, field: string, missing: string[]): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  missing.push(field);
  return fallback;
}

function clampSentiment(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

export function fillFeatures(
  snapshot: FeatureSnapshot | undefined,
  sentiment: number | undefined
): FilledFeatures {
  const missing: string[] = [];
  const raw = snapshot ?? {};

  const features: AssetFeatures = {
    return1h: pick(raw.return_1h, FEATURE_DEFAULTS.return1h, 'return_1h', missing),
    return6h: pick(raw.return_6h, FEATURE_DEFAULTS.return6h, 'return_6h', missing),
    return24h: pick(raw.return_24h, FEATURE_DEFAULTS.return24h, 'return_24h', missing),
    rsi14: pick(raw.rsi_14, FEATURE_DEFAULTS.rsi14, 'rsi_14', missing),
    volumeRatio: pick(raw.volume_ratio, FEATURE_DEFAULTS.volumeRatio, 'volume_ratio', missing),
    newsSentiment: clampSentiment(
      pick(sentiment, FEATURE_DEFAULTS.newsSentiment, 'news_sentiment', missing)
    ),
    currentPrice:
      typeof raw.current_price === 'number' && Number.isFinite(raw.current_price)
        ? raw.current_price
        : null,
  };

  return { features, missing };
}

export function toScoringInputs(features: AssetFeatures): ScoringInputs {
  return {
    return24h: features.return24h,
    return6h: features.return6h,
    volumeRatio: features.volumeRatio,
    newsSentiment: features.newsSentiment,
  };
}
