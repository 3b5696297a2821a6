/**
 * Built-in strategy used until the first candidate is promoted. Recorded as
 * model version 0 on predictions.
 */

export const BASELINE_VERSION = 0;

export const BASELINE_STRATEGY_CODE = `function scoreAsset(return24h, return6h, volumeRatio, newsSentiment) {
  const momentum = return24h * 0.5 + return6h * 0.3;
  const volume = (volumeRatio - 1) * 2;
  return momentum + volume + newsSentiment * 3;
}`;
