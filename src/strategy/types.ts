/**
 * Scoring strategy contract. A strategy maps four features of one asset on one
 * day to a preference score; higher is better.
 */

export interface ScoringInputs {
  return24h: number;
  return6h: number;
  volumeRatio: number;
  newsSentiment: number;
}

export interface ScoringStrategy {
  /** Registry version, 0 for the built-in baseline, null for an unregistered candidate. */
  readonly version: number | null;
  readonly label: string;
  readonly code: string;
  readonly codeHash: string;
  /** Throws on any failure; callers go through the fault boundary in invoke.ts. */
  score(inputs: ScoringInputs): number;
}

export interface StrategyLoadOptions {
  version?: number | null;
  label?: string;
  timeoutMs?: number;
}
