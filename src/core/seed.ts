/**
 * Deterministic hashing and seeding
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function deterministicSeed(dateKey: string, salt: string = ''): number {
  const hash = deterministicHash(`${dateKey}${salt}`);
  // First 8 hex characters fit in a safe integer
  return parseInt(hash.substring(0, 8), 16);
}

/**
 * Small seeded generator (mulberry32) so template candidates are reproducible
 * for a given date.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Hash of strategy source with line endings and trailing whitespace
 * normalized, so cosmetic edits do not register as new code.
 */
export function strategyCodeHash(code: string): string {
  const normalized = code
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
  return deterministicHash(normalized);
}
