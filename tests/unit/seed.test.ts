import { describe, expect, it } from 'vitest';
import { deterministicHash, deterministicSeed, seededRandom, strategyCodeHash } from '@/core/seed';
import { daysBetween, isDateKey, previousDateKey, shiftDateKey } from '@/core/time';

describe('seed', () => {
  it('hashes consistently to 64 hex characters', () => {
    expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
  });

  it('derives different seeds for different salts', () => {
    expect(deterministicSeed('2024-03-01', 'daily')).toBe(deterministicSeed('2024-03-01', 'daily'));
    expect(deterministicSeed('2024-03-01', 'daily')).not.toBe(
      deterministicSeed('2024-03-01', 'long_term')
    );
  });

  it('replays the same sequence for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('ignores line endings and trailing whitespace in strategy hashes', () => {
    const unix = 'function scoreAsset(a, b, c, d) {\n  return a;\n}';
    const windows = 'function scoreAsset(a, b, c, d) {  \r\n  return a;\r\n}\r\n';
    expect(strategyCodeHash(windows)).toBe(strategyCodeHash(unix));
    expect(strategyCodeHash(unix)).not.toBe(strategyCodeHash(unix.replace('a;', 'b;')));
  });
});

describe('time', () => {
  it('validates date keys', () => {
    expect(isDateKey('2024-02-29')).toBe(true);
    expect(isDateKey('2024-02-30')).toBe(false);
    expect(isDateKey('2024-3-1')).toBe(false);
  });

  it('shifts across month and year boundaries', () => {
    expect(previousDateKey('2024-03-01')).toBe('2024-02-29');
    expect(shiftDateKey('2023-12-31', 1)).toBe('2024-01-01');
  });

  it('counts calendar days between keys', () => {
    expect(daysBetween('2024-01-01', '2024-01-31')).toBe(30);
    expect(daysBetween('2024-01-01', '2024-03-13')).toBe(72);
  });
});
