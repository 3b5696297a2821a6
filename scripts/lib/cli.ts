/**
 * Small argv helpers shared by the scripts.
 */

import { assertDateKey, utcDateKey } from '../../src/core/time';

export function parseBooleanLike(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return null;
}

/** Value of `--name=value` or `--name value`. */
export function getFlagValue(name: string, argv: readonly string[] = process.argv): string | undefined {
  const flag = `--${name}`;
  const eq = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (eq) return eq.slice(flag.length + 1);

  const index = argv.indexOf(flag);
  if (index >= 0) {
    const next = argv[index + 1];
    if (next !== undefined && !next.startsWith('--')) return next;
  }
  return undefined;
}

export function hasFlag(name: string, argv: readonly string[] = process.argv): boolean {
  const flag = `--${name}`;
  if (argv.includes(flag)) return true;
  const raw = getFlagValue(name, argv);
  return raw !== undefined && parseBooleanLike(raw) === true;
}

/** `--date=YYYY-MM-DD`, defaulting to today (UTC). */
export function getDateFlag(argv: readonly string[] = process.argv): string {
  const raw = getFlagValue('date', argv);
  return raw ? assertDateKey(raw) : utcDateKey();
}
