/**
 * Canonical ranking: value descending, ties broken by universe position
 * (first listed wins). The tie-break is a convention for determinism, not a
 * modeled preference.
 */

export interface Rankable {
  asset: string;
  position: number;
  value: number;
}

function comparable(value: number): number {
  return Number.isNaN(value) ? Number.NEGATIVE_INFINITY : value;
}

export function sortDescending<T extends Rankable>(items: readonly T[]): T[] {
  return items.slice().sort((a, b) => {
    const av = comparable(a.value);
    const bv = comparable(b.value);
    if (bv !== av) return bv > av ? 1 : -1;
    if (a.position !== b.position) return a.position - b.position;
    return a.asset.localeCompare(b.asset);
  });
}

/** 1-indexed rank per asset. */
export function rankMap(items: readonly Rankable[]): Map<string, number> {
  const ranks = new Map<string, number>();
  sortDescending(items).forEach((item, index) => ranks.set(item.asset, index + 1));
  return ranks;
}

export function selectTop<T extends Rankable>(items: readonly T[]): T | null {
  return sortDescending(items)[0] ?? null;
}
