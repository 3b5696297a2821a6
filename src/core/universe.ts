/**
 * Universe management - the ordered list of assets scored each cycle.
 * List order is the canonical tie-break order.
 */

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function canonicalPosition(symbol: string, universe: readonly string[]): number {
  const index = universe.indexOf(normalizeSymbol(symbol));
  return index === -1 ? Number.MAX_SAFE_INTEGER : index;
}
