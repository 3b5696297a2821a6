/**
 * Statistics for backtest reports.
 */

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation (divides by n). */
export function stdDev(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null) return null;
  let acc = 0;
  for (const v of values) acc += (v - m) * (v - m);
  return Math.sqrt(acc / values.length);
}

/**
 * Ranks starting at 1 in ascending order; tied values share the average of the
 * positions they span.
 */
export function averageRanks(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => {
    if (a.value !== b.value) return a.value - b.value;
    return a.index - b.index;
  });

  const ranks = new Array<number>(values.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) j++;
    const avg = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) ranks[order[k].index] = avg;
    i = j + 1;
  }
  return ranks;
}

/** Pearson correlation, or null when either side has zero variance. */
export function pearson(x: readonly number[], y: readonly number[]): number | null {
  if (x.length !== y.length) {
    throw new Error(`Sequence lengths differ: ${x.length} vs ${y.length}`);
  }
  const mx = mean(x);
  const my = mean(y);
  if (mx === null || my === null) return null;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < x.length; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

/** Spearman's rho: Pearson correlation of average ranks. */
export function spearman(x: readonly number[], y: readonly number[]): number | null {
  if (x.length !== y.length) {
    throw new Error(`Sequence lengths differ: ${x.length} vs ${y.length}`);
  }
  if (x.length < 2) return null;
  return pearson(averageRanks(x), averageRanks(y));
}

/** Mean over standard deviation, 0 when returns do not vary. */
export function sharpeRatio(returns: readonly number[]): number {
  const m = mean(returns);
  const sd = stdDev(returns);
  if (m === null || sd === null || sd === 0) return 0;
  return m / sd;
}

export function winRate(returns: readonly number[]): number {
  if (returns.length === 0) return 0;
  return returns.filter((r) => r > 0).length / returns.length;
}
