/**
 * Group-and-rank combinators used for deduplication.
 */

/** Negative when `a` ranks ahead of `b`, positive when behind, 0 on a tie */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Group rows by key. Groups keep the order in which their key first appears,
 * and rows keep their input order within a group.
 */
export function groupBy<T, K>(rows: readonly T[], keyOf: (row: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/**
 * Comparator ranking higher selector values first, each selector breaking
 * the ties of the previous one
 */
export function rankDescending<T>(...selectors: Array<(row: T) => number>): Comparator<T> {
  return (a, b) => {
    for (const select of selectors) {
      const diff = select(b) - select(a);
      if (diff !== 0) return diff;
    }
    return 0;
  };
}

/**
 * Keep exactly one row per key: the best ranked one, or the first seen among
 * rows the comparator cannot separate. Output follows first appearance of each key.
 */
export function pickBestPerKey<T, K>(
  rows: readonly T[],
  keyOf: (row: T) => K,
  compare: Comparator<T>,
): T[] {
  const winners: T[] = [];
  for (const group of groupBy(rows, keyOf).values()) {
    let best = group[0];
    for (let i = 1; i < group.length; i++) {
      if (compare(group[i], best) < 0) {
        best = group[i];
      }
    }
    winners.push(best);
  }
  return winners;
}
