/** Array.sort-style comparator: negative when `a` ranks before `b`. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * The best `k` items of `items` in `compare` order, found in one pass over a
 * sorted buffer of at most `k` entries. Items that compare equal keep their
 * input order. `k <= 0` gives [].
 */
export function selectTopK<T>(items: Iterable<T>, k: number, compare: Comparator<T>): T[] {
  if (k <= 0) return [];
  const best: T[] = [];
  for (const item of items) {
    if (best.length === k && compare(item, best[k - 1]) >= 0) continue;
    // first slot whose entry ranks strictly after `item`
    let lo = 0;
    let hi = best.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compare(best[mid], item) <= 0) lo = mid + 1;
      else hi = mid;
    }
    best.splice(lo, 0, item);
    if (best.length > k) best.pop();
  }
  return best;
}
