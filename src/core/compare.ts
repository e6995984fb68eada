
/** Negative if a < b, zero if equal, positive if a > b. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Default ordering: numbers, strings and bigints compare with < and >.
 * NaN has no place in that order and is rejected. Anything else needs an
 * explicit comparator.
 */
export function naturalOrder<T>(a: T, b: T): number {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) throw new TypeError('NaN cannot be ordered');
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  throw new TypeError(`no natural ordering between ${typeof a} and ${typeof b}; pass a compare function`);
}
