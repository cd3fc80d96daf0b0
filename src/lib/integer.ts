function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'number' && Number.isNaN(value);
}

/**
 * Whether `value` is an integer. Missing values (`null`, `undefined`, `NaN`)
 * count as integers only when `allowMissing` is set; anything that is not a
 * number is never an integer, including numeric text such as `'1'`.
 */
export function isIntegerValue(value: unknown, allowMissing = false): boolean {
  if (isMissing(value)) return allowMissing;
  if (typeof value === 'bigint') return true;
  if (typeof value !== 'number') return false;
  // exact: Infinity % 1 is NaN
  return value % 1 === 0;
}

/**
 * Elementwise {@link isIntegerValue}. Expects a numeric collection: one that
 * was coerced to text upstream gives `false` for every element.
 */
export function isIntegerVector(values: Iterable<unknown>, allowMissing = false): boolean[] {
  return [...values].map((v) => isIntegerValue(v, allowMissing));
}

