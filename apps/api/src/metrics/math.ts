export const clamp = (value: number, lo = 0, hi = 1): number =>
  Math.max(lo, Math.min(hi, value));

// Digits past the rounding position used to tell an exact half from float noise
const TAIL_DIGITS = 30;

/**
 * Rounds to `digits` decimals with exact halves going to the even neighbour.
 * Ties are judged on the stored binary value: 0.625 is exact and rounds to 0.62,
 * while 0.285 is stored just below the half and rounds to 0.28.
 */
export const roundTo = (value: number, digits: number): number => {
  if (!Number.isFinite(value)) return value;

  const [whole, fraction] = Math.abs(value).toFixed(digits + TAIL_DIGITS).split('.');
  const kept = Number(whole + fraction.slice(0, digits));
  const tail = fraction.slice(digits);
  const half = '5'.padEnd(tail.length, '0');
  const roundUp = tail > half || (tail === half && kept % 2 === 1);

  const rounded = (roundUp ? kept + 1 : kept) / 10 ** digits;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
};

export const mean = (values: number[]): number => {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
};

// Guards every ratio field: an empty denominator yields 0, never NaN
export const ratio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;
