/**
 * Coerces a value to a finite number, falling back when invalid.
 */
export const toFiniteNumber = (value: unknown, fallback = 0): number => {
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Coerces a value to a finite, non-negative number. Negative input collapses to zero.
 */
export const toNonNegativeNumber = (value: unknown, fallback = 0): number => {
  return Math.max(0, toFiniteNumber(value, fallback));
};

/**
 * Coerces a value to an integer by truncation, falling back when invalid.
 */
export const toInteger = (value: unknown, fallback = 0): number => {
  return Math.trunc(toFiniteNumber(value, fallback));
};

export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};
