/**
 * Fixed-point analog values in the closed range [-1, 1].
 *
 * Stored as integers scaled by FIXED_LIMIT so that arithmetic is exact and
 * deterministic across platforms.
 */

/** Scaled integer in [-FIXED_LIMIT, FIXED_LIMIT] */
export type Fixed = number;

export const FIXED_LIMIT = 1_000_000_000;
export const FIXED_ZERO: Fixed = 0;
export const FIXED_ONE: Fixed = FIXED_LIMIT;

const LIMIT_BIG = BigInt(FIXED_LIMIT);

/** Clamp a raw scaled integer into range */
export function fixed(inner: number): Fixed {
  const truncated = Math.trunc(inner);
  if (truncated >= FIXED_LIMIT) return FIXED_LIMIT;
  if (truncated <= -FIXED_LIMIT) return -FIXED_LIMIT;
  return truncated;
}

/** numerator/denominator, rounded half away from zero */
export function fixedFromRatio(numerator: number, denominator: number): Fixed {
  const sign = Math.sign(numerator) * Math.sign(denominator) < 0 ? -1 : 1;
  const dividend = BigInt(Math.abs(numerator)) * LIMIT_BIG;
  const divisor = BigInt(Math.abs(denominator));
  const quotient = dividend / divisor;
  const remainder = dividend % divisor;
  let magnitude: number;
  if (quotient >= LIMIT_BIG) {
    magnitude = FIXED_LIMIT;
  } else if (remainder * 2n >= divisor) {
    magnitude = Number(quotient) + 1;
  } else {
    magnitude = Number(quotient);
  }
  return sign * magnitude;
}

export function fixedFromNumber(value: number): Fixed {
  return fixed(Math.round(Math.max(-1, Math.min(1, value)) * FIXED_LIMIT));
}

export function fixedToNumber(value: Fixed): number {
  return value / FIXED_LIMIT;
}

/** Saturating addition */
export function fixedAdd(a: Fixed, b: Fixed): Fixed {
  return fixed(a + b);
}

export function fixedMul(a: Fixed, b: Fixed): Fixed {
  return Number((BigInt(a) * BigInt(b)) / LIMIT_BIG);
}
