/**
 * Wire sizes, ordered from narrowest to widest.
 *
 * Digital sizes carry 0..16 bits. `analog` sorts above every digital size
 * and carries a fixed-point value instead of bits.
 */

export type WireSize = 'zero' | 'one' | 'two' | 'four' | 'eight' | 'sixteen' | 'analog';

export const WIRE_SIZES: readonly WireSize[] = [
  'zero',
  'one',
  'two',
  'four',
  'eight',
  'sixteen',
  'analog',
];

export const DIGITAL_WIRE_SIZES: readonly WireSize[] = WIRE_SIZES.filter((s) => s !== 'analog');

const BITS: Record<WireSize, number> = {
  zero: 0,
  one: 1,
  two: 2,
  four: 4,
  eight: 8,
  sixteen: 16,
  analog: 0,
};

const HALF: Record<WireSize, WireSize | null> = {
  zero: null,
  one: 'zero',
  two: 'one',
  four: 'two',
  eight: 'four',
  sixteen: 'eight',
  analog: null,
};

const DOUBLE: Record<WireSize, WireSize | null> = {
  zero: 'one',
  one: 'two',
  two: 'four',
  four: 'eight',
  eight: 'sixteen',
  sixteen: null,
  analog: null,
};

/** Position in the size ordering */
export function wireSizeRank(s: WireSize): number {
  return WIRE_SIZES.indexOf(s);
}

export function compareWireSizes(a: WireSize, b: WireSize): number {
  return wireSizeRank(a) - wireSizeRank(b);
}

export function maxWireSize(a: WireSize, b: WireSize): WireSize {
  return compareWireSizes(a, b) >= 0 ? a : b;
}

export function minWireSize(a: WireSize, b: WireSize): WireSize {
  return compareWireSizes(a, b) <= 0 ? a : b;
}

export function numBits(s: WireSize): number {
  return BITS[s];
}

export function wireMask(s: WireSize): number {
  const bits = BITS[s];
  return bits === 0 ? 0 : (1 << bits) - 1;
}

export function halfSize(s: WireSize): WireSize | null {
  return HALF[s];
}

export function doubleSize(s: WireSize): WireSize | null {
  return DOUBLE[s];
}

/** Smallest digital size able to hold `value` (0 fits in zero bits) */
export function minSizeForValue(value: number): WireSize {
  for (const s of DIGITAL_WIRE_SIZES) {
    if (value <= wireMask(s)) return s;
  }
  return 'sixteen';
}

/** Digital size with exactly `bits` bits, or null */
export function wireSizeFromBits(bits: number): WireSize | null {
  return DIGITAL_WIRE_SIZES.find((s) => BITS[s] === bits) ?? null;
}
