import type { WireSize } from './wire-size.ts';
import {
  compareWireSizes,
  doubleSize,
  halfSize,
  maxWireSize,
  minWireSize,
} from './wire-size.ts';

/** Closed range of sizes a net may still take */
export interface WireSizeInterval {
  readonly lo: WireSize;
  readonly hi: WireSize;
}

export const FULL_INTERVAL: WireSizeInterval = { lo: 'zero', hi: 'sixteen' };
export const EMPTY_INTERVAL: WireSizeInterval = { lo: 'analog', hi: 'zero' };

export function exactly(s: WireSize): WireSizeInterval {
  return { lo: s, hi: s };
}

export function atLeast(s: WireSize): WireSizeInterval {
  return s === 'analog' ? exactly(s) : { lo: s, hi: 'sixteen' };
}

export function atMost(s: WireSize): WireSizeInterval {
  return { lo: 'zero', hi: s };
}

export function isEmptyInterval(i: WireSizeInterval): boolean {
  return compareWireSizes(i.lo, i.hi) > 0;
}

export function isAmbiguousInterval(i: WireSizeInterval): boolean {
  return compareWireSizes(i.lo, i.hi) < 0;
}

export function intersectIntervals(a: WireSizeInterval, b: WireSizeInterval): WireSizeInterval {
  const result = { lo: maxWireSize(a.lo, b.lo), hi: minWireSize(a.hi, b.hi) };
  return isEmptyInterval(result) ? EMPTY_INTERVAL : result;
}

/** Every empty interval is equal to every other */
export function intervalsEqual(a: WireSizeInterval, b: WireSizeInterval): boolean {
  if (isEmptyInterval(a) || isEmptyInterval(b)) {
    return isEmptyInterval(a) && isEmptyInterval(b);
  }
  return a.lo === b.lo && a.hi === b.hi;
}

/**
 * Sizes whose double lies in `i`. Only digital sizes of at least two bits
 * have a half, so the result never admits zero.
 */
export function halveInterval(i: WireSizeInterval): WireSizeInterval {
  if (isEmptyInterval(i)) return EMPTY_INTERVAL;
  const lo = halfSize(maxWireSize(i.lo, 'two'));
  const hi = halfSize(minWireSize(i.hi, 'sixteen'));
  if (lo === null || hi === null) return EMPTY_INTERVAL;
  const result = { lo, hi };
  return isEmptyInterval(result) ? EMPTY_INTERVAL : result;
}

/** Sizes that are the double of some size in `i` */
export function doubleInterval(i: WireSizeInterval): WireSizeInterval {
  if (isEmptyInterval(i)) return EMPTY_INTERVAL;
  const lo = doubleSize(i.lo);
  if (lo === null) return EMPTY_INTERVAL;
  return { lo, hi: doubleSize(i.hi) ?? 'sixteen' };
}

export function formatInterval(i: WireSizeInterval): string {
  if (isEmptyInterval(i)) return '[]';
  return i.lo === i.hi ? i.lo : `[${i.lo}, ${i.hi}]`;
}
