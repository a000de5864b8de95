/**
 * Chip orientations: the 8 rotations and reflections of a grid rectangle.
 *
 * An orientation is applied by first mirroring across the horizontal axis
 * (when `mirror` is set) and then rotating clockwise `rotate` quarter turns.
 * Rotations by an odd number of quarter turns transpose width and height.
 */

import type { CoordsDelta, CoordsSize } from './coords.ts';
import type { Direction } from './direction.ts';
import { flipVert, oppositeDirection, rotateCcw, rotateCw } from './direction.ts';

/** Number of clockwise quarter turns */
export type Rotation = 0 | 1 | 2 | 3;

export interface Orientation {
  readonly rotate: Rotation;
  readonly mirror: boolean;
}

const ROTATIONS: readonly Rotation[] = [0, 1, 2, 3];

export const IDENTITY_ORIENTATION: Orientation = { rotate: 0, mirror: false };

/** Normalize any integer to a quarter-turn count */
export function toRotation(turns: number): Rotation {
  return ROTATIONS[((turns % 4) + 4) % 4];
}

export function orientation(rotate: number, mirror = false): Orientation {
  return { rotate: toRotation(rotate), mirror };
}

export function orientationsEqual(a: Orientation, b: Orientation): boolean {
  return a.rotate === b.rotate && a.mirror === b.mirror;
}

// =============================================================================
// Acting on directions, sizes and deltas
// =============================================================================

export function orientDirection(orient: Orientation, dir: Direction): Direction {
  const d = orient.mirror ? flipVert(dir) : dir;
  switch (orient.rotate) {
    case 0:
      return d;
    case 1:
      return rotateCw(d);
    case 2:
      return oppositeDirection(d);
    case 3:
      return rotateCcw(d);
  }
}

export function orientSize(orient: Orientation, s: CoordsSize): CoordsSize {
  return orient.rotate % 2 === 0 ? s : { width: s.height, height: s.width };
}

/**
 * Map a delta inside a rectangle of the given (unoriented) size to where
 * that cell lands once the rectangle is oriented.
 */
export function transformInSize(
  orient: Orientation,
  delta: CoordsDelta,
  s: CoordsSize,
): CoordsDelta {
  const x = delta.x;
  const y = orient.mirror ? s.height - delta.y - 1 : delta.y;
  switch (orient.rotate) {
    case 0:
      return { x, y };
    case 1:
      return { x: s.height - y - 1, y: x };
    case 2:
      return { x: s.width - x - 1, y: s.height - y - 1 };
    case 3:
      return { x: y, y: s.width - x - 1 };
  }
}

// =============================================================================
// Group operations
// =============================================================================

export function rotateOrientationCw(o: Orientation): Orientation {
  return { rotate: toRotation(o.rotate + 1), mirror: o.mirror };
}

export function rotateOrientationCcw(o: Orientation): Orientation {
  return { rotate: toRotation(o.rotate + 3), mirror: o.mirror };
}

export function flipOrientationVert(o: Orientation): Orientation {
  return {
    rotate: o.rotate % 2 === 0 ? o.rotate : toRotation(o.rotate + 2),
    mirror: !o.mirror,
  };
}

export function flipOrientationHorz(o: Orientation): Orientation {
  return {
    rotate: o.rotate % 2 !== 0 ? o.rotate : toRotation(o.rotate + 2),
    mirror: !o.mirror,
  };
}

/** The orientation equivalent to applying `inner` and then `outer` */
export function composeOrientations(outer: Orientation, inner: Orientation): Orientation {
  const base = outer.mirror ? flipOrientationVert(inner) : inner;
  return { rotate: toRotation(base.rotate + outer.rotate), mirror: base.mirror };
}

export function invertOrientation(o: Orientation): Orientation {
  if (o.mirror) return o;
  return { rotate: toRotation(4 - o.rotate), mirror: false };
}

// =============================================================================
// Text form: f0..f3 (unmirrored), t0..t3 (mirrored)
// =============================================================================

export function formatOrientation(o: Orientation): string {
  return `${o.mirror ? 't' : 'f'}${o.rotate}`;
}

export function parseOrientation(text: string): Orientation | null {
  const match = /^([ft])([0-3])$/.exec(text);
  if (!match) return null;
  return orientation(Number(match[2]), match[1] === 't');
}
