/**
 * Cardinal directions on the circuit grid.
 *
 * Clockwise order is east → south → west → north, with y growing
 * downward, so rotating east clockwise faces south.
 */

import type { CoordsDelta } from './coords.ts';

export type Direction = 'east' | 'south' | 'west' | 'north';

/** All directions in clockwise order starting from east */
export const DIRECTIONS: readonly Direction[] = ['east', 'south', 'west', 'north'];

const DELTAS: Record<Direction, CoordsDelta> = {
  east: { x: 1, y: 0 },
  south: { x: 0, y: 1 },
  west: { x: -1, y: 0 },
  north: { x: 0, y: -1 },
};

const CW: Record<Direction, Direction> = {
  east: 'south',
  south: 'west',
  west: 'north',
  north: 'east',
};

const CCW: Record<Direction, Direction> = {
  east: 'north',
  north: 'west',
  west: 'south',
  south: 'east',
};

const OPPOSITE: Record<Direction, Direction> = {
  east: 'west',
  west: 'east',
  north: 'south',
  south: 'north',
};

const CHARS: Record<Direction, string> = {
  east: 'e',
  south: 's',
  west: 'w',
  north: 'n',
};

export function directionDelta(dir: Direction): CoordsDelta {
  return DELTAS[dir];
}

export function rotateCw(dir: Direction): Direction {
  return CW[dir];
}

export function rotateCcw(dir: Direction): Direction {
  return CCW[dir];
}

export function oppositeDirection(dir: Direction): Direction {
  return OPPOSITE[dir];
}

/** Mirror across the horizontal axis: north ↔ south */
export function flipVert(dir: Direction): Direction {
  return dir === 'north' || dir === 'south' ? OPPOSITE[dir] : dir;
}

/** Mirror across the vertical axis: east ↔ west */
export function flipHorz(dir: Direction): Direction {
  return dir === 'east' || dir === 'west' ? OPPOSITE[dir] : dir;
}

export function isVertical(dir: Direction): boolean {
  return dir === 'north' || dir === 'south';
}

/** Index in clockwise order from east (0..3) */
export function directionIndex(dir: Direction): number {
  return DIRECTIONS.indexOf(dir);
}

/** Single-letter form used in circuit data keys */
export function directionChar(dir: Direction): string {
  return CHARS[dir];
}

export function parseDirectionChar(ch: string): Direction | null {
  switch (ch) {
    case 'e':
      return 'east';
    case 's':
      return 'south';
    case 'w':
      return 'west';
    case 'n':
      return 'north';
    default:
      return null;
  }
}
