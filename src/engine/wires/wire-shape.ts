/**
 * Wire shapes at a half-edge.
 *
 * A fragment lives at a (cell, direction) half-edge and names how it joins
 * the other half-edges of the same cell. TurnLeft at east runs east-north.
 */

import type { Direction } from '../../shared/geom/index.ts';
import { oppositeDirection, rotateCcw, rotateCw } from '../../shared/geom/index.ts';

export type WireShape =
  | 'stub'
  | 'straight'
  | 'turnLeft'
  | 'turnRight'
  | 'splitTee'
  | 'splitLeft'
  | 'splitRight'
  | 'cross';

export const WIRE_SHAPES: readonly WireShape[] = [
  'stub',
  'straight',
  'turnLeft',
  'turnRight',
  'splitTee',
  'splitLeft',
  'splitRight',
  'cross',
];

/** A half-edge in the same cell and the shape it must carry */
export interface PartnerFragment {
  dir: Direction;
  shape: WireShape;
}

/** Directions joined to `dir` inside the cell, `dir` included */
export function connectedDirections(shape: WireShape, dir: Direction): Direction[] {
  switch (shape) {
    case 'stub':
      return [dir];
    case 'straight':
      return [dir, oppositeDirection(dir)];
    case 'turnLeft':
      return [dir, rotateCcw(dir)];
    case 'turnRight':
      return [dir, rotateCw(dir)];
    case 'splitTee':
      return [dir, rotateCw(dir), rotateCcw(dir)];
    case 'splitLeft':
      return [dir, oppositeDirection(dir), rotateCcw(dir)];
    case 'splitRight':
      return [dir, oppositeDirection(dir), rotateCw(dir)];
    case 'cross':
      return [dir, rotateCw(dir), oppositeDirection(dir), rotateCcw(dir)];
  }
}

/** The other half-edges a fragment of this shape requires in its cell */
export function partnerFragments(shape: WireShape, dir: Direction): PartnerFragment[] {
  switch (shape) {
    case 'stub':
      return [];
    case 'straight':
      return [{ dir: oppositeDirection(dir), shape: 'straight' }];
    case 'turnLeft':
      return [{ dir: rotateCcw(dir), shape: 'turnRight' }];
    case 'turnRight':
      return [{ dir: rotateCw(dir), shape: 'turnLeft' }];
    case 'splitTee':
      return [
        { dir: rotateCw(dir), shape: 'splitLeft' },
        { dir: rotateCcw(dir), shape: 'splitRight' },
      ];
    case 'splitLeft':
      return [
        { dir: rotateCcw(dir), shape: 'splitTee' },
        { dir: oppositeDirection(dir), shape: 'splitRight' },
      ];
    case 'splitRight':
      return [
        { dir: rotateCw(dir), shape: 'splitTee' },
        { dir: oppositeDirection(dir), shape: 'splitLeft' },
      ];
    case 'cross':
      return [rotateCw(dir), oppositeDirection(dir), rotateCcw(dir)].map((d) => ({
        dir: d,
        shape: 'cross' as const,
      }));
  }
}

// =============================================================================
// Names used in saved circuits
// =============================================================================

const SHAPE_NAMES: Record<WireShape, string> = {
  stub: 'Stub',
  straight: 'Straight',
  turnLeft: 'TurnLeft',
  turnRight: 'TurnRight',
  splitTee: 'SplitTee',
  splitLeft: 'SplitLeft',
  splitRight: 'SplitRight',
  cross: 'Cross',
};

export function wireShapeName(shape: WireShape): string {
  return SHAPE_NAMES[shape];
}

export function parseWireShapeName(name: string): WireShape | null {
  return WIRE_SHAPES.find((shape) => SHAPE_NAMES[shape] === name) ?? null;
}
