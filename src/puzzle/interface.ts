/**
 * Interface placement.
 *
 * An interface occupies a one-cell-thick strip just outside the board on
 * its side. Its ports face into the board, so each one joins the wire at
 * the adjacent board edge.
 */

import type { Coords, CoordsRect, CoordsSize, Direction } from '../shared/geom/index.ts';
import {
  addDelta,
  DIRECTIONS,
  directionDelta,
  isVertical,
  oppositeDirection,
  rectTopLeft,
  rotateCcw,
  rotateCw,
  scaleDelta,
} from '../shared/geom/index.ts';
import type { PlacedInterfacePort } from '../engine/graph/types.ts';
import type { PuzzleInterface } from './types.ts';

function span(side: Direction, bounds: CoordsRect): number {
  return isVertical(side) ? bounds.width : bounds.height;
}

function distanceAlong(iface: PuzzleInterface, total: number): number {
  const len = iface.ports.length;
  switch (iface.position.kind) {
    case 'left':
      return iface.position.offset;
    case 'center':
      return Math.trunc((total - len) / 2);
    case 'right':
      return total - len - iface.position.offset;
  }
}

export function interfaceTopLeft(iface: PuzzleInterface, bounds: CoordsRect): Coords {
  const total = span(iface.side, bounds);
  const len = iface.ports.length;
  const dist = distanceAlong(iface, total);
  const origin = rectTopLeft(bounds);
  switch (iface.side) {
    case 'east':
      return addDelta(origin, { x: bounds.width, y: total - len - dist });
    case 'south':
      return addDelta(origin, { x: dist, y: bounds.height });
    case 'west':
      return addDelta(origin, { x: -1, y: dist });
    case 'north':
      return addDelta(origin, { x: total - len - dist, y: -1 });
  }
}

/** Cells covered by the interface strip */
export function interfaceSize(iface: PuzzleInterface): CoordsSize {
  const len = iface.ports.length;
  return isVertical(iface.side) ? { width: len, height: 1 } : { width: 1, height: len };
}

export function interfacePorts(iface: PuzzleInterface, bounds: CoordsRect): PlacedInterfacePort[] {
  const topLeft = interfaceTopLeft(iface, bounds);
  const step =
    iface.side === 'south' || iface.side === 'west'
      ? directionDelta(rotateCcw(iface.side))
      : directionDelta(rotateCw(iface.side));
  const dir = oppositeDirection(iface.side);
  return iface.ports.map((p, i) => ({
    name: p.name,
    loc: { coords: addDelta(topLeft, scaleDelta(step, i)), dir },
    flow: p.flow,
    color: p.color,
    size: p.size,
  }));
}

/** Smallest board the interfaces fit along, at least 1×1 */
export function minBoundsSize(interfaces: readonly PuzzleInterface[]): CoordsSize {
  let width = 1;
  let height = 1;
  for (const side of DIRECTIONS) {
    let left = 0;
    let center = 0;
    let right = 0;
    for (const iface of interfaces) {
      if (iface.side !== side) continue;
      const count = iface.ports.length;
      switch (iface.position.kind) {
        case 'left':
          left = Math.max(left, count + iface.position.offset);
          break;
        case 'center':
          center = Math.max(center, count);
          break;
        case 'right':
          right = Math.max(right, count + iface.position.offset);
          break;
      }
    }
    const needed = center > 0 ? 2 * Math.max(left, right) + center : left + right;
    if (isVertical(side)) {
      width = Math.max(width, needed);
    } else {
      height = Math.max(height, needed);
    }
  }
  return { width, height };
}

export function boundsFitInterfaces(bounds: CoordsRect, interfaces: readonly PuzzleInterface[]): boolean {
  const min = minBoundsSize(interfaces);
  return bounds.width >= min.width && bounds.height >= min.height;
}
