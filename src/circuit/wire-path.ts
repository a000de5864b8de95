/**
 * Wire drawing along a path of cells.
 *
 * The path runs through adjacent cells; each end gets a stub pointing
 * along the wire and each inner cell a straight or a turn.
 */

import type { Coords, Direction } from '../shared/geom/index.ts';
import {
  coordsEqual,
  coordsKey,
  DIRECTIONS,
  directionDelta,
  oppositeDirection,
  rotateCcw,
  addDelta,
} from '../shared/geom/index.ts';
import type { WireShape } from '../engine/wires/index.ts';
import { fragmentKey } from '../engine/wires/index.ts';
import type { GridChange } from './change.ts';
import { replaceWiresChange } from './change.ts';

/** Direction from one cell to an adjacent one */
function stepDirection(from: Coords, to: Coords): Direction | null {
  return DIRECTIONS.find((dir) => coordsEqual(addDelta(from, directionDelta(dir)), to)) ?? null;
}

/**
 * Fragments for a wire through `cells`. Null for fewer than two cells, a
 * step between cells that are not adjacent, or a path that revisits a cell.
 */
export function planWirePath(cells: readonly Coords[]): Map<string, WireShape> | null {
  if (cells.length < 2) return null;
  if (new Set(cells.map(coordsKey)).size !== cells.length) return null;

  const steps: Direction[] = [];
  for (let i = 1; i < cells.length; i++) {
    const dir = stepDirection(cells[i - 1], cells[i]);
    if (dir === null) return null;
    steps.push(dir);
  }

  const fragments = new Map<string, WireShape>();
  const last = cells.length - 1;
  fragments.set(fragmentKey(cells[0], steps[0]), 'stub');
  for (let i = 1; i < last; i++) {
    const back = oppositeDirection(steps[i - 1]);
    const ahead = steps[i];
    if (ahead === oppositeDirection(back)) {
      fragments.set(fragmentKey(cells[i], back), 'straight');
      fragments.set(fragmentKey(cells[i], ahead), 'straight');
    } else if (ahead === rotateCcw(back)) {
      fragments.set(fragmentKey(cells[i], back), 'turnLeft');
      fragments.set(fragmentKey(cells[i], ahead), 'turnRight');
    } else {
      fragments.set(fragmentKey(cells[i], back), 'turnRight');
      fragments.set(fragmentKey(cells[i], ahead), 'turnLeft');
    }
  }
  fragments.set(fragmentKey(cells[last], oppositeDirection(steps[last - 1])), 'stub');
  return fragments;
}

/** The change that draws the wire into empty cells */
export function wirePathChange(cells: readonly Coords[]): GridChange | null {
  const fragments = planWirePath(cells);
  return fragments ? replaceWiresChange(new Map(), fragments) : null;
}
