import type { Coords, Direction } from '../../shared/geom/index.ts';
import {
  addDelta,
  directionChar,
  directionDelta,
  directionIndex,
  oppositeDirection,
  parseDirectionChar,
} from '../../shared/geom/index.ts';
import type { WireShape } from './wire-shape.ts';
import { partnerFragments } from './wire-shape.ts';

/** A half-edge: one side of one cell */
export interface FragmentLoc {
  readonly coords: Coords;
  readonly dir: Direction;
}

/** Fragment shapes keyed by `fragmentKey` */
export type WireMap = ReadonlyMap<string, WireShape>;

export function fragmentLoc(coords: Coords, dir: Direction): FragmentLoc {
  return { coords, dir };
}

export function fragmentKey(coords: Coords, dir: Direction): string {
  return `${coords.x},${coords.y},${directionChar(dir)}`;
}

export function locKey(loc: FragmentLoc): string {
  return fragmentKey(loc.coords, loc.dir);
}

export function parseFragmentKey(key: string): FragmentLoc {
  const [x, y, ch] = key.split(',');
  const dir = parseDirectionChar(ch ?? '');
  if (dir === null || x === undefined || y === undefined) {
    throw new Error(`Malformed fragment key: ${key}`);
  }
  return { coords: { x: Number(x), y: Number(y) }, dir };
}

/** The half-edge on the other side of the shared cell edge */
export function neighborLoc(loc: FragmentLoc): FragmentLoc {
  return {
    coords: addDelta(loc.coords, directionDelta(loc.dir)),
    dir: oppositeDirection(loc.dir),
  };
}

/** Orders by y, then x, then direction (east, south, west, north) */
export function compareFragmentLocs(a: FragmentLoc, b: FragmentLoc): number {
  if (a.coords.y !== b.coords.y) return a.coords.y - b.coords.y;
  if (a.coords.x !== b.coords.x) return a.coords.x - b.coords.x;
  return directionIndex(a.dir) - directionIndex(b.dir);
}

/** Fragments of the map in deterministic order */
export function sortedFragments(wires: WireMap): Array<{ loc: FragmentLoc; shape: WireShape }> {
  return [...wires.entries()]
    .map(([key, shape]) => ({ loc: parseFragmentKey(key), shape }))
    .sort((a, b) => compareFragmentLocs(a.loc, b.loc));
}

/**
 * Fragments breaking wire consistency: a missing neighbor across the edge,
 * or a partner in the same cell that is missing or has the wrong shape.
 */
export function findInconsistentFragments(wires: WireMap): FragmentLoc[] {
  const bad: FragmentLoc[] = [];
  for (const { loc, shape } of sortedFragments(wires)) {
    if (!wires.has(locKey(neighborLoc(loc)))) {
      bad.push(loc);
      continue;
    }
    const partnersOk = partnerFragments(shape, loc.dir).every(
      (p) => wires.get(fragmentKey(loc.coords, p.dir)) === p.shape,
    );
    if (!partnersOk) bad.push(loc);
  }
  return bad;
}
