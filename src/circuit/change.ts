/**
 * Grid changes: the only way an edit grid is modified.
 *
 * Every change has an exact inverse, so a group of changes can be undone by
 * applying the inverted group. Groups are collapsed before they go on the
 * undo stack, fusing adjacent changes that touch the same thing.
 */

import type { Coords, CoordsRect, Direction, Orientation } from '../shared/geom/index.ts';
import {
  addDelta,
  coordsEqual,
  directionDelta,
  oppositeDirection,
  orientationsEqual,
  rectsEqual,
} from '../shared/geom/index.ts';
import type { WireMap, WireShape } from '../engine/wires/index.ts';
import type { ChipType } from '../engine/chips/chip-type.ts';
import { chipTypesEqual } from '../engine/chips/chip-type.ts';

export interface ReplaceWiresChange {
  kind: 'replaceWires';
  /** Fragments removed, keyed by fragmentKey */
  oldWires: WireMap;
  /** Fragments added in their place */
  newWires: WireMap;
}

export interface ChipChange {
  kind: 'addChip' | 'removeChip';
  coords: Coords;
  type: ChipType;
  orient: Orientation;
}

export interface SetBoundsChange {
  kind: 'setBounds';
  oldBounds: CoordsRect;
  newBounds: CoordsRect;
}

export interface MassWiresChange {
  kind: 'massRemoveWires' | 'massAddWires';
  rect: CoordsRect;
  wires: WireMap;
}

export interface StubWireChange {
  kind: 'addStubWire' | 'removeStubWire';
  coords: Coords;
  dir: Direction;
}

export type GridChange =
  | ReplaceWiresChange
  | ChipChange
  | SetBoundsChange
  | MassWiresChange
  | StubWireChange;

// =============================================================================
// Construction
// =============================================================================

export function replaceWiresChange(
  oldWires: ReadonlyMap<string, WireShape>,
  newWires: ReadonlyMap<string, WireShape>,
): GridChange {
  return { kind: 'replaceWires', oldWires, newWires };
}

export function addChipChange(coords: Coords, type: ChipType, orient: Orientation): GridChange {
  return { kind: 'addChip', coords, type, orient };
}

export function removeChipChange(coords: Coords, type: ChipType, orient: Orientation): GridChange {
  return { kind: 'removeChip', coords, type, orient };
}

export function setBoundsChange(oldBounds: CoordsRect, newBounds: CoordsRect): GridChange {
  return { kind: 'setBounds', oldBounds, newBounds };
}

export function massRemoveWiresChange(rect: CoordsRect, wires: WireMap): GridChange {
  return { kind: 'massRemoveWires', rect, wires: new Map(wires) };
}

export function massAddWiresChange(rect: CoordsRect, wires: WireMap): GridChange {
  return { kind: 'massAddWires', rect, wires: new Map(wires) };
}

export function addStubWireChange(coords: Coords, dir: Direction): GridChange {
  return { kind: 'addStubWire', coords, dir };
}

export function removeStubWireChange(coords: Coords, dir: Direction): GridChange {
  return { kind: 'removeStubWire', coords, dir };
}

// =============================================================================
// Inversion
// =============================================================================

export function invertChange(change: GridChange): GridChange {
  switch (change.kind) {
    case 'replaceWires':
      return replaceWiresChange(change.newWires, change.oldWires);
    case 'addChip':
      return removeChipChange(change.coords, change.type, change.orient);
    case 'removeChip':
      return addChipChange(change.coords, change.type, change.orient);
    case 'setBounds':
      return setBoundsChange(change.newBounds, change.oldBounds);
    case 'massRemoveWires':
      return massAddWiresChange(change.rect, change.wires);
    case 'massAddWires':
      return massRemoveWiresChange(change.rect, change.wires);
    case 'addStubWire':
      return removeStubWireChange(change.coords, change.dir);
    case 'removeStubWire':
      return addStubWireChange(change.coords, change.dir);
  }
}

/** The group that undoes `changes`: reversed, each change inverted */
export function invertGroup(changes: readonly GridChange[]): GridChange[] {
  return [...changes].reverse().map(invertChange);
}

// =============================================================================
// Collapse
// =============================================================================

function wireMapsEqual(a: WireMap, b: WireMap): boolean {
  if (a.size !== b.size) return false;
  for (const [key, shape] of a) {
    if (b.get(key) !== shape) return false;
  }
  return true;
}

function sameChip(a: ChipChange, b: ChipChange): boolean {
  return (
    coordsEqual(a.coords, b.coords) &&
    chipTypesEqual(a.type, b.type) &&
    orientationsEqual(a.orient, b.orient)
  );
}

/** A stub pair is named from either of its two half-edges */
function sameStubPair(a: StubWireChange, b: StubWireChange): boolean {
  if (coordsEqual(a.coords, b.coords) && a.dir === b.dir) return true;
  return (
    coordsEqual(addDelta(a.coords, directionDelta(a.dir)), b.coords) &&
    oppositeDirection(a.dir) === b.dir
  );
}

/** Drop no-op entries; null when nothing is left */
function normalize(change: GridChange): GridChange | null {
  switch (change.kind) {
    case 'replaceWires': {
      const oldWires = new Map(change.oldWires);
      const newWires = new Map<string, WireShape>();
      for (const [key, shape] of change.newWires) {
        if (oldWires.get(key) === shape) {
          oldWires.delete(key);
        } else {
          newWires.set(key, shape);
        }
      }
      if (oldWires.size === 0 && newWires.size === 0) return null;
      return replaceWiresChange(oldWires, newWires);
    }
    case 'setBounds':
      return rectsEqual(change.oldBounds, change.newBounds) ? null : change;
    case 'massRemoveWires':
    case 'massAddWires':
      return change.wires.size === 0 ? null : change;
    default:
      return change;
  }
}

/**
 * Fuse `second` into `first` (applied in that order).
 * Returns the fused list: empty when they cancel, the pair itself when they
 * don't combine.
 */
function fuse(first: GridChange, second: GridChange): GridChange[] {
  if (first.kind === 'replaceWires' && second.kind === 'replaceWires') {
    const oldWires = new Map(first.oldWires);
    const newWires = new Map(first.newWires);
    for (const [key, shape] of second.oldWires) {
      if (newWires.get(key) === shape) {
        newWires.delete(key);
      } else {
        oldWires.set(key, shape);
      }
    }
    for (const [key, shape] of second.newWires) {
      if (oldWires.get(key) === shape) {
        oldWires.delete(key);
      } else {
        newWires.set(key, shape);
      }
    }
    if (oldWires.size === 0 && newWires.size === 0) return [];
    return [replaceWiresChange(oldWires, newWires)];
  }
  if (
    (first.kind === 'addChip' && second.kind === 'removeChip') ||
    (first.kind === 'removeChip' && second.kind === 'addChip')
  ) {
    if (sameChip(first, second)) return [];
  }
  if (first.kind === 'setBounds' && second.kind === 'setBounds') {
    if (rectsEqual(first.newBounds, second.oldBounds)) {
      return rectsEqual(first.oldBounds, second.newBounds)
        ? []
        : [setBoundsChange(first.oldBounds, second.newBounds)];
    }
  }
  if (
    (first.kind === 'massRemoveWires' && second.kind === 'massAddWires') ||
    (first.kind === 'massAddWires' && second.kind === 'massRemoveWires')
  ) {
    if (rectsEqual(first.rect, second.rect) && wireMapsEqual(first.wires, second.wires)) return [];
  }
  if (
    (first.kind === 'addStubWire' && second.kind === 'removeStubWire') ||
    (first.kind === 'removeStubWire' && second.kind === 'addStubWire')
  ) {
    if (sameStubPair(first, second)) return [];
  }
  const normalized = normalize(second);
  return normalized ? [first, normalized] : [first];
}

/**
 * Invert a group and collapse the result: the returned group undoes
 * `changes`, with adjacent changes fused and no-ops dropped.
 */
export function invertAndCollapseGroup(changes: readonly GridChange[]): GridChange[] {
  const collapsed: GridChange[] = [];
  for (let i = changes.length - 1; i >= 0; i--) {
    const inverted = invertChange(changes[i]);
    const top = collapsed.pop();
    if (top === undefined) {
      const normalized = normalize(inverted);
      if (normalized) collapsed.push(normalized);
    } else {
      collapsed.push(...fuse(top, inverted));
    }
  }
  return collapsed;
}

/** A group with the same effect as `changes`, collapsed */
export function collapseChanges(changes: readonly GridChange[]): GridChange[] {
  return invertGroup(invertAndCollapseGroup(changes));
}
