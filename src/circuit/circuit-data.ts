/**
 * Saved circuit format.
 *
 * Cells are stored relative to the board's top-left corner as delta keys
 * (`p2m3` is +2, -3). Only the fragments needed to rebuild the wires are
 * written; partners and neighbor stubs are inferred on load.
 */

import type { CoordsDelta, Direction } from '../shared/geom/index.ts';
import {
  addDelta,
  deltaBetween,
  directionChar,
  formatOrientation,
  parseDirectionChar,
  parseOrientation,
  rect,
  rectTopLeft,
} from '../shared/geom/index.ts';
import { createLogger } from '../shared/logger/index.ts';
import type { WireShape } from '../engine/wires/index.ts';
import {
  fragmentKey,
  locKey,
  neighborLoc,
  parseFragmentKey,
  partnerFragments,
  parseWireShapeName,
  sortedFragments,
  wireShapeName,
} from '../engine/wires/index.ts';
import { formatChipType, parseChipType } from '../engine/chips/chip-type.ts';
import type { PuzzleDefinition } from '../puzzle/types.ts';
import { addChipChange } from './change.ts';
import { EditGrid } from './edit-grid.ts';

const log = createLogger('CircuitData');

export interface CircuitData {
  /** Board width and height */
  size: [number, number];
  /** Delta key → `<orientation>-<chip type>`, e.g. `f1-Const(5)` */
  chips: Record<string, string>;
  /** Delta key plus direction letter → wire shape name */
  wires: Record<string, string>;
}

// =============================================================================
// Delta keys
// =============================================================================

function encodeInt(n: number): string {
  return n < 0 ? `m${-n}` : `p${n}`;
}

export function encodeDeltaKey(delta: CoordsDelta): string {
  return `${encodeInt(delta.x)}${encodeInt(delta.y)}`;
}

const DELTA_PATTERN = /^([pm])(\d+)([pm])(\d+)$/;

export function parseDeltaKey(key: string): CoordsDelta | null {
  const match = DELTA_PATTERN.exec(key);
  if (!match) return null;
  const [, sx, x, sy, y] = match;
  return {
    x: (sx === 'm' ? -1 : 1) * Number(x),
    y: (sy === 'm' ? -1 : 1) * Number(y),
  };
}

// =============================================================================
// Grid → data
// =============================================================================

/** Whether this fragment is written, or rebuilt from another on load */
function isStoredFragment(shape: WireShape, dir: Direction, neighbor: WireShape | undefined): boolean {
  switch (shape) {
    case 'stub':
      return neighbor === 'stub' && (dir === 'east' || dir === 'south');
    case 'straight':
      return dir === 'east' || dir === 'south';
    case 'turnLeft':
    case 'splitTee':
      return true;
    case 'cross':
      return dir === 'east';
    case 'turnRight':
    case 'splitLeft':
    case 'splitRight':
      return false;
  }
}

export function toCircuitData(grid: EditGrid): CircuitData {
  const origin = rectTopLeft(grid.bounds);
  const chips: Record<string, string> = {};
  for (const chip of grid.chips()) {
    const key = encodeDeltaKey(deltaBetween(origin, chip.coords));
    chips[key] = `${formatOrientation(chip.orient)}-${formatChipType(chip.type)}`;
  }
  const wires: Record<string, string> = {};
  for (const { loc, shape } of sortedFragments(grid.wires)) {
    const neighbor = grid.wires.get(locKey(neighborLoc(loc)));
    if (!isStoredFragment(shape, loc.dir, neighbor)) continue;
    const key = encodeDeltaKey(deltaBetween(origin, loc.coords)) + directionChar(loc.dir);
    wires[key] = wireShapeName(shape);
  }
  return { size: [grid.bounds.width, grid.bounds.height], chips, wires };
}

// =============================================================================
// Data → grid
// =============================================================================

export function editGridFromCircuitData(puzzle: PuzzleDefinition, data: CircuitData): EditGrid {
  const origin = { x: 0, y: 0 };
  const bounds = rect(origin.x, origin.y, data.size[0], data.size[1]);

  // Chips go through the normal placement checks.
  const staging = new EditGrid(puzzle, bounds);
  for (const [key, value] of Object.entries(data.chips)) {
    const delta = parseDeltaKey(key);
    const dash = value.indexOf('-');
    const orient = dash < 0 ? null : parseOrientation(value.slice(0, dash));
    const type = dash < 0 ? null : parseChipType(value.slice(dash + 1));
    if (!delta || !orient || !type) {
      log.warn('Skipping unreadable chip', { key, value });
      continue;
    }
    const result = staging.mutate([addChipChange(addDelta(origin, delta), type, orient)]);
    if (!result.ok) {
      log.warn('Skipping chip that cannot be placed', { key, value, reason: result.error[0]?.message });
    }
  }

  const fragments = new Map<string, WireShape>();
  for (const [key, name] of Object.entries(data.wires)) {
    const delta = parseDeltaKey(key.slice(0, -1));
    const dir = parseDirectionChar(key.slice(-1));
    const shape = parseWireShapeName(name);
    if (!delta || !dir || !shape) {
      log.warn('Skipping unreadable wire', { key, name });
      continue;
    }
    const coords = addDelta(origin, delta);
    const partners = partnerFragments(shape, dir);
    const free =
      !fragments.has(fragmentKey(coords, dir)) &&
      partners.every((p) => !fragments.has(fragmentKey(coords, p.dir)));
    if (!free) continue;
    fragments.set(fragmentKey(coords, dir), shape);
    for (const p of partners) fragments.set(fragmentKey(coords, p.dir), p.shape);
  }

  const repaired: string[] = [];
  for (const key of [...fragments.keys()]) {
    const across = locKey(neighborLoc(parseFragmentKey(key)));
    if (!fragments.has(across)) {
      fragments.set(across, 'stub');
      repaired.push(across);
    }
  }
  if (repaired.length > 0) {
    log.debug('Added missing stubs', { count: repaired.length });
  }

  return new EditGrid(puzzle, bounds, staging.chips(), fragments);
}

// =============================================================================
// JSON
// =============================================================================

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

function isSize(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((n) => typeof n === 'number' && Number.isInteger(n) && n > 0)
  );
}

export function serializeCircuitData(data: CircuitData): string {
  return JSON.stringify(data);
}

/** Parse saved JSON; null when it is not circuit data */
export function deserializeCircuitData(json: string): CircuitData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const size: unknown = Reflect.get(parsed, 'size');
  const chips: unknown = Reflect.get(parsed, 'chips') ?? {};
  const wires: unknown = Reflect.get(parsed, 'wires') ?? {};
  if (!isSize(size) || !isStringRecord(chips) || !isStringRecord(wires)) return null;
  return { size: [size[0], size[1]], chips, wires };
}
