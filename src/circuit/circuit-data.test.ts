import { describe, it, expect, vi, afterEach } from 'vitest';
import { IDENTITY_ORIENTATION, rect } from '../shared/geom/index.ts';
import { simpleChipType } from '../engine/chips/chip-type.ts';
import { blankPuzzle } from '../puzzle/testing.ts';
import { addChipChange } from './change.ts';
import {
  deserializeCircuitData,
  editGridFromCircuitData,
  encodeDeltaKey,
  parseDeltaKey,
  serializeCircuitData,
  toCircuitData,
} from './circuit-data.ts';
import type { CircuitData } from './circuit-data.ts';
import { EditGrid } from './edit-grid.ts';
import { wirePathChange } from './wire-path.ts';

const NOT = simpleChipType('Not');

function sampleGrid(): EditGrid {
  const grid = EditGrid.create(blankPuzzle());
  const wire = wirePathChange([
    { x: 1, y: 0 },
    { x: 2, y: 0 },
    { x: 3, y: 0 },
    { x: 3, y: 1 },
  ]);
  const pair = wirePathChange([
    { x: 4, y: 2 },
    { x: 5, y: 2 },
  ]);
  if (!wire || !pair) throw new Error('bad path');
  const result = grid.mutate([
    addChipChange({ x: 1, y: 0 }, NOT, IDENTITY_ORIENTATION),
    addChipChange({ x: 0, y: 2 }, simpleChipType('Counter'), IDENTITY_ORIENTATION),
    wire,
    pair,
  ]);
  if (!result.ok) throw new Error(result.error[0].message);
  return grid;
}

describe('delta keys', () => {
  it('writes signs as p and m', () => {
    expect(encodeDeltaKey({ x: 2, y: -3 })).toBe('p2m3');
    expect(encodeDeltaKey({ x: 0, y: 0 })).toBe('p0p0');
  });

  it('parses what it writes', () => {
    expect(parseDeltaKey('m1p4')).toEqual({ x: -1, y: 4 });
    expect(parseDeltaKey('p12p0')).toEqual({ x: 12, y: 0 });
  });

  it('rejects malformed keys', () => {
    expect(parseDeltaKey('x1y2')).toBeNull();
    expect(parseDeltaKey('p1')).toBeNull();
    expect(parseDeltaKey('p1m2e')).toBeNull();
  });
});

describe('toCircuitData', () => {
  it('stores only the fragments needed to rebuild the wires', () => {
    expect(toCircuitData(sampleGrid())).toEqual({
      size: [6, 4],
      chips: { p1p0: 'f0-Not', p0p2: 'f0-Counter' },
      wires: { p2p0e: 'Straight', p3p0w: 'TurnLeft', p4p2e: 'Stub' },
    });
  });

  it('keys cells from the top-left corner of the board', () => {
    const grid = new EditGrid(blankPuzzle(), rect(-2, -1, 6, 4), [
      { coords: { x: -2, y: -1 }, type: NOT, orient: IDENTITY_ORIENTATION },
    ]);
    expect(toCircuitData(grid).chips).toEqual({ p0p0: 'f0-Not' });
  });
});

describe('editGridFromCircuitData', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rebuilds partners and neighbor stubs', () => {
    const grid = sampleGrid();
    const loaded = editGridFromCircuitData(blankPuzzle(), toCircuitData(grid));
    expect(loaded.bounds).toEqual(rect(0, 0, 6, 4));
    expect(loaded.chips()).toEqual(grid.chips());
    expect([...loaded.wires.entries()].sort()).toEqual([...grid.wires.entries()].sort());
    expect(loaded.canUndo).toBe(false);
  });

  it('skips chips it cannot read or place', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const data: CircuitData = {
      size: [4, 3],
      chips: { p0p0: 'f0-Bogus', zz: 'f0-Not', p1p1: 'f0-Not', p3p0: 'f0-Counter' },
      wires: {},
    };
    const loaded = editGridFromCircuitData(blankPuzzle(), data);
    expect(loaded.chips()).toEqual([{ coords: { x: 1, y: 1 }, type: NOT, orient: IDENTITY_ORIENTATION }]);
    expect(console.warn).toHaveBeenCalledTimes(3);
  });

  it('skips a wire that would overwrite another', () => {
    const loaded = editGridFromCircuitData(blankPuzzle(), {
      size: [4, 3],
      chips: {},
      wires: { p1p0e: 'Straight', p1p0w: 'TurnLeft' },
    });
    expect(loaded.wireShapeAt({ x: 1, y: 0 }, 'west')).toBe('straight');
    expect(loaded.wireShapeAt({ x: 1, y: 0 }, 'north')).toBeNull();
  });
});

describe('circuit data JSON', () => {
  it('reads back what it writes', () => {
    const data = toCircuitData(sampleGrid());
    expect(deserializeCircuitData(serializeCircuitData(data))).toEqual(data);
  });

  it('defaults missing chips and wires to empty', () => {
    expect(deserializeCircuitData('{"size":[4,3]}')).toEqual({ size: [4, 3], chips: {}, wires: {} });
  });

  it('rejects anything that is not circuit data', () => {
    expect(deserializeCircuitData('not json')).toBeNull();
    expect(deserializeCircuitData('null')).toBeNull();
    expect(deserializeCircuitData('{"size":[0,3]}')).toBeNull();
    expect(deserializeCircuitData('{"size":[4,3],"chips":{"p0p0":5}}')).toBeNull();
  });
});
