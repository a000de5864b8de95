import { describe, it, expect } from 'vitest';
import { IDENTITY_ORIENTATION } from '../../shared/geom/index.ts';
import { simpleChipType } from '../../engine/chips/chip-type.ts';
import { addChipChange } from '../../circuit/change.ts';
import { blankPuzzle } from '../../puzzle/testing.ts';
import { createCircuitStore } from '../index.ts';

const NOT = simpleChipType('Not');

describe('circuit-slice', () => {
  it('starts with no circuit', () => {
    const store = createCircuitStore();
    expect(store.getState().grid).toBeNull();
    expect(store.getState().exportCircuit()).toBeNull();
    expect(() => store.getState().undo()).toThrow('No circuit is loaded');
  });

  it('bumps gridVersion only when the grid changes', () => {
    const store = createCircuitStore();
    store.getState().loadPuzzle(blankPuzzle());
    expect(store.getState().gridVersion).toBe(1);

    const added = store.getState().applyChanges([addChipChange({ x: 1, y: 0 }, NOT, IDENTITY_ORIENTATION)]);
    expect(added.ok).toBe(true);
    expect(store.getState().gridVersion).toBe(2);

    const overlapping = store.getState().applyChanges([addChipChange({ x: 1, y: 0 }, NOT, IDENTITY_ORIENTATION)]);
    expect(overlapping.ok).toBe(false);
    expect(store.getState().gridVersion).toBe(2);

    expect(store.getState().undo()).toBe(true);
    expect(store.getState().gridVersion).toBe(3);
    expect(store.getState().undo()).toBe(false);
    expect(store.getState().gridVersion).toBe(3);
    expect(store.getState().redo()).toBe(true);
    expect(store.getState().gridVersion).toBe(4);
  });

  it('exports and reloads the circuit', () => {
    const store = createCircuitStore();
    store.getState().loadPuzzle(blankPuzzle());
    store.getState().applyChanges([addChipChange({ x: 1, y: 0 }, NOT, IDENTITY_ORIENTATION)]);
    const data = store.getState().exportCircuit();
    expect(data).toEqual({ size: [6, 4], chips: { p1p0: 'f0-Not' }, wires: {} });
    if (!data) return;

    const other = createCircuitStore();
    other.getState().loadCircuit(blankPuzzle(), data);
    expect(other.getState().grid?.chipAt({ x: 1, y: 0 })?.type).toEqual(NOT);
    expect(other.getState().grid?.canUndo).toBe(false);
  });

  it('stops a running simulation when a new circuit loads', () => {
    const store = createCircuitStore();
    store.getState().loadPuzzle(blankPuzzle());
    expect(store.getState().startSimulation()).toBe(true);
    const first = store.getState().grid;

    store.getState().loadPuzzle(blankPuzzle());
    expect(store.getState().circuitEval).toBeNull();
    expect(first?.eval).toBeNull();
  });
});
