import { describe, it, expect, vi, afterEach } from 'vitest';
import { IDENTITY_ORIENTATION } from '../../shared/geom/index.ts';
import { simpleChipType } from '../../engine/chips/chip-type.ts';
import { addChipChange } from '../../circuit/change.ts';
import { wirePathChange } from '../../circuit/wire-path.ts';
import { blankPuzzle } from '../../puzzle/testing.ts';
import { CONTINUE, FAILURE } from '../../engine/evaluation/types.ts';
import { createCircuitStore } from '../index.ts';

function storeWith(...kinds: Array<['Button' | 'Break' | 'Not', number]>) {
  const store = createCircuitStore();
  store.getState().loadPuzzle(blankPuzzle());
  const result = store
    .getState()
    .applyChanges(kinds.map(([kind, x]) => addChipChange({ x, y: 0 }, simpleChipType(kind), IDENTITY_ORIENTATION)));
  if (!result.ok) throw new Error('could not place chips');
  return store;
}

function wireFirstTwo(store: ReturnType<typeof createCircuitStore>): void {
  const change = wirePathChange([
    { x: 0, y: 0 },
    { x: 1, y: 0 },
  ]);
  if (!change) throw new Error('bad path');
  const result = store.getState().applyChanges([change]);
  if (!result.ok) throw new Error('could not wire chips');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('simulation-slice', () => {
  it('runs time steps as real time passes', () => {
    const store = createCircuitStore();
    store.getState().loadPuzzle(blankPuzzle());
    expect(store.getState().startSimulation()).toBe(true);

    expect(store.getState().advanceSimulation(0.25)).toBe(2);
    expect(store.getState().circuitEval?.timeStep).toBe(2);
    expect(store.getState().lastOutcome).toEqual(CONTINUE);
  });

  it('freezes editing while running', () => {
    const store = storeWith(['Not', 0]);
    store.getState().startSimulation();
    const result = store.getState().applyChanges([
      addChipChange({ x: 3, y: 0 }, simpleChipType('Not'), IDENTITY_ORIENTATION),
    ]);
    expect(result.ok ? [] : result.error.map((e) => e.kind)).toEqual(['evalRunning']);

    store.getState().stopSimulation();
    expect(store.getState().circuitEval).toBeNull();
    expect(store.getState().grid?.eval).toBeNull();
    expect(store.getState().advanceSimulation(1)).toBe(0);
  });

  it('keeps build errors when the circuit cannot start', () => {
    const store = storeWith(['Button', 0], ['Not', 1]);
    wireFirstTwo(store);
    expect(store.getState().startSimulation()).toBe(false);
    expect(store.getState().circuitEval).toBeNull();
    expect(store.getState().buildErrors.map((e) => e.kind)).toContain('PortColorMismatch');
  });

  it('pauses real-time advance at a breakpoint', () => {
    const store = storeWith(['Button', 0], ['Break', 1]);
    wireFirstTwo(store);
    store.getState().startSimulation();
    expect(store.getState().pressChip({ x: 0, y: 0 }, 0, 1)).toBe(true);

    expect(store.getState().advanceSimulation(1)).toBe(1);
    expect(store.getState().lastOutcome).toEqual({ kind: 'breakpoint', coords: [{ x: 1, y: 0 }] });
    expect(store.getState().advanceSimulation(1)).toBe(0);

    expect(store.getState().stepSimulation('timeStep')).toEqual(CONTINUE);
    expect(store.getState().advanceSimulation(0.25)).toBe(2);
    expect(store.getState().circuitEval?.timeStep).toBe(3);
  });

  it('logs a failed run once', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = storeWith(['Button', 0]);
    store.getState().startSimulation({ prefs: { maxCyclesPerTimeStep: 2 } });
    store.getState().pressChip({ x: 0, y: 0 }, 0, 3);

    expect(store.getState().stepSimulation('timeStep')).toEqual(FAILURE);
    expect(store.getState().stepSimulation('cycle')).toEqual(FAILURE);
    expect(store.getState().advanceSimulation(1)).toBe(0);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[Simulation] Simulation failed', {
      timeStep: 0,
      errors: 1,
      message: 'Exceeded 2 cycles',
    });
  });

  it('does nothing without a running circuit', () => {
    const store = createCircuitStore();
    expect(store.getState().startSimulation()).toBe(false);
    expect(store.getState().stepSimulation('subcycle')).toBeNull();
    expect(store.getState().pressChip({ x: 0, y: 0 }, 0, 1)).toBe(false);
  });
});
