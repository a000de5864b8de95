import { describe, it, expect } from 'vitest';
import { IDENTITY_ORIENTATION, rect } from '../../shared/geom/index.ts';
import { simpleChipType } from '../../engine/chips/chip-type.ts';
import { CONTINUE, FAILURE } from '../../engine/evaluation/types.ts';
import { planWirePath } from '../../circuit/wire-path.ts';
import { EditGrid } from '../../circuit/edit-grid.ts';
import { PUZZLE_LEVELS, getPuzzleById, unlockedPuzzles } from './index.ts';
import { TUTORIAL_XOR } from './tutorial-levels.ts';
import { SANDBOX_ANALOG, SANDBOX_BEHAVIOR, SANDBOX_EVENT } from './sandbox-levels.ts';

describe('puzzle levels', () => {
  it('have unique ids', () => {
    const ids = PUZZLE_LEVELS.map((p) => p.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('are found by id', () => {
    expect(getPuzzleById('tutorial-xor')).toBe(TUTORIAL_XOR);
    expect(getPuzzleById('sandbox-event')).toBe(SANDBOX_EVENT);
    expect(getPuzzleById('no-such-puzzle')).toBeUndefined();
  });

  it('filter by the host unlock check', () => {
    const solved = new Set(['tutorial-or']);
    const ids = unlockedPuzzles((p) => p.kind === 'sandbox' || solved.has(p.id)).map((p) => p.id);
    expect(ids).toEqual(['tutorial-or', 'sandbox-behavior', 'sandbox-event', 'sandbox-analog']);
  });

  it('restrict the behavior lab to behavior chips', () => {
    const grid = EditGrid.create(SANDBOX_BEHAVIOR);
    expect(grid.isChipAllowed(simpleChipType('Xor'))).toBe(true);
    expect(grid.isChipAllowed(simpleChipType('Clock'))).toBe(false);
  });
});

describe('truth table tutorials', () => {
  it('record a mismatch for each wrong output and fail at the end', () => {
    const wire = planWirePath([
      { x: -1, y: 1 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
      { x: 2, y: 1 },
      { x: 3, y: 1 },
    ]);
    if (!wire) throw new Error('bad path');
    const grid = new EditGrid(TUTORIAL_XOR, rect(0, 0, 3, 3), [], wire);
    const result = grid.startEval();
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const run = result.value;

    for (let step = 0; step < 4; step++) {
      expect(run.stepTimeStep()).toEqual(CONTINUE);
    }
    expect(run.errors.map((e) => e.message)).toEqual([
      'Expected output 1 for inputs 0 and 1, but output was 0',
      'Expected output 0 for inputs 1 and 1, but output was 1',
    ]);
    expect(run.errors.every((e) => !e.fatal)).toBe(true);
    expect(run.stepTimeStep()).toEqual(FAILURE);
    expect(run.isCompleted).toBe(false);
  });
});

describe('event lab', () => {
  it('publishes the time step on the timer interface', () => {
    // Time port at (-1, 4) routed round to a Display's south input
    const wire = planWirePath([
      { x: -1, y: 4 },
      { x: 0, y: 4 },
      { x: 0, y: 5 },
      { x: 1, y: 5 },
      { x: 1, y: 4 },
    ]);
    if (!wire) throw new Error('bad path');
    const display = { coords: { x: 1, y: 4 }, type: simpleChipType('Display'), orient: IDENTITY_ORIENTATION };
    const grid = new EditGrid(SANDBOX_EVENT, rect(0, 0, 8, 6), [display], wire);
    const result = grid.startEval();
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const run = result.value;

    const shown: number[] = [];
    for (let step = 0; step < 3; step++) {
      expect(run.stepTimeStep()).toEqual(CONTINUE);
      shown.push(run.displayData({ x: 1, y: 4 })?.[0] ?? -1);
    }
    expect(shown).toEqual([0, 1, 2]);
    expect(run.errors).toEqual([]);
    expect(run.secondsPerTimeStep()).toBe(0.1);
  });
});

describe('analog lab', () => {
  it('keeps the sine wave within the host cycle cap', () => {
    const wire = planWirePath([
      { x: -1, y: 5 },
      { x: 0, y: 5 },
    ]);
    if (!wire) throw new Error('bad path');
    const grid = new EditGrid(SANDBOX_ANALOG, rect(0, 0, 8, 6), [], wire);
    const result = grid.startEval({ prefs: { maxCyclesPerTimeStep: 16 } });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const run = result.value;

    expect(run.stepTimeStep()).toEqual(CONTINUE);
    expect(run.errors).toEqual([]);
    expect(run.totalCycles).toBe(16);
    expect(run.stepTimeStep()).toEqual(CONTINUE);
    expect(run.totalCycles).toBe(32);
  });
});
