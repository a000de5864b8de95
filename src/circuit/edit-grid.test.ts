import { describe, it, expect } from 'vitest';
import { IDENTITY_ORIENTATION, rect } from '../shared/geom/index.ts';
import type { Coords } from '../shared/geom/index.ts';
import type { WireShape } from '../engine/wires/index.ts';
import { fragmentKey } from '../engine/wires/index.ts';
import { simpleChipType } from '../engine/chips/chip-type.ts';
import { blankPuzzle } from '../puzzle/testing.ts';
import { SANDBOX_EVENT } from '../puzzle/levels/sandbox-levels.ts';
import {
  addChipChange,
  addStubWireChange,
  collapseChanges,
  massAddWiresChange,
  removeChipChange,
  replaceWiresChange,
  setBoundsChange,
} from './change.ts';
import type { GridChange } from './change.ts';
import { EditGrid } from './edit-grid.ts';
import { wirePathChange } from './wire-path.ts';

const NOT = simpleChipType('Not');
const COUNTER = simpleChipType('Counter');
const ID = IDENTITY_ORIENTATION;

function path(...cells: Coords[]): GridChange {
  const change = wirePathChange(cells);
  if (!change) throw new Error('bad path');
  return change;
}

function snapshot(grid: EditGrid) {
  return {
    bounds: grid.bounds,
    chips: grid.chips(),
    wires: [...grid.wires.entries()].sort(),
  };
}

function newWires(change: GridChange): Map<string, WireShape> {
  if (change.kind !== 'replaceWires') throw new Error('expected a wire change');
  return new Map(change.newWires);
}

function errorKinds(result: ReturnType<EditGrid['mutate']>): string[] {
  return result.ok ? [] : result.error.map((e) => e.kind);
}

describe('EditGrid chips', () => {
  it('starts blank at the puzzle size', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(grid.bounds).toEqual(rect(0, 0, 6, 4));
    expect(grid.chips()).toEqual([]);
    expect(grid.wires.size).toBe(0);
    expect(grid.canUndo).toBe(false);
  });

  it('finds a chip from any cell it covers', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(grid.mutate([addChipChange({ x: 1, y: 1 }, COUNTER, ID)]).ok).toBe(true);
    expect(grid.chipAt({ x: 2, y: 1 })?.coords).toEqual({ x: 1, y: 1 });
    expect(grid.chipAt({ x: 3, y: 1 })).toBeNull();
    expect(grid.canPlaceChip(rect(2, 1, 1, 1))).toBe(false);
    expect(grid.canPlaceChip(rect(3, 1, 1, 1))).toBe(true);
  });

  it('rejects overlapping chips', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 1, y: 1 }, COUNTER, ID)]);
    const result = grid.mutate([addChipChange({ x: 2, y: 1 }, NOT, ID)]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0].kind).toBe('chipOverlaps');
      expect(result.error[0].message).toBe('Not chip overlaps the Counter chip at (1, 1)');
    }
  });

  it('rejects chips that stick out of the board', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(errorKinds(grid.mutate([addChipChange({ x: 5, y: 0 }, COUNTER, ID)]))).toEqual([
      'chipOutOfBounds',
    ]);
  });

  it('rejects chips the puzzle does not allow', () => {
    const grid = EditGrid.create(blankPuzzle({ allowedChips: ['And'] }));
    expect(grid.isChipAllowed(simpleChipType('And'))).toBe(true);
    expect(errorKinds(grid.mutate([addChipChange({ x: 0, y: 0 }, NOT, ID)]))).toEqual([
      'chipNotAllowed',
    ]);
  });

  it('rejects removing a chip that is not there', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(errorKinds(grid.mutate([removeChipChange({ x: 0, y: 0 }, NOT, ID)]))).toEqual([
      'chipMismatch',
    ]);
  });

  it('applies a group atomically', () => {
    const grid = EditGrid.create(blankPuzzle());
    const result = grid.mutate([
      addChipChange({ x: 0, y: 0 }, NOT, ID),
      addChipChange({ x: 0, y: 0 }, NOT, ID),
    ]);
    expect(errorKinds(result)).toEqual(['chipOverlaps']);
    expect(grid.chipAt({ x: 0, y: 0 })).toBeNull();
    expect(grid.canUndo).toBe(false);
  });
});

describe('EditGrid wires', () => {
  it('draws a wire along a path', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(grid.mutate([path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 })]).ok).toBe(true);
    expect(grid.wires.size).toBe(4);
    expect(grid.wireShapeAt({ x: 0, y: 0 }, 'east')).toBe('stub');
    expect(grid.wireShapeAt({ x: 1, y: 0 }, 'west')).toBe('straight');
    expect(grid.wireShapeAt({ x: 2, y: 0 }, 'west')).toBe('stub');
  });

  it('rejects a fragment with nothing across the edge', () => {
    const grid = EditGrid.create(blankPuzzle());
    const lone = new Map([[fragmentKey({ x: 0, y: 0 }, 'east'), 'stub' as const]]);
    const result = grid.mutate([replaceWiresChange(new Map(), lone)]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual([
        {
          kind: 'wireShapeInconsistent',
          fragments: [{ coords: { x: 0, y: 0 }, dir: 'east' }],
          message: 'Wire shapes do not fit together at (0, 0) east',
        },
      ]);
    }
    expect(grid.wires.size).toBe(0);
  });

  it('rejects removing wires that are not there', () => {
    const grid = EditGrid.create(blankPuzzle());
    const old = new Map([[fragmentKey({ x: 0, y: 0 }, 'east'), 'straight' as const]]);
    expect(errorKinds(grid.mutate([replaceWiresChange(old, new Map())]))).toEqual([
      'replaceWiresOldMismatch',
    ]);
  });

  it('keeps wires out from under chips', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 1, y: 0 }, NOT, ID)]);
    expect(errorKinds(grid.mutate([path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 })]))).toEqual([
      'wireUnderChip',
      'wireUnderChip',
    ]);
  });

  it('lets a stub poke out of a chip toward its port', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 1, y: 0 }, NOT, ID)]);
    expect(grid.mutate([path({ x: 1, y: 0 }, { x: 2, y: 0 })]).ok).toBe(true);
    expect(grid.wireShapeAt({ x: 1, y: 0 }, 'east')).toBe('stub');
  });

  it('keeps chips off existing wires', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 })]);
    expect(errorKinds(grid.mutate([addChipChange({ x: 1, y: 0 }, NOT, ID)]))).toEqual([
      'chipOverWires',
      'chipOverWires',
    ]);
  });

  it('rejects wires off the board', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(errorKinds(grid.mutate([path({ x: 5, y: 3 }, { x: 5, y: 4 }, { x: 5, y: 5 })]))).toEqual([
      'wireOutOfBounds',
      'wireOutOfBounds',
      'wireOutOfBounds',
    ]);
  });

  it('connects a stub to an interface port outside the board', () => {
    const grid = EditGrid.create(SANDBOX_EVENT);
    expect(grid.interfaceAt({ x: -1, y: 4 })).toBe(1);
    expect(grid.interfaceAt({ x: 0, y: -1 })).toBe(0);
    expect(grid.interfaceAt({ x: 0, y: 0 })).toBeNull();
    expect(grid.mutate([addStubWireChange({ x: -1, y: 4 }, 'east')]).ok).toBe(true);
    expect(grid.wireShapeAt({ x: 0, y: 4 }, 'west')).toBe('stub');
  });
});

describe('EditGrid history', () => {
  it('undoes and redoes groups in order', () => {
    const grid = EditGrid.create(blankPuzzle());
    const s0 = snapshot(grid);
    grid.mutate([path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 })]);
    const s1 = snapshot(grid);
    grid.mutate([addChipChange({ x: 0, y: 2 }, COUNTER, ID)]);
    const s2 = snapshot(grid);

    expect(grid.undo()).toBe(true);
    expect(snapshot(grid)).toEqual(s1);
    expect(grid.undo()).toBe(true);
    expect(snapshot(grid)).toEqual(s0);
    expect(grid.undo()).toBe(false);

    expect(grid.redo()).toBe(true);
    expect(snapshot(grid)).toEqual(s1);
    expect(grid.redo()).toBe(true);
    expect(snapshot(grid)).toEqual(s2);
    expect(grid.redo()).toBe(false);
  });

  it('undoes a mixed group as one step', () => {
    const grid = EditGrid.create(blankPuzzle());
    const before = snapshot(grid);
    const result = grid.mutate([
      addChipChange({ x: 0, y: 0 }, NOT, ID),
      path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }),
      addChipChange({ x: 2, y: 0 }, NOT, ID),
    ]);
    expect(result.ok).toBe(true);
    const after = snapshot(grid);
    expect(after.chips).toHaveLength(2);
    expect(after.wires).toHaveLength(4);

    expect(grid.undo()).toBe(true);
    expect(snapshot(grid)).toEqual(before);
    expect(grid.canUndo).toBe(false);
    expect(grid.redo()).toBe(true);
    expect(snapshot(grid)).toEqual(after);
  });

  it('clears redo on a new edit', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    grid.undo();
    expect(grid.canRedo).toBe(true);
    grid.mutate([addChipChange({ x: 3, y: 0 }, NOT, ID)]);
    expect(grid.canRedo).toBe(false);
  });

  it('pushes nothing for a group that cancels out', () => {
    const grid = EditGrid.create(blankPuzzle());
    const result = grid.mutate([
      addChipChange({ x: 0, y: 0 }, NOT, ID),
      removeChipChange({ x: 0, y: 0 }, NOT, ID),
    ]);
    expect(result.ok).toBe(true);
    expect(grid.canUndo).toBe(false);
  });

  it('merges the last two groups into one undo step', () => {
    const grid = EditGrid.create(blankPuzzle());
    const s0 = snapshot(grid);
    grid.mutate([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    grid.mutate([addChipChange({ x: 2, y: 0 }, NOT, ID)]);
    expect(grid.mergeLastGroups()).toBe(true);
    expect(grid.undo()).toBe(true);
    expect(snapshot(grid)).toEqual(s0);
    expect(grid.canUndo).toBe(false);
  });

  it('rolls back provisional changes', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutateProvisionally([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    grid.mutateProvisionally([addChipChange({ x: 1, y: 0 }, NOT, ID)]);
    expect(grid.hasProvisionalChanges).toBe(true);
    expect(grid.rollBackProvisionalChanges()).toBe(true);
    expect(grid.chips()).toEqual([]);
    expect(grid.canUndo).toBe(false);
  });

  it('commits provisional changes as one undo group', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutateProvisionally([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    grid.mutateProvisionally([addChipChange({ x: 1, y: 0 }, NOT, ID)]);
    grid.commitProvisionalChanges();
    expect(grid.hasProvisionalChanges).toBe(false);
    expect(grid.undo()).toBe(true);
    expect(grid.chips()).toEqual([]);
    expect(grid.canUndo).toBe(false);
  });

  it('keeps the redo groups in reverse order of undoing', () => {
    const grid = EditGrid.create(blankPuzzle());
    const groups: GridChange[][] = [
      [addChipChange({ x: 0, y: 0 }, NOT, ID)],
      [path({ x: 1, y: 2 }, { x: 2, y: 2 }, { x: 2, y: 3 })],
      [setBoundsChange(rect(0, 0, 6, 4), rect(0, 0, 7, 5)), addChipChange({ x: 5, y: 0 }, COUNTER, ID)],
    ];
    for (const group of groups) expect(grid.mutate(group).ok).toBe(true);

    for (let i = 0; i < groups.length; i++) grid.undo();
    expect(grid.redoGroups).toEqual([...groups].reverse().map(collapseChanges));

    grid.redo();
    expect(grid.redoGroups).toEqual([groups[2], groups[1]].map(collapseChanges));
  });

  it('undoes a mass add with the wires it was given', () => {
    const grid = EditGrid.create(blankPuzzle());
    const added = new Map<string, WireShape>([
      [fragmentKey({ x: 0, y: 0 }, 'east'), 'stub'],
      [fragmentKey({ x: 1, y: 0 }, 'west'), 'stub'],
    ]);
    expect(grid.mutate([massAddWiresChange(rect(0, 0, 6, 4), added)]).ok).toBe(true);
    added.clear();

    expect(grid.undo()).toBe(true);
    expect(grid.wires.size).toBe(0);
  });

  it('undo also drops uncommitted provisional changes', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    grid.mutateProvisionally([addChipChange({ x: 1, y: 0 }, NOT, ID)]);
    expect(grid.undo()).toBe(true);
    expect(grid.chips()).toEqual([]);
  });
});

describe('EditGrid bounds', () => {
  it('resizes the board', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(grid.mutate([setBoundsChange(rect(0, 0, 6, 4), rect(-1, 0, 7, 4))]).ok).toBe(true);
    expect(grid.bounds).toEqual(rect(-1, 0, 7, 4));
  });

  it('rejects a stale old bounds', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(errorKinds(grid.mutate([setBoundsChange(rect(0, 0, 5, 5), rect(0, 0, 6, 6))]))).toEqual([
      'boundsMismatch',
    ]);
  });

  it('keeps room for the interfaces', () => {
    const grid = EditGrid.create(SANDBOX_EVENT);
    expect(grid.minBoundsSize()).toEqual({ width: 1, height: 2 });
    const result = grid.mutate([setBoundsChange(rect(0, 0, 8, 6), rect(0, 0, 8, 1))]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0]).toMatchObject({
        kind: 'boundsTooSmallForInterfaces',
        minSize: { width: 1, height: 2 },
      });
    }
  });

  it('caps the board size', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(errorKinds(grid.mutate([setBoundsChange(rect(0, 0, 6, 4), rect(0, 0, 65, 4))]))).toEqual([
      'boundsTooLarge',
    ]);
  });

  it('will not cut off chips', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 5, y: 3 }, NOT, ID)]);
    expect(grid.canHaveBounds(rect(0, 0, 5, 4))).toBe(false);
    expect(errorKinds(grid.mutate([setBoundsChange(rect(0, 0, 6, 4), rect(0, 0, 5, 4))]))).toEqual([
      'boundsExcludeContent',
    ]);
  });

  it('allows a stub just outside the board', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([path({ x: 0, y: 0 }, { x: 1, y: 0 })]);
    expect(grid.canHaveBounds(rect(1, 0, 5, 4))).toBe(true);
    expect(grid.canHaveBounds(rect(2, 0, 4, 4))).toBe(false);
  });
});

describe('EditGrid evaluation', () => {
  it('freezes the grid while running', () => {
    const grid = EditGrid.create(blankPuzzle());
    grid.mutate([addChipChange({ x: 0, y: 0 }, NOT, ID)]);
    const started = grid.startEval();
    expect(started.ok).toBe(true);
    expect(grid.eval).not.toBeNull();

    expect(errorKinds(grid.mutate([addChipChange({ x: 2, y: 0 }, NOT, ID)]))).toEqual(['evalRunning']);
    expect(grid.undo()).toBe(false);

    grid.stopEval();
    expect(grid.eval).toBeNull();
    expect(grid.mutate([addChipChange({ x: 2, y: 0 }, NOT, ID)]).ok).toBe(true);
  });

  it('returns the running evaluation when started twice', () => {
    const grid = EditGrid.create(blankPuzzle());
    const first = grid.startEval();
    const second = grid.startEval({ prefs: { maxCyclesPerTimeStep: 2 } });
    expect(first.ok && second.ok && first.value === second.value).toBe(true);

    grid.stopEval();
    const third = grid.startEval({ prefs: { maxCyclesPerTimeStep: 2 } });
    expect(first.ok && third.ok && first.value !== third.value).toBe(true);
  });

  it('diagnoses the board without starting a run', () => {
    const grid = EditGrid.create(blankPuzzle());
    expect(grid.diagnose()).toEqual([]);

    grid.mutate([
      addChipChange({ x: 0, y: 0 }, simpleChipType('Button'), ID),
      addChipChange({ x: 1, y: 0 }, NOT, ID),
      path({ x: 0, y: 0 }, { x: 1, y: 0 }),
    ]);
    expect(grid.diagnose().map((e) => e.kind)).toContain('PortColorMismatch');
    expect(grid.eval).toBeNull();
  });
});

describe('EditGrid collapsed groups', () => {
  const straight = newWires(path({ x: 0, y: 0 }, { x: 1, y: 0 }));
  const longer = newWires(path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }));
  const bent = newWires(path({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }));
  const none = new Map<string, WireShape>();

  const cases: Array<{ name: string; initial: Map<string, WireShape>; first: GridChange[]; second: GridChange[] }> = [
    {
      name: 'a rewire and its reverse',
      initial: straight,
      first: [replaceWiresChange(straight, longer)],
      second: [replaceWiresChange(longer, straight)],
    },
    {
      name: 'a removal and a re-add',
      initial: longer,
      first: [replaceWiresChange(longer, none)],
      second: [replaceWiresChange(none, longer)],
    },
    {
      name: 'two rewires in a row',
      initial: straight,
      first: [replaceWiresChange(straight, longer)],
      second: [replaceWiresChange(longer, bent)],
    },
    {
      name: 'chips and bounds',
      initial: none,
      first: [addChipChange({ x: 4, y: 2 }, NOT, ID)],
      second: [removeChipChange({ x: 4, y: 2 }, NOT, ID), setBoundsChange(rect(0, 0, 6, 4), rect(0, 0, 7, 5))],
    },
  ];

  for (const { name, initial, first, second } of cases) {
    it(`match applying the groups one by one: ${name}`, () => {
      const stepwise = new EditGrid(blankPuzzle(), rect(0, 0, 6, 4), [], initial);
      const start = snapshot(stepwise);
      expect(stepwise.mutate(first).ok).toBe(true);
      expect(stepwise.mutate(second).ok).toBe(true);

      const collapsed = new EditGrid(blankPuzzle(), rect(0, 0, 6, 4), [], initial);
      expect(collapsed.mutate(collapseChanges([...first, ...second])).ok).toBe(true);
      expect(snapshot(collapsed)).toEqual(snapshot(stepwise));

      collapsed.undo();
      expect(snapshot(collapsed)).toEqual(start);
    });
  }
});
