import type { StateCreator } from 'zustand';
import type { CircuitStore } from '../index.ts';
import type { Result } from '../../shared/result/index.ts';
import { EditGrid } from '../../circuit/edit-grid.ts';
import type { MutationError } from '../../circuit/edit-grid.ts';
import type { GridChange } from '../../circuit/change.ts';
import type { CircuitData } from '../../circuit/circuit-data.ts';
import { editGridFromCircuitData, toCircuitData } from '../../circuit/circuit-data.ts';
import type { PuzzleDefinition } from '../../puzzle/types.ts';

export interface CircuitSlice {
  /** The circuit being edited, or null before a puzzle is loaded */
  grid: EditGrid | null;
  /** Incremented whenever the grid's contents change */
  gridVersion: number;

  /** Start a blank circuit for a puzzle */
  loadPuzzle: (puzzle: PuzzleDefinition) => void;
  /** Restore a saved circuit for a puzzle */
  loadCircuit: (puzzle: PuzzleDefinition, data: CircuitData) => void;
  /** Saved form of the current circuit */
  exportCircuit: () => CircuitData | null;
  /** Apply one change group as a single undo step */
  applyChanges: (changes: readonly GridChange[]) => Result<void, MutationError[]>;
  undo: () => boolean;
  redo: () => boolean;
}

function requireGrid(grid: EditGrid | null): EditGrid {
  if (!grid) throw new Error('No circuit is loaded');
  return grid;
}

export const createCircuitSlice: StateCreator<CircuitStore, [], [], CircuitSlice> = (set, get) => {
  const replaceGrid = (grid: EditGrid) => {
    get().stopSimulation();
    set((state) => ({ grid, gridVersion: state.gridVersion + 1 }));
  };

  const bumpIf = (changed: boolean): boolean => {
    if (changed) set((state) => ({ gridVersion: state.gridVersion + 1 }));
    return changed;
  };

  return {
    grid: null,
    gridVersion: 0,

    loadPuzzle: (puzzle) => replaceGrid(EditGrid.create(puzzle)),

    loadCircuit: (puzzle, data) => replaceGrid(editGridFromCircuitData(puzzle, data)),

    exportCircuit: () => {
      const { grid } = get();
      return grid ? toCircuitData(grid) : null;
    },

    applyChanges: (changes) => {
      const result = requireGrid(get().grid).mutate(changes);
      bumpIf(result.ok);
      return result;
    },

    undo: () => bumpIf(requireGrid(get().grid).undo()),

    redo: () => bumpIf(requireGrid(get().grid).redo()),
  };
};
