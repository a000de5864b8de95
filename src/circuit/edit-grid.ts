/**
 * Edit Grid
 *
 * The circuit being edited: bounds, chips and wire fragments for one
 * puzzle, plus undo/redo history. All edits go through change groups,
 * which apply atomically. While a simulation runs the grid is frozen.
 */

import type {
  Coords,
  CoordsRect,
  CoordsSize,
  Direction,
  Orientation,
} from '../shared/geom/index.ts';
import {
  addDelta,
  compareCoords,
  coordsEqual,
  coordsKey,
  DIRECTIONS,
  directionDelta,
  orientationsEqual,
  rectCells,
  rectContains,
  rectContainsRect,
  rectsEqual,
  rectsIntersect,
  rectWithSize,
} from '../shared/geom/index.ts';
import { EDIT_CONFIG, SIMULATION_CONFIG } from '../shared/constants/index.ts';
import type { Result } from '../shared/result/index.ts';
import { ok, err } from '../shared/result/index.ts';
import { createLogger } from '../shared/logger/index.ts';
import type { FragmentLoc, WireMap, WireShape } from '../engine/wires/index.ts';
import {
  fragmentKey,
  locKey,
  neighborLoc,
  parseFragmentKey,
  partnerFragments,
} from '../engine/wires/index.ts';
import type { ChipType } from '../engine/chips/chip-type.ts';
import { chipTypesEqual, formatChipType } from '../engine/chips/chip-type.ts';
import type { PlacedChip } from '../engine/chips/framework.ts';
import { chipSizeFor } from '../engine/chips/registry.ts';
import type { BuildError } from '../engine/graph/types.ts';
import { buildCircuit } from '../engine/graph/eval-builder.ts';
import type { CircuitProgram } from '../engine/graph/eval-builder.ts';
import { CircuitEval } from '../engine/evaluation/circuit-eval.ts';
import type { ScoreReporter, SimulationPrefs } from '../engine/evaluation/types.ts';
import type { PuzzleDefinition, PuzzleInterface } from '../puzzle/types.ts';
import { interfaceSize, interfaceTopLeft, minBoundsSize } from '../puzzle/interface.ts';
import type { GridChange } from './change.ts';
import { invertAndCollapseGroup, invertGroup, collapseChanges } from './change.ts';

const log = createLogger('EditGrid');

// =============================================================================
// Errors
// =============================================================================

export type MutationError =
  | { kind: 'evalRunning'; message: string }
  | { kind: 'chipNotAllowed'; coords: Coords; message: string }
  | { kind: 'chipOutOfBounds'; rect: CoordsRect; message: string }
  | { kind: 'chipOverlaps'; rect: CoordsRect; message: string }
  | { kind: 'chipOverWires'; loc: FragmentLoc; message: string }
  | { kind: 'chipMismatch'; coords: Coords; message: string }
  | { kind: 'replaceWiresOldMismatch'; loc: FragmentLoc; message: string }
  | { kind: 'wireOutOfBounds'; loc: FragmentLoc; message: string }
  | { kind: 'wireUnderChip'; loc: FragmentLoc; message: string }
  | { kind: 'wireOutsideRect'; loc: FragmentLoc; rect: CoordsRect; message: string }
  | { kind: 'wireShapeInconsistent'; fragments: FragmentLoc[]; message: string }
  | { kind: 'boundsMismatch'; bounds: CoordsRect; message: string }
  | { kind: 'boundsTooSmallForInterfaces'; bounds: CoordsRect; minSize: CoordsSize; message: string }
  | { kind: 'boundsTooLarge'; bounds: CoordsRect; message: string }
  | { kind: 'boundsExcludeContent'; bounds: CoordsRect; message: string };

function describeLoc(loc: FragmentLoc): string {
  return `(${loc.coords.x}, ${loc.coords.y}) ${loc.dir}`;
}

function describeRect(r: CoordsRect): string {
  return `${r.width}x${r.height} at (${r.x}, ${r.y})`;
}

export interface StartEvalOptions {
  prefs?: SimulationPrefs;
  scoreReporter?: ScoreReporter;
}

// =============================================================================
// Edit grid
// =============================================================================

export class EditGrid {
  readonly puzzle: PuzzleDefinition;
  private currentBounds: CoordsRect;
  private readonly fragments = new Map<string, WireShape>();
  /** Placed chips keyed by top-left cell */
  private readonly chipsByOrigin = new Map<string, PlacedChip>();
  /** Every covered cell, pointing at its chip's top-left key */
  private readonly chipCells = new Map<string, string>();
  private readonly undoStack: GridChange[][] = [];
  private readonly redoStack: GridChange[][] = [];
  private provisional: GridChange[] = [];
  private currentEval: CircuitEval | null = null;

  /**
   * Contents are taken as given; use `editGridFromCircuitData` to load
   * saved circuits with repair.
   */
  constructor(
    puzzle: PuzzleDefinition,
    bounds: CoordsRect,
    chips: readonly PlacedChip[] = [],
    wires: WireMap = new Map(),
  ) {
    this.puzzle = puzzle;
    this.currentBounds = bounds;
    for (const chip of chips) this.insertChip(chip);
    for (const [key, shape] of wires) this.fragments.set(key, shape);
  }

  /** A blank board of the puzzle's starting size at the origin */
  static create(puzzle: PuzzleDefinition): EditGrid {
    return new EditGrid(puzzle, rectWithSize({ x: 0, y: 0 }, puzzle.initialBoundsSize));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get bounds(): CoordsRect {
    return this.currentBounds;
  }

  get interfaces(): readonly PuzzleInterface[] {
    return this.puzzle.interfaces;
  }

  get wires(): WireMap {
    return this.fragments;
  }

  get eval(): CircuitEval | null {
    return this.currentEval;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0 || this.provisional.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** Groups waiting to be redone; the last one is redone first */
  get redoGroups(): readonly (readonly GridChange[])[] {
    return this.redoStack;
  }

  /** Chips in row-major order of their top-left cells */
  chips(): PlacedChip[] {
    return [...this.chipsByOrigin.values()].sort((a, b) => compareCoords(a.coords, b.coords));
  }

  /** The chip covering `coords`, if any */
  chipAt(coords: Coords): PlacedChip | null {
    const origin = this.chipCells.get(coordsKey(coords));
    if (origin === undefined) return null;
    return this.chipsByOrigin.get(origin) ?? null;
  }

  wireShapeAt(coords: Coords, dir: Direction): WireShape | null {
    return this.fragments.get(fragmentKey(coords, dir)) ?? null;
  }

  /** Index of the interface whose strip covers `coords` */
  interfaceAt(coords: Coords): number | null {
    const index = this.puzzle.interfaces.findIndex((iface) =>
      rectContains(
        rectWithSize(interfaceTopLeft(iface, this.currentBounds), interfaceSize(iface)),
        coords,
      ),
    );
    return index < 0 ? null : index;
  }

  isChipAllowed(type: ChipType): boolean {
    const allowed = this.puzzle.allowedChips;
    return allowed === undefined || allowed.includes(type.kind);
  }

  minBoundsSize(): CoordsSize {
    return minBoundsSize(this.puzzle.interfaces);
  }

  canHaveBounds(bounds: CoordsRect): boolean {
    return this.boundsErrors(bounds).length === 0;
  }

  /** Free of chips and inside the bounds */
  canPlaceChip(rect: CoordsRect): boolean {
    if (!rectContainsRect(this.currentBounds, rect)) return false;
    return rectCells(rect).every((cell) => !this.chipCells.has(coordsKey(cell)));
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Apply a change group atomically. On success the undo group is pushed
   * and the redo stack cleared; on failure nothing changes.
   */
  mutate(changes: readonly GridChange[]): Result<void, MutationError[]> {
    if (this.currentEval) return err([evalRunning()]);
    this.commitProvisionalChanges();
    const result = this.applyGroup(changes);
    if (!result.ok) return result;
    this.redoStack.length = 0;
    const undo = invertAndCollapseGroup(changes);
    if (undo.length > 0) this.undoStack.push(undo);
    return ok(undefined);
  }

  /**
   * Apply changes that may still be rolled back as a whole (a drag in
   * progress). They join the undo history on commit.
   */
  mutateProvisionally(changes: readonly GridChange[]): Result<void, MutationError[]> {
    if (this.currentEval) return err([evalRunning()]);
    const result = this.applyGroup(changes);
    if (!result.ok) return result;
    this.redoStack.length = 0;
    this.provisional.push(...changes);
    return ok(undefined);
  }

  get hasProvisionalChanges(): boolean {
    return this.provisional.length > 0;
  }

  commitProvisionalChanges(): void {
    if (this.provisional.length === 0) return;
    const undo = invertAndCollapseGroup(this.provisional);
    this.provisional = [];
    if (undo.length > 0) this.undoStack.push(undo);
  }

  rollBackProvisionalChanges(): boolean {
    if (this.currentEval || this.provisional.length === 0) return false;
    this.applyUnchecked(invertGroup(this.provisional), 'roll back');
    this.provisional = [];
    return true;
  }

  /** Returns true when the grid changed */
  undo(): boolean {
    if (this.currentEval) return false;
    let changed = this.rollBackProvisionalChanges();
    const group = this.undoStack.pop();
    if (group) {
      this.applyUnchecked(group, 'undo');
      this.redoStack.push(invertGroup(group));
      changed = true;
    }
    return changed;
  }

  /** Returns true when the grid changed */
  redo(): boolean {
    if (this.currentEval) return false;
    const group = this.redoStack.pop();
    if (!group) return false;
    this.applyUnchecked(group, 'redo');
    this.undoStack.push(invertGroup(group));
    return true;
  }

  /** Fuse the two most recent undo groups into one */
  mergeLastGroups(): boolean {
    if (this.undoStack.length < 2) return false;
    const latest = this.undoStack.pop();
    const earlier = this.undoStack.pop();
    if (!latest || !earlier) return false;
    const merged = collapseChanges([...latest, ...earlier]);
    if (merged.length > 0) this.undoStack.push(merged);
    return true;
  }

  private applyGroup(changes: readonly GridChange[]): Result<void, MutationError[]> {
    const applied: GridChange[] = [];
    for (const change of changes) {
      const errors = this.mutateOne(change);
      if (errors.length > 0) {
        this.applyUnchecked(invertGroup(applied), 'roll back');
        return err(errors);
      }
      applied.push(change);
    }
    return ok(undefined);
  }

  private applyUnchecked(changes: readonly GridChange[], action: string): void {
    for (const change of changes) {
      const errors = this.mutateOne(change);
      if (errors.length > 0) {
        log.warn(`Failed to ${action} change`, { change: change.kind, errors: errors.map((e) => e.message) });
      }
    }
  }

  private mutateOne(change: GridChange): MutationError[] {
    switch (change.kind) {
      case 'replaceWires':
        return this.replaceWires(change.oldWires, change.newWires, null);
      case 'massRemoveWires':
        return this.replaceWires(change.wires, new Map(), change.rect);
      case 'massAddWires':
        return this.replaceWires(new Map(), change.wires, change.rect);
      case 'addStubWire': {
        const pair = stubPair(change.coords, change.dir);
        return this.replaceWires(new Map(), pair, null);
      }
      case 'removeStubWire': {
        const pair = stubPair(change.coords, change.dir);
        return this.replaceWires(pair, new Map(), null);
      }
      case 'addChip':
        return this.addChip(change.coords, change.type, change.orient);
      case 'removeChip':
        return this.removeChip(change.coords, change.type, change.orient);
      case 'setBounds':
        return this.setBounds(change.oldBounds, change.newBounds);
    }
  }

  // ===========================================================================
  // Wires
  // ===========================================================================

  private replaceWires(oldWires: WireMap, newWires: WireMap, within: CoordsRect | null): MutationError[] {
    const errors: MutationError[] = [];

    for (const [key, shape] of oldWires) {
      const loc = parseFragmentKey(key);
      if (this.fragments.get(key) !== shape) {
        errors.push({
          kind: 'replaceWiresOldMismatch',
          loc,
          message: `Expected ${shape} wire at ${describeLoc(loc)}`,
        });
      }
      if (within && !inRectOrAdjacentStub(within, loc, shape)) {
        errors.push(outsideRect(loc, within));
      }
    }

    for (const [key, shape] of newWires) {
      const loc = parseFragmentKey(key);
      if (this.fragments.has(key) && !oldWires.has(key)) {
        errors.push({
          kind: 'replaceWiresOldMismatch',
          loc,
          message: `Wire at ${describeLoc(loc)} is already present`,
        });
      }
      if (!inRectOrAdjacentStub(this.currentBounds, loc, shape)) {
        errors.push({
          kind: 'wireOutOfBounds',
          loc,
          message: `Wire at ${describeLoc(loc)} is outside the board`,
        });
      }
      const chip = this.chipAt(loc.coords);
      if (chip && (shape !== 'stub' || rectContains(this.chipRect(chip), addDelta(loc.coords, directionDelta(loc.dir))))) {
        errors.push({
          kind: 'wireUnderChip',
          loc,
          message: `Wire at ${describeLoc(loc)} runs under a chip`,
        });
      }
      if (within && !inRectOrAdjacentStub(within, loc, shape)) {
        errors.push(outsideRect(loc, within));
      }
    }
    if (errors.length > 0) return errors;

    for (const key of oldWires.keys()) this.fragments.delete(key);
    for (const [key, shape] of newWires) this.fragments.set(key, shape);

    const touched = new Map<string, Coords>();
    for (const key of [...oldWires.keys(), ...newWires.keys()]) {
      const loc = parseFragmentKey(key);
      touched.set(coordsKey(loc.coords), loc.coords);
      const across = neighborLoc(loc).coords;
      touched.set(coordsKey(across), across);
    }
    const inconsistent = this.inconsistentFragmentsIn([...touched.values()]);
    if (inconsistent.length > 0) {
      for (const key of newWires.keys()) this.fragments.delete(key);
      for (const [key, shape] of oldWires) this.fragments.set(key, shape);
      return [
        {
          kind: 'wireShapeInconsistent',
          fragments: inconsistent,
          message: `Wire shapes do not fit together at ${inconsistent.map(describeLoc).join(', ')}`,
        },
      ];
    }
    return [];
  }

  private inconsistentFragmentsIn(cells: readonly Coords[]): FragmentLoc[] {
    const bad: FragmentLoc[] = [];
    for (const cell of [...cells].sort(compareCoords)) {
      for (const dir of DIRECTIONS) {
        const shape = this.wireShapeAt(cell, dir);
        if (shape === null) continue;
        const loc = { coords: cell, dir };
        const partnersOk = partnerFragments(shape, dir).every(
          (p) => this.wireShapeAt(cell, p.dir) === p.shape,
        );
        if (!this.fragments.has(locKey(neighborLoc(loc))) || !partnersOk) bad.push(loc);
      }
    }
    return bad;
  }

  // ===========================================================================
  // Chips
  // ===========================================================================

  private chipRect(chip: PlacedChip): CoordsRect {
    return rectWithSize(chip.coords, chipSizeFor(chip.type, chip.orient));
  }

  private insertChip(chip: PlacedChip): void {
    const origin = coordsKey(chip.coords);
    this.chipsByOrigin.set(origin, chip);
    for (const cell of rectCells(this.chipRect(chip))) {
      this.chipCells.set(coordsKey(cell), origin);
    }
  }

  private addChip(coords: Coords, type: ChipType, orient: Orientation): MutationError[] {
    const chip: PlacedChip = { coords, type, orient };
    const r = this.chipRect(chip);
    const name = formatChipType(type);
    if (!this.isChipAllowed(type)) {
      return [{ kind: 'chipNotAllowed', coords, message: `${name} chips are not allowed in this puzzle` }];
    }
    if (!rectContainsRect(this.currentBounds, r)) {
      return [{ kind: 'chipOutOfBounds', rect: r, message: `${name} chip does not fit on the board` }];
    }
    const overlapping = this.chips().find((other) => rectsIntersect(this.chipRect(other), r));
    if (overlapping) {
      return [
        {
          kind: 'chipOverlaps',
          rect: r,
          message: `${name} chip overlaps the ${formatChipType(overlapping.type)} chip at (${overlapping.coords.x}, ${overlapping.coords.y})`,
        },
      ];
    }
    const errors: MutationError[] = [];
    for (const cell of rectCells(r)) {
      for (const dir of DIRECTIONS) {
        const shape = this.wireShapeAt(cell, dir);
        if (shape === null) continue;
        if (shape !== 'stub' || rectContains(r, addDelta(cell, directionDelta(dir)))) {
          const loc = { coords: cell, dir };
          errors.push({ kind: 'chipOverWires', loc, message: `Wire at ${describeLoc(loc)} is in the way` });
        }
      }
    }
    if (errors.length > 0) return errors;
    this.insertChip(chip);
    return [];
  }

  private removeChip(coords: Coords, type: ChipType, orient: Orientation): MutationError[] {
    const chip = this.chipsByOrigin.get(coordsKey(coords));
    if (!chip || !coordsEqual(chip.coords, coords) || !chipTypesEqual(chip.type, type) || !orientationsEqual(chip.orient, orient)) {
      return [
        {
          kind: 'chipMismatch',
          coords,
          message: `No ${formatChipType(type)} chip at (${coords.x}, ${coords.y}) with that orientation`,
        },
      ];
    }
    this.chipsByOrigin.delete(coordsKey(coords));
    for (const cell of rectCells(this.chipRect(chip))) {
      this.chipCells.delete(coordsKey(cell));
    }
    return [];
  }

  // ===========================================================================
  // Bounds
  // ===========================================================================

  private boundsErrors(bounds: CoordsRect): MutationError[] {
    const minSize = this.minBoundsSize();
    if (bounds.width < minSize.width || bounds.height < minSize.height) {
      return [
        {
          kind: 'boundsTooSmallForInterfaces',
          bounds,
          minSize,
          message: `Board must be at least ${minSize.width}x${minSize.height}`,
        },
      ];
    }
    if (bounds.width > EDIT_CONFIG.MAX_BOUNDS_SIZE || bounds.height > EDIT_CONFIG.MAX_BOUNDS_SIZE) {
      return [
        {
          kind: 'boundsTooLarge',
          bounds,
          message: `Board cannot exceed ${EDIT_CONFIG.MAX_BOUNDS_SIZE} cells on a side`,
        },
      ];
    }
    const chipsInside = this.chips().every((chip) => rectContainsRect(bounds, this.chipRect(chip)));
    const wiresInside = [...this.fragments].every(([key, shape]) =>
      inRectOrAdjacentStub(bounds, parseFragmentKey(key), shape),
    );
    if (!chipsInside || !wiresInside) {
      return [
        {
          kind: 'boundsExcludeContent',
          bounds,
          message: `Board ${describeRect(bounds)} would leave chips or wires outside`,
        },
      ];
    }
    return [];
  }

  private setBounds(oldBounds: CoordsRect, newBounds: CoordsRect): MutationError[] {
    if (!rectsEqual(oldBounds, this.currentBounds)) {
      return [
        {
          kind: 'boundsMismatch',
          bounds: oldBounds,
          message: `Board is ${describeRect(this.currentBounds)}, not ${describeRect(oldBounds)}`,
        },
      ];
    }
    const errors = this.boundsErrors(newBounds);
    if (errors.length > 0) return errors;
    this.currentBounds = newBounds;
    return [];
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  private build(): Result<CircuitProgram, BuildError[]> {
    return buildCircuit({
      bounds: this.currentBounds,
      chips: this.chips(),
      wires: this.fragments,
      interfaces: this.puzzle.interfaces,
    });
  }

  /** Build errors and warnings for the current board */
  diagnose(): BuildError[] {
    const result = this.build();
    return result.ok ? result.value.warnings : result.error;
  }

  /**
   * Build the circuit and start a run; the grid is frozen until stopEval.
   * While a run is active this returns it unchanged, so new options only
   * apply after `stopEval`.
   */
  startEval(options: StartEvalOptions = {}): Result<CircuitEval, BuildError[]> {
    if (this.currentEval) return ok(this.currentEval);
    this.commitProvisionalChanges();
    const result = this.build();
    if (!result.ok) {
      log.info('Circuit has errors', { puzzle: this.puzzle.id, errors: result.error.length });
      return result;
    }
    const program = result.value;
    const prefs = options.prefs ?? { maxCyclesPerTimeStep: SIMULATION_CONFIG.MAX_CYCLES_PER_TIME_STEP };
    this.currentEval = new CircuitEval({
      program,
      puzzle: this.puzzle.createEval(program.interfaceSlots, prefs),
      prefs,
      puzzleId: this.puzzle.id,
      scoreReporter: options.scoreReporter,
    });
    log.debug('Started evaluation', { puzzle: this.puzzle.id, groups: program.groups.length });
    return ok(this.currentEval);
  }

  stopEval(): void {
    this.currentEval = null;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function evalRunning(): MutationError {
  return { kind: 'evalRunning', message: 'Cannot edit the circuit while it is running' };
}

function outsideRect(loc: FragmentLoc, rect: CoordsRect): MutationError {
  return {
    kind: 'wireOutsideRect',
    loc,
    rect,
    message: `Wire at ${describeLoc(loc)} is outside ${describeRect(rect)}`,
  };
}

/** In the rect, or a stub poking out from a cell inside it */
function inRectOrAdjacentStub(r: CoordsRect, loc: FragmentLoc, shape: WireShape): boolean {
  if (rectContains(r, loc.coords)) return true;
  return shape === 'stub' && rectContains(r, addDelta(loc.coords, directionDelta(loc.dir)));
}

function stubPair(coords: Coords, dir: Direction): Map<string, WireShape> {
  const across = neighborLoc({ coords, dir });
  return new Map<string, WireShape>([
    [fragmentKey(coords, dir), 'stub'],
    [locKey(across), 'stub'],
  ]);
}
