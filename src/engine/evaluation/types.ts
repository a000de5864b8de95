import type { Coords, Direction } from '../../shared/geom/index.ts';
import type { CircuitState } from './circuit-state.ts';

// =============================================================================
// Locations
// =============================================================================

/** A chip or interface port: the cell it sits in and the side it faces */
export interface PortLoc {
  readonly coords: Coords;
  readonly dir: Direction;
}

// =============================================================================
// Errors and outcomes
// =============================================================================

/** A problem reported while the circuit runs */
export interface EvalError {
  timeStep: number;
  /** Port to highlight, when the error concerns one */
  port: PortLoc | null;
  /** Fatal errors end the run */
  fatal: boolean;
  message: string;
}

/** How a solved puzzle is scored */
export type EvalScore =
  | { kind: 'cycles' }
  | { kind: 'value'; value: number }
  | { kind: 'wireLength' };

/** Result of one call to a step method */
export type StepOutcome =
  | { kind: 'continue' }
  | { kind: 'breakpoint'; coords: Coords[] }
  | { kind: 'victory'; score: number }
  | { kind: 'failure' };

export const CONTINUE: StepOutcome = { kind: 'continue' };
export const FAILURE: StepOutcome = { kind: 'failure' };

/** Receives the final score of a solved puzzle */
export interface ScoreReporter {
  reportScore(puzzleId: string, score: number): void;
}

/** Tuning the host passes in when starting a run */
export interface SimulationPrefs {
  maxCyclesPerTimeStep: number;
}

// =============================================================================
// Puzzle evaluators
// =============================================================================

/** Where an interface port sits and the slot it reads or writes */
export interface InterfaceSlot {
  loc: PortLoc;
  slot: number;
}

/**
 * The puzzle's side of a run: injects stimulus, checks outputs and
 * decides when the task is done.
 */
export interface PuzzleEval {
  secondsPerTimeStep(): number;
  /** Return a score to end the run */
  beginTimeStep(state: CircuitState): EvalScore | null;
  beginAdditionalCycle?(state: CircuitState): void;
  endCycle?(state: CircuitState): EvalError[];
  needsAnotherCycle?(state: CircuitState): boolean;
  endTimeStep(state: CircuitState): EvalError[];
}

/**
 * Builds a puzzle evaluator from `slots[interface][port]`. A puzzle that
 * asks for extra cycles must stay under `prefs.maxCyclesPerTimeStep`.
 */
export type PuzzleEvalFactory = (slots: InterfaceSlot[][], prefs: SimulationPrefs) => PuzzleEval;
