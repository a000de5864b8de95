/**
 * Circuit simulation core: edit grid, wire-size inference and a
 * cycle-accurate evaluator for grid-based circuit puzzles.
 */

export type { Result } from './shared/result/index.ts';
export { ok, err } from './shared/result/index.ts';
export type { LogLevel, Logger } from './shared/logger/index.ts';
export { createLogger, setLogLevel } from './shared/logger/index.ts';
export { SIMULATION_CONFIG, EDIT_CONFIG } from './shared/constants/index.ts';
export * from './shared/geom/index.ts';
export * from './engine/wires/index.ts';

// Chips
export type { ChipKind, ChipType, SimpleChipKind } from './engine/chips/chip-type.ts';
export {
  SIMPLE_CHIP_KINDS,
  simpleChipType,
  constChipType,
  toggleChipType,
  coerceChipType,
  chipTypesEqual,
  formatChipType,
  parseChipType,
} from './engine/chips/chip-type.ts';
export type { ChipCategory, ChipDefinition, PlacedChip, PortColor, PortFlow } from './engine/chips/framework.ts';
export { chipRegistry, getChipDefinition, chipSizeFor, chipsInCategory } from './engine/chips/registry.ts';

// Build and evaluation
export * from './engine/graph/index.ts';
export { CircuitEval } from './engine/evaluation/circuit-eval.ts';
export type { CircuitEvalOptions } from './engine/evaluation/circuit-eval.ts';
export { CircuitState } from './engine/evaluation/circuit-state.ts';
export type {
  EvalError,
  EvalScore,
  InterfaceSlot,
  PortLoc,
  PuzzleEval,
  PuzzleEvalFactory,
  ScoreReporter,
  SimulationPrefs,
  StepOutcome,
} from './engine/evaluation/types.ts';
export { CONTINUE, FAILURE } from './engine/evaluation/types.ts';

// Editing
export { EditGrid } from './circuit/edit-grid.ts';
export type { MutationError, StartEvalOptions } from './circuit/edit-grid.ts';
export * from './circuit/change.ts';
export { planWirePath, wirePathChange } from './circuit/wire-path.ts';
export type { CircuitData } from './circuit/circuit-data.ts';
export {
  toCircuitData,
  editGridFromCircuitData,
  serializeCircuitData,
  deserializeCircuitData,
} from './circuit/circuit-data.ts';

// Puzzles, store and driver
export * from './puzzle/index.ts';
export { createCircuitStore } from './store/index.ts';
export type { CircuitStore, CircuitSlice, SimulationSlice, StepUnit } from './store/index.ts';
export { TimeAccumulator } from './simulation/time-accumulator.ts';
