/**
 * Chip Framework
 *
 * Single source of truth for chip definitions. A chip is defined once with
 * its footprint, ports, size constraints and evaluator factory; the
 * registry, the constraint solver and the evaluation builder all derive
 * from it.
 */

import type { Coords, CoordsDelta, CoordsSize, Direction, Orientation } from '../../shared/geom/index.ts';
import { addDelta, orientDirection, orientSize, transformInSize } from '../../shared/geom/index.ts';
import type { WireSize } from '../wires/index.ts';
import type { CircuitState } from '../evaluation/circuit-state.ts';
import type { PortLoc } from '../evaluation/types.ts';
import type { ChipKind, ChipType, ChipTypeOf } from './chip-type.ts';

// =============================================================================
// Core Types
// =============================================================================

/** Chip categories for catalog organization */
export type ChipCategory =
  | 'value'
  | 'logic'
  | 'arithmetic'
  | 'comparison'
  | 'event'
  | 'timing'
  | 'memory'
  | 'analog'
  | 'debug';

export type PortFlow = 'source' | 'sink';
export type PortColor = 'behavior' | 'event' | 'analog';

// =============================================================================
// Port Definitions
// =============================================================================

/** A port in the chip's own frame, before orientation */
export interface ChipPortDefinition {
  /** Display name: 'In', 'Ctrl', 'Out' */
  name: string;
  flow: PortFlow;
  color: PortColor;
  /** Cell within the footprint */
  delta: CoordsDelta;
  /** Side of that cell the port faces */
  dir: Direction;
}

/** Size constraint over port indices */
export type PortConstraint =
  | { kind: 'exact'; port: number; size: WireSize }
  | { kind: 'atLeast'; port: number; size: WireSize }
  | { kind: 'atMost'; port: number; size: WireSize }
  | { kind: 'equal'; a: number; b: number }
  /** size(a) is twice size(b) */
  | { kind: 'double'; a: number; b: number };

/** Value on `sink` must be known before `source` is produced */
export interface ChipDependency {
  sink: number;
  source: number;
}

/** Footprint, ports and constraints of one chip type */
export interface ChipData {
  size: CoordsSize;
  ports: readonly ChipPortDefinition[];
  constraints: readonly PortConstraint[];
  dependencies: readonly ChipDependency[];
}

// =============================================================================
// Evaluation
// =============================================================================

/** Slot wiring for one port of a placed chip */
export interface PortSlot {
  slot: number;
  size: WireSize;
  loc: PortLoc;
}

/** Passed to a chip's evaluator factory */
export interface ChipEvalContext {
  /** One entry per port, in port-list order */
  ports: readonly PortSlot[];
  /** Top-left cell of the placed chip */
  coords: Coords;
}

/** Runtime behavior of a placed chip */
export interface ChipEval {
  eval(state: CircuitState): void;
  /** Polled at the end of each cycle */
  needsAnotherCycle?(state: CircuitState): boolean;
  onTimeStep?(): void;
  /** Values shown on the chip face */
  displayData?(state: CircuitState): readonly number[];
  onPress?(sublocation: number, times: number): void;
}

/**
 * An evaluator and the local port it produces. Evaluators producing no
 * port are not scheduled; they exist for display and presses.
 */
export interface ChipEvalBinding {
  port: number | null;
  evaluator: ChipEval;
}

// =============================================================================
// Chip Definition
// =============================================================================

/**
 * Complete definition of a chip kind.
 *
 * Methods rather than function properties, so a definition for one kind
 * can be stored alongside the others in the registry.
 */
export interface ChipDefinition<K extends ChipKind = ChipKind> {
  /** Kind as written in saved circuits: 'And', 'Const', ... */
  kind: K;
  category: ChipCategory;
  description: string;

  data(type: ChipTypeOf<K>): ChipData;
  createEvals(type: ChipTypeOf<K>, ctx: ChipEvalContext): ChipEvalBinding[];
}

// =============================================================================
// Factory Helpers
// =============================================================================

/** Create a chip definition with full type inference */
export function defineChip<K extends ChipKind>(definition: ChipDefinition<K>): ChipDefinition<K> {
  return definition;
}

/** Single 1×1 data block for the common case */
export function chipData(
  ports: readonly ChipPortDefinition[],
  constraints: readonly PortConstraint[],
  dependencies: readonly ChipDependency[],
  size: CoordsSize = { width: 1, height: 1 },
): ChipData {
  return { size, ports, constraints, dependencies };
}

export function port(
  name: string,
  flow: PortFlow,
  color: PortColor,
  dir: Direction,
  delta: CoordsDelta = { x: 0, y: 0 },
): ChipPortDefinition {
  return { name, flow, color, delta, dir };
}

export function deps(...pairs: Array<[number, number]>): ChipDependency[] {
  return pairs.map(([sink, source]) => ({ sink, source }));
}

export const exact = (p: number, size: WireSize): PortConstraint => ({ kind: 'exact', port: p, size });
export const atLeastSize = (p: number, size: WireSize): PortConstraint => ({ kind: 'atLeast', port: p, size });
export const atMostSize = (p: number, size: WireSize): PortConstraint => ({ kind: 'atMost', port: p, size });
export const equal = (a: number, b: number): PortConstraint => ({ kind: 'equal', a, b });
export const double = (a: number, b: number): PortConstraint => ({ kind: 'double', a, b });

/** Pairwise equality among all listed ports */
export function allEqual(...ports: number[]): PortConstraint[] {
  const out: PortConstraint[] = [];
  for (let i = 0; i < ports.length; i++) {
    for (let j = i + 1; j < ports.length; j++) {
      out.push(equal(ports[i], ports[j]));
    }
  }
  return out;
}

// =============================================================================
// Placement
// =============================================================================

/** A chip on the grid: type, top-left cell and orientation */
export interface PlacedChip {
  readonly coords: Coords;
  readonly type: ChipType;
  readonly orient: Orientation;
}

/** A port of a placed chip, in grid coordinates */
export interface PlacedPort {
  index: number;
  name: string;
  flow: PortFlow;
  color: PortColor;
  loc: PortLoc;
}

/** Footprint size once the chip is oriented */
export function placedSize(data: ChipData, orient: Orientation): CoordsSize {
  return orientSize(orient, data.size);
}

/** Ports of a chip placed with its top-left cell at `coords` */
export function placedPorts(data: ChipData, coords: Coords, orient: Orientation): PlacedPort[] {
  return data.ports.map((p, index) => ({
    index,
    name: p.name,
    flow: p.flow,
    color: p.color,
    loc: {
      coords: addDelta(coords, transformInSize(orient, p.delta, data.size)),
      dir: orientDirection(orient, p.dir),
    },
  }));
}
