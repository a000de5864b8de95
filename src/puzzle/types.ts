import type { CoordsSize, Direction } from '../shared/geom/index.ts';
import type { WireSize } from '../engine/wires/index.ts';
import type { PortColor, PortFlow } from '../engine/chips/framework.ts';
import type { ChipKind } from '../engine/chips/chip-type.ts';
import type { PuzzleEvalFactory } from '../engine/evaluation/types.ts';

// =============================================================================
// Interfaces
// =============================================================================

/** Where along its side of the board an interface sits */
export type InterfacePosition =
  | { kind: 'left'; offset: number }
  | { kind: 'center' }
  | { kind: 'right'; offset: number };

/** One port of a puzzle interface. A source port drives its wire. */
export interface InterfacePort {
  name: string;
  description: string;
  flow: PortFlow;
  color: PortColor;
  size: WireSize;
}

/** A group of puzzle ports attached to one side of the board */
export interface PuzzleInterface {
  name: string;
  description: string;
  side: Direction;
  position: InterfacePosition;
  ports: readonly InterfacePort[];
}

// =============================================================================
// Puzzles
// =============================================================================

export type PuzzleKind = 'tutorial' | 'sandbox';

/** Complete definition of a puzzle */
export interface PuzzleDefinition {
  /** Unique identifier (e.g., 'tutorial-xor') */
  id: string;
  title: string;
  description: string;
  kind: PuzzleKind;
  /** Board size a fresh circuit starts with */
  initialBoundsSize: CoordsSize;
  /** Chips the player may place; every chip when omitted */
  allowedChips?: readonly ChipKind[];
  interfaces: readonly PuzzleInterface[];
  createEval: PuzzleEvalFactory;
}
