import type { Coords } from '../../shared/geom/index.ts';
import type { FragmentLoc, WireSize } from '../wires/index.ts';
import type { PortColor, PortFlow } from '../chips/framework.ts';
import type { PortLoc } from '../evaluation/types.ts';

// =============================================================================
// Ports on the grid
// =============================================================================

export type PortOwner =
  | { kind: 'chip'; coords: Coords; index: number }
  | { kind: 'interface'; iface: number; index: number };

/** A chip or interface port as the topology sees it */
export interface CircuitPort {
  loc: PortLoc;
  flow: PortFlow;
  color: PortColor;
  owner: PortOwner;
}

/** An interface port once placed against the bounds */
export interface PlacedInterfacePort {
  name: string;
  loc: PortLoc;
  flow: PortFlow;
  color: PortColor;
  size: WireSize;
}

// =============================================================================
// Nets
// =============================================================================

/** A connected set of fragments plus the ports touching it */
export interface Net {
  index: number;
  /** Fragments in traversal order; empty for a port with no wire */
  fragments: FragmentLoc[];
  /** Indices into the circuit port list */
  ports: number[];
}

// =============================================================================
// Build errors
// =============================================================================

export type BuildError =
  | { kind: 'WireSizeConflict'; net: number; ports: PortLoc[]; message: string }
  | { kind: 'MultipleSources'; net: number; ports: PortLoc[]; message: string }
  | { kind: 'NoSource'; net: number; fragment: FragmentLoc; message: string }
  | { kind: 'PortColorMismatch'; net: number; ports: PortLoc[]; message: string }
  | { kind: 'UnconnectedPort'; port: PortLoc; message: string }
  | { kind: 'AnalogMixedWithDigital'; net: number; ports: PortLoc[]; message: string }
  | { kind: 'CombinationalLoop'; nets: number[]; ports: PortLoc[]; message: string }
  | { kind: 'InterfacePortMissing'; port: PortLoc | null; message: string };

export type BuildErrorKind = BuildError['kind'];

const WARNING_KINDS: ReadonlySet<BuildErrorKind> = new Set<BuildErrorKind>([
  'NoSource',
  'UnconnectedPort',
]);

/** Warnings are reported but do not stop the circuit from starting */
export function isBuildWarning(error: BuildError): boolean {
  return WARNING_KINDS.has(error.kind);
}
