/**
 * Wire topology: joins wire fragments into nets, attaches chip and
 * interface ports to them and classifies each net.
 */

import type { FragmentLoc, WireMap } from '../wires/index.ts';
import {
  connectedDirections,
  fragmentKey,
  locKey,
  neighborLoc,
  sortedFragments,
} from '../wires/index.ts';
import type { PortColor } from '../chips/framework.ts';
import type { PortLoc } from '../evaluation/types.ts';
import type { BuildError, CircuitPort, Net } from './types.ts';

export interface ClassifiedNet extends Net {
  /** Common color of the attached ports; null when none or mixed */
  color: PortColor | null;
  /** Index of the single source port, when there is exactly one */
  source: number | null;
}

export interface Topology {
  nets: ClassifiedNet[];
  /** Net index for each port, in port order */
  portNets: number[];
  errors: BuildError[];
}

// =============================================================================
// Traversal
// =============================================================================

/**
 * Group fragments into nets. Nets are numbered in the order a scan over the
 * sorted fragments first meets them.
 */
export function groupFragments(wires: WireMap): { nets: FragmentLoc[][]; netOfKey: Map<string, number> } {
  const netOfKey = new Map<string, number>();
  const nets: FragmentLoc[][] = [];

  for (const { loc } of sortedFragments(wires)) {
    if (netOfKey.has(locKey(loc))) continue;

    const index = nets.length;
    const fragments: FragmentLoc[] = [];
    const stack: FragmentLoc[] = [loc];
    netOfKey.set(locKey(loc), index);

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      fragments.push(current);

      const shape = wires.get(locKey(current));
      if (shape === undefined) continue;

      const next: FragmentLoc[] = [neighborLoc(current)];
      for (const dir of connectedDirections(shape, current.dir)) {
        if (dir !== current.dir) next.push({ coords: current.coords, dir });
      }
      for (const candidate of next) {
        const key = locKey(candidate);
        if (wires.has(key) && !netOfKey.has(key)) {
          netOfKey.set(key, index);
          stack.push(candidate);
        }
      }
    }

    nets.push(fragments);
  }

  return { nets, netOfKey };
}

// =============================================================================
// Classification
// =============================================================================

function classify(net: Net, ports: readonly CircuitPort[], errors: BuildError[]): ClassifiedNet {
  const attached = net.ports.map((i) => ports[i]);
  const locs: PortLoc[] = attached.map((p) => p.loc);
  const sources = net.ports.filter((i) => ports[i].flow === 'source');
  const colors = new Set(attached.map((p) => p.color));

  let color: PortColor | null = null;
  if (colors.size === 1) {
    const [only] = colors;
    color = only;
  } else if (colors.size > 1) {
    if (colors.has('analog')) {
      errors.push({
        kind: 'AnalogMixedWithDigital',
        net: net.index,
        ports: locs,
        message: 'Analog ports cannot share a wire with digital ports',
      });
    } else {
      errors.push({
        kind: 'PortColorMismatch',
        net: net.index,
        ports: locs,
        message: 'Behavior and event ports cannot share a wire',
      });
    }
  }

  if (sources.length > 1) {
    errors.push({
      kind: 'MultipleSources',
      net: net.index,
      ports: sources.map((i) => ports[i].loc),
      message: `Wire has ${sources.length} sources`,
    });
  }

  const hasSinks = sources.length < attached.length;
  if (sources.length === 0 && hasSinks) {
    const [first] = net.fragments;
    if (first !== undefined) {
      errors.push({
        kind: 'NoSource',
        net: net.index,
        fragment: first,
        message: 'Wire has no source',
      });
    } else {
      for (const i of net.ports) {
        const p = ports[i];
        if (p.owner.kind === 'chip') {
          errors.push({ kind: 'UnconnectedPort', port: p.loc, message: 'Input port is not connected' });
        }
      }
    }
  }

  return { ...net, color, source: sources.length === 1 ? sources[0] : null };
}

/**
 * Build nets for a circuit. Every port joins the net holding the fragment
 * at its own location; ports with no fragment get a net of their own,
 * numbered after all fragment nets in port order.
 */
export function buildTopology(wires: WireMap, ports: readonly CircuitPort[]): Topology {
  const { nets: fragmentNets, netOfKey } = groupFragments(wires);
  const nets: Net[] = fragmentNets.map((fragments, index) => ({ index, fragments, ports: [] }));
  const portNets: number[] = [];

  const unwired: number[] = [];
  ports.forEach((p, i) => {
    const index = netOfKey.get(fragmentKey(p.loc.coords, p.loc.dir));
    if (index === undefined) {
      unwired.push(i);
      portNets.push(-1);
    } else {
      nets[index].ports.push(i);
      portNets.push(index);
    }
  });
  for (const i of unwired) {
    const index = nets.length;
    nets.push({ index, fragments: [], ports: [i] });
    portNets[i] = index;
  }

  const errors: BuildError[] = [];
  const classified = nets.map((net) => classify(net, ports, errors));
  return { nets: classified, portNets, errors };
}
