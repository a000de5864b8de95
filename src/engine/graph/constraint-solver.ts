/**
 * Wire size inference.
 *
 * Each net starts with the interval its color allows. Port constraints,
 * resolved to nets, narrow those intervals until nothing changes. A net
 * that runs out of sizes is a conflict; the constraint that emptied it is
 * reported with it.
 */

import type { WireSize, WireSizeInterval } from '../wires/index.ts';
import {
  EMPTY_INTERVAL,
  FULL_INTERVAL,
  atLeast,
  atMost,
  doubleInterval,
  exactly,
  formatInterval,
  halveInterval,
  intersectIntervals,
  intervalsEqual,
  isAmbiguousInterval,
  isEmptyInterval,
} from '../wires/index.ts';
import type { PortColor } from '../chips/framework.ts';
import type { PortLoc } from '../evaluation/types.ts';
import type { BuildError } from './types.ts';

/** A port constraint resolved against net indices */
export type NetConstraint =
  | { kind: 'exact' | 'atLeast' | 'atMost'; net: number; size: WireSize; ports: PortLoc[] }
  | { kind: 'equal' | 'double'; a: number; b: number; ports: PortLoc[] };

export interface SolverResult {
  sizes: WireSize[];
  intervals: WireSizeInterval[];
  /** Nets left with more than one admissible size */
  ambiguousNets: number[];
  errors: BuildError[];
}

export function initialInterval(color: PortColor | null): WireSizeInterval {
  switch (color) {
    case 'behavior':
      return atLeast('one');
    case 'analog':
      return exactly('analog');
    case 'event':
    case null:
      return FULL_INTERVAL;
  }
}

function netsOf(c: NetConstraint): number[] {
  return c.kind === 'equal' || c.kind === 'double' ? [c.a, c.b] : [c.net];
}

function describe(c: NetConstraint): string {
  switch (c.kind) {
    case 'exact':
      return `must be exactly ${c.size}`;
    case 'atLeast':
      return `must be at least ${c.size}`;
    case 'atMost':
      return `must be at most ${c.size}`;
    case 'equal':
      return 'must match another wire';
    case 'double':
      return 'must be twice the size of another wire';
  }
}

/** New intervals for the nets the constraint touches, in `netsOf` order */
function apply(c: NetConstraint, intervals: readonly WireSizeInterval[]): WireSizeInterval[] {
  switch (c.kind) {
    case 'exact':
      return [intersectIntervals(intervals[c.net], exactly(c.size))];
    case 'atLeast':
      return [intersectIntervals(intervals[c.net], atLeast(c.size))];
    case 'atMost':
      return [intersectIntervals(intervals[c.net], atMost(c.size))];
    case 'equal': {
      const both = intersectIntervals(intervals[c.a], intervals[c.b]);
      return [both, both];
    }
    case 'double': {
      if (c.a === c.b) return [EMPTY_INTERVAL, EMPTY_INTERVAL];
      const a = intersectIntervals(intervals[c.a], doubleInterval(intervals[c.b]));
      const b = intersectIntervals(intervals[c.b], halveInterval(a));
      return [a, b];
    }
  }
}

export function solveWireSizes(
  colors: readonly (PortColor | null)[],
  constraints: readonly NetConstraint[],
): SolverResult {
  const intervals = colors.map(initialInterval);
  const errors: BuildError[] = [];
  const conflicted = new Set<number>();

  const touching: number[][] = colors.map(() => []);
  constraints.forEach((c, i) => {
    for (const net of netsOf(c)) touching[net].push(i);
  });

  const queue: number[] = constraints.map((_, i) => i);
  const queued = constraints.map(() => true);
  let head = 0;

  while (head < queue.length) {
    const index = queue[head++];
    queued[index] = false;
    const constraint = constraints[index];

    const nets = netsOf(constraint);
    const updated = apply(constraint, intervals);
    nets.forEach((net, k) => {
      const next = updated[k];
      if (intervalsEqual(intervals[net], next)) return;
      intervals[net] = next;

      if (isEmptyInterval(next)) {
        if (!conflicted.has(net)) {
          conflicted.add(net);
          errors.push({
            kind: 'WireSizeConflict',
            net,
            ports: constraint.ports,
            message: `Wire size conflict: wire ${describe(constraint)}`,
          });
        }
      }
      for (const other of touching[net]) {
        if (!queued[other]) {
          queued[other] = true;
          queue.push(other);
        }
      }
    });
  }

  const sizes = intervals.map((i): WireSize => (isEmptyInterval(i) ? 'zero' : i.lo));
  const ambiguousNets = intervals.flatMap((i, net) => (isAmbiguousInterval(i) ? [net] : []));
  return { sizes, intervals, ambiguousNets, errors };
}

export function formatNetIntervals(intervals: readonly WireSizeInterval[]): string[] {
  return intervals.map((i, net) => `${net}: ${formatInterval(i)}`);
}
