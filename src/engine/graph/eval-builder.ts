/**
 * Evaluation graph builder.
 *
 * Turns a board (chips, wires, puzzle interfaces) into a runnable program:
 * one slot per net, chip evaluators grouped by scheduling depth, and the
 * interface slots the puzzle reads and writes. Every build problem is
 * collected; warnings ride along with a successful build.
 */

import type { CoordsRect } from '../../shared/geom/index.ts';
import { compareCoords, coordsKey, rectContains, rectWithSize } from '../../shared/geom/index.ts';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import type { WireMap, WireSize } from '../wires/index.ts';
import type { ChipEval, PlacedChip, PortConstraint, PortSlot } from '../chips/framework.ts';
import { placedPorts, placedSize } from '../chips/framework.ts';
import { chipDataFor, getChipDefinition } from '../chips/registry.ts';
import type { SlotInfo } from '../evaluation/circuit-state.ts';
import type { InterfaceSlot } from '../evaluation/types.ts';
import type { PuzzleInterface } from '../../puzzle/types.ts';
import { boundsFitInterfaces, interfacePorts } from '../../puzzle/interface.ts';
import type { GraphEdge } from './topological-sort.ts';
import { topologicalSortWithDepths } from './topological-sort.ts';
import { buildTopology } from './topology.ts';
import type { NetConstraint } from './constraint-solver.ts';
import { formatNetIntervals, solveWireSizes } from './constraint-solver.ts';
import type { BuildError, CircuitPort } from './types.ts';
import { isBuildWarning } from './types.ts';

const log = createLogger('Build');

export interface CircuitLayout {
  bounds: CoordsRect;
  chips: readonly PlacedChip[];
  wires: WireMap;
  interfaces: readonly PuzzleInterface[];
}

/** A placed chip's evaluators, kept for presses and display */
export interface ChipEvaluators {
  chip: PlacedChip;
  evaluators: ChipEval[];
}

export interface CircuitProgram {
  slots: SlotInfo[];
  /** Evaluators to run in each subcycle, in order */
  groups: ChipEval[][];
  /** Keyed by the chip's top-left cell */
  chips: Map<string, ChipEvaluators>;
  /** `interfaceSlots[iface][port]` */
  interfaceSlots: InterfaceSlot[][];
  sizes: WireSize[];
  ambiguousNets: number[];
  /** Number of wire fragments on the board */
  wireLength: number;
  warnings: BuildError[];
}

function resolveConstraint(c: PortConstraint, netOf: (port: number) => number, ports: CircuitPort[], start: number): NetConstraint {
  switch (c.kind) {
    case 'exact':
    case 'atLeast':
    case 'atMost':
      return { kind: c.kind, net: netOf(c.port), size: c.size, ports: [ports[start + c.port].loc] };
    case 'equal':
    case 'double':
      return {
        kind: c.kind,
        a: netOf(c.a),
        b: netOf(c.b),
        ports: [ports[start + c.a].loc, ports[start + c.b].loc],
      };
  }
}

export function buildCircuit(layout: CircuitLayout): Result<CircuitProgram, BuildError[]> {
  const chips = [...layout.chips].sort((a, b) => compareCoords(a.coords, b.coords));
  const errors: BuildError[] = [];

  // ---------------------------------------------------------------------------
  // Ports
  // ---------------------------------------------------------------------------

  const ports: CircuitPort[] = [];
  const chipPortStart: number[] = [];
  const chipData = chips.map((chip) => chipDataFor(chip.type));
  chips.forEach((chip, i) => {
    chipPortStart.push(ports.length);
    for (const p of placedPorts(chipData[i], chip.coords, chip.orient)) {
      ports.push({
        loc: p.loc,
        flow: p.flow,
        color: p.color,
        owner: { kind: 'chip', coords: chip.coords, index: p.index },
      });
    }
  });

  const interfaceStart: number[] = [];
  const placedInterfaces = layout.interfaces.map((iface) => interfacePorts(iface, layout.bounds));
  placedInterfaces.forEach((placed, iface) => {
    interfaceStart.push(ports.length);
    placed.forEach((p, index) => {
      ports.push({ loc: p.loc, flow: p.flow, color: p.color, owner: { kind: 'interface', iface, index } });
    });
  });

  if (!boundsFitInterfaces(layout.bounds, layout.interfaces)) {
    errors.push({
      kind: 'InterfacePortMissing',
      port: null,
      message: 'The board is too small for the puzzle interfaces',
    });
  }
  const footprints = chips.map((chip, i) => rectWithSize(chip.coords, placedSize(chipData[i], chip.orient)));
  for (const placed of placedInterfaces) {
    for (const p of placed) {
      if (footprints.some((r) => rectContains(r, p.loc.coords))) {
        errors.push({
          kind: 'InterfacePortMissing',
          port: p.loc,
          message: `Interface port ${p.name} is covered by a chip`,
        });
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Nets and sizes
  // ---------------------------------------------------------------------------

  const topology = buildTopology(layout.wires, ports);
  errors.push(...topology.errors);
  const { nets, portNets } = topology;

  const constraints: NetConstraint[] = [];
  chips.forEach((_chip, i) => {
    const start = chipPortStart[i];
    const netOf = (p: number): number => portNets[start + p];
    for (const c of chipData[i].constraints) {
      constraints.push(resolveConstraint(c, netOf, ports, start));
    }
  });
  placedInterfaces.forEach((placed, iface) => {
    placed.forEach((p, index) => {
      const portIndex = interfaceStart[iface] + index;
      constraints.push({ kind: 'exact', net: portNets[portIndex], size: p.size, ports: [p.loc] });
    });
  });

  const solved = solveWireSizes(
    nets.map((net) => net.color),
    constraints,
  );
  errors.push(...solved.errors);
  log.debug('Wire sizes solved', { intervals: formatNetIntervals(solved.intervals) });

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  const edges: GraphEdge<number>[] = [];
  chips.forEach((_chip, i) => {
    const start = chipPortStart[i];
    for (const dep of chipData[i].dependencies) {
      edges.push({ from: portNets[start + dep.sink], to: portNets[start + dep.source] });
    }
  });
  const sorted = topologicalSortWithDepths(
    nets.map((net) => net.index),
    edges,
  );
  if (!sorted.ok) {
    const loop = [...new Set(sorted.error.cyclePath)];
    errors.push({
      kind: 'CombinationalLoop',
      nets: loop,
      ports: loop.flatMap((net) => nets[net].ports.map((p) => ports[p].loc)),
      message: 'Circuit contains a loop with no delay',
    });
  }

  const fatal = errors.filter((e) => !isBuildWarning(e));
  if (fatal.length > 0 || !sorted.ok) {
    log.info('Circuit build failed', { errors: fatal.length });
    return err(errors);
  }

  // ---------------------------------------------------------------------------
  // Evaluators
  // ---------------------------------------------------------------------------

  const slots: SlotInfo[] = nets.map((net) => ({
    size: solved.sizes[net.index],
    isNull: net.fragments.length === 0,
    source: net.source === null ? null : ports[net.source].loc,
  }));

  const { depths, maxDepth } = sorted.value;
  const groups = Array.from({ length: maxDepth + 1 }, (): ChipEval[] => []);
  const byCoords = new Map<string, ChipEvaluators>();

  chips.forEach((chip, i) => {
    const start = chipPortStart[i];
    const portSlots: PortSlot[] = chipData[i].ports.map((_, p) => {
      const net = portNets[start + p];
      return { slot: net, size: solved.sizes[net], loc: ports[start + p].loc };
    });
    const bindings = getChipDefinition(chip.type).createEvals(chip.type, {
      ports: portSlots,
      coords: chip.coords,
    });
    for (const binding of bindings) {
      if (binding.port === null) continue;
      const depth = depths.get(portNets[start + binding.port]) ?? 0;
      groups[depth].push(binding.evaluator);
    }
    byCoords.set(coordsKey(chip.coords), { chip, evaluators: bindings.map((b) => b.evaluator) });
  });

  const interfaceSlots: InterfaceSlot[][] = placedInterfaces.map((placed, iface) =>
    placed.map((p, index) => ({ loc: p.loc, slot: portNets[interfaceStart[iface] + index] })),
  );

  log.debug('Circuit built', { nets: nets.length, groups: groups.length, chips: chips.length });

  return ok({
    slots,
    groups,
    chips: byCoords,
    interfaceSlots,
    sizes: solved.sizes,
    ambiguousNets: solved.ambiguousNets,
    wireLength: layout.wires.size,
    warnings: errors,
  });
}
