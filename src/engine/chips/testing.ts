/**
 * Test harness for a single chip: every port gets its own slot, so tests
 * can drive inputs and read outputs directly.
 */

import { IDENTITY_ORIENTATION } from '../../shared/geom/index.ts';
import type { Coords } from '../../shared/geom/index.ts';
import type { WireSize } from '../wires/index.ts';
import { CircuitState } from '../evaluation/circuit-state.ts';
import type { ChipData, ChipEvalBinding, PortSlot } from './framework.ts';
import { placedPorts } from './framework.ts';
import type { ChipType } from './chip-type.ts';
import { chipDataFor, getChipDefinition } from './registry.ts';

export interface MountedChip {
  state: CircuitState;
  ports: PortSlot[];
  bindings: ChipEvalBinding[];
  /** Run every scheduled evaluator once */
  evaluate(): void;
  /** Poll needsAnotherCycle, then clear events for the next cycle */
  endCycle(): boolean;
  /** Fire onTimeStep on every evaluator */
  endTimeStep(): void;
}

function defaultSize(data: ChipData, index: number): WireSize {
  for (const c of data.constraints) {
    if (c.kind === 'exact' && c.port === index) return c.size;
  }
  return data.ports[index].color === 'analog' ? 'analog' : 'eight';
}

export function mountChip(type: ChipType, sizes: readonly WireSize[] = [], coords: Coords = { x: 0, y: 0 }): MountedChip {
  const data = chipDataFor(type);
  const placed = placedPorts(data, coords, IDENTITY_ORIENTATION);
  const ports: PortSlot[] = placed.map((p, i) => ({
    slot: i,
    size: sizes[i] ?? defaultSize(data, i),
    loc: p.loc,
  }));
  const state = new CircuitState(
    ports.map((p, i) => ({
      size: p.size,
      isNull: false,
      source: placed[i].flow === 'source' ? p.loc : null,
    })),
  );
  const bindings = getChipDefinition(type).createEvals(type, { ports, coords });
  const scheduled = bindings.filter((b) => b.port !== null);

  return {
    state,
    ports,
    bindings,
    evaluate() {
      for (const b of scheduled) b.evaluator.eval(state);
    },
    endCycle() {
      let another = false;
      for (const b of bindings) {
        if (b.evaluator.needsAnotherCycle?.(state)) another = true;
      }
      state.resetForCycle();
      return another;
    },
    endTimeStep() {
      for (const b of bindings) b.evaluator.onTimeStep?.();
    },
  };
}
