import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { createCircuitSlice } from './slices/circuit-slice.ts';
import type { CircuitSlice } from './slices/circuit-slice.ts';
import { createSimulationSlice } from './slices/simulation-slice.ts';
import type { SimulationSlice, StepUnit } from './slices/simulation-slice.ts';

export type CircuitStore = CircuitSlice & SimulationSlice;
export type { CircuitSlice, SimulationSlice, StepUnit };

/** A store holding one circuit and its simulation */
export function createCircuitStore(): StoreApi<CircuitStore> {
  return createStore<CircuitStore>()((...a) => ({
    ...createCircuitSlice(...a),
    ...createSimulationSlice(...a),
  }));
}
