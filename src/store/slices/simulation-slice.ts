import type { StateCreator } from 'zustand';
import type { CircuitStore } from '../index.ts';
import type { Coords } from '../../shared/geom/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import type { StartEvalOptions } from '../../circuit/edit-grid.ts';
import type { CircuitEval } from '../../engine/evaluation/circuit-eval.ts';
import type { StepOutcome } from '../../engine/evaluation/types.ts';
import type { BuildError } from '../../engine/graph/types.ts';
import { TimeAccumulator } from '../../simulation/time-accumulator.ts';

const log = createLogger('Simulation');

export type StepUnit = 'subcycle' | 'cycle' | 'timeStep';

export interface SimulationSlice {
  /** The running evaluation, or null while editing */
  circuitEval: CircuitEval | null;
  /** Errors from the last failed start */
  buildErrors: BuildError[];
  /** Outcome of the most recent step; real-time advance pauses unless it is 'continue' */
  lastOutcome: StepOutcome | null;

  /** Build the circuit and start running it. False when the build failed. */
  startSimulation: (options?: StartEvalOptions) => boolean;
  stopSimulation: () => void;
  /** Run one step by hand */
  stepSimulation: (unit: StepUnit) => StepOutcome | null;
  /** Route a press to the chip at `coords` */
  pressChip: (coords: Coords, sublocation: number, times: number) => boolean;
  /** Run the time steps due after `elapsedSeconds`; returns how many ran */
  advanceSimulation: (elapsedSeconds: number) => number;
}

function runStep(circuitEval: CircuitEval, unit: StepUnit): StepOutcome {
  switch (unit) {
    case 'subcycle':
      return circuitEval.stepSubcycle();
    case 'cycle':
      return circuitEval.stepCycle();
    case 'timeStep':
      return circuitEval.stepTimeStep();
  }
}

export const createSimulationSlice: StateCreator<CircuitStore, [], [], SimulationSlice> = (set, get) => {
  const clock = new TimeAccumulator();

  const record = (circuitEval: CircuitEval, outcome: StepOutcome): void => {
    if (outcome.kind === 'failure' && get().lastOutcome?.kind !== 'failure') {
      const last = circuitEval.errors[circuitEval.errors.length - 1];
      log.error('Simulation failed', {
        timeStep: circuitEval.timeStep,
        errors: circuitEval.errors.length,
        message: last?.message,
      });
    }
    if (outcome.kind !== 'continue') clock.reset();
    set({ lastOutcome: outcome });
  };

  return {
    circuitEval: null,
    buildErrors: [],
    lastOutcome: null,

    startSimulation: (options) => {
      const { grid } = get();
      if (!grid) return false;
      const result = grid.startEval(options);
      clock.reset();
      if (!result.ok) {
        set({ circuitEval: null, buildErrors: result.error, lastOutcome: null });
        return false;
      }
      set({ circuitEval: result.value, buildErrors: [], lastOutcome: null });
      return true;
    },

    stopSimulation: () => {
      get().grid?.stopEval();
      clock.reset();
      set({ circuitEval: null, lastOutcome: null });
    },

    stepSimulation: (unit) => {
      const { circuitEval } = get();
      if (!circuitEval) return null;
      const outcome = runStep(circuitEval, unit);
      record(circuitEval, outcome);
      return outcome;
    },

    pressChip: (coords, sublocation, times) => {
      const { circuitEval } = get();
      return circuitEval ? circuitEval.pressButton(coords, sublocation, times) : false;
    },

    advanceSimulation: (elapsedSeconds) => {
      const { circuitEval, lastOutcome } = get();
      if (!circuitEval || (lastOutcome !== null && lastOutcome.kind !== 'continue')) return 0;

      const due = clock.advance(elapsedSeconds, circuitEval.secondsPerTimeStep());
      let ran = 0;
      while (ran < due) {
        const outcome = circuitEval.stepTimeStep();
        ran++;
        record(circuitEval, outcome);
        if (outcome.kind !== 'continue') break;
      }
      return ran;
    },
  };
};
