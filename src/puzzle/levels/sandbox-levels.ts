import { SIMULATION_CONFIG } from '../../shared/constants/index.ts';
import { fixedFromNumber } from '../../shared/geom/index.ts';
import type { CircuitState } from '../../engine/evaluation/circuit-state.ts';
import type { InterfaceSlot, PuzzleEval } from '../../engine/evaluation/types.ts';
import type { ChipKind } from '../../engine/chips/chip-type.ts';
import type { InterfacePort, PuzzleDefinition, PuzzleInterface } from '../types.ts';

/** Time steps in one period of the analog sandbox's sine output */
const SINE_PERIOD = 10;

const INIT_PORT: InterfacePort = {
  name: 'Init',
  description: 'Sends a single event at the start of the first time step.',
  flow: 'source',
  color: 'event',
  size: 'zero',
};

const TIME_PORT: InterfacePort = {
  name: 'Time',
  description: 'Outputs the current time step.',
  flow: 'source',
  color: 'behavior',
  size: 'eight',
};

const TICK_PORT: InterfacePort = {
  name: 'Tick',
  description: 'Sends an event at the beginning of each time step.',
  flow: 'source',
  color: 'event',
  size: 'zero',
};

const SINE_PORT: InterfacePort = {
  name: 'Sine',
  description: `Outputs a sine wave with a period of ${SINE_PERIOD} time steps.`,
  flow: 'source',
  color: 'analog',
  size: 'analog',
};

function startupInterface(): PuzzleInterface {
  return {
    name: 'Startup Interface',
    description: 'Connects to the power supply.',
    side: 'north',
    position: { kind: 'right', offset: 0 },
    ports: [INIT_PORT],
  };
}

function timerInterface(ports: InterfacePort[]): PuzzleInterface {
  return {
    name: 'Timer Interface',
    description: 'Connects to a digital timer.',
    side: 'west',
    position: { kind: 'right', offset: 0 },
    ports,
  };
}

function slotOf(slots: InterfaceSlot[][], iface: number, port: number): number {
  const entry = slots[iface]?.[port];
  if (!entry) throw new Error(`Missing slot for interface ${iface} port ${port}`);
  return entry.slot;
}

const BEHAVIOR_CHIPS: readonly ChipKind[] = [
  'Const',
  'Coerce',
  'Pack',
  'Unpack',
  'And',
  'Or',
  'Xor',
  'Not',
  'Mux',
  'Add',
  'Add2Bit',
  'Sub',
  'Mul',
  'Mul4Bit',
  'Halve',
  'Neg',
  'Cmp',
  'CmpEq',
  'Eq',
  'Toggle',
  'Display',
];

// =============================================================================
// Levels
// =============================================================================

/** Open-ended board with a timer; never completes */
export const SANDBOX_BEHAVIOR: PuzzleDefinition = {
  id: 'sandbox-behavior',
  title: 'Behavior Lab',
  description: 'Build any circuits you want using all behavior chips.',
  kind: 'sandbox',
  initialBoundsSize: { width: 8, height: 6 },
  allowedChips: BEHAVIOR_CHIPS,
  interfaces: [timerInterface([TIME_PORT])],
  createEval: (slots): PuzzleEval => {
    const time = slotOf(slots, 0, 0);
    return {
      secondsPerTimeStep: () => SIMULATION_CONFIG.DEFAULT_SECONDS_PER_TIME_STEP,
      beginTimeStep(state: CircuitState) {
        state.sendBehavior(time, state.timeStep & 0xff);
        return null;
      },
      endTimeStep: () => [],
    };
  },
};

/** Open-ended board with startup and tick events; never completes */
export const SANDBOX_EVENT: PuzzleDefinition = {
  id: 'sandbox-event',
  title: 'Event Lab',
  description: 'Build any circuits you want using all behavior and event chips.',
  kind: 'sandbox',
  initialBoundsSize: { width: 8, height: 6 },
  interfaces: [startupInterface(), timerInterface([TIME_PORT, TICK_PORT])],
  createEval: (slots): PuzzleEval => {
    const init = slotOf(slots, 0, 0);
    const time = slotOf(slots, 1, 0);
    const tick = slotOf(slots, 1, 1);
    return {
      secondsPerTimeStep: () => SIMULATION_CONFIG.DEFAULT_SECONDS_PER_TIME_STEP,
      beginTimeStep(state: CircuitState) {
        if (state.timeStep === 0) state.sendEvent(init, 0);
        state.sendBehavior(time, state.timeStep & 0xff);
        state.sendEvent(tick, 0);
        return null;
      },
      endTimeStep: () => [],
    };
  },
};

/**
 * Event lab plus a sine wave that updates every cycle while anything is
 * wired to it.
 */
export const SANDBOX_ANALOG: PuzzleDefinition = {
  id: 'sandbox-analog',
  title: 'Analog Lab',
  description: 'Build any circuits you want using analog, behavior and event chips.',
  kind: 'sandbox',
  initialBoundsSize: { width: 8, height: 6 },
  interfaces: [startupInterface(), timerInterface([TIME_PORT, TICK_PORT, SINE_PORT])],
  createEval: (slots, prefs): PuzzleEval => {
    const init = slotOf(slots, 0, 0);
    const time = slotOf(slots, 1, 0);
    const tick = slotOf(slots, 1, 1);
    const sine = slotOf(slots, 1, 2);
    const cyclesPerStep = prefs.maxCyclesPerTimeStep;
    const sendSine = (state: CircuitState): void => {
      const t = (state.timeStep % SINE_PERIOD) * cyclesPerStep + state.cycle;
      const theta = ((2 * Math.PI) / (SINE_PERIOD * cyclesPerStep)) * t;
      state.sendAnalog(sine, fixedFromNumber(Math.sin(theta)));
    };
    return {
      secondsPerTimeStep: () => SIMULATION_CONFIG.DEFAULT_SECONDS_PER_TIME_STEP,
      beginTimeStep(state: CircuitState) {
        if (state.timeStep === 0) state.sendEvent(init, 0);
        state.sendBehavior(time, state.timeStep & 0xff);
        state.sendEvent(tick, 0);
        sendSine(state);
        return null;
      },
      beginAdditionalCycle: sendSine,
      needsAnotherCycle: (state: CircuitState) =>
        state.cycle + 1 < cyclesPerStep && !state.isNullSlot(sine),
      endTimeStep: () => [],
    };
  },
};
