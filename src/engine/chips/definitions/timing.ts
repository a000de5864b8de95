import { chipData, defineChip, deps, equal, exact, port } from '../framework.ts';
import { wireMask } from '../../wires/index.ts';

/**
 * Delay: an event received in one cycle is re-sent in the next cycle of
 * the same time step. Has no dependencies, so loops through it are legal.
 */
export const delayChip = defineChip({
  kind: 'Delay',
  category: 'timing',
  description: 'Re-sends each event one cycle later',
  data: () =>
    chipData(
      [port('In', 'sink', 'event', 'west'), port('Out', 'source', 'event', 'east')],
      [equal(0, 1)],
      [],
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    let held: number | null = null;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            if (held !== null) {
              state.sendEvent(out.slot, held);
              held = null;
            }
          },
          needsAnotherCycle(state) {
            held = state.recvEvent(input.slot);
            return held !== null;
          },
        },
      },
    ];
  },
});

/** Clock: fires once in the time step after it receives any event */
export const clockChip = defineChip({
  kind: 'Clock',
  category: 'timing',
  description: 'Emits one event in the time step after receiving one',
  data: () =>
    chipData(
      [port('In', 'sink', 'event', 'west'), port('Out', 'source', 'event', 'east')],
      [exact(0, 'zero'), exact(1, 'zero')],
      [],
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    let received = false;
    let shouldSend = false;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            if (shouldSend) {
              state.sendEvent(out.slot, 0);
              shouldSend = false;
            }
          },
          needsAnotherCycle(state) {
            if (state.hasEvent(input.slot)) received = true;
            return false;
          },
          onTimeStep() {
            shouldSend = received;
            received = false;
          },
        },
      },
    ];
  },
});

export const eggTimerChip = defineChip({
  kind: 'EggTimer',
  category: 'timing',
  description: 'Counts down once per time step and alarms at zero',
  data: () =>
    chipData(
      [
        port('Set', 'sink', 'event', 'south'),
        port('Remain', 'source', 'behavior', 'north', { x: 1, y: 0 }),
        port('Alarm', 'source', 'event', 'north'),
      ],
      [equal(0, 1), exact(2, 'zero')],
      deps([0, 1], [0, 2]),
      { width: 2, height: 1 },
    ),
  createEvals: (_type, { ports }) => {
    const [set, remain, alarm] = ports;
    let time = 0;
    let shouldSend = false;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(set.slot);
            if (value !== null) {
              time = value;
              if (value === 0) shouldSend = true;
            }
            state.sendBehavior(remain.slot, time);
            if (shouldSend) {
              state.sendEvent(alarm.slot, 0);
              shouldSend = false;
            }
          },
          onTimeStep() {
            if (time > 0) {
              time -= 1;
              if (time === 0) shouldSend = true;
            }
          },
        },
      },
    ];
  },
});

export const stopwatchChip = defineChip({
  kind: 'Stopwatch',
  category: 'timing',
  description: 'Counts time steps while running',
  data: () =>
    chipData(
      [
        port('Start', 'sink', 'event', 'south'),
        port('Stop', 'sink', 'event', 'north', { x: 1, y: 0 }),
        port('Reset', 'sink', 'event', 'south', { x: 1, y: 0 }),
        port('Out', 'source', 'behavior', 'north'),
      ],
      [exact(0, 'zero'), exact(1, 'zero'), exact(2, 'zero')],
      deps([0, 3], [1, 3], [2, 3]),
      { width: 2, height: 1 },
    ),
  createEvals: (_type, { ports }) => {
    const [start, stop, reset, out] = ports;
    const mask = wireMask(out.size);
    let time = 0;
    let running = false;
    return [
      {
        port: 3,
        evaluator: {
          eval(state) {
            const started = state.hasEvent(start.slot);
            const stopped = state.hasEvent(stop.slot);
            if (started && !stopped) running = true;
            else if (stopped && !started) running = false;
            if (state.hasEvent(reset.slot)) time = 0;
            state.sendBehavior(out.slot, time);
          },
          onTimeStep() {
            if (running) time = (time + 1) & mask;
          },
        },
      },
    ];
  },
});
