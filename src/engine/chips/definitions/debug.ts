import { chipData, defineChip, deps, equal, exact, port } from '../framework.ts';

export const breakChip = defineChip({
  kind: 'Break',
  category: 'debug',
  description: 'Passes events through and pauses the run while enabled',
  data: () =>
    chipData(
      [port('In', 'sink', 'event', 'west'), port('Out', 'source', 'event', 'east')],
      [equal(0, 1)],
      deps([0, 1]),
    ),
  createEvals: (_type, { ports, coords }) => {
    const [input, out] = ports;
    let enabled = true;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(input.slot);
            if (value === null) return;
            state.sendEvent(out.slot, value);
            if (enabled) state.breakpoint(coords);
          },
          displayData() {
            return [enabled ? 1 : 0];
          },
          onPress(_sublocation, times) {
            if (times % 2 !== 0) enabled = !enabled;
          },
        },
      },
    ];
  },
});

export const buttonChip = defineChip({
  kind: 'Button',
  category: 'debug',
  description: 'Emits one event per press, one press per cycle',
  data: () => chipData([port('Out', 'source', 'event', 'east')], [exact(0, 'zero')], []),
  createEvals: (_type, { ports }) => {
    const [out] = ports;
    let pressCount = 0;
    return [
      {
        port: 0,
        evaluator: {
          eval(state) {
            if (pressCount > 0) {
              pressCount -= 1;
              state.sendEvent(out.slot, 0);
            }
          },
          needsAnotherCycle() {
            return pressCount > 0;
          },
          onPress(_sublocation, times) {
            pressCount += times;
          },
        },
      },
    ];
  },
});

export const toggleChip = defineChip({
  kind: 'Toggle',
  category: 'debug',
  description: 'A 1-bit switch flipped by pressing it',
  data: () => chipData([port('Out', 'source', 'behavior', 'east')], [exact(0, 'one')], []),
  createEvals: (type, { ports }) => {
    const [out] = ports;
    let value = type.value;
    return [
      {
        port: 0,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, value ? 1 : 0);
          },
          displayData() {
            return [value ? 1 : 0];
          },
          onPress(_sublocation, times) {
            if (times % 2 !== 0) value = !value;
          },
        },
      },
    ];
  },
});

export const displayChip = defineChip({
  kind: 'Display',
  category: 'debug',
  description: 'Shows the value of a behavior wire',
  data: () =>
    chipData([port('In', 'sink', 'behavior', 'south')], [], [], { width: 2, height: 1 }),
  createEvals: (_type, { ports }) => {
    const [input] = ports;
    return [
      {
        port: null,
        evaluator: {
          eval() {
            return;
          },
          displayData(state) {
            return [state.recvBehavior(input.slot)];
          },
        },
      },
    ];
  },
});
