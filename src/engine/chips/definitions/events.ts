import { allEqual, atLeastSize, chipData, defineChip, deps, equal, exact, port } from '../framework.ts';
import { wireMask } from '../../wires/index.ts';

export const sampleChip = defineChip({
  kind: 'Sample',
  category: 'event',
  description: 'On each event, emits the current value of the behavior input',
  data: () =>
    chipData(
      [
        port('Trigger', 'sink', 'event', 'west'),
        port('In', 'sink', 'behavior', 'south'),
        port('Out', 'source', 'event', 'east'),
      ],
      [exact(0, 'zero'), equal(1, 2)],
      deps([0, 2], [1, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [trigger, input, out] = ports;
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            if (state.hasEvent(trigger.slot)) {
              state.sendEvent(out.slot, state.recvBehavior(input.slot));
            }
          },
        },
      },
    ];
  },
});

export const latestChip = defineChip({
  kind: 'Latest',
  category: 'event',
  description: 'Holds the value of the most recent event',
  data: () =>
    chipData(
      [port('In', 'sink', 'event', 'west'), port('Out', 'source', 'behavior', 'east')],
      [equal(0, 1)],
      deps([0, 1]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(input.slot);
            if (value !== null) state.sendBehavior(out.slot, value);
          },
        },
      },
    ];
  },
});

export const discardChip = defineChip({
  kind: 'Discard',
  category: 'event',
  description: 'Passes events through without their values',
  data: () =>
    chipData(
      [port('In', 'sink', 'event', 'west'), port('Out', 'source', 'event', 'east')],
      [atLeastSize(0, 'one'), exact(1, 'zero')],
      deps([0, 1]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            if (state.hasEvent(input.slot)) state.sendEvent(out.slot, 0);
          },
        },
      },
    ];
  },
});

export const joinChip = defineChip({
  kind: 'Join',
  category: 'event',
  description: 'Forwards an event from either input, preferring the first',
  data: () =>
    chipData(
      [
        port('In1', 'sink', 'event', 'west'),
        port('In2', 'sink', 'event', 'south'),
        port('Out', 'source', 'event', 'east'),
      ],
      allEqual(0, 1, 2),
      deps([0, 2], [1, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [in1, in2, out] = ports;
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(in1.slot) ?? state.recvEvent(in2.slot);
            if (value !== null) state.sendEvent(out.slot, value);
          },
        },
      },
    ];
  },
});

export const demuxChip = defineChip({
  kind: 'Demux',
  category: 'event',
  description: 'Routes each event to Out1 when Ctrl is nonzero, otherwise to Out2',
  data: () =>
    chipData(
      [
        port('In', 'sink', 'event', 'west'),
        port('Out1', 'source', 'event', 'south'),
        port('Out2', 'source', 'event', 'east'),
        port('Ctrl', 'sink', 'behavior', 'north'),
      ],
      [...allEqual(0, 1, 2), exact(3, 'one')],
      deps([0, 1], [0, 2], [3, 1], [3, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out1, out2, ctrl] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(input.slot);
            if (value === null) return;
            const target = state.recvBehavior(ctrl.slot) !== 0 ? out1 : out2;
            state.sendEvent(target.slot, value);
          },
        },
      },
    ];
  },
});

export const filterChip = defineChip({
  kind: 'Filter',
  category: 'event',
  description: 'Passes events only while Ctrl is 0',
  data: () =>
    chipData(
      [
        port('In', 'sink', 'event', 'west'),
        port('Out', 'source', 'event', 'east'),
        port('Ctrl', 'sink', 'behavior', 'north'),
      ],
      [equal(0, 1), exact(2, 'one')],
      deps([0, 1], [2, 1]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out, ctrl] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(input.slot);
            if (value !== null && state.recvBehavior(ctrl.slot) === 0) {
              state.sendEvent(out.slot, value);
            }
          },
        },
      },
    ];
  },
});

export const incChip = defineChip({
  kind: 'Inc',
  category: 'event',
  description: 'Adds the behavior input to each event value',
  data: () =>
    chipData(
      [
        port('In', 'sink', 'event', 'west'),
        port('Amount', 'sink', 'behavior', 'south'),
        port('Out', 'source', 'event', 'east'),
      ],
      allEqual(0, 1, 2),
      deps([0, 2], [1, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, amount, out] = ports;
    const mask = wireMask(out.size);
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const value = state.recvEvent(input.slot);
            if (value !== null) {
              state.sendEvent(out.slot, (value + state.recvBehavior(amount.slot)) & mask);
            }
          },
        },
      },
    ];
  },
});
