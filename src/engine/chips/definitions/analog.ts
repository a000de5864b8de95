import { chipData, defineChip, deps, exact, port } from '../framework.ts';
import type { ChipEvalBinding, PortSlot } from '../framework.ts';
import type { Fixed } from '../../../shared/geom/index.ts';
import { fixedAdd, fixedMul } from '../../../shared/geom/index.ts';

const ANALOG_BINARY_DATA = chipData(
  [
    port('In1', 'sink', 'analog', 'west'),
    port('In2', 'sink', 'analog', 'south'),
    port('Out', 'source', 'analog', 'east'),
  ],
  [exact(0, 'analog'), exact(1, 'analog'), exact(2, 'analog')],
  deps([0, 2], [1, 2]),
);

function binaryAnalog(
  ports: readonly PortSlot[],
  op: (a: Fixed, b: Fixed) => Fixed,
): ChipEvalBinding[] {
  const [in1, in2, out] = ports;
  return [
    {
      port: 2,
      evaluator: {
        eval(state) {
          state.sendAnalog(out.slot, op(state.recvAnalog(in1.slot), state.recvAnalog(in2.slot)));
        },
      },
    },
  ];
}

export const aAddChip = defineChip({
  kind: 'AAdd',
  category: 'analog',
  description: 'Saturating sum of two analog values',
  data: () => ANALOG_BINARY_DATA,
  createEvals: (_type, { ports }) => binaryAnalog(ports, fixedAdd),
});

export const aMulChip = defineChip({
  kind: 'AMul',
  category: 'analog',
  description: 'Product of two analog values',
  data: () => ANALOG_BINARY_DATA,
  createEvals: (_type, { ports }) => binaryAnalog(ports, fixedMul),
});

export const aCmpChip = defineChip({
  kind: 'ACmp',
  category: 'analog',
  description: 'On each test event, emits 1 when In1 < In2',
  data: () =>
    chipData(
      [
        port('In1', 'sink', 'analog', 'west'),
        port('In2', 'sink', 'analog', 'east'),
        port('Test', 'sink', 'event', 'south'),
        port('Out', 'source', 'event', 'north'),
      ],
      [exact(0, 'analog'), exact(1, 'analog'), exact(2, 'zero'), exact(3, 'one')],
      deps([0, 3], [1, 3], [2, 3]),
    ),
  createEvals: (_type, { ports }) => {
    const [in1, in2, test, out] = ports;
    return [
      {
        port: 3,
        evaluator: {
          eval(state) {
            if (state.hasEvent(test.slot)) {
              const less = state.recvAnalog(in1.slot) < state.recvAnalog(in2.slot);
              state.sendEvent(out.slot, less ? 1 : 0);
            }
          },
        },
      },
    ];
  },
});

export const relayChip = defineChip({
  kind: 'Relay',
  category: 'analog',
  description: 'Passes In1 when Ctrl is 0, otherwise In2',
  data: () =>
    chipData(
      [
        port('In1', 'sink', 'analog', 'west'),
        port('In2', 'sink', 'analog', 'south'),
        port('Out', 'source', 'analog', 'east'),
        port('Ctrl', 'sink', 'behavior', 'north'),
      ],
      [exact(0, 'analog'), exact(1, 'analog'), exact(2, 'analog'), exact(3, 'one')],
      deps([0, 2], [1, 2], [3, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [in1, in2, out, ctrl] = ports;
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const chosen = state.recvBehavior(ctrl.slot) === 0 ? in1 : in2;
            state.sendAnalog(out.slot, state.recvAnalog(chosen.slot));
          },
        },
      },
    ];
  },
});
