import { allEqual, chipData, defineChip, deps, exact, port } from '../framework.ts';
import type { ChipEvalBinding, PortSlot } from '../framework.ts';
import type { CircuitState } from '../../evaluation/circuit-state.ts';

const BINARY_DATA = chipData(
  [
    port('In1', 'sink', 'behavior', 'west'),
    port('In2', 'sink', 'behavior', 'south'),
    port('Out', 'source', 'behavior', 'east'),
  ],
  allEqual(0, 1, 2),
  deps([0, 2], [1, 2]),
);

/** Evaluator for a two-input, one-output behavior chip */
export function binaryBehavior(
  ports: readonly PortSlot[],
  op: (a: number, b: number) => number,
): ChipEvalBinding[] {
  const [in1, in2, out] = ports;
  return [
    {
      port: 2,
      evaluator: {
        eval(state: CircuitState) {
          state.sendBehavior(out.slot, op(state.recvBehavior(in1.slot), state.recvBehavior(in2.slot)));
        },
      },
    },
  ];
}

export const andChip = defineChip({
  kind: 'And',
  category: 'logic',
  description: 'Bitwise AND of the two inputs',
  data: () => BINARY_DATA,
  createEvals: (_type, { ports }) => binaryBehavior(ports, (a, b) => a & b),
});

export const orChip = defineChip({
  kind: 'Or',
  category: 'logic',
  description: 'Bitwise OR of the two inputs',
  data: () => BINARY_DATA,
  createEvals: (_type, { ports }) => binaryBehavior(ports, (a, b) => a | b),
});

export const xorChip = defineChip({
  kind: 'Xor',
  category: 'logic',
  description: 'Bitwise XOR of the two inputs',
  data: () => BINARY_DATA,
  createEvals: (_type, { ports }) => binaryBehavior(ports, (a, b) => a ^ b),
});

export const notChip = defineChip({
  kind: 'Not',
  category: 'logic',
  description: 'Bitwise complement of the input',
  data: () =>
    chipData(
      [port('In', 'sink', 'behavior', 'west'), port('Out', 'source', 'behavior', 'east')],
      allEqual(0, 1),
      deps([0, 1]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, ~state.recvBehavior(input.slot));
          },
        },
      },
    ];
  },
});

export const muxChip = defineChip({
  kind: 'Mux',
  category: 'logic',
  description: 'Outputs In1 when Ctrl is 0, otherwise In2',
  data: () =>
    chipData(
      [
        port('In1', 'sink', 'behavior', 'west'),
        port('In2', 'sink', 'behavior', 'south'),
        port('Out', 'source', 'behavior', 'east'),
        port('Ctrl', 'sink', 'behavior', 'north'),
      ],
      [...allEqual(0, 1, 2), exact(3, 'one')],
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
            state.sendBehavior(out.slot, state.recvBehavior(chosen.slot));
          },
        },
      },
    ];
  },
});
