import { chipData, defineChip, deps, equal, exact, port } from '../framework.ts';
import type { ChipEvalBinding, PortSlot } from '../framework.ts';

const COMPARE_DATA = chipData(
  [
    port('In1', 'sink', 'behavior', 'west'),
    port('In2', 'sink', 'behavior', 'east'),
    port('Out', 'source', 'behavior', 'north'),
  ],
  [equal(0, 1), exact(2, 'one')],
  deps([0, 2], [1, 2]),
);

function comparison(
  ports: readonly PortSlot[],
  test: (a: number, b: number) => boolean,
): ChipEvalBinding[] {
  const [in1, in2, out] = ports;
  return [
    {
      port: 2,
      evaluator: {
        eval(state) {
          const result = test(state.recvBehavior(in1.slot), state.recvBehavior(in2.slot));
          state.sendBehavior(out.slot, result ? 1 : 0);
        },
      },
    },
  ];
}

export const cmpChip = defineChip({
  kind: 'Cmp',
  category: 'comparison',
  description: 'Outputs 1 when In1 < In2',
  data: () => COMPARE_DATA,
  createEvals: (_type, { ports }) => comparison(ports, (a, b) => a < b),
});

export const cmpEqChip = defineChip({
  kind: 'CmpEq',
  category: 'comparison',
  description: 'Outputs 1 when In1 <= In2',
  data: () => COMPARE_DATA,
  createEvals: (_type, { ports }) => comparison(ports, (a, b) => a <= b),
});

export const eqChip = defineChip({
  kind: 'Eq',
  category: 'comparison',
  description: 'Outputs 1 when the inputs are equal',
  data: () => COMPARE_DATA,
  createEvals: (_type, { ports }) => comparison(ports, (a, b) => a === b),
});
