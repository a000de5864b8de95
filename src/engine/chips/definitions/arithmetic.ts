import { allEqual, chipData, defineChip, deps, exact, port } from '../framework.ts';
import { wireMask } from '../../wires/index.ts';
import { binaryBehavior } from './logic.ts';

const ARITH_DATA = chipData(
  [
    port('In1', 'sink', 'behavior', 'west'),
    port('In2', 'sink', 'behavior', 'south'),
    port('Out', 'source', 'behavior', 'east'),
  ],
  allEqual(0, 1, 2),
  deps([0, 2], [1, 2]),
);

const UNARY_DATA = chipData(
  [port('In', 'sink', 'behavior', 'west'), port('Out', 'source', 'behavior', 'east')],
  allEqual(0, 1),
  deps([0, 1]),
);

export const addChip = defineChip({
  kind: 'Add',
  category: 'arithmetic',
  description: 'Sum of the inputs, wrapping at the wire size',
  data: () => ARITH_DATA,
  createEvals: (_type, { ports }) => {
    const mask = wireMask(ports[2].size);
    return binaryBehavior(ports, (a, b) => (a + b) & mask);
  },
});

export const subChip = defineChip({
  kind: 'Sub',
  category: 'arithmetic',
  description: 'Absolute difference of the inputs',
  data: () => ARITH_DATA,
  createEvals: (_type, { ports }) => binaryBehavior(ports, (a, b) => Math.abs(a - b)),
});

export const mulChip = defineChip({
  kind: 'Mul',
  category: 'arithmetic',
  description: 'Product of the inputs, wrapping at the wire size',
  data: () => ARITH_DATA,
  createEvals: (_type, { ports }) => {
    const mask = wireMask(ports[2].size);
    return binaryBehavior(ports, (a, b) => (a * b) & mask);
  },
});

/** Two inputs, a low output east and a high output north, all one fixed size */
function splitResultData(size: 'two' | 'four') {
  return chipData(
    [
      port('In1', 'sink', 'behavior', 'west'),
      port('In2', 'sink', 'behavior', 'south'),
      port('Lo', 'source', 'behavior', 'east'),
      port('Hi', 'source', 'behavior', 'north'),
    ],
    [exact(0, size), exact(1, size), exact(2, size), exact(3, size)],
    deps([0, 2], [1, 2], [0, 3], [1, 3]),
  );
}

export const add2BitChip = defineChip({
  kind: 'Add2Bit',
  category: 'arithmetic',
  description: 'Adds two 2-bit values into a low half and a carry',
  data: () => splitResultData('two'),
  createEvals: (_type, { ports }) => {
    const [in1, in2, lo, hi] = ports;
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const sum = state.recvBehavior(in1.slot) + state.recvBehavior(in2.slot);
            state.sendBehavior(lo.slot, sum & 0b11);
            state.sendBehavior(hi.slot, (sum >> 2) & 0b11);
          },
        },
      },
    ];
  },
});

export const mul4BitChip = defineChip({
  kind: 'Mul4Bit',
  category: 'arithmetic',
  description: 'Multiplies two 4-bit values into low and high nibbles',
  data: () => splitResultData('four'),
  createEvals: (_type, { ports }) => {
    const [in1, in2, lo, hi] = ports;
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const product = state.recvBehavior(in1.slot) * state.recvBehavior(in2.slot);
            state.sendBehavior(lo.slot, product & 0xf);
            state.sendBehavior(hi.slot, (product >> 4) & 0xf);
          },
        },
      },
    ];
  },
});

export const halveChip = defineChip({
  kind: 'Halve',
  category: 'arithmetic',
  description: 'Shifts the input right by one bit',
  data: () => UNARY_DATA,
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, state.recvBehavior(input.slot) >> 1);
          },
        },
      },
    ];
  },
});

export const negChip = defineChip({
  kind: 'Neg',
  category: 'arithmetic',
  description: "Two's complement negation at the wire size",
  data: () => UNARY_DATA,
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    const mask = wireMask(out.size);
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, (~state.recvBehavior(input.slot) + 1) & mask);
          },
        },
      },
    ];
  },
});
