import { allEqual, atLeastSize, chipData, defineChip, deps, double, exact, port } from '../framework.ts';
import type { PortConstraint } from '../framework.ts';
import { compareWireSizes, minSizeForValue, numBits, wireMask } from '../../wires/index.ts';

export const constChip = defineChip({
  kind: 'Const',
  category: 'value',
  description: 'Outputs a fixed value',
  data: (type) => {
    const min = minSizeForValue(type.value);
    const constraints: PortConstraint[] =
      compareWireSizes(min, 'one') > 0 ? [atLeastSize(0, min)] : [];
    return chipData([port('Out', 'source', 'behavior', 'east')], constraints, []);
  },
  createEvals: (type, { ports }) => {
    const [out] = ports;
    return [
      {
        port: 0,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, type.value);
          },
        },
      },
    ];
  },
});

export const coerceChip = defineChip({
  kind: 'Coerce',
  category: 'value',
  description: 'Fixes the size of the wires on both sides',
  data: (type) =>
    chipData(
      [port('In', 'sink', 'behavior', 'west'), port('Out', 'source', 'behavior', 'east')],
      [exact(0, type.size), exact(1, type.size)],
      deps([0, 1]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, out] = ports;
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            state.sendBehavior(out.slot, state.recvBehavior(input.slot));
          },
        },
      },
    ];
  },
});

export const packChip = defineChip({
  kind: 'Pack',
  category: 'value',
  description: 'Joins a low half and a high half into one wider value',
  data: () =>
    chipData(
      [
        port('Lo', 'sink', 'behavior', 'west'),
        port('Hi', 'sink', 'behavior', 'north'),
        port('Out', 'source', 'behavior', 'east'),
      ],
      [...allEqual(0, 1), double(2, 0), double(2, 1)],
      deps([0, 2], [1, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [lo, hi, out] = ports;
    const bits = numBits(lo.size);
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            state.sendBehavior(
              out.slot,
              state.recvBehavior(lo.slot) | (state.recvBehavior(hi.slot) << bits),
            );
          },
        },
      },
    ];
  },
});

export const unpackChip = defineChip({
  kind: 'Unpack',
  category: 'value',
  description: 'Splits a value into its low half and high half',
  data: () =>
    chipData(
      [
        port('In', 'sink', 'behavior', 'west'),
        port('Lo', 'source', 'behavior', 'east'),
        port('Hi', 'source', 'behavior', 'north'),
      ],
      [...allEqual(1, 2), double(0, 1), double(0, 2)],
      deps([0, 1], [0, 2]),
    ),
  createEvals: (_type, { ports }) => {
    const [input, lo, hi] = ports;
    const bits = numBits(lo.size);
    const mask = wireMask(lo.size);
    return [
      {
        port: 1,
        evaluator: {
          eval(state) {
            const value = state.recvBehavior(input.slot);
            state.sendBehavior(lo.slot, value & mask);
            state.sendBehavior(hi.slot, (value >> bits) & mask);
          },
        },
      },
    ];
  },
});
