import { allEqual, atLeastSize, atMostSize, chipData, defineChip, deps, equal, exact, port } from '../framework.ts';
import { numBits, wireMask } from '../../wires/index.ts';

export const counterChip = defineChip({
  kind: 'Counter',
  category: 'memory',
  description: 'Register that can be set, incremented and decremented',
  data: () =>
    chipData(
      [
        port('Set', 'sink', 'event', 'south'),
        port('Inc', 'sink', 'event', 'north', { x: 1, y: 0 }),
        port('Dec', 'sink', 'event', 'south', { x: 1, y: 0 }),
        port('Out', 'source', 'behavior', 'north'),
      ],
      [equal(0, 3), exact(1, 'zero'), exact(2, 'zero')],
      deps([0, 3], [1, 3], [2, 3]),
      { width: 2, height: 1 },
    ),
  createEvals: (_type, { ports }) => {
    const [set, inc, dec, out] = ports;
    const mask = wireMask(out.size);
    let value = 0;
    return [
      {
        port: 3,
        evaluator: {
          eval(state) {
            const setValue = state.recvEvent(set.slot);
            if (setValue !== null) value = setValue;
            if (state.hasEvent(inc.slot)) value = (value + 1) & mask;
            if (state.hasEvent(dec.slot)) value = (value - 1) & mask;
            state.sendBehavior(out.slot, value);
          },
          displayData() {
            return [value];
          },
        },
      },
    ];
  },
});

/**
 * Ram: dual-ported memory. Each side has an address, a write event and a
 * read output. Writing the same address from both sides in one cycle is a
 * fatal error.
 */
export const ramChip = defineChip({
  kind: 'Ram',
  category: 'memory',
  description: 'Dual-ported random access memory',
  data: () =>
    chipData(
      [
        port('Addr1', 'sink', 'behavior', 'west'),
        port('Write1', 'sink', 'event', 'north'),
        port('Read1', 'source', 'behavior', 'west', { x: 0, y: 1 }),
        port('Addr2', 'sink', 'behavior', 'east', { x: 1, y: 1 }),
        port('Write2', 'sink', 'event', 'south', { x: 1, y: 1 }),
        port('Read2', 'source', 'behavior', 'east', { x: 1, y: 0 }),
      ],
      [
        atMostSize(0, 'eight'),
        atMostSize(3, 'eight'),
        atLeastSize(1, 'one'),
        atLeastSize(4, 'one'),
        equal(0, 3),
        ...allEqual(1, 2, 4, 5),
      ],
      deps([0, 2], [1, 2], [3, 2], [4, 2], [0, 5], [1, 5], [3, 5], [4, 5]),
      { width: 2, height: 2 },
    ),
  createEvals: (_type, { ports }) => {
    const [addr1, write1, read1, addr2, write2, read2] = ports;
    const memory = new Array<number>(1 << numBits(addr1.size)).fill(0);
    return [
      {
        port: 2,
        evaluator: {
          eval(state) {
            const a1 = state.recvBehavior(addr1.slot);
            const a2 = state.recvBehavior(addr2.slot);
            const v1 = state.recvEvent(write1.slot);
            const v2 = state.recvEvent(write2.slot);
            if (v1 !== null) memory[a1] = v1;
            if (v2 !== null) {
              if (v1 !== null && a1 === a2) {
                state.reportError(
                  state.fatalPortError(
                    write2.loc,
                    `Both ports wrote to address ${a2} in the same cycle`,
                  ),
                );
              } else {
                memory[a2] = v2;
              }
            }
            state.sendBehavior(read1.slot, memory[a1]);
            state.sendBehavior(read2.slot, memory[a2]);
          },
          displayData() {
            return memory;
          },
        },
      },
    ];
  },
});
