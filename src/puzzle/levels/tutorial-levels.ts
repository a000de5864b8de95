import type { CircuitState } from '../../engine/evaluation/circuit-state.ts';
import type { EvalError, InterfaceSlot, PuzzleEval } from '../../engine/evaluation/types.ts';
import type { ChipKind } from '../../engine/chips/chip-type.ts';
import type { PuzzleDefinition, PuzzleInterface } from '../types.ts';

// =============================================================================
// Two-input truth tables
// =============================================================================

const TRUTH_TABLE_CHIPS: readonly ChipKind[] = ['And', 'Or', 'Not', 'Xor'];

function truthTableInterfaces(outDescription: string): PuzzleInterface[] {
  return [
    {
      name: 'In1',
      description: 'First input (0 or 1).',
      side: 'west',
      position: { kind: 'center' },
      ports: [{ name: 'In1', description: '', flow: 'source', color: 'behavior', size: 'one' }],
    },
    {
      name: 'In2',
      description: 'Second input (0 or 1).',
      side: 'south',
      position: { kind: 'center' },
      ports: [{ name: 'In2', description: '', flow: 'source', color: 'behavior', size: 'one' }],
    },
    {
      name: 'Out',
      description: outDescription,
      side: 'east',
      position: { kind: 'center' },
      ports: [{ name: 'Out', description: '', flow: 'sink', color: 'behavior', size: 'one' }],
    },
  ];
}

function slotAt(slots: InterfaceSlot[][], iface: number): InterfaceSlot {
  const slot = slots[iface]?.[0];
  if (!slot) throw new Error(`Missing slot for interface ${iface}`);
  return slot;
}

/**
 * Feeds the four input combinations, one per time step, and checks the
 * output after each. Scored by wire length.
 */
function truthTableEval(op: (a: number, b: number) => number) {
  return (slots: InterfaceSlot[][]): PuzzleEval => {
    const in1 = slotAt(slots, 0);
    const in2 = slotAt(slots, 1);
    const out = slotAt(slots, 2);
    return {
      secondsPerTimeStep: () => 0.2,
      beginTimeStep(state: CircuitState) {
        if (state.timeStep >= 4) return { kind: 'wireLength' };
        state.sendBehavior(in1.slot, state.timeStep & 0x1);
        state.sendBehavior(in2.slot, (state.timeStep & 0x2) >> 1);
        return null;
      },
      endTimeStep(state: CircuitState): EvalError[] {
        const a = state.recvBehavior(in1.slot);
        const b = state.recvBehavior(in2.slot);
        const expected = op(a, b);
        const actual = state.recvBehavior(out.slot);
        if (actual === expected) return [];
        return [
          state.portError(
            out.loc,
            `Expected output ${expected} for inputs ${a} and ${b}, but output was ${actual}`,
          ),
        ];
      },
    };
  };
}

export const TUTORIAL_OR: PuzzleDefinition = {
  id: 'tutorial-or',
  title: 'OR Gate',
  description: 'Build a 1-bit OR gate out of AND and NOT chips.',
  kind: 'tutorial',
  initialBoundsSize: { width: 5, height: 5 },
  allowedChips: ['And', 'Not'],
  interfaces: truthTableInterfaces('Should be 1 if either input is 1.\nShould be 0 if both inputs are 0.'),
  createEval: truthTableEval((a, b) => a | b),
};

export const TUTORIAL_XOR: PuzzleDefinition = {
  id: 'tutorial-xor',
  title: 'XOR Gate',
  description: 'Build a 1-bit XOR gate.',
  kind: 'tutorial',
  initialBoundsSize: { width: 5, height: 5 },
  allowedChips: TRUTH_TABLE_CHIPS,
  interfaces: truthTableInterfaces('Should be 1 if exactly one input is 1.\nShould be 0 otherwise.'),
  createEval: truthTableEval((a, b) => a ^ b),
};
