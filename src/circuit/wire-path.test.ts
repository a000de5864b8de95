import { describe, it, expect } from 'vitest';
import { fragmentKey } from '../engine/wires/index.ts';
import { planWirePath, wirePathChange } from './wire-path.ts';

describe('planWirePath', () => {
  it('puts stubs at both ends of a short wire', () => {
    const wires = planWirePath([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
    ]);
    expect(wires).toEqual(
      new Map([
        [fragmentKey({ x: 0, y: 0 }, 'south'), 'stub'],
        [fragmentKey({ x: 0, y: 1 }, 'north'), 'stub'],
      ]),
    );
  });

  it('runs straight through inner cells', () => {
    const wires = planWirePath([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
    ]);
    expect(wires?.get(fragmentKey({ x: 1, y: 0 }, 'west'))).toBe('straight');
    expect(wires?.get(fragmentKey({ x: 1, y: 0 }, 'east'))).toBe('straight');
    expect(wires?.size).toBe(4);
  });

  it('turns left and right', () => {
    // east then north
    const left = planWirePath([
      { x: 0, y: 1 },
      { x: 1, y: 1 },
      { x: 1, y: 0 },
    ]);
    expect(left?.get(fragmentKey({ x: 1, y: 1 }, 'west'))).toBe('turnRight');
    expect(left?.get(fragmentKey({ x: 1, y: 1 }, 'north'))).toBe('turnLeft');

    // east then south
    const right = planWirePath([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
    ]);
    expect(right?.get(fragmentKey({ x: 1, y: 0 }, 'west'))).toBe('turnLeft');
    expect(right?.get(fragmentKey({ x: 1, y: 0 }, 'south'))).toBe('turnRight');
  });

  it('rejects paths it cannot draw', () => {
    expect(planWirePath([{ x: 0, y: 0 }])).toBeNull();
    expect(
      planWirePath([
        { x: 0, y: 0 },
        { x: 2, y: 0 },
      ]),
    ).toBeNull();
    expect(
      planWirePath([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 0, y: 0 },
      ]),
    ).toBeNull();
  });
});

describe('wirePathChange', () => {
  it('adds the planned fragments', () => {
    const change = wirePathChange([
      { x: 3, y: 3 },
      { x: 4, y: 3 },
    ]);
    expect(change?.kind).toBe('replaceWires');
    if (change?.kind === 'replaceWires') {
      expect(change.oldWires.size).toBe(0);
      expect(change.newWires.size).toBe(2);
    }
  });
});
