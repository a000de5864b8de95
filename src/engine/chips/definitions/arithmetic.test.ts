import { describe, it, expect } from 'vitest';
import { mountChip } from '../testing.ts';
import { simpleChipType } from '../chip-type.ts';
import type { SimpleChipKind } from '../chip-type.ts';

function binary(kind: SimpleChipKind, a: number, b: number): number {
  const chip = mountChip(simpleChipType(kind));
  chip.state.sendBehavior(0, a);
  chip.state.sendBehavior(1, b);
  chip.evaluate();
  return chip.state.recvBehavior(2);
}

describe('Add / Sub / Mul', () => {
  it('Add wraps at the wire size', () => {
    expect(binary('Add', 20, 30)).toBe(50);
    expect(binary('Add', 200, 100)).toBe(44);
  });

  it('Sub is the absolute difference', () => {
    expect(binary('Sub', 10, 3)).toBe(7);
    expect(binary('Sub', 3, 10)).toBe(7);
  });

  it('Mul wraps at the wire size', () => {
    expect(binary('Mul', 6, 7)).toBe(42);
    expect(binary('Mul', 20, 20)).toBe(144);
  });
});

describe('Add2Bit / Mul4Bit', () => {
  it('Add2Bit splits the sum into low bits and carry', () => {
    const chip = mountChip(simpleChipType('Add2Bit'));
    expect(chip.ports.map((p) => p.size)).toEqual(['two', 'two', 'two', 'two']);
    chip.state.sendBehavior(0, 3);
    chip.state.sendBehavior(1, 3);
    chip.evaluate();
    expect(chip.state.recvBehavior(2)).toBe(2);
    expect(chip.state.recvBehavior(3)).toBe(1);
  });

  it('Mul4Bit splits the product into low and high nibbles', () => {
    const chip = mountChip(simpleChipType('Mul4Bit'));
    chip.state.sendBehavior(0, 15);
    chip.state.sendBehavior(1, 15);
    chip.evaluate();
    expect(chip.state.recvBehavior(2)).toBe(1);
    expect(chip.state.recvBehavior(3)).toBe(14);
  });
});

describe('Halve / Neg', () => {
  it('Halve shifts right by one', () => {
    const chip = mountChip(simpleChipType('Halve'));
    chip.state.sendBehavior(0, 7);
    chip.evaluate();
    expect(chip.state.recvBehavior(1)).toBe(3);
  });

  it("Neg is the two's complement at the wire size", () => {
    const chip = mountChip(simpleChipType('Neg'), ['four', 'four']);
    chip.state.sendBehavior(0, 3);
    chip.evaluate();
    expect(chip.state.recvBehavior(1)).toBe(13);
  });

  it('Neg of zero is zero', () => {
    const chip = mountChip(simpleChipType('Neg'), ['four', 'four']);
    chip.evaluate();
    expect(chip.state.recvBehavior(1)).toBe(0);
  });
});
