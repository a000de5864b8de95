/**
 * Chip types and their text form.
 *
 * Most chips carry no parameters. Const, Toggle and Coerce carry one,
 * written in parentheses: `Const(5)`, `Toggle(true)`, `Coerce(8)`.
 */

import type { WireSize } from '../wires/index.ts';
import { numBits, wireSizeFromBits } from '../wires/index.ts';

export const SIMPLE_CHIP_KINDS = [
  'Add',
  'Add2Bit',
  'And',
  'Break',
  'Button',
  'Clock',
  'Cmp',
  'CmpEq',
  'Counter',
  'Delay',
  'Demux',
  'Discard',
  'Display',
  'EggTimer',
  'Eq',
  'Filter',
  'Halve',
  'Inc',
  'Join',
  'Latest',
  'Mul',
  'Mul4Bit',
  'Mux',
  'Neg',
  'Not',
  'Or',
  'Pack',
  'Ram',
  'Sample',
  'Stopwatch',
  'Sub',
  'Unpack',
  'Xor',
  'AAdd',
  'AMul',
  'ACmp',
  'Relay',
] as const;

export type SimpleChipKind = (typeof SIMPLE_CHIP_KINDS)[number];

export interface SimpleChip {
  readonly kind: SimpleChipKind;
}

export interface ConstChip {
  readonly kind: 'Const';
  /** 0..0xffff */
  readonly value: number;
}

export interface ToggleChip {
  readonly kind: 'Toggle';
  readonly value: boolean;
}

export interface CoerceChip {
  readonly kind: 'Coerce';
  readonly size: WireSize;
}

export type ChipType = SimpleChip | ConstChip | ToggleChip | CoerceChip;
export type ChipKind = ChipType['kind'];

/** The chip type value for a given kind */
export type ChipTypeOf<K extends ChipKind> = K extends SimpleChipKind
  ? SimpleChip
  : Extract<ChipType, { kind: K }>;

export const COERCE_SIZES: readonly WireSize[] = ['one', 'two', 'four', 'eight', 'sixteen'];

// =============================================================================
// Construction
// =============================================================================

export function simpleChipType(kind: SimpleChipKind): SimpleChip {
  return { kind };
}

export function constChipType(value: number): ConstChip {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new Error(`Const value out of range: ${value}`);
  }
  return { kind: 'Const', value };
}

export function toggleChipType(value: boolean): ToggleChip {
  return { kind: 'Toggle', value };
}

export function coerceChipType(size: WireSize): CoerceChip {
  if (!COERCE_SIZES.includes(size)) {
    throw new Error(`Cannot coerce to ${size}`);
  }
  return { kind: 'Coerce', size };
}

export function isSimpleChipKind(kind: string): kind is SimpleChipKind {
  return SIMPLE_CHIP_KINDS.some((k) => k === kind);
}

export function chipTypesEqual(a: ChipType, b: ChipType): boolean {
  return formatChipType(a) === formatChipType(b);
}

// =============================================================================
// Text form
// =============================================================================

export function formatChipType(type: ChipType): string {
  switch (type.kind) {
    case 'Const':
      return `Const(${type.value})`;
    case 'Toggle':
      return `Toggle(${type.value})`;
    case 'Coerce':
      return `Coerce(${numBits(type.size)})`;
    default:
      return type.kind;
  }
}

const PARAM_PATTERN = /^([A-Za-z0-9]+)\((.*)\)$/;

/** Parse the text form; null for anything unrecognised */
export function parseChipType(text: string): ChipType | null {
  if (isSimpleChipKind(text)) return simpleChipType(text);
  const match = PARAM_PATTERN.exec(text);
  if (!match) return null;
  const [, name, arg] = match;
  switch (name) {
    case 'Const': {
      if (!/^\d+$/.test(arg)) return null;
      const value = Number(arg);
      return value <= 0xffff ? constChipType(value) : null;
    }
    case 'Toggle':
      if (arg === 'true') return toggleChipType(true);
      if (arg === 'false') return toggleChipType(false);
      return null;
    case 'Coerce': {
      if (!/^\d+$/.test(arg)) return null;
      const size = wireSizeFromBits(Number(arg));
      return size !== null && COERCE_SIZES.includes(size) ? coerceChipType(size) : null;
    }
    default:
      return null;
  }
}
