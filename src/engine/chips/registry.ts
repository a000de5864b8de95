/**
 * Chip Registry
 *
 * Central registry of all chip definitions.
 * Auto-generates lookups by kind and category.
 */

import type { CoordsSize, Orientation } from '../../shared/geom/index.ts';
import type { ChipCategory, ChipData, ChipDefinition } from './framework.ts';
import { placedSize } from './framework.ts';
import type { ChipKind, ChipType } from './chip-type.ts';
import {
  andChip,
  orChip,
  xorChip,
  notChip,
  muxChip,
  addChip,
  subChip,
  mulChip,
  add2BitChip,
  mul4BitChip,
  halveChip,
  negChip,
  cmpChip,
  cmpEqChip,
  eqChip,
  constChip,
  coerceChip,
  packChip,
  unpackChip,
  sampleChip,
  latestChip,
  discardChip,
  joinChip,
  demuxChip,
  filterChip,
  incChip,
  delayChip,
  clockChip,
  eggTimerChip,
  stopwatchChip,
  counterChip,
  ramChip,
  breakChip,
  buttonChip,
  toggleChip,
  displayChip,
  aAddChip,
  aMulChip,
  aCmpChip,
  relayChip,
} from './definitions/index.ts';

// =============================================================================
// Chip Definitions Array (Single Source of Truth)
// =============================================================================

/**
 * All chip definitions.
 * To add a new chip: import it and add it to this array.
 */
const CHIP_DEFINITIONS: readonly ChipDefinition[] = [
  constChip,
  coerceChip,
  packChip,
  unpackChip,
  notChip,
  andChip,
  orChip,
  xorChip,
  muxChip,
  addChip,
  subChip,
  mulChip,
  add2BitChip,
  mul4BitChip,
  halveChip,
  negChip,
  cmpChip,
  cmpEqChip,
  eqChip,
  sampleChip,
  latestChip,
  discardChip,
  joinChip,
  demuxChip,
  filterChip,
  incChip,
  delayChip,
  clockChip,
  eggTimerChip,
  stopwatchChip,
  counterChip,
  ramChip,
  breakChip,
  buttonChip,
  toggleChip,
  displayChip,
  aAddChip,
  aMulChip,
  aCmpChip,
  relayChip,
];

// =============================================================================
// Derived Lookups (Computed Once at Startup)
// =============================================================================

/** Lookup by kind */
const byKind = new Map<ChipKind, ChipDefinition>(CHIP_DEFINITIONS.map((def) => [def.kind, def]));

/** Lookup by category */
const byCategory = CHIP_DEFINITIONS.reduce<Partial<Record<ChipCategory, ChipDefinition[]>>>(
  (acc, def) => {
    (acc[def.category] ??= []).push(def);
    return acc;
  },
  {},
);

/** All kind strings */
const allKinds = CHIP_DEFINITIONS.map((def) => def.kind);

// =============================================================================
// Public API
// =============================================================================

/**
 * Chip registry providing lookups and utilities.
 */
export const chipRegistry = {
  byKind,
  byCategory,
  allKinds,
  all: CHIP_DEFINITIONS,
} as const;

export function getChipDefinition(type: ChipType): ChipDefinition {
  const def = byKind.get(type.kind);
  if (!def) {
    throw new Error(`No chip definition for ${type.kind}`);
  }
  return def;
}

export function chipDataFor(type: ChipType): ChipData {
  return getChipDefinition(type).data(type);
}

/** Footprint of the chip as placed with the given orientation */
export function chipSizeFor(type: ChipType, orient: Orientation): CoordsSize {
  return placedSize(chipDataFor(type), orient);
}

export function chipsInCategory(category: ChipCategory): readonly ChipDefinition[] {
  return byCategory[category] ?? [];
}

/**
 * Category labels for UI display.
 */
export const CATEGORY_LABELS: Record<ChipCategory, string> = {
  value: 'Value',
  logic: 'Logic',
  arithmetic: 'Arithmetic',
  comparison: 'Comparison',
  event: 'Event',
  timing: 'Timing',
  memory: 'Memory',
  analog: 'Analog',
  debug: 'Debug',
};
