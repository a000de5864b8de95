export { andChip, orChip, xorChip, notChip, muxChip } from './logic.ts';
export { addChip, subChip, mulChip, add2BitChip, mul4BitChip, halveChip, negChip } from './arithmetic.ts';
export { cmpChip, cmpEqChip, eqChip } from './comparison.ts';
export { constChip, coerceChip, packChip, unpackChip } from './value.ts';
export { sampleChip, latestChip, discardChip, joinChip, demuxChip, filterChip, incChip } from './events.ts';
export { delayChip, clockChip, eggTimerChip, stopwatchChip } from './timing.ts';
export { counterChip, ramChip } from './memory.ts';
export { breakChip, buttonChip, toggleChip, displayChip } from './debug.ts';
export { aAddChip, aMulChip, aCmpChip, relayChip } from './analog.ts';
