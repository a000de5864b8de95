export type { WireSize } from './wire-size.ts';
export {
  WIRE_SIZES,
  DIGITAL_WIRE_SIZES,
  wireSizeRank,
  compareWireSizes,
  maxWireSize,
  minWireSize,
  numBits,
  wireMask,
  halfSize,
  doubleSize,
  minSizeForValue,
  wireSizeFromBits,
} from './wire-size.ts';

export type { WireSizeInterval } from './wire-size-interval.ts';
export {
  FULL_INTERVAL,
  EMPTY_INTERVAL,
  exactly,
  atLeast,
  atMost,
  isEmptyInterval,
  isAmbiguousInterval,
  intersectIntervals,
  intervalsEqual,
  halveInterval,
  doubleInterval,
  formatInterval,
} from './wire-size-interval.ts';

export type { WireShape, PartnerFragment } from './wire-shape.ts';
export {
  WIRE_SHAPES,
  connectedDirections,
  partnerFragments,
  wireShapeName,
  parseWireShapeName,
} from './wire-shape.ts';

export type { FragmentLoc, WireMap } from './fragment.ts';
export {
  fragmentLoc,
  fragmentKey,
  locKey,
  parseFragmentKey,
  neighborLoc,
  compareFragmentLocs,
  sortedFragments,
  findInconsistentFragments,
} from './fragment.ts';
