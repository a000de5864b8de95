export type { Coords, CoordsDelta, CoordsSize, CoordsRect } from './coords.ts';
export {
  coords,
  size,
  rect,
  rectWithSize,
  addDelta,
  scaleDelta,
  deltaBetween,
  coordsEqual,
  coordsKey,
  compareCoords,
  rectContains,
  rectContainsRect,
  rectsIntersect,
  rectsEqual,
  rectTopLeft,
  rectSize,
  rectCells,
} from './coords.ts';

export type { Direction } from './direction.ts';
export {
  DIRECTIONS,
  directionDelta,
  rotateCw,
  rotateCcw,
  oppositeDirection,
  flipVert,
  flipHorz,
  isVertical,
  directionIndex,
  directionChar,
  parseDirectionChar,
} from './direction.ts';

export type { Orientation, Rotation } from './orientation.ts';
export {
  IDENTITY_ORIENTATION,
  toRotation,
  orientation,
  orientationsEqual,
  orientDirection,
  orientSize,
  transformInSize,
  rotateOrientationCw,
  rotateOrientationCcw,
  flipOrientationVert,
  flipOrientationHorz,
  composeOrientations,
  invertOrientation,
  formatOrientation,
  parseOrientation,
} from './orientation.ts';

export type { Fixed } from './fixed.ts';
export {
  FIXED_LIMIT,
  FIXED_ZERO,
  FIXED_ONE,
  fixed,
  fixedFromRatio,
  fixedFromNumber,
  fixedToNumber,
  fixedAdd,
  fixedMul,
} from './fixed.ts';
