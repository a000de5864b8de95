export type {
  InterfacePosition,
  InterfacePort,
  PuzzleInterface,
  PuzzleKind,
  PuzzleDefinition,
} from './types.ts';
export {
  interfaceTopLeft,
  interfaceSize,
  interfacePorts,
  minBoundsSize,
  boundsFitInterfaces,
} from './interface.ts';
export { PUZZLE_LEVELS, getPuzzleById, unlockedPuzzles } from './levels/index.ts';
export type { PuzzleUnlockPredicate } from './levels/index.ts';
export { TUTORIAL_OR, TUTORIAL_XOR } from './levels/tutorial-levels.ts';
export { SANDBOX_ANALOG, SANDBOX_BEHAVIOR, SANDBOX_EVENT } from './levels/sandbox-levels.ts';
