import type { PuzzleDefinition } from '../types.ts';
import { TUTORIAL_OR, TUTORIAL_XOR } from './tutorial-levels.ts';
import { SANDBOX_ANALOG, SANDBOX_BEHAVIOR, SANDBOX_EVENT } from './sandbox-levels.ts';

/** All available puzzles in order */
export const PUZZLE_LEVELS: PuzzleDefinition[] = [
  TUTORIAL_OR,
  TUTORIAL_XOR,
  SANDBOX_BEHAVIOR,
  SANDBOX_EVENT,
  SANDBOX_ANALOG,
];

/** Look up a puzzle by its ID. Returns undefined if not found. */
export function getPuzzleById(id: string): PuzzleDefinition | undefined {
  return PUZZLE_LEVELS.find((p) => p.id === id);
}

/** Host-supplied check for whether the player may open a puzzle */
export type PuzzleUnlockPredicate = (puzzle: PuzzleDefinition) => boolean;

/** Puzzles the host reports as unlocked, in catalog order */
export function unlockedPuzzles(isUnlocked: PuzzleUnlockPredicate): PuzzleDefinition[] {
  return PUZZLE_LEVELS.filter((p) => isUnlocked(p));
}
