/**
 * Puzzle fixtures for tests.
 */

import type { PuzzleEval } from '../engine/evaluation/types.ts';
import type { PuzzleDefinition } from './types.ts';

/** A puzzle evaluator that never ends the run and checks nothing */
export const IDLE_EVAL: PuzzleEval = {
  secondsPerTimeStep: () => 0.1,
  beginTimeStep: () => null,
  endTimeStep: () => [],
};

/** A 6×4 puzzle with no interfaces and every chip allowed */
export function blankPuzzle(overrides: Partial<PuzzleDefinition> = {}): PuzzleDefinition {
  return {
    id: 'test-blank',
    title: 'Blank',
    description: 'Test board',
    kind: 'sandbox',
    initialBoundsSize: { width: 6, height: 4 },
    interfaces: [],
    createEval: () => IDLE_EVAL,
    ...overrides,
  };
}
