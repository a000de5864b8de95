/**
 * Circuit Evaluator
 *
 * Drives a built circuit through subcycles, cycles and time steps. A
 * subcycle runs one scheduling group; a cycle runs every group once; a
 * time step repeats cycles while any chip or the puzzle asks for another.
 */

import type { Coords } from '../../shared/geom/index.ts';
import { coordsEqual, coordsKey } from '../../shared/geom/index.ts';
import { SIMULATION_CONFIG } from '../../shared/constants/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import type { ChipEval } from '../chips/framework.ts';
import type { CircuitProgram } from '../graph/eval-builder.ts';
import { CircuitState } from './circuit-state.ts';
import type {
  EvalError,
  EvalScore,
  PortLoc,
  PuzzleEval,
  ScoreReporter,
  SimulationPrefs,
  StepOutcome,
} from './types.ts';
import { CONTINUE, FAILURE } from './types.ts';

const log = createLogger('Eval');

export interface CircuitEvalOptions {
  program: CircuitProgram;
  puzzle: PuzzleEval;
  prefs?: SimulationPrefs;
  puzzleId?: string;
  scoreReporter?: ScoreReporter;
}

export class CircuitEval {
  private readonly program: CircuitProgram;
  private readonly groups: ChipEval[][];
  private readonly puzzle: PuzzleEval;
  private readonly state: CircuitState;
  private readonly maxCycles: number;
  private readonly puzzleId: string | null;
  private readonly scoreReporter: ScoreReporter | null;

  private currentSubcycle = 0;
  private currentTotalCycles = 0;
  private readonly recordedErrors: EvalError[] = [];
  private finalScore: number | null = null;
  private terminal: StepOutcome | null = null;

  constructor(options: CircuitEvalOptions) {
    this.program = options.program;
    this.groups = options.program.groups;
    this.puzzle = options.puzzle;
    this.state = new CircuitState(options.program.slots);
    this.maxCycles = options.prefs?.maxCyclesPerTimeStep ?? SIMULATION_CONFIG.MAX_CYCLES_PER_TIME_STEP;
    this.puzzleId = options.puzzleId ?? null;
    this.scoreReporter = options.scoreReporter ?? null;
  }

  // ===========================================================================
  // Progress
  // ===========================================================================

  get timeStep(): number {
    return this.state.timeStep;
  }

  get cycle(): number {
    return this.state.cycle;
  }

  get subcycle(): number {
    return this.currentSubcycle;
  }

  get totalCycles(): number {
    return this.currentTotalCycles;
  }

  get errors(): readonly EvalError[] {
    return this.recordedErrors;
  }

  /** True once the puzzle has scored the run */
  get isCompleted(): boolean {
    return this.finalScore !== null;
  }

  get score(): number | null {
    return this.finalScore;
  }

  /** The outcome every further step returns, once the run is over */
  get finished(): StepOutcome | null {
    return this.terminal;
  }

  get wireLength(): number {
    return this.program.wireLength;
  }

  secondsPerTimeStep(): number {
    return this.puzzle.secondsPerTimeStep();
  }

  // ===========================================================================
  // Inspection and interaction
  // ===========================================================================

  slotValue(slot: number): number {
    return this.state.recvBehavior(slot);
  }

  slotEvent(slot: number): number | null {
    return this.state.recvEvent(slot);
  }

  /** The slot written by the output port at `loc` */
  slotDrivenBy(loc: PortLoc): number | null {
    const index = this.program.slots.findIndex(
      (s) => s.source !== null && coordsEqual(s.source.coords, loc.coords) && s.source.dir === loc.dir,
    );
    return index < 0 ? null : index;
  }

  /** Route a press to the chip whose top-left cell is `coords` */
  pressButton(coords: Coords, sublocation: number, times: number): boolean {
    const entry = this.program.chips.get(coordsKey(coords));
    if (!entry) return false;
    let handled = false;
    for (const evaluator of entry.evaluators) {
      if (evaluator.onPress) {
        evaluator.onPress(sublocation, times);
        handled = true;
      }
    }
    return handled;
  }

  displayData(coords: Coords): readonly number[] | null {
    const entry = this.program.chips.get(coordsKey(coords));
    if (!entry) return null;
    for (const evaluator of entry.evaluators) {
      if (evaluator.displayData) return evaluator.displayData(this.state);
    }
    return null;
  }

  // ===========================================================================
  // Stepping
  // ===========================================================================

  stepSubcycle(): StepOutcome {
    if (this.terminal) return this.terminal;
    return this.runSubcycle();
  }

  stepCycle(): StepOutcome {
    const timeStep = this.state.timeStep;
    const cycle = this.state.cycle;
    while (!this.terminal && this.state.timeStep === timeStep && this.state.cycle === cycle) {
      const outcome = this.runSubcycle();
      if (outcome.kind !== 'continue') return outcome;
    }
    return this.terminal ?? CONTINUE;
  }

  stepTimeStep(): StepOutcome {
    const timeStep = this.state.timeStep;
    while (!this.terminal && this.state.timeStep === timeStep) {
      const outcome = this.runSubcycle();
      if (outcome.kind !== 'continue') return outcome;
    }
    return this.terminal ?? CONTINUE;
  }

  private runSubcycle(): StepOutcome {
    const state = this.state;
    state.resetForSubcycle();
    while (!state.changed) {
      if (state.cycle === 0 && this.currentSubcycle === 0) {
        const score = this.puzzle.beginTimeStep(state);
        if (score !== null) return this.finishRun(score);
      }

      if (this.currentSubcycle >= this.groups.length) {
        return this.finishCycle();
      }

      for (const evaluator of this.groups[this.currentSubcycle]) {
        evaluator.eval(state);
      }
      this.currentSubcycle += 1;

      if (this.recordErrors(state.takeErrors())) return this.fail();
      const breakpoints = state.takeBreakpoints();
      if (breakpoints.length > 0) {
        log.debug('Breakpoint', { count: breakpoints.length });
        return { kind: 'breakpoint', coords: breakpoints };
      }
    }
    return CONTINUE;
  }

  private finishCycle(): StepOutcome {
    const state = this.state;
    let needsAnotherCycle = false;
    for (const group of this.groups) {
      for (const evaluator of group) {
        if (evaluator.needsAnotherCycle?.(state)) needsAnotherCycle = true;
      }
    }
    if (this.recordErrors(this.puzzle.endCycle?.(state) ?? [])) return this.fail();
    if (this.puzzle.needsAnotherCycle?.(state)) needsAnotherCycle = true;

    if (needsAnotherCycle && state.cycle + 1 >= this.maxCycles) {
      this.recordedErrors.push(state.fatalError(`Exceeded ${this.maxCycles} cycles`));
      return this.fail();
    }

    this.currentSubcycle = 0;
    state.cycle += 1;
    this.currentTotalCycles += 1;

    if (needsAnotherCycle) {
      state.resetForCycle();
      this.puzzle.beginAdditionalCycle?.(state);
      return CONTINUE;
    }

    if (this.recordErrors(this.puzzle.endTimeStep(state))) return this.fail();
    for (const group of this.groups) {
      for (const evaluator of group) {
        evaluator.onTimeStep?.();
      }
    }
    log.debug('Time step complete', { timeStep: state.timeStep, cycles: state.cycle });
    state.resetForCycle();
    state.cycle = 0;
    state.timeStep += 1;
    return CONTINUE;
  }

  /** Returns true when any of the errors is fatal */
  private recordErrors(errors: readonly EvalError[]): boolean {
    this.recordedErrors.push(...errors);
    return errors.some((e) => e.fatal);
  }

  private fail(): StepOutcome {
    this.terminal = FAILURE;
    return FAILURE;
  }

  private finishRun(score: EvalScore): StepOutcome {
    if (this.recordedErrors.length > 0) {
      log.debug('Run finished with errors', { errors: this.recordedErrors.length });
      return this.fail();
    }
    const value = this.scoreValue(score);
    this.finalScore = value;
    this.terminal = { kind: 'victory', score: value };
    if (this.puzzleId !== null && this.scoreReporter) {
      this.scoreReporter.reportScore(this.puzzleId, value);
    }
    return this.terminal;
  }

  private scoreValue(score: EvalScore): number {
    switch (score.kind) {
      case 'cycles':
        return this.currentTotalCycles;
      case 'value':
        return score.value;
      case 'wireLength':
        return this.program.wireLength;
    }
  }
}
