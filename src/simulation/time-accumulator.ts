import { SIMULATION_CONFIG } from '../shared/constants/index.ts';

/**
 * Turns elapsed wall-clock time into whole time steps.
 *
 * Leftover time carries into the next advance. When one advance hits the
 * catch-up cap, the excess is dropped so a long pause does not replay as a
 * burst of steps.
 */
export class TimeAccumulator {
  private accumulated = 0;
  private readonly maxSteps: number;

  constructor(maxSteps: number = SIMULATION_CONFIG.MAX_CATCHUP_TIME_STEPS) {
    this.maxSteps = maxSteps;
  }

  /** Seconds carried towards the next time step */
  get pending(): number {
    return this.accumulated;
  }

  advance(elapsedSeconds: number, secondsPerTimeStep: number): number {
    if (elapsedSeconds <= 0 || secondsPerTimeStep <= 0) return 0;
    this.accumulated += elapsedSeconds;

    let steps = 0;
    while (this.accumulated >= secondsPerTimeStep && steps < this.maxSteps) {
      this.accumulated -= secondsPerTimeStep;
      steps++;
    }
    if (steps >= this.maxSteps) {
      this.accumulated = 0;
    }
    return steps;
  }

  reset(): void {
    this.accumulated = 0;
  }
}
