/** Simulation timing and limits */
export const SIMULATION_CONFIG = {
  /** Cycles allowed in one time step before the run is aborted */
  MAX_CYCLES_PER_TIME_STEP: 64,
  /** Puzzle default when it does not pick its own pace */
  DEFAULT_SECONDS_PER_TIME_STEP: 0.1,
  /** Upper bound on time steps run for a single elapsed-time advance */
  MAX_CATCHUP_TIME_STEPS: 10,
} as const;

/** Edit grid limits */
export const EDIT_CONFIG = {
  /** Largest width or height the bounds may take */
  MAX_BOUNDS_SIZE: 64,
} as const;
