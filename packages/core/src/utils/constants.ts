// packages/core/src/utils/constants.ts -- Shared engine constants

/** Default rendering ticks per second */
export const DEFAULT_FRAME_RATE = 60;

/** Routine duration cap in seconds (0 = unbounded) */
export const DEFAULT_MAX_ROUTINE_DURATION = 0;

/** Config file looked up in the working directory */
export const CONFIG_FILENAME = '.trialflow.yml';

/** Prefix marking a string parameter value as an expression */
export const EXPRESSION_PREFIX = '$';

/** Suffixes of the counters every active loop publishes */
export const LOOP_COUNTER_THIS_N = 'thisN';
export const LOOP_COUNTER_N_TOTAL = 'nTotal';
export const LOOP_COUNTER_THIS_REP_N = 'thisRepN';

/** Largest seed a seeded random source takes (unsigned 32-bit) */
export const MAX_SEED = 0xffffffff;

/** Slack, in seconds, when comparing clock times against start/stop values */
export const TIME_TOLERANCE = 1e-6;
