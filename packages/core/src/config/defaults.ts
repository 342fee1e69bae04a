// packages/core/src/config/defaults.ts

import type { EngineConfig } from '../types/config.js';
import { DEFAULT_FRAME_RATE, DEFAULT_MAX_ROUTINE_DURATION } from '../utils/constants.js';

export const DEFAULT_CONFIG: EngineConfig = {
  engine: {
    frameRate: DEFAULT_FRAME_RATE,
    maxRoutineDuration: DEFAULT_MAX_ROUTINE_DURATION,
    seed: null,
  },
  advanced: {
    logLevel: 'info',
  },
};
