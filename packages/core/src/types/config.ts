// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface EngineSettings {
  frameRate: number;
  maxRoutineDuration: number;
  seed: number | null;
}

export interface EngineConfig {
  engine: EngineSettings;
  advanced: {
    logLevel: LogLevel;
  };
}
