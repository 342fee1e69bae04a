// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export { ConfigError, ConfigurationError, UnresolvedNameError, EvaluationError } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
