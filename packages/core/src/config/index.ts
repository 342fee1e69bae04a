// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { engineConfigSchema, validateConfig } from './schema.js';
export type { EngineConfigInput } from './schema.js';
export { loadConfig, deepMerge } from './loader.js';
export type { ConfigOverrides } from './loader.js';
