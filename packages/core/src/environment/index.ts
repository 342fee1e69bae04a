// packages/core/src/environment -- per-run variable store

export { VariableEnvironment } from './variable-environment.js';
