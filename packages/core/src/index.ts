// @trialflow/core - Frame-driven experiment flow engine

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  EngineSettings,
  EngineConfig,
  // Flow
  Value,
  LoopType,
  UpdatesPolicy,
  ComponentKind,
  StartCondition,
  StopCondition,
  ParameterSource,
  ParameterDefinition,
  ComponentDefinition,
  RoutineDefinition,
  ConditionRow,
  LoopDefinition,
  FlowEntry,
  FlowDefinition,
  RoutineNode,
  LoopNode,
  FlowNode,
  ResolvedFlow,
  // Events
  RunStartedEvent,
  RunCompletedEvent,
  RunAbortedEvent,
  RunFailedEvent,
  LoopEnteredEvent,
  LoopIterationEvent,
  LoopExitedEvent,
  BranchResolvedEvent,
  RoutineEndReason,
  RoutineStartedEvent,
  RoutineEndedEvent,
  ComponentStartedEvent,
  ComponentStoppedEvent,
  FrameEvent,
  EngineEvent,
} from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  ConfigurationError,
  UnresolvedNameError,
  EvaluationError,
  createLogger,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_FRAME_RATE,
  DEFAULT_MAX_ROUTINE_DURATION,
  CONFIG_FILENAME,
  EXPRESSION_PREFIX,
  TIME_TOLERANCE,
} from './utils/constants.js';

// Configuration
export { DEFAULT_CONFIG, engineConfigSchema, validateConfig, loadConfig, deepMerge } from './config/index.js';
export type { EngineConfigInput, ConfigOverrides } from './config/index.js';

// Variables and expressions
export { VariableEnvironment } from './environment/index.js';
export {
  tokenize,
  parseExpression,
  parseStatements,
  compile,
  compileStatements,
  evaluate,
  executeStatements,
  isTruthy,
  formatValue,
  BUILTINS,
} from './expression/index.js';
export type { CompiledExpression, CompiledStatements, Expr, Statement } from './expression/index.js';

// Devices
export { ResponseDevice, LoggingListener, DeviceManager } from './devices/index.js';
export type { DeviceResponse, ResponseListener } from './devices/index.js';

// Components
export {
  ComponentInstance,
  instantiateComponent,
  createBehavior,
  InputBehavior,
  CodeBehavior,
} from './components/index.js';
export type {
  Capability,
  ComponentBehavior,
  ComponentContext,
  DrawCommand,
  ParameterValues,
} from './components/index.js';

// Engine (Flow + Execution)
export {
  EventBus,
  isEventOf,
  CancellationToken,
  CancellationError,
  SteppedFrameClock,
  RealtimeFrameClock,
  createSeededRandom,
  permutation,
  systemRandom,
  toBranchGuard,
  isBranchTaken,
  LoopActivation,
  toRepetitionCount,
  RoutineActivation,
  activate,
  flowFileSchema,
  parseFlowDefinition,
  FlowLoader,
  linearizeFlow,
  describeFlow,
  FlowSequencer,
} from './engine/index.js';
export type {
  EngineEventOf,
  FrameClock,
  RandomSource,
  BranchGuard,
  LoopIteration,
  LoopPhase,
  ActivationOptions,
  ActivationResult,
  FrameCallback,
  FrameSnapshot,
  FlowFileInput,
  ParseFlowOptions,
  FlowSequencerOptions,
  RunOptions,
  RunStatus,
  RunSummary,
} from './engine/index.js';
