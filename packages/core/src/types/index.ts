// packages/core/src/types -- barrel re-export

export type { EngineSettings, EngineConfig } from './config.js';
export type {
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
} from './flow.js';
export type {
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
} from './events.js';
