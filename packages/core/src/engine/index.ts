// packages/core/src/engine -- Flow loading, loop activations and the frame-driven sequencer

export { EventBus, isEventOf } from './event-bus.js';
export type { EngineEventOf } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
export { SteppedFrameClock, RealtimeFrameClock } from './frame-clock.js';
export type { FrameClock } from './frame-clock.js';
export { createSeededRandom, permutation, systemRandom } from './random.js';
export type { RandomSource } from './random.js';
export { toBranchGuard, isBranchTaken } from './branch-guard.js';
export type { BranchGuard } from './branch-guard.js';
export { LoopActivation, toRepetitionCount } from './loop-node.js';
export type { LoopIteration, LoopPhase } from './loop-node.js';
export { RoutineActivation, activate } from './routine-activation.js';
export type {
  ActivationOptions,
  ActivationResult,
  FrameCallback,
  FrameSnapshot,
} from './routine-activation.js';
export { flowFileSchema, conditionRowsSchema, parseFlowDefinition } from './flow-schema.js';
export type { FlowFileInput, ParseFlowOptions } from './flow-schema.js';
export { FlowLoader, linearizeFlow, describeFlow } from './flow-loader.js';
export { FlowSequencer } from './flow-sequencer.js';
export type { FlowSequencerOptions, RunOptions, RunStatus, RunSummary } from './flow-sequencer.js';
