// packages/core/src/types/events.ts

/**
 * Events emitted by the sequencer while a flow runs.
 * Consumed by the CLI renderer and by external draw/log collaborators.
 */

// -- Run lifecycle --
export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  flow: string;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  routineActivations: number;
  loopIterations: number;
  frames: number;
  durationSec: number;
  timestamp: string;
}

export interface RunAbortedEvent {
  type: 'run.aborted';
  runId: string;
  reason: string;
  timestamp: string;
}

export interface RunFailedEvent {
  type: 'run.failed';
  runId: string;
  error: string;
  errorName: string;
  timestamp: string;
}

// -- Loops --
export interface LoopEnteredEvent {
  type: 'loop.entered';
  loop: string;
  nTotal: number;
  order: number[];
  timestamp: string;
}

export interface LoopIterationEvent {
  type: 'loop.iteration';
  loop: string;
  thisN: number;
  thisRepN: number;
  nTotal: number;
  timestamp: string;
}

export interface LoopExitedEvent {
  type: 'loop.exited';
  loop: string;
  iterations: number;
  timestamp: string;
}

export interface BranchResolvedEvent {
  type: 'branch.resolved';
  loop: string;
  taken: boolean;
  timestamp: string;
}

// -- Routines and components --
export type RoutineEndReason = 'completed' | 'forced' | 'timeout' | 'aborted';

export interface RoutineStartedEvent {
  type: 'routine.started';
  routine: string;
  activation: number;
  timestamp: string;
}

export interface RoutineEndedEvent {
  type: 'routine.ended';
  routine: string;
  frames: number;
  durationSec: number;
  reason: RoutineEndReason;
  timestamp: string;
}

export interface ComponentStartedEvent {
  type: 'component.started';
  routine: string;
  component: string;
  t: number;
  timestamp: string;
}

export interface ComponentStoppedEvent {
  type: 'component.stopped';
  routine: string;
  component: string;
  t: number;
  timestamp: string;
}

// -- Per-tick --
export interface FrameEvent {
  type: 'frame';
  routine: string;
  frame: number;
  t: number;
  live: string[];
}

export type EngineEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunAbortedEvent
  | RunFailedEvent
  | LoopEnteredEvent
  | LoopIterationEvent
  | LoopExitedEvent
  | BranchResolvedEvent
  | RoutineStartedEvent
  | RoutineEndedEvent
  | ComponentStartedEvent
  | ComponentStoppedEvent
  | FrameEvent;
