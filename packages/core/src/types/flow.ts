// packages/core/src/types/flow.ts

/**
 * Values that live in the variable environment and flow through expressions.
 */
export type Value = number | string | boolean | null | Value[] | { [key: string]: Value };

export type LoopType = 'sequential' | 'random';

export type UpdatesPolicy = 'never' | 'constant' | 'set every repeat' | 'set every frame';

export type ComponentKind = 'shape' | 'text' | 'progress' | 'input' | 'code';

export type StartCondition =
  | { type: 'time'; value: number }
  | { type: 'frame'; value: number }
  | { type: 'condition'; expression: string }
  | { type: 'none' };

export type StopCondition =
  | { type: 'duration'; value: number }
  | { type: 'time'; value: number }
  | { type: 'frames'; value: number }
  | { type: 'condition'; expression: string };

export type ParameterSource =
  | { type: 'literal'; value: Value }
  | { type: 'expression'; source: string };

export interface ParameterDefinition {
  name: string;
  source: ParameterSource;
  updates: UpdatesPolicy;
}

export interface ComponentDefinition {
  kind: ComponentKind;
  name: string;
  start: StartCondition;
  /** Absent: live until the routine ends. */
  stop?: StopCondition;
  updates: UpdatesPolicy;
  parameters: ParameterDefinition[];
}

export interface RoutineDefinition {
  name: string;
  components: ComponentDefinition[];
  /** Seconds after which the activation is forced to end. */
  maxDuration?: number;
}

export type ConditionRow = Record<string, Value>;

export interface LoopDefinition {
  name: string;
  loopType: LoopType;
  /** Repetition-count expression; may be absent on trial loops with a condition table. */
  nReps?: string;
  seed?: number;
  isTrials: boolean;
  /** Loop used as an if: its count must resolve to 0 or 1. */
  branch: boolean;
  conditions?: ConditionRow[];
}

/** One record of the serialized flow, in execution order. */
export type FlowEntry =
  | { type: 'routine'; routine: string }
  | { type: 'loopStart'; loop: LoopDefinition }
  | { type: 'loopEnd'; name: string };

/**
 * A flow as parsed from YAML/JSON: entries are still flat and unchecked
 * for bracket structure.
 */
export interface FlowDefinition {
  name: string;
  description?: string;
  variables: Record<string, Value>;
  routines: Record<string, RoutineDefinition>;
  entries: FlowEntry[];
}

export interface RoutineNode {
  kind: 'routine';
  routine: RoutineDefinition;
}

export interface LoopNode {
  kind: 'loop';
  loop: LoopDefinition;
  body: FlowNode[];
}

export type FlowNode = RoutineNode | LoopNode;

/**
 * Linearized flow: loop brackets resolved into a tree.
 * The sequencer works with this, not the raw definition.
 */
export interface ResolvedFlow {
  name: string;
  variables: Record<string, Value>;
  nodes: FlowNode[];
  entries: FlowEntry[];
}
