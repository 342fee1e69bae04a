// packages/core/src/components/component.ts

import type { DeviceManager } from '../devices/device-manager.js';
import type { VariableEnvironment } from '../environment/variable-environment.js';
import type { ComponentKind, Value } from '../types/flow.js';

export type Capability = 'drawable' | 'listenable' | 'computational';

export type ParameterValues = Readonly<Record<string, Value>>;

/** What a hook sees during one routine activation. */
export interface ComponentContext {
  readonly env: VariableEnvironment;
  readonly devices: DeviceManager;
  readonly routine: string;
  readonly component: string;
  /** Seconds since the activation started. */
  readonly t: number;
  /** Run clock time, in seconds. */
  readonly clockTime: number;
  /** Frames since the activation started. */
  readonly frame: number;
  /** Run clock time the component went live; undefined while waiting. */
  readonly liveSince?: number;
  readonly params: ParameterValues;
  /** Ask the routine to end after the current tick. */
  endRoutine(): void;
}

/**
 * Shared capability interface of every component variant. Hooks are
 * optional; a missing hook is a no-op.
 */
export interface ComponentBehavior {
  readonly kind: ComponentKind;
  readonly capabilities: ReadonlySet<Capability>;
  /** Accepted parameter names with their default values. */
  readonly defaults: ParameterValues;
  /** Once per run, before the first flow entry. */
  onRunStart?(env: VariableEnvironment): void;
  /** Once per activation, before any component starts. */
  onRoutineBegin?(ctx: ComponentContext): void;
  onStart?(ctx: ComponentContext): void;
  onFrame?(ctx: ComponentContext): void;
  onStop?(ctx: ComponentContext): void;
  /** Once per activation, after every component stopped. */
  onRoutineEnd?(ctx: ComponentContext): void;
  /** Payload handed to the renderer each tick while live. */
  draw?(params: ParameterValues): Record<string, Value>;
}

export interface DrawCommand {
  component: string;
  kind: ComponentKind;
  params: Record<string, Value>;
}
