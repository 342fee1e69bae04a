// packages/core/src/engine/routine-activation.ts

import type { ComponentContext, DrawCommand } from '../components/component.js';
import type { ComponentInstance } from '../components/component-instance.js';
import type { DeviceManager } from '../devices/device-manager.js';
import type { VariableEnvironment } from '../environment/variable-environment.js';
import { isTruthy } from '../expression/evaluator.js';
import type { RoutineEndReason } from '../types/events.js';
import type { RoutineDefinition } from '../types/flow.js';
import { TIME_TOLERANCE } from '../utils/constants.js';
import type { EventBus } from './event-bus.js';

type ComponentStatus = 'waiting' | 'live' | 'finished' | 'never';

interface ComponentRun {
  instance: ComponentInstance;
  status: ComponentStatus;
  liveSince?: number;
  liveFrames: number;
}

/** Everything the renderer and input pollers need for one tick. */
export interface FrameSnapshot {
  routine: string;
  frame: number;
  t: number;
  clockTime: number;
  drawables: DrawCommand[];
  listening: string[];
}

export type FrameCallback = (snapshot: FrameSnapshot) => void;

export interface ActivationOptions {
  env: VariableEnvironment;
  devices: DeviceManager;
  /** Run clock time of the first tick. */
  startTime: number;
  /** Identifies the innermost enclosing loop iteration; undefined at top level. */
  repeatKey?: string;
  /** Seconds; 0 means no limit. */
  maxDuration?: number;
  eventBus?: EventBus;
  onFrame?: FrameCallback;
}

export interface ActivationResult {
  routine: string;
  frames: number;
  durationSec: number;
  reason: RoutineEndReason;
}

/**
 * Whether a component holds the routine open. Code components never do; a
 * routine of code only ends after its first tick.
 */
function keepsAlive(run: ComponentRun): boolean {
  if (run.status !== 'waiting' && run.status !== 'live') return false;
  return !run.instance.behavior.capabilities.has('computational');
}

function reached(current: number, target: number): boolean {
  return current + TIME_TOLERANCE >= target;
}

/**
 * One pass through a routine. The sequencer calls `begin` once, then `tick`
 * once per frame until it returns false.
 */
export class RoutineActivation {
  private runs: ComponentRun[];
  private frame = 0;
  private lastClockTime: number;
  private endRequested = false;
  private state: 'created' | 'running' | 'ended' = 'created';
  private outcome: ActivationResult | undefined;

  constructor(
    readonly routine: RoutineDefinition,
    components: ComponentInstance[],
    private readonly options: ActivationOptions,
  ) {
    this.runs = components.map((instance) => ({ instance, status: 'waiting', liveFrames: 0 }));
    this.lastClockTime = options.startTime;
  }

  get status(): 'created' | 'running' | 'ended' {
    return this.state;
  }

  get frames(): number {
    return this.frame;
  }

  /** Set once the activation has ended. */
  get result(): ActivationResult | undefined {
    return this.outcome;
  }

  /** Ask the activation to end after the current tick. */
  forceEnd(): void {
    this.endRequested = true;
  }

  /**
   * Run begin-routine code in declaration order, then resolve the parameters
   * due at activation start.
   */
  begin(): void {
    if (this.state !== 'created') return;
    this.state = 'running';
    const { env, repeatKey } = this.options;

    for (const run of this.runs) {
      run.status = run.instance.definition.start.type === 'none' ? 'never' : 'waiting';
    }
    for (const run of this.runs) {
      run.instance.invoke('onRoutineBegin', this.contextFor(run, this.options.startTime));
    }
    for (const run of this.runs) {
      run.instance.resolveForActivation(env, repeatKey);
    }
  }

  /**
   * Process one frame at `clockTime`. Returns false once the activation has
   * ended; `result` then says why.
   */
  tick(clockTime: number): boolean {
    if (this.state === 'created') this.begin();
    if (this.state === 'ended') return false;

    const t = clockTime - this.options.startTime;
    this.lastClockTime = clockTime;
    const maxDuration = this.options.maxDuration ?? 0;
    if (maxDuration > 0 && reached(t, maxDuration)) {
      this.finish('timeout');
      return false;
    }

    for (const run of this.runs) {
      this.advance(run, clockTime, t);
    }

    this.publishFrame(clockTime, t);
    this.frame++;

    if (this.endRequested) {
      this.finish('forced');
      return false;
    }
    if (!this.runs.some(keepsAlive)) {
      this.finish('completed');
      return false;
    }
    return true;
  }

  /**
   * End the activation: stop live components, then run end-routine code.
   * Idempotent.
   */
  finish(reason: RoutineEndReason = 'completed'): ActivationResult {
    if (this.outcome) return this.outcome;
    if (this.state === 'created') this.begin();

    const clockTime = this.lastClockTime;
    for (const run of this.runs) {
      if (run.status === 'live') this.stop(run, clockTime);
    }
    for (const run of this.runs) {
      run.instance.invoke('onRoutineEnd', this.contextFor(run, clockTime));
    }
    return this.close(reason);
  }

  /** Drop the activation without running any more hooks (run aborted). */
  discard(): ActivationResult {
    if (this.outcome) return this.outcome;
    return this.close('aborted');
  }

  private close(reason: RoutineEndReason): ActivationResult {
    this.state = 'ended';
    this.outcome = {
      routine: this.routine.name,
      frames: this.frame,
      durationSec: this.lastClockTime - this.options.startTime,
      reason,
    };
    return this.outcome;
  }

  private advance(run: ComponentRun, clockTime: number, t: number): void {
    const { env, eventBus } = this.options;
    const { instance } = run;

    if (run.status === 'live' && this.shouldStop(run, clockTime, t)) {
      this.stop(run, clockTime);
      return;
    }

    let started = false;
    if (run.status === 'waiting' && this.shouldStart(run, t)) {
      run.status = 'live';
      run.liveSince = clockTime;
      run.liveFrames = 0;
      started = true;
      eventBus?.emitEvent({
        type: 'component.started',
        routine: this.routine.name,
        component: instance.name,
        t,
        timestamp: '',
      });
    }

    if (run.status !== 'live') return;

    instance.resolveForFrame(env);
    const ctx = this.contextFor(run, clockTime);
    if (started) instance.invoke('onStart', ctx);
    instance.invoke('onFrame', ctx);
    run.liveFrames++;
  }

  private shouldStart(run: ComponentRun, t: number): boolean {
    const start = run.instance.definition.start;
    switch (start.type) {
      case 'time':
        return reached(t, start.value);
      case 'frame':
        return this.frame >= start.value;
      case 'condition': {
        const expression = run.instance.startExpression;
        return expression !== undefined && isTruthy(run.instance.evaluateCondition(expression, this.options.env));
      }
      case 'none':
        return false;
    }
  }

  private shouldStop(run: ComponentRun, clockTime: number, t: number): boolean {
    const stop = run.instance.definition.stop;
    if (!stop) return false;
    switch (stop.type) {
      case 'duration':
        return reached(clockTime - (run.liveSince ?? clockTime), stop.value);
      case 'time':
        return reached(t, stop.value);
      case 'frames':
        return run.liveFrames >= stop.value;
      case 'condition': {
        const expression = run.instance.stopExpression;
        return expression !== undefined && isTruthy(run.instance.evaluateCondition(expression, this.options.env));
      }
    }
  }

  private stop(run: ComponentRun, clockTime: number): void {
    run.instance.invoke('onStop', this.contextFor(run, clockTime));
    run.status = 'finished';
    this.options.eventBus?.emitEvent({
      type: 'component.stopped',
      routine: this.routine.name,
      component: run.instance.name,
      t: clockTime - this.options.startTime,
      timestamp: '',
    });
  }

  private publishFrame(clockTime: number, t: number): void {
    const drawables: DrawCommand[] = [];
    const listening: string[] = [];
    const live: string[] = [];
    for (const run of this.runs) {
      if (run.status !== 'live') continue;
      const { instance } = run;
      live.push(instance.name);
      if (instance.isDrawable) {
        drawables.push({ component: instance.name, kind: instance.kind, params: instance.draw() ?? {} });
      }
      if (instance.behavior.capabilities.has('listenable')) {
        listening.push(instance.name);
      }
    }

    this.options.onFrame?.({
      routine: this.routine.name,
      frame: this.frame,
      t,
      clockTime,
      drawables,
      listening,
    });
    this.options.eventBus?.emitEvent({
      type: 'frame',
      routine: this.routine.name,
      frame: this.frame,
      t,
      live,
    });
  }

  private contextFor(run: ComponentRun, clockTime: number): ComponentContext {
    return {
      env: this.options.env,
      devices: this.options.devices,
      routine: this.routine.name,
      component: run.instance.name,
      t: clockTime - this.options.startTime,
      clockTime,
      frame: this.frame,
      liveSince: run.liveSince,
      params: run.instance.params,
      endRoutine: () => {
        this.endRequested = true;
      },
    };
  }
}

/** Convenience: begin an activation ready to tick. */
export function activate(
  routine: RoutineDefinition,
  components: ComponentInstance[],
  options: ActivationOptions,
): RoutineActivation {
  const activation = new RoutineActivation(routine, components, options);
  activation.begin();
  return activation;
}
