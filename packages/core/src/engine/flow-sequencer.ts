// packages/core/src/engine/flow-sequencer.ts

import { EventEmitter } from 'eventemitter3';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { instantiateComponent } from '../components/index.js';
import type { ComponentInstance } from '../components/component-instance.js';
import { DeviceManager } from '../devices/device-manager.js';
import { VariableEnvironment } from '../environment/variable-environment.js';
import type { EngineConfig } from '../types/config.js';
import type { EngineEvent } from '../types/events.js';
import type { FlowNode, LoopNode, ResolvedFlow, RoutineDefinition, Value } from '../types/flow.js';
import { generateRunId } from '../utils/id.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { CancellationError, CancellationToken } from './cancellation.js';
import { EventBus } from './event-bus.js';
import { type FrameClock, SteppedFrameClock } from './frame-clock.js';
import { LoopActivation } from './loop-node.js';
import { type RandomSource, createSeededRandom, systemRandom } from './random.js';
import { type FrameCallback, activate } from './routine-activation.js';

interface SequencerEvents {
  event: (event: EngineEvent) => void;
}

export interface FlowSequencerOptions {
  config?: EngineConfig;
  logger?: Logger;
  eventBus?: EventBus;
}

export interface RunOptions {
  /** Defaults to a stepped clock at the configured frame rate. */
  clock?: FrameClock;
  /** Initial variables; override the flow's own. */
  variables?: Record<string, Value>;
  devices?: DeviceManager;
  /** Per-tick draw/poll callback. */
  onFrame?: FrameCallback;
  cancellation?: CancellationToken;
  /** Process-level source for random loops without a seed. */
  random?: RandomSource;
}

export type RunStatus = 'completed' | 'aborted';

export interface RunSummary {
  runId: string;
  flowName: string;
  status: RunStatus;
  routineActivations: number;
  loopIterations: number;
  frames: number;
  durationSec: number;
  /** End-of-run environment; loop counters are already released. */
  variables: Record<string, Value>;
  abortReason?: string;
}

interface RunState {
  runId: string;
  env: VariableEnvironment;
  devices: DeviceManager;
  clock: FrameClock;
  cancellation: CancellationToken;
  random: RandomSource;
  onFrame?: FrameCallback;
  components: Map<string, ComponentInstance[]>;
  activationCounts: Map<string, number>;
  /** Open loop iterations, outermost first, as `name:thisRepN`. */
  loopPath: string[];
  routineActivations: number;
  loopIterations: number;
  frames: number;
}

function effectiveMaxDuration(routine: RoutineDefinition, configured: number): number {
  const own = routine.maxDuration ?? 0;
  if (own > 0 && configured > 0) return Math.min(own, configured);
  return own > 0 ? own : configured;
}

function collectRoutines(nodes: FlowNode[], into: Map<string, RoutineDefinition>): void {
  for (const node of nodes) {
    if (node.kind === 'routine') {
      if (!into.has(node.routine.name)) into.set(node.routine.name, node.routine);
    } else {
      collectRoutines(node.body, into);
    }
  }
}

/**
 * Runs a resolved flow: walks the node tree, drives loop activations and
 * ticks each routine activation off the frame clock. Single-threaded; the
 * only await per tick is the clock.
 */
export class FlowSequencer extends EventEmitter<SequencerEvents> {
  private config: EngineConfig;
  private logger: Logger;
  private eventBus: EventBus;

  constructor(options: FlowSequencerOptions = {}) {
    super();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? createLogger(this.config.advanced.logLevel, 'sequencer');
    this.eventBus = options.eventBus ?? new EventBus();

    // Forward all bus events to sequencer listeners
    this.eventBus.on('event', (event) => {
      this.emit('event', event);
    });
  }

  async run(flow: ResolvedFlow, options: RunOptions = {}): Promise<RunSummary> {
    const seed = this.config.engine.seed;
    const state: RunState = {
      runId: generateRunId(),
      env: new VariableEnvironment({ ...flow.variables, ...options.variables }),
      devices: options.devices ?? new DeviceManager(),
      clock: options.clock ?? new SteppedFrameClock(this.config.engine.frameRate),
      cancellation: options.cancellation ?? new CancellationToken(),
      random: options.random ?? (seed !== null ? createSeededRandom(seed) : systemRandom),
      onFrame: options.onFrame,
      components: new Map(),
      activationCounts: new Map(),
      loopPath: [],
      routineActivations: 0,
      loopIterations: 0,
      frames: 0,
    };
    const startedAt = state.clock.now();

    this.logger.info(`Starting flow "${flow.name}" (run ${state.runId})`);
    this.eventBus.emitEvent({ type: 'run.started', runId: state.runId, flow: flow.name, timestamp: '' });

    const summarize = (status: RunStatus, abortReason?: string): RunSummary => ({
      runId: state.runId,
      flowName: flow.name,
      status,
      routineActivations: state.routineActivations,
      loopIterations: state.loopIterations,
      frames: state.frames,
      durationSec: state.clock.now() - startedAt,
      variables: state.env.snapshot(),
      abortReason,
    });

    try {
      this.prepareComponents(flow, state);
      await this.runNodes(flow.nodes, state);

      const summary = summarize('completed');
      this.eventBus.emitEvent({
        type: 'run.completed',
        runId: state.runId,
        routineActivations: summary.routineActivations,
        loopIterations: summary.loopIterations,
        frames: summary.frames,
        durationSec: summary.durationSec,
        timestamp: '',
      });
      this.logger.info(
        `Flow "${flow.name}" completed: ${summary.routineActivations} routine activations, ${summary.frames} frames`,
      );
      return summary;
    } catch (err) {
      if (err instanceof CancellationError) {
        this.logger.warn(`Flow "${flow.name}" aborted: ${err.message}`);
        this.eventBus.emitEvent({ type: 'run.aborted', runId: state.runId, reason: err.message, timestamp: '' });
        return summarize('aborted', err.message);
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Flow "${flow.name}" failed: ${message}`);
      this.eventBus.emitEvent({
        type: 'run.failed',
        runId: state.runId,
        error: message,
        errorName: err instanceof Error ? err.name : 'Error',
        timestamp: '',
      });
      throw err;
    } finally {
      state.env.clear();
    }
  }

  /** One instance per component per run; beginExperiment code runs here. */
  private prepareComponents(flow: ResolvedFlow, state: RunState): void {
    const routines = new Map<string, RoutineDefinition>();
    collectRoutines(flow.nodes, routines);
    for (const routine of routines.values()) {
      state.components.set(routine.name, routine.components.map(instantiateComponent));
    }
    for (const instances of state.components.values()) {
      for (const instance of instances) instance.startRun(state.env);
    }
  }

  private async runNodes(nodes: FlowNode[], state: RunState): Promise<void> {
    for (const node of nodes) {
      state.cancellation.throwIfCancelled();
      if (node.kind === 'routine') {
        await this.runRoutine(node.routine, state);
      } else {
        await this.runLoop(node, state);
      }
    }
  }

  private async runLoop(node: LoopNode, state: RunState): Promise<void> {
    const { loop } = node;
    const activation = new LoopActivation(loop, state.env, state.random);
    const count = activation.enter();
    this.logger.debug(
      count === 0 ? `Loop "${loop.name}" skipped (0 repetitions)` : `Loop "${loop.name}" entered: ${count} repetitions`,
    );

    this.eventBus.emitEvent({
      type: 'loop.entered',
      loop: loop.name,
      nTotal: count,
      order: [...activation.iterationOrder],
      timestamp: '',
    });
    if (activation.guard) {
      const taken = activation.taken === true;
      this.logger.debug(`Branch "${loop.name}" ${taken ? 'taken' : 'skipped'}`);
      this.eventBus.emitEvent({ type: 'branch.resolved', loop: loop.name, taken, timestamp: '' });
    }

    try {
      for (let iteration = activation.next(); iteration; iteration = activation.next()) {
        state.loopIterations++;
        this.eventBus.emitEvent({
          type: 'loop.iteration',
          loop: loop.name,
          thisN: iteration.thisN,
          thisRepN: iteration.thisRepN,
          nTotal: iteration.nTotal,
          timestamp: '',
        });
        state.loopPath.push(`${loop.name}:${iteration.thisRepN}`);
        try {
          await this.runNodes(node.body, state);
        } finally {
          state.loopPath.pop();
        }
      }
    } finally {
      activation.exit();
    }

    this.logger.debug(`Loop "${loop.name}" exited after ${count} iterations`);
    this.eventBus.emitEvent({ type: 'loop.exited', loop: loop.name, iterations: count, timestamp: '' });
  }

  private async runRoutine(routine: RoutineDefinition, state: RunState): Promise<void> {
    const activationNumber = (state.activationCounts.get(routine.name) ?? 0) + 1;
    state.activationCounts.set(routine.name, activationNumber);
    state.routineActivations++;

    this.logger.debug(`Routine "${routine.name}" activation ${activationNumber}`);
    this.eventBus.emitEvent({
      type: 'routine.started',
      routine: routine.name,
      activation: activationNumber,
      timestamp: '',
    });

    const activation = activate(routine, state.components.get(routine.name) ?? [], {
      env: state.env,
      devices: state.devices,
      startTime: state.clock.now(),
      repeatKey: state.loopPath.length > 0 ? state.loopPath.join('/') : undefined,
      maxDuration: effectiveMaxDuration(routine, this.config.engine.maxRoutineDuration),
      eventBus: this.eventBus,
      onFrame: state.onFrame,
    });

    let clockTime = state.clock.now();
    try {
      for (;;) {
        state.cancellation.throwIfCancelled();
        if (!activation.tick(clockTime)) break;
        clockTime = await state.clock.nextFrame(state.cancellation);
      }
    } catch (err) {
      const discarded = activation.discard();
      state.frames += discarded.frames;
      if (err instanceof CancellationError) {
        this.eventBus.emitEvent({
          type: 'routine.ended',
          routine: routine.name,
          frames: discarded.frames,
          durationSec: discarded.durationSec,
          reason: 'aborted',
          timestamp: '',
        });
      }
      throw err;
    }

    const result = activation.result ?? activation.finish();
    state.frames += result.frames;
    this.logger.debug(`Routine "${routine.name}" ended (${result.reason}) after ${result.frames} frames`);
    this.eventBus.emitEvent({
      type: 'routine.ended',
      routine: routine.name,
      frames: result.frames,
      durationSec: result.durationSec,
      reason: result.reason,
      timestamp: '',
    });
  }
}
