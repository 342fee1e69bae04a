import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { DeviceManager } from '../../src/devices/device-manager.js';
import { CancellationToken } from '../../src/engine/cancellation.js';
import { FlowLoader } from '../../src/engine/flow-loader.js';
import { FlowSequencer } from '../../src/engine/flow-sequencer.js';
import type { FrameCallback, FrameSnapshot } from '../../src/engine/routine-activation.js';
import type { EngineEvent } from '../../src/types/events.js';
import { UnresolvedNameError } from '../../src/utils/errors.js';
import { createLogger } from '../../src/utils/logger.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/', import.meta.url));
const loader = new FlowLoader(FIXTURES);

function createSequencer(): { sequencer: FlowSequencer; events: EngineEvent[] } {
  const sequencer = new FlowSequencer({
    config: { ...DEFAULT_CONFIG, engine: { ...DEFAULT_CONFIG.engine, frameRate: 10 } },
    logger: createLogger('silent'),
  });
  const events: EngineEvent[] = [];
  sequencer.on('event', (event) => events.push(event));
  return { sequencer, events };
}

function activationsOf(events: EngineEvent[], routine: string): number {
  return events.filter((e) => e.type === 'routine.started' && e.routine === routine).length;
}

function drawn(snapshots: FrameSnapshot[], component: string): string[] {
  return snapshots.flatMap((s) =>
    s.drawables.filter((d) => d.component === component).map((d) => String(d.params.text)),
  );
}

/** Answers every trial with `key` one frame after the listener went live. */
function scriptedResponses(devices: DeviceManager, key: string, snapshots: FrameSnapshot[]): FrameCallback {
  return (snapshot) => {
    snapshots.push(snapshot);
    if (snapshot.routine === 'trial' && snapshot.frame === 1) {
      devices.getOrCreate('keyboard').makeResponse(key, snapshot.clockTime);
    }
  };
}

describe('optional block', () => {
  const flow = loader.load('optional-block.yaml');

  it('skips the whole block when the branch value is 0', async () => {
    const { sequencer, events } = createSequencer();
    const summary = await sequencer.run(flow);

    expect(activationsOf(events, 'instructions')).toBe(1);
    expect(activationsOf(events, 'body')).toBe(0);
    expect(events.some((e) => e.type === 'loop.entered' && e.loop === 'inner')).toBe(false);
    expect(summary).toMatchObject({ status: 'completed', routineActivations: 1, loopIterations: 0, frames: 3 });
    expect(summary.variables.seen).toEqual([]);
  });

  it('runs the inner loop three times when the branch value is 1', async () => {
    const { sequencer, events } = createSequencer();
    const snapshots: FrameSnapshot[] = [];
    const summary = await sequencer.run(flow, {
      variables: { branch: 1 },
      onFrame: (snapshot) => snapshots.push(snapshot),
    });

    expect(activationsOf(events, 'instructions')).toBe(1);
    expect(activationsOf(events, 'body')).toBe(3);
    expect(summary.variables.seen).toEqual([
      [0, 3],
      [1, 3],
      [2, 3],
    ]);
    expect(drawn(snapshots, 'counter')).toEqual(['trial 1 of 3', 'trial 2 of 3', 'trial 3 of 3']);
    expect(summary).toMatchObject({ routineActivations: 4, loopIterations: 4, frames: 9 });
  });
});

describe('nested loops', () => {
  it('re-resolves the inner count on every outer pass', async () => {
    const { sequencer } = createSequencer();
    const summary = await sequencer.run(loader.load('nested-counts.yaml'));

    expect(summary.variables.visits).toEqual(['0.0', '0.1', '1.0', '1.1', '1.2']);
    expect(summary).toMatchObject({ routineActivations: 5, loopIterations: 7, frames: 5 });
  });
});

describe('counter scope', () => {
  it('never publishes counters of a zero-count loop', async () => {
    const { sequencer, events } = createSequencer();
    const run = sequencer.run(loader.load('counter-scope.yaml'));

    await expect(run).rejects.toThrow(UnresolvedNameError);
    expect(activationsOf(events, 'practice')).toBe(0);
    expect(events.some((e) => e.type === 'loop.iteration')).toBe(false);
  });

  it('removes counters once the loop exits', async () => {
    const { sequencer, events } = createSequencer();
    const run = sequencer.run(loader.load('counter-scope.yaml'), { variables: { nPractice: 2 } });

    await expect(run).rejects.toThrow('Unresolved name "skip.thisN" in expression: skip.thisN');
    expect(activationsOf(events, 'practice')).toBe(2);
  });
});

describe('stroop session', () => {
  const flow = loader.load('stroop.yaml');

  it('scores scripted responses against each condition row', async () => {
    const { sequencer } = createSequencer();
    const devices = new DeviceManager();
    const snapshots: FrameSnapshot[] = [];

    const summary = await sequencer.run(flow, { devices, onFrame: scriptedResponses(devices, 'left', snapshots) });

    expect(summary).toMatchObject({ status: 'completed', routineActivations: 4, loopIterations: 4, frames: 12 });
    expect(summary.variables.correct).toBe(2);
    expect(summary.variables['resp.value']).toBe('left');
    expect(summary.variables['resp.rt']).toBeCloseTo(0.1);
    expect(summary.variables).not.toHaveProperty('word');
    expect([...new Set(drawn(snapshots, 'stimulus'))].sort()).toEqual(['blue', 'green', 'red', 'yellow']);
  });

  it('presents the same order on every run with a loop seed', async () => {
    const orders: string[][] = [];
    for (let i = 0; i < 2; i++) {
      const { sequencer } = createSequencer();
      const devices = new DeviceManager();
      const snapshots: FrameSnapshot[] = [];
      await sequencer.run(flow, { devices, onFrame: scriptedResponses(devices, 'right', snapshots) });
      orders.push(snapshots.filter((s) => s.frame === 0).flatMap((s) => drawn([s], 'stimulus')));
    }

    expect(orders[0]).toHaveLength(4);
    expect(orders[1]).toEqual(orders[0]);
  });

  it('aborts between ticks and releases loop state', async () => {
    const { sequencer, events } = createSequencer();
    const devices = new DeviceManager();
    const cancellation = new CancellationToken();
    const snapshots: FrameSnapshot[] = [];
    const respond = scriptedResponses(devices, 'left', snapshots);
    let trialsStarted = 0;

    const summary = await sequencer.run(flow, {
      devices,
      cancellation,
      onFrame: (snapshot) => {
        respond(snapshot);
        if (snapshot.frame === 0 && ++trialsStarted === 2) cancellation.cancel('Interrupted');
      },
    });

    expect(summary).toMatchObject({
      status: 'aborted',
      abortReason: 'Interrupted',
      routineActivations: 2,
      loopIterations: 2,
      frames: 4,
    });
    expect(summary.variables).not.toHaveProperty(['trials.thisN']);
    expect(summary.variables).not.toHaveProperty('word');
    expect(events.map((e) => e.type).slice(-3)).toEqual(['frame', 'routine.ended', 'run.aborted']);
  });
});
