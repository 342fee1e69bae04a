// packages/core/src/engine/frame-clock.ts

import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { CancellationToken } from './cancellation.js';

/**
 * Source of rendering ticks. The sequencer awaits `nextFrame` once per tick
 * while a routine is active; that await is the only place it yields.
 */
export interface FrameClock {
  readonly frameRate: number;
  /** Run clock time in seconds. */
  now(): number;
  /** Wait for the next tick and return its time. */
  nextFrame(cancellation?: CancellationToken): Promise<number>;
}

/**
 * Virtual clock advancing exactly 1/frameRate per tick without waiting.
 * Used for headless runs and tests. Each tick still yields to the event loop
 * so signal handlers can cancel a run.
 */
export class SteppedFrameClock implements FrameClock {
  private frames = 0;

  constructor(readonly frameRate: number) {
    if (!(frameRate > 0)) {
      throw new RangeError(`frameRate must be positive, got ${frameRate}`);
    }
  }

  now(): number {
    return this.frames / this.frameRate;
  }

  async nextFrame(): Promise<number> {
    await yieldToEventLoop();
    this.frames++;
    return this.now();
  }
}

/** Wall clock ticking at frameRate; sleeps are cut short by cancellation. */
export class RealtimeFrameClock implements FrameClock {
  private readonly origin = performance.now();
  private frames = 0;

  constructor(readonly frameRate: number) {
    if (!(frameRate > 0)) {
      throw new RangeError(`frameRate must be positive, got ${frameRate}`);
    }
  }

  now(): number {
    return (performance.now() - this.origin) / 1000;
  }

  async nextFrame(cancellation?: CancellationToken): Promise<number> {
    this.frames++;
    const dueMs = (this.frames / this.frameRate) * 1000;
    const waitMs = Math.max(0, dueMs - (performance.now() - this.origin));
    if (cancellation) {
      await cancellation.sleep(waitMs);
    } else {
      await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
    }
    return this.now();
  }
}
