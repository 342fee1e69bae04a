// packages/cli/src/render.ts -- Terminal rendering for flow events

import type { EngineEvent, RunSummary } from '@trialflow/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface RenderOptions {
  /** Also show component start/stop events. */
  verbose?: boolean;
}

function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

/**
 * Format one event as a terminal line. Returns undefined for events that are
 * not shown at the given verbosity; per-frame events never are.
 */
export function formatEvent(event: EngineEvent, options: RenderOptions = {}): string | undefined {
  switch (event.type) {
    case 'run.started':
      return chalk.gray(`\n━━━ Run ${event.runId} ━━━\nFlow: ${event.flow}\n`);

    case 'run.completed':
      return chalk.green(
        `\n━━━ Run Complete ━━━\n  ${event.routineActivations} routines, ${event.loopIterations} loop iterations, ${event.frames} frames in ${seconds(event.durationSec)}`,
      );

    case 'run.aborted':
      return chalk.yellow(`\n━━━ Run Aborted ━━━\n  Reason: ${event.reason}`);

    case 'run.failed':
      return chalk.red(`\n━━━ Run Failed ━━━\n  ${event.errorName}: ${event.error}`);

    case 'loop.entered':
      return chalk.blue(`↻ ${event.loop}: ${event.nTotal} repetitions [${event.order.join(', ')}]`);

    case 'loop.iteration':
      return chalk.blue(`  ${event.loop} ${event.thisRepN + 1}/${event.nTotal} (thisN=${event.thisN})`);

    case 'loop.exited':
      return chalk.gray(`  ${event.loop} done after ${event.iterations} iterations`);

    case 'branch.resolved':
      return event.taken
        ? chalk.magenta(`⑂ ${event.loop}: taken`)
        : chalk.magenta(`⑂ ${event.loop}: skipped`);

    case 'routine.started':
      return chalk.cyan(`▶ ${event.routine} (#${event.activation})`);

    case 'routine.ended': {
      const line = `  ✓ ${event.routine} ${event.reason} after ${event.frames} frames (${seconds(event.durationSec)})`;
      return event.reason === 'aborted' ? chalk.yellow(line) : chalk.gray(line);
    }

    case 'component.started':
      return options.verbose ? chalk.dim(`    + ${event.component} at ${seconds(event.t)}`) : undefined;

    case 'component.stopped':
      return options.verbose ? chalk.dim(`    - ${event.component} at ${seconds(event.t)}`) : undefined;

    case 'frame':
      return undefined;
  }
}

export function renderEvent(event: EngineEvent, options?: RenderOptions): void {
  const line = formatEvent(event, options);
  if (line !== undefined) console.log(line);
}

/** Spinner shown while a flow file is read and checked. */
export function startLoadSpinner(flowFile: string): Ora {
  return ora({ text: `Loading ${flowFile}...`, color: 'cyan' }).start();
}

/**
 * Print a final run summary with formatted output.
 */
export function printRunSummary(summary: RunSummary): void {
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Run:         ${chalk.white(summary.runId)}`);
  console.log(`  Flow:        ${chalk.white(summary.flowName)}`);
  console.log(
    `  Status:      ${summary.status === 'completed' ? chalk.green('completed') : chalk.yellow(summary.status)}`,
  );
  console.log(`  Routines:    ${chalk.cyan(String(summary.routineActivations))}`);
  console.log(`  Iterations:  ${chalk.cyan(String(summary.loopIterations))}`);
  console.log(`  Frames:      ${chalk.cyan(String(summary.frames))}`);
  console.log(`  Duration:    ${chalk.cyan(seconds(summary.durationSec))}`);
  console.log(chalk.gray('-'.repeat(40)));
}
