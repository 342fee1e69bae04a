// packages/cli/src/commands/run.ts

import {
  CancellationToken,
  FlowLoader,
  FlowSequencer,
  RealtimeFrameClock,
  type ResolvedFlow,
  createLogger,
  loadConfig,
} from '@trialflow/core';
import chalk from 'chalk';

import { printRunSummary, renderEvent, startLoadSpinner } from '../render.js';
import { exitCodeFor, parseAssignments, writeSummary } from '../utils.js';

export interface RunCommandOptions {
  realtime?: boolean;
  frameRate?: number;
  seed?: number;
  maxDuration?: number;
  set?: string[];
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export function loadFlowWithSpinner(flowFile: string): ResolvedFlow {
  const spinner = startLoadSpinner(flowFile);
  try {
    const flow = new FlowLoader().load(flowFile);
    spinner.succeed(`Loaded flow "${flow.name}"`);
    return flow;
  } catch (error) {
    spinner.fail(`Could not load ${flowFile}`);
    throw error;
  }
}

export async function runCommand(flowFile: string, options: RunCommandOptions): Promise<void> {
  try {
    // 1. Load config; command-line flags win over .trialflow.yml
    const config = loadConfig({
      overrides: {
        engine: {
          frameRate: options.frameRate,
          seed: options.seed,
          maxRoutineDuration: options.maxDuration,
        },
        advanced: options.verbose ? { logLevel: 'debug' } : undefined,
      },
    });

    // 2. Load and linearize the flow
    const flow = loadFlowWithSpinner(flowFile);
    const variables = parseAssignments(options.set ?? []);

    // 3. Create sequencer and subscribe to events
    const logger = createLogger(config.advanced.logLevel, 'sequencer');
    const sequencer = new FlowSequencer({ config, logger });
    if (!options.quiet) {
      sequencer.on('event', (event) => renderEvent(event, { verbose: options.verbose }));
    }

    // 4. Execute; Ctrl-C aborts at the next tick
    const cancellation = new CancellationToken();
    const onSigint = (): void => cancellation.cancel('Interrupted');
    process.once('SIGINT', onSigint);
    const summary = await sequencer
      .run(flow, {
        variables,
        cancellation,
        clock: options.realtime ? new RealtimeFrameClock(config.engine.frameRate) : undefined,
      })
      .finally(() => {
        process.off('SIGINT', onSigint);
      });

    // 5. Print summary
    printRunSummary(summary);
    if (options.output) {
      writeSummary(options.output, summary);
      console.log(chalk.gray(`Summary written to ${options.output}`));
    }

    process.exit(exitCodeFor(summary.status));
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
