// packages/cli/src/program.ts -- Command registration for the trialflow CLI

import { Command } from 'commander';

import { VERSION } from '@trialflow/core';

import { evalCommand } from './commands/eval.js';
import { type RunCommandOptions, runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { collect, parseInteger, parsePositiveNumber } from './utils.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('trialflow')
    .description('Run frame-driven experiment flows from YAML or JSON flow files')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  const verbose = (): boolean => program.opts<{ verbose?: boolean }>().verbose === true;

  program
    .command('run')
    .description('Run a flow file to completion')
    .argument('<flow-file>', 'Path to the flow file (YAML or JSON)')
    .option('--realtime', 'Pace frames on the wall clock instead of stepping', false)
    .option('--frame-rate <fps>', 'Frames per second', parsePositiveNumber)
    .option('--seed <n>', 'Seed for random loops without their own seed', parseInteger)
    .option('--max-duration <seconds>', 'Force-end routines after this many seconds', parsePositiveNumber)
    .option('--set <name=value>', 'Initial variable, value parsed as an expression (repeatable)', collect, [])
    .option('--output <file>', 'Write the run summary as JSON')
    .option('--quiet', 'Do not render flow events', false)
    .action((flowFile: string, options: RunCommandOptions) =>
      runCommand(flowFile, { ...options, verbose: verbose() }),
    );

  program
    .command('validate')
    .description('Load a flow file, check its structure and print the outline')
    .argument('<flow-file>', 'Path to the flow file (YAML or JSON)')
    .action((flowFile: string) => validateCommand(flowFile));

  program
    .command('eval')
    .description('Evaluate an expression and print the value as JSON')
    .argument('<expression>', 'Expression to evaluate')
    .option('--set <name=value>', 'Variable visible to the expression (repeatable)', collect, [])
    .action(evalCommand);

  return program;
}
