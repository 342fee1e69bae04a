// packages/cli/src/commands/eval.ts

import { VariableEnvironment, evaluate } from '@trialflow/core';
import chalk from 'chalk';

import { parseAssignments } from '../utils.js';

interface EvalOptions {
  set?: string[];
}

export async function evalCommand(expression: string, options: EvalOptions): Promise<void> {
  try {
    const env = new VariableEnvironment(parseAssignments(options.set ?? []));
    console.log(JSON.stringify(evaluate(expression, env)));
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
