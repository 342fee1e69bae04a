// packages/cli/src/commands/validate.ts

import { describeFlow } from '@trialflow/core';
import chalk from 'chalk';

import { loadFlowWithSpinner } from './run.js';

export async function validateCommand(flowFile: string): Promise<void> {
  try {
    const flow = loadFlowWithSpinner(flowFile);
    console.log(describeFlow(flow));
    console.log(chalk.green(`\n✓ ${flowFile} is valid`));
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
