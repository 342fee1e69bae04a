// packages/cli/src/utils.ts -- Option parsing helpers

import { writeFileSync } from 'node:fs';
import {
  EvaluationError,
  UnresolvedNameError,
  type RunStatus,
  type RunSummary,
  type Value,
  VariableEnvironment,
  evaluate,
} from '@trialflow/core';
import { InvalidArgumentError } from 'commander';

/** Exit code for SIGINT-style aborts. */
export const EXIT_ABORTED = 130;

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number');
  }
  return n;
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be an integer');
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse `name=value`. The value is evaluated as an expression over an empty
 * environment; text that does not evaluate (`word=red`) is kept as a string.
 */
export function parseAssignment(pair: string): [string, Value] {
  const eq = pair.indexOf('=');
  const name = eq > 0 ? pair.slice(0, eq).trim() : '';
  if (!/^[A-Za-z_][A-Za-z0-9_.]*$/.test(name)) {
    throw new InvalidArgumentError(`Expected name=value, got "${pair}"`);
  }
  const source = pair.slice(eq + 1);
  try {
    return [name, evaluate(source, new VariableEnvironment())];
  } catch (err) {
    if (err instanceof UnresolvedNameError || err instanceof EvaluationError) {
      return [name, source];
    }
    throw err;
  }
}

export function parseAssignments(pairs: string[]): Record<string, Value> {
  const variables: Record<string, Value> = {};
  for (const pair of pairs) {
    const [name, value] = parseAssignment(pair);
    variables[name] = value;
  }
  return variables;
}

export function exitCodeFor(status: RunStatus): number {
  return status === 'completed' ? 0 : EXIT_ABORTED;
}

export function writeSummary(filePath: string, summary: RunSummary): void {
  writeFileSync(filePath, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');
}
