// packages/core/src/engine/branch-guard.ts

import type { LoopDefinition } from '../types/flow.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * A loop used as an `if`: its repetition count must be 0 or 1. Skipping is
 * still done by running the body zero times; the guard only checks the count
 * and names the outcome.
 */
export interface BranchGuard {
  kind: 'branch';
  loop: string;
  expression: string;
}

export function toBranchGuard(loop: LoopDefinition): BranchGuard | undefined {
  if (!loop.branch) return undefined;
  if (loop.nReps === undefined) {
    throw new ConfigurationError(`Branch "${loop.name}" needs a repetition expression`, loop.name);
  }
  return { kind: 'branch', loop: loop.name, expression: loop.nReps };
}

/** Whether the guarded body runs. Counts other than 0 and 1 are rejected. */
export function isBranchTaken(guard: BranchGuard, count: number): boolean {
  if (count !== 0 && count !== 1) {
    throw new ConfigurationError(
      `Branch "${guard.loop}" must resolve to 0 or 1, got ${count} from: ${guard.expression}`,
      guard.loop,
    );
  }
  return count === 1;
}
