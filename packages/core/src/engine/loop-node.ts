// packages/core/src/engine/loop-node.ts

import type { VariableEnvironment } from '../environment/variable-environment.js';
import { type CompiledExpression, compile, formatValue } from '../expression/evaluator.js';
import type { LoopDefinition, Value } from '../types/flow.js';
import {
  LOOP_COUNTER_N_TOTAL,
  LOOP_COUNTER_THIS_N,
  LOOP_COUNTER_THIS_REP_N,
} from '../utils/constants.js';
import { ConfigurationError, EvaluationError } from '../utils/errors.js';
import { type BranchGuard, isBranchTaken, toBranchGuard } from './branch-guard.js';
import { type RandomSource, createSeededRandom, permutation } from './random.js';

export type LoopPhase =
  | { phase: 'pending' }
  | { phase: 'entering' }
  | { phase: 'iterating'; index: number }
  | { phase: 'exited' };

export interface LoopIteration {
  /** Body index for this pass: position in 0..nTotal-1 drawn by the ordering mode. */
  thisN: number;
  /** Ordinal of the pass, 0-based. */
  thisRepN: number;
  nTotal: number;
  row?: Record<string, Value>;
}

function counterName(loop: string, counter: string): string {
  return `${loop}.${counter}`;
}

/**
 * Check a resolved repetition count. Booleans count as 0/1; anything that is
 * not a non-negative integer is a configuration error.
 */
export function toRepetitionCount(loop: string, expression: string, value: Value): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      `Loop "${loop}" repetition count must be a non-negative integer, got ${formatValue(value)} from: ${expression}`,
      loop,
    );
  }
  return value;
}

/** Parse a loop's repetition expression; syntax errors name the loop. */
export function compileCount(loop: LoopDefinition, expression: string): CompiledExpression {
  try {
    return compile(expression);
  } catch (err) {
    if (err instanceof EvaluationError && err.component === undefined) {
      throw err.withComponent(loop.name);
    }
    throw err;
  }
}

/**
 * One activation of a loop: pending -> entering -> iterating(i) -> exited.
 * A new activation is created every time the flow reaches the loop, so an
 * inner loop re-resolves its count on every outer pass.
 */
export class LoopActivation {
  private state: LoopPhase = { phase: 'pending' };
  private order: number[] = [];
  private position = 0;
  private release: (() => void) | undefined;
  private readonly countExpression: CompiledExpression | undefined;
  readonly guard: BranchGuard | undefined;
  private guardTaken: boolean | undefined;

  constructor(
    readonly loop: LoopDefinition,
    private readonly env: VariableEnvironment,
    private readonly random: RandomSource,
  ) {
    this.guard = toBranchGuard(loop);
    if (loop.nReps !== undefined) {
      this.countExpression = compileCount(loop, loop.nReps);
    }
  }

  get phase(): LoopPhase {
    return this.state;
  }

  get nTotal(): number {
    return this.order.length;
  }

  /** Drawn body order; empty before entry. */
  get iterationOrder(): readonly number[] {
    return this.order;
  }

  /** Guard outcome; undefined for plain loops or before entry. */
  get taken(): boolean | undefined {
    return this.guardTaken;
  }

  /**
   * Resolve the repetition count against the environment and draw the order.
   * A count of zero exits immediately.
   */
  enter(): number {
    if (this.state.phase !== 'pending') {
      throw new ConfigurationError(`Loop "${this.loop.name}" entered twice`, this.loop.name);
    }
    this.state = { phase: 'entering' };

    const count = this.resolveCount();
    if (this.guard) {
      this.guardTaken = isBranchTaken(this.guard, count);
    }

    if (this.loop.loopType === 'random') {
      const source = this.loop.seed !== undefined ? createSeededRandom(this.loop.seed) : this.random;
      this.order = permutation(count, source);
    } else {
      this.order = Array.from({ length: count }, (_, i) => i);
    }

    if (count === 0) {
      this.state = { phase: 'exited' };
    }
    return count;
  }

  /**
   * Release the previous iteration and publish the next one. Returns
   * undefined, after exiting, once the order is exhausted.
   */
  next(): LoopIteration | undefined {
    if (this.state.phase === 'exited') return undefined;
    if (this.state.phase !== 'entering' && this.state.phase !== 'iterating') {
      throw new ConfigurationError(`Loop "${this.loop.name}" iterated before entry`, this.loop.name);
    }

    this.releaseIteration();
    if (this.position >= this.order.length) {
      this.exit();
      return undefined;
    }

    const thisRepN = this.position++;
    const thisN = this.order[thisRepN];
    const nTotal = this.order.length;
    const name = this.loop.name;

    const bindings: Record<string, Value> = {};
    const row = this.rowFor(thisN);
    if (row) Object.assign(bindings, row);
    bindings[counterName(name, LOOP_COUNTER_THIS_N)] = thisN;
    bindings[counterName(name, LOOP_COUNTER_N_TOTAL)] = nTotal;
    bindings[counterName(name, LOOP_COUNTER_THIS_REP_N)] = thisRepN;
    this.release = this.env.bind(bindings);

    this.state = { phase: 'iterating', index: thisN };
    return { thisN, thisRepN, nTotal, row };
  }

  /** Remove counters and row bindings. Safe to call in any phase. */
  exit(): void {
    this.releaseIteration();
    this.state = { phase: 'exited' };
  }

  private releaseIteration(): void {
    this.release?.();
    this.release = undefined;
  }

  private resolveCount(): number {
    const expression = this.countExpression;
    if (!expression) {
      const rows = this.loop.conditions;
      if (this.loop.isTrials && rows) return rows.length;
      throw new ConfigurationError(`Loop "${this.loop.name}" has no repetition count`, this.loop.name);
    }
    return toRepetitionCount(this.loop.name, expression.source, expression.evaluate(this.env));
  }

  private rowFor(index: number): Record<string, Value> | undefined {
    const rows = this.loop.conditions;
    if (!this.loop.isTrials || !rows || rows.length === 0) return undefined;
    return rows[index % rows.length];
  }
}
