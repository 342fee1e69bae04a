// packages/core/src/expression/evaluator.ts

import type { VariableEnvironment } from '../environment/variable-environment.js';
import type { Value } from '../types/flow.js';
import { EvaluationError, UnresolvedNameError } from '../utils/errors.js';
import { BUILTINS } from './builtins.js';
import { formatValue, isObjectValue, isTruthy } from './values.js';
import { type AssignOperator, type BinaryOperator, type Expr, type Statement, parseExpression, parseStatements } from './parser.js';

export { formatValue, isObjectValue, isTruthy };

/** A parsed expression that can be evaluated repeatedly. */
export interface CompiledExpression {
  readonly source: string;
  evaluate(env: VariableEnvironment): Value;
  /** Root names the expression reads (dotted paths joined). */
  names(): string[];
}

function toNumber(value: Value, op: string, source: string, pos: number): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new EvaluationError(
    `Unsupported operand ${formatValue(value)} for "${op}" at position ${pos}`,
    source,
    pos,
  );
}

function isNumeric(value: Value): value is number | boolean {
  return typeof value === 'number' || typeof value === 'boolean';
}

function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return Number(a) === Number(b);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isObjectValue(a) && isObjectValue(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]))
    );
  }
  return a === b;
}

/**
 * Apply a binary operator. Shared with compound assignments in code blocks.
 */
export function applyBinary(
  op: BinaryOperator,
  left: Value,
  right: Value,
  source: string,
  pos: number,
): Value {
  switch (op) {
    case '+':
      if (typeof left === 'string' || typeof right === 'string') {
        return formatValue(left) + formatValue(right);
      }
      if (Array.isArray(left) && Array.isArray(right)) {
        return [...left, ...right];
      }
      return toNumber(left, op, source, pos) + toNumber(right, op, source, pos);
    case '-':
      return toNumber(left, op, source, pos) - toNumber(right, op, source, pos);
    case '*':
      return toNumber(left, op, source, pos) * toNumber(right, op, source, pos);
    case '**':
      return toNumber(left, op, source, pos) ** toNumber(right, op, source, pos);
    case '/':
    case '//':
    case '%': {
      const a = toNumber(left, op, source, pos);
      const b = toNumber(right, op, source, pos);
      if (b === 0) {
        throw new EvaluationError(`Division by zero at position ${pos}`, source, pos);
      }
      if (op === '/') return a / b;
      if (op === '//') return Math.floor(a / b);
      return ((a % b) + b) % b;
    }
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=': {
      const order =
        typeof left === 'string' && typeof right === 'string'
          ? left < right ? -1 : left > right ? 1 : 0
          : Math.sign(toNumber(left, op, source, pos) - toNumber(right, op, source, pos));
      if (op === '<') return order < 0;
      if (op === '<=') return order <= 0;
      if (op === '>') return order > 0;
      return order >= 0;
    }
  }
}

/** Flatten `a.b.c` member chains rooted at a name into their segments. */
function dottedPath(expr: Expr): string[] | undefined {
  if (expr.type === 'name') return [expr.name];
  if (expr.type === 'member') {
    const parent = dottedPath(expr.object);
    return parent ? [...parent, expr.property] : undefined;
  }
  return undefined;
}

function readProperty(value: Value, property: string): Value | undefined {
  return isObjectValue(value) && Object.hasOwn(value, property) ? value[property] : undefined;
}

/**
 * Resolve a dotted path: the longest prefix bound as a flat key whose value
 * has the remaining segments as own properties wins.
 */
function resolvePath(segments: string[], env: VariableEnvironment, source: string): Value {
  for (let length = segments.length; length > 0; length--) {
    const base = env.lookup(segments.slice(0, length).join('.'));
    if (base === undefined) continue;
    let value: Value | undefined = base;
    for (const property of segments.slice(length)) {
      value = value === undefined ? undefined : readProperty(value, property);
    }
    if (value === undefined) continue;
    return value;
  }
  throw new UnresolvedNameError(segments.join('.'), source);
}

function indexInto(target: Value, index: Value, source: string, pos: number): Value {
  if (Array.isArray(target) || typeof target === 'string') {
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      throw new EvaluationError(`Index must be an integer at position ${pos}`, source, pos);
    }
    const i = index < 0 ? target.length + index : index;
    if (i < 0 || i >= target.length) {
      throw new EvaluationError(`Index ${index} out of range at position ${pos}`, source, pos);
    }
    return Array.isArray(target) ? target[i] : target.charAt(i);
  }
  if (isObjectValue(target) && typeof index === 'string') {
    if (!Object.hasOwn(target, index)) {
      throw new EvaluationError(`Key "${index}" not found at position ${pos}`, source, pos);
    }
    return target[index];
  }
  throw new EvaluationError(`Value is not indexable at position ${pos}`, source, pos);
}

function evaluateNode(expr: Expr, env: VariableEnvironment, source: string): Value {
  switch (expr.type) {
    case 'literal':
      return expr.value;
    case 'name':
      return resolvePath([expr.name], env, source);
    case 'member': {
      const path = dottedPath(expr);
      if (path) return resolvePath(path, env, source);
      const object = evaluateNode(expr.object, env, source);
      const value = readProperty(object, expr.property);
      if (value === undefined) {
        throw new EvaluationError(
          `No property "${expr.property}" at position ${expr.pos}`,
          source,
          expr.pos,
        );
      }
      return value;
    }
    case 'index':
      return indexInto(
        evaluateNode(expr.object, env, source),
        evaluateNode(expr.index, env, source),
        source,
        expr.pos,
      );
    case 'call': {
      const fn = BUILTINS.get(expr.callee);
      if (!fn) {
        throw new EvaluationError(`Unknown function "${expr.callee}"`, source, expr.pos);
      }
      const args = expr.args.map((arg) => evaluateNode(arg, env, source));
      try {
        return fn(args);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new EvaluationError(`${expr.callee}(): ${reason}`, source, expr.pos);
      }
    }
    case 'unary': {
      const operand = evaluateNode(expr.operand, env, source);
      if (expr.op === 'not') return !isTruthy(operand);
      const n = toNumber(operand, expr.op, source, expr.pos);
      return expr.op === '-' ? -n : n;
    }
    case 'binary':
      return applyBinary(
        expr.op,
        evaluateNode(expr.left, env, source),
        evaluateNode(expr.right, env, source),
        source,
        expr.pos,
      );
    case 'logical': {
      const left = evaluateNode(expr.left, env, source);
      if (expr.op === 'and') {
        return isTruthy(left) ? evaluateNode(expr.right, env, source) : left;
      }
      return isTruthy(left) ? left : evaluateNode(expr.right, env, source);
    }
    case 'conditional':
      return isTruthy(evaluateNode(expr.test, env, source))
        ? evaluateNode(expr.consequent, env, source)
        : evaluateNode(expr.alternate, env, source);
    case 'list':
      return expr.items.map((item) => evaluateNode(item, env, source));
  }
}

function collectNames(expr: Expr, into: Set<string>): void {
  switch (expr.type) {
    case 'name':
      into.add(expr.name);
      return;
    case 'member': {
      const path = dottedPath(expr);
      if (path) into.add(path.join('.'));
      else collectNames(expr.object, into);
      return;
    }
    case 'index':
      collectNames(expr.object, into);
      collectNames(expr.index, into);
      return;
    case 'call':
      for (const arg of expr.args) collectNames(arg, into);
      return;
    case 'unary':
      collectNames(expr.operand, into);
      return;
    case 'binary':
    case 'logical':
      collectNames(expr.left, into);
      collectNames(expr.right, into);
      return;
    case 'conditional':
      collectNames(expr.test, into);
      collectNames(expr.consequent, into);
      collectNames(expr.alternate, into);
      return;
    case 'list':
      for (const item of expr.items) collectNames(item, into);
      return;
    case 'literal':
      return;
  }
}

export function compile(source: string): CompiledExpression {
  const ast = parseExpression(source);
  return {
    source,
    evaluate: (env) => evaluateNode(ast, env, source),
    names: () => {
      const names = new Set<string>();
      collectNames(ast, names);
      return [...names];
    },
  };
}

/**
 * Evaluate an expression against the environment. Never writes to it.
 */
export function evaluate(source: string, env: VariableEnvironment): Value {
  return compile(source).evaluate(env);
}

const COMPOUND_OPS: Record<Exclude<AssignOperator, '='>, BinaryOperator> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
};

/** A parsed code block; `run` applies its assignments in order. */
export interface CompiledStatements {
  readonly source: string;
  readonly statements: Statement[];
  run(env: VariableEnvironment): void;
}

export function compileStatements(source: string): CompiledStatements {
  const statements = parseStatements(source);
  return {
    source,
    statements,
    run: (env) => executeStatements(statements, env, source),
  };
}

/**
 * Run assignments against the environment. The only mutating entry point of
 * the expression layer.
 */
export function executeStatements(
  statements: Statement[],
  env: VariableEnvironment,
  source = '',
): void {
  for (const statement of statements) {
    const value = evaluateNode(statement.value, env, source);
    if (statement.op === '=') {
      env.set(statement.target, value);
      continue;
    }
    const current = env.lookup(statement.target);
    if (current === undefined) {
      throw new UnresolvedNameError(statement.target, source);
    }
    env.set(
      statement.target,
      applyBinary(COMPOUND_OPS[statement.op], current, value, source, statement.pos),
    );
  }
}
