// packages/core/src/expression/builtins.ts -- Pure functions callable from expressions

import type { Value } from '../types/flow.js';
import { formatValue } from './values.js';

export type BuiltinFunction = (args: Value[]) => Value;

function numberArg(args: Value[], index: number, fn: string): number {
  const value = args[index];
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new Error(`argument ${index + 1} of ${fn} must be a number`);
}

function arity(args: Value[], min: number, max: number, fn: string): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new Error(`${fn} takes ${expected} argument(s), got ${args.length}`);
  }
}

function unaryMath(fn: string, op: (n: number) => number): BuiltinFunction {
  return (args) => {
    arity(args, 1, 1, fn);
    return op(numberArg(args, 0, fn));
  };
}

function extremum(fn: string, pick: (a: number, b: number) => number): BuiltinFunction {
  return (args) => {
    const first = args[0];
    const items = args.length === 1 && Array.isArray(first) ? first : args;
    if (items.length === 0) throw new Error(`${fn} of an empty sequence`);
    return items
      .map((_, i) => numberArg(items, i, fn))
      .reduce((acc, n) => pick(acc, n));
  };
}

function parseNumeric(value: Value, fn: string): number {
  if (typeof value === 'string') {
    const parsed = Number(value.trim());
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new Error(`cannot convert "${value}" with ${fn}`);
    }
    return parsed;
  }
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new Error(`cannot convert ${formatValue(value)} with ${fn}`);
}

export const BUILTINS: ReadonlyMap<string, BuiltinFunction> = new Map<string, BuiltinFunction>([
  ['abs', unaryMath('abs', Math.abs)],
  ['floor', unaryMath('floor', Math.floor)],
  ['ceil', unaryMath('ceil', Math.ceil)],
  ['sin', unaryMath('sin', Math.sin)],
  ['cos', unaryMath('cos', Math.cos)],
  [
    'sqrt',
    unaryMath('sqrt', (n) => {
      if (n < 0) throw new Error('math domain error');
      return Math.sqrt(n);
    }),
  ],
  ['min', extremum('min', Math.min)],
  ['max', extremum('max', Math.max)],
  [
    'round',
    (args) => {
      arity(args, 1, 2, 'round');
      const digits = args.length === 2 ? numberArg(args, 1, 'round') : 0;
      const factor = 10 ** digits;
      return Math.round(numberArg(args, 0, 'round') * factor) / factor;
    },
  ],
  [
    'int',
    (args) => {
      arity(args, 1, 1, 'int');
      return Math.trunc(parseNumeric(args[0], 'int'));
    },
  ],
  [
    'float',
    (args) => {
      arity(args, 1, 1, 'float');
      return parseNumeric(args[0], 'float');
    },
  ],
  [
    'str',
    (args) => {
      arity(args, 1, 1, 'str');
      return formatValue(args[0]);
    },
  ],
  [
    'len',
    (args) => {
      arity(args, 1, 1, 'len');
      const value = args[0];
      if (typeof value === 'string' || Array.isArray(value)) return value.length;
      if (value !== null && typeof value === 'object') return Object.keys(value).length;
      throw new Error(`object of type ${typeof value} has no len()`);
    },
  ],
]);
