// packages/core/src/expression -- runtime expressions over the variable environment

export { tokenize } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseExpression, parseStatements } from './parser.js';
export type { Expr, Statement, BinaryOperator, AssignOperator } from './parser.js';
export {
  compile,
  compileStatements,
  evaluate,
  executeStatements,
  applyBinary,
  isTruthy,
  isObjectValue,
  formatValue,
} from './evaluator.js';
export type { CompiledExpression, CompiledStatements } from './evaluator.js';
export { BUILTINS } from './builtins.js';
export type { BuiltinFunction } from './builtins.js';
