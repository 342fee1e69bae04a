// packages/core/src/expression/parser.ts

import type { Value } from '../types/flow.js';
import { EvaluationError } from '../utils/errors.js';
import { type Token, tokenize } from './tokenizer.js';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '//' | '%' | '**'
  | '==' | '!=' | '<' | '<=' | '>' | '>=';

export type AssignOperator = '=' | '+=' | '-=' | '*=' | '/=';

export type Expr =
  | { type: 'literal'; value: Value }
  | { type: 'name'; name: string; pos: number }
  | { type: 'member'; object: Expr; property: string; pos: number }
  | { type: 'index'; object: Expr; index: Expr; pos: number }
  | { type: 'call'; callee: string; args: Expr[]; pos: number }
  | { type: 'unary'; op: '-' | '+' | 'not'; operand: Expr; pos: number }
  | { type: 'binary'; op: BinaryOperator; left: Expr; right: Expr; pos: number }
  | { type: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { type: 'conditional'; test: Expr; consequent: Expr; alternate: Expr }
  | { type: 'list'; items: Expr[] };

export interface Statement {
  /** Flat environment key, dotted segments joined (`resp.corr`). */
  target: string;
  op: AssignOperator;
  value: Expr;
  pos: number;
}

const KEYWORD_LITERALS: Record<string, Value> = {
  True: true,
  true: true,
  False: false,
  false: false,
  None: null,
  null: null,
};

const RESERVED = new Set(['and', 'or', 'not', 'if', 'else']);

const COMPARISON_OPS = new Set(['==', '!=', '<', '<=', '>', '>=']);
const ASSIGN_OPS = new Set(['=', '+=', '-=', '*=', '/=']);

function isComparison(value: string): value is '==' | '!=' | '<' | '<=' | '>' | '>=' {
  return COMPARISON_OPS.has(value);
}

function isAssign(value: string): value is AssignOperator {
  return ASSIGN_OPS.has(value);
}

/**
 * Recursive-descent parser over the token stream. One instance parses one
 * source string.
 */
class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  private get current(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private isOp(...values: string[]): boolean {
    return this.current.type === 'op' && values.includes(this.current.value);
  }

  private isKeyword(word: string): boolean {
    return this.current.type === 'name' && this.current.value === word;
  }

  private fail(message: string, token: Token = this.current): never {
    const found = token.type === 'eof' ? 'end of input' : `"${token.value}"`;
    throw new EvaluationError(
      `${message} at position ${token.pos} (found ${found})`,
      this.source,
      token.pos,
    );
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) this.fail(`Expected "${value}"`);
    return this.advance();
  }

  atEnd(): boolean {
    return this.current.type === 'eof';
  }

  skipNewlines(): void {
    while (this.current.type === 'newline') this.advance();
  }

  parseExpressionOnly(): Expr {
    const expr = this.parseConditional();
    if (!this.atEnd()) this.fail('Unexpected token');
    return expr;
  }

  parseStatement(): Statement {
    const first = this.current;
    if (first.type !== 'name' || RESERVED.has(first.value) || first.value in KEYWORD_LITERALS) {
      this.fail('Expected an assignment target');
    }
    this.advance();
    const segments = [first.value];
    while (this.isOp('.')) {
      this.advance();
      const part = this.current;
      if (part.type !== 'name') this.fail('Expected a name after "."');
      segments.push(part.value);
      this.advance();
    }
    const opToken = this.current;
    const op: AssignOperator =
      opToken.type === 'op' && isAssign(opToken.value)
        ? opToken.value
        : this.fail('Expected an assignment operator');
    this.advance();
    const value = this.parseConditional();
    if (this.current.type !== 'newline' && !this.atEnd()) {
      this.fail('Expected end of statement');
    }
    return { target: segments.join('.'), op, value, pos: first.pos };
  }

  private parseConditional(): Expr {
    const expr = this.parseOr();

    if (this.isKeyword('if')) {
      this.advance();
      const test = this.parseOr();
      if (!this.isKeyword('else')) this.fail('Expected "else"');
      this.advance();
      const alternate = this.parseConditional();
      return { type: 'conditional', test, consequent: expr, alternate };
    }

    if (this.isOp('?')) {
      this.advance();
      const consequent = this.parseConditional();
      this.expectOp(':');
      const alternate = this.parseConditional();
      return { type: 'conditional', test: expr, consequent, alternate };
    }

    return expr;
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.isKeyword('or') || this.isOp('||')) {
      this.advance();
      left = { type: 'logical', op: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.isKeyword('and') || this.isOp('&&')) {
      this.advance();
      left = { type: 'logical', op: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.isKeyword('not') || this.isOp('!')) {
      const token = this.advance();
      return { type: 'unary', op: 'not', operand: this.parseNot(), pos: token.pos };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseAdditive();
    const token = this.current;
    if (token.type === 'op' && isComparison(token.value)) {
      this.advance();
      const right = this.parseAdditive();
      if (this.current.type === 'op' && isComparison(this.current.value)) {
        this.fail('Chained comparisons are not supported');
      }
      return { type: 'binary', op: token.value, left, right, pos: token.pos };
    }
    return left;
  }

  private parseAdditive(): Expr {
    let left = this.parseMultiplicative();
    while (this.isOp('+', '-')) {
      const token = this.advance();
      const op = token.value === '+' ? '+' : '-';
      left = { type: 'binary', op, left, right: this.parseMultiplicative(), pos: token.pos };
    }
    return left;
  }

  private parseMultiplicative(): Expr {
    let left = this.parseUnary();
    while (this.isOp('*', '/', '//', '%')) {
      const token = this.advance();
      const op = token.value === '*' ? '*' : token.value === '/' ? '/' : token.value === '//' ? '//' : '%';
      left = { type: 'binary', op, left, right: this.parseUnary(), pos: token.pos };
    }
    return left;
  }

  private parseUnary(): Expr {
    if (this.isOp('-', '+')) {
      const token = this.advance();
      const op = token.value === '-' ? '-' : '+';
      return { type: 'unary', op, operand: this.parseUnary(), pos: token.pos };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePostfix();
    if (this.isOp('**')) {
      const token = this.advance();
      return { type: 'binary', op: '**', left: base, right: this.parseUnary(), pos: token.pos };
    }
    return base;
  }

  private parsePostfix(): Expr {
    let expr = this.parseAtom();
    for (;;) {
      if (this.isOp('.')) {
        const dot = this.advance();
        const part = this.current;
        if (part.type !== 'name') this.fail('Expected a name after "."');
        this.advance();
        expr = { type: 'member', object: expr, property: part.value, pos: dot.pos };
      } else if (this.isOp('[')) {
        const open = this.advance();
        const index = this.parseConditional();
        this.expectOp(']');
        expr = { type: 'index', object: expr, index, pos: open.pos };
      } else if (this.isOp('(')) {
        const open = this.current;
        if (expr.type !== 'name') {
          return this.fail('Only built-in functions can be called', open);
        }
        const callee = expr;
        this.advance();
        const args = this.parseSequence(')');
        expr = { type: 'call', callee: callee.name, args, pos: callee.pos };
      } else {
        return expr;
      }
    }
  }

  private parseSequence(close: string): Expr[] {
    const items: Expr[] = [];
    if (this.isOp(close)) {
      this.advance();
      return items;
    }
    for (;;) {
      items.push(this.parseConditional());
      if (this.isOp(',')) {
        this.advance();
        if (this.isOp(close)) break;
        continue;
      }
      break;
    }
    this.expectOp(close);
    return items;
  }

  private parseAtom(): Expr {
    const token = this.current;
    switch (token.type) {
      case 'number':
        this.advance();
        return { type: 'literal', value: Number(token.value) };
      case 'string':
        this.advance();
        return { type: 'literal', value: token.value };
      case 'name': {
        if (token.value in KEYWORD_LITERALS) {
          this.advance();
          return { type: 'literal', value: KEYWORD_LITERALS[token.value] };
        }
        if (RESERVED.has(token.value)) this.fail('Unexpected keyword');
        this.advance();
        return { type: 'name', name: token.value, pos: token.pos };
      }
      case 'op':
        if (token.value === '(') {
          this.advance();
          const inner = this.parseConditional();
          this.expectOp(')');
          return inner;
        }
        if (token.value === '[') {
          this.advance();
          return { type: 'list', items: this.parseSequence(']') };
        }
        return this.fail('Unexpected token');
      default:
        return this.fail('Unexpected token');
    }
  }
}

export function parseExpression(source: string): Expr {
  if (source.trim() === '') {
    throw new EvaluationError('Empty expression', source, 0);
  }
  return new Parser(tokenize(source), source).parseExpressionOnly();
}

/**
 * Parse a code block of assignments separated by newlines or `;`.
 * Blank lines and `#` comments are skipped.
 */
export function parseStatements(source: string): Statement[] {
  const parser = new Parser(tokenize(source, { statements: true }), source);
  const statements: Statement[] = [];
  parser.skipNewlines();
  while (!parser.atEnd()) {
    statements.push(parser.parseStatement());
    parser.skipNewlines();
  }
  return statements;
}
