import { describe, expect, it } from 'vitest';
import { parseExpression, parseStatements } from '../../../src/expression/parser.js';

describe('parseExpression', () => {
  it('parses literals and keyword constants', () => {
    expect(parseExpression('42')).toEqual({ type: 'literal', value: 42 });
    expect(parseExpression("'red'")).toEqual({ type: 'literal', value: 'red' });
    expect(parseExpression('True')).toEqual({ type: 'literal', value: true });
    expect(parseExpression('false')).toEqual({ type: 'literal', value: false });
    expect(parseExpression('None')).toEqual({ type: 'literal', value: null });
  });

  it('gives multiplication precedence over addition', () => {
    const expr = parseExpression('1 + 2 * 3');
    expect(expr).toMatchObject({
      type: 'binary',
      op: '+',
      left: { type: 'literal', value: 1 },
      right: { type: 'binary', op: '*' },
    });
  });

  it('makes ** right-associative and tighter than unary minus', () => {
    expect(parseExpression('-2 ** 2')).toMatchObject({
      type: 'unary',
      op: '-',
      operand: { type: 'binary', op: '**' },
    });
    expect(parseExpression('2 ** 3 ** 2')).toMatchObject({
      type: 'binary',
      op: '**',
      left: { type: 'literal', value: 2 },
      right: { type: 'binary', op: '**' },
    });
  });

  it('parses both conditional forms', () => {
    const shape = {
      type: 'conditional',
      test: { type: 'name', name: 'x' },
      consequent: { type: 'literal', value: 'a' },
      alternate: { type: 'literal', value: 'b' },
    };
    expect(parseExpression("'a' if x else 'b'")).toMatchObject(shape);
    expect(parseExpression("x ? 'a' : 'b'")).toMatchObject(shape);
  });

  it('accepts word and symbol forms of logical operators', () => {
    const shape = {
      type: 'logical',
      op: 'and',
      left: { type: 'name', name: 'a' },
      right: { type: 'unary', op: 'not', operand: { type: 'name', name: 'b' } },
    };
    expect(parseExpression('a and not b')).toMatchObject(shape);
    expect(parseExpression('a && !b')).toMatchObject(shape);
    expect(parseExpression('a or b')).toMatchObject({ type: 'logical', op: 'or' });
  });

  it('parses member access, indexing and calls', () => {
    expect(parseExpression('trials.thisN')).toMatchObject({
      type: 'member',
      object: { type: 'name', name: 'trials' },
      property: 'thisN',
    });
    expect(parseExpression('items[0]')).toMatchObject({ type: 'index' });
    expect(parseExpression('max(1, 2,)')).toMatchObject({ type: 'call', callee: 'max' });
    expect(parseExpression('[1, 2]')).toMatchObject({ type: 'list' });
  });

  it('rejects chained comparisons', () => {
    expect(() => parseExpression('1 < x < 3')).toThrow(
      'Chained comparisons are not supported at position 6 (found "<")',
    );
  });

  it('rejects calls on anything but a bare name', () => {
    expect(() => parseExpression('a.b(1)')).toThrow('Only built-in functions can be called');
  });

  it('rejects trailing tokens and empty input', () => {
    expect(() => parseExpression('1 2')).toThrow('Unexpected token at position 2 (found "2")');
    expect(() => parseExpression('   ')).toThrow('Empty expression');
  });

  it('reports a missing else', () => {
    expect(() => parseExpression('1 if x')).toThrow('Expected "else" at position 6 (found end of input)');
  });
});

describe('parseStatements', () => {
  it('parses assignments separated by newlines and semicolons', () => {
    const statements = parseStatements('score = 0\n\ncount += 1; resp.corr = 1');
    expect(statements.map((s) => [s.target, s.op])).toEqual([
      ['score', '='],
      ['count', '+='],
      ['resp.corr', '='],
    ]);
  });

  it('skips comment-only lines', () => {
    expect(parseStatements('# setup\nx = 1 # trailing')).toHaveLength(1);
  });

  it('returns no statements for an empty block', () => {
    expect(parseStatements('')).toEqual([]);
  });

  it('rejects a bare expression', () => {
    expect(() => parseStatements('x + 1')).toThrow('Expected an assignment operator');
  });

  it('rejects keywords as assignment targets', () => {
    expect(() => parseStatements('True = 1')).toThrow('Expected an assignment target');
  });

  it('rejects two statements on one line without a separator', () => {
    expect(() => parseStatements('a = 1 b = 2')).toThrow('Expected end of statement');
  });
});
