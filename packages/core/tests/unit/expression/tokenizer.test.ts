import { describe, expect, it } from 'vitest';
import { tokenize } from '../../../src/expression/tokenizer.js';
import { EvaluationError } from '../../../src/utils/errors.js';

function kinds(source: string, statements = false): string[] {
  return tokenize(source, { statements }).map((t) => `${t.type}:${t.value}`);
}

describe('tokenize', () => {
  it('splits numbers, names and operators', () => {
    expect(kinds('trials.thisN + 1')).toEqual([
      'name:trials',
      'op:.',
      'name:thisN',
      'op:+',
      'number:1',
      'eof:',
    ]);
  });

  it('prefers the longest operator', () => {
    expect(kinds('a ** 2 // b')).toEqual(['name:a', 'op:**', 'number:2', 'op://', 'name:b', 'eof:']);
  });

  it('reads decimals and exponents', () => {
    expect(kinds('1.5 2e3 3E-2')).toEqual(['number:1.5', 'number:2e3', 'number:3E-2', 'eof:']);
  });

  it('does not treat a trailing dot as part of a number', () => {
    expect(kinds('x[1].y')).toEqual(['name:x', 'op:[', 'number:1', 'op:]', 'op:.', 'name:y', 'eof:']);
  });

  it('decodes string escapes in both quote styles', () => {
    const [single, double] = tokenize(`'it\\'s' "a\\nb"`);
    expect(single).toEqual({ type: 'string', value: "it's", pos: 0 });
    expect(double.value).toBe('a\nb');
  });

  it('records the position of each token', () => {
    const tokens = tokenize('ab >= 10');
    expect(tokens.map((t) => t.pos)).toEqual([0, 3, 6, 8]);
  });

  it('skips comments', () => {
    expect(kinds('x # the rest is ignored')).toEqual(['name:x', 'eof:']);
  });

  it('emits newline tokens for statement blocks only', () => {
    expect(kinds('a = 1; b = 2', true)).toEqual([
      'name:a',
      'op:=',
      'number:1',
      'newline:;',
      'name:b',
      'op:=',
      'number:2',
      'eof:',
    ]);
    expect(kinds('a\nb')).toEqual(['name:a', 'name:b', 'eof:']);
  });

  it('rejects ";" inside an expression', () => {
    expect(() => tokenize('a; b')).toThrow('Unexpected ";" at position 1');
  });

  it('rejects unterminated strings', () => {
    expect(() => tokenize('"open')).toThrow('Unterminated string starting at position 0');
  });

  it('rejects unknown characters with an EvaluationError', () => {
    let caught: unknown;
    try {
      tokenize('a @ b');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EvaluationError);
    expect(caught).toMatchObject({ message: 'Unexpected character "@" at position 2', position: 2 });
  });
});
