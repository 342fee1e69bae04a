// packages/core/src/expression/tokenizer.ts

import { EvaluationError } from '../utils/errors.js';

export type TokenType = 'number' | 'string' | 'name' | 'op' | 'newline' | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

// Longest operators first so `**` wins over `*`.
const OPERATORS = [
  '**', '//', '==', '!=', '<=', '>=', '&&', '||', '+=', '-=', '*=', '/=',
  '+', '-', '*', '/', '%', '<', '>', '!', '(', ')', '[', ']', ',', '.', '?', ':', '=',
];

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

export interface TokenizeOptions {
  /** Emit `newline` tokens for line breaks and `;` (statement blocks). */
  statements?: boolean;
}

export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === '\n' || ch === ';') {
      if (options.statements) {
        tokens.push({ type: 'newline', value: ch, pos: i });
      } else if (ch === ';') {
        throw new EvaluationError(`Unexpected ";" at position ${i}`, source, i);
      }
      i++;
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }

    if (ch === '#') {
      while (i < source.length && source[i] !== '\n') i++;
      continue;
    }

    if (DIGIT.test(ch)) {
      const start = i;
      while (i < source.length && DIGIT.test(source[i])) i++;
      if (source[i] === '.' && DIGIT.test(source[i + 1] ?? '')) {
        i++;
        while (i < source.length && DIGIT.test(source[i])) i++;
      }
      if (source[i] === 'e' || source[i] === 'E') {
        const save = i;
        i++;
        if (source[i] === '+' || source[i] === '-') i++;
        if (DIGIT.test(source[i] ?? '')) {
          while (i < source.length && DIGIT.test(source[i])) i++;
        } else {
          i = save;
        }
      }
      tokens.push({ type: 'number', value: source.slice(start, i), pos: start });
      continue;
    }

    if (NAME_START.test(ch)) {
      const start = i;
      while (i < source.length && NAME_PART.test(source[i])) i++;
      tokens.push({ type: 'name', value: source.slice(start, i), pos: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      const quote = ch;
      let value = '';
      i++;
      while (i < source.length && source[i] !== quote) {
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          value += ESCAPES[next] ?? next;
          i += 2;
          continue;
        }
        if (source[i] === '\n') break;
        value += source[i];
        i++;
      }
      if (source[i] !== quote) {
        throw new EvaluationError(`Unterminated string starting at position ${start}`, source, start);
      }
      i++;
      tokens.push({ type: 'string', value, pos: start });
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i));
    if (op === undefined) {
      throw new EvaluationError(`Unexpected character "${ch}" at position ${i}`, source, i);
    }
    tokens.push({ type: 'op', value: op, pos: i });
    i += op.length;
  }

  tokens.push({ type: 'eof', value: '', pos: source.length });
  return tokens;
}
