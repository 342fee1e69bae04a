import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import type { RunSummary } from '@trialflow/core';
import {
  EXIT_ABORTED,
  collect,
  exitCodeFor,
  parseAssignment,
  parseAssignments,
  parseInteger,
  parsePositiveNumber,
  writeSummary,
} from '../src/utils.js';

describe('option parsers', () => {
  it('collects repeated values', () => {
    expect(collect('b=2', collect('a=1', []))).toEqual(['a=1', 'b=2']);
  });

  it('parses positive numbers', () => {
    expect(parsePositiveNumber('2.5')).toBe(2.5);
    expect(() => parsePositiveNumber('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveNumber('fast')).toThrow('Must be a positive number');
  });

  it('parses integers', () => {
    expect(parseInteger('-3')).toBe(-3);
    expect(() => parseInteger('1.5')).toThrow('Must be an integer');
  });
});

describe('parseAssignment', () => {
  it.each([
    ['n=3', ['n', 3]],
    ['flag=True', ['flag', true]],
    ['sizes=[1, 2]', ['sizes', [1, 2]]],
    ['half=1 / 2', ['half', 0.5]],
    ['word=red', ['word', 'red']],
    ['phrase=hello world', ['phrase', 'hello world']],
    ['empty=', ['empty', '']],
    ['resp.corr=1', ['resp.corr', 1]],
  ])('reads %s', (pair, expected) => {
    expect(parseAssignment(pair)).toEqual(expected);
  });

  it.each(['=3', 'noequals', '1x=2'])('rejects %s', (pair) => {
    expect(() => parseAssignment(pair)).toThrow(`Expected name=value, got "${pair}"`);
  });

  it('lets later assignments win', () => {
    expect(parseAssignments(['n=1', 'word=red', 'n=2'])).toEqual({ n: 2, word: 'red' });
  });
});

describe('run results', () => {
  it('maps statuses to exit codes', () => {
    expect(exitCodeFor('completed')).toBe(0);
    expect(exitCodeFor('aborted')).toBe(EXIT_ABORTED);
  });

  it('writes the summary as indented JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'trialflow-cli-test-'));
    try {
      const file = join(dir, 'summary.json');
      const summary: RunSummary = {
        runId: 'run_abc',
        flowName: 'demo',
        status: 'completed',
        routineActivations: 1,
        loopIterations: 0,
        frames: 6,
        durationSec: 0.5,
        variables: { correct: 2 },
      };

      writeSummary(file, summary);

      const text = readFileSync(file, 'utf-8');
      expect(text.endsWith('}\n')).toBe(true);
      expect(JSON.parse(text)).toEqual(summary);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
