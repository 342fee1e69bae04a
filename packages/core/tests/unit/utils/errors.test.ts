import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  ConfigurationError,
  EvaluationError,
  UnresolvedNameError,
} from '../../../src/utils/errors.js';

describe('error classes', () => {
  it('name themselves', () => {
    expect(new ConfigError('bad', 'engine.frameRate')).toMatchObject({
      name: 'ConfigError',
      field: 'engine.frameRate',
    });
    expect(new ConfigurationError('bad', 'trials')).toMatchObject({
      name: 'ConfigurationError',
      entry: 'trials',
    });
  });

  it('UnresolvedNameError mentions the expression when known', () => {
    expect(new UnresolvedNameError('x').message).toBe('Unresolved name "x"');
    expect(new UnresolvedNameError('x', 'x + 1').message).toBe('Unresolved name "x" in expression: x + 1');
  });

  it('EvaluationError.withComponent keeps the details', () => {
    const err = new EvaluationError('Division by zero at position 2', '1 / 0', 2).withComponent('label');
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toMatchObject({
      message: 'Division by zero at position 2 (component "label")',
      expression: '1 / 0',
      position: 2,
      component: 'label',
    });
  });
});
