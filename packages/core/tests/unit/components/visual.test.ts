import { describe, expect, it } from 'vitest';
import { createProgressBehavior } from '../../../src/components/progress.js';
import { createShapeBehavior } from '../../../src/components/shape.js';
import { createTextBehavior } from '../../../src/components/text.js';

describe('drawable components', () => {
  it('shape draws its parameters unchanged', () => {
    const shape = createShapeBehavior();
    expect(shape.capabilities.has('drawable')).toBe(true);
    expect(shape.draw?.({ ...shape.defaults, fillColor: 'red' })).toMatchObject({ fillColor: 'red', vertices: 4 });
  });

  it('text draws its text as a string', () => {
    const text = createTextBehavior();
    expect(text.draw?.({ ...text.defaults, text: 3 })).toMatchObject({ text: '3' });
    expect(text.draw?.({ ...text.defaults, text: null })).toMatchObject({ text: '' });
  });

  it('progress clamps to 0..1', () => {
    const bar = createProgressBehavior('bar');
    expect(bar.draw?.({ ...bar.defaults, progress: 1.5 })).toMatchObject({ progress: 1 });
    expect(bar.draw?.({ ...bar.defaults, progress: -0.2 })).toMatchObject({ progress: 0 });
    expect(bar.draw?.({ ...bar.defaults, progress: 0.25 })).toMatchObject({ progress: 0.25 });
  });

  it('progress rejects non-numeric values', () => {
    const bar = createProgressBehavior('bar');
    expect(() => bar.draw?.({ ...bar.defaults, progress: 'half' })).toThrow('Progress of "bar" must be a number');
  });
});
