// packages/core/src/components/progress.ts -- Progress bar driven by a 0..1 value

import { EvaluationError } from '../utils/errors.js';
import type { Capability, ComponentBehavior } from './component.js';

export function createProgressBehavior(name: string): ComponentBehavior {
  return {
    kind: 'progress',
    capabilities: new Set<Capability>(['drawable']),
    defaults: {
      progress: 0,
      pos: [0, 0],
      size: [1, 0.1],
      color: 'white',
    },
    draw: (params) => {
      const raw = params.progress;
      const value = typeof raw === 'boolean' ? Number(raw) : raw;
      if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new EvaluationError(
          `Progress of "${name}" must be a number`,
          String(raw),
          undefined,
          name,
        );
      }
      return { ...params, progress: Math.min(1, Math.max(0, value)) };
    },
  };
}
