// packages/core/src/components/text.ts

import { formatValue } from '../expression/evaluator.js';
import type { Capability, ComponentBehavior } from './component.js';

export function createTextBehavior(): ComponentBehavior {
  return {
    kind: 'text',
    capabilities: new Set<Capability>(['drawable']),
    defaults: {
      text: '',
      pos: [0, 0],
      height: 0.05,
      color: 'white',
      opacity: 1,
    },
    draw: (params) => ({ ...params, text: formatValue(params.text ?? '') }),
  };
}
