// packages/core/src/components/shape.ts -- Visual shape (polygon, rect, circle)

import type { Capability, ComponentBehavior } from './component.js';

export function createShapeBehavior(): ComponentBehavior {
  return {
    kind: 'shape',
    capabilities: new Set<Capability>(['drawable']),
    defaults: {
      pos: [0, 0],
      size: [0.5, 0.5],
      ori: 0,
      vertices: 4,
      fillColor: 'white',
      lineColor: 'white',
      opacity: 1,
    },
    draw: (params) => ({ ...params }),
  };
}
