// packages/core/src/components -- tagged component variants behind one capability interface

import type { ComponentDefinition } from '../types/flow.js';
import { CodeBehavior } from './code.js';
import type { ComponentBehavior } from './component.js';
import { ComponentInstance } from './component-instance.js';
import { InputBehavior } from './input.js';
import { createProgressBehavior } from './progress.js';
import { createShapeBehavior } from './shape.js';
import { createTextBehavior } from './text.js';

export function createBehavior(definition: ComponentDefinition): ComponentBehavior {
  switch (definition.kind) {
    case 'shape':
      return createShapeBehavior();
    case 'text':
      return createTextBehavior();
    case 'progress':
      return createProgressBehavior(definition.name);
    case 'input':
      return new InputBehavior(definition.name);
    case 'code':
      return new CodeBehavior(definition);
  }
}

/** Fresh instance with its own parameter state; one per component per run. */
export function instantiateComponent(definition: ComponentDefinition): ComponentInstance {
  return new ComponentInstance(definition, createBehavior(definition));
}

export { ComponentInstance } from './component-instance.js';
export { InputBehavior } from './input.js';
export { CodeBehavior } from './code.js';
export { createShapeBehavior } from './shape.js';
export { createTextBehavior } from './text.js';
export { createProgressBehavior } from './progress.js';
export type {
  Capability,
  ComponentBehavior,
  ComponentContext,
  DrawCommand,
  ParameterValues,
} from './component.js';
