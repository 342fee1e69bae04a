// packages/core/src/components/component-instance.ts

import type { VariableEnvironment } from '../environment/variable-environment.js';
import { type CompiledExpression, compile } from '../expression/evaluator.js';
import type { ComponentDefinition, ComponentKind, ParameterDefinition, Value } from '../types/flow.js';
import { ConfigurationError, EvaluationError } from '../utils/errors.js';
import type { ComponentBehavior, ComponentContext, ParameterValues } from './component.js';

type Hook = 'onRoutineBegin' | 'onStart' | 'onFrame' | 'onStop' | 'onRoutineEnd';

function rethrowForComponent(err: unknown, component: string): never {
  if (err instanceof EvaluationError && err.component === undefined) {
    throw err.withComponent(component);
  }
  throw err;
}

function compileFor(source: string, component: string): CompiledExpression {
  try {
    return compile(source);
  } catch (err) {
    return rethrowForComponent(err, component);
  }
}

/**
 * A component definition bound to its behavior for the length of one run.
 * Holds the current parameter values and applies the updates policy of each
 * parameter.
 */
export class ComponentInstance {
  readonly name: string;
  readonly kind: ComponentKind;
  readonly startExpression?: CompiledExpression;
  readonly stopExpression?: CompiledExpression;

  private values: Record<string, Value>;
  private compiled = new Map<string, CompiledExpression>();
  private counts = new Map<string, number>();
  private resolvedOnce = new Set<string>();
  private lastRepeatKey: string | undefined;

  constructor(
    readonly definition: ComponentDefinition,
    readonly behavior: ComponentBehavior,
  ) {
    this.name = definition.name;
    this.kind = definition.kind;
    this.values = { ...behavior.defaults };

    for (const param of definition.parameters) {
      if (!(param.name in behavior.defaults)) {
        throw new ConfigurationError(
          `Component "${this.name}" (${this.kind}) has unknown parameter "${param.name}". ` +
            `Accepted: ${Object.keys(behavior.defaults).join(', ')}`,
          this.name,
        );
      }
      if (param.source.type === 'expression') {
        this.compiled.set(param.name, compileFor(param.source.source, this.name));
      }
    }

    if (definition.start.type === 'condition') {
      this.startExpression = compileFor(definition.start.expression, this.name);
    }
    if (definition.stop?.type === 'condition') {
      this.stopExpression = compileFor(definition.stop.expression, this.name);
    }
  }

  get params(): ParameterValues {
    return this.values;
  }

  get isDrawable(): boolean {
    return this.behavior.capabilities.has('drawable');
  }

  /** How many times `param` has been resolved during this run. */
  resolveCount(param: string): number {
    return this.counts.get(param) ?? 0;
  }

  /**
   * Resolve the parameters due at activation start: `never` (first activation
   * only), `constant`, and `set every repeat` when the enclosing loop
   * iteration changed. `repeatKey` is undefined outside any loop.
   */
  resolveForActivation(env: VariableEnvironment, repeatKey: string | undefined): void {
    const repeatChanged = repeatKey === undefined || repeatKey !== this.lastRepeatKey;
    for (const param of this.definition.parameters) {
      switch (param.updates) {
        case 'never':
          if (!this.resolvedOnce.has(param.name)) {
            this.resolve(param, env);
            this.resolvedOnce.add(param.name);
          }
          break;
        case 'constant':
          this.resolve(param, env);
          break;
        case 'set every repeat':
          if (repeatChanged) this.resolve(param, env);
          break;
        case 'set every frame':
          break;
      }
    }
    this.lastRepeatKey = repeatKey;
  }

  /** Resolve the `set every frame` parameters; called once per live tick. */
  resolveForFrame(env: VariableEnvironment): void {
    for (const param of this.definition.parameters) {
      if (param.updates === 'set every frame') this.resolve(param, env);
    }
  }

  evaluateCondition(expression: CompiledExpression, env: VariableEnvironment): Value {
    try {
      return expression.evaluate(env);
    } catch (err) {
      return rethrowForComponent(err, this.name);
    }
  }

  /** Run the once-per-run hook, if the behavior has one. */
  startRun(env: VariableEnvironment): void {
    if (!this.behavior.onRunStart) return;
    try {
      this.behavior.onRunStart(env);
    } catch (err) {
      rethrowForComponent(err, this.name);
    }
  }

  invoke(hook: Hook, ctx: ComponentContext): void {
    const fn = this.behavior[hook];
    if (!fn) return;
    try {
      fn.call(this.behavior, ctx);
    } catch (err) {
      rethrowForComponent(err, this.name);
    }
  }

  draw(): Record<string, Value> | undefined {
    if (!this.behavior.draw) return undefined;
    try {
      return this.behavior.draw(this.values);
    } catch (err) {
      return rethrowForComponent(err, this.name);
    }
  }

  private resolve(param: ParameterDefinition, env: VariableEnvironment): void {
    const expression = this.compiled.get(param.name);
    if (expression) {
      try {
        this.values[param.name] = expression.evaluate(env);
      } catch (err) {
        rethrowForComponent(err, this.name);
      }
    } else if (param.source.type === 'literal') {
      this.values[param.name] = param.source.value;
    }
    this.counts.set(param.name, (this.counts.get(param.name) ?? 0) + 1);
  }
}
