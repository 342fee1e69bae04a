// packages/core/src/components/code.ts -- Inline code blocks run at fixed hook points

import type { VariableEnvironment } from '../environment/variable-environment.js';
import { type CompiledStatements, compileStatements } from '../expression/evaluator.js';
import type { ComponentDefinition } from '../types/flow.js';
import { ConfigurationError, EvaluationError } from '../utils/errors.js';
import type { Capability, ComponentBehavior, ComponentContext, ParameterValues } from './component.js';

const CODE_HOOKS = ['beginExperiment', 'beginRoutine', 'eachFrame', 'endRoutine'] as const;

type CodeHook = (typeof CODE_HOOKS)[number];

function isCodeHook(name: string): name is CodeHook {
  return (CODE_HOOKS as readonly string[]).includes(name);
}

export class CodeBehavior implements ComponentBehavior {
  readonly kind = 'code';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['computational']);
  readonly defaults: ParameterValues = {
    beginExperiment: '',
    beginRoutine: '',
    eachFrame: '',
    endRoutine: '',
  };

  private blocks = new Map<CodeHook, CompiledStatements>();

  constructor(private readonly definition: ComponentDefinition) {
    for (const param of definition.parameters) {
      if (!isCodeHook(param.name)) continue;
      const source = param.source;
      if (source.type !== 'literal' || typeof source.value !== 'string') {
        throw new ConfigurationError(
          `Code component "${definition.name}" block "${param.name}" must be literal text`,
          definition.name,
        );
      }
      try {
        this.blocks.set(param.name, compileStatements(source.value));
      } catch (err) {
        if (err instanceof EvaluationError) throw err.withComponent(definition.name);
        throw err;
      }
    }
  }

  private runBlock(hook: CodeHook, env: VariableEnvironment): void {
    const block = this.blocks.get(hook);
    if (!block) return;
    try {
      block.run(env);
    } catch (err) {
      if (err instanceof EvaluationError) throw err.withComponent(this.definition.name);
      throw err;
    }
  }

  onRunStart(env: VariableEnvironment): void {
    this.runBlock('beginExperiment', env);
  }

  onRoutineBegin(ctx: ComponentContext): void {
    this.runBlock('beginRoutine', ctx.env);
  }

  onFrame(ctx: ComponentContext): void {
    this.runBlock('eachFrame', ctx.env);
  }

  onRoutineEnd(ctx: ComponentContext): void {
    this.runBlock('endRoutine', ctx.env);
  }
}
