// packages/core/src/engine/flow-schema.ts

import { z } from 'zod';
import type {
  ComponentDefinition,
  ConditionRow,
  FlowDefinition,
  FlowEntry,
  LoopDefinition,
  ParameterDefinition,
  ParameterSource,
  RoutineDefinition,
  StartCondition,
  StopCondition,
  UpdatesPolicy,
  Value,
} from '../types/flow.js';
import { EXPRESSION_PREFIX, MAX_SEED } from '../utils/constants.js';
import { ConfigurationError } from '../utils/errors.js';

const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(valueSchema), z.record(valueSchema)]),
);

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier (letters, digits, underscore)');

const updatesSchema = z.enum(['never', 'constant', 'set every repeat', 'set every frame']);

interface NormalizedParameter {
  source: ParameterSource;
  updates?: UpdatesPolicy;
}

const parameterSchema = z.union([
  z
    .object({ expression: z.string().min(1), updates: updatesSchema.optional() })
    .strict()
    .transform((p): NormalizedParameter => ({
      source: { type: 'expression', source: p.expression },
      updates: p.updates,
    })),
  z
    .object({ literal: valueSchema, updates: updatesSchema.optional() })
    .strict()
    .transform((p): NormalizedParameter => ({
      source: { type: 'literal', value: p.literal },
      updates: p.updates,
    })),
  valueSchema.transform(
    (value): NormalizedParameter =>
      typeof value === 'string' && value.startsWith(EXPRESSION_PREFIX)
        ? { source: { type: 'expression', source: value.slice(EXPRESSION_PREFIX.length) } }
        : { source: { type: 'literal', value } },
  ),
]);

const componentSchema = z
  .object({
    kind: z.enum(['shape', 'text', 'progress', 'input', 'code']),
    name: identifier,
    startType: z.enum(['time', 'frame', 'condition', 'none']).optional(),
    startVal: z.union([z.number(), z.string()]).optional(),
    stopType: z.enum(['duration', 'time', 'frames', 'condition']).optional(),
    stopVal: z.union([z.number(), z.string()]).optional(),
    updates: updatesSchema.default('constant'),
    parameters: z.record(parameterSchema).default({}),
  })
  .strict();

const routineSchema = z
  .object({
    maxDuration: z.number().nonnegative().optional(),
    components: z.array(componentSchema).default([]),
  })
  .strict();

const rowSchema = z.record(valueSchema);

/** Contents of a `conditionsFile`: a list of rows. */
export const conditionRowsSchema = z.array(rowSchema);

const loopStartSchema = z
  .object({
    name: identifier,
    loopType: z.enum(['sequential', 'random']).default('sequential'),
    nReps: z.union([z.number(), z.string().min(1), z.boolean()]).optional(),
    seed: z.number().int().min(0).max(MAX_SEED).optional(),
    isTrials: z.boolean().default(false),
    branch: z.boolean().default(false),
    conditions: z.union([z.string(), z.array(rowSchema)]).optional(),
    conditionsFile: z.string().optional(),
  })
  .strict();

const entrySchema = z.union([
  z.object({ routine: z.string() }).strict(),
  z.object({ loopStart: loopStartSchema }).strict(),
  z.object({ loopEnd: z.string() }).strict(),
]);

export const flowFileSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    variables: z.record(valueSchema).default({}),
    conditions: z.record(z.array(rowSchema)).default({}),
    routines: z.record(routineSchema),
    flow: z.array(entrySchema).min(1),
  })
  .strict();

export type FlowFileInput = z.input<typeof flowFileSchema>;
type ComponentRecord = z.output<typeof componentSchema>;
type LoopStartRecord = z.output<typeof loopStartSchema>;

export interface ParseFlowOptions {
  /** Label used in error messages, usually the file path. */
  source?: string;
  /** Reads a `conditionsFile` reference; relative paths are the reader's concern. */
  readConditionsFile?: (path: string) => ConditionRow[];
}

function fail(source: string | undefined, path: string, message: string): never {
  const label = source ? ` "${source}"` : '';
  throw new ConfigurationError(`Invalid flow${label}: ${path}: ${message}`, path);
}

function numberValue(
  value: number | string | undefined,
  path: string,
  source: string | undefined,
  options: { integer?: boolean; fallback?: number } = {},
): number {
  if (value === undefined && options.fallback !== undefined) return options.fallback;
  if (typeof value !== 'number' || value < 0 || (options.integer && !Number.isInteger(value))) {
    return fail(source, path, `expected a non-negative ${options.integer ? 'integer' : 'number'}`);
  }
  return value;
}

function expressionValue(value: number | string | undefined, path: string, source: string | undefined): string {
  if (typeof value !== 'string' || value.trim() === '') {
    return fail(source, path, 'expected a condition expression');
  }
  return value;
}

function toStart(record: ComponentRecord, path: string, source: string | undefined): StartCondition {
  const at = `${path}.startVal`;
  switch (record.startType) {
    case undefined:
    case 'time':
      return { type: 'time', value: numberValue(record.startVal, at, source, { fallback: 0 }) };
    case 'frame':
      return { type: 'frame', value: numberValue(record.startVal, at, source, { integer: true, fallback: 0 }) };
    case 'condition':
      return { type: 'condition', expression: expressionValue(record.startVal, at, source) };
    case 'none':
      return { type: 'none' };
  }
}

function toStop(record: ComponentRecord, path: string, source: string | undefined): StopCondition | undefined {
  const at = `${path}.stopVal`;
  // A bare stopVal is a duration.
  const stopType = record.stopType ?? (record.stopVal !== undefined ? 'duration' : undefined);
  switch (stopType) {
    case undefined:
      return undefined;
    case 'duration':
    case 'time':
      return { type: stopType, value: numberValue(record.stopVal, at, source) };
    case 'frames':
      return { type: 'frames', value: numberValue(record.stopVal, at, source, { integer: true }) };
    case 'condition':
      return { type: 'condition', expression: expressionValue(record.stopVal, at, source) };
  }
}

function toComponent(record: ComponentRecord, path: string, source: string | undefined): ComponentDefinition {
  return {
    kind: record.kind,
    name: record.name,
    start: toStart(record, path, source),
    stop: toStop(record, path, source),
    updates: record.updates,
    parameters: Object.entries(record.parameters).map(
      ([name, parameter]): ParameterDefinition => ({
        name,
        source: parameter.source,
        updates: parameter.updates ?? record.updates,
      }),
    ),
  };
}

function toLoop(
  record: LoopStartRecord,
  tables: Record<string, ConditionRow[]>,
  path: string,
  options: ParseFlowOptions,
): LoopDefinition {
  let conditions: ConditionRow[] | undefined;
  if (record.conditions !== undefined && record.conditionsFile !== undefined) {
    fail(options.source, path, 'give either conditions or conditionsFile, not both');
  }
  if (typeof record.conditions === 'string') {
    conditions = tables[record.conditions];
    if (!conditions) {
      fail(options.source, `${path}.conditions`, `unknown condition table "${record.conditions}"`);
    }
  } else if (record.conditions) {
    conditions = record.conditions;
  } else if (record.conditionsFile !== undefined) {
    if (!options.readConditionsFile) {
      fail(options.source, `${path}.conditionsFile`, 'condition files can only be read when loading from disk');
    }
    conditions = options.readConditionsFile(record.conditionsFile);
  }

  return {
    name: record.name,
    loopType: record.loopType,
    nReps: record.nReps === undefined ? undefined : String(record.nReps),
    seed: record.seed,
    isTrials: record.isTrials,
    branch: record.branch,
    conditions,
  };
}

/**
 * Validate a raw flow record (parsed YAML/JSON) and convert it into a
 * FlowDefinition. Bracket structure is checked later by linearizeFlow.
 */
export function parseFlowDefinition(raw: unknown, options: ParseFlowOptions = {}): FlowDefinition {
  const result = flowFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const label = options.source ? ` "${options.source}"` : '';
    throw new ConfigurationError(`Invalid flow${label}: ${issues}`, result.error.issues[0]?.path.join('.'));
  }
  const file = result.data;

  const routines: Record<string, RoutineDefinition> = {};
  for (const [name, routine] of Object.entries(file.routines)) {
    routines[name] = {
      name,
      maxDuration: routine.maxDuration,
      components: routine.components.map((component, i) =>
        toComponent(component, `routines.${name}.components.${i}`, options.source),
      ),
    };
  }

  const entries: FlowEntry[] = file.flow.map((entry, i) => {
    if ('routine' in entry) return { type: 'routine', routine: entry.routine };
    if ('loopEnd' in entry) return { type: 'loopEnd', name: entry.loopEnd };
    return { type: 'loopStart', loop: toLoop(entry.loopStart, file.conditions, `flow.${i}.loopStart`, options) };
  });

  return {
    name: file.name,
    description: file.description,
    variables: file.variables,
    routines,
    entries,
  };
}
