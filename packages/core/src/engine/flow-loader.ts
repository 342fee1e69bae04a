// packages/core/src/engine/flow-loader.ts

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { instantiateComponent } from '../components/index.js';
import type {
  ConditionRow,
  FlowDefinition,
  FlowNode,
  LoopDefinition,
  LoopNode,
  ResolvedFlow,
} from '../types/flow.js';
import { ConfigurationError } from '../utils/errors.js';
import { conditionRowsSchema, parseFlowDefinition } from './flow-schema.js';
import { compileCount } from './loop-node.js';

interface OpenLoop {
  node: LoopNode;
  entry: number;
}

function checkLoop(loop: LoopDefinition): void {
  if (loop.nReps === undefined) {
    if (!loop.isTrials || !loop.conditions) {
      throw new ConfigurationError(
        `Loop "${loop.name}" needs nReps${loop.isTrials ? ' or a condition table' : ''}`,
        loop.name,
      );
    }
    return;
  }
  compileCount(loop, loop.nReps);
}

function checkRoutines(definition: FlowDefinition): void {
  for (const routine of Object.values(definition.routines)) {
    const seen = new Set<string>();
    for (const component of routine.components) {
      if (seen.has(component.name)) {
        throw new ConfigurationError(
          `Routine "${routine.name}" has duplicate component name "${component.name}"`,
          routine.name,
        );
      }
      seen.add(component.name);
      // Rejects unknown parameters and expression syntax errors up front.
      instantiateComponent(component);
    }
  }
}

/**
 * Resolve the flat entry list into a tree of routines and loops. Every
 * LoopStart must be closed by a LoopEnd naming it, innermost first.
 */
export function linearizeFlow(definition: FlowDefinition): ResolvedFlow {
  checkRoutines(definition);

  const nodes: FlowNode[] = [];
  const open: OpenLoop[] = [];
  const loopNames = new Set<string>();
  const bodyOf = (): FlowNode[] => open[open.length - 1]?.node.body ?? nodes;

  definition.entries.forEach((entry, index) => {
    switch (entry.type) {
      case 'routine': {
        const routine = definition.routines[entry.routine];
        if (!routine) {
          throw new ConfigurationError(
            `Flow entry ${index} references undefined routine "${entry.routine}"`,
            entry.routine,
          );
        }
        bodyOf().push({ kind: 'routine', routine });
        break;
      }
      case 'loopStart': {
        const { loop } = entry;
        if (loopNames.has(loop.name)) {
          throw new ConfigurationError(`Duplicate loop name "${loop.name}"`, loop.name);
        }
        loopNames.add(loop.name);
        checkLoop(loop);
        const node: LoopNode = { kind: 'loop', loop, body: [] };
        bodyOf().push(node);
        open.push({ node, entry: index });
        break;
      }
      case 'loopEnd': {
        const innermost = open[open.length - 1];
        if (!innermost || !loopNames.has(entry.name)) {
          throw new ConfigurationError(
            `LoopEnd "${entry.name}" at entry ${index} has no matching LoopStart`,
            entry.name,
          );
        }
        if (innermost.node.loop.name !== entry.name) {
          throw new ConfigurationError(
            `LoopEnd "${entry.name}" at entry ${index} crosses open loop "${innermost.node.loop.name}"`,
            entry.name,
          );
        }
        open.pop();
        break;
      }
    }
  });

  const unclosed = open[open.length - 1];
  if (unclosed) {
    throw new ConfigurationError(
      `LoopStart "${unclosed.node.loop.name}" at entry ${unclosed.entry} is never closed`,
      unclosed.node.loop.name,
    );
  }

  return {
    name: definition.name,
    variables: definition.variables,
    nodes,
    entries: definition.entries,
  };
}

function describeNodes(nodes: FlowNode[], depth: number, lines: string[]): void {
  const pad = '  '.repeat(depth);
  for (const node of nodes) {
    if (node.kind === 'routine') {
      const count = node.routine.components.length;
      lines.push(`${pad}routine ${node.routine.name} (${count} component${count === 1 ? '' : 's'})`);
      continue;
    }
    const { loop } = node;
    if (loop.branch) {
      lines.push(`${pad}if ${loop.name}: ${loop.nReps ?? ''}`);
    } else {
      const details = [loop.loopType, `nReps: ${loop.nReps ?? 'rows'}`];
      if (loop.isTrials && loop.conditions) details.push(`${loop.conditions.length} condition rows`);
      if (loop.seed !== undefined) details.push(`seed ${loop.seed}`);
      lines.push(`${pad}loop ${loop.name} (${details.join(', ')})`);
    }
    describeNodes(node.body, depth + 1, lines);
  }
}

/** Indented outline of the flow tree, one line per node. */
export function describeFlow(flow: ResolvedFlow): string {
  const lines = [`flow ${flow.name}`];
  describeNodes(flow.nodes, 1, lines);
  return lines.join('\n');
}

function readStructured(filePath: string, what: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch {
    throw new ConfigurationError(`${what} not found: ${filePath}`);
  }
  try {
    // YAML 1.2 is a superset of JSON, so one parser covers both.
    return parseYaml(text);
  } catch (err) {
    throw new ConfigurationError(
      `Invalid YAML in ${what.toLowerCase()} ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Loads flow files (YAML or JSON) from disk, validates them and resolves
 * them into an executable tree.
 */
export class FlowLoader {
  constructor(private baseDir: string = process.cwd()) {}

  /** Read and validate a flow file without linearizing it. */
  loadDefinition(filePath: string): FlowDefinition {
    const fullPath = resolve(this.baseDir, filePath);
    const raw = readStructured(fullPath, 'Flow file');
    return parseFlowDefinition(raw, {
      source: filePath,
      readConditionsFile: (path) => this.readConditions(resolve(dirname(fullPath), path)),
    });
  }

  load(filePath: string): ResolvedFlow {
    return linearizeFlow(this.loadDefinition(filePath));
  }

  private readConditions(filePath: string): ConditionRow[] {
    const result = conditionRowsSchema.safeParse(readStructured(filePath, 'Conditions file'));
    if (!result.success) {
      throw new ConfigurationError(`Conditions file ${filePath} must be a list of rows`);
    }
    return result.data;
  }
}
