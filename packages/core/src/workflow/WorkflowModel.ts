/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'crypto';
import {
  CaptureSpec,
  Condition,
  ConditionDefinition,
  DependencySpec,
  DependsOnDefinition,
  InjectDefinition,
  ParallelDefinition,
  ProviderTemplate,
  RetryDefinition,
  RetryPolicy,
  Step,
  StepDefinition,
  StepList,
  StepNode,
  Transition,
  TransitionDefinition,
  Transitions,
  TransitionsDefinition,
  WorkflowDefinition,
  WorkflowModel,
} from './types.js';
import { WorkflowConfigurationError } from './errors.js';
import {
  DEFAULT_INJECT_MAX_BYTES,
  DEFAULT_MAX_TRANSITIONS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  MAX_EXPRESSION_DEPTH,
  PROMPT_PLACEHOLDER,
  PROVIDER_RETRYABLE_EXIT_CODES,
} from './config.js';

const EXECUTION_KINDS = ['command', 'provider', 'for_each', 'while', 'wait_for'] as const;
const PROCESS_ONLY_FIELDS = [
  'depends_on',
  'retries',
  'timeout_sec',
  'secrets',
  'env',
  'input_file',
  'output_file',
  'output_capture',
  'allow_parse_error',
  'provider_params',
] as const;
const RESERVED_LOOP_NAMES: readonly string[] = ['steps', 'context', 'run', 'loop'];

interface MutableList {
  id: number;
  ownerNodeId?: number;
  nodeIds: number[];
  indexByName: Map<string, number>;
}

/**
 * Builds the immutable, arena-addressed model of a workflow definition.
 * Rejects anything the engine could not execute deterministically.
 */
export function buildWorkflowModel(definition: WorkflowDefinition): WorkflowModel {
  const builder = new ModelBuilder(definition);
  return builder.build();
}

/**
 * SHA-256 over a canonical (sorted-key) JSON rendering of the definition
 */
export function computeChecksum(definition: WorkflowDefinition): string {
  const digest = createHash('sha256').update(stableStringify(definition)).digest('hex');
  return `sha256:${digest}`;
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

class ModelBuilder {
  private nodes: StepNode[] = [];
  private lists: MutableList[] = [];
  private providers = new Map<string, ProviderTemplate>();

  constructor(private readonly definition: WorkflowDefinition) {}

  build(): WorkflowModel {
    const definition = this.definition;
    if (!definition.name) {
      throw new WorkflowConfigurationError('Workflow must have a name');
    }
    if (!Array.isArray(definition.steps) || definition.steps.length === 0) {
      throw new WorkflowConfigurationError('Workflow must declare at least one step');
    }

    for (const [name, provider] of Object.entries(definition.providers ?? {})) {
      this.providers.set(name, this.buildProvider(name, provider.command, provider.input_mode, provider.defaults));
    }

    const rootListId = this.buildList(definition.steps, undefined, '', false);
    this.validateTransitions();

    const model: WorkflowModel = {
      name: definition.name,
      version: definition.version,
      strictFlow: definition.strict_flow ?? true,
      maxTransitions: definition.max_transitions ?? DEFAULT_MAX_TRANSITIONS,
      providers: this.providers,
      context: { ...(definition.context ?? {}) },
      secrets: [...(definition.secrets ?? [])],
      rootListId,
      nodes: this.nodes,
      lists: this.lists.map((list): StepList => ({ ...list })),
      checksum: computeChecksum(definition),
      definition: structuredClone(definition),
    };
    return deepFreeze(model);
  }

  private buildProvider(
    name: string,
    command: string[],
    inputMode: 'argv' | 'stdin' | undefined,
    defaults: Record<string, string | number | boolean> | undefined
  ): ProviderTemplate {
    if (!Array.isArray(command) || command.length === 0) {
      throw new WorkflowConfigurationError(`Provider '${name}' must declare a non-empty command`);
    }
    const mode = inputMode ?? 'argv';
    const placeholderCount = command.filter((token) => token === PROMPT_PLACEHOLDER).length;
    if (mode === 'argv' && placeholderCount !== 1) {
      throw new WorkflowConfigurationError(
        `Provider '${name}' uses argv input and must contain ${PROMPT_PLACEHOLDER} exactly once as a whole argument`
      );
    }
    if (mode === 'stdin' && placeholderCount !== 0) {
      throw new WorkflowConfigurationError(
        `Provider '${name}' uses stdin input and must not contain ${PROMPT_PLACEHOLDER}`
      );
    }
    return { name, command: [...command], inputMode: mode, defaults: { ...(defaults ?? {}) } };
  }

  private buildList(
    definitions: StepDefinition[],
    ownerNodeId: number | undefined,
    pathPrefix: string,
    inLoop: boolean
  ): number {
    const list: MutableList = {
      id: this.lists.length,
      ownerNodeId,
      nodeIds: [],
      indexByName: new Map(),
    };
    this.lists.push(list);

    definitions.forEach((definition, index) => {
      if (!definition.name) {
        throw new WorkflowConfigurationError(`Step at ${pathPrefix || 'top level'}[${index}] has no name`);
      }
      if (definition.name.startsWith('_')) {
        throw new WorkflowConfigurationError(
          `Step name '${definition.name}' is reserved: names starting with '_' are transition targets`
        );
      }
      if (list.indexByName.has(definition.name)) {
        throw new WorkflowConfigurationError(
          `Duplicate step name '${definition.name}' in ${pathPrefix || 'top-level'} step list`,
          definition.name
        );
      }
      const path = pathPrefix ? `${pathPrefix}/${definition.name}` : definition.name;
      const nodeId = this.nodes.length;
      // reserve the slot so nested bodies get later ids
      this.nodes.push({ id: nodeId, path, listId: list.id, index, step: placeholderStep(definition.name) });
      list.indexByName.set(definition.name, index);
      list.nodeIds.push(nodeId);

      const step = this.buildStep(definition, nodeId, path, inLoop);
      this.nodes[nodeId] = { id: nodeId, path, listId: list.id, index, step };
    });

    return list.id;
  }

  private buildStep(definition: StepDefinition, nodeId: number, path: string, inLoop: boolean): Step {
    const declared = EXECUTION_KINDS.filter((kind) => definition[kind] !== undefined);
    if (declared.length !== 1) {
      throw new WorkflowConfigurationError(
        declared.length === 0
          ? `Step '${path}' must declare one of: ${EXECUTION_KINDS.join(', ')}`
          : `Step '${path}' declares mutually exclusive kinds: ${declared.join(', ')}`,
        definition.name,
        { declared }
      );
    }

    const kind = declared[0];
    if (kind === 'for_each' || kind === 'while' || kind === 'wait_for') {
      const stray = PROCESS_ONLY_FIELDS.filter((field) => definition[field] !== undefined);
      if (stray.length > 0) {
        throw new WorkflowConfigurationError(
          `${kind} step '${path}' does not take: ${stray.join(', ')}`,
          definition.name,
          { fields: stray }
        );
      }
    }

    const common = {
      name: definition.name,
      when: definition.when ? parseCondition(definition.when, path) : undefined,
      on: definition.on ? parseTransitions(definition.on, path, inLoop) : undefined,
      allowUndefined: [...(definition.allow_undefined ?? [])],
    };
    const processFields = {
      ...common,
      dependsOn: definition.depends_on ? parseDependencies(definition.depends_on) : undefined,
      timeoutMs: definition.timeout_sec !== undefined ? secondsToMs(definition.timeout_sec, path, 'timeout_sec') : undefined,
      secrets: [...(definition.secrets ?? [])],
      env: { ...(definition.env ?? {}) },
    };
    const capture: CaptureSpec = {
      mode: definition.output_capture ?? 'text',
      allowParseError: definition.allow_parse_error ?? false,
    };

    switch (kind) {
      case 'command': {
        const command = definition.command ?? [];
        if (command.length === 0) {
          throw new WorkflowConfigurationError(`Step '${path}' has an empty command`, definition.name);
        }
        return {
          ...processFields,
          kind: 'command',
          command: [...command],
          inputFile: definition.input_file,
          outputFile: definition.output_file,
          capture,
          retry: parseRetry(definition.retries, []),
        };
      }
      case 'provider': {
        const providerName = definition.provider ?? '';
        if (!this.providers.has(providerName)) {
          throw new WorkflowConfigurationError(
            `Step '${path}' references unknown provider '${providerName}'`,
            definition.name
          );
        }
        return {
          ...processFields,
          kind: 'provider',
          provider: providerName,
          params: { ...(definition.provider_params ?? {}) },
          inputFile: definition.input_file,
          outputFile: definition.output_file,
          capture,
          retry: parseRetry(definition.retries, PROVIDER_RETRYABLE_EXIT_CODES),
        };
      }
      case 'for_each': {
        const loop = definition.for_each;
        if (!loop) {
          throw new WorkflowConfigurationError(`Step '${path}' has an empty for_each`, definition.name);
        }
        if ((loop.items === undefined) === (loop.items_from === undefined)) {
          throw new WorkflowConfigurationError(
            `for_each step '${path}' must declare exactly one of items or items_from`,
            definition.name
          );
        }
        const as = loop.as ?? 'item';
        if (RESERVED_LOOP_NAMES.includes(as)) {
          throw new WorkflowConfigurationError(
            `for_each step '${path}' cannot bind '${as}': it names a variable namespace`,
            definition.name
          );
        }
        const parallel: ParallelDefinition | undefined = loop.parallel === true ? {} : loop.parallel || undefined;
        const body = this.buildList(loop.steps ?? [], nodeId, path, true);
        return {
          ...common,
          kind: 'for_each',
          items: loop.items ? [...loop.items] : undefined,
          itemsFrom: loop.items_from,
          as,
          parallel: parallel
            ? {
                maxWorkers: Math.max(1, parallel.max_workers ?? DEFAULT_MAX_WORKERS),
                timeoutMs: parallel.timeout_sec !== undefined
                  ? secondsToMs(parallel.timeout_sec, path, 'parallel.timeout_sec')
                  : undefined,
              }
            : undefined,
          join: parallel?.join ?? 'all',
          onItemFailure: loop.on_item_failure ?? 'stop',
          body,
        };
      }
      case 'while': {
        const loop = definition.while;
        if (!loop) {
          throw new WorkflowConfigurationError(`Step '${path}' has an empty while`, definition.name);
        }
        if (!Number.isInteger(loop.max_iterations) || loop.max_iterations < 1) {
          throw new WorkflowConfigurationError(
            `while step '${path}' requires a positive integer max_iterations`,
            definition.name
          );
        }
        const body = this.buildList(loop.steps ?? [], nodeId, path, true);
        return {
          ...common,
          kind: 'while',
          condition: parseCondition(loop.condition, path),
          maxIterations: loop.max_iterations,
          maxDurationMs: loop.max_duration_sec !== undefined
            ? secondsToMs(loop.max_duration_sec, path, 'max_duration_sec')
            : undefined,
          delayMs: loop.delay_sec !== undefined ? secondsToMs(loop.delay_sec, path, 'delay_sec') : 0,
          body,
        };
      }
      case 'wait_for': {
        const wait = definition.wait_for;
        if (!wait || !wait.glob) {
          throw new WorkflowConfigurationError(`wait_for step '${path}' requires a glob`, definition.name);
        }
        return {
          ...common,
          kind: 'wait_for',
          glob: wait.glob,
          minCount: wait.min_count ?? 1,
          timeoutMs: wait.timeout_sec !== undefined
            ? secondsToMs(wait.timeout_sec, path, 'timeout_sec')
            : DEFAULT_WAIT_TIMEOUT_MS,
          pollIntervalMs: wait.poll_interval_sec !== undefined
            ? secondsToMs(wait.poll_interval_sec, path, 'poll_interval_sec')
            : DEFAULT_POLL_INTERVAL_MS,
        };
      }
      default: {
        const unreachable: never = kind;
        throw new WorkflowConfigurationError(`Unsupported step kind: ${String(unreachable)}`);
      }
    }
  }

  /**
   * Goto targets must name a step in the same list as the step that jumps.
   */
  private validateTransitions(): void {
    for (const node of this.nodes) {
      const list = this.lists[node.listId];
      for (const transition of Object.values(node.step.on ?? {})) {
        if (transition?.type === 'goto' && transition.target !== '_start' && !list.indexByName.has(transition.target)) {
          throw new WorkflowConfigurationError(
            `Step '${node.path}' jumps to '${transition.target}', which is not a step in the same list`,
            node.step.name,
            { target: transition.target }
          );
        }
      }
    }
  }
}

function placeholderStep(name: string): Step {
  return {
    kind: 'wait_for',
    name,
    glob: '',
    minCount: 0,
    timeoutMs: 0,
    pollIntervalMs: 0,
    allowUndefined: [],
  };
}

function secondsToMs(seconds: number, path: string, field: string): number {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds) || seconds < 0) {
    throw new WorkflowConfigurationError(`Step '${path}' has an invalid ${field}: ${String(seconds)}`);
  }
  return Math.round(seconds * 1000);
}

export function parseCondition(definition: ConditionDefinition, path: string, depth = 0): Condition {
  if (depth > MAX_EXPRESSION_DEPTH) {
    throw new WorkflowConfigurationError(`Condition in '${path}' is nested too deeply`);
  }
  const keys = Object.keys(definition);
  if (keys.length !== 1) {
    throw new WorkflowConfigurationError(
      `Condition in '${path}' must have exactly one predicate, found: ${keys.join(', ') || 'none'}`
    );
  }
  if ('step_ok' in definition) return { type: 'step_ok', step: definition.step_ok };
  if ('file_exists' in definition) return { type: 'file_exists', path: definition.file_exists };
  if ('env_set' in definition) return { type: 'env_set', name: definition.env_set };
  if ('equals' in definition) return { type: 'equals', left: definition.equals.left, right: definition.equals.right };
  if ('contains' in definition) return { type: 'contains', left: definition.contains.left, right: definition.contains.right };
  if ('regex' in definition) return { type: 'regex', value: definition.regex.value, pattern: definition.regex.pattern };
  if ('compare' in definition) {
    return { type: 'compare', left: definition.compare.left, op: definition.compare.op, right: definition.compare.right };
  }
  if ('all' in definition) {
    return { type: 'all', conditions: definition.all.map((entry) => parseCondition(entry, path, depth + 1)) };
  }
  if ('any' in definition) {
    return { type: 'any', conditions: definition.any.map((entry) => parseCondition(entry, path, depth + 1)) };
  }
  if ('not' in definition) return { type: 'not', condition: parseCondition(definition.not, path, depth + 1) };
  if ('expr' in definition) return { type: 'expr', source: definition.expr };
  throw new WorkflowConfigurationError(`Unknown condition predicate '${keys[0]}' in '${path}'`);
}

function parseTransitions(definition: TransitionsDefinition, path: string, inLoop: boolean): Transitions {
  const result: Transitions = {};
  for (const outcome of ['success', 'failure', 'always'] as const) {
    const entry = definition[outcome];
    if (entry) {
      result[outcome] = parseTransition(entry, path, outcome, inLoop);
    }
  }
  return result;
}

function parseTransition(
  definition: TransitionDefinition,
  path: string,
  outcome: string,
  inLoop: boolean
): Transition {
  const forms = [definition.goto !== undefined, definition.end === true, definition.error !== undefined]
    .filter(Boolean).length;
  if (forms !== 1) {
    throw new WorkflowConfigurationError(
      `Transition on.${outcome} of '${path}' must use exactly one of goto, end or error`
    );
  }
  if (definition.end) {
    return { type: 'end' };
  }
  if (definition.error !== undefined) {
    return { type: 'error', message: definition.error };
  }
  const target = definition.goto ?? '';
  switch (target) {
    case '_end':
      return { type: 'end' };
    case '_error':
      return { type: 'error', message: `Step '${path}' routed to _error` };
    case '_loop_break':
    case '_loop_continue':
      if (!inLoop) {
        throw new WorkflowConfigurationError(`Step '${path}' uses ${target} outside a loop body`);
      }
      return { type: target === '_loop_break' ? 'loop_break' : 'loop_continue' };
    default:
      if (target.startsWith('_') && target !== '_start') {
        throw new WorkflowConfigurationError(`Step '${path}' uses unknown reserved target '${target}'`);
      }
      return { type: 'goto', target };
  }
}

function parseDependencies(definition: DependsOnDefinition): DependencySpec {
  const inject = definition.inject;
  const injectSpec: InjectDefinition = inject === true
    ? {}
    : inject === false || inject === undefined
      ? { mode: 'none' as const }
      : inject;
  return {
    required: [...(definition.required ?? [])],
    optional: [...(definition.optional ?? [])],
    injection: {
      mode: injectSpec.mode ?? 'list',
      instruction: injectSpec.instruction,
      position: injectSpec.position ?? 'prepend',
      maxBytes: injectSpec.max_bytes ?? DEFAULT_INJECT_MAX_BYTES,
    },
  };
}

function parseRetry(definition: RetryDefinition | undefined, defaultCodes: readonly number[]): RetryPolicy {
  return {
    maxAttempts: Math.max(1, definition?.max_attempts ?? 1),
    backoff: definition?.backoff ?? 'fixed',
    delayMs: definition?.delay_ms ?? DEFAULT_RETRY_DELAY_MS,
    maxDelayMs: definition?.max_delay_ms ?? DEFAULT_RETRY_MAX_DELAY_MS,
    onExitCodes: [...(definition?.on_exit_codes ?? defaultCodes)],
    onTimeout: definition?.on_timeout ?? true,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    if (value instanceof Map) {
      for (const entry of value.values()) {
        deepFreeze(entry);
      }
    } else {
      for (const entry of Object.values(value)) {
        deepFreeze(entry);
      }
    }
  }
  return value;
}

/**
 * Looks up the nodes of a step list in order
 */
export function listNodes(model: WorkflowModel, listId: number): StepNode[] {
  return model.lists[listId].nodeIds.map((nodeId) => model.nodes[nodeId]);
}
