/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { StepResult } from './types.js';
import { MissingVariableError, WorkflowConfigurationError } from './errors.js';

/**
 * Loop scope for one iteration; `parent` links the enclosing loop's iteration.
 */
export interface LoopScope {
  varName: string;
  item?: unknown;
  hasItem: boolean;
  index: number;
  iteration: number;
  total?: number;
  startedAt: number;
  parent?: LoopScope;
}

export interface RunScope {
  id: string;
  timestamp_utc: string;
  root: string;
}

export interface ResolutionScope {
  run: RunScope;
  context: Readonly<Record<string, unknown>>;
  /** Searches the innermost iteration first, then enclosing ones, then top level. */
  lookupStep(name: string): StepResult | undefined;
  loop?: LoopScope;
  now?: () => number;
}

export interface ResolveOptions {
  /** Field being resolved, matched against `allowUndefined` */
  field?: string;
  allowUndefined?: readonly string[];
  stepName?: string;
}

interface LookupResult {
  found: boolean;
  value?: unknown;
}

const NOT_FOUND: LookupResult = { found: false };
const REFERENCE_REGEX = /^[A-Za-z_][A-Za-z0-9_-]*(\.[A-Za-z0-9_-]+)*$/;

/**
 * Resolves `${namespace.path}` references.
 *
 * Namespaces, highest precedence first: the loop variable and `loop.*`, then
 * `steps.<name>.<field>`, `context.<key>` and `run.<field>`. `$$` yields a
 * literal `$`; `${{...}}` is left untouched for downstream templating.
 */
export class VariableResolver {
  /**
   * Substitute every reference in a string
   */
  resolveString(value: string, scope: ResolutionScope, options: ResolveOptions = {}): string {
    let output = '';
    let index = 0;

    while (index < value.length) {
      const char = value[index];
      if (char !== '$') {
        output += char;
        index++;
        continue;
      }

      const next = value[index + 1];
      if (next === '$') {
        output += '$';
        index += 2;
        continue;
      }
      if (next !== '{') {
        output += char;
        index++;
        continue;
      }

      if (value[index + 2] === '{') {
        const close = value.indexOf('}}', index + 3);
        if (close === -1) {
          throw new WorkflowConfigurationError(
            `Unterminated '\${{' in ${describeField(options)}`,
            options.stepName
          );
        }
        output += value.slice(index, close + 2);
        index = close + 2;
        continue;
      }

      const close = value.indexOf('}', index + 2);
      if (close === -1) {
        throw new WorkflowConfigurationError(
          `Unterminated variable reference in ${describeField(options)}`,
          options.stepName
        );
      }
      const reference = value.slice(index + 2, close).trim();
      output += stringifyValue(this.require(reference, scope, options));
      index = close + 1;
    }

    return output;
  }

  /**
   * Substitute recursively through arrays and plain objects. Non-string leaves pass through.
   */
  resolveValue(value: unknown, scope: ResolutionScope, options: ResolveOptions = {}): unknown {
    if (typeof value === 'string') {
      return this.resolveString(value, scope, options);
    }
    if (Array.isArray(value)) {
      return value.map((entry) => this.resolveValue(entry, scope, options));
    }
    if (isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveValue(entry, scope, options);
      }
      return result;
    }
    return value;
  }

  resolveRecord(
    record: Readonly<Record<string, string>>,
    scope: ResolutionScope,
    options: ResolveOptions = {}
  ): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(record)) {
      result[key] = this.resolveString(entry, scope, options);
    }
    return result;
  }

  /**
   * Resolve a whole-value pointer such as `steps.scan.json.files`, with or
   * without the `${}` wrapper, returning the raw value rather than text.
   */
  resolvePointer(pointer: string, scope: ResolutionScope, options: ResolveOptions = {}): unknown {
    const trimmed = pointer.trim();
    const reference = trimmed.startsWith('${') && trimmed.endsWith('}')
      ? trimmed.slice(2, -1).trim()
      : trimmed;
    return this.require(reference, scope, options);
  }

  /**
   * Whether the reference resolves, without throwing
   */
  has(reference: string, scope: ResolutionScope): boolean {
    return REFERENCE_REGEX.test(reference) && this.lookup(reference, scope).found;
  }

  private require(reference: string, scope: ResolutionScope, options: ResolveOptions): unknown {
    if (!REFERENCE_REGEX.test(reference)) {
      throw new WorkflowConfigurationError(
        `Invalid variable reference '\${${reference}}' in ${describeField(options)}: ` +
          'use dotted names without wildcards or indexing',
        options.stepName,
        { variable: reference }
      );
    }
    const result = this.lookup(reference, scope);
    if (result.found) {
      return result.value;
    }
    if (options.field && options.allowUndefined?.includes(options.field)) {
      return '';
    }
    throw new MissingVariableError(reference, options.field, options.stepName);
  }

  private lookup(reference: string, scope: ResolutionScope): LookupResult {
    const [head, ...rest] = reference.split('.');

    for (let frame = scope.loop; frame; frame = frame.parent) {
      if (frame.hasItem && head === frame.varName) {
        return walk(frame.item, rest);
      }
    }

    switch (head) {
      case 'loop':
        return scope.loop ? lookupLoop(scope.loop, rest, scope.now ?? Date.now) : NOT_FOUND;
      case 'steps':
        return lookupStep(scope, rest);
      case 'context':
        return rest.length > 0 ? walk(scope.context, rest) : NOT_FOUND;
      case 'run':
        return lookupRun(scope.run, rest);
      default:
        return NOT_FOUND;
    }
  }
}

function lookupLoop(loop: LoopScope, rest: string[], now: () => number): LookupResult {
  if (rest.length !== 1) {
    return NOT_FOUND;
  }
  switch (rest[0]) {
    case 'index':
      return { found: true, value: loop.index };
    case 'iteration':
      return { found: true, value: loop.iteration };
    case 'total':
      return loop.total === undefined ? NOT_FOUND : { found: true, value: loop.total };
    case 'elapsed':
      return { found: true, value: Math.round(now() - loop.startedAt) / 1000 };
    default:
      return NOT_FOUND;
  }
}

function lookupStep(scope: ResolutionScope, rest: string[]): LookupResult {
  const [name, field, ...path] = rest;
  if (!name || !field) {
    return NOT_FOUND;
  }
  const result = scope.lookupStep(name);
  if (!result) {
    return NOT_FOUND;
  }
  if (field === 'json') {
    return result.json === undefined ? NOT_FOUND : walk(result.json, path);
  }
  if (path.length > 0) {
    return NOT_FOUND;
  }
  const value = (() => {
    switch (field) {
      case 'exit_code':
        return result.exit_code;
      case 'output':
        return result.output;
      case 'lines':
        return result.lines;
      case 'duration':
        return result.duration_ms;
      case 'status':
        return result.status;
      default:
        return undefined;
    }
  })();
  return value === undefined ? NOT_FOUND : { found: true, value };
}

function lookupRun(run: RunScope, rest: string[]): LookupResult {
  if (rest.length !== 1) {
    return NOT_FOUND;
  }
  switch (rest[0]) {
    case 'id':
      return { found: true, value: run.id };
    case 'timestamp_utc':
      return { found: true, value: run.timestamp_utc };
    case 'root':
      return { found: true, value: run.root };
    default:
      return NOT_FOUND;
  }
}

function walk(value: unknown, path: string[]): LookupResult {
  let current = value;
  for (const key of path) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return NOT_FOUND;
    }
    current = current[key];
  }
  return current === undefined ? NOT_FOUND : { found: true, value: current };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function describeField(options: ResolveOptions): string {
  return options.field ? `field '${options.field}'` : 'value';
}
