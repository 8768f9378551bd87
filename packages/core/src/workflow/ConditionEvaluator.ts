/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import { Condition, StepStatus } from './types.js';
import { VariableResolver, ResolutionScope, ResolveOptions, stringifyValue } from './VariableResolver.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { WorkflowConfigurationError, isNotFoundError } from './errors.js';
import { ExpressionBindings, evaluateCondition, toExpressionValue } from './ExpressionParser.js';
import { MAX_EXPRESSION_DEPTH } from './config.js';

export interface ConditionEvaluatorOptions {
  resolver: VariableResolver;
  paths: WorkspacePaths;
  /** Environment consulted by `env_set` */
  env: Readonly<Record<string, string | undefined>>;
}

/**
 * Engine for evaluating `when` gates and `while` conditions.
 * Predicates have no side effects; operands are resolved before comparison.
 */
export class ConditionEvaluator {
  private readonly resolver: VariableResolver;
  private readonly paths: WorkspacePaths;
  private readonly env: Readonly<Record<string, string | undefined>>;

  constructor(options: ConditionEvaluatorOptions) {
    this.resolver = options.resolver;
    this.paths = options.paths;
    this.env = options.env;
  }

  /**
   * Evaluate a condition against the current scope
   * @throws MissingVariableError, PathSafetyError or WorkflowConfigurationError
   */
  async evaluate(condition: Condition, scope: ResolutionScope, options: ResolveOptions = {}): Promise<boolean> {
    return this.evaluateNode(condition, scope, options, 0);
  }

  private async evaluateNode(
    condition: Condition,
    scope: ResolutionScope,
    options: ResolveOptions,
    depth: number
  ): Promise<boolean> {
    if (depth > MAX_EXPRESSION_DEPTH) {
      throw new WorkflowConfigurationError('Condition is nested too deeply', options.stepName);
    }

    switch (condition.type) {
      case 'step_ok': {
        const result = scope.lookupStep(this.text(condition.step, scope, options));
        if (!result) {
          return false;
        }
        return result.status === StepStatus.SKIPPED || result.exit_code === 0;
      }

      case 'file_exists': {
        const target = await this.paths.resolve(this.text(condition.path, scope, options), options.stepName);
        try {
          await fs.stat(target);
          return true;
        } catch (error) {
          if (isNotFoundError(error)) {
            return false;
          }
          throw error;
        }
      }

      case 'env_set': {
        const value = this.env[this.text(condition.name, scope, options)];
        return value !== undefined && value !== '';
      }

      case 'equals':
        return this.operand(condition.left, scope, options) === this.operand(condition.right, scope, options);

      case 'contains': {
        const left = this.resolver.resolveValue(condition.left, scope, options);
        const right = this.operand(condition.right, scope, options);
        if (Array.isArray(left)) {
          return left.some((entry) => stringifyValue(entry) === right);
        }
        return stringifyValue(left).includes(right);
      }

      case 'regex': {
        const value = this.text(condition.value, scope, options);
        const pattern = this.text(condition.pattern, scope, options);
        return compilePattern(pattern, options.stepName).test(value);
      }

      case 'compare': {
        const left = toNumber(this.operand(condition.left, scope, options), options.stepName);
        const right = toNumber(this.operand(condition.right, scope, options), options.stepName);
        switch (condition.op) {
          case '<':
            return left < right;
          case '<=':
            return left <= right;
          case '>':
            return left > right;
          case '>=':
            return left >= right;
          case '==':
            return left === right;
          case '!=':
            return left !== right;
          default:
            throw new WorkflowConfigurationError(
              `Unknown comparison operator '${String(condition.op)}'`,
              options.stepName
            );
        }
      }

      case 'all':
        for (const entry of condition.conditions) {
          if (!(await this.evaluateNode(entry, scope, options, depth + 1))) {
            return false;
          }
        }
        return true;

      case 'any':
        for (const entry of condition.conditions) {
          if (await this.evaluateNode(entry, scope, options, depth + 1)) {
            return true;
          }
        }
        return false;

      case 'not':
        return !(await this.evaluateNode(condition.condition, scope, options, depth + 1));

      case 'expr': {
        const source = condition.source;
        const bindings: ExpressionBindings = {
          lookup: (reference) => toExpressionValue(this.resolver.resolvePointer(reference, scope, options)),
          interpolate: (text) => this.text(text, scope, options),
        };
        try {
          return evaluateCondition(source, bindings);
        } catch (error) {
          if (error instanceof WorkflowConfigurationError) {
            throw new WorkflowConfigurationError(
              `Invalid expression '${source}': ${error.message}`,
              options.stepName,
              { expression: source }
            );
          }
          throw error;
        }
      }
    }
  }

  private text(value: string, scope: ResolutionScope, options: ResolveOptions): string {
    return this.resolver.resolveString(value, scope, options);
  }

  private operand(value: unknown, scope: ResolutionScope, options: ResolveOptions): string {
    return stringifyValue(this.resolver.resolveValue(value, scope, options));
  }
}

function compilePattern(pattern: string, stepName?: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new WorkflowConfigurationError(
      `Invalid regular expression '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
      stepName
    );
  }
}

function toNumber(value: string, stepName?: string): number {
  const parsed = value.trim() === '' ? Number.NaN : Number(value);
  if (Number.isNaN(parsed)) {
    throw new WorkflowConfigurationError(`Cannot compare non-numeric value '${value}'`, stepName);
  }
  return parsed;
}
