/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { Step, StepKind, StepResult, WaitForStep } from './types.js';
import { StepExecutor, StepExecutionContext, completedResult, failedResult } from './StepExecutor.js';
import { DependencyInjector } from './DependencyInjector.js';
import { VariableResolver } from './VariableResolver.js';
import { Sleeper, defaultSleep } from './CancellationToken.js';
import { StepTimeoutError, toWorkflowError } from './errors.js';
import { TIMEOUT_EXIT_CODE } from './config.js';

export interface WaitForServices {
  resolver: VariableResolver;
  /** Glob matching with the workspace path guard */
  dependencies: DependencyInjector;
  sleep?: Sleeper;
  now?: () => number;
}

/**
 * Blocks until a glob matches at least `min_count` files, polling at the
 * step's interval. Success stores `{files, count, waited_ms}` as json.
 */
export class WaitForExecutor extends StepExecutor<WaitForStep> {
  private readonly sleep: Sleeper;
  private readonly now: () => number;

  constructor(private readonly services: WaitForServices) {
    super();
    this.sleep = services.sleep ?? defaultSleep;
    this.now = services.now ?? Date.now;
  }

  getSupportedType(): StepKind {
    return 'wait_for';
  }

  canExecute(step: Step): step is WaitForStep {
    return step.kind === 'wait_for';
  }

  async execute(step: WaitForStep, context: StepExecutionContext): Promise<StepResult> {
    const startedAt = new Date();
    const start = this.now();
    try {
      const pattern = this.services.resolver.resolveString(step.glob, context.scope, {
        field: 'wait_for',
        allowUndefined: step.allowUndefined,
        stepName: step.name,
      });

      for (;;) {
        await context.checkCancellation?.();
        context.token.throwIfCancelled(step.name);

        const files = await this.services.dependencies.match(pattern, step.name);
        const waitedMs = this.now() - start;
        if (files.length >= step.minCount) {
          return completedResult(startedAt, {
            exit_code: 0,
            json: { files, count: files.length, waited_ms: waitedMs },
          });
        }
        if (waitedMs >= step.timeoutMs) {
          throw new StepTimeoutError(
            `Timed out after ${step.timeoutMs}ms waiting for ${step.minCount} file(s) matching '${pattern}'`,
            step.timeoutMs,
            step.name,
            { pattern, found: files.length }
          );
        }
        await this.sleep(Math.min(step.pollIntervalMs, step.timeoutMs - waitedMs), context.token.signal);
      }
    } catch (caught) {
      const error = toWorkflowError(caught, step.name);
      return failedResult(
        error,
        startedAt,
        error instanceof StepTimeoutError ? { exit_code: TIMEOUT_EXIT_CODE } : {},
        context.logger.getMasker()
      );
    }
  }
}
