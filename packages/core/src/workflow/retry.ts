/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { RetryPolicy } from './types.js';
import {
  WorkflowError,
  WorkflowCancelledError,
  StepExecutionError,
  StepTimeoutError,
  toWorkflowError
} from './errors.js';
import { WorkflowLogger } from './logging.js';
import { Sleeper, defaultSleep } from './CancellationToken.js';

export interface WorkflowRetryContext {
  stepName: string;
  policy: RetryPolicy;
  logger?: WorkflowLogger;
  signal?: AbortSignal;
}

/**
 * Retry loop for process steps, driven by the step's `retries` policy
 */
export class WorkflowRetryManager {
  constructor(private readonly sleep: Sleeper = defaultSleep) {}

  /**
   * Execute `fn` until it succeeds, the policy declines, or attempts run out.
   * `fn` receives the 1-based attempt number. The last error is rethrown.
   */
  async executeWithRetry<T>(
    fn: (attempt: number) => Promise<T>,
    context: WorkflowRetryContext
  ): Promise<T> {
    const { policy } = context;
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (caught) {
        const error = toWorkflowError(caught, context.stepName);
        if (attempt >= policy.maxAttempts || !this.shouldRetry(error, policy) || context.signal?.aborted) {
          throw error;
        }

        const delayMs = this.computeDelay(policy, attempt);
        context.logger?.logRetryAttempt(context.stepName, attempt + 1, policy.maxAttempts, error.message, delayMs);
        await this.sleep(delayMs, context.signal);
        if (context.signal?.aborted) {
          throw new WorkflowCancelledError(undefined, context.stepName);
        }
      }
    }
  }

  /**
   * Timeouts follow `on_timeout`; non-zero exits follow `on_exit_codes`.
   * Configuration, path, dependency, parse and start-up failures never retry.
   */
  shouldRetry(error: WorkflowError, policy: RetryPolicy): boolean {
    if (error instanceof WorkflowCancelledError) {
      return false;
    }
    if (error instanceof StepTimeoutError) {
      return policy.onTimeout;
    }
    if (error instanceof StepExecutionError) {
      return error.exitCode !== null && policy.onExitCodes.includes(error.exitCode);
    }
    return false;
  }

  computeDelay(policy: RetryPolicy, attempt: number): number {
    if (policy.backoff === 'exponential') {
      return Math.min(policy.maxDelayMs, policy.delayMs * 2 ** (attempt - 1));
    }
    return Math.min(policy.maxDelayMs, policy.delayMs);
  }
}
