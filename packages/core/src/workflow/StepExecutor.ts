/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { Step, StepKind, StepResult, StepStatus } from './types.js';
import { ResolutionScope } from './VariableResolver.js';
import { CancellationToken } from './CancellationToken.js';
import { SecretMasker, WorkflowLogger } from './logging.js';
import { WorkflowError, toWorkflowError } from './errors.js';

/**
 * Everything one execution of one step needs from the engine
 */
export interface StepExecutionContext {
  /** Arena path of the step, such as `review/summarize` */
  path: string;
  scope: ResolutionScope;
  token: CancellationToken;
  logger: WorkflowLogger;
  /** File stem for spilled output, unique per execution */
  spillName: string;
  /** Result persisted by an interrupted run, consulted on resume */
  previous?: StepResult;
  /**
   * Aborted when an enclosing loop stops its own in-flight work (join
   * timeout or early join). Run-level cancellation never aborts it, so a
   * running process is left to finish or time out.
   */
  interrupt?: AbortSignal;
  /** Looks for out-of-process cancellation, cancelling `token` when found */
  checkCancellation?: () => Promise<void>;
}

/**
 * Abstract base class for step executors.
 * Each step kind (command, provider, loops, wait_for) implements this.
 * A failed step is reported as a result with status `failed`; a throw means
 * the executor itself could not proceed.
 */
export abstract class StepExecutor<TStep extends Step = Step> {
  abstract execute(step: TStep, context: StepExecutionContext): Promise<StepResult>;

  /**
   * Get the supported step kind for this executor
   */
  abstract getSupportedType(): StepKind;

  /**
   * Narrow a step to the kind this executor handles
   */
  abstract canExecute(step: Step): step is TStep;

  /**
   * Pre-execution hook
   */
  protected async beforeExecute(step: TStep, context: StepExecutionContext): Promise<void> {
    context.logger.logStepStart(context.path, step.kind);
  }

  /**
   * Post-execution hook, called for completed and failed results alike
   */
  protected async afterExecute(step: TStep, context: StepExecutionContext, result: StepResult): Promise<void> {
    if (result.status === StepStatus.COMPLETED) {
      context.logger.logStepComplete(context.path, result);
    }
  }

  /**
   * Error handling hook, called with the error of a failed result or a throw
   */
  protected async onError(step: TStep, context: StepExecutionContext, error: WorkflowError, durationMs?: number): Promise<void> {
    context.logger.logStepFailure(context.path, error, durationMs);
  }

  /**
   * Template method that wraps the execution with hooks
   */
  async executeWithHooks(step: TStep, context: StepExecutionContext): Promise<StepResult> {
    const startTime = Date.now();
    try {
      await this.beforeExecute(step, context);
      const result = await this.execute(step, context);
      await this.afterExecute(step, context, result);
      if (result.status === StepStatus.FAILED && result.error) {
        await this.onError(step, context, new RecordedStepError(result.error.message, result.error.kind, step.name, result.error.context), result.duration_ms);
      }
      return result;
    } catch (error) {
      const workflowError = toWorkflowError(error, step.name);
      await this.onError(step, context, workflowError, Date.now() - startTime);
      throw workflowError;
    }
  }
}

/**
 * Carries an error already recorded on a step result to the error hook
 */
class RecordedStepError extends WorkflowError {
  constructor(
    message: string,
    kind: WorkflowError['kind'],
    stepName: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STEP_FAILED', kind, false, stepName, context);
  }
}

/**
 * Builds the persisted result for a failure, masking secrets in the error
 */
export function failedResult(
  error: WorkflowError,
  startedAt: Date,
  extra: Partial<StepResult> = {},
  masker: SecretMasker = new SecretMasker()
): StepResult {
  const finishedAt = new Date();
  const detail = error.toDetail();
  return {
    status: StepStatus.FAILED,
    ...extra,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    duration_ms: finishedAt.getTime() - startedAt.getTime(),
    error: {
      kind: detail.kind,
      message: masker.mask(detail.message),
      ...(detail.context ? { context: masker.maskRecord(detail.context) } : {}),
    },
  };
}

/**
 * Builds a completed result with timings
 */
export function completedResult(startedAt: Date, fields: Partial<StepResult> = {}): StepResult {
  const finishedAt = new Date();
  return {
    status: StepStatus.COMPLETED,
    ...fields,
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    duration_ms: finishedAt.getTime() - startedAt.getTime(),
  };
}
