/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { StepErrorDetail, ErrorKind } from './types.js';

/**
 * Base class for all workflow-related errors
 */
export abstract class WorkflowError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly stepName?: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    kind: ErrorKind,
    retryable: boolean,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.kind = kind;
    this.retryable = retryable;
    this.stepName = stepName;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get error details in a structured format
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      retryable: this.retryable,
      stepName: this.stepName,
      context: this.context,
      stack: this.stack
    };
  }

  /**
   * The shape recorded on a persisted step result
   */
  toDetail(): StepErrorDetail {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.context ? { context: this.context } : {})
    };
  }
}

/**
 * Invalid workflow definition, state document or step configuration
 */
export class WorkflowConfigurationError extends WorkflowError {
  constructor(
    message: string,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'WORKFLOW_CONFIGURATION_ERROR', 'configuration', false, stepName, context);
  }
}

/**
 * A user-declared path is absolute or resolves outside the workspace root
 */
export class PathSafetyError extends WorkflowError {
  public readonly requestedPath: string;

  constructor(
    message: string,
    requestedPath: string,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'PATH_SAFETY_ERROR', 'path_safety', false, stepName, { path: requestedPath, ...context });
    this.requestedPath = requestedPath;
  }
}

/**
 * A required dependency pattern matched no files
 */
export class MissingDependencyError extends WorkflowError {
  public readonly patterns: string[];

  constructor(
    message: string,
    patterns: string[],
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'MISSING_DEPENDENCY_ERROR', 'missing_dependency', false, stepName, { patterns, ...context });
    this.patterns = patterns;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      patterns: this.patterns
    };
  }
}

/**
 * A `${...}` reference names a variable that is not defined
 */
export class MissingVariableError extends WorkflowError {
  public readonly variable: string;
  public readonly field?: string;

  constructor(
    variable: string,
    field?: string,
    stepName?: string
  ) {
    super(
      field
        ? `Undefined variable '\${${variable}}' in field '${field}'`
        : `Undefined variable '\${${variable}}'`,
      'MISSING_VARIABLE_ERROR',
      'missing_variable',
      false,
      stepName,
      { variable, ...(field ? { field } : {}) }
    );
    this.variable = variable;
    this.field = field;
  }
}

/**
 * Captured output could not be parsed in the requested capture mode
 */
export class OutputParseError extends WorkflowError {
  constructor(
    message: string,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'OUTPUT_PARSE_ERROR', 'output_parse', false, stepName, context);
  }
}

/**
 * A process or wait exceeded its time budget
 */
export class StepTimeoutError extends WorkflowError {
  public readonly timeoutMs: number;

  constructor(
    message: string,
    timeoutMs: number,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STEP_TIMEOUT_ERROR', 'timeout', true, stepName, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs
    };
  }
}

/**
 * A process exited non-zero, or could not be started
 */
export class StepExecutionError extends WorkflowError {
  public readonly exitCode: number | null;

  constructor(
    message: string,
    exitCode: number | null,
    retryable: boolean,
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STEP_EXECUTION_ERROR', 'execution', retryable, stepName, { exitCode, ...context });
    this.exitCode = exitCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      exitCode: this.exitCode
    };
  }
}

/**
 * Error thrown when workflow execution is cancelled
 */
export class WorkflowCancelledError extends WorkflowError {
  constructor(
    message: string = 'Workflow execution was cancelled',
    stepName?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'WORKFLOW_CANCELLED_ERROR', 'cancelled', false, stepName, context);
  }
}

/**
 * Goto hops exceeded the workflow's `max_transitions`
 */
export class TransitionLimitError extends WorkflowError {
  public readonly limit: number;

  constructor(limit: number, stepName?: string) {
    super(
      `Exceeded max_transitions (${limit})`,
      'TRANSITION_LIMIT_ERROR',
      'execution',
      false,
      stepName,
      { limit }
    );
    this.limit = limit;
  }
}

/**
 * Another live process holds the run's lock
 */
export class RunLockedError extends WorkflowError {
  public readonly runId: string;
  public readonly ownerPid: number;

  constructor(runId: string, ownerPid: number) {
    super(
      `Run ${runId} is locked by live process ${ownerPid}`,
      'RUN_LOCKED_ERROR',
      'configuration',
      false,
      undefined,
      { runId, ownerPid }
    );
    this.runId = runId;
    this.ownerPid = ownerPid;
  }
}

/**
 * Wraps anything thrown into a WorkflowError, preserving workflow errors as-is
 */
export function toWorkflowError(error: unknown, stepName?: string): WorkflowError {
  if (error instanceof WorkflowError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StepExecutionError(message, null, false, stepName, {
    cause: error instanceof Error ? error.name : typeof error
  });
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether Node reported a missing file for this error
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
