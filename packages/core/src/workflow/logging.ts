/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, createLogger, LogLevel } from '../utils/logging.js';
import { RunStatus, StepResult, StepStatus } from './types.js';
import { WorkflowError } from './errors.js';

export enum WorkflowLogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface WorkflowLogContext {
  runId: string;
  step?: string;
  phase?: 'init' | 'execution' | 'completed' | 'failed' | 'cancelled';
  executionTime?: number;
}

export interface WorkflowLogEntry {
  timestamp: string;
  level: WorkflowLogLevel;
  message: string;
  context: WorkflowLogContext;
  errorCode?: string;
  data?: Record<string, unknown>;
}

export interface RunMetrics {
  runId: string;
  name: string;
  startTime: number;
  endTime?: number;
  duration?: number;
  status: RunStatus;
  completedSteps: number;
  failedSteps: number;
  skippedSteps: number;
  /** Steps answered from an interrupted run's results */
  reusedSteps: number;
  retryCount: number;
  errorCount: number;
  warningCount: number;
}

export const MASK = '***';

/**
 * Replaces every known secret value with `***`. Longer values are replaced
 * first so a secret containing another is masked whole.
 */
export class SecretMasker {
  private readonly values: string[];

  constructor(values: Iterable<string> = []) {
    this.values = [...new Set(values)].filter((value) => value.length > 0).sort((a, b) => b.length - a.length);
  }

  get isEmpty(): boolean {
    return this.values.length === 0;
  }

  mask(text: string): string {
    let result = text;
    for (const value of this.values) {
      result = result.split(value).join(MASK);
    }
    return result;
  }

  maskValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.mask(value);
    }
    if (Array.isArray(value)) {
      return value.map((entry) => this.maskValue(entry));
    }
    if (value !== null && typeof value === 'object') {
      return this.maskRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }

  maskRecord(record: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(record)) {
      result[key] = this.maskValue(entry);
    }
    return result;
  }

  /**
   * A masker that also hides `values`
   */
  extend(values: Iterable<string>): SecretMasker {
    return new SecretMasker([...this.values, ...values]);
  }
}

/**
 * Structured, run-scoped logger. Entries are kept in memory and mirrored to
 * the debug logger; secret values never reach either.
 */
export class WorkflowLogger {
  private debugLogger: DebugLogger;
  private logEntries: WorkflowLogEntry[] = [];
  private metrics: RunMetrics;
  private masker: SecretMasker;

  constructor(
    runId: string,
    workflowName: string,
    masker: SecretMasker = new SecretMasker(),
    private readonly enabled: boolean = true
  ) {
    this.masker = masker;
    this.debugLogger = createLogger('workflow').withRedaction((message) => this.masker.mask(message));
    this.metrics = {
      runId,
      name: workflowName,
      startTime: Date.now(),
      status: RunStatus.RUNNING,
      completedSteps: 0,
      failedSteps: 0,
      skippedSteps: 0,
      reusedSteps: 0,
      retryCount: 0,
      errorCount: 0,
      warningCount: 0,
    };
  }

  /**
   * Secrets resolved after the logger was created
   */
  addSecrets(values: Iterable<string>): void {
    this.masker = this.masker.extend(values);
  }

  getMasker(): SecretMasker {
    return this.masker;
  }

  logRunStart(resumed: boolean, data?: Record<string, unknown>): void {
    this.log(WorkflowLogLevel.INFO, resumed ? 'Run resumed' : 'Run started', this.context('init'), data);
  }

  logStepStart(step: string, kind: string, attempt?: number): void {
    this.log(WorkflowLogLevel.INFO, `Step started: ${step}`, this.context('execution', step), {
      kind,
      ...(attempt !== undefined ? { attempt } : {}),
    });
  }

  logStepComplete(step: string, result: StepResult): void {
    this.metrics.completedSteps++;
    this.log(WorkflowLogLevel.INFO, `Step completed: ${step}`, this.context('execution', step, result.duration_ms), {
      exitCode: result.exit_code,
      attempts: result.attempts,
      truncated: result.truncated,
    });
  }

  logStepFailure(step: string, error: WorkflowError, executionTime?: number): void {
    this.metrics.failedSteps++;
    this.metrics.errorCount++;
    this.log(
      WorkflowLogLevel.ERROR,
      `Step failed: ${step}`,
      this.context('execution', step, executionTime),
      { errorMessage: error.message, kind: error.kind, context: error.context },
      error
    );
  }

  logStepSkipped(step: string, reason: string): void {
    this.metrics.skippedSteps++;
    this.log(WorkflowLogLevel.INFO, `Step skipped: ${step}`, this.context('execution', step), { reason });
  }

  logStepReused(step: string, fingerprint: string): void {
    this.metrics.reusedSteps++;
    this.log(WorkflowLogLevel.INFO, `Step reused: ${step}`, this.context('execution', step), { fingerprint });
  }

  logRetryAttempt(step: string, attempt: number, maxAttempts: number, reason: string, delayMs: number): void {
    this.metrics.retryCount++;
    this.metrics.warningCount++;
    this.log(
      WorkflowLogLevel.WARN,
      `Step retry attempt ${attempt}/${maxAttempts}: ${step}`,
      this.context('execution', step),
      { reason, delayMs }
    );
  }

  logTransition(from: string, to: string): void {
    this.log(WorkflowLogLevel.DEBUG, `Transition ${from} -> ${to}`, this.context('execution', from));
  }

  logLoopIteration(loop: string, index: number, status: StepStatus, data?: Record<string, unknown>): void {
    const level = status === StepStatus.FAILED ? WorkflowLogLevel.WARN : WorkflowLogLevel.DEBUG;
    if (level === WorkflowLogLevel.WARN) {
      this.metrics.warningCount++;
    }
    this.log(level, `Loop ${loop} iteration ${index}: ${status}`, this.context('execution', loop), data);
  }

  logRunComplete(status: RunStatus, error?: WorkflowError): void {
    this.finish(status);
    const level = status === RunStatus.COMPLETED ? WorkflowLogLevel.INFO : WorkflowLogLevel.ERROR;
    this.log(
      level,
      `Run ${status}`,
      this.context(status === RunStatus.COMPLETED ? 'completed' : 'failed', undefined, this.metrics.duration),
      error ? { errorMessage: error.message, kind: error.kind } : undefined,
      error
    );
  }

  logRunCancelled(reason?: string): void {
    this.finish(RunStatus.CANCELLED);
    this.metrics.warningCount++;
    this.log(WorkflowLogLevel.WARN, 'Run cancelled', this.context('cancelled', undefined, this.metrics.duration), {
      reason,
    });
  }

  /**
   * Core logging method
   */
  log(
    level: WorkflowLogLevel,
    message: string,
    context: WorkflowLogContext,
    data?: Record<string, unknown>,
    error?: WorkflowError
  ): void {
    if (!this.enabled) {
      return;
    }
    const maskedMessage = this.masker.mask(message);
    const maskedData = data ? this.masker.maskRecord(data) : undefined;
    const entry: WorkflowLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: maskedMessage,
      context,
      ...(error ? { errorCode: error.code } : {}),
      ...(maskedData ? { data: maskedData } : {}),
    };
    this.logEntries.push(entry);

    const debugMessage = `[${context.step || 'workflow'}] ${maskedMessage}`;
    const debugData = maskedData ? ` ${JSON.stringify(maskedData)}` : '';

    switch (level) {
      case WorkflowLogLevel.ERROR:
        this.debugLogger.error(debugMessage + debugData);
        break;
      case WorkflowLogLevel.WARN:
        this.debugLogger.warn(debugMessage + debugData);
        break;
      case WorkflowLogLevel.INFO:
        this.debugLogger.debug(debugMessage + debugData, LogLevel.NORMAL);
        break;
      case WorkflowLogLevel.DEBUG:
        this.debugLogger.debug(debugMessage + debugData, LogLevel.VERBOSE);
        break;
    }
  }

  getMetrics(): RunMetrics {
    return { ...this.metrics };
  }

  getLogEntries(): WorkflowLogEntry[] {
    return [...this.logEntries];
  }

  getLogEntriesByLevel(level: WorkflowLogLevel): WorkflowLogEntry[] {
    return this.logEntries.filter((entry) => entry.level === level);
  }

  getStepLogEntries(step: string): WorkflowLogEntry[] {
    return this.logEntries.filter((entry) => entry.context.step === step);
  }

  private context(
    phase: WorkflowLogContext['phase'],
    step?: string,
    executionTime?: number
  ): WorkflowLogContext {
    return {
      runId: this.metrics.runId,
      phase,
      ...(step ? { step } : {}),
      ...(executionTime !== undefined ? { executionTime } : {}),
    };
  }

  private finish(status: RunStatus): void {
    this.metrics.endTime = Date.now();
    this.metrics.duration = this.metrics.endTime - this.metrics.startTime;
    this.metrics.status = status;
  }
}
