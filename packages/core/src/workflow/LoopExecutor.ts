/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ForEachStep,
  IterationRecord,
  JoinPolicy,
  LoopState,
  LoopSummary,
  Step,
  StepErrorDetail,
  StepKind,
  StepResult,
  StepStatus,
  TerminationReason,
  WhileStep,
} from './types.js';
import { StepExecutor, StepExecutionContext, completedResult, failedResult } from './StepExecutor.js';
import { LoopScope, ResolutionScope, VariableResolver } from './VariableResolver.js';
import { ConditionEvaluator } from './ConditionEvaluator.js';
import { CancellationToken, Sleeper, defaultSleep } from './CancellationToken.js';
import {
  StepExecutionError,
  StepTimeoutError,
  WorkflowCancelledError,
  WorkflowConfigurationError,
  WorkflowError,
  toWorkflowError,
} from './errors.js';
import { TIMEOUT_EXIT_CODE } from './config.js';

/**
 * How a step list (top level or one loop iteration) stopped
 */
export type ListOutcome =
  | { kind: 'completed'; hadFailure: boolean }
  | { kind: 'failed'; step: string; error?: StepErrorDetail }
  | { kind: 'end' }
  | { kind: 'error'; message: string }
  | { kind: 'loop_break' }
  | { kind: 'loop_continue' }
  | { kind: 'cancelled' };

export interface IterationRequest {
  /** List id of the loop body */
  body: number;
  /** State key of the loop, such as `review` or `outer[1]/inner` */
  loopKey: string;
  index: number;
  loop: LoopScope;
  /** The iteration's isolated result map, filled in place */
  steps: Record<string, StepResult>;
  parentScope: ResolutionScope;
  token: CancellationToken;
  /** Aborts the iteration's in-flight processes */
  interrupt?: AbortSignal;
  /** Results an interrupted run left for this iteration, offered for reuse */
  previous?: Readonly<Record<string, StepResult>>;
}

/**
 * What loop executors need from the engine that runs them
 */
export interface LoopHost {
  getLoop(key: string): LoopState | undefined;
  saveLoop(key: string, loop: LoopState): Promise<void>;
  /** Forget a loop and everything nested in it before a fresh start */
  clearLoop(key: string): void;
  runIteration(request: IterationRequest): Promise<ListOutcome>;
}

export interface LoopServices {
  host: LoopHost;
  resolver: VariableResolver;
  conditions: ConditionEvaluator;
  sleep?: Sleeper;
  now?: () => number;
}

interface IterationOutcome {
  record: IterationRecord;
  outcome: ListOutcome;
}

/**
 * Shared bookkeeping for `for_each` and `while`
 */
abstract class LoopExecutor<TStep extends ForEachStep | WhileStep> extends StepExecutor<TStep> {
  protected readonly sleep: Sleeper;
  protected readonly now: () => number;

  constructor(protected readonly services: LoopServices) {
    super();
    this.sleep = services.sleep ?? defaultSleep;
    this.now = services.now ?? Date.now;
  }

  /**
   * Run one iteration and record how it ended
   */
  /**
   * Persisted state of this loop when an interrupted run is resuming into it.
   * Any other entry, such as a goto back to the loop, starts from scratch.
   */
  protected resumableLoop(context: StepExecutionContext): LoopState | undefined {
    if (context.previous) {
      return this.services.host.getLoop(context.path);
    }
    this.services.host.clearLoop(context.path);
    return undefined;
  }

  protected async runIteration(
    step: TStep,
    context: StepExecutionContext,
    loop: LoopState,
    record: IterationRecord,
    scope: LoopScope,
    token: CancellationToken,
    interrupt: AbortSignal | undefined = context.interrupt
  ): Promise<IterationOutcome> {
    const previous = Object.keys(record.steps).length > 0 ? record.steps : undefined;
    const started = this.now();
    record.status = StepStatus.RUNNING;
    record.steps = {};
    record.started_at = new Date(started).toISOString();
    delete record.error;
    delete record.duration_ms;
    await this.services.host.saveLoop(context.path, loop);

    const outcome = await this.services.host.runIteration({
      body: step.body,
      loopKey: context.path,
      index: record.index,
      loop: scope,
      steps: record.steps,
      parentScope: context.scope,
      token,
      ...(interrupt ? { interrupt } : {}),
      ...(previous ? { previous } : {}),
    });

    const { status, error } = classifyIteration(outcome, step.name);
    record.status = status;
    record.duration_ms = this.now() - started;
    if (error) {
      record.error = error;
    }
    context.logger.logLoopIteration(context.path, record.index, status, { outcome: outcome.kind });
    await this.services.host.saveLoop(context.path, loop);
    return { record, outcome };
  }

  protected summarize(loop: LoopState, total: number, reason?: TerminationReason): LoopSummary {
    let completed = 0;
    let failed = 0;
    for (const record of loop.iterations) {
      if (record.status === StepStatus.COMPLETED) {
        completed++;
      } else if (record.status === StepStatus.FAILED) {
        failed++;
      }
    }
    return {
      total,
      completed,
      failed,
      skipped: total - completed - failed,
      success_rate: total === 0 ? 1 : Math.round((completed / total) * 1000) / 1000,
      duration_ms: this.now() - Date.parse(loop.started_at),
      ...(reason ? { termination_reason: reason } : {}),
    };
  }

  protected failure(error: WorkflowError, startedAt: Date, context: StepExecutionContext, summary?: LoopSummary): StepResult {
    const exitCode = error instanceof StepTimeoutError ? TIMEOUT_EXIT_CODE : 1;
    return failedResult(
      error,
      startedAt,
      { exit_code: exitCode, ...(summary ? { json: summary } : {}) },
      context.logger.getMasker()
    );
  }
}

/**
 * Runs a body once per item, sequentially or on a bounded worker pool.
 * Items are resolved once and persisted, so a resumed run iterates the same
 * list and only re-runs iterations that did not complete.
 */
export class ForEachExecutor extends LoopExecutor<ForEachStep> {
  getSupportedType(): StepKind {
    return 'for_each';
  }

  canExecute(step: Step): step is ForEachStep {
    return step.kind === 'for_each';
  }

  async execute(step: ForEachStep, context: StepExecutionContext): Promise<StepResult> {
    const startedAt = new Date();
    let loop: LoopState;
    try {
      loop = await this.prepare(step, context);
    } catch (caught) {
      return this.failure(toWorkflowError(caught, step.name), startedAt, context);
    }

    const loopToken = context.token.createChild();
    let result: ForEachRunResult;
    try {
      result = step.parallel
        ? await this.runParallel(step, context, loop, loopToken, step.parallel.maxWorkers, step.parallel.timeoutMs)
        : await this.runSequential(step, context, loop, loopToken);
    } finally {
      loopToken.dispose();
    }

    for (const record of loop.iterations) {
      if (record.status === StepStatus.PENDING) {
        record.status = StepStatus.SKIPPED;
      }
    }
    const summary = this.summarize(loop, loop.iterations.length);
    loop.summary = summary;
    await this.services.host.saveLoop(context.path, loop);

    if (context.token.isCancelled || result.cancelled) {
      return this.failure(new WorkflowCancelledError(context.token.reason, step.name), startedAt, context, summary);
    }
    if (result.timedOut && step.parallel?.timeoutMs !== undefined && !joinSatisfied(step.join, summary)) {
      return this.failure(
        new StepTimeoutError(
          `for_each '${step.name}' timed out after ${step.parallel.timeoutMs}ms`,
          step.parallel.timeoutMs,
          step.name,
          { completed: summary.completed, total: summary.total }
        ),
        startedAt,
        context,
        summary
      );
    }
    if (result.terminated === 'end') {
      return completedResult(startedAt, { exit_code: 0, json: summary });
    }
    if (result.terminated === 'error' || !joinSatisfied(step.join, summary)) {
      return this.failure(
        new StepExecutionError(
          `for_each '${step.name}' did not satisfy join '${step.join}': ${summary.completed}/${summary.total} iterations completed`,
          1,
          false,
          step.name,
          { completed: summary.completed, failed: summary.failed, skipped: summary.skipped }
        ),
        startedAt,
        context,
        summary
      );
    }
    return completedResult(startedAt, { exit_code: 0, json: summary });
  }

  /**
   * Resolve the items once; on resume, reuse the persisted list and keep
   * completed iterations
   */
  private async prepare(step: ForEachStep, context: StepExecutionContext): Promise<LoopState> {
    const existing = this.resumableLoop(context);
    if (existing?.kind === 'for_each' && existing.items) {
      const items = existing.items;
      existing.iterations = items.map((item, index) => {
        const record = existing.iterations.find((candidate) => candidate.index === index);
        if (record) {
          return record.status === StepStatus.COMPLETED ? record : { ...record, item, status: StepStatus.PENDING };
        }
        return { index, item, status: StepStatus.PENDING, steps: {} };
      });
      delete existing.summary;
      await this.services.host.saveLoop(context.path, existing);
      return existing;
    }

    const items = this.resolveItems(step, context);
    const loop: LoopState = {
      kind: 'for_each',
      items,
      iterations: items.map((item, index) => ({ index, item, status: StepStatus.PENDING, steps: {} })),
      started_at: new Date(this.now()).toISOString(),
    };
    await this.services.host.saveLoop(context.path, loop);
    return loop;
  }

  private resolveItems(step: ForEachStep, context: StepExecutionContext): unknown[] {
    const options = { field: 'for_each', allowUndefined: step.allowUndefined, stepName: step.name };
    if (step.items) {
      const resolved = this.services.resolver.resolveValue([...step.items], context.scope, options);
      return Array.isArray(resolved) ? resolved : [];
    }
    const pointer = step.itemsFrom ?? '';
    const value = this.services.resolver.resolvePointer(pointer, context.scope, options);
    if (!Array.isArray(value)) {
      throw new WorkflowConfigurationError(
        `for_each items_from '${pointer}' must resolve to an array, got ${value === null ? 'null' : typeof value}`,
        step.name,
        { items_from: pointer }
      );
    }
    return [...value];
  }

  private iterationScope(step: ForEachStep, context: StepExecutionContext, loop: LoopState, record: IterationRecord): LoopScope {
    return {
      varName: step.as,
      item: record.item,
      hasItem: true,
      index: record.index,
      iteration: record.index + 1,
      total: loop.iterations.length,
      startedAt: Date.parse(loop.started_at),
      ...(context.scope.loop ? { parent: context.scope.loop } : {}),
    };
  }

  private async runSequential(
    step: ForEachStep,
    context: StepExecutionContext,
    loop: LoopState,
    token: CancellationToken
  ): Promise<ForEachRunResult> {
    const result: ForEachRunResult = { cancelled: false, timedOut: false };
    for (const record of loop.iterations) {
      if (record.status !== StepStatus.PENDING) {
        continue;
      }
      await context.checkCancellation?.();
      if (token.isCancelled) {
        result.cancelled = true;
        break;
      }
      const { record: done, outcome } = await this.runIteration(
        step,
        context,
        loop,
        record,
        this.iterationScope(step, context, loop, record),
        token
      );
      if (outcome.kind === 'cancelled') {
        result.cancelled = true;
        break;
      }
      if (outcome.kind === 'end' || outcome.kind === 'error') {
        result.terminated = outcome.kind;
        break;
      }
      if (outcome.kind === 'loop_break') {
        break;
      }
      if (done.status === StepStatus.FAILED && step.onItemFailure === 'stop') {
        break;
      }
    }
    return result;
  }

  /**
   * Fixed-size pool. Early join satisfaction and the join timeout cancel the
   * loop token: unstarted iterations stay pending (then skipped) and in-flight
   * ones come back failed with a cancelled error.
   */
  private async runParallel(
    step: ForEachStep,
    context: StepExecutionContext,
    loop: LoopState,
    token: CancellationToken,
    maxWorkers: number,
    timeoutMs: number | undefined
  ): Promise<ForEachRunResult> {
    const result: ForEachRunResult = { cancelled: false, timedOut: false };
    const pending = loop.iterations.filter((record) => record.status === StepStatus.PENDING);
    const running = new Map<number, Promise<void>>();
    let stopLaunching = false;
    let failure: unknown;

    const interrupt = new AbortController();
    const outer = context.interrupt;
    const followOuter = () => interrupt.abort();
    if (outer?.aborted) {
      interrupt.abort();
    } else {
      outer?.addEventListener('abort', followOuter, { once: true });
    }
    const stopLoop = (reason: string) => {
      token.cancel(reason);
      interrupt.abort();
    };

    const timer = timeoutMs !== undefined
      ? setTimeout(() => {
          result.timedOut = true;
          stopLoop(`for_each '${step.name}' timed out`);
        }, timeoutMs)
      : undefined;

    const settle = ({ record, outcome }: IterationOutcome): void => {
      if (context.token.isCancelled) {
        result.cancelled = true;
        stopLaunching = true;
        return;
      }
      if (outcome.kind === 'end' || outcome.kind === 'error') {
        result.terminated = outcome.kind;
        stopLaunching = true;
        stopLoop('Run is ending');
        return;
      }
      if (outcome.kind === 'loop_break') {
        stopLaunching = true;
      }
      if (record.status === StepStatus.FAILED && step.onItemFailure === 'stop') {
        stopLaunching = true;
      }
      if (step.join !== 'all' && joinSatisfied(step.join, this.summarize(loop, loop.iterations.length))) {
        stopLaunching = true;
        stopLoop(`for_each '${step.name}' join '${step.join}' satisfied`);
      }
    };

    try {
      while ((pending.length > 0 && !stopLaunching) || running.size > 0) {
        await context.checkCancellation?.();
        if (token.isCancelled) {
          stopLaunching = true;
        }

        while (!stopLaunching && pending.length > 0 && running.size < maxWorkers) {
          const record = pending.shift();
          if (!record) {
            break;
          }
          const scope = this.iterationScope(step, context, loop, record);
          const task = this.runIteration(step, context, loop, record, scope, token, interrupt.signal)
            .then(settle)
            .catch((error: unknown) => {
              failure ??= error;
              stopLaunching = true;
              stopLoop('Loop iteration raised an error');
            })
            .finally(() => {
              running.delete(record.index);
            });
          running.set(record.index, task);
        }

        if (running.size > 0) {
          await Promise.race(running.values());
        }
      }
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      outer?.removeEventListener('abort', followOuter);
    }

    if (failure !== undefined) {
      throw failure;
    }
    if (context.token.isCancelled) {
      result.cancelled = true;
    }
    return result;
  }
}

interface ForEachRunResult {
  /** The run was cancelled */
  cancelled: boolean;
  timedOut: boolean;
  /** An iteration ended the run through `_end` or `_error` */
  terminated?: 'end' | 'error';
}

type WhileEnd =
  | { reason: TerminationReason; halted?: { step: string; index: number; error?: StepErrorDetail } }
  | { error: WorkflowError };

/**
 * Repeats a body while its condition holds, bounded by `max_iterations` and
 * `max_duration_sec`. Exactly one termination reason is recorded.
 */
export class WhileExecutor extends LoopExecutor<WhileStep> {
  getSupportedType(): StepKind {
    return 'while';
  }

  canExecute(step: Step): step is WhileStep {
    return step.kind === 'while';
  }

  async execute(step: WhileStep, context: StepExecutionContext): Promise<StepResult> {
    const startedAt = new Date();
    const { loop, interrupted } = this.prepare(context);
    await this.services.host.saveLoop(context.path, loop);

    const end = await this.iterate(step, context, loop, interrupted);
    if ('error' in end) {
      const summary = this.summarize(loop, loop.iterations.length);
      loop.summary = summary;
      await this.services.host.saveLoop(context.path, loop);
      return this.failure(end.error, startedAt, context, summary);
    }

    const summary = this.summarize(loop, loop.iterations.length, end.reason);
    loop.summary = summary;
    loop.termination_reason = end.reason;
    await this.services.host.saveLoop(context.path, loop);

    if (end.halted) {
      const { step: failedStep, index, error } = end.halted;
      return this.failure(
        new StepExecutionError(
          `Step '${failedStep}' failed in iteration ${index} of while '${step.name}'`,
          1,
          false,
          step.name,
          { iteration: index, step: failedStep, ...(error ? { cause: error.message } : {}) }
        ),
        startedAt,
        context,
        summary
      );
    }

    switch (end.reason) {
      case 'condition_false':
      case 'max_iterations':
      case 'explicit_break':
        return completedResult(startedAt, { exit_code: 0, json: summary });
      case 'timeout': {
        const limit = step.maxDurationMs ?? 0;
        return this.failure(
          new StepTimeoutError(`while '${step.name}' exceeded ${limit}ms`, limit, step.name, {
            iterations: summary.total,
          }),
          startedAt,
          context,
          summary
        );
      }
      case 'cancelled':
        return this.failure(new WorkflowCancelledError(context.token.reason, step.name), startedAt, context, summary);
    }
  }

  private async iterate(
    step: WhileStep,
    context: StepExecutionContext,
    loop: LoopState,
    interrupted: Record<string, StepResult> | undefined
  ): Promise<WhileEnd> {
    const loopStart = Date.parse(loop.started_at);
    let resumeSteps = interrupted;
    let ran = 0;

    for (;;) {
      const bound = await this.checkBounds(step, context, loop, loopStart);
      if (bound) {
        return { reason: bound };
      }
      if (ran > 0 && step.delayMs > 0) {
        await this.sleep(step.delayMs, context.token.signal);
        await context.checkCancellation?.();
        if (context.token.isCancelled) {
          return { reason: 'cancelled' };
        }
      }

      const index = loop.iterations.length;
      const scope = this.iterationScope(context, loopStart, index);
      const lastSteps = index > 0 ? loop.iterations[index - 1].steps : undefined;
      const conditionScope: ResolutionScope = {
        ...context.scope,
        loop: scope,
        lookupStep: (name) => lastSteps?.[name] ?? context.scope.lookupStep(name),
      };
      let proceed: boolean;
      try {
        proceed = await this.services.conditions.evaluate(step.condition, conditionScope, {
          field: 'while',
          allowUndefined: step.allowUndefined,
          stepName: step.name,
        });
      } catch (caught) {
        return { error: toWorkflowError(caught, step.name) };
      }
      if (!proceed) {
        return { reason: 'condition_false' };
      }

      const record: IterationRecord = { index, status: StepStatus.PENDING, steps: resumeSteps ?? {} };
      resumeSteps = undefined;
      loop.iterations.push(record);
      const { outcome } = await this.runIteration(step, context, loop, record, scope, context.token);
      ran++;
      if (outcome.kind === 'cancelled') {
        return { reason: 'cancelled' };
      }
      if (outcome.kind === 'loop_break' || outcome.kind === 'end' || outcome.kind === 'error') {
        return { reason: 'explicit_break' };
      }
      // only strict flow reports an unhandled body failure as 'failed'
      if (outcome.kind === 'failed') {
        return {
          reason: 'explicit_break',
          halted: { step: outcome.step, index, ...(outcome.error ? { error: outcome.error } : {}) },
        };
      }
    }
  }

  /**
   * Keep finished iterations from an interrupted run. An iteration that was
   * still running is repeated; its results are offered for reuse.
   */
  private prepare(context: StepExecutionContext): { loop: LoopState; interrupted?: Record<string, StepResult> } {
    const existing = this.resumableLoop(context);
    if (existing?.kind !== 'while') {
      return { loop: { kind: 'while', iterations: [], started_at: new Date(this.now()).toISOString() } };
    }
    const finished = existing.iterations.filter(
      (record) => record.status === StepStatus.COMPLETED || record.status === StepStatus.FAILED
    );
    const unfinished = existing.iterations.find(
      (record) => record.status !== StepStatus.COMPLETED && record.status !== StepStatus.FAILED
    );
    existing.iterations = finished;
    delete existing.summary;
    delete existing.termination_reason;
    return unfinished ? { loop: existing, interrupted: unfinished.steps } : { loop: existing };
  }

  private async checkBounds(
    step: WhileStep,
    context: StepExecutionContext,
    loop: LoopState,
    loopStart: number
  ): Promise<TerminationReason | undefined> {
    await context.checkCancellation?.();
    if (context.token.isCancelled) {
      return 'cancelled';
    }
    if (loop.iterations.length >= step.maxIterations) {
      return 'max_iterations';
    }
    if (step.maxDurationMs !== undefined && this.now() - loopStart >= step.maxDurationMs) {
      return 'timeout';
    }
    return undefined;
  }

  private iterationScope(context: StepExecutionContext, loopStart: number, index: number): LoopScope {
    return {
      varName: '',
      hasItem: false,
      index,
      iteration: index + 1,
      startedAt: loopStart,
      ...(context.scope.loop ? { parent: context.scope.loop } : {}),
    };
  }
}

function classifyIteration(outcome: ListOutcome, loopName: string): { status: StepStatus; error?: StepErrorDetail } {
  switch (outcome.kind) {
    case 'completed':
      return outcome.hadFailure
        ? { status: StepStatus.FAILED, error: { kind: 'execution', message: 'A step in the iteration failed' } }
        : { status: StepStatus.COMPLETED };
    case 'end':
    case 'loop_break':
    case 'loop_continue':
      return { status: StepStatus.COMPLETED };
    case 'failed':
      return {
        status: StepStatus.FAILED,
        error: outcome.error ?? { kind: 'execution', message: `Step '${outcome.step}' failed` },
      };
    case 'error':
      return { status: StepStatus.FAILED, error: { kind: 'execution', message: outcome.message } };
    case 'cancelled':
      return {
        status: StepStatus.FAILED,
        error: new WorkflowCancelledError(`Iteration of '${loopName}' was cancelled`, loopName).toDetail(),
      };
  }
}

function joinSatisfied(join: JoinPolicy, summary: LoopSummary): boolean {
  if (summary.total === 0) {
    return true;
  }
  switch (join) {
    case 'all':
      return summary.failed === 0;
    case 'any':
      return summary.completed >= 1;
    case 'majority':
      return summary.completed * 2 > summary.total;
  }
}
