/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  LoopState,
  RunExitCode,
  RunStateDocument,
  RunStatus,
  Step,
  StepErrorDetail,
  StepNode,
  StepResult,
  StepStatus,
  Transition,
  WorkflowModel,
} from './types.js';
import { buildWorkflowModel, computeChecksum, listNodes } from './WorkflowModel.js';
import { ResolutionScope, RunScope, VariableResolver } from './VariableResolver.js';
import { ConditionEvaluator } from './ConditionEvaluator.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { DependencyInjector } from './DependencyInjector.js';
import { OutputProcessor, sanitizeFileName } from './OutputProcessor.js';
import { ChildProcessRunner, ProcessRunner } from './ProcessRunner.js';
import { ProcessExecutorServices } from './ProcessStepExecutor.js';
import { CommandStepExecutor } from './CommandStepExecutor.js';
import { ProviderStepExecutor } from './ProviderStepExecutor.js';
import { WaitForExecutor } from './WaitForExecutor.js';
import { ForEachExecutor, IterationRequest, ListOutcome, LoopHost, WhileExecutor } from './LoopExecutor.js';
import { StepExecutionContext, failedResult } from './StepExecutor.js';
import { WorkflowRetryManager } from './retry.js';
import { CancellationToken, Sleeper, defaultSleep } from './CancellationToken.js';
import { RunMetrics, SecretMasker, WorkflowLogger } from './logging.js';
import { RunState } from './persistence/RunState.js';
import { RunStateStore } from './persistence/RunStateStore.js';
import { RunLock } from './persistence/RunLock.js';
import {
  TransitionLimitError,
  WorkflowConfigurationError,
  WorkflowError,
  getErrorMessage,
  isNotFoundError,
  toWorkflowError,
} from './errors.js';
import {
  CANCEL_SENTINEL_NAME,
  DEFAULT_BACKUP_COUNT,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_STEP_TIMEOUT_MS,
  INHERITED_ENV_NAMES,
  STATE_ROOT_DIRNAME,
} from './config.js';
import { createLogger } from '../utils/logging.js';

const debugLogger = createLogger('runner');

export interface WorkflowRunnerOptions {
  /** Root every user path is resolved against */
  workspace: string;
  /** Parent of the per-run directories; defaults to `<workspace>/.wayline/runs` */
  stateDir?: string;
  processRunner?: ProcessRunner;
  /** Where allowlisted secrets are read from; defaults to process.env */
  secretSource?: Readonly<Record<string, string | undefined>>;
  /**
   * Environment every child starts from, also consulted by `env_set`.
   * Defaults to the PATH, HOME, USER, LANG, TMPDIR, SHELL and TERM of
   * process.env for children, and all of process.env for conditions.
   */
  baseEnv?: Readonly<Record<string, string>>;
  defaultTimeoutMs?: number;
  killGraceMs?: number;
  /** Rotating state backups per run, 0 disables */
  backupCount?: number;
  lockStaleMs?: number;
  sleep?: Sleeper;
  now?: () => number;
  enableLogging?: boolean;
  generateRunId?: () => string;
}

export interface WorkflowRunResult {
  runId: string;
  status: RunStatus;
  exitCode: RunExitCode;
  error?: StepErrorDetail;
  runDir: string;
  state: RunStateDocument;
  metrics: RunMetrics;
}

/**
 * Entry point of the engine: starts and resumes runs. Each call builds a
 * run-scoped execution; nothing about a run outlives it on this object
 * except the handle used by `cancel()`.
 */
export class WorkflowRunner {
  private readonly workspace: string;
  private readonly stateDir: string;
  private current?: RunExecution;

  constructor(private readonly options: WorkflowRunnerOptions) {
    this.workspace = path.resolve(options.workspace);
    this.stateDir = options.stateDir
      ? path.resolve(this.workspace, options.stateDir)
      : path.join(this.workspace, STATE_ROOT_DIRNAME, 'runs');
  }

  /**
   * Start a new run. `initialContext` is layered over the workflow's context.
   */
  async run(model: WorkflowModel, initialContext: Record<string, unknown> = {}): Promise<WorkflowRunResult> {
    const runId = (this.options.generateRunId ?? uuidv4)();
    const now = this.options.now ?? Date.now;
    const state = RunState.create({
      runId,
      model,
      context: { ...model.context, ...initialContext },
      startedAt: new Date(now()),
    });
    return this.execute(model, state, false);
  }

  /**
   * Continue an interrupted run from its recorded current step, with the
   * definition and context it started with
   */
  async resume(runId: string): Promise<WorkflowRunResult> {
    const store = this.createStore();
    const state = await store.load(runId);
    const definition = state.definition;
    if (computeChecksum(definition) !== state.workflowChecksum) {
      throw new WorkflowConfigurationError(`Workflow checksum mismatch for run ${runId}`, undefined, {
        expected: state.workflowChecksum,
      });
    }
    const model = buildWorkflowModel(definition);
    if (!state.canResume()) {
      debugLogger.info(`Run ${runId} already completed`);
      return buildResult(state, store.getRunDir(runId), new WorkflowLogger(runId, model.name, undefined, false));
    }
    return this.execute(model, state, true);
  }

  /**
   * Cancel the run in progress, if any
   */
  cancel(reason?: string): void {
    this.current?.cancel(reason);
  }

  /**
   * Ask a run, possibly in another process, to stop at its next checkpoint
   */
  async requestCancellation(runId: string): Promise<void> {
    const runDir = this.createStore().getRunDir(runId);
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, CANCEL_SENTINEL_NAME), new Date().toISOString());
  }

  async getRunState(runId: string): Promise<RunStateDocument> {
    return (await this.createStore().load(runId)).getSnapshot();
  }

  async listRuns(): Promise<string[]> {
    return this.createStore().listRuns();
  }

  private async execute(model: WorkflowModel, state: RunState, resumed: boolean): Promise<WorkflowRunResult> {
    const execution = new RunExecution(model, state, this.workspace, this.createStore(), this.options, resumed);
    this.current = execution;
    try {
      return await execution.start();
    } finally {
      this.current = undefined;
    }
  }

  private createStore(): RunStateStore {
    return new RunStateStore({
      baseDir: this.stateDir,
      maxBackups: this.options.backupCount ?? DEFAULT_BACKUP_COUNT,
    });
  }
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(status: RunStatus, error?: StepErrorDetail): RunExitCode {
  switch (status) {
    case RunStatus.COMPLETED:
      return RunExitCode.SUCCESS;
    case RunStatus.FAILED:
      return error?.kind === 'timeout' ? RunExitCode.TIMEOUT : RunExitCode.STRICT_FLOW_HALT;
    case RunStatus.CANCELLED:
      return RunExitCode.CANCELLED;
    case RunStatus.ERROR:
    case RunStatus.RUNNING:
      return RunExitCode.ERROR;
  }
}

function buildResult(state: RunState, runDir: string, logger: WorkflowLogger): WorkflowRunResult {
  const error = state.error;
  return {
    runId: state.runId,
    status: state.status,
    exitCode: exitCodeFor(state.status, error),
    ...(error ? { error } : {}),
    runDir,
    state: state.getSnapshot(),
    metrics: logger.getMetrics(),
  };
}

interface ExecutorSet {
  command: CommandStepExecutor;
  provider: ProviderStepExecutor;
  for_each: ForEachExecutor;
  while: WhileExecutor;
  wait_for: WaitForExecutor;
}

/** One step list being executed: the top level or a loop iteration */
interface ListFrame {
  /** `''` at top level, `review[2]/` inside an iteration */
  pathPrefix: string;
  steps: Record<string, StepResult>;
  scope: ResolutionScope;
  token: CancellationToken;
  topLevel: boolean;
  startIndex: number;
  /** Results from an interrupted run, consulted until the first goto */
  previous?: Readonly<Record<string, StepResult>>;
  interrupt?: AbortSignal;
}

type Termination = { kind: 'end' } | { kind: 'error'; message: string };

/**
 * Everything scoped to one run: state, lock, logger, token and executors
 */
class RunExecution implements LoopHost {
  private readonly token = new CancellationToken();
  private readonly logger: WorkflowLogger;
  private readonly lock: RunLock;
  private readonly runDir: string;
  private readonly conditions: ConditionEvaluator;
  private readonly executors: ExecutorSet;
  private readonly runScope: RunScope;
  private readonly now: () => number;
  private termination?: Termination;
  private executions = 0;

  constructor(
    private readonly model: WorkflowModel,
    private readonly state: RunState,
    workspace: string,
    private readonly store: RunStateStore,
    options: WorkflowRunnerOptions,
    private readonly resumed: boolean
  ) {
    this.now = options.now ?? Date.now;
    this.runDir = store.getRunDir(state.runId);
    this.logger = new WorkflowLogger(state.runId, model.name, new SecretMasker(), options.enableLogging ?? true);
    this.lock = new RunLock(this.runDir, state.runId, { staleMs: options.lockStaleMs ?? DEFAULT_LOCK_STALE_MS });
    this.runScope = { id: state.runId, timestamp_utc: state.timestampUtc, root: workspace };

    const sleep = options.sleep ?? defaultSleep;
    const baseEnv = options.baseEnv ?? inheritedEnv(process.env);
    const paths = new WorkspacePaths(workspace);
    const resolver = new VariableResolver();
    const dependencies = new DependencyInjector(paths, resolver);
    this.conditions = new ConditionEvaluator({ resolver, paths, env: options.baseEnv ?? process.env });

    const processServices: ProcessExecutorServices = {
      paths,
      resolver,
      dependencies,
      output: new OutputProcessor(this.runDir),
      processRunner: options.processRunner ?? new ChildProcessRunner(),
      retry: new WorkflowRetryManager(sleep),
      providers: model.providers,
      workflowSecrets: model.secrets,
      secretSource: options.secretSource ?? process.env,
      baseEnv,
      defaultTimeoutMs: options.defaultTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS,
      killGraceMs: options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    };
    const loopServices = { host: this, resolver, conditions: this.conditions, sleep, now: this.now };
    this.executors = {
      command: new CommandStepExecutor(processServices),
      provider: new ProviderStepExecutor(processServices),
      for_each: new ForEachExecutor(loopServices),
      while: new WhileExecutor(loopServices),
      wait_for: new WaitForExecutor({ resolver, dependencies, sleep, now: this.now }),
    };
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  async start(): Promise<WorkflowRunResult> {
    await fs.mkdir(this.runDir, { recursive: true });
    await this.lock.acquire();
    try {
      let outcome: ListOutcome;
      try {
        await this.store.initialize(this.state.runId);
        this.state.updateStatus(RunStatus.RUNNING);
        this.logger.logRunStart(this.resumed, { workflow: this.model.name, runDir: this.runDir });
        await this.store.save(this.state);
        outcome = await this.runList(this.model.rootListId, this.topLevelFrame());
      } catch (caught) {
        await this.failRun(toWorkflowError(caught));
        return buildResult(this.state, this.runDir, this.logger);
      }
      await this.finish(outcome);
      return buildResult(this.state, this.runDir, this.logger);
    } finally {
      await this.lock.release();
    }
  }

  getLoop(key: string): LoopState | undefined {
    return this.state.getLoop(key);
  }

  saveLoop(key: string, loop: LoopState): Promise<void> {
    this.state.setLoop(key, loop);
    return this.store.save(this.state);
  }

  clearLoop(key: string): void {
    this.state.clearLoop(key);
  }

  runIteration(request: IterationRequest): Promise<ListOutcome> {
    const parent = request.parentScope;
    const steps = request.steps;
    return this.runList(request.body, {
      pathPrefix: `${request.loopKey}[${request.index}]/`,
      steps,
      scope: {
        run: this.runScope,
        context: this.state.context,
        loop: request.loop,
        lookupStep: (name) => steps[name] ?? parent.lookupStep(name),
        now: this.now,
      },
      token: request.token,
      topLevel: false,
      startIndex: 0,
      ...(request.previous ? { previous: request.previous } : {}),
      ...(request.interrupt ? { interrupt: request.interrupt } : {}),
    });
  }

  private topLevelFrame(): ListFrame {
    const current = this.state.currentStep;
    const startIndex = this.resumed && current !== null
      ? this.model.lists[this.model.rootListId].indexByName.get(current) ?? 0
      : 0;
    return {
      pathPrefix: '',
      steps: this.state.steps,
      scope: {
        run: this.runScope,
        context: this.state.context,
        lookupStep: (name) => this.state.getStepResult(name),
        now: this.now,
      },
      token: this.token,
      topLevel: true,
      startIndex,
      ...(this.resumed ? { previous: { ...this.state.steps } } : {}),
    };
  }

  /**
   * Execute a step list from `frame.startIndex`, following transitions
   */
  private async runList(listId: number, frame: ListFrame): Promise<ListOutcome> {
    const nodes = listNodes(this.model, listId);
    const list = this.model.lists[listId];
    let previous = frame.previous;
    let hadFailure = false;
    let index = frame.startIndex;

    while (index < nodes.length) {
      await this.checkCancellation();
      if (frame.token.isCancelled) {
        return { kind: 'cancelled' };
      }

      const node = nodes[index];
      const step = node.step;
      const result = await this.executeNode(node, frame, previous?.[step.name]);

      if (this.termination) {
        return this.termination;
      }
      if (frame.token.isCancelled) {
        return { kind: 'cancelled' };
      }

      const succeeded = result.status !== StepStatus.FAILED;
      const transition: Transition | undefined = succeeded
        ? step.on?.success ?? step.on?.always
        : step.on?.failure ?? step.on?.always;

      if (!transition) {
        if (!succeeded) {
          if (this.model.strictFlow) {
            return { kind: 'failed', step: step.name, ...(result.error ? { error: result.error } : {}) };
          }
          hadFailure = true;
        }
        index++;
        continue;
      }

      switch (transition.type) {
        case 'goto': {
          if (this.state.recordTransition() > this.model.maxTransitions) {
            throw new TransitionLimitError(this.model.maxTransitions, step.name);
          }
          this.logger.logTransition(frame.pathPrefix + step.name, transition.target);
          previous = undefined;
          index = transition.target === '_start' ? 0 : list.indexByName.get(transition.target) ?? nodes.length;
          break;
        }
        case 'end':
          this.termination = { kind: 'end' };
          return this.termination;
        case 'error':
          this.termination = { kind: 'error', message: transition.message };
          return this.termination;
        case 'loop_break':
          return { kind: 'loop_break' };
        case 'loop_continue':
          return { kind: 'loop_continue' };
      }
    }

    return { kind: 'completed', hadFailure };
  }

  /**
   * Gate, execute and persist one step
   */
  private async executeNode(node: StepNode, frame: ListFrame, previous: StepResult | undefined): Promise<StepResult> {
    const step = node.step;
    const stepPath = frame.pathPrefix + step.name;

    if (frame.topLevel) {
      await this.store.createBackup(this.state.runId);
      this.state.setCurrentStep(step.name);
    }
    frame.steps[step.name] = { status: StepStatus.RUNNING, started_at: new Date().toISOString() };
    await this.persist();

    const context: StepExecutionContext = {
      path: stepPath,
      scope: frame.scope,
      token: frame.token,
      logger: this.logger,
      spillName: `${sanitizeFileName(stepPath)}-${++this.executions}`,
      checkCancellation: () => this.checkCancellation(),
      ...(previous ? { previous } : {}),
      ...(frame.interrupt ? { interrupt: frame.interrupt } : {}),
    };

    const gated = await this.evaluateWhen(step, context);
    const result = gated ?? (await this.dispatch(step, context));
    frame.steps[step.name] = result;
    await this.persist();
    return result;
  }

  /**
   * A false `when` yields a skipped result; a failing `when` a failed one
   */
  private async evaluateWhen(step: Step, context: StepExecutionContext): Promise<StepResult | undefined> {
    if (!step.when) {
      return undefined;
    }
    const startedAt = new Date();
    try {
      const proceed = await this.conditions.evaluate(step.when, context.scope, {
        field: 'when',
        allowUndefined: step.allowUndefined,
        stepName: step.name,
      });
      if (proceed) {
        return undefined;
      }
    } catch (caught) {
      const error = toWorkflowError(caught, step.name);
      this.logger.logStepFailure(context.path, error);
      return failedResult(error, startedAt, {}, this.logger.getMasker());
    }

    const reason = 'when condition is false';
    this.logger.logStepSkipped(context.path, reason);
    const finishedAt = new Date();
    return {
      status: StepStatus.SKIPPED,
      exit_code: 0,
      skipped_reason: reason,
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: finishedAt.getTime() - startedAt.getTime(),
    };
  }

  private dispatch(step: Step, context: StepExecutionContext): Promise<StepResult> {
    switch (step.kind) {
      case 'command':
        return this.executors.command.executeWithHooks(step, context);
      case 'provider':
        return this.executors.provider.executeWithHooks(step, context);
      case 'for_each':
        return this.executors.for_each.executeWithHooks(step, context);
      case 'while':
        return this.executors.while.executeWithHooks(step, context);
      case 'wait_for':
        return this.executors.wait_for.executeWithHooks(step, context);
      default: {
        const unreachable: never = step;
        throw new WorkflowConfigurationError(`Unsupported step kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private persist(): Promise<void> {
    this.state.touch();
    return this.store.save(this.state);
  }

  /**
   * Consume the `cancel` sentinel in the run directory, cancelling the run
   */
  private async checkCancellation(): Promise<void> {
    if (this.token.isCancelled) {
      return;
    }
    const sentinel = path.join(this.runDir, CANCEL_SENTINEL_NAME);
    try {
      await fs.unlink(sentinel);
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw error;
    }
    this.token.cancel('Cancellation requested via sentinel file');
  }

  private async finish(outcome: ListOutcome): Promise<void> {
    switch (outcome.kind) {
      case 'completed':
      case 'end':
      case 'loop_break':
      case 'loop_continue':
        this.state.updateStatus(RunStatus.COMPLETED);
        this.logger.logRunComplete(RunStatus.COMPLETED);
        break;
      case 'failed': {
        const detail = outcome.error ?? { kind: 'execution', message: `Step '${outcome.step}' failed` };
        this.state.updateStatus(RunStatus.FAILED, detail);
        this.logger.logRunComplete(RunStatus.FAILED, new HaltedRunError(detail, outcome.step));
        break;
      }
      case 'error': {
        const detail: StepErrorDetail = { kind: 'execution', message: outcome.message };
        this.state.updateStatus(RunStatus.ERROR, detail);
        this.logger.logRunComplete(RunStatus.ERROR, new HaltedRunError(detail));
        break;
      }
      case 'cancelled':
        this.state.updateStatus(RunStatus.CANCELLED, {
          kind: 'cancelled',
          message: this.token.reason ?? 'Workflow execution was cancelled',
        });
        this.logger.logRunCancelled(this.token.reason);
        break;
    }
    await this.store.save(this.state);
    await this.store.flush();
  }

  /**
   * Record a run-level error; the save is best effort
   */
  private async failRun(error: WorkflowError): Promise<void> {
    const masker = this.logger.getMasker();
    this.state.updateStatus(RunStatus.ERROR, {
      kind: error.kind,
      message: masker.mask(error.message),
      ...(error.context ? { context: masker.maskRecord(error.context) } : {}),
    });
    this.logger.logRunComplete(RunStatus.ERROR, error);
    try {
      await this.store.save(this.state);
    } catch (saveError) {
      debugLogger.error(`Failed to save state for run ${this.state.runId}: ${getErrorMessage(saveError)}`);
    }
  }
}

/**
 * Carries the reason a run stopped to the run-complete log entry
 */
class HaltedRunError extends WorkflowError {
  constructor(detail: StepErrorDetail, stepName?: string) {
    super(detail.message, 'RUN_HALTED', detail.kind, false, stepName, detail.context);
  }
}

/**
 * The non-secret part of the engine's environment. Anything else reaches a
 * child only through `env` or the secrets allowlist.
 */
export function inheritedEnv(source: Readonly<Record<string, string | undefined>>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const name of INHERITED_ENV_NAMES) {
    const value = source[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return env;
}
