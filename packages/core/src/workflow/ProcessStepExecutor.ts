/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import { createHash } from 'crypto';
import { quote } from 'shell-quote';
import {
  InjectionSummary,
  ProcessStep,
  ProviderTemplate,
  RetryPolicy,
  StepResult,
  StepStatus,
} from './types.js';
import { StepExecutor, StepExecutionContext, completedResult, failedResult } from './StepExecutor.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { ResolveOptions, VariableResolver } from './VariableResolver.js';
import { DependencyInjector, ResolvedDependencies } from './DependencyInjector.js';
import { OutputProcessor } from './OutputProcessor.js';
import { ProcessOutcome, ProcessRunner } from './ProcessRunner.js';
import { WorkflowRetryManager } from './retry.js';
import { SecretMasker } from './logging.js';
import { stableStringify } from './WorkflowModel.js';
import { atomicWriteFile } from './persistence/atomicWrite.js';
import {
  MissingDependencyError,
  StepExecutionError,
  StepTimeoutError,
  WorkflowCancelledError,
  WorkflowConfigurationError,
  WorkflowError,
  isNotFoundError,
  toWorkflowError,
} from './errors.js';
import { STDERR_EXCERPT_BYTES, TEXT_STATE_LIMIT_BYTES, TIMEOUT_EXIT_CODE } from './config.js';
import { stripTrailingNewlines, truncateUtf8 } from '../utils/text.js';

/**
 * Run-scoped collaborators shared by the command and provider executors
 */
export interface ProcessExecutorServices {
  paths: WorkspacePaths;
  resolver: VariableResolver;
  dependencies: DependencyInjector;
  output: OutputProcessor;
  processRunner: ProcessRunner;
  retry: WorkflowRetryManager;
  providers: ReadonlyMap<string, ProviderTemplate>;
  /** Workflow-scope secret allowlist */
  workflowSecrets: readonly string[];
  secretSource: Readonly<Record<string, string | undefined>>;
  baseEnv: Readonly<Record<string, string>>;
  defaultTimeoutMs: number;
  killGraceMs: number;
}

export interface ProcessInvocation {
  argv: string[];
  stdin?: string | Buffer;
  /** The composed prompt, for provider steps */
  prompt?: string;
  injection?: InjectionSummary;
}

const SINGLE_ATTEMPT: RetryPolicy = {
  maxAttempts: 1,
  backoff: 'fixed',
  delayMs: 0,
  maxDelayMs: 0,
  onExitCodes: [],
  onTimeout: false,
};

/**
 * Shared pipeline for steps that spawn a process: resolve inputs, check
 * dependencies, build the invocation, run it under the retry policy and
 * capture its output.
 */
export abstract class ProcessStepExecutor<TStep extends ProcessStep> extends StepExecutor<TStep> {
  constructor(protected readonly services: ProcessExecutorServices) {
    super();
  }

  /**
   * Build argv and stdin for one step. Dependencies are already validated.
   */
  protected abstract buildInvocation(
    step: TStep,
    context: StepExecutionContext,
    options: ResolveOptions,
    dependencies?: ResolvedDependencies
  ): Promise<ProcessInvocation>;

  async execute(step: TStep, context: StepExecutionContext): Promise<StepResult> {
    const startedAt = new Date();
    const options: ResolveOptions = { allowUndefined: step.allowUndefined, stepName: step.name };
    let masker = context.logger.getMasker();
    let attempts = 0;
    let fingerprint: string | undefined;
    let injection: InjectionSummary | undefined;
    const last: { outcome?: ProcessOutcome } = {};

    try {
      context.token.throwIfCancelled(step.name);
      const secrets = this.collectSecrets(step);
      context.logger.addSecrets(Object.values(secrets));
      masker = context.logger.getMasker();

      const stepEnv = this.services.resolver.resolveRecord(step.env, context.scope, { ...options, field: 'env' });
      const dependencies = step.dependsOn
        ? await this.services.dependencies.resolve(step.dependsOn, context.scope, step.name, step.allowUndefined)
        : undefined;
      const invocation = await this.buildInvocation(step, context, options, dependencies);
      injection = invocation.injection;
      fingerprint = computeFingerprint(step.kind, invocation.argv, invocation.prompt, invocation.stdin, [
        ...Object.keys(stepEnv),
        ...Object.keys(secrets),
      ]);

      const previous = context.previous;
      if (previous?.status === StepStatus.COMPLETED && previous.fingerprint === fingerprint) {
        context.logger.logStepReused(context.path, fingerprint);
        return { ...previous };
      }

      const outputFile = step.outputFile
        ? await this.services.paths.resolve(
            this.services.resolver.resolveString(step.outputFile, context.scope, { ...options, field: 'output_file' }),
            step.name
          )
        : undefined;
      const env = { ...this.services.baseEnv, ...stepEnv, ...secrets };
      const timeoutMs = step.timeoutMs ?? this.services.defaultTimeoutMs;
      const command = masker.mask(quote(invocation.argv));

      const outcome = await this.services.retry.executeWithRetry(
        async (attempt) => {
          attempts = attempt;
          context.token.throwIfCancelled(step.name);
          if (attempt > 1) {
            context.logger.logStepStart(context.path, step.kind, attempt);
          }
          const result = await this.services.processRunner.run({
            argv: invocation.argv,
            cwd: this.services.paths.root,
            env,
            stdin: invocation.stdin,
            timeoutMs,
            killGraceMs: this.services.killGraceMs,
            signal: context.interrupt,
          });
          last.outcome = result;
          this.checkOutcome(step, result, timeoutMs, command);
          return result;
        },
        { stepName: step.name, policy: step.retry ?? SINGLE_ATTEMPT, logger: context.logger, signal: context.token.signal }
      );

      const processed = await this.services.output.process(
        outcome.stdout,
        step.capture,
        context.spillName,
        step.name,
        outcome.stdoutTruncated
      );
      if (outputFile) {
        await atomicWriteFile(outputFile, outcome.stdout);
      }

      return completedResult(startedAt, {
        exit_code: 0,
        ...processed,
        attempts,
        fingerprint,
        ...(injection ? { injection } : {}),
      });
    } catch (caught) {
      const error = toWorkflowError(caught, step.name);
      const exitCode = exitCodeOf(error);
      return failedResult(
        error,
        startedAt,
        {
          ...(exitCode !== undefined ? { exit_code: exitCode } : {}),
          ...(attempts > 0 ? { attempts } : {}),
          ...(fingerprint ? { fingerprint } : {}),
          ...(injection ? { injection } : {}),
          ...(last.outcome ? failureOutput(last.outcome, masker) : {}),
        },
        masker
      );
    }
  }

  /**
   * Error for a process that ran and exited non-zero
   */
  protected exitError(step: TStep, exitCode: number, command: string): WorkflowError {
    return new StepExecutionError(
      `Process exited with code ${exitCode}`,
      exitCode,
      this.isRetryableExit(step, exitCode),
      step.name,
      { command }
    );
  }

  protected isRetryableExit(step: TStep, exitCode: number): boolean {
    return (step.retry ?? SINGLE_ATTEMPT).onExitCodes.includes(exitCode);
  }

  /**
   * Reads `input_file` through the path guard
   */
  protected async readInputFile(step: TStep, context: StepExecutionContext, options: ResolveOptions): Promise<Buffer | undefined> {
    if (step.inputFile === undefined) {
      return undefined;
    }
    const requested = this.services.resolver.resolveString(step.inputFile, context.scope, {
      ...options,
      field: 'input_file',
    });
    const absolute = await this.services.paths.resolve(requested, step.name);
    try {
      return await fs.readFile(absolute);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new MissingDependencyError(`Input file not found: ${requested}`, [requested], step.name);
      }
      throw error;
    }
  }

  private collectSecrets(step: TStep): Record<string, string> {
    const secrets: Record<string, string> = {};
    for (const name of new Set([...this.services.workflowSecrets, ...step.secrets])) {
      const value = this.services.secretSource[name];
      if (value === undefined) {
        throw new WorkflowConfigurationError(`Secret '${name}' is not set`, step.name, { secret: name });
      }
      secrets[name] = value;
    }
    return secrets;
  }

  private checkOutcome(step: TStep, outcome: ProcessOutcome, timeoutMs: number, command: string): void {
    if (outcome.cancelled) {
      throw new WorkflowCancelledError(undefined, step.name, { command });
    }
    if (outcome.timedOut) {
      throw new StepTimeoutError(`Step '${step.name}' timed out after ${timeoutMs}ms`, timeoutMs, step.name, { command });
    }
    if (outcome.spawnError !== undefined) {
      throw new StepExecutionError(`Failed to start process: ${outcome.spawnError}`, null, false, step.name, { command });
    }
    if (outcome.exitCode === null) {
      throw new StepExecutionError(
        `Process terminated by signal ${outcome.signal ?? 'unknown'}`,
        null,
        false,
        step.name,
        { command }
      );
    }
    if (outcome.exitCode !== 0) {
      throw this.exitError(step, outcome.exitCode, command);
    }
  }
}

/**
 * SHA-256 over the step's effective inputs. Only environment names take
 * part, so rotating a secret does not invalidate completed work. Stdin
 * enters as its own digest.
 */
export function computeFingerprint(
  kind: string,
  argv: readonly string[],
  prompt: string | undefined,
  stdin: string | Buffer | undefined,
  envNames: readonly string[]
): string {
  const canonical = stableStringify({
    kind,
    argv,
    prompt: prompt ?? null,
    stdin: stdin === undefined ? null : createHash('sha256').update(stdin).digest('hex'),
    env: [...new Set(envNames)].sort(),
  });
  return `sha256:${createHash('sha256').update(canonical).digest('hex')}`;
}

function exitCodeOf(error: WorkflowError): number | undefined {
  if (error instanceof StepTimeoutError) {
    return TIMEOUT_EXIT_CODE;
  }
  if (error instanceof StepExecutionError && error.exitCode !== null) {
    return error.exitCode;
  }
  return undefined;
}

/**
 * Tail of stderr, where the failure usually is
 */
function stderrExcerpt(stderr: Buffer): string {
  const tail = stderr.length > STDERR_EXCERPT_BYTES ? stderr.subarray(stderr.length - STDERR_EXCERPT_BYTES) : stderr;
  return stripTrailingNewlines(tail.toString('utf8'));
}

function failureOutput(outcome: ProcessOutcome, masker: SecretMasker): Partial<StepResult> {
  const fields: Partial<StepResult> = {};
  if (outcome.stdout.length > 0) {
    fields.output = stripTrailingNewlines(truncateUtf8(outcome.stdout, TEXT_STATE_LIMIT_BYTES).toString('utf8'));
    if (outcome.stdout.length > TEXT_STATE_LIMIT_BYTES) {
      fields.truncated = true;
    }
  }
  if (outcome.stderr.length > 0) {
    fields.stderr = masker.mask(stderrExcerpt(outcome.stderr));
  }
  return fields;
}
