/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StepExecutor, StepExecutionContext, completedResult, failedResult } from './StepExecutor.js';
import { CommandStep, Step, StepKind, StepResult, StepStatus } from './types.js';
import { buildWorkflowModel } from './WorkflowModel.js';
import { CancellationToken } from './CancellationToken.js';
import { SecretMasker, WorkflowLogger } from './logging.js';
import { StepExecutionError, WorkflowConfigurationError } from './errors.js';
import { setGlobalLoggerConfig } from '../utils/logging.js';

type Behaviour = 'complete' | 'fail' | 'throw';

class ScriptedExecutor extends StepExecutor<CommandStep> {
  constructor(private readonly behaviour: Behaviour) {
    super();
  }

  getSupportedType(): StepKind {
    return 'command';
  }

  canExecute(step: Step): step is CommandStep {
    return step.kind === 'command';
  }

  async execute(step: CommandStep): Promise<StepResult> {
    const startedAt = new Date();
    switch (this.behaviour) {
      case 'complete':
        return completedResult(startedAt, { exit_code: 0, output: step.command.join(' ') });
      case 'fail':
        return failedResult(new StepExecutionError('Process exited with code 2', 2, false, step.name), startedAt, {
          exit_code: 2,
        });
      case 'throw':
        throw new Error('executor broke');
    }
  }
}

describe('StepExecutor', () => {
  const model = buildWorkflowModel({
    version: '1',
    name: 'executor-test',
    steps: [{ name: 'build', command: ['make', 'all'] }, { name: 'wait', wait_for: { glob: '*.md' } }],
  });
  const buildStep = model.nodes[0].step;
  let logger: WorkflowLogger;

  const contextFor = (path: string): StepExecutionContext => ({
    path,
    scope: { run: { id: 'run-1', timestamp_utc: '20250101T000000Z', root: '/ws' }, context: {}, lookupStep: () => undefined },
    token: new CancellationToken(),
    logger,
    spillName: `${path}-1`,
  });

  const run = async (behaviour: Behaviour): Promise<StepResult> => {
    const executor = new ScriptedExecutor(behaviour);
    if (!executor.canExecute(buildStep)) {
      throw new Error('expected a command step');
    }
    return executor.executeWithHooks(buildStep, contextFor('build'));
  };

  beforeEach(() => {
    setGlobalLoggerConfig({ quiet: true });
    logger = new WorkflowLogger('run-1', 'executor-test');
  });

  afterEach(() => {
    setGlobalLoggerConfig({ quiet: false });
  });

  it('should narrow steps to its kind', () => {
    const executor = new ScriptedExecutor('complete');

    expect(executor.getSupportedType()).toBe('command');
    expect(executor.canExecute(buildStep)).toBe(true);
    expect(executor.canExecute(model.nodes[1].step)).toBe(false);
  });

  it('should log start and completion around a completed result', async () => {
    const result = await run('complete');

    expect(result).toMatchObject({ status: StepStatus.COMPLETED, exit_code: 0, output: 'make all' });
    expect(logger.getStepLogEntries('build').map((entry) => entry.message)).toEqual([
      'Step started: build',
      'Step completed: build',
    ]);
    expect(logger.getMetrics().completedSteps).toBe(1);
  });

  it('should route a failed result to the error hook', async () => {
    const result = await run('fail');

    expect(result.status).toBe(StepStatus.FAILED);
    expect(result.error).toEqual({
      kind: 'execution',
      message: 'Process exited with code 2',
      context: { exitCode: 2 },
    });
    expect(logger.getStepLogEntries('build').map((entry) => entry.message)).toEqual([
      'Step started: build',
      'Step failed: build',
    ]);
    expect(logger.getMetrics().failedSteps).toBe(1);
  });

  it('should wrap and rethrow what an executor throws', async () => {
    const error = await run('throw').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StepExecutionError);
    expect(error).toMatchObject({ message: 'executor broke', stepName: 'build' });
    expect(logger.getMetrics().failedSteps).toBe(1);
  });
});

describe('failedResult', () => {
  it('should mask secrets in the recorded error', () => {
    const result = failedResult(
      new WorkflowConfigurationError('token test-secret rejected', 'deploy', { header: 'Bearer test-secret' }),
      new Date('2025-01-01T00:00:00Z'),
      { exit_code: 1 },
      new SecretMasker(['test-secret'])
    );

    expect(result).toMatchObject({
      status: StepStatus.FAILED,
      exit_code: 1,
      started_at: '2025-01-01T00:00:00.000Z',
      error: { kind: 'configuration', message: 'token *** rejected', context: { header: 'Bearer ***' } },
    });
  });
});
