/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ProviderStepExecutor } from './ProviderStepExecutor.js';
import { StepExecutionContext } from './StepExecutor.js';
import { FakeProcessRunner, ProcessHandler } from './testing/FakeProcessRunner.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { VariableResolver } from './VariableResolver.js';
import { DependencyInjector } from './DependencyInjector.js';
import { OutputProcessor } from './OutputProcessor.js';
import { WorkflowRetryManager } from './retry.js';
import { CancellationToken } from './CancellationToken.js';
import { WorkflowLogger } from './logging.js';
import { buildWorkflowModel } from './WorkflowModel.js';
import { ProviderDefinition, ProviderStep, StepDefinition, StepStatus, WorkflowModel } from './types.js';

describe('ProviderStepExecutor', () => {
  let tempDir: string;
  let runner: FakeProcessRunner;

  const providers: Record<string, ProviderDefinition> = {
    llm: { command: ['llm', '--model', '${model}', '${PROMPT}'], defaults: { model: 'small' } },
    piped: { command: ['llm-pipe', '--temperature=${temperature}'], input_mode: 'stdin', defaults: { temperature: 0.2 } },
    bare: { command: ['bare', '--level', '${level}', '${PROMPT}'] },
  };

  const buildStep = (overrides: Partial<StepDefinition>): { model: WorkflowModel; step: ProviderStep } => {
    const model = buildWorkflowModel({
      version: '1',
      name: 'test',
      providers,
      steps: [{ name: 'ask', provider: 'llm', ...overrides }],
    });
    const step = model.nodes[0].step;
    if (step.kind !== 'provider') {
      throw new Error('expected a provider step');
    }
    return { model, step };
  };

  const run = async (overrides: Partial<StepDefinition>, handler?: ProcessHandler) => {
    const { model, step } = buildStep(overrides);
    runner = new FakeProcessRunner(handler);
    const paths = new WorkspacePaths(tempDir);
    const resolver = new VariableResolver();
    const executor = new ProviderStepExecutor({
      paths,
      resolver,
      dependencies: new DependencyInjector(paths, resolver),
      output: new OutputProcessor(path.join(tempDir, 'run')),
      processRunner: runner,
      retry: new WorkflowRetryManager(async () => {}),
      providers: model.providers,
      workflowSecrets: [],
      secretSource: {},
      baseEnv: {},
      defaultTimeoutMs: 5000,
      killGraceMs: 100,
    });
    const context: StepExecutionContext = {
      path: 'ask',
      scope: {
        run: { id: 'run-1', timestamp_utc: '2025-01-01T00:00:00.000Z', root: tempDir },
        context: { size: 'large' },
        lookupStep: () => undefined,
      },
      token: new CancellationToken(),
      logger: new WorkflowLogger('run-1', 'test'),
      spillName: 'ask',
    };
    return executor.executeWithHooks(step, context);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provider-test-'));
    await fs.writeFile(path.join(tempDir, 'prompt.md'), 'Summarize the notes');
    await fs.mkdir(path.join(tempDir, 'notes'));
    await fs.writeFile(path.join(tempDir, 'notes', 'a.md'), 'first note');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should pass the prompt as one argv element with params overriding defaults', async () => {
    const result = await run(
      { input_file: 'prompt.md', provider_params: { model: '${context.size}' } },
      () => ({ stdout: 'summary\n' })
    );

    expect(runner.argvs).toEqual([['llm', '--model', 'large', 'Summarize the notes']]);
    expect(runner.calls[0].stdin).toBeUndefined();
    expect(result.status).toBe(StepStatus.COMPLETED);
    expect(result.output).toBe('summary');
  });

  it('should fall back to template defaults', async () => {
    await run({ input_file: 'prompt.md' });
    expect(runner.argvs[0][2]).toBe('small');
  });

  it('should send the injected prompt on stdin', async () => {
    const result = await run({
      provider: 'piped',
      input_file: 'prompt.md',
      depends_on: { required: ['notes/*.md'], inject: true },
    });

    expect(runner.argvs).toEqual([['llm-pipe', '--temperature=0.2']]);
    expect(runner.calls[0].stdin).toBe(
      'The following files are available for this task:\n- notes/a.md\n\nSummarize the notes'
    );
    expect(result.injection).toEqual({ mode: 'list', files: 1, truncated: false });
  });

  it('should append file contents when asked', async () => {
    await run({
      input_file: 'prompt.md',
      depends_on: {
        required: ['notes/a.md'],
        inject: { mode: 'content', position: 'append', instruction: 'Notes:' },
      },
    });

    expect(runner.argvs[0][3]).toBe('Summarize the notes\n\nNotes:\n\n=== notes/a.md ===\nfirst note');
  });

  it('should use an empty prompt without input_file', async () => {
    await run({});
    expect(runner.argvs).toEqual([['llm', '--model', 'small', '']]);
  });

  it('should never retry an invalid-input exit', async () => {
    const result = await run({ retries: { max_attempts: 3 } }, () => ({ exitCode: 2, stderr: 'bad prompt' }));

    expect(runner.calls).toHaveLength(1);
    expect(result.exit_code).toBe(2);
    expect(result.error?.message).toBe("Provider 'llm' rejected its input (exit code 2)");
    expect(result.stderr).toBe('bad prompt');
  });

  it('should retry exit code 1 by default', async () => {
    const result = await run({ retries: { max_attempts: 2 } }, () => ({ exitCode: 1 }));

    expect(runner.calls).toHaveLength(2);
    expect(result.status).toBe(StepStatus.FAILED);
    expect(result.attempts).toBe(2);
    expect(result.error?.message).toBe("Provider 'llm' exited with code 1");
  });

  it('should fail on a template parameter with no value', async () => {
    const result = await run({ provider: 'bare' });

    expect(runner.calls).toHaveLength(0);
    expect(result.error).toEqual({
      kind: 'missing_variable',
      message: "Undefined variable '${level}' in field 'provider_params'",
      context: { variable: 'level', field: 'provider_params' },
    });
  });

  it('should stringify non-string params', async () => {
    await run({ provider: 'bare', provider_params: { level: 3 } });
    expect(runner.argvs).toEqual([['bare', '--level', '3', '']]);
  });
});
