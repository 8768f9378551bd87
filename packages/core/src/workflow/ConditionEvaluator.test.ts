/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConditionEvaluator } from './ConditionEvaluator.js';
import { VariableResolver, ResolutionScope } from './VariableResolver.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { Condition, StepResult, StepStatus } from './types.js';
import { MissingVariableError, PathSafetyError, WorkflowConfigurationError } from './errors.js';

describe('ConditionEvaluator', () => {
  let tempDir: string;
  let evaluator: ConditionEvaluator;
  let scope: ResolutionScope;
  let steps: Map<string, StepResult>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'condition-test-'));
    evaluator = new ConditionEvaluator({
      resolver: new VariableResolver(),
      paths: new WorkspacePaths(tempDir),
      env: { PRESENT: 'yes', EMPTY: '' }
    });
    steps = new Map<string, StepResult>([
      ['ok', { status: StepStatus.COMPLETED, exit_code: 0, output: 'ready' }],
      ['bad', { status: StepStatus.FAILED, exit_code: 3, output: 'boom' }],
      ['gated', { status: StepStatus.SKIPPED, exit_code: 0 }],
      ['count', { status: StepStatus.COMPLETED, exit_code: 0, output: '12' }]
    ]);
    scope = {
      run: { id: 'run-1', timestamp_utc: '2025-01-01T00:00:00.000Z', root: tempDir },
      context: { mode: 'fast', tags: ['a', 'b'] },
      lookupStep: (name) => steps.get(name)
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const check = (condition: Condition) => evaluator.evaluate(condition, scope);

  describe('step_ok', () => {
    it('should be true for exit code 0', async () => {
      expect(await check({ type: 'step_ok', step: 'ok' })).toBe(true);
    });

    it('should be false for a failed step', async () => {
      expect(await check({ type: 'step_ok', step: 'bad' })).toBe(false);
    });

    it('should count a skipped step as success', async () => {
      expect(await check({ type: 'step_ok', step: 'gated' })).toBe(true);
    });

    it('should be false for a step that never ran', async () => {
      expect(await check({ type: 'step_ok', step: 'later' })).toBe(false);
    });
  });

  describe('file_exists', () => {
    it('should detect files in the workspace', async () => {
      await fs.writeFile(path.join(tempDir, 'done.txt'), 'x');
      expect(await check({ type: 'file_exists', path: 'done.txt' })).toBe(true);
      expect(await check({ type: 'file_exists', path: 'missing.txt' })).toBe(false);
    });

    it('should reject paths outside the workspace', async () => {
      await expect(check({ type: 'file_exists', path: '../outside.txt' })).rejects.toBeInstanceOf(PathSafetyError);
      await expect(check({ type: 'file_exists', path: '/etc/hosts' })).rejects.toBeInstanceOf(PathSafetyError);
    });
  });

  describe('operand predicates', () => {
    it('should check env_set', async () => {
      expect(await check({ type: 'env_set', name: 'PRESENT' })).toBe(true);
      expect(await check({ type: 'env_set', name: 'EMPTY' })).toBe(false);
      expect(await check({ type: 'env_set', name: 'ABSENT' })).toBe(false);
    });

    it('should compare substituted strings with equals', async () => {
      expect(await check({ type: 'equals', left: '${steps.ok.output}', right: 'ready' })).toBe(true);
      expect(await check({ type: 'equals', left: '${steps.ok.exit_code}', right: 0 })).toBe(true);
    });

    it('should check contains on strings and lists', async () => {
      expect(await check({ type: 'contains', left: '${steps.bad.output}', right: 'oo' })).toBe(true);
      expect(await check({ type: 'contains', left: ['x', '${context.mode}'], right: 'fast' })).toBe(true);
      expect(await check({ type: 'contains', left: ['x'], right: 'y' })).toBe(false);
    });

    it('should match regex', async () => {
      expect(await check({ type: 'regex', value: '${steps.count.output}', pattern: '^[0-9]+$' })).toBe(true);
    });

    it('should reject an invalid regex', async () => {
      await expect(check({ type: 'regex', value: 'x', pattern: '(' })).rejects.toBeInstanceOf(WorkflowConfigurationError);
    });

    it('should compare numerically', async () => {
      expect(await check({ type: 'compare', left: '${steps.count.output}', op: '>', right: 9 })).toBe(true);
      expect(await check({ type: 'compare', left: '${steps.count.output}', op: '<=', right: '11' })).toBe(false);
    });

    it('should refuse non-numeric comparisons', async () => {
      await expect(check({ type: 'compare', left: 'abc', op: '<', right: 1 }))
        .rejects.toThrow("Cannot compare non-numeric value 'abc'");
    });
  });

  describe('composition', () => {
    it('should compose all, any and not', async () => {
      const condition: Condition = {
        type: 'all',
        conditions: [
          { type: 'step_ok', step: 'ok' },
          { type: 'any', conditions: [{ type: 'step_ok', step: 'bad' }, { type: 'env_set', name: 'PRESENT' }] },
          { type: 'not', condition: { type: 'step_ok', step: 'bad' } }
        ]
      };
      expect(await check(condition)).toBe(true);
    });

    it('should short-circuit all before evaluating an undefined reference', async () => {
      const condition: Condition = {
        type: 'all',
        conditions: [
          { type: 'step_ok', step: 'bad' },
          { type: 'equals', left: '${context.missing}', right: 'x' }
        ]
      };
      expect(await check(condition)).toBe(false);
    });
  });

  describe('expr', () => {
    it('should read numeric text from a reference as a number', async () => {
      expect(await check({ type: 'expr', source: '${steps.count.output} > 10 and ${steps.bad.exit_code} == 3' }))
        .toBe(true);
    });

    it('should compare quoted substitutions', async () => {
      expect(await check({ type: 'expr', source: "'${context.mode}' in ['fast', 'slow']" })).toBe(true);
    });

    it('should read a bare reference as a string value', async () => {
      expect(await check({ type: 'expr', source: "${steps.ok.output} == 'ready'" })).toBe(true);
      expect(await check({ type: 'expr', source: '${steps.ok.output} == 1' })).toBe(false);
    });

    it('should read list references as lists', async () => {
      expect(await check({ type: 'expr', source: "'b' in ${context.tags}" })).toBe(true);
    });

    it('should never parse substituted text as expression syntax', async () => {
      steps.set('vote', { status: StepStatus.COMPLETED, exit_code: 0, output: "x' == 'x' or 'a" });

      expect(await check({ type: 'expr', source: "'${steps.vote.output}' == 'yes'" })).toBe(false);
      expect(await check({ type: 'expr', source: "${steps.vote.output} == 'yes'" })).toBe(false);
      expect(await check({ type: 'expr', source: "'${steps.vote.output}' == \"x' == 'x' or 'a\"" })).toBe(true);
    });

    it('should accept substituted text containing quotes', async () => {
      steps.set('note', { status: StepStatus.COMPLETED, exit_code: 0, output: "it's fine" });

      expect(await check({ type: 'expr', source: "'${steps.note.output}' == 'yes'" })).toBe(false);
      expect(await check({ type: 'expr', source: "'fine' in '${steps.note.output}'" })).toBe(true);
    });

    it('should name the unresolved expression in syntax errors', async () => {
      await expect(check({ type: 'expr', source: '${steps.ok.output} ==' }))
        .rejects.toThrow("Invalid expression '${steps.ok.output} ==': Unexpected end of expression at position 21");
    });

    it('should reject bare names', async () => {
      await expect(check({ type: 'expr', source: 'ready == true' }))
        .rejects.toBeInstanceOf(WorkflowConfigurationError);
    });

    it('should surface undefined variables', async () => {
      await expect(check({ type: 'expr', source: '${steps.nope.exit_code} == 0' }))
        .rejects.toBeInstanceOf(MissingVariableError);
    });
  });
});
