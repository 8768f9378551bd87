/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { WorkflowRetryManager } from './retry.js';
import { RetryPolicy } from './types.js';
import {
  MissingDependencyError,
  StepExecutionError,
  StepTimeoutError,
  WorkflowCancelledError
} from './errors.js';

const policy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  maxAttempts: 3,
  backoff: 'fixed',
  delayMs: 100,
  maxDelayMs: 1000,
  onExitCodes: [1, 124],
  onTimeout: true,
  ...overrides
});

describe('WorkflowRetryManager', () => {
  it('should retry retryable exit codes until success', async () => {
    const sleep = vi.fn(async () => {});
    const manager = new WorkflowRetryManager(sleep);
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new StepExecutionError('exit 1', 1, true, 'call');
      }
      return 'ok';
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy() })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 100, undefined);
  });

  it('should rethrow the last error when attempts run out', async () => {
    const manager = new WorkflowRetryManager(async () => {});
    const fn = vi.fn(async () => {
      throw new StepExecutionError('exit 1', 1, true, 'call');
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy() }))
      .rejects.toBeInstanceOf(StepExecutionError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry exit codes outside on_exit_codes', async () => {
    const manager = new WorkflowRetryManager(async () => {});
    const fn = vi.fn(async () => {
      throw new StepExecutionError('exit 2', 2, false, 'call');
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy() })).rejects.toThrow('exit 2');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should follow on_timeout for timeouts', async () => {
    const manager = new WorkflowRetryManager(async () => {});
    const fn = vi.fn(async () => {
      throw new StepTimeoutError('timed out', 50, 'call');
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy({ onTimeout: false }) }))
      .rejects.toBeInstanceOf(StepTimeoutError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should never retry missing dependencies', async () => {
    const manager = new WorkflowRetryManager(async () => {});
    const fn = vi.fn(async () => {
      throw new MissingDependencyError('missing', ['a/*.md'], 'call');
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy() }))
      .rejects.toBeInstanceOf(MissingDependencyError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should stop when cancelled during the backoff', async () => {
    const controller = new AbortController();
    const manager = new WorkflowRetryManager(async () => {
      controller.abort();
    });
    const fn = vi.fn(async () => {
      throw new StepExecutionError('exit 1', 1, true, 'call');
    });

    await expect(manager.executeWithRetry(fn, { stepName: 'call', policy: policy(), signal: controller.signal }))
      .rejects.toBeInstanceOf(WorkflowCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should compute fixed and capped exponential delays', () => {
    const manager = new WorkflowRetryManager();
    expect(manager.computeDelay(policy(), 3)).toBe(100);
    const exponential = policy({ backoff: 'exponential', delayMs: 200, maxDelayMs: 1000 });
    expect(manager.computeDelay(exponential, 1)).toBe(200);
    expect(manager.computeDelay(exponential, 3)).toBe(800);
    expect(manager.computeDelay(exponential, 4)).toBe(1000);
  });
});
