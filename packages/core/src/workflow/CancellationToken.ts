/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { WorkflowCancelledError } from './errors.js';

/** Waits `ms`, returning early when the signal aborts */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Cooperative cancellation. Children are cancelled with their parent but can
 * also be cancelled alone, which is how parallel loops stop outstanding work.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private cancelReason?: string;
  private detach?: () => void;

  constructor(parent?: CancellationToken) {
    if (!parent) {
      return;
    }
    if (parent.isCancelled) {
      this.cancel(parent.reason);
      return;
    }
    const onParentAbort = () => this.cancel(parent.reason);
    parent.signal.addEventListener('abort', onParentAbort, { once: true });
    this.detach = () => parent.signal.removeEventListener('abort', onParentAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  cancel(reason: string = 'Workflow execution was cancelled'): void {
    if (this.isCancelled) {
      return;
    }
    this.cancelReason = reason;
    this.controller.abort();
    this.dispose();
  }

  createChild(): CancellationToken {
    return new CancellationToken(this);
  }

  /**
   * Stop following the parent token
   */
  dispose(): void {
    this.detach?.();
    this.detach = undefined;
  }

  throwIfCancelled(stepName?: string): void {
    if (this.isCancelled) {
      throw new WorkflowCancelledError(this.cancelReason, stepName);
    }
  }
}
