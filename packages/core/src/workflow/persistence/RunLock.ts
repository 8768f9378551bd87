/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { RunLockedError, getErrorMessage, isNotFoundError } from '../errors.js';
import { DEFAULT_LOCK_STALE_MS, LOCK_FILE_NAME } from '../config.js';
import { createLogger } from '../../utils/logging.js';

const logger = createLogger('lock');

export interface RunLockOptions {
  /** Age after which a lock is stale even if its process lives */
  staleMs?: number;
  pid?: number;
  now?: () => number;
  isProcessAlive?: (pid: number) => boolean;
}

interface LockFileContent {
  pid: number;
  created_at: string;
}

/**
 * Exclusive `run.lock` in the run directory. A lock whose process is gone, or
 * that has outlived the stale threshold, is replaced; a live one refuses.
 */
export class RunLock {
  private readonly lockPath: string;
  private readonly staleMs: number;
  private readonly pid: number;
  private readonly now: () => number;
  private readonly isProcessAlive: (pid: number) => boolean;
  private held = false;

  constructor(
    runDir: string,
    private readonly runId: string,
    options: RunLockOptions = {}
  ) {
    this.lockPath = path.join(runDir, LOCK_FILE_NAME);
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? Date.now;
    this.isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  }

  get path(): string {
    return this.lockPath;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * @throws RunLockedError when a live, fresh lock exists
   */
  async acquire(): Promise<void> {
    const content: LockFileContent = { pid: this.pid, created_at: new Date(this.now()).toISOString() };
    const serialized = JSON.stringify(content, null, 2);

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await fs.writeFile(this.lockPath, serialized, { flag: 'wx' });
        this.held = true;
        return;
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw error;
        }
      }

      const existing = await this.readLock();
      if (existing && !this.isStale(existing)) {
        throw new RunLockedError(this.runId, existing.pid);
      }
      logger.warn(`Replacing stale lock for run ${this.runId}${existing ? ` (pid ${existing.pid})` : ''}`);
      await fs.rm(this.lockPath, { force: true });
    }
    throw new RunLockedError(this.runId, -1);
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    try {
      const existing = await this.readLock();
      if (existing && existing.pid !== this.pid) {
        return;
      }
      await fs.rm(this.lockPath, { force: true });
    } catch (error) {
      logger.warn(`Failed to release lock for run ${this.runId}: ${getErrorMessage(error)}`);
    }
  }

  private isStale(lock: LockFileContent): boolean {
    if (!this.isProcessAlive(lock.pid)) {
      return true;
    }
    const created = Date.parse(lock.created_at);
    return Number.isNaN(created) || this.now() - created > this.staleMs;
  }

  /**
   * Unreadable or malformed content counts as no lock
   */
  private async readLock(): Promise<LockFileContent | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.lockPath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (
        parsed !== null &&
        typeof parsed === 'object' &&
        'pid' in parsed &&
        typeof parsed.pid === 'number' &&
        'created_at' in parsed &&
        typeof parsed.created_at === 'string'
      ) {
        return { pid: parsed.pid, created_at: parsed.created_at };
      }
    } catch (error) {
      logger.debug(`Unreadable lock file for run ${this.runId}: ${getErrorMessage(error)}`);
    }
    return undefined;
  }
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}
