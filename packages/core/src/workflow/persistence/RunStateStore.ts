/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { RunState } from './RunState.js';
import { atomicWriteFile } from './atomicWrite.js';
import { validateRunStateDocument } from '../schema.js';
import { RunStateDocument, STATE_SCHEMA_VERSION } from '../types.js';
import { WorkflowConfigurationError, getErrorMessage, isNotFoundError } from '../errors.js';
import { DEFAULT_BACKUP_COUNT, STATE_FILE_NAME } from '../config.js';
import { createLogger } from '../../utils/logging.js';

const logger = createLogger('state');

const BACKUP_PATTERN = /^state\.(\d+)\.json$/;

export interface RunStateStoreConfig {
  /** Directory holding one subdirectory per run */
  baseDir: string;
  /** Rotating backups kept per run; 0 disables them */
  maxBackups?: number;
}

/**
 * Persists run state under `<baseDir>/<run_id>/state.json`.
 *
 * Writes go through a per-store queue so concurrent loop workers never
 * interleave, and every write is temp-file, fsync, rename.
 */
export class RunStateStore {
  private readonly baseDir: string;
  private readonly maxBackups: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: RunStateStoreConfig) {
    this.baseDir = path.resolve(config.baseDir);
    this.maxBackups = config.maxBackups ?? DEFAULT_BACKUP_COUNT;
  }

  getRunDir(runId: string): string {
    return path.join(this.baseDir, runId);
  }

  getStateFilePath(runId: string): string {
    return path.join(this.getRunDir(runId), STATE_FILE_NAME);
  }

  /**
   * Create the run directory and discard a temp file left by an interrupted save
   */
  async initialize(runId: string): Promise<void> {
    await fs.mkdir(this.getRunDir(runId), { recursive: true });
    const tmpPath = `${this.getStateFilePath(runId)}.tmp`;
    try {
      await fs.unlink(tmpPath);
      logger.warn(`Discarded incomplete state write for run ${runId}`);
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
  }

  /**
   * Queue a save of the state as it is right now
   */
  save(state: RunState): Promise<void> {
    const runId = state.runId;
    const serialized = state.serialize();
    return this.enqueue(() => atomicWriteFile(this.getStateFilePath(runId), serialized));
  }

  /**
   * Wait for every queued write
   */
  flush(): Promise<void> {
    return this.enqueue(async () => {});
  }

  async hasState(runId: string): Promise<boolean> {
    try {
      await fs.access(this.getStateFilePath(runId));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load and validate. Anything short of a complete, valid document is a
   * configuration error; nothing is partially loaded.
   */
  async load(runId: string): Promise<RunState> {
    await this.flush();
    const filePath = this.getStateFilePath(runId);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new WorkflowConfigurationError(`No state found for run ${runId}`, undefined, { runId });
      }
      throw error;
    }
    return new RunState(parseStateDocument(content, filePath));
  }

  /**
   * Copy the committed state to `backups/state.<n>.json`, keeping the newest
   */
  createBackup(runId: string): Promise<void> {
    if (this.maxBackups <= 0) {
      return Promise.resolve();
    }
    return this.enqueue(async () => {
      const backupDir = this.getBackupDir(runId);
      await fs.mkdir(backupDir, { recursive: true });
      const existing = await this.listBackupNumbers(runId);
      const next = existing.length > 0 ? existing[existing.length - 1] + 1 : 1;
      try {
        await fs.copyFile(this.getStateFilePath(runId), path.join(backupDir, `state.${next}.json`));
      } catch (error) {
        if (isNotFoundError(error)) {
          return;
        }
        throw error;
      }
      await this.cleanupOldBackups(runId, [...existing, next]);
    });
  }

  async listBackups(runId: string): Promise<string[]> {
    const numbers = await this.listBackupNumbers(runId);
    return numbers.map((n) => path.join(this.getBackupDir(runId), `state.${n}.json`));
  }

  /**
   * Replace state.json with the newest backup that validates.
   * Returns false when there is none.
   */
  restoreLatestBackup(runId: string): Promise<boolean> {
    return this.enqueueResult(async () => {
      const backups = (await this.listBackups(runId)).reverse();
      for (const backup of backups) {
        const content = await fs.readFile(backup, 'utf8');
        try {
          parseStateDocument(content, backup);
        } catch (error) {
          logger.warn(`Skipping invalid backup ${backup}: ${getErrorMessage(error)}`);
          continue;
        }
        await atomicWriteFile(this.getStateFilePath(runId), content);
        logger.info(`Restored run ${runId} from ${path.basename(backup)}`);
        return true;
      }
      return false;
    });
  }

  /**
   * Run ids with a state file, newest first
   */
  async listRuns(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
    const runs: Array<{ runId: string; modified: number }> = [];
    for (const runId of entries) {
      try {
        const stats = await fs.stat(this.getStateFilePath(runId));
        runs.push({ runId, modified: stats.mtimeMs });
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
      }
    }
    return runs.sort((a, b) => b.modified - a.modified).map((run) => run.runId);
  }

  private getBackupDir(runId: string): string {
    return path.join(this.getRunDir(runId), 'backups');
  }

  private async listBackupNumbers(runId: string): Promise<number[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.getBackupDir(runId));
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
    return files
      .map((file) => BACKUP_PATTERN.exec(file))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => Number(match[1]))
      .sort((a, b) => a - b);
  }

  private async cleanupOldBackups(runId: string, numbers: number[]): Promise<void> {
    const excess = numbers.slice(0, Math.max(0, numbers.length - this.maxBackups));
    for (const n of excess) {
      await fs.rm(path.join(this.getBackupDir(runId), `state.${n}.json`), { force: true });
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    return this.enqueueResult(task);
  }

  private enqueueResult<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

function parseStateDocument(content: string, filePath: string): RunStateDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new WorkflowConfigurationError(`State file is not valid JSON: ${filePath}`, undefined, {
      path: filePath,
      reason: getErrorMessage(error),
    });
  }
  const validation = validateRunStateDocument(parsed);
  if (!validation.valid) {
    throw new WorkflowConfigurationError(`State file failed validation: ${filePath}`, undefined, {
      path: filePath,
      errors: validation.errors,
    });
  }
  if (validation.value.schema_version !== STATE_SCHEMA_VERSION) {
    throw new WorkflowConfigurationError(
      `Unsupported state schema version '${validation.value.schema_version}' (expected ${STATE_SCHEMA_VERSION})`,
      undefined,
      { path: filePath }
    );
  }
  return validation.value;
}
