/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { glob } from 'glob';
import { WorkspacePaths } from './WorkspacePaths.js';
import { atomicWriteFile } from './persistence/atomicWrite.js';
import { formatTimestampUtc } from './persistence/RunState.js';
import { WorkflowConfigurationError } from './errors.js';
import { createLogger } from '../utils/logging.js';

const logger = createLogger('queue');

export const TASK_EXTENSION = '.task';

export type TaskOutcome = 'processed' | 'failed';

export interface FileQueueOptions {
  now?: () => number;
  generateId?: () => string;
}

/**
 * File-queue handoff between agents. A queue directory holds `inbox/`, and
 * finished tasks are filed under `processed/<timestamp>/` or
 * `failed/<timestamp>/` beside it. Tasks appear in the inbox only complete:
 * they are written to a temporary name and renamed to `*.task`.
 *
 * All paths are workspace-relative and go through the workspace guard.
 */
export class FileQueue {
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly paths: WorkspacePaths,
    options: FileQueueOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => uuidv4().slice(0, 8));
  }

  /**
   * Write a task into `inbox` and return its workspace-relative path
   */
  async enqueueTask(inbox: string, content: string, name?: string): Promise<string> {
    const inboxDir = await this.paths.resolve(inbox);
    const base = name ?? `${formatTimestampUtc(new Date(this.now()))}-${this.generateId()}`;
    if (base.length === 0 || base.includes('/') || base.includes('\\')) {
      throw new WorkflowConfigurationError(`Invalid task name '${base}'`, undefined, { inbox });
    }
    const fileName = base.endsWith(TASK_EXTENSION) ? base : `${base}${TASK_EXTENSION}`;
    const target = path.join(inboxDir, fileName);
    await atomicWriteFile(target, content);
    const relative = this.paths.relative(target);
    logger.debug(`Enqueued ${relative}`);
    return relative;
  }

  /**
   * Tasks waiting in `inbox`, oldest name first
   */
  async listTasks(inbox: string): Promise<string[]> {
    const inboxDir = await this.paths.resolve(inbox);
    const matches = await glob(`*${TASK_EXTENSION}`, { cwd: inboxDir, nodir: true, absolute: true });
    return matches.map((match) => this.paths.relative(match)).sort();
  }

  /**
   * Move a task out of its inbox into `processed/<timestamp>/` or
   * `failed/<timestamp>/` next to the inbox. Returns the new path.
   */
  async completeTask(taskPath: string, outcome: TaskOutcome): Promise<string> {
    const source = await this.paths.resolve(taskPath);
    const queueDir = path.dirname(path.dirname(source));
    const destinationDir = path.join(queueDir, outcome, formatTimestampUtc(new Date(this.now())));
    await this.paths.assertRealPathWithin(destinationDir, this.paths.relative(destinationDir));
    await fs.mkdir(destinationDir, { recursive: true });

    const destination = path.join(destinationDir, path.basename(source));
    await fs.rename(source, destination);
    const relative = this.paths.relative(destination);
    logger.debug(`Moved ${taskPath} to ${relative}`);
    return relative;
  }
}
