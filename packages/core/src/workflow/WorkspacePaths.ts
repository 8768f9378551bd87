/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PathSafetyError, isNotFoundError } from './errors.js';

/**
 * Resolves user-declared paths against the workspace root and refuses anything
 * that lands outside it, before the path is ever opened.
 */
export class WorkspacePaths {
  readonly root: string;
  private realRoot: string | null = null;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Lexical check: rejects absolute paths and `..` escapes.
   * Returns the absolute path inside the root.
   */
  resolveLexical(userPath: string, stepName?: string): string {
    if (userPath.length === 0) {
      throw new PathSafetyError('Empty path', userPath, stepName);
    }
    if (path.isAbsolute(userPath) || path.win32.isAbsolute(userPath)) {
      throw new PathSafetyError(`Absolute paths are not allowed: ${userPath}`, userPath, stepName);
    }
    const resolved = path.resolve(this.root, userPath);
    if (!isWithin(this.root, resolved)) {
      throw new PathSafetyError(`Path escapes the workspace root: ${userPath}`, userPath, stepName);
    }
    return resolved;
  }

  /**
   * Full check: lexical, then the real location (after symlinks) of the path,
   * or of its nearest existing ancestor when it does not exist yet.
   */
  async resolve(userPath: string, stepName?: string): Promise<string> {
    const resolved = this.resolveLexical(userPath, stepName);
    await this.assertRealPathWithin(resolved, userPath, stepName);
    return resolved;
  }

  /**
   * Realpath check for a path that is already absolute, such as a glob match.
   */
  async assertRealPathWithin(absolutePath: string, displayPath: string, stepName?: string): Promise<void> {
    const realRoot = await this.getRealRoot();
    const real = await realPathOfNearestExisting(absolutePath);
    if (!isWithin(realRoot, real)) {
      throw new PathSafetyError(
        `Path resolves outside the workspace root: ${displayPath}`,
        displayPath,
        stepName,
        { resolved: real }
      );
    }
  }

  /**
   * Relative POSIX-style path for display and persisted state
   */
  relative(absolutePath: string): string {
    return path.relative(this.root, absolutePath).split(path.sep).join('/');
  }

  private async getRealRoot(): Promise<string> {
    if (this.realRoot === null) {
      this.realRoot = await fs.realpath(this.root);
    }
    return this.realRoot;
  }
}

export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

async function realPathOfNearestExisting(target: string): Promise<string> {
  const pending: string[] = [];
  let current = target;
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return pending.length > 0 ? path.join(real, ...pending.reverse()) : real;
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return target;
      }
      pending.push(path.basename(current));
      current = parent;
    }
  }
}
