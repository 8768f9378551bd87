/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { DependencySpec, InjectionSpec, InjectionSummary } from './types.js';
import { WorkspacePaths } from './WorkspacePaths.js';
import { VariableResolver, ResolutionScope } from './VariableResolver.js';
import { MissingDependencyError } from './errors.js';
import { DEFAULT_CONTENT_INSTRUCTION, DEFAULT_LIST_INSTRUCTION } from './config.js';
import { truncateUtf8 } from '../utils/text.js';

export interface ResolvedDependencies {
  required: string[];
  optional: string[];
  /** Every matched file once, required first, as workspace-relative POSIX paths */
  files: string[];
}

export interface InjectionResult {
  prompt: string;
  summary?: InjectionSummary;
}

/**
 * Validates `depends_on` patterns against the workspace and composes the
 * augmented prompt. Nothing here writes to disk.
 */
export class DependencyInjector {
  constructor(
    private readonly paths: WorkspacePaths,
    private readonly resolver: VariableResolver
  ) {}

  /**
   * Resolve every pattern. A required pattern with no match raises
   * MissingDependencyError naming all of the empty patterns.
   */
  async resolve(
    spec: DependencySpec,
    scope: ResolutionScope,
    stepName: string,
    allowUndefined: readonly string[] = []
  ): Promise<ResolvedDependencies> {
    const options = { field: 'depends_on', allowUndefined, stepName };
    const required: string[] = [];
    const missing: string[] = [];

    for (const rawPattern of spec.required) {
      const pattern = this.resolver.resolveString(rawPattern, scope, options);
      const matches = await this.match(pattern, stepName);
      if (matches.length === 0) {
        missing.push(pattern);
      }
      required.push(...matches);
    }

    if (missing.length > 0) {
      throw new MissingDependencyError(
        `Required dependencies not found: ${missing.join(', ')}`,
        missing,
        stepName
      );
    }

    const optional: string[] = [];
    for (const rawPattern of spec.optional) {
      const pattern = this.resolver.resolveString(rawPattern, scope, options);
      optional.push(...(await this.match(pattern, stepName)));
    }

    return {
      required: unique(required),
      optional: unique(optional),
      files: unique([...required, ...optional]),
    };
  }

  /**
   * Expand one glob inside the workspace. Every match is realpath-checked.
   */
  async match(pattern: string, stepName?: string): Promise<string[]> {
    this.paths.resolveLexical(pattern, stepName);

    const matches = await glob(pattern, {
      cwd: this.paths.root,
      nodir: true,
      absolute: true,
      follow: false,
    });

    const relative: string[] = [];
    for (const match of matches) {
      const display = this.paths.relative(match);
      await this.paths.assertRealPathWithin(match, display, stepName);
      relative.push(display);
    }
    return relative.sort();
  }

  /**
   * Compose the prompt with the dependency list or contents
   */
  async inject(prompt: string, files: readonly string[], injection: InjectionSpec): Promise<InjectionResult> {
    if (injection.mode === 'none') {
      return { prompt };
    }
    if (files.length === 0) {
      return { prompt, summary: { mode: injection.mode, files: 0, truncated: false } };
    }

    if (injection.mode === 'list') {
      const block = [
        injection.instruction ?? DEFAULT_LIST_INSTRUCTION,
        ...files.map((file) => `- ${file}`),
      ].join('\n');
      return {
        prompt: compose(prompt, block, injection),
        summary: { mode: 'list', files: files.length, truncated: false },
      };
    }

    const sections: string[] = [injection.instruction ?? DEFAULT_CONTENT_INSTRUCTION];
    let remaining = injection.maxBytes;
    let filesShown = 0;
    let filesOmitted = 0;
    let bytesShown = 0;
    let bytesOmitted = 0;

    for (const file of files) {
      const content = await fs.readFile(path.join(this.paths.root, file));
      if (remaining <= 0) {
        filesOmitted++;
        bytesOmitted += content.length;
        continue;
      }
      const shown = truncateUtf8(content, remaining);
      const omitted = content.length - shown.length;
      let section = `=== ${file} ===\n${shown.toString('utf8')}`;
      if (omitted > 0) {
        section += `\n[... ${omitted} more bytes truncated]`;
      }
      sections.push(section);
      filesShown++;
      bytesShown += shown.length;
      bytesOmitted += omitted;
      remaining -= shown.length;
      if (omitted > 0) {
        remaining = 0;
      }
    }

    if (filesOmitted > 0) {
      sections.push(`[${filesOmitted} more file(s) omitted: content limit of ${injection.maxBytes} bytes reached]`);
    }

    const truncated = filesOmitted > 0 || bytesOmitted > 0;
    return {
      prompt: compose(prompt, sections.join('\n\n'), injection),
      summary: {
        mode: 'content',
        files: files.length,
        truncated,
        files_shown: filesShown,
        files_omitted: filesOmitted,
        bytes_shown: bytesShown,
        bytes_omitted: bytesOmitted,
      },
    };
  }
}

function compose(prompt: string, block: string, injection: InjectionSpec): string {
  if (prompt.length === 0) {
    return block;
  }
  return injection.position === 'append' ? `${prompt}\n\n${block}` : `${block}\n\n${prompt}`;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
