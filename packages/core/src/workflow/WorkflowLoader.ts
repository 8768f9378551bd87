/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import * as yaml from 'yaml';
import { WorkflowDefinition, WorkflowModel } from './types.js';
import { validateWorkflowDefinition } from './schema.js';
import { buildWorkflowModel } from './WorkflowModel.js';
import { WorkflowConfigurationError, getErrorMessage, isNotFoundError } from './errors.js';
import { createLogger } from '../utils/logging.js';

const logger = createLogger('loader');

export type WorkflowFormat = 'yaml' | 'json';

export interface LoadedWorkflow {
  model: WorkflowModel;
  filePath: string;
  lastModified: Date;
}

export interface WorkflowLoaderOptions {
  workflowDirectory?: string;
  supportedExtensions?: string[];
}

export interface WorkflowDiscoveryResult {
  workflows: LoadedWorkflow[];
  errors: Array<{
    filePath: string;
    error: string;
  }>;
}

/**
 * Parse, validate and normalize workflow source text. A numeric `version`
 * (as YAML reads `version: 1`) is taken as its string form.
 */
export function parseWorkflowDefinition(content: string, format: WorkflowFormat, source = '<inline>'): WorkflowDefinition {
  let parsed: unknown;
  try {
    parsed = format === 'yaml' ? yaml.parse(content) : JSON.parse(content);
  } catch (error) {
    throw new WorkflowConfigurationError(`Failed to parse ${source}: ${getErrorMessage(error)}`, undefined, {
      source,
    });
  }

  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    const version: unknown = Reflect.get(parsed, 'version');
    if (typeof version === 'number') {
      parsed = { ...parsed, version: String(version) };
    }
  }

  const validation = validateWorkflowDefinition(parsed);
  if (!validation.valid) {
    throw new WorkflowConfigurationError(`Validation failed for ${source}: ${validation.errors.join(', ')}`, undefined, {
      source,
      errors: validation.errors,
    });
  }
  return validation.value;
}

export function formatForPath(filePath: string): WorkflowFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  if (ext === '.json') {
    return 'json';
  }
  throw new WorkflowConfigurationError(`Unsupported file extension: ${ext}`, undefined, { filePath });
}

/**
 * Loads workflow files into immutable models. Models are cached per path and
 * reloaded when the file's modification time changes.
 */
export class WorkflowLoader {
  private readonly workflowDirectory: string;
  private readonly supportedExtensions: string[];
  private cache: Map<string, LoadedWorkflow> = new Map();

  constructor(options: WorkflowLoaderOptions = {}) {
    this.workflowDirectory = path.resolve(options.workflowDirectory || './workflows');
    this.supportedExtensions = options.supportedExtensions || ['.yaml', '.yml', '.json'];
  }

  /**
   * Load every workflow file under the workflow directory. Invalid files are
   * reported, not thrown.
   */
  async discoverWorkflows(): Promise<WorkflowDiscoveryResult> {
    const result: WorkflowDiscoveryResult = { workflows: [], errors: [] };

    try {
      await fs.access(this.workflowDirectory);
    } catch {
      logger.debug(`Workflow directory ${this.workflowDirectory} does not exist`);
      return result;
    }

    const patterns = this.supportedExtensions.map((ext) => `**/*${ext}`);
    const files = await glob(patterns, { cwd: this.workflowDirectory, nodir: true, absolute: true });

    for (const filePath of files.sort()) {
      try {
        result.workflows.push(await this.loadWorkflowFile(filePath));
      } catch (error) {
        result.errors.push({ filePath, error: getErrorMessage(error) });
      }
    }
    return result;
  }

  /**
   * Load by path (anything containing a separator or a known extension) or
   * by the `name` declared in the file
   */
  async loadWorkflow(nameOrPath: string): Promise<LoadedWorkflow> {
    const looksLikePath =
      nameOrPath.includes('/') ||
      nameOrPath.includes('\\') ||
      this.supportedExtensions.includes(path.extname(nameOrPath).toLowerCase());
    if (looksLikePath) {
      return this.loadWorkflowFile(path.resolve(this.workflowDirectory, nameOrPath));
    }

    const discovery = await this.discoverWorkflows();
    const found = discovery.workflows.find((workflow) => workflow.model.name === nameOrPath);
    if (!found) {
      throw new WorkflowConfigurationError(`Workflow '${nameOrPath}' not found in ${this.workflowDirectory}`);
    }
    return found;
  }

  async loadWorkflowFile(filePath: string): Promise<LoadedWorkflow> {
    const stats = await fs.stat(filePath).catch((error: unknown) => {
      if (isNotFoundError(error)) {
        throw new WorkflowConfigurationError(`Workflow file not found: ${filePath}`, undefined, { filePath });
      }
      throw error;
    });

    const cached = this.cache.get(filePath);
    if (cached && cached.lastModified.getTime() === stats.mtime.getTime()) {
      return cached;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    const definition = parseWorkflowDefinition(content, formatForPath(filePath), filePath);
    const loaded: LoadedWorkflow = {
      model: buildWorkflowModel(definition),
      filePath,
      lastModified: stats.mtime,
    };
    this.cache.set(filePath, loaded);
    logger.debug(`Loaded workflow '${loaded.model.name}' from ${filePath}`);
    return loaded;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cachedWorkflows(): LoadedWorkflow[] {
    return Array.from(this.cache.values());
  }
}
