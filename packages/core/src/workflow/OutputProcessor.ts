/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'path';
import { CaptureSpec } from './types.js';
import { OutputParseError } from './errors.js';
import { atomicWriteFile } from './persistence/atomicWrite.js';
import { JSON_LIMIT_BYTES, LINES_LIMIT, SPILL_THRESHOLD_BYTES, TEXT_STATE_LIMIT_BYTES } from './config.js';
import { splitLines, stripTrailingNewlines, truncateUtf8 } from '../utils/text.js';

/** The StepResult fields produced from captured stdout */
export interface ProcessedOutput {
  output?: string;
  lines?: string[];
  json?: unknown;
  parse_error?: boolean;
  truncated?: boolean;
  spill_path?: string;
}

export interface OutputLimits {
  textBytes: number;
  spillBytes: number;
  lines: number;
  jsonBytes: number;
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

const DEFAULT_LIMITS: OutputLimits = {
  textBytes: TEXT_STATE_LIMIT_BYTES,
  spillBytes: SPILL_THRESHOLD_BYTES,
  lines: LINES_LIMIT,
  jsonBytes: JSON_LIMIT_BYTES,
};

/**
 * Turns raw stdout into the persisted representation for the step's capture
 * mode. Oversized streams are spilled to `logs/` under the run directory.
 */
export class OutputProcessor {
  private readonly limits: OutputLimits;

  constructor(private readonly runDir: string, limits: Partial<OutputLimits> = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  /**
   * @param spillName file stem for spills, unique per step execution
   * @param captureTruncated the runner stopped reading at its memory ceiling
   */
  async process(
    stdout: Buffer,
    capture: CaptureSpec,
    spillName: string,
    stepName: string,
    captureTruncated = false
  ): Promise<ProcessedOutput> {
    switch (capture.mode) {
      case 'text': {
        const result: ProcessedOutput = {
          output: stripTrailingNewlines(truncateUtf8(stdout, this.limits.textBytes).toString('utf8')),
        };
        if (stdout.length > this.limits.textBytes || captureTruncated) {
          result.truncated = true;
        }
        if (stdout.length > this.limits.spillBytes) {
          result.spill_path = await this.spill(spillName, stdout);
        }
        return result;
      }

      case 'lines': {
        const all = splitLines(stdout.toString('utf8'));
        const result: ProcessedOutput = { lines: all.slice(0, this.limits.lines) };
        if (all.length > this.limits.lines || captureTruncated) {
          result.truncated = true;
        }
        if (stdout.length > this.limits.spillBytes) {
          result.spill_path = await this.spill(spillName, stdout);
        }
        return result;
      }

      case 'json': {
        const parsed = this.parseJson(stdout, captureTruncated);
        if (parsed.ok) {
          return { json: parsed.value };
        }
        if (!capture.allowParseError) {
          throw new OutputParseError(`Step output is not valid JSON: ${parsed.reason}`, stepName, {
            bytes: stdout.length,
          });
        }
        return { parse_error: true, spill_path: await this.spill(spillName, stdout) };
      }
    }
  }

  private parseJson(stdout: Buffer, captureTruncated: boolean): JsonParseResult {
    if (stdout.length > this.limits.jsonBytes || captureTruncated) {
      return { ok: false, reason: `output exceeds the ${this.limits.jsonBytes} byte limit` };
    }
    try {
      const value: unknown = JSON.parse(stdout.toString('utf8'));
      return { ok: true, value };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private async spill(spillName: string, data: Buffer): Promise<string> {
    const relative = path.posix.join('logs', `${sanitizeFileName(spillName)}.stdout`);
    await atomicWriteFile(path.join(this.runDir, relative), data);
    return relative;
  }
}

export function sanitizeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, '_');
}
