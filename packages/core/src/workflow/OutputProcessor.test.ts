/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { OutputProcessor, sanitizeFileName } from './OutputProcessor.js';
import { OutputParseError } from './errors.js';

describe('OutputProcessor', () => {
  let runDir: string;
  let processor: OutputProcessor;

  beforeEach(async () => {
    runDir = await fs.mkdtemp(path.join(os.tmpdir(), 'output-test-'));
    processor = new OutputProcessor(runDir, { textBytes: 8, spillBytes: 16, lines: 3, jsonBytes: 32 });
  });

  afterEach(async () => {
    await fs.rm(runDir, { recursive: true, force: true });
  });

  describe('text', () => {
    it('should store small output without trailing newlines', async () => {
      const result = await processor.process(Buffer.from('hello\n'), { mode: 'text', allowParseError: false }, 'one', 'one');
      expect(result).toEqual({ output: 'hello' });
    });

    it('should truncate output above the state limit without spilling', async () => {
      const result = await processor.process(Buffer.from('0123456789'), { mode: 'text', allowParseError: false }, 'one', 'one');
      expect(result).toEqual({ output: '01234567', truncated: true });
    });

    it('should spill output above the spill threshold', async () => {
      const data = 'abcdefghijklmnopqrstuvwxyz';
      const result = await processor.process(Buffer.from(data), { mode: 'text', allowParseError: false }, 'big', 'big');
      expect(result).toEqual({ output: 'abcdefgh', truncated: true, spill_path: 'logs/big.stdout' });
      expect(await fs.readFile(path.join(runDir, 'logs', 'big.stdout'), 'utf8')).toBe(data);
      await expect(fs.access(path.join(runDir, 'logs', 'big.stdout.tmp'))).rejects.toThrow();
    });

    it('should not split a multi-byte character', async () => {
      // 'aaaaaaa' is 7 bytes, 'é' takes 2
      const result = await processor.process(Buffer.from('aaaaaaaé'), { mode: 'text', allowParseError: false }, 'u', 'u');
      expect(result.output).toBe('aaaaaaa');
    });

    it('should flag output the runner cut short', async () => {
      const result = await processor.process(Buffer.from('hi'), { mode: 'text', allowParseError: false }, 'c', 'c', true);
      expect(result).toEqual({ output: 'hi', truncated: true });
    });
  });

  describe('lines', () => {
    it('should split on LF and CRLF and omit the raw output', async () => {
      const result = await processor.process(Buffer.from('a\r\nb\nc\n'), { mode: 'lines', allowParseError: false }, 'l', 'l');
      expect(result).toEqual({ lines: ['a', 'b', 'c'] });
    });

    it('should cap the number of lines', async () => {
      const result = await processor.process(Buffer.from('1\n2\n3\n4\n5'), { mode: 'lines', allowParseError: false }, 'l', 'l');
      expect(result).toEqual({ lines: ['1', '2', '3'], truncated: true });
    });

    it('should return no lines for empty output', async () => {
      const result = await processor.process(Buffer.alloc(0), { mode: 'lines', allowParseError: false }, 'l', 'l');
      expect(result).toEqual({ lines: [] });
    });
  });

  describe('json', () => {
    it('should parse valid JSON', async () => {
      const result = await processor.process(Buffer.from('{"files":["a"]}'), { mode: 'json', allowParseError: false }, 'j', 'j');
      expect(result).toEqual({ json: { files: ['a'] } });
    });

    it('should raise OutputParseError for invalid JSON', async () => {
      const error = await processor
        .process(Buffer.from('not json'), { mode: 'json', allowParseError: false }, 'j', 'parse')
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(OutputParseError);
      if (error instanceof OutputParseError) {
        expect(error.retryable).toBe(false);
        expect(error.stepName).toBe('parse');
      }
    });

    it('should record parse_error and spill when parse errors are allowed', async () => {
      const result = await processor.process(Buffer.from('not json'), { mode: 'json', allowParseError: true }, 'j', 'j');
      expect(result).toEqual({ parse_error: true, spill_path: 'logs/j.stdout' });
      expect(await fs.readFile(path.join(runDir, 'logs', 'j.stdout'), 'utf8')).toBe('not json');
    });

    it('should treat JSON over the limit as a parse error', async () => {
      const big = JSON.stringify({ value: 'x'.repeat(40) });
      await expect(processor.process(Buffer.from(big), { mode: 'json', allowParseError: false }, 'j', 'j'))
        .rejects.toBeInstanceOf(OutputParseError);
    });
  });

  it('should sanitize spill names', () => {
    expect(sanitizeFileName('loop/body step#2')).toBe('loop_body_step_2');
  });
});
