/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn, ChildProcess } from 'child_process';
import { DEFAULT_KILL_GRACE_MS, MAX_CAPTURE_BYTES } from './config.js';

export interface ProcessSpec {
  argv: readonly string[];
  cwd: string;
  env: Record<string, string>;
  stdin?: string | Buffer;
  timeoutMs: number;
  killGraceMs?: number;
  signal?: AbortSignal;
  maxStdoutBytes?: number;
}

export interface ProcessOutcome {
  /** null when the process was killed by a signal or never started */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
  stdoutTruncated: boolean;
  timedOut: boolean;
  cancelled: boolean;
  durationMs: number;
  /** Set when the executable could not be started */
  spawnError?: string;
}

/**
 * Runs one external process. The engine only talks to this interface so
 * tests can substitute a scripted runner.
 */
export interface ProcessRunner {
  run(spec: ProcessSpec): Promise<ProcessOutcome>;
}

const STDERR_CAPTURE_BYTES = 64 * 1024;

/**
 * Spawns argv directly, never through a shell. On timeout or cancellation the
 * child gets SIGTERM, then SIGKILL once the grace period lapses.
 */
export class ChildProcessRunner implements ProcessRunner {
  run(spec: ProcessSpec): Promise<ProcessOutcome> {
    const [command, ...args] = spec.argv;
    const startTime = Date.now();
    const maxStdout = spec.maxStdoutBytes ?? MAX_CAPTURE_BYTES;
    const killGraceMs = spec.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

    if (!command) {
      return Promise.resolve(notStarted('Empty command', startTime));
    }

    return new Promise<ProcessOutcome>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let stdoutTruncated = false;
      let timedOut = false;
      let cancelled = false;
      let spawnError: string | undefined;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        spec.signal?.removeEventListener('abort', onAbort);
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(stdoutChunks),
          stderr: Buffer.concat(stderrChunks),
          stdoutTruncated,
          timedOut,
          cancelled,
          durationMs: Date.now() - startTime,
          spawnError,
        });
      };

      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: spec.cwd,
          env: spec.env,
          stdio: ['pipe', 'pipe', 'pipe'],
          shell: false,
          windowsHide: true,
        });
      } catch (error) {
        resolve(notStarted(error instanceof Error ? error.message : String(error), startTime));
        return;
      }

      const terminate = () => {
        if (child.exitCode !== null || child.signalCode !== null) {
          return;
        }
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, killGraceMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, spec.timeoutMs);

      const onAbort = () => {
        cancelled = true;
        terminate();
      };

      child.stdout?.on('data', (chunk: Buffer) => {
        const room = maxStdout - stdoutBytes;
        if (room <= 0) {
          stdoutTruncated = true;
          return;
        }
        const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
        if (kept.length < chunk.length) {
          stdoutTruncated = true;
        }
        stdoutChunks.push(kept);
        stdoutBytes += kept.length;
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        const room = STDERR_CAPTURE_BYTES - stderrBytes;
        if (room > 0) {
          const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
          stderrChunks.push(kept);
          stderrBytes += kept.length;
        }
      });

      child.on('error', (error) => {
        spawnError = error.message;
        // a process that never started emits no exit
        if (child.pid === undefined) {
          finish(null, null);
        }
      });

      child.on('close', (exitCode, signal) => {
        finish(exitCode, signal);
      });

      child.stdin?.on('error', (error) => {
        // the child may exit without reading its input
        const code = 'code' in error ? error.code : undefined;
        if (code !== 'EPIPE' && code !== 'ERR_STREAM_DESTROYED') {
          stderrChunks.push(Buffer.from(`stdin error: ${error.message}\n`));
        }
      });
      if (spec.stdin !== undefined) {
        child.stdin?.end(spec.stdin);
      } else {
        child.stdin?.end();
      }

      if (spec.signal) {
        if (spec.signal.aborted) {
          onAbort();
        } else {
          spec.signal.addEventListener('abort', onAbort, { once: true });
        }
      }
    });
  }
}

function notStarted(message: string, startTime: number): ProcessOutcome {
  return {
    exitCode: null,
    signal: null,
    stdout: Buffer.alloc(0),
    stderr: Buffer.alloc(0),
    stdoutTruncated: false,
    timedOut: false,
    cancelled: false,
    durationMs: Date.now() - startTime,
    spawnError: message,
  };
}
