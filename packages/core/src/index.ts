/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './workflow/index.js';
export {
  DebugLogger,
  LogLevel,
  createLogger,
  getGlobalLoggerConfig,
  setGlobalLoggerConfig,
  setLogSink,
} from './utils/logging.js';
export type { LoggerConfig, LogSink } from './utils/logging.js';
export { FakeProcessRunner } from './workflow/testing/FakeProcessRunner.js';
export type { ProcessHandler, ScriptedOutcome } from './workflow/testing/FakeProcessRunner.js';
