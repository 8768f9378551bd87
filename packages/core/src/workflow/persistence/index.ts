/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

export { atomicWriteFile } from './atomicWrite.js';
export { RunState, formatTimestampUtc } from './RunState.js';
export type { RunStateInit, RunExecutionSummary } from './RunState.js';
export { RunStateStore } from './RunStateStore.js';
export type { RunStateStoreConfig } from './RunStateStore.js';
export { RunLock } from './RunLock.js';
export type { RunLockOptions } from './RunLock.js';
