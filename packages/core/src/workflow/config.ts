/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

export const KIB = 1024;
export const MIB = 1024 * KIB;

export const DEFAULT_STEP_TIMEOUT_MS = 300_000;
export const DEFAULT_KILL_GRACE_MS = 10_000;
export const DEFAULT_MAX_TRANSITIONS = 1000;

export const TEXT_STATE_LIMIT_BYTES = 8 * KIB;
export const SPILL_THRESHOLD_BYTES = MIB;
export const LINES_LIMIT = 10_000;
export const JSON_LIMIT_BYTES = MIB;
/** Hard ceiling on stdout held in memory for one process */
export const MAX_CAPTURE_BYTES = 64 * MIB;
export const STDERR_EXCERPT_BYTES = 4 * KIB;

export const DEFAULT_INJECT_MAX_BYTES = 256 * KIB;
export const DEFAULT_LIST_INSTRUCTION = 'The following files are available for this task:';
export const DEFAULT_CONTENT_INSTRUCTION = 'The following file contents are provided as context:';

export const MAX_EXPRESSION_DEPTH = 50;

export const DEFAULT_WAIT_TIMEOUT_MS = 300_000;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;
export const PROVIDER_RETRYABLE_EXIT_CODES: readonly number[] = [1, 124];
export const TIMEOUT_EXIT_CODE = 124;

export const STATE_ROOT_DIRNAME = '.wayline';
export const STATE_FILE_NAME = 'state.json';
export const LOCK_FILE_NAME = 'run.lock';
export const CANCEL_SENTINEL_NAME = 'cancel';
export const DEFAULT_BACKUP_COUNT = 3;
export const DEFAULT_LOCK_STALE_MS = 60 * 60 * 1000;

export const PROMPT_PLACEHOLDER = '${PROMPT}';

/** Variables a child inherits from the engine when no base environment is given */
export const INHERITED_ENV_NAMES: readonly string[] = ['PATH', 'HOME', 'USER', 'LANG', 'TMPDIR', 'SHELL', 'TERM'];
