/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

// ---------------------------------------------------------------------------
// Workflow definition, as written in a workflow file
// ---------------------------------------------------------------------------

export type CaptureMode = 'text' | 'lines' | 'json';
export type InjectMode = 'list' | 'content' | 'none';
export type InjectPosition = 'prepend' | 'append';
export type PromptTransport = 'argv' | 'stdin';
export type JoinPolicy = 'all' | 'any' | 'majority';
export type CompareOperator = '<' | '<=' | '>' | '>=' | '==' | '!=';
export type ScalarParam = string | number | boolean;

export interface OperandPair {
  left: unknown;
  right: unknown;
}

export type ConditionDefinition =
  | { step_ok: string }
  | { file_exists: string }
  | { env_set: string }
  | { equals: OperandPair }
  | { contains: OperandPair }
  | { regex: { value: string; pattern: string } }
  | { compare: { left: unknown; op: CompareOperator; right: unknown } }
  | { all: ConditionDefinition[] }
  | { any: ConditionDefinition[] }
  | { not: ConditionDefinition }
  | { expr: string };

export interface TransitionDefinition {
  goto?: string;
  end?: boolean;
  error?: string;
}

export interface TransitionsDefinition {
  success?: TransitionDefinition;
  failure?: TransitionDefinition;
  always?: TransitionDefinition;
}

export interface InjectDefinition {
  mode?: InjectMode;
  instruction?: string;
  position?: InjectPosition;
  max_bytes?: number;
}

export interface DependsOnDefinition {
  required?: string[];
  optional?: string[];
  inject?: boolean | InjectDefinition;
}

export interface RetryDefinition {
  max_attempts?: number;
  backoff?: 'fixed' | 'exponential';
  delay_ms?: number;
  max_delay_ms?: number;
  on_exit_codes?: number[];
  on_timeout?: boolean;
}

export interface ParallelDefinition {
  max_workers?: number;
  join?: JoinPolicy;
  timeout_sec?: number;
}

export interface ForEachDefinition {
  items?: unknown[];
  items_from?: string;
  as?: string;
  parallel?: boolean | ParallelDefinition;
  on_item_failure?: 'stop' | 'continue';
  steps: StepDefinition[];
}

export interface WhileDefinition {
  condition: ConditionDefinition;
  max_iterations: number;
  max_duration_sec?: number;
  delay_sec?: number;
  steps: StepDefinition[];
}

export interface WaitForDefinition {
  glob: string;
  min_count?: number;
  timeout_sec?: number;
  poll_interval_sec?: number;
}

export interface StepDefinition {
  name: string;
  command?: string[];
  provider?: string;
  provider_params?: Record<string, ScalarParam>;
  for_each?: ForEachDefinition;
  while?: WhileDefinition;
  wait_for?: WaitForDefinition;
  input_file?: string;
  output_file?: string;
  output_capture?: CaptureMode;
  allow_parse_error?: boolean;
  when?: ConditionDefinition;
  on?: TransitionsDefinition;
  depends_on?: DependsOnDefinition;
  retries?: RetryDefinition;
  timeout_sec?: number;
  secrets?: string[];
  env?: Record<string, string>;
  allow_undefined?: string[];
}

export interface ProviderDefinition {
  command: string[];
  input_mode?: PromptTransport;
  defaults?: Record<string, ScalarParam>;
}

export interface WorkflowDefinition {
  version: string;
  name: string;
  strict_flow?: boolean;
  max_transitions?: number;
  providers?: Record<string, ProviderDefinition>;
  context?: Record<string, unknown>;
  secrets?: string[];
  steps: StepDefinition[];
}

// ---------------------------------------------------------------------------
// Workflow model: immutable, validated, arena-addressed
// ---------------------------------------------------------------------------

export type Condition =
  | { type: 'step_ok'; step: string }
  | { type: 'file_exists'; path: string }
  | { type: 'env_set'; name: string }
  | { type: 'equals'; left: unknown; right: unknown }
  | { type: 'contains'; left: unknown; right: unknown }
  | { type: 'regex'; value: string; pattern: string }
  | { type: 'compare'; left: unknown; op: CompareOperator; right: unknown }
  | { type: 'all'; conditions: readonly Condition[] }
  | { type: 'any'; conditions: readonly Condition[] }
  | { type: 'not'; condition: Condition }
  | { type: 'expr'; source: string };

export const RESERVED_TARGETS = ['_start', '_end', '_error', '_loop_break', '_loop_continue'] as const;
export type ReservedTarget = (typeof RESERVED_TARGETS)[number];

export type Transition =
  | { type: 'goto'; target: string }
  | { type: 'end' }
  | { type: 'error'; message: string }
  | { type: 'loop_break' }
  | { type: 'loop_continue' };

export interface Transitions {
  success?: Transition;
  failure?: Transition;
  always?: Transition;
}

export interface InjectionSpec {
  mode: InjectMode;
  instruction?: string;
  position: InjectPosition;
  maxBytes: number;
}

export interface DependencySpec {
  required: readonly string[];
  optional: readonly string[];
  injection: InjectionSpec;
}

export interface RetryPolicy {
  maxAttempts: number;
  backoff: 'fixed' | 'exponential';
  delayMs: number;
  maxDelayMs: number;
  onExitCodes: readonly number[];
  onTimeout: boolean;
}

export interface CaptureSpec {
  mode: CaptureMode;
  allowParseError: boolean;
}

interface StepCommon {
  name: string;
  when?: Condition;
  on?: Transitions;
  allowUndefined: readonly string[];
}

/** Fields that only shape a spawned process. */
interface ProcessStepCommon extends StepCommon {
  dependsOn?: DependencySpec;
  retry?: RetryPolicy;
  timeoutMs?: number;
  secrets: readonly string[];
  env: Readonly<Record<string, string>>;
}

export interface CommandStep extends ProcessStepCommon {
  kind: 'command';
  command: readonly string[];
  inputFile?: string;
  outputFile?: string;
  capture: CaptureSpec;
}

export interface ProviderStep extends ProcessStepCommon {
  kind: 'provider';
  provider: string;
  params: Readonly<Record<string, ScalarParam>>;
  inputFile?: string;
  outputFile?: string;
  capture: CaptureSpec;
}

export interface ForEachStep extends StepCommon {
  kind: 'for_each';
  items?: readonly unknown[];
  itemsFrom?: string;
  as: string;
  parallel?: { maxWorkers: number; timeoutMs?: number };
  /** Sequential loops always join on `all`. */
  join: JoinPolicy;
  onItemFailure: 'stop' | 'continue';
  body: number;
}

export interface WhileStep extends StepCommon {
  kind: 'while';
  condition: Condition;
  maxIterations: number;
  maxDurationMs?: number;
  delayMs: number;
  body: number;
}

export interface WaitForStep extends StepCommon {
  kind: 'wait_for';
  glob: string;
  minCount: number;
  timeoutMs: number;
  pollIntervalMs: number;
}

export type ProcessStep = CommandStep | ProviderStep;
export type Step = CommandStep | ProviderStep | ForEachStep | WhileStep | WaitForStep;
export type StepKind = Step['kind'];

export interface ProviderTemplate {
  name: string;
  command: readonly string[];
  inputMode: PromptTransport;
  defaults: Readonly<Record<string, ScalarParam>>;
}

/** One step in the arena. `path` is unique across the whole workflow. */
export interface StepNode {
  id: number;
  path: string;
  listId: number;
  index: number;
  step: Step;
}

/** An ordered step list: the top level or a loop body. */
export interface StepList {
  id: number;
  ownerNodeId?: number;
  nodeIds: readonly number[];
  indexByName: ReadonlyMap<string, number>;
}

export interface WorkflowModel {
  name: string;
  version: string;
  strictFlow: boolean;
  maxTransitions: number;
  providers: ReadonlyMap<string, ProviderTemplate>;
  context: Readonly<Record<string, unknown>>;
  secrets: readonly string[];
  rootListId: number;
  nodes: readonly StepNode[];
  lists: readonly StepList[];
  checksum: string;
  definition: WorkflowDefinition;
}

// ---------------------------------------------------------------------------
// Run state document
// ---------------------------------------------------------------------------

export const STATE_SCHEMA_VERSION = '1.1';

export enum RunStatus {
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
  ERROR = 'error'
}

export enum StepStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  SKIPPED = 'skipped'
}

export type ErrorKind =
  | 'configuration'
  | 'path_safety'
  | 'missing_dependency'
  | 'missing_variable'
  | 'output_parse'
  | 'timeout'
  | 'execution'
  | 'cancelled';

export interface StepErrorDetail {
  kind: ErrorKind;
  message: string;
  context?: Record<string, unknown>;
}

export interface InjectionSummary {
  mode: InjectMode;
  files: number;
  truncated: boolean;
  files_shown?: number;
  files_omitted?: number;
  bytes_shown?: number;
  bytes_omitted?: number;
}

export interface StepResult {
  status: StepStatus;
  exit_code?: number;
  output?: string;
  lines?: string[];
  json?: unknown;
  parse_error?: boolean;
  truncated?: boolean;
  spill_path?: string;
  stderr?: string;
  duration_ms?: number;
  attempts?: number;
  started_at?: string;
  finished_at?: string;
  fingerprint?: string;
  injection?: InjectionSummary;
  skipped_reason?: string;
  error?: StepErrorDetail;
}

export type TerminationReason =
  | 'condition_false'
  | 'max_iterations'
  | 'timeout'
  | 'explicit_break'
  | 'cancelled';

export interface IterationRecord {
  index: number;
  item?: unknown;
  status: StepStatus;
  steps: Record<string, StepResult>;
  started_at?: string;
  duration_ms?: number;
  error?: StepErrorDetail;
}

export interface LoopSummary {
  total: number;
  completed: number;
  failed: number;
  skipped: number;
  success_rate: number;
  duration_ms: number;
  termination_reason?: TerminationReason;
}

export interface LoopState {
  kind: 'for_each' | 'while';
  items?: unknown[];
  iterations: IterationRecord[];
  started_at: string;
  summary?: LoopSummary;
  termination_reason?: TerminationReason;
}

export interface RunStateDocument {
  schema_version: string;
  run_id: string;
  workflow_name: string;
  workflow_checksum: string;
  definition: WorkflowDefinition;
  status: RunStatus;
  started_at: string;
  updated_at: string;
  timestamp_utc: string;
  context: Record<string, unknown>;
  current_step: string | null;
  transitions: number;
  steps: Record<string, StepResult>;
  loops: Record<string, LoopState>;
  error?: StepErrorDetail;
}

/** Process exit codes for each terminal run outcome */
export enum RunExitCode {
  SUCCESS = 0,
  ERROR = 1,
  STRICT_FLOW_HALT = 2,
  TIMEOUT = 124,
  CANCELLED = 130
}
