/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  LoopState,
  RunStateDocument,
  RunStatus,
  STATE_SCHEMA_VERSION,
  StepErrorDetail,
  StepResult,
  StepStatus,
  WorkflowDefinition,
  WorkflowModel,
} from '../types.js';

export interface RunStateInit {
  runId: string;
  model: WorkflowModel;
  context: Record<string, unknown>;
  startedAt?: Date;
}

export interface RunExecutionSummary {
  runId: string;
  name: string;
  status: RunStatus;
  stepCounts: Partial<Record<StepStatus, number>>;
  transitions: number;
  currentStep: string | null;
  canResume: boolean;
}

/**
 * Mutable, in-memory run state. The document is the persisted form; loop
 * workers write into it directly and the store snapshots it on save.
 */
export class RunState {
  private document: RunStateDocument;

  constructor(document: RunStateDocument) {
    this.document = document;
  }

  static create(init: RunStateInit): RunState {
    const startedAt = init.startedAt ?? new Date();
    return new RunState({
      schema_version: STATE_SCHEMA_VERSION,
      run_id: init.runId,
      workflow_name: init.model.name,
      workflow_checksum: init.model.checksum,
      definition: structuredClone(init.model.definition),
      status: RunStatus.RUNNING,
      started_at: startedAt.toISOString(),
      updated_at: startedAt.toISOString(),
      timestamp_utc: formatTimestampUtc(startedAt),
      context: structuredClone(init.context),
      current_step: null,
      transitions: 0,
      steps: {},
      loops: {},
    });
  }

  get runId(): string {
    return this.document.run_id;
  }

  get status(): RunStatus {
    return this.document.status;
  }

  get context(): Readonly<Record<string, unknown>> {
    return this.document.context;
  }

  get currentStep(): string | null {
    return this.document.current_step;
  }

  get transitions(): number {
    return this.document.transitions;
  }

  get error(): StepErrorDetail | undefined {
    return this.document.error;
  }

  get timestampUtc(): string {
    return this.document.timestamp_utc;
  }

  get workflowChecksum(): string {
    return this.document.workflow_checksum;
  }

  /** The definition the run was started with */
  get definition(): WorkflowDefinition {
    return this.document.definition;
  }

  /**
   * Deep copy of the persisted form
   */
  getSnapshot(): RunStateDocument {
    return structuredClone(this.document);
  }

  serialize(): string {
    return JSON.stringify(this.document, null, 2);
  }

  updateStatus(status: RunStatus, error?: StepErrorDetail): void {
    this.document.status = status;
    if (error) {
      this.document.error = error;
    } else {
      delete this.document.error;
    }
    this.touch();
  }

  setCurrentStep(name: string | null): void {
    this.document.current_step = name;
    this.touch();
  }

  /**
   * Count one goto hop and return the new total
   */
  recordTransition(): number {
    this.document.transitions++;
    this.touch();
    return this.document.transitions;
  }

  /** Top-level step results, shared by reference with the engine */
  get steps(): Record<string, StepResult> {
    return this.document.steps;
  }

  getStepResult(name: string): StepResult | undefined {
    return this.document.steps[name];
  }

  setStepResult(name: string, result: StepResult): void {
    this.document.steps[name] = result;
    this.touch();
  }

  getLoop(key: string): LoopState | undefined {
    return this.document.loops[key];
  }

  setLoop(key: string, loop: LoopState): void {
    this.document.loops[key] = loop;
    this.touch();
  }

  /**
   * Drop a loop's state together with the loops nested in its iterations
   */
  clearLoop(key: string): void {
    const nested = `${key}[`;
    for (const candidate of Object.keys(this.document.loops)) {
      if (candidate === key || candidate.startsWith(nested)) {
        delete this.document.loops[candidate];
      }
    }
    this.touch();
  }

  touch(): void {
    this.document.updated_at = new Date().toISOString();
  }

  getCompletedSteps(): string[] {
    return this.stepsWithStatus(StepStatus.COMPLETED);
  }

  getFailedSteps(): string[] {
    return this.stepsWithStatus(StepStatus.FAILED);
  }

  /**
   * A finished successful run has nothing left to do
   */
  canResume(): boolean {
    return this.document.status !== RunStatus.COMPLETED;
  }

  getExecutionSummary(): RunExecutionSummary {
    const stepCounts: Partial<Record<StepStatus, number>> = {};
    for (const result of Object.values(this.document.steps)) {
      stepCounts[result.status] = (stepCounts[result.status] ?? 0) + 1;
    }
    return {
      runId: this.document.run_id,
      name: this.document.workflow_name,
      status: this.document.status,
      stepCounts,
      transitions: this.document.transitions,
      currentStep: this.document.current_step,
      canResume: this.canResume(),
    };
  }

  private stepsWithStatus(status: StepStatus): string[] {
    return Object.entries(this.document.steps)
      .filter(([, result]) => result.status === status)
      .map(([name]) => name);
  }
}

/**
 * Compact UTC stamp for `${run.timestamp_utc}`, e.g. `20250102T030405Z`
 */
export function formatTimestampUtc(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
}
