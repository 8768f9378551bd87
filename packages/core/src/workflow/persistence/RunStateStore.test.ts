/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunStateStore } from './RunStateStore.js';
import { RunState } from './RunState.js';
import { buildWorkflowModel } from '../WorkflowModel.js';
import { RunStatus, StepStatus } from '../types.js';
import { WorkflowConfigurationError } from '../errors.js';
import { setGlobalLoggerConfig } from '../../utils/logging.js';

describe('RunStateStore', () => {
  let tempDir: string;
  let store: RunStateStore;

  const model = buildWorkflowModel({
    version: '1',
    name: 'store-test',
    steps: [{ name: 'one', command: ['echo', 'one'] }],
  });

  const newState = (runId = 'run-1'): RunState =>
    RunState.create({ runId, model, context: { env: 'dev' }, startedAt: new Date('2025-01-02T03:04:05.678Z') });

  beforeEach(async () => {
    setGlobalLoggerConfig({ quiet: true });
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'store-test-'));
    store = new RunStateStore({ baseDir: tempDir, maxBackups: 2 });
  });

  afterEach(async () => {
    setGlobalLoggerConfig({ quiet: false });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should save and load a run state', async () => {
    const state = newState();
    state.setStepResult('one', { status: StepStatus.COMPLETED, exit_code: 0, output: 'one' });
    await store.initialize('run-1');
    await store.save(state);

    const loaded = await store.load('run-1');
    expect(loaded.getSnapshot()).toEqual(state.getSnapshot());
    expect(loaded.timestampUtc).toBe('20250102T030405Z');
    expect(await store.hasState('run-1')).toBe(true);
    expect(await store.hasState('run-2')).toBe(false);
  });

  it('should write state.json under the run directory', async () => {
    await store.save(newState());
    const raw = await fs.readFile(path.join(tempDir, 'run-1', 'state.json'), 'utf8');
    expect(JSON.parse(raw).run_id).toBe('run-1');
  });

  it('should serialize concurrent saves and keep the last one', async () => {
    const state = newState();
    const saves: Promise<void>[] = [];
    for (let i = 0; i < 5; i++) {
      state.setStepResult(`step-${i}`, { status: StepStatus.COMPLETED, exit_code: 0 });
      saves.push(store.save(state));
    }
    await Promise.all(saves);

    const loaded = await store.load('run-1');
    expect(Object.keys(loaded.steps)).toEqual(['step-0', 'step-1', 'step-2', 'step-3', 'step-4']);
  });

  it('should keep the committed state when a write dies before the rename', async () => {
    const state = newState();
    await store.save(state);
    await fs.writeFile(path.join(tempDir, 'run-1', 'state.json.tmp'), '{"run_id": "run-1", "sta');

    const loaded = await store.load('run-1');
    expect(loaded.status).toBe(RunStatus.RUNNING);

    await store.initialize('run-1');
    await expect(fs.access(path.join(tempDir, 'run-1', 'state.json.tmp'))).rejects.toThrow();
  });

  it('should reject a state file that is not JSON', async () => {
    await fs.mkdir(path.join(tempDir, 'run-1'));
    await fs.writeFile(path.join(tempDir, 'run-1', 'state.json'), 'not json');
    await expect(store.load('run-1')).rejects.toThrow(WorkflowConfigurationError);
  });

  it('should reject a state file that fails validation', async () => {
    await fs.mkdir(path.join(tempDir, 'run-1'));
    await fs.writeFile(path.join(tempDir, 'run-1', 'state.json'), JSON.stringify({ run_id: 'run-1' }));
    await expect(store.load('run-1')).rejects.toThrow(/failed validation/);
  });

  it('should reject an unsupported schema version', async () => {
    const document = newState().getSnapshot();
    document.schema_version = '0.9';
    await fs.mkdir(path.join(tempDir, 'run-1'));
    await fs.writeFile(path.join(tempDir, 'run-1', 'state.json'), JSON.stringify(document));
    await expect(store.load('run-1')).rejects.toThrow("Unsupported state schema version '0.9' (expected 1.1)");
  });

  it('should report a missing run as a configuration error', async () => {
    await expect(store.load('nope')).rejects.toThrow('No state found for run nope');
  });

  it('should rotate backups keeping the newest', async () => {
    const state = newState();
    for (let i = 0; i < 4; i++) {
      state.setCurrentStep(`step-${i}`);
      await store.save(state);
      await store.createBackup('run-1');
    }

    const backups = await store.listBackups('run-1');
    expect(backups.map((file) => path.basename(file))).toEqual(['state.3.json', 'state.4.json']);
    const newest = JSON.parse(await fs.readFile(backups[1], 'utf8'));
    expect(newest.current_step).toBe('step-3');
  });

  it('should skip backups before the first save', async () => {
    await store.initialize('run-1');
    await store.createBackup('run-1');
    expect(await store.listBackups('run-1')).toEqual([]);
  });

  it('should restore the newest valid backup', async () => {
    const state = newState();
    state.setCurrentStep('one');
    await store.save(state);
    await store.createBackup('run-1');
    await fs.writeFile(path.join(tempDir, 'run-1', 'backups', 'state.2.json'), '{broken');
    await fs.writeFile(path.join(tempDir, 'run-1', 'state.json'), '{broken');

    expect(await store.restoreLatestBackup('run-1')).toBe(true);
    const loaded = await store.load('run-1');
    expect(loaded.currentStep).toBe('one');
  });

  it('should report when there is no backup to restore', async () => {
    expect(await store.restoreLatestBackup('run-1')).toBe(false);
  });

  it('should list runs that have state', async () => {
    await store.save(newState('run-a'));
    await fs.mkdir(path.join(tempDir, 'empty-dir'));

    expect(await store.listRuns()).toEqual(['run-a']);
  });

  it('should list no runs when the base directory is missing', async () => {
    const missing = new RunStateStore({ baseDir: path.join(tempDir, 'missing') });
    expect(await missing.listRuns()).toEqual([]);
  });
});
