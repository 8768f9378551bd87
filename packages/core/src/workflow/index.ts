/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './config.js';
export * from './errors.js';
export * from './schema.js';
export * from './WorkflowModel.js';
export * from './WorkflowLoader.js';
export * from './WorkspacePaths.js';
export * from './VariableResolver.js';
export * from './ExpressionParser.js';
export * from './ConditionEvaluator.js';
export * from './DependencyInjector.js';
export * from './OutputProcessor.js';
export * from './ProcessRunner.js';
export * from './CancellationToken.js';
export * from './logging.js';
export * from './retry.js';
export * from './StepExecutor.js';
export * from './ProcessStepExecutor.js';
export * from './CommandStepExecutor.js';
export * from './ProviderStepExecutor.js';
export * from './LoopExecutor.js';
export * from './WaitForExecutor.js';
export * from './WorkflowRunner.js';
export * from './FileQueue.js';
export * from './persistence/index.js';
