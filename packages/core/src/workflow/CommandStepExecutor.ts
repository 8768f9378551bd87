/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { CommandStep, Step, StepKind } from './types.js';
import { ProcessInvocation, ProcessStepExecutor } from './ProcessStepExecutor.js';
import { StepExecutionContext } from './StepExecutor.js';
import { ResolveOptions } from './VariableResolver.js';

/**
 * Executor for raw `command` steps. Each argv element is substituted on its
 * own and passed to the process as-is, so no quoting is ever needed.
 */
export class CommandStepExecutor extends ProcessStepExecutor<CommandStep> {
  getSupportedType(): StepKind {
    return 'command';
  }

  canExecute(step: Step): step is CommandStep {
    return step.kind === 'command';
  }

  protected async buildInvocation(
    step: CommandStep,
    context: StepExecutionContext,
    options: ResolveOptions
  ): Promise<ProcessInvocation> {
    const argv = step.command.map((part) =>
      this.services.resolver.resolveString(part, context.scope, { ...options, field: 'command' })
    );
    const stdin = await this.readInputFile(step, context, options);
    return { argv, ...(stdin !== undefined ? { stdin } : {}) };
  }
}
