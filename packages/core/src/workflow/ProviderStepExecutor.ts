/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { InjectionSummary, ProviderStep, ProviderTemplate, Step, StepKind } from './types.js';
import { ProcessInvocation, ProcessStepExecutor } from './ProcessStepExecutor.js';
import { StepExecutionContext } from './StepExecutor.js';
import { ResolveOptions } from './VariableResolver.js';
import { ResolvedDependencies } from './DependencyInjector.js';
import { MissingVariableError, StepExecutionError, WorkflowConfigurationError, WorkflowError } from './errors.js';
import { PROMPT_PLACEHOLDER } from './config.js';

const PARAM_REGEX = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const INVALID_INPUT_EXIT_CODE = 2;

/**
 * Executor for `provider` steps.
 *
 * The prompt is read from `input_file`, augmented with the step's
 * dependencies, and delivered either as the `${PROMPT}` argument or on
 * stdin, as the provider template declares. Other `${name}` tokens in the
 * template take the provider defaults overridden by `provider_params`.
 *
 * Exit codes follow the provider contract: 1 and 124 are retryable by
 * default, 2 means the provider rejected its input and is never retried.
 */
export class ProviderStepExecutor extends ProcessStepExecutor<ProviderStep> {
  getSupportedType(): StepKind {
    return 'provider';
  }

  canExecute(step: Step): step is ProviderStep {
    return step.kind === 'provider';
  }

  protected async buildInvocation(
    step: ProviderStep,
    context: StepExecutionContext,
    options: ResolveOptions,
    dependencies?: ResolvedDependencies
  ): Promise<ProcessInvocation> {
    const template = this.getTemplate(step);
    const params = this.resolveParams(step, template, context, options);

    const input = await this.readInputFile(step, context, options);
    let prompt = input ? input.toString('utf8') : '';
    let injection: InjectionSummary | undefined;
    if (dependencies && step.dependsOn) {
      const injected = await this.services.dependencies.inject(prompt, dependencies.files, step.dependsOn.injection);
      prompt = injected.prompt;
      injection = injected.summary;
    }

    const argv = template.command.map((token) =>
      token === PROMPT_PLACEHOLDER ? prompt : substituteParams(token, params, step.name)
    );
    return {
      argv,
      prompt,
      ...(template.inputMode === 'stdin' ? { stdin: prompt } : {}),
      ...(injection ? { injection } : {}),
    };
  }

  protected exitError(step: ProviderStep, exitCode: number, command: string): WorkflowError {
    if (exitCode === INVALID_INPUT_EXIT_CODE) {
      return new StepExecutionError(
        `Provider '${step.provider}' rejected its input (exit code ${exitCode})`,
        exitCode,
        false,
        step.name,
        { command, provider: step.provider }
      );
    }
    return new StepExecutionError(
      `Provider '${step.provider}' exited with code ${exitCode}`,
      exitCode,
      this.isRetryableExit(step, exitCode),
      step.name,
      { command, provider: step.provider }
    );
  }

  private getTemplate(step: ProviderStep): ProviderTemplate {
    const template = this.services.providers.get(step.provider);
    if (!template) {
      throw new WorkflowConfigurationError(`Unknown provider '${step.provider}'`, step.name);
    }
    return template;
  }

  private resolveParams(
    step: ProviderStep,
    template: ProviderTemplate,
    context: StepExecutionContext,
    options: ResolveOptions
  ): Record<string, string> {
    const params: Record<string, string> = {};
    for (const [name, value] of Object.entries({ ...template.defaults, ...step.params })) {
      params[name] = typeof value === 'string'
        ? this.services.resolver.resolveString(value, context.scope, { ...options, field: 'provider_params' })
        : String(value);
    }
    return params;
  }
}

function substituteParams(token: string, params: Readonly<Record<string, string>>, stepName: string): string {
  return token.replace(PARAM_REGEX, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new MissingVariableError(name, 'provider_params', stepName);
    }
    return value;
  });
}
