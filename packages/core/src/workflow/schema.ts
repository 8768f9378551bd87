/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { Ajv, ErrorObject, SchemaObject } from 'ajv';
import { RunStateDocument, WorkflowDefinition } from './types.js';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const stringArraySchema = { type: 'array', items: { type: 'string' } } as const;
const stringMapSchema = { type: 'object', additionalProperties: { type: 'string' } } as const;
const scalarMapSchema = {
  type: 'object',
  additionalProperties: { type: ['string', 'number', 'boolean'] },
} as const;
const nonNegativeNumber = { type: 'number', minimum: 0 } as const;

const operandsSchema = {
  type: 'object',
  properties: { left: {}, right: {} },
  required: ['left', 'right'],
  additionalProperties: false,
} as const;

const transitionSchema = {
  type: 'object',
  properties: {
    goto: { type: 'string', minLength: 1 },
    end: { type: 'boolean' },
    error: { type: 'string' },
  },
  additionalProperties: false,
} as const;

const workflowDefinitionSchema: SchemaObject = {
  type: 'object',
  properties: {
    version: { type: 'string' },
    name: { type: 'string', minLength: 1 },
    strict_flow: { type: 'boolean' },
    max_transitions: { type: 'integer', minimum: 1 },
    providers: { type: 'object', additionalProperties: { $ref: '#/$defs/provider' } },
    context: { type: 'object' },
    secrets: stringArraySchema,
    steps: { $ref: '#/$defs/steps' },
  },
  required: ['version', 'name', 'steps'],
  additionalProperties: false,
  $defs: {
    provider: {
      type: 'object',
      properties: {
        command: { type: 'array', items: { type: 'string' }, minItems: 1 },
        input_mode: { type: 'string', enum: ['argv', 'stdin'] },
        defaults: scalarMapSchema,
      },
      required: ['command'],
      additionalProperties: false,
    },
    steps: { type: 'array', items: { $ref: '#/$defs/step' }, minItems: 1 },
    condition: {
      type: 'object',
      properties: {
        step_ok: { type: 'string' },
        file_exists: { type: 'string' },
        env_set: { type: 'string' },
        equals: operandsSchema,
        contains: operandsSchema,
        regex: {
          type: 'object',
          properties: { value: { type: 'string' }, pattern: { type: 'string' } },
          required: ['value', 'pattern'],
          additionalProperties: false,
        },
        compare: {
          type: 'object',
          properties: {
            left: {},
            op: { type: 'string', enum: ['<', '<=', '>', '>=', '==', '!='] },
            right: {},
          },
          required: ['left', 'op', 'right'],
          additionalProperties: false,
        },
        all: { type: 'array', items: { $ref: '#/$defs/condition' }, minItems: 1 },
        any: { type: 'array', items: { $ref: '#/$defs/condition' }, minItems: 1 },
        not: { $ref: '#/$defs/condition' },
        expr: { type: 'string', minLength: 1 },
      },
      minProperties: 1,
      maxProperties: 1,
      additionalProperties: false,
    },
    step: {
      type: 'object',
      properties: {
        name: { type: 'string', minLength: 1 },
        command: { type: 'array', items: { type: 'string' }, minItems: 1 },
        provider: { type: 'string' },
        provider_params: scalarMapSchema,
        for_each: {
          type: 'object',
          properties: {
            items: { type: 'array' },
            items_from: { type: 'string' },
            as: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
            parallel: {
              oneOf: [
                { type: 'boolean' },
                {
                  type: 'object',
                  properties: {
                    max_workers: { type: 'integer', minimum: 1 },
                    join: { type: 'string', enum: ['all', 'any', 'majority'] },
                    timeout_sec: nonNegativeNumber,
                  },
                  additionalProperties: false,
                },
              ],
            },
            on_item_failure: { type: 'string', enum: ['stop', 'continue'] },
            steps: { $ref: '#/$defs/steps' },
          },
          required: ['steps'],
          additionalProperties: false,
        },
        while: {
          type: 'object',
          properties: {
            condition: { $ref: '#/$defs/condition' },
            max_iterations: { type: 'integer', minimum: 1 },
            max_duration_sec: nonNegativeNumber,
            delay_sec: nonNegativeNumber,
            steps: { $ref: '#/$defs/steps' },
          },
          required: ['condition', 'max_iterations', 'steps'],
          additionalProperties: false,
        },
        wait_for: {
          type: 'object',
          properties: {
            glob: { type: 'string', minLength: 1 },
            min_count: { type: 'integer', minimum: 1 },
            timeout_sec: nonNegativeNumber,
            poll_interval_sec: nonNegativeNumber,
          },
          required: ['glob'],
          additionalProperties: false,
        },
        input_file: { type: 'string' },
        output_file: { type: 'string' },
        output_capture: { type: 'string', enum: ['text', 'lines', 'json'] },
        allow_parse_error: { type: 'boolean' },
        when: { $ref: '#/$defs/condition' },
        on: {
          type: 'object',
          properties: { success: transitionSchema, failure: transitionSchema, always: transitionSchema },
          additionalProperties: false,
        },
        depends_on: {
          type: 'object',
          properties: {
            required: stringArraySchema,
            optional: stringArraySchema,
            inject: {
              oneOf: [
                { type: 'boolean' },
                {
                  type: 'object',
                  properties: {
                    mode: { type: 'string', enum: ['list', 'content', 'none'] },
                    instruction: { type: 'string' },
                    position: { type: 'string', enum: ['prepend', 'append'] },
                    max_bytes: { type: 'integer', minimum: 0 },
                  },
                  additionalProperties: false,
                },
              ],
            },
          },
          additionalProperties: false,
        },
        retries: {
          type: 'object',
          properties: {
            max_attempts: { type: 'integer', minimum: 1 },
            backoff: { type: 'string', enum: ['fixed', 'exponential'] },
            delay_ms: { type: 'integer', minimum: 0 },
            max_delay_ms: { type: 'integer', minimum: 0 },
            on_exit_codes: { type: 'array', items: { type: 'integer' } },
            on_timeout: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        timeout_sec: nonNegativeNumber,
        secrets: stringArraySchema,
        env: stringMapSchema,
        allow_undefined: stringArraySchema,
      },
      required: ['name'],
      additionalProperties: false,
    },
  },
};

const errorDetailSchema = {
  type: 'object',
  properties: {
    kind: {
      type: 'string',
      enum: [
        'configuration',
        'path_safety',
        'missing_dependency',
        'missing_variable',
        'output_parse',
        'timeout',
        'execution',
        'cancelled',
      ],
    },
    message: { type: 'string' },
    context: { type: 'object' },
  },
  required: ['kind', 'message'],
} as const;

const stepStatusSchema = { type: 'string', enum: ['pending', 'running', 'completed', 'failed', 'skipped'] } as const;

const runStateSchema: SchemaObject = {
  type: 'object',
  properties: {
    schema_version: { type: 'string' },
    run_id: { type: 'string', minLength: 1 },
    workflow_name: { type: 'string' },
    workflow_checksum: { type: 'string', pattern: '^sha256:[0-9a-f]{64}$' },
    definition: { type: 'object' },
    status: { type: 'string', enum: ['running', 'completed', 'failed', 'cancelled', 'error'] },
    started_at: { type: 'string' },
    updated_at: { type: 'string' },
    timestamp_utc: { type: 'string' },
    context: { type: 'object' },
    current_step: { type: ['string', 'null'] },
    transitions: { type: 'integer', minimum: 0 },
    steps: { type: 'object', additionalProperties: { $ref: '#/$defs/stepResult' } },
    loops: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          kind: { type: 'string', enum: ['for_each', 'while'] },
          items: { type: 'array' },
          iterations: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                index: { type: 'integer', minimum: 0 },
                status: stepStatusSchema,
                steps: { type: 'object', additionalProperties: { $ref: '#/$defs/stepResult' } },
                error: errorDetailSchema,
              },
              required: ['index', 'status', 'steps'],
            },
          },
          started_at: { type: 'string' },
          summary: { type: 'object' },
          termination_reason: {
            type: 'string',
            enum: ['condition_false', 'max_iterations', 'timeout', 'explicit_break', 'cancelled'],
          },
        },
        required: ['kind', 'iterations', 'started_at'],
      },
    },
    error: errorDetailSchema,
  },
  required: [
    'schema_version',
    'run_id',
    'workflow_name',
    'workflow_checksum',
    'definition',
    'status',
    'started_at',
    'updated_at',
    'timestamp_utc',
    'context',
    'current_step',
    'transitions',
    'steps',
    'loops',
  ],
  $defs: {
    stepResult: {
      type: 'object',
      properties: {
        status: stepStatusSchema,
        exit_code: { type: 'integer' },
        output: { type: 'string' },
        lines: stringArraySchema,
        parse_error: { type: 'boolean' },
        truncated: { type: 'boolean' },
        spill_path: { type: 'string' },
        stderr: { type: 'string' },
        duration_ms: nonNegativeNumber,
        attempts: { type: 'integer', minimum: 0 },
        fingerprint: { type: 'string' },
        skipped_reason: { type: 'string' },
        error: errorDetailSchema,
      },
      required: ['status'],
    },
  },
};

const validateWorkflow = ajv.compile<WorkflowDefinition>(workflowDefinitionSchema);
const validateState = ajv.compile<RunStateDocument>(runStateSchema);

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

export function validateWorkflowDefinition(workflow: unknown): ValidationResult<WorkflowDefinition> {
  if (validateWorkflow(workflow)) {
    return { valid: true, value: workflow };
  }
  return { valid: false, errors: formatErrors(validateWorkflow.errors) };
}

export function validateRunStateDocument(document: unknown): ValidationResult<RunStateDocument> {
  if (validateState(document)) {
    return { valid: true, value: document };
  }
  return { valid: false, errors: formatErrors(validateState.errors) };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Unknown validation error'];
  }
  return errors.map((error) => `${error.instancePath || 'root'}: ${error.message ?? 'is invalid'}`);
}
