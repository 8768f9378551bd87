/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { VariableResolver, ResolutionScope, LoopScope } from './VariableResolver.js';
import { MissingVariableError, WorkflowConfigurationError } from './errors.js';
import { StepResult, StepStatus } from './types.js';

describe('VariableResolver', () => {
  let resolver: VariableResolver;
  let steps: Map<string, StepResult>;
  let scope: ResolutionScope;

  beforeEach(() => {
    resolver = new VariableResolver();
    steps = new Map<string, StepResult>([
      ['one', { status: StepStatus.COMPLETED, exit_code: 0, output: 'hello', duration_ms: 42 }],
      ['scan', {
        status: StepStatus.COMPLETED,
        exit_code: 0,
        json: { files: ['a.md', 'b.md'], meta: { count: 2 } }
      }],
      ['split', { status: StepStatus.COMPLETED, exit_code: 0, lines: ['x', 'y'] }]
    ]);
    scope = {
      run: { id: 'run-1', timestamp_utc: '2025-01-01T00:00:00.000Z', root: '/work' },
      context: { project: 'demo', nested: { level: 3 } },
      lookupStep: (name) => steps.get(name)
    };
  });

  describe('String substitution', () => {
    test('should resolve step output', () => {
      expect(resolver.resolveString('${steps.one.output}', scope)).toBe('hello');
    });

    test('should resolve several references in one string', () => {
      expect(resolver.resolveString('${context.project}-${run.id}', scope)).toBe('demo-run-1');
    });

    test('should resolve exit code, duration and status', () => {
      expect(resolver.resolveString(
        '${steps.one.exit_code}/${steps.one.duration}/${steps.one.status}',
        scope
      )).toBe('0/42/completed');
    });

    test('should walk into json results', () => {
      expect(resolver.resolveString('${steps.scan.json.meta.count}', scope)).toBe('2');
    });

    test('should embed arrays and objects as JSON text', () => {
      expect(resolver.resolveString('${steps.scan.json.files}', scope)).toBe('["a.md","b.md"]');
      expect(resolver.resolveString('${context.nested}', scope)).toBe('{"level":3}');
    });

    test('should resolve run fields', () => {
      expect(resolver.resolveString('${run.root}@${run.timestamp_utc}', scope))
        .toBe('/work@2025-01-01T00:00:00.000Z');
    });

    test('should tolerate whitespace inside the braces', () => {
      expect(resolver.resolveString('${ context.project }', scope)).toBe('demo');
    });
  });

  describe('Escapes', () => {
    test('should turn $$ into a literal dollar', () => {
      expect(resolver.resolveString('cost: $$5', scope)).toBe('cost: $5');
    });

    test('should not resolve an escaped reference', () => {
      expect(resolver.resolveString('$${context.project}', scope)).toBe('${context.project}');
    });

    test('should pass ${{...}} through verbatim', () => {
      expect(resolver.resolveString('echo ${{ github.sha }}', scope)).toBe('echo ${{ github.sha }}');
    });

    test('should leave a lone dollar alone', () => {
      expect(resolver.resolveString('price $ 3', scope)).toBe('price $ 3');
    });
  });

  describe('Undefined references', () => {
    test('should throw MissingVariableError naming the variable and field', () => {
      try {
        resolver.resolveString('${context.missing}', scope, { field: 'command', stepName: 'build' });
        expect.fail('expected a MissingVariableError');
      } catch (error) {
        expect(error).toBeInstanceOf(MissingVariableError);
        if (error instanceof MissingVariableError) {
          expect(error.variable).toBe('context.missing');
          expect(error.field).toBe('command');
          expect(error.stepName).toBe('build');
          expect(error.message).toBe("Undefined variable '${context.missing}' in field 'command'");
        }
      }
    });

    test('should substitute an empty string for allowlisted fields', () => {
      const result = resolver.resolveString('[${context.missing}]', scope, {
        field: 'env',
        allowUndefined: ['env']
      });
      expect(result).toBe('[]');
    });

    test('should still fail for fields outside the allowlist', () => {
      expect(() => resolver.resolveString('${context.missing}', scope, {
        field: 'command',
        allowUndefined: ['env']
      })).toThrow(MissingVariableError);
    });

    test('should treat an unknown step as undefined', () => {
      expect(() => resolver.resolveString('${steps.nope.output}', scope)).toThrow(MissingVariableError);
    });

    test('should treat a field the step did not capture as undefined', () => {
      expect(() => resolver.resolveString('${steps.split.output}', scope)).toThrow(MissingVariableError);
    });

    test('should reject indexing syntax as a configuration error', () => {
      expect(() => resolver.resolveString('${steps.scan.json.files[0]}', scope))
        .toThrow(WorkflowConfigurationError);
    });

    test('should reject an unterminated reference', () => {
      expect(() => resolver.resolveString('${context.project', scope)).toThrow(WorkflowConfigurationError);
    });
  });

  describe('Loop scope', () => {
    let outer: LoopScope;

    beforeEach(() => {
      outer = { varName: 'item', item: 'outer-item', hasItem: true, index: 0, iteration: 1, total: 2, startedAt: 0 };
    });

    test('should resolve the loop variable and loop fields', () => {
      scope.loop = { varName: 'file', item: 'a.md', hasItem: true, index: 1, iteration: 2, total: 3, startedAt: 1000 };
      scope.now = () => 3500;
      expect(resolver.resolveString(
        '${file}:${loop.index}:${loop.iteration}:${loop.total}:${loop.elapsed}',
        scope
      )).toBe('a.md:1:2:3:2.5');
    });

    test('should walk into object items', () => {
      scope.loop = { varName: 'task', item: { id: 7 }, hasItem: true, index: 0, iteration: 1, total: 1, startedAt: 0 };
      expect(resolver.resolveString('${task.id}', scope)).toBe('7');
    });

    test('should see enclosing loop variables', () => {
      scope.loop = { varName: 'inner', item: 'x', hasItem: true, index: 0, iteration: 1, total: 1, startedAt: 0, parent: outer };
      expect(resolver.resolveString('${item}/${inner}', scope)).toBe('outer-item/x');
    });

    test('should let the loop variable shadow a namespace', () => {
      scope.loop = { varName: 'context', item: { project: 'shadowed' }, hasItem: true, index: 0, iteration: 1, startedAt: 0 };
      expect(resolver.resolveString('${context.project}', scope)).toBe('shadowed');
    });

    test('should leave loop.total undefined for while loops', () => {
      scope.loop = { varName: 'item', hasItem: false, index: 0, iteration: 1, startedAt: 0 };
      expect(() => resolver.resolveString('${loop.total}', scope)).toThrow(MissingVariableError);
    });
  });

  describe('Values and pointers', () => {
    test('should resolve nested arrays and records', () => {
      const value = resolver.resolveValue({ args: ['${context.project}', 3], flag: true }, scope);
      expect(value).toEqual({ args: ['demo', 3], flag: true });
    });

    test('should resolve env records', () => {
      expect(resolver.resolveRecord({ NAME: '${context.project}' }, scope)).toEqual({ NAME: 'demo' });
    });

    test('should return raw values for pointers with or without braces', () => {
      expect(resolver.resolvePointer('steps.scan.json.files', scope)).toEqual(['a.md', 'b.md']);
      expect(resolver.resolvePointer('${steps.scan.json.files}', scope)).toEqual(['a.md', 'b.md']);
    });

    test('should report whether a reference resolves', () => {
      expect(resolver.has('steps.one.output', scope)).toBe(true);
      expect(resolver.has('steps.two.output', scope)).toBe(false);
      expect(resolver.has('bad[0]', scope)).toBe(false);
    });
  });
});
