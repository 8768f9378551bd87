/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  ExpressionBindings,
  evaluateCondition,
  evaluateExpression,
  parseExpression,
  toExpressionValue,
} from './ExpressionParser.js';
import { WorkflowConfigurationError } from './errors.js';

describe('ExpressionParser', () => {
  describe('evaluation', () => {
    it('should respect arithmetic precedence', () => {
      expect(evaluateExpression(parseExpression('1 + 2 * 3'))).toBe(7);
      expect(evaluateExpression(parseExpression('(1 + 2) * 3'))).toBe(9);
      expect(evaluateExpression(parseExpression('7 % 4 - -1'))).toBe(4);
    });

    it('should compare numbers and strings', () => {
      expect(evaluateCondition('3 >= 3')).toBe(true);
      expect(evaluateCondition("'abc' < 'abd'")).toBe(true);
      expect(evaluateCondition('0 != 0')).toBe(false);
    });

    it('should combine with and, or and not', () => {
      expect(evaluateCondition('1 == 1 and not 2 == 3')).toBe(true);
      expect(evaluateCondition('false or null')).toBe(false);
      expect(evaluateCondition('not (true and false)')).toBe(true);
    });

    it('should support membership on lists and strings', () => {
      expect(evaluateCondition("'b' in ['a', 'b']")).toBe(true);
      expect(evaluateCondition("'z' not in ['a', 'b']")).toBe(true);
      expect(evaluateCondition("'ell' in 'hello'")).toBe(true);
      expect(evaluateCondition('[1, 2] in [[1, 2], [3]]')).toBe(true);
    });

    it('should concatenate strings and lists', () => {
      expect(evaluateExpression(parseExpression("'a' + 'b'"))).toBe('ab');
      expect(evaluateExpression(parseExpression('[1] + [2]'))).toEqual([1, 2]);
    });

    it('should handle string escapes', () => {
      expect(evaluateExpression(parseExpression("'it\\'s'"))).toBe("it's");
    });

    it('should treat empty values as false', () => {
      expect(evaluateCondition("''")).toBe(false);
      expect(evaluateCondition('[]')).toBe(false);
      expect(evaluateCondition('0')).toBe(false);
      expect(evaluateCondition("'x'")).toBe(true);
    });

    it('should not evaluate the right side when and short-circuits', () => {
      expect(evaluateCondition('false and 1 / 0')).toBe(false);
    });
  });

  describe('variables', () => {
    const bindings: ExpressionBindings = {
      lookup: (reference) => (reference === 'steps.a.exit_code' ? 0 : "' or 'x"),
      interpolate: (text) => text.replace('${context.quote}', "it's"),
    };

    it('should parse references as their own nodes', () => {
      expect(parseExpression("${steps.a.exit_code} == 0 and '${context.quote}' != ''")).toEqual({
        type: 'binary',
        operator: 'and',
        left: {
          type: 'binary',
          operator: '==',
          left: { type: 'variable', reference: 'steps.a.exit_code' },
          right: { type: 'literal', value: 0 },
        },
        right: {
          type: 'binary',
          operator: '!=',
          left: { type: 'template', text: '${context.quote}' },
          right: { type: 'literal', value: '' },
        },
      });
    });

    it('should evaluate references as values', () => {
      expect(evaluateCondition('${steps.a.exit_code} == 0', bindings)).toBe(true);
      expect(evaluateCondition("${context.other} == 'x'", bindings)).toBe(false);
      expect(evaluateExpression(parseExpression("'${context.quote}'"), bindings)).toBe("it's");
    });

    it('should require bindings for bare references', () => {
      expect(() => evaluateCondition('${steps.a.exit_code} == 0')).toThrow('Variable references need a resolution scope');
    });

    it('should reject an unterminated reference', () => {
      expect(() => parseExpression('${steps.a == 0')).toThrow('Unterminated variable reference at position 0');
    });
  });

  describe('toExpressionValue', () => {
    it('should read numeric text as numbers', () => {
      expect(toExpressionValue('12')).toBe(12);
      expect(toExpressionValue(' -1.5 ')).toBe(-1.5);
      expect(toExpressionValue('12 apples')).toBe('12 apples');
      expect(toExpressionValue('')).toBe('');
    });

    it('should keep list entries and stringify objects', () => {
      expect(toExpressionValue(['1', 2, { a: 1 }])).toEqual(['1', 2, '{"a":1}']);
      expect(toExpressionValue({ a: true })).toBe('{"a":true}');
      expect(toExpressionValue(undefined)).toBeNull();
    });
  });

  describe('rejections', () => {
    it.each([
      ['bare names', 'ready == true'],
      ['function calls', "open('x')"],
      ['attribute access', "'a'.upper"],
      ['subscripts', '[1, 2][0]'],
      ['chained comparisons', '1 < 2 < 3'],
      ['unknown characters', '1 && 2'],
      ['unterminated strings', "'abc"],
      ['trailing tokens', '1 2'],
      ['empty input', '   ']
    ])('should reject %s', (_label, source) => {
      expect(() => parseExpression(source)).toThrow(WorkflowConfigurationError);
    });

    it('should reject type mismatches at evaluation', () => {
      expect(() => evaluateCondition("1 < 'a'")).toThrow(WorkflowConfigurationError);
      expect(() => evaluateCondition('1 / 0')).toThrow('Division by zero in expression');
    });

    it('should cap nesting depth', () => {
      const deep = `${'('.repeat(60)}1${')'.repeat(60)}`;
      expect(() => parseExpression(deep)).toThrow('Expression nesting exceeds 50 levels');
    });

    it('should accept moderate nesting', () => {
      const nested = `${'('.repeat(10)}1${')'.repeat(10)}`;
      expect(evaluateExpression(parseExpression(nested))).toBe(1);
    });
  });
});
