/**
 * @license
 * Copyright 2025 Yiheng Tao
 * SPDX-License-Identifier: Apache-2.0
 */

import { WorkflowConfigurationError } from './errors.js';
import { MAX_EXPRESSION_DEPTH } from './config.js';

export type ExpressionValue = number | string | boolean | null | ExpressionValue[];

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | 'in' | 'not in'
  | 'and' | 'or';

export type ExpressionNode =
  | { type: 'literal'; value: number | string | boolean | null }
  | { type: 'variable'; reference: string }
  | { type: 'template'; text: string }
  | { type: 'list'; elements: ExpressionNode[] }
  | { type: 'unary'; operator: '-' | '+' | 'not'; operand: ExpressionNode }
  | { type: 'binary'; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode };

type TokenKind = 'number' | 'string' | 'template' | 'variable' | 'keyword' | 'name' | 'operator' | 'punct' | 'end';

/**
 * How `${...}` references reach their values. A bare reference becomes one
 * value; a quoted string containing references is interpolated as a whole.
 * Either way the result is data and is never parsed as expression syntax.
 */
export interface ExpressionBindings {
  lookup(reference: string): ExpressionValue;
  interpolate(text: string): string;
}

interface Token {
  kind: TokenKind;
  value: string;
  position: number;
}

interface ParseContext {
  tokens: readonly Token[];
  index: number;
  depth: number;
  source: string;
}

const KEYWORDS = new Set(['and', 'or', 'not', 'in', 'true', 'false', 'null']);
const COMPARISON_OPERATORS = new Set(['==', '!=', '<', '<=', '>', '>=']);
const TWO_CHAR_OPERATORS = new Set(['==', '!=', '<=', '>=']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '<', '>']);
const PUNCTUATION = new Set(['(', ')', '[', ']', ',', '.']);
const NUMBER_TEXT = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

/**
 * Parses a condition expression into a tree. Only literals, lists,
 * arithmetic, comparisons, membership and boolean operators are accepted;
 * names, calls, attribute access and subscripts are configuration errors.
 */
export function parseExpression(source: string): ExpressionNode {
  if (source.trim().length === 0) {
    throw new WorkflowConfigurationError('Expression is empty');
  }
  const ctx: ParseContext = { tokens: tokenize(source), index: 0, depth: 0, source };
  const node = parseOr(ctx);
  const trailing = peek(ctx);
  if (trailing.kind !== 'end') {
    throw unexpected(ctx, trailing);
  }
  return node;
}

/**
 * Evaluates a parsed tree. No host evaluation is involved.
 */
export function evaluateExpression(node: ExpressionNode, bindings?: ExpressionBindings, depth = 0): ExpressionValue {
  if (depth > MAX_EXPRESSION_DEPTH) {
    throw new WorkflowConfigurationError(`Expression nesting exceeds ${MAX_EXPRESSION_DEPTH} levels`);
  }

  switch (node.type) {
    case 'literal':
      return node.value;
    case 'variable':
      return requireBindings(bindings).lookup(node.reference);
    case 'template':
      return bindings ? bindings.interpolate(node.text) : node.text;
    case 'list':
      return node.elements.map((element) => evaluateExpression(element, bindings, depth + 1));
    case 'unary': {
      const operand = evaluateExpression(node.operand, bindings, depth + 1);
      if (node.operator === 'not') {
        return !isTruthy(operand);
      }
      const value = requireNumber(operand, node.operator);
      return node.operator === '-' ? -value : value;
    }
    case 'binary':
      return evaluateBinary(node.operator, node.left, node.right, bindings, depth + 1);
  }
}

/**
 * Parse and evaluate, returning the truthiness of the result
 */
export function evaluateCondition(source: string, bindings?: ExpressionBindings): boolean {
  return isTruthy(evaluateExpression(parseExpression(source), bindings));
}

/**
 * Convert a resolved variable into an expression value. Text that spells a
 * number compares as one; objects become their JSON text.
 */
export function toExpressionValue(value: unknown): ExpressionValue {
  if (typeof value === 'string') {
    return NUMBER_TEXT.test(value.trim()) ? Number(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => (typeof entry === 'string' ? entry : toExpressionValue(entry)));
  }
  return JSON.stringify(value);
}

function requireBindings(bindings: ExpressionBindings | undefined): ExpressionBindings {
  if (!bindings) {
    throw new WorkflowConfigurationError('Variable references need a resolution scope');
  }
  return bindings;
}

export function isTruthy(value: ExpressionValue): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== null && value !== false && value !== 0 && value !== '';
}

function evaluateBinary(
  operator: BinaryOperator,
  leftNode: ExpressionNode,
  rightNode: ExpressionNode,
  bindings: ExpressionBindings | undefined,
  depth: number
): ExpressionValue {
  // short-circuit before touching the right side
  if (operator === 'and' || operator === 'or') {
    const left = isTruthy(evaluateExpression(leftNode, bindings, depth));
    if (operator === 'and' ? !left : left) {
      return left;
    }
    return isTruthy(evaluateExpression(rightNode, bindings, depth));
  }

  const left = evaluateExpression(leftNode, bindings, depth);
  const right = evaluateExpression(rightNode, bindings, depth);

  switch (operator) {
    case '+':
      if (typeof left === 'number' && typeof right === 'number') return left + right;
      if (typeof left === 'string' && typeof right === 'string') return left + right;
      if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
      throw operandError(operator, left, right);
    case '-':
      return requireNumber(left, operator) - requireNumber(right, operator);
    case '*':
      return requireNumber(left, operator) * requireNumber(right, operator);
    case '/':
    case '%': {
      const divisor = requireNumber(right, operator);
      if (divisor === 0) {
        throw new WorkflowConfigurationError('Division by zero in expression');
      }
      const dividend = requireNumber(left, operator);
      return operator === '/' ? dividend / divisor : dividend % divisor;
    }
    case '==':
      return valuesEqual(left, right);
    case '!=':
      return !valuesEqual(left, right);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compareOrdered(operator, left, right);
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
  }
}

function compareOrdered(operator: '<' | '<=' | '>' | '>=', left: ExpressionValue, right: ExpressionValue): boolean {
  let sign: number;
  if (typeof left === 'number' && typeof right === 'number') {
    sign = left < right ? -1 : left > right ? 1 : 0;
  } else if (typeof left === 'string' && typeof right === 'string') {
    sign = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw operandError(operator, left, right);
  }
  switch (operator) {
    case '<':
      return sign < 0;
    case '<=':
      return sign <= 0;
    case '>':
      return sign > 0;
    case '>=':
      return sign >= 0;
  }
}

function contains(container: ExpressionValue, needle: ExpressionValue): boolean {
  if (Array.isArray(container)) {
    return container.some((entry) => valuesEqual(entry, needle));
  }
  if (typeof container === 'string' && typeof needle === 'string') {
    return container.includes(needle);
  }
  throw operandError('in', needle, container);
}

function valuesEqual(left: ExpressionValue, right: ExpressionValue): boolean {
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((entry, index) => valuesEqual(entry, right[index]));
  }
  return left === right;
}

function requireNumber(value: ExpressionValue, operator: string): number {
  if (typeof value !== 'number') {
    throw new WorkflowConfigurationError(
      `Operator '${operator}' expects numbers, got ${describe(value)}`
    );
  }
  return value;
}

function operandError(operator: string, left: ExpressionValue, right: ExpressionValue): WorkflowConfigurationError {
  return new WorkflowConfigurationError(
    `Unsupported operand types for '${operator}': ${describe(left)} and ${describe(right)}`
  );
}

function describe(value: ExpressionValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

function enter(ctx: ParseContext): void {
  ctx.depth++;
  if (ctx.depth > MAX_EXPRESSION_DEPTH) {
    throw new WorkflowConfigurationError(`Expression nesting exceeds ${MAX_EXPRESSION_DEPTH} levels`, undefined, {
      expression: ctx.source
    });
  }
}

function leave(ctx: ParseContext): void {
  ctx.depth--;
}

function parseOr(ctx: ParseContext): ExpressionNode {
  enter(ctx);
  let left = parseAnd(ctx);
  while (matchKeyword(ctx, 'or')) {
    left = { type: 'binary', operator: 'or', left, right: parseAnd(ctx) };
  }
  leave(ctx);
  return left;
}

function parseAnd(ctx: ParseContext): ExpressionNode {
  let left = parseNot(ctx);
  while (matchKeyword(ctx, 'and')) {
    left = { type: 'binary', operator: 'and', left, right: parseNot(ctx) };
  }
  return left;
}

function parseNot(ctx: ParseContext): ExpressionNode {
  const token = peek(ctx);
  if (token.kind === 'keyword' && token.value === 'not' && !isNotIn(ctx)) {
    ctx.index++;
    enter(ctx);
    const operand = parseNot(ctx);
    leave(ctx);
    return { type: 'unary', operator: 'not', operand };
  }
  return parseComparison(ctx);
}

function parseComparison(ctx: ParseContext): ExpressionNode {
  const left = parseAdditive(ctx);
  const operator = matchComparison(ctx);
  if (!operator) {
    return left;
  }
  const right = parseAdditive(ctx);
  if (matchComparison(ctx)) {
    throw new WorkflowConfigurationError('Chained comparisons are not supported; combine them with and', undefined, {
      expression: ctx.source
    });
  }
  return { type: 'binary', operator, left, right };
}

function matchComparison(ctx: ParseContext): BinaryOperator | null {
  const token = peek(ctx);
  if (token.kind === 'operator' && COMPARISON_OPERATORS.has(token.value)) {
    ctx.index++;
    return toComparison(token.value);
  }
  if (token.kind === 'keyword' && token.value === 'in') {
    ctx.index++;
    return 'in';
  }
  if (isNotIn(ctx)) {
    ctx.index += 2;
    return 'not in';
  }
  return null;
}

function toComparison(value: string): BinaryOperator {
  switch (value) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return value;
    default:
      throw new WorkflowConfigurationError(`Unknown comparison operator '${value}'`);
  }
}

function parseAdditive(ctx: ParseContext): ExpressionNode {
  let left = parseMultiplicative(ctx);
  for (;;) {
    const token = peek(ctx);
    const operator = token.kind === 'operator' ? token.value : '';
    if (operator !== '+' && operator !== '-') {
      return left;
    }
    ctx.index++;
    left = { type: 'binary', operator, left, right: parseMultiplicative(ctx) };
  }
}

function parseMultiplicative(ctx: ParseContext): ExpressionNode {
  let left = parseUnary(ctx);
  for (;;) {
    const token = peek(ctx);
    const operator = token.kind === 'operator' ? token.value : '';
    if (operator !== '*' && operator !== '/' && operator !== '%') {
      return left;
    }
    ctx.index++;
    left = { type: 'binary', operator, left, right: parseUnary(ctx) };
  }
}

function parseUnary(ctx: ParseContext): ExpressionNode {
  const token = peek(ctx);
  const operator = token.kind === 'operator' ? token.value : '';
  if (operator === '-' || operator === '+') {
    ctx.index++;
    enter(ctx);
    const operand = parseUnary(ctx);
    leave(ctx);
    return { type: 'unary', operator, operand };
  }
  const node = parsePrimary(ctx);
  rejectPostfix(ctx);
  return node;
}

function parsePrimary(ctx: ParseContext): ExpressionNode {
  const token = peek(ctx);
  ctx.index++;

  switch (token.kind) {
    case 'number':
      return { type: 'literal', value: Number(token.value) };
    case 'string':
      return { type: 'literal', value: token.value };
    case 'template':
      return { type: 'template', text: token.value };
    case 'variable':
      return { type: 'variable', reference: token.value };
    case 'keyword':
      if (token.value === 'true') return { type: 'literal', value: true };
      if (token.value === 'false') return { type: 'literal', value: false };
      if (token.value === 'null') return { type: 'literal', value: null };
      throw unexpected(ctx, token);
    case 'name':
      if (peek(ctx).value === '(') {
        throw new WorkflowConfigurationError(`Function calls are not allowed in expressions: '${token.value}(...)'`, undefined, {
          expression: ctx.source
        });
      }
      throw new WorkflowConfigurationError(
        `Unknown name '${token.value}' in expression; quote strings and use \${...} for variables`,
        undefined,
        { expression: ctx.source }
      );
    case 'punct':
      if (token.value === '(') {
        const inner = parseOr(ctx);
        expectPunct(ctx, ')');
        return inner;
      }
      if (token.value === '[') {
        return parseList(ctx);
      }
      throw unexpected(ctx, token);
    default:
      throw unexpected(ctx, token);
  }
}

function parseList(ctx: ParseContext): ExpressionNode {
  enter(ctx);
  const elements: ExpressionNode[] = [];
  while (peek(ctx).value !== ']' || peek(ctx).kind !== 'punct') {
    elements.push(parseOr(ctx));
    const separator = peek(ctx);
    if (separator.kind === 'punct' && separator.value === ',') {
      ctx.index++;
      continue;
    }
    break;
  }
  expectPunct(ctx, ']');
  leave(ctx);
  return { type: 'list', elements };
}

function rejectPostfix(ctx: ParseContext): void {
  const token = peek(ctx);
  if (token.kind !== 'punct') {
    return;
  }
  if (token.value === '.') {
    throw new WorkflowConfigurationError('Attribute access is not allowed in expressions', undefined, {
      expression: ctx.source
    });
  }
  if (token.value === '[') {
    throw new WorkflowConfigurationError('Subscripts are not allowed in expressions', undefined, {
      expression: ctx.source
    });
  }
  if (token.value === '(') {
    throw new WorkflowConfigurationError('Function calls are not allowed in expressions', undefined, {
      expression: ctx.source
    });
  }
}

function expectPunct(ctx: ParseContext, value: string): void {
  const token = peek(ctx);
  if (token.kind !== 'punct' || token.value !== value) {
    throw unexpected(ctx, token, `expected '${value}'`);
  }
  ctx.index++;
}

function matchKeyword(ctx: ParseContext, keyword: string): boolean {
  const token = peek(ctx);
  if (token.kind === 'keyword' && token.value === keyword) {
    ctx.index++;
    return true;
  }
  return false;
}

function isNotIn(ctx: ParseContext): boolean {
  const current = ctx.tokens[ctx.index];
  const next = ctx.tokens[ctx.index + 1];
  return current?.kind === 'keyword' && current.value === 'not' && next?.kind === 'keyword' && next.value === 'in';
}

function peek(ctx: ParseContext): Token {
  return ctx.tokens[Math.min(ctx.index, ctx.tokens.length - 1)];
}

function unexpected(ctx: ParseContext, token: Token, hint?: string): WorkflowConfigurationError {
  const found = token.kind === 'end' ? 'end of expression' : `'${token.value}'`;
  return new WorkflowConfigurationError(
    `Unexpected ${found} at position ${token.position}${hint ? `: ${hint}` : ''}`,
    undefined,
    { expression: ctx.source }
  );
}

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (/[0-9]/.test(char)) {
      const match = /^[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/.exec(source.slice(index));
      const text = match ? match[0] : char;
      tokens.push({ kind: 'number', value: text, position: index });
      index += text.length;
      continue;
    }

    if (char === '"' || char === "'") {
      const { value, end } = readString(source, index, char);
      tokens.push({ kind: value.includes('$') ? 'template' : 'string', value, position: index });
      index = end;
      continue;
    }

    if (char === '$' && source[index + 1] === '{' && source[index + 2] !== '{') {
      const close = source.indexOf('}', index + 2);
      if (close === -1) {
        throw new WorkflowConfigurationError(`Unterminated variable reference at position ${index}`, undefined, {
          expression: source
        });
      }
      tokens.push({ kind: 'variable', value: source.slice(index + 2, close).trim(), position: index });
      index = close + 1;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(index));
      const word = match ? match[0] : char;
      tokens.push({ kind: KEYWORDS.has(word) ? 'keyword' : 'name', value: word, position: index });
      index += word.length;
      continue;
    }

    const pair = source.slice(index, index + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({ kind: 'operator', value: pair, position: index });
      index += 2;
      continue;
    }

    if (ONE_CHAR_OPERATORS.has(char)) {
      tokens.push({ kind: 'operator', value: char, position: index });
      index++;
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ kind: 'punct', value: char, position: index });
      index++;
      continue;
    }

    throw new WorkflowConfigurationError(`Unexpected character '${char}' at position ${index}`, undefined, {
      expression: source
    });
  }

  tokens.push({ kind: 'end', value: '', position: source.length });
  return tokens;
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '\\': '\\', "'": "'", '"': '"' };

function readString(source: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let index = start + 1;
  while (index < source.length) {
    const char = source[index];
    if (char === quote) {
      return { value, end: index + 1 };
    }
    if (char === '\\' && index + 1 < source.length) {
      const escaped = source[index + 1];
      value += ESCAPES[escaped] ?? escaped;
      index += 2;
      continue;
    }
    value += char;
    index++;
  }
  throw new WorkflowConfigurationError(`Unterminated string literal at position ${start}`, undefined, {
    expression: source
  });
}
