import type { ArithmeticOperator, ComparisonOperator, LiteralValue } from '@/lib/selector/ast';

export type TriState = 'true' | 'false' | 'unknown';

export type NumericValue = { type: 'exact'; value: bigint } | { type: 'approx'; value: number };

/**
 * A runtime operand. `text` is a property value read from the environment;
 * it has no type of its own until an operator asks for one.
 */
export type Value = LiteralValue | { type: 'text'; value: string };

const EXACT_TEXT = /^[+-]?\d+$/;
const APPROX_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function fromBoolean(value: boolean): TriState {
  return value ? 'true' : 'false';
}

export function not(value: TriState): TriState {
  if (value === 'unknown') {
    return value;
  }

  return value === 'true' ? 'false' : 'true';
}

export function and(left: TriState, right: TriState): TriState {
  if (left === 'false' || right === 'false') {
    return 'false';
  }

  if (left === 'unknown' || right === 'unknown') {
    return 'unknown';
  }

  return 'true';
}

export function or(left: TriState, right: TriState): TriState {
  if (left === 'true' || right === 'true') {
    return 'true';
  }

  if (left === 'unknown' || right === 'unknown') {
    return 'unknown';
  }

  return 'false';
}

export function parseNumeric(text: string): NumericValue | null {
  const trimmed = text.trim();

  if (EXACT_TEXT.test(trimmed)) {
    return { type: 'exact', value: BigInt(trimmed) };
  }

  if (APPROX_TEXT.test(trimmed)) {
    const value = Number(trimmed);
    return Number.isFinite(value) ? { type: 'approx', value } : null;
  }

  return null;
}

export function toNumeric(value: Value | null): NumericValue | null {
  if (value === null) {
    return null;
  }

  switch (value.type) {
    case 'exact':
    case 'approx':
      return value;
    case 'text':
      return parseNumeric(value.value);
    default:
      return null;
  }
}

export function toBoolean(value: Value | null): boolean | null {
  if (value === null) {
    return null;
  }

  if (value.type === 'boolean') {
    return value.value;
  }

  if (value.type === 'text') {
    const lowered = value.value.trim().toLowerCase();
    if (lowered === 'true') {
      return true;
    }

    if (lowered === 'false') {
      return false;
    }
  }

  return null;
}

export function toText(value: Value | null): string | null {
  if (value === null) {
    return null;
  }

  return value.type === 'string' || value.type === 'text' ? value.value : null;
}

export function negate(value: NumericValue): NumericValue {
  return value.type === 'exact' ? { type: 'exact', value: -value.value } : { type: 'approx', value: -value.value };
}

export function arithmetic(op: ArithmeticOperator, left: NumericValue, right: NumericValue): NumericValue | null {
  if (left.type === 'exact' && right.type === 'exact') {
    switch (op) {
      case '+':
        return { type: 'exact', value: left.value + right.value };
      case '-':
        return { type: 'exact', value: left.value - right.value };
      case '*':
        return { type: 'exact', value: left.value * right.value };
      case '/':
        return right.value === 0n ? null : { type: 'exact', value: left.value / right.value };
    }
  }

  const a = approximate(left);
  const b = approximate(right);

  if (op === '/' && b === 0) {
    return null;
  }

  const result = applyApproximate(op, a, b);
  return Number.isFinite(result) ? { type: 'approx', value: result } : null;
}

export function compareValues(op: ComparisonOperator, left: Value | null, right: Value | null): TriState {
  if (left === null || right === null) {
    return 'unknown';
  }

  if (isNumericType(left) || isNumericType(right)) {
    return compareNumeric(op, toNumeric(left), toNumeric(right));
  }

  if (left.type === 'boolean' || right.type === 'boolean') {
    return compareEquality(op, toBoolean(left), toBoolean(right));
  }

  if (left.type === 'text' && right.type === 'text') {
    const leftNumber = parseNumeric(left.value);
    const rightNumber = parseNumeric(right.value);

    if (leftNumber && rightNumber) {
      return compareNumeric(op, leftNumber, rightNumber);
    }
  }

  return compareEquality(op, toText(left), toText(right));
}

function applyApproximate(op: ArithmeticOperator, a: number, b: number): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      return a / b;
  }
}

function compareNumeric(op: ComparisonOperator, left: NumericValue | null, right: NumericValue | null): TriState {
  if (left === null || right === null) {
    return 'unknown';
  }

  const order = compareOrder(left, right);

  switch (op) {
    case '=':
      return fromBoolean(order === 0);
    case '<>':
      return fromBoolean(order !== 0);
    case '>':
      return fromBoolean(order > 0);
    case '<':
      return fromBoolean(order < 0);
    case '>=':
      return fromBoolean(order >= 0);
    case '<=':
      return fromBoolean(order <= 0);
  }
}

// Strings and booleans only support equality; ordering them is unknown.
function compareEquality<T extends string | boolean>(op: ComparisonOperator, left: T | null, right: T | null): TriState {
  if (left === null || right === null) {
    return 'unknown';
  }

  if (op === '=') {
    return fromBoolean(left === right);
  }

  if (op === '<>') {
    return fromBoolean(left !== right);
  }

  return 'unknown';
}

function compareOrder(left: NumericValue, right: NumericValue): number {
  if (left.type === 'exact' && right.type === 'exact') {
    return left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
  }

  const a = approximate(left);
  const b = approximate(right);

  return a === b ? 0 : a < b ? -1 : 1;
}

function approximate(value: NumericValue): number {
  return value.type === 'exact' ? Number(value.value) : value.value;
}

function isNumericType(value: Value): value is NumericValue {
  return value.type === 'exact' || value.type === 'approx';
}
