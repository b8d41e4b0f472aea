import type { SelectorEnv } from '@/core/env';
import { matchLike } from '@/core/like';
import {
  and,
  arithmetic,
  compareValues,
  fromBoolean,
  negate,
  not,
  or,
  toBoolean,
  toNumeric,
  toText,
  type TriState,
  type Value,
} from '@/core/values';
import type { ArithmeticOperator, BinaryOperator, ComparisonOperator, SelectorNode } from '@/lib/selector/ast';

/**
 * Evaluates a selector AST against one environment using three-valued logic.
 * Missing properties, failed coercions and division by zero all surface as
 * `'unknown'`; nothing here throws for data-dependent reasons.
 */
export function evaluateSelectorAst(ast: SelectorNode, env: SelectorEnv): TriState {
  return evalCondition(ast, env);
}

function evalCondition(ast: SelectorNode, env: SelectorEnv): TriState {
  switch (ast.kind) {
    case 'binary': {
      if (ast.op === 'and') {
        const left = evalCondition(ast.left, env);
        if (left === 'false') {
          return left;
        }

        return and(left, evalCondition(ast.right, env));
      }

      if (ast.op === 'or') {
        const left = evalCondition(ast.left, env);
        if (left === 'true') {
          return left;
        }

        return or(left, evalCondition(ast.right, env));
      }

      if (isComparisonOperator(ast.op)) {
        return compareValues(ast.op, evalValue(ast.left, env), evalValue(ast.right, env));
      }

      return truthOf(evalValue(ast, env));
    }

    case 'unary': {
      if (ast.op === 'not') {
        return not(evalCondition(ast.operand, env));
      }

      return truthOf(evalValue(ast, env));
    }

    case 'between': {
      const value = evalValue(ast.value, env);
      const result = and(
        compareValues('>=', value, evalValue(ast.low, env)),
        compareValues('<=', value, evalValue(ast.high, env)),
      );

      return ast.negated ? not(result) : result;
    }

    case 'in': {
      const value = evalValue(ast.value, env);
      if (value === null) {
        return 'unknown';
      }

      let result: TriState = 'false';
      for (const item of ast.list) {
        result = or(result, compareValues('=', value, item.value));
        if (result === 'true') {
          break;
        }
      }

      return ast.negated ? not(result) : result;
    }

    case 'like': {
      const text = toText(evalValue(ast.value, env));
      if (text === null) {
        return 'unknown';
      }

      const matched = matchLike(ast, text);
      if (matched === null) {
        return 'unknown';
      }

      return fromBoolean(ast.negated ? !matched : matched);
    }

    case 'isNull': {
      const isNull = !env.present(ast.value.name);
      return fromBoolean(ast.negated ? !isNull : isNull);
    }

    case 'identifier':
    case 'literal':
      return truthOf(evalValue(ast, env));

    default: {
      const impossible: never = ast;
      throw new Error(`Unsupported selector node: ${(impossible as { kind: string }).kind}`);
    }
  }
}

function evalValue(ast: SelectorNode, env: SelectorEnv): Value | null {
  switch (ast.kind) {
    case 'identifier': {
      if (!env.present(ast.name)) {
        return null;
      }

      const text = env.value(ast.name);
      return text === undefined ? null : { type: 'text', value: text };
    }

    case 'literal':
      return ast.value;

    case 'unary': {
      if (ast.op === 'not') {
        return valueOf(evalCondition(ast, env));
      }

      const operand = toNumeric(evalValue(ast.operand, env));
      return operand === null ? null : negate(operand);
    }

    case 'binary': {
      if (!isArithmeticOperator(ast.op)) {
        return valueOf(evalCondition(ast, env));
      }

      const left = toNumeric(evalValue(ast.left, env));
      if (left === null) {
        return null;
      }

      const right = toNumeric(evalValue(ast.right, env));
      if (right === null) {
        return null;
      }

      return arithmetic(ast.op, left, right);
    }

    case 'between':
    case 'in':
    case 'like':
    case 'isNull':
      return valueOf(evalCondition(ast, env));

    default: {
      const impossible: never = ast;
      throw new Error(`Unsupported selector node: ${(impossible as { kind: string }).kind}`);
    }
  }
}

function truthOf(value: Value | null): TriState {
  const bool = toBoolean(value);
  return bool === null ? 'unknown' : fromBoolean(bool);
}

function valueOf(state: TriState): Value | null {
  return state === 'unknown' ? null : { type: 'boolean', value: state === 'true' };
}

function isComparisonOperator(op: BinaryOperator): op is ComparisonOperator {
  return op === '=' || op === '<>' || op === '>' || op === '<' || op === '>=' || op === '<=';
}

function isArithmeticOperator(op: BinaryOperator): op is ArithmeticOperator {
  return op === '+' || op === '-' || op === '*' || op === '/';
}
