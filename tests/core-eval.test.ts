import { describe, expect, it, vi } from 'vitest';

import { RecordSelectorEnv, type SelectorEnv } from '@/core/env';
import { evaluateSelectorAst } from '@/core/eval';
import type { TriState } from '@/core/values';
import { parseSelector } from '@/lib/selector/parser';
import type { MessageProperties } from '@/lib/types';

function evaluate(selector: string, properties: MessageProperties = {}): TriState {
  return evaluateSelectorAst(parseSelector(selector), new RecordSelectorEnv(properties));
}

describe('core evaluator', () => {
  describe('identifier resolution', () => {
    it('coerces property text for numeric comparisons', () => {
      expect(evaluate('weight > 10', { weight: '15' })).toBe('true');
      expect(evaluate('weight > 10', { weight: 15 })).toBe('true');
      expect(evaluate('weight > 10', { weight: 'heavy' })).toBe('unknown');
      expect(evaluate('weight > 10')).toBe('unknown');
    });

    it('compares text with string literals as text', () => {
      expect(evaluate("code = '10'", { code: 10 })).toBe('true');
      expect(evaluate("color = 'red'", { color: 'Red' })).toBe('false');
    });

    it('treats comparisons across types as unknown', () => {
      expect(evaluate('color = 5', { color: 'red' })).toBe('unknown');
      expect(evaluate("name > 'a'", { name: 'b' })).toBe('unknown');
    });

    it('compares two properties numerically when both are numbers', () => {
      expect(evaluate('a = b', { a: '10', b: '10.0' })).toBe('true');
      expect(evaluate('a = b', { a: 'x', b: 'x' })).toBe('true');
      expect(evaluate('a < b', { a: 'x', b: 'y' })).toBe('unknown');
    });

    it('reads booleans case-insensitively', () => {
      expect(evaluate('active = TRUE', { active: true })).toBe('true');
      expect(evaluate('active', { active: 'TRUE' })).toBe('true');
      expect(evaluate('active', { active: 'yes' })).toBe('unknown');
    });
  });

  describe('three-valued logic', () => {
    it('lets false dominate AND', () => {
      expect(evaluate('missing = 1 AND flag = 1', { flag: 2 })).toBe('false');
      expect(evaluate('missing = 1 AND flag = 1', { flag: 1 })).toBe('unknown');
      expect(evaluate('flag = 1 AND flag = 1', { flag: 1 })).toBe('true');
    });

    it('lets true dominate OR', () => {
      expect(evaluate('missing = 1 OR flag = 1', { flag: 1 })).toBe('true');
      expect(evaluate('missing = 1 OR flag = 1', { flag: 2 })).toBe('unknown');
      expect(evaluate('flag = 1 OR flag = 3', { flag: 2 })).toBe('false');
    });

    it('keeps NOT unknown unknown', () => {
      expect(evaluate('NOT missing = 1')).toBe('unknown');
      expect(evaluate('NOT flag = 1', { flag: 1 })).toBe('false');
    });

    it('skips the right operand once the result is decided', () => {
      const present = vi.fn((name: string) => name === 'a');
      const env: SelectorEnv = { present, value: () => '2' };

      expect(evaluateSelectorAst(parseSelector('a = 1 AND b = 2'), env)).toBe('false');
      expect(present.mock.calls).toEqual([['a']]);
    });

    it('evaluates bare literals by their truth', () => {
      expect(evaluate('TRUE')).toBe('true');
      expect(evaluate('FALSE OR TRUE')).toBe('true');
      expect(evaluate('1')).toBe('unknown');
    });
  });

  describe('IS NULL', () => {
    it('turns absence into a definite answer', () => {
      expect(evaluate('p IS NULL')).toBe('true');
      expect(evaluate('p IS NOT NULL')).toBe('false');
      expect(evaluate('p = 5')).toBe('unknown');
      expect(evaluate('p IS NULL', { p: 'x' })).toBe('false');
      expect(evaluate('p IS NULL', { p: null })).toBe('true');
    });

    it('keeps arithmetic on missing values unknown', () => {
      expect(evaluate('missing + 1 = 2')).toBe('unknown');
      expect(evaluate('missing + 1 <> 2')).toBe('unknown');
    });

    it('answers from presence alone', () => {
      const env: SelectorEnv = { present: () => true, value: () => undefined };

      expect(evaluateSelectorAst(parseSelector('w IS NULL'), env)).toBe('false');
      expect(evaluate('w IS NOT NULL', { w: 'heavy' })).toBe('true');
    });
  });

  describe('numeric semantics', () => {
    it('keeps exact division exact', () => {
      expect(evaluate('7 / 2 = 3')).toBe('true');
      expect(evaluate('-7 / 2 = -3')).toBe('true');
      expect(evaluate('7 / 2.0 = 3.5')).toBe('true');
    });

    it('promotes mixed arithmetic to approximate', () => {
      expect(evaluate('x * 1.5 = 3', { x: 2 })).toBe('true');
      expect(evaluate('x + 0.25 > 2', { x: '1.8' })).toBe('true');
    });

    it('turns division by zero into unknown', () => {
      expect(evaluate('x / 0 > 1', { x: 5 })).toBe('unknown');
      expect(evaluate('1.5 / 0 = 1')).toBe('unknown');
      expect(evaluate('x / 0 > 1 OR TRUE', { x: 5 })).toBe('true');
    });

    it('negates operands', () => {
      expect(evaluate('-x = -5', { x: 5 })).toBe('true');
    });

    it('compares integers beyond double precision exactly', () => {
      expect(evaluate('id = 9007199254740993', { id: '9007199254740993' })).toBe('true');
      expect(evaluate('id = 9007199254740993', { id: '9007199254740992' })).toBe('false');
    });
  });

  describe('BETWEEN', () => {
    it('includes both bounds', () => {
      expect(evaluate('x BETWEEN 1 AND 5', { x: 1 })).toBe('true');
      expect(evaluate('x BETWEEN 1 AND 5', { x: 5 })).toBe('true');
      expect(evaluate('x BETWEEN 1 AND 5', { x: 6 })).toBe('false');
      expect(evaluate('x NOT BETWEEN 1 AND 5', { x: 6 })).toBe('true');
    });

    it('follows AND rules when a bound is unknown', () => {
      expect(evaluate('x BETWEEN y AND 10', { x: 20 })).toBe('false');
      expect(evaluate('x BETWEEN y AND 10', { x: 5 })).toBe('unknown');
      expect(evaluate('x NOT BETWEEN 1 AND 5')).toBe('unknown');
    });
  });

  describe('IN', () => {
    it('matches any list entry', () => {
      expect(evaluate("grade IN ('A', 'B')", { grade: 'B' })).toBe('true');
      expect(evaluate("grade IN ('A', 'B')", { grade: 'D' })).toBe('false');
      expect(evaluate("grade NOT IN ('A', 'B')", { grade: 'D' })).toBe('true');
    });

    it('is unknown for a missing value, negated or not', () => {
      expect(evaluate("grade IN ('A', 'B')")).toBe('unknown');
      expect(evaluate("grade NOT IN ('A', 'B')")).toBe('unknown');
    });

    it('compares numeric entries numerically', () => {
      expect(evaluate('n IN (1, 2.5)', { n: '2.50' })).toBe('true');
    });

    it('is unknown when no entry matches and one comparison was unknown', () => {
      expect(evaluate('n IN (1)', { n: 'abc' })).toBe('unknown');
      expect(evaluate('n NOT IN (1)', { n: 'abc' })).toBe('unknown');
      expect(evaluate('n <> 1', { n: 'abc' })).toBe('unknown');
    });

    it('lets a matching entry decide over unknown ones', () => {
      expect(evaluate("n IN (1, 'abc')", { n: 'abc' })).toBe('true');
      expect(evaluate("n NOT IN (1, 'abc')", { n: 'abc' })).toBe('false');
      expect(evaluate('n NOT IN (1, 2)', { n: '3' })).toBe('true');
    });
  });

  describe('LIKE', () => {
    it('matches single and multi character wildcards', () => {
      expect(evaluate("name LIKE 'J_n%'", { name: 'Jane' })).toBe('true');
      expect(evaluate("name LIKE 'J_n%'", { name: 'Joan' })).toBe('false');
      expect(evaluate("name NOT LIKE 'J_n%'", { name: 'Joan' })).toBe('true');
      expect(evaluate("name LIKE 'J_n%'")).toBe('unknown');
    });

    it('honours the escape character', () => {
      expect(evaluate("code LIKE '10!%' ESCAPE '!'", { code: '10%' })).toBe('true');
      expect(evaluate("code LIKE '10!%' ESCAPE '!'", { code: '100' })).toBe('false');
    });

    it('treats a pattern ending in the escape character as unknown', () => {
      expect(evaluate("code LIKE 'abc!' ESCAPE '!'", { code: 'abc' })).toBe('unknown');
    });

    it('does not match numbers', () => {
      expect(evaluate("5 LIKE '5'")).toBe('unknown');
    });
  });
});
