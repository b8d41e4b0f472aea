import { MessageSelectorEnv, type SelectorEnv } from '@/core/env';
import { evaluateSelectorAst } from '@/core/eval';
import type { TriState } from '@/core/values';
import type { SelectorNode } from '@/lib/selector/ast';
import { parseSelector, type ParseOptions } from '@/lib/selector/parser';
import { renderSelector } from '@/lib/selector/render';
import type { Message } from '@/lib/types';

/**
 * A compiled selector. Holds no per-call state, so one instance can be shared
 * by every subscription that uses the same expression.
 */
export class Selector {
  readonly expression: string;
  readonly ast: SelectorNode;

  constructor(expression: string, ast: SelectorNode) {
    this.expression = expression;
    this.ast = ast;
  }

  evaluate(env: SelectorEnv): TriState {
    return evaluateSelectorAst(this.ast, env);
  }

  /**
   * Only a definite `true` selects; `unknown` is treated as `false`.
   */
  eval(env: SelectorEnv): boolean {
    return this.evaluate(env) === 'true';
  }

  filter(message: Message): boolean {
    return this.eval(new MessageSelectorEnv(message));
  }

  canonical(): string {
    return renderSelector(this.ast);
  }

  toString(): string {
    return this.expression;
  }
}

export function compileSelector(expression: string, options: ParseOptions = {}): Selector {
  return new Selector(expression, parseSelector(expression, options));
}
