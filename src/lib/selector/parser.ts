import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_LENGTH } from '@/lib/config';
import { ParseError } from '@/lib/errors';
import type { ComparisonOperator, LiteralNode, SelectorNode } from '@/lib/selector/ast';
import { describeToken, Lexer, type Keyword, type Token } from '@/lib/selector/lexer';

export type ParseOptions = {
  maxDepth?: number;
  maxLength?: number;
};

type NumberToken = Extract<Token, { kind: 'number' }>;

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>(['=', '<>', '>', '<', '>=', '<=']);

/**
 * Recursive descent over the lexer's token stream, one token of lookahead.
 *
 * Grammar, lowest binding first:
 * ```
 * or         := and ('OR' and)*
 * and        := not ('AND' not)*
 * not        := 'NOT' not | comparison
 * comparison := identifier 'IS' ['NOT'] 'NULL'
 *             | additive ( cmpOp additive
 *                        | ['NOT'] 'BETWEEN' additive 'AND' additive
 *                        | ['NOT'] 'IN' '(' literal (',' literal)* ')'
 *                        | ['NOT'] 'LIKE' string ['ESCAPE' string] )*
 * additive   := multiplicative (('+' | '-') multiplicative)*
 * multiplicative := unary (('*' | '/') unary)*
 * unary      := ('-' | '+') unary | primary
 * primary    := identifier ('.' identifier)* | literal | '(' or ')'
 * ```
 */
class Parser {
  private readonly tokens: Iterator<Token>;
  private readonly maxDepth: number;
  private current: Token;
  private depth = 0;

  constructor(input: string, options: ParseOptions) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.tokens = new Lexer(input)[Symbol.iterator]();
    this.current = this.pull(input.length);
  }

  parse(): SelectorNode {
    if (this.peek().kind === 'eof') {
      throw this.error('expression');
    }

    const node = this.parseOr();

    if (this.peek().kind !== 'eof') {
      throw this.error('end of input');
    }

    return node;
  }

  private parseOr(): SelectorNode {
    let left = this.parseAnd();

    while (this.atKeyword('OR')) {
      this.advance();
      const right = this.parseAnd();
      left = { kind: 'binary', op: 'or', left, right };
    }

    return left;
  }

  private parseAnd(): SelectorNode {
    let left = this.parseNot();

    while (this.atKeyword('AND')) {
      this.advance();
      const right = this.parseNot();
      left = { kind: 'binary', op: 'and', left, right };
    }

    return left;
  }

  private parseNot(): SelectorNode {
    if (!this.atKeyword('NOT')) {
      return this.parseComparison();
    }

    this.advance();
    this.enter();
    const operand = this.parseNot();
    this.leave();

    return { kind: 'unary', op: 'not', operand };
  }

  private parseComparison(): SelectorNode {
    let left = this.parseAdditive();

    while (true) {
      const token = this.current;

      if (token.kind === 'operator' && isComparisonOperator(token.text)) {
        this.advance();
        const right = this.parseAdditive();
        left = { kind: 'binary', op: token.text, left, right };
        continue;
      }

      if (token.kind !== 'keyword') {
        return left;
      }

      if (token.keyword === 'IS') {
        if (left.kind !== 'identifier') {
          throw new ParseError(
            'identifier before IS',
            describeToken(token),
            token.position,
            `IS NULL applies only to an identifier at position ${token.position}.`,
          );
        }

        this.advance();
        const negated = this.acceptKeyword('NOT');
        this.expectKeyword('NULL');
        left = { kind: 'isNull', value: left, negated };
        continue;
      }

      let negated = false;
      if (token.keyword === 'NOT') {
        this.advance();
        negated = true;

        if (!this.atKeyword('BETWEEN') && !this.atKeyword('IN') && !this.atKeyword('LIKE')) {
          throw this.error('BETWEEN, IN or LIKE after NOT');
        }
      }

      if (this.atKeyword('BETWEEN')) {
        left = this.parseBetween(left, negated);
      } else if (this.atKeyword('IN')) {
        left = this.parseIn(left, negated);
      } else if (this.atKeyword('LIKE')) {
        left = this.parseLike(left, negated);
      } else {
        return left;
      }
    }
  }

  private parseBetween(value: SelectorNode, negated: boolean): SelectorNode {
    this.expectKeyword('BETWEEN');
    const low = this.parseAdditive();
    this.expectKeyword('AND');
    const high = this.parseAdditive();

    return { kind: 'between', value, low, high, negated };
  }

  private parseIn(value: SelectorNode, negated: boolean): SelectorNode {
    this.expectKeyword('IN');
    this.expectPunctuation('(');

    const list: LiteralNode[] = [this.parseInLiteral()];
    while (this.atPunctuation(',')) {
      this.advance();
      list.push(this.parseInLiteral());
    }

    this.expectPunctuation(')');

    return { kind: 'in', value, list, negated };
  }

  private parseInLiteral(): LiteralNode {
    const first = this.current;
    const signed = first.kind === 'operator' && (first.text === '-' || first.text === '+');
    const sign = first.kind === 'operator' && first.text === '-' ? '-' : '';

    if (signed) {
      this.advance();
      if (this.peek().kind !== 'number') {
        throw this.error('numeric literal after sign');
      }
    }

    const token = this.peek();

    if (token.kind === 'number') {
      this.advance();
      return this.numberLiteral(token, sign);
    }

    if (token.kind === 'string') {
      this.advance();
      return { kind: 'literal', value: { type: 'string', value: token.value } };
    }

    if (token.kind === 'keyword' && (token.keyword === 'TRUE' || token.keyword === 'FALSE')) {
      this.advance();
      return { kind: 'literal', value: { type: 'boolean', value: token.keyword === 'TRUE' } };
    }

    throw this.error('literal');
  }

  private parseLike(value: SelectorNode, negated: boolean): SelectorNode {
    this.expectKeyword('LIKE');
    const pattern = this.expectString('pattern string');

    let escape: string | null = null;
    if (this.atKeyword('ESCAPE')) {
      this.advance();
      const escapeToken = this.current;
      escape = this.expectString('escape string');

      if (escape.length !== 1) {
        throw new ParseError(
          'single-character escape string',
          describeToken(escapeToken),
          escapeToken.position,
          `ESCAPE must be exactly one character at position ${escapeToken.position}.`,
        );
      }
    }

    return { kind: 'like', value, pattern, escape, negated };
  }

  private parseAdditive(): SelectorNode {
    let left = this.parseMultiplicative();

    while (true) {
      const token = this.current;
      if (token.kind !== 'operator' || !isAdditiveOperator(token.text)) {
        return left;
      }

      this.advance();
      const right = this.parseMultiplicative();
      left = { kind: 'binary', op: token.text, left, right };
    }
  }

  private parseMultiplicative(): SelectorNode {
    let left = this.parseUnary();

    while (true) {
      const token = this.current;
      if (token.kind !== 'operator' || isAdditiveOperator(token.text) || isComparisonOperator(token.text)) {
        return left;
      }

      this.advance();
      const right = this.parseUnary();
      left = { kind: 'binary', op: token.text, left, right };
    }
  }

  private parseUnary(): SelectorNode {
    const token = this.current;

    if (token.kind === 'operator' && (token.text === '-' || token.text === '+')) {
      this.advance();
      this.enter();
      const operand = this.parseUnary();
      this.leave();

      return token.text === '-' ? { kind: 'unary', op: 'neg', operand } : operand;
    }

    return this.parsePrimary();
  }

  private parsePrimary(): SelectorNode {
    const token = this.current;

    switch (token.kind) {
      case 'identifier': {
        this.advance();
        let name = token.name;

        while (this.atPunctuation('.')) {
          this.advance();
          const part = this.peek();
          if (part.kind !== 'identifier') {
            throw this.error('identifier after "."');
          }

          name += `.${part.name}`;
          this.advance();
        }

        return { kind: 'identifier', name };
      }

      case 'string': {
        this.advance();
        return { kind: 'literal', value: { type: 'string', value: token.value } };
      }

      case 'number': {
        this.advance();
        return this.numberLiteral(token, '');
      }

      case 'keyword': {
        if (token.keyword === 'TRUE' || token.keyword === 'FALSE') {
          this.advance();
          return { kind: 'literal', value: { type: 'boolean', value: token.keyword === 'TRUE' } };
        }

        throw this.error('expression');
      }

      case 'punctuation': {
        if (token.text !== '(') {
          throw this.error('expression');
        }

        this.advance();
        this.enter();
        const inner = this.parseOr();
        this.expectPunctuation(')');
        this.leave();

        return inner;
      }

      default:
        throw this.error('expression');
    }
  }

  private enter(): void {
    this.depth += 1;

    if (this.depth > this.maxDepth) {
      throw new ParseError(
        `expression nested at most ${this.maxDepth} levels deep`,
        describeToken(this.current),
        this.current.position,
        `Selector nesting exceeds ${this.maxDepth} levels at position ${this.current.position}.`,
      );
    }
  }

  private leave(): void {
    this.depth -= 1;
  }

  private peek(): Token {
    return this.current;
  }

  private atPunctuation(text: '(' | ')' | ',' | '.'): boolean {
    const token = this.current;
    return token.kind === 'punctuation' && token.text === text;
  }

  private atKeyword(keyword: Keyword): boolean {
    return this.current.kind === 'keyword' && this.current.keyword === keyword;
  }

  private acceptKeyword(keyword: Keyword): boolean {
    if (!this.atKeyword(keyword)) {
      return false;
    }

    this.advance();
    return true;
  }

  private expectKeyword(keyword: Keyword): void {
    if (!this.acceptKeyword(keyword)) {
      throw this.error(keyword);
    }
  }

  private expectPunctuation(text: '(' | ')'): void {
    if (!this.atPunctuation(text)) {
      throw this.error(`"${text}"`);
    }

    this.advance();
  }

  private expectString(expected: string): string {
    const token = this.current;
    if (token.kind !== 'string') {
      throw this.error(expected);
    }

    this.advance();
    return token.value;
  }

  private advance(): void {
    if (this.current.kind !== 'eof') {
      this.current = this.pull(this.current.position);
    }
  }

  private pull(fallbackPosition: number): Token {
    const next = this.tokens.next();
    if (next.done) {
      return { kind: 'eof', text: '', position: fallbackPosition };
    }

    return next.value;
  }

  private numberLiteral(token: NumberToken, sign: '-' | ''): LiteralNode {
    const text = sign + token.text;

    if (token.exact) {
      return { kind: 'literal', value: { type: 'exact', value: BigInt(text) } };
    }

    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw new ParseError(
        'finite numeric literal',
        describeToken(token),
        token.position,
        `Numeric literal ${token.text} is out of range at position ${token.position}.`,
      );
    }

    return { kind: 'literal', value: { type: 'approx', value } };
  }

  private error(expected: string): ParseError {
    return new ParseError(expected, describeToken(this.current), this.current.position);
  }
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value);
}

function isAdditiveOperator(value: string): value is '+' | '-' {
  return value === '+' || value === '-';
}

export function parseSelector(input: string, options: ParseOptions = {}): SelectorNode {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;

  if (input.length > maxLength) {
    throw new ParseError(
      `selector of at most ${maxLength} characters`,
      `${input.length} characters`,
      maxLength,
      `Selector is longer than ${maxLength} characters.`,
    );
  }

  const parser = new Parser(input, options);
  return parser.parse();
}
