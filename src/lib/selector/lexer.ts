import { LexError } from '@/lib/errors';

export type Keyword = 'AND' | 'OR' | 'NOT' | 'BETWEEN' | 'LIKE' | 'IN' | 'IS' | 'NULL' | 'ESCAPE' | 'TRUE' | 'FALSE';

export type Operator = '=' | '<>' | '>' | '<' | '>=' | '<=' | '+' | '-' | '*' | '/';

export type Punctuation = '(' | ')' | ',' | '.';

export type Token =
  | { kind: 'identifier'; text: string; position: number; name: string }
  | { kind: 'keyword'; text: string; position: number; keyword: Keyword }
  | { kind: 'number'; text: string; position: number; exact: boolean }
  | { kind: 'string'; text: string; position: number; value: string }
  | { kind: 'operator'; text: Operator; position: number }
  | { kind: 'punctuation'; text: Punctuation; position: number }
  | { kind: 'eof'; text: ''; position: number };

const KEYWORDS: ReadonlySet<string> = new Set<Keyword>([
  'AND',
  'OR',
  'NOT',
  'BETWEEN',
  'LIKE',
  'IN',
  'IS',
  'NULL',
  'ESCAPE',
  'TRUE',
  'FALSE',
]);

const OPERATORS: ReadonlySet<string> = new Set<Operator>(['=', '<>', '>', '<', '>=', '<=', '+', '-', '*', '/']);
const PUNCTUATION: ReadonlySet<string> = new Set<Punctuation>(['(', ')', ',', '.']);

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const WHITESPACE = /[ \t\n\r]/;

/**
 * Lazy token sequence over selector text. Every iteration starts again from
 * the beginning and finishes with a single `eof` token.
 */
export class Lexer implements Iterable<Token> {
  readonly input: string;

  constructor(input: string) {
    this.input = input;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let index = 0;

    while (true) {
      while (index < this.input.length && WHITESPACE.test(this.input[index])) {
        index += 1;
      }

      if (index >= this.input.length) {
        yield { kind: 'eof', text: '', position: index };
        return;
      }

      const token = this.readToken(index);
      index += token.length;
      yield token.token;
    }
  }

  private readToken(start: number): { token: Token; length: number } {
    const char = this.input[start];
    const next = this.input[start + 1] ?? '';

    if (IDENT_START.test(char)) {
      return this.readWord(start);
    }

    if (DIGIT.test(char) || (char === '.' && DIGIT.test(next))) {
      return this.readNumber(start);
    }

    if (char === "'") {
      const { value, end } = this.readQuoted(start, "'", 'string literal');
      return {
        token: { kind: 'string', text: this.input.slice(start, end), position: start, value },
        length: end - start,
      };
    }

    if (char === '"') {
      const { value, end } = this.readQuoted(start, '"', 'quoted identifier');
      if (value.length === 0) {
        throw new LexError(`Empty quoted identifier at position ${start}.`, char, start);
      }

      return {
        token: { kind: 'identifier', text: this.input.slice(start, end), position: start, name: value },
        length: end - start,
      };
    }

    const pair = char + next;
    if (pair.length === 2 && isOperator(pair)) {
      return { token: { kind: 'operator', text: pair, position: start }, length: 2 };
    }

    if (isOperator(char)) {
      return { token: { kind: 'operator', text: char, position: start }, length: 1 };
    }

    if (isPunctuation(char)) {
      return { token: { kind: 'punctuation', text: char, position: start }, length: 1 };
    }

    throw new LexError(`Unexpected character "${char}" at position ${start}.`, char, start);
  }

  private readWord(start: number): { token: Token; length: number } {
    let end = start + 1;
    while (end < this.input.length && IDENT_PART.test(this.input[end])) {
      end += 1;
    }

    const text = this.input.slice(start, end);
    const upper = text.toUpperCase();

    if (isKeyword(upper)) {
      return { token: { kind: 'keyword', text, position: start, keyword: upper }, length: end - start };
    }

    return { token: { kind: 'identifier', text, position: start, name: text }, length: end - start };
  }

  private readNumber(start: number): { token: Token; length: number } {
    let end = start;
    let exact = true;

    while (end < this.input.length && DIGIT.test(this.input[end])) {
      end += 1;
    }

    if (this.input[end] === '.') {
      exact = false;
      end += 1;
      while (end < this.input.length && DIGIT.test(this.input[end])) {
        end += 1;
      }
    }

    if (this.input[end] === 'e' || this.input[end] === 'E') {
      let cursor = end + 1;
      if (this.input[cursor] === '+' || this.input[cursor] === '-') {
        cursor += 1;
      }

      if (!DIGIT.test(this.input[cursor] ?? '')) {
        throw new LexError(
          `Malformed exponent in numeric literal at position ${start}.`,
          this.input[cursor] ?? '',
          cursor,
        );
      }

      while (cursor < this.input.length && DIGIT.test(this.input[cursor])) {
        cursor += 1;
      }

      exact = false;
      end = cursor;
    }

    if (end < this.input.length && IDENT_START.test(this.input[end])) {
      throw new LexError(`Unexpected character "${this.input[end]}" in numeric literal.`, this.input[end], end);
    }

    return {
      token: { kind: 'number', text: this.input.slice(start, end), position: start, exact },
      length: end - start,
    };
  }

  // A doubled quote inside the literal stands for one quote character.
  private readQuoted(start: number, quote: string, what: string): { value: string; end: number } {
    let value = '';
    let index = start + 1;

    while (index < this.input.length) {
      const char = this.input[index];

      if (char === quote) {
        if (this.input[index + 1] === quote) {
          value += quote;
          index += 2;
          continue;
        }

        return { value, end: index + 1 };
      }

      value += char;
      index += 1;
    }

    throw new LexError(`Unterminated ${what} starting at position ${start}.`, quote, start);
  }
}

function isKeyword(value: string): value is Keyword {
  return KEYWORDS.has(value);
}

function isOperator(value: string): value is Operator {
  return OPERATORS.has(value);
}

function isPunctuation(value: string): value is Punctuation {
  return PUNCTUATION.has(value);
}

export function tokenize(input: string): Token[] {
  return [...new Lexer(input)];
}

export function describeToken(token: Token): string {
  if (token.kind === 'eof') {
    return 'end of input';
  }

  return `${token.kind} "${token.text}"`;
}
