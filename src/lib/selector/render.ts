import type { LiteralValue, SelectorNode } from '@/lib/selector/ast';

const BARE_IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const RESERVED: ReadonlySet<string> = new Set([
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

/**
 * Prints an AST back as selector text. Every compound operand is wrapped in
 * parentheses, so the output parses back to an equal tree regardless of
 * precedence.
 */
export function renderSelector(ast: SelectorNode): string {
  switch (ast.kind) {
    case 'identifier':
      return renderIdentifier(ast.name);

    case 'literal':
      return renderLiteral(ast.value);

    case 'unary':
      return ast.op === 'not' ? `NOT ${renderOperand(ast.operand)}` : `-${renderOperand(ast.operand)}`;

    case 'binary': {
      const op = ast.op === 'and' || ast.op === 'or' ? ast.op.toUpperCase() : ast.op;
      return `${renderOperand(ast.left)} ${op} ${renderOperand(ast.right)}`;
    }

    case 'between':
      return `${renderOperand(ast.value)} ${ast.negated ? 'NOT ' : ''}BETWEEN ${renderOperand(ast.low)} AND ${renderOperand(ast.high)}`;

    case 'in': {
      const items = ast.list.map((item) => renderLiteral(item.value)).join(', ');
      return `${renderOperand(ast.value)} ${ast.negated ? 'NOT ' : ''}IN (${items})`;
    }

    case 'like': {
      const escape = ast.escape === null ? '' : ` ESCAPE ${quoteString(ast.escape)}`;
      return `${renderOperand(ast.value)} ${ast.negated ? 'NOT ' : ''}LIKE ${quoteString(ast.pattern)}${escape}`;
    }

    case 'isNull':
      return `${renderOperand(ast.value)} IS ${ast.negated ? 'NOT ' : ''}NULL`;

    default: {
      const impossible: never = ast;
      throw new Error(`Unsupported selector node: ${(impossible as { kind: string }).kind}`);
    }
  }
}

function renderOperand(ast: SelectorNode): string {
  if (ast.kind === 'identifier' || ast.kind === 'literal') {
    return renderSelector(ast);
  }

  return `(${renderSelector(ast)})`;
}

function renderIdentifier(name: string): string {
  const segments = name.split('.');
  const bare = segments.every((segment) => BARE_IDENTIFIER.test(segment) && !RESERVED.has(segment.toUpperCase()));

  if (bare) {
    return name;
  }

  return `"${name.replace(/"/g, '""')}"`;
}

function renderLiteral(value: LiteralValue): string {
  switch (value.type) {
    case 'string':
      return quoteString(value.value);

    case 'exact':
      return value.value.toString();

    case 'approx':
      // Keep a decimal point so the literal reads back as approximate.
      if (Object.is(value.value, -0)) {
        return '-0.0';
      }

      return Number.isInteger(value.value) && Math.abs(value.value) < 1e21
        ? value.value.toFixed(1)
        : String(value.value);

    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';

    default: {
      const impossible: never = value;
      throw new Error(`Unsupported literal: ${(impossible as { type: string }).type}`);
    }
  }
}

function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
