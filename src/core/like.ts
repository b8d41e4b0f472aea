import type { LikeNode } from '@/lib/selector/ast';

const REGEXP_SYNTAX = /[\\^$.*+?()[\]{}|/]/g;

// Compiled patterns, keyed by the AST node that owns them. `null` marks a
// malformed pattern.
const compiled = new WeakMap<LikeNode, RegExp | null>();

/**
 * Translates a LIKE pattern into an anchored regular expression: `%` is any
 * run of characters, `_` exactly one, and the escape character makes the
 * character after it literal. Returns `null` when the pattern ends in a lone
 * escape character.
 */
export function compileLikePattern(pattern: string, escape: string | null): RegExp | null {
  const chars = Array.from(pattern);
  let source = '';

  for (let index = 0; index < chars.length; index += 1) {
    const char = chars[index];

    if (escape !== null && char === escape) {
      index += 1;
      if (index >= chars.length) {
        return null;
      }

      source += chars[index].replace(REGEXP_SYNTAX, '\\$&');
      continue;
    }

    if (char === '%') {
      source += '[\\s\\S]*';
    } else if (char === '_') {
      source += '[\\s\\S]';
    } else {
      source += char.replace(REGEXP_SYNTAX, '\\$&');
    }
  }

  return new RegExp(`^${source}$`, 'u');
}

export function matchLike(node: LikeNode, text: string): boolean | null {
  let pattern = compiled.get(node);

  if (pattern === undefined) {
    pattern = compileLikePattern(node.pattern, node.escape);
    compiled.set(node, pattern);
  }

  return pattern === null ? null : pattern.test(text);
}
