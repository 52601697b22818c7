/**
 * Assignment Scanner
 *
 * Finds the lines of a region that (re)bind a variable: the line starts with
 * the identifier followed by a lone `=`. For each site it also records where
 * the assigned expression ends, which is where the new binding becomes live.
 */

import {
  isBlockCloser,
  isBlockOpener,
  nextSignificant,
  previousSignificant,
  tokenize,
  type Token,
} from './lexer.js';
import type { Region } from './region-locator.js';

export interface AssignmentSite {
  identifier: string;
  /** 0-based line within the region text. */
  line: number;
  /** Position among the assignments to this identifier, in textual order. */
  ordinal: number;
  /** Region-relative offset of the bound identifier token. */
  offset: number;
  /** Region-relative offset where the assigned expression ends. */
  valueEnd: number;
  /** Block depth below the function body; 0 means the body's top level. */
  depth: number;
}

// Operators that continue the previous line's expression when they lead a line.
const LEADING_CONTINUATIONS = new Set([
  '|>', '++', '--', '<>', '||', '&&', '|||', '&&&', '..', '|', '.', '==', '!=', '===', '!==',
  '=~', '<=', '>=', '<', '>', '*', '/', '=', '->', '<-', '\\\\', '::', '~>', '<~', '>>>', '<<<',
  '**', '//', '=>',
]);

const WORD_OPERATORS = new Set(['and', 'or', 'in', 'when', 'not']);

function isOpenBracket(token: Token): boolean {
  return token.kind === 'punct' && (token.text === '(' || token.text === '[' || token.text === '{');
}

function isCloseBracket(token: Token): boolean {
  return token.kind === 'punct' && (token.text === ')' || token.text === ']' || token.text === '}');
}

function isWordOperator(token: Token | undefined): boolean {
  return token !== undefined && token.kind === 'identifier' && WORD_OPERATORS.has(token.text);
}

/** Block depth of every token, counting the definition's own `do` as depth 1. */
export function blockDepths(tokens: readonly Token[]): number[] {
  const depths: number[] = [];
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    if (isBlockCloser(tokens, i)) {
      depth--;
    }
    depths.push(depth);
    if (isBlockOpener(tokens, i)) {
      depth++;
    }
  }
  return depths;
}

/**
 * Offset where the expression that starts after `tokens[equalsIndex]` ends:
 * the first newline outside brackets and blocks that neither follows a
 * trailing operator or comma nor precedes a leading operator, or the `end` / closing
 * bracket of an enclosing construct.
 */
export function expressionEnd(tokens: readonly Token[], equalsIndex: number, limit: number): number {
  let nesting = 0;

  for (let j = equalsIndex + 1; j < tokens.length; j++) {
    const token = tokens[j];
    if (!token) {
      break;
    }

    if (isOpenBracket(token) || isBlockOpener(tokens, j)) {
      nesting++;
      continue;
    }

    if (isCloseBracket(token) || isBlockCloser(tokens, j)) {
      nesting--;
      if (nesting < 0) {
        return token.start;
      }
      continue;
    }

    if (token.kind !== 'newline' || nesting > 0) {
      continue;
    }

    const beforeIndex = previousSignificant(tokens, j);
    if (beforeIndex <= equalsIndex) {
      continue;
    }
    const before = tokens[beforeIndex];
    if (before && (before.kind === 'operator' || isWordOperator(before))) {
      continue;
    }
    // `with` / `for` clauses and unparenthesized call arguments
    if (before && before.kind === 'punct' && before.text === ',') {
      continue;
    }

    const after = tokens[nextSignificant(tokens, j)];
    if (after && ((after.kind === 'operator' && LEADING_CONTINUATIONS.has(after.text)) || isWordOperator(after))) {
      continue;
    }

    return token.start;
  }

  return limit;
}

/** True when `tokens[index]` is the first token on its line. */
function startsLine(tokens: readonly Token[], index: number): boolean {
  if (index === 0) {
    return true;
  }
  return tokens[index - 1]?.kind === 'newline';
}

function isBindingAt(tokens: readonly Token[], index: number, identifier?: string): boolean {
  const token = tokens[index];
  const next = tokens[index + 1];
  return (
    token !== undefined &&
    token.kind === 'identifier' &&
    (identifier === undefined || token.text === identifier) &&
    startsLine(tokens, index) &&
    next !== undefined &&
    next.kind === 'operator' &&
    next.text === '='
  );
}

export function scanTokens(
  tokens: readonly Token[],
  identifier: string,
  textLength: number
): AssignmentSite[] {
  const depths = blockDepths(tokens);
  const sites: AssignmentSite[] = [];

  for (let i = 0; i < tokens.length; i++) {
    if (!isBindingAt(tokens, i, identifier)) {
      continue;
    }
    const token = tokens[i];
    if (!token) {
      continue;
    }
    sites.push({
      identifier,
      line: token.line,
      ordinal: sites.length,
      offset: token.start,
      valueEnd: expressionEnd(tokens, i + 1, textLength),
      depth: (depths[i] ?? 0) - 1,
    });
  }

  return sites;
}

export function scan(region: Region, identifier: string): AssignmentSite[] {
  return scanTokens(tokenize(region.text), identifier, region.text.length);
}

/**
 * Identifiers bound two or more times at the top level of the region body,
 * in order of their first binding. Underscored names are ignored.
 */
export function findRebound(region: Region): string[] {
  const tokens = tokenize(region.text);
  const depths = blockDepths(tokens);
  const counts = new Map<string, number>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token || token.text.startsWith('_') || depths[i] !== 1 || !isBindingAt(tokens, i)) {
      continue;
    }
    counts.set(token.text, (counts.get(token.text) ?? 0) + 1);
  }

  return [...counts.entries()].filter(([, count]) => count > 1).map(([name]) => name);
}
