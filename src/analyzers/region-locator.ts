/**
 * Region Locator
 *
 * Splits a source file into function-level regions: every outermost
 * `def`/`defp`/`defmacro`/`defmacrop` that opens a `do ... end` block.
 */

import { StructuralMismatchError } from '../utils/errors.js';
import {
  isBlockCloser,
  isBlockOpener,
  isWord,
  nextSignificant,
  previousSignificant,
  tokenize,
  type Token,
} from './lexer.js';

export type DefinitionKeyword = 'def' | 'defp' | 'defmacro' | 'defmacrop';
export type BindingKind = 'public' | 'private';

export interface Region {
  name: string;
  keyword: DefinitionKeyword;
  kind: BindingKind;
  /** Offset of the definition keyword. */
  start: number;
  /** Offset just past the matching `end`, or the file length when unterminated. */
  end: number;
  /** 0-based file line of the definition keyword. */
  startLine: number;
  text: string;
  terminated: boolean;
}

export type UnterminatedPolicy = 'extend' | 'error';

export interface LocateOptions {
  onUnterminated?: UnterminatedPolicy;
}

const DEFINITION_KINDS: Record<DefinitionKeyword, BindingKind> = {
  def: 'public',
  defp: 'private',
  defmacro: 'public',
  defmacrop: 'private',
};

function isDefinitionKeyword(text: string): text is DefinitionKeyword {
  return Object.prototype.hasOwnProperty.call(DEFINITION_KINDS, text);
}

type HeadScan =
  | { type: 'block'; doIndex: number }
  | { type: 'skip'; resumeAt: number };

/**
 * Walks a definition head from the keyword at `defIndex` to its block `do`.
 * Keyword bodies (`do:`), bodiless heads and anything that meets another
 * definition or an `end` first are skipped.
 */
function scanHead(tokens: readonly Token[], defIndex: number): HeadScan {
  let depth = 0;

  for (let i = defIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) {
      break;
    }

    if (token.kind === 'punct') {
      if (token.text === '(' || token.text === '[' || token.text === '{') {
        depth++;
      } else if (token.text === ')' || token.text === ']' || token.text === '}') {
        depth--;
      }
      continue;
    }

    if (depth > 0) {
      continue;
    }

    if (token.kind === 'newline') {
      const before = tokens[previousSignificant(tokens, i)];
      const after = tokens[nextSignificant(tokens, i)];
      // a trailing operator, comma or guard keeps the head open
      const continues =
        (before !== undefined &&
          (before.kind === 'operator' || before.text === ',' || (before.kind === 'identifier' && before.text === 'when'))) ||
        (after !== undefined && after.kind === 'identifier' && after.text === 'when');
      if (!continues) {
        return { type: 'skip', resumeAt: i + 1 };
      }
      continue;
    }

    if (token.kind === 'key' && token.text === 'do:') {
      return { type: 'skip', resumeAt: i + 1 };
    }

    if (isWord(tokens, i, 'do')) {
      return { type: 'block', doIndex: i };
    }

    if (isBlockCloser(tokens, i) || (token.kind === 'identifier' && isDefinitionKeyword(token.text))) {
      return { type: 'skip', resumeAt: i };
    }
  }

  return { type: 'skip', resumeAt: tokens.length };
}

function definitionName(tokens: readonly Token[], defIndex: number): string {
  const name = tokens[nextSignificant(tokens, defIndex)];
  return name && (name.kind === 'identifier' || name.kind === 'alias') ? name.text : '(anonymous)';
}

export function locate(text: string, options: LocateOptions = {}): Region[] {
  const tokens = tokenize(text);
  const regions: Region[] = [];
  const policy = options.onUnterminated ?? 'extend';

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (!token || token.kind !== 'identifier' || !isDefinitionKeyword(token.text)) {
      i++;
      continue;
    }
    const keyword: DefinitionKeyword = token.text;

    const before = tokens[i - 1];
    if (before && before.kind === 'operator' && before.text === '.') {
      i++;
      continue;
    }

    const head = scanHead(tokens, i);
    if (head.type === 'skip') {
      i = Math.max(head.resumeAt, i + 1);
      continue;
    }

    let depth = 1;
    let closeIndex = -1;
    for (let j = head.doIndex + 1; j < tokens.length; j++) {
      if (isBlockOpener(tokens, j)) {
        depth++;
      } else if (isBlockCloser(tokens, j)) {
        depth--;
        if (depth === 0) {
          closeIndex = j;
          break;
        }
      }
    }

    const closing = closeIndex === -1 ? undefined : tokens[closeIndex];
    if (!closing && policy === 'error') {
      throw new StructuralMismatchError(
        `Definition "${definitionName(tokens, i)}" at line ${token.line + 1} has no matching end`,
        token.line + 1
      );
    }

    const end = closing ? closing.end : text.length;
    regions.push({
      name: definitionName(tokens, i),
      keyword,
      kind: DEFINITION_KINDS[keyword],
      start: token.start,
      end,
      startLine: token.line,
      text: text.slice(token.start, end),
      terminated: closing !== undefined,
    });

    i = closeIndex === -1 ? tokens.length : closeIndex + 1;
  }

  return regions;
}
