/**
 * Live-Range Rewriter
 *
 * Gives every assignment to a rebound identifier its own name and renames
 * each reference to the name of the assignment that is live at that point.
 * A binding becomes live where its assigned expression ends and stays live
 * until the next assignment's expression ends, so the right-hand side of an
 * assignment still sees the previous value.
 */

import { computeLineStarts, tokenize, type Token } from '../analyzers/lexer.js';
import type { AssignmentSite } from '../analyzers/assignment-scanner.js';
import type { Region } from '../analyzers/region-locator.js';
import type { NamingRegistry } from './naming-registry.js';

export interface LiveRange {
  ordinal: number;
  /** Name given to the binding, or null when the naming sequence ran out. */
  name: string | null;
  /** Region-relative offsets, half-open. */
  start: number;
  end: number;
  /** Region-relative lines, half-open: the assignment line up to the next one. */
  startLine: number;
  endLine: number;
}

export interface SiteBinding {
  site: AssignmentSite;
  name: string | null;
}

export interface ExitReference {
  /** Region-relative line of the terminal use. */
  line: number;
  /** Name the use resolves to after the rewrite. */
  name: string;
  /** True when supplied by the caller rather than found by the backward scan. */
  explicit: boolean;
}

export interface RewritePlan {
  identifier: string;
  bindings: SiteBinding[];
  ranges: LiveRange[];
  exits: ExitReference[];
  /** Assignments left under the original name. */
  unrenamed: number;
}

export interface RewriteOptions {
  /** Region-relative lines of the function's exit expressions, when known. */
  exitLines?: readonly number[];
}

export interface RewriteResult {
  text: string;
  plan: RewritePlan;
  /** Number of tokens substituted. */
  replacements: number;
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

function isReference(tokens: readonly Token[], index: number, identifier: string): boolean {
  const token = tokens[index];
  if (!token || token.kind !== 'identifier' || token.text !== identifier) {
    return false;
  }
  const before = tokens[index - 1];
  if (before && before.kind === 'operator' && before.text === '.' && before.end === token.start) {
    return false;
  }
  // `name(...)` is a local call
  const after = tokens[index + 1];
  if (after && after.kind === 'punct' && after.text === '(' && after.start === token.end) {
    return false;
  }
  // `&name/2` captures a function
  return !(
    before &&
    before.kind === 'operator' &&
    before.text === '&' &&
    after &&
    after.kind === 'operator' &&
    after.text === '/'
  );
}

function significantLineTokens(tokens: readonly Token[], line: number): Token[] {
  return tokens.filter(token => token.line === line && token.kind !== 'newline' && token.kind !== 'comment');
}

/**
 * Whether a line is a terminal use of `identifier`: the bare name, the name
 * piped onward, or a tagged pair such as `{:ok, name}`.
 */
export function isTerminalUse(lineTokens: readonly Token[], identifier: string): boolean {
  const [first, second, third, fourth, fifth, ...rest] = lineTokens;
  if (!first) {
    return false;
  }
  if (first.kind === 'identifier' && first.text === identifier) {
    return second === undefined || (second.kind === 'operator' && second.text === '|>');
  }
  return (
    rest.length === 0 &&
    first.text === '{' &&
    second?.kind === 'atom' &&
    third?.text === ',' &&
    fourth?.kind === 'identifier' &&
    fourth.text === identifier &&
    fifth?.text === '}'
  );
}

export class LiveRangeRewriter {
  constructor(private readonly registry: NamingRegistry) {}

  plan(
    region: Region,
    identifier: string,
    sites: readonly AssignmentSite[],
    options: RewriteOptions = {}
  ): RewritePlan {
    return this.planWithTokens(tokenize(region.text), region, identifier, sites, options);
  }

  rewrite(
    region: Region,
    identifier: string,
    sites: readonly AssignmentSite[],
    options: RewriteOptions = {}
  ): RewriteResult {
    const tokens = tokenize(region.text);
    const plan = this.planWithTokens(tokens, region, identifier, sites, options);
    return this.applyWithTokens(tokens, region, plan);
  }

  apply(region: Region, plan: RewritePlan): RewriteResult {
    return this.applyWithTokens(tokenize(region.text), region, plan);
  }

  private planWithTokens(
    tokens: readonly Token[],
    region: Region,
    identifier: string,
    sites: readonly AssignmentSite[],
    options: RewriteOptions
  ): RewritePlan {
    const taken = new Set(tokens.filter(token => token.kind === 'identifier').map(token => token.text));
    const names = this.registry.pick(identifier, sites.length, taken);
    const bindings: SiteBinding[] = sites.map((site, index) => ({ site, name: names[index] ?? null }));

    const lineCount = computeLineStarts(region.text).length;
    const ranges: LiveRange[] = bindings.map(({ site, name }, index) => {
      const next = sites[index + 1];
      return {
        ordinal: site.ordinal,
        name,
        start: site.valueEnd,
        end: next ? next.valueEnd : region.text.length,
        startLine: site.line,
        endLine: next ? next.line : lineCount,
      };
    });

    return {
      identifier,
      bindings,
      ranges,
      exits: this.resolveExits(tokens, identifier, ranges, options),
      unrenamed: bindings.filter(binding => binding.name === null).length,
    };
  }

  private resolveExits(
    tokens: readonly Token[],
    identifier: string,
    ranges: readonly LiveRange[],
    options: RewriteOptions
  ): ExitReference[] {
    const last = ranges[ranges.length - 1];
    if (!last) {
      return [];
    }

    const resolve = (token: Token): string => {
      const range = ranges.find(candidate => token.start >= candidate.start && token.start < candidate.end);
      return range?.name ?? identifier;
    };

    if (options.exitLines) {
      const exits: ExitReference[] = [];
      for (const line of options.exitLines) {
        const index = tokens.findIndex(
          (token, i) => token.line === line && token.start >= last.start && isReference(tokens, i, identifier)
        );
        const token = tokens[index];
        if (token) {
          exits.push({ line, name: resolve(token), explicit: true });
        }
      }
      return exits;
    }

    const lastLine = tokens[tokens.length - 1]?.line ?? 0;
    for (let line = lastLine; line >= 0; line--) {
      const lineTokens = significantLineTokens(tokens, line);
      const use = lineTokens.find(token => token.kind === 'identifier' && token.text === identifier);
      if (!use || use.start < last.start) {
        continue;
      }
      if (isTerminalUse(lineTokens, identifier)) {
        return [{ line, name: resolve(use), explicit: false }];
      }
    }
    return [];
  }

  private applyWithTokens(tokens: readonly Token[], region: Region, plan: RewritePlan): RewriteResult {
    const edits: Edit[] = [];
    const siteOffsets = new Map<number, string | null>();
    for (const binding of plan.bindings) {
      siteOffsets.set(binding.site.offset, binding.name);
    }

    const firstRange = plan.ranges[0];
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (!token || !firstRange) {
        break;
      }

      const siteName = siteOffsets.get(token.start);
      if (siteName !== undefined) {
        if (siteName !== null) {
          edits.push({ start: token.start, end: token.end, text: siteName });
        }
        continue;
      }

      if (token.start < firstRange.start || !isReference(tokens, i, plan.identifier)) {
        continue;
      }

      const range = plan.ranges.find(candidate => token.start >= candidate.start && token.start < candidate.end);
      if (range?.name) {
        edits.push({ start: token.start, end: token.end, text: range.name });
      }
    }

    let text = '';
    let cursor = 0;
    for (const edit of edits) {
      text += region.text.slice(cursor, edit.start) + edit.text;
      cursor = edit.end;
    }
    text += region.text.slice(cursor);

    return { text, plan, replacements: edits.length };
  }
}
