/**
 * Rebinding Resolver
 *
 * Runs region location, assignment scanning and live-range rewriting for one
 * identifier over a whole file and splices the rewritten regions back.
 */

import { scan } from '../analyzers/assignment-scanner.js';
import { locate, type UnterminatedPolicy } from '../analyzers/region-locator.js';
import type { Logger } from '../utils/logger.js';
import { LiveRangeRewriter, type RewritePlan } from './live-range-rewriter.js';
import type { NamingRegistry } from './naming-registry.js';

export type OutcomeStatus =
  | 'rewritten'  // at least one assignment renamed
  | 'single'     // one assignment, nothing to split
  | 'nested'     // an assignment sits in an inner block; left alone
  | 'exhausted'; // no replacement name was available

export interface RegionOutcome {
  identifier: string;
  region: string;
  /** 1-based file line of the definition. */
  line: number;
  status: OutcomeStatus;
  sites: number;
  replacements: number;
  plan?: RewritePlan;
}

export interface ResolveResult {
  content: string;
  changed: boolean;
  outcomes: RegionOutcome[];
}

export interface ResolverOptions {
  onUnterminated?: UnterminatedPolicy;
}

export interface ResolveRequest {
  identifier: string;
  /** 0-based file lines of exit expressions; replaces the backward scan. */
  exitLines?: readonly number[];
}

export class RebindingResolver {
  private readonly rewriter: LiveRangeRewriter;

  constructor(
    registry: NamingRegistry,
    private readonly logger: Logger,
    private readonly options: ResolverOptions = {}
  ) {
    this.rewriter = new LiveRangeRewriter(registry);
  }

  resolve(content: string, request: ResolveRequest | string): ResolveResult {
    const { identifier, exitLines } = typeof request === 'string' ? { identifier: request, exitLines: undefined } : request;
    const regions = locate(content, { onUnterminated: this.options.onUnterminated ?? 'extend' });
    const outcomes: RegionOutcome[] = [];

    let output = '';
    let cursor = 0;

    for (const region of regions) {
      if (!region.terminated) {
        this.logger.warn(`Definition ${region.name} at line ${region.startLine + 1} has no matching end; treating the rest of the file as its body`);
      }
      if (!region.text.includes(identifier)) {
        continue;
      }

      const sites = scan(region, identifier);
      if (sites.length === 0) {
        continue;
      }

      const outcome: RegionOutcome = {
        identifier,
        region: region.name,
        line: region.startLine + 1,
        status: 'single',
        sites: sites.length,
        replacements: 0,
      };
      outcomes.push(outcome);

      if (sites.length === 1) {
        continue;
      }

      if (sites.some(site => site.depth !== 0)) {
        outcome.status = 'nested';
        this.logger.debug(`Skipping ${identifier} in ${region.name}: assigned inside a nested block`, {
          lines: sites.map(site => region.startLine + site.line + 1),
        });
        continue;
      }

      const relativeExits = exitLines
        ?.map(line => line - region.startLine)
        .filter(line => line >= 0);
      const result = this.rewriter.rewrite(region, identifier, sites, { exitLines: relativeExits });
      outcome.plan = result.plan;
      outcome.replacements = result.replacements;
      outcome.status = result.plan.unrenamed === sites.length ? 'exhausted' : 'rewritten';

      if (result.plan.unrenamed > 0) {
        this.logger.warn(`Ran out of names for ${identifier} in ${region.name}`, {
          assignments: sites.length,
          unrenamed: result.plan.unrenamed,
        });
      }

      if (result.text !== region.text) {
        output += content.slice(cursor, region.start) + result.text;
        cursor = region.end;
      }
    }

    output += content.slice(cursor);
    return { content: output, changed: output !== content, outcomes };
  }

  /**
   * Resolves each distinct identifier in turn; later identifiers see the
   * rewrites of earlier ones.
   */
  resolveAll(content: string, identifiers: Iterable<string | ResolveRequest>): ResolveResult {
    const seen = new Set<string>();
    const outcomes: RegionOutcome[] = [];
    let current = content;

    for (const entry of identifiers) {
      const request = typeof entry === 'string' ? { identifier: entry } : entry;
      if (seen.has(request.identifier)) {
        continue;
      }
      seen.add(request.identifier);

      const result = this.resolve(current, request);
      current = result.content;
      outcomes.push(...result.outcomes);
    }

    return { content: current, changed: current !== content, outcomes };
  }
}
