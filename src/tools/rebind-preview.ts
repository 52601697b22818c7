/**
 * Rebind Preview Tool for Rebinder MCP Server
 *
 * Shows the rewrite plan and the changed lines for one file without writing it.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { findRebound } from '../analyzers/assignment-scanner.js';
import { locate } from '../analyzers/region-locator.js';
import type { RegionOutcome } from '../resolver/rebinding-resolver.js';
import type { ToolContext } from './index.js';

const RebindPreviewSchema = z.object({
  file: z.string().min(1, 'File path cannot be empty'),
  identifiers: z.array(z.string().min(1)).optional(),
  /** 1-based lines of the function's exit expressions. */
  exitLines: z.array(z.number().int().positive()).optional(),
});

export interface ChangedLine {
  line: number;
  before: string;
  after: string;
}

/** Rewrites never add or remove lines, so a line-by-line comparison is exact. */
export function changedLines(before: string, after: string): ChangedLine[] {
  const beforeLines = before.split('\n');
  const afterLines = after.split('\n');
  const changes: ChangedLine[] = [];
  beforeLines.forEach((line, index) => {
    const rewritten = afterLines[index] ?? '';
    if (rewritten !== line) {
      changes.push({ line: index + 1, before: line, after: rewritten });
    }
  });
  return changes;
}

function describeOutcome(outcome: RegionOutcome, regionStartLine: number): string {
  let text = `### ${outcome.identifier} in ${outcome.region} (line ${outcome.line})\n`;
  text += `**Status:** ${outcome.status}, ${outcome.sites} assignment(s)\n`;

  if (outcome.plan) {
    for (const binding of outcome.plan.bindings) {
      const line = regionStartLine + binding.site.line + 1;
      text += `- Line ${line}: \`${outcome.identifier}\` → \`${binding.name ?? outcome.identifier}\`${binding.name ? '' : ' (no name left)'}\n`;
    }
    for (const exit of outcome.plan.exits) {
      text += `- Exit line ${regionStartLine + exit.line + 1} resolves to \`${exit.name}\`${exit.explicit ? ' (given)' : ''}\n`;
    }
  }
  return `${text}\n`;
}

export async function handleRebindPreview(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = RebindPreviewSchema.parse(args);
  const { logger, runner } = context;

  logger.info('Previewing rebind', { file: validated.file });
  const content = await runner.fileOps.readFile(validated.file);

  const identifiers = validated.identifiers ?? [
    ...new Set(locate(content).flatMap(region => findRebound(region))),
  ];
  const exitLines = validated.exitLines?.map(line => line - 1);

  let current = content;
  const outcomes: RegionOutcome[] = [];
  for (const identifier of identifiers) {
    const result = runner.resolver.resolve(current, exitLines ? { identifier, exitLines } : { identifier });
    current = result.content;
    outcomes.push(...result.outcomes);
  }

  let response = `# Rebind Preview\n\n`;
  response += `**File:** \`${validated.file}\`\n`;
  response += `**Identifiers:** ${identifiers.length > 0 ? identifiers.map(name => `\`${name}\``).join(', ') : 'none'}\n\n`;

  if (outcomes.length === 0) {
    response += `No assignments to these identifiers were found.\n`;
    return { content: [{ type: 'text', text: response }] };
  }

  response += `## Plan\n\n`;
  for (const outcome of outcomes) {
    response += describeOutcome(outcome, outcome.line - 1);
  }

  const changes = changedLines(content, current);
  response += `## Changes\n\n`;
  if (changes.length === 0) {
    response += `No changes.\n`;
  } else {
    response += '```diff\n';
    for (const change of changes) {
      response += `@@ line ${change.line} @@\n-${change.before}\n+${change.after}\n`;
    }
    response += '```\n';
  }

  return {
    content: [
      {
        type: 'text',
        text: response,
      },
    ],
  };
}
