/**
 * Rebind Fix Tool for Rebinder MCP Server
 *
 * Runs a full batch: discovery (or the given pairs), rewrite and verification.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ManifestSchema, manifestToMap } from '../orchestrator/discovery.js';
import type { ToolContext } from './index.js';

const RebindFixSchema = z.object({
  pairs: ManifestSchema.shape.files.optional(),
  dryRun: z.boolean().optional(),
  verify: z.boolean().optional(),
});

export async function handleRebindFix(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = RebindFixSchema.parse(args ?? {});
  const { logger, runner } = context;

  logger.info('Starting rebind fix', { dryRun: validated.dryRun, explicitPairs: validated.pairs !== undefined });

  const report = await runner.run({
    ...(validated.pairs ? { pairs: manifestToMap({ files: validated.pairs }) } : {}),
    ...(validated.dryRun !== undefined ? { dryRun: validated.dryRun } : {}),
    ...(validated.verify !== undefined ? { verify: validated.verify } : {}),
  });
  const { summary } = report;

  let response = `# Rebind Fix\n\n`;
  response += `**Mode:** ${summary.dryRun ? 'DRY RUN (Preview)' : 'LIVE REWRITE'}\n`;
  response += `**Files discovered:** ${report.discoveredFiles}\n`;
  response += `**Pairs discovered:** ${report.discoveredPairs}\n\n`;

  response += `## Summary\n`;
  response += `- **Files changed:** ${summary.filesChanged}\n`;
  response += `- **Files failed:** ${summary.filesFailed}\n`;
  response += `- **Pairs rewritten:** ${summary.pairsRewritten}\n`;
  response += `- **Pairs skipped:** ${summary.pairsSkipped}\n`;
  if (summary.historyEntryId) {
    response += `- **History entry:** \`${summary.historyEntryId}\`\n`;
  }
  if (summary.historyError) {
    response += `- **History not recorded:** ${summary.historyError}\n`;
  }
  response += '\n';

  const changed = summary.results.filter(result => result.changed);
  if (changed.length > 0) {
    response += `## Changed Files\n`;
    for (const result of changed.slice(0, 20)) {
      const rewritten = result.outcomes.filter(outcome => outcome.status === 'rewritten');
      response += `- \`${result.file}\`: ${rewritten.map(outcome => `${outcome.identifier} in ${outcome.region}`).join(', ')}\n`;
    }
    if (changed.length > 20) {
      response += `... and ${changed.length - 20} more files\n`;
    }
    response += '\n';
  }

  const skipped = summary.results.flatMap(result =>
    result.outcomes
      .filter(outcome => outcome.status === 'nested' || outcome.status === 'exhausted')
      .map(outcome => ({ file: result.file, outcome }))
  );
  if (skipped.length > 0) {
    response += `## Skipped\n`;
    for (const { file, outcome } of skipped.slice(0, 20)) {
      response += `- \`${file}:${outcome.line}\` ${outcome.identifier} in ${outcome.region} (${outcome.status})\n`;
    }
    response += '\n';
  }

  const failed = summary.results.filter(result => result.error);
  if (failed.length > 0) {
    response += `## Failures\n`;
    for (const result of failed) {
      response += `- \`${result.file}\`: ${result.error}\n`;
    }
    response += '\n';
  }

  response += `## Verification\n`;
  if (report.verificationError) {
    response += `Verification failed: ${report.verificationError}\n`;
  } else if (report.remainingViolations === null) {
    response += `Verification skipped.\n`;
  } else {
    response += `Remaining "declared more than once" violations: **${report.remainingViolations}**\n`;
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
