/**
 * Rebind History Tool for Rebinder MCP Server
 *
 * Lists recorded rewrite runs and rolls one back.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ResourceNotFoundError, ValidationError } from '../utils/errors.js';
import type { ToolContext } from './index.js';

const RebindHistorySchema = z.object({
  action: z.enum(['list', 'rollback']).optional().default('list'),
  entryId: z.string().min(1).optional(),
  force: z.boolean().optional().default(false),
  limit: z.number().int().positive().optional().default(10),
});

export async function handleRebindHistory(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = RebindHistorySchema.parse(args ?? {});
  const { logger, runner } = context;

  if (validated.action === 'list') {
    const entries = await runner.history.getHistory(validated.limit);
    return {
      content: [
        {
          type: 'text',
          text: runner.history.generateHistoryReport(entries),
        },
      ],
    };
  }

  if (!validated.entryId) {
    throw new ValidationError('entryId is required for rollback');
  }

  if (!(await runner.history.getEntry(validated.entryId))) {
    throw new ResourceNotFoundError(`History entry ${validated.entryId} not found`);
  }

  logger.info(`Rolling back ${validated.entryId}`, { force: validated.force });
  const result = await runner.history.rollback(validated.entryId, validated.force);

  let response = `# Rollback ${result.success ? 'Complete' : 'Incomplete'}\n\n`;
  response += `**Entry:** \`${result.entryId}\`\n`;
  response += `**Files restored:** ${result.filesRestored.length}\n\n`;
  for (const file of result.filesRestored) {
    response += `- \`${runner.fileOps.relative(file)}\`\n`;
  }
  if (result.errors.length > 0) {
    response += `\n## Errors\n`;
    for (const error of result.errors) {
      response += `- ${error}\n`;
    }
  }

  return {
    isError: !result.success,
    content: [
      {
        type: 'text',
        text: response,
      },
    ],
  };
}
