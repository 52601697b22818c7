/**
 * Lint Verify Tool for Rebinder MCP Server
 *
 * Runs the lint command and lists the redeclaration diagnostics it reports.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { LintReportParser } from '../utils/lint-report.js';
import type { ToolContext } from './index.js';

const LintVerifySchema = z.object({
  includeDiagnostics: z.boolean().optional().default(true),
});

export async function handleLintVerify(args: unknown, context: ToolContext): Promise<CallToolResult> {
  const validated = LintVerifySchema.parse(args ?? {});
  const { logger, runner, config } = context;

  const run = await runner.lintRunner.run();

  let response = `# Lint Verification\n\n`;
  response += `**Command:** \`${config.lintCommand}\`\n`;
  response += `**Exit code:** ${run.exitCode}\n`;
  response += `**Duration:** ${run.durationMs}ms\n`;
  response += `**Remaining violations:** ${run.violations}\n\n`;

  if (validated.includeDiagnostics && run.violations > 0) {
    const diagnostics = new LintReportParser(logger, config.reportOrder).parse(run.output);
    response += `## Diagnostics\n`;
    for (const diagnostic of diagnostics.slice(0, 50)) {
      response += `- \`${diagnostic.file}:${diagnostic.line}\` ${diagnostic.variable}\n`;
    }
    if (diagnostics.length > 50) {
      response += `... and ${diagnostics.length - 50} more\n`;
    }
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
