/**
 * Rebinder MCP Tools Registration
 *
 * Registers the rebinder tools with the MCP server
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { RebinderConfig } from '../config.js';
import type { BatchRunner } from '../orchestrator/batch-runner.js';
import type { ErrorHandler } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { handleLintVerify } from './lint-verify.js';
import { handleRebindFix } from './rebind-fix.js';
import { handleRebindHistory } from './rebind-history.js';
import { handleRebindPreview } from './rebind-preview.js';

export interface ToolContext {
  logger: Logger;
  errorHandler: ErrorHandler;
  config: RebinderConfig;
  runner: BatchRunner;
}

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'rebind_fix',
    description:
      'Rename variables assigned more than once in a function so each assignment gets its own name, then re-run the lint check',
    inputSchema: {
      type: 'object',
      properties: {
        pairs: {
          type: 'object',
          description: 'Map of file path to variable names to fix. Runs the configured discovery when omitted',
          additionalProperties: {
            type: 'array',
            items: { type: 'string' },
          },
        },
        dryRun: {
          type: 'boolean',
          description: 'Compute the rewrite without writing files',
        },
        verify: {
          type: 'boolean',
          description: 'Run the lint command after rewriting',
        },
      },
    },
  },
  {
    name: 'rebind_preview',
    description: 'Show the renaming plan and the changed lines for one file without writing it',
    inputSchema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          description: 'Path of the source file, relative to the project root',
        },
        identifiers: {
          type: 'array',
          items: { type: 'string' },
          description: 'Variables to rename. Every rebound variable in the file when omitted',
        },
        exitLines: {
          type: 'array',
          items: { type: 'number' },
          description: '1-based lines of the function exit expressions',
        },
      },
      required: ['file'],
    },
  },
  {
    name: 'lint_verify',
    description: 'Run the lint command and count the remaining "declared more than once" violations',
    inputSchema: {
      type: 'object',
      properties: {
        includeDiagnostics: {
          type: 'boolean',
          description: 'List each remaining violation',
          default: true,
        },
      },
    },
  },
  {
    name: 'rebind_history',
    description: 'List recorded rewrite runs or roll one back',
    inputSchema: {
      type: 'object',
      properties: {
        action: {
          type: 'string',
          enum: ['list', 'rollback'],
          default: 'list',
        },
        entryId: {
          type: 'string',
          description: 'History entry to roll back',
        },
        force: {
          type: 'boolean',
          description: 'Restore files even if they changed after the run',
          default: false,
        },
        limit: {
          type: 'number',
          description: 'Number of entries to list',
          default: 10,
        },
      },
    },
  },
];

export async function dispatchTool(name: string, args: unknown, context: ToolContext): Promise<CallToolResult> {
  switch (name) {
    case 'rebind_fix':
      return handleRebindFix(args, context);
    case 'rebind_preview':
      return handleRebindPreview(args, context);
    case 'lint_verify':
      return handleLintVerify(args, context);
    case 'rebind_history':
      return handleRebindHistory(args, context);
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown rebinder tool: ${name}`);
  }
}

export async function registerTools(server: Server, context: ToolContext): Promise<void> {
  const { logger, errorHandler } = context;

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;

    try {
      logger.info(`Executing rebinder tool: ${name}`, { args });
      return await dispatchTool(name, args, context);
    } catch (error) {
      return errorHandler.handleToolError(error, name);
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.info('Listing available rebinder tools');
    return { tools: TOOL_DEFINITIONS };
  });
}
