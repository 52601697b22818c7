import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConfigurationError,
  DiscoveryError,
  ErrorHandler,
  FileOperationError,
  LintToolError,
  ValidationError,
} from './errors.js';
import { Logger } from './logger.js';

describe('ErrorHandler', () => {
  const handler = new ErrorHandler(new Logger('error', () => {}));

  it('classifies known errors', () => {
    expect(handler.classify(new ValidationError('bad'))).toEqual({ code: ErrorCode.InvalidParams, message: 'bad' });
    expect(handler.classify(new ConfigurationError('conf'))).toEqual({ code: ErrorCode.InternalError, message: 'conf' });
    expect(handler.classify(new DiscoveryError('gone'))).toEqual({ code: ErrorCode.InternalError, message: 'gone' });
    expect(handler.classify(new LintToolError('slow'))).toEqual({
      code: ErrorCode.InternalError,
      message: 'Lint verification failed: slow',
    });
    expect(handler.classify(new FileOperationError('io'))).toEqual({
      code: ErrorCode.InternalError,
      message: 'File operation failed: io',
    });
    expect(handler.classify(new McpError(ErrorCode.MethodNotFound, 'nope')).code).toBe(ErrorCode.MethodNotFound);
    expect(handler.classify('text')).toEqual({ code: ErrorCode.InternalError, message: 'An unknown error occurred' });
  });

  it('reports zod failures by path', () => {
    const parsed = z.object({ limit: z.number() }).safeParse({ limit: 'x' });
    if (parsed.success) {
      throw new Error('expected a parse failure');
    }
    expect(handler.classify(parsed.error)).toEqual({
      code: ErrorCode.InvalidParams,
      message: 'Invalid parameters: limit: Expected number, received string',
    });
  });

  it('builds an MCP error result', () => {
    expect(handler.handleToolError(new ValidationError('bad'), 'rebind_fix')).toEqual({
      isError: true,
      content: [{ type: 'text', text: `Error ${ErrorCode.InvalidParams}: bad` }],
    });
  });
});
