/**
 * Error Handling Utilities for Rebinder
 */

import { ErrorCode, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import type { Logger } from './logger.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ResourceNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceNotFoundError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class FileOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FileOperationError';
  }
}

/** The discovery input (manifest, lint report, source scan) could not be enumerated. */
export class DiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

/** The external lint command could not be run to completion. */
export class LintToolError extends Error {
  constructor(message: string, public readonly output: string = '') {
    super(message);
    this.name = 'LintToolError';
  }
}

/** A definition opened with `do` never reaches its matching `end`. */
export class StructuralMismatchError extends Error {
  constructor(message: string, public readonly line: number) {
    super(message);
    this.name = 'StructuralMismatchError';
  }
}

export function formatZodError(error: ZodError): string {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}

export class ErrorHandler {
  constructor(private logger: Logger) {}

  handleToolError(error: unknown, toolName: string): CallToolResult {
    this.logger.error(`Error in tool ${toolName}:`, { error: this.serializeError(error) });
    const { code, message } = this.classify(error);

    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error ${code}: ${message}`,
        },
      ],
    };
  }

  classify(error: unknown): { code: number; message: string } {
    if (error instanceof ZodError) {
      return {
        code: ErrorCode.InvalidParams,
        message: `Invalid parameters: ${formatZodError(error)}`,
      };
    }

    if (error instanceof ValidationError || error instanceof ResourceNotFoundError) {
      return {
        code: ErrorCode.InvalidParams,
        message: error.message,
      };
    }

    if (error instanceof ConfigurationError || error instanceof DiscoveryError) {
      return {
        code: ErrorCode.InternalError,
        message: error.message,
      };
    }

    if (error instanceof LintToolError) {
      return {
        code: ErrorCode.InternalError,
        message: `Lint verification failed: ${error.message}`,
      };
    }

    if (error instanceof FileOperationError) {
      return {
        code: ErrorCode.InternalError,
        message: `File operation failed: ${error.message}`,
      };
    }

    if (error instanceof McpError) {
      return {
        code: error.code,
        message: error.message,
      };
    }

    if (error instanceof Error) {
      return {
        code: ErrorCode.InternalError,
        message: error.message,
      };
    }

    return {
      code: ErrorCode.InternalError,
      message: 'An unknown error occurred',
    };
  }

  private serializeError(error: unknown): unknown {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }
    return error;
  }
}
