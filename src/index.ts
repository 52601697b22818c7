#!/usr/bin/env node

/**
 * Rebinder MCP Server
 *
 * Exposes the rebound-variable rewriter, its lint verification and its run
 * history as MCP tools over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type RebinderConfig } from './config.js';
import { BatchRunner } from './orchestrator/batch-runner.js';
import { registerTools, TOOL_DEFINITIONS } from './tools/index.js';
import { ErrorHandler } from './utils/errors.js';
import { Logger } from './utils/logger.js';

class RebinderMCPServer {
  private server: Server;
  private logger: Logger;
  private errorHandler: ErrorHandler;
  private config: RebinderConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.server = new Server(
      {
        name: 'rebinder-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.config = loadConfig(env);
    this.logger = new Logger(this.config.logLevel);
    this.errorHandler = new ErrorHandler(this.logger);
    this.setupErrorHandling();
  }

  async initialize(): Promise<void> {
    try {
      this.logger.info('Starting Rebinder MCP Server initialization...', { root: this.config.rootDir });

      await registerTools(this.server, {
        logger: this.logger,
        errorHandler: this.errorHandler,
        config: this.config,
        runner: new BatchRunner(this.config, this.logger),
      });

      this.logger.info('Rebinder MCP Server initialized successfully');
      this.logger.info(`Available tools: ${TOOL_DEFINITIONS.map(tool => tool.name).join(', ')}`);
    } catch (error) {
      this.logger.error('Failed to initialize Rebinder MCP Server:', error);
      throw error;
    }
  }

  private setupErrorHandling(): void {
    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception in Rebinder MCP Server:', error);
      process.exit(1);
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled rejection in Rebinder MCP Server:', { reason });
      process.exit(1);
    });

    process.on('SIGINT', () => {
      this.logger.info('Received SIGINT, shutting down Rebinder MCP Server...');
      void this.shutdown().then(() => process.exit(0));
    });

    process.on('SIGTERM', () => {
      this.logger.info('Received SIGTERM, shutting down Rebinder MCP Server...');
      void this.shutdown().then(() => process.exit(0));
    });
  }

  async start(): Promise<void> {
    try {
      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      this.logger.info('Rebinder MCP Server started and listening on stdio');
    } catch (error) {
      this.logger.error('Failed to start Rebinder MCP Server:', error);
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.server.close();
      this.logger.info('Rebinder MCP Server shutdown complete');
    } catch (error) {
      this.logger.error('Error during Rebinder MCP Server shutdown:', error);
    }
  }
}

async function main(): Promise<void> {
  try {
    const server = new RebinderMCPServer();
    await server.initialize();
    await server.start();
  } catch (error) {
    console.error('Failed to start Rebinder MCP Server:', error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(error => {
    console.error('Unhandled error in Rebinder MCP Server main:', error);
    process.exit(1);
  });
}

export { RebinderMCPServer };
