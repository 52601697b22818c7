#!/usr/bin/env node

/**
 * Rebinder batch command
 *
 * Discovers rebound variables, rewrites them and reports what the lint tool
 * still flags. Configured entirely through the environment.
 */

import { loadConfig } from './config.js';
import { BatchRunner, formatBatchReport } from './orchestrator/batch-runner.js';
import { Logger } from './utils/logger.js';

export async function runCli(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const logger = new Logger('info');

  try {
    const config = loadConfig(env);
    logger.setLevel(config.logLevel);

    const runner = new BatchRunner(config, logger);
    const report = await runner.run();

    console.log(formatBatchReport(report));
    return report.verificationError ? 1 : 0;
  } catch (error) {
    logger.error('Rebinder run failed', error);
    console.error(`rebinder: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runCli()
    .then(code => process.exit(code))
    .catch(error => {
      console.error('Unhandled error in rebinder:', error);
      process.exit(1);
    });
}
