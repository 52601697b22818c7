/**
 * Batch Runner
 *
 * Wires configuration into discovery, the file orchestrator and the
 * verification hook. Shared by the CLI and the MCP tools.
 */

import type { RebinderConfig } from '../config.js';
import { NamingRegistry } from '../resolver/naming-registry.js';
import { RebindingResolver } from '../resolver/rebinding-resolver.js';
import { LintToolError } from '../utils/errors.js';
import { FileOperations } from '../utils/file-operations.js';
import { HistoryManager } from '../utils/history-manager.js';
import { LintReportParser } from '../utils/lint-report.js';
import { LintRunner, shellExecutor, type CommandExecutor } from '../utils/lint-runner.js';
import type { Logger } from '../utils/logger.js';
import { countPairs, Discovery, type DiscoveryMap } from './discovery.js';
import { FileOrchestrator, type BatchSummary } from './file-orchestrator.js';

export interface BatchRunnerDeps {
  executor?: CommandExecutor;
}

export interface BatchOverrides {
  dryRun?: boolean;
  verify?: boolean;
  /** Pairs to fix instead of running discovery. */
  pairs?: DiscoveryMap;
}

export interface BatchReport {
  discoveredFiles: number;
  discoveredPairs: number;
  summary: BatchSummary;
  /** Null when verification was skipped or could not run. */
  remainingViolations: number | null;
  verificationError?: string;
}

export class BatchRunner {
  readonly fileOps: FileOperations;
  readonly history: HistoryManager;
  readonly lintRunner: LintRunner;
  readonly resolver: RebindingResolver;
  private readonly reportParser: LintReportParser;

  constructor(
    private readonly config: RebinderConfig,
    private readonly logger: Logger,
    deps: BatchRunnerDeps = {}
  ) {
    const registry = NamingRegistry.fromFile(config.namingFile, { unbounded: config.unboundedNames });
    this.fileOps = new FileOperations(logger, config.rootDir);
    this.history = new HistoryManager(logger, config.rootDir, config.historyLimit);
    this.lintRunner = new LintRunner(
      logger,
      { command: config.lintCommand, cwd: config.rootDir, timeoutMs: config.lintTimeoutMs },
      deps.executor ?? shellExecutor
    );
    this.reportParser = new LintReportParser(logger, config.reportOrder);
    this.resolver = new RebindingResolver(registry, logger, { onUnterminated: config.onUnterminated });
  }

  async discover(): Promise<DiscoveryMap> {
    const discovery = new Discovery(
      { fileOps: this.fileOps, logger: this.logger, lintRunner: this.lintRunner, reportParser: this.reportParser },
      { mode: this.config.discovery, manifestPath: this.config.manifestPath, scanGlob: this.config.scanGlob }
    );
    return discovery.discover();
  }

  async run(overrides: BatchOverrides = {}): Promise<BatchReport> {
    const dryRun = overrides.dryRun ?? this.config.dryRun;
    const pairs = overrides.pairs ?? (await this.discover());

    const orchestrator = new FileOrchestrator(this.fileOps, this.resolver, this.logger, {
      dryRun,
      ...(this.config.backups ? { history: this.history } : {}),
    });
    const summary = await orchestrator.processBatch(pairs);

    const report: BatchReport = {
      discoveredFiles: pairs.size,
      discoveredPairs: countPairs(pairs),
      summary,
      remainingViolations: null,
    };

    // a dry run leaves the files as they were
    const verify = (overrides.verify ?? this.config.verify) && !dryRun;
    if (verify) {
      try {
        report.remainingViolations = await this.lintRunner.verify();
      } catch (error) {
        if (!(error instanceof LintToolError)) {
          throw error;
        }
        report.verificationError = error.message;
        this.logger.error('Verification failed', error);
      }
    }

    return report;
  }
}

export function formatBatchReport(report: BatchReport): string {
  const { summary } = report;
  const lines = [
    `Discovered ${report.discoveredPairs} rebound variable(s) in ${report.discoveredFiles} file(s)`,
    `${summary.dryRun ? 'Files that would change' : 'Files changed'}: ${summary.filesChanged}`,
    `Pairs rewritten: ${summary.pairsRewritten}`,
    `Pairs skipped: ${summary.pairsSkipped}`,
  ];
  if (summary.filesFailed > 0) {
    lines.push(`Files failed: ${summary.filesFailed}`);
  }
  if (summary.historyEntryId) {
    lines.push(`History entry: ${summary.historyEntryId}`);
  }
  if (summary.historyError) {
    lines.push(`History not recorded: ${summary.historyError}`);
  }
  if (report.verificationError) {
    lines.push(`Verification failed: ${report.verificationError}`);
  } else if (report.remainingViolations !== null) {
    lines.push(`Remaining violations: ${report.remainingViolations}`);
  }
  return lines.join('\n');
}
