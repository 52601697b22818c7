/**
 * File Orchestrator
 *
 * Applies the rebinding resolver to every (file, identifier) pair, writing a
 * file back only when its text changed.
 */

import type { RebindingResolver, RegionOutcome, ResolveResult } from '../resolver/rebinding-resolver.js';
import type { FileOperations } from '../utils/file-operations.js';
import type { FileSnapshot, HistoryManager } from '../utils/history-manager.js';
import type { Logger } from '../utils/logger.js';
import type { DiscoveryMap } from './discovery.js';

export interface OrchestratorOptions {
  dryRun?: boolean;
  /** Records a snapshot of each batch that changes files. */
  history?: HistoryManager;
}

export interface FileResult {
  file: string;
  identifiers: string[];
  changed: boolean;
  outcomes: RegionOutcome[];
  /** Set when the file could not be read, resolved or written. */
  error?: string;
  before?: string;
  after?: string;
}

export interface BatchSummary {
  filesScanned: number;
  filesChanged: number;
  filesFailed: number;
  pairsRewritten: number;
  pairsSkipped: number;
  dryRun: boolean;
  historyEntryId?: string;
  /** Set when the files were rewritten but the history snapshot failed. */
  historyError?: string;
  results: FileResult[];
}

export class FileOrchestrator {
  private readonly dryRun: boolean;
  private readonly history: HistoryManager | undefined;

  constructor(
    private readonly fileOps: FileOperations,
    private readonly resolver: RebindingResolver,
    private readonly logger: Logger,
    options: OrchestratorOptions = {}
  ) {
    this.dryRun = options.dryRun ?? false;
    this.history = options.history;
  }

  async processFile(file: string, identifiers: Iterable<string>): Promise<FileResult> {
    const distinct = [...new Set(identifiers)];
    const result: FileResult = { file, identifiers: distinct, changed: false, outcomes: [] };

    let content: string;
    try {
      content = await this.fileOps.readFile(file);
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not read ${file}; skipping`, error);
      return result;
    }

    let resolved: ResolveResult;
    try {
      resolved = this.resolver.resolveAll(content, distinct);
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not resolve ${file}; leaving it unchanged`, error);
      return result;
    }
    result.outcomes = resolved.outcomes;

    if (!resolved.changed) {
      this.logger.debug(`No changes for ${file}`);
      return result;
    }

    if (!this.dryRun) {
      try {
        await this.fileOps.writeFile(file, resolved.content);
      } catch (error) {
        result.error = error instanceof Error ? error.message : String(error);
        this.logger.error(`Could not write ${file}`, error);
        return result;
      }
    }

    result.changed = true;
    result.before = content;
    result.after = resolved.content;
    this.logger.info(`${this.dryRun ? 'Would rewrite' : 'Rewrote'} ${file}`, { identifiers: distinct });
    return result;
  }

  /** True when the file was (or, in a dry run, would be) rewritten. */
  async process(file: string, identifiers: Iterable<string>): Promise<boolean> {
    const result = await this.processFile(file, identifiers);
    return result.changed;
  }

  async processBatch(map: DiscoveryMap): Promise<BatchSummary> {
    const summary: BatchSummary = {
      filesScanned: 0,
      filesChanged: 0,
      filesFailed: 0,
      pairsRewritten: 0,
      pairsSkipped: 0,
      dryRun: this.dryRun,
      results: [],
    };

    for (const [file, identifiers] of map) {
      const result = await this.processFile(file, identifiers);
      summary.results.push(result);
      summary.filesScanned++;
      if (result.error) {
        summary.filesFailed++;
      }
      if (result.changed) {
        summary.filesChanged++;
      }
      for (const outcome of result.outcomes) {
        if (outcome.status === 'rewritten') {
          summary.pairsRewritten++;
        } else if (outcome.status !== 'single') {
          summary.pairsSkipped++;
        }
      }
    }

    if (this.history && !this.dryRun && summary.filesChanged > 0) {
      try {
        summary.historyEntryId = await this.history.recordOperation(
          'rebinder',
          'rebind',
          `Renamed rebound variables in ${summary.filesChanged} file(s)`,
          this.snapshots(summary.results),
          { pairsRewritten: summary.pairsRewritten, pairsSkipped: summary.pairsSkipped }
        );
      } catch (error) {
        summary.historyError = error instanceof Error ? error.message : String(error);
        this.logger.error('Could not record history for this batch', error);
      }
    }

    this.logger.info('Batch complete', {
      filesScanned: summary.filesScanned,
      filesChanged: summary.filesChanged,
      filesFailed: summary.filesFailed,
      pairsRewritten: summary.pairsRewritten,
      pairsSkipped: summary.pairsSkipped,
    });
    return summary;
  }

  private snapshots(results: readonly FileResult[]): FileSnapshot[] {
    const snapshots: FileSnapshot[] = [];
    for (const result of results) {
      if (result.changed && result.before !== undefined && result.after !== undefined) {
        snapshots.push({
          filePath: this.fileOps.resolve(result.file),
          contentBefore: result.before,
          contentAfter: result.after,
        });
      }
    }
    return snapshots;
  }
}
