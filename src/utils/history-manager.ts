/**
 * History Manager for Rebinder
 *
 * Records the before/after content of every file a rewrite run touches and
 * restores a run on request.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Logger } from './logger.js';
import { FileOperationError } from './errors.js';

export const HISTORY_DIR_NAME = '.rebinder-history';

const FileSnapshotSchema = z.object({
  filePath: z.string(),
  contentBefore: z.string(),
  contentAfter: z.string(),
  backup: z.string().optional(),
});

const HistoryEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  operation: z.string(),
  tool: z.string(),
  description: z.string(),
  files: z.array(FileSnapshotSchema),
  metadata: z.record(z.unknown()).optional(),
});

export type FileSnapshot = z.infer<typeof FileSnapshotSchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export interface RollbackResult {
  success: boolean;
  filesRestored: string[];
  errors: string[];
  entryId: string;
}

export class HistoryManager {
  private historyDir: string;
  private maxEntries: number;
  private logger: Logger;

  constructor(logger: Logger, rootDir: string = process.cwd(), maxEntries: number = 50) {
    this.logger = logger;
    this.maxEntries = maxEntries;
    this.historyDir = path.join(rootDir, HISTORY_DIR_NAME);
  }

  getDirectory(): string {
    return this.historyDir;
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.historyDir, { recursive: true });
      this.logger.debug('History manager initialized', { directory: this.historyDir });
    } catch (error) {
      throw new FileOperationError(`Failed to initialize history directory: ${error}`);
    }
  }

  async recordOperation(
    tool: string,
    operation: string,
    description: string,
    files: FileSnapshot[],
    metadata?: Record<string, unknown>
  ): Promise<string> {
    try {
      await this.initialize();
      const entryId = uuidv4();
      const timestamp = new Date().toISOString();

      const filesWithBackups = await Promise.all(
        files.map(async (file, index) => {
          const backupPath = await this.createBackup(file.filePath, file.contentBefore, entryId, index);
          return {
            ...file,
            backup: backupPath,
          };
        })
      );

      const entry: HistoryEntry = {
        id: entryId,
        timestamp,
        operation,
        tool,
        description,
        files: filesWithBackups,
        metadata: metadata ?? {},
      };

      await this.saveEntry(entry);
      await this.cleanupOldEntries();

      this.logger.info(`Recorded operation: ${operation} (${entryId})`, { files: files.length });
      return entryId;
    } catch (error) {
      throw new FileOperationError(`Failed to record operation: ${error}`);
    }
  }

  private async createBackup(filePath: string, content: string, entryId: string, index: number): Promise<string> {
    try {
      const fileName = path.basename(filePath).replace(/[^a-zA-Z0-9.-]/g, '_');
      const backupPath = path.join(this.historyDir, `${entryId}_${index}_${fileName}.bak`);
      await fs.writeFile(backupPath, content, 'utf-8');
      return backupPath;
    } catch (error) {
      throw new FileOperationError(`Failed to create backup: ${error}`);
    }
  }

  private async saveEntry(entry: HistoryEntry): Promise<void> {
    try {
      const entryPath = path.join(this.historyDir, `${entry.id}.json`);
      await fs.writeFile(entryPath, JSON.stringify(entry, null, 2), 'utf-8');
    } catch (error) {
      throw new FileOperationError(`Failed to save history entry: ${error}`);
    }
  }

  private parseEntry(content: string): HistoryEntry {
    return HistoryEntrySchema.parse(JSON.parse(content));
  }

  async getHistory(limit?: number): Promise<HistoryEntry[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.historyDir);
    } catch {
      return [];
    }

    const entries: HistoryEntry[] = [];
    for (const file of files.filter(name => name.endsWith('.json'))) {
      try {
        const content = await fs.readFile(path.join(this.historyDir, file), 'utf-8');
        entries.push(this.parseEntry(content));
      } catch (error) {
        this.logger.warn(`Failed to read history entry ${file}: ${error}`);
      }
    }

    // Newest first
    entries.sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime());

    return limit ? entries.slice(0, limit) : entries;
  }

  async getEntry(entryId: string): Promise<HistoryEntry | null> {
    try {
      const entryPath = path.join(this.historyDir, `${entryId}.json`);
      const content = await fs.readFile(entryPath, 'utf-8');
      return this.parseEntry(content);
    } catch (error) {
      this.logger.warn(`Failed to get history entry ${entryId}: ${error}`);
      return null;
    }
  }

  /**
   * Restores every file of an entry to its recorded content. A file edited
   * since the run is left alone unless `force` is set.
   */
  async rollback(entryId: string, force: boolean = false): Promise<RollbackResult> {
    const entry = await this.getEntry(entryId);

    if (!entry) {
      return {
        success: false,
        filesRestored: [],
        errors: [`History entry ${entryId} not found`],
        entryId,
      };
    }

    const filesRestored: string[] = [];
    const errors: string[] = [];

    for (const file of entry.files) {
      try {
        const current = await fs.readFile(file.filePath, 'utf-8');
        if (!force && current !== file.contentAfter) {
          errors.push(`${file.filePath} has changed since ${entryId}; not restored`);
          continue;
        }

        const content =
          file.backup && (await this.fileExists(file.backup))
            ? await fs.readFile(file.backup, 'utf-8')
            : file.contentBefore;
        await fs.writeFile(file.filePath, content, 'utf-8');
        filesRestored.push(file.filePath);
        this.logger.debug(`Restored ${file.filePath}`);
      } catch (error) {
        errors.push(`Failed to restore ${file.filePath}: ${error}`);
      }
    }

    this.logger.info(`Rolled back operation ${entry.operation} (${entryId})`, {
      restored: filesRestored.length,
      errors: errors.length,
    });

    return {
      success: errors.length === 0,
      filesRestored,
      errors,
      entryId,
    };
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async deleteEntry(entryId: string): Promise<boolean> {
    const entry = await this.getEntry(entryId);
    if (!entry) {
      return false;
    }

    for (const file of entry.files) {
      if (file.backup && (await this.fileExists(file.backup))) {
        try {
          await fs.unlink(file.backup);
        } catch (error) {
          this.logger.warn(`Failed to delete backup ${file.backup}: ${error}`);
        }
      }
    }

    try {
      await fs.unlink(path.join(this.historyDir, `${entryId}.json`));
      this.logger.info(`Deleted history entry: ${entryId}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to delete entry ${entryId}: ${error}`);
      return false;
    }
  }

  private async cleanupOldEntries(): Promise<void> {
    const entries = await this.getHistory();
    if (entries.length <= this.maxEntries) {
      return;
    }

    const entriesToDelete = entries.slice(this.maxEntries);
    for (const entry of entriesToDelete) {
      await this.deleteEntry(entry.id);
    }
    this.logger.debug(`Cleaned up ${entriesToDelete.length} old history entries`);
  }

  generateHistoryReport(entries: HistoryEntry[]): string {
    let report = '# Rewrite History\n\n';

    if (entries.length === 0) {
      report += 'No rewrite runs recorded.\n';
      return report;
    }

    report += `- **Recorded runs:** ${entries.length}\n\n`;

    entries.slice(0, 10).forEach(entry => {
      report += `### ${entry.operation}\n`;
      report += `- **ID:** ${entry.id}\n`;
      report += `- **Tool:** ${entry.tool}\n`;
      report += `- **Date:** ${entry.timestamp}\n`;
      report += `- **Description:** ${entry.description}\n`;
      report += `- **Files affected:** ${entry.files.length}\n\n`;
    });

    if (entries.length > 10) {
      report += `... and ${entries.length - 10} more runs\n`;
    }

    return report;
  }
}
