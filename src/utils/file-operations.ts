/**
 * File Operations Utilities for Rebinder
 *
 * Whole-file reads and writes rooted at the project directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { FileOperationError } from './errors.js';
import type { Logger } from './logger.js';

export class FileOperations {
  constructor(
    private logger: Logger,
    private rootDir: string = process.cwd()
  ) {}

  getRoot(): string {
    return this.rootDir;
  }

  resolve(filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.join(this.rootDir, filePath);
  }

  relative(filePath: string): string {
    return path.relative(this.rootDir, this.resolve(filePath)).split(path.sep).join('/');
  }

  async readFile(filePath: string): Promise<string> {
    const absolute = this.resolve(filePath);
    try {
      const content = await fs.readFile(absolute, 'utf-8');
      this.logger.debug(`Read file: ${absolute}`, { size: content.length });
      return content;
    } catch (error) {
      throw new FileOperationError(`Failed to read file ${absolute}: ${error}`);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const absolute = this.resolve(filePath);
    try {
      await this.ensureDirectoryExists(path.dirname(absolute));
      await fs.writeFile(absolute, content, 'utf-8');
      this.logger.debug(`Wrote file: ${absolute}`, { size: content.length });
    } catch (error) {
      if (error instanceof FileOperationError) {
        throw error;
      }
      throw new FileOperationError(`Failed to write file ${absolute}: ${error}`);
    }
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(filePath));
      return true;
    } catch {
      return false;
    }
  }

  async ensureDirectoryExists(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw new FileOperationError(`Failed to create directory ${dirPath}: ${error}`);
    }
  }

  /** Root-relative, `/`-separated paths matching `pattern`, sorted. */
  async findFiles(pattern: string): Promise<string[]> {
    try {
      const files = await glob(pattern, {
        cwd: this.rootDir,
        nodir: true,
        posix: true,
        ignore: ['**/node_modules/**', '**/_build/**', '**/deps/**', '**/.git/**'],
      });
      this.logger.debug(`Found ${files.length} files matching pattern: ${pattern}`);
      return files.sort();
    } catch (error) {
      throw new FileOperationError(`Failed to find files with pattern ${pattern}: ${error}`);
    }
  }
}
