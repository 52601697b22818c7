/**
 * Discovery of (file, identifier) pairs to fix
 *
 * Every source normalises to a map of root-relative path → identifiers.
 */

import { z } from 'zod';
import { findRebound } from '../analyzers/assignment-scanner.js';
import { locate } from '../analyzers/region-locator.js';
import { DiscoveryError, formatZodError } from '../utils/errors.js';
import type { FileOperations } from '../utils/file-operations.js';
import type { LintReportParser } from '../utils/lint-report.js';
import type { LintRunner } from '../utils/lint-runner.js';
import type { Logger } from '../utils/logger.js';

export type DiscoveryMode = 'manifest' | 'lint' | 'scan';

export type DiscoveryMap = Map<string, Set<string>>;

const IdentifierSchema = z.string().regex(/^[a-z_][A-Za-z0-9_]*[?!]?$/, 'not a variable name');

export const ManifestSchema = z.object({
  files: z.record(z.string().min(1), z.array(IdentifierSchema).min(1)),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export function manifestToMap(manifest: Manifest): DiscoveryMap {
  const map: DiscoveryMap = new Map();
  for (const [file, identifiers] of Object.entries(manifest.files)) {
    const existing = map.get(file) ?? new Set<string>();
    identifiers.forEach(identifier => existing.add(identifier));
    map.set(file, existing);
  }
  return map;
}

export function parseManifest(raw: unknown, source = 'manifest'): DiscoveryMap {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DiscoveryError(`Invalid ${source}: ${formatZodError(parsed.error)}`);
  }
  return manifestToMap(parsed.data);
}

export function countPairs(map: DiscoveryMap): number {
  let pairs = 0;
  map.forEach(identifiers => {
    pairs += identifiers.size;
  });
  return pairs;
}

export interface DiscoveryDeps {
  fileOps: FileOperations;
  logger: Logger;
  lintRunner?: LintRunner;
  reportParser?: LintReportParser;
}

export interface DiscoverySettings {
  mode: DiscoveryMode;
  manifestPath?: string;
  scanGlob: string;
}

export class Discovery {
  constructor(
    private deps: DiscoveryDeps,
    private settings: DiscoverySettings
  ) {}

  async discover(): Promise<DiscoveryMap> {
    const { logger } = this.deps;
    logger.info(`Discovering rebound variables (${this.settings.mode})`);

    const map = await this.fromSource();
    logger.info('Discovery complete', { files: map.size, pairs: countPairs(map) });
    return map;
  }

  private fromSource(): Promise<DiscoveryMap> {
    switch (this.settings.mode) {
      case 'manifest':
        return this.fromManifest();
      case 'lint':
        return this.fromLint();
      case 'scan':
        return this.fromScan();
    }
  }

  private async fromManifest(): Promise<DiscoveryMap> {
    const { manifestPath } = this.settings;
    if (!manifestPath) {
      throw new DiscoveryError('Manifest discovery needs a manifest path');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await this.deps.fileOps.readFile(manifestPath));
    } catch (error) {
      throw new DiscoveryError(`Could not load manifest ${manifestPath}: ${error instanceof Error ? error.message : error}`);
    }
    return parseManifest(raw, `manifest ${manifestPath}`);
  }

  private async fromLint(): Promise<DiscoveryMap> {
    const { lintRunner, reportParser } = this.deps;
    if (!lintRunner || !reportParser) {
      throw new DiscoveryError('Lint discovery needs a lint runner and a report parser');
    }

    try {
      const run = await lintRunner.run();
      return reportParser.group(reportParser.parse(run.output));
    } catch (error) {
      throw new DiscoveryError(`Lint discovery failed: ${error instanceof Error ? error.message : error}`);
    }
  }

  private async fromScan(): Promise<DiscoveryMap> {
    const { fileOps, logger } = this.deps;
    let files: string[];
    try {
      files = await fileOps.findFiles(this.settings.scanGlob);
    } catch (error) {
      throw new DiscoveryError(`Scan discovery failed: ${error instanceof Error ? error.message : error}`);
    }

    const map: DiscoveryMap = new Map();
    for (const file of files) {
      try {
        const content = await fileOps.readFile(file);
        const identifiers = new Set<string>();
        for (const region of locate(content)) {
          findRebound(region).forEach(identifier => identifiers.add(identifier));
        }
        if (identifiers.size > 0) {
          map.set(file, identifiers);
        }
      } catch (error) {
        logger.warn(`Skipping ${file} during scan`, error);
      }
    }
    return map;
  }
}
