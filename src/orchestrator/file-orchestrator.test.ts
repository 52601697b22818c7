import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NamingRegistry } from '../resolver/naming-registry.js';
import { RebindingResolver } from '../resolver/rebinding-resolver.js';
import { FileOperations } from '../utils/file-operations.js';
import { HISTORY_DIR_NAME, HistoryManager } from '../utils/history-manager.js';
import { Logger } from '../utils/logger.js';
import { FileOrchestrator } from './file-orchestrator.js';

const logger = new Logger('error', () => {});
const resolver = new RebindingResolver(NamingRegistry.fromFile(), logger);

const rebound = ['def c do', '  scratch = 1', '  scratch = scratch * 2', '  scratch', 'end', ''].join('\n');
const rewritten = ['def c do', '  initial_scratch = 1', '  base_scratch = initial_scratch * 2', '  base_scratch', 'end', ''].join('\n');
const clean = ['def d do', '  value = 1', '  value', 'end', ''].join('\n');

describe('FileOrchestrator', () => {
  let root: string;
  let fileOps: FileOperations;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rebinder-orchestrator-'));
    fs.mkdirSync(path.join(root, 'lib'));
    fs.writeFileSync(path.join(root, 'lib/rebound.ex'), rebound);
    fs.writeFileSync(path.join(root, 'lib/clean.ex'), clean);
    fileOps = new FileOperations(logger, root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes a file only when its text changed', async () => {
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger);

    expect(await orchestrator.process('lib/rebound.ex', ['scratch'])).toBe(true);
    expect(await orchestrator.process('lib/clean.ex', ['value'])).toBe(false);

    expect(fs.readFileSync(path.join(root, 'lib/rebound.ex'), 'utf-8')).toBe(rewritten);
    expect(fs.readFileSync(path.join(root, 'lib/clean.ex'), 'utf-8')).toBe(clean);
  });

  it('reports an unreadable file as unchanged and carries on', async () => {
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger);
    const summary = await orchestrator.processBatch(
      new Map([
        ['lib/missing.ex', new Set(['scratch'])],
        ['lib/rebound.ex', new Set(['scratch'])],
      ])
    );

    expect(summary).toMatchObject({ filesScanned: 2, filesChanged: 1, filesFailed: 1, pairsRewritten: 1, pairsSkipped: 0 });
    expect(summary.results[0]?.changed).toBe(false);
    expect(summary.results[0]?.error).toMatch(/Failed to read file/);
  });

  it('computes changes without writing in a dry run', async () => {
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger, { dryRun: true });
    const result = await orchestrator.processFile('lib/rebound.ex', ['scratch']);

    expect(result.changed).toBe(true);
    expect(result.after).toBe(rewritten);
    expect(fs.readFileSync(path.join(root, 'lib/rebound.ex'), 'utf-8')).toBe(rebound);
  });

  it('counts nested pairs as skipped', async () => {
    fs.writeFileSync(
      path.join(root, 'lib/nested.ex'),
      ['def n(x) do', '  acc = []', '  if x do', '    acc = [1 | acc]', '  end', '  acc', 'end'].join('\n')
    );
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger);
    const summary = await orchestrator.processBatch(new Map([['lib/nested.ex', new Set(['acc'])]]));

    expect(summary).toMatchObject({ filesChanged: 0, pairsRewritten: 0, pairsSkipped: 1 });
  });

  it('records a history entry that can be rolled back', async () => {
    const history = new HistoryManager(logger, root);
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger, { history });

    const summary = await orchestrator.processBatch(new Map([['lib/rebound.ex', new Set(['scratch'])]]));
    expect(summary.historyEntryId).toBeDefined();

    const entry = await history.getEntry(summary.historyEntryId ?? '');
    expect(entry?.files.map(file => file.filePath)).toEqual([path.join(root, 'lib/rebound.ex')]);

    const rollback = await history.rollback(summary.historyEntryId ?? '');
    expect(rollback.success).toBe(true);
    expect(fs.readFileSync(path.join(root, 'lib/rebound.ex'), 'utf-8')).toBe(rebound);
  });

  it('keeps the rewrites when the history snapshot cannot be written', async () => {
    fs.writeFileSync(path.join(root, HISTORY_DIR_NAME), 'not a directory');
    const history = new HistoryManager(logger, root);
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger, { history });

    const summary = await orchestrator.processBatch(new Map([['lib/rebound.ex', new Set(['scratch'])]]));

    expect(summary).toMatchObject({ filesChanged: 1, filesFailed: 0, pairsRewritten: 1 });
    expect(summary.historyEntryId).toBeUndefined();
    expect(summary.historyError).toMatch(/^Failed to record operation/);
    expect(fs.readFileSync(path.join(root, 'lib/rebound.ex'), 'utf-8')).toBe(rewritten);
  });

  it('records nothing when no file changed', async () => {
    const history = new HistoryManager(logger, root);
    const orchestrator = new FileOrchestrator(fileOps, resolver, logger, { history });

    const summary = await orchestrator.processBatch(new Map([['lib/clean.ex', new Set(['value'])]]));

    expect(summary.historyEntryId).toBeUndefined();
    expect(await history.getHistory()).toEqual([]);
  });
});
