import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { HISTORY_DIR_NAME, HistoryManager } from './history-manager.js';
import { Logger } from './logger.js';

const logger = new Logger('error', () => {});

describe('HistoryManager', () => {
  let root: string;
  let file: string;
  let history: HistoryManager;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rebinder-history-'));
    file = path.join(root, 'a.ex');
    fs.writeFileSync(file, 'after');
    history = new HistoryManager(logger, root, 2);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const record = () =>
    history.recordOperation('rebinder', 'rebind', 'test run', [
      { filePath: file, contentBefore: 'before', contentAfter: 'after' },
    ]);

  it('returns nothing before the first run', async () => {
    expect(await history.getHistory()).toEqual([]);
  });

  it('records an entry with a backup', async () => {
    const id = await record();
    const entry = await history.getEntry(id);

    expect(history.getDirectory()).toBe(path.join(root, HISTORY_DIR_NAME));
    expect(entry?.description).toBe('test run');
    expect(fs.readFileSync(entry?.files[0]?.backup ?? '', 'utf-8')).toBe('before');
  });

  it('restores recorded content', async () => {
    const id = await record();
    const result = await history.rollback(id);

    expect(result).toEqual({ success: true, filesRestored: [file], errors: [], entryId: id });
    expect(fs.readFileSync(file, 'utf-8')).toBe('before');
  });

  it('leaves files edited since the run unless forced', async () => {
    const id = await record();
    fs.writeFileSync(file, 'edited');

    const refused = await history.rollback(id);
    expect(refused.success).toBe(false);
    expect(fs.readFileSync(file, 'utf-8')).toBe('edited');

    const forced = await history.rollback(id, true);
    expect(forced.success).toBe(true);
    expect(fs.readFileSync(file, 'utf-8')).toBe('before');
  });

  it('reports an unknown entry', async () => {
    const result = await history.rollback('missing');
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['History entry missing not found']);
  });

  it('keeps at most the configured number of entries', async () => {
    await record();
    await record();
    await record();
    expect(await history.getHistory()).toHaveLength(2);
  });

  it('renders a report', async () => {
    expect(history.generateHistoryReport([])).toBe('# Rewrite History\n\nNo rewrite runs recorded.\n');

    const id = await record();
    const report = history.generateHistoryReport(await history.getHistory());
    expect(report).toContain(`- **ID:** ${id}\n`);
  });
});
