import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DiscoveryError } from '../utils/errors.js';
import { FileOperations } from '../utils/file-operations.js';
import { LintReportParser } from '../utils/lint-report.js';
import { LintRunner, type CommandExecutor } from '../utils/lint-runner.js';
import { Logger } from '../utils/logger.js';
import { countPairs, Discovery, parseManifest } from './discovery.js';

const logger = new Logger('error', () => {});

const respond =
  (stdout: string, exitCode: number | null = 0): CommandExecutor =>
  async () => ({ stdout, stderr: '', exitCode, timedOut: false });

describe('parseManifest', () => {
  it('merges duplicate identifiers per file', () => {
    const map = parseManifest({ files: { 'lib/a.ex': ['alerts', 'alerts', 'factors'], 'lib/b.ex': ['gaps'] } });
    expect([...map.entries()].map(([file, names]) => [file, [...names]])).toEqual([
      ['lib/a.ex', ['alerts', 'factors']],
      ['lib/b.ex', ['gaps']],
    ]);
    expect(countPairs(map)).toBe(3);
  });

  it('rejects empty lists and non-variable names', () => {
    expect(() => parseManifest({ files: { 'lib/a.ex': [] } })).toThrow(DiscoveryError);
    expect(() => parseManifest({ files: { 'lib/a.ex': ['Alerts'] } })).toThrow(/not a variable name/);
    expect(() => parseManifest([])).toThrow(DiscoveryError);
  });
});

describe('Discovery', () => {
  let root: string;
  let fileOps: FileOperations;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rebinder-discovery-'));
    fileOps = new FileOperations(logger, root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reads a manifest file', async () => {
    fs.writeFileSync(path.join(root, 'pairs.json'), JSON.stringify({ files: { 'lib/a.ex': ['alerts'] } }));
    const discovery = new Discovery(
      { fileOps, logger },
      { mode: 'manifest', manifestPath: path.join(root, 'pairs.json'), scanGlob: 'lib/**/*.ex' }
    );

    const map = await discovery.discover();
    expect([...(map.get('lib/a.ex') ?? [])]).toEqual(['alerts']);
  });

  it('fails when the manifest is missing or malformed', async () => {
    const missing = new Discovery({ fileOps, logger }, { mode: 'manifest', manifestPath: 'none.json', scanGlob: '' });
    await expect(missing.discover()).rejects.toThrow(DiscoveryError);

    fs.writeFileSync(path.join(root, 'bad.json'), '{"files":');
    const malformed = new Discovery({ fileOps, logger }, { mode: 'manifest', manifestPath: 'bad.json', scanGlob: '' });
    await expect(malformed.discover()).rejects.toThrow(DiscoveryError);

    const unset = new Discovery({ fileOps, logger }, { mode: 'manifest', scanGlob: '' });
    await expect(unset.discover()).rejects.toThrow(/needs a manifest path/);
  });

  it('collects pairs from the lint report', async () => {
    const output = [
      'lib/a.ex:4:5 W: warning',
      'Variable "alerts" was declared more than once.',
      'lib/a.ex:9:5 W: warning',
      'Variable "gaps" was declared more than once.',
      'lib/b.ex:2:3 W: warning',
      'Variable "alerts" was declared more than once.',
    ].join('\n');
    const discovery = new Discovery(
      {
        fileOps,
        logger,
        lintRunner: new LintRunner(logger, { command: 'lint', cwd: root, timeoutMs: 1000 }, respond(output, 1)),
        reportParser: new LintReportParser(logger),
      },
      { mode: 'lint', scanGlob: '' }
    );

    const map = await discovery.discover();
    expect([...map.entries()].map(([file, names]) => [file, [...names]])).toEqual([
      ['lib/a.ex', ['alerts', 'gaps']],
      ['lib/b.ex', ['alerts']],
    ]);
  });

  it('fails when the lint command cannot run', async () => {
    const discovery = new Discovery(
      {
        fileOps,
        logger,
        lintRunner: new LintRunner(logger, { command: 'lint', cwd: root, timeoutMs: 1000 }, respond('', 127)),
        reportParser: new LintReportParser(logger),
      },
      { mode: 'lint', scanGlob: '' }
    );

    await expect(discovery.discover()).rejects.toThrow(DiscoveryError);
  });

  it('scans sources for rebound variables', async () => {
    fs.mkdirSync(path.join(root, 'lib/nested'), { recursive: true });
    fs.writeFileSync(
      path.join(root, 'lib/nested/a.ex'),
      ['def a do', '  risks = []', '  risks = [1 | risks]', '  risks', 'end'].join('\n')
    );
    fs.writeFileSync(path.join(root, 'lib/b.ex'), ['def b do', '  x = 1', '  x', 'end'].join('\n'));

    const discovery = new Discovery({ fileOps, logger }, { mode: 'scan', scanGlob: 'lib/**/*.ex' });
    const map = await discovery.discover();

    expect([...map.keys()]).toEqual(['lib/nested/a.ex']);
    expect([...(map.get('lib/nested/a.ex') ?? [])]).toEqual(['risks']);
  });
});
