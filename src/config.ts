/**
 * Configuration for Rebinder, read from the environment.
 */

import * as path from 'path';
import { z } from 'zod';
import type { UnterminatedPolicy } from './analyzers/region-locator.js';
import type { DiscoveryMode } from './orchestrator/discovery.js';
import { DEFAULT_NAMING_FILE } from './resolver/naming-registry.js';
import { ConfigurationError, formatZodError } from './utils/errors.js';
import type { ReportOrder } from './utils/lint-report.js';
import type { LogLevel } from './utils/logger.js';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true' || value === '1'));

const positiveInt = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .optional()
    .transform(value => (value === undefined ? fallback : parseInt(value, 10)))
    .refine(value => value > 0, 'must be a positive integer');

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  REBINDER_ROOT: z.string().min(1).optional(),
  REBINDER_DISCOVERY: z.enum(['lint', 'manifest', 'scan']).default('lint'),
  REBINDER_MANIFEST: z.string().min(1).optional(),
  REBINDER_LINT_COMMAND: z.string().min(1).default('mix credo --strict'),
  REBINDER_LINT_TIMEOUT_MS: positiveInt(300_000),
  REBINDER_REPORT_ORDER: z.enum(['location-first', 'message-first']).default('location-first'),
  REBINDER_SCAN_GLOB: z.string().min(1).default('lib/**/*.ex'),
  REBINDER_VERIFY: flag(true),
  REBINDER_DRY_RUN: flag(false),
  REBINDER_BACKUPS: flag(true),
  REBINDER_UNBOUNDED_NAMES: flag(true),
  REBINDER_UNTERMINATED: z.enum(['extend', 'error']).default('extend'),
  REBINDER_NAMING_FILE: z.string().min(1).optional(),
  REBINDER_HISTORY_LIMIT: positiveInt(50),
});

export interface RebinderConfig {
  logLevel: LogLevel;
  rootDir: string;
  discovery: DiscoveryMode;
  manifestPath?: string;
  lintCommand: string;
  lintTimeoutMs: number;
  reportOrder: ReportOrder;
  scanGlob: string;
  verify: boolean;
  dryRun: boolean;
  backups: boolean;
  unboundedNames: boolean;
  onUnterminated: UnterminatedPolicy;
  namingFile: string;
  historyLimit: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): RebinderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  const values = parsed.data;

  if (values.REBINDER_DISCOVERY === 'manifest' && !values.REBINDER_MANIFEST) {
    throw new ConfigurationError('REBINDER_MANIFEST is required when REBINDER_DISCOVERY=manifest');
  }

  const rootDir = path.resolve(cwd, values.REBINDER_ROOT ?? '.');

  return {
    logLevel: values.LOG_LEVEL,
    rootDir,
    discovery: values.REBINDER_DISCOVERY,
    ...(values.REBINDER_MANIFEST ? { manifestPath: path.resolve(rootDir, values.REBINDER_MANIFEST) } : {}),
    lintCommand: values.REBINDER_LINT_COMMAND,
    lintTimeoutMs: values.REBINDER_LINT_TIMEOUT_MS,
    reportOrder: values.REBINDER_REPORT_ORDER,
    scanGlob: values.REBINDER_SCAN_GLOB,
    verify: values.REBINDER_VERIFY,
    dryRun: values.REBINDER_DRY_RUN,
    backups: values.REBINDER_BACKUPS,
    unboundedNames: values.REBINDER_UNBOUNDED_NAMES,
    onUnterminated: values.REBINDER_UNTERMINATED,
    namingFile: values.REBINDER_NAMING_FILE ? path.resolve(rootDir, values.REBINDER_NAMING_FILE) : DEFAULT_NAMING_FILE,
    historyLimit: values.REBINDER_HISTORY_LIMIT,
  };
}
