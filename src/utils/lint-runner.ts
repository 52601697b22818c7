/**
 * Lint Runner for Rebinder
 *
 * Runs the project's lint command and counts the redeclaration diagnostics
 * left in its output.
 */

import { exec } from 'child_process';
import { LintToolError } from './errors.js';
import { countRedeclarations } from './lint-report.js';
import type { Logger } from './logger.js';

export interface CommandOutcome {
  stdout: string;
  stderr: string;
  /** Exit status, or null when the process was killed or never started. */
  exitCode: number | null;
  timedOut: boolean;
  /** Set when the command could not be started at all. */
  spawnError?: Error;
  /** Set when the output outgrew the buffer and the process was killed. */
  outputOverflow?: boolean;
}

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

export type CommandExecutor = (command: string, options: CommandOptions) => Promise<CommandOutcome>;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const MAX_BUFFER_ERROR_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

// Shell statuses for "cannot execute" and "not found"
const NOT_RUNNABLE_EXIT_CODES = new Set([126, 127]);

type ExecFailure = Error & { code?: unknown; killed?: boolean };

/** Maps the result of `child_process.exec` to a {@link CommandOutcome}. */
export function outcomeFromExec(error: ExecFailure | null, stdout: string, stderr: string): CommandOutcome {
  if (!error) {
    return { stdout, stderr, exitCode: 0, timedOut: false };
  }
  // exec kills the child once output passes maxBuffer
  if (error.code === MAX_BUFFER_ERROR_CODE) {
    return { stdout, stderr, exitCode: null, timedOut: false, outputOverflow: true };
  }
  const exitCode = typeof error.code === 'number' ? error.code : null;
  return {
    stdout,
    stderr,
    exitCode,
    timedOut: error.killed === true && exitCode === null,
    ...(exitCode === null && !error.killed ? { spawnError: error } : {}),
  };
}

export const shellExecutor: CommandExecutor = (command, options) =>
  new Promise(resolve => {
    exec(
      command,
      { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf-8' },
      (error, stdout, stderr) => resolve(outcomeFromExec(error, stdout, stderr))
    );
  });

export interface LintRunnerOptions {
  command: string;
  cwd: string;
  timeoutMs: number;
}

export interface LintRun {
  output: string;
  exitCode: number | null;
  violations: number;
  durationMs: number;
}

export class LintRunner {
  constructor(
    private logger: Logger,
    private options: LintRunnerOptions,
    private executor: CommandExecutor = shellExecutor
  ) {}

  /** Combined stdout and stderr of one lint run. */
  async run(): Promise<LintRun> {
    const { command, cwd, timeoutMs } = this.options;
    const startedAt = Date.now();
    this.logger.info(`Running lint command: ${command}`, { cwd, timeoutMs });

    const outcome = await this.executor(command, { cwd, timeoutMs });
    const output = `${outcome.stdout}${outcome.stderr}`;

    if (outcome.spawnError) {
      throw new LintToolError(`Could not start "${command}": ${outcome.spawnError.message}`, output);
    }
    if (outcome.outputOverflow) {
      throw new LintToolError(`"${command}" produced more than ${MAX_OUTPUT_BYTES} bytes of output`, output);
    }
    if (outcome.timedOut) {
      throw new LintToolError(`"${command}" did not finish within ${timeoutMs}ms`, output);
    }
    if (outcome.exitCode === null) {
      throw new LintToolError(`"${command}" was terminated before it finished`, output);
    }
    if (NOT_RUNNABLE_EXIT_CODES.has(outcome.exitCode)) {
      throw new LintToolError(`"${command}" could not be executed (exit ${outcome.exitCode})`, output);
    }

    // Lint tools exit non-zero whenever they report issues
    const violations = countRedeclarations(output);
    const durationMs = Date.now() - startedAt;
    this.logger.info('Lint command finished', { exitCode: outcome.exitCode, violations, durationMs });

    return { output, exitCode: outcome.exitCode, violations, durationMs };
  }

  /** Number of redeclaration diagnostics the lint tool still reports. */
  async verify(): Promise<number> {
    const run = await this.run();
    return run.violations;
  }
}
