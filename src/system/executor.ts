/**
 * Command Executor
 *
 * Spawns external programs (wg, systemctl, useradd, ...) without a shell and
 * captures their output.
 */

import { spawn } from 'node:child_process';

import { ExternalCommandError } from '../core/errors.js';
import { formatCommand, supportsAnsi } from '../lib/verbose.js';

/**
 * Result of running an external command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Options for running a command
 */
export interface RunOptions {
  /** Data written to the program's stdin */
  input?: string;
  /** Working directory */
  cwd?: string;
}

/**
 * Capability for running external programs.
 *
 * `run` resolves with the exit status whatever it is and rejects only when
 * the program cannot be started.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Options for constructing an ExecCommandRunner
 */
export interface ExecCommandRunnerOptions {
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Runs commands with child_process.spawn.
 */
export class ExecCommandRunner implements CommandRunner {
  private readonly verbose: boolean;

  constructor(options?: ExecCommandRunnerOptions) {
    this.verbose = options?.verbose ?? false;
  }

  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    if (this.verbose) {
      process.stderr.write(formatCommand(command, args, supportsAnsi()));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error: Error) => {
        reject(
          new ExternalCommandError(
            `Failed to start ${command}: ${error.message}`,
            command,
            args,
            null,
            stdout,
            stderr,
            error
          )
        );
      });

      child.on('close', (code: number | null) => {
        resolve({ stdout, stderr, exitCode: code ?? -1 });
      });

      // EPIPE when the program exits before reading stdin
      child.stdin.on('error', () => undefined);
      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    });
  }
}

/**
 * Strip ANSI escape codes and carriage returns.
 */
function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Build a short failure message from captured stderr.
 */
export function formatFailureMessage(
  command: string,
  args: readonly string[],
  result: CommandResult
): string {
  const lines = stripAnsiCodes(result.stderr)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, 3);

  const invocation = [command, ...args].join(' ');
  if (lines.length > 0) {
    return `${invocation} failed (exit ${result.exitCode}): ${lines.join(' | ')}`;
  }
  return `${invocation} failed with exit code ${result.exitCode}`;
}

/**
 * Run a command and reject with ExternalCommandError on a non-zero exit.
 *
 * @returns The command result, exit code 0
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new ExternalCommandError(
      formatFailureMessage(command, args, result),
      command,
      args,
      result.exitCode,
      result.stdout,
      result.stderr
    );
  }
  return result;
}

/**
 * Check whether a program is on PATH.
 */
export async function commandExists(runner: CommandRunner, command: string): Promise<boolean> {
  try {
    const result = await runner.run('which', [command]);
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
