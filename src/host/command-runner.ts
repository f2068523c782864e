// Child-process wrapper for the git and gh command-line tools.

import { execFile } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

/** Signature of a command runner; swapped for a fake in tests. */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandResult>;

/**
 * A command exited non-zero, timed out or could not be spawned.
 * `stderr` is kept so the transfer classifier can recognise throttling.
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly code: string | undefined;

  constructor(options: {
    command: string;
    exitCode: number | null;
    stderr: string;
    code?: string;
    message?: string;
  }) {
    const detail = options.stderr.trim() || options.message || 'no output';
    super(`Command failed (${options.command}): ${detail}`);
    this.name = 'CommandFailedError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
    this.code = options.code;
  }
}

const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/**
 * Run a binary without a shell. Arguments are passed verbatim, so repository
 * names and paths never go through shell interpolation.
 */
export const runCommand: CommandRunner = (file, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeoutMs,
        maxBuffer: MAX_BUFFER_BYTES,
        encoding: 'utf-8',
      },
      (error, stdout, stderr) => {
        if (error) {
          const errno = typeof error.code === 'string' ? error.code : undefined;
          const exitCode = typeof error.code === 'number' ? error.code : null;
          reject(
            new CommandFailedError({
              command: `${file} ${args[0] ?? ''}`.trim(),
              exitCode,
              stderr,
              // A killed process (timeout) surfaces as ETIMEDOUT for the classifier
              code: error.killed ? 'ETIMEDOUT' : errno,
              message: error.message,
            })
          );
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });
