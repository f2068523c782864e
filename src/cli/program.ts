// Command surface: upload, download, ls, repos, init, clean.
//
// Commands print their result on stdout; logs go to stderr through pino.
// runCli() never exits the process itself, it returns the exit status.

import { readFile, rm } from 'node:fs/promises';
import { resolve } from 'node:path';

import { Command, CommanderError } from 'commander';
import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';

import { loadConfig, resolveConfigPath, type Config } from '../config/index.js';
import { createDrive, type Drive } from '../drive/index.js';
import { initSentry } from '../instrument.js';

import { EXIT_CODES, exitCodeFor } from './exit-codes.js';
import { humanSize } from './format.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io: CliIo;
  /** Aborts the running command (SIGINT) */
  signal?: AbortSignal;
  loadConfig(path?: string): Config;
  openDrive(config: Config): Promise<Drive>;
}

/** Pino logger writing to stderr, so stdout stays command output. */
export function createCliLogger(config: Config): FastifyBaseLogger {
  if (config.logging.pretty) {
    return pino({
      level: config.logging.level,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
      },
    });
  }
  return pino({ level: config.logging.level }, pino.destination(2));
}

export function defaultDeps(signal?: AbortSignal): CliDeps {
  return {
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
    signal,
    loadConfig: (path) => loadConfig(resolveConfigPath(path)),
    openDrive: async (config) => {
      const logger = createCliLogger(config);
      initSentry(config.sentry, logger);
      return createDrive(config, logger);
    },
  };
}

export function buildProgram(deps: CliDeps): Command {
  const { io, signal } = deps;
  const program = new Command();

  program
    .name('repodrive')
    .description('Store files as chunks spread over size-capped git repositories')
    .version('1.0.0')
    .option('-c, --config <path>', 'configuration file (default: $REPODRIVE_CONFIG or ./config/config.json)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const withDrive = async (fn: (drive: Drive) => Promise<void>): Promise<void> => {
    const config = deps.loadConfig(program.opts<{ config?: string }>().config);
    const drive = await deps.openDrive(config);
    try {
      await fn(drive);
    } finally {
      await drive.close();
    }
  };

  program
    .command('init')
    .description('Create the metadata repository and an empty snapshot if missing')
    .action(() =>
      withDrive(async (drive) => {
        const result = await drive.orchestrator.init({ signal });
        io.out(
          result.snapshotCreated ? 'Initialized empty drive' : 'Drive already initialized'
        );
      })
    );

  program
    .command('upload <remoteName> <localPath>')
    .description('Upload a local file under a new remote name')
    .action((remoteName: string, localPath: string) =>
      withDrive(async (drive) => {
        const data = await readFile(localPath);
        const file = await drive.orchestrator.upload(remoteName, data, { signal });
        io.out(`Uploaded ${file.name} (${humanSize(file.size)}, ${file.chunks.length} chunks)`);
      })
    );

  program
    .command('download <remoteName> <localPath>')
    .description('Download a remote file to a local path')
    .action((remoteName: string, localPath: string) =>
      withDrive(async (drive) => {
        const file = await drive.orchestrator.download(remoteName, localPath, { signal });
        io.out(`Downloaded ${file.name} to ${resolve(localPath)} (${humanSize(file.size)})`);
      })
    );

  program
    .command('ls')
    .description('List stored files')
    .action(() =>
      withDrive(async (drive) => {
        const files = await drive.orchestrator.ls({ signal });
        if (files.length === 0) {
          io.out('No files');
          return;
        }
        for (const file of files) {
          io.out(`${file.name} ${humanSize(file.size)}`);
        }
      })
    );

  program
    .command('repos')
    .description('List data repositories with usage')
    .action(() =>
      withDrive(async (drive) => {
        const repositories = await drive.orchestrator.repositories({ signal });
        if (repositories.length === 0) {
          io.out('No repositories');
          return;
        }
        for (const repo of repositories) {
          io.out(
            `${repo.name} ${humanSize(repo.committedBytes)} / ${humanSize(repo.ceilingBytes)} ${repo.status}`
          );
        }
      })
    );

  program
    .command('clean')
    .description('Remove local working copies left behind by interrupted runs')
    .action(async () => {
      const config = deps.loadConfig(program.opts<{ config?: string }>().config);
      const workDir = resolve(config.drive.workDir);
      await rm(workDir, { recursive: true, force: true });
      io.out(`Removed ${workDir}`);
    });

  return program;
}

/**
 * Run the CLI with `argv` (user arguments only, without node and script)
 * and return the process exit status.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output end in a CommanderError with exit code 0
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE;
    }
    deps.io.err(`error: ${error instanceof Error ? error.message : String(error)}`);
    return exitCodeFor(error);
  }
}
