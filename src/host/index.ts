// Host module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import type { HostConfig } from './config.js';
import { GitHubHost } from './github-host.js';
import { LocalHost } from './local-host.js';
import type { RepositoryHost } from './types.js';

export type { RepositoryHost } from './types.js';
export type { HostConfig, GitHubHostConfig } from './config.js';
export { HostConfigSchema } from './config.js';
export { GitHubHost } from './github-host.js';
export { LocalHost } from './local-host.js';
export { CommandFailedError, runCommand } from './command-runner.js';
export type { CommandRunner, CommandResult, RunOptions } from './command-runner.js';

/**
 * Create a repository host based on configuration.
 */
export function createRepositoryHost(config: HostConfig, logger: FastifyBaseLogger): RepositoryHost {
  switch (config.type) {
    case 'github':
      return new GitHubHost({ config: config.github, logger });
    case 'local':
      return new LocalHost(config.local.rootDir);
  }
}
