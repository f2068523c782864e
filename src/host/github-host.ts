// GitHub repository host driven through the git and gh command-line tools.
//
// Authentication is whatever gh and the SSH agent already hold; the only
// credential this module touches is the optional SSH key path, which is
// handed to git through GIT_SSH_COMMAND for its own child processes.

import type { FastifyBaseLogger } from 'fastify';

import type { GitHubHostConfig } from './config.js';
import { CommandFailedError, type CommandRunner, runCommand } from './command-runner.js';
import type { RepositoryHost } from './types.js';

/** gh's wording when `repo view` targets a missing repository */
const NOT_FOUND_PATTERN = /could not resolve to a repository|not found/i;

export class GitHubHost implements RepositoryHost {
  readonly kind = 'github';
  private readonly config: GitHubHostConfig;
  private readonly run: CommandRunner;
  private readonly log: FastifyBaseLogger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: { config: GitHubHostConfig; logger: FastifyBaseLogger; run?: CommandRunner }) {
    this.config = options.config;
    this.log = options.logger;
    this.run = options.run ?? runCommand;
    this.env = {
      ...process.env,
      // Never block on a credential prompt
      GIT_TERMINAL_PROMPT: '0',
      ...(options.config.sshKeyPath && {
        GIT_SSH_COMMAND: `ssh -i ${options.config.sshKeyPath} -o IdentitiesOnly=yes`,
      }),
    };
  }

  async exists(name: string): Promise<boolean> {
    try {
      await this.gh(['repo', 'view', this.slug(name), '--json', 'name']);
      return true;
    } catch (error) {
      if (error instanceof CommandFailedError && NOT_FOUND_PATTERN.test(error.stderr)) {
        return false;
      }
      throw error;
    }
  }

  async create(name: string): Promise<void> {
    await this.gh(['repo', 'create', this.slug(name), `--${this.config.visibility}`]);
    this.log.info({ repository: name }, 'Repository created on GitHub');
  }

  async checkout(name: string, dir: string): Promise<void> {
    await this.git(['clone', '--quiet', this.remoteUrl(name), dir]);
  }

  async commit(dir: string, message: string): Promise<boolean> {
    await this.git(['add', '--all'], dir);
    const status = await this.git(['status', '--porcelain'], dir);
    if (status.stdout.trim().length === 0) {
      return false;
    }
    await this.git(
      [
        '-c',
        `user.name=${this.config.committerName}`,
        '-c',
        `user.email=${this.config.committerEmail}`,
        'commit',
        '--quiet',
        '-m',
        message,
      ],
      dir
    );
    return true;
  }

  async push(_name: string, dir: string): Promise<void> {
    // HEAD:<branch> also covers freshly created repositories whose clone has no branch yet
    await this.git(['push', '--quiet', 'origin', `HEAD:${this.config.branch}`], dir);
  }

  async healthy(): Promise<boolean> {
    try {
      await this.gh(['auth', 'status']);
      return true;
    } catch {
      return false;
    }
  }

  private slug(name: string): string {
    return `${this.config.account}/${name}`;
  }

  private remoteUrl(name: string): string {
    return `git@${this.config.sshHost}:${this.config.account}/${name}.git`;
  }

  private git(args: string[], cwd?: string) {
    return this.run(this.config.gitBinary, args, {
      cwd,
      env: this.env,
      timeoutMs: this.config.commandTimeoutMs,
    });
  }

  private gh(args: string[]) {
    return this.run(this.config.ghBinary, args, {
      env: this.env,
      timeoutMs: this.config.commandTimeoutMs,
    });
  }
}
