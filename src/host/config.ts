import { z } from 'zod';

/**
 * Repository host configuration.
 *
 * `github` drives the `git` and `gh` command-line tools against a hosted
 * account; `local` keeps every repository as a plain directory under
 * `rootDir` and is used for development and tests.
 *
 * SECURITY: `github.sshKeyPath` points at a private key. The path is passed
 * to git through GIT_SSH_COMMAND and is never logged.
 */
export const HostConfigSchema = z
  .discriminatedUnion('type', [
    z.object({
      type: z.literal('github'),
      github: z.object({
        /** Account (user or organisation) that owns every repository */
        account: z.string().regex(/^[A-Za-z0-9-]+$/, 'Invalid account name'),
        /** Private key used for git over SSH (sensitive - never log) */
        sshKeyPath: z.string().optional(),
        visibility: z.enum(['private', 'public', 'internal']).default('private'),
        branch: z.string().min(1).default('main'),
        sshHost: z.string().min(1).default('github.com'),
        gitBinary: z.string().min(1).default('git'),
        ghBinary: z.string().min(1).default('gh'),
        /** Hard timeout for a single git or gh invocation */
        commandTimeoutMs: z.number().int().min(1000).default(300_000),
        committerName: z.string().min(1).default('repodrive'),
        committerEmail: z.string().min(1).default('repodrive@localhost'),
      }),
    }),
    z.object({
      type: z.literal('local'),
      local: z
        .object({
          rootDir: z.string().min(1).default('./data/repositories'),
        })
        .default(() => ({ rootDir: './data/repositories' })),
    }),
  ])
  .default(() => ({ type: 'local' as const, local: { rootDir: './data/repositories' } }));

export type HostConfig = z.infer<typeof HostConfigSchema>;
export type GitHubHostConfig = Extract<HostConfig, { type: 'github' }>['github'];
