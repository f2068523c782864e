// Repository allocation and provisioning.
//
// First-fit over the registry in creation order; when no OPEN repository can
// take the chunk a new one is provisioned, registered in the operation's
// snapshot view, and reserved from. The registry inside the snapshot is the
// only record of repositories: the pool keeps no copy of its own.

import type { FastifyBaseLogger } from 'fastify';

import type { CapacityTracker } from '../capacity/capacity-tracker.js';
import { OperationCancelledError, ProvisionFailedError } from '../drive/errors.js';
import type { MetadataSnapshot, RepositoryHandle } from '../drive/types.js';
import type { RepositoryHost } from '../host/types.js';
import { classifyFailure, describeFailure } from '../transfer/classifier.js';
import type { ClassifierRules } from '../transfer/config.js';
import { sleep } from '../transfer/retry.js';

import type { WorkspaceScope } from './workspace.js';

export interface RepositoryPoolOptions {
  host: RepositoryHost;
  /** Name prefix of data repositories */
  prefix: string;
  /** Ceiling given to newly provisioned repositories */
  ceilingBytes: number;
  /** Minimum spacing between two creations */
  minIntervalMs: number;
  rules: ClassifierRules;
  /** Bytes already stored in an existing repository that is about to be adopted */
  measureUsage: (name: string, signal?: AbortSignal) => Promise<number>;
  logger: FastifyBaseLogger;
  now?: () => number;
}

/** `<prefix><id zero-padded to 4>` */
export function repositoryName(prefix: string, id: number): string {
  return `${prefix}${String(id).padStart(4, '0')}`;
}

export class RepositoryPool {
  private readonly host: RepositoryHost;
  private readonly prefix: string;
  private readonly ceilingBytes: number;
  private readonly minIntervalMs: number;
  private readonly rules: ClassifierRules;
  private readonly measureUsage: RepositoryPoolOptions['measureUsage'];
  private readonly logger: FastifyBaseLogger;
  private readonly now: () => number;
  private lastProvisionAt: number | undefined;

  constructor(options: RepositoryPoolOptions) {
    this.host = options.host;
    this.prefix = options.prefix;
    this.ceilingBytes = options.ceilingBytes;
    this.minIntervalMs = options.minIntervalMs;
    this.rules = options.rules;
    this.measureUsage = options.measureUsage;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Pick the repository for a chunk of `bytes` and reserve the bytes in it.
   * Calls must not overlap: reservations are a critical section.
   */
  async allocateForWrite(
    snapshot: MetadataSnapshot,
    tracker: CapacityTracker,
    bytes: number,
    signal?: AbortSignal
  ): Promise<RepositoryHandle> {
    for (const repo of snapshot.repositories) {
      if (tracker.reserve(repo, bytes).ok) {
        return repo;
      }
    }

    for (;;) {
      const repo = await this.provision(snapshot, signal);
      if (tracker.reserve(repo, bytes).ok) {
        return repo;
      }
      if (repo.committedBytes === 0) {
        throw new Error(
          `Chunk of ${bytes} bytes does not fit a new repository of ${repo.ceilingBytes} bytes`
        );
      }
      // Adopted with too little room left
      tracker.markFull(repo);
    }
  }

  /** Local working copy holding the chunks of `repository`. */
  resolveForRead(scope: WorkspaceScope, repository: string): Promise<string> {
    return scope.checkout(repository);
  }

  /**
   * Create the next repository and register it in `snapshot`.
   *
   * A name that already exists on the host is an orphan of an operation that
   * never committed; it is adopted rather than recreated, starting from the
   * bytes its chunks already take up.
   */
  private async provision(
    snapshot: MetadataSnapshot,
    signal?: AbortSignal
  ): Promise<RepositoryHandle> {
    let name = repositoryName(this.prefix, snapshot.nextRepoId);
    snapshot.nextRepoId += 1;
    while (snapshot.repositories.some((r) => r.name === name)) {
      name = repositoryName(this.prefix, snapshot.nextRepoId);
      snapshot.nextRepoId += 1;
    }

    await this.pace(signal);

    let adopted = false;
    try {
      adopted = await this.host.exists(name);
      if (!adopted) {
        await this.host.create(name);
      }
    } catch (error) {
      const failure = classifyFailure(error, this.rules);
      const reason =
        failure === 'rate-limited'
          ? `rate limited by host (${describeFailure(error)})`
          : describeFailure(error);
      this.logger.error({ repository: name, classification: failure, reason }, 'Provisioning failed');
      throw new ProvisionFailedError(name, reason);
    } finally {
      this.lastProvisionAt = this.now();
    }

    let committedBytes = 0;
    if (adopted) {
      committedBytes = await this.measureUsage(name, signal);
      this.logger.warn({ repository: name, committed: committedBytes }, 'Adopting existing repository');
    }

    const repo: RepositoryHandle = {
      name,
      committedBytes,
      ceilingBytes: this.ceilingBytes,
      status: 'OPEN',
      createdAt: new Date(this.now()).toISOString(),
    };
    snapshot.repositories.push(repo);
    this.logger.info({ repository: name, ceiling: this.ceilingBytes }, 'Repository provisioned');
    return repo;
  }

  private async pace(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new OperationCancelledError('provisioning');
    }
    if (this.lastProvisionAt === undefined || this.minIntervalMs === 0) return;
    const wait = this.lastProvisionAt + this.minIntervalMs - this.now();
    if (wait > 0) {
      this.logger.debug({ wait }, 'Pacing repository creation');
      await sleep(wait, signal);
    }
  }
}
