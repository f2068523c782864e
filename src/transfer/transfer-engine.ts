// Chunk transfer against the repository host, with classified retry.
//
// Every remote call (fetching a working copy, committing, pushing) goes
// through withRetry(). Capacity bookkeeping is settled here: a confirmed push
// confirms its reservation, a push that fails for good releases it.

import { createHash } from 'node:crypto';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import type { CapacityTracker } from '../capacity/capacity-tracker.js';
import { ChecksumMismatchError, TransferPermanentError } from '../drive/errors.js';
import type { ChunkRef, RepositoryHandle } from '../drive/types.js';
import type { RepositoryHost } from '../host/types.js';
import type { WorkspaceScope } from '../repos/workspace.js';

import type { ClassifierRules, RetryPolicy } from './config.js';
import { withRetry } from './retry.js';

/** Directory inside a data repository that holds chunk objects */
export const CHUNKS_DIR = 'chunks';

export interface PushRequest {
  scope: WorkspaceScope;
  repository: RepositoryHandle;
  chunkId: string;
  payload: Buffer;
  /** Tracker holding the reservation for this payload */
  tracker: CapacityTracker;
  signal?: AbortSignal;
}

export interface PullRequest {
  /** Working copy of the chunk's repository */
  dir: string;
  chunk: ChunkRef;
}

export function sha256Hex(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export class TransferEngine {
  private readonly host: RepositoryHost;
  private readonly policy: RetryPolicy;
  private readonly rules: ClassifierRules;
  private readonly logger: FastifyBaseLogger;

  constructor(options: {
    host: RepositoryHost;
    policy: RetryPolicy;
    rules: ClassifierRules;
    logger: FastifyBaseLogger;
  }) {
    this.host = options.host;
    this.policy = options.policy;
    this.rules = options.rules;
    this.logger = options.logger;
  }

  /**
   * Fetch a working copy of `name` into `dir`, clearing leftovers of a
   * previous partial attempt before each try.
   */
  checkout(name: string, dir: string, signal?: AbortSignal): Promise<void> {
    return this.retry(
      async () => {
        await rm(dir, { recursive: true, force: true });
        await this.host.checkout(name, dir);
      },
      `checkout ${name}`,
      signal
    );
  }

  /** Commit everything in `dir` and push it to `name`. */
  async publish(name: string, dir: string, message: string, signal?: AbortSignal): Promise<void> {
    const changed = await this.retry(() => this.host.commit(dir, message), `commit ${name}`, signal);
    if (!changed) {
      this.logger.debug({ repository: name }, 'Nothing new to commit');
    }
    await this.retry(() => this.host.push(name, dir), `push ${name}`, signal);
  }

  /**
   * Store one chunk payload in its allocated repository.
   * Returns the chunk id once the host confirmed the push.
   */
  async push(request: PushRequest): Promise<string> {
    const { scope, repository, chunkId, payload, tracker, signal } = request;

    try {
      const dir = await scope.checkout(repository.name);
      const chunksDir = join(dir, CHUNKS_DIR);
      await mkdir(chunksDir, { recursive: true });
      // Deterministic id: a retried push rewrites identical bytes
      await writeFile(join(chunksDir, chunkId), payload);
      await this.publish(repository.name, dir, `Add chunk ${chunkId}`, signal);
    } catch (error) {
      tracker.release(repository, payload.length);
      throw error;
    }

    tracker.confirm(repository, payload.length);
    this.logger.debug(
      { repository: repository.name, chunkId, size: payload.length },
      'Chunk pushed'
    );
    return chunkId;
  }

  /** Total size of the chunk files in working copy `dir`. */
  async storedBytes(dir: string): Promise<number> {
    let names: string[];
    try {
      names = await readdir(join(dir, CHUNKS_DIR));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    let total = 0;
    for (const name of names) {
      const info = await stat(join(dir, CHUNKS_DIR, name));
      if (info.isFile()) {
        total += info.size;
      }
    }
    return total;
  }

  /** Read one chunk payload and check it against its recorded size and digest. */
  async pull(request: PullRequest): Promise<Buffer> {
    const { dir, chunk } = request;
    const label = `${chunk.repository}/${chunk.chunkId}`;

    let payload: Buffer;
    try {
      payload = await readFile(join(dir, CHUNKS_DIR, chunk.chunkId));
    } catch (error) {
      throw new TransferPermanentError(
        label,
        error instanceof Error ? error.message : 'chunk unreadable'
      );
    }

    if (payload.length !== chunk.size) {
      throw new ChecksumMismatchError(label, `expected ${chunk.size} bytes, got ${payload.length}`);
    }
    const digest = sha256Hex(payload);
    if (digest !== chunk.sha256) {
      throw new ChecksumMismatchError(label, `expected sha256 ${chunk.sha256}, got ${digest}`);
    }

    this.logger.debug({ repository: chunk.repository, chunkId: chunk.chunkId }, 'Chunk pulled');
    return payload;
  }

  private retry<T>(fn: () => Promise<T>, label: string, signal?: AbortSignal): Promise<T> {
    return withRetry(fn, label, {
      policy: this.policy,
      rules: this.rules,
      logger: this.logger,
      signal,
    });
  }
}
