// Per-repository byte accounting against a fixed ceiling.
//
// Bytes move through two stages: reserve() holds them provisionally while a
// chunk is in flight, confirm() turns them into committed bytes once the
// push succeeded, release() hands them back when the push failed.

import type { FastifyBaseLogger } from 'fastify';

import type { RepositoryHandle } from '../drive/types.js';

export type ReserveResult = { ok: true } | { ok: false; reason: 'full' | 'insufficient' };

/**
 * Capacity bookkeeping for the repository handles of one operation.
 *
 * The tracker mutates `committedBytes` and `status` on the handles it is
 * given; those handles belong to the operation's snapshot view, so nothing
 * here outlives the operation. Invariant per repository:
 * committedBytes + reserved <= ceilingBytes.
 */
export class CapacityTracker {
  private readonly reserved = new Map<string, number>();
  private readonly fullMarginBytes: number;
  private readonly logger: FastifyBaseLogger;

  constructor(options: { fullMarginBytes: number; logger: FastifyBaseLogger }) {
    this.fullMarginBytes = options.fullMarginBytes;
    this.logger = options.logger;
  }

  /**
   * Provisionally claim `bytes` in `repo`.
   * Rejected when the repository is FULL or the bytes do not fit under the ceiling.
   */
  reserve(repo: RepositoryHandle, bytes: number): ReserveResult {
    if (repo.status === 'FULL') {
      return { ok: false, reason: 'full' };
    }

    const held = this.reservedBytes(repo.name);
    if (repo.committedBytes + held + bytes > repo.ceilingBytes) {
      this.logger.debug(
        { repository: repo.name, bytes, committed: repo.committedBytes, reserved: held },
        'Reservation rejected'
      );
      return { ok: false, reason: 'insufficient' };
    }

    this.reserved.set(repo.name, held + bytes);
    return { ok: true };
  }

  /**
   * Turn a reservation into committed bytes after a confirmed transfer.
   * Closes the repository once its free space falls below the configured margin.
   */
  confirm(repo: RepositoryHandle, bytes: number): void {
    this.take(repo.name, bytes);
    repo.committedBytes += bytes;

    if (repo.status === 'OPEN' && repo.ceilingBytes - repo.committedBytes < this.fullMarginBytes) {
      this.markFull(repo);
    }
  }

  /** Hand back a reservation whose transfer failed or never started. */
  release(repo: RepositoryHandle, bytes: number): void {
    this.take(repo.name, bytes);
    this.logger.debug({ repository: repo.name, bytes }, 'Reservation released');
  }

  /** Stop assigning chunks to `repo`; stored chunks stay readable. */
  markFull(repo: RepositoryHandle): void {
    if (repo.status === 'FULL') return;
    repo.status = 'FULL';
    this.logger.info(
      { repository: repo.name, committed: repo.committedBytes, ceiling: repo.ceilingBytes },
      'Repository marked full'
    );
  }

  reservedBytes(name: string): number {
    return this.reserved.get(name) ?? 0;
  }

  /** Bytes still assignable to `repo` (0 once FULL). */
  available(repo: RepositoryHandle): number {
    if (repo.status === 'FULL') return 0;
    return Math.max(0, repo.ceilingBytes - repo.committedBytes - this.reservedBytes(repo.name));
  }

  private take(name: string, bytes: number): void {
    const held = this.reservedBytes(name);
    if (bytes > held) {
      throw new Error(`No reservation of ${bytes} bytes held for ${name} (held: ${held})`);
    }
    if (held === bytes) {
      this.reserved.delete(name);
    } else {
      this.reserved.set(name, held - bytes);
    }
  }
}
