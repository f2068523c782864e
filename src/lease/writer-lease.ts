// Single-writer lease.
//
// Metadata commits have no locking on the host side, so two writers that
// load the same snapshot would lose one update. Within a process the
// orchestrator already runs one operation at a time; across processes a
// Redis key guards mutating operations for as long as they run.

import { randomUUID } from 'node:crypto';

import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';

import { WriterBusyError } from '../drive/errors.js';

export interface WriterLease {
  /** Take the lease for `owner`, or throw WriterBusyError */
  acquire(owner: string): Promise<void>;
  /** Give the lease back; a no-op if `owner` does not hold it */
  release(owner: string): Promise<void>;
  /** Health check for the lease store */
  healthy(): Promise<boolean>;
}

/** Lease used when no Redis is configured: this process is the only writer. */
export class LocalWriterLease implements WriterLease {
  private holder: string | null = null;

  async acquire(owner: string): Promise<void> {
    if (this.holder !== null && this.holder !== owner) {
      throw new WriterBusyError(this.holder);
    }
    this.holder = owner;
  }

  async release(owner: string): Promise<void> {
    if (this.holder === owner) {
      this.holder = null;
    }
  }

  async healthy(): Promise<boolean> {
    return true;
  }
}

// Both scripts act only while the key still carries the caller's token
const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0`;

const RENEW_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('pexpire', KEYS[1], ARGV[2])
end
return 0`;

/**
 * Redis-backed lease: `SET key token NX PX ttl`.
 *
 * The TTL bounds how long a crashed writer can block others; a live holder
 * extends it every third of the TTL. Release and renewal are compare-and-set
 * scripts keyed on the holder's token.
 */
export class RedisWriterLease implements WriterLease {
  private readonly redis: Redis;
  private readonly key: string;
  private readonly ttlMs: number;
  private readonly logger: FastifyBaseLogger;
  private readonly held = new Map<string, { token: string; timer: NodeJS.Timeout }>();

  constructor(options: { redis: Redis; key: string; ttlMs: number; logger: FastifyBaseLogger }) {
    this.redis = options.redis;
    this.key = options.key;
    this.ttlMs = options.ttlMs;
    this.logger = options.logger;
  }

  async acquire(owner: string): Promise<void> {
    const token = `${owner}:${randomUUID()}`;
    const result = await this.redis.set(this.key, token, 'PX', this.ttlMs, 'NX');
    if (result !== 'OK') {
      const holder = await this.redis.get(this.key);
      this.logger.warn({ key: this.key, holder }, 'Writer lease held elsewhere');
      throw new WriterBusyError(holder ?? 'unknown holder');
    }

    const timer = setInterval(() => {
      this.renew(owner, token).catch((error: unknown) => {
        this.logger.warn(
          { key: this.key, owner, err: error instanceof Error ? error.message : 'Unknown error' },
          'Writer lease renewal failed'
        );
      });
    }, Math.max(1, Math.floor(this.ttlMs / 3)));
    timer.unref();

    this.held.set(owner, { token, timer });
    this.logger.debug({ key: this.key, owner, ttlMs: this.ttlMs }, 'Writer lease acquired');
  }

  async release(owner: string): Promise<void> {
    const entry = this.held.get(owner);
    if (entry === undefined) return;
    this.held.delete(owner);
    clearInterval(entry.timer);

    const deleted = await this.redis.eval(RELEASE_SCRIPT, 1, this.key, entry.token);
    if (deleted === 1) {
      this.logger.debug({ key: this.key, owner }, 'Writer lease released');
    } else {
      this.logger.warn({ key: this.key, owner }, 'Writer lease expired before release');
    }
  }

  private async renew(owner: string, token: string): Promise<void> {
    const renewed = await this.redis.eval(RENEW_SCRIPT, 1, this.key, token, this.ttlMs);
    if (renewed === 1) {
      this.logger.debug({ key: this.key, owner }, 'Writer lease renewed');
      return;
    }

    // Lost: stop extending someone else's key
    const entry = this.held.get(owner);
    if (entry?.token === token) {
      clearInterval(entry.timer);
    }
    this.logger.warn({ key: this.key, owner }, 'Writer lease lost before renewal');
  }

  async healthy(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch {
      return false;
    }
  }
}
