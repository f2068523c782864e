// Drive module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';
import type { Redis } from 'ioredis';

import type { Config } from '../config/index.js';
import { createRepositoryHost, type RepositoryHost } from '../host/index.js';
import { createRedisClient, disconnectRedis } from '../lease/redis-client.js';
import { LocalWriterLease, RedisWriterLease, type WriterLease } from '../lease/writer-lease.js';

import { DriveOrchestrator, type OrchestratorHooks } from './orchestrator.js';

export { DriveOrchestrator } from './orchestrator.js';
export type {
  DriveOrchestratorOptions,
  DriveSettings,
  InitResult,
  OrchestratorHooks,
  StateChangeEvent,
} from './orchestrator.js';
export * from './types.js';
export { isDriveError } from './errors.js';

export interface Drive {
  orchestrator: DriveOrchestrator;
  host: RepositoryHost;
  lease: WriterLease;
  /** Present when the writer lease is kept in Redis */
  redis?: Redis;
  close(): Promise<void>;
}

/**
 * Wire a drive from configuration: repository host, writer lease and the
 * orchestrator on top. Connects to Redis when `lease.redis` is configured.
 */
export async function createDrive(
  config: Config,
  logger: FastifyBaseLogger,
  hooks?: OrchestratorHooks
): Promise<Drive> {
  const host = createRepositoryHost(config.host, logger);

  let lease: WriterLease;
  let redis: Redis | undefined;
  if (config.lease.redis) {
    redis = createRedisClient(config.lease.redis, logger);
    await redis.connect();
    lease = new RedisWriterLease({
      redis,
      key: config.lease.redis.key,
      ttlMs: config.lease.ttlSeconds * 1000,
      logger,
    });
    logger.info(
      { redis: `${config.lease.redis.host}:${config.lease.redis.port}`, key: config.lease.redis.key },
      'Writer lease: Redis connected'
    );
  } else {
    lease = new LocalWriterLease();
  }

  const orchestrator = new DriveOrchestrator({ settings: config, host, logger, lease, hooks });
  logger.info(
    {
      host: host.kind,
      metadataRepository: config.drive.metadataRepository,
      chunkSize: config.drive.chunkSizeBytes,
      maxSizePerRepo: config.drive.maxSizePerRepoBytes,
    },
    'Drive initialized'
  );

  return {
    orchestrator,
    host,
    lease,
    redis,
    async close() {
      if (redis) {
        await disconnectRedis(redis);
      }
    },
  };
}
