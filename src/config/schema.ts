import { z } from 'zod';

import { HostConfigSchema } from '../host/config.js';
import { TransferConfigSchema } from '../transfer/config.js';

const MIB = 1024 * 1024;

export const ConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().default('0.0.0.0'),
        port: z.number().int().min(1).max(65535).default(3000),
        /** Largest multipart upload accepted by PUT /files/* */
        uploadLimitBytes: z
          .number()
          .int()
          .min(1)
          .default(512 * MIB),
      })
      .default(() => ({ host: '0.0.0.0', port: 3000, uploadLimitBytes: 512 * MIB })),

    logging: z
      .object({
        level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
        pretty: z.boolean().default(false),
      })
      .default(() => ({ level: 'info' as const, pretty: false })),

    // Optional Sentry integration
    sentry: z
      .object({
        dsn: z.string().url(),
        environment: z.string().default('development'),
        tracesSampleRate: z.number().min(0).max(1).default(0.1),
      })
      .optional(),

    // Environment mode
    env: z.enum(['development', 'production', 'test']).default('development'),

    // HTTP rate limiting
    rateLimit: z
      .object({
        global: z.number().int().min(1).default(100),
        sensitive: z.number().int().min(1).default(10),
        windowMs: z.number().int().min(1000).default(60000),
      })
      .default(() => ({ global: 100, sensitive: 10, windowMs: 60000 })),

    drive: z
      .object({
        /** Repository holding the snapshot document */
        metadataRepository: z
          .string()
          .regex(/^[A-Za-z0-9._-]+$/, 'Metadata repository name may only contain [A-Za-z0-9._-]')
          .default('metadata'),
        /** Data repositories are named <prefix><id:04> */
        repositoryPrefix: z
          .string()
          .regex(/^[A-Za-z0-9._-]+$/, 'Repository prefix may only contain [A-Za-z0-9._-]')
          .default('storage-'),
        chunkSizeBytes: z
          .number()
          .int()
          .min(1)
          .default(2 * MIB),
        maxSizePerRepoBytes: z
          .number()
          .int()
          .min(1)
          .default(20 * MIB),
        /** Local staging root for working copies */
        workDir: z.string().min(1).default('./data/work'),
      })
      .default(() => ({
        metadataRepository: 'metadata',
        repositoryPrefix: 'storage-',
        chunkSizeBytes: 2 * MIB,
        maxSizePerRepoBytes: 20 * MIB,
        workDir: './data/work',
      })),

    capacity: z
      .object({
        /** A repository whose free space drops below this margin is closed (FULL) */
        fullMarginBytes: z.number().int().min(0).default(64 * 1024),
      })
      .default(() => ({ fullMarginBytes: 64 * 1024 })),

    provisioning: z
      .object({
        /** Minimum spacing between repository creations (burst creation trips a separate limit) */
        minIntervalMs: z.number().int().min(0).default(1300),
      })
      .default(() => ({ minIntervalMs: 1300 })),

    host: HostConfigSchema,

    transfer: TransferConfigSchema,

    // Optional cross-process single-writer lease
    lease: z
      .object({
        ttlSeconds: z.number().int().min(10).max(86400).default(900),
        redis: z
          .object({
            host: z.string().default('127.0.0.1'),
            port: z.number().int().min(1).max(65535).default(6379),
            /** Redis password (sensitive - never log). Optional for local dev. */
            password: z.string().optional(),
            username: z.string().optional(),
            db: z.number().int().min(0).max(15).default(0),
            key: z.string().min(1).default('repodrive:writer-lease'),
          })
          .optional(),
      })
      .default(() => ({ ttlSeconds: 900 })),
  })
  .superRefine((data, ctx) => {
    if (data.drive.chunkSizeBytes > data.drive.maxSizePerRepoBytes) {
      ctx.addIssue({
        code: 'custom',
        message: 'chunkSizeBytes must not exceed maxSizePerRepoBytes',
        path: ['drive', 'chunkSizeBytes'],
      });
    }
    const { metadataRepository, repositoryPrefix } = data.drive;
    if (
      metadataRepository.startsWith(repositoryPrefix) &&
      /^\d+$/.test(metadataRepository.slice(repositoryPrefix.length))
    ) {
      ctx.addIssue({
        code: 'custom',
        message: 'metadataRepository collides with the data repository naming scheme',
        path: ['drive', 'metadataRepository'],
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type DriveConfig = Config['drive'];
export type LeaseConfig = Config['lease'];
