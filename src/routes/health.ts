import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { RepositoryHost } from '../host/types.js';
import type { WriterLease } from '../lease/writer-lease.js';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  dependencies: Record<string, DependencyStatus>;
}

// Dependency check functions

async function checkHost(host?: RepositoryHost): Promise<DependencyStatus> {
  if (!host) {
    return { status: 'down', error: 'Repository host not configured' };
  }
  const start = Date.now();
  try {
    const healthy = await host.healthy();
    return { status: healthy ? 'up' : 'down', latency: Date.now() - start };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

async function checkLease(lease?: WriterLease): Promise<DependencyStatus> {
  if (!lease) {
    // No lease store configured: single-process writer
    return { status: 'up', latency: 0 };
  }
  const start = Date.now();
  try {
    const healthy = await lease.healthy();
    return { status: healthy ? 'up' : 'down', latency: Date.now() - start };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { description: 'Server and dependency health', tags: ['Health'] } },
    async (_request, reply) => {
      // Run dependency checks in parallel
      const [hostStatus, leaseStatus] = await Promise.all([
        checkHost(fastify.drive?.host),
        checkLease(fastify.drive?.lease),
      ]);

      const dependencies: Record<string, DependencyStatus> = {
        host: hostStatus,
        lease: leaseStatus,
      };

      // Determine overall status
      const allUp = Object.values(dependencies).every((d) => d.status === 'up');
      const allDown = Object.values(dependencies).every((d) => d.status === 'down');

      let status: HealthResponse['status'];
      if (allUp) {
        status = 'healthy';
      } else if (allDown) {
        status = 'unhealthy';
      } else {
        status = 'degraded';
      }

      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        dependencies,
      };

      // Set appropriate status code
      const statusCode = status === 'unhealthy' ? 503 : 200;

      return reply.status(statusCode).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
