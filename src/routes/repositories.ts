// GET /repositories -- the repository registry.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

const repositoriesRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/repositories',
    {
      schema: {
        description: 'List data repositories with used bytes, ceiling and status',
        tags: ['Repositories'],
        response: {
          200: z.object({
            repositories: z.array(
              z.object({
                name: z.string(),
                committedBytes: z.number(),
                ceilingBytes: z.number(),
                status: z.enum(['OPEN', 'FULL']),
                createdAt: z.string(),
              })
            ),
          }),
        },
      },
    },
    async () => {
      const repositories = await fastify.drive.orchestrator.repositories();
      return { repositories };
    }
  );

  done();
};

export const repositoriesRoutesPlugin = fp(repositoriesRoutes, {
  name: 'repositories-routes',
  fastify: '5.x',
});
