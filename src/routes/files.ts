// /files routes: list, download and upload drive files.
//
// The remote name is the wildcard part of the URL, so names may contain
// slashes. Every handler goes through the drive orchestrator; drive errors
// carry their own status code and are rendered by the error handler.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

const FileListingSchema = z.object({
  name: z.string(),
  size: z.number(),
  chunks: z.number(),
  uploadedAt: z.string(),
});

const NameParamsSchema = z.object({
  '*': z.string().min(1).describe('Remote file name; may contain slashes'),
});

const filesRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/files',
    {
      schema: {
        description: 'List stored files',
        tags: ['Files'],
        response: {
          200: z.object({ files: z.array(FileListingSchema) }),
        },
      },
    },
    async () => {
      const files = await fastify.drive.orchestrator.ls();
      return { files };
    }
  );

  fastify.get<{ Params: { '*': string } }>(
    '/files/*',
    {
      schema: {
        description: 'Download a file (checksum verified before it is sent)',
        tags: ['Files'],
        params: NameParamsSchema,
      },
    },
    async (request, reply) => {
      const name = request.params['*'];
      const { file, data } = await fastify.drive.orchestrator.read(name);

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', data.length.toString())
        .header('X-Checksum-Sha256', file.checksum)
        .send(data);
    }
  );

  fastify.put<{ Params: { '*': string } }>(
    '/files/*',
    {
      schema: {
        description: 'Upload a file as multipart/form-data (field "file"); names are never overwritten',
        tags: ['Files'],
        params: NameParamsSchema,
        response: {
          201: z.object({
            name: z.string(),
            size: z.number(),
            checksum: z.string(),
            chunks: z.number(),
            repositories: z.array(z.string()),
          }),
          400: z.object({ error: z.string(), message: z.string() }),
        },
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
      bodyLimit: fastify.config.server.uploadLimitBytes,
    },
    async (request, reply) => {
      const name = request.params['*'];

      const part = await request.file();
      if (!part) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: 'No file provided. Send a multipart/form-data request with a "file" field.',
        });
      }
      const data = await part.toBuffer();

      const file = await fastify.drive.orchestrator.upload(name, data);
      request.log.info({ name, size: file.size, chunks: file.chunks.length }, 'File stored');

      return reply.status(201).send({
        name: file.name,
        size: file.size,
        checksum: file.checksum,
        chunks: file.chunks.length,
        repositories: [...new Set(file.chunks.map((c) => c.repository))],
      });
    }
  );

  done();
};

export const filesRoutesPlugin = fp(filesRoutes, {
  name: 'files-routes',
  fastify: '5.x',
});
