import { z } from 'zod';

const Sha256Schema = z.string().regex(/^[a-f0-9]{64}$/, 'Expected a lowercase hex SHA-256');

export const RepositoryHandleSchema = z
  .object({
    name: z.string().min(1),
    committedBytes: z.number().int().min(0),
    ceilingBytes: z.number().int().min(1),
    status: z.enum(['OPEN', 'FULL']),
    createdAt: z.string(),
  })
  .refine((r) => r.committedBytes <= r.ceilingBytes, {
    message: 'committedBytes exceeds ceilingBytes',
  });

export const ChunkRefSchema = z.object({
  index: z.number().int().min(0),
  size: z.number().int().min(1),
  repository: z.string().min(1),
  chunkId: z.string().min(1),
  sha256: Sha256Schema,
});

export const LogicalFileSchema = z
  .object({
    name: z.string().min(1),
    size: z.number().int().min(0),
    checksum: Sha256Schema,
    chunkSize: z.number().int().min(1),
    status: z.enum(['ACTIVE', 'DELETED']).default('ACTIVE'),
    uploadedAt: z.string(),
    chunks: z.array(ChunkRefSchema),
  })
  .superRefine((file, ctx) => {
    file.chunks.forEach((chunk, i) => {
      if (chunk.index !== i) {
        ctx.addIssue({
          code: 'custom',
          message: `chunk at position ${i} has index ${chunk.index}`,
          path: ['chunks', i, 'index'],
        });
      }
    });
    const total = file.chunks.reduce((sum, c) => sum + c.size, 0);
    if (total !== file.size) {
      ctx.addIssue({
        code: 'custom',
        message: `chunk sizes add up to ${total}, file size is ${file.size}`,
        path: ['size'],
      });
    }
  });

export const MetadataSnapshotSchema = z
  .object({
    version: z.string().min(1),
    revision: z.number().int().min(0),
    nextRepoId: z.number().int().min(1),
    repositories: z.array(RepositoryHandleSchema),
    files: z.array(LogicalFileSchema),
  })
  .superRefine((snapshot, ctx) => {
    const repos = new Set(snapshot.repositories.map((r) => r.name));
    const names = new Set<string>();
    snapshot.files.forEach((file, i) => {
      if (names.has(file.name)) {
        ctx.addIssue({ code: 'custom', message: `duplicate file ${file.name}`, path: ['files', i] });
      }
      names.add(file.name);
      for (const chunk of file.chunks) {
        if (!repos.has(chunk.repository)) {
          ctx.addIssue({
            code: 'custom',
            message: `file ${file.name} references unknown repository ${chunk.repository}`,
            path: ['files', i],
          });
        }
      }
    });
  });

