// Drive data model: logical files, chunk references and the repository registry.

export type RepositoryStatus = 'OPEN' | 'FULL';

/** Reserved for a future delete operation; every file is ACTIVE today. */
export type LogicalFileStatus = 'ACTIVE' | 'DELETED';

export interface RepositoryHandle {
  name: string;
  /** Bytes of confirmed chunk payloads stored in this repository */
  committedBytes: number;
  ceilingBytes: number;
  status: RepositoryStatus;
  createdAt: string;
}

export interface ChunkRef {
  /** 0-based, contiguous within the owning file */
  index: number;
  size: number;
  repository: string;
  /** Object name inside the repository, unique within it */
  chunkId: string;
  /** SHA-256 of the chunk payload (hex) */
  sha256: string;
}

export interface LogicalFile {
  name: string;
  size: number;
  /** SHA-256 of the whole file (hex) */
  checksum: string;
  chunkSize: number;
  status: LogicalFileStatus;
  uploadedAt: string;
  chunks: ChunkRef[];
}

export interface MetadataSnapshot {
  /** Format version of the program that last wrote the snapshot */
  version: string;
  /** Incremented on every commit */
  revision: number;
  /** Id used for the next provisioned repository name */
  nextRepoId: number;
  /** Registry in creation order */
  repositories: RepositoryHandle[];
  files: LogicalFile[];
}

export type OperationKind = 'upload' | 'download' | 'ls' | 'repos' | 'init';

export type OperationState =
  | 'RESOLVING_METADATA'
  | 'PLANNING'
  | 'TRANSFERRING'
  | 'COMMITTING'
  | 'DONE'
  | 'FAILED';

export interface FileListing {
  name: string;
  size: number;
  chunks: number;
  uploadedAt: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}
