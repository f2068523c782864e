// Authoritative snapshot persistence in the metadata repository.
//
// The repository holds a single document, snapshot.json. load() always reads
// it from a fresh working copy; commit() writes the whole document in one
// commit, or nothing. There is no incremental update.

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import {
  isDriveError,
  MetadataConflictError,
  MetadataInvalidError,
  MetadataUnavailableError,
  ProvisionFailedError,
} from '../drive/errors.js';
import type { MetadataSnapshot } from '../drive/types.js';
import type { RepositoryHost } from '../host/types.js';
import { describeFailure } from '../transfer/classifier.js';
import type { TransferEngine } from '../transfer/transfer-engine.js';
import { withWorkspace, type WorkspaceScope } from '../repos/workspace.js';

import { MetadataSnapshotSchema } from './schema.js';
import { FORMAT_VERSION, versionsAreCompatible } from './version.js';

export const SNAPSHOT_FILE = 'snapshot.json';

export interface LoadedSnapshot {
  snapshot: MetadataSnapshot;
  /** False when the snapshot was written by an incompatible format version */
  writable: boolean;
  /** False when the repository holds no snapshot yet */
  initialized: boolean;
}

export function emptySnapshot(): MetadataSnapshot {
  return {
    version: FORMAT_VERSION,
    revision: 0,
    nextRepoId: 1,
    repositories: [],
    files: [],
  };
}

export class MetadataStore {
  private readonly host: RepositoryHost;
  private readonly transfer: TransferEngine;
  private readonly repository: string;
  private readonly workDir: string;
  private readonly logger: FastifyBaseLogger;

  constructor(options: {
    host: RepositoryHost;
    transfer: TransferEngine;
    repository: string;
    workDir: string;
    logger: FastifyBaseLogger;
  }) {
    this.host = options.host;
    this.transfer = options.transfer;
    this.repository = options.repository;
    this.workDir = options.workDir;
    this.logger = options.logger;
  }

  get repositoryName(): string {
    return this.repository;
  }

  /**
   * Read the current snapshot. Every call returns a new object, so callers
   * can mutate it freely as their operation-scoped view.
   */
  async load(signal?: AbortSignal): Promise<LoadedSnapshot> {
    const loaded = await this.inWorkspace(async (scope) => {
      const dir = await scope.fresh(this.repository);
      return this.readSnapshot(dir);
    }, signal);

    this.logger.debug(
      {
        revision: loaded.snapshot.revision,
        files: loaded.snapshot.files.length,
        repositories: loaded.snapshot.repositories.length,
        writable: loaded.writable,
      },
      'Metadata loaded'
    );
    return loaded;
  }

  /**
   * Persist `snapshot` as the next revision after `baseRevision`.
   *
   * Refuses with MetadataConflictError if the remote revision is no longer
   * `baseRevision`: another writer committed in between. Nothing is merged.
   */
  async commit(
    snapshot: MetadataSnapshot,
    baseRevision: number,
    signal?: AbortSignal
  ): Promise<MetadataSnapshot> {
    const next: MetadataSnapshot = {
      ...snapshot,
      version: FORMAT_VERSION,
      revision: baseRevision + 1,
    };

    const parsed = MetadataSnapshotSchema.safeParse(next);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new MetadataInvalidError(issues);
    }

    await this.inWorkspace(async (scope) => {
      const dir = await scope.fresh(this.repository);
      const remote = await this.readSnapshot(dir);
      if (remote.snapshot.revision !== baseRevision) {
        throw new MetadataConflictError(baseRevision, remote.snapshot.revision);
      }

      await writeFile(join(dir, SNAPSHOT_FILE), `${JSON.stringify(next, null, 2)}\n`);
      try {
        await this.transfer.publish(
          this.repository,
          dir,
          `Snapshot revision ${next.revision}`,
          signal
        );
      } catch (error) {
        if (isDriveError(error) && error.code === 'DRIVE_CANCELLED') throw error;
        throw new MetadataUnavailableError(`commit failed: ${describeFailure(error)}`);
      }
    }, signal);

    this.logger.info(
      { revision: next.revision, files: next.files.length, repositories: next.repositories.length },
      'Metadata committed'
    );
    return next;
  }

  /**
   * Create the metadata repository if it does not exist yet.
   * Returns true when it was created.
   */
  async ensureRepository(): Promise<boolean> {
    try {
      if (await this.host.exists(this.repository)) {
        return false;
      }
      await this.host.create(this.repository);
    } catch (error) {
      throw new ProvisionFailedError(this.repository, describeFailure(error));
    }
    this.logger.info({ repository: this.repository }, 'Metadata repository created');
    return true;
  }

  private async readSnapshot(dir: string): Promise<LoadedSnapshot> {
    let raw: string;
    try {
      raw = await readFile(join(dir, SNAPSHOT_FILE), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { snapshot: emptySnapshot(), writable: true, initialized: false };
      }
      throw new MetadataUnavailableError(`cannot read ${SNAPSHOT_FILE}: ${describeFailure(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new MetadataUnavailableError(`${SNAPSHOT_FILE} is not valid JSON: ${describeFailure(error)}`);
    }

    const result = MetadataSnapshotSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new MetadataUnavailableError(`${SNAPSHOT_FILE} is malformed: ${issues}`);
    }

    const snapshot: MetadataSnapshot = result.data;
    return {
      snapshot,
      writable: versionsAreCompatible(snapshot.version, FORMAT_VERSION),
      initialized: true,
    };
  }

  private inWorkspace<T>(
    fn: (scope: WorkspaceScope) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return withWorkspace(
      {
        rootDir: this.workDir,
        label: 'metadata',
        checkout: async (name, dir) => {
          try {
            await this.transfer.checkout(name, dir, signal);
          } catch (error) {
            if (isDriveError(error) && error.code === 'DRIVE_CANCELLED') throw error;
            throw new MetadataUnavailableError(
              `cannot fetch ${name}: ${describeFailure(error)}`
            );
          }
        },
        logger: this.logger,
      },
      fn
    );
  }
}
