// Drive façade: upload, download, ls and friends.
//
// Each operation walks RESOLVING_METADATA -> PLANNING -> TRANSFERRING ->
// COMMITTING -> DONE, or ends in FAILED. The snapshot loaded at the start is
// the operation's private view; it is committed once, after every chunk
// transfer was confirmed, and dropped otherwise.

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import { CapacityTracker } from '../capacity/capacity-tracker.js';
import { join, split, type IndexedChunk } from '../codec/chunk-codec.js';
import type { Config } from '../config/schema.js';
import type { RepositoryHost } from '../host/types.js';
import { LocalWriterLease, type WriterLease } from '../lease/writer-lease.js';
import { MetadataStore } from '../metadata/metadata-store.js';
import { FORMAT_VERSION } from '../metadata/version.js';
import { RepositoryPool } from '../repos/repository-pool.js';
import { withWorkspace, type WorkspaceScope } from '../repos/workspace.js';
import { runBounded } from '../transfer/parallel.js';
import { sha256Hex, TransferEngine } from '../transfer/transfer-engine.js';

import {
  AlreadyExistsError,
  ChecksumMismatchError,
  MetadataIncompatibleError,
  NotFoundError,
  OperationCancelledError,
} from './errors.js';
import { assertValidName, chunkIdFor } from './names.js';
import type {
  ChunkRef,
  FileListing,
  LogicalFile,
  MetadataSnapshot,
  OperationKind,
  OperationOptions,
  OperationState,
  RepositoryHandle,
} from './types.js';

export type DriveSettings = Pick<Config, 'drive' | 'capacity' | 'provisioning' | 'transfer'>;

export interface StateChangeEvent {
  operation: OperationKind;
  operationId: string;
  state: OperationState;
}

export interface OrchestratorHooks {
  /** Called on every state transition; throwing aborts the operation */
  onStateChange?: (event: StateChangeEvent) => void;
}

export interface DriveOrchestratorOptions {
  settings: DriveSettings;
  host: RepositoryHost;
  logger: FastifyBaseLogger;
  lease?: WriterLease;
  hooks?: OrchestratorHooks;
}

export interface InitResult {
  repositoryCreated: boolean;
  snapshotCreated: boolean;
}

interface PlannedChunk {
  index: number;
  repository: RepositoryHandle;
  chunkId: string;
  payload: Buffer;
  sha256: string;
}

/** Per-operation state holder */
class Operation {
  readonly id = randomUUID();
  state: OperationState = 'RESOLVING_METADATA';
  readonly log: FastifyBaseLogger;

  constructor(
    readonly kind: OperationKind,
    readonly signal: AbortSignal | undefined,
    logger: FastifyBaseLogger,
    private readonly hooks: OrchestratorHooks
  ) {
    this.log = logger.child({ operation: kind, operationId: this.id });
  }

  enter(state: OperationState): void {
    if (state !== 'FAILED') this.checkpoint();
    this.state = state;
    this.log.debug({ state }, 'Operation state');
    this.hooks.onStateChange?.({ operation: this.kind, operationId: this.id, state });
  }

  /** Throw if the caller cancelled. */
  checkpoint(): void {
    if (this.signal?.aborted) {
      throw new OperationCancelledError(`${this.kind} (${this.state})`);
    }
  }
}

export class DriveOrchestrator {
  private readonly settings: DriveSettings;
  private readonly logger: FastifyBaseLogger;
  private readonly lease: WriterLease;
  private readonly hooks: OrchestratorHooks;
  private readonly transfer: TransferEngine;
  private readonly metadata: MetadataStore;
  private readonly pool: RepositoryPool;
  /** Tail of the in-process operation queue */
  private queue: Promise<void> = Promise.resolve();

  constructor(options: DriveOrchestratorOptions) {
    const { settings, host, logger } = options;
    this.settings = settings;
    this.logger = logger;
    this.lease = options.lease ?? new LocalWriterLease();
    this.hooks = options.hooks ?? {};

    this.transfer = new TransferEngine({
      host,
      policy: settings.transfer.retry,
      rules: settings.transfer.classifier,
      logger,
    });
    this.metadata = new MetadataStore({
      host,
      transfer: this.transfer,
      repository: settings.drive.metadataRepository,
      workDir: settings.drive.workDir,
      logger,
    });
    this.pool = new RepositoryPool({
      host,
      prefix: settings.drive.repositoryPrefix,
      ceilingBytes: settings.drive.maxSizePerRepoBytes,
      minIntervalMs: settings.provisioning.minIntervalMs,
      rules: settings.transfer.classifier,
      measureUsage: (name, signal) =>
        withWorkspace(
          {
            rootDir: settings.drive.workDir,
            label: 'adopt',
            checkout: (repository, dir) => this.transfer.checkout(repository, dir, signal),
            logger,
          },
          async (scope) => this.transfer.storedBytes(await scope.checkout(name))
        ),
      logger,
    });
  }

  /**
   * Store `data` under `name`. Atomic for the caller: either the file is
   * recorded with every chunk confirmed, or the snapshot is left untouched.
   */
  async upload(name: string, data: Buffer, options: OperationOptions = {}): Promise<LogicalFile> {
    assertValidName(name);

    return this.run('upload', options, true, async (op) => {
      op.enter('RESOLVING_METADATA');
      const { snapshot, writable } = await this.metadata.load(op.signal);
      if (!writable) {
        throw new MetadataIncompatibleError(snapshot.version, FORMAT_VERSION);
      }
      if (snapshot.files.some((f) => f.name === name)) {
        throw new AlreadyExistsError(name);
      }
      const baseRevision = snapshot.revision;

      op.enter('PLANNING');
      const tracker = new CapacityTracker({
        fullMarginBytes: this.settings.capacity.fullMarginBytes,
        logger: op.log,
      });
      const checksum = sha256Hex(data);
      const plan = await this.plan(op, snapshot, tracker, name, checksum, data);
      op.log.info(
        {
          name,
          size: data.length,
          chunks: plan.length,
          repositories: [...new Set(plan.map((c) => c.repository.name))],
        },
        'Upload planned'
      );

      op.enter('TRANSFERRING');
      const chunks = await this.pushAll(op, plan, tracker);

      op.enter('COMMITTING');
      const file: LogicalFile = {
        name,
        size: data.length,
        checksum,
        chunkSize: this.settings.drive.chunkSizeBytes,
        status: 'ACTIVE',
        uploadedAt: new Date().toISOString(),
        chunks,
      };
      snapshot.files.push(file);
      op.checkpoint();
      await this.metadata.commit(snapshot, baseRevision, op.signal);

      op.enter('DONE');
      op.log.info({ name, size: file.size, chunks: chunks.length }, 'Upload complete');
      return file;
    });
  }

  /** Fetch `name` and write it to the local path `destination`. */
  async download(
    name: string,
    destination: string,
    options: OperationOptions = {}
  ): Promise<LogicalFile> {
    assertValidName(name);

    return this.run('download', options, false, async (op) => {
      const { file, data } = await this.fetchFile(op, name);

      const target = resolve(destination);
      const partial = `${target}.partial-${op.id}`;
      await mkdir(dirname(target), { recursive: true });
      try {
        await writeFile(partial, data);
        await rename(partial, target);
      } catch (error) {
        await rm(partial, { force: true });
        throw error;
      }

      op.enter('DONE');
      op.log.info({ name, destination: target, size: file.size }, 'Download complete');
      return file;
    });
  }

  /** Fetch `name` into memory. */
  async read(name: string, options: OperationOptions = {}): Promise<{ file: LogicalFile; data: Buffer }> {
    assertValidName(name);

    return this.run('download', options, false, async (op) => {
      const result = await this.fetchFile(op, name);
      op.enter('DONE');
      return result;
    });
  }

  /** Names and sizes of every stored file, sorted by name. */
  ls(options: OperationOptions = {}): Promise<FileListing[]> {
    return this.run('ls', options, false, async (op) => {
      op.enter('RESOLVING_METADATA');
      const { snapshot } = await this.metadata.load(op.signal);
      op.enter('DONE');
      return snapshot.files
        .filter((f) => f.status === 'ACTIVE')
        .map((f) => ({
          name: f.name,
          size: f.size,
          chunks: f.chunks.length,
          uploadedAt: f.uploadedAt,
        }))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    });
  }

  /** The repository registry in creation order. */
  repositories(options: OperationOptions = {}): Promise<RepositoryHandle[]> {
    return this.run('repos', options, false, async (op) => {
      op.enter('RESOLVING_METADATA');
      const { snapshot } = await this.metadata.load(op.signal);
      op.enter('DONE');
      return snapshot.repositories;
    });
  }

  /**
   * Make sure the metadata repository exists and holds a snapshot.
   * Safe to run repeatedly.
   */
  init(options: OperationOptions = {}): Promise<InitResult> {
    return this.run('init', options, true, async (op) => {
      op.enter('RESOLVING_METADATA');
      const repositoryCreated = await this.metadata.ensureRepository();
      const { snapshot, initialized } = await this.metadata.load(op.signal);

      let snapshotCreated = false;
      if (!initialized) {
        op.enter('COMMITTING');
        await this.metadata.commit(snapshot, snapshot.revision, op.signal);
        snapshotCreated = true;
      }

      op.enter('DONE');
      return { repositoryCreated, snapshotCreated };
    });
  }

  /**
   * Queue `body` behind every earlier operation of this instance and run it
   * with state tracking, the writer lease for mutations, and FAILED logging.
   */
  private run<T>(
    kind: OperationKind,
    options: OperationOptions,
    mutating: boolean,
    body: (op: Operation) => Promise<T>
  ): Promise<T> {
    const execute = async (): Promise<T> => {
      const op = new Operation(kind, options.signal, this.logger, this.hooks);
      try {
        if (mutating) {
          await this.lease.acquire(op.id);
        }
        try {
          return await body(op);
        } finally {
          if (mutating) {
            await this.lease.release(op.id);
          }
        }
      } catch (error) {
        const failedIn = op.state;
        op.enter('FAILED');
        op.log.error(
          {
            failedIn,
            code: error instanceof Error && 'code' in error ? error.code : undefined,
            err: error instanceof Error ? error.message : 'Unknown error',
          },
          'Operation failed'
        );
        throw error;
      }
    };

    const result = this.queue.then(execute);
    // Keep the queue going whatever this operation's outcome; the caller gets `result`
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Split `data` and assign every chunk a repository, provisioning as needed.
   * Sequential on purpose: reservations must not interleave.
   */
  private async plan(
    op: Operation,
    snapshot: MetadataSnapshot,
    tracker: CapacityTracker,
    name: string,
    checksum: string,
    data: Buffer
  ): Promise<PlannedChunk[]> {
    const payloads = split(data, this.settings.drive.chunkSizeBytes);
    const plan: PlannedChunk[] = [];

    try {
      for (const [index, payload] of payloads.entries()) {
        op.checkpoint();
        const repository = await this.pool.allocateForWrite(
          snapshot,
          tracker,
          payload.length,
          op.signal
        );
        plan.push({
          index,
          repository,
          chunkId: chunkIdFor(name, checksum, index),
          payload,
          sha256: sha256Hex(payload),
        });
      }
    } catch (error) {
      for (const chunk of plan) {
        tracker.release(chunk.repository, chunk.payload.length);
      }
      throw error;
    }

    return plan;
  }

  /**
   * Push every planned chunk. Repositories are independent, so they run in
   * parallel; chunks of one repository go in sequence order through one
   * working copy. Results are placed by sequence index.
   */
  private async pushAll(
    op: Operation,
    plan: PlannedChunk[],
    tracker: CapacityTracker
  ): Promise<ChunkRef[]> {
    const refs: (ChunkRef | undefined)[] = new Array<ChunkRef | undefined>(plan.length);
    const started = new Set<number>();

    try {
      await this.withScope(op, 'upload', (scope) =>
        this.inLanes(
          op,
          groupByRepository(plan, (c) => c.repository.name),
          async (chunk, signal) => {
            started.add(chunk.index);
            await this.transfer.push({
              scope,
              repository: chunk.repository,
              chunkId: chunk.chunkId,
              payload: chunk.payload,
              tracker,
              signal,
            });
            refs[chunk.index] = {
              index: chunk.index,
              size: chunk.payload.length,
              repository: chunk.repository.name,
              chunkId: chunk.chunkId,
              sha256: chunk.sha256,
            };
          }
        )
      );
    } catch (error) {
      // push() settles its own reservation; chunks never started still hold one
      for (const chunk of plan) {
        if (!started.has(chunk.index)) {
          tracker.release(chunk.repository, chunk.payload.length);
        }
      }
      throw error;
    }

    return refs.map((ref, index) => {
      if (ref === undefined) {
        throw new Error(`Chunk ${index} was not transferred`);
      }
      return ref;
    });
  }

  /** RESOLVING_METADATA and TRANSFERRING for a read, then reassembly and checks. */
  private async fetchFile(
    op: Operation,
    name: string
  ): Promise<{ file: LogicalFile; data: Buffer }> {
    op.enter('RESOLVING_METADATA');
    const { snapshot } = await this.metadata.load(op.signal);
    const file = snapshot.files.find((f) => f.name === name && f.status === 'ACTIVE');
    if (!file) {
      throw new NotFoundError(name);
    }

    op.enter('TRANSFERRING');
    const pulled: IndexedChunk[] = [];
    await this.withScope(op, 'download', (scope) =>
      this.inLanes(
        op,
        groupByRepository(file.chunks, (c) => c.repository),
        async (chunk) => {
          const dir = await this.pool.resolveForRead(scope, chunk.repository);
          const payload = await this.transfer.pull({ dir, chunk });
          pulled.push({ index: chunk.index, payload });
        }
      )
    );

    // Reads do not touch metadata
    op.enter('COMMITTING');

    const data = join(pulled, file.chunks.length);
    if (data.length !== file.size) {
      throw new ChecksumMismatchError(name, `expected ${file.size} bytes, got ${data.length}`);
    }
    const checksum = sha256Hex(data);
    if (checksum !== file.checksum) {
      throw new ChecksumMismatchError(name, `expected sha256 ${file.checksum}, got ${checksum}`);
    }

    return { file, data };
  }

  /**
   * Run each group's items in order, groups in parallel lanes. The first
   * failure stops every lane before its next item and aborts in-flight retries
   * through the signal handed to `fn`.
   */
  private async inLanes<T>(
    op: Operation,
    groups: T[][],
    fn: (item: T, signal: AbortSignal) => Promise<void>
  ): Promise<void> {
    const halt = new AbortController();
    const signal = op.signal ? AbortSignal.any([op.signal, halt.signal]) : halt.signal;

    await runBounded(groups, this.settings.transfer.concurrency, async (group) => {
      try {
        for (const item of group) {
          op.checkpoint();
          if (halt.signal.aborted) return;
          await fn(item, signal);
        }
      } catch (error) {
        halt.abort();
        throw error;
      }
    });
  }

  private withScope<T>(
    op: Operation,
    label: string,
    fn: (scope: WorkspaceScope) => Promise<T>
  ): Promise<T> {
    return withWorkspace(
      {
        rootDir: this.settings.drive.workDir,
        label,
        checkout: (repository, dir) => this.transfer.checkout(repository, dir, op.signal),
        logger: op.log,
      },
      fn
    );
  }
}

/** Group items by repository, keeping the input order inside each group. */
function groupByRepository<T>(items: readonly T[], key: (item: T) => string): T[][] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return [...groups.values()];
}
