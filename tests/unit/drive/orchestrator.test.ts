import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DriveOrchestrator, type StateChangeEvent } from '@/drive/orchestrator.js';
import { LocalHost } from '@/host/local-host.js';
import { LocalWriterLease } from '@/lease/writer-lease.js';
import { SNAPSHOT_FILE } from '@/metadata/metadata-store.js';
import type { Config } from '@/config/index.js';

import { createTestConfig } from '../../helpers/config.js';
import { createMockLogger } from '../../helpers/logger.js';
import { ScriptedHost } from '../../helpers/scripted-host.js';

describe('DriveOrchestrator', () => {
  let root: string;
  let host: ScriptedHost;
  let events: StateChangeEvent[];

  function createDrive(
    config: Config,
    hooks: { onStateChange?: (event: StateChangeEvent) => void } = {}
  ): DriveOrchestrator {
    return new DriveOrchestrator({
      settings: config,
      host,
      logger: createMockLogger().asLogger,
      hooks: {
        onStateChange: (event) => {
          events.push(event);
          hooks.onStateChange?.(event);
        },
      },
    });
  }

  const remoteSnapshot = () => readFile(join(root, 'remote', 'metadata', SNAPSHOT_FILE), 'utf-8');

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'orchestrator-'));
    host = new ScriptedHost(new LocalHost(join(root, 'remote')));
    events = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('init', () => {
    it('creates the metadata repository and an empty snapshot', async () => {
      const drive = createDrive(createTestConfig(root));

      await expect(drive.init()).resolves.toEqual({ repositoryCreated: true, snapshotCreated: true });
      await expect(drive.init()).resolves.toEqual({ repositoryCreated: false, snapshotCreated: false });
      expect(JSON.parse(await remoteSnapshot())).toMatchObject({ revision: 1, files: [], repositories: [] });
    });
  });

  describe('upload and download', () => {
    let drive: DriveOrchestrator;

    beforeEach(async () => {
      drive = createDrive(createTestConfig(root, { chunkSizeBytes: 4, maxSizePerRepoBytes: 10 }));
      await drive.init();
      host.reset();
      events = [];
    });

    it('stores a file as ordered chunks and lists it', async () => {
      const file = await drive.upload('notes/a.txt', Buffer.from('0123456789'));

      expect(file.size).toBe(10);
      expect(file.chunks.map((c) => [c.index, c.size, c.repository])).toEqual([
        [0, 4, 'storage-0001'],
        [1, 4, 'storage-0001'],
        [2, 2, 'storage-0001'],
      ]);
      await expect(drive.ls()).resolves.toEqual([
        { name: 'notes/a.txt', size: 10, chunks: 3, uploadedAt: file.uploadedAt },
      ]);
    });

    it('walks the operation states in order', async () => {
      await drive.upload('a.txt', Buffer.from('abc'));

      expect(events.map((e) => e.state)).toEqual([
        'RESOLVING_METADATA',
        'PLANNING',
        'TRANSFERRING',
        'COMMITTING',
        'DONE',
      ]);
      expect(new Set(events.map((e) => e.operation))).toEqual(new Set(['upload']));
    });

    it('downloads the exact bytes that were uploaded', async () => {
      const data = Buffer.from('the quick brown fox jumps over the lazy dog');
      await drive.upload('fox.txt', data);
      const target = join(root, 'out', 'fox.txt');

      const file = await drive.download('fox.txt', target);

      expect(file.name).toBe('fox.txt');
      expect((await readFile(target)).equals(data)).toBe(true);
      expect(await readdir(join(root, 'out'))).toEqual(['fox.txt']);
    });

    it('spreads a large file over several repositories, first fit', async () => {
      const data = Buffer.from('abcdefghijklmnopqrstuvwxyz');
      const file = await drive.upload('alphabet.txt', data);

      // The trailing 2-byte chunk still fits the first repository
      expect(file.chunks.map((c) => c.repository)).toEqual([
        'storage-0001',
        'storage-0001',
        'storage-0002',
        'storage-0002',
        'storage-0003',
        'storage-0003',
        'storage-0001',
      ]);
      const repos = await drive.repositories();
      expect(repos.map((r) => [r.name, r.committedBytes])).toEqual([
        ['storage-0001', 10],
        ['storage-0002', 8],
        ['storage-0003', 8],
      ]);

      const { data: read } = await drive.read('alphabet.txt');
      expect(read.toString()).toBe('abcdefghijklmnopqrstuvwxyz');
    });

    it('round-trips an empty file', async () => {
      const file = await drive.upload('empty', Buffer.alloc(0));

      expect(file.chunks).toEqual([]);
      const { data } = await drive.read('empty');
      expect(data.length).toBe(0);
    });

    it('refuses a second upload of the same name and leaves metadata unchanged', async () => {
      await drive.upload('a.txt', Buffer.from('first'));
      const before = await remoteSnapshot();

      await expect(drive.upload('a.txt', Buffer.from('second'))).rejects.toMatchObject({
        code: 'DRIVE_ALREADY_EXISTS',
      });

      expect(await remoteSnapshot()).toBe(before);
      expect(events.at(-1)?.state).toBe('FAILED');
    });

    it('reports a missing file without touching any data repository', async () => {
      await expect(drive.download('missing.txt', join(root, 'out'))).rejects.toMatchObject({
        code: 'DRIVE_NOT_FOUND',
        statusCode: 404,
      });

      expect(host.calls).toEqual([{ method: 'checkout', target: 'metadata' }]);
    });

    it('rejects invalid names before reading metadata', async () => {
      await expect(drive.upload('../x', Buffer.from('x'))).rejects.toMatchObject({
        code: 'DRIVE_INVALID_NAME',
      });
      expect(host.calls).toEqual([]);
    });

    it('rides out rate limiting below the retry ceiling', async () => {
      host.failNext('push', new Error('HTTP 429 rate limit'), new Error('HTTP 429 rate limit'));

      await drive.upload('a.txt', Buffer.from('abc'));

      await expect(drive.ls()).resolves.toHaveLength(1);
    });

    it('records nothing when a chunk transfer fails for good', async () => {
      const before = await remoteSnapshot();
      host.failNext('push', new Error('remote: Repository not found.'));

      await expect(drive.upload('a.txt', Buffer.from('abcdefgh'))).rejects.toMatchObject({
        code: 'DRIVE_TRANSFER_PERMANENT',
      });

      expect(await remoteSnapshot()).toBe(before);
      await expect(drive.ls()).resolves.toEqual([]);
    });

    it('surfaces ProvisionFailed when repository creation is refused', async () => {
      host.failNext('create', new Error('GraphQL: was submitted too quickly'));

      await expect(drive.upload('a.txt', Buffer.from('abc'))).rejects.toMatchObject({
        code: 'DRIVE_PROVISION_FAILED',
      });
      expect(host.callsTo('push')).toHaveLength(0);
    });

    it('detects corrupted chunk data on download', async () => {
      const file = await drive.upload('a.txt', Buffer.from('abcdef'));
      const chunk = file.chunks[1];
      if (!chunk) throw new Error('expected two chunks');
      await writeFile(join(root, 'remote', chunk.repository, 'chunks', chunk.chunkId), 'XY');

      await expect(drive.read('a.txt')).rejects.toMatchObject({ code: 'DRIVE_CHECKSUM_MISMATCH' });
    });

    it('serializes concurrent operations', async () => {
      const [first, second] = await Promise.allSettled([
        drive.upload('same.txt', Buffer.from('one')),
        drive.upload('same.txt', Buffer.from('two')),
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second).toMatchObject({ status: 'rejected', reason: { code: 'DRIVE_ALREADY_EXISTS' } });
    });
  });

  it('falls through to a new repository when a chunk of 2 follows one of ceiling - 1', async () => {
    // Ceiling Z = 10, chunks of Z - 1 = 9 and 2 bytes
    const drive = createDrive(createTestConfig(root, { chunkSizeBytes: 9, maxSizePerRepoBytes: 10 }));
    await drive.init();
    const data = Buffer.from('ABCDEFGHIJK');

    const file = await drive.upload('eleven.bin', data);

    expect(file.chunks.map((c) => [c.size, c.repository])).toEqual([
      [9, 'storage-0001'],
      [2, 'storage-0002'],
    ]);
    const target = join(root, 'eleven.bin');
    await drive.download('eleven.bin', target);
    expect((await readFile(target)).equals(data)).toBe(true);
  });

  it('closes repositories whose free space drops below the margin', async () => {
    const drive = createDrive(
      createTestConfig(root, { chunkSizeBytes: 4, maxSizePerRepoBytes: 10, fullMarginBytes: 3 })
    );
    await drive.init();

    await drive.upload('a.bin', Buffer.from('abcdefgh'));
    await drive.upload('b.bin', Buffer.from('x'));

    const repos = await drive.repositories();
    expect(repos.map((r) => [r.name, r.committedBytes, r.status])).toEqual([
      ['storage-0001', 8, 'FULL'],
      ['storage-0002', 1, 'OPEN'],
    ]);
  });

  it('stops pushing to other repositories once one of them fails', async () => {
    // One-byte chunks: ten per repository, two repositories pushed in parallel
    const drive = createDrive(createTestConfig(root, { chunkSizeBytes: 1, maxSizePerRepoBytes: 10 }));
    await drive.init();
    const before = await remoteSnapshot();
    host.reset();
    host.failNext('push', new Error('remote: Permission denied'));

    await expect(drive.upload('twenty.bin', Buffer.alloc(20, 7))).rejects.toMatchObject({
      code: 'DRIVE_TRANSFER_PERMANENT',
    });

    // The failed push plus at most the one already in flight on the other lane
    expect(host.callsTo('push').length).toBeLessThanOrEqual(2);
    expect(await remoteSnapshot()).toBe(before);
  });

  describe('interrupted uploads', () => {
    it('forgets an upload that crashed before commit and accepts it again', async () => {
      let crash = true;
      const drive = createDrive(createTestConfig(root), {
        onStateChange: (event) => {
          if (crash && event.operation === 'upload' && event.state === 'COMMITTING') {
            throw new Error('simulated crash');
          }
        },
      });
      await drive.init();
      const data = Buffer.from('0123456789');

      await expect(drive.upload('a.txt', data)).rejects.toThrow('simulated crash');
      await expect(drive.ls()).resolves.toEqual([]);
      // The crashed run already created storage-0001 on the host
      expect(await host.exists('storage-0001')).toBe(true);

      crash = false;
      const file = await drive.upload('a.txt', data);

      // storage-0001 already holds the 10 orphaned bytes and is closed on adoption
      expect(file.chunks.every((c) => c.repository === 'storage-0002')).toBe(true);
      const repos = await drive.repositories();
      expect(repos.map((r) => [r.name, r.committedBytes, r.status])).toEqual([
        ['storage-0001', 10, 'FULL'],
        ['storage-0002', 10, 'OPEN'],
      ]);
      const { data: read } = await drive.read('a.txt');
      expect(read.equals(data)).toBe(true);
    });

    it('never overfills a repository adopted from a crashed upload', async () => {
      let crash = true;
      const drive = createDrive(createTestConfig(root, { chunkSizeBytes: 5, maxSizePerRepoBytes: 10 }), {
        onStateChange: (event) => {
          if (crash && event.operation === 'upload' && event.state === 'COMMITTING') {
            throw new Error('simulated crash');
          }
        },
      });
      await drive.init();
      await expect(drive.upload('a.bin', Buffer.alloc(10, 1))).rejects.toThrow('simulated crash');

      crash = false;
      await drive.upload('b.bin', Buffer.alloc(10, 2));

      const orphan = await readdir(join(root, 'remote', 'storage-0001', 'chunks'));
      expect(orphan).toHaveLength(2);
      const repos = await drive.repositories();
      expect(repos.map((r) => [r.name, r.committedBytes, r.status])).toEqual([
        ['storage-0001', 10, 'FULL'],
        ['storage-0002', 10, 'OPEN'],
      ]);
    });

    it('never commits when cancelled after the transfers', async () => {
      const controller = new AbortController();
      const drive = createDrive(createTestConfig(root), {
        onStateChange: (event) => {
          if (event.operation === 'upload' && event.state === 'TRANSFERRING') {
            // Lands before the first chunk push
            controller.abort();
          }
        },
      });
      await drive.init();
      const before = await remoteSnapshot();

      await expect(
        drive.upload('a.txt', Buffer.from('0123456789'), { signal: controller.signal })
      ).rejects.toMatchObject({ code: 'DRIVE_CANCELLED' });

      expect(await remoteSnapshot()).toBe(before);
      const uploadStates = events.filter((e) => e.operation === 'upload').map((e) => e.state);
      expect(uploadStates).toEqual(['RESOLVING_METADATA', 'PLANNING', 'TRANSFERRING', 'FAILED']);
    });
  });

  describe('metadata format', () => {
    it('refuses uploads against an incompatible snapshot but still lists it', async () => {
      const drive = createDrive(createTestConfig(root));
      await drive.init();
      const snapshot = JSON.parse(await remoteSnapshot());
      await writeFile(
        join(root, 'remote', 'metadata', SNAPSHOT_FILE),
        JSON.stringify({ ...snapshot, version: '0.1.0' })
      );

      await expect(drive.upload('a.txt', Buffer.from('abc'))).rejects.toMatchObject({
        code: 'DRIVE_METADATA_INCOMPATIBLE',
        message: 'Metadata format 0.1.0 is incompatible with 0.2.0; only read operations are allowed',
      });
      await expect(drive.ls()).resolves.toEqual([]);
    });
  });

  describe('writer lease', () => {
    it('refuses to mutate while another writer holds the lease', async () => {
      const lease = new LocalWriterLease();
      await lease.acquire('someone-else');
      const drive = new DriveOrchestrator({
        settings: createTestConfig(root),
        host,
        logger: createMockLogger().asLogger,
        lease,
      });

      await expect(drive.init()).rejects.toMatchObject({ code: 'DRIVE_WRITER_BUSY' });
      expect(host.calls).toEqual([]);
    });
  });
});
