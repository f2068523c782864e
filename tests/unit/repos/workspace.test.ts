import { access, mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { WorkspaceScope, withWorkspace } from '@/repos/workspace.js';

import { createMockLogger } from '../../helpers/logger.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('WorkspaceScope', () => {
  let root: string;
  const logger = createMockLogger().asLogger;

  const fakeCheckout = vi.fn(async (name: string, dir: string) => {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'README'), name);
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'workspace-'));
    fakeCheckout.mockClear();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('fetches each repository once per scope', async () => {
    const scope = await WorkspaceScope.open({ rootDir: root, label: 'op', checkout: fakeCheckout, logger });

    const [a, b] = await Promise.all([scope.checkout('storage-0001'), scope.checkout('storage-0001')]);

    expect(a).toBe(b);
    expect(fakeCheckout).toHaveBeenCalledTimes(1);
    await scope.dispose();
  });

  it('retries a checkout that failed earlier', async () => {
    const scope = await WorkspaceScope.open({ rootDir: root, label: 'op', checkout: fakeCheckout, logger });
    fakeCheckout.mockRejectedValueOnce(new Error('offline'));

    await expect(scope.checkout('storage-0001')).rejects.toThrow('offline');
    await expect(scope.checkout('storage-0001')).resolves.toBe(join(scope.dir, 'storage-0001'));
    expect(fakeCheckout).toHaveBeenCalledTimes(2);
    await scope.dispose();
  });

  it('gives fresh() a new directory every time', async () => {
    const scope = await WorkspaceScope.open({ rootDir: root, label: 'op', checkout: fakeCheckout, logger });

    const first = await scope.fresh('metadata');
    const second = await scope.fresh('metadata');

    expect(first).toBe(join(scope.dir, 'metadata.1'));
    expect(second).toBe(join(scope.dir, 'metadata.2'));
    await scope.dispose();
  });

  it('removes its directory on dispose and refuses further use', async () => {
    const scope = await WorkspaceScope.open({ rootDir: root, label: 'op', checkout: fakeCheckout, logger });
    await scope.checkout('storage-0001');

    await scope.dispose();

    expect(await exists(scope.dir)).toBe(false);
    expect(() => scope.checkout('storage-0001')).toThrow('already disposed');
  });
});

describe('withWorkspace', () => {
  let root: string;
  const logger = createMockLogger().asLogger;
  const checkout = async (_name: string, dir: string): Promise<void> => {
    await mkdir(dir, { recursive: true });
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'workspace-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns the callback result and cleans up', async () => {
    const result = await withWorkspace({ rootDir: root, label: 'ok', checkout, logger }, async (scope) => {
      await scope.checkout('storage-0001');
      return 42;
    });

    expect(result).toBe(42);
    expect(await readdir(root)).toEqual([]);
  });

  it('cleans up when the callback throws', async () => {
    await expect(
      withWorkspace({ rootDir: root, label: 'fail', checkout, logger }, async (scope) => {
        await scope.checkout('storage-0001');
        throw new Error('transfer failed');
      })
    ).rejects.toThrow('transfer failed');

    expect(await readdir(root)).toEqual([]);
  });
});
