// Directory-backed repository host.
//
// Each repository is a directory under `rootDir`. A checkout copies the
// directory, a push copies the working copy back. No git involved, which
// makes it the development and test backend.

import { access, cp, mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { RepositoryHost } from './types.js';

const VALID_NAME = /^[A-Za-z0-9._-]+$/;

export class LocalHost implements RepositoryHost {
  readonly kind = 'local';
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async exists(name: string): Promise<boolean> {
    try {
      await access(this.repoPath(name));
      return true;
    } catch {
      return false;
    }
  }

  async create(name: string): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
    // Non-recursive: fails with EEXIST instead of silently reusing a directory
    await mkdir(this.repoPath(name));
  }

  async checkout(name: string, dir: string): Promise<void> {
    const source = this.repoPath(name);
    await access(source);
    await mkdir(dir, { recursive: true });
    await cp(source, dir, { recursive: true });
  }

  async commit(dir: string, _message: string): Promise<boolean> {
    const entries = await readdir(dir);
    return entries.length > 0;
  }

  async push(name: string, dir: string): Promise<void> {
    const target = this.repoPath(name);
    await access(target);
    await cp(dir, target, { recursive: true, force: true });
  }

  async healthy(): Promise<boolean> {
    try {
      await mkdir(this.rootDir, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  private repoPath(name: string): string {
    if (!VALID_NAME.test(name)) {
      throw new Error(`Invalid repository name: ${name}`);
    }
    return join(this.rootDir, name);
  }
}
