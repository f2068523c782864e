// Operation-scoped local working copies.
//
// One scope per operation: every repository is fetched at most once into a
// private temp directory and reused for all chunks of that operation, then
// the whole directory is removed by dispose(), success or failure.

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

/** Fetches repository `name` into the empty or absent directory `dir`. */
export type CheckoutFn = (name: string, dir: string) => Promise<void>;

export class WorkspaceScope {
  readonly dir: string;
  private readonly checkoutFn: CheckoutFn;
  private readonly logger: FastifyBaseLogger;
  private readonly copies = new Map<string, Promise<string>>();
  private freshCount = 0;
  private disposed = false;

  private constructor(dir: string, checkoutFn: CheckoutFn, logger: FastifyBaseLogger) {
    this.dir = dir;
    this.checkoutFn = checkoutFn;
    this.logger = logger;
  }

  /** Create a scope directory under `rootDir`. */
  static async open(options: {
    rootDir: string;
    label: string;
    checkout: CheckoutFn;
    logger: FastifyBaseLogger;
  }): Promise<WorkspaceScope> {
    const root = resolve(options.rootDir);
    await mkdir(root, { recursive: true });
    const dir = await mkdtemp(join(root, `${options.label}-`));
    return new WorkspaceScope(dir, options.checkout, options.logger);
  }

  /**
   * Working copy of `name`, fetched on first use and shared afterwards.
   * A failed fetch is forgotten so the next caller tries again.
   */
  checkout(name: string): Promise<string> {
    this.assertOpen();
    const existing = this.copies.get(name);
    if (existing) return existing;

    const dir = join(this.dir, name);
    const pending = this.checkoutFn(name, dir).then(() => {
      this.logger.debug({ repository: name, dir }, 'Working copy ready');
      return dir;
    });
    pending.catch(() => {
      this.copies.delete(name);
    });
    this.copies.set(name, pending);
    return pending;
  }

  /** A new working copy of `name`, never shared with earlier checkouts. */
  async fresh(name: string): Promise<string> {
    this.assertOpen();
    this.freshCount += 1;
    const dir = join(this.dir, `${name}.${this.freshCount}`);
    await this.checkoutFn(name, dir);
    return dir;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    // Let in-flight checkouts settle before deleting under them
    await Promise.allSettled(this.copies.values());
    this.copies.clear();
    await rm(this.dir, { recursive: true, force: true });
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw new Error(`Workspace ${this.dir} already disposed`);
    }
  }
}

/**
 * Run `fn` inside a fresh scope and always dispose it afterwards.
 */
export async function withWorkspace<T>(
  options: Parameters<typeof WorkspaceScope.open>[0],
  fn: (scope: WorkspaceScope) => Promise<T>
): Promise<T> {
  const scope = await WorkspaceScope.open(options);
  try {
    return await fn(scope);
  } finally {
    try {
      await scope.dispose();
    } catch (error) {
      options.logger.warn(
        { dir: scope.dir, err: error instanceof Error ? error.message : 'Unknown error' },
        'Failed to remove workspace'
      );
    }
  }
}
