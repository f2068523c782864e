// Repository host interface.
//
// A host offers the generic primitives the drive is built on: create a
// repository, check it exists, fetch a working copy, commit local changes
// and push them back. Everything above this layer treats these calls as
// opaque, possibly slow, possibly throttled I/O.

/**
 * Abstract repository host.
 * Implementations must make `push` idempotent: pushing a working copy whose
 * contents already match the remote is a successful no-op.
 */
export interface RepositoryHost {
  /** Host kind, for logging and health output */
  readonly kind: 'github' | 'local';

  /** Whether a repository with this name exists */
  exists(name: string): Promise<boolean>;

  /** Create an empty repository; fails if the host refuses */
  create(name: string): Promise<void>;

  /** Fetch a working copy of `name` into the empty directory `dir` */
  checkout(name: string, dir: string): Promise<void>;

  /** Record every change in `dir`; returns false when there was nothing to record */
  commit(dir: string, message: string): Promise<boolean>;

  /** Publish recorded changes of the working copy in `dir` to repository `name` */
  push(name: string, dir: string): Promise<void>;

  /** Health check -- returns true if the host is reachable */
  healthy(): Promise<boolean>;
}
