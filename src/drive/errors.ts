import createError from '@fastify/error';

// Drive errors (DRIVE_*)

/** Logical file name absent from the snapshot (404) */
export const NotFoundError = createError<[string]>(
  'DRIVE_NOT_FOUND',
  'No such file on drive: %s',
  404
);

/** Upload target name already recorded; the namespace is append-only (409) */
export const AlreadyExistsError = createError<[string]>(
  'DRIVE_ALREADY_EXISTS',
  'File already exists on drive: %s',
  409
);

/** Remote file name rejected before any metadata access (400) */
export const InvalidNameError = createError<[string]>(
  'DRIVE_INVALID_NAME',
  'Invalid remote file name: %s',
  400
);

/** Metadata repository unreachable, unreadable or unwritable (503) */
export const MetadataUnavailableError = createError<[string]>(
  'DRIVE_METADATA_UNAVAILABLE',
  'Metadata unavailable: %s',
  503
);

/** Snapshot written by an incompatible format version; writes are refused (409) */
export const MetadataIncompatibleError = createError<[string, string]>(
  'DRIVE_METADATA_INCOMPATIBLE',
  'Metadata format %s is incompatible with %s; only read operations are allowed',
  409
);

/** Remote snapshot revision moved since it was loaded (409) */
export const MetadataConflictError = createError<[number, number]>(
  'DRIVE_METADATA_CONFLICT',
  'Metadata changed concurrently: loaded revision %s, remote revision %s',
  409
);

/** Snapshot failed validation before commit; nothing was written (500) */
export const MetadataInvalidError = createError<[string]>(
  'DRIVE_METADATA_INVALID',
  'Refusing to commit an invalid snapshot: %s',
  500
);

/** Repository creation rejected by the host; not retried within an operation (502) */
export const ProvisionFailedError = createError<[string, string]>(
  'DRIVE_PROVISION_FAILED',
  'Failed to provision repository %s: %s',
  502
);

/** Transient transfer failures outlasted the retry budget (503) */
export const TransferTransientError = createError<[string]>(
  'DRIVE_TRANSFER_TRANSIENT',
  'Transfer failed after retries: %s',
  503
);

/** Host kept throttling after the retry budget was spent (429) */
export const TransferRateLimitedError = createError<[string]>(
  'DRIVE_TRANSFER_RATE_LIMITED',
  'Transfer rate limited after retries: %s',
  429
);

/** Transfer failure that retrying cannot fix (502) */
export const TransferPermanentError = createError<[string, string]>(
  'DRIVE_TRANSFER_PERMANENT',
  'Transfer failed permanently for %s: %s',
  502
);

/** Chunk set handed to join is gapped or does not start at 0 (500) */
export const IncompleteSequenceError = createError<[string]>(
  'DRIVE_INCOMPLETE_SEQUENCE',
  'Incomplete chunk sequence: %s',
  500
);

export const InvalidChunkSizeError = createError<[number]>(
  'DRIVE_INVALID_CHUNK_SIZE',
  'Chunk size must be a positive integer, got %s',
  500
);

/** Reassembled bytes differ from what was recorded at upload (500) */
export const ChecksumMismatchError = createError<[string, string]>(
  'DRIVE_CHECKSUM_MISMATCH',
  'Integrity check failed for %s: %s',
  500
);

/** Another writer holds the single-writer lease (423) */
export const WriterBusyError = createError<[string]>(
  'DRIVE_WRITER_BUSY',
  'Another writer holds the drive lease: %s',
  423
);

/** Operation aborted before it committed (499) */
export const OperationCancelledError = createError<[string]>(
  'DRIVE_CANCELLED',
  'Operation cancelled: %s',
  499
);

/** True for any error carrying a DRIVE_* code. */
export function isDriveError(error: unknown): error is Error & { code: string; statusCode?: number } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('DRIVE_')
  );
}
