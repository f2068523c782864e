// Process exit status per failure class.

export const EXIT_CODES = {
  OK: 0,
  UNEXPECTED: 1,
  USAGE: 2,
  NOT_FOUND: 3,
  ALREADY_EXISTS: 4,
  TRANSFER_FAILED: 5,
  METADATA_UNAVAILABLE: 6,
  PROVISION_FAILED: 7,
  INTEGRITY: 8,
  CONFIG: 9,
  WRITER_BUSY: 10,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const BY_ERROR_CODE: Record<string, ExitCode> = {
  DRIVE_INVALID_NAME: EXIT_CODES.USAGE,
  DRIVE_NOT_FOUND: EXIT_CODES.NOT_FOUND,
  DRIVE_ALREADY_EXISTS: EXIT_CODES.ALREADY_EXISTS,
  DRIVE_TRANSFER_TRANSIENT: EXIT_CODES.TRANSFER_FAILED,
  DRIVE_TRANSFER_RATE_LIMITED: EXIT_CODES.TRANSFER_FAILED,
  DRIVE_TRANSFER_PERMANENT: EXIT_CODES.TRANSFER_FAILED,
  DRIVE_METADATA_UNAVAILABLE: EXIT_CODES.METADATA_UNAVAILABLE,
  DRIVE_METADATA_INCOMPATIBLE: EXIT_CODES.METADATA_UNAVAILABLE,
  DRIVE_METADATA_CONFLICT: EXIT_CODES.METADATA_UNAVAILABLE,
  DRIVE_METADATA_INVALID: EXIT_CODES.METADATA_UNAVAILABLE,
  DRIVE_PROVISION_FAILED: EXIT_CODES.PROVISION_FAILED,
  DRIVE_INCOMPLETE_SEQUENCE: EXIT_CODES.INTEGRITY,
  DRIVE_CHECKSUM_MISMATCH: EXIT_CODES.INTEGRITY,
  DRIVE_INVALID_CHUNK_SIZE: EXIT_CODES.CONFIG,
  DRIVE_WRITER_BUSY: EXIT_CODES.WRITER_BUSY,
  DRIVE_CANCELLED: EXIT_CODES.CANCELLED,
  CONFIG_MISSING: EXIT_CODES.CONFIG,
  CONFIG_PARSE_ERROR: EXIT_CODES.CONFIG,
  CONFIG_INVALID: EXIT_CODES.CONFIG,
};

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return BY_ERROR_CODE[error.code] ?? EXIT_CODES.UNEXPECTED;
  }
  return EXIT_CODES.UNEXPECTED;
}
