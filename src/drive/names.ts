import { createHash } from 'node:crypto';

import { InvalidNameError } from './errors.js';

const MAX_NAME_LENGTH = 1024;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Validate a remote file name. Names are slash-separated paths without
 * empty, `.` or `..` segments and without a leading or trailing slash.
 */
export function assertValidName(name: string): void {
  if (name.length === 0) {
    throw new InvalidNameError('name is empty');
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(`name longer than ${MAX_NAME_LENGTH} characters`);
  }
  if (CONTROL_CHARS.test(name)) {
    throw new InvalidNameError(`${JSON.stringify(name)} contains control characters`);
  }
  for (const segment of name.split('/')) {
    if (segment === '' || segment === '.' || segment === '..') {
      throw new InvalidNameError(`${name} has an empty, "." or ".." segment`);
    }
  }
}

/**
 * Object name of chunk `index` of a file.
 *
 * Derived from the file's content digest and its name, so a retried push
 * targets the same object while two files with identical content never
 * share one.
 */
export function chunkIdFor(name: string, checksum: string, index: number): string {
  const nameDigest = createHash('sha256').update(name).digest('hex').slice(0, 16);
  return `${checksum}_${nameDigest}_${String(index).padStart(4, '0')}.chunk`;
}
