import { CommandFailedError } from '../host/command-runner.js';

import type { ClassifierRules } from './config.js';

export type FailureClass = 'transient' | 'rate-limited' | 'permanent';

/**
 * Classify a failed host call.
 *
 * Rate-limit patterns win over transient ones: a throttled push usually also
 * reports a generic remote hang-up, and it needs the longer backoff.
 * Anything unrecognised is permanent.
 */
export function classifyFailure(error: unknown, rules: ClassifierRules): FailureClass {
  const text = failureText(error).toLowerCase();

  if (rules.rateLimitedPatterns.some((p) => text.includes(p.toLowerCase()))) {
    return 'rate-limited';
  }

  const code = errorCode(error);
  if (code !== undefined && rules.transientCodes.includes(code)) {
    return 'transient';
  }

  if (rules.transientPatterns.some((p) => text.includes(p.toLowerCase()))) {
    return 'transient';
  }

  return 'permanent';
}

/** Short human-readable reason for logs and terminal errors. */
export function describeFailure(error: unknown): string {
  if (error instanceof CommandFailedError) {
    const firstLine = error.stderr.trim().split('\n')[0];
    return firstLine ? `${error.command}: ${firstLine}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function failureText(error: unknown): string {
  if (error instanceof CommandFailedError) {
    return `${error.message}\n${error.stderr}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
