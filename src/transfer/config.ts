import { z } from 'zod';

/**
 * Default failure-classification rules.
 *
 * The hosting service does not document its throttling. These patterns are
 * matched case-insensitively against the failing command's stderr and error
 * message; operators retune them in config without code changes.
 */
export const DEFAULT_RATE_LIMITED_PATTERNS = [
  'rate limit',
  'secondary rate limit',
  'abuse detection',
  'too many requests',
  'http 429',
  'submitted too quickly',
  'was submitted too quickly',
];

export const DEFAULT_TRANSIENT_PATTERNS = [
  'could not resolve host',
  'connection reset',
  'connection timed out',
  'operation timed out',
  'connection refused',
  'early eof',
  'the remote end hung up unexpectedly',
  'unexpected disconnect',
  'rpc failed',
  'http 500',
  'http 502',
  'http 503',
  'http 504',
  'internal server error',
  'temporarily unavailable',
  'could not read from remote repository',
];

export const DEFAULT_TRANSIENT_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EBUSY',
  'EAGAIN',
];

export const RetryPolicySchema = z.object({
  /** Total attempts including the first one */
  maxAttempts: z.number().int().min(1).max(20).default(5),
  /** First delay after a transient failure */
  baseDelayMs: z.number().int().min(0).default(1000),
  /** First delay after a rate-limit response (longer than transient) */
  rateLimitDelayMs: z.number().int().min(0).default(10_000),
  maxDelayMs: z.number().int().min(0).default(60_000),
  multiplier: z.number().min(1).max(10).default(2),
});

export const ClassifierRulesSchema = z.object({
  rateLimitedPatterns: z.array(z.string().min(1)).default(() => [...DEFAULT_RATE_LIMITED_PATTERNS]),
  transientPatterns: z.array(z.string().min(1)).default(() => [...DEFAULT_TRANSIENT_PATTERNS]),
  transientCodes: z.array(z.string().min(1)).default(() => [...DEFAULT_TRANSIENT_CODES]),
});

export const TransferConfigSchema = z
  .object({
    retry: RetryPolicySchema.default(() => ({
      maxAttempts: 5,
      baseDelayMs: 1000,
      rateLimitDelayMs: 10_000,
      maxDelayMs: 60_000,
      multiplier: 2,
    })),
    /** Number of data repositories transferred in parallel within one operation */
    concurrency: z.number().int().min(1).max(32).default(4),
    classifier: ClassifierRulesSchema.default(() => ({
      rateLimitedPatterns: [...DEFAULT_RATE_LIMITED_PATTERNS],
      transientPatterns: [...DEFAULT_TRANSIENT_PATTERNS],
      transientCodes: [...DEFAULT_TRANSIENT_CODES],
    })),
  })
  .default(() => ({
    retry: {
      maxAttempts: 5,
      baseDelayMs: 1000,
      rateLimitDelayMs: 10_000,
      maxDelayMs: 60_000,
      multiplier: 2,
    },
    concurrency: 4,
    classifier: {
      rateLimitedPatterns: [...DEFAULT_RATE_LIMITED_PATTERNS],
      transientPatterns: [...DEFAULT_TRANSIENT_PATTERNS],
      transientCodes: [...DEFAULT_TRANSIENT_CODES],
    },
  }));

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type ClassifierRules = z.infer<typeof ClassifierRulesSchema>;
export type TransferConfig = z.infer<typeof TransferConfigSchema>;
