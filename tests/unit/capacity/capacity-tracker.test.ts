import { describe, it, expect, beforeEach } from 'vitest';

import { CapacityTracker } from '@/capacity/capacity-tracker.js';
import type { RepositoryHandle } from '@/drive/types.js';

import { createMockLogger } from '../../helpers/logger.js';

function handle(overrides: Partial<RepositoryHandle> = {}): RepositoryHandle {
  return {
    name: 'storage-0001',
    committedBytes: 0,
    ceilingBytes: 100,
    status: 'OPEN',
    createdAt: '2026-01-15T00:00:00.000Z',
    ...overrides,
  };
}

describe('CapacityTracker', () => {
  let tracker: CapacityTracker;

  beforeEach(() => {
    tracker = new CapacityTracker({ fullMarginBytes: 0, logger: createMockLogger().asLogger });
  });

  it('accepts reservations up to the ceiling', () => {
    const repo = handle();

    expect(tracker.reserve(repo, 60)).toEqual({ ok: true });
    expect(tracker.reserve(repo, 40)).toEqual({ ok: true });
    expect(tracker.available(repo)).toBe(0);
  });

  it('rejects a reservation of 2 after one of ceiling - 1', () => {
    const repo = handle({ ceilingBytes: 10 });

    expect(tracker.reserve(repo, 9)).toEqual({ ok: true });
    expect(tracker.reserve(repo, 2)).toEqual({ ok: false, reason: 'insufficient' });
  });

  it('counts committed bytes against the ceiling', () => {
    const repo = handle({ committedBytes: 95 });

    expect(tracker.reserve(repo, 6)).toEqual({ ok: false, reason: 'insufficient' });
    expect(tracker.reserve(repo, 5)).toEqual({ ok: true });
  });

  it('moves confirmed bytes into committedBytes', () => {
    const repo = handle();
    tracker.reserve(repo, 30);

    tracker.confirm(repo, 30);

    expect(repo.committedBytes).toBe(30);
    expect(tracker.reservedBytes(repo.name)).toBe(0);
  });

  it('gives released bytes back without committing them', () => {
    const repo = handle();
    tracker.reserve(repo, 70);

    tracker.release(repo, 70);

    expect(repo.committedBytes).toBe(0);
    expect(tracker.reserve(repo, 100)).toEqual({ ok: true });
  });

  it('rejects every reservation once FULL', () => {
    const repo = handle();
    tracker.markFull(repo);

    expect(tracker.reserve(repo, 1)).toEqual({ ok: false, reason: 'full' });
    expect(tracker.available(repo)).toBe(0);
  });

  it('marks a repository FULL when free space drops below the margin', () => {
    const marginTracker = new CapacityTracker({
      fullMarginBytes: 10,
      logger: createMockLogger().asLogger,
    });
    const repo = handle();
    marginTracker.reserve(repo, 91);

    marginTracker.confirm(repo, 91);

    expect(repo.status).toBe('FULL');
  });

  it('keeps a repository OPEN while free space is at least the margin', () => {
    const marginTracker = new CapacityTracker({
      fullMarginBytes: 10,
      logger: createMockLogger().asLogger,
    });
    const repo = handle();
    marginTracker.reserve(repo, 90);

    marginTracker.confirm(repo, 90);

    expect(repo.status).toBe('OPEN');
  });

  it('refuses to settle more bytes than are reserved', () => {
    const repo = handle();
    tracker.reserve(repo, 10);

    expect(() => tracker.confirm(repo, 11)).toThrow(
      'No reservation of 11 bytes held for storage-0001 (held: 10)'
    );
  });

  it('never lets confirmed bytes exceed the ceiling over a sequence of reservations', () => {
    const repo = handle({ ceilingBytes: 50 });
    const sizes = [7, 13, 20, 1, 9, 30, 4, 2, 50, 3];

    for (const size of sizes) {
      if (tracker.reserve(repo, size).ok) {
        tracker.confirm(repo, size);
      }
      expect(repo.committedBytes).toBeLessThanOrEqual(repo.ceilingBytes);
    }
    // 7+13+20+1+9 = 50, everything after is rejected
    expect(repo.committedBytes).toBe(50);
  });
});
