import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SnapshotOutput } from '../types';
import { pruneExpiredSnapshots, startRetentionScheduler } from './scheduler';
import { SnapshotStore } from './snapshot-store';

const cronMock = vi.hoisted(() => ({
  validate: vi.fn((_expression: string) => true),
  schedule: vi.fn((_expression: string, _task: () => void) => ({ stop: vi.fn() })),
}));

vi.mock('node-cron', () => ({ default: cronMock }));

const HOUR_MS = 60 * 60 * 1000;

const emptySnapshot: SnapshotOutput = {
  sections: {},
  metadata: {
    avg_confidence: 0,
    total_sections: 0,
    entities_extracted: {},
    topics_identified: [],
    low_confidence_sections: [],
  },
  validation: {
    factual_consistency: true,
    completeness: true,
    quality: true,
    issues: [],
    improvements: [],
    requires_improvements: false,
    missing_critical_info: [],
  },
  missing_fields: [],
};

describe('pruneExpiredSnapshots', () => {
  it('removes snapshots older than the retention window', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    let now = new Date('2025-03-01T00:00:00.000Z');
    const store = new SnapshotStore(() => now);
    store.save('user-a', 'stale', emptySnapshot);
    now = new Date('2025-03-01T20:00:00.000Z');
    store.save('user-a', 'fresh', emptySnapshot);

    const removed = pruneExpiredSnapshots(store, 12, new Date('2025-03-02T00:00:00.000Z'));

    expect(removed).toBe(1);
    expect(store.list('user-a').map((s) => s.id)).toEqual(['fresh']);
    expect(log).toHaveBeenCalledWith(
      '[Scheduler] Removed 1 snapshots older than 12h (before 2025-03-01T12:00:00.000Z); 1 remaining'
    );
    log.mockRestore();
  });
});

describe('startRetentionScheduler', () => {
  beforeEach(() => {
    cronMock.validate.mockClear();
    cronMock.schedule.mockClear();
  });

  it('schedules pruning on the configured expression', () => {
    const store = new SnapshotStore(() => new Date(Date.now() - 48 * HOUR_MS));
    store.save('user-a', 'expired', emptySnapshot);

    const task = startRetentionScheduler(store, { retentionHours: 24, cleanupSchedule: '*/5 * * * *' });

    expect(task).not.toBeNull();
    expect(cronMock.validate).toHaveBeenCalledWith('*/5 * * * *');
    expect(cronMock.schedule).toHaveBeenCalledTimes(1);

    const [expression, run] = cronMock.schedule.mock.calls[0];
    expect(expression).toBe('*/5 * * * *');

    run();
    expect(store.size()).toBe(0);
  });

  it('does not schedule an invalid expression', () => {
    cronMock.validate.mockReturnValueOnce(false);

    const task = startRetentionScheduler(new SnapshotStore(), { retentionHours: 24, cleanupSchedule: 'nonsense' });

    expect(task).toBeNull();
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });
});
