import { describe, expect, it } from 'vitest';
import { SnapshotOutput } from '../types';
import { SnapshotStore, snapshotIdFor } from './snapshot-store';

function snapshotWith(total: number): SnapshotOutput {
  return {
    sections: {},
    metadata: {
      avg_confidence: 0.9,
      total_sections: total,
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
}

describe('snapshotIdFor', () => {
  it('uses the filename stem', () => {
    expect(snapshotIdFor('acme-kickoff.vtt')).toBe('acme-kickoff');
    expect(snapshotIdFor('calls/2024/acme-review.vtt')).toBe('acme-review');
  });

  it('falls back to a default id', () => {
    expect(snapshotIdFor('')).toBe('transcript');
  });
});

describe('SnapshotStore', () => {
  it('keeps snapshots per user', () => {
    const store = new SnapshotStore(() => new Date('2025-01-01T00:00:00.000Z'));

    store.save('user-a', 'kickoff', snapshotWith(11));
    store.save('user-b', 'review', snapshotWith(11));

    expect(store.get('user-a', 'kickoff')).toEqual({
      id: 'kickoff',
      user_id: 'user-a',
      snapshot: snapshotWith(11),
      created_at: '2025-01-01T00:00:00.000Z',
    });
    expect(store.get('user-a', 'review')).toBeUndefined();
    expect(store.list('user-b').map((s) => s.id)).toEqual(['review']);
    expect(store.list('nobody')).toEqual([]);
    expect(store.size()).toBe(2);
  });

  it('replaces a snapshot saved under the same id and moves it last', () => {
    const store = new SnapshotStore();

    store.save('user-a', 'first', snapshotWith(1));
    store.save('user-a', 'second', snapshotWith(2));
    store.save('user-a', 'first', snapshotWith(3));

    expect(store.list('user-a').map((s) => [s.id, s.snapshot.metadata.total_sections])).toEqual([
      ['second', 2],
      ['first', 3],
    ]);
  });

  it('prunes snapshots created before the cutoff', () => {
    let now = new Date('2025-01-01T00:00:00.000Z');
    const store = new SnapshotStore(() => now);

    store.save('user-a', 'old', snapshotWith(1));
    store.save('user-b', 'old', snapshotWith(1));
    now = new Date('2025-01-01T02:00:00.000Z');
    store.save('user-a', 'new', snapshotWith(1));

    expect(store.pruneOlderThan(new Date('2025-01-01T01:00:00.000Z'))).toBe(2);
    expect(store.list('user-a').map((s) => s.id)).toEqual(['new']);
    expect(store.list('user-b')).toEqual([]);
    expect(store.size()).toBe(1);
  });
});
