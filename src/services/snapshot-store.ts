/**
 * In-memory snapshot store, scoped per user. Entries live only as long as the
 * process and are pruned by the retention scheduler.
 */

import path from 'path';
import { SnapshotOutput, StoredSnapshot } from '../types';

/** Snapshot id derived from the transcript filename: its stem. */
export function snapshotIdFor(filename: string): string {
  const stem = path.parse(filename.trim()).name;
  return stem || 'transcript';
}

export class SnapshotStore {
  private readonly byUser = new Map<string, Map<string, StoredSnapshot>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Saves under `id`, replacing any earlier snapshot with the same id. */
  save(userId: string, id: string, snapshot: SnapshotOutput): StoredSnapshot {
    let snapshots = this.byUser.get(userId);
    if (!snapshots) {
      snapshots = new Map();
      this.byUser.set(userId, snapshots);
    }

    const stored: StoredSnapshot = {
      id,
      user_id: userId,
      snapshot,
      created_at: this.now().toISOString(),
    };

    snapshots.delete(id);
    snapshots.set(id, stored);
    return stored;
  }

  get(userId: string, id: string): StoredSnapshot | undefined {
    return this.byUser.get(userId)?.get(id);
  }

  list(userId: string): StoredSnapshot[] {
    return [...(this.byUser.get(userId)?.values() ?? [])];
  }

  size(): number {
    let total = 0;
    for (const snapshots of this.byUser.values()) {
      total += snapshots.size;
    }
    return total;
  }

  pruneOlderThan(cutoff: Date): number {
    let removed = 0;

    for (const [userId, snapshots] of this.byUser) {
      for (const [id, stored] of snapshots) {
        if (new Date(stored.created_at).getTime() < cutoff.getTime()) {
          snapshots.delete(id);
          removed++;
        }
      }
      if (snapshots.size === 0) {
        this.byUser.delete(userId);
      }
    }

    return removed;
  }
}
