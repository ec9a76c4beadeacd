/**
 * Background scheduler for snapshot retention
 *
 * Runs on a cron schedule and drops snapshots older than the retention window.
 */

import cron, { ScheduledTask } from 'node-cron';
import { StoreSettings } from './config';
import { SnapshotStore } from './snapshot-store';

const HOUR_MS = 60 * 60 * 1000;

export function pruneExpiredSnapshots(store: SnapshotStore, retentionHours: number, now: Date = new Date()): number {
  const cutoff = new Date(now.getTime() - retentionHours * HOUR_MS);
  const removed = store.pruneOlderThan(cutoff);

  console.log(
    `[Scheduler] Removed ${removed} snapshots older than ${retentionHours}h (before ${cutoff.toISOString()}); ` +
      `${store.size()} remaining`
  );
  return removed;
}

export function startRetentionScheduler(store: SnapshotStore, settings: StoreSettings): ScheduledTask | null {
  console.log(`[Scheduler] Starting with schedule: ${settings.cleanupSchedule}`);
  console.log(`[Scheduler] Cleanup: snapshots older than ${settings.retentionHours}h will be removed`);

  if (!cron.validate(settings.cleanupSchedule)) {
    console.error(`[Scheduler] Invalid cron expression: ${settings.cleanupSchedule}`);
    return null;
  }

  const task = cron.schedule(settings.cleanupSchedule, () => {
    pruneExpiredSnapshots(store, settings.retentionHours);
  });

  console.log('[Scheduler] Scheduler started successfully');
  return task;
}
