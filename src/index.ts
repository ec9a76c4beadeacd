/**
 * Snapshot Engine
 *
 * Entry point for the service that:
 * 1. Parses WebVTT meeting transcripts
 * 2. Generates an eleven-section Customer Success Snapshot with Claude
 * 3. Keeps snapshots in memory for retrieval until they expire
 */

import { SnapshotOrchestrator } from './generation';
import { createSnapshotServer } from './server';
import { ClaudeSampler } from './services/claude';
import { getSettings } from './services/config';
import { startRetentionScheduler } from './services/scheduler';
import { SnapshotStore } from './services/snapshot-store';

async function main() {
  const settings = getSettings();
  console.log(`${settings.server.name} starting...`);

  const store = new SnapshotStore();
  let orchestrator: SnapshotOrchestrator | null = null;

  // Built on first use so a missing API key only fails generation requests
  const getOrchestrator = (): SnapshotOrchestrator => {
    if (!orchestrator) {
      orchestrator = new SnapshotOrchestrator({
        sampler: new ClaudeSampler(settings.llm),
        settings,
      });
    }
    return orchestrator;
  };

  const server = createSnapshotServer({
    store,
    getOrchestrator,
    serviceName: settings.server.name,
    corsOrigins: settings.server.corsOrigins,
  });

  server.listen(settings.server.port, () => {
    console.log(`Engine running on port ${settings.server.port}`);

    // Start the background scheduler
    startRetentionScheduler(store, settings.store);
  });
}

main().catch(console.error);
