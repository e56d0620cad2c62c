import { SqliteLedgerStore } from '../db/SQLiteStore';
import { checkJournalBalance, checkSnapshotInvariants } from '../ledger/invariants';

async function main() {
  const store = await SqliteLedgerStore.open();
  try {
    const snapshots = await store.loadSnapshots();
    let violations = 0;

    for (const snapshot of snapshots) {
      const transfers = await store.listTransfers(snapshot.id);
      const found = [...checkSnapshotInvariants(snapshot), ...checkJournalBalance(snapshot, transfers)];
      for (const violation of found) {
        console.error(`[audit] ${violation.campaignId} ${violation.rule}: ${violation.detail}`);
      }
      violations += found.length;
    }

    console.log(`[audit] campaigns=${snapshots.length} violations=${violations}`);
    if (violations > 0) {
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[audit] failed: ${message}`);
  process.exitCode = 1;
});
