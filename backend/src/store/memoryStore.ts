import type { CampaignSnapshot, LedgerChange } from '../ledger/types';
import type { AuditEntry, LedgerStore, TransferRecord } from './types';

/** Process-local store for tests and `TIERFUND_STORE=memory`. */
export class MemoryLedgerStore implements LedgerStore {
  private snapshots = new Map<string, CampaignSnapshot>();
  private transfers: TransferRecord[] = [];
  private audit: AuditEntry[] = [];
  private registryPaused = false;

  async commit(change: LedgerChange): Promise<void> {
    this.snapshots.set(change.campaignId, structuredClone(change.snapshot));
    if (change.transfer) {
      this.transfers.push({
        id: this.transfers.length + 1,
        campaignId: change.campaignId,
        createdAt: change.at,
        ...change.transfer,
      });
    }
    this.audit.push({
      id: this.audit.length + 1,
      campaignId: change.campaignId,
      event: change.event,
      details: { ...change.details },
      timestamp: new Date(change.at).toISOString(),
    });
  }

  async loadSnapshots(): Promise<CampaignSnapshot[]> {
    return Array.from(this.snapshots.values())
      .map((snapshot) => structuredClone(snapshot))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async getHistory(campaignId: string): Promise<AuditEntry[]> {
    return this.audit.filter((entry) => entry.campaignId === campaignId);
  }

  async listTransfers(campaignId: string): Promise<TransferRecord[]> {
    return this.transfers.filter((transfer) => transfer.campaignId === campaignId);
  }

  async loadRegistryPaused(): Promise<boolean> {
    return this.registryPaused;
  }

  async saveRegistryPaused(paused: boolean, changedBy: string): Promise<void> {
    this.registryPaused = paused;
    this.audit.push({
      id: this.audit.length + 1,
      campaignId: '',
      event: 'REGISTRY_PAUSE_TOGGLED',
      details: { paused, changedBy },
      timestamp: new Date().toISOString(),
    });
  }
}
