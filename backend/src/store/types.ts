import type { CampaignSnapshot, LedgerEvent, LedgerSettlement, ValueTransfer } from '../ledger/types';

export type AuditEntry = {
  id: number;
  campaignId: string;
  event: LedgerEvent | 'REGISTRY_PAUSE_TOGGLED';
  details: Record<string, unknown>;
  timestamp: string;
};

export type TransferRecord = ValueTransfer & {
  id: number;
  campaignId: string;
  createdAt: number;
};

export interface CampaignRepository {
  loadSnapshots(): Promise<CampaignSnapshot[]>;
  getHistory(campaignId: string): Promise<AuditEntry[]>;
  listTransfers(campaignId: string): Promise<TransferRecord[]>;
  loadRegistryPaused(): Promise<boolean>;
  saveRegistryPaused(paused: boolean, changedBy: string): Promise<void>;
}

export type LedgerStore = LedgerSettlement & CampaignRepository;
