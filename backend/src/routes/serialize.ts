import type { BackerView, CampaignSummary, TierView } from '../ledger/types';
import type { RegistryRecord } from '../services/CampaignRegistry';
import type { TransferRecord } from '../store/types';

export function serializeTier(tier: TierView) {
  return {
    index: tier.index,
    id: tier.id,
    name: tier.name,
    amount: tier.amount.toString(),
    backerCount: tier.backerCount,
  };
}

export function serializeBacker(backer: BackerView) {
  return {
    identity: backer.identity,
    totalContribution: backer.totalContribution.toString(),
    fundedTiers: backer.fundedTiers,
    releasedContribution: backer.releasedContribution.toString(),
  };
}

export function serializeCampaign(summary: CampaignSummary) {
  return {
    ...summary,
    goal: summary.goal.toString(),
    balance: summary.balance.toString(),
    deadlineAt: new Date(summary.deadline).toISOString(),
    tiers: summary.tiers.map(serializeTier),
  };
}

export function serializeRegistryRecord(record: RegistryRecord) {
  return {
    ...record,
    createdAtIso: new Date(record.createdAt).toISOString(),
  };
}

export function serializeTransfer(transfer: TransferRecord) {
  return {
    ...transfer,
    amount: transfer.amount.toString(),
  };
}
