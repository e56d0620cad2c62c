export type CampaignState = 'active' | 'successful' | 'failed';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export type Tier = {
  id: number;
  name: string;
  amount: bigint;
  backerCount: number;
};

export type TierView = Tier & { index: number };

export type BackerRecord = {
  totalContribution: bigint;
  fundedTierIds: Set<number>;
  releasedContribution: bigint;
};

export type BackerView = {
  identity: string;
  totalContribution: bigint;
  fundedTiers: number[];
  releasedContribution: bigint;
};

export type CampaignInit = {
  id: string;
  owner: string;
  name: string;
  description?: string;
  goal: bigint;
  durationDays: number;
};

export type CampaignSummary = {
  id: string;
  owner: string;
  name: string;
  description: string;
  goal: bigint;
  deadline: number;
  createdAt: number;
  paused: boolean;
  state: CampaignState;
  balance: bigint;
  tiers: TierView[];
  backerCount: number;
};

/** Serializable form of a ledger; amounts are decimal strings. */
export type CampaignSnapshot = {
  id: string;
  owner: string;
  name: string;
  description: string;
  goal: string;
  deadline: number;
  createdAt: number;
  paused: boolean;
  state: CampaignState;
  heldBalance: string;
  nextTierId: number;
  tiers: Array<{ id: number; name: string; amount: string; backerCount: number }>;
  backers: Array<{
    identity: string;
    totalContribution: string;
    fundedTierIds: number[];
    releasedContribution: string;
  }>;
};

export type LedgerEvent =
  | 'CAMPAIGN_CREATED'
  | 'TIER_ADDED'
  | 'TIER_REMOVED'
  | 'PLEDGE_FUNDED'
  | 'FUNDS_WITHDRAWN'
  | 'REFUND_ISSUED'
  | 'PAUSE_TOGGLED'
  | 'DEADLINE_EXTENDED';

export type ValueTransfer = {
  direction: 'in' | 'out';
  counterparty: string;
  amount: bigint;
};

export type LedgerChange = {
  campaignId: string;
  event: LedgerEvent;
  at: number;
  snapshot: CampaignSnapshot;
  transfer: ValueTransfer | null;
  details: Record<string, string | number | boolean>;
};

/**
 * Receives every committed ledger change. A rejection aborts the operation and
 * the ledger restores the state it had before the call.
 */
export interface LedgerSettlement {
  commit(change: LedgerChange): Promise<void>;
}

export type RefundIssued = {
  campaignId: string;
  backer: string;
  amount: bigint;
};
