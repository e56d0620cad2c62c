import type { CampaignSnapshot, ValueTransfer } from './types';

export type InvariantViolation = {
  campaignId: string;
  rule: 'held-balance' | 'backer-total' | 'tier-backer-count' | 'dangling-tier' | 'journal-balance';
  detail: string;
};

export function checkSnapshotInvariants(snapshot: CampaignSnapshot): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const tierById = new Map<number, CampaignSnapshot['tiers'][number]>(
    snapshot.tiers.map((tier): [number, CampaignSnapshot['tiers'][number]] => [tier.id, tier]),
  );
  const holders = new Map<number, number>();
  let liveTotal = 0n;

  for (const backer of snapshot.backers) {
    const total = BigInt(backer.totalContribution);
    liveTotal += total;
    let joined = 0n;
    for (const tierId of backer.fundedTierIds) {
      const tier = tierById.get(tierId);
      if (!tier) {
        violations.push({
          campaignId: snapshot.id,
          rule: 'dangling-tier',
          detail: `${backer.identity} holds missing tier ${tierId}`,
        });
        continue;
      }
      joined += BigInt(tier.amount);
      holders.set(tierId, (holders.get(tierId) ?? 0) + 1);
    }
    if (joined !== total) {
      violations.push({
        campaignId: snapshot.id,
        rule: 'backer-total',
        detail: `${backer.identity} total=${total} tiers=${joined}`,
      });
    }
  }

  if (liveTotal !== BigInt(snapshot.heldBalance)) {
    violations.push({
      campaignId: snapshot.id,
      rule: 'held-balance',
      detail: `held=${snapshot.heldBalance} contributions=${liveTotal}`,
    });
  }

  for (const tier of snapshot.tiers) {
    const expected = holders.get(tier.id) ?? 0;
    if (tier.backerCount !== expected) {
      violations.push({
        campaignId: snapshot.id,
        rule: 'tier-backer-count',
        detail: `tier ${tier.id} count=${tier.backerCount} holders=${expected}`,
      });
    }
  }

  return violations;
}

/** Net value moved through the transfer journal must equal what the ledger holds. */
export function checkJournalBalance(
  snapshot: CampaignSnapshot,
  transfers: ReadonlyArray<ValueTransfer>,
): InvariantViolation[] {
  const net = transfers.reduce(
    (total, transfer) => (transfer.direction === 'in' ? total + transfer.amount : total - transfer.amount),
    0n,
  );
  if (net === BigInt(snapshot.heldBalance)) return [];
  return [
    {
      campaignId: snapshot.id,
      rule: 'journal-balance',
      detail: `journal=${net} held=${snapshot.heldBalance}`,
    },
  ];
}
