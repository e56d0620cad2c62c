import { describe, expect, it, vi } from 'vitest';
import { MS_PER_DAY } from '../config/constants';
import { CampaignLedger } from '../ledger/CampaignLedger';
import { LedgerError } from '../ledger/errors';
import { MemoryLedgerStore } from '../store/memoryStore';
import { FakeClock, START } from './helpers/fakeClock';
import { FlakyStore } from './helpers/flakyStore';
import { GatedStore } from './helpers/gatedStore';

const OWNER = 'owner-1';

async function setup(goal: bigint, tiers: Array<[string, bigint]>, store = new MemoryLedgerStore()) {
  const clock = new FakeClock();
  const ledger = await CampaignLedger.create(
    { id: 'campaign-test', owner: OWNER, name: 'Garden robot', goal, durationDays: 1 },
    { settlement: store, clock },
  );
  for (const [name, amount] of tiers) {
    await ledger.addTier(OWNER, name, amount);
  }
  return { clock, store, ledger };
}

async function transfersOf(store: MemoryLedgerStore) {
  const transfers = await store.listTransfers('campaign-test');
  return transfers.map(({ direction, counterparty, amount }) => ({ direction, counterparty, amount }));
}

describe('CampaignLedger creation', () => {
  it('starts active with a deadline fixed from the duration', async () => {
    const { ledger } = await setup(100n, []);
    expect(ledger.getCampaignStatus()).toBe('active');
    expect(ledger.getDeadline()).toBe(START + MS_PER_DAY);
    expect(ledger.getBalance()).toBe(0n);
    expect(ledger.isPaused()).toBe(false);
  });

  it('rejects invalid construction parameters', async () => {
    const options = { settlement: new MemoryLedgerStore(), clock: new FakeClock() };
    const init = { id: 'c', owner: OWNER, name: 'Valid', goal: 100n, durationDays: 1 };

    await expect(CampaignLedger.create({ ...init, goal: 0n }, options)).rejects.toMatchObject({
      code: 'invalid-goal',
    });
    await expect(CampaignLedger.create({ ...init, durationDays: 0 }, options)).rejects.toMatchObject({
      code: 'invalid-duration',
    });
    await expect(CampaignLedger.create({ ...init, name: '  ' }, options)).rejects.toMatchObject({
      code: 'invalid-campaign-name',
    });
  });
});

describe('CampaignLedger success path', () => {
  it('succeeds before the deadline once the goal is funded and pays the owner once', async () => {
    const { ledger, store } = await setup(100n, [['Patron', 100n]]);

    await ledger.fund('alice', 0, 100n);
    expect(ledger.getCampaignStatus()).toBe('successful');
    expect(ledger.getBalance()).toBe(100n);

    await expect(ledger.withdraw(OWNER)).resolves.toBe(100n);
    expect(ledger.getBalance()).toBe(0n);
    expect(ledger.getBacker('alice')).toEqual({
      identity: 'alice',
      totalContribution: 0n,
      fundedTiers: [],
      releasedContribution: 100n,
    });
    expect(ledger.getTiers()[0].backerCount).toBe(0);
    expect(await transfersOf(store)).toEqual([
      { direction: 'in', counterparty: 'alice', amount: 100n },
      { direction: 'out', counterparty: OWNER, amount: 100n },
    ]);

    await expect(ledger.withdraw(OWNER)).rejects.toMatchObject({ code: 'no-funds-to-withdraw' });
  });

  it('only lets the owner withdraw', async () => {
    const { ledger } = await setup(100n, [['Patron', 100n]]);
    await ledger.fund('alice', 0, 100n);

    await expect(ledger.withdraw('alice')).rejects.toMatchObject({ code: 'not-owner' });
    expect(ledger.getBalance()).toBe(100n);
  });

  it('refuses withdrawal while the campaign is still active', async () => {
    const { ledger } = await setup(100n, [['Seed', 50n]]);
    await ledger.fund('alice', 0, 50n);

    await expect(ledger.withdraw(OWNER)).rejects.toMatchObject({ code: 'campaign-not-successful' });
  });

  it('closes funding once successful, even before the deadline', async () => {
    const { ledger, clock } = await setup(100n, [['Patron', 100n], ['Seed', 10n]]);
    await ledger.fund('alice', 0, 100n);

    await expect(ledger.fund('bob', 1, 10n)).rejects.toMatchObject({ code: 'campaign-not-open' });
    clock.advance(2 * MS_PER_DAY);
    expect(ledger.getCampaignStatus()).toBe('successful');
    await expect(ledger.refund('alice')).rejects.toMatchObject({ code: 'refunds-not-available' });
  });
});

describe('CampaignLedger failure path', () => {
  it('fails after the deadline and refunds the exact contribution once', async () => {
    const { ledger, clock, store } = await setup(100n, [['Seed', 50n]]);
    const notices: unknown[] = [];
    ledger.onRefundIssued((notice) => notices.push(notice));

    await ledger.fund('alice', 0, 50n);
    clock.advance(MS_PER_DAY);

    expect(ledger.getCampaignStatus()).toBe('failed');
    expect(ledger.toSnapshot().state).toBe('active');

    await expect(ledger.refund('alice')).resolves.toBe(50n);
    expect(ledger.toSnapshot().state).toBe('failed');
    expect(ledger.getBacker('alice').totalContribution).toBe(0n);
    expect(ledger.getTiers()[0].backerCount).toBe(0);
    expect(ledger.getBalance()).toBe(0n);
    expect(notices).toEqual([{ campaignId: 'campaign-test', backer: 'alice', amount: 50n }]);
    expect(await transfersOf(store)).toEqual([
      { direction: 'in', counterparty: 'alice', amount: 50n },
      { direction: 'out', counterparty: 'alice', amount: 50n },
    ]);

    await expect(ledger.refund('alice')).rejects.toMatchObject({ code: 'no-contribution-to-refund' });
    expect(notices).toHaveLength(1);
  });

  it('refunds every tier a backer joined', async () => {
    const { ledger, clock } = await setup(1_000n, [['Seed', 30n], ['Sprout', 20n]]);
    await ledger.fund('alice', 0, 30n);
    await ledger.fund('alice', 1, 20n);
    await ledger.fund('bob', 1, 20n);
    expect(ledger.getBacker('alice').fundedTiers).toEqual([0, 1]);

    clock.advance(MS_PER_DAY);
    await expect(ledger.refund('alice')).resolves.toBe(50n);

    expect(ledger.getTiers().map((tier) => tier.backerCount)).toEqual([0, 1]);
    expect(ledger.getBalance()).toBe(20n);
    expect(ledger.hasFundedTier('bob', 1)).toBe(true);
  });

  it('rejects refunds while active and for strangers', async () => {
    const { ledger, clock } = await setup(100n, [['Seed', 50n]]);
    await ledger.fund('alice', 0, 50n);
    await expect(ledger.refund('alice')).rejects.toMatchObject({ code: 'refunds-not-available' });

    clock.advance(MS_PER_DAY);
    await expect(ledger.refund('mallory')).rejects.toMatchObject({ code: 'no-contribution-to-refund' });
  });

  it('rejects funding at the deadline without persisting the transition', async () => {
    const { ledger, clock } = await setup(100n, [['Seed', 50n]]);
    clock.advance(MS_PER_DAY);

    await expect(ledger.fund('alice', 0, 50n)).rejects.toMatchObject({ code: 'campaign-not-open' });
    expect(ledger.toSnapshot().state).toBe('active');
    expect(ledger.getCampaignStatus()).toBe('failed');
  });
});

describe('CampaignLedger funding rules', () => {
  it('rejects every amount other than the tier price without changing state', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);

    for (const value of [0n, 1n, 49n, 51n, 100n]) {
      await expect(ledger.fund('alice', 0, value)).rejects.toMatchObject({
        code: 'incorrect-contribution-amount',
      });
    }
    expect(ledger.getBalance()).toBe(0n);
    expect(ledger.getTiers()[0].backerCount).toBe(0);
    expect(ledger.hasFundedTier('alice', 0)).toBe(false);
  });

  it('rejects unknown tier indexes', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);
    await expect(ledger.fund('alice', 1, 50n)).rejects.toMatchObject({ code: 'invalid-tier-index' });
    await expect(ledger.fund('alice', -1, 50n)).rejects.toMatchObject({ code: 'invalid-tier-index' });
  });

  it('allows a tier only once per backer while the pledge is live', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);
    await ledger.fund('alice', 0, 50n);

    await expect(ledger.fund('alice', 0, 50n)).rejects.toMatchObject({ code: 'tier-already-funded' });
    expect(ledger.getBacker('alice').totalContribution).toBe(50n);
    expect(ledger.getTiers()[0].backerCount).toBe(1);
  });

  it('blocks funding while paused and resumes after unpausing', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);

    await expect(ledger.togglePause('alice')).rejects.toMatchObject({ code: 'not-owner' });
    await expect(ledger.togglePause(OWNER)).resolves.toBe(true);
    await expect(ledger.fund('alice', 0, 50n)).rejects.toMatchObject({ code: 'campaign-paused' });

    await expect(ledger.togglePause(OWNER)).resolves.toBe(false);
    await ledger.fund('alice', 0, 50n);
    expect(ledger.getBalance()).toBe(50n);
  });

  it('serializes concurrent pledges from the same backer', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);

    const results = await Promise.allSettled([ledger.fund('alice', 0, 50n), ledger.fund('alice', 0, 50n)]);

    expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
    expect(ledger.getBalance()).toBe(50n);
    expect(ledger.getTiers()[0].backerCount).toBe(1);
  });

  it('counts concurrent pledges from different backers exactly', async () => {
    const { ledger } = await setup(1_000n, [['Seed', 50n]]);
    const backers = ['a', 'b', 'c', 'd', 'e'];

    await Promise.all(backers.map((backer) => ledger.fund(backer, 0, 50n)));

    expect(ledger.getBalance()).toBe(250n);
    expect(ledger.getTiers()[0].backerCount).toBe(5);
  });
});

describe('CampaignLedger tiers', () => {
  it('validates new tiers', async () => {
    const { ledger } = await setup(100n, []);

    await expect(ledger.addTier('alice', 'Seed', 10n)).rejects.toMatchObject({ code: 'not-owner' });
    await expect(ledger.addTier(OWNER, 'Seed', 0n)).rejects.toMatchObject({ code: 'invalid-tier-amount' });
    await expect(ledger.addTier(OWNER, ' ', 10n)).rejects.toMatchObject({ code: 'invalid-tier-name' });
    await expect(ledger.addTier(OWNER, 'Seed', 10n)).resolves.toEqual({
      id: 0,
      index: 0,
      name: 'Seed',
      amount: 10n,
      backerCount: 0,
    });
  });

  it('moves the last tier into the removed slot and keeps backer references stable', async () => {
    const { ledger } = await setup(1_000n, [['Bronze', 10n], ['Silver', 20n]]);
    await ledger.fund('bob', 1, 20n);

    await ledger.removeTier(OWNER, 0);

    expect(ledger.getTiers()).toEqual([{ id: 1, index: 0, name: 'Silver', amount: 20n, backerCount: 1 }]);
    expect(ledger.hasFundedTier('bob', 0)).toBe(true);
    expect(ledger.hasFundedTier('bob', 1)).toBe(false);
    expect(ledger.getBacker('bob').fundedTiers).toEqual([0]);
  });

  it('refuses to remove a tier that still has backers', async () => {
    const { ledger } = await setup(1_000n, [['Bronze', 10n], ['Silver', 20n]]);
    await ledger.fund('bob', 1, 20n);

    await expect(ledger.removeTier(OWNER, 1)).rejects.toMatchObject({ code: 'tier-has-backers' });
    await expect(ledger.removeTier(OWNER, 2)).rejects.toMatchObject({ code: 'invalid-tier-index' });
    await expect(ledger.removeTier('bob', 0)).rejects.toMatchObject({ code: 'not-owner' });
    expect(ledger.getTiers().map((tier) => tier.name)).toEqual(['Bronze', 'Silver']);
  });

  it('never reuses a removed tier id', async () => {
    const { ledger } = await setup(1_000n, [['Bronze', 10n]]);
    await ledger.removeTier(OWNER, 0);
    const tier = await ledger.addTier(OWNER, 'Gold', 30n);

    expect(tier.id).toBe(1);
    expect(tier.index).toBe(0);
  });
});

describe('CampaignLedger deadline extension', () => {
  it('extends an active campaign by whole days', async () => {
    const { ledger } = await setup(100n, []);

    await expect(ledger.extendDeadline(OWNER, 2)).resolves.toBe(START + 3 * MS_PER_DAY);
    await expect(ledger.extendDeadline(OWNER, 0)).rejects.toMatchObject({ code: 'invalid-extension' });
    await expect(ledger.extendDeadline(OWNER, 1.5)).rejects.toMatchObject({ code: 'invalid-extension' });
    await expect(ledger.extendDeadline('alice', 1)).rejects.toMatchObject({ code: 'not-owner' });
    expect(ledger.getDeadline()).toBe(START + 3 * MS_PER_DAY);
  });

  it('rejects extensions past the largest representable date without committing', async () => {
    const { ledger, store } = await setup(100n, []);
    const before = await store.getHistory('campaign-test');

    await expect(ledger.extendDeadline(OWNER, 200_000_000)).rejects.toMatchObject({ code: 'invalid-extension' });

    expect(ledger.getDeadline()).toBe(START + MS_PER_DAY);
    expect(await store.getHistory('campaign-test')).toHaveLength(before.length);
  });

  it('rejects durations past the largest representable date', async () => {
    const store = new MemoryLedgerStore();
    const create = CampaignLedger.create(
      { id: 'campaign-far', owner: OWNER, name: 'Far future', goal: 100n, durationDays: 200_000_000 },
      { settlement: store, clock: new FakeClock() },
    );

    await expect(create).rejects.toMatchObject({ code: 'invalid-duration' });
    expect(await store.loadSnapshots()).toEqual([]);
  });

  it('cannot revive a campaign whose deadline has passed', async () => {
    const { ledger, clock } = await setup(100n, []);
    clock.advance(MS_PER_DAY);

    await expect(ledger.extendDeadline(OWNER, 5)).rejects.toMatchObject({ code: 'campaign-not-open' });
    expect(ledger.getCampaignStatus()).toBe('failed');
  });
});

describe('CampaignLedger settlement failures', () => {
  it('restores the ledger when a pledge cannot be committed', async () => {
    const store = new FlakyStore();
    const { ledger } = await setup(1_000n, [['Seed', 50n]], store);
    store.failNext = true;

    const error: unknown = await ledger.fund('alice', 0, 50n).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LedgerError);
    expect(error).toMatchObject({ code: 'transfer-failed' });
    const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : null;
    expect(cause).toBe('ledger-offline');
    expect(ledger.getBalance()).toBe(0n);
    expect(ledger.getTiers()[0].backerCount).toBe(0);
    expect(ledger.hasFundedTier('alice', 0)).toBe(false);
    expect(await store.listTransfers('campaign-test')).toEqual([]);

    await ledger.fund('alice', 0, 50n);
    expect(ledger.getBalance()).toBe(50n);
  });

  it('keeps the contribution when a refund cannot be committed', async () => {
    const store = new FlakyStore();
    const { ledger, clock } = await setup(100n, [['Seed', 50n]], store);
    const listener = vi.fn();
    ledger.onRefundIssued(listener);
    await ledger.fund('alice', 0, 50n);
    clock.advance(MS_PER_DAY);
    store.failNext = true;

    await expect(ledger.refund('alice')).rejects.toMatchObject({ code: 'transfer-failed' });

    expect(ledger.getBacker('alice').totalContribution).toBe(50n);
    expect(ledger.getBalance()).toBe(50n);
    expect(ledger.getTiers()[0].backerCount).toBe(1);
    expect(ledger.toSnapshot().state).toBe('active');
    expect(listener).not.toHaveBeenCalled();

    await expect(ledger.refund('alice')).resolves.toBe(50n);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('CampaignLedger pending commits', () => {
  it('keeps reads on committed data until the commit resolves', async () => {
    const store = new GatedStore();
    const { ledger } = await setup(100n, [['Patron', 100n]], store);

    const aborted = store.holdNextCommit();
    const failing = ledger.fund('alice', 0, 100n);
    await aborted;

    expect(ledger.getBalance()).toBe(0n);
    expect(ledger.getCampaignStatus()).toBe('active');
    expect(ledger.getBacker('alice').totalContribution).toBe(0n);
    expect(ledger.getTiers()[0].backerCount).toBe(0);
    expect(ledger.hasFundedTier('alice', 0)).toBe(false);

    store.release(new Error('ledger-offline'));
    await expect(failing).rejects.toMatchObject({ code: 'transfer-failed' });
    expect(ledger.getBalance()).toBe(0n);

    const committed = store.holdNextCommit();
    const succeeding = ledger.fund('alice', 0, 100n);
    await committed;

    expect(ledger.getSummary()).toMatchObject({ balance: 0n, state: 'active', backerCount: 0 });

    store.release();
    await expect(succeeding).resolves.toMatchObject({ totalContribution: 100n });
    expect(ledger.getBalance()).toBe(100n);
    expect(ledger.getCampaignStatus()).toBe('successful');
  });
});

describe('CampaignLedger refund notices', () => {
  it('pays the refund even when a listener throws', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { ledger, clock } = await setup(100n, [['Seed', 50n]]);
    const after = vi.fn();
    ledger.onRefundIssued(() => {
      throw new Error('listener-broke');
    });
    ledger.onRefundIssued(after);
    await ledger.fund('alice', 0, 50n);
    clock.advance(MS_PER_DAY);

    await expect(ledger.refund('alice')).resolves.toBe(50n);

    expect(ledger.getBalance()).toBe(0n);
    expect(after).toHaveBeenCalledWith({ campaignId: 'campaign-test', backer: 'alice', amount: 50n });
    expect(errors).toHaveBeenCalledWith('[campaigns] campaign-test refund listener failed: listener-broke');
    errors.mockRestore();
  });
});

describe('CampaignLedger snapshots', () => {
  it('restores a committed snapshot with the same read surface', async () => {
    const { ledger, clock, store } = await setup(1_000n, [['Bronze', 10n], ['Silver', 20n]]);
    await ledger.fund('alice', 0, 10n);
    await ledger.fund('bob', 1, 20n);
    await ledger.togglePause(OWNER);

    const restored = CampaignLedger.restore(ledger.toSnapshot(), { settlement: store, clock });

    expect(restored.getSummary()).toEqual(ledger.getSummary());
    expect(restored.getBacker('bob')).toEqual(ledger.getBacker('bob'));
    expect(restored.hasFundedTier('alice', 0)).toBe(true);
  });
});
