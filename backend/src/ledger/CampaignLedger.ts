import { EventEmitter } from 'events';
import { MAX_DEADLINE_MS, MS_PER_DAY } from '../config/constants';
import { SerialQueue } from '../utils/serialQueue';
import { LedgerError } from './errors';
import { evaluateState } from './evaluateState';
import type {
  BackerRecord,
  BackerView,
  CampaignInit,
  CampaignSnapshot,
  CampaignState,
  CampaignSummary,
  Clock,
  LedgerChange,
  LedgerEvent,
  LedgerSettlement,
  RefundIssued,
  Tier,
  TierView,
  ValueTransfer,
} from './types';
import { systemClock } from './types';

type LedgerData = {
  paused: boolean;
  state: CampaignState;
  deadline: number;
  heldBalance: bigint;
  nextTierId: number;
  tiers: Tier[];
  backers: Map<string, BackerRecord>;
};

type Staged<T> = {
  result: T;
  event: LedgerEvent;
  transfer?: ValueTransfer;
  details?: LedgerChange['details'];
};

export type LedgerOptions = {
  settlement: LedgerSettlement;
  clock?: Clock;
};

const REFUND_ISSUED = 'refund-issued';

/**
 * Ledger and state machine for one campaign. Every mutation runs through a
 * serial queue and is committed to the settlement port before it becomes
 * visible.
 */
export class CampaignLedger {
  readonly id: string;
  readonly owner: string;
  readonly name: string;
  readonly description: string;
  readonly goal: bigint;
  readonly createdAt: number;

  private data: LedgerData;
  private readonly settlement: LedgerSettlement;
  private readonly clock: Clock;
  private readonly queue = new SerialQueue();
  private readonly emitter = new EventEmitter();

  private constructor(
    identity: Pick<CampaignSnapshot, 'id' | 'owner' | 'name' | 'description' | 'createdAt'> & { goal: bigint },
    data: LedgerData,
    options: LedgerOptions,
  ) {
    this.id = identity.id;
    this.owner = identity.owner;
    this.name = identity.name;
    this.description = identity.description;
    this.goal = identity.goal;
    this.createdAt = identity.createdAt;
    this.data = data;
    this.settlement = options.settlement;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Create and persist a new campaign. The deadline is fixed here from
   * `durationDays` and is never re-derived.
   */
  static async create(init: CampaignInit, options: LedgerOptions): Promise<CampaignLedger> {
    if (typeof init.name !== 'string' || !init.name.trim()) {
      throw new LedgerError('invalid-campaign-name');
    }
    if (init.goal <= 0n) {
      throw new LedgerError('invalid-goal');
    }
    const now = (options.clock ?? systemClock).now();
    const deadline =
      Number.isInteger(init.durationDays) && init.durationDays > 0 ? deadlineAfter(now, init.durationDays) : null;
    if (deadline === null) {
      throw new LedgerError('invalid-duration');
    }

    const ledger = new CampaignLedger(
      {
        id: init.id,
        owner: init.owner,
        name: init.name.trim(),
        description: init.description ?? '',
        goal: init.goal,
        createdAt: now,
      },
      {
        paused: false,
        state: 'active',
        deadline,
        heldBalance: 0n,
        nextTierId: 0,
        tiers: [],
        backers: new Map(),
      },
      options,
    );

    await ledger.transact(() => ({
      result: undefined,
      event: 'CAMPAIGN_CREATED',
      details: { owner: init.owner, goal: init.goal.toString(), durationDays: init.durationDays },
    }));
    return ledger;
  }

  /** Rebuild a ledger from a committed snapshot without re-committing it. */
  static restore(snapshot: CampaignSnapshot, options: LedgerOptions): CampaignLedger {
    return new CampaignLedger(
      {
        id: snapshot.id,
        owner: snapshot.owner,
        name: snapshot.name,
        description: snapshot.description,
        goal: BigInt(snapshot.goal),
        createdAt: snapshot.createdAt,
      },
      {
        paused: snapshot.paused,
        state: snapshot.state,
        deadline: snapshot.deadline,
        heldBalance: BigInt(snapshot.heldBalance),
        nextTierId: snapshot.nextTierId,
        tiers: snapshot.tiers.map((tier) => ({
          id: tier.id,
          name: tier.name,
          amount: BigInt(tier.amount),
          backerCount: tier.backerCount,
        })),
        backers: new Map(
          snapshot.backers.map((backer): [string, BackerRecord] => [
            backer.identity,
            {
              totalContribution: BigInt(backer.totalContribution),
              fundedTierIds: new Set(backer.fundedTierIds),
              releasedContribution: BigInt(backer.releasedContribution),
            },
          ]),
        ),
      },
      options,
    );
  }

  /** Listener failures are logged and never reach the refunding caller. */
  onRefundIssued(listener: (notice: RefundIssued) => void): () => void {
    const guarded = (notice: RefundIssued) => {
      try {
        listener(notice);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[campaigns] ${notice.campaignId} refund listener failed: ${message}`);
      }
    };
    this.emitter.on(REFUND_ISSUED, guarded);
    return () => {
      this.emitter.off(REFUND_ISSUED, guarded);
    };
  }

  addTier(caller: string, name: string, amount: bigint): Promise<TierView> {
    return this.transact((draft) => {
      this.requireOwner(caller);
      if (typeof name !== 'string' || !name.trim()) {
        throw new LedgerError('invalid-tier-name');
      }
      if (amount <= 0n) {
        throw new LedgerError('invalid-tier-amount');
      }
      const tier: Tier = { id: draft.nextTierId, name: name.trim(), amount, backerCount: 0 };
      draft.nextTierId += 1;
      draft.tiers.push(tier);
      return {
        result: { ...tier, index: draft.tiers.length - 1 },
        event: 'TIER_ADDED',
        details: { tierId: tier.id, name: tier.name, amount: amount.toString() },
      };
    });
  }

  /**
   * Swap-and-pop removal: the last tier moves into `index`. Backers reference
   * tiers by id, and a tier with live backers cannot be removed.
   */
  removeTier(caller: string, index: number): Promise<void> {
    return this.transact((draft) => {
      this.requireOwner(caller);
      const tier = tierAt(draft, index);
      if (tier.backerCount > 0) {
        throw new LedgerError('tier-has-backers');
      }
      const tiers = draft.tiers;
      const last = tiers.length - 1;
      tiers[index] = tiers[last];
      tiers.pop();
      return {
        result: undefined,
        event: 'TIER_REMOVED',
        details: { tierId: tier.id, index, movedFrom: last },
      };
    });
  }

  fund(caller: string, tierIndex: number, value: bigint): Promise<BackerView> {
    return this.transact((draft, now) => {
      if (draft.state !== 'active' || now >= draft.deadline) {
        throw new LedgerError('campaign-not-open');
      }
      if (draft.paused) {
        throw new LedgerError('campaign-paused');
      }
      const tier = tierAt(draft, tierIndex);
      if (value <= 0n || value !== tier.amount) {
        throw new LedgerError('incorrect-contribution-amount');
      }
      const backer = draft.backers.get(caller) ?? {
        totalContribution: 0n,
        fundedTierIds: new Set<number>(),
        releasedContribution: 0n,
      };
      if (backer.fundedTierIds.has(tier.id)) {
        throw new LedgerError('tier-already-funded');
      }

      tier.backerCount += 1;
      backer.totalContribution += value;
      backer.fundedTierIds.add(tier.id);
      draft.backers.set(caller, backer);
      draft.heldBalance += value;
      draft.state = this.evaluate(draft, now);

      return {
        result: viewBacker(draft, caller, backer),
        event: 'PLEDGE_FUNDED',
        transfer: { direction: 'in', counterparty: caller, amount: value },
        details: { backer: caller, tierId: tier.id, tierIndex, amount: value.toString() },
      };
    });
  }

  /** Pays the whole held balance to the owner and releases every live pledge. */
  withdraw(caller: string): Promise<bigint> {
    return this.transact((draft) => {
      this.requireOwner(caller);
      if (draft.state !== 'successful') {
        throw new LedgerError('campaign-not-successful');
      }
      const amount = draft.heldBalance;
      if (amount <= 0n) {
        throw new LedgerError('no-funds-to-withdraw');
      }
      if (amount < this.goal) {
        throw new LedgerError('goal-not-reached');
      }

      for (const backer of draft.backers.values()) {
        clearTiers(draft, backer);
        backer.releasedContribution += backer.totalContribution;
        backer.totalContribution = 0n;
      }
      draft.heldBalance = 0n;

      return {
        result: amount,
        event: 'FUNDS_WITHDRAWN',
        transfer: { direction: 'out', counterparty: this.owner, amount },
        details: { owner: this.owner, amount: amount.toString() },
      };
    });
  }

  async refund(caller: string): Promise<bigint> {
    const amount = await this.transact((draft) => {
      if (draft.state !== 'failed') {
        throw new LedgerError('refunds-not-available');
      }
      const backer = draft.backers.get(caller);
      const owed = backer?.totalContribution ?? 0n;
      if (!backer || owed <= 0n) {
        throw new LedgerError('no-contribution-to-refund');
      }

      backer.totalContribution = 0n;
      clearTiers(draft, backer);
      draft.heldBalance -= owed;

      return {
        result: owed,
        event: 'REFUND_ISSUED',
        transfer: { direction: 'out', counterparty: caller, amount: owed },
        details: { backer: caller, amount: owed.toString() },
      };
    });

    const notice: RefundIssued = { campaignId: this.id, backer: caller, amount };
    this.emitter.emit(REFUND_ISSUED, notice);
    return amount;
  }

  togglePause(caller: string): Promise<boolean> {
    return this.transact((draft) => {
      this.requireOwner(caller);
      draft.paused = !draft.paused;
      return {
        result: draft.paused,
        event: 'PAUSE_TOGGLED',
        details: { paused: draft.paused },
      };
    });
  }

  extendDeadline(caller: string, days: number): Promise<number> {
    return this.transact((draft) => {
      this.requireOwner(caller);
      if (draft.state !== 'active') {
        throw new LedgerError('campaign-not-open');
      }
      const deadline = Number.isInteger(days) && days > 0 ? deadlineAfter(draft.deadline, days) : null;
      if (deadline === null) {
        throw new LedgerError('invalid-extension');
      }
      draft.deadline = deadline;
      return {
        result: deadline,
        event: 'DEADLINE_EXTENDED',
        details: { days, deadline },
      };
    });
  }

  /** Read-only: the state the campaign would move to if a mutation ran now. */
  getCampaignStatus(): CampaignState {
    return this.evaluate(this.data, this.clock.now());
  }

  getBalance(): bigint {
    return this.data.heldBalance;
  }

  isPaused(): boolean {
    return this.data.paused;
  }

  getDeadline(): number {
    return this.data.deadline;
  }

  getTiers(): TierView[] {
    return this.data.tiers.map((tier, index) => ({ ...tier, index }));
  }

  hasFundedTier(identity: string, tierIndex: number): boolean {
    const tier = this.data.tiers[tierIndex];
    const backer = this.data.backers.get(identity);
    if (!tier || !backer) return false;
    return backer.fundedTierIds.has(tier.id);
  }

  getBacker(identity: string): BackerView {
    const backer = this.data.backers.get(identity);
    if (!backer) {
      return { identity, totalContribution: 0n, fundedTiers: [], releasedContribution: 0n };
    }
    return viewBacker(this.data, identity, backer);
  }

  listBackers(): BackerView[] {
    return Array.from(this.data.backers.entries()).map(([identity, backer]) =>
      viewBacker(this.data, identity, backer),
    );
  }

  getSummary(): CampaignSummary {
    let backerCount = 0;
    for (const backer of this.data.backers.values()) {
      if (backer.totalContribution > 0n) backerCount += 1;
    }
    return {
      id: this.id,
      owner: this.owner,
      name: this.name,
      description: this.description,
      goal: this.goal,
      deadline: this.data.deadline,
      createdAt: this.createdAt,
      paused: this.data.paused,
      state: this.getCampaignStatus(),
      balance: this.data.heldBalance,
      tiers: this.getTiers(),
      backerCount,
    };
  }

  toSnapshot(): CampaignSnapshot {
    return this.snapshotOf(this.data);
  }

  /**
   * Run `stage` against a copy of the committed data and commit the result.
   * The copy replaces the live data only once the settlement port accepts it,
   * so reads never observe a pending or aborted change.
   */
  private transact<T>(stage: (draft: LedgerData, now: number) => Staged<T>): Promise<T> {
    return this.queue.run(async () => {
      const draft = structuredClone(this.data);
      const now = this.clock.now();
      draft.state = this.evaluate(draft, now);
      const staged = stage(draft, now);
      try {
        await this.settlement.commit({
          campaignId: this.id,
          event: staged.event,
          at: now,
          snapshot: this.snapshotOf(draft),
          transfer: staged.transfer ?? null,
          details: staged.details ?? {},
        });
      } catch (err) {
        throw new LedgerError('transfer-failed', { cause: err });
      }
      this.data = draft;
      return staged.result;
    });
  }

  private snapshotOf(data: LedgerData): CampaignSnapshot {
    return {
      id: this.id,
      owner: this.owner,
      name: this.name,
      description: this.description,
      goal: this.goal.toString(),
      deadline: data.deadline,
      createdAt: this.createdAt,
      paused: data.paused,
      state: data.state,
      heldBalance: data.heldBalance.toString(),
      nextTierId: data.nextTierId,
      tiers: data.tiers.map((tier) => ({
        id: tier.id,
        name: tier.name,
        amount: tier.amount.toString(),
        backerCount: tier.backerCount,
      })),
      backers: Array.from(data.backers.entries()).map(([identity, backer]) => ({
        identity,
        totalContribution: backer.totalContribution.toString(),
        fundedTierIds: Array.from(backer.fundedTierIds).sort((a, b) => a - b),
        releasedContribution: backer.releasedContribution.toString(),
      })),
    };
  }

  private evaluate(data: LedgerData, now: number): CampaignState {
    return evaluateState({
      state: data.state,
      now,
      deadline: data.deadline,
      heldBalance: data.heldBalance,
      goal: this.goal,
    });
  }

  private requireOwner(caller: string): void {
    if (caller !== this.owner) {
      throw new LedgerError('not-owner');
    }
  }
}

/** `null` when the result is not a timestamp a `Date` can represent. */
function deadlineAfter(from: number, days: number): number | null {
  const deadline = from + days * MS_PER_DAY;
  return Number.isSafeInteger(deadline) && deadline <= MAX_DEADLINE_MS ? deadline : null;
}

function tierAt(data: LedgerData, index: number): Tier {
  const tier = Number.isInteger(index) ? data.tiers[index] : undefined;
  if (!tier) {
    throw new LedgerError('invalid-tier-index');
  }
  return tier;
}

function clearTiers(data: LedgerData, backer: BackerRecord): void {
  for (const tierId of backer.fundedTierIds) {
    const tier = data.tiers.find((candidate) => candidate.id === tierId);
    if (tier) tier.backerCount -= 1;
  }
  backer.fundedTierIds.clear();
}

function viewBacker(data: LedgerData, identity: string, backer: BackerRecord): BackerView {
  const fundedTiers: number[] = [];
  data.tiers.forEach((tier, index) => {
    if (backer.fundedTierIds.has(tier.id)) fundedTiers.push(index);
  });
  return {
    identity,
    totalContribution: backer.totalContribution,
    fundedTiers,
    releasedContribution: backer.releasedContribution,
  };
}
