import { randomUUID } from 'crypto';
import { CampaignLedger } from '../ledger/CampaignLedger';
import { LedgerError } from '../ledger/errors';
import type { BackerView, CampaignState, CampaignSummary, Clock, RefundIssued, TierView } from '../ledger/types';
import { systemClock } from '../ledger/types';
import type { AuditEntry, LedgerStore, TransferRecord } from '../store/types';
import { SerialQueue } from '../utils/serialQueue';
import { CampaignRegistry, type RegistryRecord } from './CampaignRegistry';

export type CreateCampaignInput = {
  name: string;
  description?: string;
  goal: bigint;
  durationDays: number;
};

export type CampaignServiceOptions = {
  store: LedgerStore;
  registryOwner: string;
  clock?: Clock;
};

export class CampaignService {
  readonly registry: CampaignRegistry;
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly ledgers = new Map<string, CampaignLedger>();
  private readonly registryQueue = new SerialQueue();
  private readonly refundListeners = new Set<(notice: RefundIssued) => void>();

  private constructor(options: CampaignServiceOptions, registryPaused: boolean) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.registry = new CampaignRegistry(options.registryOwner, registryPaused);
  }

  /**
   * Build the service from whatever the store already holds. Ledgers are
   * restored from their last committed snapshot.
   */
  static async load(options: CampaignServiceOptions): Promise<CampaignService> {
    const registryPaused = await options.store.loadRegistryPaused();
    const service = new CampaignService(options, registryPaused);
    const snapshots = await options.store.loadSnapshots();
    for (const snapshot of snapshots) {
      const ledger = CampaignLedger.restore(snapshot, { settlement: service.store, clock: service.clock });
      service.track(ledger);
    }
    console.log(`[campaigns] hydrated ${snapshots.length} campaigns (registryPaused=${registryPaused})`);
    return service;
  }

  onRefundIssued(listener: (notice: RefundIssued) => void): () => void {
    this.refundListeners.add(listener);
    return () => {
      this.refundListeners.delete(listener);
    };
  }

  createCampaign(creator: string, input: CreateCampaignInput): Promise<CampaignSummary> {
    return this.registryQueue.run(async () => {
      this.registry.assertOpen();
      const ledger = await CampaignLedger.create(
        {
          id: `campaign-${randomUUID()}`,
          owner: creator,
          name: input.name,
          description: input.description,
          goal: input.goal,
          durationDays: input.durationDays,
        },
        { settlement: this.store, clock: this.clock },
      );
      this.track(ledger);
      console.log(`[campaigns] created ${ledger.id} owner=${creator} goal=${input.goal.toString()}`);
      return ledger.getSummary();
    });
  }

  toggleRegistryPause(caller: string): Promise<boolean> {
    return this.registryQueue.run(async () => {
      const next = this.registry.nextPauseState(caller);
      await this.store.saveRegistryPaused(next, caller);
      this.registry.setPaused(next);
      console.log(`[registry] paused=${next} by ${caller}`);
      return next;
    });
  }

  listCampaigns(): RegistryRecord[] {
    return this.registry.listAll();
  }

  listCampaignsByCreator(creator: string): RegistryRecord[] {
    return this.registry.listByCreator(creator);
  }

  getCampaign(campaignId: string): CampaignSummary {
    return this.requireLedger(campaignId).getSummary();
  }

  getCampaignStatus(campaignId: string): CampaignState {
    return this.requireLedger(campaignId).getCampaignStatus();
  }

  getTiers(campaignId: string): TierView[] {
    return this.requireLedger(campaignId).getTiers();
  }

  getBacker(campaignId: string, identity: string): BackerView {
    return this.requireLedger(campaignId).getBacker(identity);
  }

  listBackers(campaignId: string): BackerView[] {
    return this.requireLedger(campaignId).listBackers();
  }

  hasFundedTier(campaignId: string, identity: string, tierIndex: number): boolean {
    return this.requireLedger(campaignId).hasFundedTier(identity, tierIndex);
  }

  getBalance(campaignId: string): bigint {
    return this.requireLedger(campaignId).getBalance();
  }

  async addTier(campaignId: string, caller: string, name: string, amount: bigint): Promise<TierView> {
    return this.requireLedger(campaignId).addTier(caller, name, amount);
  }

  async removeTier(campaignId: string, caller: string, index: number): Promise<void> {
    return this.requireLedger(campaignId).removeTier(caller, index);
  }

  async fund(campaignId: string, caller: string, tierIndex: number, value: bigint): Promise<BackerView> {
    return this.requireLedger(campaignId).fund(caller, tierIndex, value);
  }

  async withdraw(campaignId: string, caller: string): Promise<bigint> {
    const amount = await this.requireLedger(campaignId).withdraw(caller);
    console.log(`[campaigns] ${campaignId} withdrew ${amount.toString()} to owner`);
    return amount;
  }

  async refund(campaignId: string, caller: string): Promise<bigint> {
    return this.requireLedger(campaignId).refund(caller);
  }

  async togglePause(campaignId: string, caller: string): Promise<boolean> {
    return this.requireLedger(campaignId).togglePause(caller);
  }

  async extendDeadline(campaignId: string, caller: string, days: number): Promise<number> {
    return this.requireLedger(campaignId).extendDeadline(caller, days);
  }

  async getCampaignHistory(campaignId: string): Promise<AuditEntry[]> {
    this.requireLedger(campaignId);
    return this.store.getHistory(campaignId);
  }

  async listTransfers(campaignId: string): Promise<TransferRecord[]> {
    this.requireLedger(campaignId);
    return this.store.listTransfers(campaignId);
  }

  private track(ledger: CampaignLedger): void {
    this.ledgers.set(ledger.id, ledger);
    this.registry.register({
      campaignId: ledger.id,
      creator: ledger.owner,
      name: ledger.name,
      createdAt: ledger.createdAt,
    });
    ledger.onRefundIssued((notice) => {
      console.log(
        `[campaigns] ${notice.campaignId} refund issued to ${notice.backer} amount=${notice.amount.toString()}`,
      );
      for (const listener of this.refundListeners) {
        try {
          listener(notice);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`[campaigns] ${notice.campaignId} refund listener failed: ${message}`);
        }
      }
    });
  }

  private requireLedger(campaignId: string): CampaignLedger {
    const ledger = this.ledgers.get(campaignId);
    if (!ledger) {
      throw new LedgerError('campaign-not-found');
    }
    return ledger;
  }
}
