import { LedgerError } from '../ledger/errors';

export type RegistryRecord = {
  campaignId: string;
  creator: string;
  name: string;
  createdAt: number;
};

/**
 * Creation index for campaigns. Its pause flag only gates creation and is
 * unrelated to any campaign's own pause flag.
 */
export class CampaignRegistry {
  readonly owner: string;
  private paused: boolean;
  private records: RegistryRecord[] = [];
  private byCreator = new Map<string, RegistryRecord[]>();

  constructor(owner: string, paused = false) {
    this.owner = owner;
    this.paused = paused;
  }

  isPaused(): boolean {
    return this.paused;
  }

  assertOpen(): void {
    if (this.paused) {
      throw new LedgerError('registry-paused');
    }
  }

  /** Returns the flag the caller should persist; the flip itself only happens in `setPaused`. */
  nextPauseState(caller: string): boolean {
    if (caller !== this.owner) {
      throw new LedgerError('not-registry-owner');
    }
    return !this.paused;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  register(record: RegistryRecord): void {
    this.records.push(record);
    const mine = this.byCreator.get(record.creator) ?? [];
    mine.push(record);
    this.byCreator.set(record.creator, mine);
  }

  listAll(): RegistryRecord[] {
    return [...this.records];
  }

  listByCreator(creator: string): RegistryRecord[] {
    return [...(this.byCreator.get(creator) ?? [])];
  }

  count(): number {
    return this.records.length;
  }
}
