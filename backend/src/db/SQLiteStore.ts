import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import { getSqlitePath } from '../config/constants';
import type { CampaignSnapshot, CampaignState, LedgerChange } from '../ledger/types';
import type { AuditEntry, LedgerStore, TransferRecord } from '../store/types';
import { SerialQueue } from '../utils/serialQueue';

let dbPromise: Promise<Database<sqlite3.Database, sqlite3.Statement>> | null = null;
let dbPromisePath: string | null = null;

export async function openDatabase(dbPath?: string): Promise<Database> {
  const effectivePath = dbPath ?? getSqlitePath();
  if (!dbPromise || dbPromisePath !== effectivePath) {
    fs.mkdirSync(path.dirname(effectivePath), { recursive: true });
    dbPromise = open({
      filename: effectivePath,
      driver: sqlite3.Database,
    });
    dbPromisePath = effectivePath;
  }
  return dbPromise;
}

export async function initializeDatabase(database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());

  await db.exec(`
    CREATE TABLE IF NOT EXISTS campaigns (
      id TEXT PRIMARY KEY,
      owner TEXT NOT NULL,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      goal TEXT NOT NULL,
      deadline INTEGER NOT NULL,
      createdAt INTEGER NOT NULL,
      paused INTEGER NOT NULL DEFAULT 0,
      state TEXT NOT NULL,
      heldBalance TEXT NOT NULL DEFAULT '0',
      nextTierId INTEGER NOT NULL DEFAULT 0,
      tiers TEXT NOT NULL DEFAULT '[]',
      backers TEXT NOT NULL DEFAULT '[]'
    );

    CREATE INDEX IF NOT EXISTS campaigns_owner_idx ON campaigns(owner);

    CREATE TABLE IF NOT EXISTS transfers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      campaignId TEXT NOT NULL,
      direction TEXT NOT NULL,
      counterparty TEXT NOT NULL,
      amount TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS audit_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      campaignId TEXT,
      event TEXT NOT NULL,
      details TEXT,
      timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS registry_settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

type CampaignRow = {
  id: string;
  owner: string;
  name: string;
  description: string | null;
  goal: string;
  deadline: number;
  createdAt: number;
  paused: number;
  state: string;
  heldBalance: string;
  nextTierId: number;
  tiers: string;
  backers: string;
};

type TransferRow = {
  id: number;
  campaignId: string;
  direction: string;
  counterparty: string;
  amount: string;
  createdAt: number;
};

type AuditRow = {
  id: number;
  campaignId: string | null;
  event: string;
  details: string | null;
  timestamp: string;
};

const AUDIT_EVENTS: ReadonlyArray<AuditEntry['event']> = [
  'CAMPAIGN_CREATED',
  'TIER_ADDED',
  'TIER_REMOVED',
  'PLEDGE_FUNDED',
  'FUNDS_WITHDRAWN',
  'REFUND_ISSUED',
  'PAUSE_TOGGLED',
  'DEADLINE_EXTENDED',
  'REGISTRY_PAUSE_TOGGLED',
];

function parseEvent(raw: string): AuditEntry['event'] {
  const event = AUDIT_EVENTS.find((candidate) => candidate === raw);
  if (!event) throw new Error(`audit-event-invalid:${raw}`);
  return event;
}

function parseState(raw: string): CampaignState {
  if (raw === 'active' || raw === 'successful' || raw === 'failed') return raw;
  throw new Error(`campaign-state-invalid:${raw}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonArray(raw: string, label: string): Record<string, unknown>[] {
  const parsed = JSON.parse(raw) as unknown;
  if (!Array.isArray(parsed)) {
    throw new Error(`${label}-invalid`);
  }
  return parsed.map((entry) => {
    if (!isRecord(entry)) throw new Error(`${label}-invalid`);
    return entry;
  });
}

function parseTiers(raw: string): CampaignSnapshot['tiers'] {
  return parseJsonArray(raw, 'tiers').map((entry) => ({
    id: Number(entry.id),
    name: String(entry.name ?? ''),
    amount: String(entry.amount ?? '0'),
    backerCount: Number(entry.backerCount ?? 0),
  }));
}

function parseBackers(raw: string): CampaignSnapshot['backers'] {
  return parseJsonArray(raw, 'backers').map((entry) => ({
    identity: String(entry.identity ?? ''),
    totalContribution: String(entry.totalContribution ?? '0'),
    fundedTierIds: Array.isArray(entry.fundedTierIds) ? entry.fundedTierIds.map((id) => Number(id)) : [],
    releasedContribution: String(entry.releasedContribution ?? '0'),
  }));
}

function mapRowToSnapshot(row: CampaignRow): CampaignSnapshot {
  return {
    id: row.id,
    owner: row.owner,
    name: row.name,
    description: row.description ?? '',
    goal: row.goal,
    deadline: Number(row.deadline),
    createdAt: Number(row.createdAt),
    paused: row.paused === 1,
    state: parseState(row.state),
    heldBalance: row.heldBalance,
    nextTierId: Number(row.nextTierId),
    tiers: parseTiers(row.tiers),
    backers: parseBackers(row.backers),
  };
}

function parseDetails(raw: string | null): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed = JSON.parse(raw) as unknown;
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export async function upsertCampaign(snapshot: CampaignSnapshot, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  try {
    await db.run(
      `
      INSERT OR REPLACE INTO campaigns (
        id,
        owner,
        name,
        description,
        goal,
        deadline,
        createdAt,
        paused,
        state,
        heldBalance,
        nextTierId,
        tiers,
        backers
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        snapshot.id,
        snapshot.owner,
        snapshot.name,
        snapshot.description,
        snapshot.goal,
        snapshot.deadline,
        snapshot.createdAt,
        snapshot.paused ? 1 : 0,
        snapshot.state,
        snapshot.heldBalance,
        snapshot.nextTierId,
        JSON.stringify(snapshot.tiers),
        JSON.stringify(snapshot.backers),
      ],
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-upsert-campaign-failed:${snapshot.id}:${message}`);
  }
}

export async function getCampaignById(id: string, database?: Database): Promise<CampaignSnapshot | null> {
  const db = database ?? (await openDatabase());
  try {
    const row = await db.get<CampaignRow>('SELECT * FROM campaigns WHERE id = ?', [id]);
    return row ? mapRowToSnapshot(row) : null;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-get-campaign-failed:${id}:${message}`);
  }
}

export async function listCampaigns(database?: Database): Promise<CampaignSnapshot[]> {
  const db = database ?? (await openDatabase());
  try {
    const rows = await db.all<CampaignRow[]>('SELECT * FROM campaigns ORDER BY createdAt ASC, id ASC');
    return rows.map((row) => mapRowToSnapshot(row));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-list-campaigns-failed:${message}`);
  }
}

export async function countCampaigns(database?: Database): Promise<number> {
  const db = database ?? (await openDatabase());
  const row = await db.get<{ total: number }>('SELECT COUNT(*) as total FROM campaigns');
  return row?.total ?? 0;
}

export async function listTransfers(campaignId: string, database?: Database): Promise<TransferRecord[]> {
  const db = database ?? (await openDatabase());
  const rows = await db.all<TransferRow[]>(
    'SELECT * FROM transfers WHERE campaignId = ? ORDER BY id ASC',
    [campaignId],
  );
  return rows.map((row) => ({
    id: row.id,
    campaignId: row.campaignId,
    direction: row.direction === 'in' ? 'in' : 'out',
    counterparty: row.counterparty,
    amount: BigInt(row.amount),
    createdAt: Number(row.createdAt),
  }));
}

export async function getCampaignHistory(campaignId: string, database?: Database): Promise<AuditEntry[]> {
  const db = database ?? (await openDatabase());
  const rows = await db.all<AuditRow[]>(
    'SELECT * FROM audit_logs WHERE campaignId = ? ORDER BY id ASC',
    [campaignId],
  );
  return rows.map((row) => ({
    id: row.id,
    campaignId: row.campaignId ?? '',
    event: parseEvent(row.event),
    details: parseDetails(row.details),
    timestamp: row.timestamp,
  }));
}

/** A failed ROLLBACK is logged so the error that caused it is the one rethrown. */
async function rollback(db: Database): Promise<void> {
  try {
    await db.exec('ROLLBACK');
  } catch (rollbackError) {
    const message = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
    console.error(`[sqlite] rollback failed: ${message}`);
  }
}

/**
 * Snapshot, transfer journal row and audit row for one ledger change, written
 * in a single transaction.
 */
export async function commitLedgerChange(change: LedgerChange, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.exec('BEGIN TRANSACTION');
  try {
    await upsertCampaign(change.snapshot, db);

    if (change.transfer) {
      await db.run(
        `INSERT INTO transfers (campaignId, direction, counterparty, amount, createdAt)
         VALUES (?, ?, ?, ?, ?)`,
        [
          change.campaignId,
          change.transfer.direction,
          change.transfer.counterparty,
          change.transfer.amount.toString(),
          change.at,
        ],
      );
    }

    await db.run(
      'INSERT INTO audit_logs (campaignId, event, details, timestamp) VALUES (?, ?, ?, ?)',
      [change.campaignId, change.event, JSON.stringify(change.details), new Date(change.at).toISOString()],
    );

    await db.exec('COMMIT');
  } catch (error) {
    await rollback(db);
    throw error;
  }
}

export async function getRegistryPaused(database?: Database): Promise<boolean> {
  const db = database ?? (await openDatabase());
  const row = await db.get<{ value: string }>(
    "SELECT value FROM registry_settings WHERE key = 'paused'",
  );
  return row?.value === '1';
}

export async function setRegistryPaused(paused: boolean, changedBy: string, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.exec('BEGIN TRANSACTION');
  try {
    await db.run(
      "INSERT OR REPLACE INTO registry_settings (key, value) VALUES ('paused', ?)",
      [paused ? '1' : '0'],
    );
    await db.run(
      'INSERT INTO audit_logs (campaignId, event, details) VALUES (?, ?, ?)',
      [null, 'REGISTRY_PAUSE_TOGGLED', JSON.stringify({ paused, changedBy })],
    );
    await db.exec('COMMIT');
  } catch (error) {
    await rollback(db);
    throw error;
  }
}

/** SQLite-backed ledger store; all writes share one connection and one queue. */
export class SqliteLedgerStore implements LedgerStore {
  private readonly writes = new SerialQueue();

  private constructor(private readonly db: Database) {}

  static async open(dbPath?: string): Promise<SqliteLedgerStore> {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    return new SqliteLedgerStore(db);
  }

  commit(change: LedgerChange): Promise<void> {
    return this.writes.run(() => commitLedgerChange(change, this.db));
  }

  loadSnapshots(): Promise<CampaignSnapshot[]> {
    return listCampaigns(this.db);
  }

  getHistory(campaignId: string): Promise<AuditEntry[]> {
    return getCampaignHistory(campaignId, this.db);
  }

  listTransfers(campaignId: string): Promise<TransferRecord[]> {
    return listTransfers(campaignId, this.db);
  }

  loadRegistryPaused(): Promise<boolean> {
    return getRegistryPaused(this.db);
  }

  saveRegistryPaused(paused: boolean, changedBy: string): Promise<void> {
    return this.writes.run(() => setRegistryPaused(paused, changedBy, this.db));
  }

  close(): Promise<void> {
    dbPromise = null;
    dbPromisePath = null;
    return this.db.close();
  }
}
