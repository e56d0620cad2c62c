import path from 'path';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Largest timestamp a `Date` can hold; deadlines never exceed it. */
export const MAX_DEADLINE_MS = 8_640_000_000_000_000;

const DEFAULT_REGISTRY_OWNER = 'registry-admin';
const DEFAULT_PORT = 3001;

export function parsePositiveIntegerEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || !Number.isInteger(parsed)) {
    return fallback;
  }
  return parsed;
}

export function getPort(): number {
  return parsePositiveIntegerEnv(process.env.PORT, DEFAULT_PORT);
}

export function getHost(): string {
  return process.env.HOST?.trim() || '127.0.0.1';
}

export function getRegistryOwner(): string {
  return process.env.TIERFUND_REGISTRY_OWNER?.trim() || DEFAULT_REGISTRY_OWNER;
}

export type StoreBackend = 'sqlite' | 'memory';

export function getStoreBackend(): StoreBackend {
  const raw = (process.env.TIERFUND_STORE || 'sqlite').trim().toLowerCase();
  return raw === 'memory' ? 'memory' : 'sqlite';
}

export function getDefaultDbPath(): string {
  return path.join(process.cwd(), 'data', 'tierfund.db');
}

export function getSqlitePath(): string {
  const envPath = process.env.TIERFUND_SQLITE_PATH?.trim();
  return envPath && envPath.length > 0 ? envPath : getDefaultDbPath();
}

export function getCorsOrigins(): string[] {
  return (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export const CALLER_HEADER = 'x-caller-id';
