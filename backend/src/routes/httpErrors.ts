import type { Response } from 'express';
import { isLedgerError, type LedgerErrorCode } from '../ledger/errors';
import { MissingCallerError } from './payload';

const STATUS_BY_CODE: Partial<Record<LedgerErrorCode, number>> = {
  'not-owner': 403,
  'not-registry-owner': 403,
  'campaign-not-found': 404,
  'transfer-failed': 500,
};

export function statusForError(err: unknown): number {
  if (err instanceof MissingCallerError) return 401;
  if (isLedgerError(err)) return STATUS_BY_CODE[err.code] ?? 400;
  return 400;
}

export function sendError(res: Response, err: unknown): void {
  const status = statusForError(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status >= 500) {
    const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : undefined;
    console.error(`[campaigns] ${message}${cause ? `: ${cause}` : ''}`);
  }
  res.status(status).json({ error: message });
}
