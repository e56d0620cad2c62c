import type { Request } from 'express';
import { CALLER_HEADER } from '../config/constants';

const INTEGER_AMOUNT_REGEX = /^\d+$/;

/** Amounts travel as decimal strings (or safe integers) and become bigint. */
export function parseAmount(raw: unknown, field: string): bigint {
  const normalized = typeof raw === 'number' && Number.isSafeInteger(raw) ? String(raw) : String(raw ?? '').trim();
  if (!normalized) {
    throw new Error(`${field}-required`);
  }
  if (!INTEGER_AMOUNT_REGEX.test(normalized)) {
    throw new Error(`${field}-invalid`);
  }
  return BigInt(normalized);
}

export function parseIndex(raw: unknown, field: string): number {
  const normalized = String(raw ?? '').trim();
  if (!/^\d+$/.test(normalized)) {
    throw new Error(`${field}-invalid`);
  }
  const parsed = Number(normalized);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`${field}-invalid`);
  }
  return parsed;
}

export function parsePositiveInteger(raw: unknown, field: string): number {
  const parsed = parseIndex(raw, field);
  if (parsed <= 0) {
    throw new Error(`${field}-invalid`);
  }
  return parsed;
}

export function parseRequiredText(raw: unknown, field: string, maxLength = 200): string {
  const value = typeof raw === 'string' ? raw.trim() : '';
  if (!value) {
    throw new Error(`${field}-required`);
  }
  if (value.length > maxLength) {
    throw new Error(`${field}-too-long`);
  }
  return value;
}

export function parseOptionalText(raw: unknown, field: string, maxLength = 2000): string {
  if (raw === undefined || raw === null) return '';
  if (typeof raw !== 'string') {
    throw new Error(`${field}-invalid`);
  }
  const value = raw.trim();
  if (value.length > maxLength) {
    throw new Error(`${field}-too-long`);
  }
  return value;
}

export class MissingCallerError extends Error {
  constructor() {
    super('caller-required');
    this.name = 'MissingCallerError';
  }
}

/** The caller identity is asserted by the environment in front of this service. */
export function readCaller(req: Request): string {
  const caller = req.header(CALLER_HEADER)?.trim() ?? '';
  if (!caller) {
    throw new MissingCallerError();
  }
  return caller;
}

export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body)
    ? Object.fromEntries(Object.entries(body))
    : {};
}
