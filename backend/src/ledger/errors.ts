export type LedgerErrorCode =
  | 'not-owner'
  | 'not-registry-owner'
  | 'campaign-not-open'
  | 'campaign-paused'
  | 'campaign-not-successful'
  | 'refunds-not-available'
  | 'invalid-tier-index'
  | 'invalid-tier-amount'
  | 'invalid-tier-name'
  | 'tier-has-backers'
  | 'tier-already-funded'
  | 'incorrect-contribution-amount'
  | 'goal-not-reached'
  | 'no-funds-to-withdraw'
  | 'no-contribution-to-refund'
  | 'invalid-extension'
  | 'invalid-goal'
  | 'invalid-duration'
  | 'invalid-campaign-name'
  | 'registry-paused'
  | 'campaign-not-found'
  | 'transfer-failed';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, options?: { cause?: unknown }) {
    super(code, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
