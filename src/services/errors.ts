import type { PriceFailureReason } from '../types/price.js';

export type JournalErrorCode =
  | 'EMPTY_MESSAGE'
  | 'ORPHAN_SELL'
  | 'OVERSELL'
  | 'POSITION_CONFLICT'
  | 'PRICE_LOOKUP_FAILED'
  | 'PERSISTENCE_FAILURE';

export class JournalError extends Error {
  readonly code: JournalErrorCode;

  constructor(code: JournalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JournalError';
    this.code = code;
  }
}

export class EmptyMessageError extends JournalError {
  constructor() {
    super('EMPTY_MESSAGE', 'Message is empty');
    this.name = 'EmptyMessageError';
  }
}

/** A SELL arrived for a token/wallet pair with no open position. */
export class OrphanSellError extends JournalError {
  readonly tokenLabel: string;

  constructor(tokenLabel: string) {
    super(
      'ORPHAN_SELL',
      `No open position for ${tokenLabel}: a sell needs an earlier buy. Nothing was recorded.`,
    );
    this.name = 'OrphanSellError';
    this.tokenLabel = tokenLabel;
  }
}

export class OversellError extends JournalError {
  readonly positionId: number;
  readonly requested: number;
  readonly remaining: number;

  constructor(positionId: number, tokenLabel: string, requested: number, remaining: number) {
    super(
      'OVERSELL',
      `Sell of ${requested} ${tokenLabel} exceeds the ${remaining} held in position #${positionId}. Nothing was recorded.`,
    );
    this.name = 'OversellError';
    this.positionId = positionId;
    this.requested = requested;
    this.remaining = remaining;
  }
}

export class PositionConflictError extends JournalError {
  readonly positionId: number;

  constructor(positionId: number, expectedVersion: number) {
    super(
      'POSITION_CONFLICT',
      `Position #${positionId} changed concurrently (expected version ${expectedVersion})`,
    );
    this.name = 'PositionConflictError';
    this.positionId = positionId;
  }
}

/** Carries why a price lookup failed; never fatal for the trade. */
export class PriceLookupError extends JournalError {
  readonly reason: PriceFailureReason;

  constructor(reason: PriceFailureReason, message: string, options?: { cause?: unknown }) {
    super('PRICE_LOOKUP_FAILED', message, options);
    this.name = 'PriceLookupError';
    this.reason = reason;
  }
}

export class PersistenceError extends JournalError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILURE', `Failed to ${operation}: ${detail}`, { cause });
    this.name = 'PersistenceError';
  }
}

export function isJournalError(err: unknown): err is JournalError {
  return err instanceof JournalError;
}
