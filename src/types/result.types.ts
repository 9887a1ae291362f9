/**
 * Typed outcome of a ledger operation.
 *
 * Business-rule failures come back as a `Rejection` value; only storage
 * failures are thrown.
 */

export enum RejectionReason {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_QTY = 'INVALID_QTY',
  INSUFFICIENT_TENDER = 'INSUFFICIENT_TENDER',
  ALREADY_CANCELED = 'ALREADY_CANCELED',
  LINE_NOT_FOUND = 'LINE_NOT_FOUND',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  EMPTY_SALE = 'EMPTY_SALE',
  DUPLICATE_LINE = 'DUPLICATE_LINE',
}

export interface Rejection {
  reason: RejectionReason;
  message: string;
  details?: Record<string, unknown>;
}

export interface Committed<T> {
  ok: true;
  value: T;
}

export interface Rejected {
  ok: false;
  rejection: Rejection;
}

export type CommitResult<T> = Committed<T> | Rejected;

export function committed<T>(value: T): Committed<T> {
  return { ok: true, value };
}

export function rejected(
  reason: RejectionReason,
  message: string,
  details?: Record<string, unknown>
): Rejected {
  return {
    ok: false,
    rejection: {
      reason,
      message,
      ...(details && { details }),
    },
  };
}
