/**
 * Error types and codes
 */
import { Rejection, RejectionReason } from './result.types';

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_QUANTITY = 'INVALID_QUANTITY',
  INSUFFICIENT_TENDER = 'INSUFFICIENT_TENDER',
  EMPTY_SALE = 'EMPTY_SALE',
  DUPLICATE_LINE = 'DUPLICATE_LINE',

  // Not found errors (404)
  NOT_FOUND = 'NOT_FOUND',
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  RECEIPT_NOT_FOUND = 'RECEIPT_NOT_FOUND',
  RECEIPT_LINE_NOT_FOUND = 'RECEIPT_LINE_NOT_FOUND',

  // Conflict errors (409)
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  ALREADY_CANCELED = 'ALREADY_CANCELED',
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',

  // Server errors (5xx)
  STORAGE_FAULT = 'STORAGE_FAULT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// Underlying persistence failed; the operation did not commit
export class StorageFaultError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.STORAGE_FAULT, message, 503, details);
    this.name = 'StorageFaultError';
  }
}

const rejectionStatus: Record<RejectionReason, { code: ErrorCode; statusCode: number }> = {
  [RejectionReason.NOT_FOUND]: { code: ErrorCode.NOT_FOUND, statusCode: 404 },
  [RejectionReason.LINE_NOT_FOUND]: { code: ErrorCode.RECEIPT_LINE_NOT_FOUND, statusCode: 404 },
  [RejectionReason.INVALID_QTY]: { code: ErrorCode.INVALID_QUANTITY, statusCode: 400 },
  [RejectionReason.EMPTY_SALE]: { code: ErrorCode.EMPTY_SALE, statusCode: 400 },
  [RejectionReason.DUPLICATE_LINE]: { code: ErrorCode.DUPLICATE_LINE, statusCode: 400 },
  [RejectionReason.INSUFFICIENT_TENDER]: { code: ErrorCode.INSUFFICIENT_TENDER, statusCode: 400 },
  [RejectionReason.ALREADY_CANCELED]: { code: ErrorCode.ALREADY_CANCELED, statusCode: 409 },
  [RejectionReason.INSUFFICIENT_STOCK]: { code: ErrorCode.INSUFFICIENT_STOCK, statusCode: 409 },
};

/**
 * Convert a rejected ledger operation into an HTTP-facing error
 */
export function rejectionToAppError(rejection: Rejection): AppError {
  const { code, statusCode } = rejectionStatus[rejection.reason];
  return new AppError(code, rejection.message, statusCode, rejection.details);
}
