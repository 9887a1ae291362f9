import { ZodError } from 'zod';
import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * `{ data, message? }` envelope for every successful response
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

/**
 * `{ error: { code, message, details? } }` envelope for every failure
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

export function appErrorResponse(err: AppError): ApiErrorResponse {
  return createErrorResponse(err.code, err.message, err.details);
}

export function formatZodIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validationErrorResponse(error: ZodError): ApiErrorResponse {
  return createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
    errors: formatZodIssues(error),
  });
}
