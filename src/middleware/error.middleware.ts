import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import { appErrorResponse, createErrorResponse, validationErrorResponse } from '../utils/response-factory';
import { componentLogger } from '../config/logger';

const logger = componentLogger('http');

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const context = {
    error: err.message,
    path: req.path,
    method: req.method,
  };

  // AppError (known application errors, including rejected ledger operations)
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('Request failed', { ...context, code: err.code, stack: err.stack });
    } else {
      logger.warn('Request rejected', { ...context, code: err.code });
    }
    return res.status(err.statusCode).json(appErrorResponse(err));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    logger.warn('Request validation failed', context);
    return res.status(400).json(validationErrorResponse(err));
  }

  // Malformed JSON body (body-parser)
  if (err instanceof SyntaxError && 'body' in err) {
    logger.warn('Malformed JSON body', context);
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.INVALID_INPUT, 'Request body is not valid JSON'));
  }

  logger.error('Unhandled error', { ...context, stack: err.stack, body: req.body });

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`));
};
