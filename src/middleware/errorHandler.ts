import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ReasonCode } from '../types/reasonCodes';
import type { ServiceResult } from '../types/serviceResult';

export interface ApiError extends Error {
  statusCode?: number;
  code?: ReasonCode;
  details?: unknown;
}

/**
 * Global error handler that formats errors consistently and logs them.
 */
export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error(`[ERROR] ${req.method} ${req.path}:`, {
    message: err.message,
    code: err.code,
    cause: err.cause,
    stack: process.env.NODE_ENV === 'development' ? err.stack : undefined,
  });

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation Error',
      code: ReasonCode.VALIDATION_ERROR,
      message: 'Request validation failed',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  if (err.code) {
    const statusCode = err.statusCode ?? getStatusCodeForReasonCode(err.code);
    res.status(statusCode).json({
      error: getErrorTypeForStatusCode(statusCode),
      code: err.code,
      message: statusCode >= 500 && process.env.NODE_ENV === 'production'
        ? 'An unexpected error occurred'
        : err.message,
      details: err.details,
    });
    return;
  }

  // Body-parser and other unknown errors
  const statusCode = err.statusCode ?? 500;
  res.status(statusCode).json({
    error: getErrorTypeForStatusCode(statusCode),
    code: statusCode === 400 ? ReasonCode.VALIDATION_ERROR : ReasonCode.INTERNAL_ERROR,
    message: process.env.NODE_ENV === 'production' && statusCode >= 500
      ? 'An unexpected error occurred'
      : err.message,
  });
}

/**
 * Creates an API error with proper typing.
 */
export function createApiError(
  message: string,
  code: ReasonCode,
  details?: unknown
): ApiError {
  const error: ApiError = new Error(message);
  error.code = code;
  error.statusCode = getStatusCodeForReasonCode(code);
  error.details = details;
  return error;
}

/**
 * Turns the error half of a failed ServiceResult into an ApiError.
 */
export function fromServiceError(
  error: ServiceResult<unknown>['error'],
  fallbackMessage: string
): ApiError {
  return createApiError(
    error?.message ?? fallbackMessage,
    error?.code ?? ReasonCode.INTERNAL_ERROR,
    error?.details
  );
}

export function getStatusCodeForReasonCode(code: ReasonCode): number {
  switch (code) {
    case ReasonCode.VALIDATION_ERROR:
      return 400;

    case ReasonCode.BET_NOT_FOUND:
    case ReasonCode.PERSON_NOT_FOUND:
      return 404;

    case ReasonCode.BET_ALREADY_SETTLED:
    case ReasonCode.CONCURRENT_MODIFICATION:
      return 409;

    case ReasonCode.INVALID_ODDS_INPUT:
    case ReasonCode.EMPTY_BET_SUBMISSION:
    case ReasonCode.NON_POSITIVE_STAKE:
    case ReasonCode.DUPLICATE_PARTICIPANT:
    case ReasonCode.PAYOUT_OUT_OF_RANGE:
    case ReasonCode.INVALID_TRANSACTION_AMOUNT:
      return 422;

    case ReasonCode.PERSISTENCE_ERROR:
    case ReasonCode.INTERNAL_ERROR:
    default:
      return 500;
  }
}

function getErrorTypeForStatusCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Bad Request';
    case 404:
      return 'Not Found';
    case 409:
      return 'Conflict';
    case 422:
      return 'Unprocessable Entity';
    case 500:
    default:
      return 'Internal Server Error';
  }
}
