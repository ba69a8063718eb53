import type { ReasonCode } from './reasonCodes';
import type { DomainError } from './errors';

export interface ServiceResult<T> {
  success: boolean;
  data?: T;
  error?: {
    code: ReasonCode;
    message: string;
    details?: unknown;
  };
}

export function ok<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

export function fail<T>(code: ReasonCode, message: string, details?: unknown): ServiceResult<T> {
  return {
    success: false,
    error: { code, message, details },
  };
}

export function failFromError<T>(err: DomainError): ServiceResult<T> {
  return fail(err.code, err.message, err.details);
}
