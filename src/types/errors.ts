import { ReasonCode } from './reasonCodes';

/**
 * Error carrying a reason code. Thrown by computations and from inside
 * database transactions so that the whole unit of work is rolled back.
 */
export class DomainError extends Error {
  readonly code: ReasonCode;
  readonly details?: unknown;

  constructor(code: ReasonCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
  }
}

export class InvalidOddsError extends DomainError {
  constructor(message: string) {
    super(ReasonCode.INVALID_ODDS_INPUT, message);
    this.name = 'InvalidOddsError';
  }
}

/**
 * Wraps a storage failure. The original error is kept as `cause` for logging.
 */
export class PersistenceError extends DomainError {
  constructor(message: string, cause: unknown) {
    super(ReasonCode.PERSISTENCE_ERROR, message);
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
