export enum ReasonCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_ODDS_INPUT = 'INVALID_ODDS_INPUT',
  EMPTY_BET_SUBMISSION = 'EMPTY_BET_SUBMISSION',
  NON_POSITIVE_STAKE = 'NON_POSITIVE_STAKE',
  DUPLICATE_PARTICIPANT = 'DUPLICATE_PARTICIPANT',
  PAYOUT_OUT_OF_RANGE = 'PAYOUT_OUT_OF_RANGE',
  INVALID_TRANSACTION_AMOUNT = 'INVALID_TRANSACTION_AMOUNT',
  BET_NOT_FOUND = 'BET_NOT_FOUND',
  PERSON_NOT_FOUND = 'PERSON_NOT_FOUND',
  BET_ALREADY_SETTLED = 'BET_ALREADY_SETTLED',
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
