import { DomainError, InvalidOddsError } from '../types/errors';
import { ReasonCode } from '../types/reasonCodes';

/**
 * Converts American odds (e.g. +150, -200) to decimal odds.
 *
 * Positive odds are the profit on a 100 stake; negative odds are the stake
 * needed to profit 100. Zero has no meaning in this notation and is rejected.
 *
 * @example americanToDecimal(150)  // 2.5
 * @example americanToDecimal(-200) // 1.5
 */
export function americanToDecimal(americanOdds: number): number {
  if (!Number.isInteger(americanOdds) || americanOdds === 0) {
    throw new InvalidOddsError(
      `American odds must be a nonzero integer, got ${americanOdds}`
    );
  }

  if (americanOdds > 0) {
    return 1 + americanOdds / 100;
  }
  return 1 + 100 / Math.abs(americanOdds);
}

/**
 * Converts decimal odds back to American odds, truncating toward zero.
 * Decimal odds of 1.0 or less have no American equivalent.
 */
export function decimalToAmerican(decimalOdds: number): number {
  if (!Number.isFinite(decimalOdds) || decimalOdds <= 1) {
    throw new InvalidOddsError(
      `Decimal odds must be greater than 1.0, got ${decimalOdds}`
    );
  }

  if (decimalOdds >= 2) {
    return Math.trunc((decimalOdds - 1) * 100);
  }
  return Math.trunc(-100 / (decimalOdds - 1));
}

/**
 * Total return (stake included) in cents for a stake at the given combined
 * decimal odds, rounded to the nearest cent with halves away from zero.
 * Throws PAYOUT_OUT_OF_RANGE when the result is not a safe integer.
 */
export function calculateParlayPayout(stakeCents: number, combinedDecimalOdds: number): number {
  if (!Number.isSafeInteger(stakeCents) || stakeCents < 0) {
    throw new InvalidOddsError(
      `Stake must be a nonnegative integer number of cents, got ${stakeCents}`
    );
  }
  if (!Number.isFinite(combinedDecimalOdds) || combinedDecimalOdds < 1) {
    throw new InvalidOddsError(
      `Combined decimal odds must be at least 1.0, got ${combinedDecimalOdds}`
    );
  }

  const payoutCents = roundHalfAwayFromZero(stakeCents * combinedDecimalOdds);
  if (!Number.isSafeInteger(payoutCents)) {
    throw new DomainError(
      ReasonCode.PAYOUT_OUT_OF_RANGE,
      `Payout of ${stakeCents} cents at ${combinedDecimalOdds} is too large to record`
    );
  }
  return payoutCents;
}

export function roundHalfAwayFromZero(value: number): number {
  // Math.round sends -2.5 to -2
  return Math.sign(value) * Math.round(Math.abs(value));
}
