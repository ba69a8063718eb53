import type { PersonBalance, PersonBalanceInputs } from '../types/ledger';

/**
 * Ownership is everything a person has put in plus what their bets have
 * settled to; live money is the part of that not riding on open bets.
 */
export function computePersonBalance(inputs: PersonBalanceInputs): PersonBalance {
  const ownershipCents = inputs.transactionCents + inputs.settlementCents;
  return {
    ownershipCents,
    exposureCents: inputs.openStakeCents,
    liveMoneyCents: ownershipCents - inputs.openStakeCents,
  };
}

/**
 * Signed amount to store for a transaction. Deposits always add and
 * withdrawals always subtract, whatever sign the caller used; adjustments
 * are taken as given.
 */
export function signedTransactionAmount(
  type: 'DEPOSIT' | 'WITHDRAW' | 'ADJUSTMENT',
  amountCents: number
): number {
  switch (type) {
    case 'DEPOSIT':
      return Math.abs(amountCents);
    case 'WITHDRAW':
      return -Math.abs(amountCents);
    case 'ADJUSTMENT':
      return amountCents;
  }
}
