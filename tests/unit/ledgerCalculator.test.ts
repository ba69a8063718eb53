import { computePersonBalance, signedTransactionAmount } from '../../src/computations/ledgerCalculator';

describe('ledgerCalculator', () => {
  describe('computePersonBalance', () => {
    it('should net deposits, settlements and open stakes', () => {
      const balance = computePersonBalance({
        transactionCents: 5000 + 5000,
        settlementCents: -2000,
        openStakeCents: 1000,
      });

      expect(balance).toEqual({
        ownershipCents: 8000,
        exposureCents: 1000,
        liveMoneyCents: 7000,
      });
    });

    it('should allow live money to go negative', () => {
      const balance = computePersonBalance({
        transactionCents: 0,
        settlementCents: 0,
        openStakeCents: 2500,
      });

      expect(balance.liveMoneyCents).toBe(-2500);
    });
  });

  describe('signedTransactionAmount', () => {
    it('should store deposits as positive', () => {
      expect(signedTransactionAmount('DEPOSIT', 300)).toBe(300);
      expect(signedTransactionAmount('DEPOSIT', -300)).toBe(300);
    });

    it('should store withdrawals as negative', () => {
      expect(signedTransactionAmount('WITHDRAW', 500)).toBe(-500);
      expect(signedTransactionAmount('WITHDRAW', -500)).toBe(-500);
    });

    it('should take adjustments as given', () => {
      expect(signedTransactionAmount('ADJUSTMENT', -250)).toBe(-250);
      expect(signedTransactionAmount('ADJUSTMENT', 250)).toBe(250);
    });
  });
});
