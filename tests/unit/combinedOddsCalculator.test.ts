import {
  calculateCombinedOdds,
  calculateSettledOdds,
  calculatePotentialOdds,
  roundOdds,
} from '../../src/computations/combinedOddsCalculator';
import type { OddsLeg } from '../../src/computations/combinedOddsCalculator';

describe('combinedOddsCalculator', () => {
  describe('calculateCombinedOdds', () => {
    it('should return the decimal odds of a single leg', () => {
      expect(calculateCombinedOdds([{ americanOdds: 150 }])).toBe(2.5);
    });

    it('should multiply the decimal odds of every leg', () => {
      expect(calculateCombinedOdds([{ americanOdds: 150 }, { americanOdds: -200 }])).toBe(3.75);
    });

    it('should return 1 for an empty list', () => {
      expect(calculateCombinedOdds([])).toBe(1);
    });
  });

  describe('calculateSettledOdds', () => {
    it('should count only WON legs', () => {
      const legs: OddsLeg[] = [
        { americanOdds: 150, result: 'WON' },
        { americanOdds: -200, result: 'VOID' },
        { americanOdds: 100, result: 'WON' },
      ];

      expect(calculateSettledOdds(legs)).toBe(5);
    });

    it('should return 1 when no leg won', () => {
      expect(calculateSettledOdds([{ americanOdds: 300, result: 'VOID' }])).toBe(1);
    });
  });

  describe('calculatePotentialOdds', () => {
    it('should price pending and won legs but drop void ones', () => {
      const legs: OddsLeg[] = [
        { americanOdds: 150, result: 'PENDING' },
        { americanOdds: -200, result: 'VOID' },
        { americanOdds: 100, result: 'WON' },
      ];

      expect(calculatePotentialOdds(legs)).toBe(5);
    });
  });

  describe('roundOdds', () => {
    it('should round to 4 decimal places by default', () => {
      expect(roundOdds(1.90909090909)).toBe(1.9091);
      expect(roundOdds(3.75)).toBe(3.75);
    });

    it('should round to the requested number of decimal places', () => {
      expect(roundOdds(1.90909090909, 2)).toBe(1.91);
    });
  });
});
