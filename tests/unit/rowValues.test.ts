import { toInteger, toTotalsMap } from '../../src/db/rowValues';

describe('rowValues', () => {
  describe('toInteger', () => {
    it('should read pg bigint strings', () => {
      expect(toInteger('-2500')).toBe(-2500);
    });

    it('should treat a missing sum as zero', () => {
      expect(toInteger(null)).toBe(0);
      expect(toInteger(undefined)).toBe(0);
    });

    it('should reject values beyond the safe integer range', () => {
      expect(() => toInteger('9007199254740993')).toThrow(
        'Expected an integer column value, got 9007199254740993'
      );
    });
  });

  describe('toTotalsMap', () => {
    it('should collect grouped sums by person', () => {
      const totals = toTotalsMap([
        { person_id: 'p-1', total: '8000' },
        { person_id: 'p-2', total: -1500 },
        { person_id: 'p-3', total: null },
      ]);

      expect([...totals.entries()]).toEqual([
        ['p-1', 8000],
        ['p-2', -1500],
        ['p-3', 0],
      ]);
    });

    it('should reject a sum that lost precision', () => {
      expect(() => toTotalsMap([{ person_id: 'p-1', total: '18014398509481985' }])).toThrow(
        'Expected an integer column value, got 18014398509481985'
      );
    });
  });
});
