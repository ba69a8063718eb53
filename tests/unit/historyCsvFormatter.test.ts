import {
  buildHistoryCsv,
  escapeCsvField,
  formatCents,
  formatTimestamp,
} from '../../src/computations/historyCsvFormatter';
import type { BetHistoryEntry } from '../../src/types/bet';

describe('historyCsvFormatter', () => {
  describe('formatCents', () => {
    it('should format cents as dollars with two decimals', () => {
      expect(formatCents(123456)).toBe('$1234.56');
      expect(formatCents(5)).toBe('$0.05');
      expect(formatCents(0)).toBe('$0.00');
    });

    it('should put the sign before the dollar mark', () => {
      expect(formatCents(-550)).toBe('-$5.50');
    });
  });

  describe('formatTimestamp', () => {
    it('should format to minutes in UTC', () => {
      expect(formatTimestamp('2026-03-01T18:05:42.123Z')).toBe('2026-03-01 18:05');
    });

    it('should return an empty string for missing or unreadable timestamps', () => {
      expect(formatTimestamp(null)).toBe('');
      expect(formatTimestamp('not a date')).toBe('');
    });
  });

  describe('escapeCsvField', () => {
    it('should leave plain values alone', () => {
      expect(escapeCsvField('Alice ($60.00)')).toBe('Alice ($60.00)');
    });

    it('should quote values with commas and double embedded quotes', () => {
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    });
  });

  describe('buildHistoryCsv', () => {
    it('should write only the header for no bets', () => {
      expect(buildHistoryCsv([])).toBe('ID,Participants,Stake,Status,Placed At,Settled At\r\n');
    });

    it('should write one row per bet', () => {
      const entries: BetHistoryEntry[] = [
        {
          bet: {
            id: 'bet-1',
            totalStakeCents: 10000,
            status: 'WON',
            version: 1,
            placedAt: '2026-03-01T18:05:00.000Z',
            settledAt: '2026-03-02T09:30:00.000Z',
          },
          participants: [
            { id: 'bp-1', betId: 'bet-1', personId: 'p-1', position: 0, stakeCents: 6000, personName: 'Alice' },
            { id: 'bp-2', betId: 'bet-1', personId: 'p-2', position: 1, stakeCents: 4000, personName: 'Bob' },
          ],
        },
        {
          bet: {
            id: 'bet-2',
            totalStakeCents: 2500,
            status: 'OPEN',
            version: 0,
            placedAt: '2026-03-03T07:00:00.000Z',
            settledAt: null,
          },
          participants: [
            { id: 'bp-3', betId: 'bet-2', personId: 'p-3', position: 0, stakeCents: 2500, personName: 'Smith, J' },
          ],
        },
      ];

      expect(buildHistoryCsv(entries).split('\r\n')).toEqual([
        'ID,Participants,Stake,Status,Placed At,Settled At',
        'bet-1,Alice ($60.00); Bob ($40.00),$100.00,won,2026-03-01 18:05,2026-03-02 09:30',
        'bet-2,"Smith, J ($25.00)",$25.00,open,2026-03-03 07:00,',
        '',
      ]);
    });
  });
});
