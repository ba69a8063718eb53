import type { BetHistoryEntry } from '../types/bet';

export const HISTORY_CSV_HEADER = ['ID', 'Participants', 'Stake', 'Status', 'Placed At', 'Settled At'];

/**
 * Formats integer cents as dollars, e.g. 123456 -> "$1234.56", -550 -> "-$5.50".
 */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const dollars = Math.floor(abs / 100);
  const remainder = (abs % 100).toString().padStart(2, '0');
  return `${sign}$${dollars}.${remainder}`;
}

/**
 * "YYYY-MM-DD HH:mm" in UTC; empty for a missing timestamp.
 */
export function formatTimestamp(iso: string | null): string {
  if (!iso) {
    return '';
  }
  const date = new Date(iso);
  if (isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvLine(fields: (string | number)[]): string {
  return fields.map((field) => escapeCsvField(String(field))).join(',');
}

export function buildHistoryCsv(entries: BetHistoryEntry[]): string {
  const lines = [toCsvLine(HISTORY_CSV_HEADER)];

  for (const { bet, participants } of entries) {
    const names = participants
      .map((p) => `${p.personName} (${formatCents(p.stakeCents)})`)
      .join('; ');

    lines.push(toCsvLine([
      bet.id,
      names,
      formatCents(bet.totalStakeCents),
      bet.status.toLowerCase(),
      formatTimestamp(bet.placedAt),
      formatTimestamp(bet.settledAt),
    ]));
  }

  return lines.join('\r\n') + '\r\n';
}
