import type { Knex } from 'knex';
import db from '../connection';
import { BET_STATUSES, LEG_RESULTS } from '../../types/bet';
import { TRANSACTION_TYPES } from '../../types/transaction';

interface EnumColumn {
  table: string;
  column: string;
  canonical: readonly string[];
}

// Older databases stored enum values lowercase
const ENUM_COLUMNS: EnumColumn[] = [
  { table: 'bets', column: 'status', canonical: BET_STATUSES },
  { table: 'bet_legs', column: 'result', canonical: LEG_RESULTS },
  { table: 'transactions', column: 'type', canonical: TRANSACTION_TYPES },
];

export type NormalizationReport = Record<string, number>;

/**
 * Rewrites lowercase legacy enum values (`open`, `won`, `deposit`, ...) to
 * their canonical names. Runs in one transaction and can be repeated; a
 * clean database reports zero rows for every table.
 */
export async function normalizeLegacyEnums(conn: Knex = db): Promise<NormalizationReport> {
  const report: NormalizationReport = {};

  await conn.transaction(async (trx) => {
    for (const { table, column, canonical } of ENUM_COLUMNS) {
      let updated = 0;
      for (const name of canonical) {
        const rows = await trx(table)
          .where(column, name.toLowerCase())
          .update({ [column]: name });
        if (rows > 0) {
          console.log(`[normalize-enums] ${table}.${column}: ${rows} row(s) ${name.toLowerCase()} -> ${name}`);
        }
        updated += rows;
      }
      report[table] = updated;
    }
  });

  return report;
}
