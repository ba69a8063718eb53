import db from '../connection';
import type { Queryable } from '../connection';
import { v4 as uuidv4 } from 'uuid';
import type { Transaction, CreateTransactionInput } from '../../types/transaction';
import { isTransactionType } from '../../types/transaction';
import {
  parseStoredEnum,
  toInteger,
  toTotalsMap,
  toIsoString,
  type DbInteger,
  type DbTimestamp,
} from '../rowValues';

const TABLE = 'transactions';

interface TransactionRow {
  id: string;
  person_id: string;
  type: string;
  amount_cents: DbInteger;
  note: string | null;
  ts: DbTimestamp;
  created_at: DbTimestamp;
}

export async function create(
  input: CreateTransactionInput,
  conn: Queryable = db
): Promise<Transaction> {
  const now = new Date().toISOString();

  const record: TransactionRow = {
    id: uuidv4(),
    person_id: input.personId,
    type: input.type,
    amount_cents: input.amountCents,
    note: input.note ?? null,
    ts: now,
    created_at: now,
  };

  await conn<TransactionRow>(TABLE).insert(record);
  return mapToEntity(record);
}

export async function findById(id: string, conn: Queryable = db): Promise<Transaction | null> {
  const record = await conn<TransactionRow>(TABLE).where({ id }).first();
  return record ? mapToEntity(record) : null;
}

export async function findAll(
  personId?: string,
  conn: Queryable = db
): Promise<Transaction[]> {
  const query = conn<TransactionRow>(TABLE).orderBy('ts', 'desc');
  if (personId) {
    query.where({ person_id: personId });
  }
  const records = await query;
  return records.map(mapToEntity);
}

/**
 * Net amount per person across all their transactions.
 */
export async function sumByPerson(conn: Queryable = db): Promise<Map<string, number>> {
  const rows: Record<string, unknown>[] = await conn(TABLE)
    .select('person_id')
    .sum({ total: 'amount_cents' })
    .groupBy('person_id');

  return toTotalsMap(rows);
}

export async function sumForPerson(personId: string, conn: Queryable = db): Promise<number> {
  const result = await conn(TABLE)
    .where({ person_id: personId })
    .sum({ total: 'amount_cents' })
    .first();
  return toInteger(result?.total);
}

function mapToEntity(record: TransactionRow): Transaction {
  return {
    id: record.id,
    personId: record.person_id,
    type: parseStoredEnum(record.type, isTransactionType, 'transactions.type'),
    amountCents: toInteger(record.amount_cents),
    note: record.note,
    timestamp: toIsoString(record.ts),
  };
}

export const transactionRepository = {
  create,
  findById,
  findAll,
  sumByPerson,
  sumForPerson,
};
