import db from '../connection';
import type { Queryable } from '../connection';
import { v4 as uuidv4 } from 'uuid';
import type { Settlement, CreateSettlementInput } from '../../types/settlement';
import {
  toInteger,
  toIsoString,
  toTotalsMap,
  type DbInteger,
  type DbTimestamp,
} from '../rowValues';

const TABLE = 'settlements';

interface SettlementRow {
  id: string;
  bet_id: string;
  person_id: string;
  net_cents: DbInteger;
  ts: DbTimestamp;
}

/**
 * Settlement rows are only ever inserted; nothing here updates or deletes them.
 */
export async function createMany(
  inputs: CreateSettlementInput[],
  settledAt: string,
  conn: Queryable = db
): Promise<Settlement[]> {
  if (inputs.length === 0) {
    return [];
  }

  const records: SettlementRow[] = inputs.map((input) => ({
    id: uuidv4(),
    bet_id: input.betId,
    person_id: input.personId,
    net_cents: input.netCents,
    ts: settledAt,
  }));

  await conn<SettlementRow>(TABLE).insert(records);
  return records.map(mapToEntity);
}

export async function findByBetId(betId: string, conn: Queryable = db): Promise<Settlement[]> {
  const records = await conn<SettlementRow>(TABLE).where({ bet_id: betId }).orderBy('ts', 'asc');
  return records.map(mapToEntity);
}

export async function sumByPerson(conn: Queryable = db): Promise<Map<string, number>> {
  const rows: Record<string, unknown>[] = await conn(TABLE)
    .select('person_id')
    .sum({ total: 'net_cents' })
    .groupBy('person_id');

  return toTotalsMap(rows);
}

export async function sumForPerson(personId: string, conn: Queryable = db): Promise<number> {
  const result = await conn(TABLE)
    .where({ person_id: personId })
    .sum({ total: 'net_cents' })
    .first();
  return toInteger(result?.total);
}

function mapToEntity(record: SettlementRow): Settlement {
  return {
    id: record.id,
    betId: record.bet_id,
    personId: record.person_id,
    netCents: toInteger(record.net_cents),
    timestamp: toIsoString(record.ts),
  };
}

export const settlementRepository = {
  createMany,
  findByBetId,
  sumByPerson,
  sumForPerson,
};
