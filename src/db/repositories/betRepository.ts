import db from '../connection';
import type { Queryable } from '../connection';
import { v4 as uuidv4 } from 'uuid';
import type {
  Bet,
  BetHistoryFilters,
  BetLeg,
  BetParticipantWithName,
  BetStatus,
  CreateBetLegInput,
  CreateBetParticipantInput,
  LegResult,
} from '../../types/bet';
import { isBetStatus, isLegResult } from '../../types/bet';
import {
  parseStoredEnum,
  toInteger,
  toIsoString,
  toNullableIsoString,
  toTotalsMap,
  type DbInteger,
  type DbTimestamp,
} from '../rowValues';

const BETS = 'bets';
const LEGS = 'bet_legs';
const PARTICIPANTS = 'bet_participants';

interface BetRow {
  id: string;
  total_stake_cents: DbInteger;
  status: string;
  version: number;
  placed_at: DbTimestamp;
  settled_at: DbTimestamp | null;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
}

interface BetLegRow {
  id: string;
  bet_id: string;
  position: number;
  matchup: string;
  bet_description: string;
  american_odds: number;
  result: string;
}

interface BetParticipantRow {
  id: string;
  bet_id: string;
  person_id: string;
  position: number;
  stake_cents: DbInteger;
}

interface BetParticipantWithNameRow extends BetParticipantRow {
  person_name: string;
}

export interface CreateBetRecordInput {
  totalStakeCents: number;
  placedAt: string;
}

export async function create(input: CreateBetRecordInput, conn: Queryable = db): Promise<Bet> {
  const now = new Date().toISOString();

  const record: BetRow = {
    id: uuidv4(),
    total_stake_cents: input.totalStakeCents,
    status: 'OPEN',
    version: 0,
    placed_at: input.placedAt,
    settled_at: null,
    created_at: now,
    updated_at: now,
  };

  await conn<BetRow>(BETS).insert(record);
  return mapBet(record);
}

export async function createLegs(
  betId: string,
  legs: CreateBetLegInput[],
  conn: Queryable = db
): Promise<BetLeg[]> {
  const records: BetLegRow[] = legs.map((leg, position) => ({
    id: uuidv4(),
    bet_id: betId,
    position,
    matchup: leg.matchup,
    bet_description: leg.betDescription,
    american_odds: leg.americanOdds,
    result: 'PENDING',
  }));

  await conn<BetLegRow>(LEGS).insert(records);
  return records.map(mapLeg);
}

export async function createParticipants(
  betId: string,
  participants: CreateBetParticipantInput[],
  conn: Queryable = db
): Promise<void> {
  const records: BetParticipantRow[] = participants.map((participant, position) => ({
    id: uuidv4(),
    bet_id: betId,
    person_id: participant.personId,
    position,
    stake_cents: participant.stakeCents,
  }));

  await conn<BetParticipantRow>(PARTICIPANTS).insert(records);
}

export async function findById(id: string, conn: Queryable = db): Promise<Bet | null> {
  const record = await conn<BetRow>(BETS).where({ id }).first();
  return record ? mapBet(record) : null;
}

export async function findByStatus(status: BetStatus, conn: Queryable = db): Promise<Bet[]> {
  const records = await conn<BetRow>(BETS)
    .where({ status })
    .orderBy([
      { column: 'placed_at', order: 'desc' },
      { column: 'created_at', order: 'desc' },
    ]);
  return records.map(mapBet);
}

/**
 * Bets newest first. A person filter keeps bets that person took part in;
 * the date bounds are inclusive and apply to `placed_at`.
 */
export async function findHistory(
  filters: BetHistoryFilters,
  conn: Queryable = db
): Promise<Bet[]> {
  const query = conn<BetRow>(BETS).orderBy([
    { column: 'placed_at', order: 'desc' },
    { column: 'created_at', order: 'desc' },
  ]);

  if (filters.personId) {
    query.whereIn(
      'id',
      conn(PARTICIPANTS).select('bet_id').where({ person_id: filters.personId })
    );
  }
  if (filters.status) {
    query.where({ status: filters.status });
  }
  if (filters.dateFrom) {
    query.where('placed_at', '>=', filters.dateFrom);
  }
  if (filters.dateTo) {
    query.where('placed_at', '<=', filters.dateTo);
  }

  const records = await query;
  return records.map(mapBet);
}

export async function findLegsByBetId(betId: string, conn: Queryable = db): Promise<BetLeg[]> {
  const records = await conn<BetLegRow>(LEGS).where({ bet_id: betId }).orderBy('position', 'asc');
  return records.map(mapLeg);
}

export async function findLegsByBetIds(
  betIds: string[],
  conn: Queryable = db
): Promise<Map<string, BetLeg[]>> {
  const grouped = new Map<string, BetLeg[]>();
  if (betIds.length === 0) {
    return grouped;
  }

  const records = await conn<BetLegRow>(LEGS)
    .whereIn('bet_id', betIds)
    .orderBy([
      { column: 'bet_id', order: 'asc' },
      { column: 'position', order: 'asc' },
    ]);
  for (const leg of records.map(mapLeg)) {
    grouped.set(leg.betId, [...(grouped.get(leg.betId) ?? []), leg]);
  }
  return grouped;
}

export async function findParticipantsByBetId(
  betId: string,
  conn: Queryable = db
): Promise<BetParticipantWithName[]> {
  const grouped = await findParticipantsByBetIds([betId], conn);
  return grouped.get(betId) ?? [];
}

export async function findParticipantsByBetIds(
  betIds: string[],
  conn: Queryable = db
): Promise<Map<string, BetParticipantWithName[]>> {
  const grouped = new Map<string, BetParticipantWithName[]>();
  if (betIds.length === 0) {
    return grouped;
  }

  const records: BetParticipantWithNameRow[] = await conn(`${PARTICIPANTS} as bp`)
    .join('persons as p', 'p.id', 'bp.person_id')
    .whereIn('bp.bet_id', betIds)
    .select('bp.*', 'p.name as person_name')
    .orderBy([
      { column: 'bp.bet_id', order: 'asc' },
      { column: 'bp.position', order: 'asc' },
    ]);

  for (const participant of records.map(mapParticipant)) {
    grouped.set(participant.betId, [...(grouped.get(participant.betId) ?? []), participant]);
  }
  return grouped;
}

export async function updateLegResult(
  legId: string,
  result: LegResult,
  conn: Queryable = db
): Promise<void> {
  await conn<BetLegRow>(LEGS).where({ id: legId }).update({ result });
}

/**
 * Moves an OPEN bet to `status`, but only if nobody else has touched it
 * since it was read at `expectedVersion`. Returns false when the guard
 * matched no row.
 */
export async function advanceOpenBet(
  id: string,
  expectedVersion: number,
  status: BetStatus,
  settledAt: string | null,
  conn: Queryable = db
): Promise<boolean> {
  const updated = await conn<BetRow>(BETS)
    .where({ id, status: 'OPEN', version: expectedVersion })
    .update({
      status,
      settled_at: settledAt,
      version: expectedVersion + 1,
      updated_at: new Date().toISOString(),
    });
  return updated === 1;
}

/**
 * Stake each person currently has riding on OPEN bets.
 */
export async function sumOpenStakeByPerson(conn: Queryable = db): Promise<Map<string, number>> {
  const rows: Record<string, unknown>[] = await conn(`${PARTICIPANTS} as bp`)
    .join(`${BETS} as b`, 'b.id', 'bp.bet_id')
    .where('b.status', 'OPEN')
    .select('bp.person_id as person_id')
    .sum({ total: 'bp.stake_cents' })
    .groupBy('bp.person_id');

  return toTotalsMap(rows);
}

export async function sumOpenStakeForPerson(personId: string, conn: Queryable = db): Promise<number> {
  const result = await conn(`${PARTICIPANTS} as bp`)
    .join(`${BETS} as b`, 'b.id', 'bp.bet_id')
    .where('b.status', 'OPEN')
    .where('bp.person_id', personId)
    .sum({ total: 'bp.stake_cents' })
    .first();
  return toInteger(result?.total);
}

function mapBet(record: BetRow): Bet {
  return {
    id: record.id,
    totalStakeCents: toInteger(record.total_stake_cents),
    status: parseStoredEnum(record.status, isBetStatus, 'bets.status'),
    version: toInteger(record.version),
    placedAt: toIsoString(record.placed_at),
    settledAt: toNullableIsoString(record.settled_at),
  };
}

function mapLeg(record: BetLegRow): BetLeg {
  return {
    id: record.id,
    betId: record.bet_id,
    position: toInteger(record.position),
    matchup: record.matchup,
    betDescription: record.bet_description,
    americanOdds: toInteger(record.american_odds),
    result: parseStoredEnum(record.result, isLegResult, 'bet_legs.result'),
  };
}

function mapParticipant(record: BetParticipantWithNameRow): BetParticipantWithName {
  return {
    id: record.id,
    betId: record.bet_id,
    personId: record.person_id,
    position: toInteger(record.position),
    stakeCents: toInteger(record.stake_cents),
    personName: record.person_name,
  };
}

export const betRepository = {
  create,
  createLegs,
  createParticipants,
  findById,
  findByStatus,
  findHistory,
  findLegsByBetId,
  findLegsByBetIds,
  findParticipantsByBetId,
  findParticipantsByBetIds,
  updateLegResult,
  advanceOpenBet,
  sumOpenStakeByPerson,
  sumOpenStakeForPerson,
};
