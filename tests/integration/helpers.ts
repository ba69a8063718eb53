import request from 'supertest';
import { app } from '../../src/index';
import db from '../../src/db/connection';

export const MISSING_ID = '00000000-0000-4000-8000-000000000000';

// Children before parents; foreign keys are enforced
const TABLES = [
  'audit_logs',
  'settlements',
  'bet_legs',
  'bet_participants',
  'bets',
  'transactions',
  'persons',
];

export async function resetTables(): Promise<void> {
  for (const table of TABLES) {
    await db(table).del();
  }
}

export async function createPerson(name: string): Promise<string> {
  const res = await request(app).post('/api/people').send({ name });
  expect(res.status).toBe(201);
  return res.body.id;
}

export async function deposit(personId: string, amountCents: number): Promise<void> {
  const res = await request(app)
    .post('/api/transactions')
    .send({ person_id: personId, type: 'DEPOSIT', amount_cents: amountCents });
  expect(res.status).toBe(201);
}

export interface LegSpec {
  odds: number;
  matchup?: string;
}

export interface PlacedBet {
  id: string;
  legIds: string[];
}

export async function placeBet(
  legs: LegSpec[],
  stakes: Array<[string, number]>,
  placedAt?: string
): Promise<PlacedBet> {
  const res = await request(app)
    .post('/api/bets')
    .send({
      legs: legs.map((leg, i) => ({
        matchup: leg.matchup ?? `Home ${i} vs Away ${i}`,
        bet_description: `Home ${i} ML`,
        american_odds: leg.odds,
      })),
      participants: stakes.map(([personId, stakeCents]) => ({
        person_id: personId,
        stake_cents: stakeCents,
      })),
      placed_at: placedAt,
    });
  expect(res.status).toBe(201);
  return {
    id: res.body.id,
    legIds: res.body.legs.map((leg: { id: string }) => leg.id),
  };
}

export function settle(betId: string, results: Array<[string, string]>): request.Test {
  return request(app)
    .post(`/api/bets/${betId}/settle`)
    .send({ results: results.map(([legId, result]) => ({ leg_id: legId, result })) });
}
