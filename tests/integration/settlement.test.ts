import request from 'supertest';
import { app } from '../../src/index';
import db from '../../src/db/connection';
import { betRepository } from '../../src/db/repositories/betRepository';
import { settlementRepository } from '../../src/db/repositories/settlementRepository';
import { auditLogRepository } from '../../src/db/repositories/auditLogRepository';
import { settlementService } from '../../src/services/settlementService';
import { MISSING_ID, type PlacedBet, createPerson, placeBet, resetTables, settle } from './helpers';

describe('Settlement Integration Tests', () => {
  let alice: string;
  let bob: string;
  let bet: PlacedBet;

  beforeAll(async () => {
    await db.migrate.latest();
  });

  afterAll(async () => {
    await db.destroy();
  });

  beforeEach(async () => {
    await resetTables();
    alice = await createPerson('Alice');
    bob = await createPerson('Bob');
    bet = await placeBet([{ odds: 150 }, { odds: -200 }], [[alice, 6000], [bob, 4000]]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function legResults(betId: string): Promise<string[]> {
    const res = await request(app).get(`/api/bets/${betId}`);
    return res.body.legs.map((leg: { result: string }) => leg.result);
  }

  describe('POST /api/bets/:id/settle', () => {
    it('should keep the bet open while a leg is pending', async () => {
      const res = await settle(bet.id, [[bet.legIds[0], 'won']]);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        bet_id: bet.id,
        status: 'OPEN',
        settled_at: null,
        combined_decimal_odds: null,
        total_payout_cents: null,
        settlements: [],
      });
      expect(await legResults(bet.id)).toEqual(['WON', 'PENDING']);
    });

    it('should settle a winning parlay in proportion to stakes', async () => {
      await settle(bet.id, [[bet.legIds[0], 'won']]);
      const res = await settle(bet.id, [[bet.legIds[1], 'WON']]);

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('WON');
      expect(res.body.combined_decimal_odds).toBe(3.75);
      expect(res.body.total_payout_cents).toBe(37500);
      expect(res.body.settled_at).toEqual(expect.any(String));

      const nets = Object.fromEntries(
        res.body.settlements.map((s: { person_id: string; net_cents: number }) => [s.person_id, s.net_cents])
      );
      expect(nets).toEqual({ [alice]: 16500, [bob]: 11000 });
    });

    it('should settle LOST on the first losing leg', async () => {
      const res = await settle(bet.id, [[bet.legIds[0], 'lost']]);

      expect(res.body.status).toBe('LOST');
      expect(res.body.total_payout_cents).toBe(0);
      expect(res.body.settlements.map((s: { net_cents: number }) => s.net_cents).sort((a: number, b: number) => a - b))
        .toEqual([-6000, -4000]);
      expect(await legResults(bet.id)).toEqual(['LOST', 'PENDING']);
    });

    it('should settle VOID without writing settlements', async () => {
      const res = await settle(bet.id, [[bet.legIds[0], 'void'], [bet.legIds[1], 'void']]);

      expect(res.body.status).toBe('VOID');
      expect(res.body.settlements).toEqual([]);

      const rows = await request(app).get(`/api/bets/${bet.id}/settlements`);
      expect(rows.body.count).toBe(0);
    });

    it('should pay only the won legs when others are void', async () => {
      const res = await settle(bet.id, [[bet.legIds[0], 'won'], [bet.legIds[1], 'void']]);

      expect(res.body.status).toBe('WON');
      expect(res.body.combined_decimal_odds).toBe(2.5);
      expect(res.body.total_payout_cents).toBe(25000);
    });

    it('should ignore unknown result tokens', async () => {
      const res = await settle(bet.id, [[bet.legIds[0], 'push'], [bet.legIds[1], '']]);

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('OPEN');
      expect(await legResults(bet.id)).toEqual(['PENDING', 'PENDING']);
    });

    it('should refuse to settle a bet twice', async () => {
      await settle(bet.id, [[bet.legIds[0], 'lost']]);

      const res = await settle(bet.id, [[bet.legIds[1], 'won']]);

      expect(res.status).toBe(409);
      expect(res.body.code).toBe('BET_ALREADY_SETTLED');

      const rows = await request(app).get(`/api/bets/${bet.id}/settlements`);
      expect(rows.body.count).toBe(2);
    });

    it('should return 404 for an unknown bet', async () => {
      const res = await settle(MISSING_ID, []);

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('BET_NOT_FOUND');
    });

    it('should roll everything back when writing settlements fails', async () => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest.spyOn(settlementRepository, 'createMany').mockRejectedValueOnce(new Error('disk full'));

      const res = await settle(bet.id, [[bet.legIds[0], 'lost']]);

      expect(res.status).toBe(500);
      expect(res.body.code).toBe('PERSISTENCE_ERROR');

      const detail = await request(app).get(`/api/bets/${bet.id}`);
      expect(detail.body.status).toBe('OPEN');
      expect(detail.body.legs.map((leg: { result: string }) => leg.result)).toEqual(['PENDING', 'PENDING']);
      expect(detail.body.settlements).toEqual([]);
    });

    it('should reject a bet changed by another request', async () => {
      jest.spyOn(betRepository, 'advanceOpenBet').mockResolvedValueOnce(false);

      const res = await settle(bet.id, [[bet.legIds[0], 'lost']]);

      expect(res.status).toBe(409);
      expect(res.body.code).toBe('CONCURRENT_MODIFICATION');
      expect(await legResults(bet.id)).toEqual(['PENDING', 'PENDING']);
    });

    it('should record the settlement in the audit log', async () => {
      await settle(bet.id, [[bet.legIds[0], 'lost']]);

      const entries = await auditLogRepository.findByEntity('bet', bet.id);
      const settleEntry = entries.find((e) => e.action === 'SETTLE');

      expect(entries.map((e) => e.action).sort()).toEqual(['CREATE', 'SETTLE']);
      expect(settleEntry?.payload).toMatchObject({ status: 'LOST', totalPayoutCents: 0 });
    });
  });

  describe('settleBetInTransaction', () => {
    it('should stamp settlements with the given time', async () => {
      const result = await db.transaction((trx) =>
        settlementService.settleBetInTransaction(
          trx,
          { betId: bet.id, results: [{ legId: bet.legIds[0], result: 'LOST' }] },
          '2026-04-01T12:00:00.000Z'
        )
      );

      expect(result.settled_at).toBe('2026-04-01T12:00:00.000Z');
      expect(result.settlements.map((s) => s.ts)).toEqual([
        '2026-04-01T12:00:00.000Z',
        '2026-04-01T12:00:00.000Z',
      ]);
    });
  });

  describe('GET /api/bets/:id/settlements', () => {
    it('should list the rows written for a settled bet', async () => {
      await settle(bet.id, [[bet.legIds[0], 'won'], [bet.legIds[1], 'won']]);

      const res = await request(app).get(`/api/bets/${bet.id}/settlements`);

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(2);
      expect(res.body.settlements.reduce((sum: number, s: { net_cents: number }) => sum + s.net_cents, 0))
        .toBe(37500 - 10000);
    });

    it('should return 404 for an unknown bet', async () => {
      const res = await request(app).get(`/api/bets/${MISSING_ID}/settlements`);

      expect(res.status).toBe(404);
    });
  });
});
