import request from 'supertest';
import { app } from '../../src/index';
import db from '../../src/db/connection';
import { auditLogRepository } from '../../src/db/repositories/auditLogRepository';
import { personRepository } from '../../src/db/repositories/personRepository';
import { seed } from '../../seeds/001_people';
import { MISSING_ID, createPerson, resetTables } from './helpers';

describe('People and Transactions Integration Tests', () => {
  beforeAll(async () => {
    await db.migrate.latest();
  });

  afterAll(async () => {
    await db.destroy();
  });

  beforeEach(async () => {
    await resetTables();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('POST /api/people', () => {
    it('should create a person with a trimmed name', async () => {
      const res = await request(app).post('/api/people').send({ name: '  Alice  ' });

      expect(res.status).toBe(201);
      expect(res.body.name).toBe('Alice');
      expect(res.body.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should reject a blank name', async () => {
      const res = await request(app).post('/api/people').send({ name: '   ' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('should log the storage error behind a failed write', async () => {
      const failure = new Error('database is locked');
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      jest.spyOn(personRepository, 'create').mockRejectedValueOnce(failure);

      const res = await request(app).post('/api/people').send({ name: 'Alice' });

      expect(res.status).toBe(500);
      expect(res.body.code).toBe('PERSISTENCE_ERROR');
      expect(errorSpy).toHaveBeenCalledWith(
        expect.stringContaining('[ERROR] POST'),
        expect.objectContaining({ code: 'PERSISTENCE_ERROR', cause: failure })
      );
    });

    it('should record an audit entry', async () => {
      const id = await createPerson('Alice');

      const entries = await auditLogRepository.findByEntity('person', id);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ action: 'CREATE', payload: { name: 'Alice' } });
    });
  });

  describe('GET /api/people', () => {
    it('should list everyone with a count', async () => {
      await createPerson('Alice');
      await createPerson('Bob');

      const res = await request(app).get('/api/people');

      expect(res.status).toBe(200);
      expect(res.body.count).toBe(2);
      expect(res.body.people.map((p: { name: string }) => p.name).sort()).toEqual(['Alice', 'Bob']);
    });
  });

  describe('PATCH /api/people/:id', () => {
    it('should rename a person', async () => {
      const id = await createPerson('Alice');

      const res = await request(app).patch(`/api/people/${id}`).send({ name: 'Alicia' });

      expect(res.status).toBe(200);
      expect(res.body.name).toBe('Alicia');

      const fetched = await request(app).get(`/api/people/${id}`);
      expect(fetched.body.name).toBe('Alicia');

      const entries = await auditLogRepository.findByEntity('person', id);
      expect(entries.map((e) => e.payload)).toContainEqual({ from: 'Alice', to: 'Alicia' });
    });

    it('should return 404 for an unknown person', async () => {
      const res = await request(app).patch(`/api/people/${MISSING_ID}`).send({ name: 'Nobody' });

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('PERSON_NOT_FOUND');
    });
  });

  describe('POST /api/transactions', () => {
    it('should store deposits as positive amounts', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'deposit', amount_cents: 5000, note: 'buy-in' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        person_id: id,
        type: 'DEPOSIT',
        amount_cents: 5000,
        note: 'buy-in',
      });
    });

    it('should store withdrawals as negative amounts', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'WITHDRAW', amount_cents: 1500 });

      expect(res.status).toBe(201);
      expect(res.body.amount_cents).toBe(-1500);
      expect(res.body.note).toBeNull();
    });

    it('should keep the sign of an adjustment', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'ADJUSTMENT', amount_cents: -250 });

      expect(res.body.amount_cents).toBe(-250);
    });

    it('should reject a zero amount', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'DEPOSIT', amount_cents: 0 });

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('INVALID_TRANSACTION_AMOUNT');
    });

    it('should reject an amount above the cap', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'DEPOSIT', amount_cents: 4_000_000_000_000_000 });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('should reject an unknown type', async () => {
      const id = await createPerson('Alice');

      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: id, type: 'BONUS', amount_cents: 100 });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });

    it('should reject an unknown person', async () => {
      const res = await request(app)
        .post('/api/transactions')
        .send({ person_id: MISSING_ID, type: 'DEPOSIT', amount_cents: 100 });

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('PERSON_NOT_FOUND');

      const [{ total }] = await db('transactions').count({ total: '*' });
      expect(Number(total)).toBe(0);
    });
  });

  describe('GET /api/transactions', () => {
    it('should filter by person', async () => {
      const alice = await createPerson('Alice');
      const bob = await createPerson('Bob');
      await request(app).post('/api/transactions').send({ person_id: alice, type: 'DEPOSIT', amount_cents: 100 });
      await request(app).post('/api/transactions').send({ person_id: alice, type: 'WITHDRAW', amount_cents: 40 });
      await request(app).post('/api/transactions').send({ person_id: bob, type: 'DEPOSIT', amount_cents: 900 });

      const all = await request(app).get('/api/transactions');
      const mine = await request(app).get('/api/transactions').query({ person_id: alice });

      expect(all.body.count).toBe(3);
      expect(mine.body.count).toBe(2);
      expect(mine.body.transactions.map((t: { amount_cents: number }) => t.amount_cents).sort((a: number, b: number) => a - b))
        .toEqual([-40, 100]);
    });

    it('should return 404 when filtering by an unknown person', async () => {
      const res = await request(app).get('/api/transactions').query({ person_id: MISSING_ID });

      expect(res.status).toBe(404);
    });
  });

  describe('seed', () => {
    it('should add the configured people once', async () => {
      await seed(db);
      await seed(db);

      const names = (await db('persons').select('name')).map((row: { name: string }) => row.name);
      expect(names.sort()).toEqual(['Alice', 'Bob']);
    });
  });
});
