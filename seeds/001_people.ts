import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../src/config';

export async function seed(knex: Knex): Promise<void> {
  // Only seed an empty ledger; people are never deleted
  const existing = await knex('persons').count({ total: '*' }).first();
  if (Number(existing?.total ?? 0) > 0) {
    console.log('Seed skipped: persons already present');
    return;
  }

  if (config.seed.people.length === 0) {
    return;
  }

  const now = new Date().toISOString();

  await knex('persons').insert(
    config.seed.people.map((name) => ({
      id: uuidv4(),
      name,
      created_at: now,
      updated_at: now,
    }))
  );

  console.log(`Seed completed: Inserted ${config.seed.people.length} people`);
}
