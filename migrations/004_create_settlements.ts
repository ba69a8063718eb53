import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('settlements', (table) => {
    table.uuid('id').primary();
    table.uuid('bet_id').notNullable()
      .references('id').inTable('bets');
    table.uuid('person_id').notNullable()
      .references('id').inTable('persons');
    table.bigInteger('net_cents').notNullable();
    table.timestamp('ts').notNullable().defaultTo(knex.fn.now());

    table.unique(['bet_id', 'person_id']);
    table.index('person_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('settlements');
}
