import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('bets', (table) => {
    table.uuid('id').primary();
    table.bigInteger('total_stake_cents').notNullable();
    // OPEN | WON | LOST | VOID | CASHED_OUT
    table.string('status', 16).notNullable().defaultTo('OPEN');
    table.integer('version').notNullable().defaultTo(0);
    table.timestamp('placed_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('settled_at').nullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index('status');
    table.index('placed_at');
  });

  await knex.schema.createTable('bet_legs', (table) => {
    table.uuid('id').primary();
    table.uuid('bet_id').notNullable()
      .references('id').inTable('bets');
    table.integer('position').notNullable();
    table.string('matchup', 200).notNullable();
    table.string('bet_description', 200).notNullable();
    table.integer('american_odds').notNullable();
    // PENDING | WON | LOST | VOID
    table.string('result', 16).notNullable().defaultTo('PENDING');

    table.index('bet_id');
  });

  await knex.schema.createTable('bet_participants', (table) => {
    table.uuid('id').primary();
    table.uuid('bet_id').notNullable()
      .references('id').inTable('bets');
    table.uuid('person_id').notNullable()
      .references('id').inTable('persons');
    table.integer('position').notNullable();
    table.bigInteger('stake_cents').notNullable();

    table.unique(['bet_id', 'person_id']);
    table.index('person_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('bet_participants');
  await knex.schema.dropTableIfExists('bet_legs');
  await knex.schema.dropTableIfExists('bets');
}
