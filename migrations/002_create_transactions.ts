import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('transactions', (table) => {
    table.uuid('id').primary();
    table.uuid('person_id').notNullable()
      .references('id').inTable('persons');
    // DEPOSIT | WITHDRAW | ADJUSTMENT; plain string so legacy values stay readable
    table.string('type', 16).notNullable();
    table.bigInteger('amount_cents').notNullable();
    table.string('note', 500);
    table.timestamp('ts').notNullable().defaultTo(knex.fn.now());
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index('person_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('transactions');
}
