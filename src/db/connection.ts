import knex from 'knex';
import type { Knex } from 'knex';
import knexConfig from '../../knexfile';
import { config } from '../config';

const environment = config.server.env;
const connectionConfig = knexConfig[environment];

if (!connectionConfig) {
  throw new Error(`No Knex configuration found for environment: ${environment}`);
}

const db = knex(connectionConfig);

/**
 * Anything repositories can run queries on: the shared pool or an open
 * transaction (a Knex.Transaction is itself a Knex instance).
 */
export type Queryable = Knex;

export default db;
