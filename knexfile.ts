import type { Knex } from 'knex';
import { config } from './src/config';

interface SqliteConnection {
  run(sql: string, callback: (err: Error | null) => void): void;
}

const baseConfig: Partial<Knex.Config> = {
  migrations: {
    directory: './migrations',
    extension: 'ts',
  },
  seeds: {
    directory: './seeds',
    extension: 'ts',
  },
};

// SQLite leaves foreign keys unchecked unless asked per connection
const sqlitePool = {
  afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
    conn.run('PRAGMA foreign_keys = ON', (err) => done(err, conn));
  },
};

function sqliteConfig(filename: string): Knex.Config {
  return {
    ...baseConfig,
    client: 'sqlite3',
    connection: { filename },
    useNullAsDefault: true,
    pool: sqlitePool,
  };
}

function pgConfig(url: string): Knex.Config {
  return {
    ...baseConfig,
    client: 'pg',
    connection: url,
    pool: {
      min: 2,
      max: 10,
    },
  };
}

const knexConfig: { [key: string]: Knex.Config } = {
  development: config.database.client === 'pg'
    ? pgConfig(config.database.url)
    : sqliteConfig(config.database.url),

  test: sqliteConfig(':memory:'),

  production: pgConfig(config.database.url),
};

export default knexConfig;
