import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  database: {
    url: string;
    client: 'sqlite3' | 'pg';
  };
  seed: {
    people: string[];
  };
  server: {
    port: number;
    env: 'development' | 'production' | 'test';
    logRequests: boolean;
  };
}

function parseDbUrl(url: string): { client: 'sqlite3' | 'pg'; connectionString: string } {
  if (url.startsWith('sqlite://')) {
    return { client: 'sqlite3', connectionString: url.replace('sqlite://', '') };
  }
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { client: 'pg', connectionString: url };
  }
  throw new Error(`Unsupported database URL format: ${url}`);
}

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getNodeEnv(): 'development' | 'production' | 'test' {
  const env = process.env.NODE_ENV ?? 'development';
  if (env !== 'development' && env !== 'production' && env !== 'test') {
    throw new Error(`Invalid NODE_ENV: ${env}. Must be development, production, or test.`);
  }
  return env;
}

function parsePort(raw: string): number {
  const port = parseInt(raw, 10);
  if (isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseNameList(raw: string): string[] {
  return raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function parseBoolean(name: string, raw: string): boolean {
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`Invalid ${name}: ${raw}. Must be true or false.`);
}

const nodeEnv = getNodeEnv();
const databaseUrl = getEnvVar('DATABASE_URL', 'sqlite://./dev.db');
const dbConfig = parseDbUrl(databaseUrl);

export const config: Config = {
  database: {
    url: dbConfig.connectionString,
    client: dbConfig.client,
  },
  seed: {
    people: parseNameList(getEnvVar('SEED_PEOPLE', 'Alice,Bob')),
  },
  server: {
    port: parsePort(getEnvVar('PORT', '3000')),
    env: nodeEnv,
    // off by default under test
    logRequests: parseBoolean('LOG_REQUESTS', getEnvVar('LOG_REQUESTS', nodeEnv === 'test' ? 'false' : 'true')),
  },
};

export default config;
