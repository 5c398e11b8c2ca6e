import pg from 'pg';
import { config } from './config.js';
import { createLogger } from './logger.js';

const { Pool } = pg;
const log = createLogger('db');

// DB_SSL_MODE=no-verify accepts a private CA; anything else verifies the chain
function buildSslConfig(): false | pg.PoolConfig['ssl'] {
  if (!config.db.ssl) return false;
  return { rejectUnauthorized: config.db.sslMode !== 'no-verify' };
}

/** Shared pool for the API process and the CLI scripts. */
export const pool = new Pool({
  host: config.db.host,
  port: config.db.port,
  database: config.db.database,
  user: config.db.user,
  password: config.db.password,
  ssl: buildSslConfig(),
  application_name: 'fuel-route-planner',
  statement_timeout: config.db.statementTimeoutMs,
  connectionTimeoutMillis: config.db.poolConnectionTimeoutMs,
  idleTimeoutMillis: config.db.poolIdleTimeoutMs,
  max: config.db.poolMax,
});

pool.on('error', (err) => {
  log.error({ err }, 'Idle Postgres client failed; pool will replace it');
});

/** Fails fast at startup when Postgres is unreachable or credentials are wrong. */
export async function verifyDbConnection(): Promise<void> {
  const result = await pool.query<{ version: string }>('SELECT version() AS version');
  log.debug({ version: result.rows[0]?.version }, 'Postgres reachable');
}
