import pg from 'pg';
import { config } from './config.js';
import { createLogger } from './logger.js';

const { Pool } = pg;
const log = createLogger('db');

// Build SSL config based on DB_SSL and DB_SSL_MODE
function buildSslConfig(): false | pg.PoolConfig['ssl'] {
  if (!config.db.ssl) return false;

  // 'verify' = require valid cert chain (production default)
  // 'no-verify' = allow self-signed/private CA (for internal/dev environments)
  return {
    rejectUnauthorized: config.db.sslMode !== 'no-verify',
  };
}

/**
 * Pool for the optional response cache. Null when no DB_PASSWORD is set; the
 * planner then runs without a cache.
 */
export function createPool(): pg.Pool | null {
  if (!config.db.password) return null;

  const pool = new Pool({
    host: config.db.host,
    port: config.db.port,
    database: config.db.database,
    user: config.db.user,
    password: config.db.password,
    ssl: buildSslConfig(),
    connectionTimeoutMillis: config.db.poolConnectionTimeoutMs,
    idleTimeoutMillis: config.db.poolIdleTimeoutMs,
    max: config.db.poolMax,
  });

  // Idle client errors would otherwise crash the process; the pool drops the bad client.
  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected error on idle database client');
  });

  return pool;
}

export async function verifyDbConnection(pool: pg.Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}
