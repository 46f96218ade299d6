import { createPool } from '../db.js';
import { createLogger } from '../logger.js';
import { runMigrations } from '../migrations.js';

const log = createLogger('migrate');

async function main() {
  const pool = createPool();
  if (!pool) {
    log.error('DB_PASSWORD is not set; nothing to migrate');
    process.exitCode = 1;
    return;
  }

  try {
    await runMigrations(pool);
    log.info('Migration run finished');
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  log.error({ err: error }, 'Migration run failed');
  process.exitCode = 1;
});
