/**
 * Apply pending schema migrations and exit.
 *
 * Run with: npm run migrate
 */

import { pool } from '../db.js';
import { createLogger } from '../logger.js';
import { runMigrations } from '../migrations.js';

const log = createLogger('migrate');

runMigrations(pool, { logger: log })
  .then((applied) => {
    log.info({ applied }, applied === 0 ? 'Nothing to migrate' : `Applied ${applied} migration(s)`);
  })
  .catch((error: unknown) => {
    log.error({ err: error }, 'Migration failed; schema left at the last committed migration');
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
