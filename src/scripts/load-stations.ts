/**
 * Import the fuel price CSV into Postgres and geocode station locations.
 *
 * Run with: npm run load:stations -- [--csv <path>] [--skip-geocoding] [--geocode-only]
 */

import { parseArgs } from 'node:util';
import { config } from '../config.js';
import { pool } from '../db.js';
import { NominatimGeocoder } from '../ingest/geocoder.js';
import { createIngestRetryPolicy, geocodePendingLocations } from '../ingest/geocodeStations.js';
import { importStationsFromCsv } from '../ingest/importStations.js';
import { createLogger } from '../logger.js';
import { runMigrations } from '../migrations.js';
import { RequestThrottle } from '../services/throttle.js';
import { PgStationRepository } from '../stations/repository.js';

const log = createLogger('ingest');
const MAX_LISTED_FAILURES = 10;

async function main() {
  const { values } = parseArgs({
    options: {
      csv: { type: 'string' },
      'skip-geocoding': { type: 'boolean', default: false },
      'geocode-only': { type: 'boolean', default: false },
    },
  });

  await runMigrations(pool, { logger: log });
  const store = new PgStationRepository(pool);

  if (values['geocode-only']) {
    const { total } = await store.countStations();
    if (total === 0) {
      log.error('No stations in database; run without --geocode-only first');
      process.exitCode = 1;
      return;
    }
    log.info('Skipping CSV import (--geocode-only)');
  } else {
    await importStationsFromCsv({ csvPath: values.csv ?? config.ingest.csvPath, store, logger: log });
  }

  if (values['skip-geocoding']) {
    log.info('Skipping geocoding (--skip-geocoding)');
  } else {
    const summary = await geocodePendingLocations({
      store,
      geocoder: new NominatimGeocoder({
        baseUrl: config.routing.nominatimBaseUrl,
        userAgent: config.routing.userAgent,
        timeoutMs: config.ingest.geocodeTimeoutMs,
      }),
      throttle: new RequestThrottle(config.routing.geocoderMinIntervalMs),
      retryPolicy: createIngestRetryPolicy({
        onRetry: ({ attempt, maxAttempts, delayMs }) => {
          log.warn({ attempt, maxAttempts, delayMs }, `Transient geocoder failure, retrying in ${delayMs / 1000}s`);
        },
      }),
      logger: log,
    });

    for (const failure of summary.failures.slice(0, MAX_LISTED_FAILURES)) {
      log.warn({ reason: failure.reason }, `Not geocoded: ${failure.location.city}, ${failure.location.state}`);
    }
    if (summary.failures.length > MAX_LISTED_FAILURES) {
      log.warn(`... and ${summary.failures.length - MAX_LISTED_FAILURES} more`);
    }
    if (summary.failures.length > 0) {
      log.info('Run again with --geocode-only to retry failed locations');
    }
  }

  const counts = await store.countStations();
  log.info(counts, `Total stations: ${counts.total}, geocoded: ${counts.geocoded}, pending: ${counts.pending}`);
}

main()
  .catch((error: unknown) => {
    log.error({ err: error }, 'Station import failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
