import { createApp } from './app.js';
import { PgGeocodeCache } from './cache.js';
import { config } from './config.js';
import { pool, verifyDbConnection } from './db.js';
import { logger } from './logger.js';
import { runMigrations } from './migrations.js';
import { FuelRouteOptimizer } from './services/fuelOptimizer.js';
import { OsrmRoutingService } from './services/routing.js';
import { RequestThrottle } from './services/throttle.js';
import { PgStationRepository } from './stations/repository.js';

async function start(): Promise<void> {
  try {
    await verifyDbConnection();
    logger.info('Database connected');
    await runMigrations(pool);

    const catalog = new PgStationRepository(pool);
    const routing = new OsrmRoutingService({
      osrmBaseUrl: config.routing.osrmBaseUrl,
      nominatimBaseUrl: config.routing.nominatimBaseUrl,
      userAgent: config.routing.userAgent,
      timeoutMs: config.routing.timeoutMs,
      throttle: new RequestThrottle(config.routing.geocoderMinIntervalMs),
      cache: new PgGeocodeCache(pool, config.cache.geocodeTtlDays),
    });
    const optimizer = new FuelRouteOptimizer({
      routing,
      catalog,
      vehicle: config.vehicle,
      corridorMiles: config.planner.corridorMiles,
      greedyBufferMiles: config.planner.greedyBufferMiles,
    });

    const app = createApp({ optimizer, catalog, corsOrigin: config.corsOrigin });
    app.listen(config.port, () => {
      logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
