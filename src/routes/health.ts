import { Router } from 'express';
import { createLogger } from '../logger.js';
import type { StationCatalog } from '../stations/repository.js';

const log = createLogger('health');

export function createHealthRouter(catalog: StationCatalog): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const counts = await catalog.countStations();
      return res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        database: {
          total_stations: counts.total,
          geocoded_stations: counts.geocoded,
          pending_geocoding: counts.pending,
        },
      });
    } catch (error) {
      log.error({ err: error }, 'Health check failed');
      return res.status(503).json({ status: 'error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
