import { toErrorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { RequestThrottle } from '../services/throttle.js';
import type { ResolvedLocation, StationLocation, StationStore } from '../stations/repository.js';
import { TransientGeocodeError, type LatLng, type LocationGeocoder } from './geocoder.js';
import { RetryPolicy, type RetryPolicyOptions } from './retry.js';

export const CANADIAN_PROVINCES: ReadonlySet<string> = new Set([
  'SK', 'AB', 'BC', 'MB', 'ON', 'QC', 'NB', 'NS', 'PE', 'NL', 'NT', 'YT', 'NU',
]);

export type GeocodeFailureReason = 'canada' | 'not_found' | 'retries_exhausted' | 'error';

export type GeocodeFailure = {
  location: StationLocation;
  reason: GeocodeFailureReason;
  message?: string;
};

export type GeocodeRunSummary = {
  locations: number;
  resolved: ResolvedLocation[];
  updatedStations: number;
  failures: GeocodeFailure[];
};

/** Ingestion schedule: three retries on transient failures, 1 s, 2 s, 4 s apart. */
export function createIngestRetryPolicy(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
  return new RetryPolicy({
    maxRetries: 3,
    baseDelayMs: 1000,
    factor: 2,
    isRetryable: (error) => error instanceof TransientGeocodeError,
    ...overrides,
  });
}

function locationKey(location: StationLocation): string {
  return `${location.city.trim().toLowerCase()}|${location.state.trim().toUpperCase()}`;
}

/**
 * Resolve every pending (city, state) pair, one request at a time, then
 * write the coordinates to all matching stations in one transaction.
 */
export async function geocodePendingLocations(options: {
  store: Pick<StationStore, 'listPendingLocations' | 'applyCoordinates'>;
  geocoder: LocationGeocoder;
  throttle: RequestThrottle;
  retryPolicy: RetryPolicy;
  logger?: Logger;
}): Promise<GeocodeRunSummary> {
  const log = options.logger ?? createLogger('ingest');
  const locations = await options.store.listPendingLocations();
  const resolved: ResolvedLocation[] = [];
  const failures: GeocodeFailure[] = [];
  const cache = new Map<string, LatLng | null>();

  log.info({ locations: locations.length }, 'Geocoding pending locations');

  for (const [index, location] of locations.entries()) {
    const position = index + 1;
    if (position % 10 === 0 || position === locations.length) {
      log.info({ done: position, total: locations.length }, `Progress: ${position}/${locations.length}`);
    }

    if (CANADIAN_PROVINCES.has(location.state.trim().toUpperCase())) {
      log.warn({ city: location.city, state: location.state }, 'Skipping Canadian location');
      failures.push({ location, reason: 'canada' });
      continue;
    }

    const key = locationKey(location);
    let coords = cache.get(key);

    if (coords === undefined) {
      const query = `${location.city}, ${location.state}, USA`;
      try {
        coords = await options.retryPolicy.execute(() => options.throttle.run(() => options.geocoder.geocode(query)));
      } catch (error) {
        const reason: GeocodeFailureReason = error instanceof TransientGeocodeError ? 'retries_exhausted' : 'error';
        log.error({ err: error, query, reason }, 'Geocoding failed');
        failures.push({ location, reason, message: toErrorMessage(error) });
        continue;
      }
      cache.set(key, coords);
    }

    if (!coords) {
      log.warn({ city: location.city, state: location.state }, 'Could not find location');
      failures.push({ location, reason: 'not_found' });
      continue;
    }

    resolved.push({ ...location, latitude: coords.lat, longitude: coords.lng });
  }

  const updatedStations = await options.store.applyCoordinates(resolved);
  log.info(
    { resolved: resolved.length, updatedStations, failed: failures.length },
    'Geocoding run complete'
  );

  return { locations: locations.length, resolved, updatedStations, failures };
}
