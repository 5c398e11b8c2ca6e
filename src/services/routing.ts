import type { GeocodeCache } from '../cache.js';
import { GeocodingError, RoutingError, toErrorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { roundTo } from '../planner/assemble.js';
import type { LineString, LngLat } from '../planner/types.js';
import { ensureNumber, isRecord } from '../validation.js';
import type { RequestThrottle } from './throttle.js';

const METERS_PER_MILE = 1609.344;
const SECONDS_PER_HOUR = 3600;

export type GeocodedPoint = {
  query: string;
  label: string;
  lat: number;
  lng: number;
};

export type Coordinates = {
  lat: number;
  lng: number;
};

export type RouteResult = {
  distanceMiles: number;
  durationHours: number;
  geometry: LineString;
};

/** Address lookup and road routing; both fail with request-level errors. */
export interface RoutingService {
  geocode(address: string): Promise<GeocodedPoint>;
  route(start: Coordinates, end: Coordinates): Promise<RouteResult>;
}

export type OsrmRoutingServiceOptions = {
  osrmBaseUrl: string;
  nominatimBaseUrl: string;
  userAgent: string;
  timeoutMs: number;
  throttle?: RequestThrottle;
  cache?: GeocodeCache;
  logger?: Logger;
};

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export function parseNominatimResult(data: unknown): { label: string; lat: number; lng: number } | null {
  if (!Array.isArray(data) || data.length === 0) return null;
  const first: unknown = data[0];
  if (!isRecord(first)) return null;

  const lat = ensureNumber(first.lat);
  const lng = ensureNumber(first.lon);
  if (lat === null || lng === null) return null;

  const label = typeof first.display_name === 'string' ? first.display_name : '';
  return { label, lat, lng };
}

function parseLineString(value: unknown): LineString | null {
  if (!isRecord(value) || value.type !== 'LineString') return null;
  if (!Array.isArray(value.coordinates)) return null;

  const coordinates: LngLat[] = [];
  for (const point of value.coordinates) {
    if (!Array.isArray(point) || point.length < 2) continue;
    const [lng, lat] = point;
    if (typeof lng !== 'number' || typeof lat !== 'number') continue;
    if (!Number.isFinite(lng) || !Number.isFinite(lat)) continue;
    coordinates.push([lng, lat]);
  }
  if (coordinates.length < 2) return null;

  return { type: 'LineString', coordinates };
}

export function parseOsrmRoute(data: unknown): RouteResult | null {
  if (!isRecord(data) || data.code !== 'Ok') return null;
  if (!Array.isArray(data.routes) || data.routes.length === 0) return null;

  const route: unknown = data.routes[0];
  if (!isRecord(route)) return null;

  const distance = route.distance;
  const duration = route.duration;
  if (typeof distance !== 'number' || !Number.isFinite(distance)) return null;
  if (typeof duration !== 'number' || !Number.isFinite(duration)) return null;

  const geometry = parseLineString(route.geometry);
  if (!geometry) return null;

  return {
    distanceMiles: roundTo(distance / METERS_PER_MILE, 2),
    durationHours: roundTo(duration / SECONDS_PER_HOUR, 2),
    geometry,
  };
}

/**
 * Nominatim for geocoding, OSRM for driving routes. Geocoding goes through
 * the throttle (Nominatim allows one request per second) and the cache.
 */
export class OsrmRoutingService implements RoutingService {
  private readonly log: Logger;

  constructor(private readonly options: OsrmRoutingServiceOptions) {
    this.log = options.logger ?? createLogger('routing');
  }

  async geocode(address: string): Promise<GeocodedPoint> {
    const query = `${address}, USA`;

    const cached = await this.options.cache?.get(query);
    if (cached) {
      return { query: address, label: cached.label, lat: cached.lat, lng: cached.lng };
    }

    const url = new URL(`${trimTrailingSlash(this.options.nominatimBaseUrl)}/search`);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');
    url.searchParams.set('countrycodes', 'us');

    let data: unknown;
    try {
      const response = await this.fetchThrottled(url.toString());
      if (!response.ok) {
        throw new Error(`Nominatim responded ${response.status} ${response.statusText}`);
      }
      data = await response.json();
    } catch (error) {
      this.log.error({ err: error, address }, 'Geocoding request failed');
      throw new GeocodingError(address, `Could not geocode "${address}": ${toErrorMessage(error)}`);
    }

    const result = parseNominatimResult(data);
    if (!result) {
      this.log.warn({ address }, 'No geocoding match');
      throw new GeocodingError(address);
    }

    const label = result.label || address;
    await this.options.cache?.set(query, { label, lat: result.lat, lng: result.lng });

    this.log.info({ address, lat: result.lat, lng: result.lng }, 'Geocoded address');
    return { query: address, label, lat: result.lat, lng: result.lng };
  }

  async route(start: Coordinates, end: Coordinates): Promise<RouteResult> {
    const base = trimTrailingSlash(this.options.osrmBaseUrl);
    const url = new URL(`${base}/route/v1/driving/${start.lng},${start.lat};${end.lng},${end.lat}`);
    url.searchParams.set('overview', 'full');
    url.searchParams.set('geometries', 'geojson');
    url.searchParams.set('steps', 'false');
    url.searchParams.set('annotations', 'false');

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: { Accept: 'application/json', 'User-Agent': this.options.userAgent },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Routing request failed');
      if (isTimeoutError(error)) {
        throw new RoutingError(`Routing service timed out after ${this.options.timeoutMs} ms`);
      }
      throw new RoutingError(`Routing service unavailable: ${toErrorMessage(error)}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      this.log.error({ err: error, status: response.status }, 'Unreadable routing response');
      throw new RoutingError(`Routing service returned an unreadable response (${response.status})`);
    }

    if (!response.ok) {
      const message = isRecord(data) && typeof data.message === 'string' ? data.message : response.statusText;
      throw new RoutingError(`Could not calculate route: ${message}`);
    }

    const route = parseOsrmRoute(data);
    if (!route) {
      const message = isRecord(data) && typeof data.message === 'string' ? data.message : 'no route found';
      throw new RoutingError(`Could not calculate route: ${message}`);
    }

    this.log.info(
      { distanceMiles: route.distanceMiles, durationHours: route.durationHours },
      'Route calculated'
    );
    return route;
  }

  private async fetchThrottled(url: string): Promise<Response> {
    const request = () => fetch(url, {
      headers: { Accept: 'application/json', 'User-Agent': this.options.userAgent },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    return this.options.throttle ? this.options.throttle.run(request) : request();
  }
}
