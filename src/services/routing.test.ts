import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CachedGeocode, GeocodeCache } from '../cache.js';
import { GeocodingError, RoutingError } from '../errors.js';
import { OsrmRoutingService, parseNominatimResult, parseOsrmRoute } from './routing.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(call: number): URL {
  return new URL(String(fetchMock.mock.calls[call]?.[0]));
}

function createService(cache?: GeocodeCache): OsrmRoutingService {
  return new OsrmRoutingService({
    osrmBaseUrl: 'https://osrm.test',
    nominatimBaseUrl: 'https://nominatim.test/',
    userAgent: 'test-agent',
    timeoutMs: 1000,
    cache,
  });
}

class MemoryCache implements GeocodeCache {
  readonly entries = new Map<string, CachedGeocode>();

  async get(query: string): Promise<CachedGeocode | null> {
    return this.entries.get(query) ?? null;
  }

  async set(query: string, value: CachedGeocode): Promise<void> {
    this.entries.set(query, value);
  }
}

const osrmRoute = {
  code: 'Ok',
  routes: [
    {
      distance: 160934.4,
      duration: 7200,
      geometry: { type: 'LineString', coordinates: [[-87.6, 41.8], [-86, 41], [-85, 40]] },
    },
  ],
};

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OsrmRoutingService.geocode', () => {
  it('resolves an address through Nominatim', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([{ lat: '41.8781', lon: '-87.6298', display_name: 'Chicago, Illinois' }])
    );

    const point = await createService().geocode('Chicago, IL');

    expect(point).toEqual({ query: 'Chicago, IL', label: 'Chicago, Illinois', lat: 41.8781, lng: -87.6298 });
    const url = requestedUrl(0);
    expect(url.origin + url.pathname).toBe('https://nominatim.test/search');
    expect(url.searchParams.get('q')).toBe('Chicago, IL, USA');
    expect(url.searchParams.get('countrycodes')).toBe('us');
    expect(url.searchParams.get('limit')).toBe('1');
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ headers: { 'User-Agent': 'test-agent' } });
  });

  it('fails when nothing matches', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    const result = createService().geocode('Nowhere');
    await expect(result).rejects.toBeInstanceOf(GeocodingError);
    await expect(result).rejects.toThrow('Could not geocode: "Nowhere"');
  });

  it('fails when the provider errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));

    await expect(createService().geocode('Tulsa, OK')).rejects.toThrow(
      'Could not geocode "Tulsa, OK": Nominatim responded 503 Service Unavailable'
    );
  });

  it('serves repeated lookups from the cache', async () => {
    const cache = new MemoryCache();
    fetchMock.mockResolvedValueOnce(jsonResponse([{ lat: '36.154', lon: '-95.993', display_name: '' }]));
    const service = createService(cache);

    const first = await service.geocode('Tulsa, OK');
    const second = await service.geocode('Tulsa, OK');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first.label).toBe('Tulsa, OK');
    expect(second).toEqual(first);
    expect(cache.entries.get('Tulsa, OK, USA')).toEqual({ label: 'Tulsa, OK', lat: 36.154, lng: -95.993 });
  });
});

describe('OsrmRoutingService.route', () => {
  it('converts the OSRM route to miles and hours', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(osrmRoute));

    const route = await createService().route({ lat: 41.8781, lng: -87.6298 }, { lat: 40.7128, lng: -74.006 });

    expect(route.distanceMiles).toBe(100);
    expect(route.durationHours).toBe(2);
    expect(route.geometry.coordinates).toEqual([[-87.6, 41.8], [-86, 41], [-85, 40]]);
    const url = requestedUrl(0);
    expect(url.pathname).toBe('/route/v1/driving/-87.6298,41.8781;-74.006,40.7128');
    expect(url.searchParams.get('overview')).toBe('full');
    expect(url.searchParams.get('geometries')).toBe('geojson');
  });

  it('reports the OSRM message for a failed route', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 'NoRoute', message: 'Impossible route' }, 400));

    const result = createService().route({ lat: 0, lng: 0 }, { lat: 1, lng: 1 });
    await expect(result).rejects.toBeInstanceOf(RoutingError);
    await expect(result).rejects.toThrow('Could not calculate route: Impossible route');
  });

  it('reports an unreachable service', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(createService().route({ lat: 0, lng: 0 }, { lat: 1, lng: 1 })).rejects.toThrow(
      'Routing service unavailable: fetch failed'
    );
  });

  it('reports a timeout', async () => {
    fetchMock.mockRejectedValueOnce(Object.assign(new Error('aborted'), { name: 'TimeoutError' }));

    await expect(createService().route({ lat: 0, lng: 0 }, { lat: 1, lng: 1 })).rejects.toThrow(
      'Routing service timed out after 1000 ms'
    );
  });
});

describe('parseNominatimResult', () => {
  it('rejects results without numeric coordinates', () => {
    expect(parseNominatimResult([{ lat: 'north', lon: '-90' }])).toBeNull();
    expect(parseNominatimResult({})).toBeNull();
  });
});

describe('parseOsrmRoute', () => {
  it('drops malformed points and requires two usable ones', () => {
    const parsed = parseOsrmRoute({
      code: 'Ok',
      routes: [{ distance: 1609.344, duration: 60, geometry: { type: 'LineString', coordinates: [[0, 0], ['x', 1]] } }],
    });
    expect(parsed).toBeNull();
  });

  it('rejects a non-Ok code', () => {
    expect(parseOsrmRoute({ ...osrmRoute, code: 'NoRoute' })).toBeNull();
  });
});
