import { describe, expect, it } from 'vitest';
import { GeocodingError } from '../errors.js';
import type { FuelStation } from '../planner/types.js';
import type { StationCatalog, StationCounts } from '../stations/repository.js';
import { FuelRouteOptimizer } from './fuelOptimizer.js';
import type { Coordinates, GeocodedPoint, RouteResult, RoutingService } from './routing.js';

// A 1200 mile route drawn along the equator from 0 to 20 degrees east, so
// chainage is 60 miles per degree of longitude once scaled.
class FakeRouting implements RoutingService {
  readonly points = new Map<string, GeocodedPoint>([
    ['Start City, ST', { query: 'Start City, ST', label: 'Start', lat: 0, lng: 0 }],
    ['End City, ST', { query: 'End City, ST', label: 'End', lat: 0, lng: 20 }],
  ]);

  async geocode(address: string): Promise<GeocodedPoint> {
    const point = this.points.get(address);
    if (!point) throw new GeocodingError(address);
    return point;
  }

  async route(start: Coordinates, end: Coordinates): Promise<RouteResult> {
    return {
      distanceMiles: 1200,
      durationHours: 17.5,
      geometry: { type: 'LineString', coordinates: [[start.lng, start.lat], [end.lng, end.lat]] },
    };
  }
}

class FakeCatalog implements StationCatalog {
  constructor(private readonly stations: FuelStation[]) {}

  async listResolvedStations(): Promise<FuelStation[]> {
    return this.stations;
  }

  async countStations(): Promise<StationCounts> {
    return { total: this.stations.length, geocoded: this.stations.length, pending: 0 };
  }
}

function station(id: number, latitude: number, longitude: number, price: number): FuelStation {
  return {
    id,
    opis_truckstop_id: id,
    truckstop_name: `Stop ${id}`,
    address: `Exit ${id}`,
    city: 'Testville',
    state: 'TX',
    rack_id: 1,
    retail_price: price,
    latitude,
    longitude,
  };
}

function createOptimizer(stations: FuelStation[]): FuelRouteOptimizer {
  return new FuelRouteOptimizer({
    routing: new FakeRouting(),
    catalog: new FakeCatalog(stations),
    vehicle: { rangeMiles: 500, milesPerGallon: 10 },
    corridorMiles: 15,
    greedyBufferMiles: 50,
  });
}

describe('FuelRouteOptimizer', () => {
  it('plans the cheapest stops among corridor stations', async () => {
    const plan = await createOptimizer([
      station(1, 0.05, 100 / 60, 3.0),
      station(2, 0.05, 7.5, 2.8),
      station(3, -0.05, 15, 2.9),
      station(4, 2, 10, 1.0),
    ]).optimizeRoute('Start City, ST', 'End City, ST');

    expect(plan.optimization_method).toBe('dynamic_programming');
    expect(plan.stations_considered).toBe(3);
    expect(plan.fuel_stops.map((stop) => stop.name)).toEqual(['Stop 2', 'Stop 3']);
    expect(plan.fuel_stops.map((stop) => stop.miles_from_start)).toEqual([450, 900]);
    expect(plan.total_fuel_cost).toBe(285);
    expect(plan.total_gallons).toBe(120);
    expect(plan.route.distance_miles).toBe(1200);
    expect(plan.start_location).toEqual({ address: 'Start City, ST', latitude: 0, longitude: 0 });
    expect(plan.end_location).toEqual({ address: 'End City, ST', latitude: 0, longitude: 20 });
    expect(plan.warning).toBeUndefined();
  });

  it('returns an empty plan when no station is near the route', async () => {
    const plan = await createOptimizer([station(4, 2, 10, 1.0)]).optimizeRoute('Start City, ST', 'End City, ST');

    expect(plan.optimization_method).toBe('no_stations');
    expect(plan.fuel_stops).toEqual([]);
    expect(plan.stations_considered).toBe(0);
    expect(plan.total_gallons).toBe(120);
  });

  it('falls back with a warning when coverage is too sparse', async () => {
    const plan = await createOptimizer([station(1, 0.05, 10, 3.0)]).optimizeRoute('Start City, ST', 'End City, ST');

    expect(plan.optimization_method).toBe('greedy_fallback');
    expect(plan.fuel_stops.map((stop) => stop.miles_from_start)).toEqual([600]);
    expect(plan.total_fuel_cost).toBe(150);
    expect(plan.warning).toBe(
      'Station coverage is too sparse for a 500 mi range: the plan leaves a 600.0 mi stretch without fuel.'
    );
  });

  it('propagates geocoding failures', async () => {
    await expect(createOptimizer([]).optimizeRoute('Atlantis', 'End City, ST')).rejects.toBeInstanceOf(
      GeocodingError
    );
  });
});
