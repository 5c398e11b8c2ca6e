import {
  buildRouteIndex,
  computeBounds,
  isWithinBounds,
  projectPointOntoRoute,
} from './geometry.js';
import type { FuelStation, LngLat, OnRouteStation } from './types.js';

export const DEFAULT_CORRIDOR_MILES = 15;

// Box padding beyond the corridor half width
const BOUNDS_SLACK_MILES = 1;

export function compareOnRouteStations(a: OnRouteStation, b: OnRouteStation): number {
  if (a.distance_along_route_miles !== b.distance_along_route_miles) {
    return a.distance_along_route_miles - b.distance_along_route_miles;
  }
  if (a.retail_price !== b.retail_price) return a.retail_price - b.retail_price;
  return a.id - b.id;
}

/**
 * Keep the stations whose cross-track distance to the route is within the
 * corridor, tagged with chainage and sorted by it (price, then id, on ties).
 */
export function filterStationsAlongRoute(options: {
  coordinates: readonly LngLat[];
  routeDistanceMiles?: number;
  stations: readonly FuelStation[];
  corridorMiles?: number;
}): OnRouteStation[] {
  const corridorMiles = options.corridorMiles ?? DEFAULT_CORRIDOR_MILES;
  if (!Number.isFinite(corridorMiles) || corridorMiles < 0) return [];
  if (options.coordinates.length < 2) return [];

  const routeIndex = buildRouteIndex(options.coordinates, options.routeDistanceMiles);
  const bounds = computeBounds(routeIndex, corridorMiles + BOUNDS_SLACK_MILES);

  const matches: OnRouteStation[] = [];
  for (const station of options.stations) {
    if (!Number.isFinite(station.latitude) || !Number.isFinite(station.longitude)) continue;
    if (!isWithinBounds(station.latitude, station.longitude, bounds)) continue;

    const projection = projectPointOntoRoute(station.latitude, station.longitude, routeIndex);
    if (!projection) continue;
    if (projection.distanceToRouteMiles > corridorMiles) continue;

    matches.push({
      ...station,
      distance_along_route_miles: projection.distanceAlongRouteMiles,
      distance_to_route_miles: projection.distanceToRouteMiles,
    });
  }

  matches.sort(compareOnRouteStations);
  return matches;
}
