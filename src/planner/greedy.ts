import type { FuelStop, OnRouteStation, VehicleProfile } from './types.js';

export const DEFAULT_GREEDY_BUFFER_MILES = 50;

export function fullTankStop(station: OnRouteStation, vehicle: VehicleProfile): FuelStop {
  const gallons = vehicle.rangeMiles / vehicle.milesPerGallon;
  return {
    station,
    gallons_purchased: gallons,
    cost: gallons * station.retail_price,
  };
}

/**
 * Single pass in chainage order: refuel at the first station reached once
 * the distance since the last fill is within `bufferMiles` of the range.
 * Used only when no range-respecting sequence exists, so the result is not
 * checked against the range here.
 */
export function greedyRefuelStops(options: {
  stations: readonly OnRouteStation[];
  vehicle: VehicleProfile;
  bufferMiles?: number;
}): FuelStop[] {
  const bufferMiles = options.bufferMiles ?? DEFAULT_GREEDY_BUFFER_MILES;
  const threshold = options.vehicle.rangeMiles - bufferMiles;

  const stops: FuelStop[] = [];
  let lastFillMiles = 0;

  for (const station of options.stations) {
    const sinceLastFill = station.distance_along_route_miles - lastFillMiles;
    if (sinceLastFill < threshold) continue;

    stops.push(fullTankStop(station, options.vehicle));
    lastFillMiles = station.distance_along_route_miles;
  }

  return stops;
}
