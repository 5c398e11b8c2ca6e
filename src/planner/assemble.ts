import type { FuelStop, LineString, OptimizationMethod, VehicleProfile } from './types.js';

export type PlanLocation = {
  address: string;
  latitude: number;
  longitude: number;
};

export type PlannedRoute = {
  distanceMiles: number;
  durationHours: number;
  geometry: LineString;
};

export type FuelStopResponse = {
  name: string;
  address: string;
  city: string;
  state: string;
  price_per_gallon: number;
  gallons_needed: number;
  cost: number;
  miles_from_start: number;
  latitude: number;
  longitude: number;
};

export type RoutePlanResponse = {
  route: {
    distance_miles: number;
    duration_hours: number;
    geometry: LineString;
  };
  fuel_stops: FuelStopResponse[];
  total_fuel_cost: number;
  total_gallons: number;
  start_location: PlanLocation;
  end_location: PlanLocation;
  optimization_method: OptimizationMethod;
  stations_considered: number;
  warning?: string;
};

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function toFuelStopResponse(stop: FuelStop): FuelStopResponse {
  const { station } = stop;
  return {
    name: station.truckstop_name,
    address: station.address,
    city: station.city,
    state: station.state,
    price_per_gallon: roundTo(station.retail_price, 3),
    gallons_needed: roundTo(stop.gallons_purchased, 2),
    cost: roundTo(stop.cost, 2),
    miles_from_start: roundTo(station.distance_along_route_miles, 2),
    latitude: station.latitude,
    longitude: station.longitude,
  };
}

/**
 * Shape a stop sequence into the API result.
 *
 * `total_gallons` is what the trip burns (distance / mpg), not what the stops
 * buy: every stop buys a full tank, so the two do not have to agree.
 */
export function assemblePlan(options: {
  route: PlannedRoute;
  start: PlanLocation;
  end: PlanLocation;
  vehicle: VehicleProfile;
  stops: readonly FuelStop[];
  method: OptimizationMethod;
  stationsConsidered: number;
  warning?: string;
}): RoutePlanResponse {
  const totalCost = options.stops.reduce((sum, stop) => sum + stop.cost, 0);
  const totalGallons = options.route.distanceMiles / options.vehicle.milesPerGallon;

  const response: RoutePlanResponse = {
    route: {
      distance_miles: options.route.distanceMiles,
      duration_hours: options.route.durationHours,
      geometry: options.route.geometry,
    },
    fuel_stops: options.stops.map(toFuelStopResponse),
    total_fuel_cost: roundTo(totalCost, 2),
    total_gallons: roundTo(totalGallons, 2),
    start_location: options.start,
    end_location: options.end,
    optimization_method: options.method,
    stations_considered: options.stationsConsidered,
  };

  if (options.warning) response.warning = options.warning;
  return response;
}

/** Plan for a route with no stations inside the corridor. */
export function assembleEmptyPlan(options: {
  route: PlannedRoute;
  start: PlanLocation;
  end: PlanLocation;
  vehicle: VehicleProfile;
}): RoutePlanResponse {
  return assemblePlan({
    ...options,
    stops: [],
    method: 'no_stations',
    stationsConsidered: 0,
  });
}
