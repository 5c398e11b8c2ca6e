import { fullTankStop, greedyRefuelStops } from './greedy.js';
import type { FuelStop, OnRouteStation, VehicleProfile } from './types.js';

export type RefuelPlan = {
  stops: FuelStop[];
  method: 'dynamic_programming' | 'greedy_fallback';
  /** Largest stretch between consecutive fills, counting the route start and end. */
  maxGapMiles: number;
  warning?: string;
};

/**
 * Cheapest sequence of full-tank refuels, or null when some stretch of the
 * route is longer than the range with no station to break it.
 *
 * Nodes are START, the stations in chainage order, then END. Arriving at a
 * station costs a full tank at that station's price; arriving at END is free.
 * Because nodes are already in position order, one forward relaxation pass
 * settles every node before it is used as a predecessor.
 */
export function findOptimalStops(options: {
  routeDistanceMiles: number;
  stations: readonly OnRouteStation[];
  vehicle: VehicleProfile;
}): FuelStop[] | null {
  const { routeDistanceMiles, stations, vehicle } = options;
  const n = stations.length;
  const endIndex = n + 1;

  const positions: number[] = [0];
  for (const station of stations) positions.push(station.distance_along_route_miles);
  positions.push(routeDistanceMiles);

  const refillGallons = vehicle.rangeMiles / vehicle.milesPerGallon;
  const best = new Array<number>(n + 2).fill(Infinity);
  const parent = new Array<number>(n + 2).fill(-1);
  best[0] = 0;

  for (let i = 1; i <= endIndex; i += 1) {
    const arrivalCost = i === endIndex ? 0 : refillGallons * stations[i - 1]!.retail_price;
    const position = positions[i]!;

    for (let j = 0; j < i; j += 1) {
      const fromCost = best[j]!;
      if (fromCost === Infinity) continue;
      if (position - positions[j]! > vehicle.rangeMiles) continue;

      const candidate = fromCost + arrivalCost;
      if (candidate < best[i]!) {
        best[i] = candidate;
        parent[i] = j;
      }
    }
  }

  if (best[endIndex] === Infinity) return null;

  const path: number[] = [];
  for (let node = parent[endIndex]!; node > 0; node = parent[node]!) {
    path.push(node - 1);
  }
  path.reverse();

  return path.map((index) => fullTankStop(stations[index]!, vehicle));
}

export function computeMaxGapMiles(stops: readonly FuelStop[], routeDistanceMiles: number): number {
  let maxGap = 0;
  let previous = 0;
  for (const stop of stops) {
    const position = stop.station.distance_along_route_miles;
    maxGap = Math.max(maxGap, position - previous);
    previous = position;
  }
  return Math.max(maxGap, routeDistanceMiles - previous);
}

/**
 * Run the exact planner, dropping to the greedy heuristic when coverage is too
 * sparse for any range-respecting plan. A fallback plan whose largest gap
 * exceeds the range is returned with a warning rather than rejected.
 */
export function planRefuelStops(options: {
  routeDistanceMiles: number;
  stations: readonly OnRouteStation[];
  vehicle: VehicleProfile;
  greedyBufferMiles?: number;
}): RefuelPlan {
  const optimal = findOptimalStops(options);
  if (optimal) {
    return {
      stops: optimal,
      method: 'dynamic_programming',
      maxGapMiles: computeMaxGapMiles(optimal, options.routeDistanceMiles),
    };
  }

  const stops = greedyRefuelStops({
    stations: options.stations,
    vehicle: options.vehicle,
    bufferMiles: options.greedyBufferMiles,
  });
  const maxGapMiles = computeMaxGapMiles(stops, options.routeDistanceMiles);
  const plan: RefuelPlan = { stops, method: 'greedy_fallback', maxGapMiles };

  if (maxGapMiles > options.vehicle.rangeMiles) {
    plan.warning = `Station coverage is too sparse for a ${Math.round(options.vehicle.rangeMiles)} mi range: `
      + `the plan leaves a ${maxGapMiles.toFixed(1)} mi stretch without fuel.`;
  }

  return plan;
}
