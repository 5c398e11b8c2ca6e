import { createLogger, type Logger } from '../logger.js';
import {
  assembleEmptyPlan,
  assemblePlan,
  type PlannedRoute,
  type RoutePlanResponse,
} from '../planner/assemble.js';
import { filterStationsAlongRoute } from '../planner/corridor.js';
import { planRefuelStops } from '../planner/refuel.js';
import type { VehicleProfile } from '../planner/types.js';
import type { StationCatalog } from '../stations/repository.js';
import type { RoutingService } from './routing.js';

export type FuelRouteOptimizerOptions = {
  routing: RoutingService;
  catalog: StationCatalog;
  vehicle: VehicleProfile;
  corridorMiles: number;
  greedyBufferMiles: number;
  logger?: Logger;
};

/**
 * Planning entry point: geocode both ends, fetch the route, narrow the
 * catalog to the corridor, and pick the cheapest full-tank stops.
 */
export class FuelRouteOptimizer {
  private readonly log: Logger;

  constructor(private readonly options: FuelRouteOptimizerOptions) {
    this.log = options.logger ?? createLogger('optimizer');
  }

  async optimizeRoute(startAddress: string, endAddress: string): Promise<RoutePlanResponse> {
    const { routing, catalog, vehicle } = this.options;
    this.log.info({ start: startAddress, end: endAddress }, 'Planning route');

    const startPoint = await routing.geocode(startAddress);
    const endPoint = await routing.geocode(endAddress);
    const routeResult = await routing.route(startPoint, endPoint);

    const route: PlannedRoute = {
      distanceMiles: routeResult.distanceMiles,
      durationHours: routeResult.durationHours,
      geometry: routeResult.geometry,
    };
    const start = { address: startAddress, latitude: startPoint.lat, longitude: startPoint.lng };
    const end = { address: endAddress, latitude: endPoint.lat, longitude: endPoint.lng };

    const stations = await catalog.listResolvedStations();
    const onRoute = filterStationsAlongRoute({
      coordinates: routeResult.geometry.coordinates,
      routeDistanceMiles: routeResult.distanceMiles,
      stations,
      corridorMiles: this.options.corridorMiles,
    });

    this.log.debug(
      { catalogStations: stations.length, onRouteStations: onRoute.length },
      'Filtered stations to route corridor'
    );

    if (onRoute.length === 0) {
      this.log.warn({ distanceMiles: route.distanceMiles }, 'No fuel stations found along route');
      return assembleEmptyPlan({ route, start, end, vehicle });
    }

    const plan = planRefuelStops({
      routeDistanceMiles: route.distanceMiles,
      stations: onRoute,
      vehicle,
      greedyBufferMiles: this.options.greedyBufferMiles,
    });

    if (plan.method === 'greedy_fallback') {
      this.log.warn(
        { maxGapMiles: plan.maxGapMiles, rangeMiles: vehicle.rangeMiles },
        'Route not coverable within range; used greedy fallback'
      );
    }

    const response = assemblePlan({
      route,
      start,
      end,
      vehicle,
      stops: plan.stops,
      method: plan.method,
      stationsConsidered: onRoute.length,
      warning: plan.warning,
    });

    this.log.info(
      {
        method: plan.method,
        stops: response.fuel_stops.length,
        totalCost: response.total_fuel_cost,
        candidates: onRoute.length,
      },
      'Route plan ready'
    );
    return response;
  }
}
