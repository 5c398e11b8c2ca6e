/** [longitude, latitude], GeoJSON order */
export type LngLat = [number, number];

export type LineString = {
  type: 'LineString';
  coordinates: LngLat[];
};

/** A catalog station whose location has been resolved. */
export type FuelStation = {
  id: number;
  opis_truckstop_id: number;
  truckstop_name: string;
  address: string;
  city: string;
  state: string;
  rack_id: number;
  retail_price: number;
  latitude: number;
  longitude: number;
};

export type OnRouteStation = FuelStation & {
  /** Chainage: miles from the route start to the station's projection. */
  distance_along_route_miles: number;
  /** Lateral offset from the route at that projection. */
  distance_to_route_miles: number;
};

export type VehicleProfile = {
  rangeMiles: number;
  milesPerGallon: number;
};

export type FuelStop = {
  station: OnRouteStation;
  gallons_purchased: number;
  cost: number;
};

export type OptimizationMethod = 'dynamic_programming' | 'greedy_fallback' | 'no_stations';
