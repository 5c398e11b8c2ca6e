import type { LngLat } from './types.js';

// Mean earth radius; every distance in the planner is measured on this sphere
export const EARTH_RADIUS_MILES = 3959;
export const MILES_PER_DEGREE = (EARTH_RADIUS_MILES * Math.PI) / 180;

type RouteSegment = {
  aLatRad: number;
  aLngRad: number;
  bLatRad: number;
  bLngRad: number;
  bearingRad: number;
  lengthRad: number;
  cumStartMiles: number;
};

export type RouteIndex = {
  segments: RouteSegment[];
  polylineMiles: number;
  routeDistanceMiles: number;
  scaleToRouteDistance: number;
};

export type RouteProjection = {
  distanceToRouteMiles: number;
  distanceAlongRouteMiles: number;
};

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function centralAngle(lat1Rad: number, lng1Rad: number, lat2Rad: number, lng2Rad: number): number {
  const dPhi = lat2Rad - lat1Rad;
  const dLambda = lng2Rad - lng1Rad;

  const a = Math.sin(dPhi / 2) ** 2
    + Math.cos(lat1Rad) * Math.cos(lat2Rad) * Math.sin(dLambda / 2) ** 2;
  return 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

function initialBearing(lat1Rad: number, lng1Rad: number, lat2Rad: number, lng2Rad: number): number {
  const dLambda = lng2Rad - lng1Rad;
  const y = Math.sin(dLambda) * Math.cos(lat2Rad);
  const x = Math.cos(lat1Rad) * Math.sin(lat2Rad)
    - Math.sin(lat1Rad) * Math.cos(lat2Rad) * Math.cos(dLambda);
  return Math.atan2(y, x);
}

export function haversineDistanceMiles(lat1: number, lng1: number, lat2: number, lng2: number): number {
  return EARTH_RADIUS_MILES * centralAngle(
    degreesToRadians(lat1),
    degreesToRadians(lng1),
    degreesToRadians(lat2),
    degreesToRadians(lng2)
  );
}

/**
 * Index a polyline for repeated projections.
 *
 * When the routing provider's reported distance is passed, chainages are
 * scaled from the polyline's own great-circle length to that distance so stop
 * positions line up with the distance shown to the driver.
 */
export function buildRouteIndex(coordinates: readonly LngLat[], routeDistanceMiles?: number): RouteIndex {
  const segments: RouteSegment[] = [];
  let cumMiles = 0;

  for (let i = 0; i < coordinates.length - 1; i += 1) {
    const [aLngDeg, aLatDeg] = coordinates[i]!;
    const [bLngDeg, bLatDeg] = coordinates[i + 1]!;

    const aLatRad = degreesToRadians(aLatDeg);
    const aLngRad = degreesToRadians(aLngDeg);
    const bLatRad = degreesToRadians(bLatDeg);
    const bLngRad = degreesToRadians(bLngDeg);

    const lengthRad = centralAngle(aLatRad, aLngRad, bLatRad, bLngRad);
    if (!Number.isFinite(lengthRad)) continue;

    segments.push({
      aLatRad,
      aLngRad,
      bLatRad,
      bLngRad,
      bearingRad: initialBearing(aLatRad, aLngRad, bLatRad, bLngRad),
      lengthRad,
      cumStartMiles: cumMiles,
    });

    cumMiles += lengthRad * EARTH_RADIUS_MILES;
  }

  const hasReportedDistance = routeDistanceMiles !== undefined
    && Number.isFinite(routeDistanceMiles)
    && routeDistanceMiles >= 0;
  const routeDistance = hasReportedDistance ? routeDistanceMiles : cumMiles;
  const scaleToRouteDistance = hasReportedDistance && cumMiles > 0 ? routeDistance / cumMiles : 1;

  return {
    segments,
    polylineMiles: cumMiles,
    routeDistanceMiles: routeDistance,
    scaleToRouteDistance,
  };
}

/**
 * Nearest point on one great-circle segment, as angular (distance, along).
 * A foot before the start or past the end snaps to that vertex.
 */
function projectOntoSegment(latRad: number, lngRad: number, seg: RouteSegment): { distanceRad: number; alongRad: number } {
  const d13 = centralAngle(seg.aLatRad, seg.aLngRad, latRad, lngRad);
  if (seg.lengthRad === 0 || d13 === 0) {
    return { distanceRad: d13, alongRad: 0 };
  }

  const theta13 = initialBearing(seg.aLatRad, seg.aLngRad, latRad, lngRad);
  const delta = theta13 - seg.bearingRad;

  if (Math.cos(delta) < 0) {
    return { distanceRad: d13, alongRad: 0 };
  }

  const crossTrack = Math.asin(clamp(Math.sin(d13) * Math.sin(delta), -1, 1));
  const alongTrack = Math.acos(clamp(Math.cos(d13) / Math.cos(crossTrack), -1, 1));

  if (alongTrack > seg.lengthRad) {
    return {
      distanceRad: centralAngle(seg.bLatRad, seg.bLngRad, latRad, lngRad),
      alongRad: seg.lengthRad,
    };
  }

  return { distanceRad: Math.abs(crossTrack), alongRad: alongTrack };
}

export function projectPointOntoRoute(
  pointLatDeg: number,
  pointLngDeg: number,
  routeIndex: RouteIndex
): RouteProjection | null {
  if (!Number.isFinite(pointLatDeg) || !Number.isFinite(pointLngDeg)) return null;

  const latRad = degreesToRadians(pointLatDeg);
  const lngRad = degreesToRadians(pointLngDeg);

  let bestDistance = Infinity;
  let bestAlong = Infinity;

  for (const seg of routeIndex.segments) {
    const { distanceRad, alongRad } = projectOntoSegment(latRad, lngRad, seg);
    const distance = distanceRad * EARTH_RADIUS_MILES;
    const along = seg.cumStartMiles + alongRad * EARTH_RADIUS_MILES;

    if (distance < bestDistance || (distance === bestDistance && along < bestAlong)) {
      bestDistance = distance;
      bestAlong = along;
    }
  }

  if (!Number.isFinite(bestDistance)) return null;

  const scaled = bestAlong * routeIndex.scaleToRouteDistance;
  return {
    distanceToRouteMiles: bestDistance,
    distanceAlongRouteMiles: clamp(scaled, 0, routeIndex.routeDistanceMiles),
  };
}

export type Bounds = { minLat: number; maxLat: number; minLng: number; maxLng: number };

const TWO_PI = 2 * Math.PI;

/**
 * Latitude span of a great-circle segment in radians. An arc bows toward the
 * pole between its ends, so the span can reach past both end latitudes.
 */
function segmentLatitudeRange(seg: RouteSegment): { minLatRad: number; maxLatRad: number } {
  let minLatRad = Math.min(seg.aLatRad, seg.bLatRad);
  let maxLatRad = Math.max(seg.aLatRad, seg.bLatRad);
  if (seg.lengthRad === 0) return { minLatRad, maxLatRad };

  // sin(lat) at angular distance s from A is amplitude * cos(s - peak)
  const sinA = Math.sin(seg.aLatRad);
  const cosA = Math.cos(seg.aLatRad);
  const cosBearing = Math.cos(seg.bearingRad);
  const amplitude = Math.min(1, Math.hypot(sinA, cosA * cosBearing));
  const peak = Math.atan2(cosA * cosBearing, sinA);

  const northVertex = ((peak % TWO_PI) + TWO_PI) % TWO_PI;
  const southVertex = (northVertex + Math.PI) % TWO_PI;
  const vertexLatRad = Math.asin(amplitude);

  if (northVertex <= seg.lengthRad) maxLatRad = Math.max(maxLatRad, vertexLatRad);
  if (southVertex <= seg.lengthRad) minLatRad = Math.min(minLatRad, -vertexLatRad);
  return { minLatRad, maxLatRad };
}

/**
 * Lat/lng box around the indexed route such that every point within
 * `paddingMiles` of it lies inside. Longitude is taken from the vertices;
 * latitude from each segment's arc.
 */
export function computeBounds(routeIndex: RouteIndex, paddingMiles: number): Bounds {
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;

  for (const seg of routeIndex.segments) {
    const { minLatRad, maxLatRad } = segmentLatitudeRange(seg);
    minLat = Math.min(minLat, minLatRad * 180 / Math.PI);
    maxLat = Math.max(maxLat, maxLatRad * 180 / Math.PI);
    minLng = Math.min(minLng, seg.aLngRad * 180 / Math.PI, seg.bLngRad * 180 / Math.PI);
    maxLng = Math.max(maxLng, seg.aLngRad * 180 / Math.PI, seg.bLngRad * 180 / Math.PI);
  }

  const padRad = paddingMiles / EARTH_RADIUS_MILES;
  const padLat = paddingMiles / MILES_PER_DEGREE;
  // Longitude degrees shrink toward the poles; pad for the most poleward latitude reached
  const poleward = Math.min(90, Math.max(Math.abs(minLat), Math.abs(maxLat)) + padLat);
  const cosLat = Math.cos(degreesToRadians(poleward));
  const sinHalfLng = cosLat > 0 ? Math.sin(padRad / 2) / cosLat : Infinity;
  const padLng = sinHalfLng >= 1 ? 180 : (2 * Math.asin(sinHalfLng) * 180) / Math.PI;

  return {
    minLat: Math.max(-90, minLat - padLat),
    maxLat: Math.min(90, maxLat + padLat),
    minLng: Math.max(-180, minLng - padLng),
    maxLng: Math.min(180, maxLng + padLng),
  };
}

export function isWithinBounds(lat: number, lng: number, bounds: Bounds): boolean {
  return lat >= bounds.minLat && lat <= bounds.maxLat && lng >= bounds.minLng && lng <= bounds.maxLng;
}
