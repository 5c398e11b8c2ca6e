import { describe, it, expect } from 'vitest';
import {
  MILES_PER_DEGREE,
  buildRouteIndex,
  computeBounds,
  degreesToRadians,
  haversineDistanceMiles,
  isWithinBounds,
  projectPointOntoRoute,
} from './geometry.js';
import type { LngLat } from './types.js';

const equator: LngLat[] = [[0, 0], [10, 0]];

describe('haversineDistanceMiles', () => {
  it('measures one degree of longitude on the equator', () => {
    expect(haversineDistanceMiles(0, 0, 0, 1)).toBeCloseTo(MILES_PER_DEGREE, 9);
  });

  it('is zero for identical points', () => {
    expect(haversineDistanceMiles(39.1, -94.6, 39.1, -94.6)).toBe(0);
  });
});

describe('buildRouteIndex', () => {
  it('sums segment lengths along the polyline', () => {
    const index = buildRouteIndex(equator);
    expect(index.segments).toHaveLength(1);
    expect(index.polylineMiles).toBeCloseTo(10 * MILES_PER_DEGREE, 6);
    expect(index.scaleToRouteDistance).toBe(1);
  });

  it('scales to the reported route distance', () => {
    const index = buildRouteIndex(equator, 700);
    expect(index.routeDistanceMiles).toBe(700);
    expect(index.scaleToRouteDistance).toBeCloseTo(700 / (10 * MILES_PER_DEGREE), 12);
  });
});

describe('projectPointOntoRoute', () => {
  it('returns cross-track offset and chainage for a point beside the route', () => {
    const projection = projectPointOntoRoute(0.1, 5, buildRouteIndex(equator));
    expect(projection).not.toBeNull();
    expect(projection?.distanceToRouteMiles).toBeCloseTo(0.1 * MILES_PER_DEGREE, 6);
    expect(projection?.distanceAlongRouteMiles).toBeCloseTo(5 * MILES_PER_DEGREE, 6);
  });

  it('snaps to the first vertex for a point behind the start', () => {
    const projection = projectPointOntoRoute(0, -1, buildRouteIndex(equator));
    expect(projection?.distanceToRouteMiles).toBeCloseTo(MILES_PER_DEGREE, 6);
    expect(projection?.distanceAlongRouteMiles).toBe(0);
  });

  it('snaps to the last vertex for a point past the end', () => {
    const projection = projectPointOntoRoute(0, 11, buildRouteIndex(equator));
    expect(projection?.distanceToRouteMiles).toBeCloseTo(MILES_PER_DEGREE, 6);
    expect(projection?.distanceAlongRouteMiles).toBeCloseTo(10 * MILES_PER_DEGREE, 6);
  });

  it('scales chainage and clamps it to the route distance', () => {
    const index = buildRouteIndex(equator, 700);
    expect(projectPointOntoRoute(0.1, 5, index)?.distanceAlongRouteMiles).toBeCloseTo(350, 6);
    expect(projectPointOntoRoute(0, 11, index)?.distanceAlongRouteMiles).toBeCloseTo(700, 6);
  });

  it('picks the nearest segment on a bent route', () => {
    // East along the equator, then north along the 1st meridian
    const bent: LngLat[] = [[0, 0], [1, 0], [1, 1]];
    const projection = projectPointOntoRoute(0.5, 1.05, buildRouteIndex(bent));
    expect(projection?.distanceToRouteMiles).toBeCloseTo(0.05 * MILES_PER_DEGREE, 2);
    expect(projection?.distanceAlongRouteMiles).toBeCloseTo(1.5 * MILES_PER_DEGREE, 3);
  });

  it('treats a repeated vertex as a point', () => {
    const projection = projectPointOntoRoute(1, 0, buildRouteIndex([[0, 0], [0, 0]]));
    expect(projection?.distanceToRouteMiles).toBeCloseTo(MILES_PER_DEGREE, 6);
    expect(projection?.distanceAlongRouteMiles).toBe(0);
  });

  it('returns null without segments', () => {
    expect(projectPointOntoRoute(0, 0, buildRouteIndex([[0, 0]]))).toBeNull();
  });
});

describe('computeBounds', () => {
  it('pads the route box by the requested distance', () => {
    const bounds = computeBounds(buildRouteIndex(equator), MILES_PER_DEGREE);
    expect(bounds.minLat).toBeCloseTo(-1, 9);
    expect(bounds.maxLat).toBeCloseTo(1, 9);
    expect(isWithinBounds(0.99, 5, bounds)).toBe(true);
    expect(isWithinBounds(1.01, 5, bounds)).toBe(false);
    expect(isWithinBounds(0, -1.0001, bounds)).toBe(true);
    expect(isWithinBounds(0, -1.01, bounds)).toBe(false);
  });

  it('reaches the northern vertex of a long east-west arc', () => {
    // Both ends at 40N; the arc peaks midway at atan(tan 40 / cos 22.5)
    const bounds = computeBounds(buildRouteIndex([[-120, 40], [-75, 40]]), 0);
    const peakLat = (Math.atan(Math.tan(degreesToRadians(40)) / Math.cos(degreesToRadians(22.5))) * 180) / Math.PI;

    expect(peakLat).toBeCloseTo(42.2468, 3);
    expect(bounds.maxLat).toBeCloseTo(peakLat, 9);
    expect(bounds.minLat).toBeCloseTo(40, 9);
  });

  it('reaches the southern vertex of an arc south of the equator', () => {
    const bounds = computeBounds(buildRouteIndex([[140, -30], [170, -30]]), 0);
    const troughLat = -(Math.atan(Math.tan(degreesToRadians(30)) / Math.cos(degreesToRadians(15))) * 180) / Math.PI;

    expect(bounds.minLat).toBeCloseTo(troughLat, 9);
    expect(bounds.maxLat).toBeCloseTo(-30, 9);
  });

  it('keeps the end latitudes for an arc that only climbs', () => {
    const bounds = computeBounds(buildRouteIndex([[-97, 30], [-97, 45]]), 0);
    expect(bounds.minLat).toBeCloseTo(30, 9);
    expect(bounds.maxLat).toBeCloseTo(45, 9);
  });
});
