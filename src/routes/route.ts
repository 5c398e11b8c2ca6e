import { Router } from 'express';
import { HttpError, ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { createRouteLimiter } from '../middleware/rateLimiter.js';
import type { RoutePlanResponse } from '../planner/assemble.js';
import { roundTo } from '../planner/assemble.js';
import { isRecord } from '../validation.js';

const MAX_LOCATION_LENGTH = 200;
const log = createLogger('route');

export type RouteRequest = {
  start: string;
  end: string;
};

export interface RouteOptimizer {
  optimizeRoute(start: string, end: string): Promise<RoutePlanResponse>;
}

function readLocation(body: Record<string, unknown>, field: keyof RouteRequest, label: string, errors: Record<string, string>): string | null {
  const raw = body[field];
  if (typeof raw !== 'string') {
    errors[field] = 'This field is required.';
    return null;
  }
  const value = raw.trim();
  if (!value) {
    errors[field] = `${label} location is required`;
    return null;
  }
  if (value.length > MAX_LOCATION_LENGTH) {
    errors[field] = `Ensure this field has no more than ${MAX_LOCATION_LENGTH} characters.`;
    return null;
  }
  return value;
}

export function parseRouteRequest(body: unknown): RouteRequest {
  const input = isRecord(body) ? body : {};
  const errors: Record<string, string> = {};

  const start = readLocation(input, 'start', 'Start', errors);
  const end = readLocation(input, 'end', 'End', errors);

  if (start === null || end === null) {
    throw new ValidationError(errors);
  }
  return { start, end };
}

export function createRouteRouter(optimizer: RouteOptimizer, options: { rateLimitMax?: number } = {}): Router {
  const router = Router();

  router.post('/', createRouteLimiter({ max: options.rateLimitMax }), async (req, res) => {
    const startedAt = Date.now();

    try {
      const { start, end } = parseRouteRequest(req.body);
      const plan = await optimizer.optimizeRoute(start, end);
      const elapsedSeconds = (Date.now() - startedAt) / 1000;

      log.info(
        { method: plan.optimization_method, elapsedSeconds },
        `Planned ${start} -> ${end} in ${elapsedSeconds.toFixed(2)}s`
      );
      return res.json({ ...plan, processing_time_seconds: roundTo(elapsedSeconds, 2) });
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(error.status).json({ error: error.message, details: error.details });
      }
      if (error instanceof HttpError) {
        log.warn({ err: error }, 'Route calculation failed');
        return res.status(error.status).json({ error: error.message });
      }
      log.error({ err: error }, 'Error computing route');
      return res.status(500).json({ error: 'Failed to compute route' });
    }
  });

  return router;
}
