import rateLimit from 'express-rate-limit';

/**
 * In-memory store: counts reset on restart and are not shared across
 * instances. Needs 'trust proxy' for the real client IP behind a proxy.
 */

// Route planning: 20 requests per minute per IP (each one calls the geocoder and router)
export function createRouteLimiter(options: { max?: number } = {}) {
  return rateLimit({
    windowMs: 60 * 1000,
    max: options.max ?? 20,
    message: { error: 'Too many route requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
