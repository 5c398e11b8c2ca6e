import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, '..', '.env') });

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid integer for ${name}: "${raw}"`);
  }
  return value;
}

function readFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid number for ${name}: "${raw}"`);
  }
  return value;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export const config = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL,
  port: readIntEnv('PORT', 3001),
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
  vehicle: {
    rangeMiles: readFloatEnv('VEHICLE_RANGE_MILES', 500),
    milesPerGallon: readFloatEnv('VEHICLE_MPG', 10),
  },
  planner: {
    corridorMiles: readFloatEnv('CORRIDOR_MILES', 15),
    greedyBufferMiles: readFloatEnv('GREEDY_BUFFER_MILES', 50),
  },
  routing: {
    osrmBaseUrl: process.env.OSRM_BASE_URL ?? 'https://router.project-osrm.org',
    nominatimBaseUrl: process.env.NOMINATIM_BASE_URL ?? 'https://nominatim.openstreetmap.org',
    userAgent: process.env.GEOCODER_USER_AGENT ?? 'fuel-route-planner/1.0',
    timeoutMs: readIntEnv('ROUTING_TIMEOUT_MS', 30_000),
    geocoderMinIntervalMs: readIntEnv('GEOCODER_MIN_INTERVAL_MS', 1000),
  },
  cache: {
    geocodeTtlDays: readIntEnv('GEOCODE_CACHE_TTL_DAYS', 30),
  },
  ingest: {
    csvPath: process.env.FUEL_PRICES_CSV_PATH ?? path.resolve(__dirname, '..', 'data', 'fuel_prices.csv'),
    geocodeTimeoutMs: readIntEnv('INGEST_GEOCODE_TIMEOUT_MS', 10_000),
  },
  db: {
    host: process.env.DB_HOST ?? 'localhost',
    port: readIntEnv('DB_PORT', 5432),
    database: process.env.DB_NAME ?? 'fuel_planner',
    user: process.env.DB_USER ?? 'fuel_planner',
    password: requireEnv('DB_PASSWORD'),
    ssl: process.env.DB_SSL === 'true',
    sslMode: process.env.DB_SSL_MODE ?? 'verify',
    poolMax: readIntEnv('DB_POOL_MAX', 10),
    poolIdleTimeoutMs: readIntEnv('DB_POOL_IDLE_TIMEOUT_MS', 30_000),
    poolConnectionTimeoutMs: readIntEnv('DB_POOL_CONNECTION_TIMEOUT_MS', 5000),
    // Bounds the full catalog read on each plan request
    statementTimeoutMs: readIntEnv('DB_STATEMENT_TIMEOUT_MS', 15_000),
  },
} as const;
