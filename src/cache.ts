import crypto from 'node:crypto';
import type { Pool } from 'pg';
import { createLogger } from './logger.js';

const log = createLogger('cache');

export type CachedGeocode = {
  label: string;
  lat: number;
  lng: number;
};

export interface GeocodeCache {
  get(query: string): Promise<CachedGeocode | null>;
  set(query: string, value: CachedGeocode): Promise<void>;
}

function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

export function normalizeQueryText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

export function makeGeocodeCacheKey(query: string): string {
  return sha256Hex(`geocode:v1:${normalizeQueryText(query).toLowerCase()}`);
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Geocode results kept in Postgres. Any cache failure is logged once and
 * treated as a miss so lookups still go to the provider.
 */
export class PgGeocodeCache implements GeocodeCache {
  private lastCleanup = 0;
  private warned = false;

  constructor(
    private readonly pool: Pool,
    private readonly ttlDays: number
  ) {}

  private warnOnce(error: unknown): void {
    if (this.warned) return;
    this.warned = true;
    log.warn({ err: error }, 'Geocode cache disabled after error');
  }

  private async maybeCleanup(): Promise<void> {
    const now = Date.now();
    if (now - this.lastCleanup < CLEANUP_INTERVAL_MS) return;
    this.lastCleanup = now;
    await this.pool.query('DELETE FROM geocode_cache WHERE expires_at < NOW()');
  }

  async get(query: string): Promise<CachedGeocode | null> {
    if (this.ttlDays <= 0) return null;
    try {
      const result = await this.pool.query<CachedGeocode>(
        `
          SELECT label, lat, lng
          FROM geocode_cache
          WHERE cache_key = $1
            AND expires_at > NOW()
          LIMIT 1
        `,
        [makeGeocodeCacheKey(query)]
      );
      const row = result.rows[0];
      if (!row) return null;
      if (typeof row.label !== 'string') return null;
      if (!Number.isFinite(row.lat) || !Number.isFinite(row.lng)) return null;
      return row;
    } catch (error) {
      this.warnOnce(error);
      return null;
    }
  }

  async set(query: string, value: CachedGeocode): Promise<void> {
    if (!Number.isFinite(this.ttlDays) || this.ttlDays <= 0) return;
    try {
      await this.maybeCleanup();
      await this.pool.query(
        `
          INSERT INTO geocode_cache (cache_key, query_text, label, lat, lng, expires_at)
          VALUES ($1, $2, $3, $4, $5, NOW() + ($6 * INTERVAL '1 day'))
          ON CONFLICT (cache_key) DO UPDATE SET
            query_text = EXCLUDED.query_text,
            label = EXCLUDED.label,
            lat = EXCLUDED.lat,
            lng = EXCLUDED.lng,
            updated_at = NOW(),
            expires_at = EXCLUDED.expires_at
        `,
        [
          makeGeocodeCacheKey(query),
          normalizeQueryText(query),
          value.label,
          value.lat,
          value.lng,
          Math.floor(this.ttlDays),
        ]
      );
    } catch (error) {
      this.warnOnce(error);
    }
  }
}
