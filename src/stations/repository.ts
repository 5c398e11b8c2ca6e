import type { Pool } from 'pg';
import type { FuelStation } from '../planner/types.js';

export type StationCounts = {
  total: number;
  geocoded: number;
  pending: number;
};

/** Read side used while planning; never written during a request. */
export interface StationCatalog {
  listResolvedStations(): Promise<FuelStation[]>;
  countStations(): Promise<StationCounts>;
}

export type NewStation = {
  opis_truckstop_id: number;
  truckstop_name: string;
  address: string;
  city: string;
  state: string;
  rack_id: number;
  retail_price: number;
};

export type StationLocation = {
  city: string;
  state: string;
};

export type ResolvedLocation = StationLocation & {
  latitude: number;
  longitude: number;
};

/** Write side used by the offline import. */
export interface StationStore extends StationCatalog {
  replaceAll(stations: readonly NewStation[]): Promise<number>;
  listPendingLocations(): Promise<StationLocation[]>;
  applyCoordinates(resolved: readonly ResolvedLocation[]): Promise<number>;
}

type ResolvedStationRow = {
  id: number;
  opis_truckstop_id: number;
  truckstop_name: string;
  address: string;
  city: string;
  state: string;
  rack_id: number;
  retail_price: number;
  latitude: number | null;
  longitude: number | null;
};

const INSERT_BATCH_SIZE = 200;
const INSERT_COLUMNS = 7;

function isResolved(row: ResolvedStationRow): row is ResolvedStationRow & { latitude: number; longitude: number } {
  return typeof row.latitude === 'number' && Number.isFinite(row.latitude)
    && typeof row.longitude === 'number' && Number.isFinite(row.longitude);
}

export class PgStationRepository implements StationStore {
  constructor(private readonly pool: Pool) {}

  async listResolvedStations(): Promise<FuelStation[]> {
    const result = await this.pool.query<ResolvedStationRow>(
      `
        SELECT id, opis_truckstop_id, truckstop_name, address, city, state,
               rack_id, retail_price, latitude, longitude
        FROM fuel_stations
        WHERE geocoded = TRUE
          AND latitude IS NOT NULL
          AND longitude IS NOT NULL
      `
    );
    return result.rows.filter(isResolved);
  }

  async countStations(): Promise<StationCounts> {
    const result = await this.pool.query<{ total: number; geocoded: number }>(
      `
        SELECT
          COUNT(*)::int AS total,
          COUNT(*) FILTER (WHERE geocoded)::int AS geocoded
        FROM fuel_stations
      `
    );
    const row = result.rows[0];
    const total = row?.total ?? 0;
    const geocoded = row?.geocoded ?? 0;
    return { total, geocoded, pending: total - geocoded };
  }

  async replaceAll(stations: readonly NewStation[]): Promise<number> {
    const client = await this.pool.connect();
    let inserted = 0;

    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM fuel_stations');

      for (let i = 0; i < stations.length; i += INSERT_BATCH_SIZE) {
        const batch = stations.slice(i, i + INSERT_BATCH_SIZE);
        const values: unknown[] = [];
        const placeholders: string[] = [];

        batch.forEach((station, idx) => {
          const offset = idx * INSERT_COLUMNS;
          const slots = Array.from({ length: INSERT_COLUMNS }, (_, col) => `$${offset + col + 1}`);
          placeholders.push(`(${slots.join(', ')})`);
          values.push(
            station.opis_truckstop_id,
            station.truckstop_name,
            station.address,
            station.city,
            station.state,
            station.rack_id,
            station.retail_price
          );
        });

        const result = await client.query(
          `
            INSERT INTO fuel_stations (
              opis_truckstop_id,
              truckstop_name,
              address,
              city,
              state,
              rack_id,
              retail_price
            )
            VALUES ${placeholders.join(', ')}
            ON CONFLICT (truckstop_name, address, city, state) DO NOTHING
          `,
          values
        );
        inserted += result.rowCount ?? 0;
      }

      await client.query('COMMIT');
      return inserted;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async listPendingLocations(): Promise<StationLocation[]> {
    const result = await this.pool.query<StationLocation>(
      `
        SELECT DISTINCT city, state
        FROM fuel_stations
        WHERE geocoded = FALSE
        ORDER BY state, city
      `
    );
    return result.rows;
  }

  async applyCoordinates(resolved: readonly ResolvedLocation[]): Promise<number> {
    if (resolved.length === 0) return 0;

    const client = await this.pool.connect();
    let updated = 0;

    try {
      await client.query('BEGIN');
      for (const location of resolved) {
        const result = await client.query(
          `
            UPDATE fuel_stations
            SET latitude = $1,
                longitude = $2,
                geocoded = TRUE,
                updated_at = NOW()
            WHERE city = $3
              AND state = $4
              AND geocoded = FALSE
          `,
          [location.latitude, location.longitude, location.city, location.state]
        );
        updated += result.rowCount ?? 0;
      }
      await client.query('COMMIT');
      return updated;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
