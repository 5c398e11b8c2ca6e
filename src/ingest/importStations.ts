import { createLogger, type Logger } from '../logger.js';
import type { StationStore } from '../stations/repository.js';
import { groupStations, parseFuelPriceCsv, readFuelPriceCsv } from './csv.js';

export type ImportSummary = {
  rows: number;
  skipped: number;
  uniqueStations: number;
  inserted: number;
};

/** Replace the catalog with the grouped contents of a fuel price CSV. */
export async function importStationsFromCsv(options: {
  csvPath: string;
  store: Pick<StationStore, 'replaceAll'>;
  logger?: Logger;
  readFile?: (csvPath: string) => Promise<string>;
}): Promise<ImportSummary> {
  const log = options.logger ?? createLogger('ingest');
  const read = options.readFile ?? readFuelPriceCsv;

  log.info({ csvPath: options.csvPath }, 'Loading fuel price CSV');
  const { rows, skipped } = parseFuelPriceCsv(await read(options.csvPath));
  if (skipped > 0) {
    log.warn({ skipped }, 'Skipped malformed CSV rows');
  }

  const stations = groupStations(rows);
  log.info({ rows: rows.length, uniqueStations: stations.length }, 'Grouped duplicate locations');

  const inserted = await options.store.replaceAll(stations);
  log.info({ inserted }, 'Saved stations');

  return { rows: rows.length, skipped, uniqueStations: stations.length, inserted };
}
