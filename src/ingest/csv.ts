import fs from 'node:fs/promises';
import type { NewStation } from '../stations/repository.js';
import { ensureNumber, ensureString } from '../validation.js';

const REQUIRED_COLUMNS = [
  'opis_truckstop_id',
  'truckstop_name',
  'address',
  'city',
  'state',
  'rack_id',
  'retail_price',
] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export type ParsedFuelPrices = {
  rows: NewStation[];
  skipped: number;
};

export function parseCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i]!;
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === ',') {
      out.push(current);
      current = '';
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      continue;
    }

    current += ch;
  }

  out.push(current);
  return out;
}

/** Split CSV text into records at line breaks outside quoted fields. */
export function splitCsvRecords(text: string): string[] {
  const records: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of text.replace(/\r\n?/g, '\n')) {
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === '\n' && !inQuotes) {
      records.push(current);
      current = '';
      continue;
    }
    current += ch;
  }

  records.push(current);
  return records;
}

// Multi-line quoted values (addresses) become one line
function collapseLineBreaks(value: string | undefined): string | undefined {
  return value?.replace(/\s*\n\s*/g, ' ');
}

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Parse the fuel price export. Quoted fields may span lines. Rows missing a
 * required value, or whose id, rack id or price is not numeric, are skipped
 * and counted.
 */
export function parseFuelPriceCsv(text: string): ParsedFuelPrices {
  const lines = splitCsvRecords(text.replace(/^\uFEFF/, ''))
    .filter((line) => line.trim().length > 0);

  const headerLine = lines[0];
  if (headerLine === undefined) {
    return { rows: [], skipped: 0 };
  }

  const headers = parseCsvLine(headerLine).map(normalizeHeader);
  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new Error(`Fuel price CSV is missing columns: ${missing.join(', ')}`);
  }

  const indexOf = (column: RequiredColumn): number => headers.indexOf(column);
  const rows: NewStation[] = [];
  let skipped = 0;

  for (const line of lines.slice(1)) {
    const cols = parseCsvLine(line);
    const value = (column: RequiredColumn): string | undefined => collapseLineBreaks(cols[indexOf(column)]);

    const id = ensureNumber(value('opis_truckstop_id'));
    const rackId = ensureNumber(value('rack_id'));
    const price = ensureNumber(value('retail_price'));
    const name = ensureString(value('truckstop_name'));
    const address = ensureString(value('address'));
    const city = ensureString(value('city'));
    const state = ensureString(value('state'));

    if (id === null || rackId === null || price === null || !name || !address || !city || !state) {
      skipped += 1;
      continue;
    }

    rows.push({
      opis_truckstop_id: Math.trunc(id),
      truckstop_name: name,
      address,
      city,
      state: state.toUpperCase(),
      rack_id: Math.trunc(rackId),
      retail_price: price,
    });
  }

  return { rows, skipped };
}

/**
 * One station per (name, address, city, state): the lowest price wins, the
 * first row's ids are kept.
 */
export function groupStations(rows: readonly NewStation[]): NewStation[] {
  const groups = new Map<string, NewStation>();

  for (const row of rows) {
    const key = [row.truckstop_name, row.address, row.city, row.state].join('\u0000');
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, { ...row });
    } else if (row.retail_price < existing.retail_price) {
      existing.retail_price = row.retail_price;
    }
  }

  return Array.from(groups.values());
}

export async function readFuelPriceCsv(csvPath: string): Promise<string> {
  const buffer = await fs.readFile(csvPath);
  const text = buffer.toString('utf8');
  // Legacy exports are often Latin-1
  return text.includes('\uFFFD') ? buffer.toString('latin1') : text;
}
