import { parseNominatimResult } from '../services/routing.js';

export type LatLng = {
  lat: number;
  lng: number;
};

/** Timeouts and temporary unavailability; worth retrying. */
export class TransientGeocodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientGeocodeError';
  }
}

export interface LocationGeocoder {
  geocode(query: string): Promise<LatLng | null>;
}

const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);

export class NominatimGeocoder implements LocationGeocoder {
  constructor(
    private readonly options: {
      baseUrl: string;
      userAgent: string;
      timeoutMs: number;
    }
  ) {}

  async geocode(query: string): Promise<LatLng | null> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}/search`);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('limit', '1');

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: { Accept: 'application/json', 'User-Agent': this.options.userAgent },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      // fetch rejects on timeouts and connection failures alike
      throw new TransientGeocodeError(`Geocoder unreachable for "${query}"`, { cause: error });
    }

    if (TRANSIENT_STATUSES.has(response.status)) {
      throw new TransientGeocodeError(`Geocoder unavailable (${response.status}) for "${query}"`);
    }
    if (!response.ok) {
      throw new Error(`Geocoder error ${response.status} ${response.statusText} for "${query}"`);
    }

    const result = parseNominatimResult(await response.json());
    return result ? { lat: result.lat, lng: result.lng } : null;
  }
}
