import {
  DEFAULT_GEOCODING_TIMEOUT_MS,
  DEFAULT_NOMINATIM_URL,
  DEFAULT_NOMINATIM_USER_AGENT,
} from "./config.js";
import { getCityCoordinates, getDefaultCityTable, type CityTable } from "./german-cities.js";
import { nominatimResponseSchema } from "./schemas.js";
import type { Coordinates } from "./types.js";
import { fetchWithTimeout, getErrorMessage, isAbortError } from "./utils.js";

const COORDINATE_PATTERN = /^\s*(-?\d+\.?\d*)\s*,\s*(-?\d+\.?\d*)\s*$/;

// Bright Sky only covers Germany, so free-form lookups are restricted to it.
export const GEOCODING_COUNTRY_CODE = "de";

export class GeocodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GeocodingError";
  }
}

export interface Geocoder {
  search(query: string, countryCode: string): Promise<Coordinates[]>;
}

export interface NominatimGeocoderOptions {
  url?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export class NominatimGeocoder implements Geocoder {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: NominatimGeocoderOptions = {}) {
    this.url = options.url ?? DEFAULT_NOMINATIM_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GEOCODING_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_NOMINATIM_USER_AGENT;
  }

  async search(query: string, countryCode: string): Promise<Coordinates[]> {
    const params = new URLSearchParams({
      q: query,
      format: "json",
      limit: "1",
      countrycodes: countryCode,
    });

    let body: unknown;
    try {
      const response = await fetchWithTimeout(
        `${this.url}?${params.toString()}`,
        { headers: { "User-Agent": this.userAgent, Accept: "application/json" } },
        this.timeoutMs
      );
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      const reason = isAbortError(error)
        ? `timed out after ${this.timeoutMs}ms`
        : getErrorMessage(error);
      throw new GeocodingError(`Nominatim API request failed: ${reason}`, { cause: error });
    }

    const parsed = nominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocodingError("Nominatim API request failed: unexpected response format");
    }

    return parsed.data.flatMap((place) => {
      const latitude = Number(place.lat);
      const longitude = Number(place.lon);
      return Number.isFinite(latitude) && Number.isFinite(longitude)
        ? [{ latitude, longitude }]
        : [];
    });
  }
}

export interface ResolveLocationOptions {
  cities?: CityTable;
  geocoder?: Geocoder;
}

type Tier = (query: string) => Coordinates | null | Promise<Coordinates | null>;

function parseCoordinates(query: string): Coordinates | null {
  const match = COORDINATE_PATTERN.exec(query);
  if (!match) {
    return null;
  }
  const latitude = Number.parseFloat(match[1]);
  const longitude = Number.parseFloat(match[2]);
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    throw new GeocodingError(`Invalid coordinates: lat=${latitude}, lon=${longitude}`);
  }
  return { latitude, longitude };
}

async function lookupExternal(query: string, geocoder: Geocoder): Promise<Coordinates> {
  const [first] = await geocoder.search(query, GEOCODING_COUNTRY_CODE);
  if (!first) {
    throw new GeocodingError(
      `Location '${query}' not found. Try using coordinates (lat,lon) or a known German city name.`
    );
  }
  return first;
}

let defaultGeocoder: Geocoder | null = null;

function getDefaultGeocoder(): Geocoder {
  if (!defaultGeocoder) {
    defaultGeocoder = new NominatimGeocoder();
  }
  return defaultGeocoder;
}

export async function resolveLocation(
  location: string,
  options: ResolveLocationOptions = {}
): Promise<Coordinates> {
  const query = location.trim();
  if (!query) {
    throw new GeocodingError("Location cannot be empty");
  }

  const cities = options.cities ?? getDefaultCityTable();
  const tiers: Tier[] = [parseCoordinates, (name) => getCityCoordinates(name, cities)];
  for (const tier of tiers) {
    const coordinates = await tier(query);
    if (coordinates) {
      return coordinates;
    }
  }

  return lookupExternal(query, options.geocoder ?? getDefaultGeocoder());
}
