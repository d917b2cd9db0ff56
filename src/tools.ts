import {
  BrightSkyClient,
  DEFAULT_FORECAST_DAYS,
  WeatherProviderError,
  type WeatherProvider,
} from "./brightsky-client.js";
import type { ServerConfig } from "./config.js";
import {
  formatAlerts,
  formatCurrentWeather,
  formatForecast,
  formatSources,
} from "./formatters.js";
import { GeocodingError, NominatimGeocoder, resolveLocation } from "./geocoding.js";
import type { Coordinates, CoordinatesOutput, ErrorEnvelope } from "./types.js";

export const NATIONWIDE_ALERTS_QUERY = "Deutschland (alle Warnungen)";

export type LocationResolver = (location: string) => Promise<Coordinates>;

export interface WeatherToolDeps {
  provider: WeatherProvider;
  resolve: LocationResolver;
}

export interface WeatherTools {
  getCurrentWeather(location: string): Promise<string>;
  getWeatherForecast(location: string, days?: number): Promise<string>;
  getWeatherAlerts(location?: string | null): Promise<string>;
  findWeatherStation(location: string): Promise<string>;
}

function toJson(value: object): string {
  return JSON.stringify(value, null, 2);
}

function toCoordinatesOutput(coordinates: Coordinates): CoordinatesOutput {
  return { lat: coordinates.latitude, lon: coordinates.longitude };
}

function isToolError(error: unknown): error is GeocodingError | WeatherProviderError {
  return error instanceof GeocodingError || error instanceof WeatherProviderError;
}

/**
 * Runs one tool call and turns resolver/provider failures into the
 * `{"error": ...}` envelope. Anything else is a bug and is rethrown.
 */
async function runTool(name: string, handler: () => Promise<object>): Promise<string> {
  try {
    return toJson(await handler());
  } catch (error) {
    if (!isToolError(error)) {
      throw error;
    }
    console.error(`[${name}] ${error.name}: ${error.message}`);
    const envelope: ErrorEnvelope = { error: error.message };
    return JSON.stringify(envelope);
  }
}

export function createWeatherTools({ provider, resolve }: WeatherToolDeps): WeatherTools {
  return {
    getCurrentWeather: (location) =>
      runTool("get_current_weather", async () => {
        const coordinates = await resolve(location);
        const raw = await provider.getCurrentWeather(coordinates.latitude, coordinates.longitude);
        return {
          ...formatCurrentWeather(raw),
          location_query: location,
          coordinates: toCoordinatesOutput(coordinates),
        };
      }),

    getWeatherForecast: (location, days = DEFAULT_FORECAST_DAYS) =>
      runTool("get_weather_forecast", async () => {
        const coordinates = await resolve(location);
        const raw = await provider.getWeatherForecast(
          coordinates.latitude,
          coordinates.longitude,
          days
        );
        return {
          ...formatForecast(raw),
          location_query: location,
          coordinates: toCoordinatesOutput(coordinates),
          days_requested: days,
        };
      }),

    getWeatherAlerts: (location) =>
      runTool("get_weather_alerts", async () => {
        if (!location) {
          const raw = await provider.getAlerts();
          return { ...formatAlerts(raw), location_query: NATIONWIDE_ALERTS_QUERY };
        }
        const coordinates = await resolve(location);
        const raw = await provider.getAlerts(coordinates.latitude, coordinates.longitude);
        return {
          ...formatAlerts(raw),
          location_query: location,
          coordinates: toCoordinatesOutput(coordinates),
        };
      }),

    findWeatherStation: (location) =>
      runTool("find_weather_station", async () => {
        const coordinates = await resolve(location);
        const raw = await provider.getSources(coordinates.latitude, coordinates.longitude);
        return {
          ...formatSources(raw),
          location_query: location,
          coordinates: toCoordinatesOutput(coordinates),
        };
      }),
  };
}

export function createDefaultWeatherTools(config: ServerConfig): WeatherTools {
  const geocoder = new NominatimGeocoder({
    url: config.nominatimUrl,
    timeoutMs: config.geocodingTimeoutMs,
    userAgent: config.nominatimUserAgent,
  });
  return createWeatherTools({
    provider: new BrightSkyClient({
      baseUrl: config.brightSkyBaseUrl,
      timeoutMs: config.brightSkyTimeoutMs,
    }),
    resolve: (location) => resolveLocation(location, { geocoder }),
  });
}
