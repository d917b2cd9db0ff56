import type { z } from "zod";
import { DEFAULT_BRIGHTSKY_BASE_URL, DEFAULT_BRIGHTSKY_TIMEOUT_MS } from "./config.js";
import {
  alertsResponseSchema,
  currentWeatherResponseSchema,
  forecastResponseSchema,
  sourcesResponseSchema,
  type AlertsResponse,
  type CurrentWeatherResponse,
  type ForecastResponse,
  type SourcesResponse,
} from "./schemas.js";
import {
  addDays,
  clamp,
  fetchWithTimeout,
  getErrorMessage,
  getLocalDateString,
  isAbortError,
} from "./utils.js";

export const DEFAULT_TIMEZONE = "Europe/Berlin";
export const DEFAULT_FORECAST_DAYS = 3;
export const MAX_FORECAST_DAYS = 10;
export const DEFAULT_MAX_DISTANCE_M = 50000;

export class WeatherProviderError extends Error {
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "WeatherProviderError";
    this.status = options.status ?? null;
  }
}

/** The four Bright Sky lookups the tools need. */
export interface WeatherProvider {
  getCurrentWeather(lat: number, lon: number): Promise<CurrentWeatherResponse>;
  getWeatherForecast(lat: number, lon: number, days?: number): Promise<ForecastResponse>;
  getAlerts(lat?: number, lon?: number): Promise<AlertsResponse>;
  getSources(lat: number, lon: number, maxDist?: number): Promise<SourcesResponse>;
}

export interface BrightSkyClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  now?: () => Date;
}

type QueryParams = Record<string, string | number>;

export class BrightSkyClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: BrightSkyClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BRIGHTSKY_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BRIGHTSKY_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  private async request<T extends z.ZodTypeAny>(
    endpoint: string,
    params: QueryParams,
    schema: T
  ): Promise<z.output<T>> {
    const query = new URLSearchParams(
      Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
    );
    const url = `${this.baseUrl}${endpoint}?${query.toString()}`;

    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        { headers: { Accept: "application/json" } },
        this.timeoutMs
      );
    } catch (error) {
      const reason = isAbortError(error)
        ? `timed out after ${this.timeoutMs}ms`
        : getErrorMessage(error);
      throw new WeatherProviderError(`API request failed: ${reason}`, { cause: error });
    }

    if (response.status === 404) {
      throw new WeatherProviderError("No weather data found for the given location.", {
        status: 404,
      });
    }
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new WeatherProviderError(`API request failed: ${response.status} - ${body}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new WeatherProviderError(`API request failed: ${getErrorMessage(error)}`, {
        status: response.status,
        cause: error,
      });
    }
    return schema.parse(body);
  }

  async getCurrentWeather(lat: number, lon: number): Promise<CurrentWeatherResponse> {
    return this.request(
      "/current_weather",
      { lat, lon, tz: DEFAULT_TIMEZONE },
      currentWeatherResponseSchema
    );
  }

  /** Hourly forecast from today (Berlin time) through `days` more days, 1-10. */
  async getWeatherForecast(
    lat: number,
    lon: number,
    days: number = DEFAULT_FORECAST_DAYS
  ): Promise<ForecastResponse> {
    const span = Number.isFinite(days)
      ? clamp(Math.trunc(days), 1, MAX_FORECAST_DAYS)
      : DEFAULT_FORECAST_DAYS;
    const date = getLocalDateString(this.now(), DEFAULT_TIMEZONE);
    const lastDate = addDays(date, span);

    return this.request(
      "/weather",
      { lat, lon, date, last_date: lastDate, tz: DEFAULT_TIMEZONE },
      forecastResponseSchema
    );
  }

  async getAlerts(lat?: number, lon?: number): Promise<AlertsResponse> {
    const params: QueryParams = { tz: DEFAULT_TIMEZONE };
    if (lat !== undefined && lon !== undefined) {
      params.lat = lat;
      params.lon = lon;
    }
    return this.request("/alerts", params, alertsResponseSchema);
  }

  async getSources(
    lat: number,
    lon: number,
    maxDist: number = DEFAULT_MAX_DISTANCE_M
  ): Promise<SourcesResponse> {
    return this.request("/sources", { lat, lon, max_dist: maxDist }, sourcesResponseSchema);
  }
}
