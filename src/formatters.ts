import type {
  Alert,
  AlertsResponse,
  CurrentWeatherResponse,
  ForecastResponse,
  HourlyRecord,
  Source,
  SourcesResponse,
} from "./schemas.js";
import type {
  AlertSummary,
  AlertsSummary,
  CurrentWeatherSummary,
  DailySummary,
  ForecastSummary,
  HourlyForecastEntry,
  StationSummary,
  StationsSummary,
} from "./types.js";
import { formatTimestamp, roundTo, weekdayName, windDirectionToText } from "./utils.js";

function firstSource(sources: Source[] | null | undefined): Source {
  return sources?.[0] ?? {};
}

export function formatCurrentWeather(data: CurrentWeatherResponse): CurrentWeatherSummary {
  const weather = data.weather ?? {};
  const station = firstSource(data.sources);

  return {
    timestamp: formatTimestamp(weather.timestamp),
    temperature_c: weather.temperature ?? null,
    feels_like_c: weather.apparent_temperature ?? null,
    humidity_percent: weather.relative_humidity ?? null,
    wind_speed_kmh: weather.wind_speed_10 ?? null,
    wind_direction: windDirectionToText(weather.wind_direction_10),
    wind_direction_degrees: weather.wind_direction_10 ?? null,
    wind_gust_kmh: weather.wind_gust_speed_10 ?? null,
    precipitation_mm: weather.precipitation_10 ?? null,
    pressure_hpa: weather.pressure_msl ?? null,
    visibility_m: weather.visibility ?? null,
    cloud_cover_percent: weather.cloud_cover ?? null,
    dew_point_c: weather.dew_point ?? null,
    condition: weather.condition ?? null,
    icon: weather.icon ?? null,
    station_name: station.station_name ?? null,
    station_distance_m: station.distance ?? null,
  };
}

function formatHourly(entry: HourlyRecord): HourlyForecastEntry {
  return {
    timestamp: formatTimestamp(entry.timestamp),
    temperature_c: entry.temperature ?? null,
    precipitation_mm: entry.precipitation ?? null,
    precipitation_probability_percent: entry.precipitation_probability ?? null,
    wind_speed_kmh: entry.wind_speed ?? null,
    wind_direction: windDirectionToText(entry.wind_direction),
    cloud_cover_percent: entry.cloud_cover ?? null,
    condition: entry.condition ?? null,
    icon: entry.icon ?? null,
  };
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

/** Most frequent value; on equal counts the one seen first wins. */
export function dominantValue(values: readonly string[]): string | null {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function summarizeDay(date: string, entries: HourlyRecord[]): DailySummary {
  const temps = entries.map((entry) => entry.temperature).filter(isPresent);
  const precipitation = entries.reduce((sum, entry) => sum + (entry.precipitation ?? 0), 0);
  const probabilities = entries
    .map((entry) => entry.precipitation_probability)
    .filter(isPresent);
  const conditions = entries.map((entry) => entry.condition).filter(isPresent);

  return {
    date,
    weekday: weekdayName(date) ?? date,
    temp_min_c: temps.length > 0 ? Math.min(...temps) : null,
    temp_max_c: temps.length > 0 ? Math.max(...temps) : null,
    precipitation_total_mm: roundTo(precipitation, 1),
    precipitation_probability_max_percent:
      probabilities.length > 0 ? Math.max(...probabilities) : null,
    condition: dominantValue(conditions),
  };
}

/** Groups hourly records by the date part of their raw timestamp. */
export function summarizeDays(entries: readonly HourlyRecord[]): DailySummary[] {
  const days = new Map<string, HourlyRecord[]>();
  for (const entry of entries) {
    if (!entry.timestamp) {
      continue;
    }
    const date = entry.timestamp.slice(0, 10);
    const bucket = days.get(date);
    if (bucket) {
      bucket.push(entry);
    } else {
      days.set(date, [entry]);
    }
  }

  return [...days.keys()]
    .sort()
    .map((date) => summarizeDay(date, days.get(date) ?? []));
}

export function formatForecast(data: ForecastResponse): ForecastSummary {
  const entries = data.weather ?? [];
  const station = firstSource(data.sources);

  return {
    hourly: entries.map(formatHourly),
    daily_summary: summarizeDays(entries),
    station_name: station.station_name ?? null,
  };
}

function preferGerman(
  german: string | null | undefined,
  ...fallbacks: Array<string | null | undefined>
): string | null {
  if (german) {
    return german;
  }
  return fallbacks.find((value) => Boolean(value)) ?? null;
}

function formatAlert(alert: Alert): AlertSummary {
  const headlineEn = alert.headline ?? alert.headline_en ?? null;
  const eventEn = alert.event ?? alert.event_en ?? null;

  return {
    id: alert.id ?? null,
    headline: preferGerman(alert.headline_de, alert.headline, alert.headline_en),
    headline_en: headlineEn,
    severity: alert.severity ?? null,
    urgency: alert.urgency ?? null,
    certainty: alert.certainty ?? null,
    category: alert.category ?? null,
    event: preferGerman(alert.event_de, alert.event, alert.event_en),
    event_en: eventEn,
    description: preferGerman(alert.description_de, alert.description, alert.description_en),
    instruction: preferGerman(alert.instruction_de, alert.instruction, alert.instruction_en),
    onset: formatTimestamp(alert.onset),
    expires: formatTimestamp(alert.expires),
    effective: formatTimestamp(alert.effective),
    regions: (alert.locations ?? []).map((location) => ({
      name: location.name ?? null,
      district: location.district ?? null,
      state: location.state ?? null,
    })),
  };
}

export function formatAlerts(data: AlertsResponse): AlertsSummary {
  const alerts = (data.alerts ?? []).map(formatAlert);
  return {
    alert_count: alerts.length,
    alerts,
  };
}

function observationTypes(value: Source["observation_type"]): string[] {
  if (!value) {
    return [];
  }
  return typeof value === "string" ? [value] : [...value];
}

function formatStation(source: Source): StationSummary {
  return {
    station_name: source.station_name ?? null,
    station_id: source.dwd_station_id ?? null,
    distance_m: source.distance ?? null,
    lat: source.lat ?? null,
    lon: source.lon ?? null,
    observation_types: observationTypes(source.observation_type),
  };
}

export function formatSources(data: SourcesResponse): StationsSummary {
  const stations = (data.sources ?? []).map(formatStation);
  return {
    station_count: stations.length,
    stations,
  };
}
