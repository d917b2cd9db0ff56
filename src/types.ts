export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface CoordinatesOutput {
  lat: number;
  lon: number;
}

export interface CurrentWeatherSummary {
  timestamp: string;
  temperature_c: number | null;
  feels_like_c: number | null;
  humidity_percent: number | null;
  wind_speed_kmh: number | null;
  wind_direction: string;
  wind_direction_degrees: number | null;
  wind_gust_kmh: number | null;
  precipitation_mm: number | null;
  pressure_hpa: number | null;
  visibility_m: number | null;
  cloud_cover_percent: number | null;
  dew_point_c: number | null;
  condition: string | null;
  icon: string | null;
  station_name: string | null;
  station_distance_m: number | null;
}

export interface HourlyForecastEntry {
  timestamp: string;
  temperature_c: number | null;
  precipitation_mm: number | null;
  precipitation_probability_percent: number | null;
  wind_speed_kmh: number | null;
  wind_direction: string;
  cloud_cover_percent: number | null;
  condition: string | null;
  icon: string | null;
}

export interface DailySummary {
  date: string;
  weekday: string;
  temp_min_c: number | null;
  temp_max_c: number | null;
  precipitation_total_mm: number;
  precipitation_probability_max_percent: number | null;
  condition: string | null;
}

export interface ForecastSummary {
  hourly: HourlyForecastEntry[];
  daily_summary: DailySummary[];
  station_name: string | null;
}

export interface AlertRegion {
  name: string | null;
  district: string | null;
  state: string | null;
}

export interface AlertSummary {
  id: number | null;
  headline: string | null;
  headline_en: string | null;
  severity: string | null;
  urgency: string | null;
  certainty: string | null;
  category: string | null;
  event: string | null;
  event_en: string | null;
  description: string | null;
  instruction: string | null;
  onset: string;
  expires: string;
  effective: string;
  regions: AlertRegion[];
}

export interface AlertsSummary {
  alert_count: number;
  alerts: AlertSummary[];
}

export interface StationSummary {
  station_name: string | null;
  station_id: string | null;
  distance_m: number | null;
  lat: number | null;
  lon: number | null;
  observation_types: string[];
}

export interface StationsSummary {
  station_count: number;
  stations: StationSummary[];
}

export interface ErrorEnvelope {
  error: string;
}
