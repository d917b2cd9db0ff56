import { z } from "zod";

// Bright Sky payloads are parsed leniently: a field that is missing or has the
// wrong type comes out as null/undefined instead of failing the whole parse.
const optionalNumber = z.number().nullish().catch(null);
const optionalString = z.string().nullish().catch(null);

function lenientList<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).nullish().catch(null);
}

export const sourceSchema = z
  .object({
    id: optionalNumber,
    dwd_station_id: optionalString,
    wmo_station_id: optionalString,
    station_name: optionalString,
    observation_type: z
      .union([z.string(), z.array(z.string())])
      .nullish()
      .catch(null),
    lat: optionalNumber,
    lon: optionalNumber,
    height: optionalNumber,
    distance: optionalNumber,
    first_record: optionalString,
    last_record: optionalString,
  })
  .catch({});

export const currentObservationSchema = z
  .object({
    source_id: optionalNumber,
    timestamp: optionalString,
    temperature: optionalNumber,
    apparent_temperature: optionalNumber,
    relative_humidity: optionalNumber,
    wind_speed_10: optionalNumber,
    wind_direction_10: optionalNumber,
    wind_gust_speed_10: optionalNumber,
    precipitation_10: optionalNumber,
    pressure_msl: optionalNumber,
    visibility: optionalNumber,
    cloud_cover: optionalNumber,
    dew_point: optionalNumber,
    condition: optionalString,
    icon: optionalString,
  })
  .catch({});

export const hourlyRecordSchema = z
  .object({
    source_id: optionalNumber,
    timestamp: optionalString,
    temperature: optionalNumber,
    precipitation: optionalNumber,
    precipitation_probability: optionalNumber,
    wind_speed: optionalNumber,
    wind_direction: optionalNumber,
    cloud_cover: optionalNumber,
    condition: optionalString,
    icon: optionalString,
  })
  .catch({});

export const alertLocationSchema = z
  .object({
    warn_cell_id: optionalNumber,
    name: optionalString,
    name_short: optionalString,
    district: optionalString,
    state: optionalString,
    state_short: optionalString,
  })
  .catch({});

export const alertSchema = z
  .object({
    id: optionalNumber,
    alert_id: optionalString,
    status: optionalString,
    effective: optionalString,
    onset: optionalString,
    expires: optionalString,
    category: optionalString,
    response_type: optionalString,
    urgency: optionalString,
    severity: optionalString,
    certainty: optionalString,
    event_code: optionalNumber,
    event: optionalString,
    event_en: optionalString,
    event_de: optionalString,
    headline: optionalString,
    headline_en: optionalString,
    headline_de: optionalString,
    description: optionalString,
    description_en: optionalString,
    description_de: optionalString,
    instruction: optionalString,
    instruction_en: optionalString,
    instruction_de: optionalString,
    locations: lenientList(alertLocationSchema),
  })
  .catch({});

export const currentWeatherResponseSchema = z
  .object({
    weather: currentObservationSchema.nullish(),
    sources: lenientList(sourceSchema),
  })
  .catch({});

export const forecastResponseSchema = z
  .object({
    weather: lenientList(hourlyRecordSchema),
    sources: lenientList(sourceSchema),
  })
  .catch({});

export const alertsResponseSchema = z
  .object({
    alerts: lenientList(alertSchema),
  })
  .catch({});

export const sourcesResponseSchema = z
  .object({
    sources: lenientList(sourceSchema),
  })
  .catch({});

export const nominatimResponseSchema = z.array(
  z.object({
    lat: z.union([z.string(), z.number()]),
    lon: z.union([z.string(), z.number()]),
    display_name: z.string().optional(),
  })
);

export type Source = z.infer<typeof sourceSchema>;
export type CurrentObservation = z.infer<typeof currentObservationSchema>;
export type HourlyRecord = z.infer<typeof hourlyRecordSchema>;
export type AlertLocation = z.infer<typeof alertLocationSchema>;
export type Alert = z.infer<typeof alertSchema>;
export type CurrentWeatherResponse = z.infer<typeof currentWeatherResponseSchema>;
export type ForecastResponse = z.infer<typeof forecastResponseSchema>;
export type AlertsResponse = z.infer<typeof alertsResponseSchema>;
export type SourcesResponse = z.infer<typeof sourcesResponseSchema>;
