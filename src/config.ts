export const DEFAULT_BRIGHTSKY_BASE_URL = "https://api.brightsky.dev";
export const DEFAULT_BRIGHTSKY_TIMEOUT_MS = 30000;
export const DEFAULT_NOMINATIM_URL = "https://nominatim.openstreetmap.org/search";
export const DEFAULT_GEOCODING_TIMEOUT_MS = 10000;
export const DEFAULT_NOMINATIM_USER_AGENT = "dwd-mcp-server/0.1.0";

export interface ServerConfig {
  brightSkyBaseUrl: string;
  brightSkyTimeoutMs: number;
  nominatimUrl: string;
  geocodingTimeoutMs: number;
  nominatimUserAgent: string;
}

export function getEnvVar(name: string, fallback: string): string;
export function getEnvVar(name: string, fallback?: string): string | undefined;
export function getEnvVar(name: string, fallback?: string): string | undefined {
  const value = process.env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

export function getPositiveIntEnv(name: string, fallback: number): number {
  const raw = getEnvVar(name);
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(): ServerConfig {
  return {
    brightSkyBaseUrl: getEnvVar("BRIGHTSKY_BASE_URL", DEFAULT_BRIGHTSKY_BASE_URL),
    brightSkyTimeoutMs: getPositiveIntEnv("BRIGHTSKY_TIMEOUT_MS", DEFAULT_BRIGHTSKY_TIMEOUT_MS),
    nominatimUrl: getEnvVar("NOMINATIM_URL", DEFAULT_NOMINATIM_URL),
    geocodingTimeoutMs: getPositiveIntEnv("GEOCODING_TIMEOUT_MS", DEFAULT_GEOCODING_TIMEOUT_MS),
    nominatimUserAgent: getEnvVar("NOMINATIM_USER_AGENT", DEFAULT_NOMINATIM_USER_AGENT),
  };
}
