import { afterEach, describe, expect, it, vi } from "vitest";
import { getEnvVar, getPositiveIntEnv, loadConfig } from "../src/config.js";

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("trims values and treats blank ones as unset", () => {
    vi.stubEnv("DWD_TEST_VALUE", "  value  ");
    vi.stubEnv("DWD_TEST_BLANK", "   ");

    expect(getEnvVar("DWD_TEST_VALUE")).toBe("value");
    expect(getEnvVar("DWD_TEST_BLANK")).toBeUndefined();
    expect(getEnvVar("DWD_TEST_BLANK", "fallback")).toBe("fallback");
  });

  it("falls back for missing or invalid integers", () => {
    vi.stubEnv("DWD_TEST_INT", "2500");
    vi.stubEnv("DWD_TEST_NEGATIVE", "-5");
    vi.stubEnv("DWD_TEST_TEXT", "soon");

    expect(getPositiveIntEnv("DWD_TEST_INT", 10)).toBe(2500);
    expect(getPositiveIntEnv("DWD_TEST_NEGATIVE", 10)).toBe(10);
    expect(getPositiveIntEnv("DWD_TEST_TEXT", 10)).toBe(10);
    expect(getPositiveIntEnv("DWD_TEST_MISSING", 10)).toBe(10);
  });

  it("builds the server config from the environment", () => {
    vi.stubEnv("BRIGHTSKY_BASE_URL", "http://localhost:5000");
    vi.stubEnv("BRIGHTSKY_TIMEOUT_MS", "5000");
    vi.stubEnv("NOMINATIM_URL", "");
    vi.stubEnv("GEOCODING_TIMEOUT_MS", "");
    vi.stubEnv("NOMINATIM_USER_AGENT", "");

    expect(loadConfig()).toEqual({
      brightSkyBaseUrl: "http://localhost:5000",
      brightSkyTimeoutMs: 5000,
      nominatimUrl: "https://nominatim.openstreetmap.org/search",
      geocodingTimeoutMs: 10000,
      nominatimUserAgent: "dwd-mcp-server/0.1.0",
    });
  });
});
