import { afterEach, describe, expect, it, vi } from "vitest";
import {
  addDays,
  fetchWithTimeout,
  isAbortError,
  formatTimestamp,
  getLocalDateString,
  roundTo,
  weekdayName,
  windDirectionToText,
} from "../src/utils.js";
import { stubStalledFetch } from "./stalled-fetch.js";

describe("windDirectionToText", () => {
  it.each([
    [0, "N"],
    [10, "N"],
    [360, "N"],
    [30, "NO"],
    [45, "NO"],
    [90, "O"],
    [135, "SO"],
    [180, "S"],
    [225, "SW"],
    [270, "W"],
    [315, "NW"],
  ])("maps %s° to %s", (degrees, expected) => {
    expect(windDirectionToText(degrees)).toBe(expected);
  });

  it("uses half-open sector boundaries", () => {
    expect(windDirectionToText(22.4)).toBe("N");
    expect(windDirectionToText(22.5)).toBe("NO");
    expect(windDirectionToText(292.5)).toBe("NW");
    expect(windDirectionToText(337.4)).toBe("NW");
    expect(windDirectionToText(337.5)).toBe("N");
  });

  it("wraps negative and large angles", () => {
    expect(windDirectionToText(-45)).toBe("NW");
    expect(windDirectionToText(-90)).toBe("W");
    expect(windDirectionToText(405)).toBe("NO");
    expect(windDirectionToText(720)).toBe("N");
  });

  it("gives the same label for every full turn", () => {
    for (const degrees of [0, 12.3, 100, 200.5, 359.9]) {
      for (const turns of [-2, -1, 1, 3]) {
        expect(windDirectionToText(degrees + 360 * turns)).toBe(windDirectionToText(degrees));
      }
    }
  });

  it("returns unbekannt for missing values", () => {
    expect(windDirectionToText(null)).toBe("unbekannt");
    expect(windDirectionToText(undefined)).toBe("unbekannt");
    expect(windDirectionToText(Number.NaN)).toBe("unbekannt");
  });
});

describe("formatTimestamp", () => {
  it("formats a timestamp with offset using its own wall-clock time", () => {
    expect(formatTimestamp("2026-02-15T14:00:00+01:00")).toBe("So, 15.02.2026 14:00");
  });

  it("accepts a trailing Z", () => {
    expect(formatTimestamp("2026-02-15T14:00:00Z")).toBe("So, 15.02.2026 14:00");
  });

  it("accepts a space separator, missing seconds and fractional seconds", () => {
    expect(formatTimestamp("2026-02-16 08:30")).toBe("Mo, 16.02.2026 08:30");
    expect(formatTimestamp("2026-02-17T23:59:59.250+0100")).toBe("Di, 17.02.2026 23:59");
  });

  it("treats a bare date as midnight", () => {
    expect(formatTimestamp("2026-03-01")).toBe("So, 01.03.2026 00:00");
  });

  it("returns unbekannt for empty input", () => {
    expect(formatTimestamp(null)).toBe("unbekannt");
    expect(formatTimestamp(undefined)).toBe("unbekannt");
    expect(formatTimestamp("")).toBe("unbekannt");
  });

  it("returns unparseable input unchanged", () => {
    expect(formatTimestamp("gestern abend")).toBe("gestern abend");
    expect(formatTimestamp("2026-02-30T10:00:00+01:00")).toBe("2026-02-30T10:00:00+01:00");
    expect(formatTimestamp("2026-02-15T24:00:00")).toBe("2026-02-15T24:00:00");
  });
});

describe("weekdayName", () => {
  it("names the weekday of a full date-time key", () => {
    expect(weekdayName("2026-02-15 12:00:00+01:00")).toBe("Sonntag");
    expect(weekdayName("2026-10-19 00:00:00+0200")).toBe("Montag");
  });

  it("returns null for a bare date or anything else", () => {
    expect(weekdayName("2026-02-15")).toBeNull();
    expect(weekdayName("2026-02-15T12:00:00+01:00")).toBeNull();
    expect(weekdayName("2026-13-01 12:00:00+01:00")).toBeNull();
    expect(weekdayName("morgen")).toBeNull();
  });
});

describe("date helpers", () => {
  it("formats today's date in the requested time zone", () => {
    expect(getLocalDateString(new Date("2026-10-18T23:30:00Z"), "Europe/Berlin")).toBe(
      "2026-10-19"
    );
    expect(getLocalDateString(new Date("2026-10-18T23:30:00Z"), "UTC")).toBe("2026-10-18");
  });

  it("adds calendar days across month and year boundaries", () => {
    expect(addDays("2026-02-27", 3)).toBe("2026-03-02");
    expect(addDays("2026-12-30", 5)).toBe("2027-01-04");
  });

  it("rejects malformed dates", () => {
    expect(() => addDays("2026-02-30", 1)).toThrow(RangeError);
  });

  it("rounds to the requested number of decimals", () => {
    expect(roundTo(0.2 + 0.3, 1)).toBe(0.5);
    expect(roundTo(0.04 + 0.03, 1)).toBe(0.1);
    expect(roundTo(12.345678, 2)).toBe(12.35);
    expect(roundTo(-1.26, 1)).toBe(-1.3);
  });

  it("rounds the stored binary value, ties to even", () => {
    expect(roundTo(0.15, 1)).toBe(0.1);
    expect(roundTo(0.25, 1)).toBe(0.2);
    expect(roundTo(0.75, 1)).toBe(0.8);
    expect(roundTo(2.5, 0)).toBe(2);
  });
});

describe("fetchWithTimeout", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("passes the request through with an abort signal", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL, _init?: RequestInit) => new Response("ok", { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await fetchWithTimeout(
      "https://example.test/data",
      { headers: { Accept: "text/plain" } },
      1000
    );

    await expect(response.text()).resolves.toBe("ok");
    const init = fetchMock.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get("Accept")).toBe("text/plain");
    expect(init?.signal?.aborted).toBe(false);
  });

  it("aborts a request that outlives the timeout", async () => {
    const fetchMock = stubStalledFetch();

    const error: unknown = await fetchWithTimeout("https://example.test/slow", {}, 20).catch(
      (reason: unknown) => reason
    );

    expect(isAbortError(error)).toBe(true);
    expect(fetchMock.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });
});
