import { describe, expect, it } from "vitest";
import {
  buildCityTable,
  getCityCoordinates,
  getDefaultCityTable,
  normalizeCityName,
} from "../src/german-cities.js";

describe("normalizeCityName", () => {
  it("lower-cases, trims and collapses whitespace", () => {
    expect(normalizeCityName("  Frankfurt   am  Main ")).toBe("frankfurt am main");
  });

  it("spells out umlauts and ß", () => {
    expect(normalizeCityName("Köln")).toBe("koeln");
    expect(normalizeCityName("MÜNCHEN")).toBe("muenchen");
    expect(normalizeCityName("Gießen")).toBe("giessen");
  });

  it("handles decomposed umlauts and other diacritics", () => {
    expect(normalizeCityName("Ko\u0308ln")).toBe("koeln");
    expect(normalizeCityName("Montréal")).toBe("montreal");
  });
});

describe("city table", () => {
  it("indexes names and aliases under their normalized keys", () => {
    const table = buildCityTable({
      Köln: { lat: 50.9375, lon: 6.9603, aliases: ["Cologne"] },
    });

    expect([...table.keys()]).toEqual(["koeln", "cologne"]);
    expect(table.get("cologne")).toEqual({ latitude: 50.9375, longitude: 6.9603 });
  });

  it("loads the bundled table once", () => {
    expect(getDefaultCityTable()).toBe(getDefaultCityTable());
    expect(getDefaultCityTable().size).toBeGreaterThan(100);
  });

  it("finds bundled cities by name, transliteration and alias", () => {
    expect(getCityCoordinates("Aachen")).toEqual({ latitude: 50.7753, longitude: 6.0839 });
    expect(getCityCoordinates("münchen")).toEqual({ latitude: 48.1351, longitude: 11.582 });
    expect(getCityCoordinates("Muenchen")).toEqual(getCityCoordinates("Munich"));
    expect(getCityCoordinates("Frankfurt")).toEqual({ latitude: 50.1109, longitude: 8.6821 });
  });

  it("returns null for unknown names", () => {
    expect(getCityCoordinates("Monschau")).toBeNull();
  });
});
