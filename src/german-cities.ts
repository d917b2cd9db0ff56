import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Coordinates } from "./types.js";

export type CityTable = ReadonlyMap<string, Coordinates>;

const CITY_DATA_PATH = fileURLToPath(new URL("../data/german-cities.json", import.meta.url));

const cityDataSchema = z.record(
  z.object({
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    aliases: z.array(z.string()).optional(),
  })
);

export type CityData = z.infer<typeof cityDataSchema>;

const UMLAUTS: ReadonlyArray<readonly [string, string]> = [
  ["ä", "ae"],
  ["ö", "oe"],
  ["ü", "ue"],
  ["ß", "ss"],
];

// "köln" and "koeln" share the key "koeln".
export function normalizeCityName(name: string): string {
  let key = name.trim().normalize("NFC").toLowerCase();
  for (const [umlaut, replacement] of UMLAUTS) {
    key = key.replaceAll(umlaut, replacement);
  }
  return key
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/\s+/g, " ");
}

export function buildCityTable(data: CityData): CityTable {
  const table = new Map<string, Coordinates>();
  for (const [name, entry] of Object.entries(data)) {
    const coordinates: Coordinates = Object.freeze({
      latitude: entry.lat,
      longitude: entry.lon,
    });
    for (const key of [name, ...(entry.aliases ?? [])]) {
      table.set(normalizeCityName(key), coordinates);
    }
  }
  return table;
}

let defaultTable: CityTable | null = null;

export function loadCityTable(filePath: string = CITY_DATA_PATH): CityTable {
  const raw = fs.readFileSync(filePath, "utf-8");
  return buildCityTable(cityDataSchema.parse(JSON.parse(raw)));
}

export function getDefaultCityTable(): CityTable {
  if (!defaultTable) {
    defaultTable = loadCityTable();
  }
  return defaultTable;
}

export function getCityCoordinates(
  name: string,
  table: CityTable = getDefaultCityTable()
): Coordinates | null {
  return table.get(normalizeCityName(name)) ?? null;
}
