import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_FORECAST_DAYS } from "./brightsky-client.js";
import { loadConfig } from "./config.js";
import { createDefaultWeatherTools, type WeatherTools } from "./tools.js";

export const SERVER_NAME = "DWD Weather Server";
export const SERVER_VERSION = "0.1.0";

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

export function createServer(
  tools: WeatherTools = createDefaultWeatherTools(loadConfig())
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "get_current_weather",
    {
      title: "Aktuelles Wetter",
      description:
        "Aktuelles Wetter für einen Ort abrufen. Gibt Temperatur, Luftfeuchtigkeit, Wind, " +
        "Niederschlag, Bewölkung und weitere aktuelle Wetterdaten zurück.",
      inputSchema: {
        location: z
          .string()
          .describe(
            "Ort als Stadtname (z.B. 'Aachen', 'München') oder Koordinaten (z.B. '50.7753,6.0839')"
          ),
      },
    },
    async ({ location }) => textResult(await tools.getCurrentWeather(location))
  );

  server.registerTool(
    "get_weather_forecast",
    {
      title: "Wettervorhersage",
      description:
        "Wettervorhersage für einen Ort abrufen. Gibt stündliche Vorhersagedaten sowie eine " +
        "Tageszusammenfassung mit Minimal-/Maximaltemperaturen und Niederschlagssummen zurück.",
      inputSchema: {
        location: z
          .string()
          .describe(
            "Ort als Stadtname (z.B. 'Köln', 'Berlin') oder Koordinaten (z.B. '50.9375,6.9603')"
          ),
        days: z
          .number()
          .int()
          .default(DEFAULT_FORECAST_DAYS)
          .describe("Anzahl der Vorhersagetage (1-10, Standard: 3)"),
      },
    },
    async ({ location, days }) => textResult(await tools.getWeatherForecast(location, days))
  );

  server.registerTool(
    "get_weather_alerts",
    {
      title: "Wetterwarnungen",
      description:
        "Amtliche Wetterwarnungen abrufen. Gibt aktuelle Wetterwarnungen des DWD zurück, " +
        "inklusive Warntyp, Schweregrad, Beschreibung und Gültigkeitszeitraum. Kann für einen " +
        "bestimmten Ort oder deutschlandweit abgefragt werden.",
      inputSchema: {
        location: z
          .string()
          .optional()
          .describe(
            "Optional: Ort als Stadtname oder Koordinaten. Ohne Angabe werden alle Warnungen " +
              "für Deutschland zurückgegeben."
          ),
      },
    },
    async ({ location }) => textResult(await tools.getWeatherAlerts(location))
  );

  server.registerTool(
    "find_weather_station",
    {
      title: "Wetterstationen finden",
      description:
        "Nächstgelegene DWD-Wetterstationen finden. Gibt eine Liste der Wetterstationen in der " +
        "Nähe des angegebenen Ortes zurück, inklusive Stationsname, ID und Entfernung.",
      inputSchema: {
        location: z
          .string()
          .describe("Ort als Stadtname (z.B. 'Hamburg') oder Koordinaten (z.B. '53.5511,9.9937')"),
      },
    },
    async ({ location }) => textResult(await tools.findWeatherStation(location))
  );

  return server;
}
