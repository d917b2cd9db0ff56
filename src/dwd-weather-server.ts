#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createProgram } from "./cli.js";
import { loadConfig } from "./config.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { createDefaultWeatherTools } from "./tools.js";

async function start(): Promise<void> {
  const config = loadConfig();
  const server = createServer(createDefaultWeatherTools(config));

  const shutdown = (signal: NodeJS.Signals) => {
    console.error(`\nReceived ${signal}, shutting down...`);
    void server
      .close()
      .catch((error: unknown) => console.error("Error while closing server", error))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  console.error(
    `Starting ${SERVER_NAME} ${SERVER_VERSION} (Bright Sky: ${config.brightSkyBaseUrl})`
  );
  await server.connect(new StdioServerTransport());
}

createProgram(start)
  .parseAsync(process.argv)
  .catch((error) => {
    console.error("Server failed", error);
    process.exitCode = 1;
  });
