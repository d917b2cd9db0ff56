import { Command } from "commander";
import { SERVER_NAME, SERVER_VERSION } from "./server.js";

export function createProgram(start: () => Promise<void>): Command {
  const program = new Command();

  program
    .name("dwd-weather-mcp")
    .description(`${SERVER_NAME}: DWD weather data from the Bright Sky API as MCP tools`)
    .version(SERVER_VERSION);

  program
    .command("start", { isDefault: true })
    .description("Serve the weather tools over stdio")
    .allowExcessArguments(false)
    .action(async () => {
      await start();
    });

  return program;
}
