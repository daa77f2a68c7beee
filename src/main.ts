#!/usr/bin/env node
import { Command } from "commander";

import { resolveConfig, toOverrides, type CliOptions } from "./config.js";
import { UiObjectMcpServer } from "./server.js";

const program = new Command();

program
  .name("uiobject-mcp")
  .description("MCP server driving Android UI objects through the on-device automation snippet")
  .version("0.3.0")
  .option("-t, --transport <kind>", "MCP transport (stdio|http)")
  .option("--host <host>", "HTTP host to bind")
  .option("-p, --port <port>", "HTTP port to listen on")
  .option("--snippet-host <host>", "Host of the forwarded snippet server")
  .option("--snippet-port <port>", "Port of the forwarded snippet server")
  .option("--rpc-timeout <ms>", "RPC round-trip ceiling in milliseconds")
  .option("--strict", "Raise instead of returning false when an object is missing")
  .action(async (opts: CliOptions) => {
    const server = new UiObjectMcpServer(resolveConfig(toOverrides(opts)));
    await server.run();
  });

program.parseAsync(process.argv).catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
