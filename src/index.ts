#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ADB_NOT_FOUND_MESSAGE, AdbRunner } from "./backend/adb/adb.js";
import { FleetService } from "./backend/fleet.js";
import { loadAddressMapping } from "./backend/identity/addressMapping.js";
import { ArpScanner } from "./backend/identity/neighborScan.js";
import { loadConfig, resolveProjectPath } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { registerTools } from "./tools/register.js";

/**
 * MCP server entrypoint.
 *
 * Loads configuration and the MAC mapping once, wires the fleet backend, and
 * serves the tool surface over stdio.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const devicesPath = resolveProjectPath(config.devicesPath);
  const runner = AdbRunner.fromConfig(config, logger.child("adb"));
  const mapping = loadAddressMapping(devicesPath, logger);
  const fleet = new FleetService({ runner, scanner: new ArpScanner(), mapping, logger });

  const server = new McpServer({ name: pkg.name, version: pkg.version });

  // Tools must be registered before connecting to a transport, since
  // registration mutates server capabilities and request handlers.
  registerTools(server, fleet, {
    serverName: pkg.name,
    serverVersion: pkg.version,
    transport: config.transport,
    logLevel: config.logLevel,
    devicesPath,
    defaultConnectPort: config.defaultConnectPort,
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.printBanner({
    version: pkg.version,
    transport: config.transport,
    adb: runner.executable() ?? ADB_NOT_FOUND_MESSAGE,
    devicesPath,
    mappedDevices: mapping.size,
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[fleetdeck-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});
