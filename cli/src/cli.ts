#!/usr/bin/env node

import { program } from "commander";
import ora from "ora";
import type { ConfigOverrides, ServerConfig } from "./config.js";
import { ConfigValidationError, getMergedConfig, resolveServerConfig } from "./config.js";
import { createConnector } from "./connector.js";
import { initLogger } from "./logger.js";
import { SERVER_VERSION, runMcpServer } from "./mcp.js";
import { createToolCatalog } from "./tools.js";

interface ServeOptions {
  mode?: string;
  python?: string;
  modulesPath?: string;
  logLevel?: string;
}

async function loadConfig(opts: ConfigOverrides): Promise<ServerConfig> {
  try {
    return resolveServerConfig(await getMergedConfig(process.cwd()), opts);
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(`Error: Invalid configuration: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

program
  .name("resolve-mcp")
  .description("MCP server for DaVinci Resolve: projects, timelines and media pool as tools over stdio")
  .version(SERVER_VERSION);

program
  .command("serve")
  .description("Start the MCP server over stdio (stdout is the protocol stream; logs go to stderr)")
  .option("--mode <mode>", "simulation | python (default: config or python)")
  .option("--python <path>", "Python interpreter used for the Resolve bridge")
  .option("--modules-path <path>", "Directory containing DaVinciResolveScript")
  .option("--log-level <level>", "fatal | error | warn | info | debug | trace | silent")
  .action(async (opts: ServeOptions) => {
    const config = await loadConfig(opts);
    initLogger(config.logging.level);
    await runMcpServer({
      connector: createConnector(config),
      catalog: createToolCatalog(config.default_project),
    });
  });

program
  .command("tools")
  .description("Print the tool catalog")
  .option("--json", "Print the tools/list payload as JSON")
  .action(async (opts: { json?: boolean }) => {
    const config = await loadConfig({});
    const tools = createToolCatalog(config.default_project).listing();
    if (opts.json) {
      console.log(JSON.stringify({ tools }, null, 2));
      return;
    }
    for (const tool of tools) {
      console.log(`${tool.name.padEnd(26)} ${tool.description}`);
    }
  });

program
  .command("check")
  .description("Connect to DaVinci Resolve and report its version")
  .option("--mode <mode>", "simulation | python (default: config or python)")
  .option("--python <path>", "Python interpreter used for the Resolve bridge")
  .option("--modules-path <path>", "Directory containing DaVinciResolveScript")
  .action(async (opts: ServeOptions) => {
    const config = await loadConfig({ ...opts, logLevel: "silent" });
    initLogger(config.logging.level);
    const connector = createConnector(config);
    const spinner = ora({ text: `Connecting to DaVinci Resolve (${config.mode})...`, stream: process.stderr }).start();
    try {
      const app = await connector.connect();
      if (!app) {
        spinner.fail("DaVinci Resolve is not running or not reachable");
        process.exitCode = 1;
        return;
      }
      const product = (await app.getProductName()) ?? "DaVinci Resolve";
      const version = (await app.getVersionString()) ?? "unknown version";
      spinner.succeed(`Connected to ${product} ${version}`);
    } finally {
      await connector.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
