#!/usr/bin/env node
/**
 * Mealie MCP Server
 *
 * Exposes a self-hosted Mealie instance to MCP clients: recipes, meal plans,
 * shopping lists, foods and units, organizers, cookbooks, comments, the recipe
 * timeline, webhooks, event notifications, recipe actions and the ingredient parser.
 */

import { loadConfig, missingSettings } from "./config.js";
import type { ServerConfig } from "./config.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { clientFactory, createServer } from "./server.js";
import { logger } from "./services/logger.js";

function buildServer(config: ServerConfig) {
  return createServer(clientFactory({ baseUrl: config.mealieUrl, apiToken: config.mealieApiToken }));
}

async function runStdio(config: ServerConfig): Promise<void> {
  const server = buildServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ mealieUrl: config.mealieUrl }, "Mealie MCP server running via stdio");
}

async function runHTTP(config: ServerConfig): Promise<void> {
  const { default: express } = await import("express");
  const { StreamableHTTPServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/streamableHttp.js"
  );

  const server = buildServer(config);
  const app = express();
  app.use(express.json());

  app.post("/mcp", async (req, res) => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      transport.close().catch((err: unknown) => logger.warn({ err }, "Failed to close HTTP transport"));
    });
    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error({ err }, "Failed to handle MCP request");
      if (!res.headersSent) {
        res.status(500).json({ jsonrpc: "2.0", error: { code: -32603, message: "Internal server error" }, id: null });
      }
    }
  });

  app.listen(config.port, () => {
    logger.info({ port: config.port }, `Mealie MCP server running on http://localhost:${config.port}/mcp`);
  });
}

// Signal handlers
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const config = loadConfig();
const missing = missingSettings(config);
if (missing.length > 0) {
  logger.fatal({ missing }, `${missing.join(" and ")} must be set (environment or .env file)`);
  process.exit(1);
}

const run = config.transport === "http" ? runHTTP : runStdio;
run(config).catch((err: unknown) => {
  logger.fatal({ err }, "Server error");
  process.exit(1);
});
