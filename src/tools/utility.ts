import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory, MealieClient } from "../services/client.js";
import { EmptySchema } from "../schemas/index.js";
import { MealieApiError } from "../services/errors.js";
import { errorMessage } from "../services/helpers.js";
import type { ToolResult } from "../services/helpers.js";
import { READ_ONLY } from "./annotations.js";

/** Plain-text connectivity report. Never rejects. */
export async function ping(openClient: ClientFactory): Promise<string> {
  let client: MealieClient | undefined;
  try {
    client = openClient();
    await client.testConnection();
    return "pong - Mealie MCP server is running and connected to Mealie";
  } catch (error) {
    if (error instanceof MealieApiError) {
      return `MCP server running but Mealie connection failed: ${error.message}`;
    }
    return `MCP server running but error occurred: ${errorMessage(error)}`;
  } finally {
    client?.close();
  }
}

export function registerUtilityTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "ping",
    {
      title: "Ping",
      description: "Check that the MCP server is running and can reach the configured Mealie instance.",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async (): Promise<ToolResult> => ({ content: [{ type: "text", text: await ping(openClient) }] })
  );
}
