import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createServer } from "../src/server.js";
import { FakeMealie } from "./helpers/fake-mealie.js";

function toolOutput(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const [block] = parsed.content;
  return { text: block?.type === "text" ? block.text : "", isError: parsed.isError === true };
}

describe("MCP server", () => {
  let fake: FakeMealie;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    fake = new FakeMealie();
    server = createServer(fake.factory());
    client = new Client({ name: "test-client", version: "1.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("should register every tool", async () => {
    const { tools } = await client.listTools();
    const names = tools.map((tool) => tool.name);

    expect(names).toHaveLength(113);
    expect(names).toContain("ping");
    expect(names).toContain("mealie_recipes_search");
    expect(names).toContain("mealie_mealplans_update_batch");
    expect(names).toContain("mealie_shopping_generate_from_mealplan");
    expect(names).toContain("mealie_tools_delete");
    expect(names).toContain("mealie_parser_ingredients_batch");
  });

  it("should mark read-only tools", async () => {
    const { tools } = await client.listTools();
    const search = tools.find((tool) => tool.name === "mealie_recipes_search");
    const remove = tools.find((tool) => tool.name === "mealie_recipes_delete");

    expect(search?.annotations?.readOnlyHint).toBe(true);
    expect(remove?.annotations?.destructiveHint).toBe(true);
  });

  it("should answer ping", async () => {
    fake.on("GET", "/api/app/about", { body: { version: "v2.0.0" } });

    const output = toolOutput(await client.callTool({ name: "ping", arguments: {} }));

    expect(output).toEqual({ text: "pong - Mealie MCP server is running and connected to Mealie", isError: false });
  });

  it("should flag failed tool calls as errors", async () => {
    const output = toolOutput(await client.callTool({ name: "mealie_recipes_get", arguments: { slug: "missing" } }));

    expect(output.isError).toBe(true);
    expect(JSON.parse(output.text)).toEqual({
      error: "HTTP 404 Error\n\nDetails:\n  - Not Found",
      status_code: 404,
      response_body: '{"detail":"Not Found"}',
    });
  });

  it("should apply schema defaults to tool arguments", async () => {
    fake.on("GET", "/api/recipes", { body: { items: [] } });

    await client.callTool({ name: "mealie_recipes_search", arguments: {} });

    expect(fake.calls[0]?.params).toEqual({ page: 1, perPage: 10 });
  });

  it("should list fixed resources and templates", async () => {
    const { resources } = await client.listResources();
    const { resourceTemplates } = await client.listResourceTemplates();

    expect(resources.map((resource) => resource.uri).sort()).toEqual([
      "mealplans://current",
      "mealplans://today",
      "recipes://list",
      "shopping://lists",
    ]);
    expect(resourceTemplates.map((template) => template.uriTemplate).sort()).toEqual([
      "mealplans://{date}",
      "recipes://{slug}",
      "shopping://{list_id}",
    ]);
  });

  it("should read shopping lists as markdown", async () => {
    fake.on("GET", "/api/households/shopping/lists", { body: { items: [] } });

    const { contents } = await client.readResource({ uri: "shopping://lists" });

    expect(contents).toEqual([
      { uri: "shopping://lists", mimeType: "text/markdown", text: "# Shopping Lists\n\n*No shopping lists found*" },
    ]);
  });

  it("should read a date through the meal plan template", async () => {
    fake.on("GET", "/api/households/mealplans", { body: { items: [] } });

    const { contents } = await client.readResource({ uri: "mealplans://2025-01-06" });

    expect(contents[0]).toMatchObject({ text: "# Meals for 2025-01-06\n\n*No meals planned for this date*" });
    expect(fake.calls[0]?.params).toMatchObject({ start_date: "2025-01-06", end_date: "2025-01-06" });
  });

  it("should render resource failures as a single line", async () => {
    const { contents } = await client.readResource({ uri: "recipes://missing" });

    expect(contents[0]).toMatchObject({ text: "Error fetching recipe 'missing': HTTP 404 Error" });
  });
});
