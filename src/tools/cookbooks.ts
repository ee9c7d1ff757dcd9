import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import { EmptySchema, CookbookIdSchema, CookbooksCreateSchema, CookbooksUpdateSchema } from "../schemas/index.js";
import type { CookbookIdInput, CookbooksCreateInput, CookbooksUpdateInput } from "../schemas/index.js";
import { asList, asObject, compact, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export async function cookbooksList(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    cookbooks: asList(await client.listCookbooks()),
  }));
}

export async function cookbooksGet(openClient: ClientFactory, params: CookbookIdInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    cookbook: await client.getCookbook(params.cookbook_id),
  }));
}

export async function cookbooksCreate(openClient: ClientFactory, params: CookbooksCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const cookbook = await client.createCookbook(
      compact({
        name: params.name,
        description: params.description ?? "",
        slug: params.slug || undefined,
        public: params.public,
      })
    );
    return { success: true, message: "Cookbook created successfully", cookbook };
  });
}

/** The cookbook PUT takes the whole object, so unchanged fields come from the current cookbook. */
export async function cookbooksUpdate(openClient: ClientFactory, params: CookbooksUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getCookbook(params.cookbook_id));
    const cookbook = await client.updateCookbook(params.cookbook_id, {
      ...current,
      ...compact({ name: params.name, description: params.description, slug: params.slug, public: params.public }),
    });
    return { success: true, message: "Cookbook updated successfully", cookbook };
  });
}

export async function cookbooksDelete(openClient: ClientFactory, params: CookbookIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteCookbook(params.cookbook_id);
    return { success: true, message: "Cookbook deleted successfully" };
  });
}

export function registerCookbookTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_cookbooks_list",
    {
      title: "List Cookbooks",
      description: "List the household's cookbooks. Returns: { success, cookbooks[] }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await cookbooksList(openClient))
  );

  server.registerTool(
    "mealie_cookbooks_create",
    {
      title: "Create Cookbook",
      description: `Create a cookbook (a saved collection page of recipes).

Args:
  - name (string)
  - description (optional)
  - slug (optional): derived from the name when omitted
  - public (boolean, default false)`,
      inputSchema: CookbooksCreateSchema,
      annotations: WRITE,
    },
    async (params: CookbooksCreateInput) => toToolResult(await cookbooksCreate(openClient, params))
  );

  server.registerTool(
    "mealie_cookbooks_get",
    {
      title: "Get Cookbook",
      description: "Get a cookbook by id.",
      inputSchema: CookbookIdSchema,
      annotations: READ_ONLY,
    },
    async (params: CookbookIdInput) => toToolResult(await cookbooksGet(openClient, params))
  );

  server.registerTool(
    "mealie_cookbooks_update",
    {
      title: "Update Cookbook",
      description: "Change a cookbook's name, description, slug or visibility. Omitted fields keep their values.",
      inputSchema: CookbooksUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: CookbooksUpdateInput) => toToolResult(await cookbooksUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_cookbooks_delete",
    {
      title: "Delete Cookbook",
      description: "Delete a cookbook. The recipes in it are not affected.",
      inputSchema: CookbookIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: CookbookIdInput) => toToolResult(await cookbooksDelete(openClient, params))
  );
}
