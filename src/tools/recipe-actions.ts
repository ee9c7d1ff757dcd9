import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import {
  ItemIdSchema,
  RecipeActionsListSchema,
  RecipeActionsCreateSchema,
  RecipeActionsUpdateSchema,
  RecipeActionsTriggerSchema,
} from "../schemas/index.js";
import type {
  ItemIdInput,
  RecipeActionsListInput,
  RecipeActionsCreateInput,
  RecipeActionsUpdateInput,
  RecipeActionsTriggerInput,
} from "../schemas/index.js";
import { asObject, compact, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export async function recipeActionsList(openClient: ClientFactory, params: RecipeActionsListInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    actions: await client.listRecipeActions({
      page: params.page,
      perPage: params.per_page,
      orderBy: params.order_by,
      orderDirection: params.order_direction,
    }),
  }));
}

export async function recipeActionsGet(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    action: await client.getRecipeAction(params.item_id),
  }));
}

export async function recipeActionsCreate(openClient: ClientFactory, params: RecipeActionsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const action = await client.createRecipeAction({
      actionType: params.action_type,
      title: params.title,
      url: params.url,
    });
    return { success: true, message: "Recipe action created successfully", action };
  });
}

export async function recipeActionsUpdate(openClient: ClientFactory, params: RecipeActionsUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getRecipeAction(params.item_id));
    const action = await client.updateRecipeAction(params.item_id, {
      ...current,
      ...compact({ actionType: params.action_type, title: params.title, url: params.url }),
    });
    return { success: true, message: "Recipe action updated successfully", action };
  });
}

export async function recipeActionsDelete(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteRecipeAction(params.item_id);
    return { success: true, message: "Recipe action deleted successfully" };
  });
}

export async function recipeActionsTrigger(openClient: ClientFactory, params: RecipeActionsTriggerInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const result = await client.triggerRecipeAction(params.item_id, params.recipe_slug);
    return { success: true, message: "Recipe action triggered successfully", result };
  });
}

export function registerRecipeActionTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_recipe_actions_list",
    {
      title: "List Recipe Actions",
      description: "List the custom actions shown on recipes (links and POST hooks). Returns: { success, actions }",
      inputSchema: RecipeActionsListSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipeActionsListInput) => toToolResult(await recipeActionsList(openClient, params))
  );

  server.registerTool(
    "mealie_recipe_actions_create",
    {
      title: "Create Recipe Action",
      description: `Create a recipe action.

Args:
  - action_type: 'link' opens the URL with the recipe slug appended; 'post' sends the recipe JSON to the URL
  - title: button title
  - url: target URL

Examples:
  - { "action_type": "post", "title": "Send to planner", "url": "https://planner.example.com/api/recipes" }`,
      inputSchema: RecipeActionsCreateSchema,
      annotations: WRITE,
    },
    async (params: RecipeActionsCreateInput) => toToolResult(await recipeActionsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_recipe_actions_get",
    {
      title: "Get Recipe Action",
      description: "Get one recipe action by id.",
      inputSchema: ItemIdSchema,
      annotations: READ_ONLY,
    },
    async (params: ItemIdInput) => toToolResult(await recipeActionsGet(openClient, params))
  );

  server.registerTool(
    "mealie_recipe_actions_update",
    {
      title: "Update Recipe Action",
      description: "Change a recipe action's type, title or URL. Omitted fields keep their values.",
      inputSchema: RecipeActionsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipeActionsUpdateInput) => toToolResult(await recipeActionsUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_recipe_actions_delete",
    {
      title: "Delete Recipe Action",
      description: "Delete a recipe action by id.",
      inputSchema: ItemIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ItemIdInput) => toToolResult(await recipeActionsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_recipe_actions_trigger",
    {
      title: "Trigger Recipe Action",
      description: "Run a recipe action for one recipe.",
      inputSchema: RecipeActionsTriggerSchema,
      annotations: WRITE,
    },
    async (params: RecipeActionsTriggerInput) => toToolResult(await recipeActionsTrigger(openClient, params))
  );
}
