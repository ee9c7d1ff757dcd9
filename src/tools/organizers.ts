import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory, OrganizerKind } from "../services/client.js";
import {
  EmptySchema,
  OrganizerNameSchema,
  CategoryIdSchema,
  CategoriesUpdateSchema,
  TagIdSchema,
  TagsUpdateSchema,
  ToolIdSchema,
  ToolsUpdateSchema,
} from "../schemas/index.js";
import type {
  OrganizerNameInput,
  CategoryIdInput,
  CategoriesUpdateInput,
  TagIdInput,
  TagsUpdateInput,
  ToolIdInput,
  ToolsUpdateInput,
} from "../schemas/index.js";
import { asList, compact, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

interface OrganizerLabels {
  /** Key used in tool output, e.g. "category". */
  singular: string;
  plural: string;
  /** Capitalised for messages, e.g. "Category". */
  title: string;
}

export const ORGANIZER_LABELS: Record<OrganizerKind, OrganizerLabels> = {
  categories: { singular: "category", plural: "categories", title: "Category" },
  tags: { singular: "tag", plural: "tags", title: "Tag" },
  tools: { singular: "tool", plural: "tools", title: "Tool" },
};

export async function organizersList(openClient: ClientFactory, kind: OrganizerKind): Promise<string> {
  return runTool(openClient, async (client) => {
    const items = asList(await client.listOrganizers(kind));
    return { count: items.length, [ORGANIZER_LABELS[kind].plural]: items };
  });
}

export async function organizersCreate(
  openClient: ClientFactory,
  kind: OrganizerKind,
  params: OrganizerNameInput
): Promise<string> {
  const labels = ORGANIZER_LABELS[kind];
  return runTool(openClient, async (client) => {
    const created = await client.createOrganizer(kind, params.name);
    return { success: true, message: `${labels.title} created successfully`, [labels.singular]: created };
  });
}

export async function organizersGet(openClient: ClientFactory, kind: OrganizerKind, id: string): Promise<string> {
  return runTool(openClient, (client) => client.getOrganizer(kind, id));
}

export async function organizersUpdate(
  openClient: ClientFactory,
  kind: OrganizerKind,
  id: string,
  changes: { name?: string; slug?: string }
): Promise<string> {
  const labels = ORGANIZER_LABELS[kind];
  return runTool(openClient, async (client) => {
    const updated = await client.updateOrganizer(kind, id, compact({ name: changes.name, slug: changes.slug }));
    return { success: true, message: `${labels.title} updated successfully`, [labels.singular]: updated };
  });
}

export async function organizersDelete(openClient: ClientFactory, kind: OrganizerKind, id: string): Promise<string> {
  const labels = ORGANIZER_LABELS[kind];
  return runTool(openClient, async (client) => {
    await client.deleteOrganizer(kind, id);
    return { success: true, message: `${labels.title} deleted successfully` };
  });
}

export function registerOrganizerTools(server: McpServer, openClient: ClientFactory): void {
  // Categories

  server.registerTool(
    "mealie_categories_list",
    {
      title: "List Categories",
      description: "List all recipe categories. Returns: { count, categories[] }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await organizersList(openClient, "categories"))
  );

  server.registerTool(
    "mealie_categories_create",
    {
      title: "Create Category",
      description: "Create a recipe category.",
      inputSchema: OrganizerNameSchema,
      annotations: WRITE,
    },
    async (params: OrganizerNameInput) => toToolResult(await organizersCreate(openClient, "categories", params))
  );

  server.registerTool(
    "mealie_categories_get",
    {
      title: "Get Category",
      description: "Get a category by id.",
      inputSchema: CategoryIdSchema,
      annotations: READ_ONLY,
    },
    async (params: CategoryIdInput) => toToolResult(await organizersGet(openClient, "categories", params.category_id))
  );

  server.registerTool(
    "mealie_categories_update",
    {
      title: "Update Category",
      description: "Rename a category or change its slug.",
      inputSchema: CategoriesUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: CategoriesUpdateInput) =>
      toToolResult(await organizersUpdate(openClient, "categories", params.category_id, params))
  );

  server.registerTool(
    "mealie_categories_delete",
    {
      title: "Delete Category",
      description: "Delete a category. Recipes keep existing but lose the category.",
      inputSchema: CategoryIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: CategoryIdInput) =>
      toToolResult(await organizersDelete(openClient, "categories", params.category_id))
  );

  // Tags

  server.registerTool(
    "mealie_tags_list",
    {
      title: "List Tags",
      description: "List all recipe tags. Returns: { count, tags[] }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await organizersList(openClient, "tags"))
  );

  server.registerTool(
    "mealie_tags_create",
    {
      title: "Create Tag",
      description: "Create a recipe tag.",
      inputSchema: OrganizerNameSchema,
      annotations: WRITE,
    },
    async (params: OrganizerNameInput) => toToolResult(await organizersCreate(openClient, "tags", params))
  );

  server.registerTool(
    "mealie_tags_get",
    {
      title: "Get Tag",
      description: "Get a tag by id.",
      inputSchema: TagIdSchema,
      annotations: READ_ONLY,
    },
    async (params: TagIdInput) => toToolResult(await organizersGet(openClient, "tags", params.tag_id))
  );

  server.registerTool(
    "mealie_tags_update",
    {
      title: "Update Tag",
      description: "Rename a tag or change its slug.",
      inputSchema: TagsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: TagsUpdateInput) => toToolResult(await organizersUpdate(openClient, "tags", params.tag_id, params))
  );

  server.registerTool(
    "mealie_tags_delete",
    {
      title: "Delete Tag",
      description: "Delete a tag.",
      inputSchema: TagIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: TagIdInput) => toToolResult(await organizersDelete(openClient, "tags", params.tag_id))
  );

  // Kitchen tools

  server.registerTool(
    "mealie_tools_list",
    {
      title: "List Kitchen Tools",
      description: "List all kitchen tools (equipment recipes can require). Returns: { count, tools[] }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await organizersList(openClient, "tools"))
  );

  server.registerTool(
    "mealie_tools_create",
    {
      title: "Create Kitchen Tool",
      description: "Create a kitchen tool, e.g. { \"name\": \"Dutch oven\" }.",
      inputSchema: OrganizerNameSchema,
      annotations: WRITE,
    },
    async (params: OrganizerNameInput) => toToolResult(await organizersCreate(openClient, "tools", params))
  );

  server.registerTool(
    "mealie_tools_get",
    {
      title: "Get Kitchen Tool",
      description: "Get a kitchen tool by id.",
      inputSchema: ToolIdSchema,
      annotations: READ_ONLY,
    },
    async (params: ToolIdInput) => toToolResult(await organizersGet(openClient, "tools", params.tool_id))
  );

  server.registerTool(
    "mealie_tools_update",
    {
      title: "Update Kitchen Tool",
      description: "Rename a kitchen tool or change its slug.",
      inputSchema: ToolsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: ToolsUpdateInput) => toToolResult(await organizersUpdate(openClient, "tools", params.tool_id, params))
  );

  server.registerTool(
    "mealie_tools_delete",
    {
      title: "Delete Kitchen Tool",
      description: "Delete a kitchen tool.",
      inputSchema: ToolIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ToolIdInput) => toToolResult(await organizersDelete(openClient, "tools", params.tool_id))
  );
}
