import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import {
  PageSchema,
  FoodIdSchema,
  FoodsCreateSchema,
  FoodsUpdateSchema,
  FoodsMergeSchema,
  UnitIdSchema,
  UnitsCreateSchema,
  UnitsUpdateSchema,
  UnitsMergeSchema,
} from "../schemas/index.js";
import type {
  PageInput,
  FoodIdInput,
  FoodsCreateInput,
  FoodsUpdateInput,
  FoodsMergeInput,
  UnitIdInput,
  UnitsCreateInput,
  UnitsUpdateInput,
  UnitsMergeInput,
} from "../schemas/index.js";
import { compact, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

// Foods

export async function foodsList(openClient: ClientFactory, params: PageInput): Promise<string> {
  return runTool(openClient, (client) => client.listFoods(params.page, params.per_page));
}

export async function foodsGet(openClient: ClientFactory, params: FoodIdInput): Promise<string> {
  return runTool(openClient, (client) => client.getFood(params.food_id));
}

export async function foodsCreate(openClient: ClientFactory, params: FoodsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const food = await client.createFood(
      compact({ name: params.name, description: params.description ?? "", labelId: params.label_id })
    );
    return { success: true, message: "Food created successfully", food };
  });
}

export async function foodsUpdate(openClient: ClientFactory, params: FoodsUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const food = await client.updateFood(
      params.food_id,
      compact({ name: params.name, description: params.description, labelId: params.label_id })
    );
    return { success: true, message: "Food updated successfully", food };
  });
}

export async function foodsDelete(openClient: ClientFactory, params: FoodIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteFood(params.food_id);
    return { success: true, message: "Food deleted successfully" };
  });
}

export async function foodsMerge(openClient: ClientFactory, params: FoodsMergeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const result = await client.mergeFoods(params.from_food_id, params.to_food_id);
    return { success: true, message: "Foods merged successfully", result };
  });
}

// Units

export async function unitsList(openClient: ClientFactory, params: PageInput): Promise<string> {
  return runTool(openClient, (client) => client.listUnits(params.page, params.per_page));
}

export async function unitsGet(openClient: ClientFactory, params: UnitIdInput): Promise<string> {
  return runTool(openClient, (client) => client.getUnit(params.unit_id));
}

export async function unitsCreate(openClient: ClientFactory, params: UnitsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const unit = await client.createUnit(
      compact({ name: params.name, description: params.description ?? "", abbreviation: params.abbreviation ?? "" })
    );
    return { success: true, message: "Unit created successfully", unit };
  });
}

export async function unitsUpdate(openClient: ClientFactory, params: UnitsUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const unit = await client.updateUnit(
      params.unit_id,
      compact({ name: params.name, description: params.description, abbreviation: params.abbreviation })
    );
    return { success: true, message: "Unit updated successfully", unit };
  });
}

export async function unitsDelete(openClient: ClientFactory, params: UnitIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteUnit(params.unit_id);
    return { success: true, message: "Unit deleted successfully" };
  });
}

export async function unitsMerge(openClient: ClientFactory, params: UnitsMergeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const result = await client.mergeUnits(params.from_unit_id, params.to_unit_id);
    return { success: true, message: "Units merged successfully", result };
  });
}

export function registerFoodTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_foods_list",
    {
      title: "List Foods",
      description: "List foods from Mealie's food database, one page at a time (Mealie's paginated response as returned).",
      inputSchema: PageSchema,
      annotations: READ_ONLY,
    },
    async (params: PageInput) => toToolResult(await foodsList(openClient, params))
  );

  server.registerTool(
    "mealie_foods_create",
    {
      title: "Create Food",
      description: "Create a food, optionally assigning a shopping label.",
      inputSchema: FoodsCreateSchema,
      annotations: WRITE,
    },
    async (params: FoodsCreateInput) => toToolResult(await foodsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_foods_get",
    {
      title: "Get Food",
      description: "Get a food by id.",
      inputSchema: FoodIdSchema,
      annotations: READ_ONLY,
    },
    async (params: FoodIdInput) => toToolResult(await foodsGet(openClient, params))
  );

  server.registerTool(
    "mealie_foods_update",
    {
      title: "Update Food",
      description: "Change a food's name, description or label. Other fields keep their values.",
      inputSchema: FoodsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: FoodsUpdateInput) => toToolResult(await foodsUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_foods_delete",
    {
      title: "Delete Food",
      description: "Delete a food by id.",
      inputSchema: FoodIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: FoodIdInput) => toToolResult(await foodsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_foods_merge",
    {
      title: "Merge Foods",
      description: "Merge one food into another. Recipes using from_food_id are moved to to_food_id and from_food_id is removed.",
      inputSchema: FoodsMergeSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: FoodsMergeInput) => toToolResult(await foodsMerge(openClient, params))
  );

  server.registerTool(
    "mealie_units_list",
    {
      title: "List Units",
      description: "List measurement units, one page at a time (Mealie's paginated response as returned).",
      inputSchema: PageSchema,
      annotations: READ_ONLY,
    },
    async (params: PageInput) => toToolResult(await unitsList(openClient, params))
  );

  server.registerTool(
    "mealie_units_create",
    {
      title: "Create Unit",
      description: "Create a measurement unit, e.g. { \"name\": \"tablespoon\", \"abbreviation\": \"tbsp\" }.",
      inputSchema: UnitsCreateSchema,
      annotations: WRITE,
    },
    async (params: UnitsCreateInput) => toToolResult(await unitsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_units_get",
    {
      title: "Get Unit",
      description: "Get a unit by id.",
      inputSchema: UnitIdSchema,
      annotations: READ_ONLY,
    },
    async (params: UnitIdInput) => toToolResult(await unitsGet(openClient, params))
  );

  server.registerTool(
    "mealie_units_update",
    {
      title: "Update Unit",
      description: "Change a unit's name, description or abbreviation.",
      inputSchema: UnitsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: UnitsUpdateInput) => toToolResult(await unitsUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_units_delete",
    {
      title: "Delete Unit",
      description: "Delete a unit by id.",
      inputSchema: UnitIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: UnitIdInput) => toToolResult(await unitsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_units_merge",
    {
      title: "Merge Units",
      description: "Merge one unit into another; from_unit_id is removed.",
      inputSchema: UnitsMergeSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: UnitsMergeInput) => toToolResult(await unitsMerge(openClient, params))
  );
}
