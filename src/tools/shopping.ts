import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import {
  EmptySchema,
  ShoppingListIdSchema,
  ShoppingListsCreateSchema,
  ShoppingItemsAddSchema,
  ShoppingItemsAddBulkSchema,
  ShoppingItemsCheckSchema,
  ShoppingItemIdSchema,
  ShoppingAddRecipeSchema,
  ShoppingGenerateFromMealplanSchema,
  ShoppingDeleteRecipeFromListSchema,
} from "../schemas/index.js";
import type {
  ShoppingListIdInput,
  ShoppingListsCreateInput,
  ShoppingItemsAddInput,
  ShoppingItemsAddBulkInput,
  ShoppingItemsCheckInput,
  ShoppingItemIdInput,
  ShoppingAddRecipeInput,
  ShoppingGenerateFromMealplanInput,
  ShoppingDeleteRecipeFromListInput,
} from "../schemas/index.js";
import type { BatchFailure, JsonObject, JsonValue, ShoppingItemSummary } from "../types.js";
import {
  addDays,
  asList,
  asObject,
  asObjects,
  compact,
  errorMessage,
  field,
  isJsonObject,
  runTool,
  shortDateLabel,
  text,
  today,
  toToolResult,
} from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

function nameOf(value: JsonValue): JsonValue {
  return isJsonObject(value) ? field(value, "name") : value ?? null;
}

export function toShoppingItem(item: JsonObject): ShoppingItemSummary {
  return {
    id: field(item, "id"),
    checked: item.checked === true,
    quantity: field(item, "quantity"),
    unit: nameOf(field(item, "unit")),
    food: nameOf(field(item, "food")),
    note: field(item, "note"),
    display: field(item, "display"),
  };
}

export function listItems(list: JsonObject): JsonObject[] {
  return asObjects(field(list, "listItems"));
}

export function summarizeShoppingList(list: JsonObject) {
  const items = listItems(list).map(toShoppingItem);
  const purchased = items.filter((item) => item.checked);
  const toBuy = items.filter((item) => !item.checked);
  return {
    id: field(list, "id"),
    name: field(list, "name"),
    created_at: field(list, "createdAt"),
    updated_at: field(list, "updateAt"),
    items,
    to_buy: toBuy,
    purchased,
    total_items: items.length,
    checked_count: purchased.length,
    progress: `${purchased.length}/${items.length}`,
  };
}

export async function shoppingListsList(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const lists = asObjects(await client.listShoppingLists()).map((list) => {
      const items = listItems(list);
      const checked = items.filter((item) => item.checked === true).length;
      return {
        id: field(list, "id"),
        name: field(list, "name"),
        created_at: field(list, "createdAt"),
        updated_at: field(list, "updateAt"),
        total_items: items.length,
        checked_items: checked,
        unchecked_items: items.length - checked,
      };
    });
    return { count: lists.length, lists };
  });
}

export async function shoppingListsGet(openClient: ClientFactory, params: ShoppingListIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const list = await client.getShoppingList(params.list_id);
    if (!isJsonObject(list)) return { error: `Shopping list '${params.list_id}' not found` };
    return summarizeShoppingList(list);
  });
}

export async function shoppingListsCreate(openClient: ClientFactory, params: ShoppingListsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const list = asObject(await client.createShoppingList(params.name));
    return {
      success: true,
      message: `Shopping list '${params.name}' created`,
      list: { id: field(list, "id"), name: field(list, "name"), created_at: field(list, "createdAt") },
    };
  });
}

export async function shoppingListsDelete(openClient: ClientFactory, params: ShoppingListIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteShoppingList(params.list_id);
    return { success: true, message: `Shopping list '${params.list_id}' deleted` };
  });
}

export async function shoppingItemsAdd(openClient: ClientFactory, params: ShoppingItemsAddInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const item = await client.addShoppingItem(
      compact({
        shoppingListId: params.list_id,
        note: params.note || undefined,
        quantity: params.quantity,
        unitId: params.unit_id || undefined,
        foodId: params.food_id || undefined,
        display: params.display || undefined,
      })
    );
    return { success: true, message: "Item added to shopping list", item };
  });
}

export async function shoppingItemsAddBulk(openClient: ClientFactory, params: ShoppingItemsAddBulkInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const failures: BatchFailure[] = [];
    let added = 0;
    for (const note of params.items) {
      try {
        await client.addShoppingItem({ shoppingListId: params.list_id, note });
        added++;
      } catch (error) {
        failures.push({ item: note, error: errorMessage(error) });
      }
    }
    return {
      success: failures.length === 0,
      message: `Added ${added} of ${params.items.length} items`,
      total: params.items.length,
      added,
      failed: failures.length,
      failures,
    };
  });
}

/** Mealie's item PUT wants the whole item, so the current one is merged with the new state. */
export async function shoppingItemsCheck(openClient: ClientFactory, params: ShoppingItemsCheckInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getShoppingItem(params.item_id));
    const item = await client.updateShoppingItem(params.item_id, {
      ...current,
      id: params.item_id,
      checked: params.checked,
    });
    return {
      success: true,
      message: `Item '${params.item_id}' marked as ${params.checked ? "checked" : "unchecked"}`,
      item,
    };
  });
}

export async function shoppingItemsDelete(openClient: ClientFactory, params: ShoppingItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteShoppingItem(params.item_id);
    return { success: true, message: `Item '${params.item_id}' removed from shopping list` };
  });
}

export async function shoppingAddRecipe(openClient: ClientFactory, params: ShoppingAddRecipeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const list = await client.addRecipeToShoppingList(params.list_id, params.recipe_id, params.scale);
    return { success: true, message: "Recipe ingredients added to shopping list", list };
  });
}

export async function shoppingDeleteRecipeFromList(
  openClient: ClientFactory,
  params: ShoppingDeleteRecipeFromListInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const list = await client.removeRecipeFromShoppingList(params.item_id, params.recipe_id);
    return {
      success: true,
      message: `Recipe '${params.recipe_id}' ingredients removed from shopping list '${params.item_id}'`,
      list,
    };
  });
}

export async function shoppingGenerateFromMealplan(
  openClient: ClientFactory,
  params: ShoppingGenerateFromMealplanInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const start = params.start_date ?? today();
    const end = params.end_date ?? addDays(start, 6);
    const range = { start_date: start, end_date: end };

    const entries = asObjects(await client.listMealplans(start, end));
    if (entries.length === 0) return { error: "No meal plans found for the specified date range", ...range };

    const recipeIds = entries.map((entry) => text(entry, "recipeId")).filter((id): id is string => !!id);
    if (recipeIds.length === 0) {
      return { error: "No recipes found in meal plan for the specified date range", ...range };
    }

    const listName = params.list_name ?? `Meal Plan - ${shortDateLabel(start)} to ${shortDateLabel(end)}`;
    const listId = text(asObject(await client.createShoppingList(listName)), "id");
    if (listId === null) return { error: "Failed to create shopping list" };

    const failures: BatchFailure[] = [];
    let processed = 0;
    for (const recipeId of recipeIds) {
      try {
        await client.addRecipeToShoppingList(listId, recipeId, 1);
        processed++;
      } catch (error) {
        failures.push({ recipe_id: recipeId, error: errorMessage(error) });
      }
    }

    const finalList = await client.getShoppingList(listId);
    const itemCount = isJsonObject(finalList) ? listItems(finalList).length : 0;
    const result: JsonObject = {
      success: true,
      message: `Shopping list '${listName}' created with ${itemCount} items`,
      list_id: listId,
      list_name: listName,
      date_range: { start, end },
      recipes_processed: processed,
      total_items: itemCount,
    };
    if (failures.length > 0) result.recipes_failed = failures;
    return result;
  });
}

export async function shoppingClearChecked(openClient: ClientFactory, params: ShoppingListIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const list = await client.getShoppingList(params.list_id);
    if (!isJsonObject(list)) return { error: `Shopping list '${params.list_id}' not found` };

    const checkedIds = asList(field(list, "listItems"))
      .filter(isJsonObject)
      .filter((item) => item.checked === true)
      .map((item) => text(item, "id"))
      .filter((id): id is string => id !== null);

    const failures: BatchFailure[] = [];
    let removed = 0;
    for (const id of checkedIds) {
      try {
        await client.deleteShoppingItem(id);
        removed++;
      } catch (error) {
        failures.push({ item_id: id, error: errorMessage(error) });
      }
    }
    return {
      success: failures.length === 0,
      message: checkedIds.length === 0 ? "No checked items to remove" : `Removed ${removed} checked items`,
      total: checkedIds.length,
      removed,
      failed: failures.length,
      failures,
    };
  });
}

export function registerShoppingTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_shopping_lists_list",
    {
      title: "List Shopping Lists",
      description: `List all shopping lists with item counts.

Returns: { count, lists[{ id, name, created_at, updated_at, total_items, checked_items, unchecked_items }] }`,
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await shoppingListsList(openClient))
  );

  server.registerTool(
    "mealie_shopping_lists_get",
    {
      title: "Get Shopping List",
      description: `Get a shopping list with its items split into what is still to buy and what is purchased.

Returns: { id, name, items, to_buy, purchased, total_items, checked_count, progress: "checked/total" }`,
      inputSchema: ShoppingListIdSchema,
      annotations: READ_ONLY,
    },
    async (params: ShoppingListIdInput) => toToolResult(await shoppingListsGet(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_lists_create",
    {
      title: "Create Shopping List",
      description: "Create an empty shopping list.",
      inputSchema: ShoppingListsCreateSchema,
      annotations: WRITE,
    },
    async (params: ShoppingListsCreateInput) => toToolResult(await shoppingListsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_lists_delete",
    {
      title: "Delete Shopping List",
      description: "Delete a shopping list and its items.",
      inputSchema: ShoppingListIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ShoppingListIdInput) => toToolResult(await shoppingListsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_items_add",
    {
      title: "Add Shopping Item",
      description: `Add one item to a shopping list. A free-text note is the simplest form.

Examples:
  - { "list_id": "<uuid>", "note": "2 lbs chicken breast" }
  - { "list_id": "<uuid>", "quantity": 3, "unit_id": "<uuid>", "food_id": "<uuid>" }`,
      inputSchema: ShoppingItemsAddSchema,
      annotations: WRITE,
    },
    async (params: ShoppingItemsAddInput) => toToolResult(await shoppingItemsAdd(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_items_add_bulk",
    {
      title: "Add Shopping Items In Bulk",
      description: `Add several note items to a list. Each item is attempted even if others fail.

Returns: { success, message, total, added, failed, failures[{ item, error }] }`,
      inputSchema: ShoppingItemsAddBulkSchema,
      annotations: WRITE,
    },
    async (params: ShoppingItemsAddBulkInput) => toToolResult(await shoppingItemsAddBulk(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_items_check",
    {
      title: "Check Shopping Item",
      description: "Mark an item as purchased (checked=true) or put it back on the list (checked=false).",
      inputSchema: ShoppingItemsCheckSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: ShoppingItemsCheckInput) => toToolResult(await shoppingItemsCheck(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_items_delete",
    {
      title: "Remove Shopping Item",
      description: "Remove one item from its shopping list.",
      inputSchema: ShoppingItemIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ShoppingItemIdInput) => toToolResult(await shoppingItemsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_add_recipe",
    {
      title: "Add Recipe To Shopping List",
      description: "Add a recipe's ingredients to a shopping list, optionally scaled.",
      inputSchema: ShoppingAddRecipeSchema,
      annotations: WRITE,
    },
    async (params: ShoppingAddRecipeInput) => toToolResult(await shoppingAddRecipe(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_delete_recipe_from_list",
    {
      title: "Remove Recipe From Shopping List",
      description: "Remove the ingredients a recipe contributed to a shopping list. item_id is the shopping list id.",
      inputSchema: ShoppingDeleteRecipeFromListSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ShoppingDeleteRecipeFromListInput) =>
      toToolResult(await shoppingDeleteRecipeFromList(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_generate_from_mealplan",
    {
      title: "Shopping List From Meal Plan",
      description: `Create a shopping list holding the ingredients of every recipe planned in a date range.

Args:
  - start_date (YYYY-MM-DD, optional): defaults to today
  - end_date (YYYY-MM-DD, optional): defaults to 6 days after start_date
  - list_name (optional): defaults to "Meal Plan - Mon DD to Mon DD"

Returns: { success, message, list_id, list_name, date_range, recipes_processed, total_items, recipes_failed? }`,
      inputSchema: ShoppingGenerateFromMealplanSchema,
      annotations: WRITE,
    },
    async (params: ShoppingGenerateFromMealplanInput) =>
      toToolResult(await shoppingGenerateFromMealplan(openClient, params))
  );

  server.registerTool(
    "mealie_shopping_clear_checked",
    {
      title: "Clear Checked Items",
      description: `Remove every checked item from a shopping list.

Returns: { success, message, total, removed, failed, failures[{ item_id, error }] }`,
      inputSchema: ShoppingListIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ShoppingListIdInput) => toToolResult(await shoppingClearChecked(openClient, params))
  );
}
