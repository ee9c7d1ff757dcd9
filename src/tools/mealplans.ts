import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory, MealieClient } from "../services/client.js";
import {
  EmptySchema,
  DateRangeSchema,
  MealplanIdSchema,
  MealplansGetDateSchema,
  MealplansCreateSchema,
  MealplansUpdateSchema,
  MealplansSearchSchema,
  MealplansUpdateBatchSchema,
  MealplanRuleIdSchema,
  MealplanRulesCreateSchema,
  MealplanRulesUpdateSchema,
} from "../schemas/index.js";
import type {
  DateRangeInput,
  MealplanIdInput,
  MealplansGetDateInput,
  MealplansCreateInput,
  MealplansUpdateInput,
  MealplansSearchInput,
  MealplansUpdateBatchInput,
  MealplanRuleIdInput,
  MealplanRulesCreateInput,
  MealplanRulesUpdateInput,
} from "../schemas/index.js";
import { CLEAR_FIELD, MEAL_ENTRY_TYPES, RANDOM_SUGGESTION_POOL } from "../constants.js";
import type { MealEntryType } from "../constants.js";
import type { BatchFailure, JsonObject, JsonValue, MealplanEntry, MealSlot } from "../types.js";
import {
  addDays,
  asList,
  asObject,
  asObjects,
  compact,
  errorMessage,
  field,
  isJsonObject,
  namesOf,
  runTool,
  text,
  today,
  toToolResult,
} from "../services/helpers.js";
import { resolveCategories, resolveTags } from "../services/organizers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export function toMealplanEntry(entry: JsonObject): MealplanEntry {
  const recipe = isJsonObject(entry.recipe) ? entry.recipe : null;
  return {
    id: field(entry, "id"),
    date: field(entry, "date"),
    entry_type: field(entry, "entryType"),
    title: field(entry, "title"),
    text: field(entry, "text"),
    recipe_id: field(entry, "recipeId"),
    recipe_name: field(recipe, "name"),
    recipe_slug: field(recipe, "slug"),
  };
}

/** Groups entries by lower-cased entry type, dropping the fields the grouping already implies. */
export function groupByEntryType(entries: JsonObject[]): Record<string, MealSlot[]> {
  const meals: Record<string, MealSlot[]> = {};
  for (const entry of entries) {
    const { date: _date, entry_type: _type, ...slot } = toMealplanEntry(entry);
    const type = (text(entry, "entryType") ?? "meal").toLowerCase();
    (meals[type] ??= []).push(slot);
  }
  return meals;
}

export function normalizeEntryType(value: string): MealEntryType | null {
  const lowered = value.toLowerCase();
  return MEAL_ENTRY_TYPES.find((type) => type === lowered) ?? null;
}

function invalidEntryType(value: string): { error: string } {
  return { error: `Invalid entry_type '${value}'. Must be one of: ${MEAL_ENTRY_TYPES.join(", ")}` };
}

function resolveRange(range: { start_date?: string; end_date?: string }, spanDays: number) {
  const start = range.start_date ?? today();
  return { start, end: range.end_date ?? addDays(start, spanDays) };
}

async function fetchRange(client: MealieClient, start: string, end: string): Promise<JsonObject[]> {
  return asObjects(await client.listMealplans(start, end));
}

export function clearable(value: string | undefined): JsonValue | undefined {
  return value === CLEAR_FIELD ? null : value;
}

interface MealplanChange {
  mealplan_id: string;
  meal_date?: string;
  entry_type?: string;
  recipe_id?: string;
  title?: string;
  text?: string;
}

/**
 * Mealie replaces the whole entry on PUT, so the current entry is fetched first.
 * Fields not passed keep their value and are left out entirely when the entry
 * never had them; `__CLEAR__` sends an explicit null.
 */
async function applyMealplanChange(client: MealieClient, change: MealplanChange): Promise<JsonValue | null> {
  const entryType = change.entry_type !== undefined ? normalizeEntryType(change.entry_type) : undefined;
  if (entryType === null) throw new Error(invalidEntryType(change.entry_type ?? "").error);

  const existing = await client.getMealplan(change.mealplan_id);
  if (!isJsonObject(existing)) throw new Error(`Meal plan entry '${change.mealplan_id}' not found`);

  const payload: JsonObject = {
    id: change.mealplan_id,
    date: change.meal_date ?? field(existing, "date"),
    entryType: entryType ?? field(existing, "entryType"),
  };
  const carry = (value: string | undefined, key: string) => {
    const next = clearable(value);
    if (next !== undefined) payload[key] = next;
    else if (key in existing) payload[key] = field(existing, key);
  };
  carry(change.recipe_id, "recipeId");
  carry(change.title, "title");
  carry(change.text, "text");

  return client.updateMealplan(change.mealplan_id, payload);
}

export async function mealplansList(openClient: ClientFactory, params: DateRangeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { start, end } = resolveRange(params, 7);
    const entries = (await fetchRange(client, start, end)).map(toMealplanEntry);
    return { start_date: start, end_date: end, count: entries.length, entries };
  });
}

export async function mealplansToday(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const entries = asObjects(await client.getTodayMealplans());
    return { date: today(), count: entries.length, meals: groupByEntryType(entries) };
  });
}

export async function mealplansGet(openClient: ClientFactory, params: MealplanIdInput): Promise<string> {
  return runTool(openClient, (client) => client.getMealplan(params.mealplan_id));
}

export async function mealplansGetDate(openClient: ClientFactory, params: MealplansGetDateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const entries = await fetchRange(client, params.meal_date, params.meal_date);
    return { date: params.meal_date, count: entries.length, meals: groupByEntryType(entries) };
  });
}

export async function mealplansCreate(openClient: ClientFactory, params: MealplansCreateInput): Promise<string> {
  const entryType = normalizeEntryType(params.entry_type);
  if (entryType === null) return JSON.stringify(invalidEntryType(params.entry_type), null, 2);

  return runTool(openClient, async (client) => {
    const payload = compact({
      date: params.meal_date,
      entryType,
      recipeId: params.recipe_id || undefined,
      title: params.title || undefined,
      text: params.text || undefined,
    });
    const entry = await client.createMealplan(payload);
    return { success: true, message: `Meal plan entry created for ${params.meal_date}`, entry };
  });
}

export async function mealplansUpdate(openClient: ClientFactory, params: MealplansUpdateInput): Promise<string> {
  if (params.entry_type !== undefined && normalizeEntryType(params.entry_type) === null) {
    return JSON.stringify(invalidEntryType(params.entry_type), null, 2);
  }
  return runTool(openClient, async (client) => {
    const entry = await applyMealplanChange(client, params);
    return { success: true, message: `Meal plan entry '${params.mealplan_id}' updated`, entry };
  });
}

export async function mealplansDelete(openClient: ClientFactory, params: MealplanIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteMealplan(params.mealplan_id);
    return { success: true, message: `Meal plan entry '${params.mealplan_id}' deleted` };
  });
}

export async function mealplansRandom(
  openClient: ClientFactory,
  pick: (count: number) => number = (count) => Math.floor(Math.random() * count)
): Promise<string> {
  return runTool(openClient, async (client) => {
    const recipes = asObjects(await client.listRecipes(1, RANDOM_SUGGESTION_POOL));
    if (recipes.length === 0) return { error: "No recipes available for suggestion" };
    const recipe = recipes[pick(recipes.length)] ?? recipes[0];
    return {
      success: true,
      suggestion: {
        recipe_id: field(recipe, "id"),
        name: field(recipe, "name"),
        slug: field(recipe, "slug"),
        description: field(recipe, "description"),
        total_time: field(recipe, "totalTime"),
        tags: namesOf(recipe?.tags),
      },
    };
  });
}

export function matchesQuery(entry: MealplanEntry, query: string): boolean {
  const needle = query.toLowerCase();
  return [entry.recipe_name, entry.title, entry.text].some(
    (value) => typeof value === "string" && value.toLowerCase().includes(needle)
  );
}

export async function mealplansSearch(openClient: ClientFactory, params: MealplansSearchInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { start, end } = resolveRange(params, 7);
    const matches = (await fetchRange(client, start, end))
      .map(toMealplanEntry)
      .filter((entry) => matchesQuery(entry, params.query));
    return { query: params.query, start_date: start, end_date: end, count: matches.length, meal_plans: matches };
  });
}

export async function mealplansDeleteRange(openClient: ClientFactory, params: DateRangeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { start, end } = resolveRange(params, 7);
    const entries = await fetchRange(client, start, end);
    const failures: BatchFailure[] = [];
    let deleted = 0;
    for (const entry of entries) {
      const id = String(field(entry, "id"));
      try {
        await client.deleteMealplan(id);
        deleted++;
      } catch (error) {
        failures.push({ mealplan_id: id, error: errorMessage(error) });
      }
    }
    return {
      success: failures.length === 0,
      message: `Deleted ${deleted} of ${entries.length} meal plan entries`,
      start_date: start,
      end_date: end,
      total: entries.length,
      deleted,
      failed: failures.length,
      failures,
    };
  });
}

export async function mealplansUpdateBatch(openClient: ClientFactory, params: MealplansUpdateBatchInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const failures: BatchFailure[] = [];
    const entries: JsonValue[] = [];
    for (const change of params.updates) {
      try {
        entries.push(await applyMealplanChange(client, change));
      } catch (error) {
        failures.push({ mealplan_id: change.mealplan_id, error: errorMessage(error) });
      }
    }
    return {
      success: failures.length === 0,
      message: `Updated ${entries.length} of ${params.updates.length} meal plan entries`,
      total: params.updates.length,
      updated: entries.length,
      failed: failures.length,
      failures,
      entries,
    };
  });
}

export async function mealplanRulesList(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const rules = asList(await client.listMealplanRules());
    return { count: rules.length, rules };
  });
}

export async function mealplanRulesGet(openClient: ClientFactory, params: MealplanRuleIdInput): Promise<string> {
  return runTool(openClient, (client) => client.getMealplanRule(params.rule_id));
}

export async function mealplanRulesCreate(openClient: ClientFactory, params: MealplanRulesCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const rule = await client.createMealplanRule({
      name: params.name,
      entryType: params.entry_type.toLowerCase(),
      tags: params.tags?.length ? await resolveTags(client, params.tags) : [],
      categories: params.categories?.length ? await resolveCategories(client, params.categories) : [],
    });
    return { success: true, message: `Meal plan rule '${params.name}' created`, rule };
  });
}

export async function mealplanRulesUpdate(openClient: ClientFactory, params: MealplanRulesUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const changes = compact({
      name: params.name,
      entryType: params.entry_type?.toLowerCase(),
      tags: params.tags ? await resolveTags(client, params.tags) : undefined,
      categories: params.categories ? await resolveCategories(client, params.categories) : undefined,
    });
    const rule = await client.updateMealplanRule(params.rule_id, changes);
    return { success: true, message: `Meal plan rule '${params.rule_id}' updated`, rule: asObject(rule) };
  });
}

export async function mealplanRulesDelete(openClient: ClientFactory, params: MealplanRuleIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteMealplanRule(params.rule_id);
    return { success: true, message: `Meal plan rule '${params.rule_id}' deleted` };
  });
}

export function registerMealplanTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_mealplans_list",
    {
      title: "List Meal Plan Entries",
      description: `List meal plan entries in a date range.

Args:
  - start_date (YYYY-MM-DD, optional): defaults to today
  - end_date (YYYY-MM-DD, optional): defaults to 7 days after start_date

Returns: { start_date, end_date, count, entries[{ id, date, entry_type, title, text, recipe_id, recipe_name, recipe_slug }] }`,
      inputSchema: DateRangeSchema,
      annotations: READ_ONLY,
    },
    async (params: DateRangeInput) => toToolResult(await mealplansList(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_today",
    {
      title: "Today's Meals",
      description: "Get today's planned meals grouped by meal type. Returns: { date, count, meals: { breakfast: [...], dinner: [...] } }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await mealplansToday(openClient))
  );

  server.registerTool(
    "mealie_mealplans_get",
    {
      title: "Get Meal Plan Entry",
      description: "Get one meal plan entry by id.",
      inputSchema: MealplanIdSchema,
      annotations: READ_ONLY,
    },
    async (params: MealplanIdInput) => toToolResult(await mealplansGet(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_get_date",
    {
      title: "Meals On A Date",
      description: "Get the meals planned for one date, grouped by meal type.",
      inputSchema: MealplansGetDateSchema,
      annotations: READ_ONLY,
    },
    async (params: MealplansGetDateInput) => toToolResult(await mealplansGetDate(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_create",
    {
      title: "Plan A Meal",
      description: `Add a meal plan entry, either for a recipe or as a free-text note.

Args:
  - meal_date (YYYY-MM-DD)
  - entry_type: breakfast, lunch, dinner, side or snack (case-insensitive)
  - recipe_id (optional), title (optional), text (optional)

Examples:
  - { "meal_date": "2025-03-14", "entry_type": "dinner", "recipe_id": "<uuid>" }
  - { "meal_date": "2025-03-15", "entry_type": "lunch", "title": "Leftovers" }`,
      inputSchema: MealplansCreateSchema,
      annotations: WRITE,
    },
    async (params: MealplansCreateInput) => toToolResult(await mealplansCreate(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_update",
    {
      title: "Update Meal Plan Entry",
      description: `Change a meal plan entry. Omitted fields keep their values.

Pass '${CLEAR_FIELD}' as recipe_id, title or text to remove that field (for example to turn a recipe
entry into a note).`,
      inputSchema: MealplansUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: MealplansUpdateInput) => toToolResult(await mealplansUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_delete",
    {
      title: "Delete Meal Plan Entry",
      description: "Delete one meal plan entry by id.",
      inputSchema: MealplanIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: MealplanIdInput) => toToolResult(await mealplansDelete(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_random",
    {
      title: "Suggest A Random Recipe",
      description: "Suggest a random recipe to plan. Returns: { success, suggestion: { recipe_id, name, slug, description, total_time, tags[] } }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await mealplansRandom(openClient))
  );

  server.registerTool(
    "mealie_mealplans_search",
    {
      title: "Search Meal Plans",
      description: `Find planned meals whose recipe name, title or text contains the query (case-insensitive).

Returns: { query, start_date, end_date, count, meal_plans[] }`,
      inputSchema: MealplansSearchSchema,
      annotations: READ_ONLY,
    },
    async (params: MealplansSearchInput) => toToolResult(await mealplansSearch(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_delete_range",
    {
      title: "Clear Meal Plan Range",
      description: `Delete every meal plan entry in a date range. Each deletion is attempted even if others fail.

Returns: { success, start_date, end_date, total, deleted, failed, failures[{ mealplan_id, error }] }`,
      inputSchema: DateRangeSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: DateRangeInput) => toToolResult(await mealplansDeleteRange(openClient, params))
  );

  server.registerTool(
    "mealie_mealplans_update_batch",
    {
      title: "Update Meal Plan Entries In Batch",
      description: `Apply several entry updates. Each update takes the same fields as mealie_mealplans_update.

Returns: { success, total, updated, failed, failures[{ mealplan_id, error }], entries[] }`,
      inputSchema: MealplansUpdateBatchSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: MealplansUpdateBatchInput) => toToolResult(await mealplansUpdateBatch(openClient, params))
  );

  server.registerTool(
    "mealie_mealplan_rules_list",
    {
      title: "List Meal Plan Rules",
      description: "List the rules that steer random meal plan suggestions.",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await mealplanRulesList(openClient))
  );

  server.registerTool(
    "mealie_mealplan_rules_get",
    {
      title: "Get Meal Plan Rule",
      description: "Get one meal plan rule by id.",
      inputSchema: MealplanRuleIdSchema,
      annotations: READ_ONLY,
    },
    async (params: MealplanRuleIdInput) => toToolResult(await mealplanRulesGet(openClient, params))
  );

  server.registerTool(
    "mealie_mealplan_rules_create",
    {
      title: "Create Meal Plan Rule",
      description: "Create a rule limiting suggestions for a meal type to recipes with the given tags or categories (names are created when missing).",
      inputSchema: MealplanRulesCreateSchema,
      annotations: WRITE,
    },
    async (params: MealplanRulesCreateInput) => toToolResult(await mealplanRulesCreate(openClient, params))
  );

  server.registerTool(
    "mealie_mealplan_rules_update",
    {
      title: "Update Meal Plan Rule",
      description: "Change a meal plan rule. Tags and categories, when given, replace the rule's current ones.",
      inputSchema: MealplanRulesUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: MealplanRulesUpdateInput) => toToolResult(await mealplanRulesUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_mealplan_rules_delete",
    {
      title: "Delete Meal Plan Rule",
      description: "Delete a meal plan rule by id.",
      inputSchema: MealplanRuleIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: MealplanRuleIdInput) => toToolResult(await mealplanRulesDelete(openClient, params))
  );
}
