import { randomUUID } from "node:crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory, MealieClient } from "../services/client.js";
import {
  EmptySchema,
  RecipesSearchSchema,
  RecipeSlugSchema,
  RecipesListSchema,
  RecipesCreateSchema,
  RecipesCreateFromUrlSchema,
  RecipesUpdateSchema,
  RecipesUpdateStructuredIngredientsSchema,
  RecipesDuplicateSchema,
  RecipesUpdateLastMadeSchema,
  RecipesCreateFromUrlsBulkSchema,
  RecipesBulkTagSchema,
  RecipesBulkCategorizeSchema,
  RecipesBulkDeleteSchema,
  RecipesBulkExportSchema,
  RecipesBulkUpdateSettingsSchema,
  RecipesCreateFromImageSchema,
  RecipesUploadImageFromUrlSchema,
  RecipesSetRatingSchema,
  RecipesGetRatingSchema,
} from "../schemas/index.js";
import type {
  RecipesSearchInput,
  RecipeSlugInput,
  RecipesListInput,
  RecipesCreateInput,
  RecipesCreateFromUrlInput,
  RecipesUpdateInput,
  RecipesUpdateStructuredIngredientsInput,
  RecipesDuplicateInput,
  RecipesUpdateLastMadeInput,
  RecipesCreateFromUrlsBulkInput,
  RecipesBulkTagInput,
  RecipesBulkCategorizeInput,
  RecipesBulkDeleteInput,
  RecipesBulkExportInput,
  RecipesBulkUpdateSettingsInput,
  RecipesCreateFromImageInput,
  RecipesUploadImageFromUrlInput,
  RecipesSetRatingInput,
  RecipesGetRatingInput,
} from "../schemas/index.js";
import type { BatchFailure, JsonObject, JsonValue, RecipeSearchItem } from "../types.js";
import {
  asList,
  asObject,
  asObjects,
  errorMessage,
  field,
  isJsonObject,
  namesOf,
  runTool,
  text,
  toToolResult,
} from "../services/helpers.js";
import { resolveCategories, resolveTags } from "../services/organizers.js";
import { logger } from "../services/logger.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export function toSearchItem(recipe: JsonObject): RecipeSearchItem {
  return {
    name: field(recipe, "name"),
    slug: field(recipe, "slug"),
    description: field(recipe, "description"),
    rating: field(recipe, "rating"),
    tags: namesOf(recipe.tags),
    categories: namesOf(recipe.recipeCategory),
  };
}

/** POST /api/recipes answers with the new slug, usually as a bare JSON string. */
export function slugFromResponse(response: JsonValue | null): string {
  if (typeof response === "string") return response.replace(/^"+|"+$/g, "");
  if (isJsonObject(response)) return text(response, "slug") ?? text(response, "id") ?? "";
  return String(response).replace(/^"+|"+$/g, "");
}

function ingredientLines(lines: string[]): JsonObject[] {
  return lines.map((line) => ({ note: line, display: line }));
}

function instructionSteps(steps: string[]): JsonObject[] {
  return steps.map((step) => ({ text: step }));
}

export async function recipesSearch(openClient: ClientFactory, params: RecipesSearchInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const response = await client.searchRecipes({
      search: params.query || undefined,
      tags: params.tags?.length ? params.tags : undefined,
      categories: params.categories?.length ? params.categories : undefined,
      perPage: params.limit,
    });
    if (!isJsonObject(response) || !Array.isArray(response.items)) return response;

    const recipes = asObjects(response.items).map(toSearchItem);
    return { total: response.total ?? recipes.length, count: recipes.length, recipes };
  });
}

export async function recipesGet(openClient: ClientFactory, params: RecipeSlugInput): Promise<string> {
  return runTool(openClient, (client) => client.getRecipe(params.slug));
}

export async function recipesList(openClient: ClientFactory, params: RecipesListInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const response = await client.listRecipes(params.page, params.per_page);
    if (!isJsonObject(response)) return response;
    return {
      page: response.page ?? params.page,
      per_page: response.perPage ?? params.per_page,
      total: response.total ?? 0,
      total_pages: response.totalPages ?? 0,
      items: response.items ?? [],
    };
  });
}

export async function recipesCreate(openClient: ClientFactory, params: RecipesCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const slug = slugFromResponse(await client.createRecipe(params.name));

    const hasDetails = Boolean(
      params.description ||
        params.recipe_yield ||
        params.total_time ||
        params.prep_time ||
        params.cook_time ||
        params.ingredients?.length ||
        params.instructions?.length ||
        params.tags?.length ||
        params.categories?.length
    );

    if (hasDetails) {
      const recipe = asObject(await client.getRecipe(slug));
      const payload: JsonObject = {
        id: field(recipe, "id"),
        userId: field(recipe, "userId"),
        householdId: field(recipe, "householdId"),
        groupId: field(recipe, "groupId"),
        name: params.name,
        slug,
      };
      if (params.description) payload.description = params.description;
      if (params.recipe_yield) payload.recipeYield = params.recipe_yield;
      if (params.total_time) payload.totalTime = params.total_time;
      if (params.prep_time) payload.prepTime = params.prep_time;
      if (params.cook_time) payload.cookTime = params.cook_time;
      if (params.ingredients?.length) payload.recipeIngredient = ingredientLines(params.ingredients);
      if (params.instructions?.length) payload.recipeInstructions = instructionSteps(params.instructions);
      if (params.tags?.length) payload.tags = await resolveTags(client, params.tags);
      if (params.categories?.length) payload.recipeCategory = await resolveCategories(client, params.categories);
      await client.updateRecipe(slug, payload);
    }

    const created = asObject(await client.getRecipe(slug));
    return {
      success: true,
      message: `Recipe '${params.name}' created`,
      recipe: {
        name: field(created, "name"),
        slug: field(created, "slug"),
        id: field(created, "id"),
        description: field(created, "description"),
      },
    };
  });
}

export async function recipesCreateFromUrl(openClient: ClientFactory, params: RecipesCreateFromUrlInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const slug = slugFromResponse(await client.createRecipeFromUrl(params.url, params.include_tags));
    const recipe = asObject(await client.getRecipe(slug));
    return {
      success: true,
      message: "Recipe imported from URL",
      recipe: {
        name: field(recipe, "name"),
        slug: field(recipe, "slug"),
        id: field(recipe, "id"),
        description: field(recipe, "description"),
        orgURL: field(recipe, "orgURL"),
      },
    };
  });
}

export async function recipesUpdate(openClient: ClientFactory, params: RecipesUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { slug } = params;
    const recipe = asObject(await client.getRecipe(slug));
    const keep = (value: string | undefined, key: string): JsonValue => value ?? field(recipe, key);

    const payload: JsonObject = {
      id: field(recipe, "id"),
      userId: field(recipe, "userId"),
      householdId: field(recipe, "householdId"),
      groupId: field(recipe, "groupId"),
      name: keep(params.name, "name"),
      slug,
      description: keep(params.description, "description"),
      recipeYield: keep(params.recipe_yield, "recipeYield"),
      totalTime: keep(params.total_time, "totalTime"),
      prepTime: keep(params.prep_time, "prepTime"),
      cookTime: keep(params.cook_time, "cookTime"),
      orgURL: keep(params.org_url, "orgURL"),
      image: keep(params.image, "image"),
      recipeIngredient: params.ingredients ? ingredientLines(params.ingredients) : asList(recipe.recipeIngredient),
      recipeInstructions: params.instructions
        ? instructionSteps(params.instructions)
        : asList(recipe.recipeInstructions),
    };

    const existingTags = asList(recipe.tags);
    payload.tags = params.tags ? await resolveTags(client, params.tags, existingTags) : existingTags;
    const existingCategories = asList(recipe.recipeCategory);
    payload.recipeCategory = params.categories
      ? await resolveCategories(client, params.categories, existingCategories)
      : existingCategories;

    const scalarChanges = [
      params.name,
      params.description,
      params.recipe_yield,
      params.total_time,
      params.prep_time,
      params.cook_time,
      params.ingredients,
      params.instructions,
      params.org_url,
      params.image,
    ];
    const organizersOnly =
      (params.tags !== undefined || params.categories !== undefined) && scalarChanges.every((v) => v === undefined);
    if (organizersOnly) {
      await client.patchRecipe(slug, payload);
    } else {
      await client.updateRecipe(slug, payload);
    }

    const updated = asObject(await client.getRecipe(slug));
    return {
      success: true,
      message: `Recipe '${text(updated, "name") ?? slug}' updated`,
      recipe: {
        name: field(updated, "name"),
        slug: field(updated, "slug"),
        id: field(updated, "id"),
        description: field(updated, "description"),
        tags: namesOf(updated.tags),
        categories: namesOf(updated.recipeCategory),
      },
    };
  });
}

function ingredientData(parsed: JsonObject): JsonObject {
  return isJsonObject(parsed.ingredient) ? parsed.ingredient : parsed;
}

/** Ensures a unit or food named by the parser exists, creating each name at most once. */
async function ensureNamed(
  kind: "unit" | "food",
  value: JsonValue,
  created: Map<string, string | null>,
  create: (name: string) => Promise<JsonValue | null>
): Promise<JsonValue> {
  if (!isJsonObject(value)) return value;
  const name = text(value, "name");
  if (!name || text(value, "id")) return value;

  if (!created.has(name)) {
    try {
      created.set(name, text(asObject(await create(name)), "id"));
    } catch (error) {
      logger.warn({ kind, name, err: errorMessage(error) }, "Could not create ingredient reference");
      created.set(name, null);
    }
  }
  const id = created.get(name);
  return id ? { ...value, id } : value;
}

function reference(value: JsonValue): JsonValue | undefined {
  if (isJsonObject(value)) {
    const id = text(value, "id");
    const name = field(value, "name");
    if (id) return { id, name };
    return typeof name === "string" && name ? name : undefined;
  }
  return value ? String(value) : undefined;
}

function referenceName(value: JsonValue | undefined): string {
  if (value === undefined) return "";
  if (isJsonObject(value)) return text(value, "name") ?? "";
  return String(value);
}

export function toMealieIngredient(data: JsonObject): JsonObject {
  const ingredient: JsonObject = {};
  if ("quantity" in data) ingredient.quantity = field(data, "quantity");

  const unit = data.unit ? reference(data.unit) : undefined;
  if (unit !== undefined) ingredient.unit = unit;
  const food = data.food ? reference(data.food) : undefined;
  if (food !== undefined) ingredient.food = food;
  if (data.note) ingredient.note = field(data, "note");

  if ("display" in data) {
    ingredient.display = field(data, "display");
  } else {
    const parts: string[] = [];
    if ("quantity" in ingredient) parts.push(String(ingredient.quantity));
    const unitName = referenceName(unit);
    if (unitName) parts.push(unitName);
    const foodName = referenceName(food);
    if (foodName) parts.push(foodName);
    if ("note" in ingredient) parts.push(`(${String(ingredient.note)})`);
    ingredient.display = parts.join(" ");
  }

  ingredient.referenceId = "referenceId" in data ? field(data, "referenceId") : randomUUID();
  ingredient.title = "title" in data ? field(data, "title") : "";
  ingredient.originalText = field(data, "originalText");
  ingredient.referencedRecipe = field(data, "referencedRecipe");
  return ingredient;
}

export async function recipesUpdateStructuredIngredients(
  openClient: ClientFactory,
  params: RecipesUpdateStructuredIngredientsInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const createdUnits = new Map<string, string | null>();
    const createdFoods = new Map<string, string | null>();
    const ingredients: JsonObject[] = [];

    for (const parsed of params.parsed_ingredients) {
      const data = { ...ingredientData(parsed) };
      if (data.unit) {
        data.unit = await ensureNamed("unit", data.unit, createdUnits, (name) => client.createUnit({ name }));
      }
      if (data.food) {
        data.food = await ensureNamed("food", data.food, createdFoods, (name) => client.createFood({ name }));
      }
      ingredients.push(toMealieIngredient(data));
    }

    const updated = asObject(await client.updateRecipeIngredients(params.slug, ingredients));
    return {
      success: true,
      message: `Recipe '${text(updated, "name") ?? params.slug}' updated with ${ingredients.length} structured ingredients`,
      recipe: {
        name: field(updated, "name"),
        slug: field(updated, "slug"),
        id: field(updated, "id"),
        ingredient_count: ingredients.length,
      },
    };
  });
}

export async function recipesDelete(openClient: ClientFactory, params: RecipeSlugInput): Promise<string> {
  return runTool(openClient, async (client) => {
    let recipeName = params.slug;
    try {
      recipeName = text(asObject(await client.getRecipe(params.slug)), "name") ?? params.slug;
    } catch (error) {
      logger.debug({ slug: params.slug, err: errorMessage(error) }, "Recipe lookup before delete failed");
    }
    await client.deleteRecipe(params.slug);
    return { success: true, message: `Recipe '${recipeName}' deleted` };
  });
}

export async function recipesDuplicate(openClient: ClientFactory, params: RecipesDuplicateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const recipe = asObject(await client.duplicateRecipe(params.slug, params.new_name));
    return {
      success: true,
      message: "Recipe duplicated successfully",
      recipe: { name: field(recipe, "name"), slug: field(recipe, "slug"), id: field(recipe, "id") },
    };
  });
}

export async function recipesUpdateLastMade(openClient: ClientFactory, params: RecipesUpdateLastMadeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const recipe = asObject(await client.updateRecipeLastMade(params.slug, params.timestamp));
    return {
      success: true,
      message: `Recipe '${text(recipe, "name") ?? params.slug}' last made timestamp updated`,
      last_made: field(recipe, "lastMade"),
    };
  });
}

export async function recipesCreateFromUrlsBulk(
  openClient: ClientFactory,
  params: RecipesCreateFromUrlsBulkInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const results = await client.createRecipesFromUrlsBulk(params.urls, params.include_tags);
    return { success: true, message: `Bulk import initiated for ${params.urls.length} URLs`, results };
  });
}

/** Bulk actions address recipes by slug; each id is looked up on its own so one bad id does not sink the batch. */
async function slugsForIds(
  client: MealieClient,
  recipeIds: string[]
): Promise<{ slugs: string[]; failures: BatchFailure[] }> {
  const slugs: string[] = [];
  const failures: BatchFailure[] = [];
  for (const recipeId of recipeIds) {
    try {
      const slug = text(asObject(await client.getRecipe(recipeId)), "slug");
      if (!slug) throw new Error(`Recipe ${recipeId} has no slug`);
      slugs.push(slug);
    } catch (error) {
      failures.push({ recipe_id: recipeId, error: errorMessage(error) });
    }
  }
  return { slugs, failures };
}

export async function recipesBulkTag(openClient: ClientFactory, params: RecipesBulkTagInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { slugs, failures } = await slugsForIds(client, params.recipe_ids);
    let results: JsonValue | null = null;
    if (slugs.length > 0) {
      const tags = await resolveTags(client, params.tags);
      results = await client.bulkTagRecipes(slugs, tags);
    }
    return {
      success: failures.length === 0,
      message: `Tagged ${slugs.length} recipes with ${params.tags.length} tag(s)`,
      total: params.recipe_ids.length,
      tagged: slugs.length,
      failed: failures.length,
      failures,
      results,
    };
  });
}

export async function recipesBulkCategorize(openClient: ClientFactory, params: RecipesBulkCategorizeInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const { slugs, failures } = await slugsForIds(client, params.recipe_ids);
    let results: JsonValue | null = null;
    if (slugs.length > 0) {
      const categories = await resolveCategories(client, params.categories);
      results = await client.bulkCategorizeRecipes(slugs, categories);
    }
    return {
      success: failures.length === 0,
      message: `Categorized ${slugs.length} recipes with ${params.categories.length} category(ies)`,
      total: params.recipe_ids.length,
      categorized: slugs.length,
      failed: failures.length,
      failures,
      results,
    };
  });
}

export async function recipesBulkDelete(openClient: ClientFactory, params: RecipesBulkDeleteInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const failures: BatchFailure[] = [];
    let deleted = 0;
    for (const recipeId of params.recipe_ids) {
      try {
        const slug = text(asObject(await client.getRecipe(recipeId)), "slug") ?? recipeId;
        await client.deleteRecipe(slug);
        deleted++;
      } catch (error) {
        failures.push({ recipe_id: recipeId, error: errorMessage(error) });
      }
    }
    return {
      success: failures.length === 0,
      message: `Deleted ${deleted} recipe(s)`,
      total: params.recipe_ids.length,
      deleted,
      failed: failures.length,
      failures,
    };
  });
}

export async function recipesBulkExport(openClient: ClientFactory, params: RecipesBulkExportInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const data = await client.bulkExportRecipes(params.recipe_ids, params.export_format);
    return {
      success: true,
      message: `Exported ${params.recipe_ids.length} recipe(s) as ${params.export_format}`,
      data,
    };
  });
}

export async function recipesBulkUpdateSettings(
  openClient: ClientFactory,
  params: RecipesBulkUpdateSettingsInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const results = await client.bulkUpdateRecipeSettings(params.recipe_ids, params.settings);
    return { success: true, message: `Updated settings for ${params.recipe_ids.length} recipe(s)`, results };
  });
}

export async function recipesCreateFromImage(openClient: ClientFactory, params: RecipesCreateFromImageInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const response = await client.createRecipeFromImage(params.image_data, params.extension);
    const recipe = isJsonObject(response) ? response : { slug: slugFromResponse(response) };
    return {
      success: true,
      message: "Recipe created from image successfully",
      recipe: { name: field(recipe, "name"), slug: field(recipe, "slug"), id: field(recipe, "id") },
    };
  });
}

export async function recipesUploadImageFromUrl(
  openClient: ClientFactory,
  params: RecipesUploadImageFromUrlInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const image = await client.downloadImage(params.image_url);
    await client.uploadRecipeImage(params.slug, image);
    return {
      success: true,
      message: `Image uploaded to recipe '${params.slug}'`,
      extension: image.extension,
      size_bytes: image.data.length,
    };
  });
}

export async function recipesSetRating(openClient: ClientFactory, params: RecipesSetRatingInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const userId = text(asObject(await client.getCurrentUser()), "id");
    if (!userId) throw new Error("Could not determine the current user");
    const result = await client.setRecipeRating(userId, params.slug, params.rating, params.is_favorite);
    return {
      success: true,
      message: `Rated '${params.slug}' ${params.rating}/5`,
      slug: params.slug,
      rating: params.rating,
      is_favorite: params.is_favorite ?? null,
      result,
    };
  });
}

export async function recipesGetRatings(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const ratings = asObjects(await client.listUserRatings()).map((r) => ({
      recipe_id: field(r, "recipeId"),
      rating: field(r, "rating"),
      is_favorite: field(r, "isFavorite"),
    }));
    return { count: ratings.length, ratings };
  });
}

export async function recipesGetRating(openClient: ClientFactory, params: RecipesGetRatingInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const rating = asObject(await client.getRecipeRating(params.recipe_id));
    return {
      recipe_id: field(rating, "recipeId") ?? params.recipe_id,
      rating: field(rating, "rating"),
      is_favorite: field(rating, "isFavorite") ?? false,
    };
  });
}

export function registerRecipeTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_recipes_search",
    {
      title: "Search Mealie Recipes",
      description: `Search recipes by free text, tag names and category names.

Args:
  - query (string, optional): matched against name and description
  - tags (string[], optional), categories (string[], optional): names to filter by
  - limit (number): maximum results, default 10

Returns: { total, count, recipes[{ name, slug, description, rating, tags[], categories[] }] }

Examples:
  - Quick dinners: { "query": "chicken", "tags": ["quick"] }`,
      inputSchema: RecipesSearchSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipesSearchInput) => toToolResult(await recipesSearch(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_get",
    {
      title: "Get Mealie Recipe",
      description: `Get the full recipe (ingredients, instructions, nutrition, tags) by slug.

Args:
  - slug (string): recipe slug, from search or list results`,
      inputSchema: RecipeSlugSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipeSlugInput) => toToolResult(await recipesGet(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_list",
    {
      title: "List Mealie Recipes",
      description: `List recipes page by page.

Returns: { page, per_page, total, total_pages, items[] }`,
      inputSchema: RecipesListSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipesListInput) => toToolResult(await recipesList(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_create",
    {
      title: "Create Mealie Recipe",
      description: `Create a recipe. Tag and category names are looked up and created when missing.

Args:
  - name (string): recipe name
  - description, recipe_yield, total_time, prep_time, cook_time (string, optional)
  - ingredients (string[], optional): one ingredient per line
  - instructions (string[], optional): one step per entry
  - tags, categories (string[], optional)

Returns: { success, message, recipe: { name, slug, id, description } }

Error Handling:
  - 409 Conflict when a recipe with the same name already exists`,
      inputSchema: RecipesCreateSchema,
      annotations: WRITE,
    },
    async (params: RecipesCreateInput) => toToolResult(await recipesCreate(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_create_from_url",
    {
      title: "Import Recipe From URL",
      description: `Scrape a recipe web page into Mealie.

Returns: { success, message, recipe: { name, slug, id, description, orgURL } }`,
      inputSchema: RecipesCreateFromUrlSchema,
      annotations: WRITE,
    },
    async (params: RecipesCreateFromUrlInput) => toToolResult(await recipesCreateFromUrl(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_update",
    {
      title: "Update Mealie Recipe",
      description: `Update a recipe. Omitted fields keep their current values.

Ingredients and instructions replace the existing lists. Tags and categories are ADDED to the
recipe's existing ones; when only tags or categories change the recipe is patched instead of replaced.

Returns: { success, message, recipe: { name, slug, id, description, tags[], categories[] } }`,
      inputSchema: RecipesUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesUpdateInput) => toToolResult(await recipesUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_update_structured_ingredients",
    {
      title: "Set Structured Recipe Ingredients",
      description: `Replace a recipe's ingredients with parsed ones (quantity, unit, food, note).

Units and foods named without an id are created first. Feed this the parsed_ingredients
returned by mealie_parser_ingredients_batch.

Returns: { success, message, recipe: { name, slug, id, ingredient_count } }`,
      inputSchema: RecipesUpdateStructuredIngredientsSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesUpdateStructuredIngredientsInput) =>
      toToolResult(await recipesUpdateStructuredIngredients(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_delete",
    {
      title: "Delete Mealie Recipe",
      description: "Delete a recipe by slug. This cannot be undone.",
      inputSchema: RecipeSlugSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: RecipeSlugInput) => toToolResult(await recipesDelete(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_duplicate",
    {
      title: "Duplicate Mealie Recipe",
      description: "Copy a recipe, optionally under a new name.",
      inputSchema: RecipesDuplicateSchema,
      annotations: WRITE,
    },
    async (params: RecipesDuplicateInput) => toToolResult(await recipesDuplicate(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_update_last_made",
    {
      title: "Mark Recipe As Made",
      description: "Set when a recipe was last made (defaults to now).",
      inputSchema: RecipesUpdateLastMadeSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesUpdateLastMadeInput) => toToolResult(await recipesUpdateLastMade(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_create_from_urls_bulk",
    {
      title: "Import Recipes From URLs",
      description: "Start a bulk import of several recipe URLs. Mealie imports them in the background.",
      inputSchema: RecipesCreateFromUrlsBulkSchema,
      annotations: WRITE,
    },
    async (params: RecipesCreateFromUrlsBulkInput) => toToolResult(await recipesCreateFromUrlsBulk(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_bulk_tag",
    {
      title: "Tag Recipes In Bulk",
      description: `Add tags to several recipes. Recipes that cannot be found are reported in failures.

Returns: { success, message, total, tagged, failed, failures[{ recipe_id, error }], results }`,
      inputSchema: RecipesBulkTagSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesBulkTagInput) => toToolResult(await recipesBulkTag(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_bulk_categorize",
    {
      title: "Categorize Recipes In Bulk",
      description: `Add categories to several recipes. Recipes that cannot be found are reported in failures.

Returns: { success, message, total, categorized, failed, failures[{ recipe_id, error }], results }`,
      inputSchema: RecipesBulkCategorizeSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesBulkCategorizeInput) => toToolResult(await recipesBulkCategorize(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_bulk_delete",
    {
      title: "Delete Recipes In Bulk",
      description: `Delete several recipes by id. Each deletion is attempted even if others fail.

Returns: { success, message, total, deleted, failed, failures[{ recipe_id, error }] }`,
      inputSchema: RecipesBulkDeleteSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: RecipesBulkDeleteInput) => toToolResult(await recipesBulkDelete(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_bulk_export",
    {
      title: "Export Recipes In Bulk",
      description: "Export several recipes in the given format.",
      inputSchema: RecipesBulkExportSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipesBulkExportInput) => toToolResult(await recipesBulkExport(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_bulk_update_settings",
    {
      title: "Update Recipe Settings In Bulk",
      description: "Apply the same settings (public, showNutrition, locked, ...) to several recipes.",
      inputSchema: RecipesBulkUpdateSettingsSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesBulkUpdateSettingsInput) => toToolResult(await recipesBulkUpdateSettings(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_create_from_image",
    {
      title: "Create Recipe From Image",
      description: "Create a recipe from a photo using Mealie's AI import (experimental; needs OpenAI configured in Mealie).",
      inputSchema: RecipesCreateFromImageSchema,
      annotations: WRITE,
    },
    async (params: RecipesCreateFromImageInput) => toToolResult(await recipesCreateFromImage(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_upload_image_from_url",
    {
      title: "Set Recipe Image From URL",
      description: "Download an image and set it as the recipe's image.",
      inputSchema: RecipesUploadImageFromUrlSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesUploadImageFromUrlInput) => toToolResult(await recipesUploadImageFromUrl(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_set_rating",
    {
      title: "Rate Recipe",
      description: `Rate a recipe for the current user (0 to 5, 0 clears) and optionally mark it as a favorite.

Examples:
  - { "slug": "chicken-parmesan", "rating": 4.5, "is_favorite": true }`,
      inputSchema: RecipesSetRatingSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: RecipesSetRatingInput) => toToolResult(await recipesSetRating(openClient, params))
  );

  server.registerTool(
    "mealie_recipes_get_ratings",
    {
      title: "List My Recipe Ratings",
      description: "List every rating and favorite of the current user. Returns: { count, ratings[{ recipe_id, rating, is_favorite }] }",
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await recipesGetRatings(openClient))
  );

  server.registerTool(
    "mealie_recipes_get_rating",
    {
      title: "Get My Recipe Rating",
      description: "Get the current user's rating for one recipe by id.",
      inputSchema: RecipesGetRatingSchema,
      annotations: READ_ONLY,
    },
    async (params: RecipesGetRatingInput) => toToolResult(await recipesGetRating(openClient, params))
  );
}
