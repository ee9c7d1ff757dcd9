import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory, MealieClient } from "../services/client.js";
import type { JsonObject, JsonValue } from "../types.js";
import { RESOURCE_RECIPE_PAGE_SIZE } from "../constants.js";
import {
  asObjects,
  field,
  isJsonObject,
  runResource,
  templateValue,
  text,
  toResourceResult,
} from "../services/helpers.js";

const UNCATEGORIZED = "Uncategorized";

/** Display text for a value that is either an organizer-like object or already a plain value. */
function label(value: JsonValue, fallback = ""): string {
  if (isJsonObject(value)) return text(value, "name") ?? fallback;
  if (value === null) return fallback;
  return String(value);
}

function tagSuffix(recipe: JsonObject): string {
  const tags = field(recipe, "tags");
  if (!Array.isArray(tags) || tags.length === 0) return "";
  return ` [${tags.map((tag) => label(tag)).join(", ")}]`;
}

function firstCategory(recipe: JsonObject): string | null {
  const category = field(recipe, "recipeCategory");
  if (Array.isArray(category)) {
    const [first] = category;
    return first === undefined ? null : label(first, UNCATEGORIZED);
  }
  if (category === null || category === "") return null;
  return label(category, UNCATEGORIZED);
}

async function fetchAllRecipes(client: MealieClient): Promise<JsonObject[]> {
  const recipes: JsonObject[] = [];
  for (let page = 1; ; page++) {
    const response = await client.listRecipes(page, RESOURCE_RECIPE_PAGE_SIZE, {
      orderBy: "name",
      orderDirection: "asc",
    });
    if (!isJsonObject(response) || !Array.isArray(response.items)) break;
    const items = asObjects(response);
    if (items.length === 0) break;
    recipes.push(...items);
    const total = typeof response.total === "number" ? response.total : 0;
    if (recipes.length >= total) break;
  }
  return recipes;
}

export function renderRecipeList(recipes: JsonObject[]): string {
  const byCategory = new Map<string, JsonObject[]>();
  const uncategorized: JsonObject[] = [];
  for (const recipe of recipes) {
    const category = firstCategory(recipe);
    if (category === null) {
      uncategorized.push(recipe);
      continue;
    }
    const group = byCategory.get(category) ?? [];
    group.push(recipe);
    byCategory.set(category, group);
  }

  const lines = ["# Recipes in Mealie", "", `**Total Recipes**: ${recipes.length}`, ""];
  const section = (title: string, group: JsonObject[]) => {
    lines.push(`## ${title} (${group.length} recipes)`, "");
    for (const recipe of group) {
      lines.push(`- **${text(recipe, "name") ?? "Unknown"}** (\`${text(recipe, "slug") ?? ""}\`)${tagSuffix(recipe)}`);
    }
    lines.push("");
  };
  for (const category of [...byCategory.keys()].sort()) {
    section(category, byCategory.get(category) ?? []);
  }
  if (uncategorized.length > 0) section(UNCATEGORIZED, uncategorized);
  return lines.join("\n");
}

function ingredientLine(ingredient: JsonValue): string {
  if (!isJsonObject(ingredient)) return `- ${label(ingredient)}`;
  const quantity = ingredient.quantity === null || ingredient.quantity === undefined ? "" : String(ingredient.quantity);
  const parts = [quantity, label(field(ingredient, "unit")), label(field(ingredient, "food"))];
  const line = `- ${parts.join(" ")}`.trim();
  const note = text(ingredient, "note");
  return note ? `${line} (${note})` : line;
}

const NUTRITION_FIELDS: ReadonlyArray<[string, string]> = [
  ["calories", "Calories"],
  ["proteinContent", "Protein"],
  ["carbohydrateContent", "Carbohydrates"],
  ["fatContent", "Fat"],
  ["fiberContent", "Fiber"],
  ["sodiumContent", "Sodium"],
];

export function renderRecipeDetail(recipe: JsonObject): string {
  const lines = [`# ${text(recipe, "name") ?? "Unknown Recipe"}`, ""];

  const description = text(recipe, "description");
  if (description) lines.push(`*${description}*`, "");

  lines.push("## Information", "");
  const categories = field(recipe, "recipeCategory");
  if (Array.isArray(categories) ? categories.length > 0 : categories !== null) {
    const names = Array.isArray(categories) ? categories.map((c) => label(c)) : [label(categories)];
    lines.push(`- **Category**: ${names.join(", ")}`);
  }
  const tags = field(recipe, "tags");
  if (Array.isArray(tags) && tags.length > 0) {
    lines.push(`- **Tags**: ${tags.map((tag) => label(tag)).join(", ")}`);
  }
  for (const [key, title] of [
    ["recipeYield", "Yield"],
    ["totalTime", "Total Time"],
    ["prepTime", "Prep Time"],
    ["performTime", "Cook Time"],
  ]) {
    const value = field(recipe, key);
    if (value !== null && value !== "") lines.push(`- **${title}**: ${label(value)}`);
  }
  lines.push("");

  const ingredients = field(recipe, "recipeIngredient");
  if (Array.isArray(ingredients) && ingredients.length > 0) {
    lines.push("## Ingredients", "", ...ingredients.map(ingredientLine), "");
  }

  const instructions = field(recipe, "recipeInstructions");
  if (Array.isArray(instructions) && instructions.length > 0) {
    lines.push("## Instructions", "");
    instructions.forEach((step, index) => {
      const number = index + 1;
      if (isJsonObject(step)) {
        const title = text(step, "title");
        lines.push(title ? `### Step ${number}: ${title}` : `### Step ${number}`, "", text(step, "text") ?? "");
      } else {
        lines.push(`${number}. ${label(step)}`);
      }
      lines.push("");
    });
  }

  const nutrition = field(recipe, "nutrition");
  if (isJsonObject(nutrition)) {
    lines.push("## Nutrition", "");
    for (const [key, title] of NUTRITION_FIELDS) {
      const value = field(nutrition, key);
      if (value !== null && value !== "") lines.push(`- **${title}**: ${label(value)}`);
    }
    lines.push("");
  }

  const notes = field(recipe, "notes");
  if (Array.isArray(notes) && notes.length > 0) {
    lines.push("## Notes", "");
    for (const note of notes) {
      if (isJsonObject(note)) {
        const title = text(note, "title");
        if (title) lines.push(`### ${title}`, "");
        lines.push(text(note, "text") ?? "");
      } else {
        lines.push(label(note));
      }
      lines.push("");
    }
  }

  const source = text(recipe, "orgURL");
  if (source) lines.push("## Source", "", `[Original Recipe](${source})`, "");

  return lines.join("\n");
}

export function registerRecipeResources(server: McpServer, openClient: ClientFactory): void {
  server.registerResource(
    "recipes-list",
    "recipes://list",
    {
      title: "All Recipes",
      description: "Browse every recipe in Mealie, grouped by category.",
      mimeType: "text/markdown",
    },
    async (uri) =>
      toResourceResult(
        uri,
        await runResource(openClient, "Error fetching recipes", async (client) =>
          renderRecipeList(await fetchAllRecipes(client))
        )
      )
  );

  server.registerResource(
    "recipe-detail",
    new ResourceTemplate("recipes://{slug}", { list: undefined }),
    {
      title: "Recipe",
      description: "One recipe with ingredients, instructions, nutrition and notes.",
      mimeType: "text/markdown",
    },
    async (uri, variables) => {
      const slug = templateValue(variables.slug);
      const markdown = await runResource(openClient, `Error fetching recipe '${slug}'`, async (client) => {
        const recipe = await client.getRecipe(slug);
        return isJsonObject(recipe) ? renderRecipeDetail(recipe) : `Recipe '${slug}' not found`;
      });
      return toResourceResult(uri, markdown);
    }
  );
}
