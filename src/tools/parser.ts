import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import { ParserIngredientSchema, ParserIngredientsBatchSchema } from "../schemas/index.js";
import type { ParserIngredientInput, ParserIngredientsBatchInput } from "../schemas/index.js";
import { asList, runTool, toToolResult } from "../services/helpers.js";
import { READ_ONLY } from "./annotations.js";

export async function parserIngredient(openClient: ClientFactory, params: ParserIngredientInput): Promise<string> {
  return runTool(openClient, (client) => client.parseIngredient(params.ingredient, params.parser));
}

export async function parserIngredientsBatch(
  openClient: ClientFactory,
  params: ParserIngredientsBatchInput
): Promise<string> {
  return runTool(openClient, async (client) => {
    const parsed = await client.parseIngredients(params.ingredients, params.parser);
    return { count: asList(parsed).length, parsed_ingredients: parsed };
  });
}

export function registerParserTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_parser_ingredient",
    {
      title: "Parse Ingredient",
      description: `Parse one ingredient line into quantity, unit, food and note.

Args:
  - ingredient (string): e.g. "2 cups all-purpose flour"
  - parser: nlp (default), brute or openai

Returns: { input, confidence, ingredient: { quantity, unit, food, note, display } }

Feed the ingredient objects to mealie_recipes_update_structured_ingredients to store them on a recipe.`,
      inputSchema: ParserIngredientSchema,
      annotations: READ_ONLY,
    },
    async (params: ParserIngredientInput) => toToolResult(await parserIngredient(openClient, params))
  );

  server.registerTool(
    "mealie_parser_ingredients_batch",
    {
      title: "Parse Ingredients",
      description: "Parse several ingredient lines at once. Returns: { count, parsed_ingredients[] }",
      inputSchema: ParserIngredientsBatchSchema,
      annotations: READ_ONLY,
    },
    async (params: ParserIngredientsBatchInput) => toToolResult(await parserIngredientsBatch(openClient, params))
  );
}
