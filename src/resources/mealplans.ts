import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import type { JsonObject } from "../types.js";
import { MEAL_ENTRY_TYPES } from "../constants.js";
import {
  addDays,
  asObjects,
  dayLabel,
  field,
  isJsonObject,
  longDateLabel,
  runResource,
  templateValue,
  text,
  toResourceResult,
  today,
  weekStart,
} from "../services/helpers.js";
import { toMealplanEntry } from "../tools/mealplans.js";

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Groups raw entries by lower-cased type: known meal types first in their usual order, then any others. */
export function groupEntries(entries: JsonObject[]): Array<[string, JsonObject[]]> {
  const byType = new Map<string, JsonObject[]>();
  for (const entry of entries) {
    const type = (text(entry, "entryType") ?? "meal").toLowerCase();
    byType.set(type, [...(byType.get(type) ?? []), entry]);
  }
  const known: string[] = MEAL_ENTRY_TYPES.filter((type) => byType.has(type));
  const others = [...byType.keys()].filter((type) => !known.includes(type));
  return [...known, ...others].map((type) => [type, byType.get(type) ?? []]);
}

function recipeOf(entry: JsonObject): JsonObject | null {
  const recipe = field(entry, "recipe");
  return isJsonObject(recipe) ? recipe : null;
}

export function renderWeek(entries: JsonObject[], start: string, current: string): string {
  const end = addDays(start, 6);
  const lines = ["# Current Week's Meal Plan", "", `**Week of ${longDateLabel(start)} - ${longDateLabel(end)}**`, ""];

  for (let offset = 0; offset < 7; offset++) {
    const day = addDays(start, offset);
    lines.push(day === current ? `## ${dayLabel(day)} **(TODAY)**` : `## ${dayLabel(day)}`, "");

    const dayEntries = entries.filter((entry) => text(entry, "date") === day);
    if (dayEntries.length === 0) {
      lines.push("*No meals planned*", "");
      continue;
    }
    for (const [type, meals] of groupEntries(dayEntries)) {
      lines.push(`### ${capitalize(type)}`, "");
      for (const meal of meals) {
        const recipe = recipeOf(meal);
        if (recipe) lines.push(`- **${text(recipe, "name") ?? "Unknown"}** (\`${text(recipe, "slug") ?? ""}\`)`);
        else if (text(meal, "title")) lines.push(`- ${text(meal, "title")}`);
        const note = text(meal, "text");
        if (note) lines.push(`  - *Note: ${note}*`);
      }
      lines.push("");
    }
  }
  return lines.join("\n");
}

export function renderToday(entries: JsonObject[], current: string): string {
  const lines = [`# Meals for ${dayLabel(current)}, ${current.slice(0, 4)}`, ""];
  if (entries.length === 0) {
    lines.push("*No meals planned for today*");
    return lines.join("\n");
  }

  for (const [type, meals] of groupEntries(entries)) {
    lines.push(`## ${capitalize(type)}`, "");
    for (const meal of meals) {
      const recipe = recipeOf(meal);
      if (recipe) {
        lines.push(`### ${text(recipe, "name") ?? "Unknown"}`, "");
        const description = text(recipe, "description");
        if (description) lines.push(`*${description}*`, "");
        const timings = [
          ["Prep", text(recipe, "prepTime")],
          ["Cook", text(recipe, "performTime")],
          ["Total", text(recipe, "totalTime")],
        ].filter((timing): timing is [string, string] => Boolean(timing[1]));
        if (timings.length > 0) {
          lines.push("**Timing:**", ...timings.map(([name, value]) => `- ${name}: ${value}`), "");
        }
        lines.push(`*Recipe slug: \`${text(recipe, "slug") ?? ""}\`*`);
      } else if (text(meal, "title")) {
        lines.push(`### ${text(meal, "title")}`, "");
      }
      const note = text(meal, "text");
      if (note) lines.push(`**Note:** ${note}`);
      lines.push("");
    }
  }
  return lines.join("\n");
}

export function renderDate(entries: JsonObject[], date: string): string {
  const lines = [`# Meals for ${date}`, ""];
  if (entries.length === 0) {
    lines.push("*No meals planned for this date*");
    return lines.join("\n");
  }
  for (const [type, meals] of groupEntries(entries)) {
    lines.push(`## ${capitalize(type)}`, "");
    for (const meal of meals.map(toMealplanEntry)) {
      const name = [meal.recipe_name, meal.title].find((v) => typeof v === "string" && v !== "") ?? "Untitled";
      const slug = typeof meal.recipe_slug === "string" && meal.recipe_slug ? ` (\`${meal.recipe_slug}\`)` : "";
      lines.push(`- **${String(name)}**${slug}`);
      if (typeof meal.text === "string" && meal.text) lines.push(`  - *Note: ${meal.text}*`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

export function registerMealplanResources(server: McpServer, openClient: ClientFactory): void {
  server.registerResource(
    "mealplans-current",
    "mealplans://current",
    {
      title: "This Week's Meal Plan",
      description: "The current week's meal plan, Monday to Sunday.",
      mimeType: "text/markdown",
    },
    async (uri) => {
      const markdown = await runResource(openClient, "Error fetching meal plan", async (client) => {
        const current = today();
        const start = weekStart(current);
        const entries = asObjects(await client.listMealplans(start, addDays(start, 6)));
        return renderWeek(entries, start, current);
      });
      return toResourceResult(uri, markdown);
    }
  );

  server.registerResource(
    "mealplans-today",
    "mealplans://today",
    {
      title: "Today's Meals",
      description: "Today's planned meals with recipe timings.",
      mimeType: "text/markdown",
    },
    async (uri) => {
      const markdown = await runResource(openClient, "Error fetching today's meals", async (client) =>
        renderToday(asObjects(await client.getTodayMealplans()), today())
      );
      return toResourceResult(uri, markdown);
    }
  );

  server.registerResource(
    "mealplans-date",
    new ResourceTemplate("mealplans://{date}", { list: undefined }),
    {
      title: "Meals On A Date",
      description: "Meals planned for one date (YYYY-MM-DD).",
      mimeType: "text/markdown",
    },
    async (uri, variables) => {
      const date = templateValue(variables.date);
      const markdown = await runResource(openClient, `Error fetching meals for ${date}`, async (client) => {
        if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return `Error: Date must be YYYY-MM-DD format, got '${date}'`;
        return renderDate(asObjects(await client.listMealplans(date, date)), date);
      });
      return toResourceResult(uri, markdown);
    }
  );
}
