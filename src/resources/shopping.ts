import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import type { JsonObject, JsonValue } from "../types.js";
import { asObjects, isJsonObject, runResource, templateValue, text, toResourceResult } from "../services/helpers.js";
import { listItems } from "../tools/shopping.js";

function namePart(value: JsonValue): string {
  if (isJsonObject(value)) return text(value, "name") ?? "";
  return value === null || value === false ? "" : String(value);
}

/** Display text, else "quantity unit food", else a placeholder. */
export function itemText(item: JsonObject): string {
  const display = text(item, "display");
  if (display) return display;
  const quantity = item.quantity;
  const parts = [quantity ? String(quantity) : "", namePart(item.unit ?? null), namePart(item.food ?? null)].filter(
    (part) => part !== ""
  );
  return parts.length > 0 ? parts.join(" ") : "Unknown item";
}

function itemLines(items: JsonObject[], checked: boolean): string[] {
  const lines: string[] = [];
  for (const item of items) {
    lines.push(`- [${checked ? "x" : " "}] ${itemText(item)}`);
    const note = text(item, "note");
    if (note) lines.push(`  - *${note}*`);
  }
  return lines;
}

/** The To Buy and Already Purchased sections, with headings at the given level. */
function itemSections(items: JsonObject[], heading: string): string[] {
  const purchased = items.filter((item) => item.checked === true);
  const toBuy = items.filter((item) => item.checked !== true);
  const lines: string[] = [];
  if (toBuy.length > 0) lines.push(`${heading} To Buy`, "", ...itemLines(toBuy, false), "");
  if (purchased.length > 0) lines.push(`${heading} Already Purchased`, "", ...itemLines(purchased, true), "");
  return lines;
}

export function renderShoppingLists(lists: JsonObject[]): string {
  const lines = ["# Shopping Lists", ""];
  if (lists.length === 0) {
    lines.push("*No shopping lists found*");
    return lines.join("\n");
  }
  lines.push(`**Total Lists**: ${lists.length}`, "");

  for (const list of lists) {
    lines.push(`## ${text(list, "name") ?? "Unnamed List"}`, "");
    const created = text(list, "createdAt");
    const updated = text(list, "updateAt");
    if (created) lines.push(`- **Created**: ${created}`);
    if (updated) lines.push(`- **Last Updated**: ${updated}`);

    const items = listItems(list);
    if (items.length === 0) {
      lines.push("- **Total Items**: 0", "", "*No items in this list*", "");
      continue;
    }
    const checked = items.filter((item) => item.checked === true).length;
    lines.push(`- **Total Items**: ${items.length}`, `- **Completed**: ${checked}/${items.length}`, "");
    lines.push(...itemSections(items, "###"));
  }
  return lines.join("\n");
}

export function renderShoppingList(list: JsonObject): string {
  const lines = [`# ${text(list, "name") ?? "Unnamed List"}`, ""];
  const created = text(list, "createdAt");
  const updated = text(list, "updateAt");
  if (created) lines.push(`**Created**: ${created}`);
  if (updated) lines.push(`**Last Updated**: ${updated}`);
  lines.push("");

  const items = listItems(list);
  if (items.length === 0) {
    lines.push("*No items in this list*", "");
    return lines.join("\n");
  }
  const checked = items.filter((item) => item.checked === true).length;
  lines.push(`**Progress**: ${checked}/${items.length} items completed`, "");
  lines.push(...itemSections(items, "##"));
  return lines.join("\n");
}

export function registerShoppingResources(server: McpServer, openClient: ClientFactory): void {
  server.registerResource(
    "shopping-lists",
    "shopping://lists",
    {
      title: "Shopping Lists",
      description: "Every shopping list with its progress and items.",
      mimeType: "text/markdown",
    },
    async (uri) => {
      const markdown = await runResource(openClient, "Error fetching shopping lists", async (client) =>
        renderShoppingLists(asObjects(await client.listShoppingLists()))
      );
      return toResourceResult(uri, markdown);
    }
  );

  server.registerResource(
    "shopping-list",
    new ResourceTemplate("shopping://{list_id}", { list: undefined }),
    {
      title: "Shopping List",
      description: "One shopping list split into To Buy and Already Purchased.",
      mimeType: "text/markdown",
    },
    async (uri, variables) => {
      const listId = templateValue(variables.list_id);
      const markdown = await runResource(openClient, `Error fetching shopping list '${listId}'`, async (client) => {
        const list = await client.getShoppingList(listId);
        return isJsonObject(list) ? renderShoppingList(list) : `Shopping list '${listId}' not found`;
      });
      return toResourceResult(uri, markdown);
    }
  );
}
