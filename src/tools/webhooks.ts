import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import { EmptySchema, ItemIdSchema, WebhooksCreateSchema, WebhooksUpdateSchema } from "../schemas/index.js";
import type { ItemIdInput, WebhooksCreateInput, WebhooksUpdateInput } from "../schemas/index.js";
import type { JsonObject } from "../types.js";
import { asObject, asObjects, compact, field, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export function toWebhook(webhook: JsonObject) {
  return {
    id: field(webhook, "id"),
    name: field(webhook, "name") ?? "",
    url: field(webhook, "url"),
    enabled: field(webhook, "enabled"),
    webhook_type: field(webhook, "webhookType"),
    scheduled_time: field(webhook, "scheduledTime"),
    group_id: field(webhook, "groupId"),
    household_id: field(webhook, "householdId"),
  };
}

/** Mealie stores the trigger time with seconds. */
export function normalizeScheduledTime(value: string): string {
  return value.length === 5 ? `${value}:00` : value;
}

export async function webhooksList(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const webhooks = asObjects(await client.listWebhooks()).map(toWebhook);
    return { total: webhooks.length, webhooks };
  });
}

export async function webhooksGet(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    webhook: toWebhook(asObject(await client.getWebhook(params.item_id))),
  }));
}

export async function webhooksCreate(openClient: ClientFactory, params: WebhooksCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const created = await client.createWebhook({
      enabled: params.enabled,
      name: params.name ?? "",
      url: params.url,
      webhookType: params.webhook_type,
      scheduledTime: normalizeScheduledTime(params.scheduled_time),
    });
    return { success: true, message: "Webhook created successfully", webhook: toWebhook(asObject(created)) };
  });
}

export async function webhooksUpdate(openClient: ClientFactory, params: WebhooksUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getWebhook(params.item_id));
    const updated = await client.updateWebhook(params.item_id, {
      ...current,
      ...compact({
        enabled: params.enabled,
        name: params.name,
        url: params.url,
        webhookType: params.webhook_type,
        scheduledTime: params.scheduled_time !== undefined ? normalizeScheduledTime(params.scheduled_time) : undefined,
      }),
    });
    return { success: true, message: "Webhook updated successfully", webhook: toWebhook(asObject(updated)) };
  });
}

export async function webhooksDelete(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteWebhook(params.item_id);
    return { success: true, message: `Webhook ${params.item_id} deleted successfully` };
  });
}

export async function webhooksTest(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const result = await client.testWebhook(params.item_id);
    return { success: true, message: "Test webhook request sent successfully", webhook_id: params.item_id, result };
  });
}

export function registerWebhookTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_webhooks_list",
    {
      title: "List Webhooks",
      description: `List the household's scheduled webhooks.

Returns: { total, webhooks[{ id, name, url, enabled, webhook_type, scheduled_time, group_id, household_id }] }`,
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await webhooksList(openClient))
  );

  server.registerTool(
    "mealie_webhooks_create",
    {
      title: "Create Webhook",
      description: `Create a webhook that Mealie POSTs to once a day. A 'mealplan' webhook sends that day's meal plan.

Examples:
  - { "url": "https://example.com/hook", "scheduled_time": "09:00", "name": "Morning plan" }`,
      inputSchema: WebhooksCreateSchema,
      annotations: WRITE,
    },
    async (params: WebhooksCreateInput) => toToolResult(await webhooksCreate(openClient, params))
  );

  server.registerTool(
    "mealie_webhooks_get",
    {
      title: "Get Webhook",
      description: "Get one webhook by id.",
      inputSchema: ItemIdSchema,
      annotations: READ_ONLY,
    },
    async (params: ItemIdInput) => toToolResult(await webhooksGet(openClient, params))
  );

  server.registerTool(
    "mealie_webhooks_update",
    {
      title: "Update Webhook",
      description: "Change a webhook. Omitted fields keep their values.",
      inputSchema: WebhooksUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: WebhooksUpdateInput) => toToolResult(await webhooksUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_webhooks_delete",
    {
      title: "Delete Webhook",
      description: "Delete a webhook by id.",
      inputSchema: ItemIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ItemIdInput) => toToolResult(await webhooksDelete(openClient, params))
  );

  server.registerTool(
    "mealie_webhooks_test",
    {
      title: "Test Webhook",
      description: "Send a test request to a webhook's URL right away.",
      inputSchema: ItemIdSchema,
      annotations: WRITE,
    },
    async (params: ItemIdInput) => toToolResult(await webhooksTest(openClient, params))
  );
}
