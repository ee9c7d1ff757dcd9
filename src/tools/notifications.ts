import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import { EmptySchema, ItemIdSchema, NotificationsCreateSchema, NotificationsUpdateSchema } from "../schemas/index.js";
import type { ItemIdInput, NotificationsCreateInput, NotificationsUpdateInput } from "../schemas/index.js";
import type { JsonObject } from "../types.js";
import { asObject, asObjects, compact, runTool, field, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export function toNotification(notification: JsonObject) {
  return {
    id: field(notification, "id"),
    name: field(notification, "name"),
    enabled: field(notification, "enabled"),
    group_id: field(notification, "groupId"),
    household_id: field(notification, "householdId"),
    options: asObject(field(notification, "options")),
  };
}

export async function notificationsList(openClient: ClientFactory): Promise<string> {
  return runTool(openClient, async (client) => {
    const notifications = asObjects(await client.listNotifications()).map(toNotification);
    return { total: notifications.length, notifications };
  });
}

export async function notificationsGet(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    notification: toNotification(asObject(await client.getNotification(params.item_id))),
  }));
}

export async function notificationsCreate(openClient: ClientFactory, params: NotificationsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const created = await client.createNotification(
      compact({
        name: params.name,
        appriseUrl: params.apprise_url,
        enabled: params.enabled,
        options: params.options,
      })
    );
    return {
      success: true,
      message: "Notification created successfully",
      notification: toNotification(asObject(created)),
    };
  });
}

/** Event options are merged into the current ones, so passing one switch leaves the others as they were. */
export async function notificationsUpdate(openClient: ClientFactory, params: NotificationsUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getNotification(params.item_id));
    const options = params.options ? { ...asObject(field(current, "options")), ...params.options } : undefined;
    const updated = await client.updateNotification(params.item_id, {
      ...current,
      ...compact({ name: params.name, appriseUrl: params.apprise_url, enabled: params.enabled, options }),
    });
    return {
      success: true,
      message: "Notification updated successfully",
      notification: toNotification(asObject(updated)),
    };
  });
}

export async function notificationsDelete(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteNotification(params.item_id);
    return { success: true, message: `Notification ${params.item_id} deleted successfully` };
  });
}

export async function notificationsTest(openClient: ClientFactory, params: ItemIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const response = await client.testNotification(params.item_id);
    return {
      success: true,
      message: "Test notification sent successfully",
      notification_id: params.item_id,
      response,
    };
  });
}

export function registerNotificationTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_notifications_list",
    {
      title: "List Event Notifiers",
      description: `List the household's event notifiers (Apprise targets fired on Mealie events).

Returns: { total, notifications[{ id, name, enabled, group_id, household_id, options }] }`,
      inputSchema: EmptySchema,
      annotations: READ_ONLY,
    },
    async () => toToolResult(await notificationsList(openClient))
  );

  server.registerTool(
    "mealie_notifications_create",
    {
      title: "Create Event Notifier",
      description: `Create an event notifier.

Examples:
  - { "name": "Kitchen chat", "apprise_url": "discord://webhook_id/webhook_token", "options": { "recipeCreated": true } }`,
      inputSchema: NotificationsCreateSchema,
      annotations: WRITE,
    },
    async (params: NotificationsCreateInput) => toToolResult(await notificationsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_notifications_get",
    {
      title: "Get Event Notifier",
      description: "Get one event notifier by id.",
      inputSchema: ItemIdSchema,
      annotations: READ_ONLY,
    },
    async (params: ItemIdInput) => toToolResult(await notificationsGet(openClient, params))
  );

  server.registerTool(
    "mealie_notifications_update",
    {
      title: "Update Event Notifier",
      description: "Change an event notifier. Options passed are merged into the current event switches.",
      inputSchema: NotificationsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: NotificationsUpdateInput) => toToolResult(await notificationsUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_notifications_delete",
    {
      title: "Delete Event Notifier",
      description: "Delete an event notifier by id.",
      inputSchema: ItemIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: ItemIdInput) => toToolResult(await notificationsDelete(openClient, params))
  );

  server.registerTool(
    "mealie_notifications_test",
    {
      title: "Test Event Notifier",
      description: "Send a test message through a notifier.",
      inputSchema: ItemIdSchema,
      annotations: WRITE,
    },
    async (params: ItemIdInput) => toToolResult(await notificationsTest(openClient, params))
  );
}
