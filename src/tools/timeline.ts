import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import {
  TimelineListSchema,
  TimelineEventIdSchema,
  TimelineCreateSchema,
  TimelineUpdateSchema,
  TimelineUpdateImageSchema,
} from "../schemas/index.js";
import type {
  TimelineListInput,
  TimelineEventIdInput,
  TimelineCreateInput,
  TimelineUpdateInput,
  TimelineUpdateImageInput,
} from "../schemas/index.js";
import type { JsonObject } from "../types.js";
import { asObject, compact, field, isJsonObject, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

// Mealie marks events carrying an image with this literal instead of a URL.
const HAS_IMAGE = "has image";

export function toTimelineEvent(event: JsonObject) {
  return {
    id: field(event, "id"),
    recipe_id: field(event, "recipeId"),
    user_id: field(event, "userId"),
    subject: field(event, "subject"),
    event_type: field(event, "eventType"),
    event_message: field(event, "eventMessage"),
    timestamp: field(event, "timestamp"),
    has_image: event.image === HAS_IMAGE,
  };
}

function toEventDetail(event: JsonObject) {
  return {
    ...toTimelineEvent(event),
    group_id: field(event, "groupId"),
    household_id: field(event, "householdId"),
    created_at: field(event, "createdAt"),
    update_at: field(event, "updateAt"),
  };
}

function toEventSummary(event: JsonObject, message: string) {
  return {
    id: field(event, "id"),
    recipe_id: field(event, "recipeId"),
    subject: field(event, "subject"),
    event_type: field(event, "eventType"),
    event_message: field(event, "eventMessage"),
    timestamp: field(event, "timestamp"),
    message,
  };
}

export async function timelineList(openClient: ClientFactory, params: TimelineListInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const response = await client.listTimelineEvents({
      page: params.page,
      perPage: params.per_page,
      orderBy: params.order_by,
      orderDirection: params.order_direction,
      queryFilter: params.query_filter,
    });
    if (!isJsonObject(response) || !Array.isArray(response.items)) return response;
    return {
      page: field(response, "page"),
      per_page: field(response, "perPage"),
      total: field(response, "total"),
      total_pages: field(response, "totalPages"),
      events: response.items.filter(isJsonObject).map(toTimelineEvent),
    };
  });
}

export async function timelineGet(openClient: ClientFactory, params: TimelineEventIdInput): Promise<string> {
  return runTool(openClient, async (client) => toEventDetail(asObject(await client.getTimelineEvent(params.event_id))));
}

export async function timelineCreate(openClient: ClientFactory, params: TimelineCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const created = await client.createTimelineEvent(
      compact({
        recipeId: params.recipe_id,
        subject: params.subject,
        eventType: params.event_type,
        eventMessage: params.event_message,
        userId: params.user_id,
        timestamp: params.timestamp ?? new Date().toISOString(),
      })
    );
    return toEventSummary(asObject(created), "Timeline event created successfully");
  });
}

export async function timelineUpdate(openClient: ClientFactory, params: TimelineUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getTimelineEvent(params.event_id));
    const updated = await client.updateTimelineEvent(params.event_id, {
      ...current,
      ...compact({
        subject: params.subject,
        eventType: params.event_type,
        eventMessage: params.event_message,
        timestamp: params.timestamp,
      }),
    });
    return toEventSummary(asObject(updated), "Timeline event updated successfully");
  });
}

export async function timelineDelete(openClient: ClientFactory, params: TimelineEventIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteTimelineEvent(params.event_id);
    return { success: true, message: `Timeline event ${params.event_id} deleted successfully` };
  });
}

export async function timelineUpdateImage(openClient: ClientFactory, params: TimelineUpdateImageInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const image = await client.downloadImage(params.image_url);
    await client.updateTimelineEventImage(params.event_id, image);
    return {
      success: true,
      message: `Image uploaded successfully to event ${params.event_id}`,
      image_url: params.image_url,
      extension: image.extension,
      event_id: params.event_id,
    };
  });
}

export function registerTimelineTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_timeline_list",
    {
      title: "List Timeline Events",
      description: `List recipe timeline events (cooking history, notes, system events).

Args:
  - page (default 1), per_page (default 50)
  - order_by (optional), order_direction: asc | desc (optional)
  - query_filter (optional): Mealie filter, e.g. 'recipeId = "<uuid>"'

Returns: { page, per_page, total, total_pages, events[{ id, recipe_id, user_id, subject, event_type, event_message, timestamp, has_image }] }`,
      inputSchema: TimelineListSchema,
      annotations: READ_ONLY,
    },
    async (params: TimelineListInput) => toToolResult(await timelineList(openClient, params))
  );

  server.registerTool(
    "mealie_timeline_get",
    {
      title: "Get Timeline Event",
      description: "Get one timeline event by id.",
      inputSchema: TimelineEventIdSchema,
      annotations: READ_ONLY,
    },
    async (params: TimelineEventIdInput) => toToolResult(await timelineGet(openClient, params))
  );

  server.registerTool(
    "mealie_timeline_create",
    {
      title: "Add Timeline Event",
      description: `Record an event on a recipe's timeline, e.g. that it was cooked.

Examples:
  - { "recipe_id": "<uuid>", "subject": "Made for Sunday dinner", "event_message": "Doubled the garlic" }`,
      inputSchema: TimelineCreateSchema,
      annotations: WRITE,
    },
    async (params: TimelineCreateInput) => toToolResult(await timelineCreate(openClient, params))
  );

  server.registerTool(
    "mealie_timeline_update",
    {
      title: "Update Timeline Event",
      description: "Change a timeline event's subject, type, message or timestamp.",
      inputSchema: TimelineUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: TimelineUpdateInput) => toToolResult(await timelineUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_timeline_delete",
    {
      title: "Delete Timeline Event",
      description: "Delete a timeline event by id.",
      inputSchema: TimelineEventIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: TimelineEventIdInput) => toToolResult(await timelineDelete(openClient, params))
  );

  server.registerTool(
    "mealie_timeline_update_image",
    {
      title: "Attach Image To Timeline Event",
      description: "Download an image from a URL and attach it to a timeline event.",
      inputSchema: TimelineUpdateImageSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: TimelineUpdateImageInput) => toToolResult(await timelineUpdateImage(openClient, params))
  );
}
