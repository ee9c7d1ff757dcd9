import { describe, expect, it } from "vitest";
import { timelineCreate, timelineList, timelineUpdateImage } from "../../src/tools/timeline.js";
import { normalizeScheduledTime, webhooksCreate, webhooksUpdate } from "../../src/tools/webhooks.js";
import { notificationsUpdate } from "../../src/tools/notifications.js";
import { recipeActionsTrigger } from "../../src/tools/recipe-actions.js";
import { ping } from "../../src/tools/utility.js";
import { ConfigurationError } from "../../src/services/errors.js";
import { FakeMealie, parse } from "../helpers/fake-mealie.js";

const EVENTS = "/api/recipes/timeline/events";

describe("timeline tools", () => {
  it("should flag events that carry an image", async () => {
    const fake = new FakeMealie().on("GET", EVENTS, {
      body: {
        page: 1,
        perPage: 50,
        total: 1,
        totalPages: 1,
        items: [{ id: "ev-1", recipeId: "r-1", subject: "Made it", eventType: "info", image: "has image" }],
      },
    });

    const result = parse(
      await timelineList(fake.factory(), { page: 1, per_page: 50, query_filter: 'recipeId = "r-1"' })
    );

    expect(fake.calls[0]?.params).toEqual({ page: 1, perPage: 50, queryFilter: 'recipeId = "r-1"' });
    expect(result).toEqual({
      page: 1,
      per_page: 50,
      total: 1,
      total_pages: 1,
      events: [
        {
          id: "ev-1",
          recipe_id: "r-1",
          user_id: null,
          subject: "Made it",
          event_type: "info",
          event_message: null,
          timestamp: null,
          has_image: true,
        },
      ],
    });
  });

  it("should create an event with the given timestamp", async () => {
    const fake = new FakeMealie().on("POST", EVENTS, (call) => ({ status: 201, body: { id: "ev-2", ...bodyOf(call.body) } }));

    const result = parse(
      await timelineCreate(fake.factory(), {
        recipe_id: "r-1",
        subject: "Made it",
        event_type: "comment",
        timestamp: "2025-01-06T18:00:00Z",
      })
    );

    expect(fake.calls[0]?.body).toEqual({
      recipeId: "r-1",
      subject: "Made it",
      eventType: "comment",
      timestamp: "2025-01-06T18:00:00Z",
    });
    expect(result).toEqual({
      id: "ev-2",
      recipe_id: "r-1",
      subject: "Made it",
      event_type: "comment",
      event_message: null,
      timestamp: "2025-01-06T18:00:00Z",
      message: "Timeline event created successfully",
    });
  });

  it("should stamp new events with the current time", async () => {
    const fake = new FakeMealie().on("POST", EVENTS, { status: 201, body: {} });

    await timelineCreate(fake.factory(), { recipe_id: "r-1", subject: "Made it", event_type: "info" });

    expect(bodyOf(fake.calls[0]?.body).timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("should upload a downloaded image to the event", async () => {
    const fake = new FakeMealie()
      .on("GET", "https://img.test/dinner.webp", { body: "webp" })
      .on("PUT", `${EVENTS}/ev-1/image`, { status: 200 });

    const result = parse(
      await timelineUpdateImage(fake.factory(), { event_id: "ev-1", image_url: "https://img.test/dinner.webp" })
    );

    expect(result).toEqual({
      success: true,
      message: "Image uploaded successfully to event ev-1",
      image_url: "https://img.test/dinner.webp",
      extension: "webp",
      event_id: "ev-1",
    });
  });
});

describe("webhook tools", () => {
  it("should add seconds to a short trigger time", () => {
    expect(normalizeScheduledTime("18:30")).toBe("18:30:00");
    expect(normalizeScheduledTime("18:30:15")).toBe("18:30:15");
  });

  it("should create a webhook with defaults", async () => {
    const fake = new FakeMealie().on("POST", "/api/households/webhooks", (call) => ({ status: 201, body: call.body }));

    const result = parse(
      await webhooksCreate(fake.factory(), {
        url: "https://hooks.test/plan",
        scheduled_time: "18:30",
        enabled: true,
        webhook_type: "mealplan",
      })
    );

    expect(fake.calls[0]?.body).toEqual({
      enabled: true,
      name: "",
      url: "https://hooks.test/plan",
      webhookType: "mealplan",
      scheduledTime: "18:30:00",
    });
    expect(result.webhook).toEqual({
      id: null,
      name: "",
      url: "https://hooks.test/plan",
      enabled: true,
      webhook_type: "mealplan",
      scheduled_time: "18:30:00",
      group_id: null,
      household_id: null,
    });
  });

  it("should keep unchanged fields on update", async () => {
    const current = {
      id: "w-1",
      name: "Plan",
      url: "https://hooks.test/plan",
      enabled: true,
      webhookType: "mealplan",
      scheduledTime: "18:30:00",
      groupId: "g-1",
      householdId: "h-1",
    };
    const fake = new FakeMealie()
      .on("GET", "/api/households/webhooks/w-1", { body: current })
      .on("PUT", "/api/households/webhooks/w-1", (call) => ({ body: call.body }));

    await webhooksUpdate(fake.factory(), { item_id: "w-1", enabled: false, scheduled_time: "07:00" });

    expect(fake.callsTo("PUT", "/api/households/webhooks/w-1")[0]?.body).toEqual({
      ...current,
      enabled: false,
      scheduledTime: "07:00:00",
    });
  });
});

describe("notification tools", () => {
  it("should merge event options into the current ones", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/households/events/notifications/n-1", {
        body: { id: "n-1", name: "Kitchen", enabled: true, options: { recipeCreated: true, mealplanEntryCreated: false } },
      })
      .on("PUT", "/api/households/events/notifications/n-1", (call) => ({ body: call.body }));

    const result = parse(
      await notificationsUpdate(fake.factory(), { item_id: "n-1", options: { mealplanEntryCreated: true } })
    );

    expect(result.notification).toEqual({
      id: "n-1",
      name: "Kitchen",
      enabled: true,
      group_id: null,
      household_id: null,
      options: { recipeCreated: true, mealplanEntryCreated: true },
    });
  });
});

describe("recipe action tools", () => {
  it("should trigger an action for a recipe", async () => {
    const fake = new FakeMealie().on("POST", "/api/households/recipe-actions/a-1/trigger/chili", { status: 202 });

    expect(parse(await recipeActionsTrigger(fake.factory(), { item_id: "a-1", recipe_slug: "chili" }))).toEqual({
      success: true,
      message: "Recipe action triggered successfully",
      result: null,
    });
  });
});

describe("ping", () => {
  it("should answer pong when Mealie is reachable", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { body: { version: "v2.0.0" } });

    await expect(ping(fake.factory())).resolves.toBe("pong - Mealie MCP server is running and connected to Mealie");
  });

  it("should report a failed connection test", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { status: 401, body: { detail: "Not authenticated" } });

    await expect(ping(fake.factory())).resolves.toBe(
      "MCP server running but Mealie connection failed: Connection test failed: HTTP 401 Error\n\nDetails:\n  - Not authenticated"
    );
  });

  it("should report a client that cannot be configured", async () => {
    const openClient = () => {
      throw new ConfigurationError("MEALIE_URL must be set in environment or passed to constructor");
    };

    await expect(ping(openClient)).resolves.toBe(
      "MCP server running but error occurred: MEALIE_URL must be set in environment or passed to constructor"
    );
  });
});

function bodyOf(body: unknown): Record<string, unknown> {
  return typeof body === "object" && body !== null ? { ...body } : {};
}
