import { afterEach, describe, expect, it, vi } from "vitest";
import { MealieClient, imageExtension } from "../../src/services/client.js";
import { ConfigurationError, MealieApiError } from "../../src/services/errors.js";
import { FakeMealie } from "../helpers/fake-mealie.js";

async function failure(promise: Promise<unknown>): Promise<MealieApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof MealieApiError) return error;
    throw error;
  }
  throw new Error("Expected the request to fail");
}

describe("MealieClient configuration", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should require a base URL", () => {
    vi.stubEnv("MEALIE_URL", "");
    expect(() => new MealieClient({ apiToken: "test-secret" })).toThrow(ConfigurationError);
    expect(() => new MealieClient({ apiToken: "test-secret" })).toThrow(
      "MEALIE_URL must be set in environment or passed to constructor"
    );
  });

  it("should require an API token", () => {
    vi.stubEnv("MEALIE_API_TOKEN", "");
    expect(() => new MealieClient({ baseUrl: "http://mealie.test" })).toThrow(
      "MEALIE_API_TOKEN must be set in environment or passed to constructor"
    );
  });

  it("should fall back to the environment", () => {
    vi.stubEnv("MEALIE_URL", "http://env.mealie.test/");
    vi.stubEnv("MEALIE_API_TOKEN", "test-secret");
    const client = new MealieClient();
    expect(client.baseUrl).toBe("http://env.mealie.test");
    client.close();
  });

  it("should strip trailing slashes from the base URL", () => {
    const client = new FakeMealie().client({ baseUrl: "http://mealie.test///" });
    expect(client.baseUrl).toBe("http://mealie.test");
    client.close();
  });
});

describe("MealieClient requests", () => {
  it("should send the bearer token and parse JSON bodies", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { body: { version: "v2.0.0" } });
    const client = fake.client();

    await expect(client.getAppInfo()).resolves.toEqual({ version: "v2.0.0" });
    expect(fake.calls[0]?.authorization).toBe("Bearer test-secret");
  });

  it("should return null for an empty body and text for a non-JSON body", async () => {
    const fake = new FakeMealie()
      .on("DELETE", "/api/recipes/soup", { status: 200 })
      .on("GET", "/api/recipes/soup", { body: "plain words" });
    const client = fake.client();

    await expect(client.deleteRecipe("soup")).resolves.toBeNull();
    await expect(client.getRecipe("soup")).resolves.toBe("plain words");
  });

  it("should send the meal plan range as query parameters", async () => {
    const fake = new FakeMealie().on("GET", "/api/households/mealplans", { body: { items: [] } });

    await fake.client().listMealplans("2025-01-06", "2025-01-12");

    expect(fake.calls[0]?.params).toEqual({ start_date: "2025-01-06", end_date: "2025-01-12", perPage: -1 });
  });

  it("should only send a scale body when the scale is not one", async () => {
    const fake = new FakeMealie().on("POST", "/api/households/shopping/lists/list-1/recipe/r-1", { body: {} });
    const client = fake.client();

    await client.addRecipeToShoppingList("list-1", "r-1", 1);
    await client.addRecipeToShoppingList("list-1", "r-1", 2);

    expect(fake.calls.map((call) => call.body)).toEqual([undefined, { recipeIncrementQuantity: 2 }]);
  });

  it("should retry server errors on the backoff schedule", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", [
      { status: 503, body: "down" },
      { status: 502, body: "still down" },
      { body: { version: "v2.0.0" } },
    ]);

    await expect(fake.client().getAppInfo()).resolves.toEqual({ version: "v2.0.0" });
    expect(fake.calls).toHaveLength(3);
    expect(fake.sleeps).toEqual([1000, 2000]);
  });

  it("should give up after three retries", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { status: 500, body: '{"detail":"boom"}' });

    const error = await failure(fake.client().getAppInfo());

    expect(fake.calls).toHaveLength(4);
    expect(fake.sleeps).toEqual([1000, 2000, 4000]);
    expect(error.statusCode).toBe(500);
    expect(error.responseBody).toBe('{"detail":"boom"}');
  });

  it("should not retry client errors", async () => {
    const fake = new FakeMealie().on("GET", "/api/recipes/missing", { status: 404, body: '{"detail":"Not Found"}' });

    const error = await failure(fake.client().getRecipe("missing"));

    expect(fake.calls).toHaveLength(1);
    expect(fake.sleeps).toEqual([]);
    expect(error.statusCode).toBe(404);
  });

  it("should retry refused connections and then report a connection error", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { networkError: "ECONNREFUSED" });

    const error = await failure(fake.client().getAppInfo());

    expect(fake.calls).toHaveLength(4);
    expect(error.statusCode).toBeNull();
    expect(error.message).toBe("Connection error: connect ECONNREFUSED 127.0.0.1:9000");
  });

  it("should not retry unknown transport failures", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { networkError: "ERR_SOMETHING" });

    const error = await failure(fake.client().getAppInfo());

    expect(fake.calls).toHaveLength(1);
    expect(error.message).toBe("Unexpected error: connect ERR_SOMETHING 127.0.0.1:9000");
  });

  it("should label connection test failures", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { status: 401, body: '{"detail":"Not authenticated"}' });

    const error = await failure(fake.client().testConnection());

    expect(error.message.startsWith("Connection test failed: HTTP 401 Error")).toBe(true);
  });

  it("should fail the connection test on an empty response", async () => {
    const fake = new FakeMealie().on("GET", "/api/app/about", { status: 200 });

    const error = await failure(fake.client().testConnection());

    expect(error.message).toBe("Connection test failed: Empty response from /api/app/about");
    expect(error.statusCode).toBeNull();
  });

  it("should merge food updates into the current food", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/foods/f-1", { body: { id: "f-1", name: "Onion", description: "", labelId: null } })
      .on("PUT", "/api/foods/f-1", (call) => ({ body: call.body }));

    await expect(fake.client().updateFood("f-1", { description: "Yellow" })).resolves.toEqual({
      id: "f-1",
      name: "Onion",
      description: "Yellow",
      labelId: null,
    });
  });
});

describe("image downloads", () => {
  it("should take the extension from the URL, then the content type", () => {
    expect(imageExtension("https://img.test/a/photo.PNG?size=2", "")).toBe("png");
    expect(imageExtension("https://img.test/photo", "image/webp")).toBe("webp");
    expect(imageExtension("https://img.test/photo", "image/jpeg")).toBe("jpg");
    expect(imageExtension("https://img.test/photo", "")).toBe("jpg");
  });

  it("should download image bytes", async () => {
    const fake = new FakeMealie().on("GET", "https://img.test/pic", {
      body: "abc",
      headers: { "content-type": "image/png" },
    });

    const image = await fake.client().downloadImage("https://img.test/pic");

    expect(image.extension).toBe("png");
    expect(image.data.toString("utf8")).toBe("abc");
  });

  it("should report a failed download as a transport error", async () => {
    const fake = new FakeMealie();

    const error = await failure(fake.client().downloadImage("https://img.test/missing.jpg"));

    expect(error.statusCode).toBeNull();
    expect(error.message).toBe(
      "Failed to download image from https://img.test/missing.jpg: Request failed with status code 404"
    );
  });
});
