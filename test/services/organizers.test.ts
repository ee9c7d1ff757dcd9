import { describe, expect, it } from "vitest";
import { resolveCategories, resolveTags } from "../../src/services/organizers.js";
import { FakeMealie } from "../helpers/fake-mealie.js";

const tags = [
  { id: "t-1", name: "Quick", slug: "quick", groupId: "g-1" },
  { id: "t-2", name: "Vegan", slug: "vegan", groupId: "g-1" },
];

describe("resolveTags", () => {
  it("should reuse existing tags and create missing ones", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/organizers/tags", { body: { items: tags } })
      .on("POST", "/api/organizers/tags", { body: { id: "t-3", name: "Spicy", slug: "spicy" } });

    const resolved = await resolveTags(fake.client(), ["Vegan", "Spicy"]);

    expect(resolved).toEqual([
      { id: "t-2", name: "Vegan", slug: "vegan" },
      { id: "t-3", name: "Spicy", slug: "spicy" },
    ]);
    expect(fake.callsTo("POST", "/api/organizers/tags").map((call) => call.body)).toEqual([{ name: "Spicy" }]);
    expect(fake.callsTo("GET", "/api/organizers/tags")[0]?.params).toEqual({ perPage: -1 });
  });

  it("should match names exactly", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/organizers/tags", { body: { items: tags } })
      .on("POST", "/api/organizers/tags", { body: { id: "t-9", name: "quick", slug: "quick-1" } });

    const resolved = await resolveTags(fake.client(), ["quick"]);

    expect(resolved).toEqual([{ id: "t-9", name: "quick", slug: "quick-1" }]);
  });

  it("should append to existing organizers without duplicating", async () => {
    const fake = new FakeMealie().on("GET", "/api/organizers/tags", { body: { items: tags } });
    const existing = [{ id: "t-1", name: "Quick", slug: "quick" }];

    const resolved = await resolveTags(fake.client(), ["Quick", "Vegan", "Vegan"], existing);

    expect(resolved).toEqual([
      { id: "t-1", name: "Quick", slug: "quick" },
      { id: "t-2", name: "Vegan", slug: "vegan" },
    ]);
    expect(fake.callsTo("POST", "/api/organizers/tags")).toHaveLength(0);
  });

  it("should skip a name whose organizer is already present under another name", async () => {
    const fake = new FakeMealie().on("GET", "/api/organizers/tags", { body: { items: tags } });
    const existing = [{ id: "t-2", name: "Plant based", slug: "vegan" }];

    const resolved = await resolveTags(fake.client(), ["Vegan"], existing);

    expect(resolved).toEqual(existing);
  });

  it("should refuse a created tag that comes back without its fields", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/organizers/tags", { body: { items: tags } })
      .on("POST", "/api/organizers/tags", { status: 201 });

    await expect(resolveTags(fake.client(), ["Spicy"])).rejects.toMatchObject({
      name: "MealieApiError",
      message: "Unexpected create response for tags 'Spicy'",
    });
  });
});

describe("resolveCategories", () => {
  it("should look up categories from a bare array listing", async () => {
    const fake = new FakeMealie().on("GET", "/api/organizers/categories", {
      body: [{ id: "c-1", name: "Dinner", slug: "dinner" }],
    });

    await expect(resolveCategories(fake.client(), ["Dinner"])).resolves.toEqual([
      { id: "c-1", name: "Dinner", slug: "dinner" },
    ]);
  });
});
