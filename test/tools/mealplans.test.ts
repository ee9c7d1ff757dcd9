import { describe, expect, it } from "vitest";
import {
  groupByEntryType,
  mealplanRulesCreate,
  mealplanRulesUpdate,
  mealplansCreate,
  mealplansDeleteRange,
  mealplansGetDate,
  mealplansList,
  mealplansRandom,
  mealplansSearch,
  mealplansToday,
  mealplansUpdate,
  mealplansUpdateBatch,
  normalizeEntryType,
} from "../../src/tools/mealplans.js";
import { today } from "../../src/services/helpers.js";
import { FakeMealie, parse } from "../helpers/fake-mealie.js";

const MEALPLANS = "/api/households/mealplans";

const chili = {
  id: "m-1",
  date: "2025-01-06",
  entryType: "dinner",
  title: "",
  text: "",
  recipeId: "r-1",
  recipe: { id: "r-1", name: "Chili", slug: "chili" },
};
const pizzaNight = {
  id: "m-2",
  date: "2025-01-07",
  entryType: "Dinner",
  title: "Pizza night",
  text: "Order from the corner place",
  recipeId: null,
  recipe: null,
};

describe("entry types", () => {
  it("should normalise known types case-insensitively", () => {
    expect(normalizeEntryType("Dinner")).toBe("dinner");
    expect(normalizeEntryType("SNACK")).toBe("snack");
    expect(normalizeEntryType("brunch")).toBeNull();
  });

  it("should group entries by lower-cased type with a default", () => {
    const groups = groupByEntryType([chili, pizzaNight, { id: "m-3", title: "Leftovers" }]);

    expect(Object.keys(groups)).toEqual(["dinner", "meal"]);
    expect(groups.dinner?.map((slot) => slot.id)).toEqual(["m-1", "m-2"]);
    expect(groups.meal).toEqual([
      { id: "m-3", title: "Leftovers", text: null, recipe_id: null, recipe_name: null, recipe_slug: null },
    ]);
  });
});

describe("mealplansList", () => {
  it("should flatten entries for the range", async () => {
    const fake = new FakeMealie().on("GET", MEALPLANS, { body: { items: [chili] } });

    const result = parse(await mealplansList(fake.factory(), { start_date: "2025-01-06", end_date: "2025-01-12" }));

    expect(result).toEqual({
      start_date: "2025-01-06",
      end_date: "2025-01-12",
      count: 1,
      entries: [
        {
          id: "m-1",
          date: "2025-01-06",
          entry_type: "dinner",
          title: "",
          text: "",
          recipe_id: "r-1",
          recipe_name: "Chili",
          recipe_slug: "chili",
        },
      ],
    });
  });

  it("should default the end to a week after the start", async () => {
    const fake = new FakeMealie().on("GET", MEALPLANS, { body: { items: [] } });

    await mealplansList(fake.factory(), { start_date: "2025-01-28" });

    expect(fake.calls[0]?.params).toMatchObject({ start_date: "2025-01-28", end_date: "2025-02-04" });
  });
});

describe("mealplansToday and mealplansGetDate", () => {
  it("should group today's meals", async () => {
    const fake = new FakeMealie().on("GET", `${MEALPLANS}/today`, { body: [chili] });

    const result = parse(await mealplansToday(fake.factory()));

    expect(result.date).toBe(today());
    expect(result.count).toBe(1);
    expect(result.meals).toEqual({
      dinner: [{ id: "m-1", title: "", text: "", recipe_id: "r-1", recipe_name: "Chili", recipe_slug: "chili" }],
    });
  });

  it("should ask for a single day", async () => {
    const fake = new FakeMealie().on("GET", MEALPLANS, { body: { items: [pizzaNight] } });

    const result = parse(await mealplansGetDate(fake.factory(), { meal_date: "2025-01-07" }));

    expect(fake.calls[0]?.params).toMatchObject({ start_date: "2025-01-07", end_date: "2025-01-07" });
    expect(result).toMatchObject({ date: "2025-01-07", count: 1 });
  });
});

describe("mealplansCreate", () => {
  it("should reject unknown entry types without calling Mealie", async () => {
    const fake = new FakeMealie();

    const result = parse(await mealplansCreate(fake.factory(), { meal_date: "2025-01-06", entry_type: "brunch" }));

    expect(result).toEqual({ error: "Invalid entry_type 'brunch'. Must be one of: breakfast, lunch, dinner, side, snack" });
    expect(fake.calls).toHaveLength(0);
  });

  it("should send only the fields given", async () => {
    const fake = new FakeMealie().on("POST", MEALPLANS, { status: 201, body: { id: "m-9" } });

    const result = parse(
      await mealplansCreate(fake.factory(), { meal_date: "2025-01-06", entry_type: "Dinner", recipe_id: "r-1", title: "" })
    );

    expect(fake.calls[0]?.body).toEqual({ date: "2025-01-06", entryType: "dinner", recipeId: "r-1" });
    expect(result).toEqual({ success: true, message: "Meal plan entry created for 2025-01-06", entry: { id: "m-9" } });
  });
});

describe("mealplansUpdate", () => {
  it("should merge changes into the current entry and clear on request", async () => {
    const fake = new FakeMealie()
      .on("GET", `${MEALPLANS}/m-1`, {
        body: { id: "m-1", date: "2025-01-06", entryType: "dinner", recipeId: "r-1", title: "Old", text: "note", groupId: "g-1" },
      })
      .on("PUT", `${MEALPLANS}/m-1`, (call) => ({ body: call.body }));

    const result = parse(
      await mealplansUpdate(fake.factory(), { mealplan_id: "m-1", entry_type: "Lunch", title: "__CLEAR__" })
    );

    const sent = { id: "m-1", date: "2025-01-06", entryType: "lunch", recipeId: "r-1", title: null, text: "note" };
    expect(fake.callsTo("PUT", `${MEALPLANS}/m-1`)[0]?.body).toEqual(sent);
    expect(result).toEqual({ success: true, message: "Meal plan entry 'm-1' updated", entry: sent });
  });

  it("should leave out fields the entry never had", async () => {
    const fake = new FakeMealie()
      .on("GET", `${MEALPLANS}/m-4`, { body: { id: "m-4", date: "2025-01-08", entryType: "side" } })
      .on("PUT", `${MEALPLANS}/m-4`, { body: {} });

    await mealplansUpdate(fake.factory(), { mealplan_id: "m-4", recipe_id: "r-2" });

    expect(fake.callsTo("PUT", `${MEALPLANS}/m-4`)[0]?.body).toEqual({
      id: "m-4",
      date: "2025-01-08",
      entryType: "side",
      recipeId: "r-2",
    });
  });

  it("should reject an invalid new type", async () => {
    const result = parse(await mealplansUpdate(new FakeMealie().factory(), { mealplan_id: "m-1", entry_type: "tea" }));
    expect(result.error).toBe("Invalid entry_type 'tea'. Must be one of: breakfast, lunch, dinner, side, snack");
  });
});

describe("mealplansUpdateBatch", () => {
  it("should keep going past a failing entry", async () => {
    const fake = new FakeMealie()
      .on("GET", `${MEALPLANS}/m-1`, { body: chili })
      .on("PUT", `${MEALPLANS}/m-1`, (call) => ({ body: call.body }));

    const result = parse(
      await mealplansUpdateBatch(fake.factory(), {
        updates: [
          { mealplan_id: "m-1", meal_date: "2025-01-09" },
          { mealplan_id: "m-404", text: "gone" },
        ],
      })
    );

    expect(result).toMatchObject({
      success: false,
      message: "Updated 1 of 2 meal plan entries",
      total: 2,
      updated: 1,
      failed: 1,
      failures: [{ mealplan_id: "m-404", error: "HTTP 404 Error\n\nDetails:\n  - Not Found" }],
    });
    expect(result.entries).toEqual([
      { id: "m-1", date: "2025-01-09", entryType: "dinner", recipeId: "r-1", title: "", text: "" },
    ]);
  });
});

describe("mealplansRandom", () => {
  it("should suggest the picked recipe", async () => {
    const fake = new FakeMealie().on("GET", "/api/recipes", {
      body: {
        items: [
          { id: "r-1", name: "Chili", slug: "chili" },
          { id: "r-2", name: "Pho", slug: "pho", description: "Noodle soup", totalTime: "2h", tags: [{ name: "Soup" }] },
        ],
      },
    });

    const result = parse(await mealplansRandom(fake.factory(), () => 1));

    expect(fake.calls[0]?.params).toEqual({ page: 1, perPage: 100 });
    expect(result).toEqual({
      success: true,
      suggestion: { recipe_id: "r-2", name: "Pho", slug: "pho", description: "Noodle soup", total_time: "2h", tags: ["Soup"] },
    });
  });

  it("should report an empty recipe book", async () => {
    const fake = new FakeMealie().on("GET", "/api/recipes", { body: { items: [] } });

    expect(parse(await mealplansRandom(fake.factory()))).toEqual({ error: "No recipes available for suggestion" });
  });
});

describe("mealplansSearch", () => {
  it("should match recipe names, titles and text case-insensitively", async () => {
    const fake = new FakeMealie().on("GET", MEALPLANS, { body: { items: [chili, pizzaNight] } });

    const result = parse(
      await mealplansSearch(fake.factory(), { query: "PIZZA", start_date: "2025-01-06", end_date: "2025-01-12" })
    );

    expect(result).toMatchObject({ query: "PIZZA", count: 1 });
    expect(result.meal_plans).toMatchObject([{ id: "m-2", title: "Pizza night" }]);
  });

  it("should match the linked recipe's name", async () => {
    const porkChops = {
      ...chili,
      id: "m-3",
      recipeId: "r-3",
      recipe: { id: "r-3", name: "Slow Cooker PORK Chops", slug: "slow-cooker-pork-chops" },
    };
    const porkTacos = { ...pizzaNight, id: "m-4", title: "Pork tacos", text: "" };
    const fake = new FakeMealie().on("GET", MEALPLANS, { body: { items: [chili, porkChops, porkTacos] } });

    const result = parse(
      await mealplansSearch(fake.factory(), { query: "pork", start_date: "2025-01-06", end_date: "2025-01-12" })
    );

    expect(result.count).toBe(2);
    expect(result.meal_plans).toEqual([
      {
        id: "m-3",
        date: "2025-01-06",
        entry_type: "dinner",
        title: "",
        text: "",
        recipe_id: "r-3",
        recipe_name: "Slow Cooker PORK Chops",
        recipe_slug: "slow-cooker-pork-chops",
      },
      {
        id: "m-4",
        date: "2025-01-07",
        entry_type: "Dinner",
        title: "Pork tacos",
        text: "",
        recipe_id: null,
        recipe_name: null,
        recipe_slug: null,
      },
    ]);
  });
});

describe("mealplansDeleteRange", () => {
  it("should delete every entry and report failures", async () => {
    const fake = new FakeMealie()
      .on("GET", MEALPLANS, { body: { items: [chili, pizzaNight] } })
      .on("DELETE", `${MEALPLANS}/m-1`, { status: 200 })
      .on("DELETE", `${MEALPLANS}/m-2`, { status: 403, body: '{"detail":"Forbidden"}' });

    const result = parse(await mealplansDeleteRange(fake.factory(), { start_date: "2025-01-06", end_date: "2025-01-12" }));

    expect(result).toMatchObject({
      success: false,
      message: "Deleted 1 of 2 meal plan entries",
      start_date: "2025-01-06",
      end_date: "2025-01-12",
      total: 2,
      deleted: 1,
      failed: 1,
      failures: [{ mealplan_id: "m-2", error: "HTTP 403 Error\n\nDetails:\n  - Forbidden" }],
    });
  });
});

describe("meal plan rules", () => {
  it("should resolve tag names when creating a rule", async () => {
    const fake = new FakeMealie()
      .on("GET", "/api/organizers/tags", { body: { items: [{ id: "t-1", name: "Quick", slug: "quick" }] } })
      .on("POST", `${MEALPLANS}/rules`, { body: { id: "ru-1", name: "Weeknights" } });

    const result = parse(
      await mealplanRulesCreate(fake.factory(), { name: "Weeknights", entry_type: "Dinner", tags: ["Quick"] })
    );

    expect(fake.callsTo("POST", `${MEALPLANS}/rules`)[0]?.body).toEqual({
      name: "Weeknights",
      entryType: "dinner",
      tags: [{ id: "t-1", name: "Quick", slug: "quick" }],
      categories: [],
    });
    expect(result).toMatchObject({ success: true, message: "Meal plan rule 'Weeknights' created" });
  });

  it("should patch only the fields given", async () => {
    const fake = new FakeMealie().on("PATCH", `${MEALPLANS}/rules/ru-1`, { body: { id: "ru-1", name: "Weekends" } });

    const result = parse(await mealplanRulesUpdate(fake.factory(), { rule_id: "ru-1", name: "Weekends" }));

    expect(fake.calls[0]?.body).toEqual({ name: "Weekends" });
    expect(result).toEqual({
      success: true,
      message: "Meal plan rule 'ru-1' updated",
      rule: { id: "ru-1", name: "Weekends" },
    });
  });
});
