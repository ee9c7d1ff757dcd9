import { describe, expect, it } from "vitest";
import {
  addDays,
  asList,
  compact,
  dayLabel,
  longDateLabel,
  runResource,
  runTool,
  shortDateLabel,
  toToolResult,
  templateValue,
  weekStart,
} from "../../src/services/helpers.js";
import { MealieApiError } from "../../src/services/errors.js";
import { FakeMealie, parse } from "../helpers/fake-mealie.js";

describe("dates", () => {
  it("should add days across month ends", () => {
    expect(addDays("2025-01-30", 3)).toBe("2025-02-02");
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28");
  });

  it("should format labels", () => {
    expect(shortDateLabel("2025-01-05")).toBe("Jan 05");
    expect(longDateLabel("2025-01-05")).toBe("January 05, 2025");
    expect(dayLabel("2025-01-05")).toBe("Sunday, January 05");
  });

  it("should find the Monday of a week", () => {
    expect(weekStart("2025-01-08")).toBe("2025-01-06");
    expect(weekStart("2025-01-06")).toBe("2025-01-06");
    expect(weekStart("2025-01-05")).toBe("2024-12-30");
  });
});

describe("values", () => {
  it("should unwrap paginated envelopes", () => {
    expect(asList({ items: [1, 2] })).toEqual([1, 2]);
    expect(asList([3])).toEqual([3]);
    expect(asList({ page: 1 })).toEqual([]);
    expect(asList(null)).toEqual([]);
  });

  it("should drop undefined entries only", () => {
    expect(compact({ a: 1, b: undefined, c: null, d: "" })).toEqual({ a: 1, c: null, d: "" });
  });

  it("should take the first template value", () => {
    expect(templateValue(["a", "b"])).toBe("a");
    expect(templateValue("c")).toBe("c");
    expect(templateValue(undefined)).toBe("");
  });
});

describe("runTool", () => {
  it("should serialise results with two-space indentation", async () => {
    const output = await runTool(new FakeMealie().factory(), async () => ({ ok: true }));
    expect(output).toBe('{\n  "ok": true\n}');
  });

  it("should turn API errors into an error object with status and body", async () => {
    const output = await runTool(new FakeMealie().factory(), async () => {
      throw MealieApiError.http(404, '{"detail":"Not Found"}');
    });

    expect(parse(output)).toEqual({
      error: "HTTP 404 Error\n\nDetails:\n  - Not Found",
      status_code: 404,
      response_body: '{"detail":"Not Found"}',
    });
  });

  it("should label anything else as unexpected", async () => {
    const output = await runTool(new FakeMealie().factory(), async () => {
      throw new Error("kaboom");
    });

    expect(parse(output)).toEqual({ error: "Unexpected error: kaboom" });
  });

  it("should report a client that cannot be opened", async () => {
    const output = await runTool(
      () => {
        throw new Error("MEALIE_URL must be set in environment or passed to constructor");
      },
      async () => ({})
    );

    expect(parse(output)).toEqual({
      error: "Unexpected error: MEALIE_URL must be set in environment or passed to constructor",
    });
  });
});

describe("toToolResult", () => {
  it("should flag error payloads", () => {
    expect(toToolResult('{"error":"nope"}')).toEqual({
      content: [{ type: "text", text: '{"error":"nope"}' }],
      isError: true,
    });
    expect(toToolResult('{"success":true}').isError).toBeUndefined();
    expect(toToolResult("pong").isError).toBeUndefined();
  });
});

describe("runResource", () => {
  it("should keep only the first line of an API error", async () => {
    const markdown = await runResource(new FakeMealie().factory(), "Error fetching recipes", async () => {
      throw MealieApiError.http(500, '{"detail":"boom"}');
    });

    expect(markdown).toBe("Error fetching recipes: Server Error (HTTP 500)");
  });

  it("should label other failures as unexpected", async () => {
    const markdown = await runResource(new FakeMealie().factory(), "Error fetching recipes", async () => {
      throw new Error("kaboom");
    });

    expect(markdown).toBe("Unexpected error: kaboom");
  });
});
