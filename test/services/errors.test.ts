import { describe, expect, it } from "vitest";
import { MealieApiError, parseApiError } from "../../src/services/errors.js";

describe("parseApiError", () => {
  it("should describe each validation failure by its field path", () => {
    const body = JSON.stringify({
      detail: [
        { loc: ["body", "name"], msg: "field required", type: "missing" },
        { loc: ["body", "date"], msg: "invalid date format" },
      ],
    });

    const diagnostic = parseApiError(422, body);

    expect(diagnostic.message).toBe("Validation Error (HTTP 422)");
    expect(diagnostic.details).toEqual(["Field 'body -> name': field required", "Field 'body -> date': invalid date format"]);
    expect(diagnostic.suggestions).toHaveLength(3);
    expect(diagnostic.raw_response).toBe(body);
  });

  it("should point at the tracked issue when a conflict says the recipe exists", () => {
    const diagnostic = parseApiError(409, '{"detail":"Recipe already exists"}');

    expect(diagnostic.message).toBe("Conflict (HTTP 409)");
    expect(diagnostic.details).toEqual(["Recipe already exists"]);
    expect(diagnostic.suggestions).toHaveLength(4);
    const known = diagnostic.suggestions[3] ?? "";
    expect(known).toContain("github.com");
    expect(known).toContain("issues/7");
  });

  it("should suggest checking server logs on a 500", () => {
    const diagnostic = parseApiError(500, '{"detail":"boom"}');

    expect(diagnostic.message).toBe("Server Error (HTTP 500)");
    expect(diagnostic.suggestions[1]).toContain("kubectl logs");
  });

  it("should read error and message keys when there is no detail", () => {
    expect(parseApiError(400, '{"error":"bad thing"}').details).toEqual(["bad thing"]);
    expect(parseApiError(400, '{"message":"other thing"}').details).toEqual(["other thing"]);
  });

  it("should fall back to a truncated raw echo for unparseable bodies", () => {
    const raw = "x".repeat(300);
    const diagnostic = parseApiError(418, raw);

    expect(diagnostic.message).toBe("HTTP 418 Error");
    expect(diagnostic.details).toEqual([`Raw error: ${"x".repeat(200)}`]);
    expect(diagnostic.suggestions).toEqual([]);
  });

  it("should echo an empty body as an empty raw error", () => {
    expect(parseApiError(404, "").details).toEqual(["Raw error: "]);
  });
});

describe("MealieApiError", () => {
  it("should keep status and body for HTTP failures", () => {
    const error = MealieApiError.http(404, '{"detail":"Not Found"}');

    expect(error.statusCode).toBe(404);
    expect(error.responseBody).toBe('{"detail":"Not Found"}');
    expect(error.message).toBe("HTTP 404 Error\n\nDetails:\n  - Not Found");
    expect(error.diagnostic?.details).toEqual(["Not Found"]);
  });

  it("should carry no status for transport failures", () => {
    const error = MealieApiError.transport("Connection error: refused");

    expect(error.statusCode).toBeNull();
    expect(error.responseBody).toBeNull();
    expect(error.diagnostic).toBeNull();
    expect(error.message).toBe("Connection error: refused");
  });

  it("should prefix context without losing the failure", () => {
    const error = MealieApiError.http(401, "").withContext("Connection test failed");

    expect(error.message.startsWith("Connection test failed: HTTP 401 Error")).toBe(true);
    expect(error.statusCode).toBe(401);
  });
});
