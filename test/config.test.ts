import { describe, expect, it } from "vitest";
import { loadConfig, missingSettings } from "../src/config.js";

describe("loadConfig", () => {
  it("should default to stdio on port 3000", () => {
    expect(loadConfig({})).toEqual({
      mealieUrl: undefined,
      mealieApiToken: undefined,
      transport: "stdio",
      port: 3000,
      logLevel: "info",
    });
  });

  it("should read the HTTP transport and port", () => {
    const config = loadConfig({
      MEALIE_URL: "http://mealie.test",
      MEALIE_API_TOKEN: "test-secret",
      TRANSPORT: "http",
      PORT: "8080",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      mealieUrl: "http://mealie.test",
      mealieApiToken: "test-secret",
      transport: "http",
      port: 8080,
      logLevel: "debug",
    });
    expect(missingSettings(config)).toEqual([]);
  });

  it("should name missing settings in order", () => {
    expect(missingSettings(loadConfig({ MEALIE_API_TOKEN: "" }))).toEqual(["MEALIE_URL", "MEALIE_API_TOKEN"]);
  });
});
