export const SERVER_NAME = "mealie-mcp-server";
export const SERVER_VERSION = "1.0.0";

export const REQUEST_TIMEOUT_MS = 30000;

export const MAX_RETRIES = 3;
export const RETRY_DELAYS_MS = [1000, 2000, 4000] as const;

export const RAW_ERROR_PREVIEW_LENGTH = 200;

export const CONNECTION_TEST_PATH = "/api/app/about";

/** Sentinel a caller passes to null out a meal plan field on update. */
export const CLEAR_FIELD = "__CLEAR__";

export const MEAL_ENTRY_TYPES = ["breakfast", "lunch", "dinner", "side", "snack"] as const;
export type MealEntryType = (typeof MEAL_ENTRY_TYPES)[number];

export const RANDOM_SUGGESTION_POOL = 100;
export const ALL_PAGES = -1;
export const DEFAULT_FOODS_PAGE_SIZE = 50;
export const RESOURCE_RECIPE_PAGE_SIZE = 100;

export interface ErrorTemplate {
  title: string;
  suggestions: readonly string[];
  knownIssues?: Readonly<Record<string, string>>;
}

export const ERROR_TEMPLATES: Readonly<Record<number, ErrorTemplate>> = {
  422: {
    title: "Validation Error",
    suggestions: [
      "Check that all required fields are provided",
      "Verify field values match expected types and formats",
      "Review the error details below for specific field issues",
    ],
  },
  500: {
    title: "Server Error",
    suggestions: [
      "The Mealie server encountered an internal error",
      "This may be a bug in Mealie - check server logs: kubectl logs -f <pod-name> -n mealie",
      "Try the operation again, or simplify the request if possible",
    ],
  },
  409: {
    title: "Conflict",
    suggestions: [
      "A resource with this name or identifier may already exist",
      "Try using a different name or identifier",
      "Use update/patch operations instead of create for existing resources",
    ],
    knownIssues: {
      "Recipe already exists": "https://github.com/mdlopresti/mealie-mcp/issues/7",
    },
  },
};
