import type { JsonObject, JsonValue, ToolErrorPayload } from "../types.js";
import type { ClientFactory, MealieClient } from "./client.js";
import { MealieApiError } from "./errors.js";
import { logger } from "./logger.js";

// Type for tool call results compatible with MCP SDK
export interface ToolResult {
  [x: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function isJsonObject(value: JsonValue | null | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asObject(value: JsonValue | null | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

/** Accepts a bare array or a paginated `{ items: [...] }` envelope. */
export function asList(value: JsonValue | null | undefined): JsonValue[] {
  if (Array.isArray(value)) return value;
  if (isJsonObject(value) && Array.isArray(value.items)) return value.items;
  return [];
}

export function asObjects(value: JsonValue | null | undefined): JsonObject[] {
  return asList(value).filter(isJsonObject);
}

export function field(obj: JsonObject | null | undefined, key: string): JsonValue {
  return obj?.[key] ?? null;
}

export function text(obj: JsonObject | null | undefined, key: string): string | null {
  const value = obj?.[key];
  return typeof value === "string" ? value : null;
}

export function namesOf(value: JsonValue | null | undefined): JsonValue[] {
  return asObjects(value).map((item) => field(item, "name"));
}

/** Drops keys whose value is undefined, so optional tool arguments stay out of payloads. */
export function compact(entries: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function parseDate(value: string): Date {
  const [y, m, d] = value.split("-").map((part) => parseInt(part, 10));
  return new Date(y ?? 1970, (m ?? 1) - 1, d ?? 1);
}

export function today(): string {
  return formatDate(new Date());
}

export function addDays(value: string, days: number): string {
  const date = parseDate(value);
  date.setDate(date.getDate() + days);
  return formatDate(date);
}

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];
const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

function monthDay(date: Date, monthLength?: number): string {
  const month = MONTHS[date.getMonth()] ?? "";
  return `${month.slice(0, monthLength)} ${String(date.getDate()).padStart(2, "0")}`;
}

/** "2025-01-05" -> "Jan 05" */
export function shortDateLabel(value: string): string {
  return monthDay(parseDate(value), 3);
}

/** "2025-01-05" -> "January 05, 2025" */
export function longDateLabel(value: string): string {
  const date = parseDate(value);
  return `${monthDay(date)}, ${date.getFullYear()}`;
}

/** "2025-01-05" -> "Sunday, January 05" */
export function dayLabel(value: string): string {
  const date = parseDate(value);
  return `${WEEKDAYS[date.getDay()]}, ${monthDay(date)}`;
}

/** Monday of the week containing the date. */
export function weekStart(value: string): string {
  const offset = (parseDate(value).getDay() + 6) % 7;
  return addDays(value, -offset);
}

export function toolError(error: unknown): ToolErrorPayload {
  if (error instanceof MealieApiError) {
    return { error: error.message, status_code: error.statusCode, response_body: error.responseBody };
  }
  return { error: `Unexpected error: ${errorMessage(error)}` };
}

/**
 * Runs one tool body against a client scoped to the call and serialises the
 * outcome. Never rejects: failures come back as an `{ error }` JSON object.
 */
export async function runTool(
  openClient: ClientFactory,
  body: (client: MealieClient) => Promise<unknown>
): Promise<string> {
  let client: MealieClient | undefined;
  try {
    client = openClient();
    const result = await body(client);
    return JSON.stringify(result, null, 2);
  } catch (error) {
    logger.debug({ err: error }, "Tool call failed");
    return JSON.stringify(toolError(error), null, 2);
  } finally {
    client?.close();
  }
}

function reportsError(output: string): boolean {
  try {
    const parsed: JsonValue = JSON.parse(output);
    return isJsonObject(parsed) && "error" in parsed;
  } catch {
    return false;
  }
}

export function toToolResult(output: string): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: output }] };
  if (reportsError(output)) result.isError = true;
  return result;
}

export interface ResourceResult {
  [x: string]: unknown;
  contents: Array<{ uri: string; mimeType: string; text: string }>;
}

/**
 * Resource counterpart of `runTool`: renders markdown, and on failure a
 * single line such as "Error fetching recipes: HTTP 500 Error".
 */
export async function runResource(
  openClient: ClientFactory,
  errorPrefix: string,
  body: (client: MealieClient) => Promise<string>
): Promise<string> {
  let client: MealieClient | undefined;
  try {
    client = openClient();
    return await body(client);
  } catch (error) {
    logger.debug({ err: error }, "Resource read failed");
    if (error instanceof MealieApiError) return `${errorPrefix}: ${error.message.split("\n")[0]}`;
    return `Unexpected error: ${errorMessage(error)}`;
  } finally {
    client?.close();
  }
}

export function toResourceResult(uri: URL, markdown: string): ResourceResult {
  return { contents: [{ uri: uri.href, mimeType: "text/markdown", text: markdown }] };
}

/** URI template variables may arrive as arrays; resources here only take single values. */
export function templateValue(value: string | string[] | undefined): string {
  return (Array.isArray(value) ? value[0] : value) ?? "";
}
