import { ERROR_TEMPLATES, RAW_ERROR_PREVIEW_LENGTH } from "../constants.js";
import type { ErrorDiagnostic } from "../types.js";

export type ApiFailure =
  | { kind: "http"; status: number; body: string; diagnostic: ErrorDiagnostic }
  | { kind: "transport"; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function describeValidationEntry(entry: unknown): string {
  if (!isRecord(entry)) return String(entry);
  const loc = Array.isArray(entry.loc) ? entry.loc.map((part) => String(part)).join(" -> ") : "";
  const msg = typeof entry.msg === "string" ? entry.msg : "validation error";
  return `Field '${loc}': ${msg}`;
}

/**
 * Translate a failed response into a human-readable diagnostic.
 * Never throws; unrecognised bodies fall back to a truncated raw echo.
 */
export function parseApiError(statusCode: number, rawBody: string): ErrorDiagnostic {
  const template = ERROR_TEMPLATES[statusCode];
  const details: string[] = [];
  const suggestions: string[] = template ? [...template.suggestions] : [];

  const parsed = parseJson(rawBody);
  if (parsed.ok && isRecord(parsed.value)) {
    const body = parsed.value;
    if (Array.isArray(body.detail)) {
      details.push(...body.detail.map(describeValidationEntry));
    } else if (typeof body.detail === "string") {
      details.push(body.detail);
      const lowered = body.detail.toLowerCase();
      for (const [phrase, url] of Object.entries(template?.knownIssues ?? {})) {
        if (lowered.includes(phrase.toLowerCase())) suggestions.push(`Known issue: ${url}`);
      }
    } else if (typeof body.error === "string") {
      details.push(body.error);
    } else if (typeof body.message === "string") {
      details.push(body.message);
    }
  }

  if (details.length === 0) {
    details.push(`Raw error: ${rawBody.slice(0, RAW_ERROR_PREVIEW_LENGTH)}`);
  }

  return {
    message: template ? `${template.title} (HTTP ${statusCode})` : `HTTP ${statusCode} Error`,
    details,
    suggestions,
    raw_response: rawBody,
  };
}

function renderDiagnostic(diagnostic: ErrorDiagnostic): string {
  const parts = [diagnostic.message];
  if (diagnostic.details.length > 0) {
    parts.push("\nDetails:", ...diagnostic.details.map((d) => `  - ${d}`));
  }
  if (diagnostic.suggestions.length > 0) {
    parts.push("\nSuggestions:", ...diagnostic.suggestions.map((s) => `  - ${s}`));
  }
  return parts.join("\n");
}

function describeFailure(failure: ApiFailure): string {
  return failure.kind === "http" ? renderDiagnostic(failure.diagnostic) : failure.message;
}

export class MealieApiError extends Error {
  readonly failure: ApiFailure;

  constructor(failure: ApiFailure, context?: string) {
    const text = describeFailure(failure);
    super(context ? `${context}: ${text}` : text);
    this.name = "MealieApiError";
    this.failure = failure;
  }

  /** Response status, or null when no response was ever received. */
  get statusCode(): number | null {
    return this.failure.kind === "http" ? this.failure.status : null;
  }

  get responseBody(): string | null {
    return this.failure.kind === "http" ? this.failure.body : null;
  }

  get diagnostic(): ErrorDiagnostic | null {
    return this.failure.kind === "http" ? this.failure.diagnostic : null;
  }

  withContext(context: string): MealieApiError {
    return new MealieApiError(this.failure, context);
  }

  static http(status: number, body: string): MealieApiError {
    return new MealieApiError({ kind: "http", status, body, diagnostic: parseApiError(status, body) });
  }

  static transport(message: string): MealieApiError {
    return new MealieApiError({ kind: "transport", message });
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
