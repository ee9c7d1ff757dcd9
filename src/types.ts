export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface ErrorDiagnostic {
  message: string;
  details: string[];
  suggestions: string[];
  raw_response: string;
}

export interface OrganizerRef {
  id: string;
  name: string;
  slug: string;
}

export interface RecipeSearchItem {
  name: JsonValue;
  slug: JsonValue;
  description: JsonValue;
  rating: JsonValue;
  tags: JsonValue[];
  categories: JsonValue[];
}

export interface MealplanEntry {
  id: JsonValue;
  date: JsonValue;
  entry_type: JsonValue;
  title: JsonValue;
  text: JsonValue;
  recipe_id: JsonValue;
  recipe_name: JsonValue;
  recipe_slug: JsonValue;
}

export type MealSlot = Omit<MealplanEntry, "date" | "entry_type">;

export interface ShoppingItemSummary {
  id: JsonValue;
  checked: boolean;
  quantity: JsonValue;
  unit: JsonValue;
  food: JsonValue;
  note: JsonValue;
  display: JsonValue;
}

export interface BatchFailure {
  [key: string]: JsonValue;
  error: string;
}

export interface ToolErrorPayload {
  error: string;
  status_code?: number | null;
  response_body?: string | null;
}
