import type { JsonObject, JsonValue } from "../types.js";
import type { MealieClient, OrganizerKind } from "./client.js";
import { MealieApiError } from "./errors.js";
import { asObjects, isJsonObject, text } from "./helpers.js";

/**
 * Resolve organizer names to the `{ id, name, slug }` objects Mealie expects
 * on a recipe. Names are matched exactly against the full listing; missing
 * ones are created one at a time.
 *
 * Without `existing` the result is exactly the named set (replace). With
 * `existing` the named organizers are appended to it, skipping names already
 * present and ids already present (additive).
 */
export async function resolveOrganizers(
  client: MealieClient,
  kind: OrganizerKind,
  names: readonly string[],
  existing?: readonly JsonValue[]
): Promise<JsonObject[]> {
  const lookup = new Map<string, JsonObject>();
  for (const organizer of asObjects(await client.listOrganizers(kind))) {
    const name = text(organizer, "name");
    if (name !== null && !lookup.has(name)) lookup.set(name, organizer);
  }

  const resolved: JsonObject[] = (existing ?? []).filter(isJsonObject);
  const presentNames = new Set(resolved.map((o) => text(o, "name")));
  const presentIds = new Set(resolved.map((o) => text(o, "id")));

  for (const name of names) {
    if (presentNames.has(name)) continue;
    const found = lookup.get(name) ?? (await createOrganizer(client, kind, name));
    const ref = toRef(found);
    if (ref.id !== null && presentIds.has(ref.id)) continue;
    resolved.push(ref);
    presentNames.add(name);
    presentIds.add(ref.id);
  }
  return resolved;
}

async function createOrganizer(client: MealieClient, kind: OrganizerKind, name: string): Promise<JsonObject> {
  const created = await client.createOrganizer(kind, name);
  if (!isJsonObject(created)) throw MealieApiError.transport(`Unexpected create response for ${kind} '${name}'`);
  return created;
}

function toRef(organizer: JsonObject): { id: string | null; name: string | null; slug: string | null } {
  return { id: text(organizer, "id"), name: text(organizer, "name"), slug: text(organizer, "slug") };
}

export function resolveTags(client: MealieClient, names: readonly string[], existing?: readonly JsonValue[]) {
  return resolveOrganizers(client, "tags", names, existing);
}

export function resolveCategories(client: MealieClient, names: readonly string[], existing?: readonly JsonValue[]) {
  return resolveOrganizers(client, "categories", names, existing);
}
