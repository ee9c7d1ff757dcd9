import http from "node:http";
import https from "node:https";
import axios from "axios";
import type { AxiosAdapter, AxiosInstance, Method } from "axios";
import {
  CONNECTION_TEST_PATH,
  MAX_RETRIES,
  REQUEST_TIMEOUT_MS,
  RETRY_DELAYS_MS,
  ALL_PAGES,
  DEFAULT_FOODS_PAGE_SIZE,
} from "../constants.js";
import type { JsonObject, JsonValue } from "../types.js";
import { ConfigurationError, MealieApiError } from "./errors.js";
import { logger } from "./logger.js";

export type QueryValue = string | number | boolean | readonly string[];
export type QueryParams = Record<string, QueryValue | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  json?: unknown;
  form?: FormData;
}

export interface MealieClientOptions {
  baseUrl?: string;
  apiToken?: string;
  timeoutMs?: number;
  /** Replaces axios' transport; tests use this to stay in-process. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export type OrganizerKind = "categories" | "tags" | "tools";

export interface DownloadedImage {
  data: Buffer;
  extension: string;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "ERR_NETWORK",
]);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function bodyText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return JSON.stringify(data);
}

function parseSuccessBody(text: string): JsonValue | null {
  if (text === "") return null;
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function imageExtension(url: string, contentType: string): string {
  const path = url.split(/[?#]/)[0] ?? "";
  const lastSegment = path.slice(path.lastIndexOf("/") + 1);
  const dot = lastSegment.lastIndexOf(".");
  if (dot > 0 && dot < lastSegment.length - 1) return lastSegment.slice(dot + 1).toLowerCase();
  if (contentType.includes("jpeg") || contentType.includes("jpg")) return "jpg";
  if (contentType.includes("png")) return "png";
  if (contentType.includes("webp")) return "webp";
  return "jpg";
}

export class MealieClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly downloader: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: MealieClientOptions = {}) {
    const baseUrl = options.baseUrl || process.env.MEALIE_URL;
    const apiToken = options.apiToken || process.env.MEALIE_API_TOKEN;
    if (!baseUrl) {
      throw new ConfigurationError("MEALIE_URL must be set in environment or passed to constructor");
    }
    if (!apiToken) {
      throw new ConfigurationError("MEALIE_API_TOKEN must be set in environment or passed to constructor");
    }

    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.sleep = options.sleep ?? defaultSleep;
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    const timeout = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout,
      headers: {
        Authorization: `Bearer ${apiToken}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      maxRedirects: 5,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: (status) => status < 400,
      paramsSerializer: { indexes: null },
      adapter: options.adapter,
    });
    this.downloader = axios.create({
      timeout,
      maxRedirects: 5,
      responseType: "arraybuffer",
      adapter: options.adapter,
    });
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  /**
   * Execute one logical request. 5xx responses and network failures are
   * retried on the fixed backoff schedule; 4xx responses fail at once.
   */
  async request(method: Method, path: string, options: RequestOptions = {}): Promise<JsonValue | null> {
    const url = path.startsWith("/") ? path : `/${path}`;
    const data = options.form ?? options.json;
    const headers = options.form ? { "Content-Type": "multipart/form-data" } : undefined;

    for (let attempt = 0; ; attempt++) {
      logger.debug({ method, path: url, attempt: attempt + 1 }, "Mealie request");
      try {
        const response = await this.http.request({ method, url, params: options.params, data, headers });
        return parseSuccessBody(bodyText(response.data));
      } catch (error) {
        if (!axios.isAxiosError(error)) {
          throw MealieApiError.transport(`Unexpected error: ${errorMessage(error)}`);
        }

        const response = error.response;
        if (response) {
          const body = bodyText(response.data);
          if (response.status >= 500 && attempt < MAX_RETRIES) {
            await this.backoff(method, url, attempt, `HTTP ${response.status}`);
            continue;
          }
          throw MealieApiError.http(response.status, body);
        }

        if (error.code !== undefined && NETWORK_ERROR_CODES.has(error.code)) {
          if (attempt < MAX_RETRIES) {
            await this.backoff(method, url, attempt, error.code);
            continue;
          }
          throw MealieApiError.transport(`Connection error: ${error.message}`);
        }

        throw MealieApiError.transport(`Unexpected error: ${error.message}`);
      }
    }
  }

  private async backoff(method: Method, path: string, attempt: number, reason: string): Promise<void> {
    const delay = RETRY_DELAYS_MS[attempt] ?? RETRY_DELAYS_MS[RETRY_DELAYS_MS.length - 1];
    logger.warn({ method, path, attempt: attempt + 1, delay, reason }, "Retrying Mealie request");
    await this.sleep(delay);
  }

  get(path: string, params?: QueryParams): Promise<JsonValue | null> {
    return this.request("GET", path, { params });
  }

  post(path: string, json?: unknown): Promise<JsonValue | null> {
    return this.request("POST", path, { json });
  }

  put(path: string, json?: unknown): Promise<JsonValue | null> {
    return this.request("PUT", path, { json });
  }

  patch(path: string, json?: unknown): Promise<JsonValue | null> {
    return this.request("PATCH", path, { json });
  }

  delete(path: string): Promise<JsonValue | null> {
    return this.request("DELETE", path);
  }

  async testConnection(): Promise<boolean> {
    try {
      const about = await this.get(CONNECTION_TEST_PATH);
      if (about === null) throw MealieApiError.transport(`Empty response from ${CONNECTION_TEST_PATH}`);
      return true;
    } catch (error) {
      if (error instanceof MealieApiError) throw error.withContext("Connection test failed");
      throw error;
    }
  }

  getAppInfo(): Promise<JsonValue | null> {
    return this.get(CONNECTION_TEST_PATH);
  }

  // Recipes

  searchRecipes(query: { search?: string; tags?: string[]; categories?: string[]; perPage: number }) {
    return this.get("/api/recipes", {
      search: query.search,
      tags: query.tags,
      categories: query.categories,
      page: 1,
      perPage: query.perPage,
    });
  }

  listRecipes(page: number, perPage: number, extra: QueryParams = {}) {
    return this.get("/api/recipes", { ...extra, page, perPage });
  }

  getRecipe(slug: string) {
    return this.get(`/api/recipes/${slug}`);
  }

  createRecipe(name: string) {
    return this.post("/api/recipes", { name });
  }

  createRecipeFromUrl(url: string, includeTags: boolean) {
    return this.post("/api/recipes/create/url", { url, includeTags });
  }

  createRecipesFromUrlsBulk(urls: string[], includeTags: boolean) {
    return this.post("/api/recipes/create/url/bulk", { urls, include_tags: includeTags });
  }

  createRecipeFromImage(image: string, extension: string) {
    return this.post("/api/recipes/create/image", { image, extension });
  }

  updateRecipe(slug: string, recipe: JsonObject) {
    return this.put(`/api/recipes/${slug}`, recipe);
  }

  patchRecipe(slug: string, changes: JsonObject) {
    return this.patch(`/api/recipes/${slug}`, changes);
  }

  updateRecipeIngredients(slug: string, ingredients: JsonObject[]) {
    return this.patch(`/api/recipes/${slug}`, { recipeIngredient: ingredients });
  }

  deleteRecipe(slug: string) {
    return this.delete(`/api/recipes/${slug}`);
  }

  duplicateRecipe(slug: string, name?: string) {
    return this.post(`/api/recipes/${slug}/duplicate`, name ? { name } : undefined);
  }

  updateRecipeLastMade(slug: string, timestamp?: string) {
    return this.patch(`/api/recipes/${slug}/last-made`, timestamp ? { timestamp } : undefined);
  }

  async downloadImage(url: string): Promise<DownloadedImage> {
    try {
      const response = await this.downloader.get<ArrayBuffer>(url);
      const contentType = String(response.headers["content-type"] ?? "");
      return { data: Buffer.from(response.data), extension: imageExtension(url, contentType) };
    } catch (error) {
      throw MealieApiError.transport(`Failed to download image from ${url}: ${errorMessage(error)}`);
    }
  }

  uploadRecipeImage(slug: string, image: DownloadedImage) {
    return this.request("PUT", `/api/recipes/${slug}/image`, { form: imageForm(image) });
  }

  bulkTagRecipes(slugs: string[], tags: JsonObject[]) {
    return this.post("/api/recipes/bulk-actions/tag", { recipes: slugs, tags });
  }

  bulkCategorizeRecipes(slugs: string[], categories: JsonObject[]) {
    return this.post("/api/recipes/bulk-actions/categorize", { recipes: slugs, categories });
  }

  bulkExportRecipes(recipeIds: string[], exportFormat: string) {
    return this.post("/api/recipes/bulk-actions/export", { recipes: recipeIds, format: exportFormat });
  }

  bulkUpdateRecipeSettings(recipeIds: string[], settings: JsonObject) {
    return this.post("/api/recipes/bulk-actions/settings", { recipes: recipeIds, settings });
  }

  // Ratings

  getCurrentUser() {
    return this.get("/api/users/self");
  }

  setRecipeRating(userId: string, slug: string, rating: number | undefined, isFavorite: boolean | undefined) {
    return this.post(`/api/users/${userId}/ratings/${slug}`, { rating, isFavorite });
  }

  listUserRatings() {
    return this.get("/api/users/self/ratings");
  }

  getRecipeRating(recipeId: string) {
    return this.get(`/api/users/self/ratings/${recipeId}`);
  }

  // Meal plans

  listMealplans(startDate: string, endDate: string) {
    return this.get("/api/households/mealplans", { start_date: startDate, end_date: endDate, perPage: ALL_PAGES });
  }

  getTodayMealplans() {
    return this.get("/api/households/mealplans/today");
  }

  getMealplan(id: string) {
    return this.get(`/api/households/mealplans/${id}`);
  }

  createMealplan(entry: JsonObject) {
    return this.post("/api/households/mealplans", entry);
  }

  updateMealplan(id: string, entry: JsonObject) {
    return this.put(`/api/households/mealplans/${id}`, entry);
  }

  deleteMealplan(id: string) {
    return this.delete(`/api/households/mealplans/${id}`);
  }

  listMealplanRules() {
    return this.get("/api/households/mealplans/rules");
  }

  getMealplanRule(id: string) {
    return this.get(`/api/households/mealplans/rules/${id}`);
  }

  createMealplanRule(rule: JsonObject) {
    return this.post("/api/households/mealplans/rules", rule);
  }

  updateMealplanRule(id: string, changes: JsonObject) {
    return this.patch(`/api/households/mealplans/rules/${id}`, changes);
  }

  deleteMealplanRule(id: string) {
    return this.delete(`/api/households/mealplans/rules/${id}`);
  }

  // Shopping

  listShoppingLists() {
    return this.get("/api/households/shopping/lists");
  }

  getShoppingList(id: string) {
    return this.get(`/api/households/shopping/lists/${id}`);
  }

  createShoppingList(name: string) {
    return this.post("/api/households/shopping/lists", { name });
  }

  deleteShoppingList(id: string) {
    return this.delete(`/api/households/shopping/lists/${id}`);
  }

  getShoppingItem(id: string) {
    return this.get(`/api/households/shopping/items/${id}`);
  }

  addShoppingItem(item: JsonObject) {
    return this.post("/api/households/shopping/items", item);
  }

  updateShoppingItem(id: string, item: JsonObject) {
    return this.put(`/api/households/shopping/items/${id}`, item);
  }

  deleteShoppingItem(id: string) {
    return this.delete(`/api/households/shopping/items/${id}`);
  }

  addRecipeToShoppingList(listId: string, recipeId: string, scale: number) {
    const body = scale !== 1 ? { recipeIncrementQuantity: scale } : undefined;
    return this.post(`/api/households/shopping/lists/${listId}/recipe/${recipeId}`, body);
  }

  removeRecipeFromShoppingList(listId: string, recipeId: string) {
    return this.post(`/api/households/shopping/lists/${listId}/recipe/${recipeId}/delete`);
  }

  // Foods and units

  listFoods(page = 1, perPage = DEFAULT_FOODS_PAGE_SIZE) {
    return this.get("/api/foods", { page, perPage });
  }

  getFood(id: string) {
    return this.get(`/api/foods/${id}`);
  }

  createFood(food: JsonObject) {
    return this.post("/api/foods", food);
  }

  /** Mealie only accepts a full food object, so the current one is fetched and merged. */
  async updateFood(id: string, changes: JsonObject) {
    const current = await this.getFood(id);
    return this.put(`/api/foods/${id}`, { ...toObject(current), ...changes });
  }

  deleteFood(id: string) {
    return this.delete(`/api/foods/${id}`);
  }

  mergeFoods(fromFood: string, toFood: string) {
    return this.post("/api/foods/merge", { fromFood, toFood });
  }

  listUnits(page = 1, perPage = DEFAULT_FOODS_PAGE_SIZE) {
    return this.get("/api/units", { page, perPage });
  }

  getUnit(id: string) {
    return this.get(`/api/units/${id}`);
  }

  createUnit(unit: JsonObject) {
    return this.post("/api/units", unit);
  }

  updateUnit(id: string, changes: JsonObject) {
    return this.patch(`/api/units/${id}`, changes);
  }

  deleteUnit(id: string) {
    return this.delete(`/api/units/${id}`);
  }

  mergeUnits(fromUnit: string, toUnit: string) {
    return this.post("/api/units/merge", { fromUnit, toUnit });
  }

  // Organizers

  listOrganizers(kind: OrganizerKind) {
    return this.get(`/api/organizers/${kind}`, { perPage: ALL_PAGES });
  }

  getOrganizer(kind: OrganizerKind, id: string) {
    return this.get(`/api/organizers/${kind}/${id}`);
  }

  createOrganizer(kind: OrganizerKind, name: string) {
    return this.post(`/api/organizers/${kind}`, { name });
  }

  updateOrganizer(kind: OrganizerKind, id: string, changes: JsonObject) {
    return this.patch(`/api/organizers/${kind}/${id}`, changes);
  }

  deleteOrganizer(kind: OrganizerKind, id: string) {
    return this.delete(`/api/organizers/${kind}/${id}`);
  }

  // Cookbooks

  listCookbooks() {
    return this.get("/api/households/cookbooks", { perPage: ALL_PAGES });
  }

  getCookbook(id: string) {
    return this.get(`/api/households/cookbooks/${id}`);
  }

  createCookbook(cookbook: JsonObject) {
    return this.post("/api/households/cookbooks", cookbook);
  }

  updateCookbook(id: string, cookbook: JsonObject) {
    return this.put(`/api/households/cookbooks/${id}`, cookbook);
  }

  deleteCookbook(id: string) {
    return this.delete(`/api/households/cookbooks/${id}`);
  }

  // Comments

  getRecipeComments(slug: string) {
    return this.get(`/api/recipes/${slug}/comments`);
  }

  createComment(recipeId: string, text: string) {
    return this.post("/api/comments", { recipeId, text });
  }

  getComment(id: string) {
    return this.get(`/api/comments/${id}`);
  }

  updateComment(id: string, comment: JsonObject) {
    return this.put(`/api/comments/${id}`, comment);
  }

  deleteComment(id: string) {
    return this.delete(`/api/comments/${id}`);
  }

  // Timeline

  listTimelineEvents(params: QueryParams) {
    return this.get("/api/recipes/timeline/events", params);
  }

  getTimelineEvent(id: string) {
    return this.get(`/api/recipes/timeline/events/${id}`);
  }

  createTimelineEvent(event: JsonObject) {
    return this.post("/api/recipes/timeline/events", event);
  }

  updateTimelineEvent(id: string, event: JsonObject) {
    return this.put(`/api/recipes/timeline/events/${id}`, event);
  }

  deleteTimelineEvent(id: string) {
    return this.delete(`/api/recipes/timeline/events/${id}`);
  }

  updateTimelineEventImage(id: string, image: DownloadedImage) {
    return this.request("PUT", `/api/recipes/timeline/events/${id}/image`, { form: imageForm(image) });
  }

  // Webhooks

  listWebhooks() {
    return this.get("/api/households/webhooks", { perPage: ALL_PAGES });
  }

  getWebhook(id: string) {
    return this.get(`/api/households/webhooks/${id}`);
  }

  createWebhook(webhook: JsonObject) {
    return this.post("/api/households/webhooks", webhook);
  }

  updateWebhook(id: string, webhook: JsonObject) {
    return this.put(`/api/households/webhooks/${id}`, webhook);
  }

  deleteWebhook(id: string) {
    return this.delete(`/api/households/webhooks/${id}`);
  }

  testWebhook(id: string) {
    return this.post(`/api/households/webhooks/${id}/test`);
  }

  // Event notifications

  listNotifications() {
    return this.get("/api/households/events/notifications", { perPage: ALL_PAGES });
  }

  getNotification(id: string) {
    return this.get(`/api/households/events/notifications/${id}`);
  }

  createNotification(notification: JsonObject) {
    return this.post("/api/households/events/notifications", notification);
  }

  updateNotification(id: string, notification: JsonObject) {
    return this.put(`/api/households/events/notifications/${id}`, notification);
  }

  deleteNotification(id: string) {
    return this.delete(`/api/households/events/notifications/${id}`);
  }

  testNotification(id: string) {
    return this.post(`/api/households/events/notifications/${id}/test`);
  }

  // Recipe actions

  listRecipeActions(params: QueryParams) {
    return this.get("/api/households/recipe-actions", params);
  }

  getRecipeAction(id: string) {
    return this.get(`/api/households/recipe-actions/${id}`);
  }

  createRecipeAction(action: JsonObject) {
    return this.post("/api/households/recipe-actions", action);
  }

  updateRecipeAction(id: string, action: JsonObject) {
    return this.put(`/api/households/recipe-actions/${id}`, action);
  }

  deleteRecipeAction(id: string) {
    return this.delete(`/api/households/recipe-actions/${id}`);
  }

  triggerRecipeAction(id: string, recipeSlug: string) {
    return this.post(`/api/households/recipe-actions/${id}/trigger/${recipeSlug}`);
  }

  // Ingredient parser

  parseIngredient(ingredient: string, parser: string) {
    return this.post("/api/parser/ingredient", { ingredient, parser });
  }

  parseIngredients(ingredients: string[], parser: string) {
    return this.post("/api/parser/ingredients", { ingredients, parser });
  }
}

function toObject(value: JsonValue | null): JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : {};
}

function imageForm(image: DownloadedImage): FormData {
  const form = new FormData();
  form.append("image", new Blob([image.data], { type: `image/${image.extension}` }), `image.${image.extension}`);
  form.append("extension", image.extension);
  return form;
}

/** Opens a client for the duration of one tool call. */
export type ClientFactory = () => MealieClient;
