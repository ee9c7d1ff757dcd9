import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { MealieClient } from "./services/client.js";
import type { ClientFactory, MealieClientOptions } from "./services/client.js";
import { registerUtilityTools } from "./tools/utility.js";
import { registerRecipeTools } from "./tools/recipes.js";
import { registerMealplanTools } from "./tools/mealplans.js";
import { registerShoppingTools } from "./tools/shopping.js";
import { registerFoodTools } from "./tools/foods.js";
import { registerOrganizerTools } from "./tools/organizers.js";
import { registerCookbookTools } from "./tools/cookbooks.js";
import { registerCommentTools } from "./tools/comments.js";
import { registerTimelineTools } from "./tools/timeline.js";
import { registerWebhookTools } from "./tools/webhooks.js";
import { registerNotificationTools } from "./tools/notifications.js";
import { registerRecipeActionTools } from "./tools/recipe-actions.js";
import { registerParserTools } from "./tools/parser.js";
import { registerRecipeResources } from "./resources/recipes.js";
import { registerMealplanResources } from "./resources/mealplans.js";
import { registerShoppingResources } from "./resources/shopping.js";

/** Each tool call opens its own client, so agents never outlive the call. */
export function clientFactory(options: MealieClientOptions = {}): ClientFactory {
  return () => new MealieClient(options);
}

export function createServer(openClient: ClientFactory = clientFactory()): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerUtilityTools(server, openClient);
  registerRecipeTools(server, openClient);
  registerMealplanTools(server, openClient);
  registerShoppingTools(server, openClient);
  registerFoodTools(server, openClient);
  registerOrganizerTools(server, openClient);
  registerCookbookTools(server, openClient);
  registerCommentTools(server, openClient);
  registerTimelineTools(server, openClient);
  registerWebhookTools(server, openClient);
  registerNotificationTools(server, openClient);
  registerRecipeActionTools(server, openClient);
  registerParserTools(server, openClient);

  registerRecipeResources(server, openClient);
  registerMealplanResources(server, openClient);
  registerShoppingResources(server, openClient);

  return server;
}
