import { z } from "zod";
import { CLEAR_FIELD, DEFAULT_FOODS_PAGE_SIZE } from "../constants.js";
import type { JsonValue } from "../types.js";

const datePattern = /^\d{4}-\d{2}-\d{2}$/;

export const DateSchema = z
  .string()
  .regex(datePattern, "Date must be YYYY-MM-DD format")
  .describe("Date in YYYY-MM-DD format");

const Id = (what: string) => z.string().min(1).describe(`${what} ID (UUID)`);
const Slug = z.string().min(1).describe("Recipe slug (URL identifier, e.g. 'chicken-parmesan')");
const NameList = (what: string) => z.array(z.string().min(1)).describe(`List of ${what} names`);
const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);
const JsonRecord = z.record(z.string(), JsonValueSchema);

export const EmptySchema = z.object({}).strict();

// Recipes

export const RecipesSearchSchema = z.object({
  query: z.string().default("").describe("Search term matched against recipe name and description"),
  tags: NameList("tag").optional(),
  categories: NameList("category").optional(),
  limit: z.number().int().min(1).max(100).default(10).describe("Maximum number of results (default 10)"),
}).strict();

export const RecipeSlugSchema = z.object({
  slug: Slug,
}).strict();

export const RecipesListSchema = z.object({
  page: z.number().int().min(1).default(1).describe("Page number (1-indexed)"),
  per_page: z.number().int().min(1).max(100).default(20).describe("Recipes per page (default 20)"),
}).strict();

const recipeFields = {
  description: z.string().optional().describe("Recipe description"),
  recipe_yield: z.string().optional().describe("Yield or servings, e.g. '4 servings'"),
  total_time: z.string().optional().describe("Total time, e.g. '1 hour 30 minutes'"),
  prep_time: z.string().optional().describe("Prep time, e.g. '20 minutes'"),
  cook_time: z.string().optional().describe("Cook time, e.g. '1 hour'"),
  ingredients: z.array(z.string()).optional().describe("Ingredient lines, e.g. ['2 cups flour', '1 tsp salt']"),
  instructions: z.array(z.string()).optional().describe("Instruction steps in order"),
};

export const RecipesCreateSchema = z.object({
  name: z.string().min(1).describe("Recipe name"),
  ...recipeFields,
  tags: NameList("tag").optional(),
  categories: NameList("category").optional(),
}).strict();

export const RecipesCreateFromUrlSchema = z.object({
  url: z.string().url().describe("URL of the recipe page to scrape"),
  include_tags: z.boolean().default(false).describe("Keep tags found on the scraped page"),
}).strict();

export const RecipesUpdateSchema = z.object({
  slug: Slug,
  name: z.string().min(1).optional().describe("New recipe name"),
  ...recipeFields,
  tags: NameList("tag").optional().describe("Tag names to add to the recipe's existing tags"),
  categories: NameList("category").optional().describe("Category names to add to the recipe's existing categories"),
  org_url: z.string().optional().describe("Original recipe URL"),
  image: z.string().optional().describe("Recipe image identifier"),
}).strict();

export const RecipesUpdateStructuredIngredientsSchema = z.object({
  slug: Slug,
  parsed_ingredients: z
    .array(JsonRecord)
    .min(1)
    .describe("Parsed ingredients, as returned in parsed_ingredients by mealie_parser_ingredients_batch"),
}).strict();

export const RecipesDuplicateSchema = z.object({
  slug: Slug,
  new_name: z.string().min(1).optional().describe("Name for the copy (Mealie defaults to 'Copy of ...')"),
}).strict();

export const RecipesUpdateLastMadeSchema = z.object({
  slug: Slug,
  timestamp: z.string().optional().describe("ISO 8601 timestamp; the server uses the current time when omitted"),
}).strict();

export const RecipesCreateFromUrlsBulkSchema = z.object({
  urls: z.array(z.string().url()).min(1).describe("Recipe URLs to import"),
  include_tags: z.boolean().default(false).describe("Keep tags found on the scraped pages"),
}).strict();

const RecipeIds = z.array(z.string().min(1)).min(1).describe("Recipe IDs (UUIDs)");

export const RecipesBulkTagSchema = z.object({
  recipe_ids: RecipeIds,
  tags: NameList("tag").min(1),
}).strict();

export const RecipesBulkCategorizeSchema = z.object({
  recipe_ids: RecipeIds,
  categories: NameList("category").min(1),
}).strict();

export const RecipesBulkDeleteSchema = z.object({
  recipe_ids: RecipeIds,
}).strict();

export const RecipesBulkExportSchema = z.object({
  recipe_ids: RecipeIds,
  export_format: z.string().default("json").describe("Export format (json, zip, ...)"),
}).strict();

export const RecipesBulkUpdateSettingsSchema = z.object({
  recipe_ids: RecipeIds,
  settings: JsonRecord.describe("Settings to apply, e.g. { \"public\": true, \"showNutrition\": false }"),
}).strict();

export const RecipesCreateFromImageSchema = z.object({
  image_data: z.string().min(1).describe("Base64 encoded image"),
  extension: z.string().default("jpg").describe("Image file extension (jpg, png, ...)"),
}).strict();

export const RecipesUploadImageFromUrlSchema = z.object({
  slug: Slug,
  image_url: z.string().url().describe("URL of the image to download and attach"),
}).strict();

export const RecipesSetRatingSchema = z.object({
  slug: Slug,
  rating: z.number().min(0).max(5).describe("Rating from 0 to 5, decimals allowed; 0 clears the rating"),
  is_favorite: z.boolean().optional().describe("Mark or unmark the recipe as a favorite"),
}).strict();

export const RecipesGetRatingSchema = z.object({
  recipe_id: Id("Recipe"),
}).strict();

// Meal plans

const EntryType = z.string().min(1).describe("Meal type: breakfast, lunch, dinner, side or snack");
const Clearable = (what: string) =>
  z.string().optional().describe(`${what}; pass '${CLEAR_FIELD}' to remove it`);

export const DateRangeSchema = z.object({
  start_date: DateSchema.optional().describe("Start date (YYYY-MM-DD), defaults to today"),
  end_date: DateSchema.optional().describe("End date (YYYY-MM-DD), defaults to 7 days after the start"),
}).strict();

export const MealplanIdSchema = z.object({
  mealplan_id: Id("Meal plan entry"),
}).strict();

export const MealplansGetDateSchema = z.object({
  meal_date: DateSchema,
}).strict();

export const MealplansCreateSchema = z.object({
  meal_date: DateSchema,
  entry_type: EntryType,
  recipe_id: z.string().optional().describe("Recipe ID to plan"),
  title: z.string().optional().describe("Title for a note-only entry"),
  text: z.string().optional().describe("Free text for the entry"),
}).strict();

const mealplanChanges = {
  meal_date: DateSchema.optional(),
  entry_type: EntryType.optional(),
  recipe_id: Clearable("Recipe ID"),
  title: Clearable("Entry title"),
  text: Clearable("Entry text"),
};

export const MealplansUpdateSchema = z.object({
  mealplan_id: Id("Meal plan entry"),
  ...mealplanChanges,
}).strict();

export const MealplansSearchSchema = z.object({
  query: z.string().min(1).describe("Text matched against recipe name, title and text"),
  start_date: DateSchema.optional().describe("Start date (YYYY-MM-DD), defaults to today"),
  end_date: DateSchema.optional().describe("End date (YYYY-MM-DD), defaults to 7 days after the start"),
}).strict();

export const MealplansUpdateBatchSchema = z.object({
  updates: z
    .array(z.object({ mealplan_id: Id("Meal plan entry"), ...mealplanChanges }).strict())
    .min(1)
    .describe("Updates to apply, each naming a mealplan_id and the fields to change"),
}).strict();

export const MealplanRuleIdSchema = z.object({
  rule_id: Id("Meal plan rule"),
}).strict();

export const MealplanRulesCreateSchema = z.object({
  name: z.string().min(1).describe("Rule name"),
  entry_type: EntryType,
  tags: NameList("tag").optional(),
  categories: NameList("category").optional(),
}).strict();

export const MealplanRulesUpdateSchema = z.object({
  rule_id: Id("Meal plan rule"),
  name: z.string().min(1).optional(),
  entry_type: EntryType.optional(),
  tags: NameList("tag").optional().describe("Tag names; replaces the rule's tags"),
  categories: NameList("category").optional().describe("Category names; replaces the rule's categories"),
}).strict();

// Shopping

export const ShoppingListIdSchema = z.object({
  list_id: Id("Shopping list"),
}).strict();

export const ShoppingListsCreateSchema = z.object({
  name: z.string().min(1).describe("Shopping list name"),
}).strict();

export const ShoppingItemsAddSchema = z.object({
  list_id: Id("Shopping list"),
  note: z.string().optional().describe("Free text, e.g. '2 lbs chicken breast'"),
  quantity: z.number().optional().describe("Quantity"),
  unit_id: z.string().optional().describe("Unit ID"),
  food_id: z.string().optional().describe("Food ID"),
  display: z.string().optional().describe("Display text"),
}).strict();

export const ShoppingItemsAddBulkSchema = z.object({
  list_id: Id("Shopping list"),
  items: z.array(z.string().min(1)).min(1).describe("Item notes, one per item"),
}).strict();

export const ShoppingItemsCheckSchema = z.object({
  item_id: Id("Shopping item"),
  checked: z.boolean().default(true).describe("true to check off, false to uncheck"),
}).strict();

export const ShoppingItemIdSchema = z.object({
  item_id: Id("Shopping item"),
}).strict();

export const ShoppingAddRecipeSchema = z.object({
  list_id: Id("Shopping list"),
  recipe_id: Id("Recipe"),
  scale: z.number().positive().default(1).describe("Multiplier for ingredient quantities"),
}).strict();

export const ShoppingGenerateFromMealplanSchema = z.object({
  start_date: DateSchema.optional().describe("Start date (YYYY-MM-DD), defaults to today"),
  end_date: DateSchema.optional().describe("End date (YYYY-MM-DD), defaults to 6 days after the start"),
  list_name: z.string().min(1).optional().describe("Name for the new list"),
}).strict();

export const ShoppingDeleteRecipeFromListSchema = z.object({
  item_id: Id("Shopping list"),
  recipe_id: Id("Recipe"),
}).strict();

// Foods and units

export const PageSchema = z.object({
  page: z.number().int().min(1).default(1).describe("Page number (1-indexed)"),
  per_page: z.number().int().min(1).max(500).default(DEFAULT_FOODS_PAGE_SIZE).describe("Items per page (default 50)"),
}).strict();

export const FoodIdSchema = z.object({
  food_id: Id("Food"),
}).strict();

export const FoodsCreateSchema = z.object({
  name: z.string().min(1).describe("Food name"),
  description: z.string().optional(),
  label_id: z.string().optional().describe("Label ID to assign"),
}).strict();

export const FoodsUpdateSchema = z.object({
  food_id: Id("Food"),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  label_id: z.string().optional().describe("Label ID to assign"),
}).strict();

export const FoodsMergeSchema = z.object({
  from_food_id: Id("Food to merge away"),
  to_food_id: Id("Food to keep"),
}).strict();

export const UnitIdSchema = z.object({
  unit_id: Id("Unit"),
}).strict();

export const UnitsCreateSchema = z.object({
  name: z.string().min(1).describe("Unit name"),
  description: z.string().optional(),
  abbreviation: z.string().optional().describe("Abbreviation, e.g. 'tbsp'"),
}).strict();

export const UnitsUpdateSchema = z.object({
  unit_id: Id("Unit"),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  abbreviation: z.string().optional(),
}).strict();

export const UnitsMergeSchema = z.object({
  from_unit_id: Id("Unit to merge away"),
  to_unit_id: Id("Unit to keep"),
}).strict();

// Organizers

export const OrganizerNameSchema = z.object({
  name: z.string().min(1).describe("Name"),
}).strict();

export const CategoryIdSchema = z.object({
  category_id: Id("Category"),
}).strict();

export const CategoriesUpdateSchema = z.object({
  category_id: Id("Category"),
  name: z.string().min(1).optional().describe("New name"),
  slug: z.string().min(1).optional().describe("New slug"),
}).strict();

export const TagIdSchema = z.object({
  tag_id: Id("Tag"),
}).strict();

export const TagsUpdateSchema = z.object({
  tag_id: Id("Tag"),
  name: z.string().min(1).optional().describe("New name"),
  slug: z.string().min(1).optional().describe("New slug"),
}).strict();

export const ToolIdSchema = z.object({
  tool_id: Id("Kitchen tool"),
}).strict();

export const ToolsUpdateSchema = z.object({
  tool_id: Id("Kitchen tool"),
  name: z.string().min(1).optional().describe("New name"),
  slug: z.string().min(1).optional().describe("New slug"),
}).strict();

// Cookbooks

export const CookbookIdSchema = z.object({
  cookbook_id: Id("Cookbook"),
}).strict();

export const CookbooksCreateSchema = z.object({
  name: z.string().min(1).describe("Cookbook name"),
  description: z.string().optional(),
  slug: z.string().optional().describe("URL slug; Mealie derives one from the name when omitted"),
  public: z.boolean().default(false).describe("Visible to everyone in the group"),
}).strict();

export const CookbooksUpdateSchema = z.object({
  cookbook_id: Id("Cookbook"),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  slug: z.string().optional(),
  public: z.boolean().optional(),
}).strict();

// Comments

export const CommentsGetRecipeSchema = z.object({
  recipe_slug: Slug,
}).strict();

export const CommentsCreateSchema = z.object({
  recipe_id: Id("Recipe"),
  text: z.string().min(1).describe("Comment text"),
}).strict();

export const CommentIdSchema = z.object({
  comment_id: Id("Comment"),
}).strict();

export const CommentsUpdateSchema = z.object({
  comment_id: Id("Comment"),
  text: z.string().min(1).describe("New comment text"),
}).strict();

// Timeline

export const TimelineListSchema = z.object({
  page: z.number().int().min(1).default(1),
  per_page: z.number().int().min(1).max(500).default(50),
  order_by: z.string().optional().describe("Field to sort by, e.g. 'timestamp'"),
  order_direction: z.enum(["asc", "desc"]).optional(),
  query_filter: z.string().optional().describe("Mealie query filter, e.g. 'recipeId = \"...\"'"),
}).strict();

export const TimelineEventIdSchema = z.object({
  event_id: Id("Timeline event"),
}).strict();

export const TimelineCreateSchema = z.object({
  recipe_id: Id("Recipe"),
  subject: z.string().min(1).describe("Short event subject"),
  event_type: z.enum(["info", "system", "comment"]).default("info"),
  event_message: z.string().optional().describe("Longer event message"),
  user_id: z.string().optional().describe("User ID; defaults to the token's user"),
  timestamp: z.string().optional().describe("ISO 8601 timestamp; defaults to now"),
}).strict();

export const TimelineUpdateSchema = z.object({
  event_id: Id("Timeline event"),
  subject: z.string().optional(),
  event_type: z.enum(["info", "system", "comment"]).optional(),
  event_message: z.string().optional(),
  timestamp: z.string().optional(),
}).strict();

export const TimelineUpdateImageSchema = z.object({
  event_id: Id("Timeline event"),
  image_url: z.string().url().describe("URL of the image to download and attach"),
}).strict();

// Webhooks, notifications and recipe actions

export const ItemIdSchema = z.object({
  item_id: z.string().min(1).describe("Item ID (UUID)"),
}).strict();

const ScheduledTime = z
  .string()
  .regex(/^\d{2}:\d{2}(:\d{2})?$/, "Time must be HH:MM or HH:MM:SS")
  .describe("Daily trigger time, HH:MM:SS");

export const WebhooksCreateSchema = z.object({
  url: z.string().url().describe("URL that receives the webhook POST"),
  scheduled_time: ScheduledTime,
  enabled: z.boolean().default(true),
  name: z.string().optional(),
  webhook_type: z.string().default("mealplan").describe("Webhook type; Mealie supports 'mealplan'"),
}).strict();

export const WebhooksUpdateSchema = z.object({
  item_id: z.string().min(1).describe("Webhook ID (UUID)"),
  url: z.string().url().optional(),
  scheduled_time: ScheduledTime.optional(),
  enabled: z.boolean().optional(),
  name: z.string().optional(),
  webhook_type: z.string().optional(),
}).strict();

export const NotificationsCreateSchema = z.object({
  name: z.string().min(1).describe("Notifier name"),
  apprise_url: z.string().optional().describe("Apprise URL, e.g. 'discord://webhook_id/webhook_token'"),
  enabled: z.boolean().default(true),
  options: z.record(z.string(), z.boolean()).optional().describe("Event switches, e.g. { \"recipeCreated\": true }"),
}).strict();

export const NotificationsUpdateSchema = z.object({
  item_id: z.string().min(1).describe("Notifier ID (UUID)"),
  name: z.string().min(1).optional(),
  apprise_url: z.string().optional(),
  enabled: z.boolean().optional(),
  options: z.record(z.string(), z.boolean()).optional(),
}).strict();

export const RecipeActionsListSchema = z.object({
  page: z.number().int().min(1).default(1),
  per_page: z.number().int().min(1).max(500).default(50),
  order_by: z.string().optional(),
  order_direction: z.enum(["asc", "desc"]).optional(),
}).strict();

const ActionType = z.enum(["link", "post"]).describe("'link' opens the URL, 'post' sends the recipe to it");

export const RecipeActionsCreateSchema = z.object({
  action_type: ActionType,
  title: z.string().min(1).describe("Button title shown on the recipe"),
  url: z.string().min(1).describe("Target URL; may contain recipe placeholders"),
}).strict();

export const RecipeActionsUpdateSchema = z.object({
  item_id: z.string().min(1).describe("Recipe action ID (UUID)"),
  action_type: ActionType.optional(),
  title: z.string().min(1).optional(),
  url: z.string().min(1).optional(),
}).strict();

export const RecipeActionsTriggerSchema = z.object({
  item_id: z.string().min(1).describe("Recipe action ID (UUID)"),
  recipe_slug: Slug,
}).strict();

// Ingredient parser

const Parser = z.enum(["nlp", "brute", "openai"]).default("nlp").describe("Parser to use (default 'nlp')");

export const ParserIngredientSchema = z.object({
  ingredient: z.string().min(1).describe("Ingredient line, e.g. '2 cups all-purpose flour'"),
  parser: Parser,
}).strict();

export const ParserIngredientsBatchSchema = z.object({
  ingredients: z.array(z.string().min(1)).min(1).describe("Ingredient lines"),
  parser: Parser,
}).strict();

export type RecipesSearchInput = z.infer<typeof RecipesSearchSchema>;
export type RecipeSlugInput = z.infer<typeof RecipeSlugSchema>;
export type RecipesListInput = z.infer<typeof RecipesListSchema>;
export type RecipesCreateInput = z.infer<typeof RecipesCreateSchema>;
export type RecipesCreateFromUrlInput = z.infer<typeof RecipesCreateFromUrlSchema>;
export type RecipesUpdateInput = z.infer<typeof RecipesUpdateSchema>;
export type RecipesUpdateStructuredIngredientsInput = z.infer<typeof RecipesUpdateStructuredIngredientsSchema>;
export type RecipesDuplicateInput = z.infer<typeof RecipesDuplicateSchema>;
export type RecipesUpdateLastMadeInput = z.infer<typeof RecipesUpdateLastMadeSchema>;
export type RecipesCreateFromUrlsBulkInput = z.infer<typeof RecipesCreateFromUrlsBulkSchema>;
export type RecipesBulkTagInput = z.infer<typeof RecipesBulkTagSchema>;
export type RecipesBulkCategorizeInput = z.infer<typeof RecipesBulkCategorizeSchema>;
export type RecipesBulkDeleteInput = z.infer<typeof RecipesBulkDeleteSchema>;
export type RecipesBulkExportInput = z.infer<typeof RecipesBulkExportSchema>;
export type RecipesBulkUpdateSettingsInput = z.infer<typeof RecipesBulkUpdateSettingsSchema>;
export type RecipesCreateFromImageInput = z.infer<typeof RecipesCreateFromImageSchema>;
export type RecipesUploadImageFromUrlInput = z.infer<typeof RecipesUploadImageFromUrlSchema>;
export type RecipesSetRatingInput = z.infer<typeof RecipesSetRatingSchema>;
export type RecipesGetRatingInput = z.infer<typeof RecipesGetRatingSchema>;

export type DateRangeInput = z.infer<typeof DateRangeSchema>;
export type MealplanIdInput = z.infer<typeof MealplanIdSchema>;
export type MealplansGetDateInput = z.infer<typeof MealplansGetDateSchema>;
export type MealplansCreateInput = z.infer<typeof MealplansCreateSchema>;
export type MealplansUpdateInput = z.infer<typeof MealplansUpdateSchema>;
export type MealplansSearchInput = z.infer<typeof MealplansSearchSchema>;
export type MealplansUpdateBatchInput = z.infer<typeof MealplansUpdateBatchSchema>;
export type MealplanRuleIdInput = z.infer<typeof MealplanRuleIdSchema>;
export type MealplanRulesCreateInput = z.infer<typeof MealplanRulesCreateSchema>;
export type MealplanRulesUpdateInput = z.infer<typeof MealplanRulesUpdateSchema>;

export type ShoppingListIdInput = z.infer<typeof ShoppingListIdSchema>;
export type ShoppingListsCreateInput = z.infer<typeof ShoppingListsCreateSchema>;
export type ShoppingItemsAddInput = z.infer<typeof ShoppingItemsAddSchema>;
export type ShoppingItemsAddBulkInput = z.infer<typeof ShoppingItemsAddBulkSchema>;
export type ShoppingItemsCheckInput = z.infer<typeof ShoppingItemsCheckSchema>;
export type ShoppingItemIdInput = z.infer<typeof ShoppingItemIdSchema>;
export type ShoppingAddRecipeInput = z.infer<typeof ShoppingAddRecipeSchema>;
export type ShoppingGenerateFromMealplanInput = z.infer<typeof ShoppingGenerateFromMealplanSchema>;
export type ShoppingDeleteRecipeFromListInput = z.infer<typeof ShoppingDeleteRecipeFromListSchema>;

export type PageInput = z.infer<typeof PageSchema>;
export type FoodIdInput = z.infer<typeof FoodIdSchema>;
export type FoodsCreateInput = z.infer<typeof FoodsCreateSchema>;
export type FoodsUpdateInput = z.infer<typeof FoodsUpdateSchema>;
export type FoodsMergeInput = z.infer<typeof FoodsMergeSchema>;
export type UnitIdInput = z.infer<typeof UnitIdSchema>;
export type UnitsCreateInput = z.infer<typeof UnitsCreateSchema>;
export type UnitsUpdateInput = z.infer<typeof UnitsUpdateSchema>;
export type UnitsMergeInput = z.infer<typeof UnitsMergeSchema>;

export type OrganizerNameInput = z.infer<typeof OrganizerNameSchema>;
export type CategoryIdInput = z.infer<typeof CategoryIdSchema>;
export type CategoriesUpdateInput = z.infer<typeof CategoriesUpdateSchema>;
export type TagIdInput = z.infer<typeof TagIdSchema>;
export type TagsUpdateInput = z.infer<typeof TagsUpdateSchema>;
export type ToolIdInput = z.infer<typeof ToolIdSchema>;
export type ToolsUpdateInput = z.infer<typeof ToolsUpdateSchema>;

export type CookbookIdInput = z.infer<typeof CookbookIdSchema>;
export type CookbooksCreateInput = z.infer<typeof CookbooksCreateSchema>;
export type CookbooksUpdateInput = z.infer<typeof CookbooksUpdateSchema>;

export type CommentsGetRecipeInput = z.infer<typeof CommentsGetRecipeSchema>;
export type CommentsCreateInput = z.infer<typeof CommentsCreateSchema>;
export type CommentIdInput = z.infer<typeof CommentIdSchema>;
export type CommentsUpdateInput = z.infer<typeof CommentsUpdateSchema>;

export type TimelineListInput = z.infer<typeof TimelineListSchema>;
export type TimelineEventIdInput = z.infer<typeof TimelineEventIdSchema>;
export type TimelineCreateInput = z.infer<typeof TimelineCreateSchema>;
export type TimelineUpdateInput = z.infer<typeof TimelineUpdateSchema>;
export type TimelineUpdateImageInput = z.infer<typeof TimelineUpdateImageSchema>;

export type ItemIdInput = z.infer<typeof ItemIdSchema>;
export type WebhooksCreateInput = z.infer<typeof WebhooksCreateSchema>;
export type WebhooksUpdateInput = z.infer<typeof WebhooksUpdateSchema>;
export type NotificationsCreateInput = z.infer<typeof NotificationsCreateSchema>;
export type NotificationsUpdateInput = z.infer<typeof NotificationsUpdateSchema>;
export type RecipeActionsListInput = z.infer<typeof RecipeActionsListSchema>;
export type RecipeActionsCreateInput = z.infer<typeof RecipeActionsCreateSchema>;
export type RecipeActionsUpdateInput = z.infer<typeof RecipeActionsUpdateSchema>;
export type RecipeActionsTriggerInput = z.infer<typeof RecipeActionsTriggerSchema>;

export type ParserIngredientInput = z.infer<typeof ParserIngredientSchema>;
export type ParserIngredientsBatchInput = z.infer<typeof ParserIngredientsBatchSchema>;
