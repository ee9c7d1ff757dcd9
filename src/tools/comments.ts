import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ClientFactory } from "../services/client.js";
import { CommentsGetRecipeSchema, CommentsCreateSchema, CommentIdSchema, CommentsUpdateSchema } from "../schemas/index.js";
import type { CommentsGetRecipeInput, CommentsCreateInput, CommentIdInput, CommentsUpdateInput } from "../schemas/index.js";
import { asObject, runTool, toToolResult } from "../services/helpers.js";
import { DESTRUCTIVE, IDEMPOTENT_WRITE, READ_ONLY, WRITE } from "./annotations.js";

export async function commentsGetRecipe(openClient: ClientFactory, params: CommentsGetRecipeInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    comments: await client.getRecipeComments(params.recipe_slug),
  }));
}

export async function commentsCreate(openClient: ClientFactory, params: CommentsCreateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const comment = await client.createComment(params.recipe_id, params.text);
    return { success: true, message: "Comment created successfully", comment };
  });
}

export async function commentsGet(openClient: ClientFactory, params: CommentIdInput): Promise<string> {
  return runTool(openClient, async (client) => ({
    success: true,
    comment: await client.getComment(params.comment_id),
  }));
}

export async function commentsUpdate(openClient: ClientFactory, params: CommentsUpdateInput): Promise<string> {
  return runTool(openClient, async (client) => {
    const current = asObject(await client.getComment(params.comment_id));
    const comment = await client.updateComment(params.comment_id, {
      ...current,
      id: params.comment_id,
      text: params.text,
    });
    return { success: true, message: "Comment updated successfully", comment };
  });
}

export async function commentsDelete(openClient: ClientFactory, params: CommentIdInput): Promise<string> {
  return runTool(openClient, async (client) => {
    await client.deleteComment(params.comment_id);
    return { success: true, message: "Comment deleted successfully" };
  });
}

export function registerCommentTools(server: McpServer, openClient: ClientFactory): void {
  server.registerTool(
    "mealie_comments_get_recipe",
    {
      title: "Recipe Comments",
      description: "List the comments left on a recipe. Returns: { success, comments }",
      inputSchema: CommentsGetRecipeSchema,
      annotations: READ_ONLY,
    },
    async (params: CommentsGetRecipeInput) => toToolResult(await commentsGetRecipe(openClient, params))
  );

  server.registerTool(
    "mealie_comments_create",
    {
      title: "Add Comment",
      description: "Comment on a recipe as the token's user. Takes the recipe id, not the slug.",
      inputSchema: CommentsCreateSchema,
      annotations: WRITE,
    },
    async (params: CommentsCreateInput) => toToolResult(await commentsCreate(openClient, params))
  );

  server.registerTool(
    "mealie_comments_get",
    {
      title: "Get Comment",
      description: "Get one comment by id.",
      inputSchema: CommentIdSchema,
      annotations: READ_ONLY,
    },
    async (params: CommentIdInput) => toToolResult(await commentsGet(openClient, params))
  );

  server.registerTool(
    "mealie_comments_update",
    {
      title: "Edit Comment",
      description: "Replace a comment's text.",
      inputSchema: CommentsUpdateSchema,
      annotations: IDEMPOTENT_WRITE,
    },
    async (params: CommentsUpdateInput) => toToolResult(await commentsUpdate(openClient, params))
  );

  server.registerTool(
    "mealie_comments_delete",
    {
      title: "Delete Comment",
      description: "Delete a comment by id.",
      inputSchema: CommentIdSchema,
      annotations: DESTRUCTIVE,
    },
    async (params: CommentIdInput) => toToolResult(await commentsDelete(openClient, params))
  );
}
