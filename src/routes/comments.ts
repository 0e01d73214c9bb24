// src/routes/comments.ts
// Comment query tools for the MCP server: compile a filter request, prepare
// an index document, provision the index mapping.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { compileQuery } from "../domain/compiler.js";
import type {
  CommentDocument,
  CompiledQuery,
  DateClause,
  DateQueryGroup,
  FilterRequest,
  MetaClause,
  MetaQueryGroup
} from "../domain/types.js";
import { prepareDocument } from "../services/document.js";
import { putCommentMapping, type PutMappingResult } from "../services/os-bootstrap.js";
import { debug } from "../services/log.js";

const log = debug("comment-query:routes");

// ---- Schemas ----

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const listParam = z.union([scalar, z.array(scalar)]);
const idValue = z.union([z.string(), z.number()]);

const metaClause: z.ZodType<MetaClause> = z.object({
  key: z.string().optional(),
  value: z.union([scalar, z.array(scalar)]).nullable().optional(),
  compare: z.string().optional(),
  type: z.string().optional()
});

const metaGroup: z.ZodType<MetaQueryGroup> = z.lazy(() =>
  z.object({
    relation: z.string().optional(),
    clauses: z.array(z.union([metaGroup, metaClause]))
  })
);

const dateParts = z.object({
  year: scalar.optional(),
  month: scalar.optional(),
  day: scalar.optional()
});

const dateClause: z.ZodType<DateClause> = z.object({
  after: z.union([z.string(), dateParts]).optional(),
  before: z.union([z.string(), dateParts]).optional(),
  inclusive: z.boolean().optional(),
  column: z.string().optional(),
  year: scalar.optional(),
  month: scalar.optional(),
  monthnum: scalar.optional(),
  day: scalar.optional()
});

const dateGroup: z.ZodType<DateQueryGroup> = z.object({
  relation: z.string().optional(),
  column: z.string().optional(),
  clauses: z.array(dateClause)
});

export const filterRequestShape = {
  number: scalar.nullable().optional().describe("Page size; defaults to the max result window"),
  offset: scalar.nullable().optional().describe("Result offset; wins over paged"),
  paged: scalar.nullable().optional().describe("1-based page number"),
  page: scalar.nullable().optional().describe("Alias of paged"),
  order: z.string().nullable().optional().describe("asc or desc (default desc)"),
  orderby: z.string().nullable().optional().describe("Sort alias, default comment_date_gmt"),
  order_by: z.string().nullable().optional().describe("Alias of orderby"),
  author_email: z.string().nullable().optional(),
  author_url: z.string().nullable().optional(),
  user_id: scalar.nullable().optional(),
  author__in: listParam.nullable().optional(),
  author__not_in: listParam.nullable().optional(),
  comment__in: listParam.nullable().optional(),
  comment__not_in: listParam.nullable().optional(),
  parent__in: listParam.nullable().optional(),
  parent__not_in: listParam.nullable().optional(),
  post_author__in: listParam.nullable().optional(),
  post_author__not_in: listParam.nullable().optional(),
  post__in: listParam.nullable().optional(),
  post__not_in: listParam.nullable().optional(),
  type__in: listParam.nullable().optional(),
  type__not_in: listParam.nullable().optional(),
  parent: scalar.nullable().optional(),
  hierarchical: scalar.nullable().optional().describe("Truthy pins an empty parent to top-level comments"),
  post_author: scalar.nullable().optional(),
  post_id: scalar.nullable().optional(),
  post_status: listParam.nullable().optional().describe("Comma list or array; 'any' disables"),
  post_type: z.string().nullable().optional(),
  post_name: z.string().nullable().optional(),
  post_parent: scalar.nullable().optional(),
  karma: scalar.nullable().optional(),
  status: listParam.nullable().optional().describe("hold, approve, other literals; 'all' disables"),
  include_unapproved: listParam.nullable().optional().describe("User ids or author emails"),
  type: listParam.nullable().optional(),
  fields: z.string().nullable().optional().describe("'ids' limits the source to comment_ID"),
  meta_key: z.string().nullable().optional(),
  meta_value: z.union([scalar, z.array(scalar)]).nullable().optional(),
  meta_query: z.union([z.array(z.union([metaGroup, metaClause])), metaGroup]).nullable().optional(),
  date_query: z.union([z.array(dateClause), dateGroup]).nullable().optional(),
  search: z.string().nullable().optional().describe("Free-text search term"),
  search_fields: z
    .union([
      z.array(z.string()),
      z.object({ fields: z.array(z.string()).optional(), meta: z.union([z.string(), z.array(z.string())]).optional() })
    ])
    .nullable()
    .optional()
};

export const filterRequestSchema = z.object(filterRequestShape);

export const commentShape = {
  comment_ID: idValue,
  comment_post_ID: idValue,
  comment_author: z.string(),
  comment_author_email: z.string(),
  comment_author_url: z.string(),
  comment_author_IP: z.string(),
  comment_date: z.string(),
  comment_date_gmt: z.string(),
  comment_content: z.string(),
  comment_karma: idValue,
  comment_approved: idValue,
  comment_agent: z.string(),
  comment_type: z.string().nullable().optional(),
  comment_parent: idValue,
  user_id: idValue
};

const postSchema = z.object({
  post_author: idValue,
  post_status: z.string(),
  post_type: z.string(),
  post_name: z.string(),
  post_parent: idValue
});

export const prepareDocumentShape = {
  comment: z.object(commentShape),
  post: postSchema.nullable().optional(),
  meta: z.record(z.union([scalar.nullable(), z.array(scalar.nullable())])).optional()
};

const prepareDocumentSchema = z.object(prepareDocumentShape);

export const putMappingShape = {
  index: z.string().optional().describe("Index name, default from config index.name"),
  version: z.string().optional().describe("Backend version; read from the cluster when omitted"),
  distribution: z.string().optional().describe("'opensearch' always takes the typeless mapping")
};

const putMappingSchema = z.object(putMappingShape);

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

// ---- Handlers ----

export function handleCompileQuery(args: unknown): CompiledQuery {
  const parsed = filterRequestSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new Error(`comments.compile_query: invalid request (${describeIssues(parsed.error)})`);
  }
  const request: FilterRequest = parsed.data;
  return compileQuery(request);
}

export function handlePrepareDocument(args: unknown): { document: CommentDocument | null } {
  const parsed = prepareDocumentSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new Error(`comments.prepare_document: invalid input (${describeIssues(parsed.error)})`);
  }
  const { comment, post, meta } = parsed.data;
  return { document: prepareDocument(comment, post, meta ?? {}) };
}

export async function handlePutMapping(args: unknown): Promise<PutMappingResult> {
  const parsed = putMappingSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new Error(`comments.put_mapping: invalid input (${describeIssues(parsed.error)})`);
  }
  return putCommentMapping(parsed.data);
}

function asToolResult(payload: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(payload) }] };
}

// ---- Public registration ----
export function registerComments(server: McpServer) {
  server.tool(
    "comments.compile_query",
    "Compile a comment filter/sort request into an OpenSearch query document (from/size/sort/query/post_filter).",
    filterRequestShape,
    async (args) => {
      const compiled = handleCompileQuery(args);
      log("compile_query", { has_filter: compiled.post_filter !== undefined });
      return asToolResult(compiled);
    }
  );

  server.tool(
    "comments.prepare_document",
    "Build the index document for a comment, its parent post and its meta.",
    prepareDocumentShape,
    async (args) => asToolResult(handlePrepareDocument(args))
  );

  server.tool(
    "comments.put_mapping",
    "Create the comment index with the mapping that matches the backend version.",
    putMappingShape,
    async (args) => asToolResult(await handlePutMapping(args))
  );
}
