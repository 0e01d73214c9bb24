// src/domain/types.ts
// Shared type definitions for the comment query compiler.

export type Scalar = string | number | boolean;

/** A parameter that expects a list but tolerates a single value. */
export type ListParam = Scalar | Scalar[];

export type SortOrder = "asc" | "desc";

// ---- Metadata sub-queries ----

export interface MetaClause {
  key?: string;
  value?: Scalar | Scalar[] | null;
  compare?: string;
  type?: string;
}

export interface MetaQueryGroup {
  relation?: string;
  clauses: Array<MetaClause | MetaQueryGroup>;
}

export type MetaQuery = Array<MetaClause | MetaQueryGroup> | MetaQueryGroup;

// ---- Temporal sub-queries ----

export interface DateParts {
  year?: Scalar;
  month?: Scalar;
  day?: Scalar;
}

export interface DateClause {
  after?: string | DateParts;
  before?: string | DateParts;
  inclusive?: boolean;
  column?: string;
  year?: Scalar;
  month?: Scalar;
  monthnum?: Scalar;
  day?: Scalar;
}

export interface DateQueryGroup {
  relation?: string;
  column?: string;
  clauses: DateClause[];
}

export type DateQuery = DateClause[] | DateQueryGroup;

// ---- Free-text search fields ----

export interface SearchFieldSelection {
  fields?: string[];
  meta?: string | string[];
}

export type SearchFields = string[] | SearchFieldSelection;

// ---- Input ----

export interface FilterRequest {
  // pagination
  number?: Scalar | null;
  offset?: Scalar | null;
  paged?: Scalar | null;
  page?: Scalar | null;

  // sort
  order?: string | null;
  orderby?: string | null;
  order_by?: string | null;

  // identity
  author_email?: string | null;
  author_url?: string | null;
  user_id?: Scalar | null;

  // include / exclude sets
  author__in?: ListParam | null;
  author__not_in?: ListParam | null;
  comment__in?: ListParam | null;
  comment__not_in?: ListParam | null;
  parent__in?: ListParam | null;
  parent__not_in?: ListParam | null;
  post_author__in?: ListParam | null;
  post_author__not_in?: ListParam | null;
  post__in?: ListParam | null;
  post__not_in?: ListParam | null;
  type__in?: ListParam | null;
  type__not_in?: ListParam | null;

  // hierarchy
  parent?: Scalar | null;
  hierarchical?: Scalar | null;

  // post
  post_author?: Scalar | null;
  post_id?: Scalar | null;
  post_status?: ListParam | null;
  post_type?: string | null;
  post_name?: string | null;
  post_parent?: Scalar | null;

  karma?: Scalar | null;

  // moderation / type
  status?: ListParam | null;
  include_unapproved?: ListParam | null;
  type?: ListParam | null;

  fields?: string | null;

  // metadata
  meta_key?: string | null;
  meta_value?: Scalar | Scalar[] | null;
  meta_query?: MetaQuery | null;

  date_query?: DateQuery | null;

  // free text
  search?: string | null;
  search_fields?: SearchFields | null;
}

// ---- Output (query DSL) ----

export type FieldValue = string | number | boolean;

export interface RangeBounds {
  gt?: FieldValue;
  gte?: FieldValue;
  lt?: FieldValue;
  lte?: FieldValue;
}

export interface BoolBody {
  must?: QueryNode | QueryNode[];
  must_not?: QueryNode | QueryNode[];
  should?: QueryNode[];
}

export interface MultiMatchBody {
  query: string;
  fields: string[];
  type?: "phrase";
  boost?: number;
  fuzziness?: number | string;
  operator?: "and" | "or";
}

export type QueryNode =
  | { term: Record<string, FieldValue> }
  | { terms: Record<string, FieldValue[]> }
  | { range: Record<string, RangeBounds> }
  | { exists: { field: string } }
  | { match_phrase: Record<string, string> }
  | { multi_match: MultiMatchBody }
  | { match_all: { boost: number } }
  | { bool: BoolBody };

/** The root filter node: a conjunction of every active dimension. */
export interface FilterTree {
  bool: { must: QueryNode[] };
}

export type SortClause = Record<string, { order: SortOrder }>;

export interface SourceFilter {
  includes: string[];
}

export interface CompiledQuery {
  from: number;
  size: number;
  sort: SortClause[];
  query: QueryNode;
  post_filter?: FilterTree;
  _source?: SourceFilter;
}

// ---- Collaborators ----

export interface MetaQueryCompiler {
  compile(query: MetaQuery): QueryNode | null;
}

export interface DateFilter {
  and?: QueryNode;
  or?: QueryNode;
}

export interface DateRangeFilterCompiler {
  compile(query: DateQuery): DateFilter;
}

// ---- Indexed documents ----

export interface CommentRecord {
  comment_ID: string | number;
  comment_post_ID: string | number;
  comment_author: string;
  comment_author_email: string;
  comment_author_url: string;
  comment_author_IP: string;
  comment_date: string;
  comment_date_gmt: string;
  comment_content: string;
  comment_karma: string | number;
  comment_approved: string | number;
  comment_agent: string;
  comment_type?: string | null;
  comment_parent: string | number;
  user_id: string | number;
}

export interface PostRecord {
  post_author: string | number;
  post_status: string;
  post_type: string;
  post_name: string;
  post_parent: string | number;
}

export type MetaValue = Scalar | null;

export interface TypedMetaValue {
  value: string;
  raw: string;
  long?: number;
  double?: number;
  boolean: boolean;
  date?: string;
  datetime?: string;
  time?: string;
}

export type CommentRow = CommentRecord & { ID: string | number };

export interface CommentDocument extends CommentRow {
  comment_post_author_ID: string | number | null;
  comment_post_status: string | null;
  comment_post_type: string | null;
  comment_post_name: string | null;
  comment_post_parent: string | number | null;
  comment_type: string;
  meta: Record<string, TypedMetaValue[]>;
}
