// src/domain/filters.ts
// Filter dimensions for comment queries. Each dimension reads one request
// parameter and yields at most one subtree for the root `bool.must` list.

import { absInt, isEmpty, isNumeric, parseList, toInt, toList, toTrimmedList } from "./coerce.js";
import { toMetaGroup } from "./meta-query.js";
import type {
  DateRangeFilterCompiler,
  FieldValue,
  FilterRequest,
  MetaClause,
  MetaQueryCompiler,
  MetaQueryGroup,
  QueryNode
} from "./types.js";

export interface FilterContext {
  metaQueryCompiler: MetaQueryCompiler;
  dateRangeFilterCompiler: DateRangeFilterCompiler;
}

/** One step of the compiler: returns the dimension's subtree, or null when inactive. */
export type FilterStep = (request: FilterRequest, ctx: FilterContext) => QueryNode | null;

/**
 * - `root`: the clause itself goes into the root list
 * - `must` / `must_not`: the clause is wrapped as `{ bool: { must|must_not: clause } }`
 */
export type Placement = "root" | "must" | "must_not";

/**
 * - `term`: single value
 * - `terms`: the value wrapped into a list
 * - `term_or_terms`: comma-split and trimmed; one element compiles to term, more to terms
 */
export type ClauseShape = "term" | "terms" | "term_or_terms";

export type FilterParam = keyof FilterRequest;

export interface FilterDimension {
  param: FilterParam;
  field: string;
  shape: ClauseShape;
  placement: Placement;
  cast?: "int";
  /** Literal that switches the dimension off entirely. */
  disabledBy?: string;
  /** Exact number 0 activates the dimension even though it counts as empty. */
  allowZero?: boolean;
  /** Derive the effective value from the whole request. */
  value?: (request: FilterRequest) => unknown;
}

function asFieldValue(v: unknown): FieldValue {
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  const [first] = toList(v);
  return first ?? String(v);
}

/** term for one value, terms for two or more. */
export function termOrTerms(field: string, values: FieldValue[]): QueryNode {
  return values.length < 2 ? { term: { [field]: values[0] ?? "" } } : { terms: { [field]: values } };
}

function place(clause: QueryNode, placement: Placement): QueryNode {
  if (placement === "must") return { bool: { must: clause } };
  if (placement === "must_not") return { bool: { must_not: clause } };
  return clause;
}

function buildClause(dim: FilterDimension, raw: unknown): QueryNode {
  switch (dim.shape) {
    case "terms":
      return { terms: { [dim.field]: toList(raw) } };
    case "term_or_terms":
      return termOrTerms(dim.field, toTrimmedList(raw));
    case "term":
    default:
      return { term: { [dim.field]: dim.cast === "int" ? toInt(raw) : asFieldValue(raw) } };
  }
}

/** Turn a declarative dimension into a compiler step. */
export function dimensionStep(dim: FilterDimension): FilterStep {
  return (request) => {
    const raw = dim.value ? dim.value(request) : request[dim.param];
    const active = !isEmpty(raw) || (dim.allowZero === true && raw === 0);
    if (!active) return null;
    if (dim.disabledBy !== undefined && raw === dim.disabledBy) return null;
    return place(buildClause(dim, raw), dim.placement);
  };
}

// ---- Custom dimensions ----

/**
 * `hierarchical` pins an empty parent to the root comment (0); an explicit
 * non-empty parent wins.
 */
function effectiveParent(request: FilterRequest): unknown {
  if (!isEmpty(request.hierarchical) && isEmpty(request.parent)) return 0;
  return request.parent;
}

/** hold -> 0 and approve -> 1; any other literal passes through. */
export function mapModerationStatus(statuses: string[]): FieldValue[] {
  return statuses.map((s) => (s === "hold" ? 0 : s === "approve" ? 1 : s));
}

/** Numeric identifiers are user ids; everything else is an author email. */
export function splitUnapprovedIdentifiers(input: unknown): { userIds: number[]; emails: string[] } {
  const userIds: number[] = [];
  const emails: string[] = [];
  for (const id of parseList(input)) {
    if (isNumeric(id)) userIds.push(absInt(id));
    else emails.push(id);
  }
  return { userIds, emails };
}

export const statusStep: FilterStep = (request) => {
  const raw = request.status;
  if (isEmpty(raw) || raw === "all") return null;

  const statusClause = termOrTerms("comment_approved", mapModerationStatus(toTrimmedList(raw)));
  if (isEmpty(request.include_unapproved)) return statusClause;

  const { userIds, emails } = splitUnapprovedIdentifiers(request.include_unapproved);
  return {
    bool: {
      should: [
        statusClause,
        { terms: { user_id: userIds } },
        { terms: { "comment_author_email.raw": emails } }
      ]
    }
  };
};

export const dateQueryStep: FilterStep = (request, ctx) => {
  if (isEmpty(request.date_query) || !request.date_query) return null;
  return ctx.dateRangeFilterCompiler.compile(request.date_query).and ?? null;
};

/** Merge the meta_key/meta_value shorthand (first) with meta_query clauses. */
export function collectMetaQuery(request: FilterRequest): MetaQueryGroup | null {
  const clauses: Array<MetaClause | MetaQueryGroup> = [];
  if (!isEmpty(request.meta_key)) {
    const shorthand: MetaClause = { key: String(request.meta_key) };
    if (request.meta_value !== undefined && request.meta_value !== null) {
      shorthand.value = request.meta_value;
    }
    clauses.push(shorthand);
  }

  let relation: string | undefined;
  if (!isEmpty(request.meta_query) && request.meta_query) {
    const group = toMetaGroup(request.meta_query);
    relation = group.relation;
    if (Array.isArray(group.clauses)) clauses.push(...group.clauses);
  }

  if (clauses.length === 0) return null;
  return relation === undefined ? { clauses } : { relation, clauses };
}

export const metaQueryStep: FilterStep = (request, ctx) => {
  const query = collectMetaQuery(request);
  return query ? ctx.metaQueryCompiler.compile(query) : null;
};

// ---- The table ----

const term = (param: FilterParam, field: string, placement: Placement, cast?: "int"): FilterDimension => ({
  param,
  field,
  shape: "term",
  placement,
  cast
});

const include = (param: FilterParam, field: string): FilterDimension => ({
  param,
  field,
  shape: "terms",
  placement: "must"
});

const exclude = (param: FilterParam, field: string): FilterDimension => ({
  param,
  field,
  shape: "terms",
  placement: "must_not"
});

/** Every filter dimension, in the order its subtree is emitted. */
export const FILTER_STEPS: readonly FilterStep[] = [
  dimensionStep(term("author_email", "comment_author_email.raw", "root")),
  dimensionStep(term("author_url", "comment_author_url.raw", "root")),
  dimensionStep(term("user_id", "user_id", "root", "int")),
  dimensionStep(include("author__in", "user_id")),
  dimensionStep(exclude("author__not_in", "user_id")),
  dimensionStep(include("comment__in", "comment_ID")),
  dimensionStep(exclude("comment__not_in", "comment_ID")),
  dateQueryStep,
  dimensionStep({ ...term("karma", "comment_karma", "must"), allowZero: true }),
  metaQueryStep,
  dimensionStep({ ...term("parent", "comment_parent", "must", "int"), allowZero: true, value: effectiveParent }),
  dimensionStep(include("parent__in", "comment_parent")),
  dimensionStep(exclude("parent__not_in", "comment_parent")),
  dimensionStep(term("post_author", "comment_post_author_ID", "must", "int")),
  dimensionStep(include("post_author__in", "comment_post_author_ID")),
  dimensionStep(exclude("post_author__not_in", "comment_post_author_ID")),
  dimensionStep(term("post_id", "comment_post_ID", "must", "int")),
  dimensionStep(include("post__in", "comment_post_ID")),
  dimensionStep(exclude("post__not_in", "comment_post_ID")),
  dimensionStep({
    param: "post_status",
    field: "comment_post_status",
    shape: "term_or_terms",
    placement: "root",
    disabledBy: "any"
  }),
  dimensionStep(term("post_type", "comment_post_type", "must")),
  dimensionStep(term("post_name", "comment_post_name", "must")),
  dimensionStep(term("post_parent", "comment_post_parent", "must", "int")),
  statusStep,
  dimensionStep({ param: "type", field: "comment_type.raw", shape: "term_or_terms", placement: "root" }),
  dimensionStep(include("type__in", "comment_type.raw")),
  dimensionStep(exclude("type__not_in", "comment_type.raw"))
];
