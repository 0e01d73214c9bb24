// src/domain/sort.ts
// Sort alias resolution for comment queries.

import { isEmpty } from "./coerce.js";
import type { FilterRequest, SortClause, SortOrder } from "./types.js";

/**
 * Known sort aliases and the field each one sorts on. Analyzed text fields
 * sort on their `.raw` keyword sibling.
 */
export const SORT_FIELDS = {
  comment_agent: "comment_agent.raw",
  comment_approved: "comment_approved.raw",
  comment_author: "comment_author.raw",
  comment_author_email: "comment_author_email.raw",
  comment_author_IP: "comment_author_IP.raw",
  comment_author_url: "comment_author_url.raw",
  comment_content: "comment_content.raw",
  comment_date: "comment_date",
  comment_date_gmt: "comment_date_gmt",
  comment_ID: "comment_ID",
  comment_karma: "comment_karma",
  comment_parent: "comment_parent",
  comment_post_ID: "comment_post_ID",
  comment_type: "comment_type.raw",
  user_id: "user_id"
} as const satisfies Record<string, string>;

export type SortAlias = keyof typeof SORT_FIELDS;

/** Aliases that sort on a meta value and need `meta_key` to name it. */
const META_SORT_SUFFIX = new Map<string, string>([
  ["meta_value", "value"],
  ["meta_value_num", "long"]
]);

function isSortAlias(alias: string): alias is SortAlias {
  return Object.prototype.hasOwnProperty.call(SORT_FIELDS, alias);
}

/** Normalize any requested direction to asc/desc; anything but "asc" is desc. */
export function parseOrder(order: unknown): SortOrder {
  if (typeof order !== "string" || order.length === 0) return "desc";
  return order.toUpperCase() === "ASC" ? "asc" : "desc";
}

/**
 * Resolve a sort alias into sort clauses.
 *
 * Unknown aliases sort on the literal field name. Meta sorts resolve to no
 * clause at all when `meta_key` is missing.
 */
export function resolveSort(alias: string, order: SortOrder, request: FilterRequest): SortClause[] {
  if (!alias) return [];

  if (isSortAlias(alias)) {
    return [{ [SORT_FIELDS[alias]]: { order } }];
  }

  const metaSuffix = META_SORT_SUFFIX.get(alias);
  if (metaSuffix !== undefined) {
    const key = request.meta_key;
    if (isEmpty(key)) return [];
    return [{ [`meta.${String(key)}.${metaSuffix}`]: { order } }];
  }

  return [{ [alias]: { order } }];
}
