// src/services/document.ts
// Comment -> index document preparation: field layout the compiler queries,
// meta filtering by indexing policy, and typed meta sub-fields.

import { isNumeric } from "../domain/coerce.js";
import { parseDateTime } from "../domain/date-query.js";
import type {
  CommentDocument,
  CommentRecord,
  CommentRow,
  MetaValue,
  PostRecord,
  TypedMetaValue
} from "../domain/types.js";
import { policyArray, policyBoolean } from "./config.js";
import { debug } from "./log.js";

const log = debug("comment-query:document");

export type RawMeta = Record<string, MetaValue | MetaValue[]>;

export interface MetaPolicy {
  /** `true` indexes every protected (underscore-prefixed) key. */
  allowedProtectedKeys: string[] | true;
  /** `true` excludes every public key. */
  excludedPublicKeys: string[] | true;
  /** Keys indexed regardless of the two lists above. */
  whitelistKeys: string[];
}

export function loadMetaPolicy(): MetaPolicy {
  return {
    allowedProtectedKeys: policyBoolean("meta.allow_all_protected", false)
      ? true
      : policyArray("meta.allowed_protected_keys", []),
    excludedPublicKeys: policyBoolean("meta.exclude_all_public", false)
      ? true
      : policyArray("meta.excluded_public_keys", []),
    whitelistKeys: policyArray("meta.whitelist_keys", [])
  };
}

export function isProtectedMeta(key: string): boolean {
  return key.startsWith("_");
}

function allowIndex(key: string, policy: MetaPolicy): boolean {
  if (policy.whitelistKeys.includes(key)) return true;
  if (isProtectedMeta(key)) {
    return policy.allowedProtectedKeys === true || policy.allowedProtectedKeys.includes(key);
  }
  return policy.excludedPublicKeys !== true && !policy.excludedPublicKeys.includes(key);
}

/** Keep the meta keys the policy lets into the index; values always become lists. */
export function prepareMeta(meta: RawMeta, policy: MetaPolicy = loadMetaPolicy()): Record<string, MetaValue[]> {
  const prepared: Record<string, MetaValue[]> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (!allowIndex(key, policy)) continue;
    prepared[key] = Array.isArray(value) ? value : [value];
  }
  return prepared;
}

const TRUTHY = new Set(["1", "true", "on", "yes"]);

/** Expand one meta value into the typed sub-fields the mapping declares. */
export function prepareMetaValueTypes(value: MetaValue): TypedMetaValue {
  const str = value === null ? "" : typeof value === "boolean" ? (value ? "1" : "") : String(value);
  const typed: TypedMetaValue = {
    value: str,
    raw: str,
    boolean: TRUTHY.has(str.trim().toLowerCase())
  };

  if (isNumeric(str)) {
    const n = Number(str.trim());
    typed.long = Math.trunc(n);
    typed.double = n;
    return typed;
  }

  const datetime = str.trim().length > 0 ? parseDateTime(str) : null;
  if (datetime) {
    typed.datetime = datetime;
    typed.date = datetime.slice(0, 10);
    typed.time = datetime.slice(11);
  }
  return typed;
}

export function prepareMetaTypes(meta: Record<string, MetaValue[]>): Record<string, TypedMetaValue[]> {
  const out: Record<string, TypedMetaValue[]> = {};
  for (const [key, values] of Object.entries(meta)) {
    out[key] = values.map(prepareMetaValueTypes);
  }
  return out;
}

/** Reduce a stored comment row to the indexer's fields, adding `ID`. */
export function remapComment(row: CommentRecord): CommentRow {
  return {
    ID: row.comment_ID,
    comment_ID: row.comment_ID,
    comment_post_ID: row.comment_post_ID,
    comment_author: row.comment_author,
    comment_author_email: row.comment_author_email,
    comment_author_url: row.comment_author_url,
    comment_author_IP: row.comment_author_IP,
    comment_date: row.comment_date,
    comment_date_gmt: row.comment_date_gmt,
    comment_content: row.comment_content,
    comment_karma: row.comment_karma,
    comment_approved: row.comment_approved,
    comment_agent: row.comment_agent,
    comment_type: row.comment_type,
    comment_parent: row.comment_parent,
    user_id: row.user_id
  };
}

/**
 * Build the index document for a comment. The parent post contributes the
 * comment_post_* fields; a missing post leaves them null.
 */
export function prepareDocument(
  comment: CommentRecord | null | undefined,
  post: PostRecord | null | undefined,
  meta: RawMeta = {},
  policy: MetaPolicy = loadMetaPolicy()
): CommentDocument | null {
  if (!comment) return null;

  const doc: CommentDocument = {
    ...remapComment(comment),
    comment_post_author_ID: post?.post_author ?? null,
    comment_post_status: post?.post_status ?? null,
    comment_post_type: post?.post_type ?? null,
    comment_post_name: post?.post_name ?? null,
    comment_post_parent: post?.post_parent ?? null,
    comment_type: comment.comment_type ? comment.comment_type : "comment",
    meta: prepareMetaTypes(prepareMeta(meta, policy))
  };

  log("prepared", { comment_ID: doc.comment_ID, meta_keys: Object.keys(doc.meta).length });
  return doc;
}
