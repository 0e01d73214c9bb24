// src/domain/search.ts
// Free-text relevance query: phrase, all-terms and fuzzy multi_match tiers.

import { isEmpty } from "./coerce.js";
import type { FilterRequest, QueryNode, SearchFieldSelection, SearchFields } from "./types.js";
import { queryArray, queryNumber, queryNumberOrString } from "../services/config.js";

export const DEFAULT_SEARCH_FIELDS: readonly string[] = [
  "comment_author",
  "comment_author_email",
  "comment_author_url",
  "comment_author_IP",
  "comment_content"
];

export interface SearchOptions {
  defaultSearchFields: readonly string[];
  phraseBoost: number;
  matchBoost: number;
  fuzziness: number | string;
}

/** Search knobs from config/query.yaml (search.*), falling back to built-in defaults. */
export function loadSearchOptions(): SearchOptions {
  return {
    defaultSearchFields: queryArray("search.default_fields", [...DEFAULT_SEARCH_FIELDS]),
    phraseBoost: queryNumber("search.phrase_boost", 4),
    matchBoost: queryNumber("search.match_boost", 2),
    fuzziness: queryNumberOrString("search.fuzziness", 1)
  };
}

/**
 * Resolve the fields a search runs against. Keys listed under `meta` become
 * `meta.<key>.value` paths, appended after the explicit fields.
 */
export function resolveSearchFields(
  fields: SearchFields | null | undefined,
  defaults: readonly string[] = DEFAULT_SEARCH_FIELDS
): string[] {
  if (fields === null || fields === undefined) return [...defaults];

  const selection: SearchFieldSelection = Array.isArray(fields) ? { fields } : fields;
  const explicit = selection.fields ?? [];
  const metaKeys = selection.meta === undefined ? [] : Array.isArray(selection.meta) ? selection.meta : [selection.meta];

  if (explicit.length === 0 && metaKeys.length === 0) return [...defaults];

  return [...explicit, ...metaKeys.filter((k) => !isEmpty(k)).map((k) => `meta.${k}.value`)];
}

/**
 * Build the scoring query for a search term. Exact phrases rank highest,
 * then documents containing every term, then typo-tolerant matches.
 */
export function buildSearchQuery(
  term: string,
  fields: SearchFields | null | undefined,
  _request: FilterRequest,
  options: Partial<SearchOptions> = {}
): QueryNode {
  const opts: SearchOptions = { ...loadSearchOptions(), ...options };
  const searchFields = resolveSearchFields(fields, opts.defaultSearchFields);

  return {
    bool: {
      should: [
        {
          multi_match: {
            query: term,
            type: "phrase",
            fields: searchFields,
            boost: opts.phraseBoost
          }
        },
        {
          multi_match: {
            query: term,
            fields: searchFields,
            boost: opts.matchBoost,
            fuzziness: 0,
            operator: "and"
          }
        },
        {
          multi_match: {
            fields: searchFields,
            query: term,
            fuzziness: opts.fuzziness
          }
        }
      ]
    }
  };
}
