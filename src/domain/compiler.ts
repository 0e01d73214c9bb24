// src/domain/compiler.ts
// Compiles a comment filter/sort request into an OpenSearch query document.

import { isEmpty, isSet, toInt } from "./coerce.js";
import { defaultDateRangeFilterCompiler } from "./date-query.js";
import { FILTER_STEPS, type FilterContext } from "./filters.js";
import { defaultMetaQueryCompiler } from "./meta-query.js";
import { buildSearchQuery, type SearchOptions } from "./search.js";
import { parseOrder, resolveSort } from "./sort.js";
import type {
  CompiledQuery,
  DateRangeFilterCompiler,
  FilterRequest,
  MetaQueryCompiler,
  QueryNode
} from "./types.js";
import { queryNumber } from "../services/config.js";
import { debug } from "../services/log.js";

const log = debug("comment-query:compiler");

export const DEFAULT_MAX_RESULTS_WINDOW = 10000;
export const DEFAULT_ORDERBY = "comment_date_gmt";

export interface CompilerOptions {
  /** Page size when `number` is not given; the backend rejects windows above index.max_result_window. */
  maxResultsWindow: number;
  metaQueryCompiler: MetaQueryCompiler;
  dateRangeFilterCompiler: DateRangeFilterCompiler;
  search: Partial<SearchOptions>;
}

export function loadCompilerOptions(): CompilerOptions {
  return {
    maxResultsWindow: queryNumber("pagination.max_results_window", DEFAULT_MAX_RESULTS_WINDOW),
    metaQueryCompiler: defaultMetaQueryCompiler,
    dateRangeFilterCompiler: defaultDateRangeFilterCompiler,
    search: {}
  };
}

/** Resolve accepted aliases (page, order_by) without touching the caller's object. */
export function normalizeRequest(request: FilterRequest): FilterRequest {
  const out: FilterRequest = { ...request };
  if (!isSet(out.paged) && isSet(out.page)) out.paged = out.page;
  if (isEmpty(out.orderby) && !isEmpty(out.order_by)) out.orderby = out.order_by;
  return out;
}

export function resolvePagination(request: FilterRequest, maxResultsWindow: number): { from: number; size: number } {
  const size = isEmpty(request.number) ? maxResultsWindow : toInt(request.number);
  let from = isSet(request.offset) ? toInt(request.offset) : 0;

  // A non-empty offset wins over paging.
  const paged = toInt(request.paged);
  if (isSet(request.paged) && isEmpty(request.offset) && paged > 1) {
    from = size * (paged - 1);
  }
  return { from: Math.max(0, from), size: Math.max(0, size) };
}

/** Compile a request. Never throws: malformed or empty parameters are skipped. */
export function compileQuery(request: FilterRequest, options: Partial<CompilerOptions> = {}): CompiledQuery {
  const opts: CompilerOptions = { ...loadCompilerOptions(), ...options };
  const req = normalizeRequest(request);

  const { from, size } = resolvePagination(req, opts.maxResultsWindow);

  const order = parseOrder(req.order);
  const orderby = isEmpty(req.orderby) ? DEFAULT_ORDERBY : String(req.orderby);
  const sort = resolveSort(orderby, order, req);

  const ctx: FilterContext = {
    metaQueryCompiler: opts.metaQueryCompiler,
    dateRangeFilterCompiler: opts.dateRangeFilterCompiler
  };
  const must = FILTER_STEPS.reduce<QueryNode[]>((acc, step) => {
    const node = step(req, ctx);
    return node ? [...acc, node] : acc;
  }, []);

  const query: QueryNode = isEmpty(req.search)
    ? { match_all: { boost: 1 } }
    : buildSearchQuery(String(req.search), isEmpty(req.search_fields) ? null : req.search_fields, req, opts.search);

  const compiled: CompiledQuery = { from, size, sort, query };
  if (req.fields === "ids") {
    compiled._source = { includes: ["comment_ID"] };
  }
  if (must.length > 0) {
    compiled.post_filter = { bool: { must } };
  }

  log("compiled", { dimensions: must.length, from, size, sort, search: !isEmpty(req.search) });
  return compiled;
}
