// src/domain/date-query.ts
// Turns a date_query sub-request into range filters over a comment date column.

import { isEmpty, toInt } from "./coerce.js";
import type {
  DateClause,
  DateFilter,
  DateParts,
  DateQuery,
  DateQueryGroup,
  DateRangeFilterCompiler,
  QueryNode,
  RangeBounds,
  Scalar
} from "./types.js";

export const DEFAULT_DATE_COLUMN = "comment_date_gmt";

const PARTIAL_DATE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;
const PLAIN_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Format as the stored comment date layout: YYYY-MM-DD HH:mm:ss (UTC). */
export function formatDate(d: Date): string {
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** Parse a date string into the stored layout, or null when it is not a date. */
export function parseDateTime(s: string): string | null {
  const m = PLAIN_DATE.exec(s.trim());
  if (m) {
    return `${m[1]}-${m[2]}-${m[3]} ${m[4] ?? "00"}:${m[5] ?? "00"}:${m[6] ?? "00"}`;
  }
  const ms = Date.parse(s);
  return Number.isNaN(ms) ? null : formatDate(new Date(ms));
}

function normalizeDateString(s: string): string {
  return parseDateTime(s) ?? s;
}

/** Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not. */
function utcDate(year: number, month: number, day: number, h: number, min: number, sec: number): Date {
  const date = new Date(Date.UTC(2000, 0, 1, h, min, sec));
  date.setUTCFullYear(year, month, day);
  return date;
}

interface Period {
  start: string;
  end: string;
}

function periodOf(year: Scalar, month?: Scalar, day?: Scalar): Period {
  const y = toInt(year);
  const hasMonth = !isEmpty(month);
  const hasDay = !isEmpty(day);
  const m = hasMonth ? toInt(month) - 1 : 0;
  const d = hasDay ? toInt(day) : 1;

  const start = utcDate(y, m, d, 0, 0, 0);
  let end: Date;
  if (hasDay) {
    end = utcDate(y, m, d, 23, 59, 59);
  } else if (hasMonth) {
    // day 0 of the next month is the last day of this one
    end = utcDate(y, m + 1, 0, 23, 59, 59);
  } else {
    end = utcDate(y, 11, 31, 23, 59, 59);
  }
  return { start: formatDate(start), end: formatDate(end) };
}

function boundary(value: string | DateParts, useEnd: boolean): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    // year, year-month and full-date strings bound like the structured form
    const m = PARTIAL_DATE.exec(trimmed);
    if (m) {
      const p = periodOf(m[1] ?? "", m[2], m[3]);
      return useEnd ? p.end : p.start;
    }
    return normalizeDateString(value);
  }
  if (isEmpty(value.year)) return undefined;
  const p = periodOf(value.year ?? 0, value.month, value.day);
  return useEnd ? p.end : p.start;
}

function compileClause(clause: DateClause, column: string): QueryNode | null {
  const field = clause.column || column;
  const inclusive = clause.inclusive === true;
  const nodes: QueryNode[] = [];

  const bounds: RangeBounds = {};
  if (clause.after !== undefined) {
    const v = boundary(clause.after, !inclusive);
    if (v !== undefined) {
      if (inclusive) bounds.gte = v;
      else bounds.gt = v;
    }
  }
  if (clause.before !== undefined) {
    const v = boundary(clause.before, inclusive);
    if (v !== undefined) {
      if (inclusive) bounds.lte = v;
      else bounds.lt = v;
    }
  }
  if (Object.keys(bounds).length > 0) {
    nodes.push({ range: { [field]: bounds } });
  }

  if (!isEmpty(clause.year)) {
    const p = periodOf(clause.year ?? 0, clause.month ?? clause.monthnum, clause.day);
    nodes.push({ range: { [field]: { gte: p.start, lte: p.end } } });
  }

  if (nodes.length === 0) return null;
  return nodes.length === 1 ? nodes[0] : { bool: { must: nodes } };
}

function toDateGroup(query: DateQuery): DateQueryGroup {
  return Array.isArray(query) ? { clauses: query } : query;
}

/**
 * Compile a date query. AND relations (the default) come back under `and`,
 * OR relations under `or`; an empty object means nothing was usable.
 */
export function compileDateQuery(query: DateQuery): DateFilter {
  const group = toDateGroup(query);
  const column = group.column || DEFAULT_DATE_COLUMN;

  const nodes: QueryNode[] = [];
  for (const clause of Array.isArray(group.clauses) ? group.clauses : []) {
    if (typeof clause !== "object" || clause === null) continue;
    const node = compileClause(clause, column);
    if (node) nodes.push(node);
  }
  if (nodes.length === 0) return {};

  if ((group.relation || "AND").toUpperCase() === "OR") {
    return { or: { bool: { should: nodes } } };
  }
  return { and: { bool: { must: nodes } } };
}

export const defaultDateRangeFilterCompiler: DateRangeFilterCompiler = {
  compile: compileDateQuery
};
