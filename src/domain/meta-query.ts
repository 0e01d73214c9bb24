// src/domain/meta-query.ts
// Compiles {key, value, compare, type} meta clauses into filters over the
// per-key `meta.<key>.*` fields of a comment document.

import { isEmpty, toList } from "./coerce.js";
import type {
  FieldValue,
  MetaClause,
  MetaQuery,
  MetaQueryCompiler,
  MetaQueryGroup,
  QueryNode
} from "./types.js";

const TYPE_SUFFIX = new Map<string, string>([
  ["numeric", "long"],
  ["signed", "long"],
  ["unsigned", "long"],
  ["decimal", "double"],
  ["date", "date"],
  ["datetime", "datetime"],
  ["time", "time"]
]);

function isGroup(entry: MetaClause | MetaQueryGroup): entry is MetaQueryGroup {
  return "clauses" in entry && Array.isArray(entry.clauses);
}

function typedPath(key: string, type: string | undefined): string {
  const suffix = type ? TYPE_SUFFIX.get(type.toLowerCase()) : undefined;
  return `meta.${key}.${suffix ?? "raw"}`;
}

function scalarValue(value: MetaClause["value"]): FieldValue | undefined {
  if (value === null || value === undefined) return undefined;
  return Array.isArray(value) ? value[0] : value;
}

function compileClause(clause: MetaClause): QueryNode | null {
  if (isEmpty(clause.key)) return null;
  const key = String(clause.key);
  const hasValue = clause.value !== undefined && clause.value !== null;

  let compare = clause.compare ? clause.compare.toUpperCase() : "";
  if (!compare) {
    if (!hasValue) compare = "EXISTS";
    else compare = Array.isArray(clause.value) ? "IN" : "=";
  }

  const path = typedPath(key, clause.type);
  const value = scalarValue(clause.value);
  const values = toList(clause.value);

  switch (compare) {
    case "EXISTS":
      return { exists: { field: `meta.${key}` } };
    case "NOT EXISTS":
      return { bool: { must_not: { exists: { field: `meta.${key}` } } } };
    case "IN":
      return { terms: { [path]: values } };
    case "NOT IN":
      return { bool: { must_not: { terms: { [path]: values } } } };
    case "BETWEEN":
      return values.length >= 2 ? { range: { [path]: { gte: values[0], lte: values[1] } } } : null;
    case "NOT BETWEEN":
      return values.length >= 2
        ? { bool: { must_not: { range: { [path]: { gte: values[0], lte: values[1] } } } } }
        : null;
    case "LIKE":
      return value === undefined ? null : { match_phrase: { [`meta.${key}.value`]: String(value) } };
    case "NOT LIKE":
      return value === undefined
        ? null
        : { bool: { must_not: { match_phrase: { [`meta.${key}.value`]: String(value) } } } };
    case ">":
      return value === undefined ? null : { range: { [path]: { gt: value } } };
    case ">=":
      return value === undefined ? null : { range: { [path]: { gte: value } } };
    case "<":
      return value === undefined ? null : { range: { [path]: { lt: value } } };
    case "<=":
      return value === undefined ? null : { range: { [path]: { lte: value } } };
    case "!=":
      return value === undefined ? null : { bool: { must_not: { term: { [path]: value } } } };
    case "=":
    default:
      return value === undefined ? null : { term: { [path]: value } };
  }
}

function compileGroup(group: MetaQueryGroup): QueryNode | null {
  const nodes: QueryNode[] = [];
  for (const entry of Array.isArray(group.clauses) ? group.clauses : []) {
    if (typeof entry !== "object" || entry === null) continue;
    const node = isGroup(entry) ? compileGroup(entry) : compileClause(entry);
    if (node) nodes.push(node);
  }
  if (nodes.length === 0) return null;

  const relation = (group.relation || "AND").toUpperCase();
  return relation === "OR" ? { bool: { should: nodes } } : { bool: { must: nodes } };
}

/** Normalize either accepted meta query shape into a group. */
export function toMetaGroup(query: MetaQuery): MetaQueryGroup {
  return Array.isArray(query) ? { clauses: query } : query;
}

export function compileMetaQuery(query: MetaQuery): QueryNode | null {
  return compileGroup(toMetaGroup(query));
}

export const defaultMetaQueryCompiler: MetaQueryCompiler = {
  compile: compileMetaQuery
};
