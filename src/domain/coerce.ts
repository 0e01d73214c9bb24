// src/domain/coerce.ts
// Lenient parameter coercion: request values arrive loosely typed and are
// never rejected, only normalized.

import type { FieldValue } from "./types.js";

/**
 * Emptiness in the comment-query vocabulary: undefined, null, false, 0,
 * "", "0" and empty lists all mean "not requested".
 */
export function isEmpty(v: unknown): boolean {
  if (v === undefined || v === null || v === false) return true;
  if (v === 0 || v === "" || v === "0") return true;
  if (Array.isArray(v)) return v.length === 0;
  if (typeof v === "number" && Number.isNaN(v)) return true;
  return false;
}

/** Set means present at all, even when empty. */
export function isSet(v: unknown): boolean {
  return v !== undefined && v !== null;
}

/** Leading-integer cast: "12abc" -> 12, "abc" -> 0, 3.9 -> 3, true -> 1. */
export function toInt(v: unknown): number {
  if (typeof v === "number") {
    return Number.isFinite(v) ? Math.trunc(v) : 0;
  }
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const m = /^\s*([+-]?\d+)/.exec(v);
    return m ? Number.parseInt(m[1], 10) : 0;
  }
  if (Array.isArray(v)) return v.length > 0 ? 1 : 0;
  return 0;
}

const NUMERIC = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

export function isNumeric(v: unknown): boolean {
  if (typeof v === "number") return Number.isFinite(v);
  return typeof v === "string" && NUMERIC.test(v);
}

/** Absolute integer value of a numeric-looking identifier. */
export function absInt(v: unknown): number {
  const n = typeof v === "number" ? v : Number(String(v).trim());
  return Number.isFinite(n) ? Math.abs(Math.trunc(n)) : 0;
}

function isFieldValue(v: unknown): v is FieldValue {
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

/** Wrap a scalar into a one-element list; keep list values, drop anything else. */
export function toList(v: unknown): FieldValue[] {
  if (Array.isArray(v)) return v.filter(isFieldValue);
  return isFieldValue(v) ? [v] : [];
}

/** Comma-separated string or list, every element trimmed to a string. */
export function toTrimmedList(v: unknown): string[] {
  const items = typeof v === "string" ? v.split(",") : toList(v);
  return items.map((x) => String(x).trim());
}

/** Whitespace- or comma-separated list with empty entries removed. */
export function parseList(v: unknown): string[] {
  if (Array.isArray(v)) return toList(v).map((x) => String(x));
  if (!isFieldValue(v)) return [];
  return String(v)
    .split(/[\s,]+/)
    .filter((s) => s.length > 0);
}
