import fs from "fs";
import yaml from "js-yaml";

// Lightweight YAML-backed config loader with lazy caches and typed getters.

export type AnyObject = Record<string, unknown>;

let queryCache: AnyObject | null = null;
let metaPoliciesCache: AnyObject | null = null;

function isPlainObject(v: unknown): v is AnyObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function safeLoadYaml(path: string): AnyObject {
  try {
    const raw = fs.readFileSync(path, "utf8");
    const doc = yaml.load(raw);
    return isPlainObject(doc) ? doc : {};
  } catch {
    return {};
  }
}

function safeLoadJsonFile(path: string): AnyObject {
  try {
    const raw = fs.readFileSync(path, "utf8");
    const obj: unknown = JSON.parse(raw);
    return isPlainObject(obj) ? obj : {};
  } catch {
    return {};
  }
}

// Deep merge utility for override application (arrays and scalars are replaced)
function deepMerge(a: AnyObject, b: AnyObject): AnyObject {
  const out: AnyObject = { ...a };
  for (const k of Object.keys(b)) {
    const bv = b[k];
    const av = out[k];
    if (isPlainObject(av) && isPlainObject(bv)) {
      out[k] = deepMerge(av, bv);
    } else {
      out[k] = bv;
    }
  }
  return out;
}

// Public: raw config objects

export function getQueryConfig(): AnyObject {
  if (!queryCache) {
    const basePath = process.env.COMMENT_QUERY_CONFIG_PATH || "config/query.yaml";
    let merged = safeLoadYaml(basePath);

    // Overrides apply in order: file then JSON string (JSON takes precedence)
    const overridesFile = process.env.COMMENT_QUERY_OVERRIDES_FILE;
    if (overridesFile && overridesFile.trim().length > 0) {
      merged = deepMerge(merged, safeLoadJsonFile(overridesFile));
    }

    const overridesJson = process.env.COMMENT_QUERY_OVERRIDES_JSON;
    if (overridesJson && overridesJson.trim().length > 0) {
      try {
        const obj: unknown = JSON.parse(overridesJson);
        if (isPlainObject(obj)) {
          merged = deepMerge(merged, obj);
        }
      } catch {
        // malformed override JSON leaves the file config in place
      }
    }

    queryCache = merged;
  }
  return queryCache;
}

export function getMetaPoliciesConfig(): AnyObject {
  if (!metaPoliciesCache) {
    metaPoliciesCache = safeLoadYaml(process.env.COMMENT_QUERY_META_POLICIES_PATH || "config/meta_policies.yaml");
  }
  return metaPoliciesCache;
}

// Path utilities

function getIn(obj: AnyObject, path: string): unknown {
  let cur: unknown = obj;
  for (const s of path.split(".")) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[s];
  }
  return cur;
}

function coerceNumber(v: unknown, dflt: number): number {
  if (typeof v === "number" && !Number.isNaN(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (!Number.isNaN(n)) return n;
  }
  return dflt;
}

function coerceBoolean(v: unknown, dflt: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "true") return true;
    if (s === "false") return false;
    const n = Number(v);
    if (s.length > 0 && !Number.isNaN(n)) return n !== 0;
  }
  return dflt;
}

function coerceStringArray(v: unknown, dflt: string[]): string[] {
  if (Array.isArray(v)) return v.filter((x): x is string => typeof x === "string");
  return dflt;
}

// Typed getters: query compiler (config/query.yaml)

export function queryNumber(path: string, dflt: number): number {
  return coerceNumber(getIn(getQueryConfig(), path), dflt);
}

/** Numbers (numeric strings included) come back as numbers; other non-empty strings trimmed. */
export function queryNumberOrString(path: string, dflt: number | string): number | string {
  const v = getIn(getQueryConfig(), path);
  const n = coerceNumber(v, Number.NaN);
  if (!Number.isNaN(n)) return n;
  if (typeof v === "string" && v.trim().length > 0) return v.trim();
  return dflt;
}

export function queryArray(path: string, dflt: string[]): string[] {
  return coerceStringArray(getIn(getQueryConfig(), path), dflt);
}

export function queryString(path: string, dflt: string): string {
  const v = getIn(getQueryConfig(), path);
  return typeof v === "string" ? v : dflt;
}

// Typed getters: meta indexing policies (config/meta_policies.yaml)

export function policyBoolean(path: string, dflt: boolean): boolean {
  return coerceBoolean(getIn(getMetaPoliciesConfig(), path), dflt);
}

export function policyArray(path: string, dflt: string[]): string[] {
  return coerceStringArray(getIn(getMetaPoliciesConfig(), path), dflt);
}

// Clears caches so tests can swap config files and env overrides
export function __resetConfigCaches() {
  queryCache = null;
  metaPoliciesCache = null;
}
