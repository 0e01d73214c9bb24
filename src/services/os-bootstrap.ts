// src/services/os-bootstrap.ts
// Comment index provisioning: choose the mapping file that matches the
// backend version and create the index with it when missing.
//
// Env:
//   COMMENT_QUERY_BOOTSTRAP_OS=1            -> run at server startup (wired from src/index.ts)
//   COMMENT_QUERY_INDEX=comments            -> index name (config: index.name)
//   COMMENT_QUERY_MAPPINGS_DIR=...          -> mapping directory (config: mapping.dir)
//
// Mapping files (config/mappings/comment):
// - pre-5-0.json  backends older than 5.0 (string fields, typed mapping)
// - initial.json  5.x and 6.x (text/keyword, typed mapping)
// - 7-0.json      7.0 and later, and every OpenSearch release (typeless mapping)

import fs from "fs";
import path from "path";
import { distributionFromInfo, getClient, versionFromInfo } from "./os-client.js";
import { queryString } from "./config.js";
import { debug } from "./log.js";

const log = debug("comment-query:bootstrap");

export type MappingFile = "pre-5-0.json" | "initial.json" | "7-0.json";

/** Subset of the OpenSearch client used for provisioning. */
export interface MappingClient {
  info(): Promise<{ body: unknown }>;
  indices: {
    exists(params: { index: string }): Promise<{ body: unknown }>;
    create(params: { index: string; body: Record<string, unknown> }): Promise<unknown>;
  };
}

export interface PutMappingOptions {
  client?: MappingClient;
  index?: string;
  mappingsDir?: string;
  /** Skip the info() call and use this version. */
  version?: string;
  /** Backend distribution paired with `version` ("opensearch" or empty). */
  distribution?: string;
}

export interface PutMappingResult {
  index: string;
  version: string;
  mappingFile: MappingFile;
  created: boolean;
}

/** Compare dotted versions numerically: -1, 0 or 1. Missing segments count as 0. */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map((s) => Number.parseInt(s, 10) || 0);
  const pb = b.split(".").map((s) => Number.parseInt(s, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? 0;
    const y = pb[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

export function selectMappingFile(version: string | null | undefined, distribution = ""): MappingFile {
  if (distribution.toLowerCase() === "opensearch") return "7-0.json";
  const v = version && version.trim().length > 0 ? version.trim() : queryString("mapping.fallback_version", "2.0");
  if (compareVersions(v, "5.0") < 0) return "pre-5-0.json";
  if (compareVersions(v, "7.0") >= 0) return "7-0.json";
  return "initial.json";
}

export function loadMapping(file: MappingFile, dir: string): Record<string, unknown> {
  const full = path.join(dir, file);
  const parsed: unknown = JSON.parse(fs.readFileSync(full, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Mapping file ${full} does not contain a JSON object.`);
  }
  return { ...parsed };
}

/** Create the comment index with the version-appropriate mapping (idempotent). */
export async function putCommentMapping(opts: PutMappingOptions = {}): Promise<PutMappingResult> {
  const client: MappingClient = opts.client ?? getClient();
  const index = opts.index ?? process.env.COMMENT_QUERY_INDEX ?? queryString("index.name", "comments");
  const dir =
    opts.mappingsDir ?? process.env.COMMENT_QUERY_MAPPINGS_DIR ?? queryString("mapping.dir", "config/mappings/comment");

  let version = opts.version ?? "";
  let distribution = opts.distribution ?? "";
  if (!version) {
    const info = await client.info();
    version = versionFromInfo(info.body);
    distribution = distributionFromInfo(info.body);
  }

  const mappingFile = selectMappingFile(version, distribution);
  const mapping = loadMapping(mappingFile, dir);

  const exists = await client.indices.exists({ index });
  if (exists.body === true) {
    log("mapping.skip", { index, version, mappingFile });
    return { index, version, mappingFile, created: false };
  }

  try {
    await client.indices.create({ index, body: mapping });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Creating index '${index}' with ${mappingFile} failed: ${msg}`);
  }
  log("mapping.created", { index, version, mappingFile });
  return { index, version, mappingFile, created: true };
}
