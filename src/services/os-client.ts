// src/services/os-client.ts
// OpenSearch client factory (singleton).
// Env:
//   OPENSEARCH_URL (default: http://localhost:9200)
//   OPENSEARCH_USERNAME / OPENSEARCH_PASSWORD (optional)
//   OPENSEARCH_SSL_REJECT_UNAUTHORIZED=false (optional; for self-signed local dev)
//   COMMENT_QUERY_OS_CLIENT_TIMEOUT_MS=10000

import { Client, type ClientOptions } from "@opensearch-project/opensearch";
import { debug } from "./log.js";

const log = debug("comment-query:os-client");

let _client: Client | null = null;

export function getClient(): Client {
  if (_client) return _client;

  const node = process.env.OPENSEARCH_URL || "http://localhost:9200";
  const username = process.env.OPENSEARCH_USERNAME;
  const password = process.env.OPENSEARCH_PASSWORD;
  const rejectUnauthorized = (process.env.OPENSEARCH_SSL_REJECT_UNAUTHORIZED ?? "true") !== "false";
  const requestTimeout = Number(process.env.COMMENT_QUERY_OS_CLIENT_TIMEOUT_MS ?? 10000);

  const opts: ClientOptions = {
    node,
    requestTimeout,
    ssl: { rejectUnauthorized }
  };
  if (username && password) {
    opts.auth = { username, password };
  }

  log("client.init", { node, requestTimeout, rejectUnauthorized });
  _client = new Client(opts);
  return _client;
}

function versionField(body: unknown, field: "number" | "distribution"): string {
  if (typeof body !== "object" || body === null || !("version" in body)) return "";
  const version: unknown = body.version;
  if (typeof version !== "object" || version === null || !(field in version)) return "";
  const value: unknown = Reflect.get(version, field);
  return typeof value === "string" ? value : "";
}

/** Pull `version.number` out of an info() response body; "" when absent. */
export function versionFromInfo(body: unknown): string {
  return versionField(body, "number");
}

/** `version.distribution` ("opensearch" on OpenSearch, absent on Elasticsearch). */
export function distributionFromInfo(body: unknown): string {
  return versionField(body, "distribution");
}

// Drops the cached client (tests swap OPENSEARCH_* env between cases)
export function __resetClient() {
  _client = null;
}
