/* Vitest global setup for comment-query tests.
 * - Pin the timezone so date formatting is deterministic
 * - Keep logging and cluster provisioning off unless a test opts in
 * - Config paths are relative to the project root (vitest's cwd)
 */

process.env.TZ = "UTC";

delete process.env.DEBUG;
process.env.COMMENT_QUERY_BOOTSTRAP_OS = "";
process.env.OPENSEARCH_URL = process.env.OPENSEARCH_URL || "http://localhost:9200";
