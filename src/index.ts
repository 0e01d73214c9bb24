import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerComments } from "./routes/comments.js";
import { putCommentMapping } from "./services/os-bootstrap.js";

async function main() {
  const server = new McpServer({ name: "comment-query-mcp", version: "0.1.0" });

  registerComments(server);

  // Optionally provision the comment index (best-effort; the compiler works without a cluster)
  const bootstrap = (process.env.COMMENT_QUERY_BOOTSTRAP_OS || "").toLowerCase();
  if (bootstrap === "1" || bootstrap === "true") {
    try {
      await putCommentMapping();
    } catch (err) {
      console.error("putCommentMapping failed (continuing to serve MCP):", err);
    }
  }

  // Dynamically import stdio transport from SDK ESM dist to satisfy TS resolver
  const { StdioServerTransport } = await import("@modelcontextprotocol/sdk/server/stdio.js");
  await server.connect(new StdioServerTransport());
}

main().catch((err) => {
  console.error("comment-query MCP server failed to start:", err);
  process.exit(1);
});
