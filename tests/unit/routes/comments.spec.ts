import { describe, it, expect, vi, beforeEach } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

vi.mock("../../../src/services/os-bootstrap.js", () => ({
  putCommentMapping: vi.fn(async (opts: { index?: string; version?: string }) => ({
    index: opts.index ?? "comments",
    version: opts.version ?? "7.10.2",
    mappingFile: "7-0.json",
    created: true
  }))
}));

import { putCommentMapping } from "../../../src/services/os-bootstrap.js";
import {
  handleCompileQuery,
  handlePrepareDocument,
  handlePutMapping,
  registerComments
} from "../../../src/routes/comments.js";

beforeEach(() => {
  vi.mocked(putCommentMapping).mockClear();
});

describe("handleCompileQuery", () => {
  it("compiles a validated request", () => {
    const q = handleCompileQuery({ number: 5, paged: 2, author_email: "jo@example.com", order: "asc" });
    expect(q).toEqual({
      from: 5,
      size: 5,
      sort: [{ comment_date_gmt: { order: "asc" } }],
      query: { match_all: { boost: 1 } },
      post_filter: { bool: { must: [{ term: { "comment_author_email.raw": "jo@example.com" } }] } }
    });
  });

  it("treats missing arguments as an empty request", () => {
    expect(handleCompileQuery(undefined).from).toBe(0);
  });

  it("accepts nested meta query groups", () => {
    const q = handleCompileQuery({
      meta_query: {
        relation: "AND",
        clauses: [{ key: "mood", value: "happy" }, { relation: "OR", clauses: [{ key: "flag", compare: "EXISTS" }] }]
      }
    });
    expect(q.post_filter).toBeDefined();
  });

  it("rejects malformed input with the offending path", () => {
    expect(() => handleCompileQuery({ number: { n: 1 } })).toThrow(/^comments\.compile_query: invalid request \(number: /);
  });
});

describe("handlePrepareDocument", () => {
  it("returns the prepared document", () => {
    const { document } = handlePrepareDocument({
      comment: {
        comment_ID: "9",
        comment_post_ID: "3",
        comment_author: "Jo",
        comment_author_email: "jo@example.com",
        comment_author_url: "",
        comment_author_IP: "127.0.0.1",
        comment_date: "2024-05-01 10:00:00",
        comment_date_gmt: "2024-05-01 08:00:00",
        comment_content: "Hi",
        comment_karma: "0",
        comment_approved: "1",
        comment_agent: "",
        comment_parent: "0",
        user_id: "0"
      },
      meta: { mood: "happy", _private: "x" }
    });
    expect(document?.ID).toBe("9");
    expect(document?.comment_type).toBe("comment");
    expect(document?.comment_post_type).toBeNull();
    expect(Object.keys(document?.meta ?? {})).toEqual(["mood"]);
  });

  it("rejects a comment without required fields", () => {
    expect(() => handlePrepareDocument({ comment: { comment_ID: 1 } })).toThrow(
      /^comments\.prepare_document: invalid input/
    );
  });
});

describe("handlePutMapping", () => {
  it("forwards the validated options", async () => {
    const result = await handlePutMapping({ index: "comments-dev", version: "7.1.0" });
    expect(result).toEqual({ index: "comments-dev", version: "7.1.0", mappingFile: "7-0.json", created: true });
    expect(putCommentMapping).toHaveBeenCalledWith({ index: "comments-dev", version: "7.1.0" });
  });

  it("rejects a non-string index", async () => {
    await expect(handlePutMapping({ index: 3 })).rejects.toThrow(/^comments\.put_mapping: invalid input \(index: /);
    expect(putCommentMapping).not.toHaveBeenCalled();
  });
});

describe("registerComments", () => {
  it("registers the three comment tools", () => {
    const server = new McpServer({ name: "test", version: "0.0.0" });
    const tool = vi.spyOn(server, "tool");
    registerComments(server);
    expect(tool.mock.calls.map((call) => call[0])).toEqual([
      "comments.compile_query",
      "comments.prepare_document",
      "comments.put_mapping"
    ]);
  });
});
