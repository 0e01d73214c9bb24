import { describe, it, expect } from "vitest";
import {
  collectMetaQuery,
  dimensionStep,
  FILTER_STEPS,
  mapModerationStatus,
  splitUnapprovedIdentifiers,
  statusStep,
  termOrTerms,
  type FilterContext
} from "../../../src/domain/filters.js";
import { defaultMetaQueryCompiler } from "../../../src/domain/meta-query.js";
import { defaultDateRangeFilterCompiler } from "../../../src/domain/date-query.js";

const ctx: FilterContext = {
  metaQueryCompiler: defaultMetaQueryCompiler,
  dateRangeFilterCompiler: defaultDateRangeFilterCompiler
};

describe("dimensionStep", () => {
  it("places a root term clause as-is", () => {
    const step = dimensionStep({ param: "author_url", field: "comment_author_url.raw", shape: "term", placement: "root" });
    expect(step({ author_url: "https://example.org" }, ctx)).toEqual({
      term: { "comment_author_url.raw": "https://example.org" }
    });
    expect(step({}, ctx)).toBeNull();
  });

  it("wraps include and exclude lists in a nested bool", () => {
    const inc = dimensionStep({ param: "post__in", field: "comment_post_ID", shape: "terms", placement: "must" });
    const exc = dimensionStep({ param: "post__not_in", field: "comment_post_ID", shape: "terms", placement: "must_not" });
    expect(inc({ post__in: ["4", 5] }, ctx)).toEqual({ bool: { must: { terms: { comment_post_ID: ["4", 5] } } } });
    expect(exc({ post__not_in: 9 }, ctx)).toEqual({ bool: { must_not: { terms: { comment_post_ID: [9] } } } });
  });

  it("casts int dimensions", () => {
    const step = dimensionStep({
      param: "post_parent",
      field: "comment_post_parent",
      shape: "term",
      placement: "must",
      cast: "int"
    });
    expect(step({ post_parent: "17 " }, ctx)).toEqual({ bool: { must: { term: { comment_post_parent: 17 } } } });
  });

  it("switches off on the disabling literal", () => {
    const step = dimensionStep({
      param: "post_status",
      field: "comment_post_status",
      shape: "term_or_terms",
      placement: "root",
      disabledBy: "any"
    });
    expect(step({ post_status: "any" }, ctx)).toBeNull();
    expect(step({ post_status: ["publish", "private"] }, ctx)).toEqual({
      terms: { comment_post_status: ["publish", "private"] }
    });
  });
});

describe("termOrTerms", () => {
  it("picks term for one value and terms for more", () => {
    expect(termOrTerms("f", ["a"])).toEqual({ term: { f: "a" } });
    expect(termOrTerms("f", ["a", "b"])).toEqual({ terms: { f: ["a", "b"] } });
  });
});

describe("moderation status", () => {
  it("substitutes hold and approve only", () => {
    expect(mapModerationStatus(["hold", "approve", "spam", "0", "trash"])).toEqual([0, 1, "spam", "0", "trash"]);
  });

  it("splits unapproved identifiers into user ids and emails", () => {
    expect(splitUnapprovedIdentifiers(["3", "a@example.com", "7"])).toEqual({
      userIds: [3, 7],
      emails: ["a@example.com"]
    });
    expect(splitUnapprovedIdentifiers("b@example.com -4")).toEqual({ userIds: [4], emails: ["b@example.com"] });
  });

  it("keeps both identifier branches even when one is empty", () => {
    expect(statusStep({ status: "hold, approve", include_unapproved: "12" }, ctx)).toEqual({
      bool: {
        should: [
          { terms: { comment_approved: [0, 1] } },
          { terms: { user_id: [12] } },
          { terms: { "comment_author_email.raw": [] } }
        ]
      }
    });
  });
});

describe("collectMetaQuery", () => {
  it("returns null when no meta parameter is set", () => {
    expect(collectMetaQuery({})).toBeNull();
    expect(collectMetaQuery({ meta_key: "", meta_query: [] })).toBeNull();
  });

  it("puts the shorthand first and keeps list clauses", () => {
    expect(collectMetaQuery({ meta_key: "a", meta_query: [{ key: "b", compare: "EXISTS" }] })).toEqual({
      clauses: [{ key: "a" }, { key: "b", compare: "EXISTS" }]
    });
  });

  it("keeps a meta_value of 0 on the shorthand", () => {
    expect(collectMetaQuery({ meta_key: "count", meta_value: 0 })).toEqual({ clauses: [{ key: "count", value: 0 }] });
  });
});

describe("FILTER_STEPS", () => {
  it("covers every filter dimension", () => {
    expect(FILTER_STEPS).toHaveLength(27);
  });
});
