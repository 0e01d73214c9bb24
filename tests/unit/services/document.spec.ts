import { describe, it, expect } from "vitest";
import {
  isProtectedMeta,
  loadMetaPolicy,
  prepareDocument,
  prepareMeta,
  prepareMetaValueTypes,
  type MetaPolicy
} from "../../../src/services/document.js";
import type { CommentRecord, PostRecord } from "../../../src/domain/types.js";

const comment: CommentRecord = {
  comment_ID: 11,
  comment_post_ID: 3,
  comment_author: "Jo",
  comment_author_email: "jo@example.com",
  comment_author_url: "https://example.com",
  comment_author_IP: "127.0.0.1",
  comment_date: "2024-05-01 10:00:00",
  comment_date_gmt: "2024-05-01 08:00:00",
  comment_content: "Nice post",
  comment_karma: 0,
  comment_approved: "1",
  comment_agent: "test-agent",
  comment_type: "",
  comment_parent: 0,
  user_id: 4
};

const post: PostRecord = {
  post_author: 2,
  post_status: "publish",
  post_type: "post",
  post_name: "hello-world",
  post_parent: 0
};

const openPolicy: MetaPolicy = { allowedProtectedKeys: [], excludedPublicKeys: [], whitelistKeys: [] };

describe("meta policy", () => {
  it("loads the shipped defaults", () => {
    expect(loadMetaPolicy()).toEqual(openPolicy);
  });

  it("treats underscore keys as protected", () => {
    expect(isProtectedMeta("_edit_lock")).toBe(true);
    expect(isProtectedMeta("mood")).toBe(false);
  });

  it("indexes public keys and drops protected ones by default", () => {
    expect(prepareMeta({ mood: "happy", _secret: "x" }, openPolicy)).toEqual({ mood: ["happy"] });
  });

  it("honors allowed, excluded and whitelisted keys", () => {
    const policy: MetaPolicy = {
      allowedProtectedKeys: ["_rating"],
      excludedPublicKeys: true,
      whitelistKeys: ["mood"]
    };
    expect(prepareMeta({ mood: "happy", color: "red", _rating: 5, _other: 1 }, policy)).toEqual({
      mood: ["happy"],
      _rating: [5]
    });
  });

  it("allows every protected key when configured", () => {
    const policy: MetaPolicy = { allowedProtectedKeys: true, excludedPublicKeys: ["color"], whitelistKeys: [] };
    expect(prepareMeta({ _a: "1", color: "red", size: ["s", "m"] }, policy)).toEqual({
      _a: ["1"],
      size: ["s", "m"]
    });
  });
});

describe("prepareMetaValueTypes", () => {
  it("adds numeric sub-fields", () => {
    expect(prepareMetaValueTypes("3.7")).toEqual({ value: "3.7", raw: "3.7", boolean: false, long: 3, double: 3.7 });
    expect(prepareMetaValueTypes(1)).toEqual({ value: "1", raw: "1", boolean: true, long: 1, double: 1 });
  });

  it("adds date sub-fields for date strings", () => {
    expect(prepareMetaValueTypes("2024-02-03 04:05:06")).toEqual({
      value: "2024-02-03 04:05:06",
      raw: "2024-02-03 04:05:06",
      boolean: false,
      datetime: "2024-02-03 04:05:06",
      date: "2024-02-03",
      time: "04:05:06"
    });
  });

  it("keeps plain strings as value/raw/boolean only", () => {
    expect(prepareMetaValueTypes("Yes")).toEqual({ value: "Yes", raw: "Yes", boolean: true });
    expect(prepareMetaValueTypes("hello there")).toEqual({ value: "hello there", raw: "hello there", boolean: false });
  });

  it("stringifies booleans and null", () => {
    expect(prepareMetaValueTypes(true)).toEqual({ value: "1", raw: "1", boolean: true, long: 1, double: 1 });
    expect(prepareMetaValueTypes(false)).toEqual({ value: "", raw: "", boolean: false });
    expect(prepareMetaValueTypes(null)).toEqual({ value: "", raw: "", boolean: false });
  });
});

describe("prepareDocument", () => {
  it("returns null without a comment", () => {
    expect(prepareDocument(null, post)).toBeNull();
  });

  it("merges comment and post fields", () => {
    const doc = prepareDocument(comment, post, { mood: "happy" }, openPolicy);
    expect(doc).toEqual({
      ID: 11,
      comment_ID: 11,
      comment_post_ID: 3,
      comment_author: "Jo",
      comment_author_email: "jo@example.com",
      comment_author_url: "https://example.com",
      comment_author_IP: "127.0.0.1",
      comment_date: "2024-05-01 10:00:00",
      comment_date_gmt: "2024-05-01 08:00:00",
      comment_content: "Nice post",
      comment_karma: 0,
      comment_approved: "1",
      comment_agent: "test-agent",
      comment_type: "comment",
      comment_parent: 0,
      user_id: 4,
      comment_post_author_ID: 2,
      comment_post_status: "publish",
      comment_post_type: "post",
      comment_post_name: "hello-world",
      comment_post_parent: 0,
      meta: { mood: [{ value: "happy", raw: "happy", boolean: false }] }
    });
  });

  it("leaves post fields null when the post is missing", () => {
    const doc = prepareDocument({ ...comment, comment_type: "pingback" }, undefined, {}, openPolicy);
    expect(doc?.comment_type).toBe("pingback");
    expect(doc?.comment_post_status).toBeNull();
    expect(doc?.comment_post_author_ID).toBeNull();
    expect(doc?.meta).toEqual({});
  });
});
