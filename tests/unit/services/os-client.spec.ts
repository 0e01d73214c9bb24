import { describe, it, expect, afterEach } from "vitest";
import { __resetClient, distributionFromInfo, getClient, versionFromInfo } from "../../../src/services/os-client.js";

afterEach(() => {
  __resetClient();
});

describe("versionFromInfo", () => {
  it("reads version.number", () => {
    expect(versionFromInfo({ version: { number: "2.11.0", distribution: "opensearch" } })).toBe("2.11.0");
  });

  it("returns an empty string for unexpected bodies", () => {
    expect(versionFromInfo(null)).toBe("");
    expect(versionFromInfo("2.0")).toBe("");
    expect(versionFromInfo({ version: "2.0" })).toBe("");
    expect(versionFromInfo({ version: { number: 2 } })).toBe("");
  });
});

describe("distributionFromInfo", () => {
  it("reads version.distribution", () => {
    expect(distributionFromInfo({ version: { number: "2.11.0", distribution: "opensearch" } })).toBe("opensearch");
    expect(distributionFromInfo({ version: { number: "7.17.0" } })).toBe("");
  });
});

describe("getClient", () => {
  it("caches the client until reset", () => {
    const a = getClient();
    expect(getClient()).toBe(a);
    __resetClient();
    expect(getClient()).not.toBe(a);
  });
});
