import { describe, it, expect } from "vitest";
import {
  formatTypeTag,
  isValidTypeName,
  normalizeVersion,
  parseTypeTag,
} from "../src/index.js";

describe("type tags", () => {
  it("parses name@version", () => {
    expect(parseTypeTag("common.struct.Address@3")).toEqual({
      name: "common.struct.Address",
      version: 3,
    });
  });

  it("leaves the version undefined when omitted", () => {
    expect(parseTypeTag("TypeDeclared")).toEqual({ name: "TypeDeclared", version: undefined });
  });

  it("rejects textual and zero-padded versions", () => {
    expect(parseTypeTag("Foo@new")).toBeUndefined();
    expect(parseTypeTag("Foo@0")).toBeUndefined();
    expect(parseTypeTag("Foo@01")).toBeUndefined();
    expect(parseTypeTag("Foo@")).toBeUndefined();
  });

  it("rejects malformed names", () => {
    expect(parseTypeTag("")).toBeUndefined();
    expect(parseTypeTag("a..b@1")).toBeUndefined();
    expect(parseTypeTag(".a@1")).toBeUndefined();
    expect(parseTypeTag("a b")).toBeUndefined();
  });

  it("accepts dashes and underscores inside segments", () => {
    expect(isValidTypeName("shop-v2.order_placed")).toBe(true);
    expect(isValidTypeName("1shop")).toBe(false);
  });

  it("formats with and without a version", () => {
    expect(formatTypeTag({ name: "a.B", version: 2 })).toBe("a.B@2");
    expect(formatTypeTag({ name: "a.B", version: undefined })).toBe("a.B");
  });
});

describe("normalizeVersion", () => {
  it("accepts positive integers and decimal strings", () => {
    expect(normalizeVersion(4)).toBe(4);
    expect(normalizeVersion("12")).toBe(12);
  });

  it("rejects everything else", () => {
    expect(normalizeVersion(0)).toBeUndefined();
    expect(normalizeVersion(-1)).toBeUndefined();
    expect(normalizeVersion(1.5)).toBeUndefined();
    expect(normalizeVersion("1.0")).toBeUndefined();
    expect(normalizeVersion("new")).toBeUndefined();
    expect(normalizeVersion(null)).toBeUndefined();
    expect(normalizeVersion(true)).toBeUndefined();
  });
});
