import { describe, it, expect } from "vitest";
import type { RejectedEntry, ValidationSummary } from "@esml/core";
import {
  formatAbort,
  formatLocation,
  formatRejection,
  formatResult,
  formatSummary,
} from "../src/lib/render.js";

const rejected: RejectedEntry = {
  index: 7,
  status: "rejected",
  kind: "declaration",
  type: "TypeDeclared@1",
  errorKind: "LineageViolation",
  reason: "BranchingForbidden",
  detail: "shop.Order@1 already has child version 2; branching is forbidden",
  line: 12,
  column: 3,
};

const summary: ValidationSummary = {
  total: 5,
  accepted: 4,
  rejected: 1,
  declarations: 3,
  events: 1,
  declaringTypes: ["TypeDeclared@1", "meta.EntityDeclared@1"],
  countsByType: { "TypeDeclared@1": 2, "meta.EntityDeclared@1": 2, "shop.Order": 1 },
  registry: {
    TypeDeclared: [{ version: 1, parent: null }],
    "meta.EntityDeclared": [{ version: 1, parent: null }],
    "shop.Order": [
      { version: 1, parent: null },
      { version: 2, parent: 1 },
    ],
  },
  fingerprint: "ab".repeat(32),
};

describe("render", () => {
  it("formats positions", () => {
    expect(formatLocation(rejected)).toBe("line 12, col 3, event 7");
    expect(formatLocation({ index: 0, status: "accepted", kind: "bootstrap", type: "TypeDeclared@1" })).toBe(
      "event 0",
    );
  });

  it("formats rejections with the lineage reason", () => {
    expect(formatRejection(rejected)).toBe(
      "ERROR: line 12, col 3, event 7: LineageViolation(BranchingForbidden): shop.Order@1 already has child version 2; branching is forbidden",
    );
    const abort: RejectedEntry = {
      index: 7,
      status: "rejected",
      type: "TypeDeclared@1",
      errorKind: "MissingBootstrap",
      detail: "no seed",
      line: 12,
      column: 3,
    };
    expect(formatAbort(abort)).toBe(
      "ABORTED: line 12, col 3, event 7: MissingBootstrap: no seed",
    );
  });

  it("formats the result line", () => {
    expect(formatResult(summary)).toBe("FAILED: 1 of 5 records rejected");
    expect(formatResult({ ...summary, rejected: 0, accepted: 5 })).toBe("OK");
  });

  it("formats the summary", () => {
    expect(formatSummary(summary)).toEqual([
      "Total events: 5",
      "  Type-declaring events: 3",
      "  Normal events: 1",
      "  Rejected events: 1",
      "Declared types (unique): 3",
      "Declarer-capable types: TypeDeclared@1, meta.EntityDeclared@1",
      "Event counts by type:",
      "  TypeDeclared@1: 2",
      "  meta.EntityDeclared@1: 2",
      "  shop.Order: 1",
      "Registry:",
      "  TypeDeclared: 1",
      "  meta.EntityDeclared: 1",
      "  shop.Order: 1, 2<-1",
      `Registry fingerprint: ${"ab".repeat(32)}`,
    ]);
  });
});
