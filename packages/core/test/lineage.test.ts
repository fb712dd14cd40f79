import { describe, it, expect, beforeEach } from "vitest";
import { LineageTracker } from "../src/index.js";

describe("LineageTracker", () => {
  let tracker: LineageTracker;

  beforeEach(() => {
    // 1 ─┬─ 2 ── 4
    //    └─ 3
    tracker = new LineageTracker();
    tracker.addRoot("Order", 1);
    tracker.addChild("Order", 2, 1);
    tracker.addChild("Order", 3, 1);
    tracker.addChild("Order", 4, 2);
  });

  it("exposes parents, children and roots", () => {
    expect(tracker.versions("Order")).toEqual([1, 2, 3, 4]);
    expect(tracker.parentOf("Order", 4)).toBe(2);
    expect(tracker.parentOf("Order", 1)).toBeNull();
    expect(tracker.parentOf("Order", 9)).toBeUndefined();
    expect(tracker.childrenOf("Order", 1)).toEqual([2, 3]);
    expect(tracker.roots("Order")).toEqual([1]);
    expect(tracker.roots("Unknown")).toEqual([]);
  });

  it("lists ancestors from the root down", () => {
    expect(tracker.ancestors("Order", 4)).toEqual([1, 2, 4]);
    expect(tracker.ancestors("Order", 1)).toEqual([1]);
    expect(tracker.ancestors("Order", 7)).toEqual([]);
  });

  it("answers descendant queries strictly", () => {
    expect(tracker.isDescendant("Order", 4, 1)).toBe(true);
    expect(tracker.isDescendant("Order", 4, 3)).toBe(false);
    expect(tracker.isDescendant("Order", 2, 2)).toBe(false);
  });

  it("accepts a first version without parent", () => {
    expect(tracker.check("Invoice", 5, undefined, true)).toBeUndefined();
  });

  it("rejects a parent on a name with no versions", () => {
    expect(tracker.check("Invoice", 2, 1, true)?.reason).toBe("UnknownParent");
  });

  it("requires a parent once the name exists", () => {
    expect(tracker.check("Order", 5, undefined, true)).toEqual({
      kind: "LineageViolation",
      reason: "MissingParent",
      detail: "Order@5 must name a parent version: Order is already registered",
    });
  });

  it("rejects an unregistered parent", () => {
    expect(tracker.check("Order", 5, 9, true)).toEqual({
      kind: "LineageViolation",
      reason: "UnknownParent",
      detail: "Order@5 names parent version 9, which is not registered",
    });
  });

  it("requires the child to be greater than its parent", () => {
    expect(tracker.check("Order", 2, 3, true)?.reason).toBe("NonMonotonicVersion");
  });

  it("enforces the branching policy", () => {
    expect(tracker.check("Order", 5, 4, false)).toBeUndefined();
    expect(tracker.check("Order", 5, 1, true)).toBeUndefined();
    expect(tracker.check("Order", 5, 1, false)).toEqual({
      kind: "LineageViolation",
      reason: "BranchingForbidden",
      detail: "Order@1 already has child version 2, 3; branching is forbidden",
    });
  });

  it("refuses edges that break the tree", () => {
    expect(() => tracker.addChild("Order", 4, 1)).toThrow("Order@4 is already in the lineage");
    expect(() => tracker.addChild("Order", 6, 5)).toThrow("Order@5 is not in the lineage");
  });
});
