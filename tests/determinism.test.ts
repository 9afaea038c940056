/**
 * Determinism: binary ordering helpers and stable output across repeated runs.
 */

import { canonicalEdges, sortIds, stringCompareBinary } from "../src/determinism/CanonicalOrder.js";
import { serializeResolution } from "../src/determinism/StableJson.js";
import { resolveOrder } from "../src/order/resolve.js";

describe("CanonicalOrder", () => {
  it("stringCompareBinary is deterministic", () => {
    expect(stringCompareBinary("a", "b")).toBe(-1);
    expect(stringCompareBinary("b", "a")).toBe(1);
    expect(stringCompareBinary("a", "a")).toBe(0);
  });

  it("sortIds orders by code unit, uppercase first", () => {
    expect(sortIds(["b", "B", "a", "A", "_"])).toEqual(["A", "B", "_", "a", "b"]);
  });

  it("canonicalEdges sorts by (from, to) and drops repeats", () => {
    expect(
      canonicalEdges([
        { from: "b", to: "a" },
        { from: "a", to: "c" },
        { from: "b", to: "a" },
        { from: "a", to: "b" },
      ]),
    ).toEqual([
      { from: "a", to: "b" },
      { from: "a", to: "c" },
      { from: "b", to: "a" },
    ]);
  });
});

describe("resolution output", () => {
  it("is byte-identical across runs", () => {
    const changeSet = {
      nodes: [{ id: "src/b.ts" }, { id: "src/a.ts", layer: "utility" as const }, { id: "src/b.ts#run", parent: "src/b.ts" }],
      edges: [{ from: "src/b.ts#run", to: "src/a.ts" }],
    };
    const runs = [1, 2, 3].map(() => serializeResolution(resolveOrder(changeSet)));
    expect(new Set(runs).size).toBe(1);
    expect(resolveOrder(changeSet).order).toEqual(["src/a.ts", "src/b.ts", "src/b.ts#run"]);
  });
});
