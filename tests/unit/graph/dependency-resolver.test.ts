import { describe, it, expect } from "vitest";

import { formatEdge, resolveEdges } from "../../../src/services/graph/dependency-resolver.js";
import type { LinkTable } from "../../../src/types/graph.js";

describe("resolveEdges", () => {
  it("should return empty array for an empty link table", () => {
    expect(resolveEdges(new Map(), new Set())).toEqual([]);
  });

  it("should keep only edges between retained issues", () => {
    const links: LinkTable = new Map([
      ["A", ["B", "C"]],
      ["B", ["D"]],
    ]);

    const edges = resolveEdges(links, new Set(["A", "B"]));

    expect(edges).toEqual([{ source: "A", target: "B" }]);
  });

  it("should skip sources that are not retained", () => {
    const links: LinkTable = new Map([["X", ["A"]]]);
    expect(resolveEdges(links, new Set(["A"]))).toEqual([]);
  });

  it("should emit a repeated link once", () => {
    const links: LinkTable = new Map([["A", ["B", "B"]]]);
    expect(resolveEdges(links, new Set(["A", "B"]))).toEqual([{ source: "A", target: "B" }]);
  });

  it("should keep both directions of a cycle", () => {
    const links: LinkTable = new Map([
      ["A", ["B"]],
      ["B", ["A"]],
    ]);
    expect(resolveEdges(links, new Set(["A", "B"]))).toEqual([
      { source: "A", target: "B" },
      { source: "B", target: "A" },
    ]);
  });

  it("should attach annotations only to edges into the annotated target", () => {
    const links: LinkTable = new Map([
      ["A", ["B", "C"]],
      ["C", ["B"]],
    ]);
    const annotations = new Map([["B", "[minlen=2]"]]);

    const edges = resolveEdges(links, new Set(["A", "B", "C"]), annotations);

    expect(edges).toEqual([
      { source: "A", target: "B", annotation: "[minlen=2]" },
      { source: "A", target: "C" },
      { source: "C", target: "B", annotation: "[minlen=2]" },
    ]);
  });
});

describe("formatEdge", () => {
  it("should render a bare edge", () => {
    expect(formatEdge({ source: "A", target: "B" })).toBe('"A"->"B"');
  });

  it("should append the annotation verbatim", () => {
    expect(formatEdge({ source: "A", target: "B", annotation: "[minlen=2]" })).toBe('"A"->"B" [minlen=2]');
  });
});
