import { describe, it, expect } from "vitest";

import { IssueTraversal, traverseIssues } from "../../../src/services/graph/traversal.js";
import type { IssueRecord } from "../../../src/types/issues.js";
import { FetchError } from "../../../src/utils/errors.js";
import { InMemoryIssueSource, makeIssue } from "./in-memory-source.js";

const renderNode = (issue: IssueRecord): string => `node:${issue.id}`;

describe("traverseIssues", () => {
  it("should drop closed issues and keep open ones", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", priority: "P1", subtasks: ["B"], outwardLinks: ["C"] }),
      makeIssue({ id: "B", priority: "P2" }),
      makeIssue({ id: "C", status: "Closed" }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect(result.fetched).toEqual(["A", "B", "C"]);
    expect(result.nodes).toEqual(["node:A", "node:B"]);
    expect([...result.retained]).toEqual(["A", "B"]);
    expect(result.links).toEqual(
      new Map([
        ["A", ["B", "C"]],
        ["B", []],
      ])
    );
    expect(result.skipped).toEqual([{ id: "C", status: "Closed" }]);
    expect(result.processedCount).toBe(2);
  });

  it("should treat Resolved as terminal regardless of case and padding", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", outwardLinks: ["B"] }),
      makeIssue({ id: "B", status: " resolved " }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect([...result.retained]).toEqual(["A"]);
    expect(result.skipped).toEqual([{ id: "B", status: " resolved " }]);
  });

  it("should not record links for a closed root", async () => {
    const source = new InMemoryIssueSource([makeIssue({ id: "A", status: "Closed", subtasks: ["B"] })]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect(result.fetched).toEqual(["A"]);
    expect(result.nodes).toEqual([]);
    expect(result.links.size).toBe(0);
    expect(result.processedCount).toBe(0);
  });

  it("should render a stopped root as a leaf without a link entry", async () => {
    const source = new InMemoryIssueSource([makeIssue({ id: "A", subtasks: ["B"], outwardLinks: ["C"] })]);

    const result = await traverseIssues(source, { rootId: "A", stopIds: ["A"], renderNode });

    expect(source.calls).toEqual(["A"]);
    expect(result.nodes).toEqual(["node:A"]);
    expect(result.links.has("A")).toBe(false);
    expect(result.stopped).toEqual(["A"]);
    expect(result.processedCount).toBe(1);
  });

  it("should not expand below a stop issue", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", outwardLinks: ["B"] }),
      makeIssue({ id: "B", outwardLinks: ["C"] }),
      makeIssue({ id: "C" }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", stopIds: new Set(["B"]), renderNode });

    expect(source.calls).toEqual(["A", "B"]);
    expect([...result.retained]).toEqual(["A", "B"]);
    expect(result.links).toEqual(new Map([["A", ["B"]]]));
    expect(result.processedCount).toBe(2);
  });

  it("should terminate on a cycle and fetch each issue once", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", outwardLinks: ["B"] }),
      makeIssue({ id: "B", outwardLinks: ["A"] }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect(source.calls).toEqual(["A", "B"]);
    expect(result.links).toEqual(
      new Map([
        ["A", ["B"]],
        ["B", ["A"]],
      ])
    );
  });

  it("should fetch a diamond's shared dependency only once", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", subtasks: ["B", "C"] }),
      makeIssue({ id: "B", outwardLinks: ["D"] }),
      makeIssue({ id: "C", outwardLinks: ["D"] }),
      makeIssue({ id: "D" }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect(source.callCount("D")).toBe(1);
    expect(result.fetched).toEqual(["A", "B", "C", "D"]);
    expect(result.nodes).toEqual(["node:A", "node:B", "node:C", "node:D"]);
  });

  it("should walk breadth-first with sub-tasks ahead of outward links", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", subtasks: ["B"], outwardLinks: ["C"] }),
      makeIssue({ id: "B", subtasks: ["D"] }),
      makeIssue({ id: "C" }),
      makeIssue({ id: "D" }),
    ]);

    const result = await traverseIssues(source, { rootId: "A", renderNode });

    expect(result.fetched).toEqual(["A", "B", "C", "D"]);
  });

  it("should reject with FetchError when an issue cannot be fetched", async () => {
    const source = new InMemoryIssueSource([makeIssue({ id: "A", outwardLinks: ["MISSING"] })]);

    await expect(traverseIssues(source, { rootId: "A", renderNode })).rejects.toThrow(FetchError);
    await expect(traverseIssues(source, { rootId: "A", renderNode })).rejects.toThrow(
      "Failed to fetch MISSING: HTTP 404 Not Found"
    );
  });

  it("should render nodes with formatNode by default", async () => {
    const source = new InMemoryIssueSource([makeIssue({ id: "A", priority: "P0" })]);

    const result = await new IssueTraversal(source, { rootId: "A" }).run();

    expect(result.nodes).toHaveLength(1);
    expect(result.nodes[0]?.startsWith('"A" [fillcolor="#ff6b6b",')).toBe(true);
  });

  it("should produce identical results on repeated runs", async () => {
    const source = new InMemoryIssueSource([
      makeIssue({ id: "A", subtasks: ["B"], outwardLinks: ["C", "B"] }),
      makeIssue({ id: "B", outwardLinks: ["A"] }),
      makeIssue({ id: "C", status: "Closed" }),
    ]);

    const first = await traverseIssues(source, { rootId: "A", renderNode });
    const second = await traverseIssues(source, { rootId: "A", renderNode });

    expect(second).toEqual(first);
  });
});

describe("traverseIssues with a source that answers under canonical keys", () => {
  const upperCase = (issueId: string): string => issueId.toUpperCase();

  it("should fetch and render each issue once when the root is requested under another key", async () => {
    const source = new InMemoryIssueSource(
      [makeIssue({ id: "PROJ-1", outwardLinks: ["PROJ-2"] }), makeIssue({ id: "PROJ-2", outwardLinks: ["PROJ-1"] })],
      upperCase
    );

    const result = await traverseIssues(source, { rootId: "proj-1", renderNode });

    expect(source.calls).toEqual(["proj-1", "PROJ-2"]);
    expect(result.nodes).toEqual(["node:PROJ-1", "node:PROJ-2"]);
    expect(result.links).toEqual(
      new Map([
        ["PROJ-1", ["PROJ-2"]],
        ["PROJ-2", ["PROJ-1"]],
      ])
    );
    expect(result.aliases).toEqual(new Map([["proj-1", "PROJ-1"]]));
    expect(result.processedCount).toBe(2);
  });

  it("should rewrite links to an alias onto the canonical key", async () => {
    const source = new InMemoryIssueSource(
      [makeIssue({ id: "PROJ-1", outwardLinks: ["proj-2", "PROJ-2"] }), makeIssue({ id: "PROJ-2" })],
      upperCase
    );

    const result = await traverseIssues(source, { rootId: "PROJ-1", renderNode });

    expect(source.calls).toEqual(["PROJ-1", "proj-2"]);
    expect(result.nodes).toEqual(["node:PROJ-1", "node:PROJ-2"]);
    expect(result.links.get("PROJ-1")).toEqual(["PROJ-2", "PROJ-2"]);
  });

  it("should honour a stop id given under the requested key", async () => {
    const source = new InMemoryIssueSource(
      [makeIssue({ id: "PROJ-1", outwardLinks: ["PROJ-2"] }), makeIssue({ id: "PROJ-2" })],
      upperCase
    );

    const result = await traverseIssues(source, { rootId: "proj-1", stopIds: ["proj-1"], renderNode });

    expect(source.calls).toEqual(["proj-1"]);
    expect(result.nodes).toEqual(["node:PROJ-1"]);
    expect(result.stopped).toEqual(["PROJ-1"]);
    expect(result.links.size).toBe(0);
  });
});
