/**
 * Dependency graph service: traversal -> edge resolution -> DOT document.
 */

import type { DependencyGraph, EdgeAnnotations } from "../../types/graph.js";
import { logInfo } from "../../utils/logger.js";
import type { IssueSource } from "../issue-source.js";
import { formatEdge, resolveEdges } from "./dependency-resolver.js";
import { assembleGraph } from "./graph-assembler.js";
import { traverseIssues } from "./traversal.js";

export interface BuildGraphOptions {
  rootId: string;
  stopIds?: Iterable<string>;
  /** Target issue id -> DOT attribute fragment appended to edges into it */
  annotations?: EdgeAnnotations;
  wrapWidth?: number;
  /** Trailer timestamp; defaults to now */
  generatedAt?: Date;
}

/** Re-keys annotations given under an alias onto the canonical issue key. */
function canonicalAnnotations(annotations: EdgeAnnotations, aliases: ReadonlyMap<string, string>): EdgeAnnotations {
  const canonical = new Map<string, string>();
  for (const [issueId, fragment] of annotations) {
    canonical.set(aliases.get(issueId) ?? issueId, fragment);
  }
  return canonical;
}

export async function buildDependencyGraph(
  source: IssueSource,
  options: BuildGraphOptions
): Promise<DependencyGraph> {
  const traversal = await traverseIssues(source, {
    rootId: options.rootId,
    stopIds: options.stopIds,
    wrapWidth: options.wrapWidth,
  });

  const edges = resolveEdges(
    traversal.links,
    traversal.retained,
    canonicalAnnotations(options.annotations ?? new Map(), traversal.aliases)
  );
  const document = assembleGraph({
    rootId: options.rootId,
    nodes: traversal.nodes,
    edges: edges.map(formatEdge),
    generatedAt: options.generatedAt ?? new Date(),
  });

  logInfo("graph built", {
    rootId: options.rootId,
    nodes: traversal.retained.size,
    edges: edges.length,
  });

  return { document, edges, traversal };
}

export { traverseIssues, IssueTraversal } from "./traversal.js";
export type { TraversalOptions } from "./traversal.js";
export { resolveEdges, formatEdge } from "./dependency-resolver.js";
export { assembleGraph, buildGraphLabel } from "./graph-assembler.js";
export { formatNode, classifyPriority, wrapText, quoteDot } from "./node-formatter.js";
