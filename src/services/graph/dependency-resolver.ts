/**
 * Turns the link table into edges between retained issues.
 *
 * Links whose target was filtered out or never reached are dropped here;
 * that is how closed work disappears from the graph.
 */

import type { EdgeAnnotations, GraphEdge, LinkTable } from "../../types/graph.js";
import { quoteDot } from "./node-formatter.js";

/**
 * Walks the link table in insertion order. Identical source->target pairs
 * (e.g. an issue that is both a sub-task and a linked issue) are emitted once.
 */
export function resolveEdges(
  links: LinkTable,
  retained: ReadonlySet<string>,
  annotations: EdgeAnnotations = new Map()
): GraphEdge[] {
  const edgeKeys = new Set<string>();
  const edges: GraphEdge[] = [];
  for (const [source, targets] of links) {
    if (!retained.has(source)) continue;
    for (const target of targets) {
      if (!retained.has(target)) continue;
      const key = `${source}->${target}`;
      if (edgeKeys.has(key)) continue;
      edgeKeys.add(key);
      const annotation = annotations.get(target);
      edges.push(annotation !== undefined ? { source, target, annotation } : { source, target });
    }
  }
  return edges;
}

export function formatEdge(edge: GraphEdge): string {
  const line = `${quoteDot(edge.source)}->${quoteDot(edge.target)}`;
  return edge.annotation !== undefined ? `${line} ${edge.annotation}` : line;
}
