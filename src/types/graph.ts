/**
 * Types shared by the traversal engine, dependency resolver and assembler.
 */

/** Issue id -> ids it points at (sub-tasks first, then outward links). */
export type LinkTable = Map<string, string[]>;

/** Target issue id -> literal DOT attribute fragment, e.g. "[minlen=2]". */
export type EdgeAnnotations = ReadonlyMap<string, string>;

export interface GraphEdge {
  source: string;
  target: string;
  /** Appended verbatim after the edge when the target has an annotation */
  annotation?: string;
}

/** An issue that was fetched but dropped by the status filter. */
export interface SkippedIssue {
  id: string;
  status: string;
}

export interface TraversalResult {
  rootId: string;
  /** Rendered node statements, in traversal order */
  nodes: string[];
  /** Ids that passed the status filter and were rendered */
  retained: Set<string>;
  links: LinkTable;
  /** Every id handed to the issue source, in fetch order */
  fetched: string[];
  /** Requested id -> key the source answered with, where they differ */
  aliases: Map<string, string>;
  skipped: SkippedIssue[];
  /** Retained ids whose children were not explored */
  stopped: string[];
  /** Retained issues, stopped or not */
  processedCount: number;
}

export interface DependencyGraph {
  document: string;
  edges: GraphEdge[];
  traversal: TraversalResult;
}
