import { quoteDot } from "./node-formatter.js";

export interface AssembleGraphInput {
  rootId: string;
  /** Node statements in traversal order */
  nodes: readonly string[];
  /** Edge statements */
  edges: readonly string[];
  generatedAt: Date;
}

export const GRAPH_PREAMBLE = [
  "rankdir=LR;",
  "nodesep=0.4;",
  "ranksep=0.8;",
  'node [shape=plaintext, style="rounded,filled", fontname="Helvetica", fontsize=10];',
];

export function buildGraphLabel(rootId: string, generatedAt: Date): string {
  return `${rootId} dependencies (generated ${generatedAt.toISOString()})`;
}

export function assembleGraph(input: AssembleGraphInput): string {
  const lines = [
    `digraph ${quoteDot(input.rootId)} {`,
    ...GRAPH_PREAMBLE,
    ...input.nodes,
    ...input.edges,
    `label=${quoteDot(buildGraphLabel(input.rootId, input.generatedAt))};`,
    `tooltip=${quoteDot(input.rootId)};`,
    "}",
  ];
  return `${lines.join("\n")}\n`;
}
