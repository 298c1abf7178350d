export { buildDependencyGraph } from "./services/graph/index.js";
export type { BuildGraphOptions } from "./services/graph/index.js";
export {
  traverseIssues,
  IssueTraversal,
  resolveEdges,
  formatEdge,
  assembleGraph,
  formatNode,
  classifyPriority,
  wrapText,
} from "./services/graph/index.js";
export type { TraversalOptions } from "./services/graph/index.js";
export type { IssueSource } from "./services/issue-source.js";
export { JiraIssueSource } from "./services/jira-client.js";
export { CachedIssueSource } from "./services/issue-cache.js";
export {
  parseGraphRunConfig,
  parseJiraSourceConfig,
  loadJiraSourceConfig,
  parseAnnotations,
} from "./config/graph-config.js";
export type { GraphRunConfig, JiraSourceConfig } from "./config/graph-config.js";
export type { IssueRecord } from "./types/issues.js";
export type { DependencyGraph, GraphEdge, LinkTable, TraversalResult, SkippedIssue } from "./types/graph.js";
export { GraphError, FetchError, ConfigurationError } from "./utils/errors.js";
