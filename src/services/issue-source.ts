import type { IssueRecord } from "../types/issues.js";

/**
 * The only I/O boundary the graph builder depends on.
 * Implementations reject with FetchError when no record can be produced.
 */
export interface IssueSource {
  fetchIssue(issueId: string): Promise<IssueRecord>;
}
